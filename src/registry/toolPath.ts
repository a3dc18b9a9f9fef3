import { PathFormatError } from "./errors.js";

/**
 * Closed set of namespaces a tool can live in. `bin`, `sbin` and `docs` hold
 * the built-in system tools; every caller-managed tool lives under a user id.
 */
export type Namespace =
  | { readonly kind: "bin" }
  | { readonly kind: "sbin" }
  | { readonly kind: "docs" }
  | { readonly kind: "user"; readonly user: string };

export type SystemNamespaceKind = "bin" | "sbin" | "docs";

export const SYSTEM_NAMESPACES: readonly SystemNamespaceKind[] = ["bin", "sbin", "docs"];

/** Version assigned to paths that do not name one. */
export const DEFAULT_VERSION = "latest";

/** User ids that would collide with the system namespaces or the store layout. */
export const RESERVED_USER_IDS: ReadonlySet<string> = new Set(["bin", "sbin", "docs", "users"]);

/**
 * Identifiers (user ids, packages, names) never start or end with a separator
 * and never double one, which keeps the `__`/`___` delimiters of the encoded
 * form unambiguous.
 */
const IDENTIFIER_PATTERN = /^[A-Za-z0-9]+(?:[_-][A-Za-z0-9]+)*$/;
/** Versions may not contain `_`: the encoded form uses it in place of `.`. */
const VERSION_PATTERN = /^[A-Za-z0-9]+(?:[.-][A-Za-z0-9]+)*$/;

const SYSTEM_ENCODED_SEPARATOR = "___";
const USER_PREFIX = "user_";
const VERSION_MARKER = "__v";

function isValidIdentifier(value: string): boolean {
  return IDENTIFIER_PATTERN.test(value);
}

function isValidVersion(value: string): boolean {
  return VERSION_PATTERN.test(value);
}

function isSystemKind(value: string): value is SystemNamespaceKind {
  return value === "bin" || value === "sbin" || value === "docs";
}

function assertIdentifier(value: string, role: string, input: string): void {
  if (!isValidIdentifier(value)) {
    throw new PathFormatError(`Invalid ${role} '${value}'`, input);
  }
}

function assertVersion(value: string, input: string): void {
  if (!isValidVersion(value)) {
    throw new PathFormatError(`Invalid version '${value}'`, input);
  }
}

/** Immutable address of a tool. Instances only come from the validating factories below. */
export class ToolPath {
  readonly namespace: Namespace;
  readonly package: string | null;
  readonly name: string;
  readonly version: string;

  private constructor(namespace: Namespace, pkg: string | null, name: string, version: string) {
    this.namespace = namespace;
    this.package = pkg;
    this.name = name;
    this.version = version;
  }

  static bin(name: string): ToolPath {
    return ToolPath.system("bin", name);
  }

  static sbin(name: string): ToolPath {
    return ToolPath.system("sbin", name);
  }

  static docs(name: string): ToolPath {
    return ToolPath.system("docs", name);
  }

  static system(kind: SystemNamespaceKind, name: string): ToolPath {
    assertIdentifier(name, "tool name", name);
    return new ToolPath({ kind }, null, name, DEFAULT_VERSION);
  }

  static user(user: string, pkg: string, name: string, version: string = DEFAULT_VERSION): ToolPath {
    const input = `/${user}/${pkg}/${name}:${version}`;
    assertIdentifier(user, "user id", input);
    if (RESERVED_USER_IDS.has(user)) {
      throw new PathFormatError(`User id '${user}' is reserved`, input);
    }
    assertIdentifier(pkg, "package", input);
    assertIdentifier(name, "tool name", input);
    assertVersion(version, input);
    return new ToolPath({ kind: "user", user }, pkg, name, version);
  }

  /**
   * Parses a canonical path: `/bin/<name>`, `/sbin/<name>`, `/docs/<name>` or
   * `/<user>/<package>/<name>[:<version>]`. A version suffix on a system path
   * is accepted and discarded.
   */
  static parse(input: string): ToolPath {
    if (!input.startsWith("/")) {
      throw new PathFormatError("Path must start with '/'", input);
    }
    const segments = input.slice(1).split("/");

    if (segments.length === 2) {
      const [kind, rawName] = segments;
      if (kind === undefined || rawName === undefined || !isSystemKind(kind)) {
        throw new PathFormatError(`Unknown system namespace '${kind ?? ""}'`, input);
      }
      const [name] = splitVersion(rawName, input);
      return ToolPath.system(kind, name);
    }

    if (segments.length === 3) {
      const [user, pkg, rawName] = segments;
      if (user === undefined || pkg === undefined || rawName === undefined) {
        throw new PathFormatError("Invalid path format", input);
      }
      const [name, version] = splitVersion(rawName, input);
      return ToolPath.user(user, pkg, name, version);
    }

    throw new PathFormatError("Invalid path format", input);
  }

  /**
   * Decodes a protocol-safe name produced by {@link toEncodedName}. The
   * package-less form `user_<user>___<name>` is rejected: user paths always
   * carry a package.
   */
  static fromEncodedName(encoded: string): ToolPath {
    for (const kind of SYSTEM_NAMESPACES) {
      const prefix = `${kind}${SYSTEM_ENCODED_SEPARATOR}`;
      if (encoded.startsWith(prefix)) {
        return ToolPath.system(kind, encoded.slice(prefix.length));
      }
    }

    if (!encoded.startsWith(USER_PREFIX)) {
      throw new PathFormatError(`Invalid encoded tool name '${encoded}'`, encoded);
    }

    const rest = encoded.slice(USER_PREFIX.length);
    const split = rest.indexOf(SYSTEM_ENCODED_SEPARATOR);
    if (split < 0) {
      throw new PathFormatError(`Invalid encoded tool name '${encoded}'`, encoded);
    }
    const owner = rest.slice(0, split).split("__");
    const [user, pkg] = owner;
    if (owner.length !== 2 || user === undefined || pkg === undefined) {
      throw new PathFormatError(`Encoded user tool '${encoded}' must name a user and a package`, encoded);
    }

    const tail = rest.slice(split + SYSTEM_ENCODED_SEPARATOR.length);
    const marker = tail.indexOf("__");
    if (marker < 0) {
      return ToolPath.user(user, pkg, tail);
    }
    if (!tail.startsWith(VERSION_MARKER, marker)) {
      throw new PathFormatError(`Invalid version marker in '${encoded}'`, encoded);
    }
    const version = tail.slice(marker + VERSION_MARKER.length).replace(/_/g, ".");
    return ToolPath.user(user, pkg, tail.slice(0, marker), version);
  }

  /** Canonical form; the version segment is omitted when it is `latest`. */
  toString(): string {
    if (this.namespace.kind !== "user") {
      return `/${this.namespace.kind}/${this.name}`;
    }
    const base = `/${this.namespace.user}/${this.package ?? ""}/${this.name}`;
    return this.version === DEFAULT_VERSION ? base : `${base}:${this.version}`;
  }

  /** Encoded form free of `/` and `:`, used as the MCP tool name. */
  toEncodedName(): string {
    if (this.namespace.kind !== "user") {
      return `${this.namespace.kind}${SYSTEM_ENCODED_SEPARATOR}${this.name}`;
    }
    const base = `${USER_PREFIX}${this.namespace.user}__${this.package ?? ""}${SYSTEM_ENCODED_SEPARATOR}${this.name}`;
    return this.version === DEFAULT_VERSION ? base : `${base}${VERSION_MARKER}${this.version.replace(/\./g, "_")}`;
  }

  isSystem(): boolean {
    return this.namespace.kind !== "user";
  }

  /** `bin`, `sbin`, `docs` or the user id; the value namespace filters match against. */
  namespaceKeyword(): string {
    return this.namespace.kind === "user" ? this.namespace.user : this.namespace.kind;
  }

  equals(other: ToolPath): boolean {
    return this.toString() === other.toString();
  }

  toJSON(): string {
    return this.toString();
  }
}

function splitVersion(segment: string, input: string): [string, string] {
  const colon = segment.indexOf(":");
  if (colon < 0) {
    return [segment, DEFAULT_VERSION];
  }
  const version = segment.slice(colon + 1);
  assertVersion(version, input);
  return [segment.slice(0, colon), version];
}

/**
 * Map keyed by tool path. Equality follows the canonical string, so two
 * separately parsed instances of the same path address one entry.
 */
export class ToolPathMap<V> {
  private readonly entriesByKey = new Map<string, { path: ToolPath; value: V }>();

  get size(): number {
    return this.entriesByKey.size;
  }

  get(path: ToolPath): V | undefined {
    return this.entriesByKey.get(path.toString())?.value;
  }

  has(path: ToolPath): boolean {
    return this.entriesByKey.has(path.toString());
  }

  set(path: ToolPath, value: V): this {
    this.entriesByKey.set(path.toString(), { path, value });
    return this;
  }

  delete(path: ToolPath): boolean {
    return this.entriesByKey.delete(path.toString());
  }

  clear(): void {
    this.entriesByKey.clear();
  }

  *keys(): IterableIterator<ToolPath> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.path;
    }
  }

  *values(): IterableIterator<V> {
    for (const entry of this.entriesByKey.values()) {
      yield entry.value;
    }
  }

  *entries(): IterableIterator<[ToolPath, V]> {
    for (const entry of this.entriesByKey.values()) {
      yield [entry.path, entry.value];
    }
  }

  [Symbol.iterator](): IterableIterator<[ToolPath, V]> {
    return this.entries();
  }
}
