import { Buffer } from "node:buffer";
import { randomUUID } from "node:crypto";
import { mkdir, readFile, readdir, rename, rm, rmdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { StructuredLogger } from "../logger.js";
import { isNotFound } from "../nodePrimitives.js";
import { ensureParentDirectory, resolveWithin, safeJoin } from "../paths.js";
import { ChecksumMismatchError, PersistenceFaultError, describeError } from "./errors.js";
import { DEFAULT_VERSION, ToolPath } from "./toolPath.js";
import {
  type IndexEntry,
  PersistedToolSchema,
  TOOL_FILE_VERSION,
  type ToolDefinition,
  ToolIndexSchema,
  type ToolMetadata,
  serializeToolDefinition,
  serializeToolPath,
} from "./types.js";

/** Durable storage of user tool definitions. */
export interface ToolStore {
  save(tool: ToolDefinition): Promise<void>;
  /** Resolves `null` when the tool is not stored. */
  load(path: ToolPath): Promise<ToolDefinition | null>;
  /** Stored tools, optionally restricted to `bin`, `sbin`, `docs` or a user id. */
  list(namespace?: string): Promise<ToolDefinition[]>;
  /** Resolves whether an index entry or a document was removed. */
  delete(path: ToolPath): Promise<boolean>;
}

export interface FileToolStoreOptions {
  /** Directory holding `index.json` and the per-tool documents. */
  root: string;
  logger: StructuredLogger;
  /** Override the clock primarily for unit tests. */
  clock?: () => Date;
}

const INDEX_FILE = "index.json";

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const UINT64_MASK = 0xffffffffffffffffn;

/** 64-bit FNV-1a digest of the UTF-8 bytes, as 16 lowercase hex characters. */
export function checksumScript(script: string): string {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(script, "utf8")) {
    hash ^= BigInt(byte);
    hash = (hash * FNV_PRIME) & UINT64_MASK;
  }
  return hash.toString(16).padStart(16, "0");
}

/**
 * Relative location of a tool document: `system/<kind>/` or
 * `users/<user>/<package>/`, then `<name>.json` or `<name>_<version>.json`.
 */
export function relativeToolFile(toolPath: ToolPath): string {
  const fileName =
    toolPath.version === DEFAULT_VERSION ? `${toolPath.name}.json` : `${toolPath.name}_${toolPath.version}.json`;
  if (toolPath.namespace.kind === "user") {
    return path.join("users", toolPath.namespace.user, toolPath.package ?? "default", fileName);
  }
  return path.join("system", toolPath.namespace.kind, fileName);
}

/**
 * File-backed {@link ToolStore}. An `index.json` maps canonical paths to their
 * documents and checksums; the documents themselves stay authoritative. Writes
 * are queued sequentially so the index never interleaves two updates.
 */
export class FileToolStore implements ToolStore {
  private readonly root: string;
  private readonly indexPath: string;
  private readonly logger: StructuredLogger;
  private readonly clock: () => Date;
  private readonly index = new Map<string, IndexEntry>();
  private lastUpdated: string;
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(root: string, logger: StructuredLogger, clock: () => Date) {
    this.root = root;
    this.indexPath = resolveWithin(root, INDEX_FILE);
    this.logger = logger;
    this.clock = clock;
    this.lastUpdated = clock().toISOString();
  }

  /** Creates the root directory when needed and loads the index. */
  static async open(options: FileToolStoreOptions): Promise<FileToolStore> {
    const root = path.resolve(options.root);
    try {
      await mkdir(root, { recursive: true });
    } catch (error) {
      throw new PersistenceFaultError(`Failed to create storage directory: ${describeError(error)}`, error, { root });
    }
    const store = new FileToolStore(root, options.logger, options.clock ?? (() => new Date()));
    await store.loadIndex();
    return store;
  }

  /** Number of entries currently held by the index. */
  get size(): number {
    return this.index.size;
  }

  async save(tool: ToolDefinition): Promise<void> {
    await this.enqueue(async () => {
      const relative = relativeToolFile(tool.path);
      const filePath = this.resolveDocument(relative);
      const checksum = checksumScript(tool.script);
      const now = this.clock().toISOString();
      const previous = await this.readExisting(filePath);
      if (previous && !previous.tool.path.equals(tool.path)) {
        throw new PersistenceFaultError(
          `Cannot save ${tool.path.toString()}: ${relative} already holds ${previous.tool.path.toString()}`,
          undefined,
          { file: filePath, owner: previous.tool.path.toString() },
        );
      }
      const metadata: ToolMetadata = {
        id: previous?.metadata.id ?? randomUUID(),
        created_at: previous?.metadata.created_at ?? now,
        updated_at: now,
        checksum,
        file_version: TOOL_FILE_VERSION,
      };

      try {
        await ensureParentDirectory(filePath);
        await writeFile(
          filePath,
          JSON.stringify({ metadata, tool: serializeToolDefinition(tool) }, null, 2),
          "utf8",
        );
      } catch (error) {
        throw new PersistenceFaultError(`Failed to write tool ${tool.path.toString()}: ${describeError(error)}`, error, {
          file: filePath,
        });
      }

      this.index.set(tool.path.toString(), { path: tool.path, file_path: relative, checksum, updated_at: now });
      this.lastUpdated = now;
      await this.writeIndex();
      this.logger.debug("tool_saved", { path: tool.path.toString(), file: filePath });
    });
  }

  async load(toolPath: ToolPath): Promise<ToolDefinition | null> {
    const entry = this.index.get(toolPath.toString());
    if (entry) {
      const indexed = await this.readOwnedDocument(this.resolveDocument(entry.file_path), toolPath);
      if (indexed) {
        const found = checksumScript(indexed.script);
        if (found !== entry.checksum) {
          const mismatch = new ChecksumMismatchError(toolPath.toString(), entry.checksum, found);
          this.logger.warn("checksum_mismatch", { code: mismatch.code, message: mismatch.message, ...mismatch.details });
        }
        return indexed;
      }
    }
    return this.readOwnedDocument(this.resolveDocument(relativeToolFile(toolPath)), toolPath);
  }

  async list(namespace?: string): Promise<ToolDefinition[]> {
    const tools: ToolDefinition[] = [];
    const keys = [...this.index.keys()].sort();
    for (const key of keys) {
      const entry = this.index.get(key);
      if (!entry || (namespace !== undefined && entry.path.namespaceKeyword() !== namespace)) {
        continue;
      }
      try {
        const tool = await this.load(entry.path);
        if (tool) {
          tools.push(tool);
        }
      } catch (error) {
        this.logger.warn("stored_tool_skipped", { path: key, message: describeError(error) });
      }
    }
    return tools;
  }

  async delete(toolPath: ToolPath): Promise<boolean> {
    let deleted = false;
    await this.enqueue(async () => {
      const key = toolPath.toString();
      const entry = this.index.get(key);
      const filePath = this.resolveDocument(entry?.file_path ?? relativeToolFile(toolPath));

      if (entry) {
        this.index.delete(key);
        this.lastUpdated = this.clock().toISOString();
        deleted = true;
      }

      const owner = (await this.readExisting(filePath))?.tool.path;
      if (owner && !owner.equals(toolPath)) {
        this.logger.warn("stored_tool_path_mismatch", { path: key, owner: owner.toString(), file: filePath });
      } else {
        try {
          await rm(filePath);
          deleted = true;
          this.logger.debug("tool_file_deleted", { path: key, file: filePath });
        } catch (error) {
          if (!isNotFound(error)) {
            throw new PersistenceFaultError(`Failed to delete tool ${key}: ${describeError(error)}`, error, {
              file: filePath,
            });
          }
        }
      }

      await this.pruneEmptyDirectories(path.dirname(filePath));
      if (entry) {
        await this.writeIndex();
      }
    });
    return deleted;
  }

  private async loadIndex(): Promise<void> {
    let raw: string;
    try {
      raw = await readFile(this.indexPath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw new PersistenceFaultError(`Failed to read index: ${describeError(error)}`, error, { file: this.indexPath });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      this.logger.warn("tool_index_unreadable", { file: this.indexPath, message: describeError(error) });
      return;
    }
    const result = ToolIndexSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.warn("tool_index_unreadable", { file: this.indexPath, message: result.error.message });
      return;
    }

    for (const entry of Object.values(result.data.tools)) {
      this.index.set(entry.path.toString(), entry);
    }
    this.lastUpdated = result.data.last_updated;
  }

  private async writeIndex(): Promise<void> {
    const tools: Record<string, unknown> = {};
    for (const key of [...this.index.keys()].sort()) {
      const entry = this.index.get(key);
      if (entry) {
        tools[key] = { ...entry, path: serializeToolPath(entry.path) };
      }
    }
    const temporary = `${this.indexPath}.tmp`;
    try {
      await writeFile(temporary, JSON.stringify({ tools, last_updated: this.lastUpdated }, null, 2), "utf8");
      await rename(temporary, this.indexPath);
    } catch (error) {
      throw new PersistenceFaultError(`Failed to write index: ${describeError(error)}`, error, { file: this.indexPath });
    }
  }

  private async readDocument(filePath: string): Promise<ToolDefinition | null> {
    let raw: string;
    try {
      raw = await readFile(filePath, "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw new PersistenceFaultError(`Failed to read ${filePath}: ${describeError(error)}`, error, { file: filePath });
    }
    try {
      return PersistedToolSchema.parse(JSON.parse(raw)).tool;
    } catch (error) {
      throw new PersistenceFaultError(`Invalid tool document ${filePath}: ${describeError(error)}`, error, {
        file: filePath,
      });
    }
  }

  /**
   * Document read only when it belongs to `toolPath`. Distinct paths can map
   * to the same file (`add_1` and `add:1`), so a foreign document counts as
   * absent.
   */
  private async readOwnedDocument(filePath: string, toolPath: ToolPath): Promise<ToolDefinition | null> {
    const tool = await this.readDocument(filePath);
    if (tool && !tool.path.equals(toolPath)) {
      this.logger.warn("stored_tool_path_mismatch", {
        path: toolPath.toString(),
        owner: tool.path.toString(),
        file: filePath,
      });
      return null;
    }
    return tool;
  }

  /** Existing document at `filePath`, or `null` when it is missing or invalid. */
  private async readExisting(filePath: string): Promise<{ metadata: ToolMetadata; tool: ToolDefinition } | null> {
    try {
      const result = PersistedToolSchema.safeParse(JSON.parse(await readFile(filePath, "utf8")));
      return result.success ? result.data : null;
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.debug("tool_metadata_unreadable", { file: filePath, message: describeError(error) });
      }
      return null;
    }
  }

  /**
   * Removes now-empty directories from `directory` upwards. Stops at the first
   * non-empty directory and never removes the store root.
   */
  private async pruneEmptyDirectories(directory: string): Promise<void> {
    let current = directory;
    while (current !== this.root && current.startsWith(`${this.root}${path.sep}`)) {
      let remaining: string[];
      try {
        remaining = await readdir(current);
      } catch (error) {
        if (isNotFound(error)) {
          current = path.dirname(current);
          continue;
        }
        throw new PersistenceFaultError(`Failed to inspect ${current}: ${describeError(error)}`, error);
      }
      if (remaining.length > 0) {
        return;
      }
      try {
        await rmdir(current);
      } catch (error) {
        if (!isNotFound(error)) {
          throw new PersistenceFaultError(`Failed to remove ${current}: ${describeError(error)}`, error);
        }
      }
      current = path.dirname(current);
    }
  }

  private resolveDocument(relative: string): string {
    return safeJoin(this.root, relative);
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.writeQueue.then(task);
    // Keep the queue usable after a failed write; the caller still sees the rejection.
    this.writeQueue = run.catch(() => undefined);
    return run;
  }
}
