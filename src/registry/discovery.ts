import type { Dirent } from "node:fs";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";

import type { StructuredLogger } from "../logger.js";
import { isNotFound } from "../nodePrimitives.js";
import { resolveWithin } from "../paths.js";
import { DiscoveryIOError, PathFormatError, describeError } from "./errors.js";
import { DEFAULT_VERSION, SYSTEM_NAMESPACES, ToolPath, ToolPathMap } from "./toolPath.js";
import type { DiscoveredTool, ParameterDefinition } from "./types.js";

export interface ToolDiscoveryOptions {
  /** Directory holding `bin/`, `sbin/`, `docs/` and `users/<user>/<package>/`. */
  root: string;
  /** Extension of tool scripts, leading dot included. */
  extension?: string;
  logger: StructuredLogger;
}

export const DEFAULT_SCRIPT_EXTENSION = ".js";

/** Metadata read from the leading comment block of a tool script. */
export interface ToolHeader {
  description: string | null;
  version: string | null;
  parameters: ParameterDefinition[];
}

const COMMENT_PREFIXES = ["//", "#"] as const;

function stripCommentPrefix(line: string): string | null {
  const trimmed = line.trimStart();
  for (const prefix of COMMENT_PREFIXES) {
    if (trimmed.startsWith(prefix)) {
      return trimmed.slice(prefix.length).trim();
    }
  }
  return null;
}

/**
 * Parses the header of a tool script. Only the leading contiguous run of
 * comment lines (`//` or `#`, shebang included) is read; the first other line
 * ends the header.
 *
 * Recognised tags:
 * - `@description <text>`
 * - `@version <text>`
 * - `@param <name>:<type>[:required] [<description>]`
 */
export function parseToolHeader(content: string): ToolHeader {
  const header: ToolHeader = { description: null, version: null, parameters: [] };

  for (const line of content.split(/\r?\n/)) {
    const comment = stripCommentPrefix(line);
    if (comment === null) {
      break;
    }

    if (comment.startsWith("@description ")) {
      header.description = comment.slice("@description ".length).trim();
    } else if (comment.startsWith("@version ")) {
      header.version = comment.slice("@version ".length).trim();
    } else if (comment.startsWith("@param ")) {
      const parameter = parseParamTag(comment.slice("@param ".length).trim());
      if (parameter) {
        header.parameters.push(parameter);
      }
    }
  }

  return header;
}

function parseParamTag(tag: string): ParameterDefinition | null {
  const space = tag.indexOf(" ");
  const definition = space < 0 ? tag : tag.slice(0, space);
  const description = space < 0 ? "" : tag.slice(space + 1).trim();
  const [name, typeName, flag] = definition.split(":");
  if (!name || !typeName) {
    return null;
  }
  return { name, type_name: typeName, required: flag === "required", description };
}

/**
 * Scans the tools directory for scripts carrying metadata headers. Each
 * {@link discover} call rebuilds the scanner's own working set from scratch;
 * merging into the executor's table is the caller's concern.
 */
export class ToolDiscovery {
  readonly root: string;
  readonly extension: string;
  private readonly logger: StructuredLogger;
  private readonly found = new ToolPathMap<DiscoveredTool>();

  constructor(options: ToolDiscoveryOptions) {
    this.root = path.resolve(options.root);
    this.extension = options.extension ?? DEFAULT_SCRIPT_EXTENSION;
    this.logger = options.logger;
  }

  /** Tools found by the last completed pass. */
  get tools(): DiscoveredTool[] {
    return [...this.found.values()];
  }

  async discover(): Promise<DiscoveredTool[]> {
    const pass = new ToolPathMap<DiscoveredTool>();

    for (const kind of SYSTEM_NAMESPACES) {
      const directory = resolveWithin(this.root, kind);
      for (const file of await this.listScripts(directory)) {
        await this.register(pass, file, (stem) => ToolPath.system(kind, stem));
      }
    }

    const usersDirectory = resolveWithin(this.root, "users");
    for (const user of await this.listDirectories(usersDirectory)) {
      const userDirectory = resolveWithin(usersDirectory, user);
      for (const pkg of await this.listDirectories(userDirectory)) {
        const packageDirectory = resolveWithin(userDirectory, pkg);
        for (const file of await this.listScripts(packageDirectory)) {
          await this.register(pass, file, (stem, version) => ToolPath.user(user, pkg, stem, version ?? DEFAULT_VERSION));
        }
      }
    }

    this.found.clear();
    for (const [toolPath, tool] of pass) {
      this.found.set(toolPath, tool);
    }
    const tools = this.tools.sort((left, right) => left.path.toString().localeCompare(right.path.toString()));
    this.logger.info("tools_discovered", { root: this.root, count: tools.length });
    return tools;
  }

  private async register(
    pass: ToolPathMap<DiscoveredTool>,
    file: string,
    buildPath: (stem: string, version: string | null) => ToolPath,
  ): Promise<void> {
    const header = parseToolHeader(await this.readScript(file));
    let toolPath: ToolPath;
    try {
      toolPath = buildPath(path.basename(file, this.extension), header.version);
    } catch (error) {
      if (error instanceof PathFormatError) {
        this.logger.warn("discovered_tool_skipped", { file, message: error.message });
        return;
      }
      throw error;
    }

    pass.set(toolPath, {
      path: toolPath,
      description: header.description ?? `Tool from ${file}`,
      file_path: file,
      parameters: header.parameters,
    });
  }

  private async readScript(file: string): Promise<string> {
    try {
      return await readFile(file, "utf8");
    } catch (error) {
      throw new DiscoveryIOError(`Failed to read tool script ${file}: ${describeError(error)}`, file, error);
    }
  }

  private async readEntries(directory: string): Promise<Dirent[]> {
    try {
      return await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw new DiscoveryIOError(`Failed to scan ${directory}: ${describeError(error)}`, directory, error);
    }
  }

  private async listScripts(directory: string): Promise<string[]> {
    const entries = await this.readEntries(directory);
    return entries
      .filter((entry) => entry.isFile() && path.extname(entry.name) === this.extension)
      .map((entry) => resolveWithin(directory, entry.name))
      .sort();
  }

  private async listDirectories(directory: string): Promise<string[]> {
    const entries = await this.readEntries(directory);
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  }
}
