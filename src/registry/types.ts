import { z } from "zod";

import { DEFAULT_VERSION, ToolPath } from "./toolPath.js";

/** Declared parameter of a tool. `type_name` is a loose label used for schema generation only. */
export interface ParameterDefinition {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly type_name: string;
}

export interface ToolDefinition {
  readonly path: ToolPath;
  readonly description: string;
  readonly script: string;
  readonly parameters: readonly ParameterDefinition[];
}

/** Tool found on disk. The script body is read when the tool executes. */
export interface DiscoveredTool {
  readonly path: ToolPath;
  readonly description: string;
  readonly file_path: string;
  readonly parameters: readonly ParameterDefinition[];
}

/** Current version of the per-tool document format. */
export const TOOL_FILE_VERSION = 1;

export const ParameterDefinitionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    required: z.boolean().default(false),
    type_name: z.string().min(1).default("string"),
  })
  .strict();

/**
 * Structured form of a {@link ToolPath} as stored on disk. Parsing runs the
 * result through the validating factories so a tampered document cannot
 * smuggle in a malformed path.
 */
export const SerializedToolPathSchema = z
  .object({
    namespace: z.discriminatedUnion("kind", [
      z.object({ kind: z.literal("bin") }),
      z.object({ kind: z.literal("sbin") }),
      z.object({ kind: z.literal("docs") }),
      z.object({ kind: z.literal("user"), user: z.string() }),
    ]),
    package: z.string().nullable(),
    name: z.string(),
    version: z.string().default(DEFAULT_VERSION),
  })
  .transform((value, ctx) => {
    try {
      if (value.namespace.kind !== "user") {
        return ToolPath.system(value.namespace.kind, value.name);
      }
      if (value.package === null) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "user tools require a package" });
        return z.NEVER;
      }
      return ToolPath.user(value.namespace.user, value.package, value.name, value.version);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
      return z.NEVER;
    }
  });

export type SerializedToolPath = z.input<typeof SerializedToolPathSchema>;

export function serializeToolPath(path: ToolPath): SerializedToolPath {
  return {
    namespace: path.namespace,
    package: path.package,
    name: path.name,
    version: path.version,
  };
}

export const ToolDefinitionSchema = z.object({
  path: SerializedToolPathSchema,
  description: z.string(),
  script: z.string(),
  parameters: z.array(ParameterDefinitionSchema).default([]),
});

export const ToolMetadataSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().min(1),
  updated_at: z.string().min(1),
  checksum: z.string().min(1),
  file_version: z.number().int().positive(),
});

export type ToolMetadata = z.infer<typeof ToolMetadataSchema>;

/** Per-tool document written by the file store. */
export const PersistedToolSchema = z.object({
  metadata: ToolMetadataSchema,
  tool: ToolDefinitionSchema,
});

export const IndexEntrySchema = z.object({
  path: SerializedToolPathSchema,
  file_path: z.string().min(1),
  checksum: z.string().min(1),
  updated_at: z.string().min(1),
});

export interface IndexEntry {
  readonly path: ToolPath;
  readonly file_path: string;
  readonly checksum: string;
  readonly updated_at: string;
}

export const ToolIndexSchema = z.object({
  tools: z.record(IndexEntrySchema),
  last_updated: z.string().min(1),
});

export function serializeToolDefinition(tool: ToolDefinition): z.input<typeof ToolDefinitionSchema> {
  return {
    path: serializeToolPath(tool.path),
    description: tool.description,
    script: tool.script,
    parameters: tool.parameters.map((parameter) => ({ ...parameter })),
  };
}
