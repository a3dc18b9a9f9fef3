import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { PrivilegeRequiredError } from "../registry/errors.js";
import { SYSTEM_TOOLS, type ToolExecutorClient } from "../registry/executor.js";
import { DEFAULT_VERSION, ToolPath } from "../registry/toolPath.js";
import { ParameterDefinitionSchema, type ParameterDefinition } from "../registry/types.js";
import type { ScriptInterpreter } from "../runtime/interpreter.js";
import { GUIDE_TOPICS, renderGuide } from "./runtimeGuide.js";
import { toolErrorResult } from "./toolErrors.js";

export const SERVER_NAME = "scriptbox-mcp";
export const SERVER_VERSION = "0.1.0";

export interface ToolServerOptions {
  client: ToolExecutorClient;
  /** Enables the sbin tools and filesystem discovery. */
  privileged: boolean;
  interpreter: Pick<ScriptInterpreter, "name" | "version" | "isSafe" | "features">;
  logger: StructuredLogger;
}

type JsonSchemaType = "string" | "number" | "integer" | "boolean" | "array" | "object" | "null";

const TYPE_ALIASES: Record<string, JsonSchemaType> = {
  string: "string",
  str: "string",
  text: "string",
  number: "number",
  float: "number",
  double: "number",
  real: "number",
  integer: "integer",
  int: "integer",
  long: "integer",
  boolean: "boolean",
  bool: "boolean",
  array: "array",
  list: "array",
  object: "object",
  dict: "object",
  map: "object",
  null: "null",
  nil: "null",
  none: "null",
};

/** Maps a loose parameter type label to a JSON Schema type. Unknown labels become `string`. */
export function normaliseTypeName(typeName: string): JsonSchemaType {
  return TYPE_ALIASES[typeName.trim().toLowerCase()] ?? "string";
}

export function parametersToInputSchema(parameters: readonly ParameterDefinition[]): Tool["inputSchema"] {
  const properties: Record<string, { type: JsonSchemaType; description: string }> = {};
  const required: string[] = [];
  for (const parameter of parameters) {
    properties[parameter.name] = { type: normaliseTypeName(parameter.type_name), description: parameter.description };
    if (parameter.required) {
      required.push(parameter.name);
    }
  }
  return required.length > 0 ? { type: "object", properties, required } : { type: "object", properties };
}

const ExecuteArgsSchema = z.object({ script: z.string() });

const ListArgsSchema = z.object({
  namespace: z.string().optional(),
  filter: z.string().optional(),
});

const GuideArgsSchema = z.object({ topic: z.enum(GUIDE_TOPICS).default("overview") });

const ExecToolArgsSchema = z.object({
  tool_path: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

const AddToolArgsSchema = z.object({
  user: z.string(),
  package: z.string(),
  name: z.string(),
  version: z.string().default(DEFAULT_VERSION),
  description: z.string(),
  script: z.string(),
  parameters: z.array(ParameterDefinitionSchema).default([]),
});

const RemoveToolArgsSchema = z.object({ path: z.string().min(1) });

interface SystemToolEntry {
  path: ToolPath;
  description: string;
  inputSchema: Tool["inputSchema"];
  privileged: boolean;
}

const SYSTEM_TOOL_ENTRIES: readonly SystemToolEntry[] = [
  {
    path: SYSTEM_TOOLS.execute,
    description: "Execute a script and return the result",
    inputSchema: {
      type: "object",
      properties: { script: { type: "string", description: "Script to execute" } },
      required: ["script"],
    },
    privileged: false,
  },
  {
    path: SYSTEM_TOOLS.list,
    description: "List all available tools",
    inputSchema: {
      type: "object",
      properties: {
        namespace: { type: "string", description: "Filter tools by namespace (bin, sbin, docs or a user id)" },
        filter: { type: "string", description: "Keep paths containing this text" },
      },
    },
    privileged: false,
  },
  {
    path: SYSTEM_TOOLS.guide,
    description: "Runtime documentation and examples",
    inputSchema: {
      type: "object",
      properties: {
        topic: { type: "string", enum: [...GUIDE_TOPICS], description: "Documentation topic" },
      },
    },
    privileged: false,
  },
  {
    path: SYSTEM_TOOLS.exec,
    description: "Execute a tool by its path with parameters",
    inputSchema: {
      type: "object",
      properties: {
        tool_path: { type: "string", description: "Full path to the tool (e.g. '/alice/utils/reverse_string:1.0')" },
        params: { type: "object", description: "Parameters to pass to the tool", default: {} },
      },
      required: ["tool_path"],
    },
    privileged: false,
  },
  {
    path: SYSTEM_TOOLS.discover,
    description: "Discover and index tools from the filesystem",
    inputSchema: { type: "object", properties: {} },
    privileged: true,
  },
  {
    path: SYSTEM_TOOLS.add,
    description: "Add a new tool (PRIVILEGED)",
    inputSchema: {
      type: "object",
      properties: {
        user: { type: "string", description: "User namespace" },
        package: { type: "string", description: "Package name" },
        name: { type: "string", description: "Name of the new tool" },
        version: { type: "string", description: "Version of the tool", default: DEFAULT_VERSION },
        description: { type: "string", description: "What the tool does" },
        script: { type: "string", description: "Script implementing the tool" },
        parameters: {
          type: "array",
          description: "Parameters the tool accepts",
          items: {
            type: "object",
            properties: {
              name: { type: "string" },
              description: { type: "string" },
              required: { type: "boolean" },
              type_name: { type: "string" },
            },
            required: ["name"],
          },
        },
      },
      required: ["user", "package", "name", "description", "script"],
    },
    privileged: true,
  },
  {
    path: SYSTEM_TOOLS.remove,
    description: "Remove a tool (PRIVILEGED)",
    inputSchema: {
      type: "object",
      properties: { path: { type: "string", description: "Full tool path (e.g. '/alice/utils/reverse_string:1.0')" } },
      required: ["path"],
    },
    privileged: true,
  },
];

/**
 * Builds the MCP server exposing the registry. Tool names on the wire are the
 * encoded paths; any name that is not a system tool is decoded and run through
 * exec_tool.
 */
export function createToolServer(options: ToolServerOptions): Server {
  const { client, privileged, interpreter, logger } = options;
  const server = new Server({ name: SERVER_NAME, version: SERVER_VERSION }, { capabilities: { tools: {} } });

  const requirePrivilege = (tool: string): void => {
    if (!privileged) {
      throw new PrivilegeRequiredError(tool);
    }
  };

  const listTools = async (): Promise<Tool[]> => {
    const tools: Tool[] = [];
    const listed = new Set<string>();
    for (const entry of SYSTEM_TOOL_ENTRIES) {
      if (entry.privileged && !privileged) {
        continue;
      }
      const name = entry.path.toEncodedName();
      listed.add(name);
      tools.push({ name, description: `${entry.description} [${entry.path.toString()}]`, inputSchema: entry.inputSchema });
    }

    for (const definition of await client.getToolDefinitions()) {
      const name = definition.path.toEncodedName();
      if (listed.has(name) || (definition.path.namespace.kind === "sbin" && !privileged)) {
        continue;
      }
      listed.add(name);
      tools.push({
        name,
        description: `${definition.description} [${definition.path.toString()}]`,
        inputSchema: parametersToInputSchema(definition.parameters),
      });
    }
    return tools;
  };

  const execPath = (toolPath: ToolPath, params: unknown): Promise<string> => {
    if (toolPath.namespace.kind === "sbin") {
      requirePrivilege(toolPath.toString());
    }
    return client.execTool(toolPath.toString(), params);
  };

  const callTool = async (name: string, args: unknown): Promise<string> => {
    switch (name) {
      case SYSTEM_TOOLS.execute.toEncodedName():
        return client.execute(ExecuteArgsSchema.parse(args).script);
      case SYSTEM_TOOLS.list.toEncodedName(): {
        const { namespace, filter } = ListArgsSchema.parse(args);
        return JSON.stringify(await client.listTools(namespace, filter), null, 2);
      }
      case SYSTEM_TOOLS.guide.toEncodedName():
        return renderGuide(GuideArgsSchema.parse(args).topic, interpreter, privileged);
      case SYSTEM_TOOLS.exec.toEncodedName(): {
        const request = ExecToolArgsSchema.parse(args);
        return execPath(ToolPath.parse(request.tool_path), request.params);
      }
      case SYSTEM_TOOLS.discover.toEncodedName():
        requirePrivilege(SYSTEM_TOOLS.discover.toString());
        return client.discoverTools();
      case SYSTEM_TOOLS.add.toEncodedName(): {
        requirePrivilege(SYSTEM_TOOLS.add.toString());
        const request = AddToolArgsSchema.parse(args);
        return client.addTool({
          path: ToolPath.user(request.user, request.package, request.name, request.version),
          description: request.description,
          script: request.script,
          parameters: request.parameters,
        });
      }
      case SYSTEM_TOOLS.remove.toEncodedName(): {
        requirePrivilege(SYSTEM_TOOLS.remove.toString());
        return client.removeTool(ToolPath.parse(RemoveToolArgsSchema.parse(args).path));
      }
      default:
        return execPath(ToolPath.fromEncodedName(name), args ?? {});
    }
  };

  server.setRequestHandler(ListToolsRequestSchema, async (): Promise<ListToolsResult> => ({ tools: await listTools() }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    try {
      const text = await callTool(name, args ?? {});
      logger.debug("tool_call_completed", { tool: name });
      return { content: [{ type: "text", text }] };
    } catch (error) {
      return toolErrorResult(logger, name, error);
    }
  });

  return server;
}
