#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { StructuredLogger } from "./logger.js";
import { createToolServer } from "./mcp/server.js";
import { describeError } from "./registry/errors.js";
import { ToolExecutor } from "./registry/executor.js";
import { createInterpreter } from "./runtime/interpreter.js";
import { parseServerOptions, type ServerOptions } from "./serverOptions.js";

export { createToolServer, type ToolServerOptions } from "./mcp/server.js";
export { ToolExecutor, ToolExecutorClient, SYSTEM_TOOLS, type AddToolRequest } from "./registry/executor.js";
export { ToolDiscovery, parseToolHeader } from "./registry/discovery.js";
export { FileToolStore, type ToolStore } from "./registry/persistence.js";
export { ToolPath, ToolPathMap, type Namespace } from "./registry/toolPath.js";
export type { DiscoveredTool, ParameterDefinition, ToolDefinition } from "./registry/types.js";
export * from "./registry/errors.js";
export { createInterpreter, type ScriptInterpreter, type RuntimeKind } from "./runtime/interpreter.js";
export { parseServerOptions, type ServerOptions } from "./serverOptions.js";
export { StructuredLogger } from "./logger.js";

/**
 * Wires the executor to the MCP server over stdio. Persistence is initialized
 * eagerly (a failure only logs a warning; add_tool retries lazily) and
 * discovery runs when requested.
 */
export async function startServer(options: ServerOptions, logger: StructuredLogger): Promise<() => Promise<void>> {
  const interpreter = createInterpreter(options.runtime, { evalTimeoutMs: options.evalTimeoutMs });
  const client = ToolExecutor.start({
    interpreter,
    logger,
    queueCapacity: options.queueCapacity,
    toolsDir: options.toolsDir,
    scriptExtension: options.scriptExtension,
    storageDir: options.storageDir,
  });

  try {
    logger.info("persistence_ready", { message: await client.initializePersistence(), root: options.storageDir });
  } catch (error) {
    logger.warn("persistence_init_failed", { message: describeError(error), root: options.storageDir });
  }

  if (options.discoverOnStart) {
    try {
      logger.info("startup_discovery", { message: await client.discoverTools(), root: options.toolsDir });
    } catch (error) {
      logger.warn("startup_discovery_failed", { message: describeError(error), root: options.toolsDir });
    }
  }

  const server = createToolServer({ client, privileged: options.privileged, interpreter, logger });
  await server.connect(new StdioServerTransport());
  logger.info("stdio_listening", {
    runtime: interpreter.name,
    privileged: options.privileged,
    tools_dir: options.toolsDir,
  });

  return async () => {
    await server.close();
    await client.close();
    await logger.flush();
  };
}

async function main(): Promise<void> {
  let options: ServerOptions;
  try {
    options = parseServerOptions(process.argv.slice(2));
  } catch (error) {
    new StructuredLogger().error("cli_options_invalid", { message: describeError(error) });
    process.exit(1);
  }

  const logger = new StructuredLogger({ logFile: options.logFile, minLevel: options.logLevel });
  let shutdown: () => Promise<void>;
  try {
    shutdown = await startServer(options, logger);
  } catch (error) {
    logger.error("server_start_failed", { message: describeError(error) });
    await logger.flush();
    process.exit(1);
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn("shutdown_signal", { signal });
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("shutdown_failed", { message: describeError(error) });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}
