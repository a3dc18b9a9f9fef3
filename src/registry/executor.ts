import { readFile } from "node:fs/promises";

import type { StructuredLogger } from "../logger.js";
import { resolveDefaultStorageRoot } from "../paths.js";
import type { ScriptInterpreter } from "../runtime/interpreter.js";
import { ToolDiscovery } from "./discovery.js";
import {
  DiscoveryIOError,
  DuplicateToolError,
  ExecutorClosedError,
  InterpreterFaultError,
  MissingRequiredParameterError,
  NamespaceViolationError,
  PersistenceFaultError,
  ToolNotFoundError,
  ToolboxError,
  describeError,
} from "./errors.js";
import { asParameterObject, renderLiteral, suppliedValue } from "./literals.js";
import { Mailbox, ReplySlot } from "./mailbox.js";
import { FileToolStore, type ToolStore } from "./persistence.js";
import { ToolPath, ToolPathMap } from "./toolPath.js";
import type { DiscoveredTool, ParameterDefinition, ToolDefinition } from "./types.js";

export const DEFAULT_QUEUE_CAPACITY = 100;

/** Name under which a custom tool run through `exec_tool` receives every supplied parameter. */
export const PARAMS_VARIABLE = "params";

/** Built-in tools. They are never stored and cannot be added or removed. */
export const SYSTEM_TOOLS = {
  execute: ToolPath.bin("tcl_execute"),
  list: ToolPath.bin("tcl_tool_list"),
  exec: ToolPath.bin("exec_tool"),
  discover: ToolPath.bin("discover_tools"),
  add: ToolPath.sbin("tcl_tool_add"),
  remove: ToolPath.sbin("tcl_tool_remove"),
  guide: ToolPath.docs("runtime_guide"),
} as const;

export const SYSTEM_TOOL_PATHS: readonly ToolPath[] = Object.values(SYSTEM_TOOLS);

export interface AddToolRequest {
  path: ToolPath;
  description: string;
  script: string;
  parameters: readonly ParameterDefinition[];
}

/** Messages understood by the executor loop. Each one carries its own reply slot. */
export type ExecutorCommand =
  | { type: "execute"; script: string; reply: ReplySlot<string> }
  | { type: "add_tool"; request: AddToolRequest; reply: ReplySlot<string> }
  | { type: "remove_tool"; path: ToolPath; reply: ReplySlot<string> }
  | { type: "list_tools"; namespace?: string; filter?: string; reply: ReplySlot<string[]> }
  | { type: "execute_custom_tool"; path: ToolPath; params: unknown; reply: ReplySlot<string> }
  | { type: "get_tool_definitions"; reply: ReplySlot<ToolDefinition[]> }
  | { type: "initialize_persistence"; reply: ReplySlot<string> }
  | { type: "exec_tool"; path: string; params: unknown; reply: ReplySlot<string> }
  | { type: "discover_tools"; reply: ReplySlot<string> };

export interface ToolExecutorOptions {
  interpreter: ScriptInterpreter;
  logger: StructuredLogger;
  queueCapacity?: number;
  /** Root scanned by discover_tools. Ignored when {@link discovery} is given. */
  toolsDir?: string;
  scriptExtension?: string;
  discovery?: ToolDiscovery;
  /** Store root used by the default {@link openStore}. */
  storageDir?: string;
  /** Opens the durable store on first use. Defaults to a {@link FileToolStore}. */
  openStore?: () => Promise<ToolStore>;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/**
 * Single owner of the interpreter, the custom and discovered tool tables and
 * the store. Commands are processed one at a time in arrival order, so no
 * state is ever touched concurrently.
 */
export class ToolExecutor {
  private readonly interpreter: ScriptInterpreter;
  private readonly logger: StructuredLogger;
  private readonly discovery: ToolDiscovery;
  private readonly openStore: () => Promise<ToolStore>;
  private readonly customTools = new ToolPathMap<ToolDefinition>();
  private readonly discoveredTools = new ToolPathMap<DiscoveredTool>();
  private store: ToolStore | null = null;

  private constructor(options: ToolExecutorOptions) {
    this.interpreter = options.interpreter;
    this.logger = options.logger;
    this.discovery =
      options.discovery ??
      new ToolDiscovery({ root: options.toolsDir ?? "tools", extension: options.scriptExtension, logger: options.logger });
    const storageDir = options.storageDir ?? resolveDefaultStorageRoot();
    this.openStore = options.openStore ?? (() => FileToolStore.open({ root: storageDir, logger: options.logger }));
  }

  /** Starts the command loop and returns the handle callers talk to. */
  static start(options: ToolExecutorOptions): ToolExecutorClient {
    const mailbox = new Mailbox<ExecutorCommand>(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    const executor = new ToolExecutor(options);
    const done = executor.run(mailbox).catch((error: unknown) => {
      options.logger.error("executor_loop_failed", { message: describeError(error) });
    });
    return new ToolExecutorClient(mailbox, done);
  }

  private async run(mailbox: Mailbox<ExecutorCommand>): Promise<void> {
    this.logger.debug("executor_started", { runtime: this.interpreter.name, capacity: mailbox.capacity });
    for (;;) {
      const command = await mailbox.receive();
      if (command === null) {
        break;
      }
      await this.dispatch(command);
    }
    this.logger.debug("executor_stopped");
  }

  private dispatch(command: ExecutorCommand): Promise<void> {
    switch (command.type) {
      case "execute":
        return command.reply.settle(() => this.evaluate(command.script));
      case "add_tool":
        return command.reply.settle(() => this.addTool(command.request));
      case "remove_tool":
        return command.reply.settle(() => this.removeTool(command.path));
      case "list_tools":
        return command.reply.settle(() => this.listTools(command.namespace, command.filter));
      case "execute_custom_tool":
        return command.reply.settle(() => this.executeCustomTool(command.path, command.params));
      case "get_tool_definitions":
        return command.reply.settle(() => this.getToolDefinitions());
      case "initialize_persistence":
        return command.reply.settle(() => this.initializePersistence());
      case "exec_tool":
        return command.reply.settle(() => this.execTool(command.path, command.params));
      case "discover_tools":
        return command.reply.settle(() => this.discoverTools());
    }
  }

  private evaluate(script: string): string {
    try {
      return this.interpreter.evaluate(script);
    } catch (error) {
      throw error instanceof ToolboxError ? error : new InterpreterFaultError(describeError(error), error);
    }
  }

  private bind(name: string, value: unknown): void {
    try {
      this.interpreter.bind(name, renderLiteral(value));
    } catch (error) {
      throw error instanceof ToolboxError ? error : new InterpreterFaultError(describeError(error), error);
    }
  }

  /**
   * Validates every required parameter first, then binds each declared
   * parameter that was supplied and runs the script.
   */
  private runWithParameters(
    script: string,
    parameters: readonly ParameterDefinition[],
    params: unknown,
    bindAll: boolean,
  ): string {
    const supplied = asParameterObject(params);
    for (const parameter of parameters) {
      if (parameter.required && suppliedValue(supplied, parameter.name) === undefined) {
        throw new MissingRequiredParameterError(parameter.name);
      }
    }
    for (const parameter of parameters) {
      const value = suppliedValue(supplied, parameter.name);
      if (value !== undefined) {
        this.bind(parameter.name, value);
      }
    }
    if (bindAll) {
      this.bind(PARAMS_VARIABLE, supplied);
    }
    return this.evaluate(script);
  }

  private async addTool(request: AddToolRequest): Promise<string> {
    const label = request.path.toString();
    if (request.path.namespace.kind !== "user") {
      throw new NamespaceViolationError(`Cannot add tools to system namespace: ${label}`, label);
    }

    await this.ensurePersistence();
    if (this.customTools.has(request.path)) {
      throw new DuplicateToolError(label);
    }

    const tool: ToolDefinition = {
      path: request.path,
      description: request.description,
      script: request.script,
      parameters: request.parameters.map((parameter) => ({ ...parameter })),
    };
    this.customTools.set(request.path, tool);
    this.logger.info("tool_added", { path: label, parameters: tool.parameters.length });

    if (!this.store) {
      return `Tool '${label}' added to memory (persistence unavailable)`;
    }
    try {
      await this.store.save(tool);
      return `Tool '${label}' added successfully and persisted`;
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn("tool_persist_failed", { path: label, message: reason });
      return `Tool '${label}' added to memory (persistence failed: ${reason})`;
    }
  }

  private async removeTool(toolPath: ToolPath): Promise<string> {
    const label = toolPath.toString();
    if (toolPath.isSystem()) {
      throw new NamespaceViolationError(`Cannot remove system tools: ${label}`, label);
    }

    const removedFromMemory = this.customTools.delete(toolPath);
    let removedFromStore = false;
    if (this.store) {
      try {
        removedFromStore = await this.store.delete(toolPath);
      } catch (error) {
        this.logger.warn("tool_unpersist_failed", { path: label, message: describeError(error) });
      }
    }

    if (!removedFromMemory && !removedFromStore) {
      throw new ToolNotFoundError(label);
    }
    this.logger.info("tool_removed", { path: label, memory: removedFromMemory, store: removedFromStore });
    return `Tool '${label}' removed successfully`;
  }

  private listTools(namespace?: string, filter?: string): string[] {
    const candidates = [...SYSTEM_TOOL_PATHS, ...this.customTools.keys(), ...this.discoveredTools.keys()];
    const listed = new Set<string>();
    for (const candidate of candidates) {
      if (namespace !== undefined && candidate.namespaceKeyword() !== namespace) {
        continue;
      }
      const label = candidate.toString();
      if (filter !== undefined && !label.includes(filter)) {
        continue;
      }
      listed.add(label);
    }
    return [...listed].sort();
  }

  private executeCustomTool(toolPath: ToolPath, params: unknown): string {
    const tool = this.customTools.get(toolPath);
    if (!tool) {
      throw new ToolNotFoundError(toolPath.toString());
    }
    return this.runWithParameters(tool.script, tool.parameters, params, false);
  }

  private getToolDefinitions(): ToolDefinition[] {
    const byPath = (left: { path: ToolPath }, right: { path: ToolPath }): number =>
      left.path.toString().localeCompare(right.path.toString());
    const custom = [...this.customTools.values()].sort(byPath);
    const discovered = [...this.discoveredTools.values()].sort(byPath).map(
      (tool): ToolDefinition => ({
        path: tool.path,
        description: tool.description,
        script: `// Tool loaded from: ${tool.file_path}`,
        parameters: tool.parameters,
      }),
    );
    return [...custom, ...discovered];
  }

  private async initializePersistence(): Promise<string> {
    if (this.store) {
      return "Persistence already initialized";
    }
    const loaded = await this.openAndLoadStore();
    return `Persistence initialized. Loaded ${loaded} tools from storage.`;
  }

  /** Lazy initialization used by add_tool: a failure is logged and retried on the next call. */
  private async ensurePersistence(): Promise<void> {
    if (this.store) {
      return;
    }
    try {
      await this.openAndLoadStore();
    } catch (error) {
      this.logger.warn("persistence_init_failed", { message: describeError(error) });
    }
  }

  private async openAndLoadStore(): Promise<number> {
    let store: ToolStore;
    let stored: ToolDefinition[];
    try {
      store = await this.openStore();
      stored = await store.list();
    } catch (error) {
      throw error instanceof ToolboxError
        ? error
        : new PersistenceFaultError(`Failed to initialize persistence: ${describeError(error)}`, error);
    }

    let loaded = 0;
    for (const tool of stored) {
      if (tool.path.namespace.kind !== "user" || this.customTools.has(tool.path)) {
        continue;
      }
      this.customTools.set(tool.path, tool);
      loaded += 1;
    }
    this.store = store;
    this.logger.info("persistence_initialized", { loaded });
    return loaded;
  }

  private async execTool(pathString: string, params: unknown): Promise<string> {
    const toolPath = ToolPath.parse(pathString);

    const custom = this.customTools.get(toolPath);
    if (custom) {
      return this.runWithParameters(custom.script, custom.parameters, params, true);
    }

    const discovered = this.discoveredTools.get(toolPath);
    if (discovered) {
      let script: string;
      try {
        script = await readFile(discovered.file_path, "utf8");
      } catch (error) {
        throw new DiscoveryIOError(
          `Failed to read tool script ${discovered.file_path}: ${describeError(error)}`,
          discovered.file_path,
          error,
        );
      }
      return this.runWithParameters(script, discovered.parameters, params, false);
    }

    const supplied = asParameterObject(params);
    if (toolPath.equals(SYSTEM_TOOLS.execute)) {
      const script = suppliedValue(supplied, "script");
      if (typeof script !== "string") {
        throw new MissingRequiredParameterError("script");
      }
      return this.evaluate(script);
    }
    if (toolPath.equals(SYSTEM_TOOLS.list)) {
      return this.listTools(optionalString(suppliedValue(supplied, "namespace")), optionalString(suppliedValue(supplied, "filter"))).join("\n");
    }

    throw new ToolNotFoundError(toolPath.toString());
  }

  private async discoverTools(): Promise<string> {
    const tools = await this.discovery.discover();
    for (const tool of tools) {
      this.discoveredTools.set(tool.path, tool);
    }
    this.logger.info("discovered_tools_merged", { found: tools.length, total: this.discoveredTools.size });
    return `Discovered ${tools.length} tools from filesystem`;
  }
}

/**
 * Handle used to submit commands to a running {@link ToolExecutor}. Every
 * method suspends while the queue is full and resolves with the command's
 * reply.
 */
export class ToolExecutorClient {
  constructor(
    private readonly mailbox: Mailbox<ExecutorCommand>,
    private readonly done: Promise<void>,
  ) {}

  get isClosed(): boolean {
    return this.mailbox.isClosed;
  }

  execute(script: string): Promise<string> {
    return this.request<string>((reply) => ({ type: "execute", script, reply }));
  }

  addTool(request: AddToolRequest): Promise<string> {
    return this.request<string>((reply) => ({ type: "add_tool", request, reply }));
  }

  removeTool(path: ToolPath): Promise<string> {
    return this.request<string>((reply) => ({ type: "remove_tool", path, reply }));
  }

  listTools(namespace?: string, filter?: string): Promise<string[]> {
    return this.request<string[]>((reply) => ({ type: "list_tools", namespace, filter, reply }));
  }

  executeCustomTool(path: ToolPath, params: unknown): Promise<string> {
    return this.request<string>((reply) => ({ type: "execute_custom_tool", path, params, reply }));
  }

  getToolDefinitions(): Promise<ToolDefinition[]> {
    return this.request<ToolDefinition[]>((reply) => ({ type: "get_tool_definitions", reply }));
  }

  initializePersistence(): Promise<string> {
    return this.request<string>((reply) => ({ type: "initialize_persistence", reply }));
  }

  execTool(path: string, params: unknown): Promise<string> {
    return this.request<string>((reply) => ({ type: "exec_tool", path, params, reply }));
  }

  discoverTools(): Promise<string> {
    return this.request<string>((reply) => ({ type: "discover_tools", reply }));
  }

  /** Stops accepting commands, lets queued ones finish and waits for the loop to exit. */
  async close(): Promise<void> {
    this.mailbox.close();
    await this.done;
  }

  private async request<T>(build: (reply: ReplySlot<T>) => ExecutorCommand): Promise<T> {
    const reply = new ReplySlot<T>();
    const accepted = await this.mailbox.send(build(reply));
    if (!accepted) {
      throw new ExecutorClosedError();
    }
    return reply.promise;
  }
}
