/**
 * Error taxonomy shared by the tool registry. Every class carries a stable
 * `code` so the MCP layer can surface it verbatim, an optional operator `hint`
 * and structured `details` for logs.
 */

/** Stable codes surfaced to MCP clients. */
export const TOOLBOX_ERROR_CODES = {
  PATH_FORMAT: "E-PATH-FORMAT",
  NAMESPACE: "E-NAMESPACE",
  DUPLICATE: "E-TOOL-DUPLICATE",
  NOT_FOUND: "E-TOOL-NOT-FOUND",
  PARAM_MISSING: "E-PARAM-MISSING",
  INTERPRETER: "E-INTERPRETER",
  PERSISTENCE: "E-PERSISTENCE",
  CHECKSUM: "E-CHECKSUM",
  DISCOVERY_IO: "E-DISCOVERY-IO",
  EXECUTOR_CLOSED: "E-EXECUTOR-CLOSED",
  PRIVILEGE: "E-PRIVILEGE",
  INVALID_ARGS: "E-INVALID-ARGS",
} as const;

export type ToolboxErrorCode = (typeof TOOLBOX_ERROR_CODES)[keyof typeof TOOLBOX_ERROR_CODES];

/** Base class of every registry failure. */
export class ToolboxError extends Error {
  public readonly code: ToolboxErrorCode;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ToolboxErrorCode,
    message: string,
    options: { hint?: string; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ToolboxError";
    this.code = code;
    this.hint = options.hint;
    this.details = options.details;
  }
}

/** Raised when a canonical path or encoded name cannot be parsed. */
export class PathFormatError extends ToolboxError {
  constructor(message: string, input: string) {
    super(TOOLBOX_ERROR_CODES.PATH_FORMAT, message, {
      hint: "use /bin/<name>, /sbin/<name>, /docs/<name> or /<user>/<package>/<name>[:<version>]",
      details: { input },
    });
    this.name = "PathFormatError";
  }
}

/** Raised when a caller mutates a tool outside the user namespaces. */
export class NamespaceViolationError extends ToolboxError {
  constructor(message: string, path: string) {
    super(TOOLBOX_ERROR_CODES.NAMESPACE, message, {
      hint: "only /<user>/<package>/<name> tools can be added or removed",
      details: { path },
    });
    this.name = "NamespaceViolationError";
  }
}

export class DuplicateToolError extends ToolboxError {
  constructor(path: string) {
    super(TOOLBOX_ERROR_CODES.DUPLICATE, `Tool '${path}' already exists`, {
      hint: "remove the existing tool or register a different version",
      details: { path },
    });
    this.name = "DuplicateToolError";
  }
}

export class ToolNotFoundError extends ToolboxError {
  constructor(path: string) {
    super(TOOLBOX_ERROR_CODES.NOT_FOUND, `Tool '${path}' not found`, { details: { path } });
    this.name = "ToolNotFoundError";
  }
}

export class MissingRequiredParameterError extends ToolboxError {
  public readonly parameter: string;

  constructor(parameter: string) {
    super(TOOLBOX_ERROR_CODES.PARAM_MISSING, `Missing required parameter: ${parameter}`, {
      details: { parameter },
    });
    this.name = "MissingRequiredParameterError";
    this.parameter = parameter;
  }
}

/** Failure reported by the scripting runtime. The message is kept verbatim. */
export class InterpreterFaultError extends ToolboxError {
  constructor(message: string, cause?: unknown) {
    super(TOOLBOX_ERROR_CODES.INTERPRETER, message, { cause });
    this.name = "InterpreterFaultError";
  }
}

export class PersistenceFaultError extends ToolboxError {
  constructor(message: string, cause?: unknown, details?: Record<string, unknown>) {
    super(TOOLBOX_ERROR_CODES.PERSISTENCE, message, { cause, details });
    this.name = "PersistenceFaultError";
  }
}

/**
 * Soft failure: a stored document no longer matches the checksum recorded in
 * the index. Only ever logged, never thrown out of a load.
 */
export class ChecksumMismatchError extends ToolboxError {
  constructor(path: string, expected: string, found: string) {
    super(TOOLBOX_ERROR_CODES.CHECKSUM, `Checksum mismatch for tool ${path}, file may be corrupted`, {
      details: { path, expected, found },
    });
    this.name = "ChecksumMismatchError";
  }
}

export class DiscoveryIOError extends ToolboxError {
  constructor(message: string, location: string, cause?: unknown) {
    super(TOOLBOX_ERROR_CODES.DISCOVERY_IO, message, { cause, details: { location } });
    this.name = "DiscoveryIOError";
  }
}

export class ExecutorClosedError extends ToolboxError {
  constructor() {
    super(TOOLBOX_ERROR_CODES.EXECUTOR_CLOSED, "tool executor is shut down");
    this.name = "ExecutorClosedError";
  }
}

/** Raised by the MCP layer when an unprivileged session reaches a gated tool. */
export class PrivilegeRequiredError extends ToolboxError {
  constructor(tool: string) {
    super(TOOLBOX_ERROR_CODES.PRIVILEGE, "Tool management requires --privileged mode", {
      hint: "restart the server with --privileged",
      details: { tool },
    });
    this.name = "PrivilegeRequiredError";
  }
}

/** Extracts a printable message from an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
