import path from "node:path";
import process from "node:process";

import { readBool, readOptionalInt, readOptionalString } from "./config/env.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";
import type { ProcessEnv } from "./nodePrimitives.js";
import { resolveDefaultStorageRoot } from "./paths.js";
import { DEFAULT_QUEUE_CAPACITY } from "./registry/executor.js";
import { DEFAULT_SCRIPT_EXTENSION } from "./registry/discovery.js";
import { RUNTIME_KINDS, isRuntimeKind, type RuntimeKind } from "./runtime/interpreter.js";
import { DEFAULT_EVAL_TIMEOUT_MS } from "./runtime/vmInterpreter.js";

/** Settings resolved once at startup. CLI flags win over environment variables. */
export interface ServerOptions {
  privileged: boolean;
  runtime: RuntimeKind;
  /** Absolute root scanned by discover_tools. */
  toolsDir: string;
  /** Absolute root of the tool store. */
  storageDir: string;
  queueCapacity: number;
  evalTimeoutMs: number;
  discoverOnStart: boolean;
  logFile: string | null;
  logLevel: LogLevel;
  scriptExtension: string;
}

/** Flags that consume a value, either inline (`--flag=value`) or as the next argument. */
const FLAG_WITH_VALUE = new Set([
  "--runtime",
  "--tools-dir",
  "--storage-dir",
  "--queue-capacity",
  "--eval-timeout-ms",
  "--log-file",
  "--log-level",
  "--script-ext",
]);

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`The value ${value} for ${flag} must be a positive integer.`);
  }
  return parsed;
}

function parseRuntime(value: string, flag: string): RuntimeKind {
  const normalised = value.trim().toLowerCase();
  if (!isRuntimeKind(normalised)) {
    throw new Error(`Unknown runtime '${value}' for ${flag} (available: ${RUNTIME_KINDS.join(", ")}).`);
  }
  return normalised;
}

function parseLogLevel(value: string, flag: string): LogLevel {
  const normalised = value.trim().toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === normalised);
  if (!level) {
    throw new Error(`Unknown log level '${value}' for ${flag} (expected one of ${LOG_LEVELS.join(", ")}).`);
  }
  return level;
}

function requireNonEmpty(value: string, flag: string): string {
  const trimmed = value.trim();
  if (!trimmed.length) {
    throw new Error(`The value for ${flag} cannot be empty.`);
  }
  return trimmed;
}

function normaliseExtension(value: string, flag: string): string {
  const trimmed = requireNonEmpty(value, flag);
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/** Defaults derived from the environment before the CLI flags are applied. */
function optionsFromEnv(env: ProcessEnv, cwd: string): ServerOptions {
  const runtime = readOptionalString("SCRIPTBOX_RUNTIME", env);
  const logLevel = readOptionalString("SCRIPTBOX_LOG_LEVEL", env);
  const extension = readOptionalString("SCRIPTBOX_SCRIPT_EXT", env);
  const toolsDir = readOptionalString("SCRIPTBOX_TOOLS_DIR", env);
  const storageDir = readOptionalString("SCRIPTBOX_STORAGE_DIR", env);

  return {
    privileged: readBool("SCRIPTBOX_PRIVILEGED", false, env),
    runtime: runtime ? parseRuntime(runtime, "SCRIPTBOX_RUNTIME") : "vm",
    toolsDir: path.resolve(cwd, toolsDir ?? "tools"),
    storageDir: storageDir ? path.resolve(cwd, storageDir) : resolveDefaultStorageRoot(env),
    queueCapacity: readOptionalInt("SCRIPTBOX_QUEUE_CAPACITY", { min: 1 }, env) ?? DEFAULT_QUEUE_CAPACITY,
    evalTimeoutMs: readOptionalInt("SCRIPTBOX_EVAL_TIMEOUT_MS", { min: 1 }, env) ?? DEFAULT_EVAL_TIMEOUT_MS,
    discoverOnStart: readBool("SCRIPTBOX_DISCOVER_ON_START", false, env),
    logFile: readOptionalString("SCRIPTBOX_LOG_FILE", env) ?? null,
    logLevel: logLevel ? parseLogLevel(logLevel, "SCRIPTBOX_LOG_LEVEL") : "info",
    scriptExtension: extension ? normaliseExtension(extension, "SCRIPTBOX_SCRIPT_EXT") : DEFAULT_SCRIPT_EXTENSION,
  };
}

/**
 * Resolves the server settings from the command line and the environment.
 * Throws an error naming the offending flag on invalid input.
 */
export function parseServerOptions(
  argv: string[],
  env: ProcessEnv = process.env,
  cwd: string = process.cwd(),
): ServerOptions {
  const state = optionsFromEnv(env, cwd);

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === undefined || !arg.startsWith("--")) {
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator < 0 ? arg : arg.slice(0, separator);
    let value = separator < 0 ? undefined : arg.slice(separator + 1);

    if (FLAG_WITH_VALUE.has(flag) && (value === undefined || value === "")) {
      const next = argv[index + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`The flag ${flag} requires a value.`);
      }
      value = next;
      index += 1;
    }

    switch (flag) {
      case "--privileged":
        state.privileged = true;
        break;
      case "--discover":
        state.discoverOnStart = true;
        break;
      case "--runtime":
        state.runtime = parseRuntime(value ?? "", flag);
        break;
      case "--tools-dir":
        state.toolsDir = path.resolve(cwd, requireNonEmpty(value ?? "", flag));
        break;
      case "--storage-dir":
        state.storageDir = path.resolve(cwd, requireNonEmpty(value ?? "", flag));
        break;
      case "--queue-capacity":
        state.queueCapacity = parsePositiveInteger(value ?? "", flag);
        break;
      case "--eval-timeout-ms":
        state.evalTimeoutMs = parsePositiveInteger(value ?? "", flag);
        break;
      case "--log-file":
        state.logFile = requireNonEmpty(value ?? "", flag);
        break;
      case "--log-level":
        state.logLevel = parseLogLevel(value ?? "", flag);
        break;
      case "--script-ext":
        state.scriptExtension = normaliseExtension(value ?? "", flag);
        break;
      default:
        throw new Error(`Unknown flag ${flag}.`);
    }
  }

  return state;
}
