import { InterpreterFaultError } from "../registry/errors.js";
import { VmInterpreter } from "./vmInterpreter.js";

/**
 * Capability surface the executor needs from a scripting runtime. One
 * instance is owned by the executor loop and never shared.
 */
export interface ScriptInterpreter {
  readonly name: string;
  readonly version: string;
  /** Whether scripts are confined so they cannot reach the host. */
  readonly isSafe: boolean;
  readonly features: readonly string[];
  /** Runs a script and returns its text result. Faults raise {@link InterpreterFaultError}. */
  evaluate(script: string): string;
  /** Binds a literal (as rendered by `renderLiteral`) to a global variable. */
  bind(name: string, literal: string): void;
  /** Text form of a global variable. */
  read(name: string): string;
  supports(command: string): boolean;
}

export const RUNTIME_KINDS = ["vm"] as const;

export type RuntimeKind = (typeof RUNTIME_KINDS)[number];

export interface InterpreterOptions {
  /** Wall-clock limit applied to each evaluation. */
  evalTimeoutMs?: number;
}

export function isRuntimeKind(value: string): value is RuntimeKind {
  return RUNTIME_KINDS.some((kind) => kind === value);
}

/** Instantiates the runtime selected at startup. */
export function createInterpreter(kind: RuntimeKind, options: InterpreterOptions = {}): ScriptInterpreter {
  switch (kind) {
    case "vm":
      return new VmInterpreter({ timeoutMs: options.evalTimeoutMs });
    default: {
      const unreachable: never = kind;
      throw new InterpreterFaultError(`Unknown runtime '${String(unreachable)}'`);
    }
  }
}
