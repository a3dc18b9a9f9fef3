import process from "node:process";
import vm from "node:vm";

import { InterpreterFaultError } from "../registry/errors.js";
import type { ScriptInterpreter } from "./interpreter.js";

export interface VmInterpreterOptions {
  /** Defaults to {@link DEFAULT_EVAL_TIMEOUT_MS}. */
  timeoutMs?: number;
}

export const DEFAULT_EVAL_TIMEOUT_MS = 1_000;

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Message of a value thrown inside the context. Errors raised by the script
 * belong to another realm, so `instanceof Error` cannot be used.
 */
function faultMessage(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "function" || typeof value === "symbol" || typeof value === "bigint") {
    return String(value);
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/** Decodes a rendered literal: a quoted string, then JSON, then the raw text. */
export function decodeLiteral(literal: string): unknown {
  if (literal.length >= 2 && literal.startsWith('"') && literal.endsWith('"')) {
    return literal.slice(1, -1).replace(/\\"/g, '"');
  }
  try {
    return JSON.parse(literal);
  } catch {
    return literal;
  }
}

/**
 * JavaScript runtime backed by one long-lived `node:vm` context. The context
 * exposes no `require`, `process` or module loader; `print(...)` and
 * `console.log(...)` append lines to the evaluation output. vm contexts
 * separate globals but are not a security boundary.
 */
export class VmInterpreter implements ScriptInterpreter {
  readonly name = "node-vm";
  readonly version = process.versions.v8;
  readonly isSafe = false;
  readonly features = ["evaluate", "bind", "read", "print", "timeout"] as const;

  private readonly timeoutMs: number;
  private readonly sandbox: Record<string, unknown>;
  private readonly context: vm.Context;
  private output: string[] = [];

  constructor(options: VmInterpreterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EVAL_TIMEOUT_MS;
    const print = (...values: unknown[]): void => {
      this.output.push(values.map(formatValue).join(" "));
    };
    this.sandbox = { print, console: { log: print } };
    this.context = vm.createContext(this.sandbox, {
      name: "scriptbox",
      codeGeneration: { strings: false, wasm: false },
    });
  }

  evaluate(script: string): string {
    this.output = [];
    let result: unknown;
    try {
      result = vm.runInContext(script, this.context, { timeout: this.timeoutMs, filename: "tool.js" });
    } catch (error) {
      throw new InterpreterFaultError(faultMessage(error), error);
    }
    return result === undefined ? this.output.join("\n") : formatValue(result);
  }

  bind(name: string, literal: string): void {
    this.assertIdentifier(name);
    this.sandbox[name] = decodeLiteral(literal);
  }

  read(name: string): string {
    this.assertIdentifier(name);
    if (!Object.prototype.hasOwnProperty.call(this.sandbox, name)) {
      throw new InterpreterFaultError(`can't read "${name}": no such variable`);
    }
    return formatValue(this.sandbox[name]);
  }

  supports(command: string): boolean {
    if (!IDENTIFIER.test(command)) {
      return false;
    }
    return vm.runInContext(`typeof ${command} === "function"`, this.context) === true;
  }

  private assertIdentifier(name: string): void {
    if (!IDENTIFIER.test(name)) {
      throw new InterpreterFaultError(`invalid variable name "${name}"`);
    }
  }
}
