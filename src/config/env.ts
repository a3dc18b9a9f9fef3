/**
 * Helpers reading environment variables with consistent coercion rules. Each
 * reader takes the environment map explicitly (defaulting to `process.env`) so
 * option parsing stays testable without mutating the process globals.
 */
import process from "node:process";

import type { ProcessEnv } from "../nodePrimitives.js";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Normalises the raw value retrieved from the environment. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the variable as a boolean. "1", "true", "yes" and "on" are truthy,
 * "0", "false", "no" and "off" falsy; anything else yields the default.
 */
export function readBool(name: string, defaultValue: boolean, env: ProcessEnv = process.env): boolean {
  return readOptionalBool(name, env) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(name: string, env: ProcessEnv = process.env): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Returns an optional integer when {@link name} contains a valid base-10 literal within bounds. */
export function readOptionalInt(
  name: string,
  options?: NumberOptions,
  env: ProcessEnv = process.env,
): number | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: ProcessEnv = process.env,
): number {
  return readOptionalInt(name, options, env) ?? defaultValue;
}

/** Returns the trimmed value when {@link name} is set to a non-empty string. */
export function readOptionalString(name: string, env: ProcessEnv = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: ProcessEnv = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Reads an enum-like variable, validating it against the allow-list. Matching
 * is case-insensitive; unknown literals yield `undefined`.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: ProcessEnv = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  return allowed.find((value) => value.toLowerCase() === normalised.toLowerCase());
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: ProcessEnv = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
