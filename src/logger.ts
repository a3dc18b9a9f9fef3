import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";
import process from "node:process";

import { isNotFound } from "./nodePrimitives.js";

/** Placeholder inserted when a secret value is redacted. */
const REDACTION_TOKEN = "[REDACTED]";

const REDACTION_ENABLE_TOKENS = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACTION_DISABLE_TOKENS = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys whose values are redacted when redaction is enabled. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
]);

/**
 * Parses the `SCRIPTBOX_LOG_REDACT` directive list. Accepts comma-separated
 * toggles (`on`, `off`, ...) mixed with literal substrings to scrub from string
 * payload values. Providing substrings without a toggle enables redaction.
 */
export function parseRedactionDirectives(raw: string | undefined): {
  enabled: boolean;
  tokens: Array<string>;
} {
  if (!raw) {
    return { enabled: false, tokens: [] };
  }

  const directives = raw
    .split(",")
    .map((value) => value.trim())
    .filter((value) => value.length > 0);

  let enabled: boolean | undefined;
  const tokens: Array<string> = [];
  for (const directive of directives) {
    const normalised = directive.toLowerCase();
    if (REDACTION_DISABLE_TOKENS.has(normalised)) {
      enabled = false;
      continue;
    }
    if (REDACTION_ENABLE_TOKENS.has(normalised)) {
      enabled = true;
      continue;
    }
    tokens.push(directive);
  }

  return { enabled: enabled ?? tokens.length > 0, tokens: Array.from(new Set(tokens)) };
}

/** Maximum size of the mirrored log file before it is rotated. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MiB

const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  readonly logFile?: string | null;
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  readonly maxFileSizeBytes?: number;
  /** Number of log files to retain, the active one included. */
  readonly maxFileCount?: number;
  /** Substrings scrubbed from string payload values. */
  readonly redactSecrets?: Array<string>;
  /** Explicit redaction toggle; falls back to `SCRIPTBOX_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  /** Stream receiving the JSON lines. Defaults to stderr, stdout carries the protocol. */
  readonly stream?: { write(chunk: string): unknown };
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger emitting JSON lines and optionally mirroring them to a
 * file. File writes are queued sequentially to guarantee ordering.
 */
export class StructuredLogger {
  private readonly logFile?: string;
  private readonly minLevel: LogLevel;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly redactSecrets: Array<string>;
  private readonly redactionEnabled: boolean;
  private readonly stream: { write(chunk: string): unknown };
  private readonly entryListener?: (entry: LogEntry) => void;
  private writeQueue: Promise<void> = Promise.resolve();
  private logDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile ?? undefined;
    this.minLevel = options.minLevel ?? "info";
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    const directives = parseRedactionDirectives(process.env.SCRIPTBOX_LOG_REDACT);
    this.redactSecrets = Array.from(new Set([...directives.tokens, ...(options.redactSecrets ?? [])]));
    this.redactionEnabled = options.redactionEnabled ?? directives.enabled;
    this.stream = options.stream ?? process.stderr;
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  /** Waits for pending file writes. Tests rely on it to read mirrored logs. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const safePayload = payload !== undefined && this.redactionEnabled ? this.deepRedact(payload) : payload;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(safePayload !== undefined ? { payload: safePayload } : {}),
    };
    const line = `${JSON.stringify(entry)}\n`;
    this.stream.write(line);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }

    const logFile = this.logFile;
    if (!logFile) {
      return;
    }
    this.writeQueue = this.writeQueue.then(async () => {
      try {
        await this.ensureLogDestination(logFile);
        await this.rotateIfNeeded(logFile, Buffer.byteLength(line, "utf8"));
        await appendFile(logFile, line, "utf8");
      } catch (err) {
        this.reportInternalFailure("log_file_write_failed", err);
        // Retry directory creation on the next entry.
        this.logDirectoryReady = false;
      }
    });
  }

  private async ensureLogDestination(logFile: string): Promise<void> {
    if (this.logDirectoryReady) {
      return;
    }
    await mkdir(dirname(logFile), { recursive: true });
    this.logDirectoryReady = true;
  }

  /** Rotates the mirrored file when appending would exceed the size limit. */
  private async rotateIfNeeded(logFile: string, pendingBytes: number): Promise<void> {
    let currentSize = 0;
    try {
      currentSize = (await stat(logFile)).size;
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    if (currentSize + pendingBytes <= this.maxFileSizeBytes) {
      return;
    }

    try {
      await this.performRotation(logFile);
    } catch (error) {
      this.reportInternalFailure("log_file_rotation_failed", error);
    }
  }

  private async performRotation(logFile: string): Promise<void> {
    if (this.maxFileCount === 1) {
      await rm(logFile, { force: true });
      return;
    }

    await rm(`${logFile}.${this.maxFileCount - 1}`, { force: true });
    for (let index = this.maxFileCount - 2; index >= 1; index -= 1) {
      await renameIfPresent(`${logFile}.${index}`, `${logFile}.${index + 1}`);
    }
    await renameIfPresent(logFile, `${logFile}.1`);
  }

  private reportInternalFailure(message: string, error: unknown): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: "error",
      message,
      payload: { message: error instanceof Error ? error.message : String(error) },
    };
    process.stderr.write(`${JSON.stringify(entry)}\n`);
  }

  private deepRedact(value: unknown): unknown {
    if (Array.isArray(value)) {
      return value.map((item) => this.deepRedact(item));
    }
    if (typeof value === "string") {
      let sanitized = value;
      for (const secret of this.redactSecrets) {
        sanitized = sanitized.split(secret).join(REDACTION_TOKEN);
      }
      return sanitized;
    }
    if (value && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTION_TOKEN : this.deepRedact(entry);
      }
      return result;
    }
    return value;
  }
}

async function renameIfPresent(source: string, target: string): Promise<void> {
  try {
    await rename(source, target);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}
