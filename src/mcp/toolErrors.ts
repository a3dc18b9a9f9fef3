import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import { TOOLBOX_ERROR_CODES } from "../registry/errors.js";

/** Code applied to failures that carry none of their own. */
const UNEXPECTED_ERROR_CODE = "E-UNEXPECTED";

/** Machine readable form of a failure surfaced to MCP clients. */
export interface NormalisedToolError {
  code: string;
  message: string;
  hint?: string;
}

function readStringField(error: object, field: "code" | "hint"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Normalises a thrown value. Zod failures map to `E-INVALID-ARGS`; errors
 * exposing their own string `code` (and optional `hint`) keep them.
 */
export function normaliseToolError(error: unknown): NormalisedToolError {
  if (error instanceof z.ZodError) {
    const issues = error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
    return {
      code: TOOLBOX_ERROR_CODES.INVALID_ARGS,
      message: `Invalid arguments: ${issues.join("; ")}`,
      hint: "check the tool input schema",
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== "object" || error === null) {
    return { code: UNEXPECTED_ERROR_CODE, message };
  }
  const hint = readStringField(error, "hint");
  return {
    code: readStringField(error, "code") ?? UNEXPECTED_ERROR_CODE,
    message,
    ...(hint !== undefined ? { hint } : {}),
  };
}

/** Logs the failure and wraps it in an MCP error result. */
export function toolErrorResult(logger: StructuredLogger, toolName: string, error: unknown): CallToolResult {
  const normalised = normaliseToolError(error);
  logger.warn("tool_call_failed", { tool: toolName, code: normalised.code, message: normalised.message });
  return {
    isError: true,
    content: [{ type: "text", text: normalised.message }],
    structuredContent: { ...normalised },
  };
}
