import { describe, it } from "mocha";
import { expect } from "chai";
import { z } from "zod";

import { DuplicateToolError } from "../../src/registry/errors.js";
import { normaliseToolError, toolErrorResult } from "../../src/mcp/toolErrors.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

describe("mcp/toolErrors", () => {
  it("keeps the code and hint of registry errors", () => {
    const error = new DuplicateToolError("/alice/utils/greet");

    expect(normaliseToolError(error)).to.deep.equal({
      code: "E-TOOL-DUPLICATE",
      message: "Tool '/alice/utils/greet' already exists",
      hint: error.hint,
    });
  });

  it("maps schema failures to invalid arguments", () => {
    const result = z.object({ path: z.string() }).safeParse({ path: 1 });
    expect(result.success).to.equal(false);
    if (result.success) {
      return;
    }

    expect(normaliseToolError(result.error)).to.deep.equal({
      code: "E-INVALID-ARGS",
      message: "Invalid arguments: path: Expected string, received number",
      hint: "check the tool input schema",
    });
  });

  it("falls back to a generic code", () => {
    expect(normaliseToolError(new Error("boom"))).to.deep.equal({ code: "E-UNEXPECTED", message: "boom" });
    expect(normaliseToolError("plain")).to.deep.equal({ code: "E-UNEXPECTED", message: "plain" });
  });

  it("logs and wraps the failure", () => {
    const logger = new RecordingLogger();
    const result = toolErrorResult(logger, "bin___tcl_execute", new Error("boom"));

    expect(result).to.deep.equal({
      isError: true,
      content: [{ type: "text", text: "boom" }],
      structuredContent: { code: "E-UNEXPECTED", message: "boom" },
    });
    expect(logger.entries).to.deep.equal([
      { level: "warn", message: "tool_call_failed", payload: { tool: "bin___tcl_execute", code: "E-UNEXPECTED", message: "boom" } },
    ]);
  });
});
