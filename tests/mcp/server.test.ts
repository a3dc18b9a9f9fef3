import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";

import { createToolServer, normaliseTypeName, parametersToInputSchema } from "../../src/mcp/server.js";
import { ToolExecutor, type ToolExecutorClient } from "../../src/registry/executor.js";
import { VmInterpreter } from "../../src/runtime/vmInterpreter.js";
import { assertPlainObject, assertString } from "../helpers/assertions.js";
import { MemoryToolStore } from "../helpers/memoryToolStore.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

interface Harness {
  mcp: Client;
  server: Server;
  executor: ToolExecutorClient;
  logger: RecordingLogger;
  toolsDir: string;
}

/** Text of the first content block of a tool result. */
function textOf(result: unknown): string {
  assertPlainObject(result, "tool result");
  const content: unknown = result.content;
  if (!Array.isArray(content)) {
    expect.fail("tool result content should be an array");
  }
  const first: unknown = content[0];
  assertPlainObject(first, "first content block");
  assertString(first.text, "first content block text");
  return first.text;
}

function errorCodeOf(result: unknown): string {
  assertPlainObject(result, "tool result");
  expect(result.isError).to.equal(true);
  assertPlainObject(result.structuredContent, "structured error");
  assertString(result.structuredContent.code, "error code");
  return result.structuredContent.code;
}

describe("mcp/server", () => {
  let harness: Harness | null = null;

  async function connect(privileged: boolean): Promise<Harness> {
    const logger = new RecordingLogger();
    const interpreter = new VmInterpreter();
    const toolsDir = await mkdtemp(path.join(tmpdir(), "scriptbox-mcp-"));
    const executor = ToolExecutor.start({
      interpreter,
      logger,
      toolsDir,
      openStore: async () => new MemoryToolStore(),
    });
    const server = createToolServer({ client: executor, privileged, interpreter, logger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const mcp = new Client({ name: "scriptbox-test", version: "0.0.0" });
    await mcp.connect(clientTransport);
    harness = { mcp, server, executor, logger, toolsDir };
    return harness;
  }

  afterEach(async () => {
    if (harness) {
      await harness.mcp.close();
      await harness.server.close();
      await harness.executor.close();
      await rm(harness.toolsDir, { recursive: true, force: true });
      harness = null;
    }
  });

  it("hides management tools from unprivileged sessions", async () => {
    const { mcp } = await connect(false);
    const listed = await mcp.listTools();

    expect(listed.tools.map((tool) => tool.name)).to.deep.equal([
      "bin___tcl_execute",
      "bin___tcl_tool_list",
      "docs___runtime_guide",
      "bin___exec_tool",
    ]);
    expect(listed.tools[0]?.description).to.equal("Execute a script and return the result [/bin/tcl_execute]");
  });

  it("lists management tools for privileged sessions", async () => {
    const { mcp } = await connect(true);
    const listed = await mcp.listTools();

    expect(listed.tools.map((tool) => tool.name)).to.deep.equal([
      "bin___tcl_execute",
      "bin___tcl_tool_list",
      "docs___runtime_guide",
      "bin___exec_tool",
      "bin___discover_tools",
      "sbin___tcl_tool_add",
      "sbin___tcl_tool_remove",
    ]);
  });

  it("adds, exposes, runs and removes a user tool", async () => {
    const { mcp } = await connect(true);

    const added = await mcp.callTool({
      name: "sbin___tcl_tool_add",
      arguments: {
        user: "alice",
        package: "math",
        name: "add",
        version: "1.0",
        description: "Adds two numbers",
        script: "a + b",
        parameters: [
          { name: "a", required: true, type_name: "int" },
          { name: "b", required: true, type_name: "int" },
        ],
      },
    });
    expect(textOf(added)).to.equal("Tool '/alice/math/add:1.0' added successfully and persisted");

    const listed = await mcp.listTools();
    const tool = listed.tools.find((candidate) => candidate.name === "user_alice__math___add__v1_0");
    expect(tool?.description).to.equal("Adds two numbers [/alice/math/add:1.0]");
    expect(tool?.inputSchema).to.deep.equal({
      type: "object",
      properties: {
        a: { type: "integer", description: "" },
        b: { type: "integer", description: "" },
      },
      required: ["a", "b"],
    });

    const direct = await mcp.callTool({ name: "user_alice__math___add__v1_0", arguments: { a: 2, b: 3 } });
    expect(textOf(direct)).to.equal("5");

    const viaExec = await mcp.callTool({
      name: "bin___exec_tool",
      arguments: { tool_path: "/alice/math/add:1.0", params: { a: 1, b: 1 } },
    });
    expect(textOf(viaExec)).to.equal("2");

    const removed = await mcp.callTool({ name: "sbin___tcl_tool_remove", arguments: { path: "/alice/math/add:1.0" } });
    expect(textOf(removed)).to.equal("Tool '/alice/math/add:1.0' removed successfully");

    const gone = await mcp.callTool({ name: "user_alice__math___add__v1_0", arguments: { a: 2, b: 3 } });
    expect(errorCodeOf(gone)).to.equal("E-TOOL-NOT-FOUND");
    expect(textOf(gone)).to.equal("Tool '/alice/math/add:1.0' not found");
  });

  it("refuses management calls without privileges", async () => {
    const { mcp, logger } = await connect(false);

    const denied = await mcp.callTool({ name: "sbin___tcl_tool_remove", arguments: { path: "/alice/math/add" } });
    expect(errorCodeOf(denied)).to.equal("E-PRIVILEGE");
    expect(textOf(denied)).to.equal("Tool management requires --privileged mode");

    const viaExec = await mcp.callTool({
      name: "bin___exec_tool",
      arguments: { tool_path: "/sbin/tcl_tool_add", params: {} },
    });
    expect(errorCodeOf(viaExec)).to.equal("E-PRIVILEGE");
    expect(logger.messages("warn")).to.deep.equal(["tool_call_failed", "tool_call_failed"]);
  });

  it("evaluates scripts and lists tools", async () => {
    const { mcp } = await connect(false);

    const evaluated = await mcp.callTool({
      name: "bin___tcl_execute",
      arguments: { script: "[1, 2, 3].map((n) => n * 2).join(',')" },
    });
    expect(textOf(evaluated)).to.equal("2,4,6");

    const listed = await mcp.callTool({ name: "bin___tcl_tool_list", arguments: { namespace: "sbin" } });
    expect(textOf(listed)).to.equal(JSON.stringify(["/sbin/tcl_tool_add", "/sbin/tcl_tool_remove"], null, 2));
  });

  it("maps failures to coded error results", async () => {
    const { mcp } = await connect(false);

    const invalid = await mcp.callTool({ name: "bin___tcl_execute", arguments: {} });
    expect(errorCodeOf(invalid)).to.equal("E-INVALID-ARGS");
    expect(textOf(invalid)).to.equal("Invalid arguments: script: Required");

    const fault = await mcp.callTool({ name: "bin___tcl_execute", arguments: { script: "throw new Error('boom')" } });
    expect(errorCodeOf(fault)).to.equal("E-INTERPRETER");
    expect(textOf(fault)).to.equal("boom");

    const unknown = await mcp.callTool({ name: "bin___nope", arguments: {} });
    expect(errorCodeOf(unknown)).to.equal("E-TOOL-NOT-FOUND");

    const garbage = await mcp.callTool({ name: "garbage", arguments: {} });
    expect(errorCodeOf(garbage)).to.equal("E-PATH-FORMAT");
    expect(textOf(garbage)).to.equal("Invalid encoded tool name 'garbage'");
  });

  it("renders the runtime guide", async () => {
    const { mcp } = await connect(false);

    const guide = await mcp.callTool({ name: "docs___runtime_guide", arguments: { topic: "capabilities" } });
    expect(textOf(guide)).to.equal(
      [
        "# Runtime capabilities",
        "",
        `- runtime: node-vm ${process.versions.v8}`,
        "- sandboxed: no (globals are isolated, the host is not)",
        "- features: evaluate, bind, read, print, timeout",
        "- tool management: disabled (start with --privileged)",
      ].join("\n"),
    );

    const overview = await mcp.callTool({ name: "docs___runtime_guide", arguments: {} });
    expect(textOf(overview).split("\n")[0]).to.equal("# Script runtime overview");
    expect(textOf(overview).split("\n")).to.include("keeps its value: an optional parameter omitted from a call still holds the");
  });

  describe("schema helpers", () => {
    it("normalises loose type names", () => {
      expect(normaliseTypeName("INT")).to.equal("integer");
      expect(normaliseTypeName(" bool ")).to.equal("boolean");
      expect(normaliseTypeName("list")).to.equal("array");
      expect(normaliseTypeName("whatever")).to.equal("string");
    });

    it("omits the required list when nothing is required", () => {
      expect(
        parametersToInputSchema([{ name: "text", description: "Input", required: false, type_name: "string" }]),
      ).to.deep.equal({ type: "object", properties: { text: { type: "string", description: "Input" } } });
    });
  });
});
