import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { ToolDiscovery, parseToolHeader } from "../../src/registry/discovery.js";
import { DiscoveryIOError } from "../../src/registry/errors.js";
import { RecordingLogger } from "../helpers/recordingLogger.js";

async function writeScript(root: string, relative: string, content: string): Promise<string> {
  const file = path.join(root, relative);
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, content, "utf8");
  return file;
}

describe("registry/discovery", () => {
  describe("parseToolHeader", () => {
    it("reads tags from the leading comment block only", () => {
      const header = parseToolHeader(
        [
          "#!/usr/bin/env node",
          "// @description Greets someone",
          "// @version 2.0",
          "// @param name:string:required Who to greet",
          "# @param count:int Number of times",
          "// @param broken",
          "const greeting = 1;",
          "// @param late:string Never parsed",
        ].join("\n"),
      );

      expect(header).to.deep.equal({
        description: "Greets someone",
        version: "2.0",
        parameters: [
          { name: "name", type_name: "string", required: true, description: "Who to greet" },
          { name: "count", type_name: "int", required: false, description: "Number of times" },
        ],
      });
    });

    it("accepts parameters without a description", () => {
      expect(parseToolHeader("// @param flag:bool:required").parameters).to.deep.equal([
        { name: "flag", type_name: "bool", required: true, description: "" },
      ]);
    });

    it("returns empty metadata for scripts without a header", () => {
      expect(parseToolHeader("print('hi');\n// @description ignored")).to.deep.equal({
        description: null,
        version: null,
        parameters: [],
      });
    });
  });

  describe("ToolDiscovery", () => {
    let root: string;
    let logger: RecordingLogger;

    beforeEach(async () => {
      root = await mkdtemp(path.join(tmpdir(), "scriptbox-tools-"));
      logger = new RecordingLogger();
    });

    afterEach(async () => {
      await rm(root, { recursive: true, force: true });
    });

    it("scans system and user directories", async () => {
      const hello = await writeScript(root, "bin/hello_world.js", "// @description Says hello\n'hi';\n");
      await writeScript(root, "bin/notes.txt", "// @description not a tool\n");
      const cleanup = await writeScript(root, "sbin/cleanup.js", "'done';\n");
      const reverse = await writeScript(
        root,
        "users/alice/utils/reverse_string.js",
        "// @description Reverse text\n// @version 1.0\n// @param text:string:required Input\ntext;\n",
      );
      await writeScript(root, "users/alice/utils/bad name.js", "'x';\n");
      await writeScript(root, "users/bin/kit/tool.js", "'x';\n");

      const discovery = new ToolDiscovery({ root, logger });
      const tools = await discovery.discover();

      expect(tools).to.have.length(3);
      expect(tools.map((tool) => tool.path.toString())).to.deep.equal([
        "/alice/utils/reverse_string:1.0",
        "/bin/hello_world",
        "/sbin/cleanup",
      ]);
      expect(tools[0]).to.deep.include({ description: "Reverse text", file_path: reverse });
      expect(tools[0]?.parameters).to.deep.equal([
        { name: "text", type_name: "string", required: true, description: "Input" },
      ]);
      expect(tools[1]).to.deep.include({ description: "Says hello", file_path: hello });
      expect(tools[2]).to.deep.include({ description: `Tool from ${cleanup}`, file_path: cleanup });
      expect(logger.messages("warn")).to.deep.equal(["discovered_tool_skipped", "discovered_tool_skipped"]);
    });

    it("honours a custom script extension", async () => {
      await writeScript(root, "bin/hello_world.js", "'hi';\n");
      await writeScript(root, "bin/hello_world.tool", "'hi';\n");

      const tools = await new ToolDiscovery({ root, logger, extension: ".tool" }).discover();

      expect(tools.map((tool) => tool.file_path)).to.deep.equal([path.join(root, "bin", "hello_world.tool")]);
    });

    it("replaces its working set on every pass", async () => {
      await writeScript(root, "bin/one.js", "1;\n");
      const two = await writeScript(root, "bin/two.js", "2;\n");
      const discovery = new ToolDiscovery({ root, logger });
      await discovery.discover();

      await rm(two);
      const second = await discovery.discover();

      expect(second.map((tool) => tool.path.toString())).to.deep.equal(["/bin/one"]);
      expect(discovery.tools.map((tool) => tool.path.toString())).to.deep.equal(["/bin/one"]);
    });

    it("returns nothing when the root does not exist", async () => {
      const discovery = new ToolDiscovery({ root: path.join(root, "missing"), logger });

      expect(await discovery.discover()).to.deep.equal([]);
    });

    it("raises a discovery error when a subtree cannot be scanned", async () => {
      await writeFile(path.join(root, "bin"), "not a directory", "utf8");

      let caught: unknown;
      try {
        await new ToolDiscovery({ root, logger }).discover();
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(DiscoveryIOError);
    });
  });
});
