import type { ScriptInterpreter } from "../runtime/interpreter.js";

export const GUIDE_TOPICS = ["overview", "capabilities", "examples"] as const;

export type GuideTopic = (typeof GUIDE_TOPICS)[number];

const OVERVIEW = `# Script runtime overview

Tools are JavaScript snippets evaluated in a long-lived node:vm context.
The value of the last expression is the tool result; when it is undefined,
the lines written with print(...) or console.log(...) are returned instead.

Declared parameters are bound as globals before the script runs. Tools run
through exec_tool also receive every supplied argument as the object \`params\`.
The context lives as long as the server, so a global bound by an earlier call
keeps its value: an optional parameter omitted from a call still holds the
value it was last given.

Paths:
- /bin/<name>, /sbin/<name>, /docs/<name> are built in.
- /<user>/<package>/<name>[:<version>] are user tools.

Use the 'capabilities' or 'examples' topics for more.`;

const EXAMPLES = `# Examples

Evaluate a snippet (bin___tcl_execute):
  { "script": "[1, 2, 3].map((n) => n * 2).join(',')" }   -> 2,4,6

Register a tool (sbin___tcl_tool_add, privileged):
  { "user": "alice", "package": "utils", "name": "reverse_string", "version": "1.0",
    "description": "Reverse a string", "script": "text.split('').reverse().join('')",
    "parameters": [{ "name": "text", "description": "Input", "required": true, "type_name": "string" }] }

Run it (bin___exec_tool):
  { "tool_path": "/alice/utils/reverse_string:1.0", "params": { "text": "abc" } }   -> cba

Discovered tools carry their metadata in a leading comment block:
  // @description Greets someone
  // @param name:string:required Who to greet
  \`Hello, \${name}!\``;

function describeCapabilities(runtime: Pick<ScriptInterpreter, "name" | "version" | "isSafe" | "features">, privileged: boolean): string {
  return [
    "# Runtime capabilities",
    "",
    `- runtime: ${runtime.name} ${runtime.version}`,
    `- sandboxed: ${runtime.isSafe ? "yes" : "no (globals are isolated, the host is not)"}`,
    `- features: ${runtime.features.join(", ")}`,
    `- tool management: ${privileged ? "enabled" : "disabled (start with --privileged)"}`,
  ].join("\n");
}

export function renderGuide(
  topic: GuideTopic,
  runtime: Pick<ScriptInterpreter, "name" | "version" | "isSafe" | "features">,
  privileged: boolean,
): string {
  switch (topic) {
    case "overview":
      return OVERVIEW;
    case "capabilities":
      return describeCapabilities(runtime, privileged);
    case "examples":
      return EXAMPLES;
  }
}
