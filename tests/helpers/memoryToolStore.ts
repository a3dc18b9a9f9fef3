import type { ToolStore } from "../../src/registry/persistence.js";
import { ToolPathMap, type ToolPath } from "../../src/registry/toolPath.js";
import type { ToolDefinition } from "../../src/registry/types.js";

/** In-memory {@link ToolStore} used where the file layout is irrelevant to the test. */
export class MemoryToolStore implements ToolStore {
  readonly tools = new ToolPathMap<ToolDefinition>();

  constructor(initial: readonly ToolDefinition[] = []) {
    for (const tool of initial) {
      this.tools.set(tool.path, tool);
    }
  }

  async save(tool: ToolDefinition): Promise<void> {
    this.tools.set(tool.path, tool);
  }

  async load(path: ToolPath): Promise<ToolDefinition | null> {
    return this.tools.get(path) ?? null;
  }

  async list(namespace?: string): Promise<ToolDefinition[]> {
    return [...this.tools.values()].filter(
      (tool) => namespace === undefined || tool.path.namespaceKeyword() === namespace,
    );
  }

  async delete(path: ToolPath): Promise<boolean> {
    return this.tools.delete(path);
  }
}
