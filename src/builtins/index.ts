import { BuiltinRegistry } from "../registry.js";
import { createTools, type ToolDeps } from "../tools/index.js";
import type { BuiltinHandler } from "../types.js";
import { coreBuiltins } from "./core.js";

/** Shell builtins plus every tool, in one registry. */
export function createRegistry(deps: ToolDeps): BuiltinRegistry {
  const tools = createTools(deps);
  const entries: Array<readonly [string, BuiltinHandler]> = [
    ...coreBuiltins(tools),
    ...tools.map((tool) => [tool.name, tool.run] as const),
  ];
  return new BuiltinRegistry(entries);
}
