import { BuiltinError, errorMessage } from "../errors.js";
import { readInputs } from "../io.js";
import type { ToolDef } from "../types.js";
import { compileFilter, formatJson, parseJsonInput, type FormatOptions } from "./query.js";

const USAGE = "usage: jq [-c] [-r] FILTER [FILE...]";

interface JqArgs extends FormatOptions {
  filter: string;
  files: string[];
}

export function parseJqArgs(args: string[]): JqArgs {
  const options: FormatOptions = {};
  const positional: string[] = [];
  let flags = true;

  for (const arg of args) {
    if (!flags || !arg.startsWith("-") || arg === "-") {
      positional.push(arg);
    } else if (arg === "--") {
      flags = false;
    } else if (arg === "--compact-output") {
      options.compact = true;
    } else if (arg === "--raw-output") {
      options.raw = true;
    } else if (/^-[cr]+$/.test(arg)) {
      if (arg.includes("c")) options.compact = true;
      if (arg.includes("r")) options.raw = true;
    } else {
      throw new BuiltinError(`unknown option: ${arg}\n${USAGE}`, 2);
    }
  }

  const [filter, ...files] = positional;
  if (filter === undefined) throw new BuiltinError(USAGE, 2);
  if (filter === ".compact") options.compact = true;
  return { ...options, filter, files };
}

export const jq: ToolDef = {
  name: "jq",
  description: "Query JSON with jq filters",
  async run(ctx, args) {
    const { filter: source, files, ...format } = parseJqArgs(args);
    const filter = compileFilter(source);

    let texts: string[];
    try {
      texts = await readInputs(ctx, files);
    } catch (err) {
      throw new BuiltinError(errorMessage(err), 2);
    }

    for (const text of texts) {
      for (const input of parseJsonInput(text)) {
        for (const output of filter(input)) {
          ctx.stdout.write(formatJson(output, format) + "\n");
        }
      }
    }
  },
};
