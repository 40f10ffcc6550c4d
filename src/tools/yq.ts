import { parseAllDocuments, stringify } from "yaml";
import { BuiltinError, errorMessage } from "../errors.js";
import { readInputs } from "../io.js";
import type { ToolDef } from "../types.js";
import { compileFilter, formatJson, toJson, type Json } from "./query.js";

const USAGE = "usage: yq [-o yaml|json] [FILTER] [FILE]";
const FORMATS = ["yaml", "json"] as const;
type OutputFormat = typeof FORMATS[number];

interface YqArgs {
  output: OutputFormat;
  filter: string;
  file?: string;
}

function outputFormat(value: string | undefined): OutputFormat {
  const format = FORMATS.find((name) => name === value);
  if (!format) throw new BuiltinError(`unknown output format: ${value ?? ""}\n${USAGE}`, 2);
  return format;
}

export function parseYqArgs(args: string[]): YqArgs {
  let output: OutputFormat = "yaml";
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "-o" || arg === "--output-format") {
      output = outputFormat(args[++i]);
    } else if (arg.startsWith("-o=") || arg.startsWith("--output-format=")) {
      output = outputFormat(arg.slice(arg.indexOf("=") + 1));
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new BuiltinError(`unknown option: ${arg}\n${USAGE}`, 2);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length > 2) throw new BuiltinError(USAGE, 2);
  const [filter = ".", file] = positional;
  return { output, filter, file };
}

// Every document in a YAML stream, as plain JSON values
export function parseYamlDocuments(text: string): Json[] {
  const values: Json[] = [];
  for (const doc of parseAllDocuments(text)) {
    const [error] = doc.errors;
    if (error) throw new BuiltinError(`invalid YAML: ${error.message}`, 2);
    values.push(toJson(doc.toJS()));
  }
  return values;
}

export const yq: ToolDef = {
  name: "yq",
  description: "Query YAML, print YAML or JSON",
  async run(ctx, args) {
    const { output, filter: source, file } = parseYqArgs(args);
    const filter = compileFilter(source);

    let text: string;
    try {
      [text] = await readInputs(ctx, file === undefined || file === "-" ? [] : [file]);
    } catch (err) {
      throw new BuiltinError(errorMessage(err), 2);
    }

    const results = parseYamlDocuments(text).flatMap(filter);
    if (output === "json") {
      for (const value of results) ctx.stdout.write(formatJson(value) + "\n");
      return;
    }
    ctx.stdout.write(results.map((value) => stringify(value)).join("---\n"));
  },
};
