import { BuiltinError, errorMessage } from "../errors.js";
import { readInputs } from "../io.js";
import type { ToolDef } from "../types.js";
import type { JsonObject } from "./query.js";

const USAGE = "usage: regex2json [--strict] PATTERN [FILE]";

// Named groups when the pattern has any, else $1..$n; $0 when it has no groups
function matchToObject(match: RegExpExecArray): JsonObject {
  const object: JsonObject = {};
  if (match.groups) {
    for (const [name, value] of Object.entries(match.groups)) object[name] = value ?? null;
    return object;
  }
  if (match.length === 1) return { $0: match[0] };
  for (let i = 1; i < match.length; i++) object[`$${i}`] = match[i] ?? null;
  return object;
}

function linesOf(text: string): string[] {
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => line.replace(/\r$/, ""));
}

export const regex2json: ToolDef = {
  name: "regex2json",
  description: "Turn lines matching a regex into JSON objects",
  async run(ctx, args) {
    const strict = args[0] === "--strict";
    const [pattern, ...files] = strict ? args.slice(1) : args;
    if (pattern === undefined || files.length > 1) throw new BuiltinError(USAGE, 2);

    let re: RegExp;
    try {
      re = new RegExp(pattern);
    } catch (err) {
      throw new BuiltinError(errorMessage(err), 2);
    }

    let text: string;
    try {
      [text] = await readInputs(ctx, files);
    } catch (err) {
      throw new BuiltinError(errorMessage(err), 2);
    }

    for (const [index, line] of linesOf(text).entries()) {
      const match = re.exec(line);
      if (match) {
        ctx.stdout.write(JSON.stringify(matchToObject(match)) + "\n");
      } else if (strict) {
        throw new BuiltinError(`line ${index + 1} does not match: ${line}`);
      }
    }
  },
};
