// ── A small jq-compatible filter language shared by jq and yq ──

import { BuiltinError, errorMessage } from "../errors.js";

export type Json =
  | null
  | boolean
  | number
  | string
  | Json[]
  | { [key: string]: Json };

export type JsonObject = { [key: string]: Json };

export type Filter = (input: Json) => Json[];

// jq exit statuses
const COMPILE_ERROR = 3;
const RUNTIME_ERROR = 5;

const FUNCTIONS = [
  "keys", "values", "length", "type", "reverse", "sort", "unique",
  "flatten", "min", "max", "add", "avg",
] as const;
type FunctionName = typeof FUNCTIONS[number];

// Whole-filter shortcuts accepted in place of a filter
const SHORTCUTS: Readonly<Record<string, string>> = {
  ".keys": "keys",
  ".values": "values",
  ".length": "length",
  ".pretty": ".",
  ".compact": ".",
  ".type": "type",
  ".reverse": "reverse",
  ".sort": "sort",
  ".unique": "unique",
  ".flatten": "flatten",
  ".min": "min",
  ".max": "max",
  ".sum": "add",
  ".avg": "avg",
};

export function expandShortcut(filter: string): string {
  return Object.hasOwn(SHORTCUTS, filter) ? SHORTCUTS[filter] : filter;
}

type Step =
  | { type: "field"; name: string }
  | { type: "index"; index: number }
  | { type: "iterate" };

type Stage =
  | { type: "path"; steps: Step[] }
  | { type: "call"; name: FunctionName };

type Token =
  | { kind: "dot" | "pipe" | "lbracket" | "rbracket" }
  | { kind: "ident"; value: string }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string };

function isFunctionName(name: string): name is FunctionName {
  return FUNCTIONS.some((fn) => fn === name);
}

function compileError(message: string): BuiltinError {
  return new BuiltinError(`compile error: ${message}`, COMPILE_ERROR);
}

function runtimeError(message: string): BuiltinError {
  return new BuiltinError(message, RUNTIME_ERROR);
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (ch === ".") {
      tokens.push({ kind: "dot" });
      i++;
    } else if (ch === "|") {
      tokens.push({ kind: "pipe" });
      i++;
    } else if (ch === "[") {
      tokens.push({ kind: "lbracket" });
      i++;
    } else if (ch === "]") {
      tokens.push({ kind: "rbracket" });
      i++;
    } else if (ch === '"') {
      const match = /^"(?:[^"\\]|\\.)*"/.exec(source.slice(i));
      if (!match) throw compileError("unterminated string literal");
      let value: unknown;
      try {
        value = JSON.parse(match[0]);
      } catch {
        throw compileError(`invalid string literal ${match[0]}`);
      }
      if (typeof value !== "string") throw compileError(`invalid string literal ${match[0]}`);
      tokens.push({ kind: "string", value });
      i += match[0].length;
    } else {
      const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(i));
      const num = /^-?[0-9]+/.exec(source.slice(i));
      if (ident) {
        tokens.push({ kind: "ident", value: ident[0] });
        i += ident[0].length;
      } else if (num) {
        tokens.push({ kind: "number", value: Number(num[0]) });
        i += num[0].length;
      } else {
        throw compileError(`unexpected character '${ch}'`);
      }
    }
  }
  return tokens;
}

class FilterParser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Stage[] {
    const stages = [this.stage()];
    while (this.peek()?.kind === "pipe") {
      this.pos++;
      stages.push(this.stage());
    }
    const rest = this.peek();
    if (rest) throw compileError(`unexpected ${describeToken(rest)}`);
    return stages;
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    return this.tokens[this.pos++];
  }

  private stage(): Stage {
    const token = this.next();
    if (!token) throw compileError("unexpected end of filter");
    if (token.kind === "ident") {
      if (!isFunctionName(token.value)) throw compileError(`${token.value}/0 is not defined`);
      return { type: "call", name: token.value };
    }
    if (token.kind !== "dot") throw compileError(`unexpected ${describeToken(token)}`);

    const steps: Step[] = [];
    const first = this.peek();
    if (first?.kind === "ident" || first?.kind === "string") {
      this.pos++;
      steps.push({ type: "field", name: first.value });
    } else if (first?.kind === "lbracket") {
      steps.push(this.bracket());
    }

    for (;;) {
      const token = this.peek();
      if (token?.kind === "lbracket") {
        steps.push(this.bracket());
      } else if (token?.kind === "dot") {
        this.pos++;
        const field = this.next();
        if (field?.kind === "ident" || field?.kind === "string") {
          steps.push({ type: "field", name: field.value });
        } else if (field?.kind === "lbracket") {
          this.pos--;
          steps.push(this.bracket());
        } else {
          throw compileError(field ? `unexpected ${describeToken(field)}` : "unexpected end of filter");
        }
      } else {
        return { type: "path", steps };
      }
    }
  }

  private bracket(): Step {
    this.pos++;
    const inner = this.next();
    if (inner?.kind === "rbracket") return { type: "iterate" };
    const close = this.next();
    if (close?.kind !== "rbracket") throw compileError("expected ']'");
    if (inner?.kind === "number") return { type: "index", index: inner.value };
    if (inner?.kind === "string") return { type: "field", name: inner.value };
    throw compileError("only numbers and strings may be used as indexes");
  }
}

function describeToken(token: Token): string {
  switch (token.kind) {
    case "dot": return "'.'";
    case "pipe": return "'|'";
    case "lbracket": return "'['";
    case "rbracket": return "']'";
    case "ident": return `'${token.value}'`;
    case "number": return `'${token.value}'`;
    case "string": return JSON.stringify(token.value);
  }
}

// ── Values ──

export function typeOf(value: Json): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isObject(value: Json): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const TYPE_ORDER = ["null", "boolean", "number", "string", "array", "object"];

// jq ordering: null < false < true < numbers < strings < arrays < objects
export function compareJson(a: Json, b: Json): number {
  const ta = TYPE_ORDER.indexOf(typeOf(a));
  const tb = TYPE_ORDER.indexOf(typeOf(b));
  if (ta !== tb) return ta - tb;

  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0;
  if (Array.isArray(a) && Array.isArray(b)) {
    for (let i = 0; i < Math.min(a.length, b.length); i++) {
      const c = compareJson(a[i], b[i]);
      if (c !== 0) return c;
    }
    return a.length - b.length;
  }
  if (isObject(a) && isObject(b)) {
    const keysA = Object.keys(a).sort();
    const keysB = Object.keys(b).sort();
    const byKeys = compareJson(keysA, keysB);
    if (byKeys !== 0) return byKeys;
    for (const key of keysA) {
      const c = compareJson(a[key], b[key]);
      if (c !== 0) return c;
    }
  }
  return 0;
}

function add(a: Json, b: Json): Json {
  if (a === null) return b;
  if (b === null) return a;
  if (typeof a === "number" && typeof b === "number") return a + b;
  if (typeof a === "string" && typeof b === "string") return a + b;
  if (Array.isArray(a) && Array.isArray(b)) return [...a, ...b];
  if (isObject(a) && isObject(b)) return { ...a, ...b };
  throw runtimeError(`${typeOf(a)} and ${typeOf(b)} cannot be added`);
}

function requireArray(value: Json, what: string): Json[] {
  if (!Array.isArray(value)) throw runtimeError(`${typeOf(value)} cannot be ${what}, as it is not an array`);
  return value;
}

function flatten(values: Json[]): Json[] {
  return values.flatMap((value) => (Array.isArray(value) ? flatten(value) : [value]));
}

function callFunction(name: FunctionName, input: Json): Json[] {
  switch (name) {
    case "keys":
      if (isObject(input)) return [Object.keys(input).sort()];
      if (Array.isArray(input)) return [input.map((_, i) => i)];
      throw runtimeError(`${typeOf(input)} has no keys`);
    case "values":
      return input === null ? [] : [input];
    case "length":
      if (input === null) return [0];
      if (typeof input === "boolean") throw runtimeError("boolean has no length");
      if (typeof input === "number") return [Math.abs(input)];
      if (typeof input === "string") return [[...input].length];
      if (Array.isArray(input)) return [input.length];
      return [Object.keys(input).length];
    case "type":
      return [typeOf(input)];
    case "reverse":
      if (input === null) return [[]];
      if (typeof input === "string") return [[...input].reverse().join("")];
      return [[...requireArray(input, "reversed")].reverse()];
    case "sort":
      return [[...requireArray(input, "sorted")].sort(compareJson)];
    case "unique": {
      const sorted = [...requireArray(input, "sorted")].sort(compareJson);
      return [sorted.filter((value, i) => i === 0 || compareJson(sorted[i - 1], value) !== 0)];
    }
    case "flatten":
      return [flatten(requireArray(input, "flattened"))];
    case "min":
    case "max": {
      const values = requireArray(input, "compared");
      if (values.length === 0) return [null];
      const sign = name === "min" ? -1 : 1;
      return [values.reduce((best, value) => (sign * compareJson(value, best) >= 0 ? value : best))];
    }
    case "add":
      return [requireArray(input, "added").reduce<Json>(add, null)];
    case "avg": {
      const values = requireArray(input, "averaged");
      if (values.length === 0) throw runtimeError("cannot average an empty array");
      const sum = values.reduce<Json>(add, null);
      if (typeof sum !== "number") throw runtimeError(`${typeOf(sum)} cannot be divided by a number`);
      return [sum / values.length];
    }
  }
}

function applyStep(step: Step, input: Json): Json[] {
  switch (step.type) {
    case "field":
      if (input === null) return [null];
      if (!isObject(input)) throw runtimeError(`Cannot index ${typeOf(input)} with "${step.name}"`);
      return [Object.hasOwn(input, step.name) ? input[step.name] : null];
    case "index": {
      if (input === null) return [null];
      if (!Array.isArray(input)) throw runtimeError(`Cannot index ${typeOf(input)} with number`);
      const index = step.index < 0 ? input.length + step.index : step.index;
      return [input[index] ?? null];
    }
    case "iterate":
      if (Array.isArray(input)) return input;
      if (isObject(input)) return Object.values(input);
      throw runtimeError(`Cannot iterate over ${typeOf(input)}`);
  }
}

function applyStage(stage: Stage, input: Json): Json[] {
  if (stage.type === "call") return callFunction(stage.name, input);
  let values = [input];
  for (const step of stage.steps) {
    values = values.flatMap((value) => applyStep(step, value));
  }
  return values;
}

/**
 * Compile a filter into a function producing zero or more outputs per input.
 * Compile errors throw with status 3, evaluation errors with status 5.
 */
export function compileFilter(source: string): Filter {
  const text = expandShortcut(source.trim());
  if (text === "") throw compileError("empty filter");
  const stages = new FilterParser(tokenize(text)).parse();
  return (input) =>
    stages.reduce<Json[]>((values, stage) => values.flatMap((value) => applyStage(stage, value)), [input]);
}

// ── Conversion from parsed documents ──

export function toJson(value: unknown): Json {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map(toJson);
  if (value instanceof Map) {
    return Object.fromEntries([...value].map(([key, entry]) => [String(key), toJson(entry)]));
  }
  if (value instanceof Set) return [...value].map(toJson);
  // fromEntries defines keys such as "__proto__" as own properties
  if (typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJson(entry)]));
  }
  return String(value);
}

function tryParse(text: string): Json | undefined {
  try {
    return toJson(JSON.parse(text));
  } catch {
    return undefined;
  }
}

/**
 * One JSON document, or newline-delimited JSON values. Blank input yields
 * no values.
 */
export function parseJsonInput(text: string): Json[] {
  if (text.trim() === "") return [];
  const whole = tryParse(text);
  if (whole !== undefined) return [whole];
  const values: Json[] = [];
  for (const [index, line] of text.split("\n").entries()) {
    if (line.trim() === "") continue;
    try {
      values.push(toJson(JSON.parse(line)));
    } catch (err) {
      throw new BuiltinError(`invalid JSON input at line ${index + 1}: ${errorMessage(err)}`, 2);
    }
  }
  return values;
}

export interface FormatOptions {
  compact?: boolean;
  raw?: boolean;
}

export function formatJson(value: Json, options: FormatOptions = {}): string {
  if (options.raw && typeof value === "string") return value;
  return options.compact ? JSON.stringify(value) : JSON.stringify(value, null, 2);
}
