// Tokenizer for the shell language. Unterminated quotes, a trailing backslash
// or an open ${ raise an *incomplete* ParseError so the caller can ask for
// more input.

import { ParseError } from "../errors.js";
import type { Word, WordPart } from "./ast.js";

export type Operator =
  | ";"
  | ";;"
  | "&&"
  | "||"
  | "|"
  | "&"
  | "("
  | ")"
  | "<"
  | "<<"
  | ">"
  | ">>";

export type Token =
  | { kind: "word"; word: Word; line: number }
  | { kind: "op"; op: Operator; line: number }
  | { kind: "newline"; line: number }
  | { kind: "eof"; line: number };

const OPERATOR_CHARS = new Set([";", "&", "|", "(", ")", "<", ">"]);
const SPECIAL_PARAMS = new Set(["?", "$", "#", "@"]);
const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /[A-Za-z0-9_]/;

function isWordEnd(ch: string): boolean {
  return ch === " " || ch === "\t" || ch === "\n" || OPERATOR_CHARS.has(ch);
}

class Lexer {
  private pos = 0;
  private line = 1;
  private readonly tokens: Token[] = [];

  constructor(private readonly src: string) {}

  run(): Token[] {
    const { src } = this;
    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === " " || ch === "\t" || ch === "\r") {
        this.pos++;
      } else if (ch === "\\" && src[this.pos + 1] === "\n") {
        this.pos += 2;
        this.line++;
      } else if (ch === "\n") {
        this.tokens.push({ kind: "newline", line: this.line });
        this.pos++;
        this.line++;
      } else if (ch === "#") {
        while (this.pos < src.length && src[this.pos] !== "\n") this.pos++;
      } else if (OPERATOR_CHARS.has(ch)) {
        this.readOperator(ch);
      } else {
        this.readWord();
      }
    }
    this.tokens.push({ kind: "eof", line: this.line });
    return this.tokens;
  }

  private readOperator(ch: string): void {
    const next = this.src[this.pos + 1];
    const line = this.line;
    let op: Operator;
    switch (ch) {
      case ";": op = next === ";" ? ";;" : ";"; break;
      case "&": op = next === "&" ? "&&" : "&"; break;
      case "|": op = next === "|" ? "||" : "|"; break;
      case "<": op = next === "<" ? "<<" : "<"; break;
      case ">": op = next === ">" ? ">>" : ">"; break;
      case "(": op = "("; break;
      default: op = ")";
    }
    this.pos += op.length;
    this.tokens.push({ kind: "op", op, line });
  }

  private readWord(): void {
    const { src } = this;
    const start = this.pos;
    const line = this.line;
    const parts: WordPart[] = [];

    const pushText = (value: string, quoted: boolean) => {
      const last = parts[parts.length - 1];
      if (last && last.type === "text" && last.quoted === quoted) {
        last.value += value;
      } else {
        parts.push({ type: "text", value, quoted });
      }
    };

    while (this.pos < src.length && !isWordEnd(src[this.pos])) {
      const ch = src[this.pos];
      if (ch === "\\") {
        if (this.pos + 1 >= src.length) {
          throw new ParseError("unexpected end of input after backslash", this.line, true);
        }
        if (src[this.pos + 1] === "\n") {
          this.line++;
        } else {
          pushText(src[this.pos + 1], true);
        }
        this.pos += 2;
      } else if (ch === "'") {
        const end = src.indexOf("'", this.pos + 1);
        if (end === -1) throw new ParseError("unterminated single quote", line, true);
        const value = src.slice(this.pos + 1, end);
        this.line += value.split("\n").length - 1;
        pushText(value, true);
        this.pos = end + 1;
      } else if (ch === '"') {
        this.readDoubleQuoted(parts, pushText);
      } else if (ch === "$") {
        this.readParam(parts, pushText, false);
      } else if (ch === "`") {
        throw new ParseError("command substitution is not supported", this.line);
      } else {
        pushText(ch, false);
        this.pos++;
      }
    }

    this.tokens.push({
      kind: "word",
      word: { parts, raw: src.slice(start, this.pos), line },
      line,
    });
  }

  private readDoubleQuoted(
    parts: WordPart[],
    pushText: (value: string, quoted: boolean) => void
  ): void {
    const { src } = this;
    const line = this.line;
    this.pos++;
    // "" must still produce an (empty) field
    pushText("", true);
    while (this.pos < src.length) {
      const ch = src[this.pos];
      if (ch === '"') {
        this.pos++;
        return;
      }
      if (ch === "\\") {
        const next = src[this.pos + 1];
        if (next === undefined) break;
        if (next === "\n") {
          this.line++;
        } else if (next === "$" || next === '"' || next === "\\" || next === "`") {
          pushText(next, true);
        } else {
          pushText("\\" + next, true);
        }
        this.pos += 2;
      } else if (ch === "$") {
        this.readParam(parts, pushText, true);
      } else if (ch === "`") {
        throw new ParseError("command substitution is not supported", this.line);
      } else {
        if (ch === "\n") this.line++;
        pushText(ch, true);
        this.pos++;
      }
    }
    throw new ParseError("unterminated double quote", line, true);
  }

  private readParam(
    parts: WordPart[],
    pushText: (value: string, quoted: boolean) => void,
    quoted: boolean
  ): void {
    const { src } = this;
    const next = src[this.pos + 1];

    if (next === "{") {
      const end = src.indexOf("}", this.pos + 2);
      if (end === -1) throw new ParseError("unterminated ${", this.line, true);
      const name = src.slice(this.pos + 2, end);
      if (!isParamName(name)) throw new ParseError(`bad substitution: \${${name}}`, this.line);
      parts.push({ type: "param", name, quoted });
      this.pos = end + 1;
      return;
    }
    if (next === "(") {
      throw new ParseError("command substitution is not supported", this.line);
    }
    if (next !== undefined && (SPECIAL_PARAMS.has(next) || /[0-9]/.test(next))) {
      parts.push({ type: "param", name: next, quoted });
      this.pos += 2;
      return;
    }
    if (next !== undefined && NAME_START.test(next)) {
      let end = this.pos + 1;
      while (end < src.length && NAME_CHAR.test(src[end])) end++;
      parts.push({ type: "param", name: src.slice(this.pos + 1, end), quoted });
      this.pos = end;
      return;
    }
    pushText("$", quoted);
    this.pos++;
  }
}

function isParamName(name: string): boolean {
  return (
    SPECIAL_PARAMS.has(name) ||
    /^[0-9]+$/.test(name) ||
    /^[A-Za-z_][A-Za-z0-9_]*$/.test(name)
  );
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).run();
}
