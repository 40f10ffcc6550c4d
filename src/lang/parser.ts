// Recursive-descent parser: Token[] → Program.
// Running out of tokens inside an open construct raises an *incomplete*
// ParseError; any other unexpected token is an invalid-input ParseError.

import { ParseError } from "../errors.js";
import type {
  Assignment,
  Command,
  ForCommand,
  GroupCommand,
  IfCommand,
  LoopCommand,
  LoopControlCommand,
  Pipeline,
  Program,
  SimpleCommand,
  Statement,
  Word,
} from "./ast.js";
import { tokenize, type Token } from "./lexer.js";

const RESERVED = new Set([
  "if", "then", "elif", "else", "fi",
  "while", "until", "do", "done",
  "for", "{", "}", "!",
]);

const UNSUPPORTED: Partial<Record<string, string>> = {
  "|": "pipelines are not supported",
  "&": "background jobs are not supported",
  "(": "subshells are not supported",
  "<": "redirections are not supported",
  "<<": "redirections are not supported",
  ">": "redirections are not supported",
  ">>": "redirections are not supported",
};

// The literal text of an unquoted, expansion-free word
function plainWord(word: Word): string | null {
  if (word.parts.length !== 1) return null;
  const [part] = word.parts;
  return part.type === "text" && !part.quoted ? part.value : null;
}

function describe(token: Token): string {
  switch (token.kind) {
    case "word": return `'${token.word.raw}'`;
    case "op": return `'${token.op}'`;
    case "newline": return "newline";
    case "eof": return "end of input";
  }
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parseProgram(): Program {
    const body = this.parseList(new Set());
    const tok = this.peek();
    if (tok.kind !== "eof") throw this.unexpected(tok);
    return { body };
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private advance(): Token {
    const tok = this.tokens[this.pos];
    if (tok.kind !== "eof") this.pos++;
    return tok;
  }

  private keyword(tok: Token): string | null {
    if (tok.kind !== "word") return null;
    const value = plainWord(tok.word);
    return value !== null && RESERVED.has(value) ? value : null;
  }

  private skipNewlines(): void {
    while (this.peek().kind === "newline") this.pos++;
  }

  private unexpected(tok: Token): ParseError {
    if (tok.kind === "eof") {
      return new ParseError("unexpected end of input", tok.line, true);
    }
    if (tok.kind === "op") {
      const message = UNSUPPORTED[tok.op];
      if (message) return new ParseError(message, tok.line);
    }
    return new ParseError(`unexpected ${describe(tok)}`, tok.line);
  }

  private parseList(terminators: ReadonlySet<string>): Statement[] {
    const body: Statement[] = [];
    this.skipNewlines();
    for (;;) {
      const tok = this.peek();
      if (tok.kind === "eof") break;
      const kw = this.keyword(tok);
      if (kw !== null && terminators.has(kw)) break;

      body.push(this.parseStatement());

      const sep = this.peek();
      if (sep.kind === "newline" || (sep.kind === "op" && sep.op === ";")) {
        this.advance();
        this.skipNewlines();
        continue;
      }
      break;
    }
    return body;
  }

  // A list that must hold at least one command before one of `terminators`
  private parseBody(terminators: ReadonlySet<string>): Statement[] {
    const body = this.parseList(terminators);
    if (body.length === 0) throw this.unexpected(this.peek());
    return body;
  }

  private expectKeyword(...allowed: string[]): string {
    const tok = this.peek();
    const kw = this.keyword(tok);
    if (kw !== null && allowed.includes(kw)) {
      this.advance();
      return kw;
    }
    if (tok.kind === "eof") {
      throw new ParseError(`expected '${allowed.join("' or '")}'`, tok.line, true);
    }
    throw this.unexpected(tok);
  }

  private parseStatement(): Statement {
    const first = this.parsePipeline();
    const rest: Statement["rest"] = [];
    for (;;) {
      const tok = this.peek();
      if (tok.kind !== "op" || (tok.op !== "&&" && tok.op !== "||")) break;
      this.advance();
      this.skipNewlines();
      if (this.peek().kind === "eof") {
        throw new ParseError(`expected a command after '${tok.op}'`, tok.line, true);
      }
      rest.push({ op: tok.op, pipeline: this.parsePipeline() });
    }
    return { first, rest };
  }

  private parsePipeline(): Pipeline {
    let negated = false;
    if (this.keyword(this.peek()) === "!") {
      this.advance();
      negated = true;
    }
    const command = this.parseCommand();
    const tok = this.peek();
    if (tok.kind === "op" && tok.op === "|") throw this.unexpected(tok);
    return { negated, command };
  }

  private parseCommand(): Command {
    const tok = this.peek();
    if (tok.kind !== "word") throw this.unexpected(tok);

    switch (this.keyword(tok)) {
      case "if": return this.parseIf();
      case "while":
      case "until": return this.parseLoop();
      case "for": return this.parseFor();
      case "{": return this.parseGroup();
      case null: break;
      default: throw this.unexpected(tok);
    }

    const value = plainWord(tok.word);
    if (value === "break" || value === "continue") return this.parseLoopControl(value);
    return this.parseSimple();
  }

  private parseSimple(): SimpleCommand {
    const line = this.peek().line;
    const assignments: Assignment[] = [];
    const words: Word[] = [];

    for (let tok = this.peek(); tok.kind === "word"; tok = this.peek()) {
      this.advance();
      const assignment = words.length === 0 ? asAssignment(tok.word) : null;
      if (assignment) {
        assignments.push(assignment);
      } else {
        words.push(tok.word);
      }
    }

    const tok = this.peek();
    if (tok.kind === "op" && tok.op === "(" && words.length === 1) {
      throw new ParseError("function definitions are not supported", tok.line);
    }
    if (tok.kind === "op" && tok.op !== ";" && tok.op !== "&&" && tok.op !== "||" && tok.op !== "|") {
      throw this.unexpected(tok);
    }
    return { type: "simple", assignments, words, line };
  }

  private parseIf(): IfCommand {
    this.advance();
    const branches: IfCommand["branches"] = [];
    let elseBody: Statement[] | null = null;

    let condition = this.parseBody(new Set(["then"]));
    this.expectKeyword("then");
    let body = this.parseBody(new Set(["elif", "else", "fi"]));
    branches.push({ condition, body });

    for (;;) {
      const kw = this.expectKeyword("elif", "else", "fi");
      if (kw === "fi") break;
      if (kw === "else") {
        elseBody = this.parseBody(new Set(["fi"]));
        this.expectKeyword("fi");
        break;
      }
      condition = this.parseBody(new Set(["then"]));
      this.expectKeyword("then");
      body = this.parseBody(new Set(["elif", "else", "fi"]));
      branches.push({ condition, body });
    }
    return { type: "if", branches, elseBody };
  }

  private parseLoop(): LoopCommand {
    const type = this.expectKeyword("while", "until") === "while" ? "while" : "until";
    const condition = this.parseBody(new Set(["do"]));
    this.expectKeyword("do");
    const body = this.parseBody(new Set(["done"]));
    this.expectKeyword("done");
    return { type, condition, body };
  }

  private parseFor(): ForCommand {
    this.advance();
    const nameTok = this.advance();
    if (nameTok.kind === "eof") {
      throw new ParseError("expected a variable name after 'for'", nameTok.line, true);
    }
    const variable = nameTok.kind === "word" ? plainWord(nameTok.word) : null;
    if (variable === null || !/^[A-Za-z_][A-Za-z0-9_]*$/.test(variable)) {
      throw new ParseError(`bad for-loop variable ${describe(nameTok)}`, nameTok.line);
    }

    this.skipNewlines();
    let items: Word[] | null = null;
    const inTok = this.peek();
    if (inTok.kind === "word" && plainWord(inTok.word) === "in") {
      this.advance();
      items = [];
      for (let tok = this.peek(); tok.kind === "word"; tok = this.peek()) {
        items.push(tok.word);
        this.advance();
      }
    }

    const sep = this.peek();
    if (sep.kind === "op" && sep.op === ";") this.advance();
    else if (items !== null && sep.kind !== "newline" && sep.kind !== "eof") throw this.unexpected(sep);
    this.skipNewlines();

    this.expectKeyword("do");
    const body = this.parseBody(new Set(["done"]));
    this.expectKeyword("done");
    return { type: "for", variable, items, body };
  }

  private parseGroup(): GroupCommand {
    this.advance();
    const body = this.parseBody(new Set(["}"]));
    this.expectKeyword("}");
    return { type: "group", body };
  }

  private parseLoopControl(type: "break" | "continue"): LoopControlCommand {
    const line = this.advance().line;
    let depth: Word | null = null;
    const tok = this.peek();
    if (tok.kind === "word") {
      depth = tok.word;
      this.advance();
      const extra = this.peek();
      if (extra.kind === "word") {
        throw new ParseError(`${type}: too many arguments`, extra.line);
      }
    }
    return { type, depth, line };
  }
}

function asAssignment(word: Word): Assignment | null {
  const [first, ...rest] = word.parts;
  if (!first || first.type !== "text" || first.quoted) return null;
  const match = /^([A-Za-z_][A-Za-z0-9_]*)=/.exec(first.value);
  if (!match) return null;
  const name = match[1];
  const head = first.value.slice(match[0].length);
  const parts = head ? [{ ...first, value: head }, ...rest] : rest;
  return {
    name,
    value: { parts, raw: word.raw.slice(match[0].length), line: word.line },
  };
}

export function parse(source: string): Program {
  return new Parser(tokenize(source)).parseProgram();
}
