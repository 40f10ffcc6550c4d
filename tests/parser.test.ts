import { describe, expect, it } from "vitest";
import { ParseError } from "../src/errors.js";
import type { SimpleCommand } from "../src/lang/ast.js";
import { tokenize } from "../src/lang/lexer.js";
import { parse } from "../src/lang/parser.js";

function parseError(source: string): ParseError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error(`expected a parse error for ${JSON.stringify(source)}`);
}

function simple(source: string): SimpleCommand {
  const [statement] = parse(source).body;
  const { command } = statement.first;
  if (command.type !== "simple") throw new Error(`not a simple command: ${command.type}`);
  return command;
}

describe("tokenize", () => {
  it("splits words and keeps quoting per part", () => {
    const tokens = tokenize(`echo "a $B" 'c$d' e\\ f`);
    const words = tokens.flatMap((token) => (token.kind === "word" ? [token.word.parts] : []));
    expect(words).toEqual([
      [{ type: "text", value: "echo", quoted: false }],
      [
        { type: "text", value: "a ", quoted: true },
        { type: "param", name: "B", quoted: true },
      ],
      [{ type: "text", value: "c$d", quoted: true }],
      [
        { type: "text", value: "e", quoted: false },
        { type: "text", value: " ", quoted: true },
        { type: "text", value: "f", quoted: false },
      ],
    ]);
    expect(tokens[tokens.length - 1]).toEqual({ kind: "eof", line: 1 });
  });

  it("drops comments and tracks lines", () => {
    const tokens = tokenize("echo hi # note\nls");
    expect(tokens.map((token) => token.kind)).toEqual(["word", "word", "newline", "word", "eof"]);
    expect(tokens[3].line).toBe(2);
  });

  it("reads special parameters and braces", () => {
    const [token] = tokenize("$?${HOME}$1");
    expect(token.kind === "word" && token.word.parts).toEqual([
      { type: "param", name: "?", quoted: false },
      { type: "param", name: "HOME", quoted: false },
      { type: "param", name: "1", quoted: false },
    ]);
  });

  it("joins a backslash-newline continuation", () => {
    const words = tokenize("echo a\\\nb").flatMap((token) => (token.kind === "word" ? [token.word.raw] : []));
    expect(words).toEqual(["echo", "a\\\nb"]);
  });

  it("recognises two-character operators", () => {
    const ops = tokenize("a && b || c ; d").flatMap((token) => (token.kind === "op" ? [token.op] : []));
    expect(ops).toEqual(["&&", "||", ";"]);
  });
});

describe("parse", () => {
  it("parses an empty or comment-only source to an empty program", () => {
    expect(parse("").body).toEqual([]);
    expect(parse("\n  # nothing here\n").body).toEqual([]);
  });

  it("separates statements on ; and newlines", () => {
    expect(parse("echo a; echo b\necho c").body).toHaveLength(3);
  });

  it("splits leading assignments from words", () => {
    const command = simple("FOO=bar BAZ= run FOO=x");
    expect(command.assignments.map((a) => a.name)).toEqual(["FOO", "BAZ"]);
    expect(command.assignments[0].value.parts).toEqual([{ type: "text", value: "bar", quoted: false }]);
    expect(command.assignments[1].value.parts).toEqual([]);
    expect(command.words.map((w) => w.raw)).toEqual(["run", "FOO=x"]);
  });

  it("does not treat a quoted name as an assignment", () => {
    expect(simple(`"A=1"`).assignments).toEqual([]);
  });

  it("parses negation and and-or chains", () => {
    const [statement] = parse("! true && false || echo x").body;
    expect(statement.first.negated).toBe(true);
    expect(statement.rest.map((r) => r.op)).toEqual(["&&", "||"]);
  });

  it("parses if with elif and else", () => {
    const [statement] = parse("if false; then echo a; elif true; then echo b; else echo c; fi").body;
    const { command } = statement.first;
    expect(command.type).toBe("if");
    if (command.type !== "if") return;
    expect(command.branches).toHaveLength(2);
    expect(command.elseBody).toHaveLength(1);
  });

  it("parses for with and without a word list", () => {
    const [withList] = parse("for x in a b c; do echo $x; done").body;
    const [withoutList] = parse("for x\ndo echo $x\ndone").body;
    expect(withList.first.command).toMatchObject({ type: "for", variable: "x" });
    expect(withList.first.command.type === "for" && withList.first.command.items?.length).toBe(3);
    expect(withoutList.first.command).toMatchObject({ type: "for", variable: "x", items: null });
  });

  it("treats reserved words as plain arguments outside command position", () => {
    expect(simple("echo if then done").words.map((w) => w.raw)).toEqual(["echo", "if", "then", "done"]);
  });

  it("parses break with a depth", () => {
    const [statement] = parse("break 2").body;
    expect(statement.first.command).toMatchObject({ type: "break", depth: { raw: "2" } });
  });

  describe("incomplete input", () => {
    it.each([
      ["if true; then"],
      ["if true; then echo hi"],
      ["if true; then echo hi\nelse"],
      ["while true; do"],
      ["until false"],
      ["for x in a b"],
      ["for"],
      ["{ echo hi"],
      ["true &&"],
      ["false ||\n"],
      ["echo 'abc"],
      ['echo "abc'],
      ["echo \\"],
      ["echo ${HOME"],
    ])("%j is incomplete", (source) => {
      expect(parseError(source).incomplete).toBe(true);
    });
  });

  describe("invalid input", () => {
    it.each([
      ["ls | wc", "line 1: pipelines are not supported"],
      ["sleep 1 &", "line 1: background jobs are not supported"],
      ["(echo hi)", "line 1: subshells are not supported"],
      ["echo hi > out", "line 1: redirections are not supported"],
      ["cat < in", "line 1: redirections are not supported"],
      ["echo $(date)", "line 1: command substitution is not supported"],
      ["echo `date`", "line 1: command substitution is not supported"],
      ["greet() { echo hi; }", "line 1: function definitions are not supported"],
      ["fi", "line 1: unexpected 'fi'"],
      ["if true; then fi", "line 1: unexpected 'fi'"],
      ["echo ${a-b}", "line 1: bad substitution: ${a-b}"],
      ["echo ok\nls | wc", "line 2: pipelines are not supported"],
      ["for 1x in a; do :; done", "line 1: bad for-loop variable '1x'"],
    ])("%j is rejected", (source, message) => {
      const err = parseError(source);
      expect(err.incomplete).toBe(false);
      expect(err.message).toBe(message);
    });
  });
});
