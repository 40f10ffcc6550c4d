import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { red } from "../src/ansi.js";
import { coreBuiltins } from "../src/builtins/core.js";
import { ExecDispatcher } from "../src/dispatcher.js";
import { ErrorCode, ParseError, ToolbeltError } from "../src/errors.js";
import { Interpreter, type InterpreterSettings } from "../src/interpreter.js";
import { readAll } from "../src/io.js";
import { BuiltinRegistry } from "../src/registry.js";
import { ShellState } from "../src/state.js";
import { SUCCESS, failure, type ExitSignal } from "../src/types.js";
import { makeIO, tick, type TestIO } from "./helpers.js";

const SETTINGS: InterpreterSettings = {
  prompt: "$ ",
  continuationPrompt: "> ",
  maxPendingSource: 1024,
  maxLoopIterations: 1000,
};

function harness(io: TestIO, settings: Partial<InterpreterSettings> = {}) {
  const calls: string[][] = [];
  const slurped: string[] = [];
  const registry = new BuiltinRegistry([
    ...coreBuiltins([]),
    ["record", (_ctx, args) => { calls.push(args); }],
    ["slurp", async (ctx) => {
      calls.push(["slurp"]);
      slurped.push(await readAll(ctx.stdin));
    }],
  ]);
  const executor = { execute: async (): Promise<ExitSignal> => SUCCESS };
  const interpreter = new Interpreter({
    io,
    dispatcher: new ExecDispatcher(registry, executor),
    state: new ShellState({ cwd: tmpdir(), env: { HOME: "/home/tester" } }),
    settings: { ...SETTINGS, ...settings },
  });
  return { interpreter, calls, slurped };
}

describe("Interpreter", () => {
  describe("interactive", () => {
    it("runs a multi-line construct once, after its last line", async () => {
      const io = makeIO();
      const { interpreter, calls } = harness(io);
      const done = interpreter.runInteractive();

      io.stdin.write("for x in a b\n");
      await tick();
      expect(calls).toEqual([]);
      io.stdin.write("do record $x\n");
      await tick();
      expect(calls).toEqual([]);
      io.stdin.write("done\n");
      await vi.waitFor(() => expect(calls).toEqual([["a"], ["b"]]));

      io.stdin.end();
      expect(await done).toEqual(SUCCESS);
      expect(calls).toEqual([["a"], ["b"]]);
      expect(io.stdout.text()).toBe("$ > > $ ");
    });

    it("hands input typed while a command runs to that command", async () => {
      const io = makeIO();
      const { interpreter, calls, slurped } = harness(io);
      const done = interpreter.runInteractive();

      io.stdin.write("slurp\n");
      await vi.waitFor(() => expect(calls).toEqual([["slurp"]]));
      io.stdin.end('{"a":1}\nrecord leaked\n');

      expect(await done).toEqual(SUCCESS);
      expect(slurped).toEqual(['{"a":1}\nrecord leaked\n']);
      expect(calls).toEqual([["slurp"]]);
    });

    it("runs lines that arrive together one after another", async () => {
      const io = makeIO({ input: "record a\nrecord b\n" });
      const { interpreter, calls } = harness(io);
      expect(await interpreter.runInteractive()).toEqual(SUCCESS);
      expect(calls).toEqual([["a"], ["b"]]);
      expect(io.stdout.text()).toBe("$ $ $ ");
    });

    it("reports an invalid line and keeps going", async () => {
      const io = makeIO({ input: "ls | wc\nrecord ok\n" });
      const { interpreter, calls } = harness(io);
      expect(await interpreter.runInteractive()).toEqual(SUCCESS);
      expect(io.stderr.text()).toBe(`${red("✗")} parse error: line 1: pipelines are not supported\n`);
      expect(calls).toEqual([["ok"]]);
    });

    it("prints an ordinary failure and keeps going", async () => {
      const io = makeIO({ input: "false\nrecord after\n" });
      const { interpreter, calls } = harness(io);
      expect(await interpreter.runInteractive()).toEqual(SUCCESS);
      expect(io.stderr.text()).toBe(`${red("✗")} exit status 1\n`);
      expect(calls).toEqual([["after"]]);
    });

    it("ends the session on exit", async () => {
      const io = makeIO({ input: "record a\nexit 7\nrecord b\n" });
      const { interpreter, calls } = harness(io);
      expect(await interpreter.runInteractive()).toEqual({ kind: "exit", status: 7 });
      expect(calls).toEqual([["a"]]);
    });

    it("discards a continuation buffer that grows past the limit", async () => {
      const io = makeIO({ input: "if true; then\nrecord x\n" });
      const { interpreter, calls } = harness(io, { maxPendingSource: 10 });
      await interpreter.runInteractive();
      expect(io.stderr.text()).toBe(`${red("✗")} parse error: input exceeds 10 bytes without completing\n`);
      expect(calls).toEqual([["x"]]);
    });

    it("succeeds on end of input with nothing typed", async () => {
      const io = makeIO({ input: "" });
      const { interpreter } = harness(io);
      expect(await interpreter.runInteractive()).toEqual(SUCCESS);
    });
  });

  describe("piped script", () => {
    it("treats empty input as a no-op", async () => {
      const { interpreter } = harness(makeIO({ input: "" }));
      expect(await interpreter.runPiped()).toEqual(SUCCESS);
    });

    it("runs the whole input as one program", async () => {
      const { interpreter, calls } = harness(makeIO({ input: "record a\nfor x in b c; do\n  record $x\ndone\n" }));
      expect(await interpreter.runPiped()).toEqual(SUCCESS);
      expect(calls).toEqual([["a"], ["b"], ["c"]]);
    });

    it("fails on incomplete input", async () => {
      const { interpreter, calls } = harness(makeIO({ input: "record a\nif true; then\n" }));
      await expect(interpreter.runPiped()).rejects.toBeInstanceOf(ParseError);
      expect(calls).toEqual([]);
    });

    it("returns exit from the script", async () => {
      const { interpreter } = harness(makeIO({ input: "exit 7\n" }));
      expect(await interpreter.runPiped()).toEqual({ kind: "exit", status: 7 });
    });
  });

  describe("command string", () => {
    it("distinguishes success, failure and exit", async () => {
      const { interpreter } = harness(makeIO());
      expect(await interpreter.runCommand("true")).toEqual(SUCCESS);
      expect(await interpreter.runCommand("false")).toEqual(failure("builtin", 1, ""));
      expect(await interpreter.runCommand("exit 7")).toEqual({ kind: "exit", status: 7 });
    });

    it("throws on a parse error", async () => {
      const { interpreter } = harness(makeIO());
      await expect(interpreter.runCommand("if true; then")).rejects.toThrow("line 1: unexpected end of input");
    });
  });

  describe("file script", () => {
    it("runs the file with its arguments", async () => {
      const dir = await mkdtemp(join(tmpdir(), "toolbelt-script-"));
      const path = join(dir, "job.sh");
      await writeFile(path, "record $0 $1 $#\nexit 7\nrecord never\n");
      const { interpreter, calls } = harness(makeIO());

      expect(await interpreter.runFile(path, ["arg"])).toEqual({ kind: "exit", status: 7 });
      expect(calls).toEqual([[path, "arg", "1"]]);
    });

    it("fails distinctly when the file cannot be opened", async () => {
      const dir = await mkdtemp(join(tmpdir(), "toolbelt-script-"));
      const path = join(dir, "missing.sh");
      const { interpreter } = harness(makeIO());

      const err = await interpreter.runFile(path).then(
        () => undefined,
        (e: unknown) => e
      );
      expect(err).toBeInstanceOf(ToolbeltError);
      expect(err instanceof ToolbeltError && err.code).toBe(ErrorCode.SCRIPT_UNREADABLE);
      expect(err instanceof Error && err.message).toBe(
        `cannot open ${path}: ENOENT: no such file or directory, open '${path}'`
      );
    });
  });
});
