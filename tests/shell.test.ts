import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { red } from "../src/ansi.js";
import { validateConfig } from "../src/config.js";
import { BuiltinError, ShellExit } from "../src/errors.js";
import { BuiltinRegistry } from "../src/registry.js";
import { runShell, selectMode, type ShellOptions } from "../src/shell.js";
import { FakeChild, fakeSpawner, makeIO, type TestIO } from "./helpers.js";

const config = validateConfig({});

function options(io: TestIO, extra: Partial<ShellOptions> = {}): ShellOptions {
  return { io, config, cwd: tmpdir(), env: { HOME: "/home/tester" }, ...extra };
}

describe("selectMode", () => {
  it("chooses interactive or piped from the terminal state", () => {
    expect(selectMode([], true)).toBe("interactive");
    expect(selectMode([], false)).toBe("piped-script");
  });

  it("chooses command string only for -c followed by exactly one string", () => {
    expect(selectMode(["-c", "true"], true)).toBe("command-string");
    expect(selectMode(["-c"], false)).toBe("file-script");
    expect(selectMode(["-c", "true", "x"], false)).toBe("file-script");
  });

  it("treats any other arguments as a script path", () => {
    expect(selectMode(["job.sh"], true)).toBe("file-script");
    expect(selectMode(["job.sh", "a", "b"], false)).toBe("file-script");
  });
});

describe("runShell", () => {
  it("exits 0 for -c true", async () => {
    const io = makeIO();
    expect(await runShell(["-c", "true"], options(io))).toBe(0);
    expect(io.stderr.text()).toBe("");
  });

  it("exits 1 for -c false and prints the failure", async () => {
    const io = makeIO();
    expect(await runShell(["-c", "false"], options(io))).toBe(1);
    expect(io.stderr.text()).toBe(`${red("✗")} exit status 1\n`);
  });

  it("exits with the status given to exit in every mode", async () => {
    const dir = await mkdtemp(join(tmpdir(), "toolbelt-shell-"));
    const script = join(dir, "job.sh");
    await writeFile(script, "exit 7\n");

    expect(await runShell(["-c", "exit 7"], options(makeIO()))).toBe(7);
    expect(await runShell([], options(makeIO({ input: "exit 7\n" })))).toBe(7);
    expect(await runShell([script], options(makeIO()))).toBe(7);
    expect(await runShell([], options(makeIO({ input: "exit 7\n", isTTY: true })))).toBe(7);
  });

  it("keeps an interactive session going after an ordinary failure", async () => {
    const io = makeIO({ input: "false\n", isTTY: true });
    expect(await runShell([], options(io))).toBe(0);
    expect(io.stderr.text()).toBe(`${red("✗")} exit status 1\n`);
  });

  it("tells a builtin's explicit exit apart from its ordinary failure", async () => {
    const registry = new BuiltinRegistry([
      ["quit", () => { throw new ShellExit(7); }],
      ["oops", () => { throw new BuiltinError("went wrong"); }],
    ]);
    const io = makeIO();
    expect(await runShell(["-c", "quit"], options(makeIO(), { registry }))).toBe(7);
    expect(await runShell(["-c", "oops"], options(io, { registry }))).toBe(1);
    expect(io.stderr.text()).toBe(`${red("✗")} oops: went wrong\n`);
  });

  it("treats empty piped input as success", async () => {
    expect(await runShell([], options(makeIO({ input: "" })))).toBe(0);
  });

  it("exits 1 on a parse error outside interactive mode", async () => {
    const io = makeIO();
    expect(await runShell(["-c", "ls | wc"], options(io))).toBe(1);
    expect(io.stderr.text()).toBe(`${red("✗")} parse error: line 1: pipelines are not supported\n`);
  });

  it("exits 1 when the script cannot be opened", async () => {
    const dir = await mkdtemp(join(tmpdir(), "toolbelt-shell-"));
    const script = join(dir, "missing.sh");
    const io = makeIO();
    expect(await runShell([script], options(io))).toBe(1);
    expect(io.stderr.text()).toBe(
      `${red("✗")} cannot open ${script}: ENOENT: no such file or directory, open '${script}'\n`
    );
  });

  it("treats a lone -c as a script path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "toolbelt-shell-"));
    const io = makeIO();
    expect(await runShell(["-c"], options(io, { cwd: dir }))).toBe(1);
    expect(io.stderr.text()).toBe(
      `${red("✗")} cannot open -c: ENOENT: no such file or directory, open '${join(dir, "-c")}'\n`
    );
  });

  it("reports command not found once", async () => {
    const { spawner } = fakeSpawner(() => new FakeChild().fail("ENOENT", "spawn nope ENOENT"));
    const io = makeIO();
    expect(await runShell(["-c", "nope"], options(io, { spawner }))).toBe(1);
    expect(io.stderr.text()).toBe(`${red("✗")} nope: command not found\n`);
  });

  it("runs -c with extra arguments as a script path", async () => {
    const dir = await mkdtemp(join(tmpdir(), "toolbelt-shell-"));
    await writeFile(join(dir, "-c"), "echo $0 $1 $2\n");
    const io = makeIO();
    expect(await runShell(["-c", "echo never", "one"], options(io, { cwd: dir }))).toBe(0);
    expect(io.stdout.text()).toBe("-c echo never one\n");
  });

  it("uses builtins before external commands", async () => {
    const { spawner, calls } = fakeSpawner(() => new FakeChild().respond({ code: 0 }));
    const io = makeIO();
    expect(await runShell(["-c", "echo hi; ls -la"], options(io, { spawner }))).toBe(0);
    expect(io.stdout.text()).toBe("hi\n");
    expect(calls.map((call) => [call.command, ...call.args])).toEqual([["ls", "-la"]]);
  });

  it("exits 1 when the config file is invalid", async () => {
    const dir = await mkdtemp(join(tmpdir(), "toolbelt-shell-"));
    const configPath = join(dir, "config.json");
    await writeFile(configPath, JSON.stringify({ prompt: 5 }));
    const io = makeIO();
    expect(await runShell(["-c", "true"], { io, configPath, env: {} })).toBe(1);
    expect(io.stderr.text()).toBe(`${red("✗")} invalid config: prompt: Expected string, received number\n`);
  });
});
