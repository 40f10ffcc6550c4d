#!/usr/bin/env node

// ── Multicall entry point: `toolbelt <tool> [args]`, `toolbelt shell`, or a link named after a tool ──

import { existsSync, readFileSync, realpathSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { bold, cyan, dim, writeError } from "./ansi.js";
import { loadConfig, type Config } from "./config.js";
import { ExecDispatcher } from "./dispatcher.js";
import { errorMessage } from "./errors.js";
import { setLang, t } from "./i18n.js";
import { processIO } from "./io.js";
import { describeFailure } from "./lang/runner.js";
import { ProcessExecutor } from "./process.js";
import { BuiltinRegistry } from "./registry.js";
import { runShell, type ShellOptions } from "./shell.js";
import { ShellState } from "./state.js";
import { createTools } from "./tools/index.js";
import type { SessionIO, ToolDef } from "./types.js";

const SHELL_LINK = "tbsh";

// package.json sits above both src/ and dist/src/
export function findVersion(start = dirname(fileURLToPath(import.meta.url))): string {
  for (let dir = start; ; dir = dirname(dir)) {
    const candidate = join(dir, "package.json");
    if (existsSync(candidate)) {
      const pkg: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    }
    if (dirname(dir) === dir) return "0.0.0";
  }
}

function printHelp(io: SessionIO, tools: readonly ToolDef[]): void {
  const out = (line = "") => io.stdout.write(line + "\n");
  out(bold(t("cli_title")));
  out("");
  out(t("cli_usage"));
  out(`  ${cyan("toolbelt shell [-c CMD | FILE [ARGS...]]")}  ${t("cli_shell")}`);
  out(`  ${cyan("toolbelt <tool> [ARGS...]")}                ${t("cli_tool")}`);
  out(`  ${cyan("toolbelt --help")}                          ${t("cli_help")}`);
  out(`  ${cyan("toolbelt --version")}                       ${t("cli_version")}`);
  out("");
  out(t("cli_tools"));
  const width = Math.max(...tools.map((tool) => tool.name.length));
  for (const tool of tools) {
    out(`  ${cyan(tool.name.padEnd(width))}  ${dim(tool.description)}`);
  }
}

async function runTool(
  tool: ToolDef,
  args: string[],
  io: SessionIO,
  options: ShellOptions
): Promise<number> {
  const state = new ShellState({ cwd: options.cwd, env: options.env });
  const dispatcher = new ExecDispatcher(
    new BuiltinRegistry([[tool.name, tool.run]]),
    new ProcessExecutor({ spawner: options.spawner })
  );
  const signal = await dispatcher.dispatch({ ...io, state, env: state.environ() }, [tool.name, ...args]);
  switch (signal.kind) {
    case "success":
      return 0;
    case "exit":
      return signal.status;
    case "failure":
      writeError(io.stderr, describeFailure(signal));
      return 1;
  }
}

/**
 * `invokedAs` is the basename the program was started under; a tool name or
 * `tbsh` selects that command directly.
 */
export async function main(
  invokedAs: string,
  args: string[],
  options: ShellOptions = {}
): Promise<number> {
  const io = options.io ?? processIO();
  const env = options.env ?? process.env;

  let config: Config;
  try {
    config = options.config ?? loadConfig({ path: options.configPath, env });
  } catch (err) {
    writeError(io.stderr, errorMessage(err));
    return 1;
  }
  setLang(config.lang);

  const shellOptions: ShellOptions = { ...options, io, config, env };
  const tools = createTools({ config, configPath: options.configPath, fetch: options.fetch });
  const findTool = (name: string) => tools.find((tool) => tool.name === name);

  const linked = findTool(invokedAs);
  if (linked) return runTool(linked, args, io, shellOptions);
  if (invokedAs === SHELL_LINK) return runShell(args, shellOptions);

  const [command, ...rest] = args;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    printHelp(io, tools);
    return 0;
  }
  if (command === "--version" || command === "-v") {
    io.stdout.write(findVersion() + "\n");
    return 0;
  }
  if (command === "shell") return runShell(rest, shellOptions);

  const tool = findTool(command);
  if (tool) return runTool(tool, rest, io, shellOptions);

  writeError(io.stderr, `Unknown command: ${command}`);
  return 1;
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  const invokedAs = basename(process.argv[1]).replace(/\.[cm]?[jt]s$/, "");
  main(invokedAs, process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err) => {
      writeError(process.stderr, `Fatal: ${errorMessage(err)}`);
      process.exit(1);
    }
  );
}
