// ── Session frontend: pick an input mode, map the result to an exit code ──

import { bold, dim, writeError } from "./ansi.js";
import { createRegistry } from "./builtins/index.js";
import { loadConfig, type Config } from "./config.js";
import { ExecDispatcher } from "./dispatcher.js";
import { ParseError, errorMessage } from "./errors.js";
import { setLang, t } from "./i18n.js";
import { Interpreter } from "./interpreter.js";
import { processIO } from "./io.js";
import { describeFailure, isReported } from "./lang/runner.js";
import { debug } from "./log.js";
import { ProcessExecutor, type Spawner } from "./process.js";
import type { BuiltinRegistry } from "./registry.js";
import { ShellState } from "./state.js";
import type { FetchLike } from "./tools/togchat.js";
import type { ExitSignal, SessionIO, SessionMode } from "./types.js";

export interface ShellOptions {
  io?: SessionIO;
  config?: Config;
  configPath?: string;
  // Replaces the default builtins and tools
  registry?: BuiltinRegistry;
  spawner?: Spawner;
  fetch?: FetchLike;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/** `-c` selects a command string only as `["-c", source]`; any other argument list names a script file. */
export function selectMode(args: readonly string[], isTTY: boolean): SessionMode {
  if (args.length === 0) return isTTY ? "interactive" : "piped-script";
  if (args.length === 2 && args[0] === "-c") return "command-string";
  return "file-script";
}

function printWelcome(io: SessionIO): void {
  io.stdout.write(bold("toolbelt") + dim(t("welcome_subtitle")) + "\n");
  io.stdout.write(dim(t("welcome_hint")) + "\n\n");
}

function runMode(
  interpreter: Interpreter,
  mode: SessionMode,
  args: readonly string[]
): Promise<ExitSignal> {
  switch (mode) {
    case "interactive":
      return interpreter.runInteractive();
    case "piped-script":
      return interpreter.runPiped();
    case "command-string": {
      const [, source = ""] = args;
      return interpreter.runCommand(source);
    }
    case "file-script": {
      const [path, ...positional] = args;
      return interpreter.runFile(path, positional);
    }
  }
}

/**
 * Run one shell session and resolve to its exit code. Nothing here calls
 * process.exit; the caller does once the session has released its streams.
 */
export async function runShell(args: string[], options: ShellOptions = {}): Promise<number> {
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

  const registry =
    options.registry ??
    createRegistry({ config, configPath: options.configPath, fetch: options.fetch });
  const executor = new ProcessExecutor({
    maxOutputBytes: config.maxOutputBytes,
    spawner: options.spawner,
  });
  const interpreter = new Interpreter({
    io,
    dispatcher: new ExecDispatcher(registry, executor),
    state: new ShellState({ cwd: options.cwd, env }),
    settings: config,
  });

  const mode = selectMode(args, io.isTTY);
  debug("session", { mode, args });

  let signal: ExitSignal;
  try {
    if (mode === "interactive") printWelcome(io);
    signal = await runMode(interpreter, mode, args);
  } catch (err) {
    writeError(io.stderr, err instanceof ParseError ? `parse error: ${err.message}` : errorMessage(err));
    return 1;
  }

  switch (signal.kind) {
    case "exit":
      return signal.status;
    case "success":
      if (mode === "interactive") io.stdout.write(dim(`\n${t("goodbye")}\n`));
      return 0;
    case "failure":
      if (!isReported(signal)) writeError(io.stderr, describeFailure(signal));
      return 1;
  }
}

