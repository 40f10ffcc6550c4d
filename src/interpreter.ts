import * as readline from "node:readline";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { writeError } from "./ansi.js";
import type { Config } from "./config.js";
import type { ExecDispatcher } from "./dispatcher.js";
import { ErrorCode, ParseError, ToolbeltError, errorMessage } from "./errors.js";
import { readAll } from "./io.js";
import type { Program } from "./lang/ast.js";
import { parse } from "./lang/parser.js";
import { Runner, describeFailure, isReported } from "./lang/runner.js";
import type { ShellState } from "./state.js";
import { SUCCESS, type ExitSignal, type SessionIO } from "./types.js";

export type InterpreterSettings = Pick<
  Config,
  "prompt" | "continuationPrompt" | "maxPendingSource" | "maxLoopIterations"
>;

export interface InterpreterOptions {
  io: SessionIO;
  dispatcher: Pick<ExecDispatcher, "dispatch">;
  state: ShellState;
  settings: InterpreterSettings;
}

/**
 * Acquires source text in one of four ways and runs it. Interactive mode
 * keeps an incomplete buffer across lines; the other modes treat any parse
 * error as fatal and throw it.
 */
export class Interpreter {
  private readonly io: SessionIO;
  private readonly runner: Runner;
  private readonly settings: InterpreterSettings;

  constructor(options: InterpreterOptions) {
    this.io = options.io;
    this.settings = options.settings;
    this.runner = new Runner({
      dispatcher: options.dispatcher,
      state: options.state,
      streams: options.io,
      maxLoopIterations: options.settings.maxLoopIterations,
    });
  }

  get state(): ShellState {
    return this.runner.state;
  }

  run(program: Program): Promise<ExitSignal> {
    return this.runner.run(program);
  }

  // ── Interactive (REPL with continuation lines) ──
  async runInteractive(): Promise<ExitSignal> {
    const { stderr } = this.io;
    const { prompt, continuationPrompt, maxPendingSource } = this.settings;
    const lines = new LineSource(this.io);

    let buffer = "";
    let promptText = prompt;
    for (;;) {
      const line = await lines.next(promptText);
      if (line === undefined) return SUCCESS;
      buffer += line + "\n";
      promptText = prompt;

      let program: Program;
      try {
        program = parse(buffer);
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        if (err.incomplete && Buffer.byteLength(buffer) <= maxPendingSource) {
          promptText = continuationPrompt;
          continue;
        }
        writeError(
          stderr,
          err.incomplete
            ? `parse error: input exceeds ${maxPendingSource} bytes without completing`
            : `parse error: ${err.message}`
        );
        buffer = "";
        continue;
      }

      buffer = "";
      const signal = await this.run(program);
      if (signal.kind === "exit") return signal;
      if (signal.kind === "failure" && !isReported(signal)) {
        writeError(stderr, describeFailure(signal));
      }
    }
  }

  // ── Piped stdin: the whole input is one script ──
  async runPiped(): Promise<ExitSignal> {
    let source: string;
    try {
      source = await readAll(this.io.stdin);
    } catch (err) {
      throw new ToolbeltError(ErrorCode.INPUT_UNREADABLE, `reading piped input: ${errorMessage(err)}`);
    }
    if (source.length === 0) return SUCCESS;
    return this.run(parse(source));
  }

  // ── -c "command string" ──
  runCommand(source: string): Promise<ExitSignal> {
    return this.run(parse(source));
  }

  // ── Script file ──
  async runFile(path: string, args: string[] = []): Promise<ExitSignal> {
    let source: string;
    try {
      source = await readFile(resolve(this.state.cwd, path), "utf-8");
    } catch (err) {
      throw new ToolbeltError(ErrorCode.SCRIPT_UNREADABLE, `cannot open ${path}: ${errorMessage(err)}`, { path });
    }
    this.state.scriptName = path;
    this.state.positional = args;
    return this.run(parse(source));
  }
}

/**
 * Hands out the session's input one line at a time. A readline interface is
 * attached to stdin only while a line is awaited, so a command that reads
 * stdin gets everything typed while it runs. Lines that arrived in the same
 * chunk as the awaited one are kept for the following calls.
 */
class LineSource {
  private readonly queued: string[] = [];
  private ended = false;

  constructor(private readonly io: SessionIO) {}

  async next(promptText: string): Promise<string | undefined> {
    const queued = this.queued.shift();
    if (queued !== undefined) {
      this.io.stdout.write(promptText);
      return queued;
    }
    if (this.ended || this.io.stdin.readableEnded) {
      this.io.stdout.write(promptText);
      return undefined;
    }

    const rl = readline.createInterface({
      input: this.io.stdin,
      output: this.io.stdout,
      prompt: promptText,
      terminal: this.io.isTTY,
    });
    try {
      return await new Promise<string | undefined>((resolveLine) => {
        let settled = false;
        rl.on("line", (line) => {
          if (settled) {
            this.queued.push(line);
            return;
          }
          settled = true;
          resolveLine(line);
        });
        rl.on("close", () => {
          if (settled) return;
          settled = true;
          this.ended = true;
          resolveLine(undefined);
        });
        rl.prompt();
      });
    } finally {
      rl.close();
    }
  }
}
