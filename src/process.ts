// ── External command execution ──

import { spawn, type SpawnOptions } from "node:child_process";
import { constants } from "node:os";
import type { Readable, Writable } from "node:stream";
import { errorMessage } from "./errors.js";
import { debug } from "./log.js";
import {
  DEFAULT_MAX_OUTPUT_BYTES,
  SUCCESS,
  exitStatusFailure,
  failure,
  type CommandContext,
  type ExitSignal,
} from "./types.js";

// The slice of ChildProcess the executor relies on
export interface ChildHandle {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
}

export type Spawner = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildHandle;

const defaultSpawner: Spawner = (command, args, options) =>
  spawn(command, args, options);

function signalNumber(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(constants.signals)) {
    if (name === signal && typeof value === "number") return value;
  }
  return 0;
}

export class ProcessExecutor {
  readonly maxOutputBytes: number;
  private readonly spawner: Spawner;

  constructor(options: { maxOutputBytes?: number; spawner?: Spawner } = {}) {
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.spawner = options.spawner ?? defaultSpawner;
  }

  /**
   * Run argv[0] as an OS process. Output is forwarded to the session streams
   * as it arrives; past `maxOutputBytes` the child is killed and the result is
   * an `output-limit` failure.
   */
  execute(ctx: CommandContext, argv: readonly string[]): Promise<ExitSignal> {
    const [name, ...args] = argv;
    if (name === undefined) return Promise.resolve(SUCCESS);

    return new Promise((resolveCmd) => {
      let settled = false;
      const settle = (signal: ExitSignal) => {
        if (settled) return;
        settled = true;
        resolveCmd(signal);
      };

      let child: ChildHandle;
      try {
        child = this.spawner(name, args, {
          cwd: ctx.state.cwd,
          env: ctx.env,
          // Interactive children (password prompts, pagers) need the real terminal
          stdio: [ctx.stdin === process.stdin ? "inherit" : "ignore", "pipe", "pipe"],
        });
      } catch (err) {
        settle(this.spawnFailure(name, err));
        return;
      }
      debug("spawn", { name, args, cwd: ctx.state.cwd });

      let written = 0;
      let limited = false;
      const forward = (target: Writable) => (data: Buffer) => {
        if (limited) return;
        written += data.length;
        if (written > this.maxOutputBytes) {
          limited = true;
          child.kill("SIGKILL");
          return;
        }
        target.write(data);
      };

      child.stdout?.on("data", forward(ctx.stdout));
      child.stderr?.on("data", forward(ctx.stderr));

      child.on("error", (err) => settle(this.spawnFailure(name, err)));

      child.on("close", (code, signal) => {
        debug("exit", { name, code, signal, written });
        if (limited) {
          settle(failure("output-limit", 1, `${name}: output exceeded ${this.maxOutputBytes} bytes`));
        } else if (signal) {
          settle(exitStatusFailure(128 + signalNumber(signal)));
        } else if (code === null || code === 0) {
          settle(SUCCESS);
        } else {
          settle(exitStatusFailure(code));
        }
      });
    });
  }

  private spawnFailure(name: string, err: unknown): ExitSignal {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      return failure("not-found", 127, `${name}: command not found`);
    }
    if (code === "EACCES") {
      return failure("not-executable", 126, `${name}: permission denied`);
    }
    return failure("spawn", 1, `${name}: ${errorMessage(err)}`);
  }
}
