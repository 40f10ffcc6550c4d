import { EventEmitter } from "node:events";
import { PassThrough, Writable } from "node:stream";
import type { ChildHandle, Spawner } from "../src/process.js";
import { ShellState } from "../src/state.js";
import type { CommandContext, SessionIO } from "../src/types.js";

// Writable that keeps everything written to it
export class Capture extends Writable {
  private chunks: string[] = [];

  override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join("");
  }
}

export interface TestIO extends SessionIO {
  stdin: PassThrough;
  stdout: Capture;
  stderr: Capture;
}

export function makeIO(options: { input?: string; isTTY?: boolean } = {}): TestIO {
  const stdin = new PassThrough();
  if (options.input !== undefined) stdin.end(options.input);
  return {
    stdin,
    stdout: new Capture(),
    stderr: new Capture(),
    isTTY: options.isTTY ?? false,
  };
}

export function makeContext(
  io: TestIO = makeIO(),
  state: ShellState = new ShellState({ env: { HOME: "/home/tester" } })
): CommandContext {
  return { ...io, state, env: state.environ() };
}

// Stand-in for a child process; output and exit are scripted by the test
export class FakeChild extends EventEmitter implements ChildHandle {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  killedWith: NodeJS.Signals | number | undefined;

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killedWith = signal;
    setImmediate(() => this.emit("close", null, signal ?? "SIGTERM"));
    return true;
  }

  respond(result: { stdout?: string[]; stderr?: string; code?: number | null; signal?: NodeJS.Signals }): this {
    setImmediate(() => {
      for (const chunk of result.stdout ?? []) this.stdout.write(chunk);
      if (result.stderr) this.stderr.write(result.stderr);
      setImmediate(() => this.emit("close", result.code ?? null, result.signal ?? null));
    });
    return this;
  }

  fail(code: string, message: string): this {
    setImmediate(() => this.emit("error", Object.assign(new Error(message), { code })));
    return this;
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  cwd: unknown;
  stdio: unknown;
}

export function fakeSpawner(make: (command: string, args: readonly string[]) => FakeChild): {
  spawner: Spawner;
  calls: SpawnCall[];
} {
  const calls: SpawnCall[] = [];
  const spawner: Spawner = (command, args, options) => {
    calls.push({ command, args, cwd: options.cwd, stdio: options.stdio });
    return make(command, args);
  };
  return { spawner, calls };
}

export const tick = () => new Promise<void>((resolve) => setImmediate(resolve));
