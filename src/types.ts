// ── Shared Types ──

import { homedir } from "node:os";
import type { Readable, Writable } from "node:stream";
import type { ShellState } from "./state.js";

export const CONFIG_DIR =
  process.env.TOOLBELT_CONFIG_DIR ||
  `${homedir()}/.config/toolbelt`;

export const CONFIG_PATH = `${CONFIG_DIR}/config.json`;

export const DEFAULT_MAX_OUTPUT_BYTES = 2 * 1024 * 1024;
export const DEFAULT_MAX_PENDING_SOURCE = 64 * 1024;
export const DEFAULT_MAX_LOOP_ITERATIONS = 100_000;

// ── Session ──

export const SESSION_MODES = [
  "interactive",
  "piped-script",
  "command-string",
  "file-script",
] as const;
export type SessionMode = typeof SESSION_MODES[number];

export interface SessionStreams {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

export interface SessionIO extends SessionStreams {
  // stdin is attached to a terminal
  isTTY: boolean;
}

// ── Exit signals ──

export type FailureReason =
  | "builtin"
  | "not-found"
  | "not-executable"
  | "exit-status"
  | "output-limit"
  | "spawn"
  | "runtime";

export type Failure = {
  kind: "failure";
  reason: FailureReason;
  status: number;
  message: string;
};

export type ExitSignal =
  | { kind: "success" }
  | Failure
  | { kind: "exit"; status: number };

export type Outcome = Exclude<ExitSignal, { kind: "exit" }>;

export const SUCCESS = { kind: "success" } as const satisfies ExitSignal;

export function failure(
  reason: FailureReason,
  status: number,
  message: string
): Failure {
  return { kind: "failure", reason, status, message };
}

export function exitStatusFailure(status: number): Failure {
  return failure("exit-status", status, `exit status ${status}`);
}

export function statusOf(signal: ExitSignal): number {
  return signal.kind === "success" ? 0 : signal.status;
}

// ── Commands ──

export interface CommandContext extends SessionStreams {
  readonly state: ShellState;
  // Environment for this one invocation: exported vars plus prefix assignments
  readonly env: Record<string, string>;
}

export type BuiltinHandler = (
  ctx: CommandContext,
  args: string[]
) => Promise<void> | void;

export interface ToolDef {
  name: string;
  description: string;
  run: BuiltinHandler;
}

export type ResolvedCommand =
  | { kind: "builtin"; name: string; handler: BuiltinHandler }
  | { kind: "external"; name: string };
