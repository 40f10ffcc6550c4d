import type { Writable } from "node:stream";

// ── ANSI colors ──
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
export const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;

export function writeError(out: Writable, message: string): void {
  out.write(`${red("✗")} ${message}\n`);
}
