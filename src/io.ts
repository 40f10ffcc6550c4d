import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { Readable } from "node:stream";
import type { CommandContext, SessionIO } from "./types.js";

// ── Read a whole stream (piped stdin) ──
export function readAll(stream: Readable): Promise<string> {
  return new Promise((resolveRead, reject) => {
    let data = "";
    stream.setEncoding("utf-8");
    stream.on("data", (chunk: string) => {
      data += chunk;
    });
    stream.on("end", () => resolveRead(data));
    stream.on("error", reject);
    stream.resume();
  });
}

// A tool's input: the named files relative to the shell's cwd, else stdin
export async function readInputs(ctx: CommandContext, files: string[]): Promise<string[]> {
  if (files.length === 0) return [await readAll(ctx.stdin)];
  return Promise.all(files.map((file) => readFile(resolve(ctx.state.cwd, file), "utf-8")));
}

export function processIO(): SessionIO {
  return {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    isTTY: process.stdin.isTTY === true,
  };
}
