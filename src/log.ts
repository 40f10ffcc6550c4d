import { appendFileSync } from "node:fs";

const debugEnabled = !!process.env.TOOLBELT_DEBUG;
const logFile = process.env.TOOLBELT_LOG_FILE;

export function debug(message: string, data?: unknown): void {
  if (!debugEnabled) return;
  const line = `[toolbelt] ${new Date().toISOString()} ${message}${data !== undefined ? " " + JSON.stringify(data) : ""}`;
  process.stderr.write(line + "\n");
  if (logFile) {
    appendFileSync(logFile, line + "\n");
  }
}
