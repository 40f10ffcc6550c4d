export enum ErrorCode {
  CONFIG_INVALID = "CONFIG_INVALID",
  SCRIPT_UNREADABLE = "SCRIPT_UNREADABLE",
  INPUT_UNREADABLE = "INPUT_UNREADABLE",
}

export class ToolbeltError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "ToolbeltError";
    this.code = code;
    this.context = context;
  }
}

// `incomplete` means the source is a valid prefix of a longer construct
export class ParseError extends Error {
  readonly incomplete: boolean;
  readonly line: number;

  constructor(message: string, line: number, incomplete = false) {
    super(`line ${line}: ${message}`);
    this.name = "ParseError";
    this.line = line;
    this.incomplete = incomplete;
  }
}

// Ordinary builtin failure; the session keeps going
export class BuiltinError extends Error {
  readonly status: number;

  constructor(message: string, status = 1) {
    super(message);
    this.name = "BuiltinError";
    this.status = status;
  }
}

// Explicit request to end the whole session with `status`
export class ShellExit extends Error {
  readonly status: number;

  constructor(status: number) {
    super(`exit ${status}`);
    this.name = "ShellExit";
    this.status = status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
