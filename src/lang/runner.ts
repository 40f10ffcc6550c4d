import { writeError } from "../ansi.js";
import type { ExecDispatcher } from "../dispatcher.js";
import { ShellExit } from "../errors.js";
import type { ShellState } from "../state.js";
import {
  DEFAULT_MAX_LOOP_ITERATIONS,
  SUCCESS,
  exitStatusFailure,
  failure,
  statusOf,
  type CommandContext,
  type ExitSignal,
  type Failure,
  type Outcome,
  type SessionStreams,
} from "../types.js";
import type {
  Command,
  ForCommand,
  IfCommand,
  LoopCommand,
  LoopControlCommand,
  Pipeline,
  Program,
  SimpleCommand,
  Statement,
  Word,
} from "./ast.js";

// Unwinds the stack to the enclosing loop(s)
class LoopJump extends Error {
  constructor(readonly type: "break" | "continue", public depth: number) {
    super(type);
    this.name = "LoopJump";
  }
}

const BLANKS = /[ \t\n]+/;

/**
 * Failures the runner prints as they happen. A plain non-zero exit (or a
 * builtin that failed without a message) is left for the caller to report.
 */
export function isReported(signal: Failure): boolean {
  return signal.reason !== "exit-status" && signal.message !== "";
}

export function describeFailure(signal: Failure): string {
  return signal.message || `exit status ${signal.status}`;
}

export interface RunnerOptions {
  dispatcher: Pick<ExecDispatcher, "dispatch">;
  state: ShellState;
  streams: SessionStreams;
  maxLoopIterations?: number;
}

/**
 * Executes a parsed Program, sending every command through the dispatcher in
 * program order.
 */
export class Runner {
  readonly state: ShellState;
  private readonly dispatcher: Pick<ExecDispatcher, "dispatch">;
  private readonly streams: SessionStreams;
  private readonly maxLoopIterations: number;
  private loopDepth = 0;

  constructor(options: RunnerOptions) {
    this.dispatcher = options.dispatcher;
    this.state = options.state;
    this.streams = options.streams;
    this.maxLoopIterations = options.maxLoopIterations ?? DEFAULT_MAX_LOOP_ITERATIONS;
  }

  async run(program: Program): Promise<ExitSignal> {
    this.loopDepth = 0;
    try {
      return await this.execList(program.body);
    } catch (err) {
      if (err instanceof ShellExit) return { kind: "exit", status: err.status };
      throw err;
    }
  }

  private async execList(statements: Statement[]): Promise<Outcome> {
    let result: Outcome = SUCCESS;
    for (const statement of statements) {
      result = await this.execStatement(statement);
    }
    return result;
  }

  private async execStatement(statement: Statement): Promise<Outcome> {
    let result = await this.execPipeline(statement.first);
    for (const { op, pipeline } of statement.rest) {
      const ok = result.kind === "success";
      if ((op === "&&" && !ok) || (op === "||" && ok)) continue;
      result = await this.execPipeline(pipeline);
    }
    return result;
  }

  private async execPipeline(pipeline: Pipeline): Promise<Outcome> {
    let result = await this.execCommand(pipeline.command);
    if (pipeline.negated) {
      result = result.kind === "success" ? exitStatusFailure(1) : SUCCESS;
    }
    this.state.lastStatus = statusOf(result);
    return result;
  }

  private execCommand(command: Command): Promise<Outcome> {
    switch (command.type) {
      case "simple": return this.execSimple(command);
      case "if": return this.execIf(command);
      case "while":
      case "until": return this.execLoop(command);
      case "for": return this.execFor(command);
      case "group": return this.execList(command.body);
      case "break":
      case "continue": return this.execLoopControl(command);
    }
  }

  private async execSimple(command: SimpleCommand): Promise<Outcome> {
    const argv = command.words.flatMap((word) => this.expandWord(word));
    const assigned: Record<string, string> = {};
    for (const { name, value } of command.assignments) {
      assigned[name] = this.expandString(value);
    }

    if (argv.length === 0) {
      for (const [name, value] of Object.entries(assigned)) this.state.set(name, value);
    }

    const ctx: CommandContext = {
      ...this.streams,
      state: this.state,
      env: argv.length > 0 ? { ...this.state.environ(), ...assigned } : this.state.environ(),
    };
    const signal = await this.dispatcher.dispatch(ctx, argv);
    if (signal.kind === "exit") throw new ShellExit(signal.status);
    if (signal.kind === "failure") this.report(signal);
    return signal;
  }

  private async execIf(command: IfCommand): Promise<Outcome> {
    for (const branch of command.branches) {
      const condition = await this.execList(branch.condition);
      if (condition.kind === "success") return this.execList(branch.body);
    }
    return command.elseBody ? this.execList(command.elseBody) : SUCCESS;
  }

  private async execLoop(command: LoopCommand): Promise<Outcome> {
    let result: Outcome = SUCCESS;
    let iterations = 0;
    this.loopDepth++;
    try {
      for (;;) {
        if (++iterations > this.maxLoopIterations) {
          return this.report(
            failure("runtime", 1, `${command.type}: loop iteration limit exceeded (${this.maxLoopIterations})`)
          );
        }
        const condition = await this.iterate(command.condition);
        if (condition === "break") return SUCCESS;
        if (condition === "continue") continue;
        if ((condition.kind === "success") !== (command.type === "while")) break;

        const step = await this.iterate(command.body);
        if (step === "break") return SUCCESS;
        if (step !== "continue") result = step;
      }
    } finally {
      this.loopDepth--;
    }
    return result;
  }

  private async execFor(command: ForCommand): Promise<Outcome> {
    const items = command.items
      ? command.items.flatMap((word) => this.expandWord(word))
      : [...this.state.positional];

    let result: Outcome = SUCCESS;
    this.loopDepth++;
    try {
      for (const item of items) {
        this.state.set(command.variable, item);
        const step = await this.iterate(command.body);
        if (step === "break") return SUCCESS;
        if (step !== "continue") result = step;
      }
    } finally {
      this.loopDepth--;
    }
    return result;
  }

  // One pass over a loop body; a jump aimed at an outer loop is re-thrown
  private async iterate(body: Statement[]): Promise<Outcome | "break" | "continue"> {
    try {
      return await this.execList(body);
    } catch (err) {
      if (!(err instanceof LoopJump)) throw err;
      if (err.depth > 1) {
        err.depth--;
        throw err;
      }
      return err.type;
    }
  }

  private async execLoopControl(command: LoopControlCommand): Promise<Outcome> {
    let depth = 1;
    if (command.depth) {
      const arg = this.expandString(command.depth);
      if (!/^[0-9]+$/.test(arg) || Number(arg) < 1) {
        return this.report(failure("runtime", 1, `${command.type}: ${arg}: loop count out of range`));
      }
      depth = Number(arg);
    }
    if (this.loopDepth === 0) {
      return this.report(failure("runtime", 1, `${command.type}: only meaningful in a loop`));
    }
    throw new LoopJump(command.type, Math.min(depth, this.loopDepth));
  }

  private report(signal: Failure): Failure {
    if (isReported(signal)) writeError(this.streams.stderr, signal.message);
    return signal;
  }

  // ── Expansion ──

  private paramValues(name: string): string[] {
    const { state } = this;
    switch (name) {
      case "@": return state.positional;
      case "?": return [String(state.lastStatus)];
      case "$": return [String(process.pid)];
      case "#": return [String(state.positional.length)];
      case "0": return [state.scriptName];
    }
    if (/^[0-9]+$/.test(name)) return [state.positional[Number(name) - 1] ?? ""];
    return [state.get(name) ?? ""];
  }

  private expandString(word: Word): string {
    return word.parts
      .map((part) => (part.type === "text" ? part.value : this.paramValues(part.name).join(" ")))
      .join("");
  }

  expandWord(word: Word): string[] {
    const fields: string[] = [];
    let current = "";
    let hasField = false;

    for (const [index, part] of word.parts.entries()) {
      if (part.type === "text") {
        let value = part.value;
        if (index === 0 && !part.quoted && (value === "~" || value.startsWith("~/"))) {
          value = this.state.home() + value.slice(1);
        }
        current += value;
        if (part.quoted || value !== "") hasField = true;
        continue;
      }

      const values = this.paramValues(part.name);
      if (part.quoted) {
        for (const [k, value] of values.entries()) {
          if (k > 0) {
            fields.push(current);
            current = "";
          }
          current += value;
          hasField = true;
        }
        continue;
      }

      const joined = values.join(" ");
      if (joined === "") continue;
      for (const [k, piece] of joined.split(BLANKS).entries()) {
        if (k > 0) {
          if (hasField) fields.push(current);
          current = "";
          hasField = false;
        }
        if (piece !== "") {
          current += piece;
          hasField = true;
        }
      }
    }

    if (hasField) fields.push(current);
    return fields;
  }
}
