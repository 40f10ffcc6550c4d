import { BuiltinError, ShellExit, errorMessage } from "./errors.js";
import { debug } from "./log.js";
import type { ProcessExecutor } from "./process.js";
import type { BuiltinRegistry } from "./registry.js";
import {
  SUCCESS,
  failure,
  type BuiltinHandler,
  type CommandContext,
  type ExitSignal,
  type ResolvedCommand,
} from "./types.js";

/**
 * The one place that decides between a builtin and an external program.
 * Registry names always win over executables on PATH.
 */
export class ExecDispatcher {
  constructor(
    private readonly registry: BuiltinRegistry,
    private readonly executor: Pick<ProcessExecutor, "execute">
  ) {}

  resolve(name: string): ResolvedCommand {
    const handler = this.registry.lookup(name);
    return handler
      ? { kind: "builtin", name, handler }
      : { kind: "external", name };
  }

  async dispatch(ctx: CommandContext, argv: readonly string[]): Promise<ExitSignal> {
    const [name, ...args] = argv;
    if (name === undefined) return SUCCESS;

    const command = this.resolve(name);
    debug("dispatch", { name, kind: command.kind });
    switch (command.kind) {
      case "builtin":
        return runBuiltin(command.name, command.handler, ctx, args);
      case "external":
        return this.executor.execute(ctx, argv);
    }
  }
}

async function runBuiltin(
  name: string,
  handler: BuiltinHandler,
  ctx: CommandContext,
  args: string[]
): Promise<ExitSignal> {
  try {
    await handler(ctx, args);
    return SUCCESS;
  } catch (err) {
    if (err instanceof ShellExit) {
      return { kind: "exit", status: err.status };
    }
    if (err instanceof BuiltinError) {
      return failure("builtin", err.status, err.message ? `${name}: ${err.message}` : "");
    }
    return failure("builtin", 1, `${name}: ${errorMessage(err)}`);
  }
}
