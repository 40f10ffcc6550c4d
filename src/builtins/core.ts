// ── Shell builtins: commands that act on the session itself ──

import { bold, cyan, dim, writeError } from "../ansi.js";
import { BuiltinError, ShellExit } from "../errors.js";
import { t } from "../i18n.js";
import { isValidName } from "../state.js";
import type { BuiltinHandler, CommandContext, ToolDef } from "../types.js";

const exit: BuiltinHandler = (ctx, args) => {
  if (args.length > 1) throw new BuiltinError("too many arguments");
  const [arg] = args;
  if (arg === undefined) throw new ShellExit(ctx.state.lastStatus);
  if (!/^[0-9]+$/.test(arg)) {
    writeError(ctx.stderr, `exit: ${arg}: numeric argument required`);
    throw new ShellExit(2);
  }
  throw new ShellExit(Number(arg) % 256);
};

const succeed: BuiltinHandler = () => {};

const fail: BuiltinHandler = () => {
  throw new BuiltinError("");
};

const echo: BuiltinHandler = (ctx, args) => {
  const newline = args[0] !== "-n";
  const words = newline ? args : args.slice(1);
  ctx.stdout.write(words.join(" ") + (newline ? "\n" : ""));
};

const cd: BuiltinHandler = (ctx, args) => {
  if (args.length > 1) throw new BuiltinError("too many arguments");
  const [target = ""] = args;
  ctx.state.chdir(target);
  if (target === "-") ctx.stdout.write(ctx.state.cwd + "\n");
};

const pwd: BuiltinHandler = (ctx) => {
  ctx.stdout.write(ctx.state.cwd + "\n");
};

const exportVars: BuiltinHandler = (ctx, args) => {
  if (args.length === 0) {
    const env = ctx.state.environ();
    for (const name of Object.keys(env).sort()) {
      ctx.stdout.write(`export ${name}=${JSON.stringify(env[name])}\n`);
    }
    return;
  }
  for (const arg of args) {
    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!isValidName(name)) throw new BuiltinError(`${arg}: not a valid identifier`);
    ctx.state.export(name, eq === -1 ? undefined : arg.slice(eq + 1));
  }
};

const unset: BuiltinHandler = (ctx, args) => {
  for (const name of args) {
    if (!isValidName(name)) throw new BuiltinError(`${name}: not a valid identifier`);
    ctx.state.unset(name);
  }
};

export const CORE_BUILTIN_NAMES = [
  ":", "cd", "echo", "exit", "export", "false", "help", "pwd", "true", "unset",
] as const;

function printHelp(ctx: CommandContext, tools: readonly ToolDef[]): void {
  const out = (line = "") => ctx.stdout.write(line + "\n");
  out(bold(t("help_header")));
  out("");
  out(t("help_builtins_section"));
  out(`  ${CORE_BUILTIN_NAMES.map((name) => cyan(name)).join(" ")}`);
  out("");
  out(t("help_tools_section"));
  const width = Math.max(...tools.map((tool) => tool.name.length));
  for (const tool of tools) {
    out(`  ${cyan(tool.name.padEnd(width))}  ${tool.description}`);
  }
  out("");
  out(dim(t("help_external_hint")));
}

export function coreBuiltins(
  tools: readonly ToolDef[]
): Array<readonly [string, BuiltinHandler]> {
  return [
    [":", succeed],
    ["cd", cd],
    ["echo", echo],
    ["exit", exit],
    ["export", exportVars],
    ["false", fail],
    ["help", (ctx) => printHelp(ctx, tools)],
    ["pwd", pwd],
    ["true", succeed],
    ["unset", unset],
  ];
}
