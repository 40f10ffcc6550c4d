import { statSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { BuiltinError } from "./errors.js";

const NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidName(name: string): boolean {
  return NAME_RE.test(name);
}

/**
 * Mutable state of one shell session: working directory, variables and
 * the status of the last command ($?).
 */
export class ShellState {
  cwd: string;
  lastStatus = 0;
  // Positional parameters ($1..$n); $0 is the script name
  scriptName: string;
  positional: string[];
  private vars = new Map<string, string>();
  private exported = new Set<string>();

  constructor(options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    scriptName?: string;
    positional?: string[];
  } = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.scriptName = options.scriptName ?? "toolbelt";
    this.positional = options.positional ?? [];
    for (const [name, value] of Object.entries(options.env ?? process.env)) {
      if (value !== undefined && isValidName(name)) {
        this.vars.set(name, value);
        this.exported.add(name);
      }
    }
    this.vars.set("PWD", this.cwd);
    this.exported.add("PWD");
  }

  get(name: string): string | undefined {
    return this.vars.get(name);
  }

  set(name: string, value: string): void {
    this.vars.set(name, value);
  }

  export(name: string, value?: string): void {
    if (value !== undefined) this.vars.set(name, value);
    this.exported.add(name);
  }

  unset(name: string): void {
    this.vars.delete(name);
    this.exported.delete(name);
  }

  environ(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const name of this.exported) {
      const value = this.vars.get(name);
      if (value !== undefined) env[name] = value;
    }
    return env;
  }

  home(): string {
    return this.vars.get("HOME") ?? homedir();
  }

  chdir(target: string): void {
    let dir = target;
    if (dir === "" || dir === "~") {
      dir = this.home();
    } else if (dir.startsWith("~/")) {
      dir = join(this.home(), dir.slice(2));
    } else if (dir === "-") {
      const previous = this.vars.get("OLDPWD");
      if (!previous) throw new BuiltinError("OLDPWD not set");
      dir = previous;
    }

    const resolved = resolve(this.cwd, dir);
    let isDir: boolean;
    try {
      isDir = statSync(resolved).isDirectory();
    } catch {
      throw new BuiltinError(`no such directory: ${target}`);
    }
    if (!isDir) throw new BuiltinError(`not a directory: ${target}`);

    this.export("OLDPWD", this.cwd);
    this.cwd = resolved;
    this.export("PWD", resolved);
  }
}
