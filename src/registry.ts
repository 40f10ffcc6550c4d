import type { BuiltinHandler } from "./types.js";

/**
 * Immutable name → handler table, built once at startup and passed to the
 * dispatcher. There is no registration after construction.
 */
export class BuiltinRegistry {
  private readonly handlers: ReadonlyMap<string, BuiltinHandler>;

  constructor(entries: Iterable<readonly [string, BuiltinHandler]>) {
    const handlers = new Map<string, BuiltinHandler>();
    for (const [name, handler] of entries) {
      if (!name) throw new Error("builtin name must not be empty");
      if (handlers.has(name)) throw new Error(`builtin registered twice: ${name}`);
      handlers.set(name, handler);
    }
    this.handlers = handlers;
  }

  lookup(name: string): BuiltinHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  names(): string[] {
    return [...this.handlers.keys()].sort();
  }
}
