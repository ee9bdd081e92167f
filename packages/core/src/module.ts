/**
 * Module registry. A module is a named set of functions; the engine maps
 * module names to modules and resolves qualified `module:name` symbols.
 */
import type { Context } from "./context.js";
import type { Expr, Span } from "./expr.js";

/** What a library function sees of the running machine. */
export interface ModuleCall {
  readonly context: Context;
  readonly engine: Engine;
  readonly span?: Span;
  pop(): Expr;
  push(value: Expr): void;
}

export interface ModuleFn {
  name: string;
  execute(call: ModuleCall): void;
}

export class Module {
  private readonly table = new Map<string, ModuleFn>();

  constructor(readonly name: string) {}

  addFn(fn: ModuleFn): this {
    this.table.set(fn.name, fn);
    return this;
  }

  fn(name: string): ModuleFn | undefined {
    return this.table.get(name);
  }

  fnNames(): string[] {
    return [...this.table.keys()];
  }
}

/** Finds a module by the name given to `import`. */
export type ModuleLoader = (name: string) => Module | undefined;

/** Splits `module:rest` at the first colon. */
export function splitQualified(name: string): { module: string; rest: string } | null {
  const at = name.indexOf(":");
  if (at <= 0) return null;
  return { module: name.slice(0, at), rest: name.slice(at + 1) };
}

export class Engine {
  private readonly modules = new Map<string, Module>();

  constructor(private readonly loader?: ModuleLoader) {}

  addModule(module: Module): this {
    this.modules.set(module.name, module);
    return this;
  }

  module(name: string): Module | undefined {
    return this.modules.get(name);
  }

  moduleNames(): string[] {
    return [...this.modules.keys()];
  }

  /** Registers a module through the loader; already-registered modules are returned as-is. */
  load(name: string): Module | undefined {
    const existing = this.modules.get(name);
    if (existing) return existing;
    const loaded = this.loader?.(name);
    if (loaded) this.modules.set(loaded.name, loaded);
    return loaded;
  }

  /** Resolves a qualified name to a function of a registered module. */
  resolve(name: string): ModuleFn | undefined {
    const parts = splitQualified(name);
    if (!parts) return undefined;
    return this.modules.get(parts.module)?.fn(parts.rest);
  }
}
