/**
 * Binding environment for one evaluation unit: a chain of lexical scopes for
 * `let`, a table of persistent scope items for `def`, the sources seen so far
 * and an optional stack journal.
 */
import type { Expr } from "./expr.js";
import { Journal } from "./journal.js";
import type { Source } from "./source.js";

/** One lexical scope. Lookups walk outward through `parent`. */
export class Scope {
  private readonly bindings = new Map<string, Expr>();

  constructor(readonly parent: Scope | null = null) {}

  child(): Scope {
    return new Scope(this);
  }

  define(name: string, value: Expr): void {
    this.bindings.set(name, value);
  }

  lookup(name: string): Expr | undefined {
    return this.bindings.get(name) ?? this.parent?.lookup(name);
  }

  /** Rebinds `name` in the nearest scope that has it. */
  assign(name: string, value: Expr): boolean {
    if (this.bindings.has(name)) {
      this.bindings.set(name, value);
      return true;
    }
    return this.parent?.assign(name, value) ?? false;
  }

  names(): string[] {
    return [...this.bindings.keys()];
  }
}

/**
 * A persistent binding cell. Readers such as `scope:dump` hold the cell, not
 * the value, so later `set`s are visible to them.
 */
export class ScopeItem {
  constructor(private value: Expr | undefined) {}

  val(): Expr | undefined {
    return this.value;
  }

  set(value: Expr): void {
    this.value = value;
  }
}

export class Context {
  /** Innermost lexical scope. */
  scope: Scope;
  readonly root: Scope;
  private readonly items = new Map<string, ScopeItem>();
  private readonly sourceMap = new Map<string, Source>();
  private journalBuffer: Journal | null = null;

  constructor() {
    this.root = new Scope();
    this.scope = this.root;
  }

  withJournal(maxLen: number | null): this {
    this.journalBuffer = maxLen === null ? null : new Journal(maxLen);
    return this;
  }

  get journal(): Journal | null {
    return this.journalBuffer;
  }

  // --- let ---

  letGet(name: string): Expr | undefined {
    return this.scope.lookup(name);
  }

  letSet(name: string, value: Expr): void {
    this.scope.define(name, value);
  }

  /** Makes `scope` the innermost scope and returns the one it replaced. */
  enterScope(scope: Scope): Scope {
    const previous = this.scope;
    this.scope = scope;
    return previous;
  }

  restoreScope(scope: Scope): void {
    this.scope = scope;
  }

  // --- def ---

  scopeItem(name: string): ScopeItem | undefined {
    return this.items.get(name);
  }

  defScopeItem(name: string, value: Expr): void {
    const item = this.items.get(name);
    if (item) {
      item.set(value);
    } else {
      this.items.set(name, new ScopeItem(value));
    }
  }

  scopeItems(): IterableIterator<[string, ScopeItem]> {
    return this.items.entries();
  }

  // --- sources ---

  addSource(source: Source): void {
    this.sourceMap.set(source.name, source);
  }

  sources(): IterableIterator<[string, Source]> {
    return this.sourceMap.entries();
  }
}
