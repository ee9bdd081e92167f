/**
 * Stack machine - steps through a compiled op stream one op at a time.
 *
 * Blocks and functions run in their own frames; the caller's frame is saved in
 * the register file and restored when the callee reaches its `End`. A failing
 * step leaves the value stack exactly as it was before that step.
 */
import type { Expr, SExpr, Span } from "./expr.js";
import {
  NIL,
  bool,
  exprEquals,
  isTruthy,
  prettyPrint,
  show,
  str,
  typeName,
} from "./expr.js";
import { Context, Scope } from "./context.js";
import { Engine, splitQualified, type ModuleFn } from "./module.js";
import { compile, compileBody, type Op } from "./compiler.js";
import { intrinsicFromName, intrinsicSpelling, type Intrinsic } from "./intrinsics.js";
import { VMError } from "./errors.js";
import { arith, compareVals, isVal, type ArithOp } from "./val.js";
import { cast } from "./cast.js";
import * as coll from "./collections.js";

// --- Trace events ---
export type TraceEventType = "run_start" | "run_end" | "frame_enter" | "frame_exit" | "bind" | "import" | "halt";

export type TraceData = Record<string, string | number | boolean>;

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

/** Where `print`, `pretty` and `debug` write. */
export interface StackOutput {
  out(text: string): void;
  err(text: string): void;
}

export const consoleOutput: StackOutput = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

export interface VMOptions {
  context?: Context;
  engine?: Engine;
  output?: StackOutput;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

export type StepResult = "continue" | "halt";

interface Frame {
  ops: Op[];
  ip: number;
  /** Scope a called frame's fresh child scopes hang off. */
  base: Scope;
  /** Caller's innermost scope, restored on return. Unused for the top frame. */
  saved: Scope;
  /** Entered by `if`; `recur` passes through it to the enclosing frame. */
  branch: boolean;
}

export type BindingKind = "intrinsic" | "module" | "let" | "scope";

/** Reports which resolution step would claim `name`, or null when none does. */
export function whereIs(name: string, context: Context, engine: Engine): BindingKind | null {
  if (intrinsicFromName(name)) return "intrinsic";
  if (engine.resolve(name)) return "module";
  if (context.letGet(name) !== undefined) return "let";
  if (context.scopeItem(name)?.val() !== undefined) return "scope";
  return null;
}

const sexprOps = new WeakMap<SExpr, Op[]>();

export class VM {
  readonly context: Context;
  readonly engine: Engine;
  private readonly output: StackOutput;
  private readonly trace?: (event: TraceEvent) => void;
  private readonly runId: string;

  private values: Expr[] = [];
  private frame: Frame;
  private registers: Frame[] = [];
  private listMarks: number[] = [];
  private halted = false;

  // per-step rollback bookkeeping
  private lowWater = 0;
  private removed: Expr[] = [];
  private version = 0;
  private journaledVersion = 0;

  constructor(options: VMOptions = {}) {
    this.context = options.context ?? new Context();
    this.engine = options.engine ?? new Engine();
    this.output = options.output ?? consoleOutput;
    this.trace = options.trace;
    this.runId = options.runId ?? "run";
    this.frame = this.topFrame([{ kind: "End" }]);
  }

  get stack(): readonly Expr[] {
    return this.values;
  }

  get ops(): readonly Op[] {
    return this.frame.ops;
  }

  get ip(): number {
    return this.frame.ip;
  }

  get depth(): number {
    return this.registers.length;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  /** Compiles a fresh program; the stack and the context carry over. */
  compile(exprs: Expr[]): this {
    return this.load(compile(exprs));
  }

  /** Installs a raw op stream as the top frame. */
  load(ops: Op[]): this {
    const outermost = this.registers[0];
    if (outermost) this.context.restoreScope(outermost.saved);
    this.registers = [];
    this.listMarks = [];
    this.halted = false;
    this.frame = this.topFrame(ops);
    return this;
  }

  clearStack(): void {
    this.values = [];
    this.version++;
  }

  /** Steps until halt and returns a copy of the final stack. */
  run(): Expr[] {
    const started = Date.now();
    this.emit("run_start", undefined, { ops: this.frame.ops.length });
    try {
      let status = this.step();
      while (status === "continue") {
        status = this.step();
      }
    } catch (err) {
      const data: TraceData = { durationMs: Date.now() - started };
      if (err instanceof VMError) {
        data.error = err.code;
        data.message = err.message;
      }
      this.emit("run_end", undefined, data);
      throw err;
    }
    this.emit("run_end", undefined, { durationMs: Date.now() - started, depth: this.values.length });
    return [...this.values];
  }

  step(): StepResult {
    if (this.halted) return "halt";

    const frame = this.frame;
    const op = frame.ops[frame.ip];
    if (op === undefined) {
      throw new VMError("E_IP_BOUNDS", `Instruction pointer ${frame.ip} is past the end of the op stream.`);
    }
    frame.ip = Math.min(frame.ip + 1, frame.ops.length);

    this.lowWater = this.values.length;
    this.removed = [];
    try {
      this.exec(op);
    } catch (err) {
      this.rollback();
      if (err instanceof VMError && !err.span && op.kind !== "End") {
        err.span = op.span;
      }
      throw err;
    }

    if (this.registers.length === 0 && this.version !== this.journaledVersion) {
      this.context.journal?.push(this.values);
      this.journaledVersion = this.version;
    }
    return this.halted ? "halt" : "continue";
  }

  // --- stack primitives ---

  private push(value: Expr): void {
    this.values.push(value);
    this.version++;
  }

  private pop(span?: Span): Expr {
    const value = this.values.pop();
    if (value === undefined) {
      throw new VMError("E_STACK_UNDERFLOW", "Stack underflow: not enough values on the stack.", span);
    }
    this.version++;
    if (this.values.length < this.lowWater) {
      this.lowWater = this.values.length;
      this.removed.push(value);
    }
    return value;
  }

  private peek(span?: Span): Expr {
    const value = this.values[this.values.length - 1];
    if (value === undefined) {
      throw new VMError("E_STACK_UNDERFLOW", "Stack underflow: not enough values on the stack.", span);
    }
    return value;
  }

  private rollback(): void {
    this.values.length = this.lowWater;
    for (let i = this.removed.length - 1; i >= 0; i--) {
      this.values.push(this.removed[i]);
    }
    this.removed = [];
  }

  // --- frames ---

  private topFrame(ops: Op[]): Frame {
    return { ops, ip: 0, base: this.context.scope, saved: this.context.scope, branch: false };
  }

  private enter(ops: Op[], base: Scope, kind: string, span?: Span, branch = false): void {
    this.registers.push(this.frame);
    const saved = this.context.enterScope(base.child());
    this.frame = { ops, ip: 0, base, saved, branch };
    this.emit("frame_enter", span, { kind, depth: this.registers.length });
  }

  private leave(): void {
    const caller = this.registers.pop();
    if (!caller) {
      this.halt();
      return;
    }
    this.context.restoreScope(this.frame.saved);
    this.emit("frame_exit", undefined, { depth: this.registers.length + 1 });
    this.frame = caller;
  }

  private halt(span?: Span): void {
    this.halted = true;
    this.emit("halt", span, { depth: this.registers.length });
  }

  /** Restarts the nearest frame not entered by `if`. */
  private recur(): void {
    while (this.frame.branch && this.registers.length > 0) {
      this.leave();
    }
    this.frame.ip = 0;
    if (this.registers.length > 0) {
      this.context.restoreScope(this.frame.base.child());
    }
  }

  /**
   * Invokes a callable value; anything else is pushed back unchanged.
   * Only a block taken by `if` is a branch frame: a function keeps its own
   * frame as the target of `recur`.
   */
  private invoke(value: Expr, span?: Span, branch = false): void {
    switch (value.kind) {
      case "Block":
        this.enter(compileBody(value.body), this.context.scope, "block", span, branch);
        return;
      case "Function":
        this.enter(compileBody(value.body), value.scope, "function", span);
        return;
      case "SExpr": {
        let ops = sexprOps.get(value);
        if (!ops) {
          ops = compile([value]);
          sexprOps.set(value, ops);
        }
        this.enter(ops, this.context.scope, "sexpr", span);
        return;
      }
      case "Symbol":
      case "Call": {
        const intrinsic = intrinsicFromName(value.name);
        if (intrinsic) {
          this.intrinsic(intrinsic, span);
        } else {
          this.callName(value.name, span);
        }
        return;
      }
      default:
        this.push(value);
    }
  }

  // --- execution ---

  private exec(op: Op): void {
    switch (op.kind) {
      case "Push":
        this.push(op.value);
        return;
      case "Const":
        this.push(op.value);
        return;
      case "Closure":
        this.push({ kind: "Function", scope: this.context.scope, body: op.body });
        return;
      case "ListStart":
        this.listMarks.push(this.values.length);
        return;
      case "ListEnd": {
        const mark = this.listMarks.pop() ?? this.values.length;
        const items: Expr[] = [];
        while (this.values.length > mark) {
          items.push(this.pop(op.span));
        }
        items.reverse();
        this.push({ kind: "List", items });
        return;
      }
      case "Call":
        this.callName(op.name, op.span);
        return;
      case "Intrinsic":
        this.intrinsic(op.name, op.span);
        return;
      case "End":
        this.leave();
        return;
    }
  }

  private callName(name: string, span?: Span): void {
    const fn = this.engine.resolve(name);
    if (fn) {
      this.callModuleFn(fn, name, span);
      return;
    }
    const bound = this.context.letGet(name) ?? this.context.scopeItem(name)?.val();
    if (bound === undefined) {
      const parts = splitQualified(name);
      const hint = parts && !this.engine.module(parts.module)
        ? `Module '${parts.module}' is not loaded (try: '${parts.module} import).`
        : undefined;
      const err = new VMError("E_UNKNOWN_NAME", `Unknown name '${name}'.`, span, { name: str(name) });
      if (hint) err.message += ` ${hint}`;
      throw err;
    }
    if (bound.kind === "Function") {
      this.invoke(bound, span);
    } else {
      this.push(bound);
    }
  }

  private callModuleFn(fn: ModuleFn, name: string, span?: Span): void {
    try {
      fn.execute({
        context: this.context,
        engine: this.engine,
        span,
        pop: () => this.pop(span),
        push: (value) => this.push(value),
      });
    } catch (err) {
      if (err instanceof VMError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new VMError("E_MODULE_FN", `${name}: ${message}`, span);
    }
  }

  private bindingName(op: string, expr: Expr, span?: Span): string {
    if (expr.kind === "Symbol" || expr.kind === "Call") return expr.name;
    if (expr.kind === "String") return expr.value;
    throw new VMError("E_TYPE", `'${op}' expects a symbol name, got ${typeName(expr)}.`, span, { name: expr });
  }

  private arithmetic(op: ArithOp, span?: Span): void {
    const rhs = this.pop(span);
    const lhs = this.pop(span);
    if (op === "add" && lhs.kind === "String" && rhs.kind === "String") {
      this.push(str(lhs.value + rhs.value));
      return;
    }
    if (!isVal(lhs) || !isVal(rhs)) {
      throw new VMError(
        "E_ARITH_TYPE",
        `Cannot apply '${op}' to ${typeName(lhs)} and ${typeName(rhs)}.`,
        span,
        { lhs, rhs }
      );
    }
    const result = arith(op, lhs, rhs);
    if (result.ok) {
      this.push(result.value);
    } else if (result.reason === "div_zero") {
      throw new VMError("E_DIV_ZERO", `Division by zero in '${op}'.`, span, { lhs, rhs });
    } else {
      throw new VMError(
        "E_ARITH_TYPE",
        `Cannot apply '${op}' to ${typeName(lhs)} and ${typeName(rhs)}.`,
        span,
        { lhs, rhs }
      );
    }
  }

  private compare(name: Intrinsic, test: (order: number) => boolean, span?: Span): void {
    const rhs = this.pop(span);
    const lhs = this.pop(span);
    let order: number;
    if (isVal(lhs) && isVal(rhs)) {
      order = compareVals(lhs, rhs);
    } else if (lhs.kind === "String" && rhs.kind === "String") {
      order = lhs.value < rhs.value ? -1 : lhs.value > rhs.value ? 1 : 0;
    } else {
      throw new VMError(
        "E_TYPE",
        `'${intrinsicSpelling(name)}' cannot order ${typeName(lhs)} and ${typeName(rhs)}.`,
        span,
        { lhs, rhs }
      );
    }
    this.push(bool(!Number.isNaN(order) && test(order)));
  }

  private intrinsic(name: Intrinsic, span?: Span): void {
    switch (name) {
      case "add":
      case "sub":
      case "mul":
      case "div":
      case "rem":
        this.arithmetic(name, span);
        return;

      case "eq":
      case "ne": {
        const rhs = this.pop(span);
        const lhs = this.pop(span);
        const equal = exprEquals(lhs, rhs);
        this.push(bool(name === "eq" ? equal : !equal));
        return;
      }
      case "lt": this.compare(name, (o) => o < 0, span); return;
      case "le": this.compare(name, (o) => o <= 0, span); return;
      case "gt": this.compare(name, (o) => o > 0, span); return;
      case "ge": this.compare(name, (o) => o >= 0, span); return;

      case "or":
      case "and": {
        const rhs = isTruthy(this.pop(span));
        const lhs = isTruthy(this.pop(span));
        this.push(bool(name === "or" ? lhs || rhs : lhs && rhs));
        return;
      }
      case "not":
        this.push(bool(!isTruthy(this.pop(span))));
        return;
      case "assert": {
        const msg = this.pop(span);
        const cond = this.pop(span);
        if (!isTruthy(cond)) {
          throw new VMError("E_ASSERT", `Assertion failed: ${show(msg)}`, span, { cond, msg });
        }
        return;
      }

      case "drop":
        this.pop(span);
        return;
      case "dupe": {
        const a = this.peek(span);
        this.push(a);
        return;
      }
      case "swap": {
        const b = this.pop(span);
        const a = this.pop(span);
        this.push(b);
        this.push(a);
        return;
      }
      case "rot": {
        const c = this.pop(span);
        const b = this.pop(span);
        const a = this.pop(span);
        this.push(b);
        this.push(c);
        this.push(a);
        return;
      }

      case "len":
        this.push(coll.len(this.pop(span), span));
        return;
      case "nth": {
        const index = this.pop(span);
        this.push(coll.nth(this.pop(span), index, span));
        return;
      }
      case "split": {
        const index = this.pop(span);
        const [left, right] = coll.split(this.pop(span), index, span);
        this.push(left);
        this.push(right);
        return;
      }
      case "concat": {
        const rhs = this.pop(span);
        this.push(coll.concat(this.pop(span), rhs, span));
        return;
      }
      case "push": {
        const item = this.pop(span);
        this.push(coll.push(this.pop(span), item, span));
        return;
      }
      case "pop": {
        const [rest, last] = coll.pop(this.pop(span), span);
        this.push(rest);
        this.push(last);
        return;
      }
      case "insert": {
        const key = this.pop(span);
        const value = this.pop(span);
        this.push(coll.insert(this.pop(span), value, key, span));
        return;
      }
      case "prop": {
        const key = this.pop(span);
        this.push(coll.prop(this.pop(span), key, span));
        return;
      }
      case "has": {
        const key = this.pop(span);
        this.push(coll.has(this.pop(span), key, span));
        return;
      }
      case "remove": {
        const key = this.pop(span);
        this.push(coll.remove(this.pop(span), key, span));
        return;
      }
      case "keys":
        this.push(coll.keys(this.pop(span), span));
        return;
      case "values":
        this.push(coll.values(this.pop(span), span));
        return;

      case "cast": {
        const target = this.pop(span);
        this.push(cast(this.pop(span), target, span));
        return;
      }
      case "typeOf":
        this.push(str(typeName(this.pop(span))));
        return;

      case "lazy":
        this.push({ kind: "Block", body: [this.pop(span)] });
        return;
      case "if": {
        const last = this.pop(span);
        const prev = this.pop(span);
        if (prev.kind === "Block" || prev.kind === "Function") {
          const cond = this.pop(span);
          this.invoke(isTruthy(cond) ? prev : last, span, true);
        } else if (isTruthy(prev)) {
          this.invoke(last, span, true);
        }
        return;
      }
      case "halt":
        this.halt(span);
        return;
      case "call":
        this.invoke(this.pop(span), span);
        return;
      case "recur":
        this.recur();
        return;
      case "orElse": {
        const fallback = this.pop(span);
        const value = this.pop(span);
        this.push(value.kind === "Nil" ? fallback : value);
        return;
      }

      case "let": {
        const bindName = this.bindingName("let", this.pop(span), span);
        this.context.letSet(bindName, this.pop(span));
        this.emit("bind", span, { name: bindName, kind: "let" });
        return;
      }
      case "def": {
        const bindName = this.bindingName("def", this.pop(span), span);
        this.context.defScopeItem(bindName, this.pop(span));
        this.emit("bind", span, { name: bindName, kind: "scope" });
        return;
      }
      case "set": {
        const bindName = this.bindingName("set", this.pop(span), span);
        const value = this.pop(span);
        if (this.context.scope.assign(bindName, value)) {
          this.emit("bind", span, { name: bindName, kind: "let" });
          return;
        }
        const item = this.context.scopeItem(bindName);
        if (!item) {
          throw new VMError("E_UNBOUND", `Cannot set '${bindName}': it is not bound.`, span, { name: str(bindName) });
        }
        item.set(value);
        this.emit("bind", span, { name: bindName, kind: "scope" });
        return;
      }
      case "get": {
        const bindName = this.bindingName("get", this.pop(span), span);
        this.push(this.context.letGet(bindName) ?? this.context.scopeItem(bindName)?.val() ?? NIL);
        return;
      }

      case "debug":
        this.output.err(show(this.peek(span), true));
        return;
      case "print":
        this.output.out(show(this.pop(span)));
        return;
      case "pretty":
        this.output.out(prettyPrint(this.pop(span)));
        return;
      case "import": {
        const moduleName = this.bindingName("import", this.pop(span), span);
        const loaded = this.engine.load(moduleName);
        if (!loaded) {
          throw new VMError("E_UNKNOWN_MODULE", `Unknown module '${moduleName}'.`, span, { name: str(moduleName) });
        }
        this.emit("import", span, { module: moduleName, fns: loaded.fnNames().length });
        return;
      }
    }
  }

  private emit(event: TraceEventType, span?: Span, data?: TraceData): void {
    if (!this.trace) return;
    this.trace({
      ts: new Date().toISOString(),
      runId: this.runId,
      event,
      span,
      data,
    });
  }
}
