/**
 * Single-pass lowering of expressions to a flat instruction stream.
 *
 * There are no jumps: control flow happens by invoking block values that
 * are already on the stack.
 */
import type { Expr, Span } from "./expr.js";
import type { Val } from "./val.js";
import { intrinsicFromName, type Intrinsic } from "./intrinsics.js";

export type Op =
  | { kind: "Push"; value: Val; span?: Span }
  | { kind: "Intrinsic"; name: Intrinsic; span?: Span }
  // non-intrinsic name, resolved when executed
  | { kind: "Call"; name: string; span?: Span }
  // literal push of a non-numeric constant
  | { kind: "Const"; value: Expr; span?: Span }
  // `(fn ...)`: capture the current scope
  | { kind: "Closure"; body: Expr[]; span?: Span }
  | { kind: "ListStart"; span?: Span }
  | { kind: "ListEnd"; span?: Span }
  | { kind: "End" };

function isFunctionLiteral(body: Expr[]): boolean {
  const head = body[0];
  return head !== undefined && head.kind === "Call" && head.name === "fn";
}

function lowerName(name: string, span: Span | undefined, ops: Op[]): void {
  const intrinsic = intrinsicFromName(name);
  ops.push(intrinsic ? { kind: "Intrinsic", name: intrinsic, span } : { kind: "Call", name, span });
}

export function compileExpr(expr: Expr, ops: Op[]): void {
  switch (expr.kind) {
    case "Integer":
      ops.push({ kind: "Push", value: { kind: "Integer", value: expr.value }, span: expr.span });
      break;
    case "Float":
      ops.push({ kind: "Push", value: { kind: "Float", value: expr.value }, span: expr.span });
      break;
    case "Call":
      lowerName(expr.name, expr.span, ops);
      break;
    case "Block":
      if (isFunctionLiteral(expr.body)) {
        ops.push({ kind: "Closure", body: expr.body.slice(1), span: expr.span });
      } else {
        ops.push({ kind: "Const", value: expr, span: expr.span });
      }
      break;
    case "List":
      ops.push({ kind: "ListStart", span: expr.span });
      for (const item of expr.items) {
        compileExpr(item, ops);
      }
      ops.push({ kind: "ListEnd", span: expr.span });
      break;
    case "SExpr":
      for (const arg of expr.body) {
        compileExpr(arg, ops);
      }
      lowerName(expr.call, expr.span, ops);
      break;
    case "Nil":
    case "Boolean":
    case "String":
    case "Symbol":
    case "Record":
    case "Function":
    case "Underscore":
      ops.push({ kind: "Const", value: expr, span: expr.span });
      break;
  }
}

/** Compiles a sequence and terminates it with exactly one `End`. */
export function compile(exprs: Expr[]): Op[] {
  const ops: Op[] = [];
  for (const expr of exprs) {
    compileExpr(expr, ops);
  }
  ops.push({ kind: "End" });
  return ops;
}

const bodyCache = new WeakMap<Expr[], Op[]>();

/** Compiles a block or function body once and reuses the result. */
export function compileBody(body: Expr[]): Op[] {
  let ops = bodyCache.get(body);
  if (!ops) {
    ops = compile(body);
    bodyCache.set(body, ops);
  }
  return ops;
}
