/**
 * Machine-level numeric values and their arithmetic.
 *
 * Integer arithmetic saturates at the signed 64-bit bounds; float arithmetic
 * is plain IEEE. Mixing variants never coerces: the operation fails and the
 * failure carries both operands.
 */
import type { Expr, FloatExpr, IntegerExpr } from "./expr.js";
import { I64_MAX, I64_MIN } from "./expr.js";

export type Val = IntegerExpr | FloatExpr;

export type ArithOp = "add" | "sub" | "mul" | "div" | "rem";

export type ValResult =
  | { ok: true; value: Val }
  | { ok: false; reason: "mismatch" | "div_zero"; lhs: Val; rhs: Val };

export function isVal(expr: Expr): expr is Val {
  return expr.kind === "Integer" || expr.kind === "Float";
}

export function saturate(n: bigint): bigint {
  if (n > I64_MAX) return I64_MAX;
  if (n < I64_MIN) return I64_MIN;
  return n;
}

function intOp(op: ArithOp, a: bigint, b: bigint): bigint | null {
  switch (op) {
    case "add": return saturate(a + b);
    case "sub": return saturate(a - b);
    case "mul": return saturate(a * b);
    case "div": return b === 0n ? null : saturate(a / b);
    case "rem": return b === 0n ? null : a % b;
  }
}

function floatOp(op: ArithOp, a: number, b: number): number {
  switch (op) {
    case "add": return a + b;
    case "sub": return a - b;
    case "mul": return a * b;
    case "div": return a / b;
    case "rem": return a % b;
  }
}

export function arith(op: ArithOp, lhs: Val, rhs: Val): ValResult {
  if (lhs.kind === "Integer" && rhs.kind === "Integer") {
    const value = intOp(op, lhs.value, rhs.value);
    if (value === null) {
      return { ok: false, reason: "div_zero", lhs, rhs };
    }
    return { ok: true, value: { kind: "Integer", value } };
  }
  if (lhs.kind === "Float" && rhs.kind === "Float") {
    return { ok: true, value: { kind: "Float", value: floatOp(op, lhs.value, rhs.value) } };
  }
  return { ok: false, reason: "mismatch", lhs, rhs };
}

/** Orders two numbers as reals, whatever their variants. */
export function compareVals(lhs: Val, rhs: Val): number {
  if (lhs.kind === "Integer" && rhs.kind === "Integer") {
    return lhs.value < rhs.value ? -1 : lhs.value > rhs.value ? 1 : 0;
  }
  const a = Number(lhs.value);
  const b = Number(rhs.value);
  if (Number.isNaN(a) || Number.isNaN(b)) return Number.NaN;
  return a < b ? -1 : a > b ? 1 : 0;
}
