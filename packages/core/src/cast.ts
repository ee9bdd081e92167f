/**
 * Type conversions for the `cast` intrinsic.
 */
import type { Expr, Span } from "./expr.js";
import { I64_MAX, I64_MIN, bool, float, int, isTruthy, list, show, str, sym, typeName } from "./expr.js";
import { VMError } from "./errors.js";
import { saturate } from "./val.js";

export const CAST_TARGETS = [
  "integer",
  "float",
  "string",
  "boolean",
  "symbol",
  "list",
  "block",
  "record",
  "sexpr",
] as const;

export type CastTarget = (typeof CAST_TARGETS)[number];

function isCastTarget(name: string): name is CastTarget {
  const names: readonly string[] = CAST_TARGETS;
  return names.includes(name);
}

function fail(value: Expr, target: string, span?: Span): VMError {
  return new VMError("E_CAST", `Cannot cast ${typeName(value)} '${show(value, true)}' to ${target}.`, span, { value });
}

function toInteger(value: Expr, span?: Span): Expr {
  switch (value.kind) {
    case "Integer":
      return value;
    case "Float":
      if (Number.isNaN(value.value)) throw fail(value, "integer", span);
      if (value.value === Infinity) return int(I64_MAX);
      if (value.value === -Infinity) return int(I64_MIN);
      return int(saturate(BigInt(Math.trunc(value.value))));
    case "Boolean":
      return int(value.value ? 1n : 0n);
    case "String": {
      const text = value.value.trim();
      if (!/^-?\d+$/.test(text)) throw fail(value, "integer", span);
      const n = BigInt(text);
      if (n < I64_MIN || n > I64_MAX) throw fail(value, "integer", span);
      return int(n);
    }
    default:
      throw fail(value, "integer", span);
  }
}

function toFloat(value: Expr, span?: Span): Expr {
  switch (value.kind) {
    case "Float":
      return value;
    case "Integer":
      return float(Number(value.value));
    case "Boolean":
      return float(value.value ? 1 : 0);
    case "String": {
      const text = value.value.trim();
      const n = Number(text);
      if (text === "" || Number.isNaN(n)) throw fail(value, "float", span);
      return float(n);
    }
    default:
      throw fail(value, "float", span);
  }
}

function toSymbol(value: Expr, span?: Span): Expr {
  switch (value.kind) {
    case "Symbol": return value;
    case "String": return sym(value.value);
    case "Call": return sym(value.name);
    default: throw fail(value, "symbol", span);
  }
}

function sequenceItems(value: Expr): Expr[] | null {
  if (value.kind === "List") return value.items;
  if (value.kind === "Block") return value.body;
  return null;
}

function toList(value: Expr, span?: Span): Expr {
  const items = sequenceItems(value);
  if (items) return list(items);
  switch (value.kind) {
    case "Record":
      return list([...value.entries].map(([k, v]) => list([sym(k), v])));
    case "String":
      return list(Array.from(value.value).map(str));
    case "SExpr":
      return list([sym(value.call), ...value.body]);
    default:
      throw fail(value, "list", span);
  }
}

function toBlock(value: Expr, span?: Span): Expr {
  const items = sequenceItems(value);
  if (items) return { kind: "Block", body: items };
  if (value.kind === "SExpr") return { kind: "Block", body: [{ kind: "Call", name: value.call }, ...value.body] };
  throw fail(value, "block", span);
}

function toRecord(value: Expr, span?: Span): Expr {
  if (value.kind === "Record") return value;
  const items = sequenceItems(value);
  if (!items) throw fail(value, "record", span);
  const entries = new Map<string, Expr>();
  for (const pair of items) {
    const parts = sequenceItems(pair);
    const key = parts?.[0];
    if (!parts || parts.length !== 2 || !key || (key.kind !== "Symbol" && key.kind !== "String")) {
      throw fail(value, "record", span);
    }
    entries.set(key.kind === "Symbol" ? key.name : key.value, parts[1]);
  }
  return { kind: "Record", entries };
}

function toSExpr(value: Expr, span?: Span): Expr {
  if (value.kind === "SExpr") return value;
  const items = sequenceItems(value);
  const head = items?.[0];
  if (!items || !head || (head.kind !== "Symbol" && head.kind !== "Call")) {
    throw fail(value, "sexpr", span);
  }
  return { kind: "SExpr", call: head.name, body: items.slice(1) };
}

export function cast(value: Expr, target: Expr, span?: Span): Expr {
  const name = target.kind === "String" ? target.value : target.kind === "Symbol" ? target.name : null;
  if (name === null || !isCastTarget(name)) {
    throw new VMError(
      "E_CAST",
      `Unknown cast target '${show(target, true)}'; expected one of ${CAST_TARGETS.join(", ")}.`,
      span,
      { target }
    );
  }
  switch (name) {
    case "integer": return toInteger(value, span);
    case "float": return toFloat(value, span);
    case "string": return str(show(value));
    case "boolean": return bool(isTruthy(value));
    case "symbol": return toSymbol(value, span);
    case "list": return toList(value, span);
    case "block": return toBlock(value, span);
    case "record": return toRecord(value, span);
    case "sexpr": return toSExpr(value, span);
  }
}
