/**
 * Collection intrinsics. Lists and blocks are sequences; records are keyed by
 * symbol name. Operations never mutate their inputs.
 */
import type { BlockExpr, Expr, ListExpr, RecordExpr, Span } from "./expr.js";
import { NIL, bool, exprEquals, int, list, str, sym, typeName } from "./expr.js";
import { VMError } from "./errors.js";

type Sequence = BlockExpr | ListExpr;

function isSequence(expr: Expr): expr is Sequence {
  return expr.kind === "List" || expr.kind === "Block";
}

function itemsOf(seq: Sequence): Expr[] {
  return seq.kind === "List" ? seq.items : seq.body;
}

function rebuild(like: Sequence, items: Expr[]): Sequence {
  return like.kind === "List" ? { kind: "List", items } : { kind: "Block", body: items };
}

function typeError(op: string, expr: Expr, span?: Span): VMError {
  return new VMError("E_TYPE", `'${op}' does not support ${typeName(expr)}.`, span, { value: expr });
}

function indexOf(op: string, expr: Expr, span?: Span): number {
  if (expr.kind !== "Integer") {
    throw new VMError("E_TYPE", `'${op}' expects an integer index, got ${typeName(expr)}.`, span, { index: expr });
  }
  return Number(expr.value);
}

export function keyName(op: string, expr: Expr, span?: Span): string {
  if (expr.kind === "Symbol") return expr.name;
  if (expr.kind === "String") return expr.value;
  throw new VMError("E_TYPE", `'${op}' expects a symbol or string key, got ${typeName(expr)}.`, span, { key: expr });
}

function clamp(index: number, length: number): number {
  return Math.max(0, Math.min(index, length));
}

export function len(coll: Expr, span?: Span): Expr {
  if (isSequence(coll)) return int(itemsOf(coll).length);
  if (coll.kind === "String") return int(Array.from(coll.value).length);
  if (coll.kind === "Record") return int(coll.entries.size);
  throw typeError("len", coll, span);
}

export function nth(coll: Expr, index: Expr, span?: Span): Expr {
  const i = indexOf("nth", index, span);
  if (isSequence(coll)) return itemsOf(coll)[i] ?? NIL;
  if (coll.kind === "String") {
    const ch = Array.from(coll.value)[i];
    return ch === undefined ? NIL : str(ch);
  }
  throw typeError("nth", coll, span);
}

export function split(coll: Expr, index: Expr, span?: Span): [Expr, Expr] {
  const i = indexOf("split", index, span);
  if (isSequence(coll)) {
    const items = itemsOf(coll);
    const at = clamp(i, items.length);
    return [rebuild(coll, items.slice(0, at)), rebuild(coll, items.slice(at))];
  }
  if (coll.kind === "String") {
    const chars = Array.from(coll.value);
    const at = clamp(i, chars.length);
    return [str(chars.slice(0, at).join("")), str(chars.slice(at).join(""))];
  }
  throw typeError("split", coll, span);
}

export function concat(lhs: Expr, rhs: Expr, span?: Span): Expr {
  if (lhs.kind === "List" && rhs.kind === "List") return list([...lhs.items, ...rhs.items]);
  if (lhs.kind === "Block" && rhs.kind === "Block") return { kind: "Block", body: [...lhs.body, ...rhs.body] };
  if (lhs.kind === "String" && rhs.kind === "String") return str(lhs.value + rhs.value);
  if (lhs.kind === "Record" && rhs.kind === "Record") {
    return { kind: "Record", entries: new Map([...lhs.entries, ...rhs.entries]) };
  }
  throw new VMError(
    "E_TYPE",
    `'concat' cannot join ${typeName(lhs)} and ${typeName(rhs)}.`,
    span,
    { lhs, rhs }
  );
}

export function push(coll: Expr, item: Expr, span?: Span): Expr {
  if (isSequence(coll)) return rebuild(coll, [...itemsOf(coll), item]);
  throw typeError("push", coll, span);
}

export function pop(coll: Expr, span?: Span): [Expr, Expr] {
  if (isSequence(coll)) {
    const items = itemsOf(coll);
    if (items.length === 0) return [coll, NIL];
    return [rebuild(coll, items.slice(0, -1)), items[items.length - 1]];
  }
  throw typeError("pop", coll, span);
}

export function insert(coll: Expr, value: Expr, key: Expr, span?: Span): Expr {
  if (coll.kind === "Record") {
    const entries = new Map(coll.entries);
    entries.set(keyName("insert", key, span), value);
    return { kind: "Record", entries };
  }
  if (isSequence(coll)) {
    const items = [...itemsOf(coll)];
    items.splice(clamp(indexOf("insert", key, span), items.length), 0, value);
    return rebuild(coll, items);
  }
  throw typeError("insert", coll, span);
}

export function prop(coll: Expr, key: Expr, span?: Span): Expr {
  if (coll.kind === "Record") return coll.entries.get(keyName("prop", key, span)) ?? NIL;
  if (isSequence(coll) || coll.kind === "String") return nth(coll, key, span);
  throw typeError("prop", coll, span);
}

export function has(coll: Expr, key: Expr, span?: Span): Expr {
  if (coll.kind === "Record") return bool(coll.entries.has(keyName("has", key, span)));
  if (isSequence(coll)) return bool(itemsOf(coll).some((item) => exprEquals(item, key)));
  if (coll.kind === "String") {
    if (key.kind !== "String") throw typeError("has", key, span);
    return bool(coll.value.includes(key.value));
  }
  throw typeError("has", coll, span);
}

export function remove(coll: Expr, key: Expr, span?: Span): Expr {
  if (coll.kind === "Record") {
    const entries = new Map(coll.entries);
    entries.delete(keyName("remove", key, span));
    return { kind: "Record", entries };
  }
  if (isSequence(coll)) {
    const i = indexOf("remove", key, span);
    const items = itemsOf(coll);
    if (i < 0 || i >= items.length) return coll;
    return rebuild(coll, [...items.slice(0, i), ...items.slice(i + 1)]);
  }
  throw typeError("remove", coll, span);
}

function asRecord(op: string, expr: Expr, span?: Span): RecordExpr {
  if (expr.kind !== "Record") throw typeError(op, expr, span);
  return expr;
}

export function keys(coll: Expr, span?: Span): Expr {
  return list([...asRecord("keys", coll, span).entries.keys()].map(sym));
}

export function values(coll: Expr, span?: Span): Expr {
  return list([...asRecord("values", coll, span).entries.values()]);
}
