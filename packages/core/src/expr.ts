/**
 * Expression/value model.
 *
 * The same tagged union is produced by the parser and flows through the
 * compiler into the machine's stack: code is data.
 */
import type { Scope } from "./context.js";

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

interface BaseExpr {
  kind: string;
  span?: Span;
}

export interface NilExpr extends BaseExpr {
  kind: "Nil";
}

export interface BooleanExpr extends BaseExpr {
  kind: "Boolean";
  value: boolean;
}

/** Signed 64-bit integer. */
export interface IntegerExpr extends BaseExpr {
  kind: "Integer";
  value: bigint;
}

export interface FloatExpr extends BaseExpr {
  kind: "Float";
  value: number;
}

export interface StringExpr extends BaseExpr {
  kind: "String";
  value: string;
}

/** A quoted name, carried as data and never looked up. */
export interface SymbolExpr extends BaseExpr {
  kind: "Symbol";
  name: string;
}

/** A bare name, resolved and invoked when reached. */
export interface CallExpr extends BaseExpr {
  kind: "Call";
  name: string;
}

/** `(a b c)`: deferred until explicitly invoked. */
export interface BlockExpr extends BaseExpr {
  kind: "Block";
  body: Expr[];
}

/** `[a b c]`: each element is reduced before the list becomes a value. */
export interface ListExpr extends BaseExpr {
  kind: "List";
  items: Expr[];
}

export interface RecordExpr extends BaseExpr {
  kind: "Record";
  entries: Map<string, Expr>;
}

/** A closure: the lexical scope captured at creation plus a body. */
export interface FunctionExpr extends BaseExpr {
  kind: "Function";
  scope: Scope;
  body: Expr[];
}

export interface SExpr extends BaseExpr {
  kind: "SExpr";
  call: string;
  body: Expr[];
}

export interface UnderscoreExpr extends BaseExpr {
  kind: "Underscore";
}

export type Expr =
  | NilExpr
  | BooleanExpr
  | IntegerExpr
  | FloatExpr
  | StringExpr
  | SymbolExpr
  | CallExpr
  | BlockExpr
  | ListExpr
  | RecordExpr
  | FunctionExpr
  | SExpr
  | UnderscoreExpr;

export type ExprKind = Expr["kind"];

export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;

// --- Constructors ---

export const NIL: NilExpr = { kind: "Nil" };

export function bool(value: boolean): BooleanExpr {
  return { kind: "Boolean", value };
}

export function int(value: bigint | number): IntegerExpr {
  return { kind: "Integer", value: typeof value === "number" ? BigInt(value) : value };
}

export function float(value: number): FloatExpr {
  return { kind: "Float", value };
}

export function str(value: string): StringExpr {
  return { kind: "String", value };
}

export function sym(name: string): SymbolExpr {
  return { kind: "Symbol", name };
}

export function call(name: string): CallExpr {
  return { kind: "Call", name };
}

export function block(body: Expr[]): BlockExpr {
  return { kind: "Block", body };
}

export function list(items: Expr[]): ListExpr {
  return { kind: "List", items };
}

export function record(entries: Iterable<readonly [string, Expr]>): RecordExpr {
  return { kind: "Record", entries: new Map(entries) };
}

// --- Predicates ---

export function isTruthy(expr: Expr): boolean {
  switch (expr.kind) {
    case "Nil":
      return false;
    case "Boolean":
      return expr.value;
    case "Integer":
      return expr.value !== 0n;
    case "Float":
      return expr.value !== 0;
    default:
      return true;
  }
}

export function isNil(expr: Expr): boolean {
  return expr.kind === "Nil";
}

/** Name reported by `typeof`. */
export function typeName(expr: Expr): string {
  switch (expr.kind) {
    case "Nil": return "nil";
    case "Boolean": return "boolean";
    case "Integer": return "integer";
    case "Float": return "float";
    case "String": return "string";
    case "Symbol": return "symbol";
    case "Call": return "call";
    case "Block": return "block";
    case "List": return "list";
    case "Record": return "record";
    case "Function": return "function";
    case "SExpr": return "sexpr";
    case "Underscore": return "underscore";
  }
}

// --- Equality ---

/**
 * Structural equality with numeric coercion: Integer/Float compare as reals,
 * Integer/Boolean compare by zero-ness. Every other cross-variant pair is unequal.
 */
export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.kind) {
    case "Nil":
      return b.kind === "Nil";
    case "Underscore":
      return b.kind === "Underscore";
    case "Boolean":
      if (b.kind === "Boolean") return a.value === b.value;
      if (b.kind === "Integer") return (b.value !== 0n) === a.value;
      return false;
    case "Integer":
      if (b.kind === "Integer") return a.value === b.value;
      if (b.kind === "Float") return Number(a.value) === b.value;
      if (b.kind === "Boolean") return (a.value !== 0n) === b.value;
      return false;
    case "Float":
      if (b.kind === "Float") return a.value === b.value;
      if (b.kind === "Integer") return a.value === Number(b.value);
      return false;
    case "String":
      return b.kind === "String" && a.value === b.value;
    case "Symbol":
      return b.kind === "Symbol" && a.name === b.name;
    case "Call":
      return b.kind === "Call" && a.name === b.name;
    case "Block":
      return b.kind === "Block" && sequenceEquals(a.body, b.body);
    case "List":
      return b.kind === "List" && sequenceEquals(a.items, b.items);
    case "Record": {
      if (b.kind !== "Record" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !exprEquals(value, other)) return false;
      }
      return true;
    }
    case "Function":
      return b.kind === "Function" && a.scope === b.scope && a.body === b.body;
    case "SExpr":
      return b.kind === "SExpr" && a.call === b.call && sequenceEquals(a.body, b.body);
  }
}

function sequenceEquals(a: Expr[], b: Expr[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!exprEquals(a[i], b[i])) return false;
  }
  return true;
}

// --- Display ---

function showFloat(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  const text = String(value);
  if (!Number.isFinite(value) || text.includes(".")) return text;
  const exp = text.search(/[eE]/);
  return exp < 0 ? `${text}.0` : `${text.slice(0, exp)}.0${text.slice(exp)}`;
}

/**
 * Single-line rendering. Display form prints strings raw and symbols bare;
 * debug form (and every nested value) quotes them so the output reads back.
 */
export function show(expr: Expr, debug: boolean = false): string {
  switch (expr.kind) {
    case "Nil": return "nil";
    case "Underscore": return "_";
    case "Boolean": return String(expr.value);
    case "Integer": return expr.value.toString();
    case "Float": return showFloat(expr.value);
    case "String": return debug ? JSON.stringify(expr.value) : expr.value;
    case "Symbol": return debug ? `'${expr.name}` : expr.name;
    case "Call": return expr.name;
    case "Block": return `(${showAll(expr.body)})`;
    case "List": return `[${showAll(expr.items)}]`;
    case "Record": {
      const pairs = sortedEntries(expr).map(([k, v]) => `${k}: ${show(v, true)}`);
      return `{${pairs.join(", ")}}`;
    }
    case "Function":
      return expr.body.length > 0 ? `(fn ${showAll(expr.body)})` : "(fn)";
    case "SExpr":
      return expr.body.length > 0 ? `(${expr.call} ${showAll(expr.body)})` : `(${expr.call})`;
  }
}

function showAll(exprs: Expr[]): string {
  return exprs.map((e) => show(e, true)).join(" ");
}

function sortedEntries(rec: RecordExpr): Array<[string, Expr]> {
  return [...rec.entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

const INDENT = "  ";

/** Multi-line rendering used by `pretty`: one element per line, nested by indentation. */
export function prettyPrint(expr: Expr, depth: number = 0): string {
  const pad = INDENT.repeat(depth + 1);
  const close = INDENT.repeat(depth);
  switch (expr.kind) {
    case "Block":
    case "List": {
      const items = expr.kind === "Block" ? expr.body : expr.items;
      const [open, end] = expr.kind === "Block" ? ["(", ")"] : ["[", "]"];
      if (items.length === 0) return `${open}${end}`;
      const lines = items.map((item) => pad + prettyPrint(item, depth + 1));
      return `${open}\n${lines.join("\n")}\n${close}${end}`;
    }
    case "Record": {
      if (expr.entries.size === 0) return "{}";
      const lines = sortedEntries(expr).map(([k, v]) => `${pad}${k}: ${prettyPrint(v, depth + 1)}`);
      return `{\n${lines.join("\n")}\n${close}}`;
    }
    default:
      return show(expr, true);
  }
}
