/**
 * Operand checks shared by the library modules. Failures are plain errors;
 * the machine reports them under the calling function's name.
 */
import type { Expr, ModuleCall } from "@stackvm/core";
import { typeName } from "@stackvm/core";

export function popString(call: ModuleCall, what: string): string {
  const value = call.pop();
  if (value.kind !== "String") {
    throw new Error(`'${what}' must be a string, got ${typeName(value)}`);
  }
  return value.value;
}

export function popName(call: ModuleCall, what: string): string {
  const value = call.pop();
  if (value.kind === "Symbol" || value.kind === "Call") return value.name;
  if (value.kind === "String") return value.value;
  throw new Error(`'${what}' must be a symbol, got ${typeName(value)}`);
}

export function popSequence(call: ModuleCall, what: string): Expr[] {
  const value = call.pop();
  if (value.kind === "List") return value.items;
  if (value.kind === "Block") return value.body;
  throw new Error(`'${what}' must be a list, got ${typeName(value)}`);
}
