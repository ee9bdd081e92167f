/**
 * scope module: binding introspection
 */
import type { Expr, ModuleFn } from "@stackvm/core";
import { Module, NIL, list, str, sym, whereIs } from "@stackvm/core";
import { popName } from "./args.js";

/** 'name -> "intrinsic" | "module" | "let" | "scope" | nil */
export const scopeWhereFn: ModuleFn = {
  name: "where",
  execute(call) {
    const kind = whereIs(popName(call, "name"), call.context, call.engine);
    call.push(kind === null ? NIL : str(kind));
  },
};

/** -> [['name value] ...] for every scope item, in definition order */
export const scopeDumpFn: ModuleFn = {
  name: "dump",
  execute(call) {
    const pairs: Expr[] = [];
    for (const [name, item] of call.context.scopeItems()) {
      const value = item.val();
      if (value !== undefined) pairs.push(list([sym(name), value]));
    }
    call.push(list(pairs));
  },
};

export function scopeModule(): Module {
  return new Module("scope").addFn(scopeWhereFn).addFn(scopeDumpFn);
}
