/**
 * str module: string operations
 * str:len, str:upper, str:lower, str:trim, str:split, str:join, str:starts,
 * str:ends, str:contains, str:replace, str:chars
 *
 * Operands follow the intrinsics: the deeper stack value comes first.
 */
import type { ModuleCall, ModuleFn } from "@stackvm/core";
import { Module, bool, int, list, show, str } from "@stackvm/core";
import { popSequence, popString } from "./args.js";

function unary(name: string, fn: (s: string) => string): ModuleFn {
  return {
    name,
    execute(call: ModuleCall): void {
      call.push(str(fn(popString(call, "in"))));
    },
  };
}

function test(name: string, fn: (s: string, arg: string) => boolean): ModuleFn {
  return {
    name,
    execute(call: ModuleCall): void {
      const arg = popString(call, "value");
      call.push(bool(fn(popString(call, "in"), arg)));
    },
  };
}

/** s -> integer (code points) */
export const strLenFn: ModuleFn = {
  name: "len",
  execute(call) {
    call.push(int(Array.from(popString(call, "in")).length));
  },
};

export const strUpperFn = unary("upper", (s) => s.toUpperCase());
export const strLowerFn = unary("lower", (s) => s.toLowerCase());
export const strTrimFn = unary("trim", (s) => s.trim());

/** s sep -> list of strings */
export const strSplitFn: ModuleFn = {
  name: "split",
  execute(call) {
    const sep = popString(call, "sep");
    const input = popString(call, "in");
    call.push(list(input.split(sep).map(str)));
  },
};

/**
 * parts sep -> s
 * Non-string parts are joined in their display form.
 */
export const strJoinFn: ModuleFn = {
  name: "join",
  execute(call) {
    const sep = popString(call, "sep");
    const parts = popSequence(call, "parts");
    call.push(str(parts.map((p) => show(p)).join(sep)));
  },
};

export const strStartsFn = test("starts", (s, prefix) => s.startsWith(prefix));
export const strEndsFn = test("ends", (s, suffix) => s.endsWith(suffix));
export const strContainsFn = test("contains", (s, sub) => s.includes(sub));

/** s from to -> s, every occurrence replaced */
export const strReplaceFn: ModuleFn = {
  name: "replace",
  execute(call) {
    const to = popString(call, "to");
    const from = popString(call, "from");
    const input = popString(call, "in");
    if (from === "") {
      throw new Error("'from' must not be empty");
    }
    call.push(str(input.split(from).join(to)));
  },
};

export const strCharsFn: ModuleFn = {
  name: "chars",
  execute(call) {
    call.push(list(Array.from(popString(call, "in")).map(str)));
  },
};

export function strModule(): Module {
  const mod = new Module("str");
  for (const fn of [
    strLenFn, strUpperFn, strLowerFn, strTrimFn, strSplitFn, strJoinFn,
    strStartsFn, strEndsFn, strContainsFn, strReplaceFn, strCharsFn,
  ]) {
    mod.addFn(fn);
  }
  return mod;
}
