/**
 * Tests for the REPL line handler.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { DEFAULT_CONFIG, applyOverrides, type ConfigOverrides } from "@stackvm/core";
import { Repl, type ReplIO } from "./cmd-repl.js";

function newRepl(overrides: ConfigOverrides = {}): { repl: Repl; out: string[]; err: string[]; clears: () => number } {
  const out: string[] = [];
  const err: string[] = [];
  let cleared = 0;
  const io: ReplIO = {
    out: (text) => out.push(text),
    err: (text) => err.push(text),
    clear: () => {
      cleared++;
    },
  };
  return { repl: new Repl(applyOverrides(DEFAULT_CONFIG, overrides), io), out, err, clears: () => cleared };
}

describe("Repl", () => {
  it("keeps the stack across lines", () => {
    const { repl, out } = newRepl();
    assert.equal(repl.handle("1 2"), "continue");
    repl.handle("+");
    assert.deepEqual(out, ["stack: 1 2", "stack: 3"]);
  });

  it("keeps bindings across lines", () => {
    const { repl, out } = newRepl();
    repl.handle("(fn dupe *) 'sq def");
    repl.handle("7 sq");
    assert.deepEqual(out, ["stack:", "stack: 49"]);
  });

  it("reports failures and keeps going with the rolled-back stack", () => {
    const { repl, out, err } = newRepl();
    repl.handle("5 0 /");
    assert.deepEqual(err, ["error: Division by zero in 'div'.", "stack: 5 0"]);
    repl.handle("drop");
    assert.deepEqual(out, ["stack: 5"]);
  });

  it("reports parse diagnostics without touching the stack", () => {
    const { repl, out, err } = newRepl();
    repl.handle("1");
    repl.handle("(2");
    repl.handle("3");
    assert.match(err[0], /^error\[E_UNBALANCED_BLOCK\]: Unbalanced blocks: 1 unclosed bracket\./);
    assert.deepEqual(out, ["stack: 1", "stack: 1 3"]);
  });

  it("sends print output to the same sink", () => {
    const { repl, out } = newRepl();
    repl.handle(`"hi" print`);
    assert.deepEqual(out, ["hi", "stack:"]);
  });

  it("ignores blank lines", () => {
    const { repl, out, err } = newRepl();
    repl.handle("   ");
    assert.deepEqual(out, []);
    assert.deepEqual(err, []);
  });

  it("exits on :exit", () => {
    assert.equal(newRepl().repl.handle(":exit"), "exit");
  });

  it("clears the screen on :clear", () => {
    const { repl, clears } = newRepl();
    repl.handle(":clear");
    assert.equal(clears(), 1);
  });

  it("drops bindings and the stack on :reset", () => {
    const { repl, out, err } = newRepl();
    repl.handle("1 'x let 2");
    repl.handle(":reset");
    repl.handle("x");
    assert.deepEqual(out, ["stack: 2", "Reset context"]);
    assert.deepEqual(err, ["error: Unknown name 'x'.", "stack:"]);
  });

  it("rejects unknown commands", () => {
    const { repl, err } = newRepl();
    assert.equal(repl.handle(":quit now"), "continue");
    assert.deepEqual(err, ["error: unknown command ':quit'"]);
  });

  it("prints journal entries oldest first", () => {
    const { repl, out } = newRepl({ journalLength: 3 });
    repl.handle("1 2");
    repl.handle("+");
    out.length = 0;
    repl.handle(":journal");
    assert.deepEqual(out, ["0: 1", "1: 1 2", "2: 3"]);
  });

  it("steps back through the journal by count", () => {
    const { repl, out, err } = newRepl({ journalLength: 5 });
    repl.handle("1 2");
    repl.handle("+");
    out.length = 0;
    repl.handle(":journal 0");
    repl.handle(":journal 2");
    repl.handle(":journal 3");
    assert.deepEqual(out, ["stack: 3", "stack: 1"]);
    assert.deepEqual(err, ["error: no journal entry 3 steps back (have 3)"]);
  });

  it("drops the oldest journal entries past capacity", () => {
    const { repl, out } = newRepl({ journalLength: 2 });
    repl.handle("1 2 3");
    out.length = 0;
    repl.handle(":journal");
    assert.deepEqual(out, ["0: 1 2", "1: 1 2 3"]);
  });

  it("says when the journal is off", () => {
    const { repl, err } = newRepl();
    repl.handle(":journal");
    assert.deepEqual(err, ["error: journal is disabled (enable it with --journal)"]);
  });
});
