/**
 * Tests for the expression model: equality, truthiness and display.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  NIL,
  block,
  bool,
  call,
  exprEquals,
  float,
  int,
  isTruthy,
  list,
  prettyPrint,
  record,
  show,
  str,
  sym,
  typeName,
} from "./expr.js";
import { Scope } from "./context.js";

describe("exprEquals", () => {
  it("compares integers and floats as reals", () => {
    assert.equal(exprEquals(int(2), float(2)), true);
    assert.equal(exprEquals(float(2), int(2)), true);
    assert.equal(exprEquals(int(2), float(2.5)), false);
  });

  it("compares integers and booleans by zero-ness", () => {
    assert.equal(exprEquals(int(5), bool(true)), true);
    assert.equal(exprEquals(int(0), bool(false)), true);
    assert.equal(exprEquals(bool(true), int(0)), false);
    assert.equal(exprEquals(bool(false), int(-3)), false);
  });

  it("never equates floats with booleans or other variants", () => {
    assert.equal(exprEquals(float(1), bool(true)), false);
    assert.equal(exprEquals(str("1"), int(1)), false);
    assert.equal(exprEquals(sym("a"), call("a")), false);
    assert.equal(exprEquals(NIL, bool(false)), false);
  });

  it("compares composites element-wise", () => {
    assert.equal(exprEquals(list([int(1), float(2)]), list([float(1), int(2)])), true);
    assert.equal(exprEquals(list([int(1)]), block([int(1)])), false);
    assert.equal(exprEquals(list([int(1)]), list([int(1), int(2)])), false);
  });

  it("compares records by key set and values", () => {
    const a = record([["x", int(1)], ["y", str("b")]]);
    const b = record([["y", str("b")], ["x", float(1)]]);
    assert.equal(exprEquals(a, b), true);
    assert.equal(exprEquals(a, record([["x", int(1)]])), false);
  });

  it("compares functions by identity", () => {
    const scope = new Scope();
    const body = [int(1)];
    assert.equal(exprEquals({ kind: "Function", scope, body }, { kind: "Function", scope, body }), true);
    assert.equal(exprEquals({ kind: "Function", scope, body }, { kind: "Function", scope, body: [int(1)] }), false);
  });
});

describe("isTruthy", () => {
  it("treats nil, false and zeros as false", () => {
    for (const value of [NIL, bool(false), int(0), float(0)]) {
      assert.equal(isTruthy(value), false, show(value, true));
    }
  });

  it("treats everything else, including the empty string, as true", () => {
    for (const value of [bool(true), int(-1), float(0.5), str(""), list([]), block([])]) {
      assert.equal(isTruthy(value), true, show(value, true));
    }
  });
});

describe("show", () => {
  it("renders scalars", () => {
    assert.equal(show(NIL), "nil");
    assert.equal(show(int(-42)), "-42");
    assert.equal(show(float(2)), "2.0");
    assert.equal(show(float(1.5)), "1.5");
    assert.equal(show(float(1e21)), "1.0e+21");
    assert.equal(show(float(-0)), "-0.0");
    assert.equal(show({ kind: "Underscore" }), "_");
  });

  it("prints strings and symbols raw unless debugging", () => {
    assert.equal(show(str("hi")), "hi");
    assert.equal(show(str("hi"), true), `"hi"`);
    assert.equal(show(sym("a")), "a");
    assert.equal(show(sym("a"), true), "'a");
  });

  it("quotes nested values", () => {
    assert.equal(show(list([str("a"), sym("b"), call("c")])), `["a" 'b c]`);
    assert.equal(show(block([int(1), block([])])), "(1 ())");
  });

  it("sorts record keys", () => {
    assert.equal(show(record([["b", int(2)], ["a", str("x")]])), `{a: "x", b: 2}`);
  });

  it("renders functions and s-expressions in call form", () => {
    assert.equal(show({ kind: "Function", scope: new Scope(), body: [call("dupe"), call("*")] }), "(fn dupe *)");
    assert.equal(show({ kind: "SExpr", call: "+", body: [int(1), int(2)] }), "(+ 1 2)");
  });
});

describe("prettyPrint", () => {
  it("indents nested composites one element per line", () => {
    const value = list([int(1), block([str("a")]), list([])]);
    assert.equal(prettyPrint(value), `[\n  1\n  (\n    "a"\n  )\n  []\n]`);
  });

  it("prints records with sorted keys", () => {
    assert.equal(prettyPrint(record([["b", int(1)], ["a", list([int(2)])]])), `{\n  a: [\n    2\n  ]\n  b: 1\n}`);
  });
});

describe("typeName", () => {
  it("names every variant", () => {
    assert.deepEqual(
      [NIL, bool(true), int(1), float(1), str(""), sym("a"), call("a"), block([]), list([]), record([])].map(typeName),
      ["nil", "boolean", "integer", "float", "string", "symbol", "call", "block", "list", "record"]
    );
  });
});
