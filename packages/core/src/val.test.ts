/**
 * Tests for numeric value arithmetic.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { arith, compareVals, saturate } from "./val.js";
import { I64_MAX, I64_MIN, float, int } from "./expr.js";

describe("arith", () => {
  it("adds integers", () => {
    assert.deepEqual(arith("add", int(2), int(2)), { ok: true, value: int(4) });
  });

  it("saturates integer overflow at the bounds", () => {
    assert.deepEqual(arith("add", int(I64_MAX), int(1)), { ok: true, value: int(I64_MAX) });
    assert.deepEqual(arith("sub", int(I64_MIN), int(1)), { ok: true, value: int(I64_MIN) });
    assert.deepEqual(arith("mul", int(I64_MAX), int(2)), { ok: true, value: int(I64_MAX) });
    assert.deepEqual(arith("mul", int(I64_MIN), int(2)), { ok: true, value: int(I64_MIN) });
    assert.deepEqual(arith("div", int(I64_MIN), int(-1)), { ok: true, value: int(I64_MAX) });
  });

  it("truncates integer division toward zero", () => {
    assert.deepEqual(arith("div", int(-7), int(2)), { ok: true, value: int(-3) });
    assert.deepEqual(arith("rem", int(-7), int(2)), { ok: true, value: int(-1) });
    assert.deepEqual(arith("rem", int(I64_MIN), int(-1)), { ok: true, value: int(0) });
  });

  it("reports integer division by zero", () => {
    const result = arith("div", int(1), int(0));
    assert.equal(result.ok, false);
    if (!result.ok) assert.equal(result.reason, "div_zero");
    assert.equal(arith("rem", int(1), int(0)).ok, false);
  });

  it("follows IEEE for floats", () => {
    assert.deepEqual(arith("add", float(0.5), float(0.25)), { ok: true, value: float(0.75) });
    assert.deepEqual(arith("div", float(1), float(0)), { ok: true, value: float(Infinity) });
  });

  it("refuses mixed variants and carries both operands", () => {
    assert.deepEqual(arith("add", int(1), float(2)), { ok: false, reason: "mismatch", lhs: int(1), rhs: float(2) });
  });
});

describe("saturate", () => {
  it("clamps only outside the 64-bit range", () => {
    assert.equal(saturate(I64_MAX + 10n), I64_MAX);
    assert.equal(saturate(I64_MIN - 10n), I64_MIN);
    assert.equal(saturate(7n), 7n);
  });
});

describe("compareVals", () => {
  it("orders mixed numbers as reals", () => {
    assert.equal(compareVals(int(1), float(1.5)), -1);
    assert.equal(compareVals(float(2), int(2)), 0);
    assert.equal(compareVals(int(3), int(2)), 1);
  });

  it("leaves NaN unordered", () => {
    assert.ok(Number.isNaN(compareVals(float(NaN), int(1))));
  });
});
