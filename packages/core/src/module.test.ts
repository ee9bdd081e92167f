/**
 * Tests for the module registry.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Engine, Module, splitQualified } from "./module.js";

const noop = { name: "noop", execute: () => undefined };

describe("splitQualified", () => {
  it("splits at the first colon", () => {
    assert.deepEqual(splitQualified("str:len"), { module: "str", rest: "len" });
    assert.deepEqual(splitQualified("a:b:c"), { module: "a", rest: "b:c" });
  });

  it("leaves unqualified names alone", () => {
    assert.equal(splitQualified("len"), null);
    assert.equal(splitQualified(":len"), null);
  });
});

describe("Engine", () => {
  it("resolves qualified names in registered modules", () => {
    const engine = new Engine().addModule(new Module("m").addFn(noop));
    assert.equal(engine.resolve("m:noop"), noop);
    assert.equal(engine.resolve("m:other"), undefined);
    assert.equal(engine.resolve("noop"), undefined);
    assert.equal(engine.resolve("x:noop"), undefined);
  });

  it("loads modules through its loader once", () => {
    let loads = 0;
    const engine = new Engine((name) => {
      loads++;
      return name === "m" ? new Module("m").addFn(noop) : undefined;
    });
    assert.equal(engine.resolve("m:noop"), undefined);
    const first = engine.load("m");
    assert.equal(engine.load("m"), first);
    assert.equal(loads, 1);
    assert.deepEqual(engine.moduleNames(), ["m"]);
    assert.deepEqual(first?.fnNames(), ["noop"]);
    assert.equal(engine.load("other"), undefined);
  });
});
