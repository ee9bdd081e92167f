/**
 * Tests for the configuration loader.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { DEFAULT_CONFIG, applyOverrides, loadConfig, resolveConfig } from "./config.js";

function withTempDirs(fn: (project: string, home: string) => void): void {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "stack-config-"));
  const project = path.join(root, "project");
  const home = path.join(root, "home");
  fs.mkdirSync(project);
  fs.mkdirSync(path.join(home, ".stack"), { recursive: true });
  try {
    fn(project, home);
  } finally {
    fs.rmSync(root, { recursive: true });
  }
}

describe("resolveConfig", () => {
  it("falls back to defaults", () => {
    withTempDirs((project, home) => {
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "default");
      assert.equal(resolved.path, null);
      assert.deepEqual(resolved.config, { journal: false, journalLength: 20, modules: [], sandbox: false });
    });
  });

  it("prefers the project file over the user file", () => {
    withTempDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".stackrc.json"), JSON.stringify({ journal: true }));
      fs.writeFileSync(path.join(home, ".stack", "config.json"), JSON.stringify({ sandbox: true }));
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "project");
      assert.equal(resolved.path, path.join(project, ".stackrc.json"));
      assert.deepEqual(resolved.config, { journal: true, journalLength: 20, modules: [], sandbox: false });
    });
  });

  it("reads the user file when there is no project file", () => {
    withTempDirs((project, home) => {
      fs.writeFileSync(path.join(home, ".stack", "config.json"), JSON.stringify({ modules: ["str", "fs"] }));
      const resolved = resolveConfig(project, home);
      assert.equal(resolved.source, "user");
      assert.deepEqual(resolved.config.modules, ["str", "fs"]);
    });
  });

  it("skips malformed JSON", () => {
    withTempDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".stackrc.json"), "not json{{");
      assert.equal(resolveConfig(project, home).source, "default");
    });
  });

  it("skips files that fail validation", () => {
    withTempDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".stackrc.json"), JSON.stringify({ journalLength: 0 }));
      fs.writeFileSync(path.join(home, ".stack", "config.json"), JSON.stringify({ modules: ["net"] }));
      assert.equal(resolveConfig(project, home).source, "default");
    });
  });

  it("rejects unknown fields", () => {
    withTempDirs((project, home) => {
      fs.writeFileSync(path.join(project, ".stackrc.json"), JSON.stringify({ jornal: true }));
      assert.deepEqual(loadConfig(project, home), DEFAULT_CONFIG);
    });
  });
});

describe("applyOverrides", () => {
  it("keeps the file's values when nothing is overridden", () => {
    const config = { journal: true, journalLength: 5, modules: ["fs" as const], sandbox: true };
    assert.deepEqual(applyOverrides(config, {}), config);
  });

  it("enables modules in a stable order", () => {
    const config = applyOverrides(DEFAULT_CONFIG, { enable: ["scope", "str"] });
    assert.deepEqual(config.modules, ["str", "scope"]);
    assert.deepEqual(applyOverrides(DEFAULT_CONFIG, { enableAll: true }).modules, ["str", "fs", "scope"]);
  });

  it("turns the journal on when a length is given", () => {
    assert.deepEqual(applyOverrides(DEFAULT_CONFIG, { journalLength: 3 }), {
      journal: true,
      journalLength: 3,
      modules: [],
      sandbox: false,
    });
  });
});
