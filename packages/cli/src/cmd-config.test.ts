/**
 * Tests for stack config.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";
import { capture, withTempDir } from "./capture.js";

describe("stack config", () => {
  it("reports defaults when no file exists", async () => {
    await withTempDir(async (dir) => {
      const result = await capture(() => runConfig({ cwd: dir, homeDir: dir }));
      assert.equal(result.code, 0);
      assert.equal(
        result.stdout,
        [
          "Effective configuration",
          "  Source:  default",
          "  Path:    (none)",
          "  Journal: off",
          "  Modules: (none)",
          "  Sandbox: off",
        ].join("\n")
      );
    });
  });

  it("reads the project file and applies flag overrides", async () => {
    await withTempDir(async (dir) => {
      const configPath = path.join(dir, ".stackrc.json");
      fs.writeFileSync(configPath, JSON.stringify({ modules: ["fs"], sandbox: true }), "utf-8");
      const result = await capture(() =>
        runConfig({ json: true, cwd: dir, homeDir: dir, overrides: { journalLength: 5, enable: ["str"] } })
      );
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "project",
        path: configPath,
        config: { journal: true, journalLength: 5, modules: ["str", "fs"], sandbox: true },
      });
    });
  });

  it("prints enabled journal and modules in text form", async () => {
    await withTempDir(async (dir) => {
      const result = await capture(() =>
        runConfig({ cwd: dir, homeDir: dir, overrides: { journal: true, enableAll: true } })
      );
      const lines = result.stdout.split("\n");
      assert.equal(lines[3], "  Journal: on (20 entries)");
      assert.equal(lines[4], "  Modules: str, fs, scope");
    });
  });
});
