/**
 * Tests for watch mode.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { DEFAULT_CONFIG } from "@stackvm/core";
import { Watcher } from "./watch.js";
import { capture, withTempDir } from "./capture.js";

const config = { ...DEFAULT_CONFIG, modules: [] };

async function waitFor(check: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("timed out");
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

describe("Watcher", () => {
  it("runs each time with a fresh context", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "prog.stk");
      fs.writeFileSync(file, "1 'x def x", "utf-8");
      const watcher = new Watcher(file, { config });
      const first = await capture(() => watcher.runOnce());
      assert.equal(first.code, 0);
      assert.equal(first.stdout, "stack: 1");

      fs.writeFileSync(file, "x", "utf-8");
      const second = await capture(() => watcher.runOnce());
      assert.equal(second.code, 4);
      assert.equal(second.stderr, "error: Unknown name 'x'.\nstack:");
      assert.equal(watcher.runCount, 2);
    });
  });

  it("tracks the files each run loaded", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "prog.stk");
      fs.writeFileSync(file, "1 2 +", "utf-8");
      const watcher = new Watcher(file, { config });
      assert.deepEqual(watcher.sourcePaths, []);
      await capture(() => watcher.runOnce());
      assert.deepEqual(watcher.sourcePaths, [path.resolve(file)]);
    });
  });

  it("watches every loaded source once", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "prog.stk");
      fs.writeFileSync(file, "1", "utf-8");
      const watcher = new Watcher(file, { config });
      try {
        await capture(() => watcher.start());
        assert.deepEqual(watcher.watchedPaths, [path.resolve(file)]);
      } finally {
        watcher.close();
      }
      assert.equal(watcher.isWatching, false);
    });
  });

  it("re-runs after the file changes", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "prog.stk");
      fs.writeFileSync(file, "1", "utf-8");
      let clears = 0;
      const watcher = new Watcher(file, { config }, () => {
        clears++;
      });
      const result = await capture(async () => {
        const code = watcher.start();
        fs.writeFileSync(file, "2 3 +", "utf-8");
        await waitFor(() => watcher.runCount >= 2);
        watcher.close();
        return code;
      });
      assert.equal(result.code, 0);
      assert.ok(clears >= 1);
      assert.equal(result.stdout.split("\n").at(-1), "stack: 5");
    });
  });

  it("does not watch a missing file", async () => {
    await withTempDir(async (dir) => {
      const watcher = new Watcher(path.join(dir, "missing.stk"), { config });
      const result = await capture(() => watcher.start());
      assert.equal(result.code, 4);
      assert.equal(watcher.isWatching, false);
    });
  });
});
