/**
 * Tests for stack trace summaries.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import { runTrace } from "./cmd-trace.js";
import { capture, withTempDir } from "./capture.js";

const lines = [
  { ts: "2026-01-01T00:00:00.000Z", runId: "run-1", event: "run_start", data: { ops: 9 } },
  { ts: "2026-01-01T00:00:00.001Z", runId: "run-1", event: "import", data: { module: "str", fns: 11 } },
  { ts: "2026-01-01T00:00:00.002Z", runId: "run-1", event: "bind", data: { name: "x", kind: "let" } },
  { ts: "2026-01-01T00:00:00.003Z", runId: "run-1", event: "bind", data: { name: "f", kind: "scope" } },
  { ts: "2026-01-01T00:00:00.004Z", runId: "run-1", event: "bind", data: { name: "y", kind: "let" } },
  { ts: "2026-01-01T00:00:00.005Z", runId: "run-1", event: "frame_enter", data: { kind: "function", depth: 1 } },
  { ts: "2026-01-01T00:00:00.006Z", runId: "run-1", event: "frame_enter", data: { kind: "block", depth: 2 } },
  { ts: "2026-01-01T00:00:00.007Z", runId: "run-1", event: "frame_exit", data: { depth: 2 } },
  { ts: "2026-01-01T00:00:00.025Z", runId: "run-1", event: "run_end", data: { durationMs: 25, error: "E_DIV_ZERO", message: "Division by zero in 'div'." } },
];

function writeTrace(dir: string, extra: string[] = []): string {
  const file = path.join(dir, "trace.jsonl");
  fs.writeFileSync(file, [...lines.map((l) => JSON.stringify(l)), ...extra].join("\n") + "\n", "utf-8");
  return file;
}

describe("stack trace", () => {
  it("summarizes events as JSON", async () => {
    await withTempDir(async (dir) => {
      const result = await capture(() => runTrace(writeTrace(dir), { json: true }));
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        runId: "run-1",
        totalEvents: 9,
        framesEntered: 2,
        maxDepth: 2,
        bindings: 3,
        bindingsByKind: { let: 2, scope: 1 },
        imports: ["str"],
        halts: 0,
        failures: 1,
        error: "E_DIV_ZERO",
        startTime: "2026-01-01T00:00:00.000Z",
        endTime: "2026-01-01T00:00:00.025Z",
        durationMs: 25,
      });
    });
  });

  it("prints a text summary", async () => {
    await withTempDir(async (dir) => {
      const result = await capture(() => runTrace(writeTrace(dir), {}));
      assert.equal(
        result.stdout,
        [
          "Trace Summary",
          "  Run ID:         run-1",
          "  Total events:   9",
          "  Frames entered: 2",
          "  Max depth:      2",
          "  Bindings:       3",
          "    let: 2",
          "    scope: 1",
          "  Imports:        str",
          "  Failures:       1 (E_DIV_ZERO)",
          "  Duration:       25ms",
        ].join("\n")
      );
    });
  });

  it("skips malformed lines", async () => {
    await withTempDir(async (dir) => {
      const file = writeTrace(dir, ["not json", `{"event":"bind"}`]);
      const result = await capture(() => runTrace(file, { json: true }));
      assert.equal(JSON.parse(result.stdout).totalEvents, 9);
    });
  });

  it("exits 4 when no event is valid", async () => {
    await withTempDir(async (dir) => {
      const file = path.join(dir, "empty.jsonl");
      fs.writeFileSync(file, "garbage\n", "utf-8");
      const result = await capture(() => runTrace(file, {}));
      assert.equal(result.code, 4);
      assert.equal(result.stderr, "No valid trace events found.");
    });
  });

  it("exits 4 when the file cannot be read", async () => {
    await withTempDir(async (dir) => {
      const result = await capture(() => runTrace(path.join(dir, "missing.jsonl"), {}));
      assert.equal(result.code, 4);
      assert.match(result.stderr, /^Error reading trace file:/);
    });
  });
});
