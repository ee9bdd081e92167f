/**
 * stack trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  data: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

interface TraceSummary {
  runId: string;
  totalEvents: number;
  framesEntered: number;
  maxDepth: number;
  bindings: number;
  bindingsByKind: Record<string, number>;
  imports: string[];
  halts: number;
  failures: number;
  error?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = traceLineSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

export function summarize(events: TraceLine[]): TraceSummary {
  const summary: TraceSummary = {
    runId: events[0]?.runId ?? "",
    totalEvents: events.length,
    framesEntered: 0,
    maxDepth: 0,
    bindings: 0,
    bindingsByKind: {},
    imports: [],
    halts: 0,
    failures: 0,
  };

  for (const ev of events) {
    const data = ev.data ?? {};
    switch (ev.event) {
      case "run_start":
        summary.startTime ??= ev.ts;
        break;
      case "run_end":
        summary.endTime = ev.ts;
        if (typeof data["error"] === "string") {
          summary.failures++;
          summary.error ??= data["error"];
        }
        break;
      case "frame_enter": {
        summary.framesEntered++;
        const depth = typeof data["depth"] === "number" ? data["depth"] : 1;
        summary.maxDepth = Math.max(summary.maxDepth, depth);
        break;
      }
      case "bind": {
        summary.bindings++;
        const kind = String(data["kind"] ?? "unknown");
        summary.bindingsByKind[kind] = (summary.bindingsByKind[kind] ?? 0) + 1;
        break;
      }
      case "import":
        summary.imports.push(String(data["module"] ?? "unknown"));
        break;
      case "halt":
        summary.halts++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }
  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const events: TraceLine[] = [];
  for (const line of content.split("\n")) {
    if (!line.trim()) continue;
    const event = parseLine(line);
    if (event) events.push(event);
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarize(events);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:         ${summary.runId}`);
  console.log(`  Total events:   ${summary.totalEvents}`);
  console.log(`  Frames entered: ${summary.framesEntered}`);
  console.log(`  Max depth:      ${summary.maxDepth}`);
  console.log(`  Bindings:       ${summary.bindings}`);
  for (const [kind, count] of Object.entries(summary.bindingsByKind)) {
    console.log(`    ${kind}: ${count}`);
  }
  console.log(`  Imports:        ${summary.imports.length > 0 ? summary.imports.join(", ") : "(none)"}`);
  console.log(`  Failures:       ${summary.failures}${summary.error ? ` (${summary.error})` : ""}`);
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:       ${summary.durationMs}ms`);
  }
  return 0;
}
