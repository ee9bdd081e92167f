/**
 * stack fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { Source, parse, format, formatDiagnostics, scanComments } from "@stackvm/core";
import { emitIoError } from "./cmd-run.js";

export async function runFmt(file: string, opts: { write?: boolean }): Promise<number> {
  let source: Source;
  try {
    source = Source.fromPath(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return emitIoError(`Error reading file: ${msg}`, true);
  }

  const result = parse(source);
  if (result.diagnostics.length > 0) {
    console.error(formatDiagnostics(result.diagnostics, true));
    return 2;
  }

  const formatted = format(result.exprs, scanComments(source.content));

  try {
    if (opts.write) {
      fs.writeFileSync(file, formatted, "utf-8");
    } else {
      process.stdout.write(formatted);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return emitIoError(`Error writing file: ${msg}`, true);
  }

  return 0;
}
