/**
 * stack check - lex and parse without running
 */
import { Source, parse, formatDiagnostics } from "@stackvm/core";
import { emitIoError } from "./cmd-run.js";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  const pretty = !!opts.pretty;
  let source: Source;
  try {
    source = Source.fromPath(file);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return emitIoError(`Error reading file: ${msg}`, pretty);
  }

  const result = parse(source);
  if (result.diagnostics.length > 0) {
    console.error(formatDiagnostics(result.diagnostics, pretty));
    return 2;
  }

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
