/**
 * stack run / stack stdin - evaluate a program once
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import { Source, formatDiagnostic, formatDiagnostics } from "@stackvm/core";
import type { StackConfig, TraceEvent } from "@stackvm/core";
import { Session, formatStack } from "./session.js";

export interface RunOptions {
  config: StackConfig;
  trace?: string;
  pretty?: boolean;
  /** Base directory for the fs module. */
  cwd?: string;
}

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function emitIoError(message: string, pretty: boolean): number {
  console.error(formatDiagnostic({ code: "E_IO", message }, pretty));
  return 4;
}

/** Creates a fresh session for one run of a program. */
export function runSession(opts: RunOptions, trace?: (event: TraceEvent) => void): Session {
  return new Session({
    config: opts.config,
    cwd: opts.cwd,
    trace,
    runId: crypto.randomUUID(),
  });
}

/**
 * Evaluates one source in `session` and prints the outcome.
 * Returns the process exit code.
 */
export function evaluateIn(session: Session, source: Source, pretty: boolean): number {
  const outcome = session.evaluate(source);
  switch (outcome.kind) {
    case "diagnostics":
      console.error(formatDiagnostics(outcome.diagnostics, pretty));
      return 2;
    case "failure":
      if (pretty) {
        console.error(formatDiagnostic(outcome.error.toDiagnostic(), true));
      } else {
        console.error(`error: ${outcome.error.message}`);
      }
      console.error(formatStack(outcome.stack));
      return 4;
    case "ok":
      console.log(formatStack(outcome.stack));
      return 0;
  }
}

export function evaluateSource(
  source: Source,
  opts: RunOptions,
  trace?: (event: TraceEvent) => void
): number {
  return evaluateIn(runSession(opts, trace), source, !!opts.pretty);
}

/** One JSON line per event. */
function traceWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      throw new CliIoError(`Error writing trace file: ${errorMessage(e)}`);
    }
  };
}

async function runSource(load: () => Source, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;

  let source: Source;
  try {
    source = load();
  } catch (e) {
    return emitIoError(`Error reading input: ${errorMessage(e)}`, pretty);
  }

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      return emitIoError(`Error opening trace file: ${errorMessage(e)}`, pretty);
    }
  }

  const traceHandler = traceFd === null ? undefined : traceWriter(traceFd);

  let code: number;
  try {
    code = evaluateSource(source, opts, traceHandler);
  } catch (e) {
    if (e instanceof CliIoError) {
      code = emitIoError(e.message, pretty);
    } else {
      throw e;
    }
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        code = emitIoError(`Error closing trace file: ${errorMessage(e)}`, pretty);
      }
    }
  }
  return code;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  return runSource(() => Source.fromPath(file), opts);
}

export async function runStdin(opts: RunOptions): Promise<number> {
  return runSource(() => new Source("stdin", fs.readFileSync(0, "utf-8")), opts);
}
