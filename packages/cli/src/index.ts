/**
 * @stackvm/cli - command entry point re-exports
 */
export { runCheck } from "./cmd-check.js";
export { runRun, runStdin, evaluateIn, evaluateSource, runSession } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runFmt } from "./cmd-fmt.js";
export { runTrace, summarize } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
export { Repl, runRepl, PROMPT } from "./cmd-repl.js";
export type { ReplIO, LineResult } from "./cmd-repl.js";
export { Watcher, runWatch } from "./watch.js";
export { Session, formatStack } from "./session.js";
export type { Outcome, SessionOptions } from "./session.js";
