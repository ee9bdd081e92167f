#!/usr/bin/env node
/**
 * stack - stack language CLI
 */
import { Command, InvalidArgumentError, Option } from "commander";
import { applyOverrides, loadConfig } from "@stackvm/core";
import type { ConfigOverrides, StackConfig, StdModuleName } from "@stackvm/core";
import { runCheck } from "./cmd-check.js";
import { runRun, runStdin } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";
import { runRepl } from "./cmd-repl.js";
import { runWatch } from "./watch.js";

const VERSION = "0.1.0";

interface GlobalOptions {
  journal?: boolean;
  journalLength?: number;
  jl?: number;
  sandbox?: boolean;
  enableAll?: boolean;
  enableStr?: boolean;
  enableFs?: boolean;
  enableScope?: boolean;
}

function parseLength(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("stack")
  .description("Stack language interpreter")
  .version(VERSION)
  .option("--journal", "Record stack snapshots after each top-level step")
  .option("--journal-length <n>", "Journal capacity (implies --journal)", parseLength)
  .addOption(new Option("--jl <n>", "Alias of --journal-length").argParser(parseLength).hideHelp())
  .option("--sandbox", "Keep fs module paths inside the working directory")
  .option("--enable-all", "Enable every standard module")
  .option("--enable-str", "Enable the str module")
  .option("--enable-fs", "Enable the fs module")
  .option("--enable-scope", "Enable the scope module");

function overrides(): ConfigOverrides {
  const g = program.opts<GlobalOptions>();
  const enable: StdModuleName[] = [];
  if (g.enableStr) enable.push("str");
  if (g.enableFs) enable.push("fs");
  if (g.enableScope) enable.push("scope");
  return {
    journal: g.journal,
    journalLength: g.journalLength ?? g.jl,
    sandbox: g.sandbox,
    enableAll: g.enableAll,
    enable,
  };
}

function effectiveConfig(): StackConfig {
  return applyOverrides(loadConfig(), overrides());
}

program
  .command("repl", { isDefault: true })
  .alias(">")
  .description("Interactive session (default)")
  .action(async () => {
    const code = await runRepl({ config: effectiveConfig() });
    process.exit(code);
  });

program
  .command("stdin")
  .alias("-")
  .description("Evaluate standard input")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (opts: { trace?: string; pretty?: boolean }) => {
    const code = await runStdin({ ...opts, config: effectiveConfig() });
    process.exit(code);
  });

program
  .command("run")
  .description("Evaluate a file")
  .argument("<input>", "Source file to run")
  .option("--watch", "Re-run whenever the file changes", false)
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (input: string, opts: { watch?: boolean; trace?: string; pretty?: boolean }) => {
    const runOpts = { trace: opts.trace, pretty: opts.pretty, config: effectiveConfig() };
    const code = opts.watch ? await runWatch(input, runOpts) : await runRun(input, runOpts);
    process.exit(code);
  });

program
  .command("check")
  .description("Lex and parse without running")
  .argument("<file>", "Source file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Source file to format")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig({ ...opts, overrides: overrides() });
    process.exit(code);
  });

// Reject unknown commands before Commander falls back to the default command
const knownCommands = new Set(["repl", ">", "stdin", "-", "run", "check", "fmt", "trace", "config", "help"]);
const valuedOptions = new Set(["--journal-length", "--jl", "--trace"]);
const userArgs = process.argv.slice(2);
let firstPositional: string | undefined;
for (let i = 0; i < userArgs.length; i++) {
  const arg = userArgs[i];
  if (valuedOptions.has(arg)) {
    i++;
    continue;
  }
  if (arg === "-" || !arg.startsWith("-")) {
    firstPositional = arg;
    break;
  }
}
if (firstPositional !== undefined && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
