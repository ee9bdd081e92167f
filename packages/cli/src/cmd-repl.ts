/**
 * stack repl - interactive read-eval-print loop
 */
import * as readline from "node:readline";
import { Source, formatDiagnostics, show, type StackConfig } from "@stackvm/core";
import { Session, formatStack } from "./session.js";

export const PROMPT = ">> ";

export interface ReplIO {
  out(text: string): void;
  err(text: string): void;
  clear(): void;
}

const consoleIO: ReplIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  clear: () => console.clear(),
};

export type LineResult = "continue" | "exit";

/**
 * Evaluates lines against one persistent session. Lines starting with `:`
 * are REPL commands and never reach the lexer.
 */
export class Repl {
  private readonly session: Session;

  constructor(config: StackConfig, private readonly io: ReplIO = consoleIO, cwd?: string) {
    this.session = new Session({ config, output: { out: io.out, err: io.err }, cwd });
  }

  handle(line: string): LineResult {
    const text = line.trim();
    if (text.startsWith(":")) return this.command(text);
    if (text === "") return "continue";

    const outcome = this.session.evaluate(new Source("repl", line));
    switch (outcome.kind) {
      case "diagnostics":
        this.io.err(formatDiagnostics(outcome.diagnostics, true));
        break;
      case "failure":
        this.io.err(`error: ${outcome.error.message}`);
        this.io.err(formatStack(outcome.stack));
        break;
      case "ok":
        this.io.out(formatStack(outcome.stack));
        break;
    }
    return "continue";
  }

  private command(text: string): LineResult {
    const [cmd, ...args] = text.split(/\s+/);
    switch (cmd) {
      case ":exit":
        return "exit";
      case ":clear":
        this.io.clear();
        return "continue";
      case ":reset":
        this.session.reset();
        this.io.out("Reset context");
        return "continue";
      case ":journal":
        this.printJournal(args[0]);
        return "continue";
      default:
        this.io.err(`error: unknown command '${cmd}'`);
        return "continue";
    }
  }

  /** Every entry oldest first, or with a step count the entry that many steps back. */
  private printJournal(stepsBack?: string): void {
    const journal = this.session.context.journal;
    if (!journal) {
      this.io.err("error: journal is disabled (enable it with --journal)");
      return;
    }
    if (stepsBack !== undefined) {
      const n = Number(stepsBack);
      const snapshot = Number.isInteger(n) ? journal.at(n) : undefined;
      if (!snapshot) {
        this.io.err(`error: no journal entry ${stepsBack} steps back (have ${journal.length})`);
        return;
      }
      this.io.out(formatStack(snapshot));
      return;
    }
    const entries = journal.entries();
    if (entries.length === 0) {
      this.io.out("(journal is empty)");
      return;
    }
    entries.forEach((snapshot, i) => {
      this.io.out(`${i}: ${snapshot.map((e) => show(e, true)).join(" ")}`);
    });
  }
}

export async function runRepl(opts: { config: StackConfig }): Promise<number> {
  const repl = new Repl(opts.config);
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: PROMPT });

  return new Promise((resolve) => {
    rl.on("line", (line) => {
      if (repl.handle(line) === "exit") {
        rl.close();
        return;
      }
      rl.prompt();
    });
    rl.on("close", () => resolve(0));
    rl.prompt();
  });
}
