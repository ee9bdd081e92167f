import * as fs from "node:fs";

/**
 * Source text tagged with an origin label (a path, `stdin`, `repl`, ...).
 * The label only shows up in diagnostics.
 */
export class Source {
  constructor(
    readonly name: string,
    readonly content: string
  ) {}

  static fromPath(filePath: string): Source {
    return new Source(filePath, fs.readFileSync(filePath, "utf-8"));
  }
}
