/**
 * Console capture for command tests.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export interface Captured {
  code: number;
  stdout: string;
  stderr: string;
}

export async function capture(fn: () => Promise<number> | number): Promise<Captured> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await fn();
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

export function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "stack-cli-test-"));
  return fn(dir).finally(() => fs.rmSync(dir, { recursive: true, force: true }));
}
