/**
 * fs module: fs:read, fs:write, fs:exists
 */
import * as fs from "node:fs";
import * as path from "node:path";
import type { ModuleFn } from "@stackvm/core";
import { Module, NIL, bool, str } from "@stackvm/core";
import { popString } from "./args.js";

export interface FsOptions {
  /** Refuse paths that resolve outside `root`. */
  sandbox?: boolean;
  /** Base for relative paths, and the sandbox boundary. Defaults to the working directory. */
  root?: string;
}

export function resolvePath(filePath: string, options: FsOptions): string {
  const root = path.resolve(options.root ?? process.cwd());
  const resolved = path.resolve(root, filePath);
  if (options.sandbox) {
    const relative = path.relative(root, resolved);
    if (relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      throw new Error(`path '${filePath}' is outside the sandbox`);
    }
  }
  return resolved;
}

export function fsModule(options: FsOptions = {}): Module {
  /** path -> string */
  const readFn: ModuleFn = {
    name: "read",
    execute(call) {
      const filePath = resolvePath(popString(call, "path"), options);
      call.push(str(fs.readFileSync(filePath, "utf-8")));
    },
  };

  /** content path -> nil; parent directories are created */
  const writeFn: ModuleFn = {
    name: "write",
    execute(call) {
      const filePath = resolvePath(popString(call, "path"), options);
      const content = popString(call, "content");
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content, "utf-8");
      call.push(NIL);
    },
  };

  /** path -> boolean */
  const existsFn: ModuleFn = {
    name: "exists",
    execute(call) {
      call.push(bool(fs.existsSync(resolvePath(popString(call, "path"), options))));
    },
  };

  return new Module("fs").addFn(readFn).addFn(writeFn).addFn(existsFn);
}
