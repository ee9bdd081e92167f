/**
 * @stackvm/std - standard library modules
 */
import type { Module, ModuleLoader, StdModuleName } from "@stackvm/core";
import { STD_MODULE_NAMES } from "@stackvm/core";
import { strModule } from "./string-ops.js";
import { scopeModule } from "./scope-ops.js";
import { fsModule, type FsOptions } from "./fs-ops.js";

export { strModule } from "./string-ops.js";
export { scopeModule, scopeDumpFn, scopeWhereFn } from "./scope-ops.js";
export { fsModule, resolvePath } from "./fs-ops.js";
export type { FsOptions } from "./fs-ops.js";

export type StdOptions = FsOptions;

function isStdModuleName(name: string): name is StdModuleName {
  const names: readonly string[] = STD_MODULE_NAMES;
  return names.includes(name);
}

export function loadStdModule(name: StdModuleName, options: StdOptions = {}): Module {
  switch (name) {
    case "str": return strModule();
    case "scope": return scopeModule();
    case "fs": return fsModule(options);
  }
}

/**
 * A loader for `import` that finds only the enabled modules.
 */
export function stdLoader(enabled: readonly StdModuleName[], options: StdOptions = {}): ModuleLoader {
  return (name) => (isStdModuleName(name) && enabled.includes(name) ? loadStdModule(name, options) : undefined);
}
