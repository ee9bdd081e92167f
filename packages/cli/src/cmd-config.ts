/**
 * stack config - effective configuration summary command
 */
import { applyOverrides, resolveConfig } from "@stackvm/core";
import type { ConfigOverrides } from "@stackvm/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string; overrides?: ConfigOverrides }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const config = applyOverrides(resolved.config, opts.overrides ?? {});

  if (opts.json) {
    console.log(JSON.stringify({ source: resolved.source, path: resolved.path, config }, null, 2));
    return 0;
  }

  console.log("Effective configuration");
  console.log(`  Source:  ${resolved.source}`);
  console.log(`  Path:    ${resolved.path ?? "(none)"}`);
  console.log(`  Journal: ${config.journal ? `on (${config.journalLength} entries)` : "off"}`);
  console.log(`  Modules: ${config.modules.length > 0 ? config.modules.join(", ") : "(none)"}`);
  console.log(`  Sandbox: ${config.sandbox ? "on" : "off"}`);
  return 0;
}
