/**
 * Interpreter configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { z } from "zod";

export const STD_MODULE_NAMES = ["str", "fs", "scope"] as const;

export type StdModuleName = (typeof STD_MODULE_NAMES)[number];

export const configSchema = z
  .object({
    journal: z.boolean().default(false),
    journalLength: z
      .number({ invalid_type_error: "'journalLength' must be a number" })
      .int()
      .positive()
      .default(20),
    modules: z.array(z.enum(STD_MODULE_NAMES)).default([]),
    sandbox: z.boolean().default(false),
  })
  .strict();

export type StackConfig = z.infer<typeof configSchema>;

export interface ResolvedConfig {
  config: StackConfig;
  source: "project" | "user" | "default";
  path: string | null;
}

export const DEFAULT_CONFIG: StackConfig = configSchema.parse({});

export const PROJECT_CONFIG_FILE = ".stackrc.json";

/**
 * Precedence: ./.stackrc.json > ~/.stack/config.json > defaults.
 * A file that is missing, unreadable or invalid is skipped.
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".stack", "config.json");

  const projectConfig = tryLoadConfigFile(projectPath);
  if (projectConfig) {
    return { config: projectConfig, source: "project", path: projectPath };
  }

  const userConfig = tryLoadConfigFile(userPath);
  if (userConfig) {
    return { config: userConfig, source: "user", path: userPath };
  }

  return { config: { ...DEFAULT_CONFIG, modules: [] }, source: "default", path: null };
}

export function loadConfig(cwd?: string, homeDir?: string): StackConfig {
  return resolveConfig(cwd, homeDir).config;
}

function tryLoadConfigFile(filePath: string): StackConfig | null {
  if (!fs.existsSync(filePath)) return null;
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch {
    return null;
  }
  const parsed = configSchema.safeParse(data);
  return parsed.success ? parsed.data : null;
}

/** Explicit command-line settings; unset fields keep the file's values. */
export interface ConfigOverrides {
  journal?: boolean;
  journalLength?: number;
  sandbox?: boolean;
  enableAll?: boolean;
  enable?: StdModuleName[];
}

export function applyOverrides(config: StackConfig, overrides: ConfigOverrides): StackConfig {
  const modules = new Set<StdModuleName>(config.modules);
  if (overrides.enableAll) {
    for (const name of STD_MODULE_NAMES) modules.add(name);
  }
  for (const name of overrides.enable ?? []) {
    modules.add(name);
  }
  return {
    journal: overrides.journal ?? (overrides.journalLength !== undefined ? true : config.journal),
    journalLength: overrides.journalLength ?? config.journalLength,
    modules: STD_MODULE_NAMES.filter((name) => modules.has(name)),
    sandbox: overrides.sandbox ?? config.sandbox,
  };
}
