/**
 * Tasklet configuration loader.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

export interface Config {
  version: number;
  limits: {
    maxSteps?: number;
  };
}

export interface ResolvedConfig {
  config: Config;
  source: "project" | "user" | "default";
  path: string | null;
  /** Config files that exist but were skipped, with the reason. */
  skipped: { path: string; reason: string }[];
}

export const DEFAULT_CONFIG: Config = {
  version: 1,
  limits: {},
};

export const PROJECT_CONFIG_FILE = ".tasklet.json";

/**
 * Resolve the effective config.
 * Precedence: ./.tasklet.json > ~/.tasklet/config.json > default (no limits)
 */
export function resolveConfig(cwd?: string, homeDir?: string): ResolvedConfig {
  const projectPath = path.join(cwd ?? process.cwd(), PROJECT_CONFIG_FILE);
  const userPath = path.join(homeDir ?? os.homedir(), ".tasklet", "config.json");
  const skipped: ResolvedConfig["skipped"] = [];

  for (const [source, filePath] of [
    ["project", projectPath],
    ["user", userPath],
  ] as const) {
    const loaded = loadConfigFile(filePath);
    if (loaded === null) continue;
    if ("error" in loaded) {
      skipped.push({ path: filePath, reason: loaded.error });
      continue;
    }
    return { config: loaded.config, source, path: filePath, skipped };
  }

  return { config: DEFAULT_CONFIG, source: "default", path: null, skipped };
}

export function loadConfig(cwd?: string, homeDir?: string): Config {
  return resolveConfig(cwd, homeDir).config;
}

function loadConfigFile(filePath: string): { config: Config } | { error: string } | null {
  if (!fs.existsSync(filePath)) return null;
  try {
    const raw = fs.readFileSync(filePath, "utf-8");
    return { config: validateConfigShape(JSON.parse(raw)) };
  } catch (e) {
    return { error: e instanceof Error ? e.message : String(e) };
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function validateConfigShape(data: unknown): Config {
  if (!isRecord(data)) {
    throw new Error("Config must be a JSON object.");
  }
  const obj = data;

  const version = typeof obj["version"] === "number" ? obj["version"] : 1;

  const rawLimits = obj["limits"];
  if (rawLimits === undefined) {
    return { version, limits: {} };
  }
  if (!isRecord(rawLimits)) {
    throw new Error("Config 'limits' must be an object when present.");
  }
  const maxSteps = rawLimits["maxSteps"];
  if (maxSteps === undefined) {
    return { version, limits: {} };
  }
  if (typeof maxSteps !== "number" || !Number.isInteger(maxSteps) || maxSteps < 1) {
    throw new Error("Config 'limits.maxSteps' must be a positive integer.");
  }
  return { version, limits: { maxSteps } };
}
