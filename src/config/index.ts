import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { homedir } from "os";
import { ConfigSchema, type CrawlerConfig } from "./schema.js";
import { CONFIG_DIR, CONFIG_FILE } from "../constants.js";

type Env = Record<string, string | undefined>;

function getConfigPath(): string {
  return join(homedir(), CONFIG_DIR, CONFIG_FILE);
}

function loadFileConfig(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

// Unexpanded "$VAR" placeholders from process managers count as unset.
function readVar(env: Env, name: string): string | undefined {
  const val = env[name];
  if (!val || val.startsWith("$")) return undefined;
  return val;
}

function parseNum(val: string | undefined): number | undefined {
  if (val === undefined) return undefined;
  const n = Number(val);
  return Number.isNaN(n) ? undefined : n;
}

export function loadEnvOverrides(env: Env = process.env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};

  const headless = readVar(env, "PDS_HEADLESS");
  if (headless !== undefined) overrides.headless = headless !== "false";
  const debug = readVar(env, "PDS_DEBUG");
  if (debug !== undefined) overrides.debug = debug === "true";

  const numeric: Array<[string, string]> = [
    ["PDS_SLOW_MO", "slow_mo"],
    ["PDS_MAX_ATTEMPTS", "max_attempts"],
    ["PDS_RETRY_PAUSE_MS", "retry_pause_ms"],
    ["PDS_WAIT_TIMEOUT_MS", "wait_timeout_ms"],
    ["PDS_DIALOG_TIMEOUT_MS", "dialog_timeout_ms"],
    ["PDS_TIME_BUDGET_MS", "time_budget_ms"],
  ];
  for (const [name, key] of numeric) {
    const n = parseNum(readVar(env, name));
    if (n !== undefined) overrides[key] = n;
  }

  const strings: Array<[string, string]> = [
    ["PDS_PORTAL_URL", "portal_url"],
    ["PDS_STATE", "state"],
    ["PDS_ARTIFACTS_DIR", "artifacts_dir"],
    ["PDS_VOCABULARY_PATH", "vocabulary_path"],
  ];
  for (const [name, key] of strings) {
    const val = readVar(env, name);
    if (val !== undefined) overrides[key] = val;
  }

  return overrides;
}

export interface LoadConfigOptions {
  env?: Env;
  configPath?: string;
  overrides?: Partial<CrawlerConfig>;
}

export function loadConfig(opts: LoadConfigOptions = {}): CrawlerConfig {
  const fileConfig = loadFileConfig(opts.configPath ?? getConfigPath());
  const envOverrides = loadEnvOverrides(opts.env);
  const explicit = Object.fromEntries(
    Object.entries(opts.overrides ?? {}).filter(([, v]) => v !== undefined)
  );
  const merged = { ...fileConfig, ...envOverrides, ...explicit };
  return ConfigSchema.parse(merged);
}
