import { readFileSync } from "fs";
import { RegistrySchema, type CrawlerConfig, type Registry } from "../config/schema.js";
import type { RunOptions } from "../types.js";

export function parseRegistry(raw: unknown): Registry {
  return RegistrySchema.parse(raw);
}

export function loadRegistry(path: string): Registry {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parseRegistry(raw);
}

/** Registry `options` expressed as config overrides (camelCase wins over snake_case). */
export function registryOverrides(registry: Registry): Partial<CrawlerConfig> {
  const opts = registry.options;
  if (!opts) return {};
  const overrides: Partial<CrawlerConfig> = {};
  if (opts.headless !== undefined) overrides.headless = opts.headless;
  const includeDetails = opts.includeDetails ?? opts.include_details;
  if (includeDetails !== undefined) overrides.include_details = includeDetails;
  return overrides;
}

export function toRunOptions(config: CrawlerConfig): RunOptions {
  return Object.freeze({
    headless: config.headless,
    includeDetails: config.include_details,
  });
}
