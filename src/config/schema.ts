import { z } from "zod";
import { DEFAULT_ARTIFACTS_DIR, PORTAL_SEARCH_URL, RETRY, TIMEOUTS } from "../constants.js";

export const ConfigSchema = z.object({
  headless: z.boolean().default(true),
  include_details: z.boolean().default(true),
  debug: z.boolean().default(false),
  slow_mo: z.number().min(0).default(0),
  portal_url: z.string().url().default(PORTAL_SEARCH_URL),
  state: z.string().min(1).optional(),
  max_attempts: z.number().int().min(1).max(5).default(RETRY.MAX_ATTEMPTS),
  retry_pause_ms: z.number().int().min(0).default(RETRY.PAUSE_MS),
  wait_timeout_ms: z.number().int().positive().default(TIMEOUTS.WAIT),
  dialog_timeout_ms: z.number().int().positive().default(TIMEOUTS.DIALOG),
  poll_interval_ms: z.number().int().positive().default(TIMEOUTS.POLL_INTERVAL),
  time_budget_ms: z.number().int().positive().optional(),
  artifacts_dir: z.string().min(1).default(DEFAULT_ARTIFACTS_DIR),
  vocabulary_path: z.string().min(1).optional(),
});

export type CrawlerConfig = z.infer<typeof ConfigSchema>;

export const ShopQuerySchema = z.object({
  id: z.string().min(1),
  district: z.string().min(1),
  taluk: z.string().min(1),
});

export const RegistrySchema = z.object({
  shops: z.array(ShopQuerySchema),
  options: z
    .object({
      headless: z.boolean().optional(),
      includeDetails: z.boolean().optional(),
      include_details: z.boolean().optional(),
    })
    .optional(),
});

export type Registry = z.infer<typeof RegistrySchema>;

export const StatusVocabularySchema = z.object({
  online: z.array(z.string().min(1)).min(1),
  offline: z.array(z.string().min(1)).min(1),
});
