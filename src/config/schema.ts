/**
 * Configuration schema definitions using Zod
 *
 * Schemas carry no defaults: DEFAULT_CONFIG is the base layer that every
 * other source is merged onto, and the merged result is validated here.
 */

import { z } from 'zod';

/**
 * CI provider connection settings
 */
export const ProviderSettingsSchema = z.object({
  api_url: z.string().url(),
  token: z.string(),
  org: z.string().min(1),
  pipeline: z.string().min(1),
});

/**
 * Build and step selection
 */
export const ScanSettingsSchema = z.object({
  /** Empty string disables the branch filter */
  branch_regex: z.string(),
  /** Empty string matches every job */
  step_substr: z.string(),
  ignore_case_steps: z.boolean(),
  /** Zero or negative scans nothing */
  max_builds: z.number().int(),
  per_page: z.number().int().min(1).max(100),
  concurrency: z.number().int().min(1).max(16),
  throttle_ms: z.number().int().min(0),
});

/**
 * Search patterns
 */
export const PatternSettingsSchema = z.object({
  /** Explicit patterns; take precedence over the patterns file */
  list: z.array(z.string().min(1)),
  file: z.string().optional(),
  regex: z.boolean(),
  snippet_window: z.number().int().min(0).max(10_000),
});

/**
 * Retry/backoff settings
 */
export const RetrySettingsSchema = z.object({
  max_attempts: z.number().int().min(1).max(10),
  base_delay_ms: z.number().int().min(0),
  max_delay_ms: z.number().int().min(0),
  rate_limit_multiplier: z.number().min(1),
});

/**
 * HTTP settings schema
 */
export const HttpSettingsSchema = z.object({
  timeout_ms: z.number().int().min(1),
  max_log_bytes: z.number().int().min(1),
  retry: RetrySettingsSchema,
});

/**
 * Output settings schema
 */
export const OutputSettingsSchema = z.object({
  json: z.boolean(),
  verbose: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const ConfigSchema = z.object({
  provider: ProviderSettingsSchema,
  scan: ScanSettingsSchema,
  patterns: PatternSettingsSchema,
  http: HttpSettingsSchema,
  output: OutputSettingsSchema,
});

/**
 * Shape accepted from config files and overrides: every key optional
 */
export const PartialConfigSchema = ConfigSchema.deepPartial().strict();

/**
 * Configuration type inferred from schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type ScanSettings = z.infer<typeof ScanSettingsSchema>;
export type PatternSettings = z.infer<typeof PatternSettingsSchema>;
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;
export type HttpSettings = z.infer<typeof HttpSettingsSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
