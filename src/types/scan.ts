/**
 * Scan result type definitions
 * Patterns, match records, counters, and the structured report shape
 */

import { z } from 'zod';

/**
 * Caller-supplied search target
 */
export interface Pattern {
  text: string;
  is_regex: boolean;
}

/**
 * A confirmed occurrence of one pattern in one job log.
 * Field order is the order of the structured output.
 */
export const MatchRecordSchema = z.object({
  build_number: z.number().int(),
  branch: z.string(),
  state: z.string(),
  created_at: z.string(),
  step_label: z.string(),
  web_url: z.string(),
  pattern: z.string(),
  snippet: z.string(),
});
export type MatchRecord = Readonly<z.infer<typeof MatchRecordSchema>>;

export const ScanSummarySchema = z.object({
  builds_scanned: z.number().int().min(0),
  jobs_scanned: z.number().int().min(0),
  matches_found: z.number().int().min(0),
});
export type ScanSummary = z.infer<typeof ScanSummarySchema>;

/**
 * Counters reported on the verbose channel only
 */
export interface ScanDiagnostics {
  /** Builds read from the provider, before the branch filter */
  builds_examined: number;
  /** Builds whose job list could not be fetched */
  builds_skipped: number;
  logs_fetched: number;
  /** Logs answered with 404 */
  logs_missing: number;
  /** Logs that failed after retries */
  log_failures: number;
  retries: number;
}

/**
 * Structured output document
 */
export const ScanReportSchema = z.object({
  summary: ScanSummarySchema,
  matches: z.array(MatchRecordSchema),
});
export type ScanReport = z.infer<typeof ScanReportSchema>;

/**
 * Result of one scan invocation
 */
export interface ScanResult {
  summary: ScanSummary;
  diagnostics: ScanDiagnostics;
  matches: MatchRecord[];
  /** True when the scan stopped early on user request */
  interrupted: boolean;
}
