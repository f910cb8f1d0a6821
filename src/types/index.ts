/**
 * Central type exports
 */

export {
  BuildSchema,
  BuildPageSchema,
  JobSchema,
  JobListSchema,
  getJobLabel,
  type Build,
  type Job,
} from './provider.js';

export {
  MatchRecordSchema,
  ScanSummarySchema,
  ScanReportSchema,
  type Pattern,
  type MatchRecord,
  type ScanSummary,
  type ScanDiagnostics,
  type ScanReport,
  type ScanResult,
} from './scan.js';
