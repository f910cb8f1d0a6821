/**
 * Result aggregator
 * Sole owner of the mutable state of one scan: counters and match records.
 */

import type { MatchRecord, ScanDiagnostics, ScanResult, ScanSummary } from '../types/scan.js';

export class ResultAggregator {
  private readonly matches: MatchRecord[] = [];
  private buildsScanned = 0;
  private jobsScanned = 0;
  private readonly diagnostics: ScanDiagnostics = {
    builds_examined: 0,
    builds_skipped: 0,
    logs_fetched: 0,
    logs_missing: 0,
    log_failures: 0,
    retries: 0,
  };

  recordBuildExamined(): void {
    this.diagnostics.builds_examined++;
  }

  /** A build passed the branch filter */
  recordBuildScanned(): void {
    this.buildsScanned++;
  }

  /** A build's job list could not be fetched */
  recordBuildSkipped(): void {
    this.diagnostics.builds_skipped++;
  }

  /**
   * A job log was fetched and searched. Records are kept in call order.
   */
  recordJobSearched(records: readonly MatchRecord[]): void {
    this.jobsScanned++;
    this.diagnostics.logs_fetched++;
    this.matches.push(...records);
  }

  /** The job passed the filters but has no log (404); it still counts as scanned */
  recordLogMissing(): void {
    this.jobsScanned++;
    this.diagnostics.logs_missing++;
  }

  recordLogFailure(): void {
    this.diagnostics.log_failures++;
  }

  recordRetry(): void {
    this.diagnostics.retries++;
  }

  get summary(): ScanSummary {
    return {
      builds_scanned: this.buildsScanned,
      jobs_scanned: this.jobsScanned,
      matches_found: this.matches.length,
    };
  }

  /**
   * Snapshot of the current state
   */
  toResult(interrupted: boolean = false): ScanResult {
    return {
      summary: this.summary,
      diagnostics: { ...this.diagnostics },
      matches: [...this.matches],
      interrupted,
    };
  }
}
