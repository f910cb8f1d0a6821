/**
 * Scan logger
 * Diagnostic channel for a scan. Writes leveled lines to stderr so the
 * report on stdout stays machine-readable.
 */

import chalk from 'chalk';
import { getErrorMessage } from '../errors.js';
import { getJobLabel } from '../types/provider.js';
import type { ScanObserver } from './scan-engine.js';

/**
 * Log levels for filtering and display
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Scan stages for categorization
 */
export type ScanStage = 'config' | 'builds' | 'jobs' | 'logs' | 'http' | 'report';

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  stage: ScanStage;
  message: string;
}

export type LogSink = (line: string) => void;

export interface ScanLoggerOptions {
  /** Emit debug entries */
  verbose?: boolean;
  /** Apply chalk colors (default true) */
  color?: boolean;
  sink?: LogSink;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: '[DEBUG]',
  info: '[INFO]',
  warn: '[WARN]',
  error: '[ERROR]',
};

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class ScanLogger {
  readonly verbose: boolean;
  private readonly color: boolean;
  private readonly sink: LogSink;

  constructor(options: ScanLoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? true;
    this.sink = options.sink ?? stderrSink;
  }

  log(level: LogLevel, stage: ScanStage, message: string): void {
    if (level === 'debug' && !this.verbose) return;

    this.sink(this.format({ level, stage, message }));
  }

  debug(stage: ScanStage, message: string): void {
    this.log('debug', stage, message);
  }

  info(stage: ScanStage, message: string): void {
    this.log('info', stage, message);
  }

  warn(stage: ScanStage, message: string): void {
    this.log('warn', stage, message);
  }

  error(stage: ScanStage, message: string): void {
    this.log('error', stage, message);
  }

  /**
   * `[LEVEL] [stage] message`, colored when enabled
   */
  format(entry: LogEntry): string {
    const label = `${LEVEL_LABELS[entry.level]} [${entry.stage}]`;
    const styled = this.color ? LEVEL_STYLES[entry.level](label) : label;
    return `${styled} ${entry.message}`;
  }
}

/**
 * Observer that reports scan progress through a logger.
 * Retries, skipped builds and missing logs are debug-level: silent unless verbose.
 */
export function createLoggingObserver(logger: ScanLogger): ScanObserver {
  return {
    onBuildStart: (build) => {
      logger.debug('builds', `Build #${build.number} [${build.branch}] - ${build.state}`);
    },
    onBuildSkipped: (build, error) => {
      logger.warn('jobs', `Skipping build #${build.number}: ${getErrorMessage(error)}`);
    },
    onJobStart: (_build, job) => {
      logger.debug('jobs', `  Checking: ${getJobLabel(job)} (${job.state})`);
    },
    onLogFetched: (_build, job, length) => {
      logger.debug('logs', `  Fetched log of job ${job.id} (${length} chars)`);
    },
    onLogMissing: (_build, job) => {
      logger.debug('logs', `  No log available for job ${job.id}`);
    },
    onLogFailed: (build, job, error) => {
      logger.warn(
        'logs',
        `Failed to fetch log of "${getJobLabel(job)}" in build #${build.number}: ${getErrorMessage(error)}`
      );
    },
    onMatch: (record) => {
      logger.debug('logs', `  Match in ${record.step_label} (#${record.build_number}): ${record.pattern}`);
    },
    onRetry: (event) => {
      logger.debug(
        'http',
        `${event.reason} on ${event.url}; retry ${event.attempt}/${event.maxAttempts - 1} in ${event.delayMs}ms`
      );
    },
    onWarning: (message) => {
      logger.warn('config', message);
    },
  };
}
