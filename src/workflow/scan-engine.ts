/**
 * Scan engine
 *
 * Build lister -> job filter -> log matcher -> aggregator. Builds are handled
 * one at a time in listing order; the logs of a build go through a bounded
 * p-queue pool and are recorded in job order whatever order they finish in.
 */

import PQueue from 'p-queue';
import { createAxiosTransport } from '../adapters/axios-transport.js';
import { BuildkiteClient, type CiProvider } from '../adapters/buildkite.js';
import { HttpClient, type HttpTransport, type RetryEvent, type SleepFn } from '../adapters/http-client.js';
import { CLI_VERSION, TOKEN_PLACEHOLDER } from '../config/defaults.js';
import type { Config } from '../config/schema.js';
import { ConfigurationError, ScanInterruptedError, isFatalError, throwIfAborted } from '../errors.js';
import type { Build, Job } from '../types/provider.js';
import type { MatchRecord, Pattern, ScanResult } from '../types/scan.js';
import { ResultAggregator } from './aggregator.js';
import { compileBranchRegex, listBuilds } from './build-lister.js';
import { jobsForBuild, type StepFilter } from './job-filter.js';
import { LogMatcher, compilePatterns, type CompiledPattern } from './log-matcher.js';

/**
 * Progress notifications. Every callback is optional.
 */
export interface ScanObserver {
  onBuildStart?(build: Build): void;
  onBuildSkipped?(build: Build, error: Error): void;
  onJobStart?(build: Build, job: Job): void;
  onLogFetched?(build: Build, job: Job, length: number): void;
  onLogReleased?(build: Build, job: Job): void;
  onLogMissing?(build: Build, job: Job): void;
  onLogFailed?(build: Build, job: Job, error: Error): void;
  onMatch?(record: MatchRecord): void;
  onRetry?(event: RetryEvent): void;
  onWarning?(message: string): void;
}

export interface ScanEngineOptions {
  maxBuilds: number;
  branchRegex: RegExp | null;
  perPage: number;
  step: StepFilter;
  patterns: readonly CompiledPattern[];
  snippetWindow: number;
  /** Maximum concurrent log downloads (1 = sequential) */
  concurrency: number;
  /** Minimum spacing between log downloads, in ms (0 = none) */
  throttleMs: number;
  observer?: ScanObserver;
}

type JobOutcome =
  | { kind: 'searched'; records: MatchRecord[] }
  | { kind: 'missing' }
  | { kind: 'failed' };

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class ScanEngine {
  private readonly observer: ScanObserver;
  private active: ResultAggregator | null = null;

  constructor(
    private readonly provider: CiProvider,
    private readonly options: ScanEngineOptions
  ) {
    this.observer = options.observer ?? {};
  }

  /**
   * Count a retry against the running scan. Wired to the HTTP client.
   */
  handleRetry(event: RetryEvent): void {
    this.active?.recordRetry();
    this.observer.onRetry?.(event);
  }

  /**
   * Run one scan. An abort ends the scan at the next suspension point and
   * resolves with the partial result flagged `interrupted`; fatal errors reject.
   */
  async run(signal?: AbortSignal): Promise<ScanResult> {
    const { options, observer } = this;
    const aggregator = new ResultAggregator();
    this.active = aggregator;

    const queue = new PQueue({
      concurrency: options.concurrency,
      interval: options.throttleMs,
      intervalCap: options.concurrency,
    });

    const matcher = new LogMatcher(this.provider, options.patterns, {
      snippetWindow: options.snippetWindow,
      hooks: {
        onLogFetched: (build, job, length) => observer.onLogFetched?.(build, job, length),
        onLogReleased: (build, job) => observer.onLogReleased?.(build, job),
      },
    });

    // First fatal error raised by a log task of this run
    let fatalError: Error | null = null;

    try {
      const builds = listBuilds(this.provider, {
        maxBuilds: options.maxBuilds,
        branchRegex: options.branchRegex,
        perPage: options.perPage,
        signal,
        onBuildExamined: () => aggregator.recordBuildExamined(),
      });

      for await (const build of builds) {
        throwIfAborted(signal);
        aggregator.recordBuildScanned();
        observer.onBuildStart?.(build);

        let jobs: Job[];
        try {
          jobs = await jobsForBuild(this.provider, build, options.step, signal);
        } catch (error) {
          if (isFatalError(error)) throw error;
          aggregator.recordBuildSkipped();
          observer.onBuildSkipped?.(build, toError(error));
          continue;
        }

        // No timeout is set; throwOnTimeout only keeps add() from resolving to void
        const settled = await Promise.allSettled(
          jobs.map((job) =>
            queue.add(
              async () => {
                // Jobs still queued after a fatal error send no request
                if (fatalError) throw fatalError;
                try {
                  return await this.searchJob(matcher, build, job, signal);
                } catch (error) {
                  if (fatalError === null) fatalError = toError(error);
                  throw error;
                }
              },
              { throwOnTimeout: true }
            )
          )
        );

        // Record in job order; stop at the first fatal failure
        for (const outcome of settled) {
          if (outcome.status === 'rejected') {
            throw outcome.reason;
          }
          this.record(aggregator, outcome.value);
        }
      }

      return aggregator.toResult(false);
    } catch (error) {
      if (error instanceof ScanInterruptedError) {
        return aggregator.toResult(true);
      }
      throw error;
    } finally {
      queue.clear();
      this.active = null;
    }
  }

  private async searchJob(
    matcher: LogMatcher,
    build: Build,
    job: Job,
    signal?: AbortSignal
  ): Promise<JobOutcome> {
    throwIfAborted(signal);
    this.observer.onJobStart?.(build, job);

    try {
      const records = await matcher.search(build, job, signal);
      if (records === null) {
        this.observer.onLogMissing?.(build, job);
        return { kind: 'missing' };
      }
      return { kind: 'searched', records };
    } catch (error) {
      if (isFatalError(error)) throw error;
      this.observer.onLogFailed?.(build, job, toError(error));
      return { kind: 'failed' };
    }
  }

  private record(aggregator: ResultAggregator, outcome: JobOutcome): void {
    switch (outcome.kind) {
      case 'searched':
        aggregator.recordJobSearched(outcome.records);
        for (const record of outcome.records) {
          this.observer.onMatch?.(record);
        }
        break;
      case 'missing':
        aggregator.recordLogMissing();
        break;
      case 'failed':
        aggregator.recordLogFailure();
        break;
    }
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface ScanEngineDependencies {
  /** Defaults to the axios transport */
  transport?: HttpTransport;
  sleep?: SleepFn;
  observer?: ScanObserver;
}

/**
 * Build a ready-to-run engine from validated configuration.
 * Throws ConfigurationError before any request when the token is missing,
 * the branch regex is invalid, or no pattern is usable.
 */
export function createScanEngine(
  config: Config,
  patterns: Pattern[],
  deps: ScanEngineDependencies = {}
): ScanEngine {
  const token = config.provider.token.trim();
  if (token === '' || token === TOKEN_PLACEHOLDER) {
    throw new ConfigurationError('API token not set. Provide --token or set BK_TOKEN.');
  }

  const branchRegex = compileBranchRegex(config.scan.branch_regex);

  const { compiled, rejected } = compilePatterns(patterns);
  for (const { pattern, reason } of rejected) {
    deps.observer?.onWarning?.(`Invalid regex pattern "${pattern.text}": ${reason}`);
  }
  if (compiled.length === 0) {
    throw new ConfigurationError('No usable search patterns');
  }

  // Assigned below; the client reports retries to it
  let engine: ScanEngine | null = null;

  const http = new HttpClient({
    baseUrl: config.provider.api_url,
    token,
    transport: deps.transport ?? createAxiosTransport(),
    timeoutMs: config.http.timeout_ms,
    retry: {
      maxAttempts: config.http.retry.max_attempts,
      baseDelayMs: config.http.retry.base_delay_ms,
      maxDelayMs: config.http.retry.max_delay_ms,
      rateLimitMultiplier: config.http.retry.rate_limit_multiplier,
    },
    userAgent: `flake-scan/${CLI_VERSION}`,
    sleep: deps.sleep,
    onRetry: (event) => engine?.handleRetry(event),
  });

  const provider = new BuildkiteClient(http, {
    org: config.provider.org,
    pipeline: config.provider.pipeline,
    maxLogBytes: config.http.max_log_bytes,
  });

  engine = new ScanEngine(provider, {
    maxBuilds: config.scan.max_builds,
    branchRegex,
    perPage: config.scan.per_page,
    step: {
      substring: config.scan.step_substr,
      ignoreCase: config.scan.ignore_case_steps,
    },
    patterns: compiled,
    snippetWindow: config.patterns.snippet_window,
    concurrency: config.scan.concurrency,
    throttleMs: config.scan.throttle_ms,
    observer: deps.observer,
  });

  return engine;
}
