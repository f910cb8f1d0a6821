/**
 * HTTP client adapter
 *
 * Wraps a single outbound GET with a timeout, bearer auth, and a retry policy.
 * 404 comes back as a not-found result; 401 is fatal; 429, 5xx, timeouts and
 * network failures are retried with exponential backoff before being surfaced.
 */

import { setTimeout as delay } from 'node:timers/promises';
import {
  AuthenticationError,
  HttpStatusError,
  ScanInterruptedError,
  TransportError,
  throwIfAborted,
} from '../errors.js';

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------

export type QueryParams = Record<string, string | number | boolean>;

export interface TransportRequest {
  url: string;
  params?: QueryParams;
  headers: Record<string, string>;
  timeoutMs: number;
  /** Maximum accepted body size in bytes */
  maxContentLength?: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;
  body: string;
  /** Header names are lower-cased */
  headers: Record<string, string>;
}

/**
 * Performs one GET. Resolves for every HTTP status; rejects with
 * TransportError for timeouts and network failures.
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

// ---------------------------------------------------------------------------
// Retry policy
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Total attempts, including the first one */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Extra factor applied to the delay after a 429 */
  rateLimitMultiplier: number;
  isRetryableStatus: (status: number) => boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
  rateLimitMultiplier: 5,
  isRetryableStatus: (status) => status === 429 || status >= 500,
};

/**
 * Delay before the attempt following `attempt` (1-based).
 * Doubles per attempt; a numeric Retry-After on a 429 sets a floor.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  status?: number,
  retryAfter?: string
): number {
  let delayMs = policy.baseDelayMs * 2 ** (attempt - 1);

  if (status === 429) {
    delayMs *= policy.rateLimitMultiplier;

    const seconds = retryAfter ? Number(retryAfter) : NaN;
    if (Number.isFinite(seconds) && seconds > 0) {
      delayMs = Math.max(delayMs, seconds * 1000);
    }
  }

  return Math.min(delayMs, policy.maxDelayMs);
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timed suspension that ends early with ScanInterruptedError on abort
 */
export const abortableSleep: SleepFn = async (ms, signal) => {
  throwIfAborted(signal);
  if (ms <= 0) return;

  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw new ScanInterruptedError();
    }
    throw error;
  }
};

/**
 * Emitted before every backoff sleep
 */
export interface RetryEvent {
  url: string;
  /** Attempt that just failed (1-based) */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  reason: string;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export type HttpResult =
  | { notFound: false; status: number; body: string; headers: Record<string, string> }
  | { notFound: true; status: 404 };

export interface HttpGetOptions {
  params?: QueryParams;
  headers?: Record<string, string>;
  maxContentLength?: number;
  signal?: AbortSignal;
}

export interface HttpClientOptions {
  baseUrl: string;
  token: string;
  transport: HttpTransport;
  timeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  userAgent?: string;
  sleep?: SleepFn;
  onRetry?: (event: RetryEvent) => void;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  readonly retryPolicy: RetryPolicy;
  private readonly transport: HttpTransport;
  private readonly sleep: SleepFn;
  private readonly onRetry?: (event: RetryEvent) => void;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.headers = {
      Authorization: `Bearer ${options.token}`,
      ...(options.userAgent ? { 'User-Agent': options.userAgent } : {}),
    };
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.transport = options.transport;
    this.sleep = options.sleep ?? abortableSleep;
    this.onRetry = options.onRetry;
  }

  /**
   * Resolve a path against the base URL
   */
  resolveUrl(path: string): string {
    return `${this.baseUrl}/${path.replace(/^\/+/, '')}`;
  }

  /**
   * GET a resource, retrying transient failures
   */
  async get(path: string, options: HttpGetOptions = {}): Promise<HttpResult> {
    const url = this.resolveUrl(path);
    const policy = this.retryPolicy;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(options.signal);

      let response: TransportResponse;
      try {
        response = await this.transport({
          url,
          params: options.params,
          headers: { ...this.headers, ...options.headers },
          timeoutMs: this.timeoutMs,
          maxContentLength: options.maxContentLength,
          signal: options.signal,
        });
      } catch (error) {
        if (!(error instanceof TransportError) || !error.retryable) {
          throw error;
        }
        if (attempt >= policy.maxAttempts) {
          throw new TransportError(
            `${error.message} (gave up after ${attempt} attempts)`,
            url,
            false,
            error
          );
        }
        await this.backoff(url, attempt, error.message, computeBackoffDelay(policy, attempt), options.signal);
        continue;
      }

      const { status } = response;

      if (status >= 200 && status < 300) {
        return { notFound: false, status, body: response.body, headers: response.headers };
      }

      if (status === 404) {
        return { notFound: true, status: 404 };
      }

      if (status === 401) {
        throw new AuthenticationError(`API token rejected (HTTP 401) for ${url}`);
      }

      if (!policy.isRetryableStatus(status)) {
        throw new HttpStatusError(`HTTP ${status} for ${url}`, status, url);
      }

      if (attempt >= policy.maxAttempts) {
        throw new HttpStatusError(
          `HTTP ${status} for ${url} (gave up after ${attempt} attempts)`,
          status,
          url
        );
      }

      const delayMs = computeBackoffDelay(policy, attempt, status, response.headers['retry-after']);
      await this.backoff(url, attempt, `HTTP ${status}`, delayMs, options.signal);
    }
  }

  private async backoff(
    url: string,
    attempt: number,
    reason: string,
    delayMs: number,
    signal?: AbortSignal
  ): Promise<void> {
    this.onRetry?.({
      url,
      attempt,
      maxAttempts: this.retryPolicy.maxAttempts,
      delayMs,
      reason,
    });
    await this.sleep(delayMs, signal);
  }
}
