/**
 * Log matcher
 *
 * Fetches one job log, runs every compiled pattern over it (first match only),
 * and turns hits into match records with a bounded snippet. The log text is
 * dropped as soon as the patterns have run.
 */

import { getErrorMessage } from '../errors.js';
import type { CiProvider } from '../adapters/buildkite.js';
import { getJobLabel, type Build, type Job } from '../types/provider.js';
import type { MatchRecord, Pattern } from '../types/scan.js';

// ---------------------------------------------------------------------------
// Patterns
// ---------------------------------------------------------------------------

export interface PatternLocation {
  index: number;
  length: number;
}

export interface CompiledPattern {
  source: Pattern;
  /** First occurrence in the text, or null */
  find(text: string): PatternLocation | null;
}

export interface RejectedPattern {
  pattern: Pattern;
  reason: string;
}

/**
 * Compile patterns once for the whole scan. Invalid regexes are rejected
 * rather than thrown so the remaining patterns still run.
 */
export function compilePatterns(patterns: Pattern[]): {
  compiled: CompiledPattern[];
  rejected: RejectedPattern[];
} {
  const compiled: CompiledPattern[] = [];
  const rejected: RejectedPattern[] = [];

  for (const pattern of patterns) {
    if (!pattern.is_regex) {
      compiled.push({
        source: pattern,
        find: (text) => {
          const index = text.indexOf(pattern.text);
          return index === -1 ? null : { index, length: pattern.text.length };
        },
      });
      continue;
    }

    let regex: RegExp;
    try {
      regex = new RegExp(pattern.text, 'm');
    } catch (error) {
      rejected.push({ pattern, reason: getErrorMessage(error) });
      continue;
    }

    compiled.push({
      source: pattern,
      find: (text) => {
        const match = regex.exec(text);
        return match ? { index: match.index, length: match[0].length } : null;
      },
    });
  }

  return { compiled, rejected };
}

// ---------------------------------------------------------------------------
// Snippets
// ---------------------------------------------------------------------------

export const DEFAULT_SNIPPET_WINDOW = 80;

const ELLIPSIS = '...';

// Buildkite timestamp markers: ESC _bk;t=<millis> BEL
const BK_TIMESTAMP = /\u001b_bk;t=\d+\u0007/g;
const ANSI_SEQUENCE = /\u001b\[[0-9;?]*[A-Za-z]/g;

/**
 * Strip terminal escapes and collapse blank-line runs
 */
export function cleanSnippet(raw: string): string {
  return raw
    .replace(BK_TIMESTAMP, '')
    .replace(ANSI_SEQUENCE, '')
    .replace(/\r\n?/g, '\n')
    .replace(/\n\s*\n+/g, '\n')
    .trim();
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Text around a match: `window` characters on each side, clipped to the log,
 * with an ellipsis on each clipped side.
 */
export function extractSnippet(
  text: string,
  location: PatternLocation,
  window: number = DEFAULT_SNIPPET_WINDOW
): string {
  let start = Math.max(0, location.index - window);
  let end = Math.min(text.length, location.index + location.length + window);

  // Widen rather than split a surrogate pair
  if (start > 0 && isLowSurrogate(text.charCodeAt(start))) start--;
  if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) end++;

  const prefix = start > 0 ? ELLIPSIS : '';
  const suffix = end < text.length ? ELLIPSIS : '';

  return `${prefix}${cleanSnippet(text.slice(start, end))}${suffix}`;
}

export interface PatternHit {
  pattern: string;
  snippet: string;
}

/**
 * Run every pattern over a log. One hit per matching pattern, in pattern order.
 */
export function searchLog(
  text: string,
  patterns: readonly CompiledPattern[],
  snippetWindow: number = DEFAULT_SNIPPET_WINDOW
): PatternHit[] {
  const hits: PatternHit[] = [];

  for (const pattern of patterns) {
    const location = pattern.find(text);
    if (location) {
      hits.push({
        pattern: pattern.source.text,
        snippet: extractSnippet(text, location, snippetWindow),
      });
    }
  }

  return hits;
}

// ---------------------------------------------------------------------------
// Matcher
// ---------------------------------------------------------------------------

export interface LogLifecycleHooks {
  onLogFetched?: (build: Build, job: Job, length: number) => void;
  /** Fires once the log text is no longer referenced */
  onLogReleased?: (build: Build, job: Job) => void;
}

export interface LogMatcherOptions {
  snippetWindow?: number;
  hooks?: LogLifecycleHooks;
}

export class LogMatcher {
  private readonly snippetWindow: number;
  private readonly hooks: LogLifecycleHooks;

  constructor(
    private readonly provider: Pick<CiProvider, 'getJobLog'>,
    private readonly patterns: readonly CompiledPattern[],
    options: LogMatcherOptions = {}
  ) {
    this.snippetWindow = options.snippetWindow ?? DEFAULT_SNIPPET_WINDOW;
    this.hooks = options.hooks ?? {};
  }

  /**
   * Search one job's log. Resolves to null when the log does not exist;
   * fetch failures propagate to the caller.
   */
  async search(build: Build, job: Job, signal?: AbortSignal): Promise<MatchRecord[] | null> {
    const hits = await this.fetchAndSearch(build, job, signal);
    if (hits === null) return null;

    const stepLabel = getJobLabel(job);
    return hits.map((hit) => ({
      build_number: build.number,
      branch: build.branch,
      state: build.state,
      created_at: build.created_at,
      step_label: stepLabel,
      web_url: build.web_url,
      pattern: hit.pattern,
      snippet: hit.snippet,
    }));
  }

  /**
   * The log is only referenced inside this frame
   */
  private async fetchAndSearch(build: Build, job: Job, signal?: AbortSignal): Promise<PatternHit[] | null> {
    const log = await this.provider.getJobLog(build.number, job.id, signal);
    if (log === null) return null;

    this.hooks.onLogFetched?.(build, job, log.length);
    try {
      return searchLog(log, this.patterns, this.snippetWindow);
    } finally {
      this.hooks.onLogReleased?.(build, job);
    }
  }
}
