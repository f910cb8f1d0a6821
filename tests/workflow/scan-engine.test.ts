/**
 * Tests for the scan engine, end to end against the fake API
 */

import { describe, it, expect } from 'vitest';
import { AuthenticationError, ConfigurationError, HttpStatusError } from '../../src/errors.js';
import { TOKEN_PLACEHOLDER } from '../../src/config/defaults.js';
import { createScanEngine, type ScanObserver } from '../../src/workflow/scan-engine.js';
import type { Pattern } from '../../src/types/scan.js';
import {
  createFakeBuildkite,
  makeConfig,
  recordingSleep,
  type FakeBuild,
  type FakeBuildkiteOptions,
} from '../helpers/fake-buildkite.js';
import type { PartialConfig } from '../../src/config/schema.js';

const NEEDLE = 'get_num_new_matched_tokens 96';
const PATTERNS: Pattern[] = [{ text: NEEDLE, is_regex: false }];
const FAILING_LOG = `step 1 ok\nAssertionError: ${NEEDLE} != build_connector_meta\nteardown`;

function setup(
  fake: FakeBuildkiteOptions,
  overrides: PartialConfig = {},
  observer?: ScanObserver,
  patterns: Pattern[] = PATTERNS
) {
  const api = createFakeBuildkite(fake);
  const sleeper = recordingSleep();
  const engine = createScanEngine(makeConfig(overrides), patterns, {
    transport: api.transport,
    sleep: sleeper.sleep,
    observer,
  });
  return { api, engine, delays: sleeper.delays };
}

function prBuild(number: number, jobs: FakeBuild['jobs'] = []): FakeBuild {
  return { number, branch: `pull/${number}`, jobs };
}

describe('ScanEngine', () => {
  it('should scan every PR build and report nothing when no job matches the step', async () => {
    const builds = [1, 2, 3, 4, 5].map((n) => prBuild(n, [{ id: `lint-${n}`, label: 'lint', log: FAILING_LOG }]));
    const { api, engine } = setup({ builds });

    const result = await engine.run();

    expect(result.summary).toEqual({ builds_scanned: 5, jobs_scanned: 0, matches_found: 0 });
    expect(result.matches).toEqual([]);
    expect(result.interrupted).toBe(false);
    expect(api.requests.filter((request) => request.url.endsWith('/log'))).toHaveLength(0);
  });

  it('should record a literal match with build metadata and a snippet', async () => {
    const { engine } = setup({
      builds: [
        { number: 7, branch: 'pull/42', jobs: [{ id: 'job-a', label: 'v1 Test others (cpu)', log: FAILING_LOG }] },
      ],
    });

    const result = await engine.run();

    expect(result.summary).toEqual({ builds_scanned: 1, jobs_scanned: 1, matches_found: 1 });
    expect(result.matches).toEqual([
      {
        build_number: 7,
        branch: 'pull/42',
        state: 'failed',
        created_at: '2026-03-01T10:00:07Z',
        step_label: 'v1 Test others (cpu)',
        web_url: 'https://buildkite.test/acme/ci/builds/7',
        pattern: NEEDLE,
        snippet: FAILING_LOG,
      },
    ]);
  });

  it('should retry a log that fails twice with 500 and then succeeds', async () => {
    const { api, engine, delays } = setup({
      builds: [
        prBuild(3),
        prBuild(2, [{ id: 'job-2', label: 'v1 Test others', log: FAILING_LOG, logFailures: [500, 500] }]),
        prBuild(1),
      ],
    });

    const result = await engine.run();

    expect(api.hits('/builds/2/jobs/job-2/log')).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(result.summary).toEqual({ builds_scanned: 3, jobs_scanned: 1, matches_found: 1 });
    expect(result.diagnostics.retries).toBe(2);
    expect(result.diagnostics.log_failures).toBe(0);
  });

  it('should scan the jobs of a build whose job list fails twice with 500 before succeeding', async () => {
    const { api, engine, delays } = setup({
      builds: [
        prBuild(3),
        {
          ...prBuild(2, [{ id: 'job-2', label: 'v1 Test others', log: FAILING_LOG }]),
          jobsFailures: [500, 500],
        },
        prBuild(1),
      ],
    });

    const result = await engine.run();

    expect(api.hits('/builds/2/jobs')).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(result.diagnostics.builds_skipped).toBe(0);
    expect(result.summary).toEqual({ builds_scanned: 3, jobs_scanned: 1, matches_found: 1 });
  });

  it('should count a log that keeps failing as a failure and keep scanning', async () => {
    const failed: string[] = [];
    const { engine, delays } = setup(
      {
        builds: [
          prBuild(2, [{ id: 'job-2', label: 'v1 Test others', log: 'ok', logFailures: [502, 502, 502] }]),
          prBuild(1, [{ id: 'job-1', label: 'v1 Test others', log: FAILING_LOG }]),
        ],
      },
      {},
      { onLogFailed: (_build, job) => failed.push(job.id) }
    );

    const result = await engine.run();

    expect(delays).toEqual([1000, 2000]);
    expect(failed).toEqual(['job-2']);
    expect(result.diagnostics.log_failures).toBe(1);
    expect(result.summary).toEqual({ builds_scanned: 2, jobs_scanned: 1, matches_found: 1 });
    expect(result.matches.map((match) => match.build_number)).toEqual([1]);
  });

  it('should treat a missing log (404) as scanned without a match, not an error', async () => {
    const { api, engine, delays } = setup({
      builds: [prBuild(1, [{ id: 'job-1', label: 'v1 Test others', log: null }])],
    });

    const result = await engine.run();

    expect(api.hits('/builds/1/jobs/job-1/log')).toBe(1);
    expect(delays).toEqual([]);
    expect(result.summary).toEqual({ builds_scanned: 1, jobs_scanned: 1, matches_found: 0 });
    expect(result.matches).toEqual([]);
    expect(result.diagnostics.logs_missing).toBe(1);
    expect(result.diagnostics.log_failures).toBe(0);
  });

  it('should skip builds whose branch does not match but still count them as examined', async () => {
    const { api, engine } = setup({
      builds: [
        { number: 3, branch: 'main', jobs: [{ id: 'job-3', label: 'v1 Test others', log: FAILING_LOG }] },
        prBuild(2, [{ id: 'job-2', label: 'v1 Test others', log: FAILING_LOG }]),
        { number: 1, branch: 'pr/feature', jobs: [] },
      ],
    });

    const result = await engine.run();

    expect(result.summary.builds_scanned).toBe(2);
    expect(result.diagnostics.builds_examined).toBe(3);
    expect(api.hits('/builds/3/jobs')).toBe(0);
    expect(result.matches.map((match) => match.build_number)).toEqual([2]);
  });

  it('should stop after max_builds builds across pages', async () => {
    const builds = [7, 6, 5, 4, 3, 2, 1].map((n) => prBuild(n));
    const { api, engine } = setup({ builds }, { scan: { max_builds: 3, per_page: 2 } });

    const result = await engine.run();

    const pages = api.requests
      .filter((request) => request.url.endsWith('/builds'))
      .map((request) => request.params?.['page']);
    expect(pages).toEqual([1, 2]);
    expect(result.diagnostics.builds_examined).toBe(3);
    expect(result.summary.builds_scanned).toBe(3);
  });

  it('should scan nothing when max_builds is zero', async () => {
    const { api, engine } = setup({ builds: [prBuild(1)] }, { scan: { max_builds: 0 } });

    const result = await engine.run();

    expect(api.requests).toHaveLength(0);
    expect(result.summary).toEqual({ builds_scanned: 0, jobs_scanned: 0, matches_found: 0 });
  });

  it('should match the step substring case-insensitively only when asked to', async () => {
    const builds = [prBuild(1, [{ id: 'job-1', label: 'V1 TEST OTHERS', log: FAILING_LOG }])];

    const sensitive = await setup({ builds }).engine.run();
    const insensitive = await setup({ builds }, { scan: { ignore_case_steps: true } }).engine.run();

    expect(sensitive.summary.jobs_scanned).toBe(0);
    expect(insensitive.summary.jobs_scanned).toBe(1);
  });

  it('should fall back to the job name when the label is missing', async () => {
    const { engine } = setup({
      builds: [prBuild(1, [{ id: 'job-1', label: null, name: 'v1 Test others', log: FAILING_LOG }])],
    });

    const result = await engine.run();

    expect(result.matches.map((match) => match.step_label)).toEqual(['v1 Test others']);
  });

  it('should skip a build whose job list cannot be fetched', async () => {
    const skipped: number[] = [];
    const { engine, delays } = setup(
      {
        builds: [
          { ...prBuild(2), jobsStatus: 503 },
          prBuild(1, [{ id: 'job-1', label: 'v1 Test others', log: FAILING_LOG }]),
        ],
      },
      {},
      { onBuildSkipped: (build) => skipped.push(build.number) }
    );

    const result = await engine.run();

    expect(skipped).toEqual([2]);
    expect(delays).toEqual([1000, 2000]);
    expect(result.diagnostics.builds_skipped).toBe(1);
    expect(result.summary).toEqual({ builds_scanned: 2, jobs_scanned: 1, matches_found: 1 });
  });

  it('should not retry a 403 on the job list', async () => {
    const { engine, delays } = setup({ builds: [{ ...prBuild(1), jobsStatus: 403 }] });

    const result = await engine.run();

    expect(delays).toEqual([]);
    expect(result.diagnostics.builds_skipped).toBe(1);
  });

  it('should fail the whole scan on 401', async () => {
    const { engine } = setup({ builds: [prBuild(1)], buildsStatus: 401 });

    await expect(engine.run()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('should stop fetching logs once one of them answers 401', async () => {
    const jobs = ['a', 'b', 'c', 'd'].map((id) => ({
      id,
      label: `v1 Test others ${id}`,
      log: FAILING_LOG,
      logFailures: [401],
    }));
    const { api, engine } = setup({ builds: [prBuild(2, jobs), prBuild(1, jobs)] });

    await expect(engine.run()).rejects.toBeInstanceOf(AuthenticationError);
    expect(api.requests.filter((request) => request.url.endsWith('/log'))).toHaveLength(1);
    expect(api.hits('/builds/1/jobs')).toBe(0);
  });

  it('should stop fetching queued logs after a 401 when downloads run in parallel', async () => {
    const jobs = ['a', 'b', 'c', 'd', 'e'].map((id) => ({
      id,
      label: `v1 Test others ${id}`,
      log: FAILING_LOG,
      logFailures: [401],
    }));
    const { api, engine } = setup({ builds: [prBuild(1, jobs)] }, { scan: { concurrency: 2 } });

    await expect(engine.run()).rejects.toBeInstanceOf(AuthenticationError);
    expect(api.requests.filter((request) => request.url.endsWith('/log'))).toHaveLength(2);
  });

  it('should fail the whole scan when the build list keeps failing', async () => {
    const { api, engine, delays } = setup({ builds: [prBuild(1)], buildsStatus: 500 });

    await expect(engine.run()).rejects.toBeInstanceOf(HttpStatusError);
    expect(api.hits('/builds')).toBe(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('should report an unknown pipeline as a configuration error', async () => {
    const { engine } = setup({ builds: [], buildsStatus: 404 });

    await expect(engine.run()).rejects.toThrow('Pipeline acme/ci not found');
  });

  it('should give the same result when run twice against the same data', async () => {
    const { engine } = setup({
      builds: [
        prBuild(2, [{ id: 'job-2', label: 'v1 Test others', log: FAILING_LOG }]),
        prBuild(1, [{ id: 'job-1', label: 'v1 Test others', log: 'passed' }]),
      ],
    });

    const first = await engine.run();
    const second = await engine.run();

    expect(second).toEqual(first);
  });

  it('should hold at most one log at a time when sequential', async () => {
    let live = 0;
    let maxLive = 0;
    const jobs = ['a', 'b', 'c'].map((id) => ({ id, label: `v1 Test others ${id}`, log: FAILING_LOG }));
    const { engine } = setup({ builds: [prBuild(1, jobs), prBuild(2, jobs)] }, {}, {
      onLogFetched: () => {
        live++;
        maxLive = Math.max(maxLive, live);
      },
      onLogReleased: () => {
        live--;
      },
    });

    const result = await engine.run();

    expect(result.summary.jobs_scanned).toBe(6);
    expect(maxLive).toBe(1);
    expect(live).toBe(0);
  });

  it('should keep job order when logs are fetched concurrently', async () => {
    const jobs = [
      { id: 'a', label: 'v1 Test others a', log: FAILING_LOG, logDelayMs: 30 },
      { id: 'b', label: 'v1 Test others b', log: FAILING_LOG, logDelayMs: 20 },
      { id: 'c', label: 'v1 Test others c', log: FAILING_LOG, logDelayMs: 10 },
    ];
    const { engine } = setup({ builds: [prBuild(1, jobs)] }, { scan: { concurrency: 3 } });

    const result = await engine.run();

    expect(result.matches.map((match) => match.step_label)).toEqual([
      'v1 Test others a',
      'v1 Test others b',
      'v1 Test others c',
    ]);
  });

  it('should return partial results when interrupted', async () => {
    const controller = new AbortController();
    const builds = [3, 2, 1].map((n) => prBuild(n, [{ id: `job-${n}`, label: 'v1 Test others', log: FAILING_LOG }]));
    const { engine } = setup({ builds }, {}, {
      onMatch: () => controller.abort(),
    });

    const result = await engine.run(controller.signal);

    expect(result.interrupted).toBe(true);
    expect(result.summary).toEqual({ builds_scanned: 1, jobs_scanned: 1, matches_found: 1 });
    expect(result.matches[0]?.build_number).toBe(3);
  });
});

describe('createScanEngine', () => {
  const api = createFakeBuildkite({ builds: [] });

  it('should require a token before any request', () => {
    expect(() =>
      createScanEngine(makeConfig({ provider: { token: '  ' } }), PATTERNS, { transport: api.transport })
    ).toThrow('API token not set. Provide --token or set BK_TOKEN.');
    expect(() =>
      createScanEngine(makeConfig({ provider: { token: TOKEN_PLACEHOLDER } }), PATTERNS, { transport: api.transport })
    ).toThrow(ConfigurationError);
    expect(api.requests).toHaveLength(0);
  });

  it('should reject an invalid branch regex', () => {
    expect(() =>
      createScanEngine(makeConfig({ scan: { branch_regex: '(' } }), PATTERNS, { transport: api.transport })
    ).toThrow(/^Invalid branch regex "\("/);
  });

  it('should warn about invalid regex patterns and fail when none is usable', () => {
    const warnings: string[] = [];
    const patterns: Pattern[] = [{ text: '[unclosed', is_regex: true }];

    expect(() =>
      createScanEngine(makeConfig(), patterns, {
        transport: api.transport,
        observer: { onWarning: (message) => warnings.push(message) },
      })
    ).toThrow('No usable search patterns');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Invalid regex pattern "\[unclosed": /);
  });
});
