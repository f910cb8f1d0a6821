/**
 * Tests for pattern matching and snippet extraction
 */

import { describe, it, expect } from 'vitest';
import {
  LogMatcher,
  cleanSnippet,
  compilePatterns,
  extractSnippet,
  searchLog,
} from '../../src/workflow/log-matcher.js';
import type { Build, Job } from '../../src/types/provider.js';

const BUILD: Build = {
  id: 'build-12',
  number: 12,
  branch: 'pull/12',
  state: 'failed',
  created_at: '2026-03-01T00:00:00Z',
  web_url: 'https://buildkite.test/acme/ci/builds/12',
};

const JOB: Job = { id: 'job-1', label: 'v1 Test others', name: null, state: 'failed' };

function literal(...texts: string[]) {
  return compilePatterns(texts.map((text) => ({ text, is_regex: false }))).compiled;
}

describe('compilePatterns', () => {
  it('should find literal text without regex interpretation', () => {
    const [pattern] = literal('a.b (c)');

    expect(pattern?.find('xx a.b (c) yy')).toEqual({ index: 3, length: 7 });
    expect(pattern?.find('axb c')).toBeNull();
  });

  it('should compile regex patterns in multiline mode', () => {
    const { compiled } = compilePatterns([{ text: '^FAILED .*::test_x\\b', is_regex: true }]);

    expect(compiled[0]?.find('collected 3 items\nFAILED tests/a.py::test_x - boom')).toEqual({
      index: 18,
      length: 25,
    });
    expect(compiled[0]?.find('FAILED tests/a.py::test_xyz')).toBeNull();
  });

  it('should reject invalid regexes and keep the rest', () => {
    const { compiled, rejected } = compilePatterns([
      { text: '(', is_regex: true },
      { text: '(', is_regex: false },
    ]);

    expect(compiled.map((pattern) => pattern.source)).toEqual([{ text: '(', is_regex: false }]);
    expect(rejected.map((entry) => entry.pattern.text)).toEqual(['(']);
  });
});

describe('cleanSnippet', () => {
  it('should strip timestamp markers and ANSI sequences', () => {
    expect(cleanSnippet('\u001b_bk;t=1700000000000\u0007\u001b[31mERROR\u001b[0m boom')).toBe('ERROR boom');
  });

  it('should normalize line endings and collapse blank lines', () => {
    expect(cleanSnippet('  one\r\n\r\n\r\ntwo\rthree\n \n  \nfour  ')).toBe('one\ntwo\nthree\nfour');
  });
});

describe('extractSnippet', () => {
  it('should add an ellipsis on each clipped side', () => {
    const text = `${'a'.repeat(100)}NEEDLE${'b'.repeat(100)}`;

    expect(extractSnippet(text, { index: 100, length: 6 }, 10)).toBe(`...${'a'.repeat(10)}NEEDLE${'b'.repeat(10)}...`);
  });

  it('should omit the ellipsis where the window reaches the edge of the log', () => {
    expect(extractSnippet('NEEDLE tail', { index: 0, length: 6 }, 3)).toBe('NEEDLE ta...');
    expect(extractSnippet('head NEEDLE', { index: 5, length: 6 }, 80)).toBe('head NEEDLE');
  });

  it('should not split a surrogate pair at either edge of the window', () => {
    const emoji = '\u{1F600}';

    expect(extractSnippet(`${emoji}bNEEDLEb${emoji}`, { index: 3, length: 6 }, 2)).toBe(`${emoji}bNEEDLEb${emoji}`);
    expect(extractSnippet(`xx${emoji}bNEEDLEb${emoji}yy`, { index: 5, length: 6 }, 2)).toBe(
      `...${emoji}bNEEDLEb${emoji}...`
    );
  });
});

describe('searchLog', () => {
  it('should report the first occurrence of each matching pattern in pattern order', () => {
    const log = 'first boom here\nsecond boom there\nwarning: flaky';

    const hits = searchLog(log, literal('warning', 'boom', 'absent'), 5);

    expect(hits).toEqual([
      { pattern: 'warning', snippet: '...here\nwarning: fla...' },
      { pattern: 'boom', snippet: '...irst boom here...' },
    ]);
  });
});

describe('LogMatcher', () => {
  it('should build match records from the log of a job', async () => {
    const provider = { getJobLog: async () => 'setup\nget_num_new_matched_tokens 96\ndone' };
    const matcher = new LogMatcher(provider, literal('get_num_new_matched_tokens 96'));

    const records = await matcher.search(BUILD, JOB);

    expect(records).toEqual([
      {
        build_number: 12,
        branch: 'pull/12',
        state: 'failed',
        created_at: '2026-03-01T00:00:00Z',
        step_label: 'v1 Test others',
        web_url: 'https://buildkite.test/acme/ci/builds/12',
        pattern: 'get_num_new_matched_tokens 96',
        snippet: 'setup\nget_num_new_matched_tokens 96\ndone',
      },
    ]);
  });

  it('should return an empty list when nothing matches', async () => {
    const matcher = new LogMatcher({ getJobLog: async () => 'all green' }, literal('boom'));

    expect(await matcher.search(BUILD, JOB)).toEqual([]);
  });

  it('should return null for a missing log without firing lifecycle hooks', async () => {
    const events: string[] = [];
    const matcher = new LogMatcher({ getJobLog: async () => null }, literal('boom'), {
      hooks: {
        onLogFetched: () => events.push('fetched'),
        onLogReleased: () => events.push('released'),
      },
    });

    expect(await matcher.search(BUILD, JOB)).toBeNull();
    expect(events).toEqual([]);
  });

  it('should release every fetched log', async () => {
    const events: string[] = [];
    const matcher = new LogMatcher({ getJobLog: async () => 'boom' }, literal('boom'), {
      hooks: {
        onLogFetched: (_build, job, length) => events.push(`fetched ${job.id} ${length}`),
        onLogReleased: (_build, job) => events.push(`released ${job.id}`),
      },
    });

    await matcher.search(BUILD, JOB);

    expect(events).toEqual(['fetched job-1 4', 'released job-1']);
  });

  it('should propagate fetch failures', async () => {
    const matcher = new LogMatcher(
      {
        getJobLog: async () => {
          throw new Error('HTTP 500');
        },
      },
      literal('boom')
    );

    await expect(matcher.search(BUILD, JOB)).rejects.toThrow('HTTP 500');
  });
});
