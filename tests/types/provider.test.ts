/**
 * Tests for provider payload schemas
 */

import { describe, it, expect } from 'vitest';
import { BuildSchema, JobListSchema, JobSchema, getJobLabel } from '../../src/types/index.js';

describe('BuildSchema', () => {
  it('should drop fields the scanner does not read', () => {
    const build = BuildSchema.parse({
      id: 'b1',
      number: 3,
      branch: 'pull/3',
      state: 'failed',
      created_at: '2026-03-01T00:00:00Z',
      web_url: 'https://buildkite.test/acme/ci/builds/3',
      commit: 'abc123',
      jobs: [{ id: 'j1' }],
    });

    expect(Object.keys(build)).toEqual(['id', 'number', 'branch', 'state', 'created_at', 'web_url']);
  });

  it('should require a build number', () => {
    expect(BuildSchema.safeParse({ id: 'b1', branch: 'main' }).success).toBe(false);
  });
});

describe('JobSchema', () => {
  it('should default a missing state and drop the job type', () => {
    expect(JobSchema.parse({ id: 'j1', type: 'waiter', label: 'lint' })).toEqual({
      id: 'j1',
      label: 'lint',
      state: 'unknown',
    });
  });
});

describe('JobListSchema', () => {
  it('should accept an array or a build with jobs', () => {
    expect(JobListSchema.parse([{ id: 'j1' }]).map((job) => job.id)).toEqual(['j1']);
    expect(JobListSchema.parse({ jobs: [{ id: 'j2' }] }).map((job) => job.id)).toEqual(['j2']);
    expect(JobListSchema.parse({ number: 1 })).toEqual([]);
  });
});

describe('getJobLabel', () => {
  it('should prefer the label, then the name', () => {
    expect(getJobLabel({ label: 'a', name: 'b' })).toBe('a');
    expect(getJobLabel({ label: null, name: 'b' })).toBe('b');
    expect(getJobLabel({})).toBe('');
  });
});
