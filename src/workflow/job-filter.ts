/**
 * Job filter
 * Keeps the jobs of a build whose step label contains the configured substring.
 */

import type { CiProvider } from '../adapters/buildkite.js';
import { getJobLabel, type Build, type Job } from '../types/provider.js';

export interface StepFilter {
  /** Empty string matches every job */
  substring: string;
  ignoreCase: boolean;
}

/**
 * Whether a job's label (or name, when the label is absent) contains the substring
 */
export function matchesStep(job: Pick<Job, 'label' | 'name'>, filter: StepFilter): boolean {
  const label = getJobLabel(job);

  if (filter.ignoreCase) {
    return label.toLowerCase().includes(filter.substring.toLowerCase());
  }
  return label.includes(filter.substring);
}

/**
 * Fetch a build's jobs and keep the matching ones, in provider order.
 * Failures propagate; the caller decides whether to skip the build.
 */
export async function jobsForBuild(
  provider: Pick<CiProvider, 'getJobs'>,
  build: Build,
  filter: StepFilter,
  signal?: AbortSignal
): Promise<Job[]> {
  const jobs = await provider.getJobs(build.number, signal);
  return jobs.filter((job) => matchesStep(job, filter));
}
