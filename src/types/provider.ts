/**
 * CI provider payload definitions
 * Zod schemas for the subset of Buildkite REST responses the scanner reads.
 * Unknown keys are stripped on parse, so only these fields stay in memory.
 */

import { z } from 'zod';

const nullableText = (fallback: string) =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? fallback);

/**
 * One CI run of the pipeline
 */
export const BuildSchema = z.object({
  id: z.string(),
  number: z.number().int(),
  branch: nullableText(''),
  state: nullableText('unknown'),
  created_at: nullableText(''),
  web_url: nullableText(''),
});
export type Build = z.infer<typeof BuildSchema>;

export const BuildPageSchema = z.array(BuildSchema);

/**
 * One step of a build. Waiter and trigger jobs usually carry neither label nor name.
 */
export const JobSchema = z.object({
  id: z.string(),
  label: z.string().nullish(),
  name: z.string().nullish(),
  state: nullableText('unknown'),
});
export type Job = z.infer<typeof JobSchema>;

/**
 * The job list endpoint answers with an array; a build payload with
 * an embedded `jobs` array is accepted as well.
 */
export const JobListSchema = z.union([
  z.array(JobSchema),
  z.object({ jobs: z.array(JobSchema).default([]) }).transform((build) => build.jobs),
]);

/**
 * Human-readable step label: label first, name as fallback
 */
export function getJobLabel(job: Pick<Job, 'label' | 'name'>): string {
  return job.label || job.name || '';
}
