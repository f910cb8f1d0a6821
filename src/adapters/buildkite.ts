/**
 * Buildkite REST client
 * Typed, read-only access to the three endpoints the scanner needs.
 */

import type { z } from 'zod';
import { ConfigurationError, FlakeScanError } from '../errors.js';
import {
  BuildPageSchema,
  JobListSchema,
  type Build,
  type Job,
} from '../types/provider.js';
import type { HttpClient } from './http-client.js';

/**
 * One page of the builds listing
 */
export interface BuildPage {
  builds: Build[];
  /** Whether the provider advertised a next page */
  hasNext: boolean;
}

/**
 * Read-only view of a CI provider, as consumed by the scan engine
 */
export interface CiProvider {
  listBuildsPage(page: number, perPage: number, signal?: AbortSignal): Promise<BuildPage>;
  /** Jobs of one build; empty when the build has no job list */
  getJobs(buildNumber: number, signal?: AbortSignal): Promise<Job[]>;
  /** Plain-text job log, or null when the provider has none (404) */
  getJobLog(buildNumber: number, jobId: string, signal?: AbortSignal): Promise<string | null>;
}

export interface BuildkiteClientOptions {
  org: string;
  pipeline: string;
  /** Upper bound on a downloaded log, in bytes */
  maxLogBytes?: number;
}

/**
 * Parse an RFC 8288 Link header into a rel -> URL map
 */
export function parseLinkHeader(header: string | undefined): Record<string, string> {
  const links: Record<string, string> = {};
  if (!header) return links;

  for (const part of header.split(',')) {
    const match = part.match(/<([^>]*)>\s*;\s*rel="?([^";]+)"?/);
    if (match) {
      links[match[2]] = match[1];
    }
  }

  return links;
}

/**
 * Parse a JSON body against a schema
 */
function parseBody<T extends z.ZodTypeAny>(body: string, schema: T, context: string): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (error) {
    throw new FlakeScanError(
      `${context}: response is not valid JSON`,
      'INVALID_RESPONSE',
      error instanceof Error ? error : undefined
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    throw new FlakeScanError(
      `${context}: unexpected response shape${where}: ${issue?.message ?? 'invalid'}`,
      'INVALID_RESPONSE'
    );
  }

  return result.data;
}

export class BuildkiteClient implements CiProvider {
  private readonly pipelinePath: string;

  constructor(
    private readonly http: HttpClient,
    private readonly options: BuildkiteClientOptions
  ) {
    this.pipelinePath =
      `/organizations/${encodeURIComponent(options.org)}` +
      `/pipelines/${encodeURIComponent(options.pipeline)}`;
  }

  async listBuildsPage(page: number, perPage: number, signal?: AbortSignal): Promise<BuildPage> {
    const response = await this.http.get(`${this.pipelinePath}/builds`, {
      params: { page, per_page: perPage },
      headers: { Accept: 'application/json' },
      signal,
    });

    if (response.notFound) {
      throw new ConfigurationError(
        `Pipeline ${this.options.org}/${this.options.pipeline} not found`
      );
    }

    const builds = parseBody(response.body, BuildPageSchema, `Builds page ${page}`);
    const links = parseLinkHeader(response.headers['link']);

    return { builds, hasNext: links['next'] !== undefined };
  }

  async getJobs(buildNumber: number, signal?: AbortSignal): Promise<Job[]> {
    const response = await this.http.get(`${this.pipelinePath}/builds/${buildNumber}/jobs`, {
      headers: { Accept: 'application/json' },
      signal,
    });

    if (response.notFound) {
      return [];
    }

    return parseBody(response.body, JobListSchema, `Jobs of build #${buildNumber}`);
  }

  async getJobLog(buildNumber: number, jobId: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.http.get(
      `${this.pipelinePath}/builds/${buildNumber}/jobs/${encodeURIComponent(jobId)}/log`,
      {
        params: { format: 'txt' },
        headers: { Accept: 'text/plain' },
        maxContentLength: this.options.maxLogBytes,
        signal,
      }
    );

    return response.notFound ? null : response.body;
  }
}
