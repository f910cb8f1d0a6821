/**
 * Build lister
 *
 * Pages through the pipeline's builds, most recent first, until `maxBuilds`
 * builds have been examined or the provider runs out of pages. The branch
 * regex only decides which examined builds are yielded; it never moves the
 * page cursor.
 */

import { ConfigurationError, getErrorMessage, throwIfAborted } from '../errors.js';
import type { CiProvider } from '../adapters/buildkite.js';
import type { Build } from '../types/provider.js';

export interface BuildListerOptions {
  maxBuilds: number;
  /** null keeps every branch */
  branchRegex: RegExp | null;
  perPage: number;
  signal?: AbortSignal;
  /** Called for every build read from the provider, before filtering */
  onBuildExamined?: (build: Build, kept: boolean) => void;
}

/**
 * Compile the branch filter. An empty source disables filtering.
 */
export function compileBranchRegex(source: string): RegExp | null {
  if (source === '') return null;

  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigurationError(`Invalid branch regex "${source}": ${getErrorMessage(error)}`);
  }
}

/**
 * Lazily list builds. Forward-only: a new call starts again from page 1.
 */
export async function* listBuilds(
  provider: Pick<CiProvider, 'listBuildsPage'>,
  options: BuildListerOptions
): AsyncGenerator<Build, void, undefined> {
  const { maxBuilds, branchRegex, perPage, signal } = options;
  let examined = 0;
  let page = 1;

  while (examined < maxBuilds) {
    throwIfAborted(signal);
    const { builds, hasNext } = await provider.listBuildsPage(page, perPage, signal);

    if (builds.length === 0) return;

    for (const build of builds) {
      if (examined >= maxBuilds) return;
      examined++;

      const kept = branchRegex === null || branchRegex.test(build.branch);
      options.onBuildExamined?.(build, kept);

      if (kept) {
        yield build;
      }
    }

    if (!hasNext) return;
    page++;
  }
}
