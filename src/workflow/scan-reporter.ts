/**
 * Scan reporter
 * Renders a scan result as a human-readable block report or as JSON.
 */

import type { MatchRecord, ScanReport, ScanResult, ScanSummary } from '../types/scan.js';

/**
 * Final line of the human report
 */
export function formatSummaryLine(summary: ScanSummary): string {
  return `Scanned ${summary.builds_scanned} builds, ${summary.jobs_scanned} jobs, ${summary.matches_found} matches found.`;
}

/**
 * Structured report with a fixed key order
 */
export function buildReport(result: Pick<ScanResult, 'summary' | 'matches'>): ScanReport {
  return {
    summary: {
      builds_scanned: result.summary.builds_scanned,
      jobs_scanned: result.summary.jobs_scanned,
      matches_found: result.summary.matches_found,
    },
    matches: result.matches.map((match) => ({
      build_number: match.build_number,
      branch: match.branch,
      state: match.state,
      created_at: match.created_at,
      step_label: match.step_label,
      web_url: match.web_url,
      pattern: match.pattern,
      snippet: match.snippet,
    })),
  };
}

export function renderJsonReport(result: Pick<ScanResult, 'summary' | 'matches'>): string {
  return JSON.stringify(buildReport(result), null, 2);
}

function renderMatch(match: MatchRecord): string[] {
  const lines = [
    `- #${match.build_number} [${match.branch}] (${match.state}) ${match.step_label}`,
    `  URL: ${match.web_url}`,
    `  Pattern: ${match.pattern}`,
    '  Snippet:',
  ];

  for (const line of match.snippet.split('\n')) {
    lines.push(`    ${line}`);
  }

  return lines;
}

/**
 * Human report, one entry per line
 */
export function renderHumanReport(result: ScanResult): string[] {
  const lines: string[] = [];

  if (result.matches.length === 0) {
    lines.push('No matching patterns found in the scanned builds.');
  } else {
    lines.push(`Found ${result.matches.length} matching failure(s):`);
    for (const match of result.matches) {
      lines.push('');
      lines.push(...renderMatch(match));
    }
  }

  lines.push('');
  if (result.interrupted) {
    lines.push('Scan interrupted; results are partial.');
  }
  lines.push(formatSummaryLine(result.summary));

  return lines;
}
