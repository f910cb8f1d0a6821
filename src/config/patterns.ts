/**
 * Search pattern resolution
 * Explicit patterns win over the patterns file, which wins over the defaults.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { Pattern } from '../types/scan.js';
import { DEFAULT_PATTERNS } from './defaults.js';
import type { PatternSettings } from './schema.js';

/**
 * Non-empty, trimmed lines that do not start with '#'
 */
export function parsePatternLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * Read a patterns file. Null when the file cannot be read.
 */
export async function loadPatternsFile(file: string): Promise<string[] | null> {
  try {
    const content = await fs.readFile(file, 'utf-8');
    return parsePatternLines(content);
  } catch {
    return null;
  }
}

/**
 * Resolve the patterns of a scan. A missing or empty file falls back to
 * the defaults, reported through `onWarning`.
 */
export async function resolvePatterns(
  settings: PatternSettings,
  options: { cwd?: string; onWarning?: (message: string) => void } = {}
): Promise<Pattern[]> {
  const toPatterns = (texts: readonly string[]): Pattern[] =>
    texts.map((text) => ({ text, is_regex: settings.regex }));

  if (settings.list.length > 0) {
    return toPatterns(settings.list);
  }

  if (settings.file) {
    const file = path.resolve(options.cwd ?? process.cwd(), settings.file);
    const lines = await loadPatternsFile(file);

    if (lines === null) {
      options.onWarning?.(`Patterns file not found: ${file}; using default patterns`);
    } else if (lines.length === 0) {
      options.onWarning?.(`Patterns file is empty: ${file}; using default patterns`);
    } else {
      return toPatterns(lines);
    }
  }

  return toPatterns(DEFAULT_PATTERNS);
}
