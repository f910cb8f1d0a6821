/**
 * Scan command
 * Scans recent builds for log patterns and prints the report
 */

import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import type { HttpTransport, SleepFn } from '../../adapters/http-client.js';
import { loadConfig, type Environment, type PartialConfig } from '../../config/index.js';
import { resolvePatterns } from '../../config/patterns.js';
import { getErrorMessage } from '../../errors.js';
import type { ScanResult } from '../../types/scan.js';
import { createScanEngine, type ScanObserver } from '../../workflow/scan-engine.js';
import { ScanLogger, createLoggingObserver, type LogSink } from '../../workflow/scan-logger.js';
import { renderHumanReport, renderJsonReport } from '../../workflow/scan-reporter.js';
import {
  startSpinner,
  stopSpinner,
  updateSpinner,
  withSpinnerPaused,
} from '../output.js';

/**
 * Process exit statuses
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  FATAL: 1,
  INTERRUPTED: 130,
} as const;

/**
 * Options as parsed by commander
 */
export const ScanCommandOptionsSchema = z.object({
  token: z.string().optional(),
  org: z.string().optional(),
  pipeline: z.string().optional(),
  apiUrl: z.string().optional(),
  branchRegex: z.string().optional(),
  stepSubstr: z.string().optional(),
  ignoreCase: z.boolean().optional(),
  maxBuilds: z.number().int().optional(),
  concurrency: z.number().int().optional(),
  patternsFile: z.string().optional(),
  pattern: z.array(z.string()).optional(),
  regex: z.boolean().optional(),
  snippetWindow: z.number().int().optional(),
  json: z.boolean().optional(),
  verbose: z.boolean().optional(),
});
export type ScanCommandOptions = z.infer<typeof ScanCommandOptionsSchema>;

/**
 * Everything a scan touches outside its options; defaults are the real process
 */
export interface ScanRunContext {
  cwd?: string;
  homeDir?: string;
  env?: Environment;
  transport?: HttpTransport;
  sleep?: SleepFn;
  signal?: AbortSignal;
  /** Report output (default: stdout) */
  stdout?: (text: string) => void;
  /** Diagnostic output (default: stderr) */
  stderr?: LogSink;
  /** Show a spinner while scanning */
  interactive?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Map command options onto the configuration shape. Unset options stay
 * undefined so lower-priority sources keep their values.
 */
export function buildOverrides(options: ScanCommandOptions): PartialConfig {
  return {
    provider: {
      token: options.token,
      org: options.org,
      pipeline: options.pipeline,
      api_url: options.apiUrl,
    },
    scan: {
      branch_regex: options.branchRegex,
      step_substr: options.stepSubstr,
      ignore_case_steps: options.ignoreCase,
      max_builds: options.maxBuilds,
      concurrency: options.concurrency,
    },
    patterns: {
      list: options.pattern,
      file: options.patternsFile,
      regex: options.regex,
      snippet_window: options.snippetWindow,
    },
    output: {
      json: options.json,
      verbose: options.verbose,
    },
  };
}

/**
 * Forward progress to the spinner on top of the logging observer
 */
function withSpinner(observer: ScanObserver): ScanObserver {
  let builds = 0;
  return {
    ...observer,
    onBuildStart: (build) => {
      builds++;
      observer.onBuildStart?.(build);
      updateSpinner(`Scanning build #${build.number} (${builds} scanned)...`);
    },
  };
}

/**
 * Run a scan and print the report.
 *
 * @returns Process exit status
 */
export async function runScan(options: ScanCommandOptions, context: ScanRunContext = {}): Promise<number> {
  const stdout = context.stdout ?? ((text: string) => process.stdout.write(text));
  const sink = context.stderr;
  const makeLogger = (verbose: boolean) =>
    new ScanLogger({
      verbose,
      color: sink === undefined,
      sink: sink ?? ((line) => withSpinnerPaused(() => process.stderr.write(`${line}\n`))),
    });

  let logger = makeLogger(options.verbose ?? false);

  try {
    const loaded = await loadConfig({
      cwd: context.cwd,
      homeDir: context.homeDir,
      env: context.env,
      overrides: buildOverrides(options),
    });
    const { config } = loaded;
    logger = makeLogger(config.output.verbose);

    logger.debug('config', loaded.configPath ? `Config file: ${loaded.configPath}` : 'No project config file');
    if (loaded.envPath) {
      logger.debug('config', `Loaded environment from ${loaded.envPath}`);
    }

    const patterns = await resolvePatterns(config.patterns, {
      cwd: context.cwd,
      onWarning: (message) => logger.warn('config', message),
    });

    const showSpinner = (context.interactive ?? false) && !config.output.json && !config.output.verbose;
    const loggingObserver = createLoggingObserver(logger);
    const engine = createScanEngine(config, patterns, {
      transport: context.transport,
      sleep: context.sleep,
      observer: showSpinner ? withSpinner(loggingObserver) : loggingObserver,
    });

    logger.info(
      'builds',
      `Scanning up to ${config.scan.max_builds} builds of ${config.provider.org}/${config.provider.pipeline}...`
    );
    if (showSpinner) {
      startSpinner('Listing builds...');
    }

    let result: ScanResult;
    try {
      result = await engine.run(context.signal);
    } finally {
      if (showSpinner) {
        stopSpinner();
      }
    }

    const d = result.diagnostics;
    logger.debug(
      'report',
      `Examined ${d.builds_examined} builds (${d.builds_skipped} skipped), ` +
        `fetched ${d.logs_fetched} logs (${d.logs_missing} missing, ${d.log_failures} failed), ${d.retries} retries`
    );

    if (config.output.json) {
      stdout(`${renderJsonReport(result)}\n`);
    } else {
      stdout(`${renderHumanReport(result).join('\n')}\n`);
    }

    if (result.interrupted) {
      logger.warn('report', 'Scan interrupted by user.');
      return EXIT_CODES.INTERRUPTED;
    }
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error('report', getErrorMessage(error));
    return EXIT_CODES.FATAL;
  }
}

/**
 * Create the scan command
 */
export function createScanCommand(): Command {
  const scan = new Command('scan')
    .description('Scan recent builds for log patterns (flakes)')
    .option('--token <token>', 'Buildkite API token (env: BK_TOKEN)')
    .option('--org <slug>', 'Organization slug (env: BK_ORG, default: vllm)')
    .option('--pipeline <slug>', 'Pipeline slug (env: BK_PIPELINE, default: ci)')
    .option('--api-url <url>', 'API base URL (env: BK_API_URL)')
    .option('--branch-regex <regex>', 'Regex to filter branches (env: BK_BRANCH_REGEX, default: ^pull/|^pr/)')
    .option('--step-substr <text>', "Substring of job label to match (env: BK_STEP_SUBSTR, default: 'v1 Test others')")
    .option('-i, --ignore-case', 'Match the step substring case-insensitively')
    .option('--max-builds <n>', 'Maximum builds to scan (env: BK_MAX_BUILDS, default: 200)', parseInteger)
    .option('--concurrency <n>', 'Parallel log downloads (env: BK_CONCURRENCY, default: 1)', parseInteger)
    .option('--patterns-file <path>', 'File with patterns to search, one per line (env: BK_PATTERNS_FILE)')
    .option('-p, --pattern <text>', 'Pattern to search for; repeat for several', collect)
    .option('--regex', 'Treat patterns as regex (default: literal search)')
    .option('--snippet-window <chars>', 'Context characters on each side of a match (default: 80)', parseInteger)
    .option('--json', 'Output results as JSON')
    .option('-v, --verbose', 'Show per-build progress and retry diagnostics')
    .action(async (rawOptions: unknown) => {
      const options = ScanCommandOptionsSchema.parse(rawOptions);
      const controller = new AbortController();

      const onSignal = () => {
        // A second interrupt does not wait for the partial report
        if (controller.signal.aborted) {
          process.exit(EXIT_CODES.INTERRUPTED);
        }
        controller.abort();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        process.exitCode = await runScan(options, {
          signal: controller.signal,
          interactive: process.stderr.isTTY === true,
        });
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });

  return scan;
}
