/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  provider: {
    api_url: 'https://api.buildkite.com/v2',
    token: '',
    org: 'vllm',
    pipeline: 'ci',
  },
  scan: {
    branch_regex: '^pull/|^pr/',
    step_substr: 'v1 Test others',
    ignore_case_steps: false,
    max_builds: 200,
    per_page: 50,
    concurrency: 1,
    throttle_ms: 300,
  },
  patterns: {
    list: [],
    regex: false,
    snippet_window: 80,
  },
  http: {
    timeout_ms: 30_000,
    max_log_bytes: 50 * 1024 * 1024,
    retry: {
      max_attempts: 3,
      base_delay_ms: 1000,
      max_delay_ms: 60_000,
      rate_limit_multiplier: 5,
    },
  },
  output: {
    json: false,
    verbose: false,
  },
};

/**
 * Patterns searched when neither --pattern nor a patterns file supplies any
 */
export const DEFAULT_PATTERNS: readonly string[] = [
  'FAILED .*::test_multi_shared_storage_connector_consistency\\b',
  "At index 2 diff: 'get_num_new_matched_tokens 96' != 'build_connector_meta'",
  'get_num_new_matched_tokens 96',
];

/**
 * Project config file names searched by cosmiconfig
 */
export const CONFIG_FILE_NAMES = [
  'flake-scan.config.yaml',
  'flake-scan.config.yml',
  '.flake-scanrc.yaml',
  '.flake-scanrc.yml',
  '.flake-scanrc',
];

/**
 * Global config directory path
 */
export const GLOBAL_CONFIG_DIR = '.flake-scan';

/**
 * Config file name in the global directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  TOKEN: 'BK_TOKEN',
  ORG: 'BK_ORG',
  PIPELINE: 'BK_PIPELINE',
  BRANCH_REGEX: 'BK_BRANCH_REGEX',
  STEP_SUBSTR: 'BK_STEP_SUBSTR',
  MAX_BUILDS: 'BK_MAX_BUILDS',
  PATTERNS_FILE: 'BK_PATTERNS_FILE',
  CONCURRENCY: 'BK_CONCURRENCY',
  API_URL: 'BK_API_URL',
  VERBOSE: 'BK_VERBOSE',
} as const;

/**
 * Placeholder token value shipped in sample env files
 */
export const TOKEN_PLACEHOLDER = '<PUT_YOUR_TOKEN_HERE>';

/**
 * CLI version
 */
export const CLI_VERSION = '1.0.0';
