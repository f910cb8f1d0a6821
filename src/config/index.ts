/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import dotenv from 'dotenv';
import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import { ConfigurationError, getErrorMessage } from '../errors.js';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

export type Environment = Record<string, string | undefined>;

/**
 * Where configuration came from
 */
export interface LoadConfigOptions {
  /** Directory searched for project config and .env (default: process.cwd()) */
  cwd?: string;
  /** Home directory holding the global config (default: os.homedir()) */
  homeDir?: string;
  /** Environment variables (default: process.env) */
  env?: Environment;
  /** Highest-priority values, typically CLI flags */
  overrides?: PartialConfig;
}

export interface LoadedConfig {
  config: Config;
  /** Project config file in effect, if any */
  configPath: string | null;
  /** .env file that was read, if any */
  envPath: string | null;
}

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('flake-scan', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

/**
 * Validate one config source
 */
function parsePartialConfig(raw: unknown, source: string): PartialConfig {
  if (raw === null || raw === undefined) {
    return {};
  }

  const result = PartialConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration in ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load global configuration from ~/.flake-scan/config.yaml
 */
async function loadGlobalConfig(homeDir: string): Promise<PartialConfig> {
  const globalConfigPath = path.join(homeDir, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch {
    // Global config doesn't exist
    return {};
  }

  return parsePartialConfig(parseYaml(content), globalConfigPath);
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd: string): Promise<{ config: PartialConfig; filepath: string | null }> {
  let result: CosmiconfigResult;
  try {
    result = await explorer.search(cwd);
  } catch (error) {
    throw new ConfigurationError(`Failed to read project configuration: ${getErrorMessage(error)}`);
  }

  if (!result || result.isEmpty) {
    return { config: {}, filepath: result?.filepath ?? null };
  }
  return { config: parsePartialConfig(result.config, result.filepath), filepath: result.filepath };
}

/**
 * Read KEY=value pairs from <cwd>/.env without touching process.env
 */
export async function loadDotEnv(cwd: string): Promise<{ values: Environment; envPath: string | null }> {
  const envPath = path.join(cwd, '.env');

  try {
    const content = await fs.readFile(envPath, 'utf-8');
    return { values: dotenv.parse(content), envPath };
  } catch {
    return { values: {}, envPath: null };
  }
}

/**
 * Parse an integer environment value
 */
function parseIntEnv(env: Environment, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: Environment): PartialConfig {
  const config: PartialConfig = {};
  const provider: NonNullable<PartialConfig['provider']> = {};
  const scan: NonNullable<PartialConfig['scan']> = {};

  const token = env[ENV_VARS.TOKEN];
  if (token) provider.token = token.trim();

  const org = env[ENV_VARS.ORG];
  if (org) provider.org = org;

  const pipeline = env[ENV_VARS.PIPELINE];
  if (pipeline) provider.pipeline = pipeline;

  const apiUrl = env[ENV_VARS.API_URL];
  if (apiUrl) provider.api_url = apiUrl;

  // An empty branch regex is meaningful: it disables the filter
  const branchRegex = env[ENV_VARS.BRANCH_REGEX];
  if (branchRegex !== undefined) scan.branch_regex = branchRegex;

  const stepSubstr = env[ENV_VARS.STEP_SUBSTR];
  if (stepSubstr !== undefined) scan.step_substr = stepSubstr;

  const maxBuilds = parseIntEnv(env, ENV_VARS.MAX_BUILDS);
  if (maxBuilds !== undefined) scan.max_builds = maxBuilds;

  const concurrency = parseIntEnv(env, ENV_VARS.CONCURRENCY);
  if (concurrency !== undefined) scan.concurrency = concurrency;

  if (Object.keys(provider).length > 0) config.provider = provider;
  if (Object.keys(scan).length > 0) config.scan = scan;

  const patternsFile = env[ENV_VARS.PATTERNS_FILE];
  if (patternsFile) {
    config.patterns = { file: patternsFile };
  }

  const verbose = env[ENV_VARS.VERBOSE];
  if (verbose === '1' || verbose === 'true') {
    config.output = { verbose: true };
  }

  return config;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

/**
 * Deep merge configuration objects
 */
export function deepMerge<T extends Record<string, unknown>>(target: T, source: DeepPartial<T>): T {
  const result = { ...target };

  for (const key in source) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      typeof targetValue === 'object' &&
      targetValue !== null &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(
        targetValue as Record<string, unknown>,
        sourceValue as Record<string, unknown>
      ) as T[Extract<keyof T, string>];
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[Extract<keyof T, string>];
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: overrides > env vars > .env file > project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? homedir();
  const processEnv = options.env ?? process.env;

  // Load from all sources
  const globalConfig = await loadGlobalConfig(homeDir);
  const projectConfig = await loadProjectConfig(cwd);
  const dotEnv = await loadDotEnv(cwd);
  // Variables already set win over the .env file
  const envConfig = loadEnvConfig({ ...dotEnv.values, ...processEnv });
  const overrides = parsePartialConfig(options.overrides ?? {}, 'command-line options');

  // Merge in priority order
  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig.config);
  merged = deepMerge(merged, envConfig);
  merged = deepMerge(merged, overrides);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  return {
    config: result.data,
    configPath: projectConfig.filepath,
    envPath: dotEnv.envPath,
  };
}

/**
 * Mask a secret for display, keeping the last four characters
 */
export function maskToken(token: string): string {
  if (token === '') return '(not set)';
  return token.length <= 4 ? '****' : `****${token.slice(-4)}`;
}

/**
 * Config with the token masked, for display
 */
export function redactConfig(config: Config): Config {
  return {
    ...config,
    provider: { ...config.provider, token: maskToken(config.provider.token) },
  };
}
