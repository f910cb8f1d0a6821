/**
 * Config command
 * Inspect and initialize scanner configuration
 */

import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { stringify as stringifyYaml } from 'yaml';
import {
  loadConfig,
  redactConfig,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  type Config,
} from '../../config/index.js';
import { getErrorMessage } from '../../errors.js';
import {
  printHeader,
  printSection,
  printSuccess,
  printError,
  printInfo,
  printKeyValue,
} from '../output.js';

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description('Inspect scanner configuration');

  // Show effective config
  config
    .command('show')
    .description('Show effective configuration (token masked)')
    .option('--json', 'Output as JSON')
    .action(async (options: { json?: boolean }) => {
      try {
        const loaded = await loadConfig();
        const redacted = redactConfig(loaded.config);

        if (options.json) {
          console.log(JSON.stringify(redacted, null, 2));
          return;
        }

        printHeader('Current Configuration');

        if (loaded.configPath) {
          printInfo(`Config file: ${loaded.configPath}`);
        } else {
          printInfo('No project config file; using defaults and environment');
        }
        if (loaded.envPath) {
          printInfo(`Environment file: ${loaded.envPath}`);
        }

        printConfig(redacted);
      } catch (error) {
        printError(getErrorMessage(error));
        process.exitCode = 1;
      }
    });

  // Show defaults
  config
    .command('defaults')
    .description('Show default configuration values')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify(DEFAULT_CONFIG, null, 2));
        return;
      }

      printHeader('Default Configuration');
      printConfig(DEFAULT_CONFIG);
    });

  // Get a specific value
  config
    .command('get')
    .description('Get a specific configuration value')
    .argument('<key>', 'Configuration key (e.g., scan.max_builds)')
    .action(async (key: string) => {
      try {
        const loaded = await loadConfig();
        const value = getNestedValue(redactConfig(loaded.config), key);

        if (value === undefined) {
          printError(`Configuration key not found: ${key}`);
          process.exitCode = 1;
          return;
        }

        console.log(typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
      } catch (error) {
        printError(getErrorMessage(error));
        process.exitCode = 1;
      }
    });

  // Init config file
  config
    .command('init')
    .description('Create a project configuration file')
    .action(async () => {
      const filepath = path.join(process.cwd(), CONFIG_FILE_NAMES[0]);

      try {
        await fs.writeFile(filepath, generateYamlConfig(), { encoding: 'utf-8', flag: 'wx' });
        printSuccess(`Created configuration file: ${filepath}`);
      } catch (error) {
        printError(`Could not create ${filepath}: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return config;
}

/**
 * Starter project config. The token is left out: it belongs in BK_TOKEN or .env.
 */
export function generateYamlConfig(): string {
  const { token: _token, ...provider } = DEFAULT_CONFIG.provider;
  return stringifyYaml({ ...DEFAULT_CONFIG, provider });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Get a nested value using dot notation
 */
export function getNestedValue(obj: unknown, keyPath: string): unknown {
  let current: unknown = obj;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

function printConfig(config: Config): void {
  for (const [name, section] of Object.entries(config)) {
    printSection(name);
    printEntries(section, '  ');
  }
  console.log();
}

function printEntries(section: unknown, indent: string): void {
  if (!isRecord(section)) return;

  for (const [key, value] of Object.entries(section)) {
    if (isRecord(value)) {
      console.log(`${indent}${key}:`);
      printEntries(value, `${indent}  `);
    } else if (Array.isArray(value)) {
      printKeyValue(`${indent}${key}`, value.length === 0 ? '(none)' : value.join(', '));
    } else {
      printKeyValue(`${indent}${key}`, String(value));
    }
  }
}
