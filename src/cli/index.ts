/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { CLI_VERSION } from '../config/defaults.js';
import { createScanCommand, createConfigCommand } from './commands/index.js';
import { printError } from './output.js';

// Re-export
export * from './output.js';
export * from './commands/index.js';

export const VERSION: string = CLI_VERSION;

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('flake-scan')
    .description('Scan recent CI builds for known flaky-failure patterns')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  // `flake-scan [options]` runs a scan
  program.addCommand(createScanCommand(), { isDefault: true });
  program.addCommand(createConfigCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exit(1);
  }
}
