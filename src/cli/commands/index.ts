/**
 * CLI commands index
 * Exports all command creators
 */

export { createScanCommand, runScan, buildOverrides, EXIT_CODES } from './scan.js';
export type { ScanCommandOptions, ScanRunContext } from './scan.js';
export { createConfigCommand } from './config.js';
