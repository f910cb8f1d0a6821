#!/usr/bin/env node
/**
 * flake-scan
 * Scan recent CI builds for known flaky-failure patterns
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
