#!/usr/bin/env node
/**
 * flask-mender CLI
 * Detects, heals and re-validates defects in Flask applications
 */

import { runCLI } from './cli/index.js';

runCLI().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
