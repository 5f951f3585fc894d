/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  rootPath: '.',
  preset: null,
  maxIterations: 3,
  simulateAuth: true,
  sandboxTimeoutMs: 30_000,
  ruleOverrides: {},
  minConfidence: 0.3,
  pythonExecutable: 'python3',
  stateDir: '.mender',
  dryRun: false,
  maxLineLength: 120,
  output: {
    verbose: false,
    events: false,
    writeReports: true,
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'mender.config.yaml',
  'mender.config.yml',
  'mender.config.json',
  '.menderrc.yaml',
  '.menderrc.yml',
  '.menderrc',
];

/**
 * Global config directory, relative to the home directory
 */
export const GLOBAL_CONFIG_DIR = '.mender';

/**
 * Config file name in the global directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Files kept under the state directory
 */
export const STATE_FILES = {
  LEDGER: 'ledger.json',
  LOG: 'HEALING_LOG.md',
  BACKUPS: 'backups',
  BACKUP_INDEX: 'index.json',
  BLOBS: 'blobs',
  REPORTS: 'reports',
} as const;

/**
 * Environment variable names
 */
export const ENV_VARS = {
  PRESET: 'MENDER_PRESET',
  MAX_ITERATIONS: 'MENDER_MAX_ITERATIONS',
  SANDBOX_TIMEOUT_MS: 'MENDER_SANDBOX_TIMEOUT_MS',
  SIMULATE_AUTH: 'MENDER_SIMULATE_AUTH',
  PYTHON: 'MENDER_PYTHON',
  STATE_DIR: 'MENDER_STATE_DIR',
  DRY_RUN: 'MENDER_DRY_RUN',
  LOG_LEVEL: 'MENDER_LOG_LEVEL',
} as const;

/**
 * Ledger file version
 */
export const LEDGER_VERSION = 1;
