/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import { ConfigSchema, type Config } from './schema.js';
import {
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  CONFIG_FILE_NAMES,
  ENV_VARS,
} from './defaults.js';
import { MenderError } from '../types/errors.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

type ConfigRecord = Record<string, unknown>;

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('mender', {
  searchPlaces: [...CONFIG_FILE_NAMES, '.mender/config.yaml', '.mender/config.yml'],
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  /** Directory to search for a project config file */
  cwd?: string;
  /** Values that win over every other source, typically CLI flags */
  overrides?: ConfigRecord;
  /** Environment to read `MENDER_*` variables from */
  env?: NodeJS.ProcessEnv;
  /** Global config file; null skips it */
  globalConfigPath?: string | null;
}

function isPlainObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load global configuration from ~/.mender/config.yaml
 */
async function loadGlobalConfig(configPath: string): Promise<ConfigRecord> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }
  const parsed: unknown = parseYaml(content);
  return isPlainObject(parsed) ? parsed : {};
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<ConfigRecord> {
  const result = await explorer.search(cwd);
  if (result && !result.isEmpty) {
    const config: unknown = result.config;
    if (isPlainObject(config)) return config;
  }
  return {};
}

function parseBooleanEnv(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
}

function parseIntegerEnv(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigRecord {
  const config: ConfigRecord = {};

  const preset = env[ENV_VARS.PRESET];
  if (preset) config.preset = preset;

  const maxIterations = parseIntegerEnv(env[ENV_VARS.MAX_ITERATIONS]);
  if (maxIterations !== undefined) config.maxIterations = maxIterations;

  const timeout = parseIntegerEnv(env[ENV_VARS.SANDBOX_TIMEOUT_MS]);
  if (timeout !== undefined) config.sandboxTimeoutMs = timeout;

  const simulateAuth = parseBooleanEnv(env[ENV_VARS.SIMULATE_AUTH]);
  if (simulateAuth !== undefined) config.simulateAuth = simulateAuth;

  const python = env[ENV_VARS.PYTHON];
  if (python) config.pythonExecutable = python;

  const stateDir = env[ENV_VARS.STATE_DIR];
  if (stateDir) config.stateDir = stateDir;

  const dryRun = parseBooleanEnv(env[ENV_VARS.DRY_RUN]);
  if (dryRun !== undefined) config.dryRun = dryRun;

  // Verbose/log level
  if (env[ENV_VARS.LOG_LEVEL] === 'debug') {
    config.output = { verbose: true };
  }

  return config;
}

/**
 * Deep merge configuration objects. Arrays and scalars from `source` replace
 * those in `target`; undefined values are skipped.
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Validate a merged record against the schema
 */
export function parseConfig(raw: ConfigRecord): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new MenderError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources
 * Priority: overrides > env vars > project config > global config > defaults
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const globalPath =
    options.globalConfigPath === undefined
      ? path.join(homedir(), GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME)
      : options.globalConfigPath;

  const globalConfig = globalPath ? await loadGlobalConfig(globalPath) : {};
  const projectConfig = await loadProjectConfig(options.cwd);
  const envConfig = loadEnvConfig(options.env);

  let merged = deepMerge(DEFAULT_CONFIG, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);
  merged = deepMerge(merged, options.overrides ?? {});

  return parseConfig(merged);
}

/**
 * Absolute state directory for a config
 */
export function resolveStateDir(config: Pick<Config, 'rootPath' | 'stateDir'>): string {
  return path.resolve(config.rootPath, config.stateDir);
}
