/**
 * Helpers shared by the CLI commands
 */

import path from 'node:path';
import { loadConfig, type Config } from '../../config/index.js';

export interface CommonOptions {
  preset?: string;
  stateDir?: string;
  verbose?: boolean;
}

/**
 * Load config for a project directory with CLI flags applied last
 */
export async function loadCommandConfig(directory: string, overrides: Record<string, unknown>): Promise<Config> {
  const rootPath = path.resolve(directory);
  return loadConfig({ cwd: rootPath, overrides: { ...overrides, rootPath } });
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new Error(`Expected a number, got '${value}'`);
  return parsed;
}

export function commonOverrides(options: CommonOptions): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (options.preset !== undefined) overrides.preset = options.preset;
  if (options.stateDir !== undefined) overrides.stateDir = options.stateDir;
  if (options.verbose) overrides.output = { verbose: true };
  return overrides;
}
