/**
 * Tests for configuration management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ConfigSchema } from '../../src/config/schema.js';
import { deepMerge, loadConfig, loadEnvConfig, parseConfig, resolveStateDir } from '../../src/config/index.js';
import { MenderError } from '../../src/types/errors.js';

describe('DEFAULT_CONFIG', () => {
  it('should have the documented defaults', () => {
    expect(DEFAULT_CONFIG.maxIterations).toBe(3);
    expect(DEFAULT_CONFIG.sandboxTimeoutMs).toBe(30_000);
    expect(DEFAULT_CONFIG.simulateAuth).toBe(true);
    expect(DEFAULT_CONFIG.stateDir).toBe('.mender');
    expect(DEFAULT_CONFIG.preset).toBeNull();
  });

  it('should pass schema validation', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });
});

describe('ConfigSchema', () => {
  it('should fill defaults for a partial config', () => {
    const config = ConfigSchema.parse({ maxIterations: 5 });

    expect(config.maxIterations).toBe(5);
    expect(config.output).toEqual({ verbose: false, events: false, writeReports: true });
    expect(config.ruleOverrides).toEqual({});
  });

  it('should reject out-of-range iteration limits', () => {
    expect(ConfigSchema.safeParse({ maxIterations: 0 }).success).toBe(false);
    expect(ConfigSchema.safeParse({ maxIterations: 21 }).success).toBe(false);
  });
});

describe('parseConfig', () => {
  it('should name the offending path', () => {
    expect(() => parseConfig({ minConfidence: 2 })).toThrow(MenderError);
    expect(() => parseConfig({ output: { verbose: 'yes' } })).toThrow(/^Invalid configuration: output\.verbose: /);
  });
});

describe('loadEnvConfig', () => {
  it('should read MENDER_* variables', () => {
    expect(
      loadEnvConfig({
        MENDER_PRESET: 'strict',
        MENDER_MAX_ITERATIONS: '4',
        MENDER_SIMULATE_AUTH: 'off',
        MENDER_DRY_RUN: '1',
        MENDER_LOG_LEVEL: 'debug',
      })
    ).toEqual({ preset: 'strict', maxIterations: 4, simulateAuth: false, dryRun: true, output: { verbose: true } });
  });

  it('should ignore unparseable values', () => {
    expect(loadEnvConfig({ MENDER_MAX_ITERATIONS: 'many', MENDER_DRY_RUN: 'maybe' })).toEqual({});
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should layer project file, env and overrides over defaults', async () => {
    await fs.writeFile(
      path.join(dir, 'mender.config.yaml'),
      'preset: lenient\nmaxIterations: 2\nruleOverrides:\n  code/line-too-long:\n    enabled: false\n',
      'utf-8'
    );

    const config = await loadConfig({
      cwd: dir,
      env: { MENDER_MAX_ITERATIONS: '6' },
      overrides: { dryRun: true },
      globalConfigPath: null,
    });

    expect(config.preset).toBe('lenient');
    expect(config.maxIterations).toBe(6);
    expect(config.dryRun).toBe(true);
    expect(config.ruleOverrides).toEqual({ 'code/line-too-long': { enabled: false } });
    expect(config.sandboxTimeoutMs).toBe(30_000);
  });

  it('should read the global config below the project file', async () => {
    const globalPath = path.join(dir, 'global.yaml');
    await fs.writeFile(globalPath, 'pythonExecutable: /opt/python/bin/python3\nmaxIterations: 9\n', 'utf-8');
    await fs.writeFile(path.join(dir, 'mender.config.json'), JSON.stringify({ maxIterations: 2 }), 'utf-8');

    const config = await loadConfig({ cwd: dir, env: {}, globalConfigPath: globalPath });

    expect(config.pythonExecutable).toBe('/opt/python/bin/python3');
    expect(config.maxIterations).toBe(2);
  });
});

describe('resolveStateDir', () => {
  it('should resolve the state dir against the root', () => {
    expect(resolveStateDir({ rootPath: '/srv/app', stateDir: '.mender' })).toBe(path.resolve('/srv/app', '.mender'));
  });
});

describe('deepMerge', () => {
  it('should deep merge nested objects', () => {
    const result = deepMerge({ output: { verbose: false, events: false } }, { output: { verbose: true } });

    expect(result).toEqual({ output: { verbose: true, events: false } });
  });

  it('should not modify original objects', () => {
    const target = { a: 1 };
    const source = { b: 2 };

    deepMerge(target, source);

    expect(target).toEqual({ a: 1 });
    expect(source).toEqual({ b: 2 });
  });

  it('should handle arrays by replacement', () => {
    expect(deepMerge({ arr: [1, 2, 3] }, { arr: [4, 5] }).arr).toEqual([4, 5]);
  });

  it('should skip undefined values in source', () => {
    expect(deepMerge({ a: 1, b: 2 }, { a: undefined, c: 3 })).toEqual({ a: 1, b: 2, c: 3 });
  });
});
