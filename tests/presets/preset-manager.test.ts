import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PresetManager, loadPresetFile, resolveRuleset } from '../../src/presets/preset-manager.js';
import { MenderError } from '../../src/types/errors.js';
import type { Preset } from '../../src/types/rules.js';

const SETTINGS = { maxLineLength: 100, minConfidence: 0.5 };

function preset(rules: Preset['rules']): Preset {
  return {
    name: 'custom',
    description: '',
    rules,
    requirements: {
      requiredRoutes: ['index'],
      recommendedRoutes: [],
      requiredTemplates: [],
      recommendedTemplates: [],
      requiredModels: [],
      requiredFields: {},
    },
  };
}

describe('resolveRuleset', () => {
  it('should use catalog settings without preset or overrides', () => {
    const ruleset = resolveRuleset(null, {}, SETTINGS);

    expect(ruleset.presetName).toBeNull();
    expect(ruleset.rules['persistence/missing-migration']).toEqual({ enabled: true, severity: 'critical' });
    expect(ruleset.rules['code/line-too-long']).toEqual({ enabled: true, severity: 'info' });
    expect(ruleset.requirements.requiredRoutes).toEqual([]);
    expect(ruleset.maxLineLength).toBe(100);
    expect(ruleset.minConfidence).toBe(0.5);
  });

  it('should let an exact rule key beat a category wildcard regardless of layer', () => {
    const ruleset = resolveRuleset(
      preset({ 'persistence/missing-migration': { severity: 'critical' } }),
      { 'persistence/*': { severity: 'warning' } },
      SETTINGS
    );

    expect(ruleset.rules['persistence/missing-migration'].severity).toBe('critical');
    expect(ruleset.rules['persistence/empty-model'].severity).toBe('warning');
    expect(ruleset.rules['persistence/required-model'].severity).toBe('warning');
  });

  it('should let user overrides win at equal specificity', () => {
    const ruleset = resolveRuleset(
      preset({ 'code/bare-except': { enabled: false, severity: 'info' } }),
      { 'code/bare-except': { enabled: true } },
      SETTINGS
    );

    expect(ruleset.rules['code/bare-except']).toEqual({ enabled: true, severity: 'info' });
  });

  it('should apply the global wildcard below everything else', () => {
    const ruleset = resolveRuleset(null, { '*': { enabled: false }, 'templating/*': { enabled: true } }, SETTINGS);

    expect(ruleset.rules['routing/missing-return'].enabled).toBe(false);
    expect(ruleset.rules['templating/missing-template'].enabled).toBe(true);
  });

  it('should collect override keys that match nothing', () => {
    const ruleset = resolveRuleset(
      preset({ 'routing/not-a-rule': { enabled: false } }),
      { 'views/*': { enabled: false }, 'code/bare-except': { enabled: false } },
      SETTINGS
    );

    expect(ruleset.unknownOverrideKeys).toEqual(['routing/not-a-rule', 'views/*']);
  });

  it('should carry preset requirements', () => {
    expect(resolveRuleset(preset({}), {}, SETTINGS).requirements.requiredRoutes).toEqual(['index']);
  });
});

describe('PresetManager', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-presets-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should list and load the built-in presets', async () => {
    const manager = new PresetManager();

    expect(await manager.listNames()).toEqual(['admin-panel', 'blog', 'ecommerce']);
    const blog = await manager.load('blog');
    expect(blog.name).toBe('blog');
    expect(blog.requirements.requiredModels).toEqual(['Post', 'User', 'Comment']);
    expect(blog.rules['routing/unspecified-methods']).toEqual({ enabled: false });
  });

  it('should reject an unknown preset name with the available names', async () => {
    const manager = new PresetManager({ presetsDir: dir });
    await fs.writeFile(path.join(dir, 'tiny.yaml'), 'name: tiny\n', 'utf-8');

    await expect(manager.load('shop')).rejects.toThrow("Unknown preset 'shop'. Available: tiny");
  });

  it('should load a preset file by path and fill defaults', async () => {
    const file = path.join(dir, 'mine.json');
    await fs.writeFile(file, JSON.stringify({ name: 'mine', rules: { 'code/*': { enabled: false } } }), 'utf-8');

    const loaded = await new PresetManager({ presetsDir: dir }).load(file);

    expect(loaded).toEqual({
      name: 'mine',
      description: '',
      rules: { 'code/*': { enabled: false } },
      requirements: {
        requiredRoutes: [],
        recommendedRoutes: [],
        requiredTemplates: [],
        recommendedTemplates: [],
        requiredModels: [],
        requiredFields: {},
      },
    });
  });

  it('should resolve a preset together with user overrides', async () => {
    const ruleset = await new PresetManager().resolve('ecommerce', { 'persistence/empty-model': { severity: 'info' } }, SETTINGS);

    expect(ruleset.presetName).toBe('ecommerce');
    expect(ruleset.rules['persistence/empty-model'].severity).toBe('info');
    expect(ruleset.rules['persistence/required-model'].severity).toBe('error');
    expect(ruleset.rules['routing/unspecified-methods'].severity).toBe('warning');
  });
});

describe('loadPresetFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-preset-file-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should reject unsupported extensions', async () => {
    await expect(loadPresetFile(path.join(dir, 'preset.toml'))).rejects.toThrow(
      `Unsupported preset file format: ${path.join(dir, 'preset.toml')} (expected .yaml, .yml or .json)`
    );
  });

  it('should report missing files', async () => {
    await expect(loadPresetFile(path.join(dir, 'gone.yaml'))).rejects.toThrow(`Preset file not found: ${path.join(dir, 'gone.yaml')}`);
  });

  it('should name invalid fields', async () => {
    const file = path.join(dir, 'bad.yaml');
    await fs.writeFile(file, 'name: bad\nrules:\n  code/bare-except:\n    severity: fatal\n', 'utf-8');

    await expect(loadPresetFile(file)).rejects.toThrow(MenderError);
    await expect(loadPresetFile(file)).rejects.toThrow(/^Invalid preset .*bad\.yaml: rules\.code\/bare-except\.severity: /);
  });
});
