/**
 * Preset loading and ruleset resolution.
 *
 * Built-in presets ship as YAML files in `presets/`; a preset may also be a
 * path to a user `.yaml`, `.yml` or `.json` file. Rule settings are merged
 * base -> preset -> user overrides.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { RULE_CATALOG } from '../analyzers/rules.js';
import { MenderError } from '../types/errors.js';
import { ISSUE_CATEGORIES, type IssueSeverity } from '../types/issue.js';
import {
  emptyRequirements,
  PresetSchema,
  type Preset,
  type ResolvedRuleset,
  type RuleDefinition,
  type RuleOverrides,
  type RuleSetting,
} from '../types/rules.js';

export const BUILTIN_PRESETS = ['blog', 'ecommerce', 'admin-panel'] as const;

const PRESET_EXTENSIONS = new Set(['.yaml', '.yml', '.json']);

/**
 * Directory holding the built-in preset files.
 */
export function defaultPresetsDir(): string {
  return fileURLToPath(new URL('../../presets/', import.meta.url));
}

// ---------------------------------------------------------------------------
// Loading
// ---------------------------------------------------------------------------

/**
 * Read and validate one preset file.
 */
export async function loadPresetFile(filePath: string): Promise<Preset> {
  const ext = path.extname(filePath).toLowerCase();
  if (!PRESET_EXTENSIONS.has(ext)) {
    throw new MenderError(`Unsupported preset file format: ${filePath} (expected .yaml, .yml or .json)`);
  }

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MenderError(`Preset file not found: ${filePath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = ext === '.json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new MenderError(`Preset file ${filePath} is not valid ${ext === '.json' ? 'JSON' : 'YAML'}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = PresetSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new MenderError(`Invalid preset ${filePath}: ${details}`);
  }
  return result.data;
}

export interface PresetManagerOptions {
  presetsDir?: string;
}

/**
 * Resolves preset names or files and merges them into rulesets.
 */
export class PresetManager {
  private readonly presetsDir: string;
  private readonly cache = new Map<string, Preset>();

  constructor(options: PresetManagerOptions = {}) {
    this.presetsDir = options.presetsDir ?? defaultPresetsDir();
  }

  /**
   * Load a built-in preset by name, or a preset file by path.
   */
  async load(nameOrPath: string): Promise<Preset> {
    const cached = this.cache.get(nameOrPath);
    if (cached) return cached;

    let preset: Preset;
    if (PRESET_EXTENSIONS.has(path.extname(nameOrPath).toLowerCase())) {
      preset = await loadPresetFile(path.resolve(nameOrPath));
    } else {
      const known = await this.listNames();
      if (!known.includes(nameOrPath)) {
        throw new MenderError(`Unknown preset '${nameOrPath}'. Available: ${known.join(', ')}`);
      }
      preset = await loadPresetFile(path.join(this.presetsDir, `${nameOrPath}.yaml`));
    }
    this.cache.set(nameOrPath, preset);
    return preset;
  }

  /**
   * Names of the presets in the presets dir.
   */
  async listNames(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.presetsDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    return files
      .filter((f) => f.endsWith('.yaml'))
      .map((f) => f.slice(0, -'.yaml'.length))
      .sort();
  }

  async list(): Promise<Preset[]> {
    const names = await this.listNames();
    return Promise.all(names.map((name) => this.load(name)));
  }

  /**
   * Load the named preset (if any) and resolve it with the user overrides.
   */
  async resolve(
    nameOrPath: string | null,
    userOverrides: RuleOverrides,
    settings: RulesetSettings
  ): Promise<ResolvedRuleset> {
    const preset = nameOrPath ? await this.load(nameOrPath) : null;
    return resolveRuleset(preset, userOverrides, settings);
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export interface RulesetSettings {
  maxLineLength: number;
  minConfidence: number;
}

/**
 * How specifically an override key addresses a rule: exact id beats
 * `category/*`, which beats `*`. Zero when it does not apply.
 */
export function overrideSpecificity(key: string, rule: RuleDefinition): number {
  if (key === rule.id) return 3;
  if (key === `${rule.category}/*`) return 2;
  if (key === '*') return 1;
  return 0;
}

function isKnownKey(key: string): boolean {
  if (key === '*') return true;
  if (key.endsWith('/*')) return ISSUE_CATEGORIES.some((c) => key === `${c}/*`);
  return RULE_CATALOG.some((r) => r.id === key);
}

interface Candidate<T> {
  value: T;
  specificity: number;
  layer: number;
}

function pick<T>(base: T, candidates: ReadonlyArray<Candidate<T>>): T {
  let best: Candidate<T> = { value: base, specificity: 0, layer: -1 };
  for (const candidate of candidates) {
    if (
      candidate.specificity > best.specificity ||
      (candidate.specificity === best.specificity && candidate.layer > best.layer)
    ) {
      best = candidate;
    }
  }
  return best.value;
}

/**
 * Merge base rules, preset overrides and user overrides. Each attribute is
 * resolved on its own: the most specific key wins, and among keys of equal
 * specificity the later layer wins.
 */
export function resolveRuleset(
  preset: Preset | null,
  userOverrides: RuleOverrides,
  settings: RulesetSettings
): ResolvedRuleset {
  const layers: RuleOverrides[] = [preset?.rules ?? {}, userOverrides];
  const rules: Record<string, RuleSetting> = {};

  for (const rule of RULE_CATALOG) {
    const enabled: Array<Candidate<boolean>> = [];
    const severity: Array<Candidate<IssueSeverity>> = [];
    layers.forEach((overrides, layer) => {
      for (const [key, override] of Object.entries(overrides)) {
        const specificity = overrideSpecificity(key, rule);
        if (specificity === 0) continue;
        if (override.enabled !== undefined) enabled.push({ value: override.enabled, specificity, layer });
        if (override.severity !== undefined) severity.push({ value: override.severity, specificity, layer });
      }
    });
    rules[rule.id] = {
      enabled: pick(rule.enabled, enabled),
      severity: pick(rule.severity, severity),
    };
  }

  const unknownOverrideKeys = [
    ...new Set(layers.flatMap((overrides) => Object.keys(overrides)).filter((key) => !isKnownKey(key))),
  ].sort();

  return {
    presetName: preset?.name ?? null,
    rules,
    requirements: preset?.requirements ?? emptyRequirements(),
    maxLineLength: settings.maxLineLength,
    minConfidence: settings.minConfidence,
    unknownOverrideKeys,
  };
}
