/**
 * Temp-directory Flask projects for tests
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { AnalysisContext } from '../../src/analyzers/context.js';
import { applyPatch, buildPatch } from '../../src/correctors/patch.js';
import type { CorrectorContext } from '../../src/correctors/corrector.js';
import { detectProject } from '../../src/detection/project-detector.js';
import { resolveRuleset, type RulesetSettings } from '../../src/presets/preset-manager.js';
import type { z } from 'zod';
import { PresetSchema, type ResolvedRuleset, type RuleOverrides } from '../../src/types/rules.js';
import type { PlannedFix } from '../../src/types/fix.js';

export async function makeTempDir(prefix = 'mender-project-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write files (root-relative POSIX paths) under root, creating directories
 */
export async function writeProject(root: string, files: Record<string, string>): Promise<void> {
  for (const [file, content] of Object.entries(files)) {
    const absolute = path.join(root, file);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content, 'utf-8');
  }
}

export function readProjectFile(root: string, file: string): Promise<string> {
  return fs.readFile(path.join(root, file), 'utf-8');
}

export function defaultRuleset(overrides: RuleOverrides = {}): ResolvedRuleset {
  return resolveRuleset(null, overrides, { maxLineLength: 120, minConfidence: 0.3 });
}

/** Single-file app with one working and one broken template route */
export const MISSING_TEMPLATE_APP = {
  'app.py': [
    'from flask import Flask, render_template',
    '',
    'app = Flask(__name__)',
    '',
    '',
    "@app.route('/', methods=['GET'])",
    'def index():',
    "    return render_template('index.html')",
    '',
    '',
    "@app.route('/missing', methods=['GET'])",
    'def missing():',
    "    return render_template('missing.html')",
    '',
  ].join('\n'),
  'templates/index.html': '<h1>Home</h1>\n',
};

/**
 * Detect the project under root and open a fresh analysis pass over it
 */
export async function contextFor(root: string, ruleset: ResolvedRuleset = defaultRuleset()): Promise<AnalysisContext> {
  return new AnalysisContext(await detectProject(root), ruleset);
}

export function rulesetWith(preset: Partial<z.input<typeof PresetSchema>>, settings: Partial<RulesetSettings> = {}): ResolvedRuleset {
  return resolveRuleset(
    PresetSchema.parse({ name: 'custom', ...preset }),
    {},
    { maxLineLength: 120, minConfidence: 0.3, ...settings }
  );
}

export const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

export async function correctorContextFor(analysis: AnalysisContext, now: Date = FIXED_NOW): Promise<CorrectorContext> {
  const index = await analysis.index();
  return { analysis, index, now, migrationHeads: [...index.migrations.heads] };
}

/**
 * Content of the planned file after applying the plan's edits
 */
export function applyPlan(plan: PlannedFix): string {
  return applyPatch(plan.baseContent, buildPatch(plan.file, plan.baseContent, plan.edits));
}
