/**
 * Corrector contract and shared helpers.
 */

import path from 'node:path';
import type { AnalysisContext, ProjectIndex } from '../analyzers/context.js';
import type { PythonModule } from '../parsers/python-source.js';
import type { Issue, IssueCategory } from '../types/issue.js';
import type { PlannedFix, TextEdit } from '../types/fix.js';

export interface CorrectorContext {
  analysis: AnalysisContext;
  index: ProjectIndex;
  /** Timestamp written into generated files */
  now: Date;
  /** Alembic heads on disk; every revision is planned on top of them */
  readonly migrationHeads: readonly string[];
}

/**
 * One corrector per issue category. `plan` proposes edits against current
 * file content and returns null when the issue is not auto-fixable.
 */
export interface Corrector {
  category: IssueCategory;
  /** Whether this corrector may write the given root-relative file */
  canWrite(file: string, ctx: CorrectorContext): boolean;
  plan(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null>;
}

// ---------------------------------------------------------------------------
// Issue data accessors
// ---------------------------------------------------------------------------

export function dataString(issue: Issue, key: string): string | null {
  const value = issue.data?.[key];
  return typeof value === 'string' ? value : null;
}

export function dataNumber(issue: Issue, key: string): number | null {
  const value = issue.data?.[key];
  return typeof value === 'number' ? value : null;
}

export function dataBoolean(issue: Issue, key: string): boolean {
  return issue.data?.[key] === true;
}

export function dataStrings(issue: Issue, key: string): string[] {
  const value = issue.data?.[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function dataNumbers(issue: Issue, key: string): number[] {
  const value = issue.data?.[key];
  return Array.isArray(value) ? value.filter((v): v is number => typeof v === 'number') : [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Array of objects under `key`, e.g. edit ranges.
 */
export function dataRecords(issue: Issue, key: string): Array<Record<string, unknown>> {
  const value = issue.data?.[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/**
 * `{start, end, replacement}` entries under `key`.
 */
export function dataEdits(issue: Issue, key: string): TextEdit[] {
  return dataRecords(issue, key).flatMap((r) =>
    typeof r.start === 'number' && typeof r.end === 'number' && typeof r.replacement === 'string'
      ? [{ start: r.start, end: r.end, replacement: r.replacement }]
      : []
  );
}

// ---------------------------------------------------------------------------
// Edit helpers
// ---------------------------------------------------------------------------

/**
 * Build a planned fix for an existing file.
 */
export function plannedEdit(
  issue: Issue,
  corrector: IssueCategory,
  file: string,
  baseContent: string | null,
  edits: TextEdit[],
  description: string
): PlannedFix {
  return { issueId: issue.id, corrector, file, description, baseContent, edits };
}

/**
 * Whether a module binds `name` at top level through an import.
 */
export function importsName(module: PythonModule, name: string): boolean {
  return module.imports.some((imp) => imp.indent === 0 && imp.names.some((n) => n.local === name));
}

/**
 * Edit inserting an import line after the module's last top-level import
 * (or at the top of the file).
 */
export function addImportEdit(module: PythonModule, statement: string): TextEdit {
  const topLevel = module.imports.filter((imp) => imp.indent === 0);
  const last = topLevel[topLevel.length - 1];
  if (!last) return { start: 0, end: 0, replacement: `${statement}\n` };
  const nextLine = module.lineStarts[last.endLine];
  if (nextLine === undefined) return { start: module.source.length, end: module.source.length, replacement: `\n${statement}\n` };
  return { start: nextLine, end: nextLine, replacement: `${statement}\n` };
}

/**
 * Whether `file` sits inside one of `dirs` (root-relative POSIX paths).
 */
export function isInside(file: string, dirs: Iterable<string>): boolean {
  const normalized = path.posix.normalize(file);
  for (const dir of dirs) {
    const prefix = dir.endsWith('/') ? dir : `${dir}/`;
    if (normalized.startsWith(prefix)) return true;
  }
  return false;
}

/**
 * Human title from a file or identifier name: `order_items.html` -> `Order Items`.
 */
export function titleFromName(name: string): string {
  const base = path.posix.basename(name).replace(/\.[^.]+$/, '');
  return base
    .split(/[_\-\s]+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}
