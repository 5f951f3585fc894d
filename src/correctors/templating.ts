/**
 * Templating corrector: creates missing templates and repairs block
 * structure, url_for endpoints and unguarded context variables.
 */

import {
  dataNumber,
  dataRecords,
  dataString,
  isInside,
  plannedEdit,
  titleFromName,
  type Corrector,
  type CorrectorContext,
} from './corrector.js';
import type { Issue } from '../types/issue.js';
import type { PlannedFix, TextEdit } from '../types/fix.js';

const LAYOUT_CANDIDATES = ['base.html', 'layout.html'];

/**
 * Content of a new template. Extends the project's layout when one exists,
 * filling its `content` block (or its first block).
 */
export function stubTemplate(name: string, ctx: CorrectorContext): string {
  const title = titleFromName(name);
  for (const layoutName of LAYOUT_CANDIDATES) {
    const layout = ctx.index.parsedTemplates.get(layoutName);
    if (!layout || layoutName === name) continue;
    const blockNames = layout.blocks.map((b) => b.name);
    const block = blockNames.includes('content') ? 'content' : blockNames[0];
    if (!block) continue;
    const titleBlock = blockNames.includes('title') && block !== 'title' ? `{% block title %}${title}{% endblock %}\n\n` : '';
    return (
      `{% extends "${layoutName}" %}\n\n` +
      titleBlock +
      `{% block ${block} %}\n<h1>${title}</h1>\n{% endblock %}\n`
    );
  }
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${title}</title>`,
    '</head>',
    '<body>',
    `  <h1>${title}</h1>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

async function planCreateTemplate(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const name = dataString(issue, 'template');
  if (!name || name.split('/').includes('..') || name.startsWith('/')) return null;
  if (ctx.index.templates.has(name)) return null;
  const file = `${ctx.analysis.defaultTemplateDir()}/${name}`;
  const existing = await ctx.analysis.readFile(file);
  if (existing !== undefined) return null;
  return plannedEdit(
    issue,
    'templating',
    file,
    null,
    [{ start: 0, end: 0, replacement: stubTemplate(name, ctx) }],
    `Create template ${name}`
  );
}

async function planUnclosedBlock(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const block = dataString(issue, 'block');
  const insertAt = dataNumber(issue, 'insertAt');
  const source = await ctx.analysis.readFile(issue.location.file);
  if (!block || insertAt === null || source === undefined || insertAt > source.length) return null;
  const atEnd = insertAt === source.length;
  const lead = atEnd && source.length > 0 && !source.endsWith('\n') ? '\n' : '';
  const replacement = `${lead}{% endblock ${block} %}\n`;
  return plannedEdit(
    issue,
    'templating',
    issue.location.file,
    source,
    [{ start: insertAt, end: insertAt, replacement }],
    `Close {% block ${block} %}`
  );
}

async function planInvalidUrlFor(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const endpoint = dataString(issue, 'endpoint');
  const suggestion = dataString(issue, 'suggestion');
  const start = dataNumber(issue, 'start');
  const end = dataNumber(issue, 'end');
  const source = await ctx.analysis.readFile(issue.location.file);
  if (!endpoint || !suggestion || start === null || end === null || source === undefined) return null;
  if (source.slice(start, end) !== endpoint) return null;
  return plannedEdit(
    issue,
    'templating',
    issue.location.file,
    source,
    [{ start, end, replacement: suggestion }],
    `Point url_for('${endpoint}') at '${suggestion}'`
  );
}

async function planUndefinedVariable(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const variable = dataString(issue, 'variable');
  const source = await ctx.analysis.readFile(issue.location.file);
  if (!variable || source === undefined) return null;
  const edits: TextEdit[] = dataRecords(issue, 'occurrences').flatMap((o) =>
    typeof o.start === 'number' && typeof o.end === 'number'
      ? [{ start: o.start, end: o.end, replacement: `{{ ${variable}|default('') }}` }]
      : []
  );
  if (edits.length === 0) return null;
  return plannedEdit(issue, 'templating', issue.location.file, source, edits, `Default '${variable}' to an empty string`);
}

export const templatingCorrector: Corrector = {
  category: 'templating',

  canWrite(file, ctx) {
    return isInside(file, [...ctx.analysis.project.templateDirs, ctx.analysis.defaultTemplateDir()]);
  },

  async plan(issue, ctx) {
    switch (issue.rule) {
      case 'templating/missing-template':
      case 'templating/required-template':
        return planCreateTemplate(issue, ctx);
      case 'templating/unclosed-block':
        return planUnclosedBlock(issue, ctx);
      case 'templating/invalid-url-for':
        return planInvalidUrlFor(issue, ctx);
      case 'templating/undefined-variable':
        return planUndefinedVariable(issue, ctx);
      default:
        return null;
    }
  },
};
