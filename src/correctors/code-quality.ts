/**
 * Code corrector: mechanical hygiene fixes on Python sources.
 */

import {
  addImportEdit,
  dataBoolean,
  dataEdits,
  dataNumbers,
  dataStrings,
  importsName,
  plannedEdit,
  type Corrector,
  type CorrectorContext,
} from './corrector.js';
import type { ImportStatement, PythonModule } from '../parsers/python-source.js';
import type { Issue } from '../types/issue.js';
import type { PlannedFix, TextEdit } from '../types/fix.js';

/**
 * Rewrite of an import statement without the given local names, or an empty
 * string when nothing remains.
 */
export function rewriteImport(imp: ImportStatement, drop: ReadonlySet<string>): string {
  const kept = imp.names.filter((n) => !drop.has(n.local));
  if (kept.length === 0) return '';
  const names = kept.map((n) => (n.alias ? `${n.name} as ${n.alias}` : n.name)).join(', ');
  if (imp.kind === 'import') return `${imp.indentText}import ${names}`;
  return `${imp.indentText}from ${'.'.repeat(imp.level)}${imp.module} import ${names}`;
}

function planUnusedImport(issue: Issue, module: PythonModule): PlannedFix | null {
  const names = new Set(dataStrings(issue, 'names'));
  const imp = module.imports.find((i) => i.line === issue.location.startLine && i.indent === 0);
  if (!imp || names.size === 0 || !imp.names.some((n) => names.has(n.local))) return null;

  const statement = module.source.slice(imp.startOffset, imp.endOffset);
  const comment = imp.line === imp.endLine ? /\s+#.*$/.exec(statement)?.[0] ?? '' : '';
  const rewritten = rewriteImport(imp, names);

  let edit: TextEdit;
  if (rewritten === '') {
    const lineEnd = module.source[imp.endOffset] === '\n' ? imp.endOffset + 1 : imp.endOffset;
    edit = { start: imp.startOffset, end: lineEnd, replacement: '' };
  } else {
    edit = { start: imp.startOffset, end: imp.endOffset, replacement: `${rewritten}${comment}` };
  }
  return plannedEdit(
    issue,
    'code',
    module.path,
    module.source,
    [edit],
    rewritten === '' ? `Remove unused import of ${[...names].join(', ')}` : `Drop ${[...names].join(', ')} from import`
  );
}

function planTrailingWhitespace(issue: Issue, module: PythonModule): PlannedFix | null {
  const edits: TextEdit[] = [];
  for (const line of dataNumbers(issue, 'lines')) {
    const text = module.lines[line - 1];
    if (text === undefined || module.openStringLines[line - 1]) continue;
    const body = text.endsWith('\r') ? text.slice(0, -1) : text;
    const trailing = /[ \t]+$/.exec(body);
    if (!trailing) continue;
    const start = module.lineStarts[line - 1] + trailing.index;
    edits.push({ start, end: start + trailing[0].length, replacement: '' });
  }
  if (edits.length === 0) return null;
  return plannedEdit(issue, 'code', module.path, module.source, edits, `Strip trailing whitespace from ${edits.length} line(s)`);
}

function planFinalNewline(issue: Issue, module: PythonModule): PlannedFix | null {
  if (module.source.length === 0 || module.source.endsWith('\n')) return null;
  const end = module.source.length;
  return plannedEdit(issue, 'code', module.path, module.source, [{ start: end, end, replacement: '\n' }], 'Add final newline');
}

function planRecordedEdits(issue: Issue, module: PythonModule, description: string): PlannedFix | null {
  const edits = dataEdits(issue, 'edits');
  if (edits.length === 0) return null;
  return plannedEdit(issue, 'code', module.path, module.source, edits, description);
}

/**
 * Recorded edits that read a value from the environment, plus `import os`
 * when the module lacks it.
 */
function planEnvironmentEdit(issue: Issue, module: PythonModule, description: string): PlannedFix | null {
  const edits = dataEdits(issue, 'edits');
  if (edits.length === 0) return null;
  if (dataBoolean(issue, 'needsOs') && !importsName(module, 'os')) {
    edits.push(addImportEdit(module, 'import os'));
  }
  return plannedEdit(issue, 'code', module.path, module.source, edits, description);
}

export const codeCorrector: Corrector = {
  category: 'code',

  canWrite(file, ctx: CorrectorContext) {
    return file.endsWith('.py') && !file.startsWith(`${ctx.analysis.versionsDir()}/`);
  },

  async plan(issue, ctx) {
    const module = ctx.index.modules.get(issue.location.file);
    if (!module) return null;
    switch (issue.rule) {
      case 'code/unused-import':
        return planUnusedImport(issue, module);
      case 'code/trailing-whitespace':
        return planTrailingWhitespace(issue, module);
      case 'code/missing-final-newline':
        return planFinalNewline(issue, module);
      case 'code/none-comparison':
        return planRecordedEdits(issue, module, 'Compare to None with is / is not');
      case 'code/bare-except':
        return planRecordedEdits(issue, module, 'Catch Exception instead of everything');
      case 'code/debug-enabled':
        return planEnvironmentEdit(issue, module, 'Enable debug mode only when FLASK_DEBUG=1');
      case 'code/hardcoded-secret':
        return planEnvironmentEdit(issue, module, 'Read SECRET_KEY from the environment');
      case 'code/insecure-config': {
        const setting = issue.data?.setting;
        return planEnvironmentEdit(issue, module, `Use a safe value for ${typeof setting === 'string' ? setting : 'the setting'}`);
      }
      case 'code/n-plus-one-query':
        return planRecordedEdits(issue, module, 'Mark loop that queries per row');
      default:
        return null;
    }
  },
};
