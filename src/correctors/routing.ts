/**
 * Routing corrector: repairs route handlers, endpoint names, blueprint
 * registration and preset-required routes.
 */

import {
  addImportEdit,
  dataBoolean,
  dataNumber,
  dataString,
  importsName,
  plannedEdit,
  type Corrector,
  type CorrectorContext,
} from './corrector.js';
import { hasEndpoint } from '../analyzers/routing.js';
import { offsetOfLine, type PythonModule } from '../parsers/python-source.js';
import type { Issue } from '../types/issue.js';
import type { PlannedFix, TextEdit } from '../types/fix.js';

const INDEX_NAMES = new Set(['index', 'home', 'main', 'root', 'homepage', 'landing']);

const CRUD_VERBS: Array<{ pattern: RegExp; verb: string }> = [
  { pattern: /^(list|all)_(\w+)$/, verb: 'list' },
  { pattern: /^(create|new|add)_(\w+)$/, verb: 'create' },
  { pattern: /^(edit|update)_(\w+)$/, verb: 'edit' },
  { pattern: /^(delete|remove)_(\w+)$/, verb: 'delete' },
  { pattern: /^(view|show|get|detail)_(\w+)$/, verb: 'detail' },
  { pattern: /^(\w+)_(detail|list)$/, verb: '' },
];

/**
 * Template a handler most plausibly renders: `index.html` for landing
 * handlers, `<resource>/<verb>.html` for CRUD-style names, otherwise
 * `<handler>.html`; prefixed with the blueprint name for blueprint routes.
 */
export function inferTemplateName(handler: string, blueprint: string | null): string {
  let name = `${handler}.html`;
  if (INDEX_NAMES.has(handler)) {
    name = 'index.html';
  } else {
    for (const { pattern, verb } of CRUD_VERBS) {
      const m = pattern.exec(handler);
      if (!m) continue;
      name = verb === '' ? `${m[1]}/${m[2]}.html` : `${m[2]}/${verb}.html`;
      break;
    }
  }
  return blueprint ? `${blueprint}/${name}` : name;
}

function moduleFor(ctx: CorrectorContext, file: string): PythonModule | undefined {
  return ctx.index.modules.get(file);
}

async function planMissingReturn(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const module = moduleFor(ctx, issue.location.file);
  const handlerName = dataString(issue, 'handler');
  if (!module || !handlerName) return null;
  const fn = module.functions.find((f) => f.name === handlerName && f.line === issue.location.startLine);
  if (!fn || fn.bodyIndentText === null) return null;

  const template = inferTemplateName(handlerName, dataString(issue, 'blueprint'));
  const edits: TextEdit[] = [
    { start: fn.endOffset, end: fn.endOffset, replacement: `\n${fn.bodyIndentText}return render_template('${template}')` },
  ];
  if (!importsName(module, 'render_template')) {
    edits.push(addImportEdit(module, 'from flask import render_template'));
  }
  return plannedEdit(issue, 'routing', module.path, module.source, edits, `Return render_template('${template}') from ${handlerName}()`);
}

async function planMalformedResponse(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const module = moduleFor(ctx, issue.location.file);
  const start = dataNumber(issue, 'start');
  const end = dataNumber(issue, 'end');
  if (!module || start === null || end === null) return null;
  const statement = module.source.slice(start, end);
  const comment = /\s*#.*$/.exec(statement)?.[0] ?? '';
  return plannedEdit(
    issue,
    'routing',
    module.path,
    module.source,
    [{ start, end: end - comment.length, replacement: "return '', 204" }],
    'Return an empty 204 response instead of None'
  );
}

async function planDuplicateEndpoint(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const module = moduleFor(ctx, issue.location.file);
  const handler = dataString(issue, 'handler');
  const newName = dataString(issue, 'newName');
  const nameOffset = dataNumber(issue, 'nameOffset');
  if (!module || !handler || !newName || nameOffset === null || dataBoolean(issue, 'explicitEndpoint')) return null;
  if (module.source.slice(nameOffset, nameOffset + handler.length) !== handler) return null;
  if (module.functions.some((f) => f.name === newName)) return null;
  return plannedEdit(
    issue,
    'routing',
    module.path,
    module.source,
    [{ start: nameOffset, end: nameOffset + handler.length, replacement: newName }],
    `Rename duplicate handler ${handler}() to ${newName}()`
  );
}

/**
 * Dotted module path of a root-relative file (`app/auth/views.py` -> `app.auth.views`).
 */
export function modulePath(file: string): string {
  const noExt = file.replace(/\.py$/, '');
  const parts = noExt.split('/');
  if (parts[parts.length - 1] === '__init__') parts.pop();
  return parts.join('.');
}

async function planUnregisteredBlueprint(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const variable = dataString(issue, 'variable');
  const bpFile = dataString(issue, 'file');
  const entry = ctx.analysis.project.entryPoint;
  const module = moduleFor(ctx, entry.file);
  if (!variable || !bpFile || !module) return null;

  const edits: TextEdit[] = [];
  let appVar = entry.symbol;
  let insertAt: number;
  let indent = '';

  if (entry.kind === 'factory') {
    const factory = module.functions.find((f) => f.name === entry.symbol && f.indent === 0);
    if (!factory || factory.bodyIndentText === null) return null;
    indent = factory.bodyIndentText;
    const finalReturn = factory.returns[factory.returns.length - 1];
    if (!finalReturn) return null;
    appVar = finalReturn.expression.replace(/#.*$/, '').trim();
    if (!/^\w+$/.test(appVar)) return null;
    insertAt = offsetOfLine(module.lineStarts, finalReturn.line);
  } else {
    const runGuard = module.logicalLines.find((l) => l.indent === 0 && /^if\s+__name__\s*==/.test(l.code));
    insertAt = runGuard ? runGuard.startOffset : module.source.length;
  }

  const alias = `${variable}_blueprint`;
  const localImport =
    bpFile === entry.file
      ? null
      : `from ${modulePath(bpFile)} import ${variable} as ${alias}`;
  const registered = localImport ? alias : variable;
  const registration = `${indent}${appVar}.register_blueprint(${registered})\n`;

  if (entry.kind === 'factory' && localImport) {
    edits.push({ start: insertAt, end: insertAt, replacement: `${indent}${localImport}\n${registration}` });
  } else {
    const needsBreak = insertAt === module.source.length && !module.source.endsWith('\n') && module.source.length > 0;
    edits.push({ start: insertAt, end: insertAt, replacement: `${needsBreak ? '\n' : ''}${registration}` });
    if (localImport) edits.push(addImportEdit(module, localImport));
  }
  return plannedEdit(issue, 'routing', module.path, module.source, edits, `Register blueprint ${variable} on ${appVar}`);
}

async function planRequiredRoute(issue: Issue, ctx: CorrectorContext): Promise<PlannedFix | null> {
  const endpoint = dataString(issue, 'endpoint');
  const module = moduleFor(ctx, issue.location.file);
  if (!endpoint || !module || !/^[A-Za-z_]\w*$/.test(endpoint)) return null;
  if (hasEndpoint(ctx.index.routes, endpoint)) return null;

  const owner = ctx.index.routes.find((r) => r.file === module.path)?.owner ?? ctx.analysis.project.entryPoint.symbol;
  const blueprint = ctx.index.blueprints.find((bp) => bp.file === module.path && bp.variable === owner);
  if (ctx.analysis.project.entryPoint.kind === 'factory' && !blueprint && owner === ctx.analysis.project.entryPoint.symbol) {
    return null;
  }

  const urlPath = INDEX_NAMES.has(endpoint) ? '/' : `/${endpoint.replace(/_/g, '-')}`;
  const template = inferTemplateName(endpoint, blueprint?.name ?? null);
  const separator = module.source.endsWith('\n') ? '\n\n' : '\n\n\n';
  const stub =
    `${separator}@${owner}.route('${urlPath}')\n` +
    `def ${endpoint}():\n` +
    `    return render_template('${template}')\n`;

  const edits: TextEdit[] = [{ start: module.source.length, end: module.source.length, replacement: stub }];
  if (!importsName(module, 'render_template')) edits.push(addImportEdit(module, 'from flask import render_template'));
  return plannedEdit(issue, 'routing', module.path, module.source, edits, `Add ${endpoint}() route at ${urlPath}`);
}

export const routingCorrector: Corrector = {
  category: 'routing',

  canWrite(file, ctx) {
    const { project } = ctx.analysis;
    return file === project.entryPoint.file || project.routeModules.includes(file);
  },

  async plan(issue, ctx) {
    switch (issue.rule) {
      case 'routing/missing-return':
        return planMissingReturn(issue, ctx);
      case 'routing/malformed-response':
        return planMalformedResponse(issue, ctx);
      case 'routing/duplicate-endpoint':
        return planDuplicateEndpoint(issue, ctx);
      case 'routing/unregistered-blueprint':
        return planUnregisteredBlueprint(issue, ctx);
      case 'routing/required-route':
        return planRequiredRoute(issue, ctx);
      default:
        return null;
    }
  },
};
