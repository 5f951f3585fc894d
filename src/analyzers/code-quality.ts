/**
 * Code analyzer: per-file hygiene and security checks over every Python
 * source. Findings are capped at `warning` by the collector.
 */

import path from 'node:path';
import type { AnalysisContext } from './context.js';
import { FindingCollector, spanOf } from './shared.js';
import {
  findCalls,
  keywordArgument,
  isIdentifierUsed,
  lineOfOffset,
  type ImportStatement,
  type PythonModule,
} from '../parsers/python-source.js';
import type { IssueDraft } from '../types/issue.js';
import type { TextEdit } from '../types/fix.js';

const SECRET_NAME_RE = /(secret|passw(or)?d|passwd|api_?key|token|private_?key)/i;
const SECRET_LINE_RE =
  /^\s*(?:([A-Za-z_][\w.]*)|[\w.]+\[\s*(['"])(\w+)\2\s*\])\s*(?::[^=\n]+)?=\s*([rRuU]?(['"])[^'"\n]+\5)\s*$/;

// ---------------------------------------------------------------------------
// Local module resolution
// ---------------------------------------------------------------------------

/**
 * Resolves dotted module paths against the project's own sources.
 */
export class LocalModules {
  private readonly files: Set<string>;
  private readonly dirs = new Set<string>();

  constructor(sourceFiles: readonly string[]) {
    this.files = new Set(sourceFiles);
    for (const file of sourceFiles) {
      let dir = path.posix.dirname(file);
      while (dir !== '.' && !this.dirs.has(dir)) {
        this.dirs.add(dir);
        dir = path.posix.dirname(dir);
      }
    }
  }

  /** Whether the first segment names a top-level project module or package */
  isLocalRoot(segment: string): boolean {
    return this.files.has(`${segment}.py`) || this.dirs.has(segment);
  }

  /** Whether `base/a/b` exists as a module, package or namespace dir */
  resolves(base: string, dotted: string): boolean {
    const rel = [base === '.' || base === '' ? null : base, ...dotted.split('.')].filter(Boolean).join('/');
    return this.files.has(`${rel}.py`) || this.files.has(`${rel}/__init__.py`) || this.dirs.has(rel);
  }

  hasFile(rel: string): boolean {
    return this.files.has(rel);
  }
}

function relativeBase(modulePath: string, level: number): string {
  let base = path.posix.dirname(modulePath);
  for (let i = 1; i < level; i++) base = path.posix.dirname(base);
  return base;
}

/**
 * Whether a binding imported by `imp` is itself a project module (an import
 * kept for its side effects, such as route registration).
 */
function bindsLocalModule(imp: ImportStatement, local: string, name: string, modules: LocalModules, file: string): boolean {
  if (imp.kind === 'import') return modules.isLocalRoot(name.split('.')[0]);
  const base = imp.level > 0 ? relativeBase(file, imp.level) : '';
  const dotted = imp.module ? `${imp.module}.${name}` : name;
  if (imp.level === 0 && !modules.isLocalRoot(imp.module.split('.')[0])) return false;
  return local !== '' && modules.resolves(base, dotted);
}

function exportedNames(module: PythonModule): Set<string> {
  const all = module.assignments.find((a) => a.target === '__all__');
  const names = new Set<string>();
  if (!all) return names;
  const re = /(['"])(\w+)\1/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(all.value)) !== null) names.add(m[2]);
  return names;
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkImports(module: PythonModule, modules: LocalModules, findings: FindingCollector): void {
  const isPackageInit = path.posix.basename(module.path) === '__init__.py';
  const exported = exportedNames(module);
  const importRanges = module.imports.map((imp) => ({ start: imp.startOffset, end: imp.endOffset }));

  for (const imp of module.imports) {
    const label = `${'.'.repeat(imp.level)}${imp.module}`;

    // Resolution of relative and project-local imports
    if (imp.level > 0) {
      const base = relativeBase(module.path, imp.level);
      const unresolved = imp.module
        ? !modules.resolves(base, imp.module)
        : !modules.hasFile(`${base === '.' ? '' : `${base}/`}__init__.py`) &&
          imp.names.some((n) => !modules.resolves(base, n.name));
      if (unresolved) {
        findings.add({
          rule: 'code/unresolved-import',
          signature: `unresolved-import:${label}`,
          location: { file: module.path, startLine: imp.line, endLine: imp.endLine },
          description: `Relative import '${label}' in ${module.path} resolves to no project file`,
        });
      }
    } else {
      const dotted = imp.kind === 'import' ? imp.names.map((n) => n.name) : [imp.module];
      for (const name of dotted) {
        if (!modules.isLocalRoot(name.split('.')[0]) || modules.resolves('', name)) continue;
        findings.add({
          rule: 'code/unresolved-import',
          signature: `unresolved-import:${name}`,
          location: { file: module.path, startLine: imp.line, endLine: imp.endLine },
          description: `Import '${name}' in ${module.path} names a project module that does not exist`,
        });
      }
    }

    // Unused module-level bindings
    if (isPackageInit || imp.indent !== 0 || imp.module === '__future__') continue;
    const unused = imp.names.filter(
      (n) =>
        n.name !== '*' &&
        !exported.has(n.local) &&
        !bindsLocalModule(imp, n.local, n.name, modules, module.path) &&
        !isIdentifierUsed(module, n.local, importRanges)
    );
    if (unused.length === 0) continue;
    const names = unused.map((n) => n.local);
    findings.add({
      rule: 'code/unused-import',
      signature: `unused-import:${names.join(',')}`,
      location: { file: module.path, startLine: imp.line, endLine: imp.endLine },
      description: `${names.map((n) => `'${n}'`).join(', ')} imported in ${module.path} but never used`,
      data: { names },
    });
  }
}

function checkWhitespace(module: PythonModule, maxLineLength: number, findings: FindingCollector): void {
  const trailing: number[] = [];
  const long: number[] = [];
  module.lines.forEach((line, i) => {
    const text = line.endsWith('\r') ? line.slice(0, -1) : line;
    if (/[ \t]+$/.test(text) && !module.openStringLines[i]) trailing.push(i + 1);
    if (text.length > maxLineLength) long.push(i + 1);
  });

  if (trailing.length > 0) {
    findings.add({
      rule: 'code/trailing-whitespace',
      signature: 'trailing-whitespace',
      location: spanOf(module.path, trailing),
      description: `${trailing.length} line(s) in ${module.path} end with whitespace`,
      data: { lines: trailing },
    });
  }
  if (long.length > 0) {
    findings.add({
      rule: 'code/line-too-long',
      signature: 'line-too-long',
      location: spanOf(module.path, long),
      description: `${long.length} line(s) in ${module.path} exceed ${maxLineLength} characters`,
      data: { lines: long },
    });
  }
  if (module.source.length > 0 && !module.source.endsWith('\n')) {
    const last = module.lines.length;
    findings.add({
      rule: 'code/missing-final-newline',
      signature: 'missing-final-newline',
      location: { file: module.path, startLine: last, endLine: last },
      description: `${module.path} does not end with a newline`,
    });
  }
}

function checkPatterns(module: PythonModule, findings: FindingCollector): void {
  // Comparisons to None
  const noneEdits: TextEdit[] = [];
  const noneLines: number[] = [];
  for (const re of [/(==|!=)(?=\s*None\b)/g, /(?<=\bNone\s*)(==|!=)/g]) {
    let m: RegExpExecArray | null;
    while ((m = re.exec(module.masked)) !== null) {
      const at = m.index;
      if (noneEdits.some((edit) => edit.start === at)) continue;
      const before = /\s/.test(module.masked[at - 1] ?? ' ') ? '' : ' ';
      const after = /\s/.test(module.masked[at + 2] ?? ' ') ? '' : ' ';
      const operator = m[1] === '==' ? 'is' : 'is not';
      noneEdits.push({ start: at, end: at + 2, replacement: `${before}${operator}${after}` });
      noneLines.push(lineOfOffset(module.lineStarts, at));
    }
  }
  if (noneEdits.length > 0) {
    findings.add({
      rule: 'code/none-comparison',
      signature: 'none-comparison',
      location: spanOf(module.path, noneLines),
      description: `${noneEdits.length} comparison(s) to None with ==/!= in ${module.path}`,
      data: { edits: noneEdits.sort((a, b) => a.start - b.start) },
    });
  }

  // Bare except clauses
  const exceptEdits: TextEdit[] = [];
  const exceptLines: number[] = [];
  const exceptRe = /^([ \t]*)(except\s*:)/gm;
  let e: RegExpExecArray | null;
  while ((e = exceptRe.exec(module.masked)) !== null) {
    const start = e.index + e[1].length;
    exceptEdits.push({ start, end: start + e[2].length, replacement: 'except Exception:' });
    exceptLines.push(lineOfOffset(module.lineStarts, start));
  }
  if (exceptEdits.length > 0) {
    findings.add({
      rule: 'code/bare-except',
      signature: 'bare-except',
      location: spanOf(module.path, exceptLines),
      description: `${exceptEdits.length} bare except clause(s) in ${module.path}`,
      data: { edits: exceptEdits },
    });
  }

  checkSettings(module, findings);
  checkSecrets(module, findings);
}

/** Expression that turns debug mode on only when FLASK_DEBUG=1 */
export const DEBUG_FROM_ENV = "os.environ.get('FLASK_DEBUG') == '1'";
export const SECRET_KEY_FROM_ENV = "os.environ.get('SECRET_KEY', 'dev-only-change-me')";

interface InsecureSetting {
  insecure: 'True' | 'False';
  replacement: string;
  problem: string;
}

const INSECURE_SETTINGS: Readonly<Record<string, InsecureSetting>> = {
  TESTING: {
    insecure: 'True',
    replacement: "os.environ.get('FLASK_TESTING') == '1'",
    problem: 'TESTING is switched on',
  },
  WTF_CSRF_ENABLED: { insecure: 'False', replacement: 'True', problem: 'CSRF protection is switched off' },
  SQLALCHEMY_TRACK_MODIFICATIONS: {
    insecure: 'True',
    replacement: 'False',
    problem: 'SQLAlchemy modification tracking is switched on',
  },
};

// `NAME = True`, `app.debug = True`, `app.config['NAME'] = False`, optionally followed by a comment
const SETTING_RE =
  /^\s*(?:([A-Za-z_]\w*\.)?([A-Za-z_]\w*)|[A-Za-z_][\w.]*\[\s*(['"])(\w+)\3\s*\])\s*=\s*(True|False)(?=\s*(?:#.*)?$)/;

function usesEnvironment(replacement: string): boolean {
  return replacement.startsWith('os.environ');
}

function inTestConfigClass(module: PythonModule, line: number): boolean {
  return module.classes.some((cls) => /test/i.test(cls.name) && cls.line < line && line <= cls.endLine);
}

function checkSettings(module: PythonModule, findings: FindingCollector): void {
  const debugEdits: Array<{ line: number; edit: TextEdit }> = [];
  for (const call of findCalls(module, '\\w+\\.run')) {
    const debug = keywordArgument(call, 'debug');
    if (debug?.value === 'True') {
      debugEdits.push({ line: call.line, edit: { start: debug.start, end: debug.end, replacement: DEBUG_FROM_ENV } });
    }
  }

  const insecure = new Map<string, { lines: number[]; edits: TextEdit[] }>();
  for (const line of module.logicalLines) {
    if (line.startLine !== line.endLine) continue;
    const m = SETTING_RE.exec(line.raw);
    if (!m) continue;
    const name = m[4] ?? (m[2] === 'debug' && m[1] ? 'DEBUG' : m[2]);
    const value = m[5];
    const valueStart = line.startOffset + m[0].length - value.length;

    if (name === 'DEBUG' && value === 'True') {
      debugEdits.push({ line: line.startLine, edit: { start: valueStart, end: valueStart + 4, replacement: DEBUG_FROM_ENV } });
      continue;
    }
    const setting = INSECURE_SETTINGS[name];
    if (!setting || setting.insecure !== value) continue;
    if (name === 'TESTING' && inTestConfigClass(module, line.startLine)) continue;
    const entry = insecure.get(name) ?? { lines: [], edits: [] };
    entry.lines.push(line.startLine);
    entry.edits.push({ start: valueStart, end: valueStart + value.length, replacement: setting.replacement });
    insecure.set(name, entry);
  }

  debugEdits
    .sort((a, b) => a.line - b.line)
    .forEach(({ line, edit }, i) => {
      findings.add({
        rule: 'code/debug-enabled',
        signature: `debug-enabled:${i + 1}`,
        location: { file: module.path, startLine: line, endLine: line },
        description: `Debug mode is enabled in ${module.path}:${line}`,
        data: { edits: [edit], needsOs: true },
      });
    });

  for (const [name, { lines, edits }] of insecure) {
    const setting = INSECURE_SETTINGS[name];
    findings.add({
      rule: 'code/insecure-config',
      signature: `insecure-config:${name}`,
      location: spanOf(module.path, lines),
      description: `${setting.problem} in ${module.path}`,
      data: { setting: name, edits, needsOs: usesEnvironment(setting.replacement) },
    });
  }
}

function checkSecrets(module: PythonModule, findings: FindingCollector): void {
  for (const line of module.logicalLines) {
    if (line.startLine !== line.endLine) continue;
    const m = SECRET_LINE_RE.exec(line.raw);
    if (!m) continue;
    const name = m[3] ?? (m[1] ?? '').split('.').pop() ?? '';
    if (!SECRET_NAME_RE.test(name)) continue;

    // Only the Flask session key has a safe environment fallback
    let data: Record<string, unknown> | undefined;
    if (name === 'SECRET_KEY') {
      const literal = m[4];
      const start = line.startOffset + line.raw.trimEnd().length - literal.length;
      data = { edits: [{ start, end: start + literal.length, replacement: SECRET_KEY_FROM_ENV }], needsOs: true };
    }
    findings.add({
      rule: 'code/hardcoded-secret',
      signature: `hardcoded-secret:${name}`,
      location: { file: module.path, startLine: line.startLine, endLine: line.startLine },
      description: `'${name}' is assigned a literal secret in ${module.path}; load it from the environment instead`,
      ...(data ? { data } : {}),
    });
  }
}

/** Comment that marks a loop as reviewed for eager loading */
export const N_PLUS_ONE_NOTE = '# N+1: load related rows up front with joinedload() or selectinload()';

const FOR_RE = /^\s*(?:async\s+)?for\s+[\w\s,()]+?\s+in\s+(.+):\s*$/;
const QUERY_RE = /\.query\b|\bdb\.session\.(?:query|get|execute|scalars?)\s*\(/;

/**
 * A loop over query results whose body runs another query per row.
 */
function checkQueryLoops(module: PythonModule, findings: FindingCollector): void {
  const lines = module.logicalLines;
  let ordinal = 0;
  lines.forEach((line, i) => {
    if (line.startLine !== line.endLine) return;
    const head = FOR_RE.exec(line.code);
    if (!head || !/\.query\b|\.all\s*\(|\.filter(?:_by)?\s*\(/.test(head[1])) return;
    if (line.raw.includes('# N+1')) return;

    let queryLine: number | null = null;
    for (const body of lines.slice(i + 1)) {
      if (body.indent <= line.indent) break;
      if (QUERY_RE.test(body.code)) {
        queryLine = body.startLine;
        break;
      }
    }
    if (queryLine === null) return;

    ordinal += 1;
    const at = line.startOffset + line.raw.trimEnd().length;
    findings.add({
      rule: 'code/n-plus-one-query',
      signature: `n-plus-one-query:${ordinal}`,
      location: { file: module.path, startLine: line.startLine, endLine: queryLine },
      description: `Loop at ${module.path}:${line.startLine} runs a query for every row (line ${queryLine})`,
      data: { edits: [{ start: at, end: at, replacement: `  ${N_PLUS_ONE_NOTE}` }] },
    });
  });
}

export async function analyzeCode(ctx: AnalysisContext): Promise<IssueDraft[]> {
  const findings = new FindingCollector(ctx.ruleset);
  const index = await ctx.index();
  const modules = new LocalModules(ctx.project.sourceFiles);
  const routeModules = new Set(ctx.project.routeModules);

  for (const module of index.modules.values()) {
    checkImports(module, modules, findings);
    checkWhitespace(module, ctx.ruleset.maxLineLength, findings);
    checkPatterns(module, findings);
    if (routeModules.has(module.path)) checkQueryLoops(module, findings);
  }
  return findings.results();
}
