/**
 * Maps runtime failures seen by the sandbox to an issue category and a
 * source location.
 */

import path from 'node:path';
import type { IssueCategory, IssueLocation } from '../types/issue.js';

const CATEGORY_PATTERNS: Array<{ category: IssueCategory; pattern: RegExp }> = [
  { category: 'templating', pattern: /\bjinja2\b|TemplateNotFound|TemplateSyntaxError|UndefinedError/ },
  { category: 'persistence', pattern: /\bsqlalchemy\b|\balembic\b|OperationalError|ProgrammingError|IntegrityError/i },
  { category: 'routing', pattern: /werkzeug\.routing|BuildError|MethodNotAllowed|url_for/ },
];

/**
 * Category a traceback points at; `code` when nothing more specific matches.
 */
export function attributeCategory(text: string): IssueCategory {
  for (const { category, pattern } of CATEGORY_PATTERNS) {
    if (pattern.test(text)) return category;
  }
  return 'code';
}

const FRAME_RE = /^\s*File "([^"]+)", line (\d+)/gm;

/**
 * Innermost traceback frame inside the project root.
 */
export function attributeLocation(traceback: string, root: string): IssueLocation | null {
  let location: IssueLocation | null = null;
  for (const match of traceback.matchAll(FRAME_RE)) {
    const file = match[1];
    const absolute = path.isAbsolute(file) ? file : path.join(root, file);
    const relative = path.relative(root, absolute);
    if (relative.startsWith('..') || path.isAbsolute(relative)) continue;
    const posix = relative.split(path.sep).join('/');
    if (posix.split('/').some((part) => part === 'site-packages' || part.startsWith('.venv') || part === 'venv')) continue;
    const line = Number(match[2]);
    location = { file: posix, startLine: line, endLine: line };
  }
  return location;
}

/**
 * Last non-empty line of a traceback, usually `module.Error: message`.
 */
export function exceptionSummary(traceback: string): string {
  const lines = traceback.split('\n').map((l) => l.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? 'unknown error';
}
