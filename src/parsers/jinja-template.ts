/**
 * Jinja template scanner.
 *
 * Tokenizes `{{ }}`, `{% %}` and `{# #}` constructs with their offsets and
 * derives what the analyzers need: block structure, template references,
 * `url_for` endpoints, and root variable names with the names the template
 * binds itself.
 */

import { computeLineStarts, lineOfOffset } from './python-source.js';

export type JinjaTokenKind = 'expression' | 'statement' | 'comment';

export interface JinjaToken {
  kind: JinjaTokenKind;
  /** Inner text without delimiters or whitespace-control dashes, trimmed */
  body: string;
  start: number;
  end: number;
  /** Offset of the trimmed body's first character */
  bodyStart: number;
  line: number;
}

export interface BlockTag {
  name: string;
  start: number;
  end: number;
  line: number;
}

export interface UnclosedBlock extends BlockTag {
  /** Where a closing tag belongs: before the next block opening, or EOF */
  insertAt: number;
}

export interface UrlForReference {
  endpoint: string;
  /** Offsets of the endpoint text inside its quotes */
  start: number;
  end: number;
  line: number;
}

export interface VariableReference {
  name: string;
  /** Offset of the name */
  start: number;
  end: number;
  line: number;
  /** The expression token holds exactly this bare name */
  bare: boolean;
  /** Offsets of the whole `{{ ... }}` token when bare */
  tokenStart: number;
  tokenEnd: number;
}

export interface JinjaTemplate {
  path: string;
  source: string;
  tokens: JinjaToken[];
  extends: string | null;
  includes: string[];
  imports: string[];
  blocks: BlockTag[];
  unclosedBlocks: UnclosedBlock[];
  urlFors: UrlForReference[];
  variables: VariableReference[];
  /** Names bound by for/set/macro/with/import inside the template */
  bindings: Set<string>;
  lineStarts: number[];
}

/**
 * Names that are always available in a Flask-rendered template.
 */
export const JINJA_GLOBALS: ReadonlySet<string> = new Set([
  'range', 'lipsum', 'dict', 'cycler', 'joiner', 'namespace',
  'url_for', 'get_flashed_messages', 'config', 'request', 'session', 'g',
  'self', 'loop', 'super', 'varargs', 'kwargs', 'caller',
  'true', 'false', 'none', 'True', 'False', 'None',
  'csrf_token', 'current_user',
]);

const KEYWORDS = new Set([
  'and', 'or', 'not', 'in', 'is', 'if', 'else', 'elif', 'for', 'recursive',
  'as', 'import', 'from', 'with', 'without', 'context', 'ignore', 'missing',
]);

const TOKEN_RE = /\{\{([\s\S]*?)\}\}|\{%([\s\S]*?)%\}|\{#([\s\S]*?)#\}/g;

function tokenize(source: string, lineStarts: number[]): JinjaToken[] {
  const tokens: JinjaToken[] = [];
  let rawUntil = -1;
  let match: RegExpExecArray | null;
  TOKEN_RE.lastIndex = 0;

  while ((match = TOKEN_RE.exec(source)) !== null) {
    if (match.index < rawUntil) continue;
    const kind: JinjaTokenKind =
      match[1] !== undefined ? 'expression' : match[2] !== undefined ? 'statement' : 'comment';
    const inner = match[1] ?? match[2] ?? match[3] ?? '';
    const innerStart = match.index + 2;
    const stripped = inner.replace(/^[-+]/, '').replace(/[-+]$/, '');
    const leadOffset = inner.length - inner.replace(/^[-+]/, '').length;
    const leadingSpace = stripped.length - stripped.trimStart().length;
    const token: JinjaToken = {
      kind,
      body: stripped.trim(),
      start: match.index,
      end: match.index + match[0].length,
      bodyStart: innerStart + leadOffset + leadingSpace,
      line: lineOfOffset(lineStarts, match.index),
    };
    tokens.push(token);

    if (kind === 'statement' && /^raw\b/.test(token.body)) {
      const endRaw = /\{%-?\s*endraw\s*-?%\}/g;
      endRaw.lastIndex = token.end;
      const close = endRaw.exec(source);
      rawUntil = close ? close.index : source.length;
    }
  }
  return tokens;
}

function tagName(token: JinjaToken): string {
  return /^(\w+)/.exec(token.body)?.[1] ?? '';
}

function quoted(text: string): string[] {
  const names: string[] = [];
  const re = /(['"])([^'"]+)\1/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) names.push(m[2]);
  return names;
}

/**
 * Mask string literal contents in an expression so identifier scanning
 * ignores them. Length and offsets are preserved.
 */
function maskStrings(text: string): string {
  return text.replace(/(['"])(?:\\.|(?!\1)[^\\])*\1/g, (s) => s[0] + ' '.repeat(s.length - 2) + s[s.length - 1]);
}

/**
 * Root identifiers of a Jinja expression: not attribute accesses, not
 * filter or test names, not keyword-argument names.
 */
export function rootIdentifiers(expression: string): Array<{ name: string; index: number }> {
  const masked = maskStrings(expression);
  const result: Array<{ name: string; index: number }> = [];
  const re = /[A-Za-z_]\w*/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(masked)) !== null) {
    const name = m[0];
    const before = masked.slice(0, m.index).trimEnd();
    const after = masked.slice(m.index + name.length).trimStart();
    if (KEYWORDS.has(name)) continue;
    if (before.endsWith('.')) continue;
    if (before.endsWith('|')) continue;
    if (/\bis(\s+not)?$/.test(before)) continue;
    if (after.startsWith('=') && !after.startsWith('==')) continue;
    if (m.index > 0 && /[\d]/.test(masked[m.index - 1])) continue;
    result.push({ name, index: m.index });
  }
  return result;
}

function targetsOf(text: string): string[] {
  return text
    .replace(/[()]/g, ' ')
    .split(',')
    .map((t) => t.trim())
    .filter((t) => /^[A-Za-z_]\w*$/.test(t));
}

/**
 * Scan a template.
 */
export function parseJinjaTemplate(templatePath: string, source: string): JinjaTemplate {
  const lineStarts = computeLineStarts(source);
  const tokens = tokenize(source, lineStarts);

  let extendsTarget: string | null = null;
  const includes: string[] = [];
  const imports: string[] = [];
  const blocks: BlockTag[] = [];
  const openBlocks: BlockTag[] = [];
  const unclosed: BlockTag[] = [];
  const urlFors: UrlForReference[] = [];
  const variables: VariableReference[] = [];
  const bindings = new Set<string>();

  const collectExpression = (token: JinjaToken, text: string, textStart: number): void => {
    const urlRe = /url_for\s*\(\s*(['"])([^'"]+)\1/g;
    let u: RegExpExecArray | null;
    while ((u = urlRe.exec(text)) !== null) {
      const endpointStart = textStart + u.index + u[0].length - 1 - u[2].length;
      urlFors.push({
        endpoint: u[2],
        start: endpointStart,
        end: endpointStart + u[2].length,
        line: lineOfOffset(lineStarts, endpointStart),
      });
    }
    const roots = rootIdentifiers(text);
    const bare = token.kind === 'expression' && roots.length === 1 && /^[A-Za-z_]\w*$/.test(text.trim());
    for (const root of roots) {
      const start = textStart + root.index;
      variables.push({
        name: root.name,
        start,
        end: start + root.name.length,
        line: lineOfOffset(lineStarts, start),
        bare,
        tokenStart: token.start,
        tokenEnd: token.end,
      });
    }
  };

  for (const token of tokens) {
    if (token.kind === 'comment') continue;
    if (token.kind === 'expression') {
      collectExpression(token, token.body, token.bodyStart);
      continue;
    }

    const tag = tagName(token);
    const rest = token.body.slice(tag.length);
    const restStart = token.bodyStart + tag.length;

    switch (tag) {
      case 'extends':
        extendsTarget = quoted(rest)[0] ?? extendsTarget;
        break;
      case 'include':
        includes.push(...quoted(rest).slice(0, 1));
        break;
      case 'import': {
        imports.push(...quoted(rest).slice(0, 1));
        const alias = /\bas\s+(\w+)/.exec(rest);
        if (alias) bindings.add(alias[1]);
        break;
      }
      case 'from': {
        imports.push(...quoted(rest).slice(0, 1));
        const names = /\bimport\s+(.+)$/.exec(rest);
        if (names) {
          for (const part of names[1].split(',')) {
            const m = /(\w+)(?:\s+as\s+(\w+))?/.exec(part.trim());
            if (m) bindings.add(m[2] ?? m[1]);
          }
        }
        break;
      }
      case 'block': {
        const name = /^\s*(\w+)/.exec(rest)?.[1] ?? '';
        const block = { name, start: token.start, end: token.end, line: token.line };
        blocks.push(block);
        openBlocks.push(block);
        break;
      }
      case 'endblock': {
        const name = /^\s*(\w+)/.exec(rest)?.[1];
        if (name) {
          const index = openBlocks.map((b) => b.name).lastIndexOf(name);
          if (index >= 0) {
            unclosed.push(...openBlocks.splice(index + 1));
            openBlocks.pop();
          }
        } else {
          openBlocks.pop();
        }
        break;
      }
      case 'for': {
        const m = /^\s*(.+?)\s+in\s+([\s\S]+)$/.exec(rest);
        if (m) {
          for (const t of targetsOf(m[1])) bindings.add(t);
          collectExpression(token, m[2], restStart + rest.length - m[2].length);
        }
        break;
      }
      case 'set': {
        const m = /^\s*([\w\s,()]+?)\s*(=\s*([\s\S]+))?$/.exec(rest);
        if (m) {
          for (const t of targetsOf(m[1])) bindings.add(t);
          if (m[3]) collectExpression(token, m[3], restStart + rest.length - m[3].length);
        }
        break;
      }
      case 'macro': {
        const m = /^\s*(\w+)\s*\(([^)]*)\)/.exec(rest);
        if (m) {
          bindings.add(m[1]);
          for (const param of m[2].split(',')) {
            const p = /^\s*(\w+)/.exec(param);
            if (p) bindings.add(p[1]);
          }
        }
        break;
      }
      case 'with': {
        for (const part of rest.split(',')) {
          const m = /^\s*(\w+)\s*=/.exec(part);
          if (m) bindings.add(m[1]);
        }
        break;
      }
      case 'if':
      case 'elif':
      case 'filter':
      case 'call':
        collectExpression(token, rest, restStart);
        break;
      default:
        break;
    }
  }

  unclosed.push(...openBlocks);
  const unclosedBlocks: UnclosedBlock[] = unclosed
    .sort((a, b) => a.start - b.start)
    .map((block) => {
      const next = blocks.find((b) => b.start > block.start);
      return { ...block, insertAt: next ? next.start : source.length };
    });

  return {
    path: templatePath,
    source,
    tokens,
    extends: extendsTarget,
    includes,
    imports,
    blocks,
    unclosedBlocks,
    urlFors,
    variables,
    bindings,
    lineStarts,
  };
}

/**
 * Root variable names the template reads from its render context.
 */
export function contextVariables(template: JinjaTemplate): VariableReference[] {
  return template.variables.filter(
    (v) => !template.bindings.has(v.name) && !JINJA_GLOBALS.has(v.name)
  );
}
