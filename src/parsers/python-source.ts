/**
 * Indentation-aware structural reader for Python modules.
 *
 * Not a full parser: it recovers logical lines, imports, decorated
 * functions, classes, assignments and return statements well enough for
 * rule-based analysis of conventional web-application code. String
 * literals and comments are masked before any structural matching so that
 * quoted text never looks like code.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LogicalLine {
  /** 1-based first physical line */
  startLine: number;
  /** 1-based last physical line */
  endLine: number;
  /** Column width of leading whitespace (tabs expand to 8) */
  indent: number;
  /** Leading whitespace as written */
  indentText: string;
  /** Masked text, physical lines joined with '\n' */
  code: string;
  /** Raw text, same length and alignment as `code` */
  raw: string;
  startOffset: number;
  /** Offset just past the last character of `endLine` (excluding '\n') */
  endOffset: number;
}

export interface ImportBinding {
  /** Imported module or attribute */
  name: string;
  alias: string | null;
  /** Name bound in the importing module */
  local: string;
}

export interface ImportStatement {
  kind: 'import' | 'from';
  /** Module path without leading dots; empty for `from . import x` */
  module: string;
  /** Number of leading dots on a relative import */
  level: number;
  names: ImportBinding[];
  parenthesized: boolean;
  line: number;
  endLine: number;
  indent: number;
  indentText: string;
  startOffset: number;
  endOffset: number;
}

export interface Decorator {
  /** Decorator text after '@', whitespace-collapsed */
  text: string;
  /** Raw text after '@' */
  raw: string;
  line: number;
  endLine: number;
  /** Offset of the '@' */
  startOffset: number;
}

export interface ReturnStatement {
  line: number;
  endLine: number;
  /** Raw returned expression, empty for a bare `return` */
  expression: string;
  indent: number;
  startOffset: number;
  endOffset: number;
}

export interface FunctionDef {
  name: string;
  isAsync: boolean;
  /** Raw parameter list */
  params: string;
  /** Line of the `def` keyword */
  line: number;
  /** First decorator line, or the def line */
  startLine: number;
  endLine: number;
  indent: number;
  /** Indentation text of the body, or null for a one-line def */
  bodyIndentText: string | null;
  decorators: Decorator[];
  returns: ReturnStatement[];
  hasYield: boolean;
  /** Body contains `raise` or an `abort(...)` call */
  raises: boolean;
  /** Name of the directly enclosing class, if any */
  className: string | null;
  /** Offset of the name token */
  nameOffset: number;
  /** Offset just past the last body character */
  endOffset: number;
}

export interface Assignment {
  target: string;
  /** Raw value expression */
  value: string;
  line: number;
  endLine: number;
  indent: number;
  indentText: string;
  startOffset: number;
  endOffset: number;
  /** Offset of the first character of the value */
  valueOffset: number;
}

export interface ClassDef {
  name: string;
  /** Base class expressions, whitespace-collapsed */
  bases: string[];
  line: number;
  startLine: number;
  endLine: number;
  indent: number;
  bodyIndentText: string | null;
  decorators: Decorator[];
  /** Statements at the class body level of the form `name = value` */
  assignments: Assignment[];
  methods: string[];
  endOffset: number;
}

export interface PythonModule {
  /** Root-relative POSIX path */
  path: string;
  source: string;
  masked: string;
  lines: string[];
  lineStarts: number[];
  logicalLines: LogicalLine[];
  imports: ImportStatement[];
  functions: FunctionDef[];
  classes: ClassDef[];
  /** Module-level `name = value` statements */
  assignments: Assignment[];
  /** Per physical line (0-based): the line break ending it is inside a string */
  openStringLines: boolean[];
}

export interface CallArgument {
  /** Keyword name, or null for positional arguments */
  keyword: string | null;
  /** `*` or `**` unpacking marker */
  star: '' | '*' | '**';
  /** Raw value text, trimmed */
  value: string;
  start: number;
  end: number;
}

export interface CallSite {
  callee: string;
  /** Offset of the callee's first character */
  start: number;
  openParen: number;
  closeParen: number;
  /** Offset just past the closing parenthesis */
  end: number;
  line: number;
  args: CallArgument[];
}

// ---------------------------------------------------------------------------
// Masking
// ---------------------------------------------------------------------------

interface MaskResult {
  masked: string;
  /** Per physical line: the newline ending it lies inside a string literal */
  openAtLineEnd: boolean[];
}

function maskSource(source: string): MaskResult {
  const out: string[] = [];
  const openAtLineEnd: boolean[] = [];
  const n = source.length;
  let i = 0;

  const pushNewline = (inString: boolean): void => {
    out.push('\n');
    openAtLineEnd.push(inString);
  };

  while (i < n) {
    const ch = source[i];
    if (ch === '#') {
      while (i < n && source[i] !== '\n') {
        out.push(' ');
        i++;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      const quote = source.startsWith(ch.repeat(3), i) ? ch.repeat(3) : ch;
      out.push(quote);
      i += quote.length;
      while (i < n) {
        if (source[i] === '\\' && i + 1 < n) {
          out.push(' ');
          if (source[i + 1] === '\n') pushNewline(true);
          else out.push(' ');
          i += 2;
          continue;
        }
        if (source.startsWith(quote, i)) {
          out.push(quote);
          i += quote.length;
          break;
        }
        if (source[i] === '\n') {
          // Unterminated single-quoted string ends at the line break
          if (quote.length === 1) break;
          pushNewline(true);
        } else {
          out.push(' ');
        }
        i++;
      }
      continue;
    }
    if (ch === '\n') pushNewline(false);
    else out.push(ch);
    i++;
  }
  openAtLineEnd.push(false);
  return { masked: out.join(''), openAtLineEnd };
}

/**
 * Replace string literal contents and comments with spaces. Quotes, line
 * breaks and every other character keep their offsets.
 */
export function maskPython(source: string): string {
  return maskSource(source).masked;
}

// ---------------------------------------------------------------------------
// Offsets
// ---------------------------------------------------------------------------

export function computeLineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

/**
 * 1-based line containing `offset`
 */
export function lineOfOffset(lineStarts: readonly number[], offset: number): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

/**
 * Offset of the first character of a 1-based line
 */
export function offsetOfLine(lineStarts: readonly number[], line: number): number {
  const index = Math.min(Math.max(line - 1, 0), lineStarts.length - 1);
  return lineStarts[index];
}

function measureIndent(text: string): { width: number; text: string } {
  let width = 0;
  let i = 0;
  while (i < text.length && (text[i] === ' ' || text[i] === '\t')) {
    width = text[i] === '\t' ? width + 8 - (width % 8) : width + 1;
    i++;
  }
  return { width, text: text.slice(0, i) };
}

// ---------------------------------------------------------------------------
// Logical lines
// ---------------------------------------------------------------------------

const OPENERS = new Set(['(', '[', '{']);
const CLOSERS = new Set([')', ']', '}']);

function buildLogicalLines(
  rawLines: string[],
  maskedLines: string[],
  openAtLineEnd: boolean[],
  lineStarts: number[]
): LogicalLine[] {
  const result: LogicalLine[] = [];
  let i = 0;

  while (i < rawLines.length) {
    if (maskedLines[i].trim() === '') {
      i++;
      continue;
    }

    let depth = 0;
    let j = i;
    for (;;) {
      for (const ch of maskedLines[j]) {
        if (OPENERS.has(ch)) depth++;
        else if (CLOSERS.has(ch)) depth = Math.max(0, depth - 1);
      }
      const continued =
        depth > 0 || openAtLineEnd[j] || maskedLines[j].trimEnd().endsWith('\\');
      if (!continued || j + 1 >= rawLines.length) break;
      j++;
    }

    const indent = measureIndent(rawLines[i]);
    result.push({
      startLine: i + 1,
      endLine: j + 1,
      indent: indent.width,
      indentText: indent.text,
      code: maskedLines.slice(i, j + 1).join('\n'),
      raw: rawLines.slice(i, j + 1).join('\n'),
      startOffset: lineStarts[i],
      endOffset: lineStarts[j] + rawLines[j].length,
    });
    i = j + 1;
  }

  return result;
}

// ---------------------------------------------------------------------------
// Helpers over masked text
// ---------------------------------------------------------------------------

/**
 * Index of the bracket closing the one at `openIndex`, or -1
 */
export function findMatchingBracket(masked: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < masked.length; i++) {
    const ch = masked[i];
    if (OPENERS.has(ch)) depth++;
    else if (CLOSERS.has(ch)) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/**
 * Split `[start, end)` of the source on top-level commas.
 */
function splitTopLevel(
  masked: string,
  start: number,
  end: number
): Array<{ start: number; end: number }> {
  const parts: Array<{ start: number; end: number }> = [];
  let depth = 0;
  let partStart = start;
  for (let i = start; i < end; i++) {
    const ch = masked[i];
    if (OPENERS.has(ch)) depth++;
    else if (CLOSERS.has(ch)) depth--;
    else if (ch === ',' && depth === 0) {
      parts.push({ start: partStart, end: i });
      partStart = i + 1;
    }
  }
  parts.push({ start: partStart, end });
  return parts;
}

/**
 * Parse the arguments between a pair of parentheses.
 */
export function parseCallArguments(
  source: string,
  masked: string,
  openParen: number,
  closeParen: number
): CallArgument[] {
  const args: CallArgument[] = [];
  for (const part of splitTopLevel(masked, openParen + 1, closeParen)) {
    const codeText = masked.slice(part.start, part.end);
    if (codeText.trim() === '') continue;
    const leading = codeText.length - codeText.trimStart().length;
    let valueStart = part.start + leading;
    let star: CallArgument['star'] = '';
    let keyword: string | null = null;

    if (masked.startsWith('**', valueStart)) {
      star = '**';
      valueStart += 2;
    } else if (masked[valueStart] === '*') {
      star = '*';
      valueStart += 1;
    } else {
      const kw = /^([A-Za-z_]\w*)\s*=(?!=)\s*/.exec(masked.slice(valueStart, part.end));
      if (kw) {
        keyword = kw[1];
        valueStart += kw[0].length;
      }
    }

    const rawValue = source.slice(valueStart, part.end);
    const trimmedEnd = valueStart + rawValue.trimEnd().length;
    args.push({
      keyword,
      star,
      value: source.slice(valueStart, trimmedEnd).trim(),
      start: valueStart,
      end: trimmedEnd,
    });
  }
  return args;
}

/**
 * Find calls whose callee matches `callee` (a regex source, e.g.
 * `render_template` or `op\\.add_column`).
 */
export function findCalls(
  module: Pick<PythonModule, 'source' | 'masked' | 'lineStarts'>,
  callee: string,
  range?: { start: number; end: number }
): CallSite[] {
  const pattern = new RegExp(`(?<![\\w.])(${callee})\\s*\\(`, 'g');
  const start = range?.start ?? 0;
  const end = range?.end ?? module.masked.length;
  const calls: CallSite[] = [];

  pattern.lastIndex = start;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(module.masked)) !== null) {
    if (match.index >= end) break;
    const openParen = match.index + match[0].length - 1;
    const closeParen = findMatchingBracket(module.masked, openParen);
    if (closeParen === -1) continue;
    calls.push({
      callee: match[1],
      start: match.index,
      openParen,
      closeParen,
      end: closeParen + 1,
      line: lineOfOffset(module.lineStarts, match.index),
      args: parseCallArguments(module.source, module.masked, openParen, closeParen),
    });
  }
  return calls;
}

/**
 * Value of a plain string literal (optionally r/u prefixed), else null.
 */
export function stringLiteral(expression: string): string | null {
  const match = /^[rRuU]?(?:'((?:[^'\\\n]|\\.)*)'|"((?:[^"\\\n]|\\.)*)")$/.exec(expression.trim());
  if (!match) return null;
  const body = match[1] ?? match[2] ?? '';
  return body.replace(/\\(['"\\])/g, '$1');
}

/**
 * Keyword argument value, or undefined when absent.
 */
export function keywordArgument(call: CallSite, name: string): CallArgument | undefined {
  return call.args.find((arg) => arg.keyword === name);
}

/**
 * Positional argument by index, ignoring keyword and unpacked arguments.
 */
export function positionalArgument(call: CallSite, index: number): CallArgument | undefined {
  return call.args.filter((arg) => arg.keyword === null && arg.star === '')[index];
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

const DEF_RE = /^\s*(async\s+)?def\s+([A-Za-z_]\w*)\s*\(/;
const CLASS_RE = /^\s*class\s+([A-Za-z_]\w*)\s*(\()?/;
const RETURN_RE = /^\s*return\b/;
const ASSIGN_RE = /^\s*([A-Za-z_][\w.]*)\s*(?::[^=\n]+)?=(?!=)\s*/;
const IMPORT_RE = /^\s*import\s+/;
const FROM_IMPORT_RE = /^\s*from\s+(\.*)([\w.]*)\s+import\s+/;

/**
 * Index in `code` of the colon ending a compound statement header.
 */
function headerColon(code: string, from: number): number {
  let depth = 0;
  for (let i = from; i < code.length; i++) {
    const ch = code[i];
    if (OPENERS.has(ch)) depth++;
    else if (CLOSERS.has(ch)) depth--;
    else if (ch === ':' && depth === 0) return i;
  }
  return -1;
}

interface BlockExtent {
  bodyStart: number;
  bodyEnd: number;
  endLine: number;
  endOffset: number;
  bodyIndentText: string | null;
}

function blockExtent(lines: LogicalLine[], headerIndex: number, colon: number): BlockExtent {
  const header = lines[headerIndex];
  const inline = colon >= 0 && header.code.slice(colon + 1).trim() !== '';
  let last = headerIndex;
  let k = headerIndex + 1;
  if (!inline) {
    while (k < lines.length && lines[k].indent > header.indent) {
      last = k;
      k++;
    }
  }
  return {
    bodyStart: headerIndex + 1,
    bodyEnd: inline ? headerIndex + 1 : k,
    endLine: lines[last].endLine,
    endOffset: lines[last].endOffset,
    bodyIndentText: !inline && last > headerIndex ? lines[headerIndex + 1].indentText : null,
  };
}

function collectDecorators(lines: LogicalLine[], headerIndex: number): Decorator[] {
  const decorators: Decorator[] = [];
  const indent = lines[headerIndex].indent;
  for (let k = headerIndex - 1; k >= 0; k--) {
    const line = lines[k];
    if (line.indent !== indent || !line.code.trimStart().startsWith('@')) break;
    const at = line.raw.indexOf('@');
    const raw = line.raw.slice(at + 1).trimEnd();
    decorators.unshift({
      text: collapse(raw),
      raw,
      line: line.startLine,
      endLine: line.endLine,
      startOffset: line.startOffset + at,
    });
  }
  return decorators;
}

function parseImport(line: LogicalLine): ImportStatement | null {
  const base = {
    line: line.startLine,
    endLine: line.endLine,
    indent: line.indent,
    indentText: line.indentText,
    startOffset: line.startOffset,
    endOffset: line.endOffset,
  };
  const parseNames = (text: string, dotted: boolean): ImportBinding[] =>
    text
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part !== '' && part !== '\\')
      .map((part) => {
        const m = /^([\w.*]+)(?:\s+as\s+(\w+))?$/.exec(part.replace(/\\\s*$/, '').trim());
        const name = m ? m[1] : part;
        const alias = m?.[2] ?? null;
        const local = alias ?? (dotted ? name.split('.')[0] : name);
        return { name, alias, local };
      });

  const from = FROM_IMPORT_RE.exec(line.code);
  if (from) {
    let rest = line.code.slice(from[0].length).replace(/\\\n/g, ' ').trim();
    const parenthesized = rest.startsWith('(');
    if (parenthesized) rest = rest.replace(/^\(/, '').replace(/\)\s*$/, '');
    return {
      ...base,
      kind: 'from',
      module: from[2],
      level: from[1].length,
      names: parseNames(rest.replace(/\s+/g, ' '), false),
      parenthesized,
    };
  }
  const plain = IMPORT_RE.exec(line.code);
  if (plain) {
    const rest = line.code.slice(plain[0].length).replace(/\\\n/g, ' ');
    const names = parseNames(rest.replace(/\s+/g, ' '), true);
    return {
      ...base,
      kind: 'import',
      module: names[0]?.name ?? '',
      level: 0,
      names,
      parenthesized: false,
    };
  }
  return null;
}

function parseAssignment(line: LogicalLine): Assignment | null {
  const match = ASSIGN_RE.exec(line.code);
  if (!match) return null;
  const valueOffset = line.startOffset + match[0].length;
  return {
    target: match[1],
    value: line.raw.slice(match[0].length).trim(),
    line: line.startLine,
    endLine: line.endLine,
    indent: line.indent,
    indentText: line.indentText,
    startOffset: line.startOffset,
    endOffset: line.endOffset,
    valueOffset,
  };
}

/**
 * Build the structural view of a Python module.
 */
export function parsePythonModule(modulePath: string, source: string): PythonModule {
  const { masked, openAtLineEnd } = maskSource(source);
  const lines = source.split('\n');
  const maskedLines = masked.split('\n');
  const lineStarts = computeLineStarts(source);
  const logical = buildLogicalLines(lines, maskedLines, openAtLineEnd, lineStarts);

  const imports: ImportStatement[] = [];
  const functions: FunctionDef[] = [];
  const classes: ClassDef[] = [];
  const assignments: Assignment[] = [];
  const returns: ReturnStatement[] = [];
  const classRanges: Array<{ cls: ClassDef; bodyStart: number; bodyEnd: number; indent: number }> = [];

  logical.forEach((line, index) => {
    const imp = parseImport(line);
    if (imp) {
      imports.push(imp);
      return;
    }

    const def = DEF_RE.exec(line.code);
    if (def) {
      const colon = headerColon(line.code, def[0].length - 1);
      const extent = blockExtent(logical, index, colon);
      const bodyLines = logical.slice(extent.bodyStart, extent.bodyEnd);
      const inlineBody = colon >= 0 ? line.code.slice(colon + 1) : '';
      const bodyCode = [inlineBody, ...bodyLines.map((l) => l.code)].join('\n');
      const openParen = def[0].length - 1;
      const closeParen = findMatchingBracket(line.code, openParen);
      functions.push({
        name: def[2],
        isAsync: Boolean(def[1]),
        params: closeParen > openParen ? collapse(line.raw.slice(openParen + 1, closeParen)) : '',
        line: line.startLine,
        startLine: 0,
        endLine: extent.endLine,
        indent: line.indent,
        bodyIndentText: extent.bodyIndentText,
        decorators: collectDecorators(logical, index),
        returns: [],
        hasYield: /\byield\b/.test(bodyCode),
        raises: /(^|\n)\s*raise\b/.test(bodyCode) || /(?<![\w.])abort\s*\(/.test(bodyCode),
        className: null,
        nameOffset: line.startOffset + line.code.indexOf(def[2], line.code.indexOf('def')),
        endOffset: extent.endOffset,
      });
      if (colon >= 0 && /^\s*return\b/.test(inlineBody)) {
        const exprStart = colon + 1 + inlineBody.indexOf('return') + 'return'.length;
        returns.push({
          line: line.startLine,
          endLine: line.endLine,
          expression: line.raw.slice(exprStart).trim(),
          indent: line.indent + 1,
          startOffset: line.startOffset + colon + 1 + inlineBody.indexOf('return'),
          endOffset: line.endOffset,
        });
      }
      return;
    }

    const cls = CLASS_RE.exec(line.code);
    if (cls) {
      let bases: string[] = [];
      let headerFrom = cls[0].length;
      if (cls[2]) {
        const open = cls[0].length - 1;
        const close = findMatchingBracket(line.code, open);
        if (close > open) {
          bases = splitTopLevel(line.code, open + 1, close)
            .map((part) => collapse(line.raw.slice(part.start, part.end)))
            .filter((base) => base !== '');
          headerFrom = close + 1;
        }
      }
      const colon = headerColon(line.code, headerFrom);
      const extent = blockExtent(logical, index, colon);
      const decorators = collectDecorators(logical, index);
      const classDef: ClassDef = {
        name: cls[1],
        bases,
        line: line.startLine,
        startLine: decorators[0]?.line ?? line.startLine,
        endLine: extent.endLine,
        indent: line.indent,
        bodyIndentText: extent.bodyIndentText,
        decorators,
        assignments: [],
        methods: [],
        endOffset: extent.endOffset,
      };
      classes.push(classDef);
      classRanges.push({
        cls: classDef,
        bodyStart: extent.bodyStart,
        bodyEnd: extent.bodyEnd,
        indent: extent.bodyStart < extent.bodyEnd ? logical[extent.bodyStart].indent : -1,
      });
      return;
    }

    if (RETURN_RE.test(line.code)) {
      const returnAt = line.code.indexOf('return');
      returns.push({
        line: line.startLine,
        endLine: line.endLine,
        expression: line.raw.slice(returnAt + 'return'.length).trim(),
        indent: line.indent,
        startOffset: line.startOffset + returnAt,
        endOffset: line.endOffset,
      });
      return;
    }

    if (line.indent === 0) {
      const assignment = parseAssignment(line);
      if (assignment) assignments.push(assignment);
    }
  });

  for (const fn of functions) {
    fn.startLine = fn.decorators[0]?.line ?? fn.line;
  }

  // Class-level statements and methods
  for (const range of classRanges) {
    for (let k = range.bodyStart; k < range.bodyEnd; k++) {
      const line = logical[k];
      if (line.indent !== range.indent) continue;
      const def = DEF_RE.exec(line.code);
      if (def) {
        range.cls.methods.push(def[2]);
        const fn = functions.find((f) => f.line === line.startLine);
        if (fn) fn.className = range.cls.name;
        continue;
      }
      const assignment = parseAssignment(line);
      if (assignment) range.cls.assignments.push(assignment);
    }
  }

  // Attribute each return to its innermost enclosing function
  for (const ret of returns) {
    let owner: FunctionDef | null = null;
    for (const fn of functions) {
      const contains =
        (ret.line > fn.line || (ret.line === fn.line && fn.bodyIndentText === null)) &&
        ret.line <= fn.endLine &&
        ret.indent > fn.indent;
      if (contains && (owner === null || fn.indent > owner.indent)) owner = fn;
    }
    owner?.returns.push(ret);
  }

  return {
    path: modulePath,
    source,
    masked,
    lines,
    lineStarts,
    logicalLines: logical,
    imports,
    functions,
    classes,
    assignments,
    openStringLines: openAtLineEnd,
  };
}

/**
 * Top-level functions only (no methods, no nested functions)
 */
export function topLevelFunctions(module: PythonModule): FunctionDef[] {
  return module.functions.filter((fn) => fn.indent === 0);
}

/**
 * Whether `name` is used as an identifier anywhere outside the given ranges.
 */
export function isIdentifierUsed(
  module: PythonModule,
  name: string,
  excluded: ReadonlyArray<{ start: number; end: number }>
): boolean {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`(?<![\\w.])${escaped}(?!\\w)`, 'g');
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(module.masked)) !== null) {
    const at = match.index;
    if (!excluded.some((range) => at >= range.start && at < range.end)) return true;
  }
  return false;
}
