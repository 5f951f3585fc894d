import { describe, it, expect } from 'vitest';
import {
  findCalls,
  isIdentifierUsed,
  keywordArgument,
  lineOfOffset,
  parsePythonModule,
  positionalArgument,
  stringLiteral,
  topLevelFunctions,
} from '../../src/parsers/python-source.js';

const SOURCE = [
  'import os',
  'from flask import Flask, render_template as rt',
  'from .models import (',
  '    Post,',
  '    User,',
  ')',
  '',
  'SECRET = "a # not comment"',
  'app = Flask(__name__)',
  '',
  '',
  "@app.route('/')",
  'def index():',
  "    if os.environ.get('X'):",
  "        return rt('index.html', posts=[])",
  '    return',
  '',
  '',
  'class Post(db.Model):',
  '    id = db.Column(db.Integer, primary_key=True)',
  '',
  '    def title_upper(self):',
  '        return self.title.upper()',
  '',
].join('\n');

describe('parsePythonModule', () => {
  const module = parsePythonModule('blog/views.py', SOURCE);

  it('should mask comments and string contents without moving offsets', () => {
    expect(module.masked).toHaveLength(SOURCE.length);
    expect(module.masked.includes('not comment')).toBe(false);
    expect(module.masked.split('\n')[8]).toBe('app = Flask(__name__)');
  });

  it('should read plain, aliased and parenthesized relative imports', () => {
    expect(module.imports.map((imp) => [imp.kind, imp.module, imp.level, imp.line, imp.endLine])).toEqual([
      ['import', 'os', 0, 1, 1],
      ['from', 'flask', 0, 2, 2],
      ['from', 'models', 1, 3, 6],
    ]);
    expect(module.imports[1].names).toEqual([
      { name: 'Flask', alias: null, local: 'Flask' },
      { name: 'render_template', alias: 'rt', local: 'rt' },
    ]);
    expect(module.imports[2].parenthesized).toBe(true);
    expect(module.imports[2].names.map((n) => n.local)).toEqual(['Post', 'User']);
  });

  it('should collect module-level assignments only', () => {
    expect(module.assignments.map((a) => [a.target, a.line])).toEqual([
      ['SECRET', 8],
      ['app', 9],
    ]);
    expect(module.assignments[1].value).toBe('Flask(__name__)');
  });

  it('should attach decorators and returns to their functions', () => {
    const [index, method] = module.functions;

    expect(index.name).toBe('index');
    expect(index.line).toBe(13);
    expect(index.startLine).toBe(12);
    expect(index.decorators.map((d) => d.line)).toEqual([12]);
    expect(index.returns.map((r) => [r.line, r.expression])).toEqual([
      [15, "rt('index.html', posts=[])"],
      [16, ''],
    ]);
    expect(method.name).toBe('title_upper');
    expect(method.className).toBe('Post');
    expect(method.returns.map((r) => r.expression)).toEqual(['self.title.upper()']);
    expect(topLevelFunctions(module).map((fn) => fn.name)).toEqual(['index']);
  });

  it('should read class bases, class-level assignments and methods', () => {
    expect(module.classes).toHaveLength(1);
    const [post] = module.classes;
    expect(post.name).toBe('Post');
    expect(post.bases).toEqual(['db.Model']);
    expect(post.assignments.map((a) => a.target)).toEqual(['id']);
    expect(post.methods).toEqual(['title_upper']);
    expect(post.line).toBe(19);
  });
});

describe('findCalls', () => {
  const module = parsePythonModule('views.py', SOURCE);

  it('should parse positional and keyword arguments', () => {
    const calls = findCalls(module, 'rt');

    expect(calls).toHaveLength(1);
    expect(calls[0].line).toBe(15);
    expect(positionalArgument(calls[0], 0)?.value).toBe("'index.html'");
    expect(keywordArgument(calls[0], 'posts')?.value).toBe('[]');
    expect(keywordArgument(calls[0], 'missing')).toBeUndefined();
  });

  it('should not match attribute calls with the same name', () => {
    const module2 = parsePythonModule('x.py', 'obj.run(1)\nrun(2)\n');

    expect(findCalls(module2, 'run').map((c) => c.line)).toEqual([2]);
    expect(lineOfOffset(module2.lineStarts, 11)).toBe(2);
  });
});

describe('stringLiteral', () => {
  it('should unquote plain and prefixed literals', () => {
    expect(stringLiteral("'index.html'")).toBe('index.html');
    expect(stringLiteral('r"^/x$"')).toBe('^/x$');
    expect(stringLiteral("'it\\'s'")).toBe("it's");
  });

  it('should return null for anything else', () => {
    expect(stringLiteral('name')).toBeNull();
    expect(stringLiteral("'a' + 'b'")).toBeNull();
    expect(stringLiteral('f"{x}"')).toBeNull();
  });
});

describe('isIdentifierUsed', () => {
  it('should ignore attribute access and excluded ranges', () => {
    const module = parsePythonModule('x.py', 'import json\nresult = data.json\n');
    const importRange = { start: module.imports[0].startOffset, end: module.imports[0].endOffset };

    expect(isIdentifierUsed(module, 'json', [importRange])).toBe(false);
    expect(isIdentifierUsed(module, 'data', [importRange])).toBe(true);
  });
});
