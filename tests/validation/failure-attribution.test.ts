import { describe, it, expect } from 'vitest';
import { attributeCategory, attributeLocation, exceptionSummary } from '../../src/validation/failure-attribution.js';

const ROOT = '/srv/blog';

const TRACEBACK = [
  'Traceback (most recent call last):',
  '  File "/usr/lib/python3/site-packages/flask/app.py", line 880, in full_dispatch_request',
  '    rv = self.dispatch_request()',
  '  File "/srv/blog/blog/views.py", line 21, in post',
  "    return render_template('post.html', post=post)",
  '  File "/srv/blog/.venv/lib/jinja2/environment.py", line 1010, in get_template',
  '  File "/usr/lib/python3/site-packages/jinja2/loaders.py", line 204, in get_source',
  'jinja2.exceptions.TemplateNotFound: post.html',
  '',
].join('\n');

describe('attributeCategory', () => {
  it('should map exceptions to categories', () => {
    expect(attributeCategory(TRACEBACK)).toBe('templating');
    expect(attributeCategory('sqlalchemy.exc.OperationalError: no such table: user')).toBe('persistence');
    expect(attributeCategory('werkzeug.routing.exceptions.BuildError: Could not build url')).toBe('routing');
    expect(attributeCategory('ZeroDivisionError: division by zero')).toBe('code');
  });
});

describe('attributeLocation', () => {
  it('should pick the innermost frame inside the project', () => {
    expect(attributeLocation(TRACEBACK, ROOT)).toEqual({ file: 'blog/views.py', startLine: 21, endLine: 21 });
  });

  it('should resolve relative frame paths against the root', () => {
    const traceback = '  File "app.py", line 7, in index\nNameError: name \'x\' is not defined';
    expect(attributeLocation(traceback, ROOT)).toEqual({ file: 'app.py', startLine: 7, endLine: 7 });
  });

  it('should return null when no frame is inside the project', () => {
    const traceback = '  File "/usr/lib/python3/site-packages/flask/app.py", line 880, in run\nRuntimeError: x';
    expect(attributeLocation(traceback, ROOT)).toBeNull();
  });
});

describe('exceptionSummary', () => {
  it('should return the last non-empty line', () => {
    expect(exceptionSummary(TRACEBACK)).toBe('jinja2.exceptions.TemplateNotFound: post.html');
  });

  it('should fall back when there is no output', () => {
    expect(exceptionSummary('\n  \n')).toBe('unknown error');
  });
});
