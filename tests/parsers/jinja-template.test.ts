import { describe, it, expect } from 'vitest';
import { contextVariables, parseJinjaTemplate, rootIdentifiers } from '../../src/parsers/jinja-template.js';

const SOURCE = [
  '{% extends "base.html" %}',
  '{% block content %}',
  '<h1>{{ title }}</h1>',
  '{% for post in posts %}',
  "  <a href=\"{{ url_for('blog.show', slug=post.slug) }}\">{{ post.title|upper }}</a>",
  '{% endfor %}',
  "{% include 'partials/footer.html' %}",
  '{% block sidebar %}',
  '',
].join('\n');

describe('parseJinjaTemplate', () => {
  const template = parseJinjaTemplate('templates/post.html', SOURCE);

  it('should read extends and include targets', () => {
    expect(template.extends).toBe('base.html');
    expect(template.includes).toEqual(['partials/footer.html']);
    expect(template.imports).toEqual([]);
  });

  it('should find unclosed blocks and where their end tag belongs', () => {
    expect(template.blocks.map((b) => b.name)).toEqual(['content', 'sidebar']);
    expect(template.unclosedBlocks.map((b) => [b.name, b.line])).toEqual([
      ['content', 2],
      ['sidebar', 8],
    ]);
    expect(template.unclosedBlocks[0].insertAt).toBe(SOURCE.indexOf('{% block sidebar %}'));
    expect(template.unclosedBlocks[1].insertAt).toBe(SOURCE.length);
  });

  it('should locate url_for endpoints', () => {
    expect(template.urlFors).toHaveLength(1);
    const [ref] = template.urlFors;
    expect(ref.endpoint).toBe('blog.show');
    expect(ref.line).toBe(5);
    expect(SOURCE.slice(ref.start, ref.end)).toBe('blog.show');
  });

  it('should list context variables, excluding loop bindings and globals', () => {
    const names = contextVariables(template).map((v) => v.name);

    expect(names).toEqual(['title', 'posts']);
    expect(contextVariables(template)[0].bare).toBe(true);
  });

  it('should accept closed blocks', () => {
    const closed = parseJinjaTemplate('t.html', '{% block a %}x{% endblock %}{% block b %}{% endblock b %}');
    expect(closed.unclosedBlocks).toEqual([]);
  });
});

describe('rootIdentifiers', () => {
  it('should skip attributes, filters, tests, keyword names and strings', () => {
    const roots = rootIdentifiers("user.name|title if user is defined else fallback(label='x y')");

    expect(roots.map((r) => r.name)).toEqual(['user', 'user', 'fallback']);
  });
});
