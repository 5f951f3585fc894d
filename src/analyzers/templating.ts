/**
 * Templating analyzer.
 *
 * Cross-checks render_template calls against the template dirs and scans each
 * Jinja template for block structure, url_for endpoints and context
 * variables.
 */

import path from 'node:path';
import type { AnalysisContext } from './context.js';
import { closestMatch, FindingCollector, spanOf } from './shared.js';
import { contextVariables, type JinjaTemplate } from '../parsers/jinja-template.js';
import type { IssueDraft, IssueLocation } from '../types/issue.js';

const LAYOUT_RE = /(^|\/)(base|layout)[^/]*$/;
const PARTIAL_DIR_RE = /(^|\/)(partials|macros|includes|components)\//;
/** `x|default(...)`, `x|d(...)`, `x is defined` and `x is not defined` tolerate a missing value */
const GUARDED_RE = /^\s*(\|\s*d(efault)?\b|is\s+(not\s+)?defined\b)/;

/**
 * Whether a url_for endpoint resolves. `.name` is relative to the current
 * blueprint and resolves against any blueprint endpoint with that name.
 */
export function endpointExists(endpoint: string, known: ReadonlySet<string>): boolean {
  if (known.has(endpoint)) return true;
  if (endpoint.startsWith('.')) {
    const short = endpoint.slice(1);
    for (const candidate of known) {
      if (candidate === short || candidate.endsWith(endpoint)) return true;
    }
  }
  return false;
}

function templateReferences(template: JinjaTemplate): string[] {
  return [...(template.extends ? [template.extends] : []), ...template.includes, ...template.imports];
}

function tokenLine(template: JinjaTemplate, name: string): number {
  const token = template.tokens.find((t) => t.kind === 'statement' && t.body.includes(name));
  return token?.line ?? 1;
}

export async function analyzeTemplating(ctx: AnalysisContext): Promise<IssueDraft[]> {
  const findings = new FindingCollector(ctx.ruleset);
  const index = await ctx.index();
  const { ruleset } = ctx;

  // Missing templates, located at their first reference
  const firstReference = new Map<string, { location: IssueLocation; from: string }>();
  const renderCalls = [...index.renderCalls].sort((a, b) => a.file.localeCompare(b.file) || a.line - b.line);
  for (const call of renderCalls) {
    if (call.template === null || firstReference.has(call.template)) continue;
    firstReference.set(call.template, {
      location: { file: call.file, startLine: call.line, endLine: call.endLine },
      from: call.handler ? `${call.handler.name}() in ${call.file}` : call.file,
    });
  }
  for (const template of index.parsedTemplates.values()) {
    for (const name of templateReferences(template)) {
      if (firstReference.has(name)) continue;
      const line = tokenLine(template, name);
      firstReference.set(name, {
        location: { file: template.path, startLine: line, endLine: line },
        from: template.path,
      });
    }
  }
  for (const [name, reference] of firstReference) {
    if (index.templates.has(name)) continue;
    findings.add({
      rule: 'templating/missing-template',
      signature: `missing-template:${name}`,
      location: reference.location,
      description: `Template '${name}' referenced by ${reference.from} does not exist`,
      data: { template: name },
    });
  }

  // Block structure
  for (const template of index.parsedTemplates.values()) {
    for (const block of template.unclosedBlocks) {
      findings.add({
        rule: 'templating/unclosed-block',
        signature: `unclosed-block:${block.name}`,
        location: { file: template.path, startLine: block.line, endLine: block.line },
        description: `{% block ${block.name} %} in ${template.path} is never closed`,
        data: { block: block.name, insertAt: block.insertAt },
      });
    }
  }

  // url_for endpoints
  if (ctx.project.confidence.routeModules >= ruleset.minConfidence) {
    const known = new Set<string>(['static']);
    for (const route of index.routes) known.add(route.qualifiedEndpoint);
    for (const bp of index.blueprints) if (bp.name) known.add(`${bp.name}.static`);
    const candidates = [...known].sort();

    for (const template of index.parsedTemplates.values()) {
      const counts = new Map<string, number>();
      for (const ref of template.urlFors) {
        if (endpointExists(ref.endpoint, known)) continue;
        const n = (counts.get(ref.endpoint) ?? 0) + 1;
        counts.set(ref.endpoint, n);
        const suggestion = closestMatch(ref.endpoint, candidates);
        findings.add({
          rule: 'templating/invalid-url-for',
          signature: `invalid-url-for:${ref.endpoint}:${n}`,
          location: { file: template.path, startLine: ref.line, endLine: ref.line },
          description:
            `url_for('${ref.endpoint}') in ${template.path} names no known endpoint` +
            (suggestion ? `; did you mean '${suggestion}'?` : ''),
          data: { endpoint: ref.endpoint, start: ref.start, end: ref.end, suggestion },
        });
      }
    }
  }

  // Unused templates; any dynamic render call makes usage unknowable
  if (!index.renderCalls.some((call) => call.template === null)) {
    const used = new Set<string>();
    for (const call of index.renderCalls) if (call.template !== null) used.add(call.template);
    for (const template of index.parsedTemplates.values()) {
      for (const name of templateReferences(template)) used.add(name);
    }
    for (const template of index.templates.values()) {
      const base = path.posix.basename(template.name);
      if (used.has(template.name) || base.startsWith('_')) continue;
      if (LAYOUT_RE.test(template.name) || PARTIAL_DIR_RE.test(template.name)) continue;
      findings.add({
        rule: 'templating/unused-template',
        signature: `unused-template:${template.name}`,
        location: { file: template.file, startLine: 1, endLine: 1 },
        description: `Template '${template.name}' is never rendered, extended, included or imported`,
      });
    }
  }

  // Context variables
  if (!index.hasContextProcessor) {
    for (const [name, template] of index.parsedTemplates) {
      const calls = index.renderCalls.filter((call) => call.template === name);
      if (calls.length === 0 || calls.some((call) => call.contextKeys === null)) continue;
      const provided = new Set(calls.flatMap((call) => call.contextKeys ?? []));

      const missing = new Map<string, ReturnType<typeof contextVariables>>();
      for (const ref of contextVariables(template)) {
        if (provided.has(ref.name) || GUARDED_RE.test(template.source.slice(ref.end, ref.end + 40))) continue;
        const refs = missing.get(ref.name) ?? [];
        refs.push(ref);
        missing.set(ref.name, refs);
      }
      for (const [variable, refs] of missing) {
        findings.add({
          rule: 'templating/undefined-variable',
          signature: `undefined-variable:${variable}`,
          location: spanOf(template.path, refs.map((r) => r.line)),
          description: `Template '${name}' reads '${variable}' but no render_template call passes it`,
          data: {
            variable,
            occurrences: refs.filter((r) => r.bare).map((r) => ({ start: r.tokenStart, end: r.tokenEnd })),
          },
        });
      }
    }
  }

  // Preset requirements
  const templateDir = ctx.defaultTemplateDir();
  const requirementChecks: Array<{ rule: string; names: readonly string[]; kind: string }> = [
    { rule: 'templating/required-template', names: ruleset.requirements.requiredTemplates, kind: 'required' },
    { rule: 'templating/recommended-template', names: ruleset.requirements.recommendedTemplates, kind: 'recommended' },
  ];
  for (const { rule, names, kind } of requirementChecks) {
    for (const name of names) {
      if (index.templates.has(name)) continue;
      findings.add({
        rule,
        signature: `${kind}-template:${name}`,
        location: { file: `${templateDir}/${name}`, startLine: 0, endLine: 0 },
        description: `Template '${name}' ${kind} by preset '${ruleset.presetName ?? 'custom'}' does not exist`,
        data: { template: name },
      });
    }
  }

  return findings.results();
}
