/**
 * Routing analyzer.
 *
 * Checks route handlers, endpoint and URL-rule uniqueness, blueprint
 * registration, and preset-required endpoints.
 */

import type { AnalysisContext } from './context.js';
import { FindingCollector } from './shared.js';
import type { RouteDecl } from '../flask/routes.js';
import type { FunctionDef } from '../parsers/python-source.js';
import type { IssueDraft } from '../types/issue.js';

/**
 * Grouping key for endpoint/URL uniqueness: a blueprint's name, or the
 * variable the app-level decorators are called on.
 */
function ownerKey(route: RouteDecl): string {
  return route.blueprint ? `bp:${route.blueprint}` : `app:${route.owner}`;
}

function handlerKey(route: RouteDecl, handler: FunctionDef): string {
  return `${route.file}:${handler.line}`;
}

function isMalformedReturn(expression: string): boolean {
  const trimmed = expression.replace(/#.*$/, '').trim();
  return trimmed === '' || trimmed === 'None';
}

/**
 * Whether some route answers to `name` (endpoint, qualified endpoint or
 * handler function name).
 */
export function hasEndpoint(routes: readonly RouteDecl[], name: string): boolean {
  return routes.some(
    (r) =>
      r.endpoint === name ||
      r.qualifiedEndpoint === name ||
      r.qualifiedEndpoint.endsWith(`.${name}`) ||
      r.handler?.name === name
  );
}

export async function analyzeRouting(ctx: AnalysisContext): Promise<IssueDraft[]> {
  const findings = new FindingCollector(ctx.ruleset);
  const { project, ruleset } = ctx;

  if (project.confidence.routeModules < ruleset.minConfidence) {
    findings.add({
      rule: 'routing/low-confidence',
      signature: 'low-confidence:route-modules',
      location: { file: project.entryPoint.file, startLine: 1, endLine: 1 },
      description: `Route module detection confidence ${project.confidence.routeModules} is below ${ruleset.minConfidence}; route analysis skipped`,
    });
    return findings.results();
  }

  const index = await ctx.index();
  const routes = index.routes;

  // Handlers
  const seenHandlers = new Set<string>();
  for (const route of routes) {
    const handler = route.handler;
    if (!handler) {
      findings.add({
        rule: 'routing/dangling-route',
        signature: `dangling-route:${route.owner}:${route.path ?? '?'}`,
        location: { file: route.file, startLine: route.decorator.line, endLine: route.decorator.endLine },
        description: `Route decorator @${route.decorator.text} is not followed by a handler function`,
      });
      continue;
    }

    if (route.methods === null) {
      findings.add({
        rule: 'routing/unspecified-methods',
        signature: `unspecified-methods:${route.qualifiedEndpoint}:${route.path ?? '?'}`,
        location: { file: route.file, startLine: route.decorator.line, endLine: route.decorator.endLine },
        description: `Route ${route.path ?? route.qualifiedEndpoint} does not declare methods= and only answers GET`,
      });
    }

    const key = handlerKey(route, handler);
    if (seenHandlers.has(key)) continue;
    seenHandlers.add(key);

    if (handler.returns.length === 0 && !handler.hasYield && !handler.raises) {
      findings.add({
        rule: 'routing/missing-return',
        signature: `missing-return:${route.qualifiedEndpoint}`,
        location: { file: route.file, startLine: handler.line, endLine: handler.endLine },
        description: `Handler ${handler.name}() for ${route.path ?? route.qualifiedEndpoint} never returns a response`,
        data: {
          handler: handler.name,
          endpoint: route.endpoint,
          blueprint: route.blueprint,
          path: route.path,
        },
      });
    }

    let malformed = 0;
    for (const ret of handler.returns) {
      if (!isMalformedReturn(ret.expression)) continue;
      malformed++;
      findings.add({
        rule: 'routing/malformed-response',
        signature: `malformed-response:${route.qualifiedEndpoint}:${malformed}`,
        location: { file: route.file, startLine: ret.line, endLine: ret.endLine },
        description: `Handler ${handler.name}() returns ${ret.expression.trim() === '' ? 'nothing' : 'None'} instead of a response`,
        data: { start: ret.startOffset, end: ret.endOffset },
      });
    }
  }

  // Endpoint uniqueness
  const endpointOwners = new Map<string, RouteDecl[]>();
  for (const route of routes) {
    if (!route.handler) continue;
    const key = `${ownerKey(route)}|${route.endpoint}`;
    const group = endpointOwners.get(key) ?? [];
    if (!group.some((r) => r.handler && route.handler && handlerKey(r, r.handler) === handlerKey(route, route.handler))) {
      group.push(route);
    }
    endpointOwners.set(key, group);
  }
  for (const group of endpointOwners.values()) {
    if (group.length < 2) continue;
    const ordered = [...group].sort((a, b) => a.file.localeCompare(b.file) || a.line - b.line);
    const first = ordered[0];
    ordered.slice(1).forEach((route, i) => {
      const handler = route.handler;
      if (!handler) return;
      const n = i + 2;
      findings.add({
        rule: 'routing/duplicate-endpoint',
        signature: `duplicate-endpoint:${route.qualifiedEndpoint}:${n}`,
        location: { file: route.file, startLine: handler.line, endLine: handler.line },
        description: `Endpoint '${route.qualifiedEndpoint}' is already defined in ${first.file}:${first.line}`,
        data: {
          handler: handler.name,
          nameOffset: handler.nameOffset,
          newName: `${handler.name}_${n}`,
          explicitEndpoint: route.endpoint !== handler.name,
        },
      });
    });
  }

  // URL rule uniqueness
  const ruleOwners = new Map<string, RouteDecl>();
  for (const route of routes) {
    if (!route.handler || route.path === null) continue;
    for (const method of route.methods ?? ['GET']) {
      const key = `${ownerKey(route)}|${method} ${route.path}`;
      const previous = ruleOwners.get(key);
      if (!previous) {
        ruleOwners.set(key, route);
        continue;
      }
      if (previous.handler && handlerKey(previous, previous.handler) === handlerKey(route, route.handler)) continue;
      findings.add({
        rule: 'routing/duplicate-route',
        signature: `duplicate-route:${ownerKey(route)}:${method} ${route.path}`,
        location: { file: route.file, startLine: route.decorator.line, endLine: route.decorator.endLine },
        description: `${method} ${route.path} is already handled by ${previous.handler?.name ?? previous.endpoint}() in ${previous.file}:${previous.line}`,
      });
    }
  }

  // Blueprint registration
  for (const bp of index.blueprints) {
    const registered = index.registrations.some(
      (reg) => reg.variable === bp.variable || reg.importedName === bp.variable
    );
    if (registered) continue;
    const label = bp.name ?? bp.variable;
    findings.add({
      rule: 'routing/unregistered-blueprint',
      signature: `unregistered-blueprint:${label}`,
      location: { file: bp.file, startLine: bp.line, endLine: bp.line },
      description: `Blueprint '${label}' (${bp.variable} in ${bp.file}) is never registered on the application`,
      data: { variable: bp.variable, file: bp.file },
    });
  }

  // Preset requirements
  const primary = project.routeModules[0] ?? project.entryPoint.file;
  const requirementChecks: Array<{ rule: string; names: readonly string[]; kind: string }> = [
    { rule: 'routing/required-route', names: ruleset.requirements.requiredRoutes, kind: 'required' },
    { rule: 'routing/recommended-route', names: ruleset.requirements.recommendedRoutes, kind: 'recommended' },
  ];
  for (const { rule, names, kind } of requirementChecks) {
    for (const name of names) {
      if (hasEndpoint(routes, name)) continue;
      findings.add({
        rule,
        signature: `${kind}-route:${name}`,
        location: { file: primary, startLine: 1, endLine: 1 },
        description: `Endpoint '${name}' ${kind} by preset '${ruleset.presetName ?? 'custom'}' is not defined`,
        data: { endpoint: name },
      });
    }
  }

  return findings.results();
}
