/**
 * Route, blueprint and render-call extraction from parsed Python modules.
 */

import {
  findCalls,
  keywordArgument,
  positionalArgument,
  stringLiteral,
  lineOfOffset,
  offsetOfLine,
  type CallSite,
  type Decorator,
  type FunctionDef,
  type PythonModule,
} from '../parsers/python-source.js';
import type { BlueprintDecl } from '../types/project.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RouteDecl {
  file: string;
  /** Variable the decorator is called on (`app`, `bp`, ...) */
  owner: string;
  /** Blueprint name when the owner is a blueprint declared in this module */
  blueprint: string | null;
  /** Literal URL rule, or null when not a literal */
  path: string | null;
  /** Declared methods; null when `methods=` is absent */
  methods: string[] | null;
  /** Endpoint name without the blueprint prefix */
  endpoint: string;
  /** `blueprint.endpoint` for blueprint routes, else `endpoint` */
  qualifiedEndpoint: string;
  handler: FunctionDef | null;
  decorator: Decorator;
  line: number;
}

export interface RenderCall {
  file: string;
  /** Literal template name, or null for dynamic names */
  template: string | null;
  /** Keyword names passed; null when the context cannot be known */
  contextKeys: string[] | null;
  line: number;
  endLine: number;
  handler: FunctionDef | null;
}

export interface BlueprintRegistration {
  file: string;
  /** Registered expression's final name segment */
  variable: string;
  /** Original name when the expression is an import alias */
  importedName: string | null;
  urlPrefix: string | null;
  line: number;
}

export const ROUTE_DECORATOR_RE = /^(\w+)\.(route|get|post|put|delete|patch)\s*\(/;

const SHORTHAND_METHODS: Record<string, string> = {
  get: 'GET',
  post: 'POST',
  put: 'PUT',
  delete: 'DELETE',
  patch: 'PATCH',
};

// ---------------------------------------------------------------------------
// Blueprints
// ---------------------------------------------------------------------------

/**
 * Module-level `bp = Blueprint('name', __name__, url_prefix='/x')`.
 */
export function extractBlueprints(module: PythonModule): BlueprintDecl[] {
  const blueprints: BlueprintDecl[] = [];
  for (const assignment of module.assignments) {
    if (!/^(?:flask\.)?Blueprint\s*\(/.test(assignment.value)) continue;
    const call = findCalls(module, '(?:flask\\.)?Blueprint', {
      start: assignment.valueOffset,
      end: assignment.endOffset,
    })[0];
    if (!call) continue;
    const nameArg = positionalArgument(call, 0);
    const prefixArg = keywordArgument(call, 'url_prefix');
    const name = nameArg ? stringLiteral(nameArg.value) : null;
    const urlPrefix = prefixArg ? stringLiteral(prefixArg.value) : null;
    blueprints.push({
      file: module.path,
      variable: assignment.target,
      ...(name !== null ? { name } : {}),
      ...(urlPrefix !== null ? { urlPrefix } : {}),
      line: assignment.line,
    });
  }
  return blueprints;
}

/**
 * `app.register_blueprint(bp, url_prefix=...)` calls anywhere in a module.
 */
export function extractRegistrations(module: PythonModule): BlueprintRegistration[] {
  return findCalls(module, '\\w+\\.register_blueprint').flatMap((call) => {
    const arg = positionalArgument(call, 0);
    if (!arg) return [];
    const variable = arg.value.split('.').pop()?.trim() ?? arg.value;
    const binding = module.imports
      .flatMap((imp) => imp.names)
      .find((name) => name.local === variable && name.alias !== null);
    const prefix = keywordArgument(call, 'url_prefix');
    return [
      {
        file: module.path,
        variable,
        importedName: binding ? binding.name.split('.').pop() ?? null : null,
        urlPrefix: prefix ? stringLiteral(prefix.value) : null,
        line: call.line,
      },
    ];
  });
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

function decoratorCall(module: PythonModule, decorator: Decorator): CallSite | undefined {
  return findCalls(module, '\\w+\\.(?:route|get|post|put|delete|patch)', {
    start: decorator.startOffset,
    end: decorator.startOffset + decorator.raw.length + 1,
  })[0];
}

function parseMethods(value: string): string[] {
  return (value.match(/(['"])([A-Za-z]+)\1/g) ?? []).map((m) => m.slice(1, -1).toUpperCase());
}

function routeFromDecorator(
  module: PythonModule,
  decorator: Decorator,
  handler: FunctionDef | null,
  blueprintNames: Map<string, string>
): RouteDecl | null {
  const head = ROUTE_DECORATOR_RE.exec(decorator.text);
  if (!head) return null;
  const call = decoratorCall(module, decorator);
  const owner = head[1];
  const verb = head[2];

  const pathArg = call ? positionalArgument(call, 0) : undefined;
  const methodsArg = call ? keywordArgument(call, 'methods') : undefined;
  const endpointArg = call ? keywordArgument(call, 'endpoint') : undefined;

  let methods: string[] | null = null;
  if (verb !== 'route') methods = [SHORTHAND_METHODS[verb]];
  else if (methodsArg) methods = parseMethods(methodsArg.value);

  const explicitEndpoint = endpointArg ? stringLiteral(endpointArg.value) : null;
  const endpoint = explicitEndpoint ?? handler?.name ?? '<unknown>';
  const blueprint = blueprintNames.get(owner) ?? null;

  return {
    file: module.path,
    owner,
    blueprint,
    path: pathArg ? stringLiteral(pathArg.value) : null,
    methods,
    endpoint,
    qualifiedEndpoint: blueprint ? `${blueprint}.${endpoint}` : endpoint,
    handler,
    decorator,
    line: decorator.line,
  };
}

/**
 * Routes declared in a module. Route decorators not attached to any
 * function come back with `handler: null`.
 */
export function extractRoutes(module: PythonModule, blueprints: readonly BlueprintDecl[]): RouteDecl[] {
  const blueprintNames = new Map<string, string>();
  for (const bp of blueprints) {
    if (bp.file === module.path && bp.name) blueprintNames.set(bp.variable, bp.name);
  }

  const routes: RouteDecl[] = [];
  const attached = new Set<number>();

  for (const fn of module.functions) {
    for (const decorator of fn.decorators) {
      attached.add(decorator.line);
      const route = routeFromDecorator(module, decorator, fn, blueprintNames);
      if (route) routes.push(route);
    }
  }
  for (const cls of module.classes) {
    for (const decorator of cls.decorators) attached.add(decorator.line);
  }

  for (const line of module.logicalLines) {
    const code = line.code.trimStart();
    if (!code.startsWith('@') || attached.has(line.startLine)) continue;
    const at = line.raw.indexOf('@');
    const raw = line.raw.slice(at + 1).trimEnd();
    const decorator: Decorator = {
      text: raw.replace(/\s+/g, ' ').trim(),
      raw,
      line: line.startLine,
      endLine: line.endLine,
      startOffset: line.startOffset + at,
    };
    const route = routeFromDecorator(module, decorator, null, blueprintNames);
    if (route) routes.push(route);
  }

  return routes.sort((a, b) => a.line - b.line);
}

/**
 * Whether a module declares any route decorator.
 */
export function hasRouteDecorators(module: PythonModule): boolean {
  return module.logicalLines.some((line) => {
    const code = line.code.trimStart();
    return code.startsWith('@') && ROUTE_DECORATOR_RE.test(code.slice(1));
  });
}

// ---------------------------------------------------------------------------
// Render calls
// ---------------------------------------------------------------------------

/**
 * `render_template(...)` calls in a module, attributed to their handler.
 */
export function extractRenderCalls(module: PythonModule): RenderCall[] {
  return findCalls(module, '(?:flask\\.)?render_template').map((call) => {
    const nameArg = positionalArgument(call, 0);
    const unknownContext = call.args.some(
      (arg) => arg.star !== '' || (arg.keyword === null && arg !== nameArg)
    );
    const handler =
      module.functions
        .filter((fn) => offsetOfLine(module.lineStarts, fn.line) <= call.start && call.start < fn.endOffset)
        .sort((a, b) => b.indent - a.indent)[0] ?? null;
    return {
      file: module.path,
      template: nameArg ? stringLiteral(nameArg.value) : null,
      contextKeys: unknownContext
        ? null
        : call.args.flatMap((arg) => (arg.keyword !== null ? [arg.keyword] : [])),
      line: call.line,
      endLine: lineOfOffset(module.lineStarts, call.end - 1),
      handler,
    };
  });
}

/**
 * Full URL of a literal route, or null when it has dynamic segments or no
 * literal path.
 */
export function staticUrl(route: RouteDecl, prefix: string | null): string | null {
  if (route.path === null || route.path.includes('<')) return null;
  const base = (prefix ?? '').replace(/\/+$/, '');
  const joined = `${base}${route.path.startsWith('/') ? '' : '/'}${route.path}`;
  return joined === '' ? '/' : joined;
}
