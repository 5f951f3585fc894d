/**
 * Validation harness: the Python script shipped in `harness/`, the config it
 * reads and the result line it prints.
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { staticUrl, type BlueprintRegistration, type RouteDecl } from '../flask/routes.js';
import type { BlueprintDecl, FrozenProjectModel } from '../types/project.js';

export const HARNESS_RESULT_MARKER = '@@MENDER_RESULT@@';

/** Placeholder credentials posted to the login route during auth replay */
export const REPLAY_CREDENTIALS: Readonly<Record<string, string>> = {
  username: 'mender-check',
  email: 'mender-check@example.invalid',
  password: 'test-secret',
};

export function harnessScriptPath(): string {
  return fileURLToPath(new URL('../../harness/validate_app.py', import.meta.url));
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export const HarnessConfigSchema = z.object({
  root: z.string(),
  module: z.string(),
  symbol: z.string(),
  kind: z.enum(['factory', 'instance']),
  routes: z.array(z.string()),
  login: z
    .object({
      path: z.string(),
      form: z.record(z.string(), z.string()),
    })
    .nullable(),
  passToken: z.number().int().min(0),
});
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

/**
 * Dotted module path of a root-relative Python file
 */
export function moduleName(file: string): string {
  const parts = file.replace(/\.py$/, '').split('/');
  if (parts.length > 1 && parts[parts.length - 1] === '__init__') parts.pop();
  return parts.join('.');
}

function routePrefix(
  route: RouteDecl,
  blueprints: readonly BlueprintDecl[],
  registrations: readonly BlueprintRegistration[]
): string | null {
  const decl = blueprints.find((bp) => bp.file === route.file && bp.variable === route.owner);
  if (!decl) return null;
  const registration = registrations.find(
    (r) => r.variable === decl.variable || r.importedName === decl.variable
  );
  return registration?.urlPrefix ?? decl.urlPrefix ?? null;
}

export interface ProbePlan {
  routes: string[];
  /** Rules with dynamic segments or non-literal paths */
  skipped: string[];
}

/**
 * GET-able static URLs to probe, sorted and de-duplicated
 */
export function probeRoutes(
  routes: readonly RouteDecl[],
  blueprints: readonly BlueprintDecl[],
  registrations: readonly BlueprintRegistration[]
): ProbePlan {
  const probe = new Set<string>();
  const skipped = new Set<string>();
  for (const route of routes) {
    if (route.methods !== null && !route.methods.includes('GET')) continue;
    const url = staticUrl(route, routePrefix(route, blueprints, registrations));
    if (url === null) skipped.add(route.path ?? `<${route.qualifiedEndpoint}>`);
    else probe.add(url);
  }
  return { routes: [...probe].sort(), skipped: [...skipped].sort() };
}

export interface HarnessConfigInput {
  project: FrozenProjectModel;
  routes: readonly string[];
  simulateAuth: boolean;
  passToken: number;
}

export function buildHarnessConfig(input: HarnessConfigInput): HarnessConfig {
  const { project } = input;
  const loginRoute = project.authMechanism?.loginRoute;
  return {
    root: project.root,
    module: moduleName(project.entryPoint.file),
    symbol: project.entryPoint.symbol,
    kind: project.entryPoint.kind,
    routes: [...input.routes],
    login: input.simulateAuth && loginRoute ? { path: loginRoute, form: { ...REPLAY_CREDENTIALS } } : null,
    passToken: input.passToken,
  };
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export const HarnessProbeSchema = z.object({
  path: z.string(),
  authenticated: z.boolean(),
  status: z.number().int().nullable(),
  error: z.string().nullable(),
  traceback: z.string().nullable(),
});
export type HarnessProbe = z.infer<typeof HarnessProbeSchema>;

export const HarnessResultSchema = z.object({
  passToken: z.number().int(),
  startupError: z.string().nullable(),
  startupTraceback: z.string().nullable(),
  probes: z.array(HarnessProbeSchema),
  authReplayed: z.boolean(),
  authError: z.string().nullable(),
});
export type HarnessResult = z.infer<typeof HarnessResultSchema>;

/**
 * Find and validate the result line in harness stdout.
 *
 * @returns null when no valid result line was printed
 */
export function parseHarnessOutput(stdout: string): HarnessResult | null {
  const lines = stdout.split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith(HARNESS_RESULT_MARKER)) continue;
    let data: unknown;
    try {
      data = JSON.parse(line.slice(HARNESS_RESULT_MARKER.length));
    } catch {
      return null;
    }
    const parsed = HarnessResultSchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }
  return null;
}
