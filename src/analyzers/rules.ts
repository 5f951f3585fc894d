/**
 * Base rule catalog. Presets and user overrides are merged over it.
 */

import type { RuleDefinition } from '../types/rules.js';

const rule = (
  id: string,
  severity: RuleDefinition['severity'],
  description: string
): RuleDefinition => {
  const [category] = id.split('/');
  if (category !== 'routing' && category !== 'templating' && category !== 'persistence' && category !== 'code') {
    throw new Error(`Rule id without a known category: ${id}`);
  }
  return { id, category, severity, enabled: true, description };
};

export const RULE_CATALOG: readonly RuleDefinition[] = [
  // Routing
  rule('routing/low-confidence', 'warning', 'Route modules detected below the confidence threshold; route analysis skipped'),
  rule('routing/missing-return', 'error', 'Route handler never returns a response'),
  rule('routing/malformed-response', 'error', 'Route handler returns nothing (bare return or None)'),
  rule('routing/dangling-route', 'error', 'Route decorator not attached to a handler function'),
  rule('routing/duplicate-endpoint', 'error', 'Endpoint name declared twice on the same app or blueprint'),
  rule('routing/duplicate-route', 'warning', 'URL rule and method declared twice on the same app or blueprint'),
  rule('routing/unregistered-blueprint', 'error', 'Blueprint declared but never registered'),
  rule('routing/unspecified-methods', 'info', 'Route without an explicit methods list'),
  rule('routing/required-route', 'error', 'Endpoint required by the preset is missing'),
  rule('routing/recommended-route', 'info', 'Endpoint recommended by the preset is missing'),
  rule('routing/runtime-error', 'error', 'Request failed at runtime in the routing layer'),
  rule('routing/startup-failure', 'critical', 'Application failed to start because of a routing error'),

  // Templating
  rule('templating/missing-template', 'error', 'Referenced template does not exist'),
  rule('templating/undefined-variable', 'warning', 'Template reads a variable no render call provides'),
  rule('templating/unclosed-block', 'error', 'Template block opened but never closed'),
  rule('templating/invalid-url-for', 'error', 'url_for() names an endpoint that does not exist'),
  rule('templating/unused-template', 'info', 'Template never rendered, extended, included or imported'),
  rule('templating/required-template', 'error', 'Template required by the preset is missing'),
  rule('templating/recommended-template', 'info', 'Template recommended by the preset is missing'),
  rule('templating/runtime-error', 'error', 'Request failed at runtime while rendering a template'),
  rule('templating/startup-failure', 'critical', 'Application failed to start because of a template error'),

  // Persistence
  rule('persistence/missing-migration', 'critical', 'Model column has no migration creating it'),
  rule('persistence/missing-table-migration', 'critical', 'Model table is never created by a migration'),
  rule('persistence/no-migration-tooling', 'info', 'Models exist but no migration tooling is configured'),
  rule('persistence/asymmetric-relationship', 'error', 'back_populates is not mirrored on the target model'),
  rule('persistence/unknown-relationship-target', 'error', 'Relationship targets an unknown model'),
  rule('persistence/empty-model', 'warning', 'Model declares no columns'),
  rule('persistence/user-model-without-password', 'warning', 'User model has no password field'),
  rule('persistence/required-model', 'error', 'Model required by the preset is missing'),
  rule('persistence/required-field', 'warning', 'Field required by the preset is missing'),
  rule('persistence/runtime-error', 'error', 'Request failed at runtime in the persistence layer'),
  rule('persistence/startup-failure', 'critical', 'Application failed to start because of a database error'),

  // Code
  rule('code/unused-import', 'warning', 'Imported name is never used'),
  rule('code/unresolved-import', 'warning', 'Project-local import resolves to no file'),
  rule('code/trailing-whitespace', 'info', 'Lines end with whitespace'),
  rule('code/missing-final-newline', 'info', 'File does not end with a newline'),
  rule('code/line-too-long', 'info', 'Lines exceed the maximum length'),
  rule('code/none-comparison', 'warning', 'Comparison to None with == or !='),
  rule('code/bare-except', 'warning', 'Bare except clause'),
  rule('code/debug-enabled', 'warning', 'Debug mode enabled in application code'),
  rule('code/hardcoded-secret', 'warning', 'Secret value hardcoded in source'),
  rule('code/insecure-config', 'warning', 'Flask setting weakens security or wastes resources'),
  rule('code/n-plus-one-query', 'warning', 'Query issued inside a loop over query results'),
  rule('code/analysis-error', 'warning', 'An analyzer failed while scanning'),
  rule('code/runtime-error', 'error', 'Request failed at runtime'),
  rule('code/startup-failure', 'critical', 'Application failed to start'),
  rule('code/validation-timeout', 'error', 'Validation sandbox exceeded its time budget'),
];

/**
 * Rules the code analyzer emits; their severity never exceeds `warning`.
 */
export const CODE_ANALYZER_RULES: ReadonlySet<string> = new Set([
  'code/unused-import',
  'code/unresolved-import',
  'code/trailing-whitespace',
  'code/missing-final-newline',
  'code/line-too-long',
  'code/none-comparison',
  'code/bare-except',
  'code/debug-enabled',
  'code/hardcoded-secret',
  'code/insecure-config',
  'code/n-plus-one-query',
  'code/analysis-error',
]);

export function findRule(id: string): RuleDefinition | undefined {
  return RULE_CATALOG.find((r) => r.id === id);
}
