/**
 * Corrector registry and the planning phase of a healing pass.
 */

import { codeCorrector } from './code-quality.js';
import { persistenceCorrector } from './persistence.js';
import { routingCorrector } from './routing.js';
import { templatingCorrector } from './templating.js';
import { compareFixPriority, resolveCollisions, type Conflict } from './fix-planner.js';
import type { Corrector, CorrectorContext } from './corrector.js';
import type { Issue, IssueCategory } from '../types/issue.js';
import type { PlannedFix } from '../types/fix.js';

export const CORRECTORS: Readonly<Record<IssueCategory, Corrector>> = {
  routing: routingCorrector,
  templating: templatingCorrector,
  persistence: persistenceCorrector,
  code: codeCorrector,
};

export interface Rejection {
  issue: Issue;
  reason: string;
}

export interface PlanningResult {
  accepted: PlannedFix[];
  conflicts: Conflict[];
  /** Plans refused before collision resolution (write authority, corrector errors) */
  rejected: Rejection[];
  /** Issues no corrector can fix automatically */
  unfixable: Issue[];
}

/**
 * Ask each issue's corrector for a plan, check write authority, then settle
 * collisions. Planning is sequential and in priority order so generated
 * migration revisions chain deterministically.
 */
export async function planFixes(
  issues: readonly Issue[],
  ctx: CorrectorContext,
  correctors: Readonly<Record<IssueCategory, Corrector>> = CORRECTORS
): Promise<PlanningResult> {
  const ordered = [...issues].sort(compareFixPriority);
  const plans: PlannedFix[] = [];
  const rejected: Rejection[] = [];
  const unfixable: Issue[] = [];

  for (const issue of ordered) {
    const corrector = correctors[issue.category];
    let plan: PlannedFix | null;
    try {
      plan = await corrector.plan(issue, ctx);
    } catch (error) {
      rejected.push({ issue, reason: `corrector error: ${error instanceof Error ? error.message : String(error)}` });
      continue;
    }
    if (!plan) {
      unfixable.push(issue);
      continue;
    }
    if (!corrector.canWrite(plan.file, ctx)) {
      rejected.push({ issue, reason: `${plan.file} is outside the ${corrector.category} corrector's write authority` });
      continue;
    }
    plans.push(plan);
  }

  const byId = new Map(issues.map((issue) => [issue.id, issue]));
  const { accepted, conflicts } = resolveCollisions(plans, byId);
  return { accepted, conflicts, rejected, unfixable };
}

export { codeCorrector, persistenceCorrector, routingCorrector, templatingCorrector };
export type { Corrector, CorrectorContext } from './corrector.js';
export { resolveCollisions, compareFixPriority, plansCollide } from './fix-planner.js';
export type { Conflict, ResolvedPlans } from './fix-planner.js';
