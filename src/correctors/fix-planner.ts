/**
 * Collision resolution between planned fixes.
 *
 * Fixes for one file were computed against the same content, so their edits
 * can be applied in sequence only when no two of them touch overlapping
 * ranges. Overlaps are settled by priority; the loser is retried next pass.
 */

import { FixConflict } from '../types/errors.js';
import { compareSeverity, type Issue } from '../types/issue.js';
import type { PlannedFix } from '../types/fix.js';
import { editsOverlap, hashContent } from './patch.js';

export interface Conflict {
  plan: PlannedFix;
  error: FixConflict;
}

export interface ResolvedPlans {
  accepted: PlannedFix[];
  conflicts: Conflict[];
}

/**
 * Order issues by fix priority: higher severity, then earlier detection,
 * then id.
 */
export function compareFixPriority(a: Issue, b: Issue): number {
  return (
    compareSeverity(b.severity, a.severity) ||
    a.detectedInIteration - b.detectedInIteration ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

export function plansCollide(a: PlannedFix, b: PlannedFix): boolean {
  if (a.file !== b.file) return false;
  if (hashContent(a.baseContent) !== hashContent(b.baseContent)) return true;
  return a.edits.some((x) => b.edits.some((y) => editsOverlap(x, y)));
}

/**
 * Accept plans in priority order, rejecting any that collides with an
 * already accepted plan for the same file.
 */
export function resolveCollisions(plans: readonly PlannedFix[], issues: ReadonlyMap<string, Issue>): ResolvedPlans {
  const ranked = [...plans].sort((a, b) => {
    const ia = issues.get(a.issueId);
    const ib = issues.get(b.issueId);
    if (!ia || !ib) return a.issueId < b.issueId ? -1 : 1;
    return compareFixPriority(ia, ib);
  });

  const accepted: PlannedFix[] = [];
  const conflicts: Conflict[] = [];
  for (const plan of ranked) {
    const winner = accepted.find((other) => plansCollide(plan, other));
    if (winner) {
      conflicts.push({ plan, error: new FixConflict(plan.issueId, winner.issueId, plan.file) });
    } else {
      accepted.push(plan);
    }
  }
  return { accepted, conflicts };
}
