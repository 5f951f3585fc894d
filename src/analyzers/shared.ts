/**
 * Helpers shared by the analyzers.
 */

import { CODE_ANALYZER_RULES, findRule } from './rules.js';
import { compareSeverity, type IssueDraft, type IssueLocation, type IssueOrigin } from '../types/issue.js';
import type { ResolvedRuleset } from '../types/rules.js';

// ---------------------------------------------------------------------------
// Finding collector
// ---------------------------------------------------------------------------

export interface Finding {
  rule: string;
  signature: string;
  location: IssueLocation;
  description: string;
  data?: Record<string, unknown>;
}

/**
 * Collects findings as issue drafts, applying the ruleset: disabled rules
 * emit nothing and severities come from the resolved settings. Code
 * analyzer rules never exceed `warning`.
 */
export class FindingCollector {
  private readonly drafts: IssueDraft[] = [];

  constructor(
    private readonly ruleset: ResolvedRuleset,
    private readonly origin: IssueOrigin = 'analysis'
  ) {}

  isEnabled(rule: string): boolean {
    return this.setting(rule)?.enabled ?? false;
  }

  add(finding: Finding): void {
    const setting = this.setting(finding.rule);
    if (!setting || !setting.enabled) return;
    const definition = findRule(finding.rule);
    if (!definition) throw new Error(`Unknown rule: ${finding.rule}`);

    let severity = setting.severity;
    if (CODE_ANALYZER_RULES.has(finding.rule) && compareSeverity(severity, 'warning') > 0) {
      severity = 'warning';
    }

    this.drafts.push({
      category: definition.category,
      severity,
      rule: finding.rule,
      signature: finding.signature,
      location: finding.location,
      description: finding.description,
      origin: this.origin,
      ...(finding.data ? { data: finding.data } : {}),
    });
  }

  results(): IssueDraft[] {
    return [...this.drafts];
  }

  private setting(rule: string): { enabled: boolean; severity: IssueDraft['severity'] } | undefined {
    const resolved = this.ruleset.rules[rule];
    if (resolved) return resolved;
    const definition = findRule(rule);
    return definition ? { enabled: definition.enabled, severity: definition.severity } : undefined;
  }
}

// ---------------------------------------------------------------------------
// String similarity
// ---------------------------------------------------------------------------

function longestCommonSubsequence(a: string, b: string): number {
  const row = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    let diagonal = 0;
    for (let j = 1; j <= b.length; j++) {
      const above = row[j];
      row[j] = a[i - 1] === b[j - 1] ? diagonal + 1 : Math.max(row[j], row[j - 1]);
      diagonal = above;
    }
  }
  return row[b.length];
}

/**
 * Similarity ratio in [0, 1]: `2 * LCS / (len(a) + len(b))`.
 */
export function similarity(a: string, b: string): number {
  if (a.length + b.length === 0) return 1;
  return (2 * longestCommonSubsequence(a, b)) / (a.length + b.length);
}

/**
 * Best candidate at or above `cutoff`; ties go to the earlier candidate.
 */
export function closestMatch(word: string, candidates: Iterable<string>, cutoff = 0.6): string | null {
  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    const score = similarity(word, candidate);
    if (score > bestScore || (best === null && score >= cutoff)) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}

/**
 * One location covering a set of 1-based lines.
 */
export function spanOf(file: string, lines: readonly number[]): IssueLocation {
  return {
    file,
    startLine: Math.min(...lines),
    endLine: Math.max(...lines),
  };
}
