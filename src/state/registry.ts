/**
 * Issue registry
 * Single-writer ledger of issues and fixes. Every mutation runs through a
 * serialized queue and issue status changes are checked against a
 * transition table.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { LEDGER_VERSION } from '../config/defaults.js';
import {
  IssueSchema,
  isOpenStatus,
  type Issue,
  type IssueDraft,
  type IssueOrigin,
  type IssueStatus,
} from '../types/issue.js';
import { FixSchema, type Fix } from '../types/fix.js';
import { InvalidTransitionError, MenderError } from '../types/errors.js';
import { readJsonFile, writeJsonFile } from './persistence.js';

// ---------------------------------------------------------------------------
// Ledger file
// ---------------------------------------------------------------------------

export const LedgerSchema = z.object({
  version: z.literal(LEDGER_VERSION),
  updatedAt: z.string(),
  issues: z.array(IssueSchema),
  fixes: z.array(FixSchema),
});
export type Ledger = z.infer<typeof LedgerSchema>;

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * Deterministic issue id: sha256 of category, file, line span and signature,
 * truncated to 16 hex characters.
 */
export function computeIssueId(draft: Pick<IssueDraft, 'category' | 'location' | 'signature'>): string {
  const { file, startLine, endLine } = draft.location;
  return createHash('sha256')
    .update(`${draft.category}|${file}|${startLine}-${endLine}|${draft.signature}`)
    .digest('hex')
    .slice(0, 16);
}

/**
 * Key that identifies the same problem across locations
 */
export function regressionKey(issue: Pick<Issue, 'category' | 'rule' | 'signature'>): string {
  return `${issue.category}|${issue.rule}|${issue.signature}`;
}

// ---------------------------------------------------------------------------
// Status transitions
// ---------------------------------------------------------------------------

const VALID_TRANSITIONS: Record<IssueStatus, IssueStatus[]> = {
  Detected: ['Planned', 'Failed', 'Verified'],
  Planned: ['Applied', 'Failed', 'Detected', 'Verified'],
  Applied: ['Verified', 'Failed', 'Detected'],
  Verified: ['Detected'],
  Failed: ['Planned', 'Detected', 'Verified'],
};

export function canTransitionIssue(current: IssueStatus, target: IssueStatus): boolean {
  return VALID_TRANSITIONS[current].includes(target);
}

export function getAvailableIssueTransitions(current: IssueStatus): IssueStatus[] {
  return VALID_TRANSITIONS[current];
}

/** Statuses from which an issue may be (re)planned */
export const PLANNABLE_STATUSES: ReadonlySet<IssueStatus> = new Set<IssueStatus>(['Detected', 'Planned', 'Failed']);

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * How a draft landed in the ledger.
 * - `new`: first sighting of this problem
 * - `existing`: same id already open
 * - `reopened`: same id was Verified and is back
 * - `regression`: new location for a problem that had been Verified
 * - `relocated`: new location for a problem that is still open
 */
export type RecordKind = 'new' | 'existing' | 'reopened' | 'regression' | 'relocated';

export interface RecordOutcome {
  issue: Issue;
  kind: RecordKind;
}

/** Outcomes that count as a newly appeared problem */
export function isNewProblem(kind: RecordKind): boolean {
  return kind === 'new' || kind === 'reopened' || kind === 'regression';
}

export interface IssueFilter {
  status?: IssueStatus | readonly IssueStatus[];
  origin?: IssueOrigin;
  open?: boolean;
}

export interface IssueRegistryOptions {
  /** Ledger file; the registry is memory-only without one */
  ledgerPath?: string;
  now?: () => Date;
}

export class IssueRegistry {
  private readonly issues = new Map<string, Issue>();
  private readonly fixes = new Map<string, Fix>();
  private queue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(private readonly options: IssueRegistryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run a mutation after every previously queued one
   */
  private enqueue<T>(operation: () => T | Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.catch(() => undefined);
    return run;
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /**
   * Replace in-memory state with the ledger file, if it exists
   */
  load(): Promise<void> {
    return this.enqueue(async () => {
      if (!this.options.ledgerPath) return;
      const ledger = await readJsonFile(this.options.ledgerPath, LedgerSchema);
      this.issues.clear();
      this.fixes.clear();
      for (const issue of ledger?.issues ?? []) this.issues.set(issue.id, issue);
      for (const fix of ledger?.fixes ?? []) this.fixes.set(fix.id, fix);
    });
  }

  save(): Promise<void> {
    return this.enqueue(async () => {
      if (!this.options.ledgerPath) return;
      await writeJsonFile(this.options.ledgerPath, LedgerSchema, {
        version: LEDGER_VERSION,
        updatedAt: this.now().toISOString(),
        issues: [...this.issues.values()],
        fixes: [...this.fixes.values()],
      });
    });
  }

  // -------------------------------------------------------------------------
  // Issues
  // -------------------------------------------------------------------------

  /**
   * Record analyzer or validation findings for one pass, in order.
   */
  recordAll(drafts: readonly IssueDraft[], iteration: number): Promise<RecordOutcome[]> {
    return this.enqueue(() => drafts.map((draft) => this.recordOne(draft, iteration)));
  }

  record(draft: IssueDraft, iteration: number): Promise<RecordOutcome> {
    return this.enqueue(() => this.recordOne(draft, iteration));
  }

  private recordOne(draft: IssueDraft, iteration: number): RecordOutcome {
    const id = computeIssueId(draft);
    const existing = this.issues.get(id);

    if (existing) {
      existing.severity = draft.severity;
      existing.description = draft.description;
      existing.data = draft.data;
      if (existing.status === 'Verified') {
        this.applyTransition(existing, 'Detected', iteration, 'regressed');
        existing.failureReason = undefined;
        return { issue: structuredClone(existing), kind: 'reopened' };
      }
      if (existing.status === 'Applied') {
        this.applyTransition(existing, 'Failed', iteration, 'still detected after fix');
        existing.failureReason = 'still detected after fix';
      }
      return { issue: structuredClone(existing), kind: 'existing' };
    }

    const predecessor = this.latestWithKey(regressionKey(draft), draft.location.file);
    const issue: Issue = {
      id,
      category: draft.category,
      severity: draft.severity,
      rule: draft.rule,
      signature: draft.signature,
      location: { ...draft.location },
      description: draft.description,
      status: 'Detected',
      origin: draft.origin ?? 'analysis',
      history: [{ from: null, to: 'Detected', at: this.now().toISOString(), iteration }],
      detectedInIteration: iteration,
      data: draft.data,
    };
    let kind: RecordKind = 'new';
    if (predecessor) {
      issue.previousIssueId = predecessor.id;
      kind = predecessor.status === 'Verified' ? 'regression' : 'relocated';
    }
    this.issues.set(id, issue);
    return { issue: structuredClone(issue), kind };
  }

  private latestWithKey(key: string, file: string): Issue | undefined {
    let latest: Issue | undefined;
    for (const issue of this.issues.values()) {
      if (issue.location.file !== file || regressionKey(issue) !== key) continue;
      latest = issue;
    }
    return latest;
  }

  /**
   * Move an issue to a new status.
   *
   * @throws InvalidTransitionError for a move outside the transition table
   */
  transition(id: string, to: IssueStatus, iteration: number, reason?: string): Promise<Issue> {
    return this.enqueue(() => {
      const issue = this.require(id);
      this.applyTransition(issue, to, iteration, reason);
      if (to === 'Failed') issue.failureReason = reason;
      else if (to !== 'Planned') issue.failureReason = undefined;
      return structuredClone(issue);
    });
  }

  private applyTransition(issue: Issue, to: IssueStatus, iteration: number, reason?: string): void {
    if (!canTransitionIssue(issue.status, to)) {
      throw new InvalidTransitionError(`issue ${issue.id}`, issue.status, to, getAvailableIssueTransitions(issue.status));
    }
    issue.history.push({
      from: issue.status,
      to,
      at: this.now().toISOString(),
      iteration,
      ...(reason ? { reason } : {}),
    });
    issue.status = to;
  }

  /**
   * Verify open issues of one origin that were not seen in the latest pass.
   *
   * @returns The issues that became Verified
   */
  reconcile(seen: ReadonlySet<string>, origin: IssueOrigin, iteration: number): Promise<Issue[]> {
    return this.enqueue(() => {
      const verified: Issue[] = [];
      for (const issue of this.issues.values()) {
        if (issue.origin !== origin || seen.has(issue.id) || !isOpenStatus(issue.status)) continue;
        const reason = issue.status === 'Applied' ? 'fix verified' : 'no longer detected';
        this.applyTransition(issue, 'Verified', iteration, reason);
        issue.failureReason = undefined;
        verified.push(structuredClone(issue));
      }
      return verified;
    });
  }

  get(id: string): Issue | undefined {
    const issue = this.issues.get(id);
    return issue ? structuredClone(issue) : undefined;
  }

  private require(id: string): Issue {
    const issue = this.issues.get(id);
    if (!issue) throw new MenderError(`Unknown issue ${id}`);
    return issue;
  }

  list(filter: IssueFilter = {}): Issue[] {
    const statuses = filter.status === undefined ? null : new Set<IssueStatus>(typeof filter.status === 'string' ? [filter.status] : filter.status);
    const result: Issue[] = [];
    for (const issue of this.issues.values()) {
      if (statuses && !statuses.has(issue.status)) continue;
      if (filter.origin && issue.origin !== filter.origin) continue;
      if (filter.open !== undefined && isOpenStatus(issue.status) !== filter.open) continue;
      result.push(structuredClone(issue));
    }
    return result;
  }

  open(): Issue[] {
    return this.list({ open: true });
  }

  get size(): number {
    return this.issues.size;
  }

  // -------------------------------------------------------------------------
  // Fixes
  // -------------------------------------------------------------------------

  addFix(fix: Fix): Promise<Fix> {
    return this.enqueue(() => {
      if (this.fixes.has(fix.id)) throw new MenderError(`Fix ${fix.id} already recorded`);
      this.require(fix.issueId);
      this.fixes.set(fix.id, structuredClone(fix));
      return structuredClone(fix);
    });
  }

  updateFix(id: string, changes: Partial<Pick<Fix, 'applied' | 'verified' | 'backupRef' | 'appliedAt' | 'rolledBack' | 'failureReason'>>): Promise<Fix> {
    return this.enqueue(() => {
      const fix = this.fixes.get(id);
      if (!fix) throw new MenderError(`Unknown fix ${id}`);
      Object.assign(fix, changes);
      return structuredClone(fix);
    });
  }

  /**
   * Mark the applied, not rolled back fixes of the given issues verified
   */
  verifyFixesFor(issueIds: ReadonlySet<string>): Promise<Fix[]> {
    return this.enqueue(() => {
      const verified: Fix[] = [];
      for (const fix of this.fixes.values()) {
        if (!issueIds.has(fix.issueId) || !fix.applied || fix.rolledBack || fix.verified) continue;
        fix.verified = true;
        verified.push(structuredClone(fix));
      }
      return verified;
    });
  }

  getFix(id: string): Fix | undefined {
    const fix = this.fixes.get(id);
    return fix ? structuredClone(fix) : undefined;
  }

  listFixes(): Fix[] {
    return [...this.fixes.values()].map((fix) => structuredClone(fix));
  }

  /**
   * Wait until every queued mutation has settled
   */
  async idle(): Promise<void> {
    await this.queue;
  }
}
