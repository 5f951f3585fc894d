/**
 * Issue ledger type definitions.
 *
 * Zod schemas and TypeScript types for findings tracked by the issue registry:
 * categories, severities, lifecycle statuses and status history.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Enums
// ---------------------------------------------------------------------------

export const IssueCategorySchema = z.enum(['routing', 'templating', 'persistence', 'code']);
export type IssueCategory = z.infer<typeof IssueCategorySchema>;

export const ISSUE_CATEGORIES: readonly IssueCategory[] = IssueCategorySchema.options;

export const IssueSeveritySchema = z.enum(['info', 'warning', 'error', 'critical']);
export type IssueSeverity = z.infer<typeof IssueSeveritySchema>;

export const IssueStatusSchema = z.enum(['Detected', 'Planned', 'Applied', 'Verified', 'Failed']);
export type IssueStatus = z.infer<typeof IssueStatusSchema>;

export const IssueOriginSchema = z.enum(['analysis', 'validation']);
export type IssueOrigin = z.infer<typeof IssueOriginSchema>;

/**
 * Numeric rank per severity, used for ordering and threshold checks.
 */
export const SEVERITY_RANK: Record<IssueSeverity, number> = {
  info: 0,
  warning: 1,
  error: 2,
  critical: 3,
};

/**
 * Compare two severities. Positive when `a` is more severe than `b`.
 */
export function compareSeverity(a: IssueSeverity, b: IssueSeverity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

/**
 * Check whether a severity is strictly above `warning`.
 */
export function isAboveWarning(severity: IssueSeverity): boolean {
  return SEVERITY_RANK[severity] > SEVERITY_RANK.warning;
}

/**
 * Statuses in which an issue still needs attention.
 */
export const OPEN_STATUSES: ReadonlySet<IssueStatus> = new Set<IssueStatus>([
  'Detected',
  'Planned',
  'Applied',
  'Failed',
]);

export function isOpenStatus(status: IssueStatus): boolean {
  return OPEN_STATUSES.has(status);
}

// ---------------------------------------------------------------------------
// Location
// ---------------------------------------------------------------------------

export const IssueLocationSchema = z.object({
  /** Root-relative POSIX path */
  file: z.string(),
  startLine: z.number().int().min(0),
  endLine: z.number().int().min(0),
});
export type IssueLocation = z.infer<typeof IssueLocationSchema>;

// ---------------------------------------------------------------------------
// Issue
// ---------------------------------------------------------------------------

export const StatusChangeSchema = z.object({
  from: IssueStatusSchema.nullable(),
  to: IssueStatusSchema,
  at: z.string(),
  iteration: z.number().int().min(0),
  reason: z.string().optional(),
});
export type StatusChange = z.infer<typeof StatusChangeSchema>;

export const IssueSchema = z.object({
  id: z.string(),
  category: IssueCategorySchema,
  severity: IssueSeveritySchema,
  rule: z.string(),
  /** Stable subject of the finding, e.g. `missing-template:missing.html` */
  signature: z.string(),
  location: IssueLocationSchema,
  description: z.string(),
  status: IssueStatusSchema,
  origin: IssueOriginSchema,
  history: z.array(StatusChangeSchema),
  detectedInIteration: z.number().int().min(0),
  previousIssueId: z.string().optional(),
  failureReason: z.string().optional(),
  /** Free-form details an analyzer hands to its corrector */
  data: z.record(z.string(), z.unknown()).optional(),
});
export type Issue = z.infer<typeof IssueSchema>;

/**
 * What an analyzer or the validation runner emits. The registry assigns id,
 * status and history.
 */
export interface IssueDraft {
  category: IssueCategory;
  severity: IssueSeverity;
  rule: string;
  signature: string;
  location: IssueLocation;
  description: string;
  origin?: IssueOrigin;
  data?: Record<string, unknown>;
}
