/**
 * Orchestrator, validation and run report type definitions.
 */
import { z } from 'zod';
import { IssueSchema, IssueSeveritySchema } from './issue.js';
import { FixSchema } from './fix.js';
import type { DeepReadonly } from './project.js';

// ---------------------------------------------------------------------------
// Orchestrator states
// ---------------------------------------------------------------------------

export const OrchestratorStateSchema = z.enum([
  'Idle',
  'Detecting',
  'Diagnosing',
  'Healing',
  'Validating',
  'Resolved',
  'PartialFailure',
  'Escalated',
  'Aborted',
  'Reported',
]);
export type OrchestratorState = z.infer<typeof OrchestratorStateSchema>;

export const TerminalStateSchema = z.enum(['Resolved', 'PartialFailure', 'Escalated', 'Aborted']);
export type TerminalState = z.infer<typeof TerminalStateSchema>;

export const TransitionEventSchema = z.object({
  /** 1-based, strictly increasing within a run */
  seq: z.number().int().min(1),
  from: OrchestratorStateSchema,
  to: OrchestratorStateSchema,
  at: z.string(),
  iteration: z.number().int().min(0),
});
export type TransitionEvent = z.infer<typeof TransitionEventSchema>;

// ---------------------------------------------------------------------------
// Backups
// ---------------------------------------------------------------------------

export const BackupRecordSchema = z.object({
  issueId: z.string(),
  /** sha256 of the pre-fix content, or `absent` for created files */
  fileHash: z.string(),
  /** Root-relative POSIX path */
  file: z.string(),
  /** Path of the blob relative to the state dir; null for created files */
  blobPath: z.string().nullable(),
  fixId: z.string(),
  /** Application order across the whole ledger */
  sequence: z.number().int().min(0),
  createdAt: z.string(),
  restored: z.boolean().default(false),
});
export type BackupRecord = z.infer<typeof BackupRecordSchema>;

export const BackupIndexSchema = z.object({
  version: z.literal(1),
  records: z.array(BackupRecordSchema),
});
export type BackupIndex = z.infer<typeof BackupIndexSchema>;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export const RouteProbeSchema = z.object({
  path: z.string(),
  authenticated: z.boolean(),
  status: z.number().int().nullable(),
  error: z.string().nullable().default(null),
  traceback: z.string().nullable().default(null),
});
export type RouteProbe = z.infer<typeof RouteProbeSchema>;

export const ValidationSummarySchema = z.object({
  iteration: z.number().int().min(0),
  passToken: z.number().int().min(0),
  success: z.boolean(),
  timedOut: z.boolean(),
  exitCode: z.number().int().nullable(),
  durationMs: z.number().min(0),
  probes: z.array(RouteProbeSchema),
  skippedRoutes: z.array(z.string()),
  issuesRaised: z.array(z.string()),
  authReplayed: z.boolean(),
});
export type ValidationSummary = z.infer<typeof ValidationSummarySchema>;

// ---------------------------------------------------------------------------
// Run report
// ---------------------------------------------------------------------------

export const OpenIssueSummarySchema = z.object({
  id: z.string(),
  severity: IssueSeveritySchema,
  rule: z.string(),
  file: z.string(),
  description: z.string(),
});
export type OpenIssueSummary = z.infer<typeof OpenIssueSummarySchema>;

export const ProjectSummarySchema = z.object({
  entryFile: z.string(),
  entrySymbol: z.string(),
  architecturePattern: z.string(),
  blueprints: z.array(z.string()),
  routeModules: z.number().int().min(0),
  templateDirs: z.array(z.string()),
  modelModules: z.number().int().min(0),
  authMechanism: z.string().nullable(),
  database: z.string().nullable(),
});
export type ProjectSummary = z.infer<typeof ProjectSummarySchema>;

export const RunReportSchema = z.object({
  root: z.string(),
  /** Null when detection failed */
  project: ProjectSummarySchema.nullable(),
  preset: z.string().nullable(),
  terminalState: TerminalStateSchema,
  iterations: z.number().int().min(0),
  maxIterations: z.number().int().min(1),
  dryRun: z.boolean(),
  startedAt: z.string(),
  finishedAt: z.string(),
  durationMs: z.number().min(0),
  issues: z.array(IssueSchema),
  fixes: z.array(FixSchema),
  openIssues: z.array(OpenIssueSummarySchema),
  openBySeverity: z.object({
    info: z.number().int().min(0),
    warning: z.number().int().min(0),
    error: z.number().int().min(0),
    critical: z.number().int().min(0),
  }),
  transitions: z.array(TransitionEventSchema),
  validations: z.array(ValidationSummarySchema),
  abortReason: z.string().nullable(),
  remainingBackups: z.array(BackupRecordSchema),
});
export type RunReportData = z.infer<typeof RunReportSchema>;

/**
 * The report handed to reporters. Frozen at runtime.
 */
export type RunReport = DeepReadonly<RunReportData>;
