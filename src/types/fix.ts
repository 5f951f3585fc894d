/**
 * Fix and patch type definitions.
 */
import { z } from 'zod';
import { IssueCategorySchema } from './issue.js';

/** Backup key used for a file that did not exist before the fix */
export const ABSENT_FILE_HASH = 'absent';

export const PatchHunkSchema = z.object({
  /** Character offset into the base content */
  offset: z.number().int().min(0),
  removed: z.string(),
  inserted: z.string(),
});
export type PatchHunk = z.infer<typeof PatchHunkSchema>;

export const ReversiblePatchSchema = z.object({
  file: z.string(),
  /** sha256 of the content the hunks apply to, or ABSENT_FILE_HASH */
  baseHash: z.string(),
  resultHash: z.string(),
  createsFile: z.boolean(),
  /** Sorted by offset, non-overlapping */
  hunks: z.array(PatchHunkSchema),
});
export type ReversiblePatch = z.infer<typeof ReversiblePatchSchema>;

export const BackupRefSchema = z.object({
  issueId: z.string(),
  fileHash: z.string(),
});
export type BackupRef = z.infer<typeof BackupRefSchema>;

export const FixSchema = z.object({
  id: z.string(),
  issueId: z.string(),
  corrector: IssueCategorySchema,
  file: z.string(),
  description: z.string(),
  patch: ReversiblePatchSchema,
  diff: z.string(),
  backupRef: BackupRefSchema.nullable(),
  applied: z.boolean(),
  verified: z.boolean(),
  iteration: z.number().int().min(0),
  appliedAt: z.string().optional(),
  rolledBack: z.boolean().default(false),
  failureReason: z.string().optional(),
});
export type Fix = z.infer<typeof FixSchema>;

/**
 * A single textual replacement planned against a file's current content.
 * `start`/`end` are character offsets; `start === end` inserts.
 */
export interface TextEdit {
  start: number;
  end: number;
  replacement: string;
}

/**
 * A corrector's proposal for one issue, before collision resolution.
 */
export interface PlannedFix {
  issueId: string;
  corrector: z.infer<typeof IssueCategorySchema>;
  /** Root-relative POSIX path */
  file: string;
  description: string;
  /** Content the edits were computed against; null when the file is absent */
  baseContent: string | null;
  edits: TextEdit[];
}
