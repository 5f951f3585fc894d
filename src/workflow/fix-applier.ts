/**
 * Applies accepted fix plans to disk.
 *
 * Plans are grouped per file. Groups run concurrently; inside a group each
 * fix runs under the file's lock, checks the file still matches what the
 * previous step left, backs it up and only then writes the patched content.
 * New migration revisions are written one at a time, in plan order, so each
 * can be chained onto the last one that reached disk.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { buildPatch, applyPatch, hashContent, unifiedDiff } from '../correctors/patch.js';
import { StaleFileError, UndecodableFileError } from '../types/errors.js';
import type { Fix, PlannedFix, TextEdit } from '../types/fix.js';
import type { BackupStore } from '../state/backup-store.js';
import { isMissingFileError, writeFileAtomic } from '../state/persistence.js';
import { decodeUtf8 } from '../detection/fs-utils.js';
import type { RevisionChain } from '../correctors/persistence.js';
import { KeyedLock } from './file-locks.js';

export interface ApplyOutcome {
  plan: PlannedFix;
  /** Present when the fix was applied, or previewed in dry-run mode */
  fix: Fix | null;
  error: Error | null;
}

export interface FixApplierOptions {
  root: string;
  backups: BackupStore;
  iteration: number;
  nextFixId: () => string;
  locks?: KeyedLock;
  now?: () => Date;
  /** Compute patches and diffs without backing up or writing */
  dryRun?: boolean;
  /** Re-links new migration revisions to the revisions actually written */
  revisions?: RevisionChain;
}

interface CurrentFile {
  bytes: Buffer;
  text: string;
}

/**
 * Read a file's bytes and their text. Null when the file does not exist.
 *
 * @throws UndecodableFileError when the bytes are not valid UTF-8
 */
async function readCurrent(absolutePath: string, file: string): Promise<CurrentFile | null> {
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(absolutePath);
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }
  const text = decodeUtf8(bytes);
  if (text === null) throw new UndecodableFileError(file);
  return { bytes, text };
}

/**
 * Shift edits planned against the original content past edits that were
 * already applied to the same file. Applied edits never overlap the new ones.
 */
export function rebaseEdits(edits: readonly TextEdit[], applied: readonly TextEdit[]): TextEdit[] {
  return edits.map((edit) => {
    let shift = 0;
    for (const prior of applied) {
      if (prior.end <= edit.start) shift += prior.replacement.length - (prior.end - prior.start);
    }
    return { start: edit.start + shift, end: edit.end + shift, replacement: edit.replacement };
  });
}

function groupByFile(plans: readonly PlannedFix[]): Map<string, PlannedFix[]> {
  const groups = new Map<string, PlannedFix[]>();
  for (const plan of plans) {
    const group = groups.get(plan.file) ?? [];
    group.push(plan);
    groups.set(plan.file, group);
  }
  return groups;
}

/**
 * Apply plans in the given order per file.
 *
 * @returns One outcome per plan, in input order
 */
export async function applyPlannedFixes(plans: readonly PlannedFix[], options: FixApplierOptions): Promise<ApplyOutcome[]> {
  const locks = options.locks ?? new KeyedLock();
  const now = options.now ?? (() => new Date());
  const outcomes = new Map<PlannedFix, ApplyOutcome>();

  const applyGroup = async (file: string, group: PlannedFix[]): Promise<void> => {
    const absolute = path.join(options.root, file);
    let expected = group[0]?.baseContent ?? null;
    const applied: TextEdit[] = [];

    for (const planned of group) {
      const plan = options.revisions?.rechain(planned) ?? planned;
      const fixId = options.nextFixId();
      try {
        const fix = await locks.withLock(file, async () => {
          const onDisk = options.dryRun ? null : await readCurrent(absolute, file);
          const current = options.dryRun ? expected : onDisk?.text ?? null;
          const currentHash = hashContent(current);
          const expectedHash = hashContent(expected);
          if (currentHash !== expectedHash) {
            throw new StaleFileError(file, expectedHash, currentHash);
          }

          const patch = buildPatch(file, current, rebaseEdits(plan.edits, applied));
          const result = applyPatch(current, patch);
          const diff = unifiedDiff(file, current, result);

          if (options.dryRun) {
            return buildFix(plan, fixId, patch, diff, null, false, options.iteration);
          }

          const backup = await options.backups.backup({ issueId: plan.issueId, fixId, file, content: onDisk?.bytes ?? null });
          await writeFileAtomic(absolute, result);
          const written = buildFix(
            plan,
            fixId,
            patch,
            diff,
            { issueId: backup.issueId, fileHash: backup.fileHash },
            true,
            options.iteration
          );
          written.appliedAt = now().toISOString();
          expected = result;
          return written;
        });
        if (options.dryRun) expected = applyPatch(expected, fix.patch);
        applied.push(...plan.edits);
        options.revisions?.advance(plan);
        outcomes.set(planned, { plan, fix, error: null });
      } catch (error) {
        outcomes.set(planned, { plan, fix: null, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }
  };

  const groups = [...groupByFile(plans)];
  const chain = options.revisions;
  const isRevision = ([, group]: [string, PlannedFix[]]): boolean => chain !== undefined && group.every((p) => chain.owns(p));
  for (const [file, group] of groups.filter(isRevision)) await applyGroup(file, group);
  await Promise.all(groups.filter((g) => !isRevision(g)).map(([file, group]) => applyGroup(file, group)));

  return plans.map((plan) => outcomes.get(plan) ?? { plan, fix: null, error: new Error('fix was not attempted') });
}

function buildFix(
  plan: PlannedFix,
  id: string,
  patch: Fix['patch'],
  diff: string,
  backupRef: Fix['backupRef'],
  applied: boolean,
  iteration: number
): Fix {
  return {
    id,
    issueId: plan.issueId,
    corrector: plan.corrector,
    file: plan.file,
    description: plan.description,
    patch,
    diff,
    backupRef,
    applied,
    verified: false,
    iteration,
    rolledBack: false,
  };
}
