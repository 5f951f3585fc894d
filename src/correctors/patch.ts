/**
 * Reversible patches and unified diffs.
 *
 * A patch is a sorted list of non-overlapping hunks against content with a
 * known sha256. Applying checks the base hash; reverting checks the result
 * hash, so a patch is only ever applied to or reverted from the exact bytes
 * it was computed for.
 */

import { createHash } from 'node:crypto';
import { ABSENT_FILE_HASH, type PatchHunk, type ReversiblePatch, type TextEdit } from '../types/fix.js';
import { StaleFileError } from '../types/errors.js';

/**
 * Hex sha256 of text (as UTF-8) or raw bytes. Equal for a string and its
 * UTF-8 encoding.
 */
export function sha256(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Hash of a file's content, or ABSENT_FILE_HASH when it does not exist.
 */
export function hashContent(content: string | null): string {
  return content === null ? ABSENT_FILE_HASH : sha256(content);
}

/**
 * Whether two edits touch overlapping ranges. Two insertions at the same
 * offset also collide, since their order would be ambiguous.
 */
export function editsOverlap(a: TextEdit, b: TextEdit): boolean {
  if (a.start === a.end && b.start === b.end) return a.start === b.start;
  return a.start < b.end && b.start < a.end;
}

/**
 * Turn planned edits into a patch. Throws when edits overlap or fall
 * outside the content.
 */
export function buildPatch(file: string, baseContent: string | null, edits: readonly TextEdit[]): ReversiblePatch {
  const base = baseContent ?? '';
  const sorted = [...edits].sort((a, b) => a.start - b.start || a.end - b.end);

  sorted.forEach((edit, i) => {
    if (edit.start < 0 || edit.end < edit.start || edit.end > base.length) {
      throw new RangeError(`Edit [${edit.start}, ${edit.end}) is outside ${file} (${base.length} chars)`);
    }
    const previous = sorted[i - 1];
    if (previous && editsOverlap(previous, edit)) {
      throw new RangeError(`Edits [${previous.start}, ${previous.end}) and [${edit.start}, ${edit.end}) overlap in ${file}`);
    }
  });

  const hunks: PatchHunk[] = sorted.map((edit) => ({
    offset: edit.start,
    removed: base.slice(edit.start, edit.end),
    inserted: edit.replacement,
  }));
  const result = applyHunks(base, hunks);

  return {
    file,
    baseHash: hashContent(baseContent),
    resultHash: sha256(result),
    createsFile: baseContent === null,
    hunks,
  };
}

function applyHunks(base: string, hunks: readonly PatchHunk[]): string {
  let out = '';
  let cursor = 0;
  for (const hunk of hunks) {
    out += base.slice(cursor, hunk.offset) + hunk.inserted;
    cursor = hunk.offset + hunk.removed.length;
  }
  return out + base.slice(cursor);
}

/**
 * Apply a patch to the current content of its file.
 *
 * @throws StaleFileError when the content is not the patch's base
 */
export function applyPatch(current: string | null, patch: ReversiblePatch): string {
  const actual = hashContent(current);
  if (actual !== patch.baseHash) throw new StaleFileError(patch.file, patch.baseHash, actual);
  return applyHunks(current ?? '', patch.hunks);
}

/**
 * Undo a patch. Returns null when the patch created the file.
 *
 * @throws StaleFileError when the content is not the patch's result
 */
export function revertPatch(current: string | null, patch: ReversiblePatch): string | null {
  const actual = hashContent(current);
  if (actual !== patch.resultHash) throw new StaleFileError(patch.file, patch.resultHash, actual);
  if (patch.createsFile) return null;

  let out = '';
  let cursor = 0;
  let delta = 0;
  const text = current ?? '';
  for (const hunk of patch.hunks) {
    const at = hunk.offset + delta;
    out += text.slice(cursor, at) + hunk.removed;
    cursor = at + hunk.inserted.length;
    delta += hunk.inserted.length - hunk.removed.length;
  }
  return out + text.slice(cursor);
}

// ---------------------------------------------------------------------------
// Unified diff
// ---------------------------------------------------------------------------

type DiffOp = { type: 'context' | 'delete' | 'add'; text: string };

function splitLines(content: string): string[] {
  if (content === '') return [];
  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

function diffLines(a: readonly string[], b: readonly string[]): DiffOp[] {
  let prefix = 0;
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix++;
  let suffix = 0;
  while (
    suffix < a.length - prefix &&
    suffix < b.length - prefix &&
    a[a.length - 1 - suffix] === b[b.length - 1 - suffix]
  ) {
    suffix++;
  }

  const midA = a.slice(prefix, a.length - suffix);
  const midB = b.slice(prefix, b.length - suffix);

  // LCS table over the changed middle
  const table: number[][] = Array.from({ length: midA.length + 1 }, () => new Array<number>(midB.length + 1).fill(0));
  for (let i = midA.length - 1; i >= 0; i--) {
    for (let j = midB.length - 1; j >= 0; j--) {
      table[i][j] = midA[i] === midB[j] ? table[i + 1][j + 1] + 1 : Math.max(table[i + 1][j], table[i][j + 1]);
    }
  }

  const ops: DiffOp[] = a.slice(0, prefix).map((text) => ({ type: 'context', text }));
  let i = 0;
  let j = 0;
  while (i < midA.length || j < midB.length) {
    if (i < midA.length && j < midB.length && midA[i] === midB[j]) {
      ops.push({ type: 'context', text: midA[i] });
      i++;
      j++;
    } else if (i < midA.length && (j >= midB.length || table[i + 1][j] >= table[i][j + 1])) {
      ops.push({ type: 'delete', text: midA[i] });
      i++;
    } else {
      ops.push({ type: 'add', text: midB[j] });
      j++;
    }
  }
  for (const text of a.slice(a.length - suffix)) ops.push({ type: 'context', text });
  return ops;
}

/**
 * Unified diff between two versions of a file, with three lines of context.
 * `before === null` diffs against /dev/null.
 */
export function unifiedDiff(file: string, before: string | null, after: string | null, context = 3): string {
  const ops = diffLines(splitLines(before ?? ''), splitLines(after ?? ''));
  const lines = [`--- ${before === null ? '/dev/null' : `a/${file}`}`, `+++ ${after === null ? '/dev/null' : `b/${file}`}`];

  const changed = ops.map((op, index) => (op.type === 'context' ? -1 : index)).filter((index) => index >= 0);
  if (changed.length === 0) return lines.join('\n');

  // Group changes whose context windows touch
  const groups: Array<{ start: number; end: number }> = [];
  for (const index of changed) {
    const start = Math.max(0, index - context);
    const end = Math.min(ops.length, index + context + 1);
    const last = groups[groups.length - 1];
    if (last && start <= last.end) last.end = Math.max(last.end, end);
    else groups.push({ start, end });
  }

  for (const group of groups) {
    let oldStart = 1;
    let newStart = 1;
    for (const op of ops.slice(0, group.start)) {
      if (op.type !== 'add') oldStart++;
      if (op.type !== 'delete') newStart++;
    }
    const slice = ops.slice(group.start, group.end);
    const oldLines = slice.filter((op) => op.type !== 'add').length;
    const newLines = slice.filter((op) => op.type !== 'delete').length;
    lines.push(`@@ -${oldLines === 0 ? oldStart - 1 : oldStart},${oldLines} +${newLines === 0 ? newStart - 1 : newStart},${newLines} @@`);
    for (const op of slice) {
      lines.push(`${op.type === 'add' ? '+' : op.type === 'delete' ? '-' : ' '}${op.text}`);
    }
  }
  return lines.join('\n');
}
