/**
 * Error taxonomy for the healing pipeline.
 *
 * Only DetectionFailure and UnrecoverableCorruption halt a run; the other
 * errors are converted into issues and retried within the bounded loop.
 */

import type { BackupRecord } from './report.js';

/**
 * Base class for all pipeline errors.
 */
export class MenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MenderError';
  }
}

/**
 * No plausible application entry point was found. Fatal.
 */
export class DetectionFailure extends MenderError {
  constructor(
    public readonly root: string,
    reason: string
  ) {
    super(`Detection failed for ${root}: ${reason}`);
    this.name = 'DetectionFailure';
  }
}

/**
 * An analyzer crashed while scanning. Non-fatal: becomes a `code` warning.
 */
export class AnalysisError extends MenderError {
  constructor(
    public readonly analyzer: string,
    public readonly cause?: unknown
  ) {
    super(`Analyzer '${analyzer}' failed: ${describeCause(cause)}`);
    this.name = 'AnalysisError';
  }
}

/**
 * Two planned fixes touch overlapping ranges of one file. Non-fatal: the
 * losing fix is marked Failed and retried next pass.
 */
export class FixConflict extends MenderError {
  constructor(
    public readonly issueId: string,
    public readonly winnerIssueId: string,
    public readonly file: string
  ) {
    super(`Fix for ${issueId} overlaps fix for ${winnerIssueId} in ${file}`);
    this.name = 'FixConflict';
  }
}

/**
 * The file changed between planning and applying a fix.
 */
export class StaleFileError extends MenderError {
  constructor(
    public readonly file: string,
    public readonly expectedHash: string,
    public readonly actualHash: string
  ) {
    super(`File ${file} changed since the fix was planned (expected ${expectedHash.slice(0, 12)}, found ${actualHash.slice(0, 12)})`);
    this.name = 'StaleFileError';
  }
}

/**
 * A file holds bytes that do not decode as UTF-8. Fixes never rewrite it.
 */
export class UndecodableFileError extends MenderError {
  constructor(public readonly file: string) {
    super(`File ${file} is not valid UTF-8; refusing to edit it`);
    this.name = 'UndecodableFileError';
  }
}

/**
 * The validation sandbox exceeded its wall-clock budget. Non-fatal.
 */
export class ValidationTimeout extends MenderError {
  constructor(
    public readonly timeoutMs: number,
    public readonly output: string
  ) {
    super(`Validation sandbox timed out after ${timeoutMs}ms`);
    this.name = 'ValidationTimeout';
  }
}

/**
 * A backup could not be restored during rollback. Fatal; carries every
 * remaining backup so they can be recovered by hand.
 */
export class UnrecoverableCorruption extends MenderError {
  constructor(
    message: string,
    public readonly remainingBackups: readonly BackupRecord[]
  ) {
    super(message);
    this.name = 'UnrecoverableCorruption';
  }
}

/**
 * A status or state transition outside the allowed table.
 */
export class InvalidTransitionError extends MenderError {
  constructor(
    public readonly subject: string,
    public readonly from: string,
    public readonly to: string,
    allowed: readonly string[]
  ) {
    super(`Invalid ${subject} transition: '${from}' -> '${to}'. Allowed from '${from}': [${allowed.join(', ')}]`);
    this.name = 'InvalidTransitionError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

/**
 * True for the two errors that must abort a run.
 */
export function isFatalError(error: unknown): error is DetectionFailure | UnrecoverableCorruption {
  return error instanceof DetectionFailure || error instanceof UnrecoverableCorruption;
}
