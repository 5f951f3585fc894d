/**
 * State persistence module
 * Handles state directory layout and atomic JSON read/write for the ledger,
 * backup index and reports
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { STATE_FILES } from '../config/defaults.js';
import { MenderError } from '../types/errors.js';
import type { DeepReadonly } from '../types/project.js';

/**
 * Paths of everything kept under one state directory
 */
export interface StatePaths {
  stateDir: string;
  ledger: string;
  log: string;
  backupsDir: string;
  backupIndex: string;
  blobsDir: string;
  reportsDir: string;
}

/**
 * Resolve the state layout for an absolute state directory
 *
 * @param stateDir - Absolute path, usually `<root>/.mender`
 */
export function getStatePaths(stateDir: string): StatePaths {
  const backupsDir = path.join(stateDir, STATE_FILES.BACKUPS);
  return {
    stateDir,
    ledger: path.join(stateDir, STATE_FILES.LEDGER),
    log: path.join(stateDir, STATE_FILES.LOG),
    backupsDir,
    backupIndex: path.join(backupsDir, STATE_FILES.BACKUP_INDEX),
    blobsDir: path.join(backupsDir, STATE_FILES.BLOBS),
    reportsDir: path.join(stateDir, STATE_FILES.REPORTS),
  };
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function isExistingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Load and validate a JSON file
 *
 * @returns The parsed value, or null if the file does not exist
 * @throws MenderError when the file is not valid JSON or fails the schema
 */
export async function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S> | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) return null;
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new MenderError(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MenderError(`Invalid state file format in ${filePath}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Save a JSON file using atomic write
 * Uses temp file + rename pattern to prevent corruption
 */
export async function writeJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S, value: DeepReadonly<z.input<S>>): Promise<void> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MenderError(`Refusing to write invalid state to ${filePath}: ${result.error.message}`);
  }
  await writeFileAtomic(filePath, JSON.stringify(result.data, null, 2));
}

let tempCounter = 0;

/**
 * Write text or bytes through a temp file in the same directory, then rename
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  tempCounter += 1;
  const tempPath = `${filePath}.tmp.${process.pid}.${tempCounter}`;
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, filePath);
}
