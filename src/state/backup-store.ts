/**
 * Content-addressed backup store
 * Pre-fix file contents are kept as write-once blobs named by their sha256,
 * with an index of records keyed by (issueId, fileHash)
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ABSENT_FILE_HASH } from '../types/fix.js';
import { BackupIndexSchema, type BackupRecord } from '../types/report.js';
import { MenderError, UnrecoverableCorruption } from '../types/errors.js';
import { sha256 } from '../correctors/patch.js';
import {
  isExistingFileError,
  isMissingFileError,
  readJsonFile,
  writeFileAtomic,
  writeJsonFile,
  type StatePaths,
} from './persistence.js';

export interface BackupRequest {
  issueId: string;
  fixId: string;
  /** Root-relative POSIX path */
  file: string;
  /** Bytes before the fix; null when the fix creates the file */
  content: string | Uint8Array | null;
}

export interface BackupStoreOptions {
  now?: () => Date;
}

export class BackupStore {
  private records: BackupRecord[] = [];
  private queue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(
    private readonly root: string,
    private readonly paths: StatePaths,
    options: BackupStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation);
    this.queue = run.catch(() => undefined);
    return run;
  }

  load(): Promise<void> {
    return this.enqueue(async () => {
      const index = await readJsonFile(this.paths.backupIndex, BackupIndexSchema);
      this.records = index?.records ?? [];
    });
  }

  private async persist(): Promise<void> {
    await writeJsonFile(this.paths.backupIndex, BackupIndexSchema, { version: 1, records: this.records });
  }

  /**
   * Store the pre-fix content and append a record. Must complete before the
   * fix is written.
   */
  backup(request: BackupRequest): Promise<BackupRecord> {
    return this.enqueue(async () => {
      const fileHash = request.content === null ? ABSENT_FILE_HASH : sha256(request.content);
      const duplicate = this.records.find(
        (r) => r.issueId === request.issueId && r.fileHash === fileHash && r.fixId === request.fixId
      );
      if (duplicate) return { ...duplicate };

      let blobPath: string | null = null;
      if (request.content !== null) {
        blobPath = path.posix.join('backups', 'blobs', fileHash);
        await this.writeBlob(fileHash, request.content);
      }

      const record: BackupRecord = {
        issueId: request.issueId,
        fileHash,
        file: request.file,
        blobPath,
        fixId: request.fixId,
        sequence: this.records.reduce((max, r) => Math.max(max, r.sequence + 1), 0),
        createdAt: this.now().toISOString(),
        restored: false,
      };
      this.records.push(record);
      await this.persist();
      return { ...record };
    });
  }

  /**
   * Write a blob once. An existing blob is reused when its content hashes to
   * the same key.
   */
  private async writeBlob(hash: string, content: string | Uint8Array): Promise<void> {
    await fs.mkdir(this.paths.blobsDir, { recursive: true });
    const blob = path.join(this.paths.blobsDir, hash);
    try {
      await fs.writeFile(blob, content, { flag: 'wx' });
    } catch (error) {
      if (!isExistingFileError(error)) throw error;
      const existing = await fs.readFile(blob);
      if (sha256(existing) !== hash) {
        throw new UnrecoverableCorruption(`Backup blob ${hash} exists with different content`, this.remaining());
      }
    }
  }

  list(): BackupRecord[] {
    return this.records.map((r) => ({ ...r }));
  }

  /** Records not yet restored, latest application first */
  remaining(): BackupRecord[] {
    return this.records
      .filter((r) => !r.restored)
      .sort((a, b) => b.sequence - a.sequence)
      .map((r) => ({ ...r }));
  }

  /**
   * Undo one fix. Later fixes to the same file are undone first so the file
   * ends up exactly as it was before the fix.
   *
   * @returns The restored records in restore order
   * @throws UnrecoverableCorruption when a blob is missing or does not match
   */
  rollbackFix(fixId: string): Promise<BackupRecord[]> {
    return this.enqueue(async () => {
      const target = this.records.find((r) => r.fixId === fixId && !r.restored);
      if (!target) throw new MenderError(`No backup to restore for fix ${fixId}`);
      const chain = this.records
        .filter((r) => !r.restored && r.file === target.file && r.sequence >= target.sequence)
        .sort((a, b) => b.sequence - a.sequence);
      return this.restoreAll(chain);
    });
  }

  /**
   * Undo every recorded fix in reverse application order
   */
  rollbackAll(): Promise<BackupRecord[]> {
    return this.enqueue(async () => {
      const chain = this.records.filter((r) => !r.restored).sort((a, b) => b.sequence - a.sequence);
      return this.restoreAll(chain);
    });
  }

  private async restoreAll(chain: BackupRecord[]): Promise<BackupRecord[]> {
    const restored: BackupRecord[] = [];
    for (const record of chain) {
      await this.restore(record);
      record.restored = true;
      await this.persist();
      restored.push({ ...record });
    }
    return restored;
  }

  private async restore(record: BackupRecord): Promise<void> {
    const target = path.join(this.root, record.file);

    if (record.fileHash === ABSENT_FILE_HASH) {
      try {
        await fs.unlink(target);
      } catch (error) {
        if (!isMissingFileError(error)) throw error;
      }
      return;
    }

    const content = await this.readBlob(record);
    await writeFileAtomic(target, content);
  }

  private async readBlob(record: BackupRecord): Promise<Buffer> {
    const corrupt = (reason: string): UnrecoverableCorruption =>
      new UnrecoverableCorruption(`Cannot restore ${record.file} for fix ${record.fixId}: ${reason}`, this.remaining());

    if (!record.blobPath) throw corrupt('backup record has no blob');
    let content: Buffer;
    try {
      content = await fs.readFile(path.join(this.paths.stateDir, record.blobPath));
    } catch (error) {
      if (isMissingFileError(error)) throw corrupt(`blob ${record.fileHash} is missing`);
      throw error;
    }
    if (sha256(content) !== record.fileHash) {
      throw corrupt(`blob ${record.fileHash} does not match its hash`);
    }
    return content;
  }
}
