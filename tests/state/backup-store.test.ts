/**
 * Tests for the content-addressed backup store
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { BackupStore } from '../../src/state/backup-store.js';
import { getStatePaths, type StatePaths } from '../../src/state/persistence.js';
import { sha256 } from '../../src/correctors/patch.js';
import { MenderError, UnrecoverableCorruption } from '../../src/types/errors.js';

describe('BackupStore', () => {
  let root: string;
  let paths: StatePaths;
  let store: BackupStore;

  const write = (file: string, content: string) => fs.writeFile(path.join(root, file), content, 'utf-8');
  const read = (file: string) => fs.readFile(path.join(root, file), 'utf-8');

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-backups-'));
    paths = getStatePaths(path.join(root, '.mender'));
    store = new BackupStore(root, paths, { now: () => new Date('2026-01-01T00:00:00.000Z') });
    await store.load();
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should store the blob under its hash', async () => {
    const content = 'print("hi")\n';
    const record = await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'app.py', content });
    expect(record).toEqual({
      issueId: 'i1',
      fileHash: sha256(content),
      file: 'app.py',
      blobPath: `backups/blobs/${sha256(content)}`,
      fixId: 'fix-0001',
      sequence: 0,
      createdAt: '2026-01-01T00:00:00.000Z',
      restored: false,
    });
    expect(await fs.readFile(path.join(paths.blobsDir, sha256(content)), 'utf-8')).toBe(content);
  });

  it('should not duplicate a repeated backup request', async () => {
    const request = { issueId: 'i1', fixId: 'fix-0001', file: 'app.py', content: 'x' };
    await store.backup(request);
    await store.backup(request);
    expect(store.list()).toHaveLength(1);
  });

  it('should reuse a blob for identical content', async () => {
    const a = await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'a.py', content: 'same' });
    const b = await store.backup({ issueId: 'i2', fixId: 'fix-0002', file: 'b.py', content: 'same' });
    expect(b.blobPath).toBe(a.blobPath);
    expect(await fs.readdir(paths.blobsDir)).toEqual([sha256('same')]);
  });

  it('should restore a file byte for byte', async () => {
    const original = 'line one\r\nline two\n\tindented  \n';
    await write('app.py', original);
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'app.py', content: original });
    await write('app.py', 'rewritten\n');

    const restored = await store.rollbackFix('fix-0001');
    expect(restored.map((r) => r.fixId)).toEqual(['fix-0001']);
    expect(await read('app.py')).toBe(original);
    expect(store.remaining()).toEqual([]);
  });

  it('should restore bytes that are not valid UTF-8', async () => {
    const original = Buffer.from([0x23, 0x20, 0x63, 0x61, 0x66, 0xe9, 0x20, 0x20, 0x0a]);
    await fs.writeFile(path.join(root, 'app.py'), original);
    const record = await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'app.py', content: original });
    await write('app.py', '# cafe\n');

    await store.rollbackFix('fix-0001');

    expect(record.fileHash).toBe(sha256(original));
    expect(await fs.readFile(path.join(paths.blobsDir, record.fileHash))).toEqual(original);
    expect(await fs.readFile(path.join(root, 'app.py'))).toEqual(original);
  });

  it('should undo later fixes to the same file first', async () => {
    await write('app.py', 'v0');
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'app.py', content: 'v0' });
    await write('app.py', 'v1');
    await store.backup({ issueId: 'i2', fixId: 'fix-0002', file: 'other.py', content: 'o0' });
    await store.backup({ issueId: 'i3', fixId: 'fix-0003', file: 'app.py', content: 'v1' });
    await write('app.py', 'v2');

    const restored = await store.rollbackFix('fix-0001');
    expect(restored.map((r) => r.fixId)).toEqual(['fix-0003', 'fix-0001']);
    expect(await read('app.py')).toBe('v0');
    expect(store.remaining().map((r) => r.fixId)).toEqual(['fix-0002']);
  });

  it('should delete files that a fix created', async () => {
    await fs.mkdir(path.join(root, 'templates'));
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'templates/new.html', content: null });
    await write('templates/new.html', '<p>new</p>');

    await store.rollbackAll();
    await expect(fs.access(path.join(root, 'templates/new.html'))).rejects.toThrow();
  });

  it('should roll everything back in reverse order', async () => {
    await write('a.py', 'a0');
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'a.py', content: 'a0' });
    await store.backup({ issueId: 'i2', fixId: 'fix-0002', file: 'b.py', content: null });
    await write('a.py', 'a1');
    await write('b.py', 'b1');

    const restored = await store.rollbackAll();
    expect(restored.map((r) => r.fixId)).toEqual(['fix-0002', 'fix-0001']);
    expect(await read('a.py')).toBe('a0');
  });

  it('should refuse an unknown fix', async () => {
    await expect(store.rollbackFix('fix-9999')).rejects.toThrow(MenderError);
  });

  it('should raise UnrecoverableCorruption for a tampered blob', async () => {
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'a.py', content: 'a0' });
    await store.backup({ issueId: 'i2', fixId: 'fix-0002', file: 'b.py', content: 'b0' });
    await fs.writeFile(path.join(paths.blobsDir, sha256('b0')), 'tampered', 'utf-8');

    const error: unknown = await store.rollbackAll().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UnrecoverableCorruption);
    if (error instanceof UnrecoverableCorruption) {
      expect(error.remainingBackups.map((r) => r.fixId)).toEqual(['fix-0002', 'fix-0001']);
    }
  });

  it('should raise UnrecoverableCorruption for a missing blob', async () => {
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'a.py', content: 'a0' });
    await fs.rm(paths.blobsDir, { recursive: true });
    await expect(store.rollbackFix('fix-0001')).rejects.toThrow(UnrecoverableCorruption);
  });

  it('should persist the index across instances', async () => {
    await store.backup({ issueId: 'i1', fixId: 'fix-0001', file: 'a.py', content: 'a0' });
    const reopened = new BackupStore(root, paths);
    await reopened.load();
    expect(reopened.list()).toEqual(store.list());
  });
});
