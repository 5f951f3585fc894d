/**
 * Tests for applying planned fixes
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { applyPlannedFixes, rebaseEdits } from '../../src/workflow/fix-applier.js';
import { BackupStore } from '../../src/state/backup-store.js';
import { getStatePaths } from '../../src/state/persistence.js';
import { StaleFileError, UndecodableFileError } from '../../src/types/errors.js';
import type { PlannedFix } from '../../src/types/fix.js';
import { RevisionChain, renderRevision } from '../../src/correctors/persistence.js';

describe('rebaseEdits', () => {
  it('should shift edits past earlier applied edits', () => {
    const rebased = rebaseEdits([{ start: 10, end: 12, replacement: 'x' }], [{ start: 0, end: 2, replacement: 'abcd' }]);
    expect(rebased).toEqual([{ start: 12, end: 14, replacement: 'x' }]);
  });

  it('should leave edits before the applied ones alone', () => {
    const rebased = rebaseEdits([{ start: 1, end: 2, replacement: 'x' }], [{ start: 5, end: 9, replacement: '' }]);
    expect(rebased).toEqual([{ start: 1, end: 2, replacement: 'x' }]);
  });
});

describe('applyPlannedFixes', () => {
  let root: string;
  let backups: BackupStore;
  let counter: number;

  const nextFixId = () => `fix-${String(++counter).padStart(4, '0')}`;
  const read = (file: string) => fs.readFile(path.join(root, file), 'utf-8');
  const base = 'a = 1\nb = 2\n';

  function plan(issueId: string, edits: PlannedFix['edits'], overrides: Partial<PlannedFix> = {}): PlannedFix {
    return { issueId, corrector: 'code', file: 'app.py', description: `fix ${issueId}`, baseContent: base, edits, ...overrides };
  }

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-apply-'));
    backups = new BackupStore(root, getStatePaths(path.join(root, '.mender')));
    await backups.load();
    counter = 0;
    await fs.writeFile(path.join(root, 'app.py'), base, 'utf-8');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('should apply two fixes to one file in sequence', async () => {
    const outcomes = await applyPlannedFixes(
      [plan('i1', [{ start: 0, end: 1, replacement: 'alpha' }]), plan('i2', [{ start: 6, end: 7, replacement: 'beta' }])],
      { root, backups, iteration: 1, nextFixId }
    );

    expect(outcomes.map((o) => o.error)).toEqual([null, null]);
    expect(outcomes.map((o) => o.fix?.id)).toEqual(['fix-0001', 'fix-0002']);
    expect(outcomes.map((o) => o.fix?.applied)).toEqual([true, true]);
    expect(await read('app.py')).toBe('alpha = 1\nbeta = 2\n');
    expect(outcomes[1].fix?.diff).toBe(
      ['--- a/app.py', '+++ b/app.py', '@@ -1,2 +1,2 @@', ' alpha = 1', '-b = 2', '+beta = 2'].join('\n')
    );
    expect(backups.list().map((r) => r.fixId)).toEqual(['fix-0001', 'fix-0002']);
  });

  it('should restore the original after rolling back the first fix', async () => {
    await applyPlannedFixes(
      [plan('i1', [{ start: 0, end: 1, replacement: 'alpha' }]), plan('i2', [{ start: 6, end: 7, replacement: 'beta' }])],
      { root, backups, iteration: 1, nextFixId }
    );
    await backups.rollbackFix('fix-0001');
    expect(await read('app.py')).toBe(base);
  });

  it('should refuse to patch a file that changed since planning', async () => {
    await fs.writeFile(path.join(root, 'app.py'), 'edited by hand\n', 'utf-8');
    const [outcome] = await applyPlannedFixes([plan('i1', [{ start: 0, end: 1, replacement: 'x' }])], {
      root,
      backups,
      iteration: 1,
      nextFixId,
    });
    expect(outcome.fix).toBeNull();
    expect(outcome.error).toBeInstanceOf(StaleFileError);
    expect(await read('app.py')).toBe('edited by hand\n');
    expect(backups.list()).toEqual([]);
  });

  it('should refuse to rewrite a file that is not valid UTF-8', async () => {
    const latin1 = Buffer.from([0x78, 0x20, 0x3d, 0x20, 0x27, 0xe9, 0x27, 0x20, 0x20, 0x0a]);
    await fs.writeFile(path.join(root, 'app.py'), latin1);
    const lossy = latin1.toString('utf-8');

    const [outcome] = await applyPlannedFixes(
      [plan('i1', [{ start: 7, end: 9, replacement: '' }], { baseContent: lossy })],
      { root, backups, iteration: 1, nextFixId }
    );

    expect(outcome.fix).toBeNull();
    expect(outcome.error).toBeInstanceOf(UndecodableFileError);
    expect(outcome.error?.message).toBe('File app.py is not valid UTF-8; refusing to edit it');
    expect(await fs.readFile(path.join(root, 'app.py'))).toEqual(latin1);
    expect(backups.list()).toEqual([]);
  });

  it('should create new files', async () => {
    const [outcome] = await applyPlannedFixes(
      [
        plan('i1', [{ start: 0, end: 0, replacement: '<h1>Missing</h1>\n' }], {
          corrector: 'templating',
          file: 'templates/missing.html',
          baseContent: null,
        }),
      ],
      { root, backups, iteration: 1, nextFixId }
    );
    expect(outcome.fix?.patch.createsFile).toBe(true);
    expect(outcome.fix?.backupRef).toEqual({ issueId: 'i1', fileHash: 'absent' });
    expect(await read('templates/missing.html')).toBe('<h1>Missing</h1>\n');
  });

  it('should chain written revisions past one that failed to write', async () => {
    const revision = (id: string): PlannedFix => {
      const content = renderRevision({
        revision: id,
        downRevisions: ['a1'],
        message: `step ${id}`,
        createDate: new Date('2026-03-01T12:00:00.000Z'),
        upgrade: ['pass'],
        downgrade: ['pass'],
      });
      return plan(`i-${id}`, [{ start: 0, end: 0, replacement: content }], {
        corrector: 'persistence',
        file: `migrations/versions/${id}_step.py`,
        baseContent: null,
      });
    };
    await fs.mkdir(path.join(root, 'migrations/versions'), { recursive: true });
    await fs.writeFile(path.join(root, 'migrations/versions/r1_step.py'), "revision = 'r1'\n", 'utf-8');
    const revisions = new RevisionChain('migrations/versions', ['a1']);

    const outcomes = await applyPlannedFixes([revision('r1'), revision('r2'), revision('r3')], {
      root,
      backups,
      iteration: 1,
      nextFixId,
      revisions,
    });

    expect(outcomes.map((o) => o.error?.name ?? null)).toEqual(['StaleFileError', null, null]);
    expect((await read('migrations/versions/r2_step.py')).split('\n')).toContain("down_revision = 'a1'");
    expect((await read('migrations/versions/r3_step.py')).split('\n')).toContain("down_revision = 'r2'");
    expect(revisions.currentHeads).toEqual(['r3']);
  });

  it('should write nothing in dry-run mode', async () => {
    const outcomes = await applyPlannedFixes(
      [plan('i1', [{ start: 0, end: 1, replacement: 'alpha' }]), plan('i2', [{ start: 6, end: 7, replacement: 'beta' }])],
      { root, backups, iteration: 1, nextFixId, dryRun: true }
    );
    expect(outcomes.map((o) => o.fix?.applied)).toEqual([false, false]);
    expect(outcomes.map((o) => o.fix?.backupRef)).toEqual([null, null]);
    expect(outcomes[1].fix?.diff).toContain('+beta = 2');
    expect(await read('app.py')).toBe(base);
    expect(backups.list()).toEqual([]);
  });
});
