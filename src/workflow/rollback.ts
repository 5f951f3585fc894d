/**
 * Restore files from backups and bring the ledger in line with them.
 */

import path from 'node:path';
import { resolveStateDir, type Config } from '../config/index.js';
import { BackupStore } from '../state/backup-store.js';
import { getStatePaths } from '../state/persistence.js';
import { IssueRegistry } from '../state/registry.js';
import type { BackupRecord } from '../types/report.js';

export type RollbackTarget = { fixId: string } | { all: true };

export interface RollbackResult {
  restored: BackupRecord[];
  /** Issues moved back to Detected */
  reopened: string[];
}

export async function rollback(
  config: Pick<Config, 'rootPath' | 'stateDir'>,
  target: RollbackTarget,
  options: { now?: () => Date } = {}
): Promise<RollbackResult> {
  const root = path.resolve(config.rootPath);
  const paths = getStatePaths(resolveStateDir(config));
  const registry = new IssueRegistry({ ledgerPath: paths.ledger, now: options.now });
  const backups = new BackupStore(root, paths, { now: options.now });
  await registry.load();
  await backups.load();

  const restored = 'fixId' in target ? await backups.rollbackFix(target.fixId) : await backups.rollbackAll();

  const iteration = registry
    .list()
    .flatMap((issue) => issue.history)
    .reduce((max, change) => Math.max(max, change.iteration), 0);
  const reopened: string[] = [];
  for (const record of restored) {
    if (registry.getFix(record.fixId)) {
      await registry.updateFix(record.fixId, { rolledBack: true, verified: false });
    }
    const issue = registry.get(record.issueId);
    if (issue && (issue.status === 'Applied' || issue.status === 'Verified')) {
      await registry.transition(issue.id, 'Detected', iteration, `rolled back ${record.fixId}`);
      reopened.push(issue.id);
    }
  }
  await registry.save();
  return { restored, reopened };
}
