/**
 * Rollback command
 * Restores files from the backup store
 */

import { Command } from 'commander';
import { rollback } from '../../workflow/rollback.js';
import { UnrecoverableCorruption } from '../../types/errors.js';
import { printError, printInfo, printListItem, printSuccess } from '../output.js';
import { commonOverrides, loadCommandConfig, type CommonOptions } from './shared.js';

interface RollbackOptions extends CommonOptions {
  all?: boolean;
  dir: string;
}

export function createRollbackCommand(): Command {
  return new Command('rollback')
    .description('Undo one applied fix (and later fixes to its file), or all of them')
    .argument('[fixId]', 'Fix to undo, e.g. fix-0003')
    .option('-a, --all', 'Undo every applied fix')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--state-dir <dir>', 'State directory relative to the project')
    .action(async (fixId: string | undefined, options: RollbackOptions) => {
      if (!fixId && !options.all) {
        throw new Error('Pass a fix id or --all');
      }
      const config = await loadCommandConfig(options.dir, commonOverrides(options));
      try {
        const result = await rollback(config, fixId ? { fixId } : { all: true });
        if (result.restored.length === 0) {
          printInfo('Nothing to roll back');
          return;
        }
        printSuccess(`Restored ${result.restored.length} file version(s)`);
        for (const record of result.restored) printListItem(`${record.fixId} ${record.file}`);
        if (result.reopened.length > 0) printInfo(`${result.reopened.length} issue(s) reopened`);
      } catch (error) {
        if (error instanceof UnrecoverableCorruption) {
          printError(error.message);
          printInfo('Backups still on disk:');
          for (const record of error.remainingBackups) {
            printListItem(`${record.fixId} ${record.file} ${record.blobPath ?? '(created file)'}`);
          }
          process.exitCode = 2;
          return;
        }
        throw error;
      }
    });
}
