/**
 * CLI module index
 * Main entry point for the CLI interface
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  createDetectCommand,
  createDiagnoseCommand,
  createPresetsCommand,
  createReportCommand,
  createRollbackCommand,
  createRunCommand,
} from './commands/index.js';
import { printError } from './output.js';

export * from './output.js';
export * from './commands/index.js';

/**
 * Package version - read from package.json
 */
const require = createRequire(import.meta.url);
const packageJson: unknown = require('../../package.json');
export const VERSION: string =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

/**
 * Create the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('flask-mender')
    .description('Detect, heal and re-validate defects in Flask applications')
    .version(VERSION)
    .option('--no-color', 'Disable colored output');

  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createDetectCommand());
  program.addCommand(createDiagnoseCommand());
  program.addCommand(createRollbackCommand());
  program.addCommand(createPresetsCommand());
  program.addCommand(createReportCommand());

  return program;
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 2;
  }
}
