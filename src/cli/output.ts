/**
 * CLI output utilities
 * Handles formatted output, spinners, and report display
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { IssueDraft } from '../types/issue.js';
import type { FrozenProjectModel } from '../types/project.js';
import type { RunReport, TerminalState } from '../types/report.js';

/**
 * Output theme colors
 */
export const theme = {
  primary: chalk.cyan,
  secondary: chalk.gray,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  highlight: chalk.bold.white,
  dim: chalk.dim,
};

/**
 * Spinner instance for progress display
 */
let spinner: Ora | null = null;

/**
 * Start a spinner with a message
 */
export function startSpinner(message: string): Ora {
  if (spinner) {
    spinner.stop();
  }
  spinner = ora({
    text: message,
    spinner: 'dots',
  }).start();
  return spinner;
}

export function updateSpinner(message: string): void {
  if (spinner) {
    spinner.text = message;
  }
}

export function succeedSpinner(message?: string): void {
  if (spinner) {
    spinner.succeed(message);
    spinner = null;
  }
}

export function failSpinner(message?: string): void {
  if (spinner) {
    spinner.fail(message);
    spinner = null;
  }
}

export function stopSpinner(): void {
  if (spinner) {
    spinner.stop();
    spinner = null;
  }
}

/**
 * Print a header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(theme.primary.bold(`=== ${title} ===`));
  console.log();
}

/**
 * Print a section header
 */
export function printSection(title: string): void {
  console.log();
  console.log(theme.highlight(`--- ${title} ---`));
}

export function printSuccess(message: string): void {
  console.log(theme.success(`[OK] ${message}`));
}

export function printWarning(message: string): void {
  console.log(theme.warning(`[WARN] ${message}`));
}

export function printError(message: string): void {
  console.log(theme.error(`[ERROR] ${message}`));
}

export function printInfo(message: string): void {
  console.log(theme.info(`[INFO] ${message}`));
}

export function printKeyValue(key: string, value: string | number | boolean): void {
  console.log(`  ${theme.secondary(key + ':')} ${value}`);
}

export function printListItem(item: string, indent: number = 0): void {
  const prefix = '  '.repeat(indent) + '- ';
  console.log(theme.secondary(prefix) + item);
}

/**
 * Print a table
 */
export function printTable(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => {
    const maxRow = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
    return Math.max(h.length, maxRow);
  });

  const headerLine = headers.map((h, i) => h.padEnd(widths[i])).join('  ');
  console.log(theme.highlight(headerLine));
  console.log(theme.dim('-'.repeat(headerLine.length)));

  for (const row of rows) {
    console.log(row.map((cell, i) => (cell ?? '').padEnd(widths[i])).join('  '));
  }
}

function colorTerminal(state: TerminalState): string {
  switch (state) {
    case 'Resolved':
      return theme.success(state);
    case 'PartialFailure':
      return theme.warning(state);
    default:
      return theme.error(state);
  }
}

/**
 * Print what detection found
 */
export function printProjectModel(project: FrozenProjectModel): void {
  printHeader('Project');
  printKeyValue('Root', project.root);
  printKeyValue('Entry point', `${project.entryPoint.file}:${project.entryPoint.symbol} (${project.entryPoint.kind})`);
  printKeyValue('Architecture', project.architecturePattern);
  printKeyValue('Route modules', project.routeModules.length);
  printKeyValue('Template dirs', project.templateDirs.join(', ') || 'none');
  printKeyValue('Model modules', project.modelModules.length);
  if (project.blueprints.length > 0) {
    printKeyValue('Blueprints', project.blueprints.map((bp) => bp.name ?? bp.variable).join(', '));
  }
  if (project.authMechanism) printKeyValue('Auth', project.authMechanism.kind);
  if (project.database) printKeyValue('Database', project.database.kind);

  printSection('Confidence');
  for (const [field, score] of Object.entries(project.confidence)) {
    printKeyValue(field, score.toFixed(2));
  }
}

/**
 * Print findings from a diagnose-only pass
 */
export function printDrafts(drafts: readonly IssueDraft[]): void {
  if (drafts.length === 0) {
    printSuccess('No issues found');
    return;
  }
  printTable(
    ['Severity', 'Rule', 'Location', 'Description'],
    drafts.map((d) => [d.severity, d.rule, `${d.location.file}:${d.location.startLine}`, d.description])
  );
}

/**
 * Print the console summary of a run report
 */
export function printRunReport(report: RunReport): void {
  printHeader('Healing run');
  printKeyValue('Terminal state', colorTerminal(report.terminalState));
  printKeyValue('Iterations', `${report.iterations}/${report.maxIterations}`);
  if (report.preset) printKeyValue('Preset', report.preset);
  if (report.dryRun) printKeyValue('Dry run', true);
  if (report.abortReason) printError(report.abortReason);

  const fixes = report.fixes.filter((fix) => fix.applied || report.dryRun);
  if (fixes.length > 0) {
    printSection(report.dryRun ? 'Planned fixes' : 'Applied fixes');
    for (const fix of fixes) printListItem(`${fix.id} ${fix.file}: ${fix.description}`);
  }

  printSection('Open issues');
  if (report.openIssues.length === 0) {
    printSuccess('None');
    return;
  }
  printTable(
    ['Severity', 'Rule', 'File', 'Description'],
    report.openIssues.map((issue) => [issue.severity, issue.rule, issue.file, issue.description])
  );
}
