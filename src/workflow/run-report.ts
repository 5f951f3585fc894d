/**
 * Run report assembly and JSON/Markdown writers.
 */

import path from 'node:path';
import {
  ISSUE_CATEGORIES,
  SEVERITY_RANK,
  isOpenStatus,
  type Issue,
  type IssueSeverity,
} from '../types/issue.js';
import { deepFreeze, type FrozenProjectModel } from '../types/project.js';
import {
  RunReportSchema,
  type OpenIssueSummary,
  type ProjectSummary,
  type RunReport,
  type RunReportData,
} from '../types/report.js';
import { readJsonFile, writeFileAtomic, writeJsonFile } from '../state/persistence.js';

/**
 * Condensed project facts for the report header
 */
export function summarizeProject(project: FrozenProjectModel): ProjectSummary {
  return {
    entryFile: project.entryPoint.file,
    entrySymbol: project.entryPoint.symbol,
    architecturePattern: project.architecturePattern,
    blueprints: project.blueprints.map((bp) => bp.name ?? bp.variable),
    routeModules: project.routeModules.length,
    templateDirs: [...project.templateDirs],
    modelModules: project.modelModules.length,
    authMechanism: project.authMechanism?.kind ?? null,
    database: project.database?.kind ?? null,
  };
}

/**
 * Open issues, most severe first
 */
export function openIssueSummaries(issues: readonly Issue[]): OpenIssueSummary[] {
  return issues
    .filter((issue) => isOpenStatus(issue.status))
    .sort((a, b) => SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] || (a.id < b.id ? -1 : 1))
    .map((issue) => ({
      id: issue.id,
      severity: issue.severity,
      rule: issue.rule,
      file: issue.location.file,
      description: issue.description,
    }));
}

export function countBySeverity(open: readonly OpenIssueSummary[]): Record<IssueSeverity, number> {
  const counts: Record<IssueSeverity, number> = { info: 0, warning: 0, error: 0, critical: 0 };
  for (const issue of open) counts[issue.severity] += 1;
  return counts;
}

export type RunReportInput = Omit<RunReportData, 'openIssues' | 'openBySeverity'>;

/**
 * Validate and deep-freeze a report
 */
export function buildRunReport(input: RunReportInput): RunReport {
  const openIssues = openIssueSummaries(input.issues);
  const data = RunReportSchema.parse({
    ...input,
    openIssues,
    openBySeverity: countBySeverity(openIssues),
  });
  return deepFreeze(data);
}

// ---------------------------------------------------------------------------
// Markdown
// ---------------------------------------------------------------------------

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function renderMarkdown(report: RunReport): string {
  const lines: string[] = [
    '# flask-mender run report',
    '',
    '## Summary',
    '',
    `- **Root:** ${report.root}`,
    `- **Terminal state:** ${report.terminalState}`,
    `- **Iterations:** ${report.iterations} / ${report.maxIterations}`,
    `- **Preset:** ${report.preset ?? 'none'}`,
    `- **Dry run:** ${report.dryRun ? 'yes' : 'no'}`,
    `- **Started:** ${report.startedAt}`,
    `- **Duration:** ${(report.durationMs / 1000).toFixed(1)}s`,
  ];
  if (report.abortReason) lines.push(`- **Abort reason:** ${report.abortReason}`);
  lines.push('');

  if (report.project) {
    const p = report.project;
    lines.push('## Project', '');
    lines.push(`- **Entry point:** \`${p.entryFile}\` (\`${p.entrySymbol}\`)`);
    lines.push(`- **Architecture:** ${p.architecturePattern}`);
    if (p.blueprints.length > 0) lines.push(`- **Blueprints:** ${p.blueprints.join(', ')}`);
    lines.push(`- **Route modules:** ${p.routeModules}`);
    lines.push(`- **Model modules:** ${p.modelModules}`);
    if (p.templateDirs.length > 0) lines.push(`- **Template dirs:** ${p.templateDirs.join(', ')}`);
    if (p.authMechanism) lines.push(`- **Auth:** ${p.authMechanism}`);
    if (p.database) lines.push(`- **Database:** ${p.database}`);
    lines.push('');
  }

  const sev = report.openBySeverity;
  lines.push('## Open issues', '');
  lines.push(`critical ${sev.critical} · error ${sev.error} · warning ${sev.warning} · info ${sev.info}`, '');
  if (report.openIssues.length > 0) {
    lines.push('| Severity | Rule | File | Description |', '|---|---|---|---|');
    for (const issue of report.openIssues) {
      lines.push(`| ${issue.severity} | ${issue.rule} | ${escapeCell(issue.file)} | ${escapeCell(issue.description)} |`);
    }
    lines.push('');
  }

  lines.push('## Issues by category', '');
  for (const category of ISSUE_CATEGORIES) {
    const issues = report.issues.filter((issue) => issue.category === category);
    if (issues.length === 0) continue;
    lines.push(`### ${category}`, '');
    for (const issue of issues) {
      lines.push(`- \`${issue.id}\` **${issue.status}** ${issue.rule} at ${issue.location.file}:${issue.location.startLine} - ${issue.description}`);
    }
    lines.push('');
  }

  const fixes = report.fixes.filter((fix) => fix.applied || report.dryRun);
  if (fixes.length > 0) {
    lines.push(report.dryRun ? '## Planned fixes' : '## Applied fixes', '');
    for (const fix of fixes) {
      const state = fix.rolledBack ? 'rolled back' : fix.verified ? 'verified' : fix.applied ? 'applied' : 'planned';
      lines.push(`### ${fix.id}: ${fix.description} (${state})`, '');
      if (fix.diff) lines.push('```diff', fix.diff.replace(/\n$/, ''), '```', '');
    }
  }

  if (report.validations.length > 0) {
    lines.push('## Validation passes', '');
    for (const v of report.validations) {
      const outcome = v.timedOut ? 'timed out' : v.success ? 'passed' : 'failed';
      lines.push(`- Iteration ${v.iteration}: ${outcome}, ${v.probes.length} probe(s), ${v.skippedRoutes.length} dynamic route(s) skipped`);
    }
    lines.push('');
  }

  lines.push('## Transitions', '');
  for (const t of report.transitions) {
    lines.push(`${t.seq}. ${t.from} → ${t.to} (iteration ${t.iteration})`);
  }
  lines.push('');

  if (report.remainingBackups.length > 0) {
    lines.push('## Remaining backups', '');
    for (const b of report.remainingBackups) {
      lines.push(`- ${b.file} (fix ${b.fixId}, ${b.blobPath ?? 'created file'})`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

export const LATEST_REPORT = 'latest.json';

export interface WrittenReport {
  json: string;
  markdown: string;
}

/**
 * Write `<stamp>.json`, `<stamp>.md` and `latest.json` under the reports dir
 */
export async function writeRunReport(report: RunReport, reportsDir: string): Promise<WrittenReport> {
  const stamp = report.finishedAt.replace(/[:.]/g, '-');
  const json = path.join(reportsDir, `report-${stamp}.json`);
  const markdown = path.join(reportsDir, `report-${stamp}.md`);
  await writeJsonFile(json, RunReportSchema, report);
  await writeFileAtomic(markdown, renderMarkdown(report));
  await writeJsonFile(path.join(reportsDir, LATEST_REPORT), RunReportSchema, report);
  return { json, markdown };
}

export async function readLatestReport(reportsDir: string): Promise<RunReport | null> {
  const data = await readJsonFile(path.join(reportsDir, LATEST_REPORT), RunReportSchema);
  return data ? deepFreeze(data) : null;
}
