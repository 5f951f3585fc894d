/**
 * Healing Logger
 * Provides persistent logging of every healing stage for transparency and debugging
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

/**
 * Log levels for filtering and display
 */
export const LogLevelSchema = z.enum(['info', 'warn', 'error', 'success', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Healing stages for categorization
 */
export const HealingStageSchema = z.enum([
  'detecting',
  'diagnosing',
  'healing',
  'validating',
  'reporting',
  'rollback',
]);
export type HealingStage = z.infer<typeof HealingStageSchema>;

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  stage: HealingStage;
  event: string;
  message: string;
  data?: Record<string, unknown>;
  level: LogLevel;
}

export interface HealingLoggerOptions {
  /** Keep debug entries; dropped otherwise */
  verbose?: boolean;
  /** Called for every kept entry, e.g. to echo to the console */
  onEntry?: (entry: LogEntry) => void;
  now?: () => Date;
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  error: '[ERROR]',
  warn: '[WARN]',
  success: '[OK]',
  debug: '[DEBUG]',
  info: '[INFO]',
};

const ICON_LEVELS = new Map<string, LogLevel>(
  LogLevelSchema.options.map((level) => [LEVEL_ICONS[level], level])
);

/**
 * Healing logger that persists entries as markdown under the state directory
 */
export class HealingLogger {
  private entries: LogEntry[] = [];
  private initialized = false;
  private writes: Promise<void> = Promise.resolve();
  private readonly now: () => Date;

  constructor(
    private readonly logFile: string,
    private readonly options: HealingLoggerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Initialize the logger and load existing entries
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;
    await fs.mkdir(path.dirname(this.logFile), { recursive: true });
    try {
      const content = await fs.readFile(this.logFile, 'utf-8');
      this.entries = parseLog(content);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
      this.entries = [];
    }
    this.initialized = true;
  }

  /**
   * Log an entry to the healing log
   */
  async log(
    stage: HealingStage,
    event: string,
    message: string,
    data?: Record<string, unknown>,
    level: LogLevel = 'info'
  ): Promise<void> {
    if (level === 'debug' && !this.options.verbose) return;
    await this.initialize();

    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      stage,
      event,
      message,
      data,
      level,
    };
    this.entries.push(entry);
    this.options.onEntry?.(entry);

    const write = this.writes.then(() => fs.writeFile(this.logFile, formatMarkdown(this.entries), 'utf-8'));
    this.writes = write.catch(() => undefined);
    await write;
  }

  async info(stage: HealingStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'info');
  }

  async warn(stage: HealingStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'warn');
  }

  async error(stage: HealingStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'error');
  }

  async success(stage: HealingStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'success');
  }

  async debug(stage: HealingStage, event: string, message: string, data?: Record<string, unknown>): Promise<void> {
    await this.log(stage, event, message, data, 'debug');
  }

  async stageStart(stage: HealingStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.info(stage, 'stage_start', `Starting: ${description}`, data);
  }

  async stageComplete(stage: HealingStage, description: string, data?: Record<string, unknown>): Promise<void> {
    await this.success(stage, 'stage_complete', `Completed: ${description}`, data);
  }

  async stageFailed(stage: HealingStage, description: string, error: string, data?: Record<string, unknown>): Promise<void> {
    await this.error(stage, 'stage_failed', `Failed: ${description} - ${error}`, data);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForStage(stage: HealingStage): LogEntry[] {
    return this.entries.filter((e) => e.stage === stage);
  }

  getErrors(): LogEntry[] {
    return this.entries.filter((e) => e.level === 'error');
  }
}

/**
 * Format log entries as markdown
 */
export function formatMarkdown(entries: readonly LogEntry[]): string {
  const lines: string[] = [
    '# Healing Log',
    '',
    'Stages recorded by flask-mender for this project.',
    '',
    '---',
    '',
  ];

  const entriesByDate = new Map<string, LogEntry[]>();
  for (const entry of entries) {
    const date = entry.timestamp.split('T')[0];
    const bucket = entriesByDate.get(date) ?? [];
    bucket.push(entry);
    entriesByDate.set(date, bucket);
  }

  for (const [date, dateEntries] of entriesByDate) {
    lines.push(`## Session: ${date}`);
    lines.push('');

    for (const entry of dateEntries) {
      const time = entry.timestamp.split('T')[1]?.split('.')[0] ?? '';
      lines.push(`### [${time}] ${LEVEL_ICONS[entry.level]} **${entry.stage}** - ${entry.message}`);

      if (entry.data && Object.keys(entry.data).length > 0) {
        lines.push('');
        lines.push('<details>');
        lines.push('<summary>Details</summary>');
        lines.push('');
        lines.push('```json');
        lines.push(JSON.stringify(entry.data, null, 2));
        lines.push('```');
        lines.push('</details>');
      }

      lines.push('');
    }
  }

  lines.push('---');
  lines.push('');
  lines.push('## Summary Statistics');
  lines.push('');
  lines.push(`- **Total Entries:** ${entries.length}`);
  lines.push(`- **Errors:** ${entries.filter((e) => e.level === 'error').length}`);
  lines.push(`- **Warnings:** ${entries.filter((e) => e.level === 'warn').length}`);
  lines.push(`- **Successful Steps:** ${entries.filter((e) => e.level === 'success').length}`);
  lines.push('');

  return lines.join('\n');
}

const DataSchema = z.record(z.string(), z.unknown());

/**
 * Recover entries from a previously written log
 */
export function parseLog(content: string): LogEntry[] {
  const entries: LogEntry[] = [];
  let date = '';
  let current: LogEntry | null = null;
  let inJson = false;
  let json: string[] = [];

  for (const line of content.split('\n')) {
    const session = /^## Session: (\d{4}-\d{2}-\d{2})$/.exec(line);
    if (session) {
      date = session[1];
      continue;
    }

    const heading = /^### \[([\d:]+)\] (\[[A-Z]+\]) \*\*([a-z-]+)\*\* - (.*)$/.exec(line);
    if (heading) {
      const level = ICON_LEVELS.get(heading[2]);
      const stage = HealingStageSchema.safeParse(heading[3]);
      current = null;
      if (level && stage.success) {
        current = { timestamp: `${date}T${heading[1]}.000Z`, stage: stage.data, event: '', message: heading[4], level };
        entries.push(current);
      }
      continue;
    }

    if (line === '```json') {
      inJson = true;
      json = [];
    } else if (line === '```' && inJson) {
      inJson = false;
      if (current) {
        try {
          const data = DataSchema.safeParse(JSON.parse(json.join('\n')));
          if (data.success) current.data = data.data;
        } catch {
          current.data = { raw: json.join('\n') };
        }
      }
    } else if (inJson) {
      json.push(line);
    }
  }

  return entries;
}
