/**
 * Tests for the markdown healing log
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { HealingLogger, formatMarkdown, parseLog, type LogEntry } from '../../src/workflow/healing-logger.js';

const now = () => new Date('2026-01-02T03:04:05.678Z');

describe('HealingLogger', () => {
  let dir: string;
  let logFile: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-log-'));
    logFile = path.join(dir, '.mender', 'HEALING_LOG.md');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should write entries as markdown', async () => {
    const logger = new HealingLogger(logFile, { now });
    await logger.stageStart('detecting', 'scan project', { root: '/srv/app' });

    const content = await fs.readFile(logFile, 'utf-8');
    expect(content.startsWith('# Healing Log\n')).toBe(true);
    expect(content).toContain('## Session: 2026-01-02');
    expect(content).toContain('### [03:04:05] [INFO] **detecting** - Starting: scan project');
    expect(content).toContain('"root": "/srv/app"');
    expect(content).toContain('- **Total Entries:** 1');
  });

  it('should drop debug entries unless verbose', async () => {
    const quiet = new HealingLogger(logFile, { now });
    await quiet.debug('healing', 'fix', 'hidden');
    expect(quiet.getEntries()).toEqual([]);

    const verbose = new HealingLogger(path.join(dir, 'verbose.md'), { now, verbose: true });
    await verbose.debug('healing', 'fix', 'shown');
    expect(verbose.getEntries().map((e) => e.message)).toEqual(['shown']);
  });

  it('should hand every kept entry to onEntry', async () => {
    const seen: string[] = [];
    const logger = new HealingLogger(logFile, { now, onEntry: (entry) => seen.push(entry.event) });
    await logger.warn('healing', 'fix_conflict', 'overlap');
    await logger.error('validating', 'aborted', 'gone');
    expect(seen).toEqual(['fix_conflict', 'aborted']);
    expect(logger.getErrors().map((e) => e.message)).toEqual(['gone']);
    expect(logger.getEntriesForStage('healing')).toHaveLength(1);
  });

  it('should keep entries from an earlier run', async () => {
    const first = new HealingLogger(logFile, { now });
    await first.success('reporting', 'stage_complete', 'Completed: run');

    const second = new HealingLogger(logFile, { now });
    await second.info('detecting', 'stage_start', 'Starting: again');
    expect(second.getEntries().map((e) => e.message)).toEqual(['Completed: run', 'Starting: again']);
  });
});

describe('parseLog', () => {
  it('should recover stage, level, message and data', () => {
    const entries: LogEntry[] = [
      {
        timestamp: '2026-01-02T03:04:05.678Z',
        stage: 'healing',
        event: 'fixes_applied',
        message: 'Applied 2 fix(es)',
        data: { conflicts: 0 },
        level: 'info',
      },
    ];
    expect(parseLog(formatMarkdown(entries))).toEqual([
      {
        timestamp: '2026-01-02T03:04:05.000Z',
        stage: 'healing',
        event: '',
        message: 'Applied 2 fix(es)',
        data: { conflicts: 0 },
        level: 'info',
      },
    ]);
  });

  it('should skip headings with unknown stages', () => {
    expect(parseLog('## Session: 2026-01-02\n### [01:02:03] [INFO] **nowhere** - lost\n')).toEqual([]);
  });
});
