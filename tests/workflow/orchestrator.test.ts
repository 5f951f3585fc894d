/**
 * End-to-end healing runs against temp projects and a scripted sandbox
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, promises as fs } from 'node:fs';
import path from 'node:path';
import { DEFAULT_CONFIG, type Config } from '../../src/config/index.js';
import { HealingOrchestrator } from '../../src/workflow/orchestrator.js';
import type { Analyzer } from '../../src/analyzers/index.js';
import { CORRECTORS } from '../../src/correctors/index.js';
import type { Corrector } from '../../src/correctors/corrector.js';
import type { TransitionEvent } from '../../src/types/report.js';
import { ScriptedLauncher, allRoutesOk, harnessStdout, templateAwareLauncher } from '../helpers/fake-launcher.js';
import { MISSING_TEMPLATE_APP, makeTempDir, readProjectFile, writeProject } from '../helpers/project.js';

const TEMPLATES = { '/': 'index.html', '/missing': 'missing.html' };

describe('HealingOrchestrator', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir('mender-heal-');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function configFor(overrides: Partial<Config> = {}): Config {
    return { ...DEFAULT_CONFIG, rootPath: root, ...overrides };
  }

  function launcher(): ScriptedLauncher {
    return templateAwareLauncher(TEMPLATES, (template) => existsSync(path.join(root, 'templates', template)));
  }

  it('should create a missing template and verify it in one iteration', async () => {
    await writeProject(root, MISSING_TEMPLATE_APP);
    const sandbox = launcher();
    const orchestrator = new HealingOrchestrator({ config: configFor(), launcher: sandbox });
    const seen: TransitionEvent[] = [];
    orchestrator.onTransition((event) => seen.push(event));

    const report = await orchestrator.run();

    expect(report.terminalState).toBe('Resolved');
    expect(report.iterations).toBe(1);
    expect(seen.map((e) => `${e.from}>${e.to}`)).toEqual([
      'Idle>Detecting',
      'Detecting>Diagnosing',
      'Diagnosing>Healing',
      'Healing>Validating',
      'Validating>Resolved',
      'Resolved>Reported',
    ]);
    expect(seen.map((e) => e.seq)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(report.transitions).toEqual(seen);
    expect(orchestrator.currentState).toBe('Reported');

    expect(await readProjectFile(root, 'templates/missing.html')).toContain('  <title>Missing</title>');
    expect(report.issues.map((i) => [i.rule, i.status])).toEqual([['templating/missing-template', 'Verified']]);
    expect(report.fixes.map((f) => [f.id, f.file, f.applied, f.verified])).toEqual([
      ['fix-0001', 'templates/missing.html', true, true],
    ]);
    expect(report.openIssues).toEqual([]);
    expect(report.validations).toHaveLength(1);
    expect(sandbox.configs[0].routes).toEqual(['/', '/missing']);
    expect(existsSync(path.join(root, '.mender', 'ledger.json'))).toBe(true);
    expect(existsSync(path.join(root, '.mender', 'reports', 'latest.json'))).toBe(true);
  });

  it('should leave a healed project untouched on the next run', async () => {
    await writeProject(root, MISSING_TEMPLATE_APP);
    await new HealingOrchestrator({ config: configFor(), launcher: launcher() }).run();
    const healed = await readProjectFile(root, 'templates/missing.html');

    const report = await new HealingOrchestrator({ config: configFor(), launcher: launcher() }).run();

    expect(report.terminalState).toBe('Resolved');
    expect(report.fixes.map((f) => f.id)).toEqual(['fix-0001']);
    expect(report.issues.map((i) => i.status)).toEqual(['Verified']);
    expect(await readProjectFile(root, 'templates/missing.html')).toBe(healed);
  });

  it('should write a migration for an unmigrated column', async () => {
    await writeProject(root, {
      'app.py': ['from flask import Flask', 'from models import db', '', 'app = Flask(__name__)', 'db.init_app(app)', ''].join('\n'),
      'models.py': [
        'from flask_sqlalchemy import SQLAlchemy',
        '',
        'db = SQLAlchemy()',
        '',
        '',
        'class Product(db.Model):',
        '    id = db.Column(db.Integer, primary_key=True)',
        '    name = db.Column(db.String(80))',
        '',
      ].join('\n'),
      'migrations/versions/a1_init.py': [
        "revision = 'a1'",
        'down_revision = None',
        '',
        '',
        'def upgrade():',
        "    op.create_table('product', sa.Column('id', sa.Integer()))",
        '',
      ].join('\n'),
    });

    const report = await new HealingOrchestrator({ config: configFor(), launcher: new ScriptedLauncher(allRoutesOk) }).run();

    expect(report.terminalState).toBe('Resolved');
    expect(report.issues.map((i) => [i.rule, i.status])).toEqual([['persistence/missing-migration', 'Verified']]);
    const [fix] = report.fixes;
    expect(fix.file).toMatch(/^migrations\/versions\/[0-9a-f]{12}_add_product_name\.py$/);
    const revision = (await readProjectFile(root, fix.file)).split('\n');
    expect(revision).toContain("down_revision = 'a1'");
    expect(revision).toContain("    op.add_column('product', sa.Column('name', sa.String(80), nullable=True))");
  });

  it('should preview fixes on a dry run without writing or validating', async () => {
    await writeProject(root, MISSING_TEMPLATE_APP);
    const sandbox = launcher();

    const report = await new HealingOrchestrator({ config: configFor({ dryRun: true }), launcher: sandbox }).run();

    expect(report.terminalState).toBe('PartialFailure');
    expect(report.dryRun).toBe(true);
    expect(report.iterations).toBe(1);
    expect(report.fixes.map((f) => [f.file, f.applied])).toEqual([['templates/missing.html', false]]);
    expect(report.fixes[0].diff.split('\n').slice(0, 2)).toEqual(['--- /dev/null', '+++ b/templates/missing.html']);
    expect(report.issues.map((i) => i.status)).toEqual(['Planned']);
    expect(sandbox.requests).toHaveLength(0);
    expect(existsSync(path.join(root, 'templates', 'missing.html'))).toBe(false);
    expect(existsSync(path.join(root, '.mender', 'ledger.json'))).toBe(false);
  });

  it('should retry a fix that lost a collision in the next iteration', async () => {
    await writeProject(root, { 'app.py': 'from flask import Flask\napp = Flask(__name__)\n# AAA BBB\n' });
    const markers: Analyzer = {
      category: 'code',
      async analyze(ctx) {
        const source = (await ctx.readFile('app.py')) ?? '';
        return ['AAA', 'BBB']
          .filter((marker) => source.includes(marker))
          .map((marker) => ({
            category: 'code' as const,
            severity: 'error' as const,
            rule: 'code/marker',
            signature: `marker:${marker}`,
            location: { file: 'app.py', startLine: 3, endLine: 3 },
            description: `Marker ${marker}`,
            data: { marker },
          }));
      },
    };
    const lowercase: Corrector = {
      category: 'code',
      canWrite: (file) => file === 'app.py',
      async plan(issue, ctx) {
        const source = (await ctx.analysis.readFile('app.py')) ?? '';
        const marker = String(issue.data?.marker);
        const start = source.indexOf('# ');
        const end = source.length - 1;
        return {
          issueId: issue.id,
          corrector: 'code',
          file: 'app.py',
          description: `Lowercase ${marker}`,
          baseContent: source,
          edits: [{ start, end, replacement: source.slice(start, end).replace(marker, marker[0].toLowerCase()) }],
        };
      },
    };

    const report = await new HealingOrchestrator({
      config: configFor(),
      launcher: new ScriptedLauncher(allRoutesOk),
      analyzers: [markers],
      correctors: { ...CORRECTORS, code: lowercase },
    }).run();

    expect(report.terminalState).toBe('Resolved');
    expect(report.iterations).toBe(2);
    expect(await readProjectFile(root, 'app.py')).toBe('from flask import Flask\napp = Flask(__name__)\n# a b\n');
    expect(report.issues.map((i) => i.status)).toEqual(['Verified', 'Verified']);
    expect(report.fixes.map((f) => [f.id, f.iteration, f.verified])).toEqual([
      ['fix-0001', 1, true],
      ['fix-0002', 2, true],
    ]);
  });

  it('should leave a file that is not valid UTF-8 byte for byte', async () => {
    const original = Buffer.concat([
      Buffer.from('from flask import Flask\napp = Flask(__name__)  \n# caf', 'utf-8'),
      Buffer.from([0xe9, 0x0a]),
    ]);
    await fs.writeFile(path.join(root, 'app.py'), original);

    const report = await new HealingOrchestrator({ config: configFor(), launcher: new ScriptedLauncher(allRoutesOk) }).run();

    expect(report.fixes).toEqual([]);
    expect(report.issues.find((i) => i.rule === 'code/trailing-whitespace')).toMatchObject({
      status: 'Failed',
      failureReason: 'File app.py is not valid UTF-8; refusing to edit it',
    });
    expect(await fs.readFile(path.join(root, 'app.py'))).toEqual(original);
  });

  it('should escalate when a critical problem survives every iteration', async () => {
    await writeProject(root, MISSING_TEMPLATE_APP);
    const sandbox = new ScriptedLauncher((config) => ({
      stdout: harnessStdout({
        passToken: config.passToken,
        startupError: "ModuleNotFoundError: No module named 'flask_mail'",
        startupTraceback: null,
        probes: [],
        authReplayed: false,
        authError: null,
      }),
    }));
    const escalate = vi.fn();

    const report = await new HealingOrchestrator({
      config: configFor({ maxIterations: 2 }),
      launcher: sandbox,
      escalationHook: { escalate },
    }).run();

    expect(report.terminalState).toBe('Escalated');
    expect(report.iterations).toBe(2);
    expect(sandbox.requests).toHaveLength(2);
    expect(escalate).toHaveBeenCalledTimes(1);
    const [{ openIssues, iteration }] = escalate.mock.calls[0];
    expect(iteration).toBe(2);
    expect(openIssues.map((i: { rule: string }) => i.rule)).toContain('code/startup-failure');
    expect(report.openIssues[0]).toMatchObject({ severity: 'critical', rule: 'code/startup-failure', file: 'app.py' });
  });

  it('should abort when no Flask application can be found', async () => {
    await writeProject(root, { 'README.md': '# nothing here\n' });

    const report = await new HealingOrchestrator({ config: configFor(), launcher: launcher() }).run();

    expect(report.terminalState).toBe('Aborted');
    expect(report.project).toBeNull();
    expect(report.iterations).toBe(0);
    expect(report.abortReason).toBe(`Detection failed for ${path.resolve(root)}: no Python sources found`);
    expect(report.transitions.map((e) => e.to)).toEqual(['Detecting', 'Aborted', 'Reported']);
  });

  it('should refuse to run twice', async () => {
    await writeProject(root, MISSING_TEMPLATE_APP);
    const orchestrator = new HealingOrchestrator({ config: configFor(), launcher: launcher() });
    await orchestrator.run();

    await expect(orchestrator.run()).rejects.toThrow('This orchestrator has already run');
  });
});
