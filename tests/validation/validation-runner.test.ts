import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { AnalysisContext } from '../../src/analyzers/context.js';
import { detectProject } from '../../src/detection/project-detector.js';
import { ValidationRunner } from '../../src/validation/validation-runner.js';
import { ValidationTimeout } from '../../src/types/errors.js';
import type { FrozenProjectModel } from '../../src/types/project.js';
import {
  ScriptedLauncher,
  allRoutesOk,
  harnessStdout,
  okProbe,
  templateAwareLauncher,
} from '../helpers/fake-launcher.js';
import { MISSING_TEMPLATE_APP, defaultRuleset, makeTempDir, writeProject } from '../helpers/project.js';

const ENTRY = { file: 'app.py', startLine: 3, endLine: 3 };

describe('ValidationRunner', () => {
  let root: string;
  let project: FrozenProjectModel;

  beforeEach(async () => {
    root = await makeTempDir();
    await writeProject(root, MISSING_TEMPLATE_APP);
    project = await detectProject(root);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function runnerWith(launcher: ScriptedLauncher): ValidationRunner {
    return new ValidationRunner({ pythonExecutable: 'python3', timeoutMs: 5000, simulateAuth: true, launcher });
  }

  function context(): AnalysisContext {
    return new AnalysisContext(project, defaultRuleset());
  }

  it('should pass the harness the probed routes and report success', async () => {
    const launcher = new ScriptedLauncher(allRoutesOk);
    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(launcher.configs[0]).toEqual({
      root: project.root,
      module: 'app',
      symbol: 'app',
      kind: 'instance',
      routes: ['/', '/missing'],
      login: null,
      passToken: 1,
    });
    expect(launcher.requests[0].executable).toBe('python3');
    expect(launcher.requests[0].cwd).toBe(project.root);
    expect(outcome.drafts).toEqual([]);
    expect(outcome.stale).toBe(false);
    expect(outcome.summary.success).toBe(true);
    expect(outcome.summary.probes.map((p) => p.status)).toEqual([200, 200]);
  });

  it('should remove the temporary config after launching', async () => {
    const launcher = new ScriptedLauncher(allRoutesOk);
    await runnerWith(launcher).validate(context(), 1);

    await expect(fs.access(launcher.requests[0].args[1])).rejects.toThrow();
  });

  it('should turn a failing route into a runtime-error draft at the innermost project frame', async () => {
    const launcher = templateAwareLauncher({ '/missing': 'missing.html' }, () => false);
    const outcome = await runnerWith(launcher).validate(context(), 2);

    expect(outcome.summary.success).toBe(false);
    expect(outcome.drafts).toEqual([
      {
        category: 'templating',
        severity: 'error',
        rule: 'templating/runtime-error',
        signature: 'runtime-error:jinja2.exceptions.TemplateNotFound: missing.html',
        location: { file: 'app.py', startLine: 13, endLine: 13 },
        description: 'GET /missing failed: jinja2.exceptions.TemplateNotFound: missing.html',
        origin: 'validation',
        data: { routes: ['GET /missing'] },
      },
    ]);
  });

  it('should group the same failure across anonymous and authenticated probes', async () => {
    const failing = { status: null, error: 'ZeroDivisionError: division by zero', traceback: null };
    const launcher = new ScriptedLauncher((config) => ({
      stdout: harnessStdout({
        passToken: config.passToken,
        startupError: null,
        startupTraceback: null,
        probes: [
          okProbe('/'),
          { path: '/missing', authenticated: false, ...failing },
          { path: '/missing', authenticated: true, ...failing },
        ],
        authReplayed: true,
        authError: null,
      }),
    }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.summary.authReplayed).toBe(true);
    expect(outcome.drafts).toHaveLength(1);
    expect(outcome.drafts[0].rule).toBe('code/runtime-error');
    expect(outcome.drafts[0].location).toEqual(ENTRY);
    expect(outcome.drafts[0].description).toBe(
      'GET /missing, GET /missing (authenticated) failed: ZeroDivisionError: division by zero'
    );
  });

  it('should report server errors without an exception', async () => {
    const launcher = new ScriptedLauncher((config) => ({
      stdout: harnessStdout({
        passToken: config.passToken,
        startupError: null,
        startupTraceback: null,
        probes: [{ path: '/', authenticated: false, status: 500, error: null, traceback: null }],
        authReplayed: false,
        authError: null,
      }),
    }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.drafts.map((d) => [d.rule, d.signature])).toEqual([['code/runtime-error', 'runtime-error:HTTP 500 from /']]);
  });

  it('should raise a critical startup failure at the entry point', async () => {
    const launcher = new ScriptedLauncher((config) => ({
      stdout: harnessStdout({
        passToken: config.passToken,
        startupError: "ModuleNotFoundError: No module named 'flask_mail'",
        startupTraceback: null,
        probes: [],
        authReplayed: false,
        authError: null,
      }),
    }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.drafts).toEqual([
      {
        category: 'code',
        severity: 'critical',
        rule: 'code/startup-failure',
        signature: "startup-failure:ModuleNotFoundError: No module named 'flask_mail'",
        location: ENTRY,
        description: "Application failed to start: ModuleNotFoundError: No module named 'flask_mail'",
        origin: 'validation',
      },
    ]);
  });

  it('should attribute a crash without a result line from stderr', async () => {
    const launcher = new ScriptedLauncher(() => ({
      exitCode: 1,
      stderr: 'Traceback (most recent call last):\nsqlalchemy.exc.OperationalError: no such table: user\n',
    }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.drafts).toHaveLength(1);
    expect(outcome.drafts[0]).toMatchObject({
      rule: 'persistence/startup-failure',
      signature: 'startup-failure:sqlalchemy.exc.OperationalError: no such table: user',
      location: ENTRY,
      description: 'Validation process exited with code 1: sqlalchemy.exc.OperationalError: no such table: user',
    });
  });

  it('should raise a timeout issue when the sandbox runs out of time', async () => {
    const launcher = new ScriptedLauncher(() => ({ exitCode: null, signal: 'SIGKILL', timedOut: true }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.timeout).toBeInstanceOf(ValidationTimeout);
    expect(outcome.summary.timedOut).toBe(true);
    expect(outcome.drafts.map((d) => [d.rule, d.description])).toEqual([
      ['code/validation-timeout', 'Validation sandbox timed out after 5000ms'],
    ]);
  });

  it('should report a launch error without raising issues when the interpreter is missing', async () => {
    const launcher = new ScriptedLauncher(() => ({ exitCode: null, spawnError: 'spawn python3 ENOENT' }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.launchError).toBe('Could not launch python3: spawn python3 ENOENT');
    expect(outcome.drafts).toEqual([]);
    expect(outcome.summary.success).toBe(false);
  });

  it('should mark a pass stale when a newer pass was requested meanwhile', async () => {
    let runner: ValidationRunner | null = null;
    const launcher = new ScriptedLauncher((config) => {
      runner?.cancel();
      return allRoutesOk(config);
    });
    runner = runnerWith(launcher);

    const outcome = await runner.validate(context(), 1);

    expect(outcome.stale).toBe(true);
    expect(outcome.drafts).toEqual([]);
    expect(outcome.summary.success).toBe(false);
  });

  it('should ignore a result line from an older pass', async () => {
    const launcher = new ScriptedLauncher((config) => ({
      ...allRoutesOk({ ...config, passToken: config.passToken + 7 }),
      exitCode: 0,
    }));

    const outcome = await runnerWith(launcher).validate(context(), 1);

    expect(outcome.drafts.map((d) => d.rule)).toEqual(['code/startup-failure']);
  });
});
