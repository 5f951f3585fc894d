/**
 * Validation runner: launches the healed project in the sandbox and turns
 * what it observes into issue drafts.
 */

import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { AnalysisContext } from '../analyzers/context.js';
import { FindingCollector } from '../analyzers/shared.js';
import { ValidationTimeout } from '../types/errors.js';
import type { IssueCategory, IssueDraft, IssueLocation } from '../types/issue.js';
import type { RouteProbe, ValidationSummary } from '../types/report.js';
import {
  buildHarnessConfig,
  harnessScriptPath,
  parseHarnessOutput,
  probeRoutes,
  type HarnessProbe,
} from './harness.js';
import { attributeCategory, attributeLocation, exceptionSummary } from './failure-attribution.js';
import { ChildProcessLauncher, type LaunchResult, type ProcessLauncher } from './sandbox.js';

export interface ValidationRunnerOptions {
  pythonExecutable: string;
  timeoutMs: number;
  simulateAuth: boolean;
  launcher?: ProcessLauncher;
  /** Location of the harness script; defaults to the shipped one */
  harnessPath?: string;
}

export interface ValidationOutcome {
  summary: ValidationSummary;
  drafts: IssueDraft[];
  timeout: ValidationTimeout | null;
  /** Set when the sandbox could not be started at all */
  launchError: string | null;
  /** A newer pass started before this one finished; discard the result */
  stale: boolean;
}

interface FailureGroup {
  category: IssueCategory;
  summary: string;
  location: IssueLocation;
  routes: string[];
}

export class ValidationRunner {
  private readonly launcher: ProcessLauncher;
  private passToken = 0;
  private controller: AbortController | null = null;

  constructor(private readonly options: ValidationRunnerOptions) {
    this.launcher = options.launcher ?? new ChildProcessLauncher();
  }

  /**
   * Cancel the pass in flight, if any. Its result will be reported stale.
   */
  cancel(): void {
    this.passToken += 1;
    this.controller?.abort();
    this.controller = null;
  }

  /**
   * Write the harness config to a temp dir and run the harness against it
   */
  private async launchHarness(config: string, cwd: string, signal: AbortSignal): Promise<LaunchResult> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'mender-validate-'));
    try {
      const configPath = path.join(workDir, 'config.json');
      await fs.writeFile(configPath, config, 'utf-8');
      return await this.launcher.launch({
        executable: this.options.pythonExecutable,
        args: [this.options.harnessPath ?? harnessScriptPath(), configPath],
        cwd,
        timeoutMs: this.options.timeoutMs,
        signal,
        env: { ...process.env, PYTHONDONTWRITEBYTECODE: '1' },
      });
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  async validate(ctx: AnalysisContext, iteration: number): Promise<ValidationOutcome> {
    this.cancel();
    const token = this.passToken;
    const controller = new AbortController();
    this.controller = controller;

    const { project } = ctx;
    const index = await ctx.index();
    const plan = probeRoutes(index.routes, index.blueprints, index.registrations);
    const config = buildHarnessConfig({
      project,
      routes: plan.routes,
      simulateAuth: this.options.simulateAuth,
      passToken: token,
    });

    let launch: LaunchResult;
    try {
      launch = await this.launchHarness(JSON.stringify(config), project.root, controller.signal);
    } finally {
      if (this.controller === controller) this.controller = null;
    }

    const summary: ValidationSummary = {
      iteration,
      passToken: token,
      success: false,
      timedOut: launch.timedOut,
      exitCode: launch.exitCode,
      durationMs: launch.durationMs,
      probes: [],
      skippedRoutes: plan.skipped,
      issuesRaised: [],
      authReplayed: false,
    };
    const outcome: ValidationOutcome = { summary, drafts: [], timeout: null, launchError: null, stale: false };

    if (launch.aborted || token !== this.passToken) {
      outcome.stale = true;
      return outcome;
    }

    const collector = new FindingCollector(ctx.ruleset, 'validation');
    const entryLocation: IssueLocation = {
      file: project.entryPoint.file,
      startLine: project.entryPoint.line,
      endLine: project.entryPoint.line,
    };

    if (launch.spawnError) {
      outcome.launchError = `Could not launch ${this.options.pythonExecutable}: ${launch.spawnError}`;
      return outcome;
    }

    if (launch.timedOut) {
      const timeout = new ValidationTimeout(this.options.timeoutMs, `${launch.stdout}${launch.stderr}`);
      outcome.timeout = timeout;
      collector.add({
        rule: 'code/validation-timeout',
        signature: 'validation-timeout',
        location: entryLocation,
        description: timeout.message,
        data: { timeoutMs: this.options.timeoutMs },
      });
      outcome.drafts = collector.results();
      return outcome;
    }

    const result = parseHarnessOutput(launch.stdout);
    if (!result || result.passToken !== token) {
      const output = launch.stderr || launch.stdout;
      const category = attributeCategory(output);
      const reason = exceptionSummary(output);
      collector.add({
        rule: `${category}/startup-failure`,
        signature: `startup-failure:${reason}`,
        location: attributeLocation(output, project.root) ?? entryLocation,
        description: `Validation process exited with code ${launch.exitCode ?? 'none'}: ${reason}`,
      });
      outcome.drafts = collector.results();
      return outcome;
    }

    summary.authReplayed = result.authReplayed;
    summary.probes = result.probes.map(toRouteProbe);

    if (result.startupError) {
      const traceback = result.startupTraceback ?? result.startupError;
      const category = attributeCategory(traceback);
      collector.add({
        rule: `${category}/startup-failure`,
        signature: `startup-failure:${result.startupError}`,
        location: attributeLocation(traceback, project.root) ?? entryLocation,
        description: `Application failed to start: ${result.startupError}`,
      });
      outcome.drafts = collector.results();
      return outcome;
    }

    const groups = new Map<string, FailureGroup>();
    for (const probe of result.probes) {
      const group = failureOf(probe, project.root, entryLocation);
      if (!group) continue;
      const key = `${group.category}|${group.summary}|${group.location.file}:${group.location.startLine}`;
      const existing = groups.get(key);
      const label = `GET ${probe.path}${probe.authenticated ? ' (authenticated)' : ''}`;
      if (existing) existing.routes.push(label);
      else groups.set(key, { ...group, routes: [label] });
    }
    if (result.authError) {
      const category = attributeCategory(result.authError);
      groups.set(`auth|${result.authError}`, {
        category,
        summary: result.authError,
        location: entryLocation,
        routes: [`POST ${config.login?.path ?? 'login'}`],
      });
    }

    for (const group of groups.values()) {
      collector.add({
        rule: `${group.category}/runtime-error`,
        signature: `runtime-error:${group.summary}`,
        location: group.location,
        description: `${group.routes.join(', ')} failed: ${group.summary}`,
        data: { routes: group.routes },
      });
    }

    outcome.drafts = collector.results();
    summary.success = groups.size === 0 && launch.exitCode === 0;
    return outcome;
  }
}

function toRouteProbe(probe: HarnessProbe): RouteProbe {
  return {
    path: probe.path,
    authenticated: probe.authenticated,
    status: probe.status,
    error: probe.error,
    traceback: probe.traceback,
  };
}

function failureOf(probe: HarnessProbe, root: string, fallback: IssueLocation): Omit<FailureGroup, 'routes'> | null {
  if (probe.error) {
    const traceback = probe.traceback ?? probe.error;
    return {
      category: attributeCategory(traceback),
      summary: probe.error,
      location: attributeLocation(traceback, root) ?? fallback,
    };
  }
  if (probe.status !== null && probe.status >= 500) {
    return { category: 'code', summary: `HTTP ${probe.status} from ${probe.path}`, location: fallback };
  }
  return null;
}
