/**
 * Healing orchestrator
 * Drives detection, diagnosis, healing and validation through the state
 * machine until the project is resolved or the iteration bound is reached.
 */

import path from 'node:path';
import { ANALYZERS, AnalysisContext, runAnalyzers, type Analyzer } from '../analyzers/index.js';
import { CORRECTORS, planFixes } from '../correctors/index.js';
import type { Corrector, CorrectorContext } from '../correctors/corrector.js';
import { RevisionChain } from '../correctors/persistence.js';
import { detectProject } from '../detection/project-detector.js';
import { PresetManager } from '../presets/preset-manager.js';
import { resolveStateDir, type Config } from '../config/index.js';
import { BackupStore } from '../state/backup-store.js';
import { getStatePaths, type StatePaths } from '../state/persistence.js';
import { IssueRegistry, PLANNABLE_STATUSES, isNewProblem, type RecordOutcome } from '../state/registry.js';
import { MenderError, isFatalError } from '../types/errors.js';
import { isAboveWarning, type Issue, type IssueCategory } from '../types/issue.js';
import type { FrozenProjectModel } from '../types/project.js';
import type { ResolvedRuleset } from '../types/rules.js';
import type {
  OrchestratorState,
  RunReport,
  TerminalState,
  TransitionEvent,
  ValidationSummary,
} from '../types/report.js';
import { ValidationRunner } from '../validation/validation-runner.js';
import type { ProcessLauncher } from '../validation/sandbox.js';
import { applyPlannedFixes } from './fix-applier.js';
import { KeyedLock } from './file-locks.js';
import { HealingLogger } from './healing-logger.js';
import { buildRunReport, summarizeProject, writeRunReport } from './run-report.js';
import { canTransition, decideAfterValidation, transitionState } from './state-machine.js';

/**
 * Called once when a run ends Escalated. Where a human or an external
 * assistant would take over.
 */
export interface EscalationHook {
  escalate(context: { openIssues: Issue[]; iteration: number; root: string }): void | Promise<void>;
}

export type TransitionListener = (event: TransitionEvent) => void;

export interface HealingOrchestratorOptions {
  config: Config;
  presets?: PresetManager;
  launcher?: ProcessLauncher;
  analyzers?: readonly Analyzer[];
  correctors?: Readonly<Record<IssueCategory, Corrector>>;
  escalationHook?: EscalationHook;
  logger?: HealingLogger;
  now?: () => Date;
}

interface PassResult {
  newProblems: number;
  validationSucceeded: boolean;
}

export class HealingOrchestrator {
  private state: OrchestratorState = 'Idle';
  private seq = 0;
  private iteration = 0;
  private readonly events: TransitionEvent[] = [];
  private readonly listeners = new Set<TransitionListener>();
  private readonly validations: ValidationSummary[] = [];

  private readonly config: Config;
  private readonly root: string;
  private readonly paths: StatePaths;
  private readonly now: () => Date;
  private readonly registry: IssueRegistry;
  private readonly backups: BackupStore;
  private readonly logger: HealingLogger;
  private readonly presets: PresetManager;
  private readonly runner: ValidationRunner;
  private readonly analyzers: readonly Analyzer[];
  private readonly correctors: Readonly<Record<IssueCategory, Corrector>>;
  private readonly locks = new KeyedLock();
  private fixCounter = 0;
  /** Issues whose fix lost a collision in the current iteration */
  private readonly deferred = new Set<string>();

  constructor(private readonly options: HealingOrchestratorOptions) {
    this.config = options.config;
    this.root = path.resolve(options.config.rootPath);
    this.paths = getStatePaths(resolveStateDir(options.config));
    this.now = options.now ?? (() => new Date());
    this.registry = new IssueRegistry({ ledgerPath: this.paths.ledger, now: this.now });
    this.backups = new BackupStore(this.root, this.paths, { now: this.now });
    this.logger =
      options.logger ?? new HealingLogger(this.paths.log, { verbose: options.config.output.verbose, now: this.now });
    this.presets = options.presets ?? new PresetManager();
    this.runner = new ValidationRunner({
      pythonExecutable: options.config.pythonExecutable,
      timeoutMs: options.config.sandboxTimeoutMs,
      simulateAuth: options.config.simulateAuth,
      launcher: options.launcher,
    });
    this.analyzers = options.analyzers ?? ANALYZERS;
    this.correctors = options.correctors ?? CORRECTORS;
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  /**
   * Subscribe to state transitions. Returns an unsubscribe function.
   */
  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private transition(to: OrchestratorState): void {
    const from = this.state;
    this.state = transitionState(from, to);
    this.seq += 1;
    const event: TransitionEvent = { seq: this.seq, from, to, at: this.now().toISOString(), iteration: this.iteration };
    this.events.push(event);
    for (const listener of this.listeners) listener(event);
  }

  /**
   * Run the full pipeline once and return the frozen report.
   */
  async run(): Promise<RunReport> {
    if (this.state !== 'Idle') throw new MenderError('This orchestrator has already run');

    const started = this.now();
    let project: FrozenProjectModel | null = null;
    let presetName: string | null = null;
    let terminal: TerminalState;
    let abortReason: string | null = null;

    try {
      this.transition('Detecting');
      await this.logger.stageStart('detecting', `Detecting Flask project in ${this.root}`);
      await this.registry.load();
      await this.backups.load();
      this.fixCounter = this.registry.listFixes().length;

      const ruleset = await this.presets.resolve(this.config.preset, this.config.ruleOverrides, {
        maxLineLength: this.config.maxLineLength,
        minConfidence: this.config.minConfidence,
      });
      presetName = ruleset.presetName;
      if (ruleset.unknownOverrideKeys.length > 0) {
        await this.logger.warn('detecting', 'unknown_rules', `Ignoring unknown rule overrides: ${ruleset.unknownOverrideKeys.join(', ')}`);
      }

      project = await detectProject(this.root, { stateDir: this.config.stateDir });
      await this.logger.stageComplete('detecting', `Entry point ${project.entryPoint.file}:${project.entryPoint.symbol}`, {
        architecture: project.architecturePattern,
        confidence: project.confidence,
      });

      terminal = await this.healLoop(project, ruleset);
    } catch (error) {
      if (!isFatalError(error) || !canTransition(this.state, 'Aborted')) throw error;
      abortReason = error.message;
      terminal = 'Aborted';
      await this.logger.error(stageOf(this.state), 'aborted', error.message);
    }

    this.transition(terminal);
    if (terminal === 'Escalated') {
      await this.options.escalationHook?.escalate({
        openIssues: this.registry.open(),
        iteration: this.iteration,
        root: this.root,
      });
    }
    this.transition('Reported');

    const finished = this.now();
    const report = buildRunReport({
      root: this.root,
      project: project ? summarizeProject(project) : null,
      preset: presetName,
      terminalState: terminal,
      iterations: this.iteration,
      maxIterations: this.config.maxIterations,
      dryRun: this.config.dryRun,
      startedAt: started.toISOString(),
      finishedAt: finished.toISOString(),
      durationMs: Math.max(0, finished.getTime() - started.getTime()),
      issues: this.registry.list(),
      fixes: this.registry.listFixes(),
      transitions: [...this.events],
      validations: [...this.validations],
      abortReason,
      remainingBackups: this.backups.remaining(),
    });

    await this.persist();
    if (this.config.output.writeReports) {
      const written = await writeRunReport(report, this.paths.reportsDir);
      await this.logger.info('reporting', 'report_written', `Report written to ${written.markdown}`);
    }
    await this.logger.stageComplete('reporting', `Run finished ${terminal}`, { openIssues: report.openIssues.length });
    return report;
  }

  private async healLoop(project: FrozenProjectModel, ruleset: ResolvedRuleset): Promise<TerminalState> {
    for (;;) {
      this.iteration += 1;
      const iteration = this.iteration;

      this.transition('Diagnosing');
      const diagnosis = new AnalysisContext(project, ruleset);
      const found = await this.analyze(diagnosis, iteration);
      await this.logger.info('diagnosing', 'issues_recorded', `Iteration ${iteration}: ${found.length} finding(s)`, {
        new: found.filter((o) => isNewProblem(o.kind)).length,
      });

      this.transition('Healing');
      await this.heal(diagnosis, iteration);
      await this.persist();

      this.transition('Validating');
      if (this.config.dryRun) {
        return this.openAboveWarning() === 0 ? 'Resolved' : 'PartialFailure';
      }
      const pass = await this.validate(project, ruleset, iteration);
      await this.persist();

      const open = this.registry.open();
      const next = decideAfterValidation({
        newIssues: pass.newProblems,
        openCritical: open.filter((i) => i.severity === 'critical').length,
        openAboveWarning: open.filter((i) => isAboveWarning(i.severity)).length,
        pendingRetries: open.filter((i) => this.deferred.has(i.id)).length,
        validationSucceeded: pass.validationSucceeded,
        iteration,
        maxIterations: this.config.maxIterations,
      });
      if (next !== 'Diagnosing') return next;
    }
  }

  /** Dry runs never touch the ledger on disk */
  private async persist(): Promise<void> {
    if (!this.config.dryRun) await this.registry.save();
  }

  private async analyze(ctx: AnalysisContext, iteration: number): Promise<RecordOutcome[]> {
    const analysis = await runAnalyzers(ctx, this.analyzers);
    for (const error of analysis.errors) {
      await this.logger.warn('diagnosing', 'analyzer_failed', error.message);
    }
    return this.registry.recordAll(analysis.drafts, iteration);
  }

  private async heal(ctx: AnalysisContext, iteration: number): Promise<void> {
    const plannable = this.registry.list({ status: [...PLANNABLE_STATUSES] });
    const index = await ctx.index();
    const correctorCtx: CorrectorContext = {
      analysis: ctx,
      index,
      now: this.now(),
      migrationHeads: [...index.migrations.heads],
    };
    const planning = await planFixes(plannable, correctorCtx, this.correctors);
    this.deferred.clear();

    for (const plan of planning.accepted) await this.markPlanned(plan.issueId, iteration);
    for (const { plan, error } of planning.conflicts) {
      await this.markPlanned(plan.issueId, iteration);
      await this.registry.transition(plan.issueId, 'Failed', iteration, error.message);
      this.deferred.add(plan.issueId);
      await this.logger.warn('healing', 'fix_conflict', error.message);
    }
    for (const { issue, reason } of planning.rejected) {
      if (issue.status !== 'Failed') await this.registry.transition(issue.id, 'Failed', iteration, reason);
      await this.logger.warn('healing', 'fix_rejected', `${issue.rule}: ${reason}`);
    }

    const outcomes = await applyPlannedFixes(planning.accepted, {
      root: this.root,
      backups: this.backups,
      iteration,
      locks: this.locks,
      now: this.now,
      dryRun: this.config.dryRun,
      revisions: new RevisionChain(ctx.versionsDir(), index.migrations.heads),
      nextFixId: () => {
        this.fixCounter += 1;
        return `fix-${String(this.fixCounter).padStart(4, '0')}`;
      },
    });

    let applied = 0;
    for (const outcome of outcomes) {
      if (outcome.fix) {
        await this.registry.addFix(outcome.fix);
        if (outcome.fix.applied) {
          applied += 1;
          await this.registry.transition(outcome.plan.issueId, 'Applied', iteration, outcome.fix.id);
        }
        await this.logger.debug('healing', 'fix', outcome.fix.description, { file: outcome.fix.file, diff: outcome.fix.diff });
      } else {
        const reason = outcome.error?.message ?? 'fix failed';
        await this.registry.transition(outcome.plan.issueId, 'Failed', iteration, reason);
        await this.logger.warn('healing', 'fix_failed', `${outcome.plan.file}: ${reason}`);
      }
    }

    const summary = this.config.dryRun ? `Previewed ${outcomes.length} fix(es)` : `Applied ${applied} fix(es)`;
    await this.logger.info('healing', 'fixes_applied', summary, {
      conflicts: planning.conflicts.length,
      rejected: planning.rejected.length,
      unfixable: planning.unfixable.length,
    });
  }

  private async markPlanned(issueId: string, iteration: number): Promise<void> {
    const issue = this.registry.get(issueId);
    if (issue && issue.status !== 'Planned') await this.registry.transition(issueId, 'Planned', iteration);
  }

  private async validate(project: FrozenProjectModel, ruleset: ResolvedRuleset, iteration: number): Promise<PassResult> {
    const ctx = new AnalysisContext(project, ruleset);
    const analysis = await this.analyze(ctx, iteration);
    const validation = await this.runner.validate(ctx, iteration);

    if (validation.stale) {
      await this.logger.warn('validating', 'stale_pass', `Discarded stale validation pass ${validation.summary.passToken}`);
      return { newProblems: analysis.filter((o) => isNewProblem(o.kind)).length, validationSucceeded: false };
    }
    if (validation.launchError) {
      await this.logger.warn('validating', 'sandbox_unavailable', validation.launchError);
    }

    const runtime = await this.registry.recordAll(validation.drafts, iteration);
    validation.summary.issuesRaised = runtime.map((o) => o.issue.id);
    this.validations.push(validation.summary);

    if (validation.summary.success) {
      const verified = [
        ...(await this.registry.reconcile(new Set(analysis.map((o) => o.issue.id)), 'analysis', iteration)),
        ...(await this.registry.reconcile(new Set(runtime.map((o) => o.issue.id)), 'validation', iteration)),
      ];
      await this.registry.verifyFixesFor(new Set(verified.map((issue) => issue.id)));
      await this.logger.success('validating', 'pass_succeeded', `Validation passed; ${verified.length} issue(s) verified`);
    } else {
      await this.logger.warn('validating', 'pass_failed', `Validation found ${validation.drafts.length} runtime problem(s)`, {
        timedOut: validation.summary.timedOut,
      });
    }

    const newProblems = [...analysis, ...runtime].filter((o) => isNewProblem(o.kind)).length;
    return { newProblems, validationSucceeded: validation.summary.success };
  }

  private openAboveWarning(): number {
    return this.registry.open().filter((issue) => isAboveWarning(issue.severity)).length;
  }
}

function stageOf(state: OrchestratorState): 'detecting' | 'healing' | 'validating' {
  if (state === 'Healing') return 'healing';
  if (state === 'Validating') return 'validating';
  return 'detecting';
}
