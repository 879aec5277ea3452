import {
  ConvergenceEngine,
  createInitialContext,
  describeLoopState,
  getRunPaths,
  isDone,
  LoopStateError,
  makeRunId,
  withPhase,
  type DoneOutcome,
  type LoopConfig,
  type LoopState,
  type PhaseContext,
  type PhaseName,
  type RunPaths,
  type TaskDescriptor,
  type ValidationResult,
} from '@fixloop/core';

import { SqliteRunHistory, type RunHistory } from './history.js';
import { SpawnLauncher, type ProcessLauncher } from './launcher.js';
import { loadLoopState, saveLoopState, summarizeJob, upsertIteration, type IterationRecord } from './loopState.js';
import { PhaseRunner } from './phaseRunner.js';
import { markEnded, markPhase, markStarted, type ProgressTarget } from './progress.js';
import { loadPromptTemplates, type PromptTemplates } from './prompts.js';
import { buildReport, writeReport, type RunReport } from './report.js';
import { createRunLog, type AppendLog } from './runLog.js';
import { ValidationHarness } from './validationHarness.js';
import { WorkerPool, type JobResult, type PoolEvent } from './workerPool.js';

export type ConvergenceLoopOptions = Readonly<{
  config: LoopConfig;
  tasks: readonly TaskDescriptor[];
  runId?: string;
  /** Launcher for phase workers; defaults to spawning `config.worker.command`. */
  launcher?: ProcessLauncher;
  /** Launcher for the validation harness; defaults to spawning `config.validation.command`. */
  harnessLauncher?: ProcessLauncher;
  /** Defaults to the bundled templates, overridden by `config.promptsDir`. */
  templates?: PromptTemplates;
  /** Defaults to the SQLite store in the run directory; null disables it. */
  history?: RunHistory | null;
  appendLog?: AppendLog;
  onEvent?: (event: PoolEvent) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}>;

export type LoopOutcome = Readonly<{
  runId: string;
  outcome: DoneOutcome;
  iteration: number;
  reason: string | null;
  validation: ValidationResult | null;
  report: RunReport;
}>;

type DoneState = Extract<LoopState, { kind: 'done' }>;

function nowIso(): string {
  return new Date().toISOString();
}

function emptyRecord(iteration: number): IterationRecord {
  return { iteration, apply: [], verify: [], validation: null, guidancePath: null };
}

/**
 * Drives the repair loop: setup once, then work -> validate -> analyze per iteration until
 * the validation gate passes or the iteration ceiling is reached. State is persisted before
 * every step so a run can be resumed from any phase, and the run is finalized exactly once.
 */
export class ConvergenceLoop {
  private readonly options: ConvergenceLoopOptions;
  private readonly engine: ConvergenceEngine;
  private readonly paths: RunPaths;
  private readonly appendLog: AppendLog;
  private readonly pool: WorkerPool;
  private readonly harness: ValidationHarness;
  private readonly history: RunHistory | null;
  private currentRunId: string;
  private startedAt = nowIso();
  private iterations: IterationRecord[] = [];
  private stopReason: string | null = null;
  private started = false;
  private finalized = false;

  constructor(options: ConvergenceLoopOptions) {
    const { config } = options;
    this.options = options;
    this.engine = new ConvergenceEngine(config.maxIterations);
    this.paths = getRunPaths(config.runDir);
    this.currentRunId = options.runId ?? makeRunId();
    this.appendLog = options.appendLog ?? createRunLog(this.paths.runLog);
    this.history = options.history === undefined ? new SqliteRunHistory(this.paths.historyDb) : options.history;

    this.pool = new WorkerPool({
      workers: config.workers,
      launcher:
        options.launcher ??
        new SpawnLauncher({
          command: config.worker.command,
          args: config.worker.args,
          contextDirFlag: config.worker.contextDirFlag,
          contextDirs: config.worker.contextDirs,
          model: config.model,
          env: config.worker.env,
        }),
      pollIntervalMs: config.pollIntervalMs,
      jobTimeoutMs: config.jobTimeoutMs,
      appendLog: this.appendLog,
      onEvent: options.onEvent,
      sleep: options.sleep,
      now: options.now,
    });
    this.harness = new ValidationHarness({
      config: config.validation,
      appendLog: this.appendLog,
      launcher: options.harnessLauncher,
      pollIntervalMs: config.pollIntervalMs,
      sleep: options.sleep,
      now: options.now,
    });
  }

  get runId(): string {
    return this.currentRunId;
  }

  /**
   * Ends the run as `aborted`: running workers get SIGTERM, queued jobs are cancelled, and the
   * loop finalizes once the current phase has returned.
   */
  requestStop(reason = 'stop requested'): void {
    if (this.stopReason !== null) return;
    this.stopReason = reason;
    this.pool.requestStop();
    this.harness.requestStop();
  }

  private isStopping(): boolean {
    return this.stopReason !== null;
  }

  private log(line: string): Promise<void> {
    return this.appendLog(`[LOOP] ${line}`);
  }

  private progressTarget(): ProgressTarget {
    return {
      progressPath: this.paths.progress,
      runId: this.currentRunId,
      dbPath: this.history instanceof SqliteRunHistory ? this.history.dbPath : undefined,
    };
  }

  private claimStart(): void {
    if (this.started) {
      throw new LoopStateError('This loop has already been started', 'INVALID_TRANSITION', { runId: this.currentRunId });
    }
    this.started = true;
  }

  async run(): Promise<LoopOutcome> {
    this.claimStart();
    const context = createInitialContext({ runId: this.currentRunId, runDir: this.paths.runDir });
    return this.drive(this.engine.getStartState(), context);
  }

  /** Re-enters a previous run at `phase` of `iteration`, using the loop state in the run directory. */
  async resume(phase: PhaseName, iteration: number): Promise<LoopOutcome> {
    this.claimStart();
    const persisted = await loadLoopState(this.paths.loopState);
    if (!persisted) {
      throw new LoopStateError(`No loop state at ${this.paths.loopState}; start a new run instead`, 'INVALID_RESUME', {
        path: this.paths.loopState,
      });
    }
    const { manifestPath } = this.options.config;
    if (persisted.manifestPath !== manifestPath) {
      throw new LoopStateError(
        `Run ${persisted.runId} was started from ${persisted.manifestPath}, not ${manifestPath}; start a new run instead`,
        'INVALID_RESUME',
        { runId: persisted.runId, persistedManifest: persisted.manifestPath, manifest: manifestPath },
      );
    }
    const state = this.engine.getResumeState(phase, iteration);

    this.currentRunId = persisted.runId;
    this.startedAt = persisted.startedAt;
    this.iterations = persisted.iterations.filter((r) => r.iteration <= iteration);
    if (state.kind === 'setup' || (state.kind === 'working' && state.startPhase === 'apply_work')) {
      this.iterations = this.iterations.filter((r) => r.iteration < iteration);
    }
    if (state.kind === 'analyzing' && !this.recordFor(iteration).validation) {
      throw new LoopStateError(
        `Cannot resume analyze_failures at iteration ${iteration}: no validation result recorded for it`,
        'INVALID_RESUME',
        { phase, iteration },
      );
    }

    const context: PhaseContext = {
      ...persisted.context,
      runId: persisted.runId,
      runDir: this.paths.runDir,
      iteration,
      guidance: persisted.context.guidance.slice(0, iteration - 1),
      previousValidation: this.recordFor(iteration - 1).validation,
    };
    await this.log(`Resuming run ${persisted.runId} at ${phase} (iteration ${iteration})`);
    if (persisted.maxIterations !== this.engine.maxIterations) {
      await this.log(
        `Warning: run was started with max_iterations=${persisted.maxIterations}; continuing with ${this.engine.maxIterations}`,
      );
    }
    return this.drive(state, context);
  }

  private recordFor(iteration: number): IterationRecord {
    return this.iterations.find((r) => r.iteration === iteration) ?? emptyRecord(iteration);
  }

  private recordJobs(phase: string, iteration: number, results: readonly JobResult[]): void {
    if (!this.history || results.length === 0) return;
    this.history.jobsFinished({ runId: this.currentRunId, iteration, phase, jobs: results.map(summarizeJob) });
  }

  private async persist(state: LoopState, context: PhaseContext): Promise<void> {
    await saveLoopState(this.paths.loopState, {
      runId: this.currentRunId,
      manifestPath: this.options.config.manifestPath,
      maxIterations: this.engine.maxIterations,
      startedAt: this.startedAt,
      state,
      context,
      iterations: this.iterations,
    });
  }

  private async drive(initial: LoopState, initialContext: PhaseContext): Promise<LoopOutcome> {
    const { tasks, config } = this.options;
    const progress = this.progressTarget();
    let state = initial;
    let context = initialContext;

    let fatal: { error: unknown } | null = null;
    try {
      await markStarted(progress);
      this.history?.runStarted({ runId: this.currentRunId, taskCount: tasks.length, maxIterations: config.maxIterations });
      await this.log(
        `Run ${this.currentRunId}: ${tasks.length} task(s), workers=${config.workers}, max_iterations=${config.maxIterations}`,
      );
      const templates = this.options.templates ?? (await loadPromptTemplates(config.promptsDir));
      const phases = new PhaseRunner({ pool: this.pool, templates, workDir: config.workDir, appendLog: this.appendLog });

      while (!isDone(state)) {
        if (this.stopReason !== null) {
          await this.log(`Stopping: ${this.stopReason}`);
          state = this.engine.next(state, { type: 'abort', reason: this.stopReason });
          break;
        }
        await this.persist(state, context);
        await this.log(`State: ${describeLoopState(state)}`);

        switch (state.kind) {
          case 'setup': {
            const regenerate = state.iteration > 1;
            if (state.startPhase === 'propose_fix') {
              await markPhase(progress, 'propose_fix', state.iteration);
              const proposed = await phases.proposeFixes(tasks, context, { regenerate });
              context = proposed.context;
              this.recordJobs('propose_fix', state.iteration, proposed.results);
              if (this.isStopping()) continue;
            }
            await markPhase(progress, 'scaffold_checks', state.iteration);
            const scaffolded = await phases.scaffoldChecks(tasks, context, { regenerate });
            context = scaffolded.context;
            if (scaffolded.setup) this.recordJobs('scaffold_harness', state.iteration, [scaffolded.setup]);
            this.recordJobs('scaffold_checks', state.iteration, scaffolded.results);
            if (this.isStopping()) continue;

            state = this.engine.next(state, { type: 'setup_complete' });
            context = { ...context, iteration: state.iteration };
            break;
          }

          case 'working': {
            await markPhase(progress, state.startPhase, state.iteration);
            const work = await phases.runWork(tasks, context, state.startPhase);
            const previous = this.recordFor(state.iteration);
            this.iterations = upsertIteration(this.iterations, {
              iteration: state.iteration,
              apply: state.startPhase === 'apply_work' ? work.apply.map(summarizeJob) : previous.apply,
              verify: work.verify.map(summarizeJob),
              validation: null,
              guidancePath: null,
            });
            this.recordJobs('apply_work', state.iteration, work.apply);
            this.recordJobs('verify_work', state.iteration, work.verify);
            if (this.isStopping()) continue;

            state = this.engine.next(state, { type: 'work_complete' });
            break;
          }

          case 'evaluating': {
            await markPhase(progress, 'run_validation', state.iteration);
            const { validation, job } = await this.harness.run(withPhase(context, 'run_validation'));
            if (this.isStopping()) continue;

            this.recordJobs('run_validation', state.iteration, [job]);
            this.history?.iterationValidated({ runId: this.currentRunId, iteration: state.iteration, validation });
            this.iterations = upsertIteration(this.iterations, { ...this.recordFor(state.iteration), validation });
            context = { ...context, previousValidation: validation };
            state = this.engine.next(state, { type: 'validated', validation });
            break;
          }

          case 'analyzing': {
            const record = this.recordFor(state.iteration);
            const validation = record.validation;
            if (!validation) {
              throw new LoopStateError(`No validation result for iteration ${state.iteration}`, 'INVALID_TRANSITION', {
                iteration: state.iteration,
              });
            }
            await markPhase(progress, 'analyze_failures', state.iteration);
            const analysis = await phases.analyzeFailures(tasks, context, validation);
            this.recordJobs('analyze_failures', state.iteration, [analysis.result]);
            this.iterations = upsertIteration(this.iterations, { ...record, guidancePath: analysis.guidancePath });
            if (this.isStopping()) continue;

            state = this.engine.next(state, { type: 'analysis_complete' });
            context = {
              ...context,
              iteration: state.iteration,
              guidance: [...context.guidance, analysis.guidance],
              previousValidation: validation,
            };
            break;
          }
        }
      }
    } catch (error) {
      fatal = { error };
      const reason = error instanceof Error ? error.message : String(error);
      state = { kind: 'done', iteration: state.iteration, outcome: 'aborted', reason };
    }

    if (!isDone(state)) {
      throw new LoopStateError(`Loop ended outside a done state (${describeLoopState(state)})`, 'INVALID_TRANSITION');
    }

    try {
      const outcome = await this.finalize(state, context);
      if (fatal) throw fatal.error;
      return outcome;
    } catch (finalizeError) {
      if (fatal && finalizeError !== fatal.error) {
        // the error that aborted the run takes precedence over a failure to write its report
        const msg = finalizeError instanceof Error ? finalizeError.message : String(finalizeError);
        await this.log(`Finalize failed: ${msg}`);
        throw fatal.error;
      }
      throw finalizeError;
    }
  }

  private async finalize(state: DoneState, context: PhaseContext): Promise<LoopOutcome> {
    if (this.finalized) {
      throw new LoopStateError('Loop already finalized', 'INVALID_TRANSITION', { runId: this.currentRunId });
    }
    this.finalized = true;

    if (state.outcome === 'aborted') await this.log(`Aborted: ${state.reason ?? 'unknown reason'}`);
    await this.persist(state, context);

    const report = buildReport({
      runId: this.currentRunId,
      outcome: state.outcome,
      reason: state.reason,
      iteration: state.iteration,
      maxIterations: this.engine.maxIterations,
      startedAt: this.startedAt,
      tasks: this.options.tasks,
      iterations: this.iterations,
    });
    const { markdownPath } = await writeReport(this.paths.runDir, report);
    this.history?.runFinished({ runId: this.currentRunId, outcome: state.outcome, lastIteration: state.iteration });
    await markEnded(this.progressTarget(), state.outcome);
    await this.log(`Finished: ${describeLoopState(state)}; report at ${markdownPath}`);

    return {
      runId: this.currentRunId,
      outcome: state.outcome,
      iteration: state.iteration,
      reason: state.reason ?? null,
      validation: report.finalValidation,
      report,
    };
  }
}
