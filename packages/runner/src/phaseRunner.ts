import fs from 'node:fs/promises';

import {
  getCheckPath,
  getGuidancePath,
  getJobLogPath,
  getPlanPath,
  getRunPaths,
  withPhase,
  type JobSpec,
  type PhaseContext,
  type PhaseName,
  type TaskDescriptor,
  type ValidationResult,
  type WorkPhase,
} from '@fixloop/core';

import { pathExists, writeTextAtomic } from './atomicWrite.js';
import {
  analyzeFailuresPayload,
  applyWorkPayload,
  fallbackGuidance,
  proposeFixPayload,
  scaffoldChecksPayload,
  scaffoldHarnessPayload,
  verifyWorkPayload,
  type PayloadInputs,
  type PromptTemplates,
} from './prompts.js';
import type { AppendLog } from './runLog.js';
import type { JobResult, PipelineStage, WorkerPool } from './workerPool.js';

/** Identities of the queue-wide jobs; the manifest rejects task identities starting with `_`. */
export const HARNESS_TASK_ID = '_harness';
export const ANALYSIS_TASK_ID = '_analysis';

export type PhaseRunnerOptions = Readonly<{
  pool: WorkerPool;
  templates: PromptTemplates;
  workDir: string;
  appendLog: AppendLog;
}>;

export type SetupOptions = Readonly<{
  /** Discard existing artifacts and regenerate them instead of skipping tasks that have one. */
  regenerate: boolean;
}>;

export type SetupOutcome = Readonly<{
  context: PhaseContext;
  results: JobResult[];
  skipped: string[];
}>;

export type ScaffoldOutcome = SetupOutcome & Readonly<{ setup: JobResult | null }>;

export type WorkOutcome = Readonly<{
  apply: JobResult[];
  verify: JobResult[];
}>;

export type AnalysisOutcome = Readonly<{
  guidance: string;
  guidancePath: string;
  result: JobResult;
  /** False when the worker left no guidance file and a summary of the failures was used instead. */
  fromWorker: boolean;
}>;

async function isNonEmptyDir(dir: string): Promise<boolean> {
  const entries = await fs.readdir(dir).catch(() => []);
  return entries.length > 0;
}

function pseudoTask(identity: string, sourceLocation: string, category: string): TaskDescriptor {
  return Object.freeze({ identity, sourceLocation, category, originalIdentity: identity });
}

/**
 * Runs one phase at a time over the task queue, delegating every worker invocation to the pool.
 * Builders read the PhaseContext their stage carries and never touch the filesystem.
 */
export class PhaseRunner {
  private readonly options: PhaseRunnerOptions;

  constructor(options: PhaseRunnerOptions) {
    this.options = options;
  }

  private log(phase: PhaseName, line: string): Promise<void> {
    return this.options.appendLog(`[PHASE ${phase}] ${line}`);
  }

  private inputs(context: PhaseContext): PayloadInputs {
    return { templates: this.options.templates, context, workDir: this.options.workDir };
  }

  private spec(context: PhaseContext, task: TaskDescriptor, payload: string, extraContext: readonly string[]): JobSpec {
    return {
      payload,
      workingDirectory: this.options.workDir,
      logPath: getJobLogPath(context.runDir, context.phase, task.identity, context.iteration),
      label: `${context.phase}:${task.identity}`,
      extraContext,
    };
  }

  private async partitionBySetupArtifact(
    phase: PhaseName,
    tasks: readonly TaskDescriptor[],
    artifactFor: (task: TaskDescriptor) => string,
    options: SetupOptions,
  ): Promise<{ toRun: TaskDescriptor[]; skipped: string[] }> {
    const toRun: TaskDescriptor[] = [];
    const skipped: string[] = [];
    for (const task of tasks) {
      const artifact = artifactFor(task);
      if (options.regenerate) {
        await fs.rm(artifact, { force: true });
        toRun.push(task);
      } else if (await pathExists(artifact)) {
        skipped.push(task.identity);
      } else {
        toRun.push(task);
      }
    }
    if (skipped.length > 0) {
      await this.log(phase, `Skipping ${skipped.length} task(s) with an existing artifact: ${skipped.join(', ')}`);
    }
    return { toRun, skipped };
  }

  private async collectArtifacts(
    tasks: readonly TaskDescriptor[],
    artifactFor: (task: TaskDescriptor) => string,
    existing: Readonly<Record<string, string>>,
  ): Promise<Record<string, string>> {
    const out: Record<string, string> = { ...existing };
    for (const task of tasks) {
      const artifact = artifactFor(task);
      if (await pathExists(artifact)) out[task.identity] = artifact;
      else delete out[task.identity];
    }
    return out;
  }

  private async summarize(phase: PhaseName, results: readonly JobResult[]): Promise<void> {
    const failed = results.filter((r) => r.status !== 'passed');
    await this.log(phase, `Finished ${results.length} job(s), ${failed.length} not passed`);
    for (const r of failed) {
      await this.log(phase, `${r.label}: status=${r.status} exit code ${r.exitCode}${r.error ? ` (${r.error})` : ''}`);
    }
  }

  /** Phase 1: one planning job per task; each writes `plans/<task>.md`. */
  async proposeFixes(tasks: readonly TaskDescriptor[], base: PhaseContext, options: SetupOptions): Promise<SetupOutcome> {
    const context = withPhase(base, 'propose_fix');
    const { plansDir } = getRunPaths(context.runDir);
    const planFor = (task: TaskDescriptor): string => getPlanPath(context.runDir, task.identity);
    const { toRun, skipped } = await this.partitionBySetupArtifact('propose_fix', tasks, planFor, options);

    await this.log('propose_fix', `Planning ${toRun.length} task(s)`);
    const results = await this.options.pool.run(toRun, {
      name: 'propose_fix',
      context,
      build: (task, ctx) => this.spec(ctx, task, proposeFixPayload(task, this.inputs(ctx)), [plansDir]),
    });
    await this.summarize('propose_fix', results);

    const plans = await this.collectArtifacts(tasks, planFor, context.plans);
    return { context: { ...context, plans }, results, skipped };
  }

  /**
   * Phase 2: one setup job for the shared harness, then one check job per task.
   * A failed setup job is logged and the per-task jobs run regardless.
   */
  async scaffoldChecks(tasks: readonly TaskDescriptor[], base: PhaseContext, options: SetupOptions): Promise<ScaffoldOutcome> {
    const context = withPhase(base, 'scaffold_checks');
    const paths = getRunPaths(context.runDir);

    let setup: JobResult | null = null;
    if (options.regenerate) {
      await fs.rm(paths.harnessDir, { recursive: true, force: true });
    }
    if (!options.regenerate && (await isNonEmptyDir(paths.harnessDir))) {
      await this.log('scaffold_checks', `Shared harness already exists at ${paths.harnessDir}; skipping setup job`);
    } else {
      await fs.mkdir(paths.harnessDir, { recursive: true });
      const harnessTask = pseudoTask(HARNESS_TASK_ID, paths.harnessDir, 'harness');
      const [result] = await this.options.pool.run([harnessTask], {
        name: 'scaffold_checks',
        context,
        build: (task, ctx) =>
          this.spec(ctx, task, scaffoldHarnessPayload(tasks, paths.harnessDir, this.inputs(ctx)), [paths.harnessDir]),
      });
      setup = result ?? null;
      if (setup && setup.status !== 'passed') {
        await this.log(
          'scaffold_checks',
          `Setup job failed (status=${setup.status}, exit code ${setup.exitCode}); continuing with per-task checks`,
        );
      }
    }

    const harnessContext: PhaseContext = {
      ...context,
      harnessPath: (await pathExists(paths.harnessDir)) ? paths.harnessDir : null,
    };
    const checkFor = (task: TaskDescriptor): string => getCheckPath(context.runDir, task.identity);
    const { toRun, skipped } = await this.partitionBySetupArtifact('scaffold_checks', tasks, checkFor, options);

    await this.log('scaffold_checks', `Scaffolding checks for ${toRun.length} task(s)`);
    const results = await this.options.pool.run(toRun, {
      name: 'scaffold_checks',
      context: harnessContext,
      build: (task, ctx) =>
        this.spec(ctx, task, scaffoldChecksPayload(task, this.inputs(ctx)), [paths.checksDir, paths.plansDir]),
    });
    await this.summarize('scaffold_checks', results);

    const checks = await this.collectArtifacts(tasks, checkFor, context.checks);
    return { context: { ...harnessContext, checks }, results, setup, skipped };
  }

  /**
   * Phases 3 and 4 over the full queue. A task's verify job starts as soon as its own apply job
   * has a result; other tasks are not waited for. `startPhase` of verify_work skips apply.
   */
  async runWork(tasks: readonly TaskDescriptor[], base: PhaseContext, startPhase: WorkPhase = 'apply_work'): Promise<WorkOutcome> {
    const paths = getRunPaths(base.runDir);
    const extra = [paths.plansDir, paths.checksDir, paths.guidanceDir];
    const applyStage: PipelineStage = {
      name: 'apply_work',
      context: withPhase(base, 'apply_work'),
      build: (task, ctx) => this.spec(ctx, task, applyWorkPayload(task, this.inputs(ctx)), extra),
    };
    const verifyStage: PipelineStage = {
      name: 'verify_work',
      context: withPhase(base, 'verify_work'),
      build: (task, ctx) => {
        const applyLog = getJobLogPath(ctx.runDir, 'apply_work', task.identity, ctx.iteration);
        return this.spec(ctx, task, verifyWorkPayload(task, this.inputs(ctx), applyLog), extra);
      },
    };

    if (startPhase === 'verify_work') {
      await this.log('verify_work', `Verifying ${tasks.length} task(s) (iteration ${base.iteration})`);
      const verify = await this.options.pool.run(tasks, verifyStage);
      await this.summarize('verify_work', verify);
      return { apply: [], verify };
    }

    await this.log('apply_work', `Applying and verifying ${tasks.length} task(s) (iteration ${base.iteration})`);
    const [apply = [], verify = []] = await this.options.pool.runPipeline(tasks, [applyStage, verifyStage]);
    await this.summarize('apply_work', apply);
    await this.summarize('verify_work', verify);
    return { apply, verify };
  }

  /** Phase 6: one job that turns the failures into guidance for the next iteration. */
  async analyzeFailures(
    tasks: readonly TaskDescriptor[],
    base: PhaseContext,
    validation: ValidationResult,
  ): Promise<AnalysisOutcome> {
    const context = withPhase(base, 'analyze_failures');
    const paths = getRunPaths(context.runDir);
    const guidancePath = getGuidancePath(context.runDir, context.iteration);
    await fs.rm(guidancePath, { force: true });
    await fs.mkdir(paths.guidanceDir, { recursive: true });

    const analysisTask = pseudoTask(ANALYSIS_TASK_ID, guidancePath, 'analysis');
    const [result] = await this.options.pool.run([analysisTask], {
      name: 'analyze_failures',
      context,
      build: (task, ctx) =>
        this.spec(ctx, task, analyzeFailuresPayload(tasks, validation, guidancePath, this.inputs(ctx)), [
          paths.guidanceDir,
          paths.validationDir,
          paths.plansDir,
          paths.checksDir,
        ]),
    });
    if (!result) throw new Error('analyze_failures produced no job result');
    await this.summarize('analyze_failures', [result]);

    const written = await fs.readFile(guidancePath, 'utf-8').catch(() => '');
    if (written.trim()) {
      return { guidance: written, guidancePath, result, fromWorker: true };
    }

    await this.log('analyze_failures', `Warning: no guidance written to ${guidancePath}; using a summary of the failures`);
    const guidance = fallbackGuidance(validation, tasks);
    await writeTextAtomic(guidancePath, `${guidance}\n`);
    return { guidance, guidancePath, result, fromWorker: false };
  }
}
