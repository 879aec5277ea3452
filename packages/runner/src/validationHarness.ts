import fs from 'node:fs/promises';

import {
  formatValidationCounts,
  getValidationLogPath,
  parseValidationReport,
  unusableValidation,
  type PhaseContext,
  type TaskDescriptor,
  type ValidationCommandConfig,
  type ValidationResult,
} from '@fixloop/core';

import { pathExists } from './atomicWrite.js';
import { SpawnLauncher, type ProcessLauncher } from './launcher.js';
import type { AppendLog } from './runLog.js';
import { WorkerPool, type JobResult } from './workerPool.js';

export const VALIDATION_TASK_ID = '_validation';
/** Name of the failed item recorded when the harness leaves no usable report. */
export const HARNESS_ITEM_NAME = 'validation-harness';

export type HarnessMissingErrorCode = 'ENTRY_POINT_MISSING' | 'SPAWN_FAILED';

/** The harness itself is unavailable. Fatal for the run. */
export class HarnessMissingError extends Error {
  constructor(
    message: string,
    public readonly code: HarnessMissingErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HarnessMissingError';
  }
}

export type ValidationHarnessOptions = Readonly<{
  config: ValidationCommandConfig;
  appendLog: AppendLog;
  /** Defaults to spawning `config.command`. */
  launcher?: ProcessLauncher;
  pollIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}>;

export type ValidationRun = Readonly<{
  validation: ValidationResult;
  job: JobResult;
}>;

/**
 * Runs the external validation harness once per iteration through a single-slot pool and
 * reads the JSON report it leaves at `reportPath`.
 */
export class ValidationHarness {
  private readonly options: ValidationHarnessOptions;
  private readonly pool: WorkerPool;

  constructor(options: ValidationHarnessOptions) {
    this.options = options;
    const { config } = options;
    this.pool = new WorkerPool({
      workers: 1,
      launcher:
        options.launcher ??
        new SpawnLauncher({
          command: config.command,
          args: config.args,
          env: { ...config.env, FIXLOOP_REPORT_PATH: config.reportPath },
        }),
      pollIntervalMs: options.pollIntervalMs,
      jobTimeoutMs: config.timeoutMs,
      appendLog: options.appendLog,
      sleep: options.sleep,
      now: options.now,
    });
  }

  requestStop(): void {
    this.pool.requestStop();
  }

  private log(line: string): Promise<void> {
    return this.options.appendLog(`[HARNESS] ${line}`);
  }

  async run(context: PhaseContext): Promise<ValidationRun> {
    const { config } = this.options;
    if (config.entryPoint && !(await pathExists(config.entryPoint))) {
      throw new HarnessMissingError(`Validation harness entry point not found: ${config.entryPoint}`, 'ENTRY_POINT_MISSING', {
        entryPoint: config.entryPoint,
      });
    }

    // A report left over from the previous iteration must never be read as this one's.
    await fs.rm(config.reportPath, { force: true });

    const task: TaskDescriptor = Object.freeze({
      identity: VALIDATION_TASK_ID,
      sourceLocation: config.workDir,
      category: 'validation',
      originalIdentity: VALIDATION_TASK_ID,
    });
    await this.log(`Running ${config.command} (iteration ${context.iteration})`);
    const [job] = await this.pool.run([task], {
      name: 'run_validation',
      context,
      build: (_task, ctx) => ({
        payload: `Validation run ${ctx.runId}, iteration ${ctx.iteration}\nReport: ${config.reportPath}\n`,
        workingDirectory: config.workDir,
        logPath: getValidationLogPath(ctx.runDir, ctx.iteration),
        label: 'run_validation',
        extraContext: [],
      }),
    });
    if (!job) throw new Error('run_validation produced no job result');

    if (job.status === 'launch_failed') {
      throw new HarnessMissingError(`Validation harness could not be started: ${job.error ?? config.command}`, 'SPAWN_FAILED', {
        command: config.command,
        error: job.error,
      });
    }

    const validation = await this.readReport(job);
    await this.log(`${formatValidationCounts(validation)} (harness exit code ${job.exitCode}, status=${job.status})`);
    return { validation, job };
  }

  private async readReport(job: JobResult): Promise<ValidationResult> {
    const { reportPath } = this.options.config;
    let text: string;
    try {
      text = await fs.readFile(reportPath, 'utf-8');
    } catch {
      await this.log(`No report at ${reportPath}`);
      return unusableValidation(HARNESS_ITEM_NAME, `No report written to ${reportPath} (exit code ${job.exitCode}, status=${job.status})`);
    }

    try {
      return parseValidationReport(JSON.parse(text));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      await this.log(`Unreadable report at ${reportPath}: ${reason}`);
      return unusableValidation(HARNESS_ITEM_NAME, `Unreadable report at ${reportPath}: ${reason}`);
    }
  }
}
