/**
 * Bounded-concurrency pool that maps a queue of tasks onto external worker processes.
 *
 * - At most `workers` processes run at once.
 * - Completion is observed by polling; the controller only ever sleeps for `pollIntervalMs`.
 * - Results come back in queue order no matter which process finished first.
 * - A failing job is data: non-zero exits, builder or launch errors and timeouts all become
 *   JobResults, and never stop the rest of the queue.
 */

import {
  DEFAULT_POLL_INTERVAL_MS,
  type JobSpec,
  type JobSpecBuilder,
  type PhaseContext,
  type TaskDescriptor,
} from '@fixloop/core';

import type { ProcessLauncher, WorkerProcess } from './launcher.js';

/** Exit code recorded for jobs that never produced a real process exit. */
export const SENTINEL_EXIT_CODE = -1;

export type JobStatus = 'passed' | 'failed' | 'timed_out' | 'builder_failed' | 'launch_failed' | 'cancelled';

export type JobResult = Readonly<{
  exitCode: number;
  durationMs: number;
  capturedOutput: string;
  label: string;
  queueIndex: number;
  task: TaskDescriptor;
  status: JobStatus;
  startedAt: string;
  endedAt: string;
  logPath: string | null;
  error?: string;
}>;

/** One job per task, built from the task and the stage's phase context. */
export type PipelineStage = Readonly<{
  name: string;
  context: PhaseContext;
  build: JobSpecBuilder;
}>;

export type PoolEvent =
  | Readonly<{ type: 'job_started'; stage: string; label: string; queueIndex: number; running: number }>
  | Readonly<{ type: 'job_finished'; stage: string; result: JobResult; running: number }>;

export type WorkerPoolOptions = Readonly<{
  workers: number;
  launcher: ProcessLauncher;
  pollIntervalMs?: number;
  /** Per-job deadline; on expiry the process tree is killed and the job recorded as timed_out. */
  jobTimeoutMs?: number | null;
  appendLog?: (line: string) => Promise<void>;
  onEvent?: (event: PoolEvent) => void;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}>;

export type WorkerPoolErrorCode = 'INVALID_WORKERS' | 'INVALID_POLL_INTERVAL' | 'NO_STAGES';

export class WorkerPoolError extends Error {
  constructor(
    message: string,
    public readonly code: WorkerPoolErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'WorkerPoolError';
  }
}

/** One worker invocation in flight. Owned by the pool until its result exists. */
interface JobHandle {
  spec: JobSpec;
  process: WorkerProcess;
  task: TaskDescriptor;
  queueIndex: number;
  stage: number;
  startedAt: string;
  startedAtMs: number;
  deadlineMs: number | null;
  timedOut: boolean;
  stopped: boolean;
}

type PendingJob = { queueIndex: number; stage: number };

function nowIso(): string {
  return new Date().toISOString();
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class WorkerPool {
  readonly workers: number;
  private readonly options: WorkerPoolOptions;
  private readonly pollIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private running: JobHandle[] = [];
  private stopRequested = false;

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.workers) || options.workers <= 0) {
      throw new WorkerPoolError(`workers must be a positive integer (got ${options.workers})`, 'INVALID_WORKERS', {
        workers: options.workers,
      });
    }
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
      throw new WorkerPoolError(`pollIntervalMs must be >= 0 (got ${pollIntervalMs})`, 'INVALID_POLL_INTERVAL', {
        pollIntervalMs,
      });
    }
    this.options = options;
    this.workers = options.workers;
    this.pollIntervalMs = pollIntervalMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get runningCount(): number {
    return this.running.length;
  }

  get stopped(): boolean {
    return this.stopRequested;
  }

  /**
   * Stops the pool: running workers get SIGTERM and every job that has not started is
   * recorded as cancelled. The pool stays stopped for any later run.
   */
  requestStop(): void {
    this.stopRequested = true;
    for (const handle of this.running) {
      handle.stopped = true;
      handle.process.terminate('SIGTERM');
    }
  }

  /** Runs one job per queued task. `results[i].queueIndex === i`. */
  async run(queue: readonly TaskDescriptor[], stage: PipelineStage): Promise<JobResult[]> {
    const [results] = await this.runPipeline(queue, [stage]);
    return results ?? [];
  }

  /**
   * Runs a chain of stages per task. Stage k+1 of a task is queued (ahead of untouched tasks)
   * as soon as its stage k result exists, so different tasks move through the chain independently.
   *
   * @returns one ordered result list per stage
   */
  async runPipeline(queue: readonly TaskDescriptor[], stages: readonly PipelineStage[]): Promise<JobResult[][]> {
    if (stages.length === 0) {
      throw new WorkerPoolError('runPipeline needs at least one stage', 'NO_STAGES');
    }

    const accumulators: JobResult[][] = stages.map(() => []);
    const pending: PendingJob[] = queue.map((_, queueIndex) => ({ queueIndex, stage: 0 }));

    const settle = async (result: JobResult, stage: number): Promise<void> => {
      accumulators[stage]?.push(result);
      this.options.onEvent?.({
        type: 'job_finished',
        stage: stages[stage]?.name ?? String(stage),
        result,
        running: this.running.length,
      });
      if (stage + 1 >= stages.length) return;
      if (result.status === 'cancelled') {
        for (let later = stage + 1; later < stages.length; later += 1) {
          accumulators[later]?.push(this.syntheticResult(result.task, result.queueIndex, stages[later], 'cancelled', null));
        }
        return;
      }
      pending.unshift({ queueIndex: result.queueIndex, stage: stage + 1 });
    };

    while (pending.length > 0 || this.running.length > 0) {
      // (a) fill free slots
      while (!this.stopRequested && this.running.length < this.workers && pending.length > 0) {
        const next = pending.shift();
        if (!next) break;
        const task = queue[next.queueIndex];
        const stage = stages[next.stage];
        if (!task || !stage) continue;

        let spec: JobSpec;
        try {
          spec = stage.build(task, stage.context);
        } catch (err) {
          const label = `${stage.name}:${task.identity}`;
          await this.log(`[WORKER ${label}] Job spec builder failed: ${errorMessage(err)}`);
          await settle(this.syntheticResult(task, next.queueIndex, stage, 'builder_failed', null, errorMessage(err)), next.stage);
          continue;
        }

        let proc: WorkerProcess;
        try {
          proc = this.options.launcher.launch(spec);
        } catch (err) {
          await this.log(`[WORKER ${spec.label}] Launch failed: ${errorMessage(err)}`);
          await settle(
            this.syntheticResult(task, next.queueIndex, stage, 'launch_failed', spec.logPath, errorMessage(err), spec.label),
            next.stage,
          );
          continue;
        }

        const startedAtMs = this.now();
        const jobTimeoutMs = this.options.jobTimeoutMs ?? null;
        this.running.push({
          spec,
          process: proc,
          task,
          queueIndex: next.queueIndex,
          stage: next.stage,
          startedAt: nowIso(),
          startedAtMs,
          deadlineMs: jobTimeoutMs !== null ? startedAtMs + jobTimeoutMs : null,
          timedOut: false,
          stopped: false,
        });
        await this.log(`[WORKER ${spec.label}] Starting...`);
        this.options.onEvent?.({
          type: 'job_started',
          stage: stage.name,
          label: spec.label,
          queueIndex: next.queueIndex,
          running: this.running.length,
        });
      }

      if (this.stopRequested && pending.length > 0) {
        const cancelled = pending.splice(0, pending.length);
        for (const item of cancelled) {
          const task = queue[item.queueIndex];
          const stage = stages[item.stage];
          if (!task || !stage) continue;
          await settle(this.syntheticResult(task, item.queueIndex, stage, 'cancelled', null), item.stage);
        }
      }

      // (b) collect every handle whose process has exited
      const now = this.now();
      let completed = 0;
      for (const handle of [...this.running]) {
        const exit = handle.process.poll();
        if (exit) {
          this.running = this.running.filter((h) => h !== handle);
          completed += 1;
          const result = this.collect(handle, exit.exitCode, exit.error, now);
          await this.log(`[WORKER ${result.label}] Completed with exit code ${result.exitCode}, status=${result.status}`);
          await settle(result, handle.stage);
          continue;
        }
        if (handle.deadlineMs !== null && !handle.timedOut && now >= handle.deadlineMs) {
          handle.timedOut = true;
          await this.log(`[WORKER ${handle.spec.label}] Deadline exceeded after ${now - handle.startedAtMs}ms; killing`);
          handle.process.terminate('SIGKILL');
        }
      }

      // (c) nothing finished this pass: wait before re-scanning
      if (completed === 0 && this.running.length > 0) {
        await this.sleep(this.pollIntervalMs);
      }
    }

    return accumulators.map((results) => [...results].sort((a, b) => a.queueIndex - b.queueIndex));
  }

  private collect(handle: JobHandle, exitCode: number, error: string | undefined, nowMs: number): JobResult {
    let status: JobStatus;
    if (error !== undefined) status = 'launch_failed';
    else if (handle.timedOut) status = 'timed_out';
    else if (handle.stopped) status = 'cancelled';
    else status = exitCode === 0 ? 'passed' : 'failed';

    return Object.freeze({
      exitCode,
      durationMs: Math.max(0, nowMs - handle.startedAtMs),
      capturedOutput: handle.process.output(),
      label: handle.spec.label,
      queueIndex: handle.queueIndex,
      task: handle.task,
      status,
      startedAt: handle.startedAt,
      endedAt: nowIso(),
      logPath: handle.spec.logPath,
      ...(error !== undefined ? { error } : {}),
    });
  }

  private syntheticResult(
    task: TaskDescriptor,
    queueIndex: number,
    stage: PipelineStage | undefined,
    status: Extract<JobStatus, 'builder_failed' | 'launch_failed' | 'cancelled'>,
    logPath: string | null,
    error?: string,
    label?: string,
  ): JobResult {
    const at = nowIso();
    return Object.freeze({
      exitCode: SENTINEL_EXIT_CODE,
      durationMs: 0,
      capturedOutput: '',
      label: label ?? `${stage?.name ?? 'job'}:${task.identity}`,
      queueIndex,
      task,
      status,
      startedAt: at,
      endedAt: at,
      logPath,
      ...(error !== undefined ? { error } : {}),
    });
  }

  private async log(line: string): Promise<void> {
    if (this.options.appendLog) await this.options.appendLog(line);
  }
}
