import {
  recordIteration,
  recordJobResults,
  recordRunFinished,
  recordRunStarted,
  type RunOutcome,
} from '@fixloop/state-db';

import type { ValidationResult } from '@fixloop/core';

import type { JobSummary } from './loopState.js';

/** Audit trail of runs. The loop reports to it; nothing reads it back during a run. */
export interface RunHistory {
  runStarted(params: { runId: string; taskCount: number; maxIterations: number }): void;
  jobsFinished(params: { runId: string; iteration: number; phase: string; jobs: readonly JobSummary[] }): void;
  iterationValidated(params: { runId: string; iteration: number; validation: ValidationResult }): void;
  runFinished(params: { runId: string; outcome: Exclude<RunOutcome, 'running'>; lastIteration: number }): void;
}

export class SqliteRunHistory implements RunHistory {
  constructor(readonly dbPath: string) {}

  runStarted(params: { runId: string; taskCount: number; maxIterations: number }): void {
    recordRunStarted(this.dbPath, params);
  }

  jobsFinished(params: { runId: string; iteration: number; phase: string; jobs: readonly JobSummary[] }): void {
    recordJobResults(
      this.dbPath,
      params.jobs.map((job) => ({
        runId: params.runId,
        iteration: params.iteration,
        phase: params.phase,
        queueIndex: job.queueIndex,
        identity: job.identity,
        label: job.label,
        status: job.status,
        exitCode: job.exitCode,
        durationMs: job.durationMs,
        startedAt: job.startedAt,
        endedAt: job.endedAt,
        logPath: job.logPath ?? '',
      })),
    );
  }

  iterationValidated(params: { runId: string; iteration: number; validation: ValidationResult }): void {
    recordIteration(this.dbPath, {
      runId: params.runId,
      iteration: params.iteration,
      total: params.validation.total,
      passed: params.validation.passed,
      failed: params.validation.failed,
      failedItems: params.validation.failedItems,
    });
  }

  runFinished(params: { runId: string; outcome: Exclude<RunOutcome, 'running'>; lastIteration: number }): void {
    recordRunFinished(this.dbPath, params);
  }
}
