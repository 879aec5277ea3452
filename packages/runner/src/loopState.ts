import fs from 'node:fs/promises';

import { z } from 'zod';

import {
  LoopStateError,
  phaseNames,
  setupPhases,
  workPhases,
  type LoopState,
  type PhaseContext,
  type ValidationResult,
} from '@fixloop/core';

import { writeJsonAtomic } from './atomicWrite.js';
import type { JobResult, JobStatus } from './workerPool.js';

/** What is kept of a JobResult once the iteration is over (no captured output). */
export type JobSummary = Readonly<{
  identity: string;
  label: string;
  queueIndex: number;
  status: JobStatus;
  exitCode: number;
  durationMs: number;
  startedAt: string;
  endedAt: string;
  logPath: string | null;
  error?: string;
}>;

export type IterationRecord = Readonly<{
  iteration: number;
  apply: readonly JobSummary[];
  verify: readonly JobSummary[];
  validation: ValidationResult | null;
  guidancePath: string | null;
}>;

export type PersistedLoopState = Readonly<{
  version: 1;
  runId: string;
  manifestPath: string;
  maxIterations: number;
  startedAt: string;
  updatedAt: string;
  state: LoopState;
  context: PhaseContext;
  iterations: readonly IterationRecord[];
}>;

export function summarizeJob(result: JobResult): JobSummary {
  return {
    identity: result.task.identity,
    label: result.label,
    queueIndex: result.queueIndex,
    status: result.status,
    exitCode: result.exitCode,
    durationMs: result.durationMs,
    startedAt: result.startedAt,
    endedAt: result.endedAt,
    logPath: result.logPath,
    ...(result.error !== undefined ? { error: result.error } : {}),
  };
}

const iterationSchema = z.number().int().positive();

const validationSchema = z.object({
  total: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  failedItems: z.array(z.object({ name: z.string(), message: z.string() })),
});

const loopStateSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('setup'), iteration: iterationSchema, startPhase: z.enum(setupPhases) }),
  z.object({ kind: z.literal('working'), iteration: iterationSchema, startPhase: z.enum(workPhases) }),
  z.object({ kind: z.literal('evaluating'), iteration: iterationSchema }),
  z.object({ kind: z.literal('analyzing'), iteration: iterationSchema }),
  z.object({
    kind: z.literal('done'),
    iteration: iterationSchema,
    outcome: z.enum(['pass', 'ceiling', 'aborted']),
    reason: z.string().optional(),
  }),
]);

const contextSchema = z.object({
  runId: z.string().min(1),
  runDir: z.string().min(1),
  iteration: iterationSchema,
  phase: z.enum(phaseNames),
  plans: z.record(z.string(), z.string()),
  checks: z.record(z.string(), z.string()),
  harnessPath: z.string().nullable(),
  guidance: z.array(z.string()),
  previousValidation: validationSchema.nullable(),
});

const jobSummarySchema = z.object({
  identity: z.string(),
  label: z.string(),
  queueIndex: z.number().int().nonnegative(),
  status: z.enum(['passed', 'failed', 'timed_out', 'builder_failed', 'launch_failed', 'cancelled']),
  exitCode: z.number().int(),
  durationMs: z.number().nonnegative(),
  startedAt: z.string(),
  endedAt: z.string(),
  logPath: z.string().nullable(),
  error: z.string().optional(),
});

const persistedSchema = z.object({
  version: z.literal(1),
  runId: z.string().min(1),
  manifestPath: z.string(),
  maxIterations: iterationSchema,
  startedAt: z.string(),
  updatedAt: z.string(),
  state: loopStateSchema,
  context: contextSchema,
  iterations: z.array(
    z.object({
      iteration: iterationSchema,
      apply: z.array(jobSummarySchema),
      verify: z.array(jobSummarySchema),
      validation: validationSchema.nullable(),
      guidancePath: z.string().nullable(),
    }),
  ),
});

export async function saveLoopState(filePath: string, value: Omit<PersistedLoopState, 'version' | 'updatedAt'>): Promise<void> {
  const persisted: PersistedLoopState = { version: 1, ...value, updatedAt: new Date().toISOString() };
  await writeJsonAtomic(filePath, persisted);
}

/** Returns null when no state file exists. */
export async function loadLoopState(filePath: string): Promise<PersistedLoopState | null> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new LoopStateError(`${filePath}: invalid JSON (${msg})`, 'INVALID_RESUME', { path: filePath });
  }

  const parsed = persistedSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new LoopStateError(`${filePath}: invalid loop state (${detail})`, 'INVALID_RESUME', { path: filePath });
  }
  return parsed.data;
}

/** Replaces the record of `record.iteration`, keeping the list sorted by iteration. */
export function upsertIteration(records: readonly IterationRecord[], record: IterationRecord): IterationRecord[] {
  return [...records.filter((r) => r.iteration !== record.iteration), record].sort((a, b) => a.iteration - b.iteration);
}
