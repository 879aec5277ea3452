import { z } from 'zod';

import type { TaskDescriptor } from './manifest.js';

export type FailedItem = Readonly<{ name: string; message: string }>;

/** Aggregate outcome of one validation harness run. */
export type ValidationResult = Readonly<{
  total: number;
  passed: number;
  failed: number;
  failedItems: readonly FailedItem[];
}>;

const countSchema = z.number().int().nonnegative();

const reportSchema = z
  .object({
    total: countSchema,
    passed: countSchema,
    failed: countSchema,
    failures: z
      .array(
        z
          .object({
            name: z.string(),
            message: z.string().optional().default(''),
          })
          .passthrough(),
      )
      .optional()
      .default([]),
  })
  .passthrough();

export class ValidationReportError extends Error {
  override name = 'ValidationReportError';
}

/**
 * Parses the harness report. Only the three counts and the failure list are read;
 * anything else the harness writes is ignored.
 */
export function parseValidationReport(raw: unknown): ValidationResult {
  const parsed = reportSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
    throw new ValidationReportError(`Invalid validation report: ${detail}`);
  }
  const report = parsed.data;
  return Object.freeze({
    total: report.total,
    passed: report.passed,
    failed: report.failed,
    failedItems: Object.freeze(report.failures.map((f) => Object.freeze({ name: f.name, message: f.message }))),
  });
}

/** Result used when the harness ran but produced nothing readable. */
export function unusableValidation(name: string, message: string): ValidationResult {
  return Object.freeze({ total: 0, passed: 0, failed: 0, failedItems: Object.freeze([{ name, message }]) });
}

/** The global gate: nothing failed and at least one check ran. */
export function isConverged(validation: ValidationResult): boolean {
  return validation.failed === 0 && validation.total > 0;
}

export function formatValidationCounts(validation: ValidationResult): string {
  return `total=${validation.total} passed=${validation.passed} failed=${validation.failed}`;
}

/**
 * Maps failed items back to tasks. A failure belongs to a task when its name contains the
 * task's identity or original identity; longer matches win so `Foo` never claims `FooBar`'s failures.
 * Failures that match no task are returned under `unmatched`.
 */
export function attributeFailures(
  tasks: readonly TaskDescriptor[],
  failedItems: readonly FailedItem[],
): { byTask: Map<string, FailedItem[]>; unmatched: FailedItem[] } {
  const candidates: { identity: string; needle: string }[] = [];
  for (const task of tasks) {
    candidates.push({ identity: task.identity, needle: task.identity });
    if (task.originalIdentity !== task.identity) {
      candidates.push({ identity: task.identity, needle: task.originalIdentity });
    }
  }
  candidates.sort((a, b) => b.needle.length - a.needle.length);

  const byTask = new Map<string, FailedItem[]>();
  const unmatched: FailedItem[] = [];
  for (const item of failedItems) {
    const match = candidates.find((c) => item.name.includes(c.needle));
    if (!match) {
      unmatched.push(item);
      continue;
    }
    const list = byTask.get(match.identity);
    if (list) list.push(item);
    else byTask.set(match.identity, [item]);
  }
  return { byTask, unmatched };
}
