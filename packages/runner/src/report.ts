import {
  attributeFailures,
  formatValidationCounts,
  getRunPaths,
  groupByCategory,
  isConverged,
  type DoneOutcome,
  type FailedItem,
  type TaskDescriptor,
  type ValidationResult,
} from '@fixloop/core';

import { writeJsonAtomic, writeTextAtomic } from './atomicWrite.js';
import type { IterationRecord, JobSummary } from './loopState.js';
import type { JobStatus } from './workerPool.js';

export type TaskVerdict = 'pass' | 'fail' | 'unknown';

export type TaskReport = Readonly<{
  identity: string;
  category: string;
  sourceLocation: string;
  verdict: TaskVerdict;
  failures: readonly FailedItem[];
  applyStatus: JobStatus | null;
  verifyStatus: JobStatus | null;
}>;

export type CategoryReport = Readonly<{
  category: string;
  total: number;
  passed: number;
  failed: number;
  unknown: number;
}>;

export type RunReport = Readonly<{
  runId: string;
  outcome: DoneOutcome;
  reason: string | null;
  iteration: number;
  maxIterations: number;
  startedAt: string;
  endedAt: string;
  finalValidation: ValidationResult | null;
  tasks: readonly TaskReport[];
  categories: readonly CategoryReport[];
  unmatchedFailures: readonly FailedItem[];
  iterations: readonly IterationRecord[];
}>;

export type BuildReportParams = Readonly<{
  runId: string;
  outcome: DoneOutcome;
  reason?: string;
  iteration: number;
  maxIterations: number;
  startedAt: string;
  endedAt?: string;
  tasks: readonly TaskDescriptor[];
  iterations: readonly IterationRecord[];
}>;

function lastStatus(jobs: readonly JobSummary[] | undefined, identity: string): JobStatus | null {
  return jobs?.find((j) => j.identity === identity)?.status ?? null;
}

/**
 * Per-task verdicts come from the last validation: a task fails when a failed item is attributed
 * to it and passes when the run converged. Without an attributed failure it passes only when
 * every reported failure was attributed to some other task; otherwise its verdict is unknown.
 */
export function buildReport(params: BuildReportParams): RunReport {
  const validated = params.iterations.filter((r) => r.validation !== null);
  const finalValidation = validated.at(-1)?.validation ?? null;
  const lastWork = [...params.iterations].reverse().find((r) => r.apply.length > 0 || r.verify.length > 0);

  const { byTask, unmatched } = attributeFailures(params.tasks, finalValidation?.failedItems ?? []);
  const unexplained =
    finalValidation !== null && (unmatched.length > 0 || finalValidation.failedItems.length < finalValidation.failed);

  const tasks: TaskReport[] = params.tasks.map((task) => {
    const failures = byTask.get(task.identity) ?? [];
    let verdict: TaskVerdict;
    if (!finalValidation) verdict = 'unknown';
    else if (isConverged(finalValidation)) verdict = 'pass';
    else if (failures.length > 0) verdict = 'fail';
    // Failures that could not be attributed may belong to any task without one of its own.
    else if (finalValidation.total === 0 || unexplained) verdict = 'unknown';
    else verdict = 'pass';
    return {
      identity: task.identity,
      category: task.category,
      sourceLocation: task.sourceLocation,
      verdict,
      failures,
      applyStatus: lastStatus(lastWork?.apply, task.identity),
      verifyStatus: lastStatus(lastWork?.verify, task.identity),
    };
  });

  const categories: CategoryReport[] = [];
  for (const [category, members] of groupByCategory(params.tasks)) {
    const reports = tasks.filter((t) => members.some((m) => m.identity === t.identity));
    categories.push({
      category,
      total: reports.length,
      passed: reports.filter((t) => t.verdict === 'pass').length,
      failed: reports.filter((t) => t.verdict === 'fail').length,
      unknown: reports.filter((t) => t.verdict === 'unknown').length,
    });
  }
  categories.sort((a, b) => a.category.localeCompare(b.category));

  return {
    runId: params.runId,
    outcome: params.outcome,
    reason: params.reason ?? null,
    iteration: params.iteration,
    maxIterations: params.maxIterations,
    startedAt: params.startedAt,
    endedAt: params.endedAt ?? new Date().toISOString(),
    finalValidation,
    tasks,
    categories,
    unmatchedFailures: unmatched,
    iterations: params.iterations,
  };
}

function outcomeHeadline(report: RunReport): string {
  switch (report.outcome) {
    case 'pass':
      return `Converged at iteration ${report.iteration} of ${report.maxIterations}.`;
    case 'ceiling':
      return `Stopped at the iteration ceiling (${report.maxIterations}) without converging.`;
    case 'aborted':
      return `Aborted during iteration ${report.iteration}${report.reason ? `: ${report.reason}` : '.'}`;
  }
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function renderReportMarkdown(report: RunReport): string {
  const lines: string[] = [];
  lines.push(`# fixloop run ${report.runId}`, '');
  lines.push(`**Outcome:** ${report.outcome}`, '');
  lines.push(outcomeHeadline(report), '');
  lines.push(`- Started: ${report.startedAt}`, `- Ended: ${report.endedAt}`);
  lines.push(`- Final validation: ${report.finalValidation ? formatValidationCounts(report.finalValidation) : 'not run'}`, '');

  lines.push('## Iterations', '');
  if (report.iterations.length === 0) {
    lines.push('No iteration ran.', '');
  } else {
    lines.push('| Iteration | Apply passed | Verify passed | Validation |', '| --- | --- | --- | --- |');
    for (const it of report.iterations) {
      const applyOk = it.apply.filter((j) => j.status === 'passed').length;
      const verifyOk = it.verify.filter((j) => j.status === 'passed').length;
      const validation = it.validation ? formatValidationCounts(it.validation) : 'not run';
      lines.push(`| ${it.iteration} | ${applyOk}/${it.apply.length} | ${verifyOk}/${it.verify.length} | ${validation} |`);
    }
    lines.push('');
  }

  lines.push('## Tasks by category', '');
  for (const category of report.categories) {
    lines.push(
      `### ${category.category} (${category.passed} passed, ${category.failed} failed, ${category.unknown} unknown)`,
      '',
    );
    lines.push('| Task | Verdict | Apply | Verify | Failures |', '| --- | --- | --- | --- | --- |');
    for (const task of report.tasks.filter((t) => t.category === category.category)) {
      const failures = task.failures.map((f) => f.name).join(', ');
      lines.push(
        `| ${escapeCell(task.identity)} | ${task.verdict} | ${task.applyStatus ?? '-'} | ${task.verifyStatus ?? '-'} | ${escapeCell(failures) || '-'} |`,
      );
    }
    lines.push('');
  }

  if (report.unmatchedFailures.length > 0) {
    lines.push('## Failures not attributed to a task', '');
    for (const f of report.unmatchedFailures) {
      lines.push(f.message ? `- ${f.name}: ${escapeCell(f.message)}` : `- ${f.name}`);
    }
    lines.push('');
  }

  return `${lines.join('\n').trimEnd()}\n`;
}

export async function writeReport(runDir: string, report: RunReport): Promise<{ markdownPath: string; jsonPath: string }> {
  const paths = getRunPaths(runDir);
  await writeJsonAtomic(paths.reportJson, report);
  await writeTextAtomic(paths.reportMarkdown, renderReportMarkdown(report));
  return { markdownPath: paths.reportMarkdown, jsonPath: paths.reportJson };
}
