import { describe, expect, it } from 'vitest';

import type { TaskDescriptor, ValidationResult } from '@fixloop/core';

import type { IterationRecord, JobSummary } from './loopState.js';
import { buildReport, renderReportMarkdown } from './report.js';
import type { JobStatus } from './workerPool.js';

const tasks: TaskDescriptor[] = [
  { identity: 'Writer', sourceLocation: 'src/Writer.cs', category: 'writers', originalIdentity: 'Writer' },
  { identity: 'Lexer', sourceLocation: 'src/Lexer.cs', category: 'parsers', originalIdentity: 'Lexer' },
  { identity: 'Parser', sourceLocation: 'src/Parser.cs', category: 'parsers', originalIdentity: 'Parser' },
];

function job(identity: string, status: JobStatus, queueIndex = 0): JobSummary {
  return {
    identity,
    label: `apply_work:${identity}`,
    queueIndex,
    status,
    exitCode: status === 'passed' ? 0 : 1,
    durationMs: 10,
    startedAt: '2026-01-01T00:00:00.000Z',
    endedAt: '2026-01-01T00:00:01.000Z',
    logPath: null,
  };
}

function record(iteration: number, validation: ValidationResult | null, status: JobStatus = 'passed'): IterationRecord {
  const jobs = tasks.map((t, i) => job(t.identity, status, i));
  return { iteration, apply: jobs, verify: jobs, validation, guidancePath: null };
}

const failing: ValidationResult = {
  total: 10,
  passed: 8,
  failed: 2,
  failedItems: [
    { name: 'Tests.Lexer.Tokens', message: 'unexpected EOF' },
    { name: 'Tests.Global | Setup', message: 'line one\nline two' },
  ],
};

function report(iterations: IterationRecord[], outcome: 'pass' | 'ceiling' | 'aborted' = 'ceiling') {
  return buildReport({
    runId: 'run-1',
    outcome,
    iteration: iterations.length || 1,
    maxIterations: 2,
    startedAt: '2026-01-01T00:00:00.000Z',
    endedAt: '2026-01-01T01:00:00.000Z',
    tasks,
    iterations,
  });
}

describe('buildReport', () => {
  it('marks every task unknown when no validation ran', () => {
    const built = report([], 'aborted');
    expect(built.finalValidation).toBeNull();
    expect(built.tasks.map((t) => t.verdict)).toEqual(['unknown', 'unknown', 'unknown']);
    expect(built.tasks.map((t) => t.applyStatus)).toEqual([null, null, null]);
  });

  it('fails tasks with attributed failures and passes the rest when every failure is attributed', () => {
    const attributed: ValidationResult = {
      total: 10,
      passed: 9,
      failed: 1,
      failedItems: [{ name: 'Tests.Lexer.Tokens', message: 'unexpected EOF' }],
    };
    const built = report([record(1, { ...failing, failed: 0, failedItems: [] }), record(2, attributed)]);

    expect(built.finalValidation).toBe(attributed);
    expect(built.tasks.map((t) => [t.identity, t.verdict])).toEqual([
      ['Writer', 'pass'],
      ['Lexer', 'fail'],
      ['Parser', 'pass'],
    ]);
    expect(built.unmatchedFailures).toEqual([]);
    expect(built.categories).toEqual([
      { category: 'parsers', total: 2, passed: 1, failed: 1, unknown: 0 },
      { category: 'writers', total: 1, passed: 1, failed: 0, unknown: 0 },
    ]);
  });

  it('leaves tasks without a failure of their own unknown when some failures are unattributed', () => {
    const built = report([record(1, failing)]);

    expect(built.tasks.map((t) => [t.identity, t.verdict])).toEqual([
      ['Writer', 'unknown'],
      ['Lexer', 'fail'],
      ['Parser', 'unknown'],
    ]);
    expect(built.unmatchedFailures).toEqual([{ name: 'Tests.Global | Setup', message: 'line one\nline two' }]);
    expect(built.categories).toEqual([
      { category: 'parsers', total: 2, passed: 0, failed: 1, unknown: 1 },
      { category: 'writers', total: 1, passed: 0, failed: 0, unknown: 1 },
    ]);
  });

  it('does not pass any task when the failures carry no items', () => {
    const counted: ValidationResult = { total: 3, passed: 1, failed: 2, failedItems: [] };
    expect(report([record(1, counted)]).tasks.map((t) => t.verdict)).toEqual(['unknown', 'unknown', 'unknown']);
  });

  it('treats a validation that ran no checks as unknown', () => {
    const empty: ValidationResult = { total: 0, passed: 0, failed: 0, failedItems: [] };
    expect(report([record(1, empty)]).tasks.map((t) => t.verdict)).toEqual(['unknown', 'unknown', 'unknown']);
  });

  it('takes job statuses from the last iteration that ran work', () => {
    const aborted: IterationRecord = { iteration: 2, apply: [], verify: [], validation: null, guidancePath: null };
    const built = report([record(1, failing, 'failed'), aborted], 'aborted');

    expect(built.tasks[0]).toMatchObject({ applyStatus: 'failed', verifyStatus: 'failed' });
    expect(built.finalValidation).toBe(failing);
  });
});

describe('renderReportMarkdown', () => {
  it('renders the iteration table, the tasks by category and the unattributed failures', () => {
    const markdown = renderReportMarkdown(report([record(1, failing)]));
    const lines = markdown.split('\n');

    expect(lines.slice(0, 5)).toEqual([
      '# fixloop run run-1',
      '',
      '**Outcome:** ceiling',
      '',
      'Stopped at the iteration ceiling (2) without converging.',
    ]);
    expect(lines).toContain('- Final validation: total=10 passed=8 failed=2');
    expect(lines).toContain('| 1 | 3/3 | 3/3 | total=10 passed=8 failed=2 |');
    expect(lines).toContain('### parsers (0 passed, 1 failed, 1 unknown)');
    expect(lines).toContain('| Lexer | fail | passed | passed | Tests.Lexer.Tokens |');
    expect(lines).toContain('| Parser | unknown | passed | passed | - |');
    expect(lines).toContain('- Tests.Global | Setup: line one line two');
    expect(markdown.endsWith('line one line two\n')).toBe(true);
  });

  it('explains an aborted run', () => {
    const built = buildReport({
      runId: 'run-2',
      outcome: 'aborted',
      reason: 'received SIGINT',
      iteration: 2,
      maxIterations: 3,
      startedAt: '2026-01-01T00:00:00.000Z',
      tasks,
      iterations: [],
    });
    const lines = renderReportMarkdown(built).split('\n');
    expect(lines[4]).toBe('Aborted during iteration 2: received SIGINT');
    expect(lines).toContain('No iteration ran.');
    expect(lines).toContain('- Final validation: not run');
  });
});
