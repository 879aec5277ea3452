import fsSync from 'node:fs';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  getGuidancePath,
  getPlanPath,
  getRunPaths,
  parseConfigObject,
  type JobSpec,
  type LoopConfig,
  type TaskDescriptor,
} from '@fixloop/core';
import { listJobResults, listRuns } from '@fixloop/state-db';

import { ConvergenceLoop } from './convergenceLoop.js';
import { FakeLauncher } from './fakeLauncher.js';
import { loadLoopState } from './loopState.js';
import { HarnessMissingError } from './validationHarness.js';

const tasks: TaskDescriptor[] = [
  { identity: 'Alpha', sourceLocation: 'src/Alpha.cs', category: 'parsers', originalIdentity: 'Alpha' },
  { identity: 'Beta', sourceLocation: 'src/Beta.cs', category: 'writers', originalIdentity: 'Beta' },
];

const failingReport = {
  total: 4,
  passed: 3,
  failed: 1,
  failures: [{ name: 'Tests.Alpha.Works', message: 'expected 1' }],
};
const passingReport = { total: 4, passed: 4, failed: 0, failures: [] };

const noSleep = async (): Promise<void> => undefined;

function iterationOf(spec: JobSpec): number {
  const match = /iter-(\d{3})/.exec(spec.logPath);
  return match ? Number(match[1]) : 0;
}

describe('ConvergenceLoop', () => {
  let tmp: string;
  let lines: string[];

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'fixloop-loop-'));
    lines = [];
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  function makeConfig(raw: Record<string, unknown> = {}, maxIterations = 3): LoopConfig {
    return parseConfigObject(
      {
        manifest: 'tasks.json',
        run_dir: 'run',
        workers: 2,
        poll_interval_ms: 1,
        worker: { command: 'worker' },
        validation: { command: 'harness', report_path: 'out/validation.json' },
        ...raw,
      },
      tmp,
      { maxIterations },
    );
  }

  /** Harness stand-in that writes the next scripted report (or nothing, for null). */
  function scriptedHarness(config: LoopConfig, reports: (object | null)[]): FakeLauncher {
    return new FakeLauncher(() => ({
      onLaunch: () => {
        const next = reports.shift();
        if (!next) return;
        fsSync.mkdirSync(path.dirname(config.validation.reportPath), { recursive: true });
        fsSync.writeFileSync(config.validation.reportPath, JSON.stringify(next));
      },
    }));
  }

  /** Worker stand-in; the analysis job writes guidance the way a real worker would. */
  function workers(config: LoopConfig, guidance: string | ((iteration: number) => string) | null = null): FakeLauncher {
    return new FakeLauncher((spec) => ({
      onLaunch: () => {
        if (guidance !== null && spec.label === 'analyze_failures:_analysis') {
          const iteration = iterationOf(spec);
          const target = getGuidancePath(config.runDir, iteration);
          fsSync.mkdirSync(path.dirname(target), { recursive: true });
          fsSync.writeFileSync(target, typeof guidance === 'string' ? guidance : guidance(iteration));
        }
      },
    }));
  }

  function makeLoop(config: LoopConfig, launcher: FakeLauncher, harnessLauncher: FakeLauncher): ConvergenceLoop {
    return new ConvergenceLoop({
      config,
      tasks,
      launcher,
      harnessLauncher,
      history: null,
      sleep: noSleep,
      appendLog: async (line) => {
        lines.push(line);
      },
    });
  }

  it('stops at done(pass) as soon as the first validation passes', async () => {
    const config = makeConfig();
    const launcher = workers(config);
    const harness = scriptedHarness(config, [passingReport]);

    const outcome = await makeLoop(config, launcher, harness).run();

    expect(outcome.outcome).toBe('pass');
    expect(outcome.iteration).toBe(1);
    expect(outcome.validation).toEqual({ total: 4, passed: 4, failed: 0, failedItems: [] });
    expect(launcher.labels()).toEqual([
      'propose_fix:Alpha',
      'propose_fix:Beta',
      'scaffold_checks:_harness',
      'scaffold_checks:Alpha',
      'scaffold_checks:Beta',
      'apply_work:Alpha',
      'apply_work:Beta',
      'verify_work:Alpha',
      'verify_work:Beta',
    ]);
    expect(harness.launched).toHaveLength(1);
  });

  it('re-runs every task in iteration 2 with the guidance from the analysis', async () => {
    const config = makeConfig();
    const launcher = workers(config, 'Fix the parser in Alpha.');
    const harness = scriptedHarness(config, [failingReport, passingReport]);

    const outcome = await makeLoop(config, launcher, harness).run();

    expect(outcome.outcome).toBe('pass');
    expect(outcome.iteration).toBe(2);
    const applied = launcher.launched.filter((s) => s.label.startsWith('apply_work:'));
    expect(applied.map((s) => [s.label, iterationOf(s)])).toEqual([
      ['apply_work:Alpha', 1],
      ['apply_work:Beta', 1],
      ['apply_work:Alpha', 2],
      ['apply_work:Beta', 2],
    ]);
    expect(launcher.labels().filter((l) => l.startsWith('propose_fix:'))).toHaveLength(2);
    expect(launcher.labels().filter((l) => l === 'analyze_failures:_analysis')).toHaveLength(1);

    const second = applied[2];
    expect(second?.payload).toContain('### After iteration 1\n\nFix the parser in Alpha.');
    expect(second?.payload).toContain('- Tests.Alpha.Works: expected 1');
    expect(applied[3]?.payload).toContain('## Failures last reported for this task\n\n(none)');
  });

  it('stops at done(ceiling) exactly at maxIterations and reports the last iteration', async () => {
    const config = makeConfig({}, 2);
    const launcher = workers(config, 'Try again.');
    const harness = scriptedHarness(config, [failingReport, failingReport, passingReport]);

    const outcome = await makeLoop(config, launcher, harness).run();

    expect(outcome.outcome).toBe('ceiling');
    expect(outcome.iteration).toBe(2);
    expect(harness.launched).toHaveLength(2);
    expect(launcher.labels().filter((l) => l === 'analyze_failures:_analysis')).toHaveLength(1);

    expect(outcome.report.iterations.map((r) => r.iteration)).toEqual([1, 2]);
    expect(outcome.report.iterations[1]?.validation?.failed).toBe(1);
    expect(outcome.report.tasks.map((t) => [t.identity, t.verdict])).toEqual([
      ['Alpha', 'fail'],
      ['Beta', 'pass'],
    ]);

    const paths = getRunPaths(config.runDir);
    const markdown = await fs.readFile(paths.reportMarkdown, 'utf-8');
    expect(markdown).toContain('Stopped at the iteration ceiling (2) without converging.');
    const persisted = await loadLoopState(paths.loopState);
    expect(persisted?.state).toEqual({ kind: 'done', iteration: 2, outcome: 'ceiling' });
  });

  it('falls back to generated guidance when the analysis writes none', async () => {
    const config = makeConfig({}, 2);
    const launcher = workers(config);
    const harness = scriptedHarness(config, [failingReport, passingReport]);

    await makeLoop(config, launcher, harness).run();

    const guidance = await fs.readFile(getGuidancePath(config.runDir, 1), 'utf-8');
    expect(guidance).toBe(
      'Validation still failing (total=4 passed=3 failed=1).\n\nAlpha:\n- Tests.Alpha.Works: expected 1\n',
    );
    expect(lines).toContain(
      `[PHASE analyze_failures] Warning: no guidance written to ${getGuidancePath(config.runDir, 1)}; using a summary of the failures`,
    );
  });

  it('treats a missing harness report as an unusable validation', async () => {
    const config = makeConfig({}, 1);
    const outcome = await makeLoop(config, workers(config), scriptedHarness(config, [null])).run();

    expect(outcome.outcome).toBe('ceiling');
    expect(outcome.validation?.total).toBe(0);
    expect(outcome.validation?.failedItems.map((f) => f.name)).toEqual(['validation-harness']);
  });

  it('aborts on a missing harness entry point, finalizes the run and rethrows', async () => {
    const config = makeConfig({
      validation: { command: 'harness', report_path: 'out/validation.json', entry_point: 'harness/run.sh' },
    });
    const harness = scriptedHarness(config, [passingReport]);

    await expect(makeLoop(config, workers(config), harness).run()).rejects.toBeInstanceOf(HarnessMissingError);

    expect(harness.launched).toHaveLength(0);
    const paths = getRunPaths(config.runDir);
    const report: unknown = JSON.parse(await fs.readFile(paths.reportJson, 'utf-8'));
    expect(report).toMatchObject({ outcome: 'aborted', iteration: 1 });
    const persisted = await loadLoopState(paths.loopState);
    expect(persisted?.state).toMatchObject({ kind: 'done', outcome: 'aborted' });
  });

  it('finalizes as aborted when a stop is requested mid-phase', async () => {
    const config = makeConfig();
    const harness = scriptedHarness(config, [passingReport]);
    const launcher = workers(config);
    const loop: ConvergenceLoop = new ConvergenceLoop({
      config,
      tasks,
      launcher,
      harnessLauncher: harness,
      history: null,
      sleep: noSleep,
      appendLog: async (line) => {
        lines.push(line);
      },
      onEvent: (e) => {
        if (e.type === 'job_finished' && e.result.label === 'apply_work:Alpha') loop.requestStop('operator stop');
      },
    });

    const outcome = await loop.run();

    expect(outcome.outcome).toBe('aborted');
    expect(outcome.reason).toBe('operator stop');
    expect(harness.launched).toHaveLength(0);
    expect(outcome.report.iterations[0]?.verify.map((j) => j.status)).toEqual(['cancelled', 'cancelled']);
    expect(lines).toContain('[LOOP] Stopping: operator stop');
  });

  it('skips setup work whose artifacts already exist on iteration 1', async () => {
    const config = makeConfig();
    const paths = getRunPaths(config.runDir);
    await fs.mkdir(paths.plansDir, { recursive: true });
    await fs.writeFile(getPlanPath(config.runDir, 'Alpha'), 'existing plan');
    await fs.mkdir(paths.harnessDir, { recursive: true });
    await fs.writeFile(path.join(paths.harnessDir, 'README.md'), 'harness');

    const launcher = workers(config);
    await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).run();

    expect(launcher.labels().slice(0, 3)).toEqual(['propose_fix:Beta', 'scaffold_checks:Alpha', 'scaffold_checks:Beta']);
    await expect(fs.readFile(getPlanPath(config.runDir, 'Alpha'), 'utf-8')).resolves.toBe('existing plan');
  });

  it('resumes at apply_work of a later iteration without re-running setup', async () => {
    const first = makeConfig({}, 1);
    const firstOutcome = await makeLoop(first, workers(first), scriptedHarness(first, [failingReport])).run();
    expect(firstOutcome.outcome).toBe('ceiling');

    const config = makeConfig({}, 2);
    const launcher = workers(config);
    const outcome = await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).resume('apply_work', 2);

    expect(outcome.runId).toBe(firstOutcome.runId);
    expect(outcome.outcome).toBe('pass');
    expect(outcome.iteration).toBe(2);
    expect(launcher.launched.map((s) => [s.label, iterationOf(s)])).toEqual([
      ['apply_work:Alpha', 2],
      ['apply_work:Beta', 2],
      ['verify_work:Alpha', 2],
      ['verify_work:Beta', 2],
    ]);
    expect(outcome.report.iterations.map((r) => r.iteration)).toEqual([1, 2]);
    expect(launcher.launched[0]?.payload).toContain('- Tests.Alpha.Works: expected 1');
  });

  describe('resume', () => {
    const guidanceFor = (iteration: number): string => `Guidance ${iteration}`;

    /** A finished run that failed validation in every iteration up to `maxIterations`. */
    async function failedRun(maxIterations: number): Promise<string> {
      const config = makeConfig({}, maxIterations);
      const reports = Array.from({ length: maxIterations }, () => failingReport);
      const outcome = await makeLoop(config, workers(config, guidanceFor), scriptedHarness(config, reports)).run();
      expect(outcome.outcome).toBe('ceiling');
      lines = [];
      return outcome.runId;
    }

    function launchedWithIteration(launcher: FakeLauncher): [string, number][] {
      return launcher.launched.map((s) => [s.label, iterationOf(s)]);
    }

    it('regenerates every plan and check when resumed at propose_fix of a later iteration', async () => {
      const runId = await failedRun(2);
      const config = makeConfig({}, 3);
      const paths = getRunPaths(config.runDir);
      await fs.mkdir(paths.plansDir, { recursive: true });
      await fs.writeFile(getPlanPath(config.runDir, 'Alpha'), 'stale plan');
      await fs.mkdir(paths.harnessDir, { recursive: true });
      await fs.writeFile(path.join(paths.harnessDir, 'README.md'), 'stale harness');

      const launcher = workers(config);
      const outcome = await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).resume('propose_fix', 2);

      expect(outcome).toMatchObject({ runId, outcome: 'pass', iteration: 2 });
      expect(launchedWithIteration(launcher)).toEqual([
        ['propose_fix:Alpha', 2],
        ['propose_fix:Beta', 2],
        ['scaffold_checks:_harness', 2],
        ['scaffold_checks:Alpha', 2],
        ['scaffold_checks:Beta', 2],
        ['apply_work:Alpha', 2],
        ['apply_work:Beta', 2],
        ['verify_work:Alpha', 2],
        ['verify_work:Beta', 2],
      ]);
      expect(fsSync.existsSync(getPlanPath(config.runDir, 'Alpha'))).toBe(false);
      expect(fsSync.existsSync(path.join(paths.harnessDir, 'README.md'))).toBe(false);
      expect(outcome.report.iterations.map((r) => [r.iteration, r.validation?.failed])).toEqual([
        [1, 1],
        [2, 0],
      ]);
      expect(lines).toContain('[LOOP] Warning: run was started with max_iterations=2; continuing with 3');
    });

    it('re-runs the harness setup and the checks when resumed at scaffold_checks', async () => {
      await failedRun(2);
      const config = makeConfig({}, 2);
      const launcher = workers(config);

      const outcome = await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).resume('scaffold_checks', 2);

      expect(outcome).toMatchObject({ outcome: 'pass', iteration: 2 });
      expect(launcher.labels()).toEqual([
        'scaffold_checks:_harness',
        'scaffold_checks:Alpha',
        'scaffold_checks:Beta',
        'apply_work:Alpha',
        'apply_work:Beta',
        'verify_work:Alpha',
        'verify_work:Beta',
      ]);
      expect(lines.some((l) => l.startsWith('[LOOP] Warning:'))).toBe(false);
    });

    it('keeps the recorded apply jobs and drops later iterations when resumed at verify_work', async () => {
      await failedRun(3);
      const config = makeConfig({}, 3);
      const launcher = workers(config);

      const outcome = await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).resume('verify_work', 2);

      expect(outcome).toMatchObject({ outcome: 'pass', iteration: 2 });
      expect(launchedWithIteration(launcher)).toEqual([
        ['verify_work:Alpha', 2],
        ['verify_work:Beta', 2],
      ]);
      expect(outcome.report.iterations.map((r) => r.iteration)).toEqual([1, 2]);
      expect(outcome.report.iterations[1]?.apply.map((j) => j.label)).toEqual(['apply_work:Alpha', 'apply_work:Beta']);
      expect(outcome.report.iterations[1]?.validation?.failed).toBe(0);

      const persisted = await loadLoopState(getRunPaths(config.runDir).loopState);
      expect(persisted?.context.guidance).toEqual(['Guidance 1']);
    });

    it('only re-runs the harness when resumed at run_validation', async () => {
      await failedRun(2);
      const config = makeConfig({}, 2);
      const launcher = workers(config);
      const harness = scriptedHarness(config, [passingReport]);

      const outcome = await makeLoop(config, launcher, harness).resume('run_validation', 2);

      expect(outcome).toMatchObject({ outcome: 'pass', iteration: 2 });
      expect(launcher.launched).toHaveLength(0);
      expect(harness.launched).toHaveLength(1);
      expect(outcome.report.iterations[1]?.verify.map((j) => j.status)).toEqual(['passed', 'passed']);
    });

    it('analyzes the recorded failures and carries both guidance texts into the next iteration', async () => {
      await failedRun(2);
      const config = makeConfig({}, 3);
      const launcher = workers(config, guidanceFor);

      const outcome = await makeLoop(config, launcher, scriptedHarness(config, [passingReport])).resume('analyze_failures', 2);

      expect(outcome).toMatchObject({ outcome: 'pass', iteration: 3 });
      expect(launchedWithIteration(launcher)).toEqual([
        ['analyze_failures:_analysis', 2],
        ['apply_work:Alpha', 3],
        ['apply_work:Beta', 3],
        ['verify_work:Alpha', 3],
        ['verify_work:Beta', 3],
      ]);
      const payload = launcher.launched[1]?.payload ?? '';
      expect(payload).toContain('### After iteration 1\n\nGuidance 1\n\n### After iteration 2\n\nGuidance 2');
      expect(outcome.report.iterations.map((r) => r.iteration)).toEqual([1, 2, 3]);
      expect(outcome.report.iterations[1]?.guidancePath).toBe(getGuidancePath(config.runDir, 2));
    });

    it('refuses to resume a run that was started from another manifest', async () => {
      await failedRun(2);
      const config = makeConfig({ manifest: 'other-tasks.json' }, 2);
      const launcher = workers(config);

      await expect(
        makeLoop(config, launcher, scriptedHarness(config, [])).resume('apply_work', 2),
      ).rejects.toMatchObject({
        name: 'LoopStateError',
        code: 'INVALID_RESUME',
        details: { persistedManifest: path.join(tmp, 'tasks.json'), manifest: path.join(tmp, 'other-tasks.json') },
      });
      expect(launcher.launched).toHaveLength(0);
    });
  });

  it('refuses to resume when the run directory holds no loop state', async () => {
    const config = makeConfig();
    await expect(makeLoop(config, workers(config), scriptedHarness(config, [])).resume('apply_work', 1)).rejects.toMatchObject(
      { code: 'INVALID_RESUME' },
    );
  });

  it('records the run, its iterations and job results in the history database', async () => {
    const config = makeConfig();
    const loop = new ConvergenceLoop({
      config,
      tasks,
      launcher: workers(config),
      harnessLauncher: scriptedHarness(config, [passingReport]),
      sleep: noSleep,
      appendLog: async () => undefined,
    });

    const outcome = await loop.run();

    const dbPath = getRunPaths(config.runDir).historyDb;
    expect(listRuns(dbPath)).toMatchObject([{ runId: outcome.runId, outcome: 'pass', lastIteration: 1, taskCount: 2 }]);
    const applied = listJobResults(dbPath, { runId: outcome.runId, phase: 'apply_work' });
    expect(applied.map((r) => [r.identity, r.status])).toEqual([
      ['Alpha', 'passed'],
      ['Beta', 'passed'],
    ]);
  });
});
