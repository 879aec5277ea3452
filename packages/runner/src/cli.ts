import path from 'node:path';
import { parseArgs } from 'node:util';

import {
  describeLoopState,
  formatValidationCounts,
  getRunPaths,
  loadConfigFromFile,
  loadManifest,
  parsePhaseName,
  resolveConfigPath,
  validateMaxIterations,
  validateWorkers,
  type ConfigOverrides,
} from '@fixloop/core';
import { listIterations, listRuns, readRun, type StoredRun } from '@fixloop/state-db';

import { ConvergenceLoop, type LoopOutcome } from './convergenceLoop.js';
import { loadLoopState } from './loopState.js';
import { createRunLog } from './runLog.js';

export type CliIo = Readonly<{
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
}>;

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
  env: process.env,
  cwd: process.cwd(),
};

/** Exit codes: converged, hit the ceiling, aborted. Fatal errors propagate and exit with 1. */
export const EXIT_PASS = 0;
export const EXIT_ABORTED = 1;
export const EXIT_CEILING = 2;

function usage(): string {
  return [
    'Usage:',
    '  fixloop run [--config <file>] [--workers <n>] [--max-iterations <n>] [--model <name>] [--run-dir <dir>] [--job-timeout-sec <s>] [--quiet]',
    '  fixloop resume --from-phase <phase> --iteration <n> [--config <file>] [overrides as for run]',
    '  fixloop status [--config <file> | --run-dir <dir>]',
    '  fixloop history [--config <file> | --run-dir <dir>] [--run <runId>]',
    '',
    'Notes:',
    '  - The config file defaults to $FIXLOOP_CONFIG, then ./fixloop.yaml.',
    '  - FIXLOOP_MODEL overrides the configured model; --model overrides both.',
    '  - Phases: propose_fix, scaffold_checks, apply_work, verify_work, run_validation, analyze_failures.',
  ].join('\n');
}

const options = {
  config: { type: 'string' },
  workers: { type: 'string' },
  'max-iterations': { type: 'string' },
  model: { type: 'string' },
  'run-dir': { type: 'string' },
  'job-timeout-sec': { type: 'string' },
  'from-phase': { type: 'string' },
  iteration: { type: 'string' },
  run: { type: 'string' },
  quiet: { type: 'boolean' },
  help: { type: 'boolean' },
} as const;

export type CliValues = ReturnType<typeof parseCliArgs>['values'];

export function parseCliArgs(args: string[]) {
  return parseArgs({ args, options, allowPositionals: true, strict: true });
}

function parsePositiveSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new Error(`--job-timeout-sec must be a positive number (got ${value})`);
  return n;
}

export function overridesFromArgs(values: CliValues, env: NodeJS.ProcessEnv): ConfigOverrides {
  const model = values.model ?? env.FIXLOOP_MODEL;
  return {
    ...(values.workers !== undefined ? { workers: validateWorkers(values.workers) } : {}),
    ...(values['max-iterations'] !== undefined ? { maxIterations: validateMaxIterations(values['max-iterations']) } : {}),
    ...(model && model.trim() ? { model: model.trim() } : {}),
    ...(values['run-dir'] !== undefined ? { runDir: values['run-dir'] } : {}),
    ...(values['job-timeout-sec'] !== undefined ? { jobTimeoutSec: parsePositiveSeconds(values['job-timeout-sec']) } : {}),
  };
}

function exitCodeFor(outcome: LoopOutcome): number {
  switch (outcome.outcome) {
    case 'pass':
      return EXIT_PASS;
    case 'ceiling':
      return EXIT_CEILING;
    case 'aborted':
      return EXIT_ABORTED;
  }
}

async function runLoop(values: CliValues, io: CliIo, resumeAt: { phase: string; iteration: string } | null): Promise<number> {
  const configPath = resolveConfigPath(values.config, io.env, io.cwd);
  const config = await loadConfigFromFile(configPath, overridesFromArgs(values, io.env));
  const tasks = await loadManifest(config.manifestPath);
  const appendLog = createRunLog(getRunPaths(config.runDir).runLog, { echo: values.quiet ? undefined : io.stderr });

  const loop = new ConvergenceLoop({ config, tasks, appendLog });
  const onSignal = (signal: NodeJS.Signals): void => {
    io.stderr(`[LOOP] Received ${signal}; stopping workers`);
    loop.requestStop(`received ${signal}`);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  let outcome: LoopOutcome;
  try {
    if (resumeAt) {
      const iteration = Number(resumeAt.iteration);
      outcome = await loop.resume(parsePhaseName(resumeAt.phase), iteration);
    } else {
      outcome = await loop.run();
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }

  const counts = outcome.validation ? formatValidationCounts(outcome.validation) : 'no validation';
  io.stdout(`Run ${outcome.runId}: ${outcome.outcome} at iteration ${outcome.iteration} (${counts})`);
  io.stdout(`Report: ${getRunPaths(config.runDir).reportMarkdown}`);
  return exitCodeFor(outcome);
}

async function resolveRunDir(values: CliValues, io: CliIo): Promise<string> {
  if (values['run-dir']) return path.resolve(io.cwd, values['run-dir']);
  const config = await loadConfigFromFile(resolveConfigPath(values.config, io.env, io.cwd));
  return config.runDir;
}

async function showStatus(values: CliValues, io: CliIo): Promise<number> {
  const runDir = await resolveRunDir(values, io);
  const paths = getRunPaths(runDir);
  const persisted = await loadLoopState(paths.loopState);
  if (!persisted) {
    io.stdout(`No loop state in ${runDir}`);
    return 1;
  }

  const lastValidated = [...persisted.iterations].reverse().find((r) => r.validation !== null);
  io.stdout(`Run: ${persisted.runId}`);
  io.stdout(`State: ${describeLoopState(persisted.state)}`);
  io.stdout(`Iteration: ${persisted.state.iteration} of ${persisted.maxIterations}`);
  io.stdout(
    `Artifacts: ${Object.keys(persisted.context.plans).length} plan(s), ${Object.keys(persisted.context.checks).length} check(s), ${persisted.context.guidance.length} guidance file(s)`,
  );
  io.stdout(
    `Last validation: ${lastValidated?.validation ? `${formatValidationCounts(lastValidated.validation)} (iteration ${lastValidated.iteration})` : 'none'}`,
  );
  io.stdout(`Updated: ${persisted.updatedAt}`);
  return 0;
}

function formatRun(run: StoredRun): string {
  return `${run.runId}  ${run.outcome}  iterations=${run.lastIteration}/${run.maxIterations}  tasks=${run.taskCount}  started=${run.startedAt}`;
}

async function showHistory(values: CliValues, io: CliIo): Promise<number> {
  const runDir = await resolveRunDir(values, io);
  const dbPath = getRunPaths(runDir).historyDb;

  if (values.run) {
    const run = readRun(dbPath, values.run);
    if (!run) {
      io.stdout(`No run ${values.run} recorded in ${dbPath}`);
      return 1;
    }
    io.stdout(formatRun(run));
    const iterations = listIterations(dbPath, values.run);
    if (iterations.length === 0) {
      io.stdout(`No iterations recorded for run ${values.run}`);
      return 0;
    }
    for (const it of iterations) {
      io.stdout(`iteration ${it.iteration}: total=${it.total} passed=${it.passed} failed=${it.failed}`);
    }
    return 0;
  }

  const runs = listRuns(dbPath);
  if (runs.length === 0) {
    io.stdout(`No runs recorded in ${dbPath}`);
    return 0;
  }
  for (const run of runs) io.stdout(formatRun(run));
  return 0;
}

export async function main(argv: string[], io: CliIo = defaultIo): Promise<number> {
  const [command, ...rest] = argv;
  const { values } = parseCliArgs(rest);

  if (values.help || command === 'help' || command === '--help' || command === undefined) {
    io.stdout(usage());
    return 0;
  }

  switch (command) {
    case 'run':
      return runLoop(values, io, null);
    case 'resume': {
      const phase = values['from-phase'];
      const iteration = values.iteration;
      if (!phase || !iteration) throw new Error(`resume needs --from-phase and --iteration\n\n${usage()}`);
      return runLoop(values, io, { phase, iteration });
    }
    case 'status':
      return showStatus(values, io);
    case 'history':
      return showHistory(values, io);
    default:
      throw new Error(`Unknown command: ${command}\n\n${usage()}`);
  }
}

// No side-effectful entrypoint here; see `src/bin.ts`.
