import type { TaskDescriptor } from './manifest.js';
import type { ValidationResult } from './validation.js';

export const phaseNames = [
  'propose_fix',
  'scaffold_checks',
  'apply_work',
  'verify_work',
  'run_validation',
  'analyze_failures',
] as const;
export type PhaseName = (typeof phaseNames)[number];

/** Phases run once, before the first iteration. */
export const setupPhases = ['propose_fix', 'scaffold_checks'] as const;
export type SetupPhase = (typeof setupPhases)[number];

/** Per-task phases re-run over the full queue on every iteration. */
export const workPhases = ['apply_work', 'verify_work'] as const;
export type WorkPhase = (typeof workPhases)[number];

export function isPhaseName(value: unknown): value is PhaseName {
  return typeof value === 'string' && (phaseNames as readonly string[]).includes(value);
}

export function parsePhaseName(value: string): PhaseName {
  const lowered = value.trim().toLowerCase().replace(/-/g, '_');
  if (isPhaseName(lowered)) return lowered;
  throw new Error(`Unknown phase '${value}'. must be one of: ${phaseNames.join(', ')}`);
}

/** Input handed to one external worker invocation. */
export type JobSpec = Readonly<{
  payload: string;
  workingDirectory: string;
  logPath: string;
  label: string;
  extraContext: readonly string[];
}>;

/**
 * Everything a phase's builders may read. Threaded through the loop by value and
 * persisted with the loop state so a resumed run sees the same lineage.
 */
export type PhaseContext = Readonly<{
  runId: string;
  runDir: string;
  iteration: number;
  phase: PhaseName;
  /** task identity -> plan artifact path */
  plans: Readonly<Record<string, string>>;
  /** task identity -> check artifact path */
  checks: Readonly<Record<string, string>>;
  harnessPath: string | null;
  /** Guidance text produced by each analyze_failures run, oldest first. */
  guidance: readonly string[];
  previousValidation: ValidationResult | null;
}>;

export type JobSpecBuilder = (task: TaskDescriptor, context: PhaseContext) => JobSpec;

export function withPhase(context: PhaseContext, phase: PhaseName): PhaseContext {
  return { ...context, phase };
}

export function createInitialContext(params: { runId: string; runDir: string }): PhaseContext {
  return {
    runId: params.runId,
    runDir: params.runDir,
    iteration: 1,
    phase: 'propose_fix',
    plans: {},
    checks: {},
    harnessPath: null,
    guidance: [],
    previousValidation: null,
  };
}
