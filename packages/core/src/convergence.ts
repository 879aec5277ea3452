import type { SetupPhase, WorkPhase, PhaseName } from './phases.js';
import { isConverged, type ValidationResult } from './validation.js';

export type DoneOutcome = 'pass' | 'ceiling' | 'aborted';

export type LoopState =
  | Readonly<{ kind: 'setup'; iteration: number; startPhase: SetupPhase }>
  | Readonly<{ kind: 'working'; iteration: number; startPhase: WorkPhase }>
  | Readonly<{ kind: 'evaluating'; iteration: number }>
  | Readonly<{ kind: 'analyzing'; iteration: number }>
  | Readonly<{ kind: 'done'; iteration: number; outcome: DoneOutcome; reason?: string }>;

export type LoopEvent =
  | Readonly<{ type: 'setup_complete' }>
  | Readonly<{ type: 'work_complete' }>
  | Readonly<{ type: 'validated'; validation: ValidationResult }>
  | Readonly<{ type: 'analysis_complete' }>
  | Readonly<{ type: 'abort'; reason: string }>;

export type LoopStateErrorCode = 'INVALID_TRANSITION' | 'INVALID_RESUME' | 'INVALID_CEILING';

export class LoopStateError extends Error {
  constructor(
    message: string,
    public readonly code: LoopStateErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'LoopStateError';
  }
}

export function isDone(state: LoopState): state is Extract<LoopState, { kind: 'done' }> {
  return state.kind === 'done';
}

export function describeLoopState(state: LoopState): string {
  switch (state.kind) {
    case 'setup':
      return `setup (from ${state.startPhase})`;
    case 'working':
      return `working(${state.iteration}) from ${state.startPhase}`;
    case 'evaluating':
      return `evaluating(${state.iteration})`;
    case 'analyzing':
      return `analyzing(${state.iteration})`;
    case 'done':
      return `done(${state.outcome}) at iteration ${state.iteration}`;
  }
}

/**
 * Transition rules of the repair loop:
 *
 *   setup -> working(i) -> evaluating(i) -> analyzing(i) -> working(i+1)
 *                                      \-> done(pass) | done(ceiling)
 *
 * Any non-terminal state may be aborted.
 */
export class ConvergenceEngine {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new LoopStateError(`maxIterations must be a positive integer (got ${maxIterations})`, 'INVALID_CEILING', {
        maxIterations,
      });
    }
    this.maxIterations = maxIterations;
  }

  getStartState(): LoopState {
    return { kind: 'setup', iteration: 1, startPhase: 'propose_fix' };
  }

  /**
   * State for re-entering the loop at `phase` of `iteration`.
   * Setup phases resumed at iteration > 1 regenerate their artifacts before working(iteration).
   */
  getResumeState(phase: PhaseName, iteration: number): LoopState {
    if (!Number.isInteger(iteration) || iteration < 1 || iteration > this.maxIterations) {
      throw new LoopStateError(
        `Cannot resume at iteration ${iteration}: must be between 1 and ${this.maxIterations}`,
        'INVALID_RESUME',
        { phase, iteration },
      );
    }
    switch (phase) {
      case 'propose_fix':
      case 'scaffold_checks':
        return { kind: 'setup', iteration, startPhase: phase };
      case 'apply_work':
      case 'verify_work':
        return { kind: 'working', iteration, startPhase: phase };
      case 'run_validation':
        return { kind: 'evaluating', iteration };
      case 'analyze_failures':
        if (iteration >= this.maxIterations) {
          throw new LoopStateError(
            `Cannot resume analyze_failures at iteration ${iteration}: the ceiling is reached after validation`,
            'INVALID_RESUME',
            { phase, iteration },
          );
        }
        return { kind: 'analyzing', iteration };
    }
  }

  next(state: LoopState, event: LoopEvent): LoopState {
    if (state.kind === 'done') {
      throw new LoopStateError(`Loop already finished (${describeLoopState(state)})`, 'INVALID_TRANSITION', {
        state: state.kind,
        event: event.type,
      });
    }

    if (event.type === 'abort') {
      return { kind: 'done', iteration: state.iteration, outcome: 'aborted', reason: event.reason };
    }

    switch (state.kind) {
      case 'setup':
        if (event.type === 'setup_complete') {
          return { kind: 'working', iteration: state.iteration, startPhase: 'apply_work' };
        }
        break;
      case 'working':
        if (event.type === 'work_complete') return { kind: 'evaluating', iteration: state.iteration };
        break;
      case 'evaluating':
        if (event.type === 'validated') {
          if (isConverged(event.validation)) return { kind: 'done', iteration: state.iteration, outcome: 'pass' };
          if (state.iteration >= this.maxIterations) {
            return { kind: 'done', iteration: state.iteration, outcome: 'ceiling' };
          }
          return { kind: 'analyzing', iteration: state.iteration };
        }
        break;
      case 'analyzing':
        if (event.type === 'analysis_complete') {
          return { kind: 'working', iteration: state.iteration + 1, startPhase: 'apply_work' };
        }
        break;
    }

    throw new LoopStateError(
      `Event '${event.type}' is not valid in state ${describeLoopState(state)}`,
      'INVALID_TRANSITION',
      { state: state.kind, event: event.type },
    );
  }
}
