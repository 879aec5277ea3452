import { describe, expect, it } from 'vitest';

import { ConvergenceEngine, describeLoopState, LoopStateError, type LoopState } from './convergence.js';
import type { ValidationResult } from './validation.js';

const failing: ValidationResult = { total: 10, passed: 7, failed: 3, failedItems: [] };
const passing: ValidationResult = { total: 10, passed: 10, failed: 0, failedItems: [] };
const empty: ValidationResult = { total: 0, passed: 0, failed: 0, failedItems: [] };

function runToEnd(engine: ConvergenceEngine, validations: ValidationResult[]): LoopState[] {
  const visited: LoopState[] = [];
  let state = engine.getStartState();
  let v = 0;
  while (state.kind !== 'done') {
    visited.push(state);
    switch (state.kind) {
      case 'setup':
        state = engine.next(state, { type: 'setup_complete' });
        break;
      case 'working':
        state = engine.next(state, { type: 'work_complete' });
        break;
      case 'evaluating':
        state = engine.next(state, { type: 'validated', validation: validations[v] ?? failing });
        v += 1;
        break;
      case 'analyzing':
        state = engine.next(state, { type: 'analysis_complete' });
        break;
    }
  }
  visited.push(state);
  return visited;
}

describe('ConvergenceEngine', () => {
  it('rejects a non-positive ceiling', () => {
    expect(() => new ConvergenceEngine(0)).toThrow(LoopStateError);
  });

  it('stops with pass as soon as validation converges', () => {
    const states = runToEnd(new ConvergenceEngine(5), [failing, passing]);
    expect(states.map(describeLoopState)).toEqual([
      'setup (from propose_fix)',
      'working(1) from apply_work',
      'evaluating(1)',
      'analyzing(1)',
      'working(2) from apply_work',
      'evaluating(2)',
      'done(pass) at iteration 2',
    ]);
  });

  it('hits the ceiling exactly at maxIterations', () => {
    const states = runToEnd(new ConvergenceEngine(3), [failing, failing, failing]);
    const last = states[states.length - 1];
    expect(last).toEqual({ kind: 'done', iteration: 3, outcome: 'ceiling' });
    expect(states.filter((s) => s.kind === 'working')).toHaveLength(3);
    expect(states.filter((s) => s.kind === 'analyzing')).toHaveLength(2);
  });

  it('does not treat an empty report as a pass', () => {
    const engine = new ConvergenceEngine(2);
    expect(engine.next({ kind: 'evaluating', iteration: 1 }, { type: 'validated', validation: empty })).toEqual({
      kind: 'analyzing',
      iteration: 1,
    });
  });

  it('passes on the last iteration rather than reporting the ceiling', () => {
    const engine = new ConvergenceEngine(1);
    expect(engine.next({ kind: 'evaluating', iteration: 1 }, { type: 'validated', validation: passing })).toEqual({
      kind: 'done',
      iteration: 1,
      outcome: 'pass',
    });
  });

  it('aborts from any running state', () => {
    const engine = new ConvergenceEngine(3);
    expect(engine.next({ kind: 'working', iteration: 2, startPhase: 'verify_work' }, { type: 'abort', reason: 'stop' })).toEqual({
      kind: 'done',
      iteration: 2,
      outcome: 'aborted',
      reason: 'stop',
    });
  });

  it('rejects events that do not belong to the state', () => {
    const engine = new ConvergenceEngine(3);
    try {
      engine.next({ kind: 'working', iteration: 1, startPhase: 'apply_work' }, { type: 'analysis_complete' });
      expect.unreachable('expected LoopStateError');
    } catch (e) {
      expect(e).toBeInstanceOf(LoopStateError);
      expect((e as LoopStateError).code).toBe('INVALID_TRANSITION');
    }
    expect(() => engine.next({ kind: 'done', iteration: 1, outcome: 'pass' }, { type: 'work_complete' })).toThrow(
      'Loop already finished',
    );
  });

  describe('getResumeState', () => {
    const engine = new ConvergenceEngine(3);

    it('maps each phase onto its state', () => {
      expect(engine.getResumeState('scaffold_checks', 1)).toEqual({ kind: 'setup', iteration: 1, startPhase: 'scaffold_checks' });
      expect(engine.getResumeState('verify_work', 2)).toEqual({ kind: 'working', iteration: 2, startPhase: 'verify_work' });
      expect(engine.getResumeState('run_validation', 3)).toEqual({ kind: 'evaluating', iteration: 3 });
      expect(engine.getResumeState('analyze_failures', 2)).toEqual({ kind: 'analyzing', iteration: 2 });
    });

    it('continues setup resumed at a later iteration into that iteration', () => {
      const state = engine.getResumeState('propose_fix', 2);
      expect(engine.next(state, { type: 'setup_complete' })).toEqual({ kind: 'working', iteration: 2, startPhase: 'apply_work' });
    });

    it('rejects iterations outside the ceiling', () => {
      expect(() => engine.getResumeState('apply_work', 4)).toThrow('must be between 1 and 3');
      expect(() => engine.getResumeState('analyze_failures', 3)).toThrow('the ceiling is reached');
    });
  });
});
