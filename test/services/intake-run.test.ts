import { describe, it, expect } from 'vitest';
import { IntakeRun, VALID_TRANSITIONS, isTerminalState } from '../../src/services/intake/index.js';
import { INTAKE_STATES } from '../../src/domain/types.js';
import { logger } from '../../src/infrastructure/logger.js';

describe('IntakeRun', () => {
  it('starts detected and walks the happy path to done', () => {
    const run = new IntakeRun(logger);
    expect(run.state).toBe('detected');

    for (const state of ['stabilizing', 'preparing', 'querying', 'sanitizing', 'renaming', 'done'] as const) {
      expect(run.transition(state)).toEqual({ ok: true, value: state });
    }
    expect(run.state).toBe('done');
  });

  it('can abort from any non-terminal state', () => {
    for (const state of INTAKE_STATES) {
      if (isTerminalState(state)) continue;
      expect(VALID_TRANSITIONS[state].has('aborted')).toBe(true);
    }
  });

  it('refuses to skip or revisit a state', () => {
    const run = new IntakeRun(logger);
    run.transition('stabilizing');

    const skipped = run.transition('querying');
    expect(skipped.ok).toBe(false);
    if (!skipped.ok) expect(skipped.error.code).toBe('INVALID_STATE_TRANSITION');

    run.transition('preparing');
    expect(run.transition('stabilizing').ok).toBe(false);
    expect(run.state).toBe('preparing');
  });

  it('does not leave a terminal state', () => {
    const run = new IntakeRun(logger);
    run.transition('aborted');

    expect(run.transition('stabilizing').ok).toBe(false);
    expect(run.state).toBe('aborted');
  });
});
