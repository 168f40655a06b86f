import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import type { IntakeState } from '../../domain/types.js';
import type { Logger } from '../../infrastructure/logger.js';
import { VALID_TRANSITIONS } from './types.js';

/** State of a single pipeline run; owned by that run only. */
export class IntakeRun {
  private current: IntakeState = 'detected';
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  get state(): IntakeState {
    return this.current;
  }

  transition(toState: IntakeState): Result<IntakeState, AppError> {
    const fromState = this.current;
    if (!VALID_TRANSITIONS[fromState].has(toState)) {
      this.log.warn({ fromState, toState }, 'Invalid state transition attempted');
      return err(
        createAppError(
          ErrorCode.INVALID_STATE_TRANSITION,
          `Cannot transition from '${fromState}' to '${toState}'`,
          false,
        ),
      );
    }

    this.current = toState;
    this.log.debug({ fromState, toState }, 'Intake state transition');
    return ok(toState);
  }
}
