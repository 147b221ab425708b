import { EngineError, EngineErrorCode } from '../errors';
import type { CommitPhase } from './types';

const TRANSITIONS: Readonly<Record<CommitPhase, readonly CommitPhase[]>> = {
  staging: ['validating'],
  validating: ['applied', 'rejected'],
  applied: ['staging'],
  rejected: ['staging'],
};

export function canTransition(from: CommitPhase, to: CommitPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Tracks one commit attempt through its phases.
 *
 * @throws EngineError FSM_INVALID_TRANSITION on a transition the table does
 *   not allow
 */
export class CommitPhaseMachine {
  private current: CommitPhase = 'staging';
  private readonly trail: CommitPhase[] = ['staging'];

  get phase(): CommitPhase {
    return this.current;
  }

  get phases(): ReadonlyArray<CommitPhase> {
    return this.trail;
  }

  transition(to: CommitPhase): void {
    if (!canTransition(this.current, to)) {
      throw new EngineError(
        EngineErrorCode.FSM_INVALID_TRANSITION,
        `Invalid commit transition ${this.current} -> ${to}`,
        { from: this.current, to },
        'CommitOrchestrator'
      );
    }
    this.current = to;
    this.trail.push(to);
  }
}
