/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Commit Orchestration Types
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Types for the simultaneous multi-world commit.
 */

import type { GameState, MoveApplication, ValidationOutcome } from '../types';

/**
 * Phases of one commit attempt. Between attempts the engine rests in
 * `staging`.
 */
export type CommitPhase = 'staging' | 'validating' | 'applied' | 'rejected';

/**
 * What happened in one world during a successful commit.
 */
export interface WorldCommitRecord {
  readonly worldId: number;
  /** World that received the arrival (a new world when branching). */
  readonly targetWorldId: number;
  readonly branching: boolean;
  readonly application: MoveApplication;
}

export interface CommitSummary {
  /** Turn number after the commit. */
  readonly turnNumber: number;
  readonly records: ReadonlyArray<WorldCommitRecord>;
  readonly createdWorlds: ReadonlyArray<number>;
  readonly lostWorlds: ReadonlyArray<number>;
  readonly collapsedPieces: number;
}

/**
 * Result of a commit attempt. On rejection `nextState` carries the input
 * state's worlds untouched, with only the status message replaced.
 */
export interface CommitTurnResult {
  readonly nextState: GameState;
  readonly outcome: ValidationOutcome<CommitSummary>;
  /** Phases traversed, starting from `staging`. */
  readonly phases: ReadonlyArray<CommitPhase>;
  /** World whose plan failed, when the failure is attributable to one. */
  readonly failedWorldId?: number;
}
