/**
 * ═══════════════════════════════════════════════════════════════════════════
 * Commit Orchestration Module
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Public API:
 * - commitTurn: resolve every world's staged plan as one turn
 * - CommitPhaseMachine / canTransition: phase bookkeeping for a commit
 */

export { commitTurn } from './commitOrchestrator';
export { CommitPhaseMachine, canTransition } from './commitPhaseMachine';

export type {
  CommitPhase,
  CommitSummary,
  CommitTurnResult,
  WorldCommitRecord,
} from './types';
