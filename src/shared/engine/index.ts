// =============================================================================
// QUANTUM SPACETIME SHOGI RULES ENGINE - PUBLIC API
// =============================================================================
// Hosts (session wrappers, front ends) should only import from this file.
//
// - PURE: functional operations take a GameState and return a new one
// - STRUCTURED: rule violations come back as ValidationOutcome values;
//   only broken invariants and bad configuration throw EngineError
// =============================================================================

// =============================================================================
// CORE TYPES
// =============================================================================

export type {
  Board,
  CandidateSet,
  CheckAttackMode,
  HandMode,
  MoveMode,
  MovePlan,
  Piece,
  PieceType,
  Player,
  Position,
  Settings,
  Snapshot,
  Square,
  TimeDirectionPolicy,
  WorldLine,
} from '../types/game';

export {
  BOARD_SIZE,
  PIECE_LIMITS,
  PIECE_TYPES,
  PLAYERS,
  forwardSign,
  opposite,
} from '../types/game';

export type {
  Displacement,
  ExecutionContext,
  GameState,
  MoveApplication,
  ValidationFailure,
  ValidationOutcome,
  WorldSummary,
} from './types';

export { ValidationErrorCode, invalidOutcome, isValidOutcome, validOutcome } from './types';

// =============================================================================
// CANDIDATE SETS & SNAPSHOTS
// =============================================================================

export {
  ALL_CANDIDATES,
  EMPTY_CANDIDATES,
  candidateCount,
  candidateSetOf,
  candidateTypes,
  filterCandidates,
  hasCandidate,
  isSingletonOf,
  singletonOf,
  withoutCandidate,
} from './candidates';

export {
  boardPieces,
  cloneSnapshot,
  createEmptySnapshot,
  getSquare,
  kingCandidates,
  presentOf,
  presentTime,
  setSquare,
  snapshotPieceIds,
  sortedWorldIds,
} from './core';

// =============================================================================
// SETUP & CONFIGURATION
// =============================================================================

export { DEFAULT_SETTINGS, MAX_COLLAPSE_PASSES, createSettings } from './rulesConfig';
export { createInitialGameState } from './initialState';
export { parseMovePlan, parseSettings } from '../validation/schemas';
export type { SchemaIssue, SchemaParseResult } from '../validation/schemas';

// =============================================================================
// LEGALITY
// =============================================================================

export { displacementBetween, filterMoveCandidates, typeAllows } from './validators/MovementValidator';
export { dropAllows, filterDropCandidates } from './validators/DropValidator';
export { validateTimeline } from './validators/TimelineValidator';
export type { TimelineResolution } from './validators/TimelineValidator';

// =============================================================================
// TURN PROCESSING
// =============================================================================

export { mutateClearStaged, mutateStage } from './mutators/StagingMutator';
export { commitTurn, CommitPhaseMachine, canTransition } from './orchestration';
export type {
  CommitPhase,
  CommitSummary,
  CommitTurnResult,
  WorldCommitRecord,
} from './orchestration';
export { collapseByCount } from './collapseLogic';
export type { CollapseResult } from './collapseLogic';
export { isKingKnown, isWorldLost } from './victoryLogic';

// =============================================================================
// QUERIES & TEXT
// =============================================================================

export {
  getPresent,
  getWorld,
  globalHandInventory,
  handInventory,
  summarizeWorlds,
} from './worldStateHelpers';
export {
  EMPTY_CELL_LABEL,
  candidateLabel,
  cellLabel,
  describePlan,
  pieceLabel,
  playerLabel,
} from './notation';

// =============================================================================
// FACADE & ERRORS
// =============================================================================

export { GameEngine } from './GameEngine';
export {
  BoardConstraintViolation,
  EngineError,
  EngineErrorCode,
  InvalidSettings,
  InvalidState,
  entityNotFound,
  isBoardConstraintViolation,
  isEngineError,
  isInvalidSettings,
  isInvalidState,
  wrapEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';
