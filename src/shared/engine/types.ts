import {
  CandidateSet,
  MovePlan,
  Piece,
  PieceType,
  Player,
  Position,
  Settings,
  Snapshot,
  WorldLine,
} from '../types/game';

// Re-export types used in the engine interface
export type { CandidateSet, MovePlan, Piece, PieceType, Player, Position, Settings, Snapshot, WorldLine };

/**
 * The whole game, passed explicitly to every engine operation.
 *
 * Treated as immutable by the engine: operations that change the game
 * return a new GameState and leave their input untouched, so a rejected
 * commit simply hands back the state it was given.
 */
export interface GameState {
  readonly id: string;
  readonly settings: Settings;
  /** Keyed by world id. */
  readonly worlds: ReadonlyMap<number, WorldLine>;
  /** Player to move in every world this turn. */
  readonly turn: Player;
  /** Number of committed turns so far. */
  readonly turnNumber: number;
  /** Human-readable status of the last staging/commit action. */
  readonly message: string;
  /** Next unused piece id. */
  readonly nextPieceId: number;
}

/**
 * (dx, dy, dw, dt) of a candidate move.
 */
export interface Displacement {
  readonly dx: number;
  readonly dy: number;
  readonly dw: number;
  readonly dt: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION OUTCOME
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Rejection codes surfaced to front ends.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR
 * - TIME_*: time-axis checks
 * - WORLD_*: world-axis checks
 * - MOVE_*: origin/destination checks for piece moves
 * - DROP_*: hand/drop checks
 * - CANDIDATE_*: quantum identity filtering
 * - COMMIT_*: whole-turn checks
 */
export enum ValidationErrorCode {
  // Time axis
  TIME_FUTURE_MOVE_FORBIDDEN = 'TIME_FUTURE_MOVE_FORBIDDEN',
  TIME_JUMP_TOO_LARGE = 'TIME_JUMP_TOO_LARGE',
  TIME_HISTORY_OUT_OF_RANGE = 'TIME_HISTORY_OUT_OF_RANGE',

  // World axis
  WORLD_LIMIT_REACHED = 'WORLD_LIMIT_REACHED',
  WORLD_ID_COLLISION = 'WORLD_ID_COLLISION',
  WORLD_INVALID_OFFSET = 'WORLD_INVALID_OFFSET',

  // Moves
  MOVE_OFF_BOARD = 'MOVE_OFF_BOARD',
  MOVE_DESTINATION_OWN_PIECE = 'MOVE_DESTINATION_OWN_PIECE',
  MOVE_EMPTY_ORIGIN = 'MOVE_EMPTY_ORIGIN',
  MOVE_NOT_OWNERS_PIECE = 'MOVE_NOT_OWNERS_PIECE',

  // Drops
  DROP_DESTINATION_OCCUPIED = 'DROP_DESTINATION_OCCUPIED',
  DROP_INVALID_HAND_INDEX = 'DROP_INVALID_HAND_INDEX',

  // Quantum identity
  CANDIDATE_NONE_LEGAL = 'CANDIDATE_NONE_LEGAL',

  // Commit
  COMMIT_MISSING_STAGED_INPUT = 'COMMIT_MISSING_STAGED_INPUT',
  COMMIT_INSUFFICIENT_GLOBAL_HAND = 'COMMIT_INSUFFICIENT_GLOBAL_HAND',
}

/**
 * Unified validation outcome.
 *
 * @example
 * ```typescript
 * const failure: ValidationOutcome<MoveApplication> = {
 *   valid: false,
 *   code: ValidationErrorCode.MOVE_EMPTY_ORIGIN,
 *   reason: 'No piece at origin square',
 *   context: { from: { x: 4, y: 4 } }
 * };
 * ```
 */
export type ValidationOutcome<T = void> =
  | { valid: true; data: T }
  | { valid: false; code: ValidationErrorCode; reason: string; context?: Record<string, unknown> };

/** The failure arm of {@link ValidationOutcome}. */
export type ValidationFailure = Extract<ValidationOutcome<unknown>, { valid: false }>;

/**
 * Type guard to check if a ValidationOutcome is successful.
 */
export function isValidOutcome<T>(
  outcome: ValidationOutcome<T>
): outcome is { valid: true; data: T } {
  return outcome.valid === true;
}

export function validOutcome<T>(data: T): ValidationOutcome<T> {
  return { valid: true, data };
}

export function invalidOutcome<T = void>(
  code: ValidationErrorCode,
  reason: string,
  context?: Record<string, unknown>
): ValidationOutcome<T> {
  return { valid: false, code, reason, context };
}

// ═══════════════════════════════════════════════════════════════════════════
// EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Per-commit scratch data threaded through the per-world executors.
 */
export interface ExecutionContext {
  readonly mover: Player;
  readonly settings: Settings;
  /** Surviving candidate types of every drop this commit, tallied by type. */
  readonly globalHandUsage: Map<PieceType, number>;
}

/** What a successful move or drop did to its snapshots. */
export interface MoveApplication {
  readonly pieceId: number;
  readonly to: Position;
  /** Candidate set of the piece after filtering. */
  readonly candidates: CandidateSet;
  /** Piece moved into the mover's hand, when the move captured. */
  readonly captured: Piece | null;
}

/**
 * Read-only digest of one world, for front ends listing the worlds.
 */
export interface WorldSummary {
  readonly worldId: number;
  /** Time coordinate of the present snapshot. */
  readonly presentTime: number;
  readonly staged: boolean;
  readonly lost: boolean;
  /** True when the active player's king has collapsed to a single square. */
  readonly kingKnown: boolean;
}
