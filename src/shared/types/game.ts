/**
 * Core domain types for the quantum spacetime shogi engine.
 *
 * These types are shared by the rules engine and any host that drives it
 * (session wrappers, front ends). They are plain data: all behaviour lives
 * in `src/shared/engine`.
 */

// ═══════════════════════════════════════════════════════════════════════════
// PLAYERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * The two sides. `first` moves first and starts on rows 6–8 facing up the
 * board (towards y = 0); `second` starts on rows 0–2 facing down.
 */
export type Player = 'first' | 'second';

export const PLAYERS: readonly Player[] = ['first', 'second'];

export function opposite(player: Player): Player {
  return player === 'first' ? 'second' : 'first';
}

/** Sign of a single forward step along y (and along the world axis). */
export function forwardSign(player: Player): 1 | -1 {
  return player === 'first' ? -1 : 1;
}

// ═══════════════════════════════════════════════════════════════════════════
// PIECE TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type PieceType = 'pawn' | 'lance' | 'knight' | 'silver' | 'gold' | 'rook' | 'bishop' | 'king';

/**
 * Declaration order doubles as bit order for {@link CandidateSet}.
 */
export const PIECE_TYPES: readonly PieceType[] = [
  'pawn',
  'lance',
  'knight',
  'silver',
  'gold',
  'rook',
  'bishop',
  'king',
];

/**
 * Maximum number of one player's pieces that may carry each type as a
 * candidate at the same time. Reaching the limit collapses the carriers.
 */
export const PIECE_LIMITS: Readonly<Record<PieceType, number>> = {
  king: 1,
  rook: 1,
  bishop: 1,
  gold: 2,
  silver: 2,
  knight: 2,
  lance: 2,
  pawn: 9,
};

/**
 * Candidate set encoded as an 8-bit mask over {@link PIECE_TYPES}.
 * See `engine/candidates.ts` for the operations.
 */
export type CandidateSet = number;

// ═══════════════════════════════════════════════════════════════════════════
// BOARD
// ═══════════════════════════════════════════════════════════════════════════

export const BOARD_SIZE = 9;

export interface Position {
  x: number;
  y: number;
}

/**
 * A physical piece. `id` is allocated once and follows the piece through
 * clones, captures, drops and collapses.
 */
export interface Piece {
  readonly id: number;
  owner: Player;
  candidates: CandidateSet;
  promoted: boolean;
}

export type Square = Piece | null;

/** Row-major grid: `board[y][x]`. */
export type Board = Square[][];

export interface Snapshot {
  board: Board;
  hands: Record<Player, Piece[]>;
}

// ═══════════════════════════════════════════════════════════════════════════
// MOVES & WORLDS
// ═══════════════════════════════════════════════════════════════════════════

export type MoveMode = 'move' | 'drop';

/**
 * A fully specified candidate move for one world. `from` and `promote` are
 * ignored for drops; `handIndex` is ignored for moves.
 */
export interface MovePlan {
  mode: MoveMode;
  from: Position;
  to: Position;
  handIndex: number;
  promote: boolean;
  deltaWorld: number;
  deltaTime: number;
}

export interface WorldLine {
  readonly id: number;
  /** Index = time coordinate; the last entry is the present. */
  readonly history: ReadonlyArray<Snapshot>;
  readonly staged: MovePlan | null;
  readonly lost: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// SETTINGS
// ═══════════════════════════════════════════════════════════════════════════

export type HandMode = 'per_world' | 'global';

export type TimeDirectionPolicy = 'past_only' | 'bidirectional';

/**
 * How attacks on a king-candidate are reported to players. Carried for
 * front ends; the legality rules do not consult it.
 */
export type CheckAttackMode = 'possible' | 'certain';

export interface Settings {
  readonly maxWorlds: number;
  readonly maxTimeJump: number;
  readonly handMode: HandMode;
  readonly timeDirectionPolicy: TimeDirectionPolicy;
  readonly checkAttackMode: CheckAttackMode;
}
