import {
  BOARD_SIZE,
  Board,
  Piece,
  PLAYERS,
  Player,
  Position,
  Snapshot,
  Square,
  WorldLine,
} from '../types/game';
import { hasCandidate } from './candidates';
import { BoardConstraintViolation, EngineErrorCode, entityNotFound } from './errors';
import { isValidPosition } from './validators/utils';

// ═══════════════════════════════════════════════════════════════════════════
// Construction & cloning
// ═══════════════════════════════════════════════════════════════════════════

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () =>
    Array.from({ length: BOARD_SIZE }, (): Square => null)
  );
}

export function createEmptySnapshot(): Snapshot {
  return { board: createEmptyBoard(), hands: { first: [], second: [] } };
}

export function clonePiece(piece: Piece): Piece {
  return {
    id: piece.id,
    owner: piece.owner,
    candidates: piece.candidates,
    promoted: piece.promoted,
  };
}

/**
 * Deep copy: every piece in the result is a fresh object, so mutating the
 * clone never reaches the original.
 */
export function cloneSnapshot(snapshot: Snapshot): Snapshot {
  return {
    board: snapshot.board.map((row) => row.map((sq) => (sq ? clonePiece(sq) : null))),
    hands: {
      first: snapshot.hands.first.map(clonePiece),
      second: snapshot.hands.second.map(clonePiece),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Board access
// ═══════════════════════════════════════════════════════════════════════════

function assertOnBoard(pos: Position): void {
  if (!isValidPosition(pos)) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Position ${pos.x},${pos.y} is off the board`,
      { position: pos }
    );
  }
}

export function getSquare(snapshot: Snapshot, pos: Position): Square {
  assertOnBoard(pos);
  return snapshot.board[pos.y][pos.x];
}

export function setSquare(snapshot: Snapshot, pos: Position, square: Square): void {
  assertOnBoard(pos);
  snapshot.board[pos.y][pos.x] = square;
}

export interface PlacedPiece {
  piece: Piece;
  position: Position;
}

/** Every piece on the board, row-major. */
export function* boardPieces(snapshot: Snapshot): Generator<PlacedPiece> {
  for (let y = 0; y < BOARD_SIZE; y++) {
    for (let x = 0; x < BOARD_SIZE; x++) {
      const piece = snapshot.board[y][x];
      if (piece) {
        yield { piece, position: { x, y } };
      }
    }
  }
}

/**
 * Squares from `from` to `to` inclusive, stepping one square at a time
 * along the x/y projection. Only straight and diagonal lines are walked
 * exactly; other displacements step by sign on each axis.
 */
export function getPathPositions(from: Position, to: Position): Position[] {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const steps = Math.max(Math.abs(dx), Math.abs(dy));
  const sx = Math.sign(dx);
  const sy = Math.sign(dy);

  const path: Position[] = [];
  for (let i = 0; i <= steps; i++) {
    path.push({ x: from.x + sx * i, y: from.y + sy * i });
  }
  return path;
}

// ═══════════════════════════════════════════════════════════════════════════
// Worlds
// ═══════════════════════════════════════════════════════════════════════════

export function presentTime(world: WorldLine): number {
  return world.history.length - 1;
}

export function presentOf(world: WorldLine): Snapshot {
  const snapshot = world.history[world.history.length - 1];
  if (!snapshot) {
    throw entityNotFound('snapshot', { worldId: world.id });
  }
  return snapshot;
}

/** World ids in ascending numeric order. */
export function sortedWorldIds(worlds: ReadonlyMap<number, WorldLine>): number[] {
  return [...worlds.keys()].sort((a, b) => a - b);
}

/**
 * All squares holding a piece of `player` that may still be the king,
 * row-major.
 */
export function kingCandidates(snapshot: Snapshot, player: Player): Position[] {
  const out: Position[] = [];
  for (const { piece, position } of boardPieces(snapshot)) {
    if (piece.owner === player && hasCandidate(piece.candidates, 'king')) {
      out.push(position);
    }
  }
  return out;
}

/** Every piece id in a snapshot, board first then hands. */
export function snapshotPieceIds(snapshot: Snapshot): number[] {
  const ids: number[] = [];
  for (const { piece } of boardPieces(snapshot)) {
    ids.push(piece.id);
  }
  for (const player of PLAYERS) {
    for (const piece of snapshot.hands[player]) {
      ids.push(piece.id);
    }
  }
  return ids;
}
