import { BOARD_SIZE, CandidateSet, PieceType, Player, Position, Snapshot } from '../../types/game';
import { filterCandidates, isSingletonOf } from '../candidates';
import { ranksToFarEdge } from './utils';

/**
 * Double-pawn rule: the file already holds a piece of `owner` that is
 * known to be a pawn.
 */
export function hasKnownPawnOnFile(snapshot: Snapshot, file: number, owner: Player): boolean {
  for (let y = 0; y < BOARD_SIZE; y++) {
    const piece = snapshot.board[y][file];
    if (piece && piece.owner === owner && isSingletonOf(piece.candidates, 'pawn')) {
      return true;
    }
  }
  return false;
}

/**
 * Whether a piece dropped as `type` at `to` by `owner` would be legal on
 * `target`.
 */
export function dropAllows(type: PieceType, owner: Player, to: Position, target: Snapshot): boolean {
  const toFarEdge = ranksToFarEdge(owner, to.y);
  switch (type) {
    case 'pawn':
      return toFarEdge > 0 && !hasKnownPawnOnFile(target, to.x, owner);
    case 'lance':
      return toFarEdge > 0;
    case 'knight':
      return toFarEdge > 1;
    default:
      return true;
  }
}

export function filterDropCandidates(
  candidates: CandidateSet,
  owner: Player,
  to: Position,
  target: Snapshot
): CandidateSet {
  return filterCandidates(candidates, (type) => dropAllows(type, owner, to, target));
}
