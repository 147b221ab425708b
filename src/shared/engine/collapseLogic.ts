import { Piece, PIECE_LIMITS, PIECE_TYPES, PLAYERS, PieceType, Player, Snapshot } from '../types/game';
import { hasCandidate, isSingletonOf, singletonOf } from './candidates';
import { boardPieces } from './core';
import { EngineError, EngineErrorCode } from './errors';
import { MAX_COLLAPSE_PASSES } from './rulesConfig';

/**
 * Every copy of `owner`'s pieces across `snapshots`: board squares they
 * occupy plus the owner's hand. The same physical piece can appear in
 * several snapshots (one per world it exists in).
 */
function* ownedPieces(snapshots: ReadonlyArray<Snapshot>, owner: Player): Generator<Piece> {
  for (const snapshot of snapshots) {
    for (const { piece } of boardPieces(snapshot)) {
      if (piece.owner === owner) {
        yield piece;
      }
    }
    yield* snapshot.hands[owner];
  }
}

/**
 * Ids of `owner`'s pieces that still carry `type` as a candidate, counted
 * once per physical piece however many worlds it appears in.
 */
export function candidateHolderIds(
  snapshots: ReadonlyArray<Snapshot>,
  owner: Player,
  type: PieceType
): Set<number> {
  const ids = new Set<number>();
  for (const piece of ownedPieces(snapshots, owner)) {
    if (hasCandidate(piece.candidates, type)) {
      ids.add(piece.id);
    }
  }
  return ids;
}

export interface CollapseResult {
  /** Passes run, including the final pass that changed nothing. */
  passes: number;
  /** Piece copies whose candidate set was forced to a singleton. */
  collapsedPieces: number;
}

/**
 * Force candidate sets to a singleton wherever a type's holder count has
 * reached its limit, repeating until a pass changes nothing. Mutates the
 * given snapshots in place; callers pass the fresh presents of a commit.
 *
 * @throws EngineError INTERNAL_COLLAPSE_DIVERGED if no fixpoint is reached
 *   within {@link MAX_COLLAPSE_PASSES}
 */
export function collapseByCount(snapshots: ReadonlyArray<Snapshot>): CollapseResult {
  let collapsedPieces = 0;

  for (let pass = 1; pass <= MAX_COLLAPSE_PASSES; pass++) {
    let changed = false;

    for (const owner of PLAYERS) {
      for (const type of PIECE_TYPES) {
        const holders = candidateHolderIds(snapshots, owner, type);
        if (holders.size !== PIECE_LIMITS[type]) {
          continue;
        }
        for (const piece of ownedPieces(snapshots, owner)) {
          if (hasCandidate(piece.candidates, type) && !isSingletonOf(piece.candidates, type)) {
            piece.candidates = singletonOf(type);
            collapsedPieces++;
            changed = true;
          }
        }
      }
    }

    if (!changed) {
      return { passes: pass, collapsedPieces };
    }
  }

  throw new EngineError(
    EngineErrorCode.INTERNAL_COLLAPSE_DIVERGED,
    'Candidate collapse did not converge',
    { maxPasses: MAX_COLLAPSE_PASSES, collapsedPieces },
    'Collapse'
  );
}
