import { MovePlan, Piece, Snapshot } from '../../types/game';
import { EMPTY_CANDIDATES, withoutCandidate } from '../candidates';
import { getSquare, setSquare } from '../core';
import {
  ExecutionContext,
  MoveApplication,
  ValidationErrorCode,
  ValidationOutcome,
  invalidOutcome,
  validOutcome,
} from '../types';
import { displacementBetween, filterMoveCandidates } from '../validators/MovementValidator';
import { isValidPosition } from '../validators/utils';

/**
 * Apply a board move to a `(source, target)` snapshot pair.
 *
 * `source` is the mover's present (it loses the piece); `target` receives
 * the arrival. For a move that stays in its world and time both are the
 * same object. For a branching move `target` is a clone of the historical
 * snapshot being forked, and the origin square is cleared only in
 * `source`.
 *
 * Both snapshots must be private clones: they are mutated in place, and
 * only after every check has passed.
 */
export function mutateMovement(
  source: Snapshot,
  target: Snapshot,
  plan: MovePlan,
  ctx: ExecutionContext
): ValidationOutcome<MoveApplication> {
  // 1. Bounds
  if (!isValidPosition(plan.from) || !isValidPosition(plan.to)) {
    return invalidOutcome(ValidationErrorCode.MOVE_OFF_BOARD, 'Position off board', {
      from: plan.from,
      to: plan.to,
    });
  }

  // 2. Origin
  const piece = getSquare(source, plan.from);
  if (!piece) {
    return invalidOutcome(ValidationErrorCode.MOVE_EMPTY_ORIGIN, 'No piece at origin square', {
      from: plan.from,
    });
  }
  if (piece.owner !== ctx.mover) {
    return invalidOutcome(ValidationErrorCode.MOVE_NOT_OWNERS_PIECE, 'You do not own this piece', {
      from: plan.from,
      owner: piece.owner,
    });
  }

  // 3. Destination
  const occupant = getSquare(target, plan.to);
  if (occupant && occupant.owner === ctx.mover) {
    return invalidOutcome(
      ValidationErrorCode.MOVE_DESTINATION_OWN_PIECE,
      'Destination holds your own piece',
      { to: plan.to }
    );
  }

  // 4. Quantum identity
  const d = displacementBetween(plan.from, plan.to, plan.deltaWorld, plan.deltaTime);
  const candidates = filterMoveCandidates(
    piece.candidates,
    piece.owner,
    d,
    plan.from,
    source,
    ctx.settings
  );
  if (candidates === EMPTY_CANDIDATES) {
    return invalidOutcome(
      ValidationErrorCode.CANDIDATE_NONE_LEGAL,
      'No candidate type of this piece can make that move',
      { pieceId: piece.id, displacement: d }
    );
  }

  // 5. Apply
  setSquare(source, plan.from, null);

  let captured: Piece | null = null;
  if (occupant) {
    // A captured piece can never again be the king.
    captured = {
      id: occupant.id,
      owner: ctx.mover,
      candidates: withoutCandidate(occupant.candidates, 'king'),
      promoted: false,
    };
    target.hands[ctx.mover].push(captured);
    setSquare(target, plan.to, null);
  }

  setSquare(target, plan.to, {
    id: piece.id,
    owner: piece.owner,
    candidates,
    promoted: plan.promote,
  });

  return validOutcome({ pieceId: piece.id, to: plan.to, candidates, captured });
}
