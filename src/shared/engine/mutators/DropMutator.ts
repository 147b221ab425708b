import { MovePlan, Snapshot } from '../../types/game';
import { EMPTY_CANDIDATES, candidateTypes } from '../candidates';
import { getSquare, setSquare } from '../core';
import {
  ExecutionContext,
  MoveApplication,
  ValidationErrorCode,
  ValidationOutcome,
  invalidOutcome,
  validOutcome,
} from '../types';
import { filterDropCandidates } from '../validators/DropValidator';
import { isValidPosition } from '../validators/utils';

/**
 * Drop a piece from the mover's hand in `source` onto `target`.
 *
 * Same snapshot contract as {@link mutateMovement}. Under the global hand
 * mode every surviving candidate type is tallied in
 * `ctx.globalHandUsage` for the end-of-commit check.
 */
export function mutateDrop(
  source: Snapshot,
  target: Snapshot,
  plan: MovePlan,
  ctx: ExecutionContext
): ValidationOutcome<MoveApplication> {
  if (!isValidPosition(plan.to)) {
    return invalidOutcome(ValidationErrorCode.MOVE_OFF_BOARD, 'Position off board', { to: plan.to });
  }

  if (getSquare(target, plan.to)) {
    return invalidOutcome(
      ValidationErrorCode.DROP_DESTINATION_OCCUPIED,
      'Cannot drop onto an occupied square',
      { to: plan.to }
    );
  }

  const hand = source.hands[ctx.mover];
  if (!Number.isInteger(plan.handIndex) || plan.handIndex < 0 || plan.handIndex >= hand.length) {
    return invalidOutcome(ValidationErrorCode.DROP_INVALID_HAND_INDEX, 'No such piece in hand', {
      handIndex: plan.handIndex,
      handSize: hand.length,
    });
  }

  const piece = hand[plan.handIndex];
  const candidates = filterDropCandidates(piece.candidates, ctx.mover, plan.to, target);
  if (candidates === EMPTY_CANDIDATES) {
    return invalidOutcome(
      ValidationErrorCode.CANDIDATE_NONE_LEGAL,
      'No candidate type of this piece may be dropped there',
      { pieceId: piece.id, to: plan.to }
    );
  }

  hand.splice(plan.handIndex, 1);

  if (ctx.settings.handMode === 'global') {
    for (const type of candidateTypes(candidates)) {
      ctx.globalHandUsage.set(type, (ctx.globalHandUsage.get(type) ?? 0) + 1);
    }
  }

  setSquare(target, plan.to, { id: piece.id, owner: ctx.mover, candidates, promoted: false });

  return validOutcome({ pieceId: piece.id, to: plan.to, candidates, captured: null });
}
