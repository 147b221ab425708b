import { mutateDrop } from '../../../src/shared/engine/mutators/DropMutator';
import { candidateSetOf } from '../../../src/shared/engine/candidates';
import { cloneSnapshot, getSquare } from '../../../src/shared/engine/core';
import { createSettings } from '../../../src/shared/engine/rulesConfig';
import { ValidationErrorCode, isValidOutcome } from '../../../src/shared/engine/types';
import { Snapshot } from '../../../src/shared/types/game';
import { makeContext, makePiece, makePlan, pos, snapshotWith } from '../../utils/fixtures';

describe('mutateDrop', () => {
  function board(): Snapshot {
    return snapshotWith(
      [
        [pos(3, 6), makePiece(1, 'first', ['pawn'])],
        [pos(5, 5), makePiece(2, 'second')],
      ],
      {
        first: [
          makePiece(10, 'first', ['pawn', 'knight', 'gold']),
          makePiece(11, 'first', ['pawn']),
        ],
      }
    );
  }

  it('places the filtered piece and removes it from the hand', () => {
    const snapshot = board();
    const ctx = makeContext();
    const outcome = mutateDrop(
      snapshot,
      snapshot,
      makePlan({ mode: 'drop', handIndex: 0, to: pos(2, 1) }),
      ctx
    );

    const candidates = candidateSetOf(['pawn', 'gold']);
    expect(outcome).toEqual({
      valid: true,
      data: { pieceId: 10, to: pos(2, 1), candidates, captured: null },
    });
    expect(getSquare(snapshot, pos(2, 1))).toEqual({
      id: 10,
      owner: 'first',
      candidates,
      promoted: false,
    });
    expect(snapshot.hands.first.map((p) => p.id)).toEqual([11]);
    expect(ctx.globalHandUsage.size).toBe(0);
  });

  it('tallies every surviving type under the global hand mode', () => {
    const snapshot = board();
    const ctx = makeContext('first', createSettings({ handMode: 'global' }));
    mutateDrop(snapshot, snapshot, makePlan({ mode: 'drop', handIndex: 0, to: pos(2, 1) }), ctx);

    expect([...ctx.globalHandUsage.entries()]).toEqual([
      ['pawn', 1],
      ['gold', 1],
    ]);
  });

  it('removes the piece from the source hand and places it in the target', () => {
    const source = board();
    const target = snapshotWith([]);
    const outcome = mutateDrop(
      source,
      target,
      makePlan({ mode: 'drop', handIndex: 1, to: pos(3, 4), deltaWorld: 1 }),
      makeContext()
    );

    expect(isValidOutcome(outcome)).toBe(true);
    expect(source.hands.first.map((p) => p.id)).toEqual([10]);
    expect(getSquare(source, pos(3, 4))).toBeNull();
    expect(getSquare(target, pos(3, 4))?.id).toBe(11);
  });

  describe('rejections leave the snapshot untouched', () => {
    it.each([
      [
        'off-board destination',
        makePlan({ mode: 'drop', to: pos(9, 9) }),
        ValidationErrorCode.MOVE_OFF_BOARD,
      ],
      [
        'occupied destination',
        makePlan({ mode: 'drop', to: pos(5, 5) }),
        ValidationErrorCode.DROP_DESTINATION_OCCUPIED,
      ],
      [
        'hand index past the end',
        makePlan({ mode: 'drop', handIndex: 2, to: pos(4, 4) }),
        ValidationErrorCode.DROP_INVALID_HAND_INDEX,
      ],
      [
        'negative hand index',
        makePlan({ mode: 'drop', handIndex: -1, to: pos(4, 4) }),
        ValidationErrorCode.DROP_INVALID_HAND_INDEX,
      ],
      [
        'double pawn on the file',
        makePlan({ mode: 'drop', handIndex: 1, to: pos(3, 4) }),
        ValidationErrorCode.CANDIDATE_NONE_LEGAL,
      ],
    ])('%s', (_label, plan, code) => {
      const snapshot = board();
      const before = cloneSnapshot(snapshot);
      const ctx = makeContext('first', createSettings({ handMode: 'global' }));

      const outcome = mutateDrop(snapshot, snapshot, plan, ctx);

      expect(isValidOutcome(outcome) ? undefined : outcome.code).toBe(code);
      expect(snapshot).toEqual(before);
      expect(ctx.globalHandUsage.size).toBe(0);
    });
  });
});
