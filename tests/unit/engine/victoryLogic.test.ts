import { isKingKnown, isWorldLost } from '../../../src/shared/engine/victoryLogic';
import { makePiece, pos, snapshotWith, withKings } from '../../utils/fixtures';

describe('victoryLogic', () => {
  it('a world with a king candidate on each side is not lost', () => {
    expect(isWorldLost(withKings())).toBe(false);
  });

  it('a world is lost once either side has no king candidate on the board', () => {
    const noSecondKing = snapshotWith([[pos(0, 8), makePiece(1, 'first', ['king'])]]);
    expect(isWorldLost(noSecondKing)).toBe(true);

    const noFirstKing = snapshotWith([
      [pos(0, 8), makePiece(1, 'first', ['gold'])],
      [pos(8, 0), makePiece(2, 'second', ['king', 'gold'])],
    ]);
    expect(isWorldLost(noFirstKing)).toBe(true);
  });

  it('king candidates in hand do not keep a world alive', () => {
    const snapshot = snapshotWith([[pos(0, 8), makePiece(1, 'first', ['king'])]], {
      second: [makePiece(2, 'second', ['king'])],
    });
    expect(isWorldLost(snapshot)).toBe(true);
  });

  it('a king is known when exactly one square may hold it', () => {
    const snapshot = snapshotWith([
      [pos(0, 8), makePiece(1, 'first', ['king'])],
      [pos(8, 0), makePiece(2, 'second', ['king', 'gold'])],
      [pos(7, 0), makePiece(3, 'second', ['king', 'silver'])],
    ]);
    expect(isKingKnown(snapshot, 'first')).toBe(true);
    expect(isKingKnown(snapshot, 'second')).toBe(false);
  });
});
