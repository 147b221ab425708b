import fc from 'fast-check';

import {
  boardPieces,
  cloneSnapshot,
  getPathPositions,
  getSquare,
  kingCandidates,
  presentOf,
  setSquare,
  snapshotPieceIds,
  sortedWorldIds,
} from '../../../src/shared/engine/core';
import { candidateSetOf } from '../../../src/shared/engine/candidates';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidState,
  isEngineError,
} from '../../../src/shared/engine/errors';
import { PIECE_TYPES, Player, Position } from '../../../src/shared/types/game';
import { makePiece, makeWorld, pos, snapshotWith, thrownBy } from '../../utils/fixtures';

describe('core', () => {
  describe('board access', () => {
    it('reads and writes squares by (x, y)', () => {
      const snapshot = snapshotWith([]);
      const piece = makePiece(1, 'first');
      setSquare(snapshot, pos(2, 7), piece);
      expect(getSquare(snapshot, pos(2, 7))).toBe(piece);
      expect(snapshot.board[7][2]).toBe(piece);
    });

    it('throws BoardConstraintViolation off the board', () => {
      const snapshot = snapshotWith([]);
      expect(() => getSquare(snapshot, pos(9, 0))).toThrow(BoardConstraintViolation);
      const error = thrownBy(() => setSquare(snapshot, pos(-1, 3), null));
      expect(error).toBeInstanceOf(BoardConstraintViolation);
      expect(isEngineError(error) && error.code).toBe(EngineErrorCode.BOARD_INVALID_POSITION);
    });

    it('lists pieces row-major', () => {
      const snapshot = snapshotWith([
        [pos(5, 1), makePiece(2, 'second')],
        [pos(0, 4), makePiece(3, 'first')],
        [pos(1, 1), makePiece(1, 'second')],
      ]);
      expect([...boardPieces(snapshot)].map((p) => p.piece.id)).toEqual([1, 2, 3]);
    });
  });

  describe('getPathPositions', () => {
    it('walks straight lines inclusive of both ends', () => {
      expect(getPathPositions(pos(4, 6), pos(4, 3))).toEqual([
        pos(4, 6),
        pos(4, 5),
        pos(4, 4),
        pos(4, 3),
      ]);
    });

    it('walks diagonals', () => {
      expect(getPathPositions(pos(1, 1), pos(3, 3))).toEqual([pos(1, 1), pos(2, 2), pos(3, 3)]);
    });

    it('returns the single square for a zero displacement', () => {
      expect(getPathPositions(pos(4, 4), pos(4, 4))).toEqual([pos(4, 4)]);
    });
  });

  describe('cloneSnapshot', () => {
    it('copies every piece into a fresh object', () => {
      const original = snapshotWith([[pos(3, 3), makePiece(7, 'first', ['gold', 'king'])]], {
        second: [makePiece(8, 'second', ['pawn'])],
      });
      const clone = cloneSnapshot(original);

      expect(clone).toEqual(original);
      expect(clone.board[3][3]).not.toBe(original.board[3][3]);
      expect(clone.hands.second[0]).not.toBe(original.hands.second[0]);
    });

    it('round trip: mutating a clone never reaches the original', () => {
      const placement = fc.record({
        x: fc.integer({ min: 0, max: 8 }),
        y: fc.integer({ min: 0, max: 8 }),
        owner: fc.constantFrom<Player>('first', 'second'),
        types: fc.subarray([...PIECE_TYPES], { minLength: 1 }),
        promoted: fc.boolean(),
      });

      fc.assert(
        fc.property(fc.array(placement, { maxLength: 20 }), (placements) => {
          const original = snapshotWith([]);
          placements.forEach((p, i) => {
            setSquare(original, pos(p.x, p.y), {
              id: i + 1,
              owner: p.owner,
              candidates: candidateSetOf(p.types),
              promoted: p.promoted,
            });
          });
          const before = JSON.stringify(original);

          const clone = cloneSnapshot(original);
          expect(clone).toEqual(original);

          for (const { piece } of boardPieces(clone)) {
            piece.candidates = 0;
            piece.promoted = !piece.promoted;
            piece.owner = 'second';
          }
          clone.hands.first.push(makePiece(999, 'first'));
          setSquare(clone, pos(0, 0), null);

          expect(JSON.stringify(original)).toBe(before);
        })
      );
    });
  });

  describe('worlds', () => {
    it('presentOf returns the last history entry', () => {
      const a = snapshotWith([]);
      const b = snapshotWith([]);
      expect(presentOf(makeWorld(0, [a, b]))).toBe(b);
    });

    it('presentOf throws InvalidState on an empty history', () => {
      expect(() => presentOf(makeWorld(2, []))).toThrow(InvalidState);
    });

    it('sorts world ids numerically', () => {
      const worlds = new Map([10, 2, -1, 0].map((id) => [id, makeWorld(id, [snapshotWith([])])]));
      expect(sortedWorldIds(worlds)).toEqual([-1, 0, 2, 10]);
    });
  });

  it('kingCandidates lists king-capable squares of one player row-major', () => {
    const snapshot = snapshotWith([
      [pos(4, 8), makePiece(1, 'first', ['king', 'gold'])],
      [pos(2, 6), makePiece(2, 'first', ['king'])],
      [pos(3, 6), makePiece(3, 'first', ['gold'])],
      [pos(4, 0), makePiece(4, 'second', ['king'])],
    ]);
    const expected: Position[] = [pos(2, 6), pos(4, 8)];
    expect(kingCandidates(snapshot, 'first')).toEqual(expected);
    expect(kingCandidates(snapshot, 'second')).toEqual([pos(4, 0)]);
  });

  it('snapshotPieceIds lists board pieces then hands', () => {
    const snapshot = snapshotWith([[pos(1, 1), makePiece(5, 'first')]], {
      first: [makePiece(6, 'first')],
      second: [makePiece(7, 'second')],
    });
    expect(snapshotPieceIds(snapshot)).toEqual([5, 6, 7]);
  });
});
