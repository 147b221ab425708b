/**
 * Test suite for src/shared/engine/initialState.ts
 *
 * Tests createInitialGameState, which creates the single-world starting
 * position.
 */

import { createInitialGameState } from '../../../src/shared/engine/initialState';
import { ALL_CANDIDATES } from '../../../src/shared/engine/candidates';
import { kingCandidates, snapshotPieceIds } from '../../../src/shared/engine/core';
import { DEFAULT_SETTINGS } from '../../../src/shared/engine/rulesConfig';
import { InvalidSettings } from '../../../src/shared/engine/errors';
import { getPresent } from '../../../src/shared/engine/worldStateHelpers';

describe('initialState', () => {
  const state = createInitialGameState();
  const present = getPresent(state, 0);

  it('starts with one world holding a one-entry history', () => {
    expect([...state.worlds.keys()]).toEqual([0]);
    const world = state.worlds.get(0);
    expect(world?.history).toHaveLength(1);
    expect(world?.staged).toBeNull();
    expect(world?.lost).toBe(false);
  });

  it('fills rows 0-2 with second-player pieces and rows 6-8 with first-player pieces', () => {
    present.board.forEach((row, y) => {
      row.forEach((square) => {
        if (y <= 2) {
          expect(square?.owner).toBe('second');
        } else if (y >= 6) {
          expect(square?.owner).toBe('first');
        } else {
          expect(square).toBeNull();
        }
      });
    });
  });

  it('gives every piece the full candidate set, unpromoted', () => {
    for (const row of present.board) {
      for (const square of row) {
        if (square) {
          expect(square.candidates).toBe(ALL_CANDIDATES);
          expect(square.promoted).toBe(false);
        }
      }
    }
  });

  it('allocates ids row-major from 1, second player first', () => {
    expect(present.board[0][0]?.id).toBe(1);
    expect(present.board[2][8]?.id).toBe(27);
    expect(present.board[6][0]?.id).toBe(28);
    expect(present.board[6][4]?.id).toBe(32);
    expect(present.board[8][8]?.id).toBe(54);
    expect(state.nextPieceId).toBe(55);
    expect(new Set(snapshotPieceIds(present)).size).toBe(54);
  });

  it('starts with empty hands, first player to move, no message', () => {
    expect(present.hands).toEqual({ first: [], second: [] });
    expect(state.turn).toBe('first');
    expect(state.turnNumber).toBe(0);
    expect(state.message).toBe('');
  });

  it('every piece of each side is a king candidate', () => {
    expect(kingCandidates(present, 'first')).toHaveLength(27);
    expect(kingCandidates(present, 'second')).toHaveLength(27);
    expect(kingCandidates(present, 'second')[0]).toEqual({ x: 0, y: 0 });
    expect(kingCandidates(present, 'first')[0]).toEqual({ x: 0, y: 6 });
  });

  it('uses the default settings and game id unless given', () => {
    expect(state.settings).toEqual(DEFAULT_SETTINGS);
    expect(state.id).toBe('local');

    const custom = createInitialGameState({ maxWorlds: 3, handMode: 'global' }, 'g-1');
    expect(custom.id).toBe('g-1');
    expect(custom.settings).toEqual({ ...DEFAULT_SETTINGS, maxWorlds: 3, handMode: 'global' });
  });

  it('rejects invalid settings', () => {
    expect(() => createInitialGameState({ maxWorlds: 0 })).toThrow(InvalidSettings);
  });

  it('creates independent games', () => {
    const other = createInitialGameState();
    expect(getPresent(other, 0)).not.toBe(present);
    expect(getPresent(other, 0).board[6][4]).not.toBe(present.board[6][4]);
  });
});
