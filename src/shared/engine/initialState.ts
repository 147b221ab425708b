import { BOARD_SIZE, Player, Settings, Snapshot } from '../types/game';
import { ALL_CANDIDATES } from './candidates';
import { createEmptySnapshot } from './core';
import { DEFAULT_SETTINGS, createSettings } from './rulesConfig';
import { GameState } from './types';

/** Starting rows per side; the second player fills them first. */
const STARTING_ROWS: ReadonlyArray<[Player, readonly number[]]> = [
  ['second', [0, 1, 2]],
  ['first', [6, 7, 8]],
];

/**
 * Creates a pristine initial GameState: world 0 with a one-entry history,
 * both sides' back three rows filled with pieces that may be anything, and
 * empty hands.
 *
 * Piece ids are allocated row-major from 1, second player first.
 *
 * @param settings - Either complete Settings or overrides merged onto the
 *   defaults; throws InvalidSettings when the result is invalid
 * @param gameId - Identifier carried through logs and events
 */
export function createInitialGameState(
  settings: Partial<Settings> = DEFAULT_SETTINGS,
  gameId: string = 'local'
): GameState {
  const snapshot: Snapshot = createEmptySnapshot();
  let nextPieceId = 1;

  for (const [owner, rows] of STARTING_ROWS) {
    for (const y of rows) {
      for (let x = 0; x < BOARD_SIZE; x++) {
        snapshot.board[y][x] = {
          id: nextPieceId++,
          owner,
          candidates: ALL_CANDIDATES,
          promoted: false,
        };
      }
    }
  }

  return {
    id: gameId,
    settings: createSettings(settings),
    worlds: new Map([[0, { id: 0, history: [snapshot], staged: null, lost: false }]]),
    turn: 'first',
    turnNumber: 0,
    message: '',
    nextPieceId,
  };
}
