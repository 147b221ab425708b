/**
 * Test Fixtures and Utilities
 * Common test data and helper functions for engine tests
 */

import {
  CandidateSet,
  MovePlan,
  Piece,
  PieceType,
  Player,
  Position,
  Snapshot,
  WorldLine,
} from '../../src/shared/types/game';
import { ALL_CANDIDATES, candidateSetOf } from '../../src/shared/engine/candidates';
import { createEmptySnapshot, setSquare } from '../../src/shared/engine/core';
import { DEFAULT_SETTINGS, createSettings } from '../../src/shared/engine/rulesConfig';
import { ExecutionContext, GameState } from '../../src/shared/engine/types';
import { Settings } from '../../src/shared/types/game';

/**
 * Position helper - creates a position object
 */
export function pos(x: number, y: number): Position {
  return { x, y };
}

/**
 * Creates a piece. `types` defaults to every type.
 */
export function makePiece(
  id: number,
  owner: Player,
  types: readonly PieceType[] | CandidateSet = ALL_CANDIDATES
): Piece {
  const candidates = typeof types === 'number' ? types : candidateSetOf(types);
  return { id, owner, candidates, promoted: false };
}

/**
 * Creates a snapshot holding only the given pieces.
 */
export function snapshotWith(
  pieces: ReadonlyArray<[Position, Piece]>,
  hands: Partial<Record<Player, Piece[]>> = {}
): Snapshot {
  const snapshot = createEmptySnapshot();
  for (const [at, piece] of pieces) {
    setSquare(snapshot, at, piece);
  }
  snapshot.hands.first = hands.first ?? [];
  snapshot.hands.second = hands.second ?? [];
  return snapshot;
}

/**
 * Both kings known, far apart, so worlds built from this are not lost.
 * Ids 901 and 902 are reserved for them.
 */
export function withKings(
  pieces: ReadonlyArray<[Position, Piece]> = [],
  hands: Partial<Record<Player, Piece[]>> = {}
): Snapshot {
  return snapshotWith(
    [
      [pos(0, 8), makePiece(901, 'first', ['king'])],
      [pos(8, 0), makePiece(902, 'second', ['king'])],
      ...pieces,
    ],
    hands
  );
}

export function makePlan(overrides: Partial<MovePlan> = {}): MovePlan {
  return {
    mode: 'move',
    from: pos(0, 0),
    to: pos(0, 0),
    handIndex: 0,
    promote: false,
    deltaWorld: 0,
    deltaTime: 0,
    ...overrides,
  };
}

export function makeWorld(id: number, history: Snapshot[], staged: MovePlan | null = null): WorldLine {
  return { id, history, staged, lost: false };
}

/**
 * Creates a GameState from worlds. `nextPieceId` is set past every id the
 * tests use.
 */
export function makeState(
  worlds: WorldLine[],
  settings: Partial<Settings> = {},
  overrides: Partial<GameState> = {}
): GameState {
  return {
    id: 'test-game',
    settings: createSettings(settings),
    worlds: new Map(worlds.map((w) => [w.id, w])),
    turn: 'first',
    turnNumber: 0,
    message: '',
    nextPieceId: 1000,
    ...overrides,
  };
}

export function makeContext(
  mover: Player = 'first',
  settings: Settings = DEFAULT_SETTINGS
): ExecutionContext {
  return { mover, settings, globalHandUsage: new Map() };
}

/**
 * Runs `fn` and returns what it threw, or undefined when it returned.
 */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
