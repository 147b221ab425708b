import {
  CandidateSet,
  PieceType,
  Player,
  Position,
  Settings,
  Snapshot,
  forwardSign,
} from '../../types/game';
import { filterCandidates } from '../candidates';
import { getPathPositions } from '../core';
import type { Displacement } from '../types';
import { isValidPosition } from './utils';

type Step = readonly [dx: number, dy: number, dw: number, dt: number];

/**
 * Step-wise types: the exact displacements they allow for forward sign `f`.
 */
const STEP_TABLES: Partial<Record<PieceType, (f: number) => readonly Step[]>> = {
  pawn: (f) => [
    [0, f, 0, 0],
    [0, 0, f, 0],
    [0, 0, 0, -1],
  ],
  gold: (f) => [
    [0, f, 0, 0],
    [1, 0, 0, 0],
    [-1, 0, 0, 0],
    [0, -f, 0, 0],
    [1, f, 0, 0],
    [-1, f, 0, 0],
    [0, 0, f, 0],
    [0, 0, 0, -1],
  ],
  silver: (f) => [
    [0, f, 0, 0],
    [1, f, 0, 0],
    [-1, f, 0, 0],
    [1, -f, 0, 0],
    [-1, -f, 0, 0],
    [0, 0, f, 0],
    [0, 0, 0, -1],
  ],
  knight: (f) => [
    [1, 2 * f, 0, 0],
    [-1, 2 * f, 0, 0],
    [1, 0, 2 * f, 0],
    [-1, 0, 2 * f, 0],
    [1, 0, 0, -2],
    [-1, 0, 0, -2],
  ],
};

/** Types that can never cross more than one world in a single move. */
const SHORT_WORLD_RANGE: ReadonlySet<PieceType> = new Set<PieceType>([
  'pawn',
  'gold',
  'silver',
  'king',
]);

export function displacementBetween(
  from: Position,
  to: Position,
  deltaWorld: number,
  deltaTime: number
): Displacement {
  return { dx: to.x - from.x, dy: to.y - from.y, dw: deltaWorld, dt: deltaTime };
}

function matchesStep(d: Displacement, step: Step): boolean {
  return d.dx === step[0] && d.dy === step[1] && d.dw === step[2] && d.dt === step[3];
}

/**
 * True when every intermediate square on the x/y projection of the path is
 * on the board and empty in `source`. World and time steps cannot be
 * blocked.
 */
export function isLineClear(from: Position, d: Displacement, source: Snapshot): boolean {
  const to = { x: from.x + d.dx, y: from.y + d.dy };
  const innerPath = getPathPositions(from, to).slice(1, -1);

  for (const pos of innerPath) {
    if (!isValidPosition(pos)) {
      return false;
    }
    if (source.board[pos.y][pos.x] !== null) {
      return false;
    }
  }
  return true;
}

/**
 * Whether a piece of `type` owned by `owner` standing at `from` in `source`
 * may make displacement `d`.
 */
export function typeAllows(
  type: PieceType,
  owner: Player,
  d: Displacement,
  from: Position,
  source: Snapshot,
  settings: Settings
): boolean {
  if (settings.timeDirectionPolicy === 'past_only' && d.dt > 0) {
    return false;
  }
  if (SHORT_WORLD_RANGE.has(type) && Math.abs(d.dw) >= 2) {
    return false;
  }

  const f = forwardSign(owner);
  const components = [d.dx, d.dy, d.dw, d.dt];

  switch (type) {
    case 'king':
      return Math.max(...components.map(Math.abs)) === 1;

    case 'pawn':
    case 'gold':
    case 'silver':
    case 'knight': {
      const table = STEP_TABLES[type];
      return table !== undefined && table(f).some((step) => matchesStep(d, step));
    }

    case 'lance': {
      const alongY = d.dx === 0 && d.dw === 0 && d.dt === 0 && d.dy !== 0 && Math.sign(d.dy) === f;
      const alongW = d.dx === 0 && d.dy === 0 && d.dt === 0 && d.dw !== 0 && Math.sign(d.dw) === f;
      return (alongY || alongW) && isLineClear(from, d, source);
    }

    case 'rook': {
      const zeros = components.filter((c) => c === 0).length;
      return zeros === 3 && isLineClear(from, d, source);
    }

    case 'bishop': {
      const nonZero = components.filter((c) => c !== 0).map(Math.abs);
      if (nonZero.length < 2 || !nonZero.every((c) => c === nonZero[0])) {
        return false;
      }
      return isLineClear(from, d, source);
    }
  }
}

/**
 * Narrow a piece's candidates to the types that allow `d`. An empty result
 * means the move is illegal for that piece.
 */
export function filterMoveCandidates(
  candidates: CandidateSet,
  owner: Player,
  d: Displacement,
  from: Position,
  source: Snapshot,
  settings: Settings
): CandidateSet {
  return filterCandidates(candidates, (type) => typeAllows(type, owner, d, from, source, settings));
}
