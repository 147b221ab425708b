import { MovePlan, PieceType, Player, Square } from '../types/game';
import { candidateCount, candidateTypes } from './candidates';
import { CandidateSet } from './types';

/**
 * Shared text helpers for status lines, board cells and traces.
 *
 * Labels follow the traditional shogi glyphs: 先手/後手 for the sides,
 * one kanji per piece type, ▲/△ marking the owner of a cell.
 */

const PIECE_LABELS: Readonly<Record<PieceType, string>> = {
  pawn: '歩',
  lance: '香',
  knight: '桂',
  silver: '銀',
  gold: '金',
  rook: '飛',
  bishop: '角',
  king: '王',
};

const PLAYER_LABELS: Readonly<Record<Player, string>> = {
  first: '先手',
  second: '後手',
};

const OWNER_MARKS: Readonly<Record<Player, string>> = {
  first: '▲',
  second: '△',
};

export const EMPTY_CELL_LABEL = '・';

export function pieceLabel(type: PieceType): string {
  return PIECE_LABELS[type];
}

export function playerLabel(player: Player): string {
  return PLAYER_LABELS[player];
}

/** Glyphs of every candidate, in type order: `歩香桂銀金飛角王`. */
export function candidateLabel(set: CandidateSet): string {
  return candidateTypes(set).map(pieceLabel).join('');
}

/**
 * Board cell text. A piece known to be one type shows its glyph; a piece
 * still in superposition shows how many types it may be, e.g. `▲8候補`.
 * Promoted known pieces are prefixed with 成.
 */
export function cellLabel(square: Square): string {
  if (!square) {
    return EMPTY_CELL_LABEL;
  }
  const mark = OWNER_MARKS[square.owner];
  const count = candidateCount(square.candidates);
  if (count === 1) {
    const prefix = square.promoted ? '成' : '';
    return `${mark}${prefix}${candidateLabel(square.candidates)}`;
  }
  return `${mark}${count}候補`;
}

/**
 * One-line description of a plan, used in logs and status messages.
 *
 * @example
 * describePlan(plan) // "move 4,6->4,5 dw=0 dt=0"
 */
export function describePlan(plan: MovePlan): string {
  const axes = `dw=${plan.deltaWorld} dt=${plan.deltaTime}`;
  if (plan.mode === 'drop') {
    return `drop #${plan.handIndex}->${plan.to.x},${plan.to.y} ${axes}`;
  }
  const promote = plan.promote ? '+' : '';
  return `move ${plan.from.x},${plan.from.y}->${plan.to.x},${plan.to.y}${promote} ${axes}`;
}
