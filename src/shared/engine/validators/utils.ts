import { BOARD_SIZE, Player, Position } from '../../types/game';

/**
 * Checks if a position is within the bounds of the 9×9 board.
 */
export function isValidPosition(pos: Position): boolean {
  return (
    Number.isInteger(pos.x) &&
    Number.isInteger(pos.y) &&
    pos.x >= 0 &&
    pos.x < BOARD_SIZE &&
    pos.y >= 0 &&
    pos.y < BOARD_SIZE
  );
}

/**
 * Number of forward steps left before `player` reaches the far edge from
 * rank `y`. 0 means the farthest rank.
 */
export function ranksToFarEdge(player: Player, y: number): number {
  return player === 'first' ? y : BOARD_SIZE - 1 - y;
}
