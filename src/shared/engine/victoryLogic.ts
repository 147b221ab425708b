import { PLAYERS, Player, Snapshot } from '../types/game';
import { kingCandidates } from './core';

/**
 * A world is lost once either side has no square left that may hold its
 * king, whether the candidates were captured away or collapsed elsewhere.
 */
export function isWorldLost(present: Snapshot): boolean {
  return PLAYERS.some((player) => kingCandidates(present, player).length === 0);
}

/** The king of `player` has collapsed onto exactly one square. */
export function isKingKnown(present: Snapshot, player: Player): boolean {
  return kingCandidates(present, player).length === 1;
}
