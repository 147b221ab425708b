import { PIECE_TYPES, PieceType, Player, Snapshot, WorldLine } from '../types/game';
import { hasCandidate } from './candidates';
import { presentOf, presentTime, sortedWorldIds } from './core';
import { entityNotFound } from './errors';
import { GameState, WorldSummary } from './types';
import { isKingKnown } from './victoryLogic';

export function getWorld(state: GameState, worldId: number): WorldLine {
  const world = state.worlds.get(worldId);
  if (!world) {
    throw entityNotFound('world', { worldId });
  }
  return world;
}

/**
 * Latest snapshot of a world.
 *
 * @throws InvalidState STATE_WORLD_NOT_FOUND for an unknown id
 */
export function getPresent(state: GameState, worldId: number): Snapshot {
  return presentOf(getWorld(state, worldId));
}

/** Present snapshots of every world, in ascending world id order. */
export function presentSnapshots(worlds: ReadonlyMap<number, WorldLine>): Snapshot[] {
  return sortedWorldIds(worlds).map((id) => presentOf(getWorldFrom(worlds, id)));
}

function getWorldFrom(worlds: ReadonlyMap<number, WorldLine>, worldId: number): WorldLine {
  const world = worlds.get(worldId);
  if (!world) {
    throw entityNotFound('world', { worldId });
  }
  return world;
}

export function summarizeWorlds(state: GameState): WorldSummary[] {
  return sortedWorldIds(state.worlds).map((worldId) => {
    const world = getWorld(state, worldId);
    return {
      worldId,
      presentTime: presentTime(world),
      staged: world.staged !== null,
      lost: world.lost,
      kingKnown: isKingKnown(presentOf(world), state.turn),
    };
  });
}

/**
 * For each type, how many of `player`'s hand pieces carry it as a
 * candidate across `snapshots`. A piece with several candidates counts
 * towards each of them.
 */
export function handInventory(
  snapshots: ReadonlyArray<Snapshot>,
  player: Player
): Record<PieceType, number> {
  const counts: Record<PieceType, number> = {
    pawn: 0,
    lance: 0,
    knight: 0,
    silver: 0,
    gold: 0,
    rook: 0,
    bishop: 0,
    king: 0,
  };
  for (const snapshot of snapshots) {
    for (const piece of snapshot.hands[player]) {
      for (const type of PIECE_TYPES) {
        if (hasCandidate(piece.candidates, type)) {
          counts[type]++;
        }
      }
    }
  }
  return counts;
}

/** {@link handInventory} over every world's present. */
export function globalHandInventory(state: GameState, player: Player): Record<PieceType, number> {
  return handInventory(presentSnapshots(state.worlds), player);
}
