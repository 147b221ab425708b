import { MovePlan, WorldLine } from '../../types/game';
import { GameState } from '../types';

/**
 * Record (or overwrite) the pending plan for one world. Unknown world ids
 * leave the state unchanged.
 */
export function mutateStage(state: GameState, worldId: number, plan: MovePlan): GameState {
  const world = state.worlds.get(worldId);
  if (!world) {
    return state;
  }

  const worlds = new Map(state.worlds);
  worlds.set(worldId, {
    ...world,
    staged: { ...plan, from: { ...plan.from }, to: { ...plan.to } },
  });
  return { ...state, worlds };
}

/**
 * Discard every pending plan.
 */
export function mutateClearStaged(state: GameState): GameState {
  const worlds = new Map<number, WorldLine>();
  for (const [id, world] of state.worlds) {
    worlds.set(id, world.staged === null ? world : { ...world, staged: null });
  }
  return { ...state, worlds };
}
