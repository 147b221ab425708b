import { opposite } from '../../types/game';
import { GameState } from '../types';

export function mutateTurnChange(state: GameState, message: string): GameState {
  return {
    ...state,
    turn: opposite(state.turn),
    turnNumber: state.turnNumber + 1,
    message,
  };
}

export function mutateMessage(state: GameState, message: string): GameState {
  return { ...state, message };
}
