import { MovePlan, PieceType, Player, Position, Settings, Snapshot } from '../types/game';
import { cloneSnapshot, kingCandidates } from './core';
import { createInitialGameState } from './initialState';
import { mutateClearStaged, mutateStage } from './mutators/StagingMutator';
import { commitTurn } from './orchestration/commitOrchestrator';
import type { CommitSummary, CommitTurnResult } from './orchestration/types';
import { GameState, ValidationOutcome, WorldSummary } from './types';
import { getPresent, globalHandInventory, summarizeWorlds } from './worldStateHelpers';

/**
 * Stateful facade over the functional engine for hosts that keep one game
 * per object. Every call replaces the held GameState wholesale; states
 * returned by {@link getGameState} are never mutated afterwards.
 */
export class GameEngine {
  private state: GameState;
  private lastResult: CommitTurnResult | null = null;

  constructor(initialState: GameState = createInitialGameState()) {
    this.state = initialState;
  }

  static create(settings: Partial<Settings> = {}, gameId?: string): GameEngine {
    return new GameEngine(createInitialGameState(settings, gameId));
  }

  public getGameState(): GameState {
    return this.state;
  }

  get turn(): Player {
    return this.state.turn;
  }

  get message(): string {
    return this.state.message;
  }

  /**
   * Copy of a world's present snapshot. Mutating it does not affect the
   * game.
   *
   * @throws InvalidState STATE_WORLD_NOT_FOUND for an unknown id
   */
  public present(worldId: number): Snapshot {
    return cloneSnapshot(getPresent(this.state, worldId));
  }

  /**
   * Record or overwrite the plan for one world. Returns false, leaving the
   * state as it was, when no world has that id.
   */
  public stage(worldId: number, plan: MovePlan): boolean {
    const next = mutateStage(this.state, worldId, plan);
    const staged = next !== this.state;
    this.state = next;
    return staged;
  }

  public clearStaged(): void {
    this.state = mutateClearStaged(this.state);
  }

  /**
   * Commit every world's staged plan at once. Returns false, with the
   * reason in {@link message} and {@link getLastOutcome}, when any plan is
   * missing or illegal; the worlds are then left exactly as they were.
   */
  public commitTurn(): boolean {
    return this.commit().outcome.valid;
  }

  /** {@link commitTurn} returning the full result. */
  public commit(): CommitTurnResult {
    const result = commitTurn(this.state);
    this.lastResult = result;
    this.state = result.nextState;
    return result;
  }

  public getLastOutcome(): ValidationOutcome<CommitSummary> | null {
    return this.lastResult ? this.lastResult.outcome : null;
  }

  public getLastCommit(): CommitTurnResult | null {
    return this.lastResult;
  }

  public kingCandidates(snapshot: Snapshot, player: Player): Position[] {
    return kingCandidates(snapshot, player);
  }

  public summarizeWorlds(): WorldSummary[] {
    return summarizeWorlds(this.state);
  }

  public globalHandInventory(player: Player): Record<PieceType, number> {
    return globalHandInventory(this.state, player);
  }
}
