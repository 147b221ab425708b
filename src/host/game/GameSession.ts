import { GameEngine } from '../../shared/engine/GameEngine';
import { wrapEngineError } from '../../shared/engine/errors';
import { describePlan, playerLabel } from '../../shared/engine/notation';
import type { CommitSummary } from '../../shared/engine/orchestration/types';
import {
  GameState,
  ValidationErrorCode,
  ValidationOutcome,
  invalidOutcome,
  validOutcome,
} from '../../shared/engine/types';
import { parseMovePlan } from '../../shared/validation/schemas';
import { MovePlan, Settings, Snapshot } from '../../shared/types/game';
import { config } from '../config';
import { logger, runWithGameContext } from '../utils/logger';

/**
 * GameSession hosts one game for a front end:
 * - holds the GameEngine
 * - validates loosely-typed plans coming from input widgets
 * - logs staging, commits and rejections with the game id attached
 *
 * Rule rejections are returned, never thrown. Only engine faults
 * (EngineError) propagate, after being logged.
 */
export class GameSession {
  private readonly engine: GameEngine;

  constructor(
    public readonly gameId: string,
    settings: Settings = config.rules
  ) {
    this.engine = GameEngine.create(settings, gameId);
    logger.info('Game session created', { gameId, settings });
  }

  public getGameState(): GameState {
    return this.engine.getGameState();
  }

  public get message(): string {
    return this.engine.message;
  }

  public present(worldId: number): Snapshot {
    return this.guard('present', () => this.engine.present(worldId), worldId);
  }

  public stage(worldId: number, plan: MovePlan): void {
    this.guard(
      'stage',
      () => {
        if (this.engine.stage(worldId, plan)) {
          logger.debug('Plan staged', { plan: describePlan(plan) });
        } else {
          logger.debug('Stage ignored for unknown world', { plan: describePlan(plan) });
        }
      },
      worldId
    );
  }

  /**
   * Validate and stage a plan assembled from form inputs. Malformed input
   * is reported as COMMIT_MISSING_STAGED_INPUT and nothing is staged.
   */
  public stageInput(worldId: number, input: unknown): ValidationOutcome<MovePlan> {
    const parsed = parseMovePlan(input);
    if (!parsed.success) {
      logger.warn('Rejected malformed plan', { gameId: this.gameId, worldId, errors: parsed.errors });
      return invalidOutcome(
        ValidationErrorCode.COMMIT_MISSING_STAGED_INPUT,
        `Malformed plan: ${parsed.errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
        { worldId, errors: parsed.errors }
      );
    }
    this.stage(worldId, parsed.data);
    return validOutcome(parsed.data);
  }

  public clearStaged(): void {
    this.guard('clearStaged', () => this.engine.clearStaged());
  }

  /**
   * Commit every world's staged plan. The returned outcome carries the
   * rejection code or the commit summary.
   */
  public commit(): ValidationOutcome<CommitSummary> {
    return this.guard('commit', () => {
      const mover = this.engine.turn;
      const { outcome, failedWorldId } = this.engine.commit();

      if (outcome.valid) {
        logger.info('Turn committed', {
          mover: playerLabel(mover),
          turnNumber: outcome.data.turnNumber,
          createdWorlds: outcome.data.createdWorlds,
          lostWorlds: outcome.data.lostWorlds,
          collapsedPieces: outcome.data.collapsedPieces,
        });
      } else {
        logger.warn('Turn rejected', {
          mover: playerLabel(mover),
          code: outcome.code,
          reason: outcome.reason,
          failedWorldId,
        });
      }
      return outcome;
    });
  }

  private guard<T>(operation: string, fn: () => T, worldId?: number): T {
    return runWithGameContext({ gameId: this.gameId, worldId }, () => {
      try {
        return fn();
      } catch (error) {
        const wrapped = wrapEngineError(error, 'GameSession', { operation, worldId });
        logger.error('Engine operation failed', { operation, error: wrapped.toJSON() });
        throw wrapped;
      }
    });
  }
}
