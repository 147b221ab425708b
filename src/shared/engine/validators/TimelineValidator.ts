import { MovePlan, Settings, WorldLine } from '../../types/game';
import { presentTime } from '../core';
import { ValidationErrorCode, ValidationOutcome, invalidOutcome, validOutcome } from '../types';

/**
 * Where on the time and world axes a staged plan lands.
 */
export interface TimelineResolution {
  /** History index of the snapshot the move arrives in. */
  readonly baseTime: number;
  /** Moves that change world or go back in time fork a new world. */
  readonly branching: boolean;
  /** World receiving the arrival; equals the source world when not branching. */
  readonly targetWorldId: number;
}

/**
 * Time-axis and world-axis checks for one world's staged plan, evaluated
 * against the world map as it stands at this point of the commit (worlds
 * created earlier in the same commit count).
 */
export function validateTimeline(
  world: WorldLine,
  plan: MovePlan,
  worlds: ReadonlyMap<number, WorldLine>,
  settings: Settings
): ValidationOutcome<TimelineResolution> {
  // 1. Whole-step deltas
  if (!Number.isInteger(plan.deltaTime)) {
    return invalidOutcome(
      ValidationErrorCode.TIME_HISTORY_OUT_OF_RANGE,
      'Time offset must be a whole number of turns',
      { worldId: world.id, deltaTime: plan.deltaTime }
    );
  }
  if (!Number.isInteger(plan.deltaWorld)) {
    return invalidOutcome(
      ValidationErrorCode.WORLD_INVALID_OFFSET,
      'World offset must be a whole number of worlds',
      { worldId: world.id, deltaWorld: plan.deltaWorld }
    );
  }

  // 2. Time direction
  if (settings.timeDirectionPolicy === 'past_only' && plan.deltaTime > 0) {
    return invalidOutcome(
      ValidationErrorCode.TIME_FUTURE_MOVE_FORBIDDEN,
      'Moves into the future are not allowed',
      { worldId: world.id, deltaTime: plan.deltaTime }
    );
  }

  // 3. Jump size
  if (Math.abs(plan.deltaTime) > settings.maxTimeJump) {
    return invalidOutcome(ValidationErrorCode.TIME_JUMP_TOO_LARGE, 'Time jump exceeds the limit', {
      worldId: world.id,
      deltaTime: plan.deltaTime,
      maxTimeJump: settings.maxTimeJump,
    });
  }

  // 4. History bounds
  const baseTime = presentTime(world) + plan.deltaTime;
  if (baseTime < 0 || baseTime > presentTime(world)) {
    return invalidOutcome(
      ValidationErrorCode.TIME_HISTORY_OUT_OF_RANGE,
      'Target time is outside the recorded history',
      { worldId: world.id, baseTime, presentTime: presentTime(world) }
    );
  }

  const branching = plan.deltaWorld !== 0 || plan.deltaTime < 0;
  if (!branching) {
    return validOutcome({ baseTime, branching, targetWorldId: world.id });
  }

  // 5. World capacity, then id collision
  const targetWorldId = world.id + plan.deltaWorld;
  if (worlds.size >= settings.maxWorlds) {
    return invalidOutcome(ValidationErrorCode.WORLD_LIMIT_REACHED, 'World limit reached', {
      worldId: world.id,
      maxWorlds: settings.maxWorlds,
    });
  }
  if (worlds.has(targetWorldId)) {
    return invalidOutcome(
      ValidationErrorCode.WORLD_ID_COLLISION,
      `World ${targetWorldId} already exists`,
      { worldId: world.id, targetWorldId }
    );
  }

  return validOutcome({ baseTime, branching, targetWorldId });
}
