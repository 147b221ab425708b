import { Settings } from '../types/game';
import { parseSettings } from '../validation/schemas';
import { InvalidSettings } from './errors';

/**
 * Defaults: seven worlds, time jumps of up to five turns, per-world hands
 * and no moves into the future.
 */
export const DEFAULT_SETTINGS: Settings = Object.freeze({
  maxWorlds: 7,
  maxTimeJump: 5,
  handMode: 'per_world',
  timeDirectionPolicy: 'past_only',
  checkAttackMode: 'possible',
});

/**
 * Upper bound on collapse passes per commit. Each productive pass removes
 * at least one candidate bit, so a real game converges far below this.
 */
export const MAX_COLLAPSE_PASSES = 64;

/**
 * Build a frozen Settings object from defaults plus overrides.
 *
 * @throws InvalidSettings when the merged settings fail the schema
 */
export function createSettings(overrides: Partial<Settings> = {}): Settings {
  const result = parseSettings({ ...DEFAULT_SETTINGS, ...overrides });
  if (!result.success) {
    throw new InvalidSettings(
      `Invalid settings: ${result.errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      { errors: result.errors }
    );
  }
  return Object.freeze(result.data);
}
