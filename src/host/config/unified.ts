/**
 * Unified Host Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object for host code.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed host config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { Settings } from '../../shared/types/game';
import { createSettings } from '../../shared/engine/rulesConfig';
import { InvalidSettings } from '../../shared/engine/errors';
import { LogFormat, LogLevel, NodeEnv, getEffectiveNodeEnv, isProduction, parseEnv } from './env';

// Load .env into process.env before we read anything from it.
// Skipped under test so a developer .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

export interface AppConfig {
  readonly nodeEnv: NodeEnv;
  readonly isProduction: boolean;
  readonly isTest: boolean;
  readonly logging: {
    readonly level: LogLevel;
    readonly format: LogFormat;
    readonly file: string | undefined;
  };
  /** Rule settings for new games. */
  readonly rules: Settings;
}

/**
 * Assemble the host config from an environment object.
 *
 * @throws InvalidSettings when a variable fails the schema or the rule
 *   settings it produces are invalid
 */
export function buildAppConfig(env: Record<string, string | undefined>): AppConfig {
  const envResult = parseEnv(env);
  if (!envResult.success || !envResult.data) {
    const errors = envResult.errors ?? [];
    throw new InvalidSettings(
      `Invalid environment configuration: ${errors
        .map((e) => `${e.path || 'root'}: ${e.message}`)
        .join('; ')}`,
      { errors },
      'HostConfig'
    );
  }
  const raw = envResult.data;

  const nodeEnv = getEffectiveNodeEnv(raw);
  const production = isProduction(nodeEnv);

  return Object.freeze({
    nodeEnv,
    isProduction: production,
    isTest: nodeEnv === 'test',
    logging: Object.freeze({
      level: raw.LOG_LEVEL,
      format: raw.LOG_FORMAT ?? (production ? 'json' : 'pretty'),
      file: raw.LOG_FILE?.trim() || undefined,
    }),
    rules: createSettings({
      maxWorlds: raw.QSS_MAX_WORLDS,
      maxTimeJump: raw.QSS_MAX_TIME_JUMP,
      handMode: raw.QSS_HAND_MODE,
      timeDirectionPolicy: raw.QSS_TIME_DIRECTION,
      checkAttackMode: raw.QSS_CHECK_ATTACK_MODE,
    }),
  });
}

export const config: AppConfig = buildAppConfig(process.env);
