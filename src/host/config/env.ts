/**
 * Environment Variable Schema and Validation
 *
 * This module defines the Zod schema for every environment variable the
 * host reads. Rule settings arrive as QSS_* variables and are validated a
 * second time by the engine when the game is created.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';
import {
  CheckAttackModeSchema,
  HandModeSchema,
  TimeDirectionPolicySchema,
} from '../../shared/validation/schemas';

/**
 * Node environment schema - supports development, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels the host uses).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  // ===================================================================
  // LOGGING
  // ===================================================================

  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Console output format; JSON by default in production */
  LOG_FORMAT: LogFormatSchema.optional(),

  /** When set, logs are also written to this file */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // RULES
  // ===================================================================

  /** Maximum number of coexisting worlds */
  QSS_MAX_WORLDS: z.coerce.number().int().min(1).default(7),

  /** Maximum |deltaTime| of a single move */
  QSS_MAX_TIME_JUMP: z.coerce.number().int().min(0).default(5),

  QSS_HAND_MODE: HandModeSchema.default('per_world'),

  QSS_TIME_DIRECTION: TimeDirectionPolicySchema.default('past_only'),

  QSS_CHECK_ATTACK_MODE: CheckAttackModeSchema.default('possible'),
});

export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of parsing the environment.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables without side effects.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}
