/**
 * Configuration Module - Canonical Entry Point
 *
 * Usage:
 *   import { config } from './config';
 */

export { buildAppConfig, config } from './unified';
export type { AppConfig } from './unified';

export {
  EnvSchema,
  LogFormatSchema,
  LogLevelSchema,
  NodeEnvSchema,
  getEffectiveNodeEnv,
  isProduction,
  isTest,
  parseEnv,
} from './env';
export type { EnvValidationResult, LogFormat, LogLevel, NodeEnv, RawEnv } from './env';
