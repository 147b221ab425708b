import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Game context stored in AsyncLocalStorage so every log line emitted while
 * a session handles a call carries the game id.
 */
export interface GameLogContext {
  gameId: string;
  worldId?: number;
}

// ============================================================================
// Game Context (AsyncLocalStorage)
// ============================================================================

export const gameContextStorage = new AsyncLocalStorage<GameLogContext>();

/**
 * Get the current game context. Returns undefined outside a session call.
 */
export const getGameContext = (): GameLogContext | undefined => {
  return gameContextStorage.getStore();
};

export const runWithGameContext = <T>(context: GameLogContext, fn: () => T): T => {
  return gameContextStorage.run(context, fn);
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'qss-engine';

const configuredLogFile = config.logging.file;
const logFilePath = configuredLogFile ? path.resolve(configuredLogFile) : undefined;

if (logFilePath) {
  const logDir = path.dirname(logFilePath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

/**
 * Adds the active game context to log entries.
 */
const addGameContext = winston.format((info) => {
  const context = getGameContext();
  if (context) {
    info.gameId = context.gameId;
    if (context.worldId !== undefined) {
      info.worldId = context.worldId;
    }
  }
  return info;
});

/**
 * Flattens Error objects so they survive JSON serialisation.
 */
const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }
  return info;
});

/**
 * Format for structured JSON logging (production and the file transport).
 */
export const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
export const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addGameContext(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, gameId, ...meta }) => {
    const gameStr = typeof gameId === 'string' ? ` [${gameId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${gameStr}: ${String(message)}${metaStr}`;
  })
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
  }),
];

if (logFilePath) {
  transports.push(
    new winston.transports.File({
      filename: logFilePath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

export const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports,
});

export default logger;
