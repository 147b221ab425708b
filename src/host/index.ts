export { GameSession } from './game/GameSession';
export { buildAppConfig, config } from './config';
export type { AppConfig } from './config';
export { logger, runWithGameContext } from './utils/logger';
