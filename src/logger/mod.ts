export { DEFAULT_LOG_DIR, Logger } from './logger.ts';
export type { LogLevel } from './logger.ts';
