export { createLogger, silentLogger, REDACTED_PATHS, type LoggerConfig } from './logger.js';
export type { Logger } from 'pino';
