export { Logger, createSilentLogger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
