export type { ILogger, LogLevel } from './logger.js';
