/**
 * @module subject-registry/infrastructure/logging
 * @description Logger contract and built-in loggers
 */

export type { ILogger, LogLevel } from './logger';

export { consoleLogger, silentLogger, createPrefixedLogger } from './logger';
