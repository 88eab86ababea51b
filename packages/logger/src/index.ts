/**
 * @fileoverview Public API exports for @vnquote/logger
 */

export { createLogger, createSilentLogger, createChildLogger } from './createLogger.js';

export { redactSecrets, redactValue, standardFields, prettyPrint } from './formats.js';

export { startTimer, measureAsync } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { PerfTimer } from './perf-timer.js';
