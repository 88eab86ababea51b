/**
 * @fileoverview Logger factory for vnquote.
 * Creates winston loggers with structured fields, secret redaction and
 * console or file transports.
 */

import winston from 'winston';
import type { LoggerConfig, Logger, ChildLoggerContext } from './types.js';
import { redactSecrets, standardFields, prettyPrint } from './formats.js';

const { format } = winston;

/**
 * Creates a configured logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('history fetched', { symbol: 'VCB', rows: 20 });
 * ```
 *
 * @example
 * ```typescript
 * // A logger that discards everything, for callers that asked for quiet
 * const quiet = createLogger({ level: 'error', silent: true });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
    silent = false,
  } = config;

  // Redaction first, so nothing downstream ever sees a secret
  const logFormat = format.combine(
    redactSecrets(),
    standardFields,
    json ? format.json() : prettyPrint
  );

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: logFormat,
      })
    );
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    silent,
    exitOnError: false,
  });
}

/**
 * Creates a logger that drops every entry.
 */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', console: false, silent: true });
}

/**
 * Creates a child logger that stamps `context` on every entry.
 *
 * @example
 * ```typescript
 * const quoteLogger = createChildLogger(logger, { component: 'vci-quote', symbol: 'VCB' });
 * quoteLogger.debug('request built'); // includes component and symbol
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
