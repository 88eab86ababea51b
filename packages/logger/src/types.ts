/**
 * @fileoverview Type definitions for the vnquote logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity of messages that will be logged.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 * };
 * ```
 */
export interface LoggerConfig {
  /** Minimum log level to output. */
  level: LogLevel;

  /**
   * Machine-readable JSON output instead of pretty-print.
   * @default true in production, false elsewhere
   */
  json?: boolean;

  /** Also write to this file. */
  filePath?: string;

  /**
   * Whether to enable console output.
   * @default true
   */
  console?: boolean;

  /**
   * Drop every entry. Used by library callers that asked for no log output,
   * without touching any other logger's level.
   * @default false
   */
  silent?: boolean;
}

/**
 * Context fields a child logger stamps on every entry.
 */
export interface ChildLoggerContext {
  /** Component or module name (e.g. 'vci-quote') */
  component?: string;

  /** Instrument symbol (e.g. 'VCB', 'VNINDEX') */
  symbol?: string;

  /** Bar interval (e.g. '1D', '15m') */
  interval?: string;

  /** Data source (e.g. 'VCI') */
  source?: string;

  [key: string]: unknown;
}

/**
 * Winston's logger, re-exported so callers never import winston directly.
 */
export type Logger = WinstonLogger;
