/**
 * @fileoverview Error taxonomy for vnquote.
 *
 * Every failure the retrieval pipeline raises is a QuoteError subclass with a
 * machine-readable code, structured data and an ISO timestamp. Each stage
 * fails with exactly one of these; nothing is retried and no partial result
 * is returned.
 *
 * @module @vnquote/contracts/errors
 */

/**
 * Base error class for all vnquote errors.
 *
 * @invariant code is a non-empty string
 * @invariant timestamp is a valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new QuoteError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class QuoteError extends Error {
  /** Machine-readable error code (e.g. 'INVALID_SYMBOL'). */
  readonly code: string;

  /** Structured context for debugging. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 time the error was created. */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'QuoteError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a symbol is empty, or looks like an index alias that the alias
 * table does not know.
 */
export class InvalidSymbolError extends QuoteError {
  constructor(message: string, data: { symbol: string; validAliases?: string[] }) {
    super('INVALID_SYMBOL', message, data);
    this.name = 'InvalidSymbolError';
  }
}

/**
 * Thrown when an interval label is not one of the supported eight.
 */
export class InvalidIntervalError extends QuoteError {
  constructor(message: string, data: { interval: string; validIntervals: string[] }) {
    super('INVALID_INTERVAL', message, data);
    this.name = 'InvalidIntervalError';
  }
}

/**
 * Thrown when the start of a requested range lies after its end.
 */
export class InvalidRangeError extends QuoteError {
  constructor(message: string, data: { start: string; end: string }) {
    super('INVALID_RANGE', message, data);
    this.name = 'InvalidRangeError';
  }
}

/**
 * Thrown when a date string is not a real `YYYY-MM-DD` calendar date.
 */
export class InvalidDateError extends QuoteError {
  constructor(message: string, data: { field: string; value: unknown }) {
    super('INVALID_DATE', message, data);
    this.name = 'InvalidDateError';
  }
}

/**
 * Thrown when a numeric query option (lookback count, rounding digits, page
 * size) is out of range.
 */
export class InvalidQueryError extends QuoteError {
  constructor(message: string, data: { field: string; value: unknown }) {
    super('INVALID_QUERY', message, data);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Thrown when intraday or depth data is requested while the exchange is
 * preparing a new session.
 */
export class SessionNotReadyError extends QuoteError {
  constructor(message: string, data: { time: string; tradingSession?: string }) {
    super('SESSION_NOT_READY', message, data);
    this.name = 'SessionNotReadyError';
  }
}

/**
 * Thrown when the provider returned no records at all.
 */
export class EmptyResultError extends QuoteError {
  constructor(message: string, data: { symbol?: string; [key: string]: unknown } = {}) {
    super('EMPTY_RESULT', message, data);
    this.name = 'EmptyResultError';
  }
}

/**
 * Thrown when a payload lacks fields the normalizer expects.
 */
export class MissingColumnsError extends QuoteError {
  constructor(message: string, data: { missing: string[]; [key: string]: unknown }) {
    super('MISSING_COLUMNS', message, data);
    this.name = 'MissingColumnsError';
  }
}

/**
 * Raised by a transport when the network call fails. The pipeline passes it
 * through unchanged.
 */
export class TransportError extends QuoteError {
  constructor(
    message: string,
    data: { url: string; status?: number; [key: string]: unknown }
  ) {
    super('TRANSPORT_ERROR', message, data);
    this.name = 'TransportError';
  }

  /** HTTP status of the failed response, when there was one. */
  get status(): number | undefined {
    const status = this.data?.['status'];
    return typeof status === 'number' ? status : undefined;
  }
}

export function isQuoteError(error: unknown): error is QuoteError {
  return error instanceof QuoteError;
}

export function isInvalidSymbolError(error: unknown): error is InvalidSymbolError {
  return error instanceof InvalidSymbolError;
}

export function isInvalidIntervalError(error: unknown): error is InvalidIntervalError {
  return error instanceof InvalidIntervalError;
}

export function isInvalidRangeError(error: unknown): error is InvalidRangeError {
  return error instanceof InvalidRangeError;
}

export function isInvalidDateError(error: unknown): error is InvalidDateError {
  return error instanceof InvalidDateError;
}

export function isInvalidQueryError(error: unknown): error is InvalidQueryError {
  return error instanceof InvalidQueryError;
}

export function isSessionNotReadyError(error: unknown): error is SessionNotReadyError {
  return error instanceof SessionNotReadyError;
}

export function isEmptyResultError(error: unknown): error is EmptyResultError {
  return error instanceof EmptyResultError;
}

export function isMissingColumnsError(error: unknown): error is MissingColumnsError {
  return error instanceof MissingColumnsError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}
