/**
 * @fileoverview Custom winston formats: secret redaction, standard fields and
 * pretty-print output.
 */

import winston from 'winston';

const { format } = winston;

/**
 * Field names whose values never reach a transport. Request headers and proxy
 * settings pass through the logger, so cookies and proxy credentials are
 * covered as well as the usual secrets.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /proxy[_-]?auth/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own keys, never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with every sensitive key replaced, at any depth.
 *
 * @example
 * ```typescript
 * redactValue({ headers: { Cookie: 'abc', Accept: 'json' } });
 * // { headers: { Cookie: '[REDACTED]', Accept: 'json' } }
 * ```
 */
export function redactValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) ? REDACTED : redactValue(nested);
  }
  return result;
}

/**
 * Redacts sensitive metadata. Must run first in the chain.
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveKey(key) ? REDACTED : redactValue(info[key]);
  }
  return info;
});

/**
 * ISO timestamp plus stack traces for logged errors.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Human-readable single-line output for development.
 *
 * @example
 * ```
 * [2024-03-05T09:12:01.004+07:00] info: history fetched component=vci-quote symbol=VCB interval=1D rows=20
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message, component, symbol, interval, stack, ...rest } = info;

    const context: string[] = [];
    if (component) context.push(`component=${String(component)}`);
    if (symbol) context.push(`symbol=${String(symbol)}`);
    if (interval) context.push(`interval=${String(interval)}`);

    for (const [key, value] of Object.entries(rest)) {
      if (key === 'splat') {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const line = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
