/**
 * @fileoverview Maps HTTP failures to `TransportError`.
 *
 * @module @vnquote/provider-vci/errors
 */

import axios from 'axios';
import { TransportError, isTransportError } from '@vnquote/contracts';

/**
 * Convert any failure raised while sending a request into a `TransportError`.
 *
 * Axios errors keep their HTTP status and error code; a `TransportError`
 * passes through unchanged.
 *
 * @example
 * ```typescript
 * try {
 *   await http.post(url, payload);
 * } catch (error) {
 *   throw mapTransportError(error, url);
 * }
 * ```
 */
export function mapTransportError(error: unknown, url: string): TransportError {
  if (isTransportError(error)) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status === undefined ? error.message : `HTTP ${status}`;
    return new TransportError(`Request to ${url} failed: ${reason}`, {
      url,
      status,
      code: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request to ${url} failed: ${message}`, { url });
}
