/**
 * Correlation ID generation for request logging
 */

import { randomUUID } from 'node:crypto';

/**
 * Generate a prefixed request ID, used to tie together the log lines of one
 * round trip.
 *
 * @example
 * ```typescript
 * const requestId = requestIdFor('soap'); // "soap-550e8400"
 * ```
 */
export function requestIdFor(prefix: string): string {
  return `${prefix}-${randomUUID().substring(0, 8)}`;
}
