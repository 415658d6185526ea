/**
 * Identifier Generation
 *
 * Request and response ids are random UUIDs so that ids from independent
 * processes never collide.
 */

import { randomBytes, randomUUID } from 'crypto';

/**
 * Generate a unique request or response id.
 *
 * @example
 * ```typescript
 * generateRequestId() // → '3b241101-e2bb-4255-8caf-4136c566a962'
 * ```
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Short random hex suffix for file names.
 *
 * @param bytes - Number of random bytes (two hex chars each)
 */
export function generateSuffix(bytes = 6): string {
  return randomBytes(bytes).toString('hex');
}
