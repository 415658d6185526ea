/**
 * Reply Addresses
 *
 * A client awaiting a response binds a socket at a path unique to the
 * process and the request; the server answers there directly.
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { ERROR_CODES, RpcError } from '@/errors/index.js';

import { generateSuffix } from './requestId.js';
import { MAX_SOCKET_PATH_LENGTH } from './security.js';

export const REPLY_ADDRESS_PREFIX = 'dgramlink';

let counter = 0;

/**
 * Generate a fresh reply address.
 *
 * Format: `<dir>/dgramlink-<pid>-<counter>-<random>.sock`. The counter makes
 * addresses unique within the process; the random suffix keeps them unique
 * across a pid being reused.
 *
 * @param directory - Directory for the socket file (defaults to the OS temp dir)
 * @throws RpcError CONFIGURATION_ERROR if the path would exceed the socket path limit
 *
 * @example
 * ```typescript
 * generateReplyAddress('/tmp') // → '/tmp/dgramlink-4242-1-9f86d081884c.sock'
 * ```
 */
export function generateReplyAddress(directory: string = tmpdir()): string {
  counter += 1;
  const name = `${REPLY_ADDRESS_PREFIX}-${process.pid}-${counter.toString(36)}-${generateSuffix()}.sock`;
  const path = join(directory, name);
  if (Buffer.byteLength(path, 'utf8') > MAX_SOCKET_PATH_LENGTH) {
    throw RpcError.withContext(
      ERROR_CODES.CONFIGURATION_ERROR,
      `Reply address exceeds ${MAX_SOCKET_PATH_LENGTH} bytes; use a shorter reply directory`,
      { directory }
    );
  }
  return path;
}

