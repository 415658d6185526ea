/**
 * Transport error mapping
 */

import { unlinkSync } from 'fs';

import { ERROR_CODES, RpcError } from '@/errors/index.js';
import type { Logger } from '@/ui/logging/index.js';
import { getErrnoCode, getErrorMessage } from '@/utils/errors.js';

const UNREACHABLE_CODES = new Set(['ENOENT', 'ECONNREFUSED']);

/**
 * Map a failed send to an RpcError. A missing or refusing peer is
 * SERVICE_UNAVAILABLE; anything else is SOCKET_ERROR.
 */
export function toSendError(error: unknown, path: string): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  const errno = getErrnoCode(error);
  const code =
    errno !== undefined && UNREACHABLE_CODES.has(errno)
      ? ERROR_CODES.SERVICE_UNAVAILABLE
      : ERROR_CODES.SOCKET_ERROR;
  return RpcError.withContext(code, `Failed to send to ${path}: ${getErrorMessage(error)}`, {
    path,
    ...(errno !== undefined && { errno }),
  });
}

/**
 * Map a failed bind to an RpcError SOCKET_ERROR.
 */
export function toBindError(error: unknown, path: string): RpcError {
  const errno = getErrnoCode(error);
  return RpcError.withContext(
    ERROR_CODES.SOCKET_ERROR,
    `Failed to bind ${path}: ${getErrorMessage(error)}`,
    { path, ...(errno !== undefined && { errno }) }
  );
}

/**
 * Remove a socket file if present. A missing file is not an error.
 */
export function removeSocketFile(path: string, log: Logger): void {
  try {
    unlinkSync(path);
  } catch (error) {
    if (getErrnoCode(error) !== 'ENOENT') {
      log.debug(`Failed to remove socket file ${path}: ${getErrorMessage(error)}`);
    }
  }
}
