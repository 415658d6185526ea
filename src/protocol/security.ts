/**
 * Security Validation
 *
 * Checks applied to names and paths taken from the wire before they are used
 * for routing or as filesystem addresses. Violations are SECURITY_VIOLATION.
 */

import { MAX_TIMEOUT_SECONDS, MIN_TIMEOUT_SECONDS } from '@/constants.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';

/** Unix domain socket paths are limited by sockaddr_un.sun_path */
export const MAX_SOCKET_PATH_LENGTH = 104;

export const MAX_COMMAND_NAME_LENGTH = 256;

export const MAX_REQUEST_ID_LENGTH = 256;

export const TIMEOUT_RANGE = `between ${MIN_TIMEOUT_SECONDS} and ${MAX_TIMEOUT_SECONDS} seconds`;

const COMMAND_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

function violation(field: string, details: string): RpcError {
  return new RpcError(ERROR_CODES.SECURITY_VIOLATION, { details, field });
}

/**
 * Validate a socket path used as a bind or reply address.
 *
 * @throws RpcError SECURITY_VIOLATION if the path is relative, too long,
 *   contains a NUL byte or a `..` segment
 */
export function validateSocketPath(path: string, field = 'socketPath'): void {
  if (path.length === 0) {
    throw violation(field, 'Socket path is empty');
  }
  if (path.includes('\0')) {
    throw violation(field, 'Socket path contains a NUL byte');
  }
  if (!path.startsWith('/')) {
    throw violation(field, `Socket path must be absolute: ${path}`);
  }
  if (path.split('/').includes('..')) {
    throw violation(field, `Socket path must not contain '..': ${path}`);
  }
  const bytes = Buffer.byteLength(path, 'utf8');
  if (bytes > MAX_SOCKET_PATH_LENGTH) {
    throw violation(
      field,
      `Socket path is ${bytes} bytes, limit is ${MAX_SOCKET_PATH_LENGTH}`
    );
  }
}

/**
 * Validate a command name.
 *
 * @throws RpcError SECURITY_VIOLATION unless the name matches `^[a-zA-Z0-9_-]+$`
 *   and is at most 256 characters
 */
export function validateCommandName(command: string): void {
  if (command.length > MAX_COMMAND_NAME_LENGTH) {
    throw violation('command', `Command name exceeds ${MAX_COMMAND_NAME_LENGTH} characters`);
  }
  if (!COMMAND_NAME_PATTERN.test(command)) {
    throw violation('command', `Invalid command name: ${JSON.stringify(command)}`);
  }
}

/**
 * Validate a request identifier.
 *
 * @throws RpcError SECURITY_VIOLATION if the id is empty, too long or contains NUL
 */
export function validateRequestId(id: string): void {
  if (id.length === 0) {
    throw violation('id', 'Request id is empty');
  }
  if (id.length > MAX_REQUEST_ID_LENGTH) {
    throw violation('id', `Request id exceeds ${MAX_REQUEST_ID_LENGTH} characters`);
  }
  if (id.includes('\0')) {
    throw violation('id', 'Request id contains a NUL byte');
  }
}

/**
 * Whether a deadline in seconds lies within the accepted range.
 */
export function isTimeoutInRange(seconds: number): boolean {
  return (
    Number.isFinite(seconds) && seconds >= MIN_TIMEOUT_SECONDS && seconds <= MAX_TIMEOUT_SECONDS
  );
}
