/**
 * Map protocol errors onto CLI exit codes.
 */

import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { EXIT_CODES, type ExitCode } from '@/utils/exitCodes.js';

/**
 * Whether an error means nothing is listening at the target socket.
 */
export function isServerUnavailableError(error: unknown): boolean {
  return error instanceof RpcError && error.code === ERROR_CODES.SERVICE_UNAVAILABLE;
}

/**
 * Exit code for an error raised while talking to a server.
 *
 * @example
 * ```typescript
 * exitCodeForError(RpcError.create(ERROR_CODES.HANDLER_TIMEOUT)); // → 102
 * ```
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (!(error instanceof RpcError)) {
    return EXIT_CODES.UNHANDLED_EXCEPTION;
  }
  switch (error.code) {
    case ERROR_CODES.SERVICE_UNAVAILABLE:
      return EXIT_CODES.RESOURCE_NOT_FOUND;
    case ERROR_CODES.HANDLER_TIMEOUT:
      return EXIT_CODES.REQUEST_TIMEOUT;
    case ERROR_CODES.SOCKET_ERROR:
      return EXIT_CODES.SOCKET_FAILURE;
    case ERROR_CODES.VALIDATION_FAILED:
      return EXIT_CODES.INVALID_MANIFEST;
    case ERROR_CODES.SECURITY_VIOLATION:
    case ERROR_CODES.INVALID_PARAMS:
    case ERROR_CODES.CONFIGURATION_ERROR:
    case ERROR_CODES.METHOD_NOT_FOUND:
    case ERROR_CODES.RESOURCE_LIMIT_EXCEEDED:
      return EXIT_CODES.INVALID_ARGUMENTS;
    default:
      return EXIT_CODES.SOFTWARE_ERROR;
  }
}
