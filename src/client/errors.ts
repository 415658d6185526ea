/**
 * Client-side request errors.
 */

import { ERROR_CODES, RpcError } from '@/errors/index.js';

/**
 * Rejection of a request whose deadline passed before a response arrived.
 * Carries HANDLER_TIMEOUT so it can be reported like a server-side timeout.
 *
 * @example
 * ```typescript
 * throw new RequestTimeoutError('3b24...', 'createWorkspace', 0.1);
 * ```
 */
export class RequestTimeoutError extends RpcError {
  public override readonly name = 'RequestTimeoutError';
  public readonly requestId: string;
  public readonly command: string;
  /** Deadline that was exceeded, in seconds */
  public readonly timeout: number;

  constructor(requestId: string, command: string, timeout: number) {
    super(ERROR_CODES.HANDLER_TIMEOUT, {
      details: `Request '${command}' timed out after ${timeout}s`,
      context: { requestId, timeout },
    });
    this.requestId = requestId;
    this.command = command;
    this.timeout = timeout;
  }
}

/**
 * Rejection of a request cancelled by its caller before a response arrived.
 * Never sent over the wire.
 */
export class RequestCancelledError extends Error {
  public override readonly name = 'RequestCancelledError';
  public readonly requestId: string;
  public readonly command: string;

  constructor(requestId: string, command: string, reason = 'Request cancelled') {
    super(`${reason}: ${command}`);
    this.requestId = requestId;
    this.command = command;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RequestCancelledError);
    }
  }
}
