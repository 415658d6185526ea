/**
 * Structured error handling for CLI commands.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Metadata that can be attached to command errors.
 */
export interface ErrorMetadata {
  /** User-facing suggestion for resolving the error */
  suggestion?: string;
  /** Technical note or additional context */
  note?: string;
}

/**
 * Error thrown by CLI commands, carrying the exit code to terminate with.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Invalid --args value',
 *   { suggestion: 'Pass a JSON object, e.g. --args \'{"name":"lib-1"}\'' },
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public override readonly name: string = 'CommandError';
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.SOFTWARE_ERROR
  ) {
    super(message);
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
