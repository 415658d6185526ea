/**
 * Error handling utilities.
 *
 * Pure utility functions for error message extraction.
 */

import { getSystemErrorMap, getSystemErrorName } from 'util';

/**
 * Extract error message from unknown error type.
 *
 * @example
 * ```typescript
 * try {
 *   await transport.send(path, payload);
 * } catch (error) {
 *   log.debug(`Send failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

const ERRNO_NAMES: ReadonlySet<string> = new Set(
  [...getSystemErrorMap().values()].map(([name]) => name)
);

/**
 * Extract the errno code (ENOENT, ECONNREFUSED, ...) from a system error.
 *
 * Node's own errors carry the name in `code`. Native add-ons may instead
 * report a negative errno number, or only mention the name or number in the
 * message (`ENOENT: No such file or directory`, `... (os error 2)`).
 *
 * @returns The code string, or undefined when the error carries none
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }
  if ('code' in error) {
    if (typeof error.code === 'string' && ERRNO_NAMES.has(error.code)) {
      return error.code;
    }
    if (typeof error.code === 'number' && Number.isInteger(error.code) && error.code < 0) {
      return getSystemErrorName(error.code);
    }
  }

  const named = error.message.match(/\bE[A-Z0-9]+\b/g)?.find((word) => ERRNO_NAMES.has(word));
  if (named !== undefined) {
    return named;
  }
  const numbered = /\(os error (\d+)\)/.exec(error.message)?.[1];
  if (numbered !== undefined) {
    return getSystemErrorName(-Number(numbered));
  }
  return undefined;
}
