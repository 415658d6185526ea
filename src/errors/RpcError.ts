/**
 * Structured error carried across the wire.
 *
 * Every failure visible to a client or server surfaces as an RpcError with a
 * stable numeric code. Nothing else is ever serialized into a response.
 */

import type { JsonValue } from '@/types.js';

import { ERROR_CODES, getCanonicalMessage, getErrorCodeName, type ErrorCode } from './codes.js';

/**
 * Optional context attached to a structured error.
 */
export interface StructuredErrorData {
  /** Human-readable specifics (the canonical message stays generic) */
  details?: string;
  /** Offending argument or property path, e.g. `items[2].name` */
  field?: string;
  /** Offending value */
  value?: JsonValue;
  /** Violated constraints, e.g. `{ pattern: '^[a-z]+$' }` */
  constraints?: Record<string, JsonValue>;
  /** Free-form key/value context */
  context?: Record<string, JsonValue>;
}

/**
 * Wire shape of an error: `{ code, message, data? }`.
 */
export interface StructuredError {
  code: number;
  message: string;
  data?: StructuredErrorData;
}

/**
 * Error class for all protocol-level failures.
 *
 * @example
 * ```typescript
 * throw RpcError.create(ERROR_CODES.RESOURCE_NOT_FOUND, 'Workspace lib-1 does not exist');
 * ```
 */
export class RpcError extends Error {
  public override readonly name: string = 'RpcError';
  public readonly code: number;
  public readonly data?: StructuredErrorData;

  constructor(code: ErrorCode | number, data?: StructuredErrorData, message?: string) {
    super(message ?? getCanonicalMessage(code));
    this.code = code;
    if (data !== undefined) {
      this.data = data;
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RpcError);
    }
  }

  /**
   * Create an error with an optional details string.
   */
  static create(code: ErrorCode, details?: string): RpcError {
    return new RpcError(code, details !== undefined ? { details } : undefined);
  }

  /**
   * Create an error with details and free-form context.
   */
  static withContext(
    code: ErrorCode,
    details: string,
    context: Record<string, JsonValue>
  ): RpcError {
    return new RpcError(code, { details, context });
  }

  /**
   * Create an argument error naming the offending field.
   *
   * The value is omitted when it is not representable as JSON (undefined).
   */
  static invalidParams(
    field: string,
    details: string,
    value?: JsonValue,
    constraints?: Record<string, JsonValue>
  ): RpcError {
    return new RpcError(ERROR_CODES.INVALID_PARAMS, {
      details,
      field,
      ...(value !== undefined && { value }),
      ...(constraints !== undefined && { constraints }),
    });
  }

  /**
   * Rebuild an RpcError from its wire shape (e.g. a response's `error`).
   * The sender's message is kept as-is.
   */
  static fromStructuredError(error: StructuredError): RpcError {
    return new RpcError(error.code, error.data, error.message);
  }

  /**
   * Convert any thrown value into an RpcError. RpcErrors pass through; other
   * errors become INTERNAL_ERROR with their message as details.
   */
  static from(error: unknown): RpcError {
    if (error instanceof RpcError) {
      return error;
    }
    const details = error instanceof Error ? error.message : String(error);
    return RpcError.create(ERROR_CODES.INTERNAL_ERROR, details);
  }

  /** Details string, if any. */
  get details(): string | undefined {
    return this.data?.details;
  }

  /** Symbolic name of the code, e.g. 'HANDLER_TIMEOUT'. */
  get codeName(): string {
    return getErrorCodeName(this.code) ?? 'UNKNOWN';
  }

  /**
   * Wire representation. `data` is omitted when there is none.
   */
  toStructuredError(): StructuredError {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined && { data: this.data }),
    };
  }

  /**
   * One-line description for logs and CLI output.
   *
   * @example
   * ```typescript
   * RpcError.create(ERROR_CODES.HANDLER_TIMEOUT, 'after 2s').describe()
   * // → 'RPC error -32006 (HANDLER_TIMEOUT): Handler timeout - after 2s'
   * ```
   */
  describe(): string {
    const base = `RPC error ${this.code} (${this.codeName}): ${this.message}`;
    return this.details ? `${base} - ${this.details}` : base;
  }
}

/**
 * Type guard for objects shaped like a wire error.
 */
export function isStructuredError(value: unknown): value is StructuredError {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return (
    'code' in value &&
    Number.isInteger(value.code) &&
    'message' in value &&
    typeof value.message === 'string' &&
    (!('data' in value) ||
      value.data === undefined ||
      (typeof value.data === 'object' && value.data !== null && !Array.isArray(value.data)))
  );
}
