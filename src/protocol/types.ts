/**
 * Protocol Types
 *
 * In-memory request/response values (camelCase) and their wire envelopes
 * (snake_case). Envelopes are what gets JSON-encoded into a datagram.
 */

import type { StructuredError } from '@/errors/index.js';
import type { JsonObject, JsonValue } from '@/types.js';

/**
 * A request as seen by clients, servers and handlers. Frozen once created.
 */
export interface RpcRequest {
  /** Unique per call, never reused */
  readonly id: string;
  readonly command: string;
  readonly args?: Readonly<JsonObject>;
  /** Deadline in seconds */
  readonly timeout?: number;
  /** Reply socket path; absent for fire-and-forget requests */
  readonly replyTo?: string;
  /** RFC 3339 with millisecond fraction */
  readonly timestamp: string;
}

interface RpcResponseBase {
  /** The response's own identifier */
  readonly id: string;
  /** Identifier of the request being answered */
  readonly requestId: string;
  readonly timestamp: string;
}

export interface SuccessResponse extends RpcResponseBase {
  readonly success: true;
  readonly result: JsonValue;
}

export interface ErrorResponse extends RpcResponseBase {
  readonly success: false;
  readonly error: StructuredError;
}

/**
 * A response carries either a result or an error, never both.
 */
export type RpcResponse = SuccessResponse | ErrorResponse;

/**
 * Request as written on the wire.
 *
 * `method` and `command` carry the same value; both are written so that
 * readers of either revision can route the request.
 */
export interface RequestEnvelope {
  id: string;
  method: string;
  command: string;
  args?: JsonObject;
  reply_to?: string;
  timeout?: number;
  timestamp: string;
}

/**
 * Response as written on the wire.
 *
 * `request_id` and `command_id` carry the same value for the same reason.
 */
export interface ResponseEnvelope {
  request_id: string;
  command_id: string;
  id: string;
  success: boolean;
  result?: JsonValue;
  error?: StructuredError;
  timestamp: string;
}

/**
 * Options accepted when building a request.
 */
export interface CreateRequestOptions {
  /** Deadline in seconds */
  timeout?: number;
  replyTo?: string;
  /** Override the generated id (tests, retransmission by a caller) */
  id?: string;
}
