/**
 * Envelope Codec
 *
 * Builds immutable requests/responses and converts them to and from the JSON
 * datagram payload. Readers ignore unknown fields; writers omit absent
 * optional fields so that they stay absent after a round trip.
 */

import { isUtf8 } from 'node:buffer';

import {
  RpcError,
  isStructuredError,
  mapLegacyErrorCode,
  type StructuredError,
} from '@/errors/index.js';
import { isJsonObject, type JsonObject, type JsonValue } from '@/types.js';
import { getErrorMessage } from '@/utils/errors.js';

import { generateRequestId } from './requestId.js';
import { TIMEOUT_RANGE, isTimeoutInRange } from './security.js';
import type {
  CreateRequestOptions,
  ErrorResponse,
  RequestEnvelope,
  ResponseEnvelope,
  RpcRequest,
  RpcResponse,
  SuccessResponse,
} from './types.js';

/**
 * Fields recovered from a payload that failed to decode, so a server can
 * still answer a malformed request that told it where to reply.
 */
export interface RecoveredFields {
  id?: string;
  replyTo?: string;
}

/**
 * Thrown when a payload is not a valid envelope.
 */
export class ProtocolDecodeError extends Error {
  public override readonly name = 'ProtocolDecodeError';
  public readonly recovered: RecoveredFields;

  constructor(message: string, recovered: RecoveredFields = {}) {
    super(message);
    this.recovered = recovered;
  }
}

// ============================================================================
// Timestamps
// ============================================================================

/**
 * Format a date as RFC 3339 in UTC with millisecond precision.
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date(0)) // → '1970-01-01T00:00:00.000Z'
 * ```
 */
export function formatTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}

/**
 * Parse an RFC 3339 timestamp. Returns null when it is not a valid date.
 */
export function parseTimestamp(timestamp: string): Date | null {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? null : date;
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Create a frozen request with a fresh id and the current timestamp.
 *
 * @example
 * ```typescript
 * const request = createRequest('createWorkspace', { name: 'lib-1' }, { timeout: 5 });
 * ```
 */
export function createRequest(
  command: string,
  args?: JsonObject,
  options: CreateRequestOptions = {}
): RpcRequest {
  const request: RpcRequest = {
    id: options.id ?? generateRequestId(),
    command,
    ...(args !== undefined && { args: Object.freeze({ ...args }) }),
    ...(options.timeout !== undefined && { timeout: options.timeout }),
    ...(options.replyTo !== undefined && { replyTo: options.replyTo }),
    timestamp: formatTimestamp(),
  };
  return Object.freeze(request);
}

/**
 * Create a successful response. An undefined result is sent as null so that
 * `result` is always present on success.
 */
export function createSuccessResponse(requestId: string, result?: JsonValue): SuccessResponse {
  const response: SuccessResponse = {
    id: generateRequestId(),
    requestId,
    success: true,
    result: result ?? null,
    timestamp: formatTimestamp(),
  };
  return Object.freeze(response);
}

/**
 * Create a failed response from an RpcError or its wire shape.
 */
export function createErrorResponse(
  requestId: string,
  error: RpcError | StructuredError
): ErrorResponse {
  const response: ErrorResponse = {
    id: generateRequestId(),
    requestId,
    success: false,
    error: error instanceof RpcError ? error.toStructuredError() : error,
    timestamp: formatTimestamp(),
  };
  return Object.freeze(response);
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Convert a request to its wire envelope.
 */
export function toRequestEnvelope(request: RpcRequest): RequestEnvelope {
  return {
    id: request.id,
    method: request.command,
    command: request.command,
    ...(request.args !== undefined && { args: { ...request.args } }),
    ...(request.replyTo !== undefined && { reply_to: request.replyTo }),
    ...(request.timeout !== undefined && { timeout: request.timeout }),
    timestamp: request.timestamp,
  };
}

/**
 * Convert a response to its wire envelope.
 */
export function toResponseEnvelope(response: RpcResponse): ResponseEnvelope {
  const base = {
    request_id: response.requestId,
    command_id: response.requestId,
    id: response.id,
  };
  if (response.success) {
    return { ...base, success: true, result: response.result, timestamp: response.timestamp };
  }
  return { ...base, success: false, error: response.error, timestamp: response.timestamp };
}

/**
 * Encode a request as a datagram payload.
 */
export function encodeRequest(request: RpcRequest): Buffer {
  return Buffer.from(JSON.stringify(toRequestEnvelope(request)), 'utf8');
}

/**
 * Encode a response as a datagram payload.
 */
export function encodeResponse(response: RpcResponse): Buffer {
  return Buffer.from(JSON.stringify(toResponseEnvelope(response)), 'utf8');
}

// ============================================================================
// Decoding
// ============================================================================

function parsePayload(payload: Buffer | string): JsonObject {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');
  if (typeof payload !== 'string' && !isUtf8(payload)) {
    throw new ProtocolDecodeError('Payload is not valid UTF-8', recoverFields(text));
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolDecodeError(`Invalid JSON: ${getErrorMessage(error)}`);
  }
  if (!isJsonObject(parsed)) {
    throw new ProtocolDecodeError('Envelope must be a JSON object');
  }
  return parsed;
}

/**
 * Id and reply address of a payload rejected for its encoding. Fields that
 * contain a replacement character were damaged by decoding and are skipped.
 */
function recoverFields(text: string): RecoveredFields {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return {};
  }
  if (!isJsonObject(parsed)) {
    return {};
  }
  const envelope = parsed;
  const intact = (key: string): string | undefined => {
    const value = envelope[key];
    return typeof value === 'string' && !value.includes('\uFFFD') ? value : undefined;
  };
  const id = intact('id');
  const replyTo = intact('reply_to');
  return {
    ...(id !== undefined && { id }),
    ...(replyTo !== undefined && { replyTo }),
  };
}

function optionalString(envelope: JsonObject, key: string): string | undefined {
  const value = envelope[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Normalize the request timestamp. Older peers sent epoch seconds.
 */
function decodeTimestamp(value: JsonValue | undefined, fail: (msg: string) => never): string {
  if (typeof value === 'string') {
    if (parseTimestamp(value) === null) {
      return fail(`Invalid timestamp: ${value}`);
    }
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return formatTimestamp(new Date(value * 1000));
  }
  return fail('Missing or invalid "timestamp"');
}

/**
 * Decode a datagram payload into a frozen request.
 *
 * The command is read from `method`, then `command`, then the legacy
 * `request` field. `null` optional fields are treated as absent.
 *
 * @throws ProtocolDecodeError if the payload is not a valid request envelope
 */
export function decodeRequest(payload: Buffer | string): RpcRequest {
  const envelope = parsePayload(payload);

  const id = optionalString(envelope, 'id');
  const replyTo = optionalString(envelope, 'reply_to');
  const recovered: RecoveredFields = {
    ...(id !== undefined && { id }),
    ...(replyTo !== undefined && { replyTo }),
  };
  const fail = (message: string): never => {
    throw new ProtocolDecodeError(message, recovered);
  };

  if (id === undefined || id.length === 0) {
    return fail('Missing or empty "id"');
  }
  const command =
    optionalString(envelope, 'method') ??
    optionalString(envelope, 'command') ??
    optionalString(envelope, 'request');
  if (command === undefined || command.length === 0) {
    return fail('Missing or empty "method"');
  }

  const rawArgs = envelope['args'];
  if (rawArgs !== undefined && rawArgs !== null && !isJsonObject(rawArgs)) {
    return fail('"args" must be an object');
  }
  const rawReplyTo = envelope['reply_to'];
  if (rawReplyTo !== undefined && rawReplyTo !== null && typeof rawReplyTo !== 'string') {
    return fail('"reply_to" must be a string');
  }
  const rawTimeout = envelope['timeout'];
  if (
    rawTimeout !== undefined &&
    rawTimeout !== null &&
    (typeof rawTimeout !== 'number' || !isTimeoutInRange(rawTimeout))
  ) {
    return fail(`"timeout" must be ${TIMEOUT_RANGE}`);
  }

  const request: RpcRequest = {
    id,
    command,
    ...(isJsonObject(rawArgs) && { args: Object.freeze({ ...rawArgs }) }),
    ...(typeof rawTimeout === 'number' && { timeout: rawTimeout }),
    ...(replyTo !== undefined && { replyTo }),
    timestamp: decodeTimestamp(envelope['timestamp'], fail),
  };
  return Object.freeze(request);
}

/**
 * Read a response's error. Peers on the channel-based revision send
 * symbolic string codes, which map onto the integer code space.
 */
function readStructuredError(value: JsonValue | undefined): StructuredError | undefined {
  if (isStructuredError(value)) {
    return value;
  }
  if (isJsonObject(value)) {
    const code = value['code'];
    const message = value['message'];
    if (typeof code === 'string' && typeof message === 'string') {
      return {
        code: mapLegacyErrorCode(code),
        message,
        data: { details: `Legacy code ${code}` },
      };
    }
  }
  return undefined;
}

/**
 * Decode a datagram payload into a frozen response.
 *
 * @throws ProtocolDecodeError if the payload is not a valid response envelope
 */
export function decodeResponse(payload: Buffer | string): RpcResponse {
  const envelope = parsePayload(payload);

  const requestId =
    optionalString(envelope, 'request_id') ?? optionalString(envelope, 'command_id');
  if (requestId === undefined || requestId.length === 0) {
    throw new ProtocolDecodeError('Missing "request_id"');
  }
  const id = optionalString(envelope, 'id');
  if (id === undefined) {
    throw new ProtocolDecodeError('Missing "id"');
  }
  const timestamp = optionalString(envelope, 'timestamp');
  if (timestamp === undefined) {
    throw new ProtocolDecodeError('Missing "timestamp"');
  }

  const success = envelope['success'];
  const error = envelope['error'];
  if (success === true) {
    if (error !== undefined && error !== null) {
      throw new ProtocolDecodeError('Successful response must not carry an error');
    }
    const response: SuccessResponse = {
      id,
      requestId,
      success: true,
      result: envelope['result'] ?? null,
      timestamp,
    };
    return Object.freeze(response);
  }
  if (success === false) {
    const structured = readStructuredError(error);
    if (structured === undefined) {
      throw new ProtocolDecodeError('Failed response must carry a structured error');
    }
    const result = envelope['result'];
    if (result !== undefined && result !== null) {
      throw new ProtocolDecodeError('Failed response must not carry a result');
    }
    const response: ErrorResponse = {
      id,
      requestId,
      success: false,
      error: structured,
      timestamp,
    };
    return Object.freeze(response);
  }
  throw new ProtocolDecodeError('"success" must be a boolean');
}
