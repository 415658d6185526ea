/**
 * Error code space shared by every implementation of the protocol.
 *
 * **STABILITY: numeric values are part of the wire protocol.**
 *
 * - -32700..-32600: standard JSON-RPC 2.0 errors
 * - -32000..-32099: implementation-defined server errors
 */

export const ERROR_CODES = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,

  SERVER_ERROR: -32000,
  SERVICE_UNAVAILABLE: -32001,
  AUTHENTICATION_FAILED: -32002,
  RATE_LIMIT_EXCEEDED: -32003,
  RESOURCE_NOT_FOUND: -32004,
  VALIDATION_FAILED: -32005,
  HANDLER_TIMEOUT: -32006,
  SOCKET_ERROR: -32007,
  CONFIGURATION_ERROR: -32008,
  SECURITY_VIOLATION: -32009,
  RESOURCE_LIMIT_EXCEEDED: -32010,
} as const;

export type ErrorCodeName = keyof typeof ERROR_CODES;

export type ErrorCode = (typeof ERROR_CODES)[ErrorCodeName];

/**
 * Canonical message for each code. Every error sent with a given code uses
 * exactly this message; specifics go into `data.details`.
 */
export const ERROR_MESSAGES: Readonly<Record<ErrorCode, string>> = {
  [ERROR_CODES.PARSE_ERROR]: 'Parse error',
  [ERROR_CODES.INVALID_REQUEST]: 'Invalid Request',
  [ERROR_CODES.METHOD_NOT_FOUND]: 'Method not found',
  [ERROR_CODES.INVALID_PARAMS]: 'Invalid params',
  [ERROR_CODES.INTERNAL_ERROR]: 'Internal error',
  [ERROR_CODES.SERVER_ERROR]: 'Server error',
  [ERROR_CODES.SERVICE_UNAVAILABLE]: 'Service unavailable',
  [ERROR_CODES.AUTHENTICATION_FAILED]: 'Authentication failed',
  [ERROR_CODES.RATE_LIMIT_EXCEEDED]: 'Rate limit exceeded',
  [ERROR_CODES.RESOURCE_NOT_FOUND]: 'Resource not found',
  [ERROR_CODES.VALIDATION_FAILED]: 'Validation failed',
  [ERROR_CODES.HANDLER_TIMEOUT]: 'Handler timeout',
  [ERROR_CODES.SOCKET_ERROR]: 'Socket error',
  [ERROR_CODES.CONFIGURATION_ERROR]: 'Configuration error',
  [ERROR_CODES.SECURITY_VIOLATION]: 'Security violation',
  [ERROR_CODES.RESOURCE_LIMIT_EXCEEDED]: 'Resource limit exceeded',
};

function isErrorCodeName(name: string): name is ErrorCodeName {
  return name in ERROR_CODES;
}

const CODE_NAMES = new Map<number, ErrorCodeName>();
for (const [name, code] of Object.entries(ERROR_CODES)) {
  if (isErrorCodeName(name)) {
    CODE_NAMES.set(code, name);
  }
}

/**
 * Check whether a number belongs to the fixed enumeration.
 */
export function isKnownErrorCode(code: number): code is ErrorCode {
  return CODE_NAMES.has(code);
}

/**
 * Symbolic name of a code, e.g. -32601 → 'METHOD_NOT_FOUND'.
 */
export function getErrorCodeName(code: number): ErrorCodeName | undefined {
  return CODE_NAMES.get(code);
}

/**
 * Canonical message for a code. Codes outside the enumeration (sent by a
 * newer peer) fall back to the generic server error message.
 */
export function getCanonicalMessage(code: number): string {
  return isKnownErrorCode(code) ? ERROR_MESSAGES[code] : ERROR_MESSAGES[ERROR_CODES.SERVER_ERROR];
}

/**
 * String codes used by the channel-based envelope revision.
 */
const LEGACY_CODES: Readonly<Record<string, ErrorCode>> = {
  UNKNOWN_COMMAND: ERROR_CODES.METHOD_NOT_FOUND,
  VALIDATION_ERROR: ERROR_CODES.VALIDATION_FAILED,
  INVALID_ARGUMENTS: ERROR_CODES.INVALID_PARAMS,
  HANDLER_ERROR: ERROR_CODES.INTERNAL_ERROR,
  HANDLER_TIMEOUT: ERROR_CODES.HANDLER_TIMEOUT,
  SOCKET_ERROR: ERROR_CODES.SOCKET_ERROR,
  SECURITY_VIOLATION: ERROR_CODES.SECURITY_VIOLATION,
  RESOURCE_LIMIT: ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
  SERVICE_UNAVAILABLE: ERROR_CODES.SERVICE_UNAVAILABLE,
  AUTHENTICATION_FAILED: ERROR_CODES.AUTHENTICATION_FAILED,
  CONFIGURATION_ERROR: ERROR_CODES.CONFIGURATION_ERROR,
};

/**
 * Map a legacy string error code to its integer replacement.
 *
 * @example
 * ```typescript
 * mapLegacyErrorCode('UNKNOWN_COMMAND') // -32601
 * mapLegacyErrorCode('SOMETHING_ELSE')  // -32000
 * ```
 */
export function mapLegacyErrorCode(legacyCode: string): ErrorCode {
  return LEGACY_CODES[legacyCode] ?? ERROR_CODES.SERVER_ERROR;
}
