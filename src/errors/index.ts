/**
 * Error taxonomy: fixed numeric codes, canonical messages and the RpcError class.
 */

export {
  ERROR_CODES,
  ERROR_MESSAGES,
  getCanonicalMessage,
  getErrorCodeName,
  isKnownErrorCode,
  mapLegacyErrorCode,
  type ErrorCode,
  type ErrorCodeName,
} from './codes.js';
export {
  RpcError,
  isStructuredError,
  type StructuredError,
  type StructuredErrorData,
} from './RpcError.js';
