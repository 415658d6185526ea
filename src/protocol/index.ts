/**
 * Wire Protocol & Addressing
 */

export type {
  CreateRequestOptions,
  ErrorResponse,
  RequestEnvelope,
  ResponseEnvelope,
  RpcRequest,
  RpcResponse,
  SuccessResponse,
} from './types.js';
export {
  ProtocolDecodeError,
  createErrorResponse,
  createRequest,
  createSuccessResponse,
  decodeRequest,
  decodeResponse,
  encodeRequest,
  encodeResponse,
  formatTimestamp,
  parseTimestamp,
  toRequestEnvelope,
  toResponseEnvelope,
  type RecoveredFields,
} from './envelope.js';
export { FRAME_HEADER_SIZE, FrameDecoder, encodeFrame } from './framing.js';
export { REPLY_ADDRESS_PREFIX, generateReplyAddress } from './replyAddress.js';
export { generateRequestId } from './requestId.js';
export {
  MAX_COMMAND_NAME_LENGTH,
  MAX_REQUEST_ID_LENGTH,
  MAX_SOCKET_PATH_LENGTH,
  TIMEOUT_RANGE,
  isTimeoutInRange,
  validateCommandName,
  validateRequestId,
  validateSocketPath,
} from './security.js';
