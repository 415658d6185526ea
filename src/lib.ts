/**
 * dgramlink public API.
 */

export * from '@/errors/index.js';
export * from '@/protocol/index.js';
export * from '@/manifest/index.js';
export * from '@/transport/index.js';
export * from '@/client/index.js';
export * from '@/server/index.js';
export {
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_SERVER_CONFIG,
  resolveClientConfig,
  resolveServerConfig,
  type ClientConfig,
  type OverloadPolicy,
  type ServerConfig,
} from '@/config/index.js';
export {
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_TIMEOUT_SECONDS,
  RESERVED_COMMAND_NAMES,
} from '@/constants.js';
export { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '@/types.js';
export {
  createLogger,
  disableDebugLogging,
  enableDebugLogging,
  type Logger,
} from '@/ui/logging/index.js';
