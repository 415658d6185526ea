/**
 * Server Dispatch Engine
 */

export {
  RpcServer,
  type ResponseValidationFailedEvent,
  type RpcServerOptions,
  type ServerStatistics,
} from './RpcServer.js';
export {
  HandlerRegistry,
  type HandlerContext,
  type HandlerResult,
  type RequestHandler,
} from './HandlerRegistry.js';
export { SERVER_NAME, registerBuiltins, type BuiltinHost } from './builtins.js';
