/**
 * Client Request Engine
 */

export {
  RpcClient,
  type ClientStatistics,
  type RequestOptions,
  type RpcClientOptions,
  type TimeoutEvent,
} from './RpcClient.js';
export { RequestHandle, type RequestStatus } from './RequestHandle.js';
export { PendingRequestManager, type PendingRequest } from './PendingRequestManager.js';
export { RequestCancelledError, RequestTimeoutError } from './errors.js';
