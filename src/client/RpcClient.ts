/**
 * RPC Client
 *
 * Sends requests to one server socket and correlates each response through
 * a reply socket bound for that request alone. Every request with a reply
 * address ends in exactly one of: completed, timed out, cancelled (or
 * failed, when it never reached the server).
 */

import { EventEmitter } from 'events';

import { resolveClientConfig, type ClientConfig } from '@/config/index.js';
import { RESERVED_COMMAND_NAMES } from '@/constants.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { validateRequestArgs, type Manifest } from '@/manifest/index.js';
import {
  ProtocolDecodeError,
  TIMEOUT_RANGE,
  createRequest,
  decodeResponse,
  encodeRequest,
  generateReplyAddress,
  isTimeoutInRange,
  validateCommandName,
  validateSocketPath,
  type RpcRequest,
  type RpcResponse,
} from '@/protocol/index.js';
import { UnixDatagramTransport, type DatagramTransport } from '@/transport/index.js';
import type { JsonObject, JsonValue } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import { PendingRequestManager, type PendingRequest } from './PendingRequestManager.js';
import { RequestHandle, getHandleRequestId, type RequestStatus } from './RequestHandle.js';
import { RequestCancelledError, RequestTimeoutError } from './errors.js';

export interface RpcClientOptions extends Partial<ClientConfig> {
  /** Defaults to the Unix datagram transport */
  transport?: DatagramTransport;
  /** Enables local validation of requests before they are sent */
  manifest?: Manifest;
}

export interface RequestOptions {
  /** Deadline in seconds (defaults to the client's defaultTimeout) */
  timeout?: number;
}

export interface TimeoutEvent {
  requestId: string;
  command: string;
  /** Deadline that was exceeded, in seconds */
  timeout: number;
}

export interface ClientStatistics {
  /** Requests registered as pending */
  totalRequests: number;
  /** Requests answered by the server (success or error response) */
  completed: number;
  /** Completed requests whose response carried an error */
  errorResponses: number;
  timedOut: number;
  cancelled: number;
  /** Requests that could not be sent */
  failed: number;
  pending: number;
  /** Mean time from send to response for completed requests, in milliseconds */
  averageResponseTime: number;
}

type RpcClientEvents = {
  timeout: (event: TimeoutEvent) => void;
  discarded: (response: RpcResponse) => void;
};

/**
 * Client for one server socket.
 *
 * @example
 * ```typescript
 * const client = new RpcClient('/tmp/app.sock', { defaultTimeout: 5 });
 * const result = await client.call('createWorkspace', { name: 'lib-1' });
 * await client.close();
 * ```
 */
export class RpcClient extends EventEmitter {
  readonly socketPath: string;
  private readonly config: ClientConfig;
  private readonly transport: DatagramTransport;
  private readonly manifest: Manifest | undefined;
  private readonly pending = new PendingRequestManager();
  private readonly log = createLogger('client');
  private closed = false;

  private readonly stats = {
    totalRequests: 0,
    completed: 0,
    errorResponses: 0,
    timedOut: 0,
    cancelled: 0,
    failed: 0,
    totalResponseTime: 0,
  };

  /**
   * @throws RpcError SECURITY_VIOLATION if the socket path is unsafe,
   *   CONFIGURATION_ERROR on an invalid option
   */
  constructor(socketPath: string, options: RpcClientOptions = {}) {
    super();
    validateSocketPath(socketPath);
    const { transport, manifest, ...config } = options;
    this.socketPath = socketPath;
    this.config = resolveClientConfig(config);
    this.transport = transport ?? new UnixDatagramTransport();
    this.manifest = manifest;
  }

  override on<Event extends keyof RpcClientEvents>(
    event: Event,
    listener: RpcClientEvents[Event]
  ): this {
    return super.on(event, listener);
  }

  override once<Event extends keyof RpcClientEvents>(
    event: Event,
    listener: RpcClientEvents[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof RpcClientEvents>(
    event: Event,
    listener: RpcClientEvents[Event]
  ): this {
    return super.off(event, listener);
  }

  /**
   * Send a request and wait for its response.
   *
   * Resolves with the response whether it carries a result or an error.
   * Rejects with RequestTimeoutError when the deadline passes first,
   * RequestCancelledError when cancelled, or RpcError when the request is
   * refused locally or cannot be sent.
   */
  sendRequest(
    command: string,
    args?: JsonObject,
    options: RequestOptions = {}
  ): Promise<RpcResponse> {
    return this.startRequest(command, args, options).response;
  }

  /**
   * Send a request and return a handle for cancelling it alongside the
   * response promise.
   *
   * @example
   * ```typescript
   * const { handle, response } = client.startRequest('slow_process');
   * client.cancelRequest(handle);
   * await response.catch((error) => console.error(error.message));
   * ```
   */
  startRequest(
    command: string,
    args?: JsonObject,
    options: RequestOptions = {}
  ): { handle: RequestHandle; response: Promise<RpcResponse> } {
    let request: RpcRequest | undefined;
    let setupError: unknown;
    try {
      const timeout = this.resolveTimeout(options);
      request = createRequest(command, args, {
        timeout,
        replyTo: generateReplyAddress(this.config.replyDirectory),
      });
    } catch (error) {
      setupError = error;
    }

    if (request === undefined) {
      const handle = new RequestHandle('', command);
      handle.settle('failed');
      return { handle, response: Promise.reject(RpcError.from(setupError)) };
    }

    const handle = new RequestHandle(request.id, command);
    return { handle, response: this.dispatch(request, handle) };
  }

  /**
   * Send a request and return its result.
   *
   * @throws RpcError carrying the server's error when the response is a failure
   */
  async call(command: string, args?: JsonObject, options: RequestOptions = {}): Promise<JsonValue> {
    const response = await this.sendRequest(command, args, options);
    if (!response.success) {
      throw RpcError.fromStructuredError(response.error);
    }
    return response.result;
  }

  /**
   * Send a request without a reply address. The server runs the handler
   * but never answers; nothing is tracked locally.
   */
  async sendNotification(command: string, args?: JsonObject): Promise<void> {
    this.assertOpen();
    const request = createRequest(command, args);
    const payload = this.prepare(request);
    await this.transport.send(this.socketPath, payload);
    this.log.debug(`Sent notification ${command} (${request.id})`);
  }

  /**
   * Check whether the server answers the built-in `ping` command.
   */
  async ping(timeout?: number): Promise<boolean> {
    try {
      const response = await this.sendRequest(
        'ping',
        undefined,
        timeout !== undefined ? { timeout } : {}
      );
      return response.success;
    } catch (error) {
      this.log.debug(`Ping failed: ${getErrorMessage(error)}`);
      return false;
    }
  }

  /**
   * Cancel a pending request. Its response promise rejects with
   * RequestCancelledError and any later response is discarded.
   *
   * @returns false if the request had already finished; never throws
   */
  cancelRequest(handle: RequestHandle, reason?: string): boolean {
    const requestId = getHandleRequestId(handle);
    if (requestId === undefined) {
      return false;
    }
    const entry = this.pending.remove(requestId);
    if (!entry) {
      return false;
    }
    this.stats.cancelled++;
    entry.handle.settle('cancelled');
    this.log.debug(`Cancelled ${entry.command} (${requestId})`);
    entry.reject(new RequestCancelledError(requestId, entry.command, reason));
    this.releaseEndpoint(entry);
    return true;
  }

  /**
   * Cancel every pending request.
   *
   * @returns Number of requests cancelled
   */
  cancelAllRequests(reason?: string): number {
    const entries = this.pending.clear();
    for (const entry of entries) {
      this.stats.cancelled++;
      entry.handle.settle('cancelled');
      entry.reject(new RequestCancelledError(entry.requestId, entry.command, reason));
      this.releaseEndpoint(entry);
    }
    return entries.length;
  }

  getRequestStatus(handle: RequestHandle): RequestStatus {
    return handle.status;
  }

  getPendingRequestCount(): number {
    return this.pending.size;
  }

  getStatistics(): ClientStatistics {
    const { totalResponseTime, ...counters } = this.stats;
    return {
      ...counters,
      pending: this.pending.size,
      averageResponseTime: counters.completed > 0 ? totalResponseTime / counters.completed : 0,
    };
  }

  /**
   * Cancel everything outstanding and refuse further requests.
   */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    const cancelled = this.cancelAllRequests('Client closed');
    if (cancelled > 0) {
      this.log.debug(`Closed with ${cancelled} pending request(s) cancelled`);
    }
    return Promise.resolve();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw RpcError.create(ERROR_CODES.SERVICE_UNAVAILABLE, 'Client is closed');
    }
  }

  private resolveTimeout(options: RequestOptions): number {
    const timeout = options.timeout ?? this.config.defaultTimeout;
    if (!isTimeoutInRange(timeout)) {
      throw RpcError.invalidParams('timeout', `Timeout must be ${TIMEOUT_RANGE}`, timeout);
    }
    return timeout;
  }

  /**
   * Apply local checks and encode the request.
   *
   * @throws RpcError with the same error the server would answer
   */
  private prepare(request: RpcRequest): Buffer {
    validateCommandName(request.command);

    if (
      this.manifest !== undefined &&
      this.config.enableValidation &&
      !RESERVED_COMMAND_NAMES.has(request.command)
    ) {
      const result = validateRequestArgs(this.manifest, request.command, request.args);
      if (!result.valid) {
        throw result.error;
      }
    }

    const payload = encodeRequest(request);
    if (payload.length > this.config.maxMessageSize) {
      throw RpcError.withContext(
        ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
        `Request of ${payload.length} bytes exceeds maximum message size of ${this.config.maxMessageSize}`,
        { size: payload.length, maxMessageSize: this.config.maxMessageSize }
      );
    }
    return payload;
  }

  private dispatch(request: RpcRequest, handle: RequestHandle): Promise<RpcResponse> {
    let payload: Buffer;
    try {
      this.assertOpen();
      payload = this.prepare(request);
      if (this.pending.size >= this.config.maxPendingRequests) {
        throw RpcError.withContext(
          ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
          `Too many pending requests (limit ${this.config.maxPendingRequests})`,
          { maxPendingRequests: this.config.maxPendingRequests }
        );
      }
    } catch (error) {
      handle.settle('failed');
      return Promise.reject(RpcError.from(error));
    }

    const replyTo = request.replyTo ?? generateReplyAddress(this.config.replyDirectory);
    const timeout = request.timeout ?? this.config.defaultTimeout;

    return new Promise<RpcResponse>((resolve, reject) => {
      const entry: PendingRequest = {
        requestId: request.id,
        command: request.command,
        handle,
        replyTo,
        timeout,
        createdAt: Date.now(),
        timer: setTimeout(() => this.handleTimeout(request.id), timeout * 1000),
        resolve,
        reject,
      };
      this.pending.add(entry);
      this.stats.totalRequests++;

      void this.bindAndSend(entry, payload);
    });
  }

  /**
   * Bind the reply socket, then send. The reply socket must exist before
   * the request leaves, or a fast server could answer into the void.
   */
  private async bindAndSend(entry: PendingRequest, payload: Buffer): Promise<void> {
    try {
      const endpoint = await this.transport.bind(entry.replyTo, (data) =>
        this.handleReply(entry.requestId, data)
      );
      if (!this.pending.has(entry.requestId)) {
        // Finished (cancelled or timed out) while binding
        await endpoint.close();
        return;
      }
      entry.endpoint = endpoint;

      await this.transport.send(this.socketPath, payload);
      this.log.debug(`Sent ${entry.command} (${entry.requestId}) to ${this.socketPath}`);
    } catch (error) {
      const removed = this.pending.remove(entry.requestId);
      if (!removed) {
        this.log.debug(`Send of ${entry.command} failed after it finished: ${getErrorMessage(error)}`);
        return;
      }
      this.stats.failed++;
      removed.handle.settle('failed');
      removed.reject(RpcError.from(error));
      this.releaseEndpoint(removed);
    }
  }

  private handleReply(requestId: string, data: Buffer): void {
    let response: RpcResponse;
    try {
      response = decodeResponse(data);
    } catch (error) {
      if (error instanceof ProtocolDecodeError) {
        this.log.debug(`Discarding undecodable response for ${requestId}: ${error.message}`);
        return;
      }
      throw error;
    }

    if (response.requestId !== requestId) {
      this.log.debug(`Discarding uncorrelated response ${response.requestId} at reply address of ${requestId}`);
      this.emitDiscarded(response);
      return;
    }

    const entry = this.pending.remove(requestId);
    if (!entry) {
      this.log.debug(`Discarding late response for ${requestId}`);
      this.emitDiscarded(response);
      return;
    }

    this.stats.completed++;
    this.stats.totalResponseTime += Date.now() - entry.createdAt;
    if (!response.success) {
      this.stats.errorResponses++;
    }
    entry.handle.settle('completed');
    entry.resolve(response);
    this.releaseEndpoint(entry);
  }

  private handleTimeout(requestId: string): void {
    const entry = this.pending.remove(requestId);
    if (!entry) {
      return;
    }
    this.stats.timedOut++;
    entry.handle.settle('timedOut');
    this.log.debug(`${entry.command} (${requestId}) timed out after ${entry.timeout}s`);
    this.emit('timeout', { requestId, command: entry.command, timeout: entry.timeout });
    entry.reject(new RequestTimeoutError(requestId, entry.command, entry.timeout));
    this.releaseEndpoint(entry);
  }

  private emitDiscarded(response: RpcResponse): void {
    if (this.listenerCount('discarded') > 0) {
      this.emit('discarded', response);
    }
  }

  /**
   * Close and unlink the reply socket of a finished request.
   */
  private releaseEndpoint(entry: PendingRequest): void {
    const endpoint = entry.endpoint;
    if (endpoint === undefined) {
      return;
    }
    delete entry.endpoint;
    void endpoint.close().catch((error: unknown) => {
      this.log.debug(`Failed to close reply socket ${entry.replyTo}: ${getErrorMessage(error)}`);
    });
  }
}
