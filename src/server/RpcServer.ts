/**
 * RPC Server
 *
 * Binds a socket, dispatches each received request to its handler and sends
 * exactly one response to the request's reply address (none when it has
 * none). The receive path never waits for a handler: each request runs
 * independently, bounded by the handler concurrency limit.
 */

import { EventEmitter } from 'events';

import { resolveServerConfig, type ServerConfig } from '@/config/index.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import {
  validateRequestArgs,
  validateResponseValue,
  type Manifest,
  type ResponseValidationError,
} from '@/manifest/index.js';
import {
  ProtocolDecodeError,
  createErrorResponse,
  createSuccessResponse,
  decodeRequest,
  encodeResponse,
  validateCommandName,
  validateRequestId,
  validateSocketPath,
  type RpcRequest,
  type RpcResponse,
} from '@/protocol/index.js';
import {
  UnixDatagramTransport,
  type DatagramTransport,
  type TransportEndpoint,
} from '@/transport/index.js';
import { isJsonValue } from '@/types.js';
import { createLogger } from '@/ui/logging/index.js';
import { ConcurrencyLimiter, raceWithTimeout } from '@/utils/concurrency.js';
import { getErrorMessage } from '@/utils/errors.js';

import { HandlerRegistry, type RequestHandler } from './HandlerRegistry.js';
import { registerBuiltins } from './builtins.js';

export interface RpcServerOptions extends Partial<ServerConfig> {
  /** Defaults to the Unix datagram transport */
  transport?: DatagramTransport;
  /** Arguments of commands it declares are validated before dispatch */
  manifest?: Manifest;
}

export interface ResponseValidationFailedEvent {
  request: RpcRequest;
  response: RpcResponse;
  errors: ResponseValidationError[];
}

export type ServerStatistics = {
  running: boolean;
  /** Seconds since start(), 0 when not running */
  uptime: number;
  startTime: string | null;
  requestsReceived: number;
  responsesSent: number;
  errorResponses: number;
  /** Requests without a reply address that were processed */
  notifications: number;
  handlerTimeouts: number;
  /** Requests refused because every handler slot was busy */
  overloadRejections: number;
  /** Datagrams dropped as oversized, undecodable or unsafe */
  droppedMessages: number;
  /** Responses that could not be delivered */
  deliveryFailures: number;
  activeHandlers: number;
  queuedHandlers: number;
  registeredHandlers: number;
};

type RpcServerEvents = {
  listening: (socketPath: string) => void;
  request: (request: RpcRequest) => void;
  response: (response: RpcResponse, request: RpcRequest) => void;
  error: (error: Error) => void;
  responseValidationFailed: (event: ResponseValidationFailedEvent) => void;
};

/**
 * Dispatch engine for one socket path.
 *
 * @example
 * ```typescript
 * const server = new RpcServer('/tmp/app.sock', { manifest });
 * server.registerHandler('createWorkspace', (request) => ({ created: request.args?.['name'] ?? null }));
 * await server.start();
 * ```
 */
export class RpcServer extends EventEmitter {
  readonly socketPath: string;
  private readonly config: ServerConfig;
  private readonly transport: DatagramTransport;
  private readonly registry = new HandlerRegistry();
  private readonly limiter: ConcurrencyLimiter;
  private readonly log = createLogger('server');
  private manifest: Manifest | undefined;
  private endpoint: TransportEndpoint | null = null;
  private startedAt: Date | null = null;

  private readonly stats = {
    requestsReceived: 0,
    responsesSent: 0,
    errorResponses: 0,
    notifications: 0,
    handlerTimeouts: 0,
    overloadRejections: 0,
    droppedMessages: 0,
    deliveryFailures: 0,
  };

  /**
   * @throws RpcError SECURITY_VIOLATION if the socket path is unsafe,
   *   CONFIGURATION_ERROR on an invalid option
   */
  constructor(socketPath: string, options: RpcServerOptions = {}) {
    super();
    validateSocketPath(socketPath);
    const { transport, manifest, ...config } = options;
    this.socketPath = socketPath;
    this.config = resolveServerConfig(config);
    this.transport = transport ?? new UnixDatagramTransport();
    this.manifest = manifest;
    this.limiter = new ConcurrencyLimiter(this.config.maxConcurrentHandlers);

    if (this.config.registerBuiltins) {
      registerBuiltins({
        registry: this.registry,
        getManifest: () => this.manifest,
        getStatistics: () => this.getStatistics(),
      });
    }
  }

  override on<Event extends keyof RpcServerEvents>(
    event: Event,
    listener: RpcServerEvents[Event]
  ): this {
    return super.on(event, listener);
  }

  override once<Event extends keyof RpcServerEvents>(
    event: Event,
    listener: RpcServerEvents[Event]
  ): this {
    return super.once(event, listener);
  }

  override off<Event extends keyof RpcServerEvents>(
    event: Event,
    listener: RpcServerEvents[Event]
  ): this {
    return super.off(event, listener);
  }

  /**
   * Register a handler, replacing any previous one for the command.
   *
   * @throws RpcError SECURITY_VIOLATION if the command name is invalid
   */
  registerHandler(command: string, handler: RequestHandler): void {
    this.registry.register(command, handler);
  }

  unregisterHandler(command: string): boolean {
    return this.registry.unregister(command);
  }

  getRegisteredCommands(): string[] {
    return this.registry.commands();
  }

  setManifest(manifest: Manifest | undefined): void {
    this.manifest = manifest;
  }

  getManifest(): Manifest | undefined {
    return this.manifest;
  }

  isRunning(): boolean {
    return this.endpoint !== null;
  }

  /**
   * Bind the socket and start receiving.
   *
   * @throws RpcError SOCKET_ERROR if the socket cannot be bound
   */
  async start(): Promise<void> {
    if (this.endpoint) {
      throw RpcError.create(ERROR_CODES.SERVER_ERROR, 'Server is already running');
    }

    this.endpoint = await this.transport.bind(this.socketPath, (payload) => this.receive(payload), {
      cleanupStale: this.config.cleanupOnStart,
      unlinkOnClose: this.config.cleanupOnShutdown,
      onError: (error) => this.reportError(error),
    });
    this.startedAt = new Date();

    this.log.info(`Listening on ${this.socketPath} (${this.transport.kind})`);
    this.emit('listening', this.socketPath);
  }

  /**
   * Stop receiving. Handlers already running finish and their responses
   * are still delivered.
   */
  async stop(): Promise<void> {
    const endpoint = this.endpoint;
    if (!endpoint) {
      return;
    }
    this.endpoint = null;
    this.startedAt = null;
    await endpoint.close();
    this.log.info(`Stopped listening on ${this.socketPath}`);
  }

  getStatistics(): ServerStatistics {
    const startedAt = this.startedAt;
    return {
      running: this.isRunning(),
      uptime: startedAt ? (Date.now() - startedAt.getTime()) / 1000 : 0,
      startTime: startedAt ? startedAt.toISOString() : null,
      ...this.stats,
      activeHandlers: this.limiter.getRunningCount(),
      queuedHandlers: this.limiter.getQueueSize(),
      registeredHandlers: this.registry.size,
    };
  }

  /**
   * Entry point for every received datagram. Never awaits a handler.
   */
  private receive(payload: Buffer): void {
    if (payload.length > this.config.maxMessageSize) {
      this.drop(
        RpcError.withContext(
          ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
          `Dropped datagram of ${payload.length} bytes (limit ${this.config.maxMessageSize})`,
          { size: payload.length, maxMessageSize: this.config.maxMessageSize }
        )
      );
      return;
    }

    let request: RpcRequest;
    try {
      request = decodeRequest(payload);
    } catch (error) {
      this.handleMalformed(error);
      return;
    }

    this.stats.requestsReceived++;
    this.emit('request', request);
    this.log.debug(`Received ${request.command} (${request.id})`);

    if (request.replyTo !== undefined) {
      try {
        validateSocketPath(request.replyTo, 'reply_to');
      } catch (error) {
        // An unsafe reply address cannot be answered
        this.drop(RpcError.from(error));
        return;
      }
    }

    try {
      validateRequestId(request.id);
      validateCommandName(request.command);
    } catch (error) {
      this.respond(request, createErrorResponse(request.id, RpcError.from(error)));
      return;
    }

    const task = (): Promise<RpcResponse> => this.process(request);
    let processing: Promise<RpcResponse> | null;
    if (this.config.overloadPolicy === 'queue') {
      processing = this.limiter.run(task);
    } else {
      processing = this.limiter.tryRun(task);
    }

    if (processing === null) {
      this.stats.overloadRejections++;
      this.respond(
        request,
        createErrorResponse(
          request.id,
          RpcError.withContext(
            ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
            `All ${this.config.maxConcurrentHandlers} handler slots are busy`,
            { maxConcurrentHandlers: this.config.maxConcurrentHandlers }
          )
        )
      );
      return;
    }

    void processing.then(
      (response) => this.respond(request, response),
      (error: unknown) =>
        this.respond(request, createErrorResponse(request.id, RpcError.from(error)))
    );
  }

  /**
   * Route, validate and run one request under its deadline.
   */
  private async process(request: RpcRequest): Promise<RpcResponse> {
    const handler = this.registry.get(request.command);
    if (!handler) {
      return createErrorResponse(
        request.id,
        RpcError.withContext(
          ERROR_CODES.METHOD_NOT_FOUND,
          `Command '${request.command}' is not registered`,
          { command: request.command }
        )
      );
    }

    let dispatched = request;
    const manifest = this.manifest;
    if (this.config.enableValidation && manifest?.commands.has(request.command)) {
      const validation = validateRequestArgs(manifest, request.command, request.args);
      if (!validation.valid) {
        this.log.debug(`Rejected ${request.command} (${request.id}): ${validation.error.describe()}`);
        return createErrorResponse(request.id, validation.error);
      }
      dispatched = Object.freeze({ ...request, args: Object.freeze(validation.args) });
    }

    const timeout = request.timeout ?? this.config.defaultTimeout;
    const outcome = await raceWithTimeout(
      async (signal) => handler(dispatched, { signal, timeout }),
      timeout * 1000
    );

    switch (outcome.status) {
      case 'timedOut':
        this.stats.handlerTimeouts++;
        this.log.debug(`Handler for ${request.command} (${request.id}) exceeded ${timeout}s`);
        return createErrorResponse(
          request.id,
          RpcError.withContext(
            ERROR_CODES.HANDLER_TIMEOUT,
            `Handler for '${request.command}' exceeded ${timeout}s`,
            { requestId: request.id, timeout }
          )
        );
      case 'failed': {
        const error = RpcError.from(outcome.error);
        this.log.debug(`Handler for ${request.command} (${request.id}) failed: ${error.describe()}`);
        return createErrorResponse(request.id, error);
      }
      case 'completed':
        return this.buildSuccess(request, outcome.value);
    }
  }

  private buildSuccess(request: RpcRequest, value: unknown): RpcResponse {
    const result = value === undefined ? null : value;
    if (!isJsonValue(result)) {
      return createErrorResponse(
        request.id,
        RpcError.create(
          ERROR_CODES.INTERNAL_ERROR,
          `Handler for '${request.command}' returned a value that is not JSON`
        )
      );
    }

    const response = createSuccessResponse(request.id, result);
    const manifest = this.manifest;
    if (manifest?.commands.has(request.command)) {
      const validation = validateResponseValue(manifest, request.command, result);
      if (!validation.valid) {
        this.log.debug(
          `Response of ${request.command} (${request.id}) does not match its manifest: ` +
            validation.errors.map((error) => `${error.field}: ${error.message}`).join('; ')
        );
        if (this.listenerCount('responseValidationFailed') > 0) {
          this.emit('responseValidationFailed', { request, response, errors: validation.errors });
        }
      }
    }
    return response;
  }

  /**
   * Send the response to the request's reply address, if it has one.
   * Delivery failures are reported and never propagate.
   */
  private respond(request: RpcRequest, response: RpcResponse): void {
    const replyTo = request.replyTo;
    if (replyTo === undefined) {
      this.stats.notifications++;
      return;
    }

    let payload = encodeResponse(response);
    let delivered = response;
    if (payload.length > this.config.maxMessageSize) {
      delivered = createErrorResponse(
        request.id,
        RpcError.withContext(
          ERROR_CODES.RESOURCE_LIMIT_EXCEEDED,
          `Response of ${payload.length} bytes exceeds maximum message size of ${this.config.maxMessageSize}`,
          { size: payload.length, maxMessageSize: this.config.maxMessageSize }
        )
      );
      payload = encodeResponse(delivered);
    }

    void this.transport.send(replyTo, payload).then(
      () => {
        this.stats.responsesSent++;
        if (!delivered.success) {
          this.stats.errorResponses++;
        }
        this.emit('response', delivered, request);
      },
      (error: unknown) => {
        this.stats.deliveryFailures++;
        this.log.debug(
          `Failed to deliver response for ${request.command} (${request.id}) to ${replyTo}: ${getErrorMessage(error)}`
        );
        this.reportError(RpcError.from(error));
      }
    );
  }

  private handleMalformed(error: unknown): void {
    if (!(error instanceof ProtocolDecodeError)) {
      this.drop(RpcError.from(error));
      return;
    }

    const { id, replyTo } = error.recovered;
    const parseError = RpcError.create(ERROR_CODES.PARSE_ERROR, error.message);
    this.drop(parseError);

    if (replyTo === undefined || !this.config.replyToMalformedRequests) {
      return;
    }
    try {
      validateSocketPath(replyTo, 'reply_to');
    } catch (unsafe) {
      this.log.debug(`Not answering malformed request at unsafe address: ${getErrorMessage(unsafe)}`);
      return;
    }

    const requestId = id !== undefined && id.length > 0 ? id : 'unknown';
    const response = createErrorResponse(requestId, parseError);
    void this.transport.send(replyTo, encodeResponse(response)).then(
      () => {
        this.stats.responsesSent++;
        this.stats.errorResponses++;
      },
      (sendError: unknown) => {
        this.stats.deliveryFailures++;
        this.reportError(RpcError.from(sendError));
      }
    );
  }

  private drop(error: RpcError): void {
    this.stats.droppedMessages++;
    this.log.debug(`Dropped message: ${error.describe()}`);
    this.reportError(error);
  }

  /**
   * Emit an 'error' event only when someone listens; an unheard 'error'
   * event would throw from the receive path.
   */
  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    }
  }
}
