/**
 * Unix Stream Transport
 *
 * Fallback for hosts without Unix datagram support. One connection carries
 * one message, framed with a 4-byte big-endian length prefix.
 */

import { connect, createServer, type Server, type Socket } from 'net';

import { DEFAULT_MAX_MESSAGE_SIZE } from '@/constants.js';
import { FrameDecoder, encodeFrame } from '@/protocol/framing.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import { removeSocketFile, toBindError, toSendError } from './errors.js';
import type {
  BindOptions,
  DatagramTransport,
  MessageListener,
  TransportEndpoint,
} from './types.js';

const log = createLogger('transport');

export interface StreamTransportOptions {
  /** Largest frame accepted from a peer, in bytes */
  maxMessageSize?: number;
}

/**
 * A listening stream server. Tracks open connections so that close() does
 * not wait for idle peers.
 */
class StreamEndpoint implements TransportEndpoint {
  private readonly sockets = new Set<Socket>();
  private closed = false;

  constructor(
    readonly path: string,
    private readonly server: Server,
    private readonly unlinkOnClose: boolean
  ) {}

  track(socket: Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    await new Promise<void>((resolve) => {
      this.server.close((error) => {
        if (error) {
          log.debug(`Error closing ${this.path}: ${error.message}`);
        }
        resolve();
      });
    });

    if (this.unlinkOnClose) {
      removeSocketFile(this.path, log);
    }
  }
}

/**
 * Stream transport over Unix domain sockets with length-prefixed frames.
 *
 * @example
 * ```typescript
 * const transport = new StreamTransport({ maxMessageSize: 65536 });
 * ```
 */
export class StreamTransport implements DatagramTransport {
  readonly kind = 'stream';
  /** Largest frame accepted from a peer, in bytes */
  readonly maxMessageSize: number;

  constructor(options: StreamTransportOptions = {}) {
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_MESSAGE_SIZE;
  }

  async bind(
    path: string,
    onMessage: MessageListener,
    options: BindOptions = {}
  ): Promise<TransportEndpoint> {
    if (options.cleanupStale) {
      removeSocketFile(path, log);
    }

    const server = createServer();
    const endpoint = new StreamEndpoint(path, server, options.unlinkOnClose ?? true);

    server.on('connection', (socket: Socket) => {
      endpoint.track(socket);
      const decoder = new FrameDecoder(this.maxMessageSize);

      socket.on('data', (chunk: Buffer) => {
        let frames: Buffer[];
        try {
          frames = decoder.push(chunk);
        } catch (error) {
          log.debug(`Dropping connection on ${path}: ${getErrorMessage(error)}`);
          socket.destroy();
          return;
        }
        for (const frame of frames) {
          try {
            onMessage(frame);
          } catch (error) {
            log.info(`Message listener for ${path} threw: ${getErrorMessage(error)}`);
          }
        }
      });

      socket.on('error', (error) => {
        log.debug(`Connection error on ${path}: ${error.message}`);
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onListenError = (error: Error): void => {
        reject(toBindError(error, path));
      };
      server.once('error', onListenError);
      server.listen(path, () => {
        server.off('error', onListenError);
        resolve();
      });
    });

    server.on('error', (error) => {
      log.debug(`Server error on ${path}: ${error.message}`);
      options.onError?.(error);
    });
    log.debug(`Listening on stream socket ${path}`);

    return endpoint;
  }

  /**
   * Connect, write one frame and close the connection.
   */
  send(path: string, payload: Buffer): Promise<void> {
    let frame: Buffer;
    try {
      frame = encodeFrame(payload);
    } catch (error) {
      return Promise.reject(toSendError(error, path));
    }

    return new Promise<void>((resolve, reject) => {
      const socket = connect(path);
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        socket.destroy();
        if (error) {
          reject(toSendError(error, path));
        } else {
          resolve();
        }
      };

      socket.on('error', finish);
      socket.once('connect', () => {
        socket.end(frame, () => finish());
      });
    });
  }
}
