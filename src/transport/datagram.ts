/**
 * Unix Datagram Transport
 *
 * AF_UNIX / SOCK_DGRAM sockets through node-unix-socket; Node's dgram
 * module only speaks UDP. Each message is one datagram, so no framing is
 * needed and boundaries are preserved by the kernel.
 */

import { DgramSocket } from 'node-unix-socket';

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

function closeQuietly(socket: DgramSocket, path: string): void {
  try {
    socket.close();
  } catch (error) {
    log.debug(`Error closing socket for ${path}: ${getErrorMessage(error)}`);
  }
}

/**
 * A bound datagram socket.
 */
class DatagramEndpoint implements TransportEndpoint {
  private closed = false;

  constructor(
    readonly path: string,
    private readonly socket: DgramSocket,
    private readonly unlinkOnClose: boolean
  ) {}

  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    closeQuietly(this.socket, this.path);
    if (this.unlinkOnClose) {
      removeSocketFile(this.path, log);
    }
    return Promise.resolve();
  }
}

/**
 * Datagram transport over Unix domain sockets.
 *
 * @example
 * ```typescript
 * const transport = new UnixDatagramTransport();
 * const endpoint = await transport.bind('/tmp/app.sock', (payload) => handle(payload));
 * await transport.send('/tmp/app.sock', Buffer.from('{}'));
 * await endpoint.close();
 * ```
 */
export class UnixDatagramTransport implements DatagramTransport {
  readonly kind = 'dgram';

  bind(
    path: string,
    onMessage: MessageListener,
    options: BindOptions = {}
  ): Promise<TransportEndpoint> {
    if (options.cleanupStale) {
      removeSocketFile(path, log);
    }

    const socket = new DgramSocket();
    try {
      socket.bind(path);
    } catch (error) {
      closeQuietly(socket, path);
      return Promise.reject(toBindError(error, path));
    }

    socket.on('data', (message: Buffer) => {
      try {
        onMessage(message);
      } catch (error) {
        log.info(`Message listener for ${path} threw: ${getErrorMessage(error)}`);
      }
    });
    socket.on('error', (error: Error) => {
      log.debug(`Socket error on ${path}: ${error.message}`);
      options.onError?.(error);
    });
    log.debug(`Bound datagram socket ${path}`);

    return Promise.resolve(new DatagramEndpoint(path, socket, options.unlinkOnClose ?? true));
  }

  /**
   * Send one datagram from a short-lived unbound socket.
   */
  send(path: string, payload: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = new DgramSocket();
      let settled = false;

      const finish = (error?: unknown): void => {
        if (settled) {
          return;
        }
        settled = true;
        closeQuietly(socket, path);
        if (error === undefined || error === null) {
          resolve();
        } else {
          reject(toSendError(error, path));
        }
      };

      socket.on('error', (error: Error) => finish(error));
      try {
        socket.sendTo(payload, 0, payload.length, path, (error: unknown) => finish(error));
      } catch (error) {
        finish(error);
      }
    });
  }
}
