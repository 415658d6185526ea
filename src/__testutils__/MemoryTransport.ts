/**
 * MemoryTransport - In-process transport fake for testing
 *
 * Implements the DatagramTransport contract over a shared in-memory map of
 * bound paths, so clients and servers can talk without touching the
 * filesystem. Delivery is asynchronous (next macrotask) like a real socket.
 *
 * Key features:
 * - Sending to an unbound path fails with ENOENT like a missing socket file
 * - Binding a bound path fails with EADDRINUSE unless cleanupStale is set
 * - Test control methods (dropMessagesTo, failNextSend, holdCloses) for loss,
 *   errors and listeners that outlive their endpoint
 * - Defensive copies in verification methods (getSentMessages)
 */

import {
  toBindError,
  toSendError,
  type BindOptions,
  type DatagramTransport,
  type MessageListener,
  type TransportEndpoint,
} from '@/transport/index.js';

export interface SentMessage {
  path: string;
  payload: Buffer;
}

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code });
}

export class MemoryTransport implements DatagramTransport {
  readonly kind = 'memory';
  private readonly bindings = new Map<string, MessageListener>();
  private readonly dropped = new Set<string>();
  private sent: SentMessage[] = [];
  private nextSendError: Error | null = null;
  private holding = false;
  private heldCloses: Array<() => void> = [];

  bind(
    path: string,
    onMessage: MessageListener,
    options: BindOptions = {}
  ): Promise<TransportEndpoint> {
    if (this.bindings.has(path) && !options.cleanupStale) {
      return Promise.reject(toBindError(systemError('EADDRINUSE', `address in use ${path}`), path));
    }
    this.bindings.set(path, onMessage);

    let closed = false;
    return Promise.resolve({
      path,
      close: (): Promise<void> => {
        const unbind = (): void => {
          if (this.bindings.get(path) === onMessage) {
            this.bindings.delete(path);
          }
        };
        if (!closed) {
          if (this.holding) {
            this.heldCloses.push(unbind);
          } else {
            unbind();
          }
        }
        closed = true;
        return Promise.resolve();
      },
    });
  }

  send(path: string, payload: Buffer): Promise<void> {
    const injected = this.nextSendError;
    if (injected !== null) {
      this.nextSendError = null;
      return Promise.reject(toSendError(injected, path));
    }
    const listener = this.bindings.get(path);
    if (listener === undefined) {
      return Promise.reject(toSendError(systemError('ENOENT', `no such socket ${path}`), path));
    }

    const copy = Buffer.from(payload);
    this.sent.push({ path, payload: copy });
    if (!this.dropped.has(path)) {
      setImmediate(() => listener(Buffer.from(copy)));
    }
    return Promise.resolve();
  }

  // ==================== Test Control Methods ====================

  /**
   * Accept but never deliver messages sent to a path.
   */
  dropMessagesTo(path: string): void {
    this.dropped.add(path);
  }

  /**
   * Make the next send() fail with the given system error.
   */
  failNextSend(code: string = 'EPERM'): void {
    this.nextSendError = systemError(code, 'injected send failure');
  }

  /**
   * Keep listeners bound after their endpoint closes, until releaseCloses().
   */
  holdCloses(): void {
    this.holding = true;
  }

  /**
   * Apply every close() held since holdCloses() and stop holding.
   */
  releaseCloses(): void {
    this.holding = false;
    const held = this.heldCloses;
    this.heldCloses = [];
    for (const unbind of held) {
      unbind();
    }
  }

  /**
   * Deliver a raw payload to a bound path, bypassing send() bookkeeping.
   */
  inject(path: string, payload: Buffer | string): boolean {
    const listener = this.bindings.get(path);
    if (listener === undefined) {
      return false;
    }
    listener(typeof payload === 'string' ? Buffer.from(payload) : payload);
    return true;
  }

  // ==================== Verification Methods ====================

  isBound(path: string): boolean {
    return this.bindings.has(path);
  }

  getBoundPaths(): string[] {
    return [...this.bindings.keys()];
  }

  getSentMessages(): SentMessage[] {
    return this.sent.map((message) => ({
      path: message.path,
      payload: Buffer.from(message.payload),
    }));
  }

  /**
   * Decoded JSON of every message sent to a path.
   */
  getSentJson(path: string): unknown[] {
    return this.sent
      .filter((message) => message.path === path)
      .map((message): unknown => JSON.parse(message.payload.toString('utf8')));
  }

  reset(): void {
    this.sent = [];
    this.dropped.clear();
    this.nextSendError = null;
    this.releaseCloses();
  }
}
