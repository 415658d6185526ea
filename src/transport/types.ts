/**
 * Transport Contract
 *
 * A transport moves opaque payloads between socket paths. The protocol
 * layer never sees sockets; client and server only see this interface.
 */

/**
 * Called once per received message with the complete payload.
 */
export type MessageListener = (payload: Buffer) => void;

export interface BindOptions {
  /** Remove a leftover socket file before binding */
  cleanupStale?: boolean;
  /** Remove the socket file on close (default true) */
  unlinkOnClose?: boolean;
  /** Receives socket errors that occur after binding */
  onError?: (error: Error) => void;
}

/**
 * A bound socket receiving messages.
 */
export interface TransportEndpoint {
  readonly path: string;
  /** Stop receiving. Safe to call more than once. */
  close(): Promise<void>;
}

export interface DatagramTransport {
  readonly kind: 'dgram' | 'stream' | 'memory';

  /**
   * Bind a socket at `path` and deliver every message to `onMessage`.
   *
   * @throws RpcError SOCKET_ERROR if the socket cannot be bound
   */
  bind(path: string, onMessage: MessageListener, options?: BindOptions): Promise<TransportEndpoint>;

  /**
   * Send one message to the socket bound at `path`.
   *
   * @throws RpcError SERVICE_UNAVAILABLE if nothing listens at `path`,
   *   SOCKET_ERROR for any other failure
   */
  send(path: string, payload: Buffer): Promise<void>;
}
