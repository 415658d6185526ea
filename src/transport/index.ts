/**
 * Transport layer
 */

import { UnixDatagramTransport } from './datagram.js';
import { StreamTransport } from './stream.js';
import type { DatagramTransport } from './types.js';

export type {
  BindOptions,
  DatagramTransport,
  MessageListener,
  TransportEndpoint,
} from './types.js';
export { UnixDatagramTransport } from './datagram.js';
export { StreamTransport, type StreamTransportOptions } from './stream.js';
export { removeSocketFile, toBindError, toSendError } from './errors.js';

export type TransportKind = 'dgram' | 'stream';

/**
 * Create a transport by kind.
 */
export function createTransport(kind: TransportKind, maxMessageSize?: number): DatagramTransport {
  if (kind === 'stream') {
    return new StreamTransport(maxMessageSize !== undefined ? { maxMessageSize } : {});
  }
  return new UnixDatagramTransport();
}
