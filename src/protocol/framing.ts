/**
 * Length-Prefixed Framing
 *
 * Stream sockets do not preserve message boundaries, so the stream fallback
 * transport prefixes each payload with its length as a 4-byte big-endian
 * unsigned integer. Datagram transports send payloads as-is.
 */

import { ProtocolDecodeError } from './envelope.js';

/** Size of the length prefix in bytes */
export const FRAME_HEADER_SIZE = 4;

/**
 * Prefix a payload with its 4-byte big-endian length.
 *
 * @throws ProtocolDecodeError if the payload is empty
 */
export function encodeFrame(payload: Buffer): Buffer {
  if (payload.length === 0) {
    throw new ProtocolDecodeError('Cannot frame an empty payload');
  }
  const header = Buffer.alloc(FRAME_HEADER_SIZE);
  header.writeUInt32BE(payload.length, 0);
  return Buffer.concat([header, payload]);
}

/**
 * Accumulates stream chunks and yields complete frame payloads.
 * Keeps partial frames buffered across calls.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameSize: number) {}

  /**
   * Append a chunk and return every payload completed by it.
   *
   * @throws ProtocolDecodeError on a zero-length frame or one larger than the maximum;
   *   the stream is unusable afterwards and should be closed
   */
  push(chunk: Buffer): Buffer[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    const frames: Buffer[] = [];
    while (this.buffer.length >= FRAME_HEADER_SIZE) {
      const length = this.buffer.readUInt32BE(0);
      if (length === 0) {
        throw new ProtocolDecodeError('Zero-length frame');
      }
      if (length > this.maxFrameSize) {
        throw new ProtocolDecodeError(
          `Frame of ${length} bytes exceeds maximum of ${this.maxFrameSize}`
        );
      }
      if (this.buffer.length < FRAME_HEADER_SIZE + length) {
        break;
      }
      frames.push(this.buffer.subarray(FRAME_HEADER_SIZE, FRAME_HEADER_SIZE + length));
      this.buffer = this.buffer.subarray(FRAME_HEADER_SIZE + length);
    }
    return frames;
  }

  /** Number of buffered bytes not yet forming a complete frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }
}
