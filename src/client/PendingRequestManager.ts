/**
 * Pending Request Manager
 *
 * Tracks requests waiting for a response, each with its own deadline timer.
 * Removing an entry is the single point of resolution: whichever of
 * response, timeout or cancellation removes it first owns the outcome.
 */

import type { RpcResponse } from '@/protocol/index.js';
import type { TransportEndpoint } from '@/transport/index.js';

import type { RequestHandle } from './RequestHandle.js';

/**
 * Request waiting for a response at its reply address.
 */
export interface PendingRequest {
  requestId: string;
  command: string;
  handle: RequestHandle;
  /** Reply socket path */
  replyTo: string;
  /** Bound reply socket; set once binding completes */
  endpoint?: TransportEndpoint;
  /** Deadline in seconds */
  timeout: number;
  /** Epoch milliseconds when the request was registered */
  createdAt: number;
  timer: NodeJS.Timeout;
  resolve: (response: RpcResponse) => void;
  reject: (error: Error) => void;
}

/**
 * Manages pending requests with automatic timeout cleanup.
 */
export class PendingRequestManager {
  private readonly pending = new Map<string, PendingRequest>();

  /**
   * Add a pending request. The id must not already be pending.
   */
  add(request: PendingRequest): void {
    if (this.pending.has(request.requestId)) {
      throw new Error(`Request ${request.requestId} is already pending`);
    }
    this.pending.set(request.requestId, request);
  }

  /**
   * Get a pending request by ID.
   */
  get(requestId: string): PendingRequest | undefined {
    return this.pending.get(requestId);
  }

  has(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  /**
   * Remove a pending request and clear its timeout.
   *
   * @returns The entry, or undefined if it was already removed
   */
  remove(requestId: string): PendingRequest | undefined {
    const request = this.pending.get(requestId);
    if (request) {
      clearTimeout(request.timer);
      this.pending.delete(requestId);
    }
    return request;
  }

  /**
   * Get all pending requests.
   */
  getAll(): IterableIterator<[string, PendingRequest]> {
    return this.pending.entries();
  }

  /**
   * Get number of pending requests.
   */
  get size(): number {
    return this.pending.size;
  }

  /**
   * Remove every pending request, clearing their timeouts.
   *
   * @returns The removed entries
   */
  clear(): PendingRequest[] {
    const removed = [...this.pending.values()];
    for (const request of removed) {
      clearTimeout(request.timer);
    }
    this.pending.clear();
    return removed;
  }
}
