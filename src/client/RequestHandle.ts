/**
 * Request Handle
 *
 * Capability returned to callers of startRequest(). It names the command
 * and tracks the request's final status; the request id stays private to
 * the client that issued it.
 */

export type RequestStatus = 'pending' | 'completed' | 'timedOut' | 'cancelled' | 'failed';

const requestIds = new WeakMap<RequestHandle, string>();

export class RequestHandle {
  private currentStatus: RequestStatus = 'pending';

  constructor(
    requestId: string,
    readonly command: string,
    readonly createdAt: Date = new Date()
  ) {
    requestIds.set(this, requestId);
  }

  get status(): RequestStatus {
    return this.currentStatus;
  }

  get isCancelled(): boolean {
    return this.currentStatus === 'cancelled';
  }

  /**
   * Move from pending to a terminal status. Terminal statuses are final.
   *
   * @returns false if the handle already reached a terminal status
   */
  settle(status: Exclude<RequestStatus, 'pending'>): boolean {
    if (this.currentStatus !== 'pending') {
      return false;
    }
    this.currentStatus = status;
    return true;
  }
}

/**
 * Look up the request id behind a handle. For use by the issuing client only.
 */
export function getHandleRequestId(handle: RequestHandle): string | undefined {
  return requestIds.get(handle);
}
