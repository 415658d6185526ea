/**
 * Unit tests for PendingRequestManager
 *
 * Contract: removing an entry clears its timer, and an entry can be
 * removed only once.
 */

import assert from 'node:assert/strict';
import { afterEach, describe, it } from 'node:test';

import { PendingRequestManager, type PendingRequest } from '@/client/PendingRequestManager.js';
import { RequestHandle } from '@/client/RequestHandle.js';
import { delay } from '@/utils/concurrency.js';

const created: PendingRequest[] = [];

function entry(requestId: string, onTimeout: () => void = () => undefined): PendingRequest {
  const request: PendingRequest = {
    requestId,
    command: 'listWorkspaces',
    handle: new RequestHandle(requestId, 'listWorkspaces'),
    replyTo: `/tmp/dgl/${requestId}.sock`,
    timeout: 0.02,
    createdAt: Date.now(),
    timer: setTimeout(onTimeout, 20),
    resolve: () => undefined,
    reject: () => undefined,
  };
  created.push(request);
  return request;
}

void describe('PendingRequestManager', () => {
  afterEach(() => {
    for (const request of created.splice(0)) {
      clearTimeout(request.timer);
    }
  });

  void it('tracks added requests by id', () => {
    const manager = new PendingRequestManager();
    const first = entry('req-1');

    manager.add(first);

    assert.equal(manager.size, 1);
    assert.equal(manager.has('req-1'), true);
    assert.equal(manager.get('req-1'), first);
    assert.equal(manager.get('req-2'), undefined);
  });

  void it('refuses a duplicate id', () => {
    const manager = new PendingRequestManager();
    manager.add(entry('req-1'));

    assert.throws(() => manager.add(entry('req-1')), /req-1 is already pending/);
  });

  void it('removes an entry once and clears its timer', async () => {
    const manager = new PendingRequestManager();
    let fired = false;
    const request = entry('req-1', () => {
      fired = true;
    });
    manager.add(request);

    assert.equal(manager.remove('req-1'), request);
    assert.equal(manager.remove('req-1'), undefined);
    await delay(40);

    assert.equal(fired, false);
    assert.equal(manager.size, 0);
  });

  void it('clears every entry and returns them', async () => {
    const manager = new PendingRequestManager();
    let fired = 0;
    manager.add(entry('req-1', () => fired++));
    manager.add(entry('req-2', () => fired++));

    const removed = manager.clear();
    await delay(40);

    assert.deepEqual(
      removed.map((request) => request.requestId),
      ['req-1', 'req-2']
    );
    assert.equal(fired, 0);
    assert.equal(manager.size, 0);
  });
});
