/**
 * Contract tests for RpcClient
 *
 * Every request with a reply address ends in exactly one of completed,
 * timed out, cancelled or failed; responses are matched by request id and
 * anything else arriving at a reply address is discarded.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import {
  MemoryTransport,
  assertEventually,
  assertRejectsWithCode,
  resultField,
} from '@/__testutils__/index.js';
import { RequestCancelledError, RequestTimeoutError } from '@/client/errors.js';
import { RpcClient, type TimeoutEvent } from '@/client/RpcClient.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { parseManifest } from '@/manifest/index.js';
import {
  createErrorResponse,
  createSuccessResponse,
  decodeRequest,
  encodeResponse,
  type RpcRequest,
  type RpcResponse,
} from '@/protocol/index.js';
import type { TransportEndpoint } from '@/transport/index.js';
import type { JsonObject } from '@/types.js';

const SERVER_PATH = '/tmp/dgl-client-test.sock';
const REPLY_DIR = '/tmp/dgl';

type Responder = (request: RpcRequest) => RpcResponse[];

interface FakeServer {
  requests: RpcRequest[];
  endpoint: TransportEndpoint;
}

/**
 * Bind a server that records every request and answers with whatever the
 * responder returns. A responder returning [] stays silent.
 */
async function startServer(
  transport: MemoryTransport,
  responder: Responder = (request) => [
    createSuccessResponse(request.id, { echo: request.args ?? null }),
  ]
): Promise<FakeServer> {
  const requests: RpcRequest[] = [];
  const endpoint = await transport.bind(SERVER_PATH, (payload) => {
    const request = decodeRequest(payload);
    requests.push(request);
    const replyTo = request.replyTo;
    if (replyTo === undefined) {
      return;
    }
    for (const response of responder(request)) {
      void transport.send(replyTo, encodeResponse(response));
    }
  });
  return { requests, endpoint };
}

const silent: Responder = () => [];

void describe('RpcClient', () => {
  let transport: MemoryTransport;
  let client: RpcClient;

  beforeEach(() => {
    transport = new MemoryTransport();
    client = new RpcClient(SERVER_PATH, { transport, replyDirectory: REPLY_DIR });
  });

  afterEach(async () => {
    await client.close();
  });

  void describe('request/response', () => {
    void it('resolves with the response correlated to the request', async () => {
      const server = await startServer(transport);

      const response = await client.sendRequest('listWorkspaces', { limit: 2 });

      assert.deepEqual(resultField(response, 'echo'), { limit: 2 });
      const [request] = server.requests;
      assert.ok(request);
      assert.equal(response.requestId, request.id);
      assert.equal(request.command, 'listWorkspaces');
      assert.equal(request.timeout, 30);
    });

    void it('binds a fresh reply address per request and releases it afterwards', async () => {
      const server = await startServer(transport);

      await client.sendRequest('listWorkspaces');
      await client.sendRequest('listWorkspaces');

      const [first, second] = server.requests.map((request) => request.replyTo ?? '');
      assert.ok(first?.startsWith(`${REPLY_DIR}/dgramlink-${process.pid}-`));
      assert.ok(second?.startsWith(`${REPLY_DIR}/dgramlink-${process.pid}-`));
      assert.notEqual(first, second);
      assert.deepEqual(transport.getBoundPaths(), [SERVER_PATH]);
    });

    void it('resolves with error responses and counts them', async () => {
      await startServer(transport, (request) => [
        createErrorResponse(
          request.id,
          RpcError.create(ERROR_CODES.METHOD_NOT_FOUND, "Command 'missing' is not registered")
        ),
      ]);

      const response = await client.sendRequest('missing');

      assert.equal(response.success, false);
      assert.ok(!response.success);
      assert.equal(response.error.code, ERROR_CODES.METHOD_NOT_FOUND);
      assert.equal(client.getStatistics().errorResponses, 1);
    });

    void it('call() returns the result and throws the server error', async () => {
      await startServer(transport, (request) =>
        request.command === 'ok'
          ? [createSuccessResponse(request.id, 7)]
          : [createErrorResponse(request.id, RpcError.invalidParams('name', 'Name is taken'))]
      );

      assert.equal(await client.call('ok'), 7);
      const error = await assertRejectsWithCode(client.call('fail'), ERROR_CODES.INVALID_PARAMS);
      assert.equal(error.details, 'Name is taken');
      assert.equal(error.data?.field, 'name');
    });

    void it('completes concurrent requests with their own responses', async () => {
      const held: RpcRequest[] = [];
      await startServer(transport, (request) => {
        held.push(request);
        if (held.length < 5) {
          return [];
        }
        return held
          .reverse()
          .map((pending) =>
            createSuccessResponse(pending.id, { index: pending.args?.['index'] ?? null })
          );
      });

      const responses = await Promise.all(
        [0, 1, 2, 3, 4].map((index) => client.sendRequest('work', { index }))
      );

      assert.deepEqual(
        responses.map((response) => resultField(response, 'index')),
        [0, 1, 2, 3, 4]
      );
      assert.equal(client.getPendingRequestCount(), 0);
    });

    void it('discards a response carrying another request id', async () => {
      await startServer(transport, (request) => [
        createSuccessResponse('someone-else', 'stray'),
        createSuccessResponse(request.id, 'mine'),
      ]);
      const discarded: RpcResponse[] = [];
      client.on('discarded', (response) => discarded.push(response));

      const response = await client.sendRequest('work');

      assert.ok(response.success);
      assert.equal(response.result, 'mine');
      assert.equal(discarded.length, 1);
      assert.equal(discarded[0]?.requestId, 'someone-else');
    });

    void it('ignores undecodable payloads at the reply address', async () => {
      await startServer(transport, (request) => {
        const replyTo = request.replyTo ?? '';
        setImmediate(() => {
          transport.inject(replyTo, 'not json');
          void transport.send(replyTo, encodeResponse(createSuccessResponse(request.id, true)));
        });
        return [];
      });

      const response = await client.sendRequest('work');

      assert.ok(response.success);
      assert.equal(response.result, true);
    });
  });

  void describe('timeouts', () => {
    void it('rejects with a timeout error and emits a timeout event', async () => {
      await startServer(transport, silent);
      const events: TimeoutEvent[] = [];
      client.on('timeout', (event) => events.push(event));

      const { handle, response } = client.startRequest('slow_process', undefined, {
        timeout: 0.1,
      });
      const error = await assertRejectsWithCode(response, ERROR_CODES.HANDLER_TIMEOUT);

      assert.ok(error instanceof RequestTimeoutError);
      assert.equal(error.details, "Request 'slow_process' timed out after 0.1s");
      assert.equal(handle.status, 'timedOut');
      assert.equal(events.length, 1);
      assert.equal(events[0]?.command, 'slow_process');
      assert.equal(events[0]?.timeout, 0.1);
      assert.equal(events[0]?.requestId, error.requestId);
      assert.equal(client.getStatistics().timedOut, 1);
      assert.deepEqual(transport.getBoundPaths(), [SERVER_PATH]);
    });

    void it('uses the configured default timeout', async () => {
      const server = await startServer(transport, silent);
      const quick = new RpcClient(SERVER_PATH, {
        transport,
        replyDirectory: REPLY_DIR,
        defaultTimeout: 0.1,
      });

      await assertRejectsWithCode(quick.sendRequest('work'), ERROR_CODES.HANDLER_TIMEOUT);

      assert.equal(server.requests[0]?.timeout, 0.1);
      await quick.close();
    });

    void it('refuses a non-positive timeout before sending', async () => {
      await startServer(transport);

      const error = await assertRejectsWithCode(
        client.sendRequest('work', undefined, { timeout: -1 }),
        ERROR_CODES.INVALID_PARAMS
      );

      assert.equal(error.data?.field, 'timeout');
      assert.equal(transport.getSentMessages().length, 0);
    });

    void it('refuses a timeout beyond one hour before sending', async () => {
      await startServer(transport);
      const { handle, response } = client.startRequest('work', undefined, {
        timeout: 3_000_000,
      });

      const error = await assertRejectsWithCode(response, ERROR_CODES.INVALID_PARAMS);

      assert.equal(error.details, 'Timeout must be between 0.1 and 3600 seconds');
      assert.equal(handle.status, 'failed');
      assert.equal(client.getPendingRequestCount(), 0);
      assert.equal(transport.getSentMessages().length, 0);
    });
  });

  void describe('late responses', () => {
    /**
     * Record every outcome a caller of the request would observe.
     */
    function observe(response: Promise<RpcResponse>): {
      outcomes: unknown[];
      settled: Promise<void>;
    } {
      const outcomes: unknown[] = [];
      const settled = response.then(
        (value) => {
          outcomes.push(value);
        },
        (error: unknown) => {
          outcomes.push(error);
        }
      );
      return { outcomes, settled };
    }

    async function replyAddressOf(server: FakeServer): Promise<{ id: string; replyTo: string }> {
      await assertEventually(() => server.requests.length === 1, 200);
      const request = server.requests[0];
      assert.ok(request);
      const replyTo = request.replyTo;
      assert.ok(replyTo !== undefined);
      return { id: request.id, replyTo };
    }

    void it('discards a response that arrives after the request timed out', async () => {
      const server = await startServer(transport, silent);
      transport.holdCloses();
      const discarded: RpcResponse[] = [];
      client.on('discarded', (response) => discarded.push(response));

      const { handle, response } = client.startRequest('work', undefined, { timeout: 0.1 });
      const { outcomes, settled } = observe(response);
      const { id, replyTo } = await replyAddressOf(server);
      await settled;

      const delivered = transport.inject(
        replyTo,
        encodeResponse(createSuccessResponse(id, 'too late'))
      );

      assert.equal(delivered, true);
      assert.equal(outcomes.length, 1);
      assert.ok(outcomes[0] instanceof RequestTimeoutError);
      assert.equal(handle.status, 'timedOut');
      assert.equal(discarded.length, 1);
      assert.equal(discarded[0]?.requestId, id);
      assert.equal(client.getStatistics().completed, 0);
      assert.equal(client.getStatistics().timedOut, 1);
      transport.releaseCloses();
    });

    void it('discards a response that arrives after the request was cancelled', async () => {
      const server = await startServer(transport, silent);
      transport.holdCloses();
      const discarded: RpcResponse[] = [];
      client.on('discarded', (response) => discarded.push(response));

      const { handle, response } = client.startRequest('work');
      const { outcomes, settled } = observe(response);
      const { id, replyTo } = await replyAddressOf(server);
      assert.equal(client.cancelRequest(handle), true);
      await settled;

      transport.inject(replyTo, encodeResponse(createSuccessResponse(id, 'too late')));

      assert.equal(outcomes.length, 1);
      assert.ok(outcomes[0] instanceof RequestCancelledError);
      assert.equal(handle.status, 'cancelled');
      assert.equal(discarded.length, 1);
      assert.equal(client.getStatistics().completed, 0);
      transport.releaseCloses();
    });
  });

  void describe('cancellation', () => {
    void it('cancels a pending request exactly once', async () => {
      await startServer(transport, silent);

      const { handle, response } = client.startRequest('slow_process');
      assert.equal(client.cancelRequest(handle), true);
      assert.equal(client.cancelRequest(handle), false);

      await assert.rejects(response, (error: unknown) => {
        assert.ok(error instanceof RequestCancelledError);
        assert.equal(error.message, 'Request cancelled: slow_process');
        return true;
      });
      assert.equal(client.getRequestStatus(handle), 'cancelled');
      assert.equal(client.getStatistics().cancelled, 1);
    });

    void it('does not send a request cancelled before its reply socket is bound', async () => {
      await startServer(transport, silent);

      const { handle, response } = client.startRequest('slow_process');
      client.cancelRequest(handle, 'Changed my mind');
      await assert.rejects(response, /Changed my mind: slow_process/);
      await assertEventually(() => transport.getBoundPaths().length === 1, 200);

      assert.equal(transport.getSentMessages().length, 0);
    });

    void it('returns false for a request that already completed', async () => {
      await startServer(transport);

      const { handle, response } = client.startRequest('work');
      await response;

      assert.equal(handle.status, 'completed');
      assert.equal(client.cancelRequest(handle), false);
    });

    void it('cancels every pending request', async () => {
      await startServer(transport, silent);

      const first = client.startRequest('a');
      const second = client.startRequest('b');

      assert.equal(client.cancelAllRequests(), 2);
      await assert.rejects(first.response, RequestCancelledError);
      await assert.rejects(second.response, RequestCancelledError);
      assert.equal(client.getPendingRequestCount(), 0);
    });
  });

  void describe('notifications', () => {
    void it('sends without a reply address and tracks nothing', async () => {
      const server = await startServer(transport);

      await client.sendNotification('log', { level: 'info' });
      await assertEventually(() => server.requests.length === 1, 200);

      const [request] = server.requests;
      assert.equal(request?.replyTo, undefined);
      assert.deepEqual(request?.args, { level: 'info' });
      assert.equal(client.getStatistics().totalRequests, 0);
      assert.deepEqual(transport.getBoundPaths(), [SERVER_PATH]);
    });

    void it('fails when no server is listening', async () => {
      await assertRejectsWithCode(client.sendNotification('log'), ERROR_CODES.SERVICE_UNAVAILABLE);
    });
  });

  void describe('local checks', () => {
    const manifest = parseManifest({
      version: '1.0.0',
      commands: {
        createWorkspace: {
          args: { name: { type: 'string', required: true, validation: { pattern: '^[a-z-]+$' } } },
        },
      },
    });

    void it('validates arguments against the manifest before sending', async () => {
      await startServer(transport);
      const validating = new RpcClient(SERVER_PATH, {
        transport,
        replyDirectory: REPLY_DIR,
        manifest,
      });

      const error = await assertRejectsWithCode(
        validating.sendRequest('createWorkspace', { name: 'Bad Name' }),
        ERROR_CODES.INVALID_PARAMS
      );

      assert.equal(error.data?.field, 'name');
      assert.equal(transport.getSentMessages().length, 0);
      await validating.close();
    });

    void it('leaves built-in commands unvalidated', async () => {
      await startServer(transport);
      const validating = new RpcClient(SERVER_PATH, {
        transport,
        replyDirectory: REPLY_DIR,
        manifest,
      });

      assert.equal(await validating.ping(1), true);
      await validating.close();
    });

    void it('refuses an invalid command name', async () => {
      const error = await assertRejectsWithCode(
        client.sendRequest('drop table'),
        ERROR_CODES.SECURITY_VIOLATION
      );

      assert.equal(error.data?.field, 'command');
    });

    void it('refuses a request larger than the message size', async () => {
      await startServer(transport);
      const small = new RpcClient(SERVER_PATH, {
        transport,
        replyDirectory: REPLY_DIR,
        maxMessageSize: 200,
      });
      const args: JsonObject = { blob: 'x'.repeat(500) };

      const error = await assertRejectsWithCode(
        small.sendRequest('upload', args),
        ERROR_CODES.RESOURCE_LIMIT_EXCEEDED
      );

      assert.equal(error.data?.context?.['maxMessageSize'], 200);
      assert.equal(transport.getSentMessages().length, 0);
      await small.close();
    });

    void it('limits the number of pending requests', async () => {
      await startServer(transport, silent);
      const limited = new RpcClient(SERVER_PATH, {
        transport,
        replyDirectory: REPLY_DIR,
        maxPendingRequests: 1,
      });

      const first = limited.startRequest('slow_process');
      await assertRejectsWithCode(
        limited.sendRequest('slow_process'),
        ERROR_CODES.RESOURCE_LIMIT_EXCEEDED
      );

      limited.cancelRequest(first.handle);
      await assert.rejects(first.response, RequestCancelledError);
      await limited.close();
    });

    void it('rejects an unsafe server path at construction', () => {
      assert.throws(
        () => new RpcClient('relative.sock', { transport }),
        (error: unknown) => error instanceof RpcError && error.code === ERROR_CODES.SECURITY_VIOLATION
      );
    });
  });

  void describe('delivery failures', () => {
    void it('reports SERVICE_UNAVAILABLE when nothing listens', async () => {
      const { handle, response } = client.startRequest('work');

      await assertRejectsWithCode(response, ERROR_CODES.SERVICE_UNAVAILABLE);

      assert.equal(handle.status, 'failed');
      assert.equal(client.getStatistics().failed, 1);
      assert.deepEqual(transport.getBoundPaths(), []);
    });

    void it('reports SOCKET_ERROR when the send fails', async () => {
      await startServer(transport);
      transport.failNextSend('EPERM');

      await assertRejectsWithCode(client.sendRequest('work'), ERROR_CODES.SOCKET_ERROR);
    });

    void it('ping() answers false when nothing listens', async () => {
      assert.equal(await client.ping(1), false);
    });
  });

  void describe('statistics and close', () => {
    void it('counts completed requests', async () => {
      await startServer(transport);

      await client.sendRequest('work');
      const stats = client.getStatistics();

      assert.equal(stats.totalRequests, 1);
      assert.equal(stats.completed, 1);
      assert.equal(stats.errorResponses, 0);
      assert.equal(stats.pending, 0);
      assert.ok(stats.averageResponseTime >= 0);
    });

    void it('cancels pending requests on close and refuses new ones', async () => {
      await startServer(transport, silent);

      const { response } = client.startRequest('slow_process');
      await client.close();
      await client.close();

      await assert.rejects(response, /Client closed: slow_process/);
      const error = await assertRejectsWithCode(
        client.sendRequest('work'),
        ERROR_CODES.SERVICE_UNAVAILABLE
      );
      assert.equal(error.details, 'Client is closed');
    });
  });
});
