/**
 * Contract tests for RpcServer
 *
 * Every decodable request with a safe reply address gets exactly one
 * response; requests without one get none. Oversized, undecodable and
 * unsafe datagrams are dropped without disturbing other requests.
 */

import assert from 'node:assert/strict';
import { afterEach, beforeEach, describe, it } from 'node:test';

import {
  MemoryTransport,
  assertErrorResponse,
  assertEventually,
  assertRejectsWithCode,
  assertSuccess,
  resultField,
} from '@/__testutils__/index.js';
import { RpcClient } from '@/client/index.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { parseManifest } from '@/manifest/index.js';
import {
  decodeResponse,
  formatTimestamp,
  type RpcRequest,
  type RpcResponse,
} from '@/protocol/index.js';
import {
  RpcServer,
  type ResponseValidationFailedEvent,
  type RpcServerOptions,
} from '@/server/index.js';
import type { JsonObject } from '@/types.js';
import { delay } from '@/utils/concurrency.js';

const SERVER_PATH = '/tmp/dgl-server-test.sock';

const manifest = parseManifest({
  version: '1.0.0',
  commands: {
    createWorkspace: {
      args: {
        name: { type: 'string', required: true, validation: { pattern: '^[a-zA-Z0-9_-]+$' } },
        template: { type: 'string', defaultValue: 'basic' },
      },
    },
    count: { response: { type: 'integer' } },
  },
});

let sequence = 0;

function envelope(method: string, extra: JsonObject = {}): JsonObject {
  sequence++;
  return { id: `req-${sequence}`, method, timestamp: formatTimestamp(), ...extra };
}

function encode(value: JsonObject): Buffer {
  return Buffer.from(JSON.stringify(value), 'utf8');
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

void describe('RpcServer', () => {
  let transport: MemoryTransport;
  let server: RpcServer;
  let errors: Error[];

  /**
   * Send a raw envelope with a fresh reply address and wait for the answer.
   */
  async function exchange(value: JsonObject): Promise<RpcResponse> {
    return exchangeRaw((replyTo) => encode({ ...value, reply_to: replyTo }));
  }

  /**
   * Like exchange(), for payloads built byte by byte.
   */
  async function exchangeRaw(build: (replyTo: string) => Buffer): Promise<RpcResponse> {
    sequence++;
    const replyTo = `/tmp/dgl/reply-${sequence}.sock`;
    let deliver: (payload: Buffer) => void = () => undefined;
    const received = new Promise<Buffer>((resolve) => {
      deliver = resolve;
    });
    const endpoint = await transport.bind(replyTo, (payload) => deliver(payload));
    await transport.send(SERVER_PATH, build(replyTo));
    const payload = await received;
    await endpoint.close();
    return decodeResponse(payload);
  }

  async function startServer(options: RpcServerOptions = {}): Promise<RpcServer> {
    server = new RpcServer(SERVER_PATH, { transport, ...options });
    server.on('error', (error) => errors.push(error));
    await server.start();
    return server;
  }

  beforeEach(() => {
    transport = new MemoryTransport();
    errors = [];
  });

  afterEach(async () => {
    await server.stop();
  });

  void describe('dispatch', () => {
    void it('answers a registered command with its result', async () => {
      await startServer();
      server.registerHandler('add', (request) => {
        const a = request.args?.['a'];
        const b = request.args?.['b'];
        return typeof a === 'number' && typeof b === 'number' ? a + b : null;
      });

      const response = await exchange(envelope('add', { args: { a: 2, b: 3 } }));

      assert.equal(assertSuccess(response).result, 5);
      assert.equal(response.requestId, `req-${sequence - 1}`);
    });

    void it('answers an unknown command with METHOD_NOT_FOUND', async () => {
      await startServer();

      const response = await exchange(envelope('doesNotExist'));

      const error = assertErrorResponse(response, -32601);
      assert.equal(error.message, 'Method not found');
      assert.equal(error.data?.details, "Command 'doesNotExist' is not registered");
      assert.deepEqual(error.data?.context, { command: 'doesNotExist' });
    });

    void it('sends null for a handler that returns nothing', async () => {
      await startServer();
      server.registerHandler('touch', () => undefined);

      assert.equal(assertSuccess(await exchange(envelope('touch'))).result, null);
    });

    void it('passes RpcErrors thrown by a handler through unchanged', async () => {
      await startServer();
      server.registerHandler('rename', () => {
        throw RpcError.invalidParams('label', 'Label is taken');
      });

      const error = assertErrorResponse(
        await exchange(envelope('rename')),
        ERROR_CODES.INVALID_PARAMS
      );
      assert.equal(error.data?.field, 'label');
    });

    void it('answers other handler failures with INTERNAL_ERROR', async () => {
      await startServer();
      server.registerHandler('explode', () => {
        throw new Error('disk full');
      });

      const error = assertErrorResponse(
        await exchange(envelope('explode')),
        ERROR_CODES.INTERNAL_ERROR
      );
      assert.equal(error.data?.details, 'disk full');
    });

    void it('refuses a result that is not JSON', async () => {
      await startServer();
      server.registerHandler('ratio', () => Number.NaN);

      const error = assertErrorResponse(
        await exchange(envelope('ratio')),
        ERROR_CODES.INTERNAL_ERROR
      );
      assert.equal(error.data?.details, "Handler for 'ratio' returned a value that is not JSON");
    });

    void it('answers an invalid command name with SECURITY_VIOLATION', async () => {
      await startServer();

      const error = assertErrorResponse(
        await exchange(envelope('drop table')),
        ERROR_CODES.SECURITY_VIOLATION
      );
      assert.equal(error.data?.field, 'command');
    });

    void it('accepts the legacy command field and epoch timestamps', async () => {
      await startServer();
      server.registerHandler('legacy', () => 'ok');
      sequence++;

      const response = await exchange({
        id: `legacy-${sequence}`,
        command: 'legacy',
        timestamp: 1714557600,
      });

      assert.equal(assertSuccess(response).result, 'ok');
    });

    void it('emits request and response events', async () => {
      await startServer();
      const seen: string[] = [];
      server.on('request', (request: RpcRequest) => seen.push(`request:${request.command}`));
      server.on('response', (response: RpcResponse, request: RpcRequest) =>
        seen.push(`response:${request.command}:${String(response.success)}`)
      );

      await exchange(envelope('ping'));

      assert.deepEqual(seen, ['request:ping', 'response:ping:true']);
    });
  });

  void describe('deadlines', () => {
    void it('answers HANDLER_TIMEOUT when the handler exceeds the request timeout', async () => {
      await startServer();
      let aborted = false;
      server.registerHandler('slow', async (_request, { signal }) => {
        signal.addEventListener('abort', () => {
          aborted = true;
        });
        await delay(1000, signal);
        return 'late';
      });

      const error = assertErrorResponse(
        await exchange(envelope('slow', { timeout: 0.1 })),
        ERROR_CODES.HANDLER_TIMEOUT
      );

      assert.equal(error.data?.details, "Handler for 'slow' exceeded 0.1s");
      assert.equal(error.data?.context?.['timeout'], 0.1);
      assert.equal(aborted, true);
      assert.equal(server.getStatistics().handlerTimeouts, 1);
    });

    void it('applies the default timeout to requests without one', async () => {
      await startServer({ defaultTimeout: 0.1 });
      const timeouts: number[] = [];
      server.registerHandler('slow', async (_request, context) => {
        timeouts.push(context.timeout);
        await delay(1000, context.signal);
        return null;
      });

      assertErrorResponse(await exchange(envelope('slow')), ERROR_CODES.HANDLER_TIMEOUT);

      assert.deepEqual(timeouts, [0.1]);
    });

    void it('survives a reply address that disappeared before the response', async () => {
      await startServer();
      server.registerHandler('slow', async () => {
        await delay(150);
        return 'done';
      });
      const client = new RpcClient(SERVER_PATH, { transport, replyDirectory: '/tmp/dgl' });

      await assertRejectsWithCode(
        client.sendRequest('slow', undefined, { timeout: 0.1 }),
        ERROR_CODES.HANDLER_TIMEOUT
      );
      await assertEventually(() => server.getStatistics().deliveryFailures === 1, 1000);

      assert.equal(errors.length, 1);
      assert.ok(errors[0] instanceof RpcError);
      assert.equal(errors[0].code, ERROR_CODES.SERVICE_UNAVAILABLE);
      assert.equal(await client.ping(1), true);
      await client.close();
    });
  });

  void describe('manifest validation', () => {
    void it('rejects invalid arguments before the handler runs', async () => {
      await startServer({ manifest });
      let calls = 0;
      server.registerHandler('createWorkspace', () => {
        calls++;
        return null;
      });

      const error = assertErrorResponse(
        await exchange(envelope('createWorkspace', { args: { name: 'My Workspace!' } })),
        ERROR_CODES.INVALID_PARAMS
      );

      assert.equal(error.data?.field, 'name');
      assert.equal(calls, 0);
    });

    void it('hands the handler arguments with defaults applied', async () => {
      await startServer({ manifest });
      server.registerHandler('createWorkspace', (request) => request.args ?? null);

      const response = await exchange(envelope('createWorkspace', { args: { name: 'lib-1' } }));

      assert.deepEqual(assertSuccess(response).result, { name: 'lib-1', template: 'basic' });
    });

    void it('skips validation when disabled', async () => {
      await startServer({ manifest, enableValidation: false });
      server.registerHandler('createWorkspace', (request) => request.args ?? null);

      const response = await exchange(envelope('createWorkspace', { args: { name: 'x y' } }));

      assert.deepEqual(assertSuccess(response).result, { name: 'x y' });
    });

    void it('reports a result that does not match the declared response', async () => {
      await startServer({ manifest });
      const events: ResponseValidationFailedEvent[] = [];
      server.on('responseValidationFailed', (event) => events.push(event));
      server.registerHandler('count', () => 'three');

      const response = await exchange(envelope('count'));

      assert.equal(assertSuccess(response).result, 'three');
      assert.equal(events.length, 1);
      assert.equal(events[0]?.request.command, 'count');
      assert.deepEqual(events[0]?.errors, [
        {
          field: 'result',
          message: 'Expected integer, got string',
          expected: 'integer',
          actual: 'string',
        },
      ]);
    });

    void it('serves the loaded manifest through the built-in command', async () => {
      await startServer({ manifest });

      const response = await exchange(envelope('manifest'));

      assert.equal(resultField(response, 'version'), '1.0.0');
    });
  });

  void describe('notifications', () => {
    void it('runs the handler and sends nothing', async () => {
      await startServer();
      const received: string[] = [];
      server.registerHandler('log', (request) => {
        received.push(String(request.args?.['level']));
        return null;
      });

      await transport.send(SERVER_PATH, encode(envelope('log', { args: { level: 'info' } })));
      await assertEventually(() => server.getStatistics().notifications === 1, 1000);

      assert.deepEqual(received, ['info']);
      assert.equal(transport.getSentMessages().length, 1);
      assert.equal(server.getStatistics().responsesSent, 0);
    });
  });

  void describe('malformed and unsafe datagrams', () => {
    void it('drops a datagram larger than the message size', async () => {
      await startServer({ maxMessageSize: 128 });

      const oversized = envelope('ping', { args: { pad: 'x'.repeat(200) } });
      await transport.send(SERVER_PATH, encode(oversized));
      await assertEventually(() => server.getStatistics().droppedMessages === 1, 1000);

      assert.equal(server.getStatistics().requestsReceived, 0);
      assert.ok(errors[0] instanceof RpcError);
      assert.equal(errors[0].code, ERROR_CODES.RESOURCE_LIMIT_EXCEEDED);
    });

    void it('answers PARSE_ERROR when the reply address can be recovered', async () => {
      await startServer();

      const response = await exchange({ id: 'broken-1', timestamp: formatTimestamp() });

      const error = assertErrorResponse(response, ERROR_CODES.PARSE_ERROR);
      assert.equal(response.requestId, 'broken-1');
      assert.equal(error.data?.details, 'Missing or empty "method"');
      assert.equal(server.getStatistics().droppedMessages, 1);
    });

    void it('answers a malformed request without an id as unknown', async () => {
      await startServer();

      const response = await exchange({ method: 'ping' });

      assertErrorResponse(response, ERROR_CODES.PARSE_ERROR);
      assert.equal(response.requestId, 'unknown');
    });

    void it('answers PARSE_ERROR for a payload that is not valid UTF-8', async () => {
      await startServer();
      const request = encode(envelope('echo', { args: { message: 'a__b' } }));
      const [before, after] = request.toString('utf8').split('__');

      const response = await exchangeRaw((replyTo) =>
        Buffer.concat([
          Buffer.from(before ?? ''),
          Buffer.from([0xff, 0xfe]),
          Buffer.from((after ?? '').replace(/}$/, `,"reply_to":"${replyTo}"}`)),
        ])
      );

      const error = assertErrorResponse(response, ERROR_CODES.PARSE_ERROR);
      assert.equal(error.data?.details, 'Payload is not valid UTF-8');
      assert.equal(response.requestId, `req-${sequence - 1}`);
      assert.equal(server.getStatistics().requestsReceived, 0);
    });

    void it('answers PARSE_ERROR for a timeout beyond one hour', async () => {
      await startServer();
      let calls = 0;
      server.registerHandler('work', () => {
        calls++;
        return null;
      });

      const response = await exchange(envelope('work', { timeout: 3_000_000 }));

      const error = assertErrorResponse(response, ERROR_CODES.PARSE_ERROR);
      assert.equal(error.data?.details, '"timeout" must be between 0.1 and 3600 seconds');
      assert.equal(calls, 0);
    });

    void it('stays silent on malformed requests when configured to', async () => {
      await startServer({ replyToMalformedRequests: false });
      const replyTo = '/tmp/dgl/silent.sock';
      await transport.bind(replyTo, () => undefined);

      await transport.send(SERVER_PATH, encode({ id: 'broken-2', reply_to: replyTo }));
      await assertEventually(() => server.getStatistics().droppedMessages === 1, 1000);
      await delay(10);

      assert.deepEqual(transport.getSentJson(replyTo), []);
    });

    void it('drops text that is not JSON', async () => {
      await startServer();

      await transport.send(SERVER_PATH, Buffer.from('hello'));
      await assertEventually(() => server.getStatistics().droppedMessages === 1, 1000);

      assert.ok(errors[0] instanceof RpcError);
      assert.equal(errors[0].code, ERROR_CODES.PARSE_ERROR);
    });

    void it('drops a request whose reply address is unsafe', async () => {
      await startServer();
      let calls = 0;
      server.registerHandler('work', () => {
        calls++;
        return null;
      });

      await transport.send(SERVER_PATH, encode(envelope('work', { reply_to: '../escape.sock' })));
      await assertEventually(() => server.getStatistics().droppedMessages === 1, 1000);

      assert.equal(calls, 0);
      assert.ok(errors[0] instanceof RpcError);
      assert.equal(errors[0].code, ERROR_CODES.SECURITY_VIOLATION);
    });

    void it('replaces a response larger than the message size', async () => {
      await startServer({ maxMessageSize: 512 });
      server.registerHandler('dump', () => 'x'.repeat(1000));

      const error = assertErrorResponse(
        await exchange(envelope('dump')),
        ERROR_CODES.RESOURCE_LIMIT_EXCEEDED
      );

      assert.equal(error.data?.context?.['maxMessageSize'], 512);
    });
  });

  void describe('overload', () => {
    void it('rejects requests beyond the handler limit', async () => {
      await startServer({ maxConcurrentHandlers: 1 });
      const gate = deferred();
      server.registerHandler('block', async () => {
        await gate.promise;
        return 'released';
      });

      const first = exchange(envelope('block'));
      await assertEventually(() => server.getStatistics().activeHandlers === 1, 1000);
      const second = await exchange(envelope('block'));
      gate.resolve();

      const error = assertErrorResponse(second, ERROR_CODES.RESOURCE_LIMIT_EXCEEDED);
      assert.equal(error.data?.details, 'All 1 handler slots are busy');
      assert.equal(assertSuccess(await first).result, 'released');
      assert.equal(server.getStatistics().overloadRejections, 1);
    });

    void it('queues requests beyond the handler limit when configured to', async () => {
      await startServer({ maxConcurrentHandlers: 1, overloadPolicy: 'queue' });
      const gate = deferred();
      server.registerHandler('block', async () => {
        await gate.promise;
        return 'released';
      });

      const first = exchange(envelope('block'));
      const second = exchange(envelope('block'));
      await assertEventually(() => server.getStatistics().queuedHandlers === 1, 1000);
      gate.resolve();

      assert.equal(assertSuccess(await first).result, 'released');
      assert.equal(assertSuccess(await second).result, 'released');
      assert.equal(server.getStatistics().overloadRejections, 0);
    });
  });

  void describe('lifecycle', () => {
    void it('reports SOCKET_ERROR when the path is taken', async () => {
      await transport.bind(SERVER_PATH, () => undefined);
      server = new RpcServer(SERVER_PATH, { transport, cleanupOnStart: false });

      const error = await assertRejectsWithCode(server.start(), ERROR_CODES.SOCKET_ERROR);

      assert.equal(error.data?.context?.['errno'], 'EADDRINUSE');
      assert.equal(server.isRunning(), false);
    });

    void it('refuses to start twice', async () => {
      await startServer();

      await assertRejectsWithCode(server.start(), ERROR_CODES.SERVER_ERROR);
    });

    void it('unbinds on stop and reports statistics', async () => {
      await startServer();
      await exchange(envelope('ping'));

      const running = server.getStatistics();
      await server.stop();

      assert.equal(running.running, true);
      assert.equal(running.requestsReceived, 1);
      assert.equal(running.responsesSent, 1);
      assert.equal(transport.isBound(SERVER_PATH), false);
      assert.equal(server.isRunning(), false);
      assert.equal(server.getStatistics().startTime, null);
    });

    void it('emits listening with the socket path', async () => {
      server = new RpcServer(SERVER_PATH, { transport });
      const paths: string[] = [];
      server.on('listening', (path) => paths.push(path));

      await server.start();

      assert.deepEqual(paths, [SERVER_PATH]);
    });

    void it('registers only custom handlers when built-ins are off', async () => {
      await startServer({ registerBuiltins: false });
      server.registerHandler('work', () => null);

      assert.deepEqual(server.getRegisteredCommands(), ['work']);
      assert.equal(server.unregisterHandler('work'), true);
      assertErrorResponse(await exchange(envelope('ping')), ERROR_CODES.METHOD_NOT_FOUND);
    });
  });
});
