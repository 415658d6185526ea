/**
 * assertions - Custom assertion helpers for contract tests
 */

import assert from 'node:assert/strict';

import { RpcError, getErrorCodeName, type StructuredError } from '@/errors/index.js';
import type { ErrorResponse, RpcResponse, SuccessResponse } from '@/protocol/index.js';
import type { JsonValue } from '@/types.js';

/**
 * Poll a condition until it becomes true or timeout
 *
 * @example
 * await assertEventually(() => transport.getSentMessages().length > 0, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Assert that async function throws with specific pattern
 *
 * @example
 * await assertThrowsAsync(() => client.call('missing'), /Method not found/);
 */
export async function assertThrowsAsync(
  fn: () => Promise<unknown>,
  pattern: RegExp | string,
  message?: string
): Promise<void> {
  let thrown: unknown;
  let didThrow = false;
  try {
    await fn();
  } catch (err) {
    didThrow = true;
    thrown = err;
  }
  assert.ok(didThrow, message ?? `Expected function to throw matching ${String(pattern)}`);
  const errorMessage = thrown instanceof Error ? thrown.message : String(thrown);
  const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
  assert.match(errorMessage, regex, message);
}

/**
 * Assert that a promise rejects with an RpcError of the given code and
 * return it for further checks.
 */
export async function assertRejectsWithCode(
  promise: Promise<unknown>,
  code: number
): Promise<RpcError> {
  let thrown: unknown;
  try {
    await promise;
  } catch (err) {
    thrown = err;
  }
  assert.ok(thrown instanceof RpcError, `Expected an RpcError, got ${String(thrown)}`);
  assert.equal(
    thrown.code,
    code,
    `Expected ${getErrorCodeName(code) ?? code}, got ${thrown.codeName}: ${thrown.details ?? ''}`
  );
  return thrown;
}

/**
 * Assert that a synchronous call throws an RpcError of the given code.
 */
export function assertThrowsCode(fn: () => unknown, code: number): RpcError {
  let thrown: unknown;
  try {
    fn();
  } catch (err) {
    thrown = err;
  }
  assert.ok(thrown instanceof RpcError, `Expected an RpcError, got ${String(thrown)}`);
  assert.equal(thrown.code, code);
  return thrown;
}

export function assertSuccess(response: RpcResponse): SuccessResponse {
  assert.equal(response.success, true, `Expected success, got ${JSON.stringify(response)}`);
  assert.ok(response.success);
  return response;
}

export function assertErrorResponse(response: RpcResponse, code: number): StructuredError {
  assert.equal(response.success, false, `Expected an error, got ${JSON.stringify(response)}`);
  assert.ok(!response.success);
  const failure: ErrorResponse = response;
  assert.equal(failure.error.code, code);
  return failure.error;
}

/**
 * Read a property of a JSON object result.
 */
export function resultField(response: RpcResponse, key: string): JsonValue | undefined {
  const result = assertSuccess(response).result;
  assert.ok(
    typeof result === 'object' && result !== null && !Array.isArray(result),
    'Expected an object result'
  );
  return result[key];
}
