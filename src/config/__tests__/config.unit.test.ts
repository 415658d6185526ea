/**
 * Unit tests for configuration resolution
 *
 * Contract: overrides beat DGRAMLINK_* environment variables, which beat
 * defaults; every invalid value is a CONFIGURATION_ERROR naming its key.
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { assertThrowsCode } from '@/__testutils__/index.js';
import {
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_SERVER_CONFIG,
  resolveClientConfig,
  resolveServerConfig,
} from '@/config/index.js';
import { ERROR_CODES } from '@/errors/index.js';

const CONFIGURATION_ERROR = ERROR_CODES.CONFIGURATION_ERROR;

void describe('resolveServerConfig', () => {
  void it('returns the defaults when nothing is set', () => {
    assert.deepEqual(resolveServerConfig({}, {}), DEFAULT_SERVER_CONFIG);
    assert.equal(DEFAULT_SERVER_CONFIG.maxMessageSize, 65536);
    assert.equal(DEFAULT_SERVER_CONFIG.defaultTimeout, 30);
    assert.equal(DEFAULT_SERVER_CONFIG.overloadPolicy, 'reject');
  });

  void it('reads the environment below explicit overrides', () => {
    const env = { DGRAMLINK_TIMEOUT: '2.5', DGRAMLINK_MAX_MESSAGE_SIZE: '8192' };

    const fromEnv = resolveServerConfig({}, env);
    assert.equal(fromEnv.defaultTimeout, 2.5);
    assert.equal(fromEnv.maxMessageSize, 8192);

    const overridden = resolveServerConfig({ defaultTimeout: 1 }, env);
    assert.equal(overridden.defaultTimeout, 1);
    assert.equal(overridden.maxMessageSize, 8192);
  });

  void it('ignores blank environment values', () => {
    assert.equal(resolveServerConfig({}, { DGRAMLINK_TIMEOUT: '  ' }).defaultTimeout, 30);
  });

  void it('rejects a non-numeric environment value naming the variable', () => {
    const error = assertThrowsCode(
      () => resolveServerConfig({}, { DGRAMLINK_TIMEOUT: 'soon' }),
      CONFIGURATION_ERROR
    );

    assert.equal(error.data?.field, 'DGRAMLINK_TIMEOUT');
    assert.equal(error.details, 'DGRAMLINK_TIMEOUT must be a number, got soon');
  });

  void it('rejects a timeout outside 0.1 to 3600 seconds', () => {
    const error = assertThrowsCode(
      () => resolveServerConfig({ defaultTimeout: 0 }, {}),
      CONFIGURATION_ERROR
    );
    const tooLong = assertThrowsCode(
      () => resolveServerConfig({}, { DGRAMLINK_TIMEOUT: '3000000' }),
      CONFIGURATION_ERROR
    );

    assert.equal(error.details, 'defaultTimeout must be between 0.1 and 3600 seconds, got 0');
    assert.equal(
      tooLong.details,
      'defaultTimeout must be between 0.1 and 3600 seconds, got 3000000'
    );
    assert.equal(resolveServerConfig({ defaultTimeout: 3600 }, {}).defaultTimeout, 3600);
  });

  void it('rejects a fractional handler limit', () => {
    const error = assertThrowsCode(
      () => resolveServerConfig({ maxConcurrentHandlers: 1.5 }, {}),
      CONFIGURATION_ERROR
    );

    assert.equal(error.data?.field, 'maxConcurrentHandlers');
  });

  void it('caps the message size', () => {
    const error = assertThrowsCode(
      () => resolveServerConfig({ maxMessageSize: 32 * 1024 * 1024 }, {}),
      CONFIGURATION_ERROR
    );

    assert.equal(
      error.details,
      'maxMessageSize must be an integer between 1 and 16777216, got 33554432'
    );
  });

  void it('accepts the queue overload policy', () => {
    assert.equal(resolveServerConfig({ overloadPolicy: 'queue' }, {}).overloadPolicy, 'queue');
  });
});

void describe('resolveClientConfig', () => {
  void it('returns the defaults when nothing is set', () => {
    assert.deepEqual(resolveClientConfig({}, {}), DEFAULT_CLIENT_CONFIG);
    assert.equal(DEFAULT_CLIENT_CONFIG.maxPendingRequests, 1000);
  });

  void it('requires an absolute reply directory', () => {
    const error = assertThrowsCode(
      () => resolveClientConfig({ replyDirectory: 'relative/dir' }, {}),
      CONFIGURATION_ERROR
    );

    assert.equal(error.details, 'replyDirectory must be an absolute path, got relative/dir');
  });

  void it('shares the timeout environment variable with the server', () => {
    assert.equal(resolveClientConfig({}, { DGRAMLINK_TIMEOUT: '4' }).defaultTimeout, 4);
  });

  void it('rejects a default timeout beyond one hour', () => {
    const error = assertThrowsCode(
      () => resolveClientConfig({ defaultTimeout: 3_000_000 }, {}),
      CONFIGURATION_ERROR
    );

    assert.equal(error.data?.field, 'defaultTimeout');
  });
});
