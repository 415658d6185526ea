/**
 * Unit tests for HandlerRegistry
 */

import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { assertThrowsCode } from '@/__testutils__/index.js';
import { ERROR_CODES } from '@/errors/index.js';
import { HandlerRegistry, type RequestHandler } from '@/server/index.js';

const noop: RequestHandler = () => null;

void describe('HandlerRegistry', () => {
  void it('registers and looks up handlers', () => {
    const registry = new HandlerRegistry();

    registry.register('createWorkspace', noop);

    assert.equal(registry.get('createWorkspace'), noop);
    assert.equal(registry.has('createWorkspace'), true);
    assert.equal(registry.get('deleteWorkspace'), undefined);
    assert.equal(registry.size, 1);
  });

  void it('replaces a handler registered twice', () => {
    const registry = new HandlerRegistry();
    const replacement: RequestHandler = () => 'second';

    registry.register('createWorkspace', noop);
    registry.register('createWorkspace', replacement);

    assert.equal(registry.get('createWorkspace'), replacement);
    assert.equal(registry.size, 1);
  });

  void it('lists commands sorted', () => {
    const registry = new HandlerRegistry();
    registry.register('zeta', noop);
    registry.register('alpha', noop);
    registry.register('mid-1', noop);

    assert.deepEqual(registry.commands(), ['alpha', 'mid-1', 'zeta']);
  });

  void it('unregisters a command once', () => {
    const registry = new HandlerRegistry();
    registry.register('createWorkspace', noop);

    assert.equal(registry.unregister('createWorkspace'), true);
    assert.equal(registry.unregister('createWorkspace'), false);
  });

  void it('refuses an invalid command name', () => {
    const registry = new HandlerRegistry();

    const error = assertThrowsCode(
      () => registry.register('create workspace', noop),
      ERROR_CODES.SECURITY_VIOLATION
    );
    assert.equal(error.data?.field, 'command');
    assert.equal(registry.size, 0);
  });
});
