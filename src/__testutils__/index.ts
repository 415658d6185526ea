/**
 * Test utilities - Re-export all test helpers
 *
 * ```ts
 * import { MemoryTransport, assertRejectsWithCode } from '@/__testutils__/index.js';
 * ```
 */

export { MemoryTransport, type SentMessage } from './MemoryTransport.js';
export { createSocketDir, type SocketDir } from './socketDir.js';
export {
  assertErrorResponse,
  assertEventually,
  assertRejectsWithCode,
  assertSuccess,
  assertThrowsAsync,
  assertThrowsCode,
  resultField,
} from './assertions.js';
