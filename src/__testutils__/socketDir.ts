/**
 * Short-lived socket directories for tests that bind real sockets.
 *
 * Paths stay under the 104-byte socket path limit by using a short prefix
 * directly in the OS temp directory.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export interface SocketDir {
  path: string;
  /** Absolute path of a socket file inside the directory */
  socket(name: string): string;
  cleanup(): void;
}

export function createSocketDir(): SocketDir {
  const path = mkdtempSync(join(tmpdir(), 'dgl-'));
  return {
    path,
    socket: (name) => join(path, name),
    cleanup: () => rmSync(path, { recursive: true, force: true }),
  };
}
