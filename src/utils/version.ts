import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('dgramlink');

/**
 * Candidate locations of package.json relative to this module, for running
 * from sources (src/utils) and from the build output (dist/src/utils).
 */
const PACKAGE_JSON_CANDIDATES = ['../../package.json', '../../../package.json'];

/**
 * Get the package version.
 * Reads package.json once and caches the result.
 */
let cachedVersion: string = '';

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const currentDir = dirname(fileURLToPath(import.meta.url));
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      const pkg = JSON.parse(readFileSync(join(currentDir, candidate), 'utf-8')) as {
        name?: string;
        version?: string;
      };
      if (pkg.name === 'dgramlink' && pkg.version) {
        cachedVersion = pkg.version;
        return cachedVersion;
      }
    } catch (error) {
      log.debug(`No package.json at ${candidate}: ${getErrorMessage(error)}`);
    }
  }

  cachedVersion = '0.0.0';
  return cachedVersion;
}

export const VERSION: string = getVersion();
