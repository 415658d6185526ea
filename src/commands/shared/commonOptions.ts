import { Option } from 'commander';

import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Shared --json flag for all commands that support JSON output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Shared --transport option. `stream` is for hosts without datagram support;
 * both ends must use the same transport.
 */
export const transportOption = new Option('--transport <kind>', 'Socket transport')
  .choices(['dgram', 'stream'])
  .default('dgram');

/**
 * Shared --manifest <file> option.
 */
export const manifestOption = new Option('-m, --manifest <file>', 'Path to a JSON manifest');

/**
 * Parse a strictly positive number, or fail with INVALID_ARGUMENTS.
 *
 * @example
 * ```typescript
 * parsePositiveNumber('2.5', '--timeout'); // → 2.5
 * ```
 */
export function parsePositiveNumber(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n <= 0) {
    throw new CommandError(
      `${flag} must be a positive number, got '${value}'`,
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return n;
}

/**
 * Parse a positive integer, or fail with INVALID_ARGUMENTS.
 */
export function parsePositiveInteger(value: string, flag: string): number {
  const n = parsePositiveNumber(value, flag);
  if (!Number.isInteger(n)) {
    throw new CommandError(
      `${flag} must be an integer, got '${value}'`,
      {},
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return n;
}

/**
 * Shared --timeout <seconds> option.
 */
export const timeoutOption = new Option(
  '-t, --timeout <seconds>',
  'Request timeout in seconds'
).argParser((value) => parsePositiveNumber(value, '--timeout'));
