/**
 * Built-in Commands
 *
 * Commands every server answers unless started with `registerBuiltins: false`.
 * Their names are reserved: a manifest may not define them.
 */

import { SLOW_PROCESS_DELAY_MS } from '@/constants.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { serializeManifest, type Manifest } from '@/manifest/index.js';
import { formatTimestamp } from '@/protocol/index.js';
import type { JsonObject } from '@/types.js';
import { delay } from '@/utils/concurrency.js';
import { getErrorMessage } from '@/utils/errors.js';
import { VERSION } from '@/utils/version.js';

import type { HandlerRegistry, RequestHandler } from './HandlerRegistry.js';

export const SERVER_NAME = 'dgramlink';

/**
 * What the built-ins need to know about the server that hosts them.
 */
export interface BuiltinHost {
  getManifest(): Manifest | undefined;
  getStatistics(): JsonObject;
  registry: HandlerRegistry;
}

const ping: RequestHandler = () => ({
  pong: true,
  message: 'pong',
  timestamp: formatTimestamp(),
});

const echo: RequestHandler = (request) => {
  const message = request.args?.['message'];
  if (message === undefined) {
    throw RpcError.invalidParams('message', "Missing required argument 'message'");
  }
  return { echo: message, timestamp: formatTimestamp() };
};

/**
 * Check whether the `message` argument is a valid JSON document.
 */
const validate: RequestHandler = (request) => {
  const message = request.args?.['message'];
  if (message === undefined) {
    return { valid: false, error: 'No message provided for validation' };
  }
  if (typeof message !== 'string') {
    throw RpcError.invalidParams('message', 'Argument \'message\' must be of type string', message, {
      type: 'string',
    });
  }
  try {
    JSON.parse(message);
    return { valid: true, message: 'Valid JSON' };
  } catch (error) {
    return { valid: false, error: `Invalid JSON: ${getErrorMessage(error)}` };
  }
};

/**
 * Wait two seconds before answering. Stops early when the deadline passes.
 */
const slowProcess: RequestHandler = async (request, { signal }) => {
  await delay(SLOW_PROCESS_DELAY_MS, signal);
  const result: JsonObject = { processed: true, delay: `${SLOW_PROCESS_DELAY_MS}ms` };
  const message = request.args?.['message'];
  if (message !== undefined) {
    result['message'] = message;
  }
  return result;
};

/**
 * Register the built-in commands on a server's registry.
 */
export function registerBuiltins(host: BuiltinHost): void {
  const { registry } = host;

  registry.register('ping', ping);
  registry.register('echo', echo);
  registry.register('validate', validate);
  registry.register('slow_process', slowProcess);

  registry.register('get_info', () => ({
    server: SERVER_NAME,
    version: VERSION,
    commands: registry.commands(),
    timestamp: formatTimestamp(),
  }));

  registry.register('manifest', () => {
    const manifest = host.getManifest();
    if (manifest === undefined) {
      throw RpcError.create(ERROR_CODES.RESOURCE_NOT_FOUND, 'Server has no manifest loaded');
    }
    return serializeManifest(manifest);
  });

  registry.register('server_stats', () => host.getStatistics());
}
