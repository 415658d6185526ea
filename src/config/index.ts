/**
 * Runtime configuration for servers and clients.
 *
 * Each engine takes a partial config; missing keys fall back to environment
 * overrides, then to the defaults below. Values are checked once here so
 * the engines can trust them.
 */

import { tmpdir } from 'node:os';

import {
  DEFAULT_MAX_CONCURRENT_HANDLERS,
  DEFAULT_MAX_MESSAGE_SIZE,
  DEFAULT_MAX_PENDING_REQUESTS,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_CONFIGURABLE_MESSAGE_SIZE,
  MAX_MESSAGE_SIZE_ENV_VAR,
  TIMEOUT_ENV_VAR,
} from '@/constants.js';
import { ERROR_CODES, RpcError } from '@/errors/index.js';
import { TIMEOUT_RANGE, isTimeoutInRange } from '@/protocol/index.js';

/**
 * What a server does with a request once every handler slot is busy.
 * - 'reject': answer RESOURCE_LIMIT_EXCEEDED immediately
 * - 'queue': wait for a free slot; the deadline starts when the handler does
 */
export type OverloadPolicy = 'reject' | 'queue';

export interface ServerConfig {
  /** Largest request or response, in bytes (default: 65536) */
  maxMessageSize: number;
  /** Deadline for requests that carry none, in seconds (default: 30) */
  defaultTimeout: number;
  /** Handlers allowed to run at once (default: 100) */
  maxConcurrentHandlers: number;
  /** Behaviour when all handler slots are busy (default: 'reject') */
  overloadPolicy: OverloadPolicy;
  /** Remove a stale socket file before binding (default: true) */
  cleanupOnStart: boolean;
  /** Remove the socket file on stop (default: true) */
  cleanupOnShutdown: boolean;
  /** Answer malformed envelopes with PARSE_ERROR when the reply address is recoverable (default: true) */
  replyToMalformedRequests: boolean;
  /** Register ping, echo and the other built-in commands (default: true) */
  registerBuiltins: boolean;
  /** Validate arguments of manifest-declared commands (default: true) */
  enableValidation: boolean;
}

export interface ClientConfig {
  /** Largest request, in bytes (default: 65536) */
  maxMessageSize: number;
  /** Deadline for requests sent without one, in seconds (default: 30) */
  defaultTimeout: number;
  /** Requests awaiting a response at once (default: 1000) */
  maxPendingRequests: number;
  /** Validate requests locally when a manifest is set (default: true) */
  enableValidation: boolean;
  /** Directory for reply socket files (default: OS temp dir) */
  replyDirectory: string;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
  defaultTimeout: DEFAULT_TIMEOUT_SECONDS,
  maxConcurrentHandlers: DEFAULT_MAX_CONCURRENT_HANDLERS,
  overloadPolicy: 'reject',
  cleanupOnStart: true,
  cleanupOnShutdown: true,
  replyToMalformedRequests: true,
  registerBuiltins: true,
  enableValidation: true,
};

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  maxMessageSize: DEFAULT_MAX_MESSAGE_SIZE,
  defaultTimeout: DEFAULT_TIMEOUT_SECONDS,
  maxPendingRequests: DEFAULT_MAX_PENDING_REQUESTS,
  enableValidation: true,
  replyDirectory: tmpdir(),
};

export type Environment = Readonly<Record<string, string | undefined>>;

function configError(key: string, value: unknown, expected: string): RpcError {
  return new RpcError(ERROR_CODES.CONFIGURATION_ERROR, {
    details: `${key} must be ${expected}, got ${String(value)}`,
    field: key,
  });
}

function checkTimeout(key: string, value: number): number {
  if (!isTimeoutInRange(value)) {
    throw configError(key, value, TIMEOUT_RANGE);
  }
  return value;
}

function checkCount(key: string, value: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < 1 || value > max) {
    throw configError(key, value, `an integer between 1 and ${max}`);
  }
  return value;
}

function checkBoolean(key: string, value: boolean): boolean {
  if (typeof value !== 'boolean') {
    throw configError(key, value, 'a boolean');
  }
  return value;
}

function readEnvNumber(env: Environment, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw configError(name, raw, 'a number');
  }
  return value;
}

/**
 * Values shared by both configs, read from the environment.
 */
function environmentDefaults(env: Environment): {
  defaultTimeout?: number;
  maxMessageSize?: number;
} {
  const defaultTimeout = readEnvNumber(env, TIMEOUT_ENV_VAR);
  const maxMessageSize = readEnvNumber(env, MAX_MESSAGE_SIZE_ENV_VAR);
  return {
    ...(defaultTimeout !== undefined && { defaultTimeout }),
    ...(maxMessageSize !== undefined && { maxMessageSize }),
  };
}

/**
 * Build a complete server config.
 *
 * Precedence: explicit overrides, then DGRAMLINK_* environment variables,
 * then defaults. Keys not part of {@link ServerConfig} are ignored.
 *
 * @throws RpcError CONFIGURATION_ERROR on an invalid value
 *
 * @example
 * ```typescript
 * const config = resolveServerConfig({ maxConcurrentHandlers: 8, overloadPolicy: 'queue' });
 * ```
 */
export function resolveServerConfig(
  overrides: Partial<ServerConfig> = {},
  env: Environment = process.env
): ServerConfig {
  const fromEnv = environmentDefaults(env);
  const overloadPolicy = overrides.overloadPolicy ?? DEFAULT_SERVER_CONFIG.overloadPolicy;
  if (overloadPolicy !== 'reject' && overloadPolicy !== 'queue') {
    throw configError('overloadPolicy', overloadPolicy, "'reject' or 'queue'");
  }

  return {
    maxMessageSize: checkCount(
      'maxMessageSize',
      overrides.maxMessageSize ?? fromEnv.maxMessageSize ?? DEFAULT_SERVER_CONFIG.maxMessageSize,
      MAX_CONFIGURABLE_MESSAGE_SIZE
    ),
    defaultTimeout: checkTimeout(
      'defaultTimeout',
      overrides.defaultTimeout ?? fromEnv.defaultTimeout ?? DEFAULT_SERVER_CONFIG.defaultTimeout
    ),
    maxConcurrentHandlers: checkCount(
      'maxConcurrentHandlers',
      overrides.maxConcurrentHandlers ?? DEFAULT_SERVER_CONFIG.maxConcurrentHandlers
    ),
    overloadPolicy,
    cleanupOnStart: checkBoolean(
      'cleanupOnStart',
      overrides.cleanupOnStart ?? DEFAULT_SERVER_CONFIG.cleanupOnStart
    ),
    cleanupOnShutdown: checkBoolean(
      'cleanupOnShutdown',
      overrides.cleanupOnShutdown ?? DEFAULT_SERVER_CONFIG.cleanupOnShutdown
    ),
    replyToMalformedRequests: checkBoolean(
      'replyToMalformedRequests',
      overrides.replyToMalformedRequests ?? DEFAULT_SERVER_CONFIG.replyToMalformedRequests
    ),
    registerBuiltins: checkBoolean(
      'registerBuiltins',
      overrides.registerBuiltins ?? DEFAULT_SERVER_CONFIG.registerBuiltins
    ),
    enableValidation: checkBoolean(
      'enableValidation',
      overrides.enableValidation ?? DEFAULT_SERVER_CONFIG.enableValidation
    ),
  };
}

/**
 * Build a complete client config. Same precedence as {@link resolveServerConfig}.
 *
 * @throws RpcError CONFIGURATION_ERROR on an invalid value
 */
export function resolveClientConfig(
  overrides: Partial<ClientConfig> = {},
  env: Environment = process.env
): ClientConfig {
  const fromEnv = environmentDefaults(env);
  const replyDirectory = overrides.replyDirectory ?? DEFAULT_CLIENT_CONFIG.replyDirectory;
  if (typeof replyDirectory !== 'string' || !replyDirectory.startsWith('/')) {
    throw configError('replyDirectory', replyDirectory, 'an absolute path');
  }

  return {
    maxMessageSize: checkCount(
      'maxMessageSize',
      overrides.maxMessageSize ?? fromEnv.maxMessageSize ?? DEFAULT_CLIENT_CONFIG.maxMessageSize,
      MAX_CONFIGURABLE_MESSAGE_SIZE
    ),
    defaultTimeout: checkTimeout(
      'defaultTimeout',
      overrides.defaultTimeout ?? fromEnv.defaultTimeout ?? DEFAULT_CLIENT_CONFIG.defaultTimeout
    ),
    maxPendingRequests: checkCount(
      'maxPendingRequests',
      overrides.maxPendingRequests ?? DEFAULT_CLIENT_CONFIG.maxPendingRequests
    ),
    enableValidation: checkBoolean(
      'enableValidation',
      overrides.enableValidation ?? DEFAULT_CLIENT_CONFIG.enableValidation
    ),
    replyDirectory,
  };
}
