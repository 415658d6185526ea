/**
 * Centralized configuration constants for dgramlink
 *
 * Limits, timeouts and reserved names shared by the client, the server and
 * the command line.
 */

// ============================================================================
// MESSAGE LIMITS
// ============================================================================

/**
 * Largest encoded request or response accepted, in bytes (64KB)
 * A response must fit in one datagram
 */
export const DEFAULT_MAX_MESSAGE_SIZE = 64 * 1024;

/**
 * Upper bound accepted for the configured message size (16MB)
 */
export const MAX_CONFIGURABLE_MESSAGE_SIZE = 16 * 1024 * 1024;

// ============================================================================
// TIMEOUTS
// ============================================================================

/**
 * Deadline applied when a request does not carry one, in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * Shortest deadline a request may carry, in seconds
 */
export const MIN_TIMEOUT_SECONDS = 0.1;

/**
 * Longest deadline a request may carry, in seconds (one hour)
 * Longer deadlines would overflow the 32-bit millisecond timer
 */
export const MAX_TIMEOUT_SECONDS = 3600;

/**
 * Delay of the built-in `slow_process` command, in milliseconds
 */
export const SLOW_PROCESS_DELAY_MS = 2000;

// ============================================================================
// CONCURRENCY
// ============================================================================

/**
 * Handlers allowed to run at once on a server
 */
export const DEFAULT_MAX_CONCURRENT_HANDLERS = 100;

/**
 * Requests a client may have awaiting a response at once
 */
export const DEFAULT_MAX_PENDING_REQUESTS = 1000;

// ============================================================================
// BUILT-IN COMMANDS
// ============================================================================

/**
 * Commands every server answers unless built-ins are disabled.
 * A manifest may not define them.
 */
export const RESERVED_COMMAND_NAMES: ReadonlySet<string> = new Set([
  'ping',
  'echo',
  'get_info',
  'validate',
  'slow_process',
  'manifest',
  'server_stats',
]);

// ============================================================================
// ENVIRONMENT
// ============================================================================

/**
 * Overrides the default timeout (seconds)
 */
export const TIMEOUT_ENV_VAR = 'DGRAMLINK_TIMEOUT';

/**
 * Overrides the maximum message size (bytes)
 */
export const MAX_MESSAGE_SIZE_ENV_VAR = 'DGRAMLINK_MAX_MESSAGE_SIZE';
