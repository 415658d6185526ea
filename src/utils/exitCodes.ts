/**
 * Semantic exit codes for the dgramlink CLI.
 *
 * Exit codes follow semantic ranges for predictable automation:
 * - **0**: Success
 * - **1**: The server answered with an error response
 * - **80-99**: User errors (invalid input, missing server, bad manifest)
 * - **100-119**: Software errors (timeouts, socket failures, unexpected exceptions)
 *
 * Values are stable; new codes are only ever added inside the existing ranges.
 */

/**
 * Exit code constants following semantic ranges.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Request was delivered and answered with an error response */
  ERROR_RESPONSE: 1,

  // User Errors (80-99): Issues caused by user input or environment

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** Insufficient permissions for the socket path */
  PERMISSION_DENIED: 82,

  /** Server socket not found or not listening */
  RESOURCE_NOT_FOUND: 83,

  /** Socket path already bound by another process */
  RESOURCE_BUSY: 85,

  /** Manifest could not be loaded or failed consistency checks */
  INVALID_MANIFEST: 87,

  // Software Errors (100-119): Internal failures or integration issues

  /** Socket creation, bind or send failed */
  SOCKET_FAILURE: 101,

  /** Request timed out waiting for a response */
  REQUEST_TIMEOUT: 102,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** Generic software error (use specific codes when possible) */
  SOFTWARE_ERROR: 110,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
