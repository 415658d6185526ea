/**
 * Logging utilities for consistent formatted output with log level support.
 *
 * By default only 'info' level logs are shown. Set DGRAMLINK_DEBUG=1 or pass
 * the --debug flag to enable verbose 'debug' level logs.
 */

// ============================================================================
// Global Debug State
// ============================================================================

const DEBUG_ENV_VAR = 'DGRAMLINK_DEBUG';

let debugEnabled = false;

/**
 * Enable debug logging globally.
 *
 * Called during CLI initialization when --debug is detected, or by embedders
 * that want request/response traces from the engines.
 */
export function enableDebugLogging(): void {
  debugEnabled = true;
}

/**
 * Disable debug logging that was enabled programmatically.
 */
export function disableDebugLogging(): void {
  debugEnabled = false;
}

/**
 * Check if debug logging is currently enabled.
 */
export function isDebugEnabled(): boolean {
  return debugEnabled || process.env[DEBUG_ENV_VAR] === '1';
}

// ============================================================================
// Log Levels
// ============================================================================

/**
 * Log level determines visibility of log messages.
 *
 * - 'info': Always shown (startup, shutdown, failures worth an operator's attention)
 * - 'debug': Only shown in debug mode (per-datagram traces, dropped responses)
 */
export type LogLevel = 'info' | 'debug';

/**
 * Log contexts for different components.
 * Used to prefix log messages with component name.
 */
export type LogContext = 'dgramlink' | 'server' | 'client' | 'transport' | 'manifest' | 'cli';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Logger instance with support for different log levels.
 */
export interface Logger {
  /** Log an info message (always shown). */
  info: (message: string) => void;

  /** Log a debug message (only shown in debug mode). */
  debug: (message: string) => void;

  /** Log a message at debug level. */
  (message: string): void;
}

// ============================================================================
// Logger Implementation
// ============================================================================

/**
 * Create a logger instance for a specific context.
 *
 * Every line goes to stderr so that stdout stays reserved for command output.
 *
 * @example
 * ```typescript
 * const log = createLogger('server');
 *
 * log.info('Listening on /tmp/app.sock');
 * log.debug('Received ping (id 2c0e...)');
 * ```
 */
export function createLogger(context: LogContext): Logger {
  const logMessage = (message: string, level: LogLevel = 'debug'): void => {
    if (level === 'debug' && !isDebugEnabled()) {
      return;
    }
    console.error(`[${context}] ${message}`);
  };

  return Object.assign((message: string) => logMessage(message, 'debug'), {
    info: (message: string) => logMessage(message, 'info'),
    debug: (message: string) => logMessage(message, 'debug'),
  });
}
