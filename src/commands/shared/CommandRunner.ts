import { RpcError } from '@/errors/index.js';
import { CommandError, exitCodeForError, isServerUnavailableError } from '@/ui/errors/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

/**
 * Standard options supported by CommandRunner.
 * All commands that use CommandRunner must extend this interface.
 */
export interface BaseCommandOptions {
  /** Output as JSON instead of human-readable format */
  json?: boolean;
}

/**
 * Result from a command handler.
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  /** Data to output; printed for failed commands too when present */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Exit code override (defaults: SUCCESS, or UNHANDLED_EXCEPTION on failure) */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formatter for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

function buildJsonError(
  message: string,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  return { version: VERSION, success: false, error: message, ...extra };
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/**
 * Run a command with consistent error handling, output formatting and exit codes.
 *
 * - Formats output as JSON or human-readable based on --json
 * - Maps thrown errors to exit codes (CommandError carries its own)
 * - Calls process.exit() when done
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => ({ success: true, data: await load(opts.file) }),
 *   options,
 *   formatData
 * );
 * ```
 */
export async function runCommand<TOptions extends BaseCommandOptions, TResult = unknown>(
  handler: CommandHandler<TOptions, TResult>,
  options: TOptions,
  formatter?: CommandFormatter<TResult>
): Promise<void> {
  try {
    const result = await handler(options);
    const exitCode =
      result.exitCode ?? (result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.UNHANDLED_EXCEPTION);

    if (options.json) {
      printJson(
        result.data !== undefined ? result.data : buildJsonError(result.error ?? 'Unknown error')
      );
    } else {
      if (result.data !== undefined) {
        const output = formatter ? formatter(result.data) : JSON.stringify(result.data, null, 2);
        if (result.success) {
          console.log(output);
        } else {
          console.error(output);
        }
      }
      if (!result.success && result.error !== undefined) {
        console.error(`Error: ${result.error}`);
      }
    }
    process.exit(exitCode);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        printJson(buildJsonError(error.message, { ...error.metadata }));
      } else {
        console.error(`Error: ${error.message}`);
        for (const value of Object.values(error.metadata)) {
          console.error(value);
        }
      }
      process.exit(error.exitCode);
    }

    const message = error instanceof RpcError ? error.describe() : getErrorMessage(error);

    if (isServerUnavailableError(error)) {
      if (options.json) {
        printJson(
          buildJsonError(message, {
            suggestion: 'Start a server with: dgramlink serve <socket>',
          })
        );
      } else {
        console.error(`Error: no server is listening (${message})`);
      }
      process.exit(EXIT_CODES.RESOURCE_NOT_FOUND);
    }

    if (options.json) {
      printJson(buildJsonError(message, error instanceof RpcError ? { code: error.code } : {}));
    } else {
      console.error(`Error: ${message}`);
    }
    process.exit(exitCodeForError(error));
  }
}
