import type { Command } from 'commander';

import { RpcClient, type RpcClientOptions } from '@/client/index.js';
import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import {
  jsonOption,
  manifestOption,
  timeoutOption,
  transportOption,
} from '@/commands/shared/commonOptions.js';
import type { SendResult } from '@/commands/types.js';
import { resolveClientConfig, type Environment } from '@/config/index.js';
import { loadManifestFile } from '@/manifest/index.js';
import { createTransport, type TransportKind } from '@/transport/index.js';
import { isJsonObject, type JsonObject } from '@/types.js';
import { CommandError } from '@/ui/errors/index.js';
import { formatResponse } from '@/ui/formatters/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Flags supported by `dgramlink send`.
 */
interface SendOptions extends BaseCommandOptions {
  /** Arguments as a JSON object */
  args?: string;
  timeout?: number;
  manifest?: string;
  /** Send without a reply address */
  notify?: boolean;
  transport: TransportKind;
}

/**
 * Parse the --args value into an argument object.
 */
export function parseArgsOption(value: string | undefined): JsonObject | undefined {
  if (value === undefined) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new CommandError(
      `--args is not valid JSON: ${getErrorMessage(error)}`,
      { suggestion: `Pass a JSON object, e.g. --args '{"name":"lib-1"}'` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  if (!isJsonObject(parsed)) {
    throw new CommandError('--args must be a JSON object', {}, EXIT_CODES.INVALID_ARGUMENTS);
  }
  return parsed;
}

/**
 * Client options for the chosen transport, sized by the client's message limit.
 */
export function buildClientOptions(
  transport: TransportKind,
  env: Environment = process.env
): RpcClientOptions {
  const { maxMessageSize } = resolveClientConfig({}, env);
  return { transport: createTransport(transport, maxMessageSize), maxMessageSize };
}

function formatSend(data: SendResult): string {
  if (data.response === undefined) {
    return `Sent ${data.command} (no response requested)`;
  }
  return formatResponse(data.response);
}

/**
 * Register send command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerSendCommand(program: Command): void {
  program
    .command('send')
    .description('Send one request to a server and print its response')
    .argument('<socket>', 'Server socket path')
    .argument('<command>', 'Command name')
    .option('-a, --args <json>', 'Arguments as a JSON object')
    .addOption(timeoutOption)
    .addOption(manifestOption)
    .option('--notify', 'Send without waiting for a response', false)
    .addOption(transportOption)
    .addOption(jsonOption)
    .action(async (socket: string, command: string, options: SendOptions) => {
      await runCommand<SendOptions, SendResult>(
        async (opts) => {
          const args = parseArgsOption(opts.args);
          const manifest =
            opts.manifest !== undefined ? await loadManifestFile(opts.manifest) : undefined;
          const client = new RpcClient(socket, {
            ...buildClientOptions(opts.transport),
            ...(manifest !== undefined && { manifest }),
          });

          const startedAt = Date.now();
          try {
            if (opts.notify) {
              await client.sendNotification(command, args);
              return { success: true, data: { command, elapsedMs: Date.now() - startedAt } };
            }

            const response = await client.sendRequest(
              command,
              args,
              opts.timeout !== undefined ? { timeout: opts.timeout } : {}
            );
            return {
              success: response.success,
              data: {
                requestId: response.requestId,
                command,
                response,
                elapsedMs: Date.now() - startedAt,
              },
              exitCode: response.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERROR_RESPONSE,
            };
          } finally {
            await client.close();
          }
        },
        options,
        formatSend
      );
    });
}
