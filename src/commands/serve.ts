import { Option, type Command } from 'commander';

import {
  manifestOption,
  parsePositiveInteger,
  parsePositiveNumber,
  transportOption,
} from '@/commands/shared/commonOptions.js';
import { SignalHandler } from '@/commands/shared/SignalHandler.js';
import {
  resolveServerConfig,
  type Environment,
  type OverloadPolicy,
} from '@/config/index.js';
import { RpcError } from '@/errors/index.js';
import { loadManifestFile } from '@/manifest/index.js';
import { RpcServer, type RpcServerOptions } from '@/server/index.js';
import { createTransport, type TransportKind } from '@/transport/index.js';
import { CommandError, exitCodeForError } from '@/ui/errors/index.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('cli');

/**
 * Flags supported by `dgramlink serve`.
 */
export interface ServeOptions {
  manifest?: string;
  transport: TransportKind;
  /** Default handler deadline in seconds */
  timeout?: number;
  maxConcurrent?: number;
  maxMessageSize?: number;
  overload: OverloadPolicy;
  /** Keep the socket file after shutdown */
  keepSocket: boolean;
  /** Answer undecodable requests that carry a reply address */
  replyMalformed: boolean;
}

/**
 * Translate CLI flags into server options.
 */
export function buildServerOptions(
  options: ServeOptions,
  env: Environment = process.env
): Omit<RpcServerOptions, 'manifest'> {
  // The stream transport frames with the same limit the server enforces
  const { maxMessageSize } = resolveServerConfig(
    options.maxMessageSize !== undefined ? { maxMessageSize: options.maxMessageSize } : {},
    env
  );
  return {
    transport: createTransport(options.transport, maxMessageSize),
    maxMessageSize,
    overloadPolicy: options.overload,
    cleanupOnShutdown: !options.keepSocket,
    replyToMalformedRequests: options.replyMalformed,
    ...(options.timeout !== undefined && { defaultTimeout: options.timeout }),
    ...(options.maxConcurrent !== undefined && { maxConcurrentHandlers: options.maxConcurrent }),
  };
}

async function serve(socket: string, options: ServeOptions): Promise<void> {
  const manifest =
    options.manifest !== undefined ? await loadManifestFile(options.manifest) : undefined;
  const server = new RpcServer(socket, {
    ...buildServerOptions(options),
    ...(manifest !== undefined && { manifest }),
  });

  server.on('error', (error) => {
    log.debug(error instanceof RpcError ? error.describe() : getErrorMessage(error));
  });
  server.on('responseValidationFailed', ({ request, errors }) => {
    log.info(
      `Response of ${request.command} does not match the manifest: ` +
        errors.map((error) => `${error.field}: ${error.message}`).join('; ')
    );
  });

  await server.start();
  console.error(`Listening on ${socket} (commands: ${server.getRegisteredCommands().join(', ')})`);

  new SignalHandler({
    onShutdown: async () => {
      await server.stop();
    },
  }).register();
}

/**
 * Register serve command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run a server answering the built-in commands until interrupted')
    .argument('<socket>', 'Socket path to bind')
    .addOption(manifestOption)
    .addOption(transportOption)
    .addOption(
      new Option('-t, --timeout <seconds>', 'Default handler timeout in seconds').argParser(
        (value) => parsePositiveNumber(value, '--timeout')
      )
    )
    .addOption(
      new Option('--max-concurrent <n>', 'Maximum concurrently running handlers').argParser(
        (value) => parsePositiveInteger(value, '--max-concurrent')
      )
    )
    .addOption(
      new Option('--max-message-size <bytes>', 'Largest accepted message').argParser((value) =>
        parsePositiveInteger(value, '--max-message-size')
      )
    )
    .addOption(
      new Option('--overload <policy>', 'What to do when every handler slot is busy')
        .choices(['reject', 'queue'])
        .default('reject')
    )
    .option('--keep-socket', 'Leave the socket file in place on shutdown', false)
    .option('--no-reply-malformed', 'Drop malformed requests instead of answering with a parse error')
    .action(async (socket: string, options: ServeOptions) => {
      try {
        await serve(socket, options);
      } catch (error) {
        const message = error instanceof RpcError ? error.describe() : getErrorMessage(error);
        console.error(`Error: ${message}`);
        process.exit(error instanceof CommandError ? error.exitCode : exitCodeForError(error));
      }
    });
}
