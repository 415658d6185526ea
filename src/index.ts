#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { enableDebugLogging } from '@/ui/logging/index.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'dgramlink';
const CLI_DESCRIPTION = 'Request/response IPC over Unix domain datagram sockets';

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  // Check for --debug early so option parsing itself can log
  if (process.argv.includes('--debug')) {
    enableDebugLogging();
  }

  const program = new Command()
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option('--debug', 'Enable debug logging (verbose output)');

  commandRegistry.forEach((register) => register(program));

  await program.parseAsync();
}

void main();
