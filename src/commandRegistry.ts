import type { Command } from 'commander';

import { registerSendCommand } from '@/commands/send.js';
import { registerServeCommand } from '@/commands/serve.js';
import { registerValidateManifestCommand } from '@/commands/validateManifest.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Server:'),
  registerServeCommand,

  addCommandGroup('Client:'),
  registerSendCommand,

  addCommandGroup('Manifest:'),
  registerValidateManifestCommand,
];
