import type { Command } from 'commander';

import { registerActionCommands, registerBroadcastCommand } from '@/commands/broadcast.js';
import { registerConfigCommands } from '@/commands/config.js';
import { registerRequestCommand } from '@/commands/request.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

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
  addCommandGroup('Events:'),
  registerBroadcastCommand,
  registerActionCommands,

  addCommandGroup('OBS Requests:'),
  registerRequestCommand,

  addCommandGroup('Settings:'),
  registerConfigCommands,
];
