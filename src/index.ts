#!/usr/bin/env node

import { Command } from 'commander';

import { commandRegistry } from '@/commandRegistry.js';
import { createLogger, enableDebugLogging } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';
import { VERSION } from '@/utils/version.js';

const CLI_NAME = 'obsb';
const CLI_DESCRIPTION = 'Broadcast custom events to OBS Studio over obs-websocket v5';

const log = createLogger('obsb');

/**
 * Parse arguments and route to the command. Every command exits the process
 * itself through runCommand.
 */
async function main(): Promise<void> {
  // Before command registration so connection setup is logged too
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

main().catch((error: unknown) => {
  log.error(getErrorMessage(error));
  process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
});
