import type { Command } from 'commander';

import type { BridgeAction } from '@/bridge/actions.js';
import { BRIDGE_ACTIONS } from '@/bridge/actions.js';
import type { BaseCommandOptions, CommandResult } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  withBridge,
  withHostBridge,
  type BridgeSessionDeps,
} from '@/commands/shared/bridgeSession.js';
import {
  asArgParser,
  jsonOption,
  parseJsonObject,
  timeoutOption,
} from '@/commands/shared/commonOptions.js';
import type { BroadcastCommandResult } from '@/commands/types.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

interface BroadcastOptions extends BaseCommandOptions {
  payload?: Record<string, unknown>;
  timeout?: number;
}

function formatBroadcast(data: BroadcastCommandResult): string {
  return `Broadcast ${data.eventType}`;
}

/**
 * Connect, broadcast one custom event and disconnect.
 */
async function broadcastOnce(
  action: string,
  payload: Record<string, unknown> | undefined,
  timeout: number | undefined
): Promise<BroadcastCommandResult> {
  return withBridge(async (bridge) => {
    const eventType = bridge.broadcaster.formatEventType(action);
    await bridge.broadcaster.broadcast(action, payload, timeout);
    return { eventType, eventData: payload ?? {} };
  });
}

/**
 * Register `obsb broadcast <action>`
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerBroadcastCommand(program: Command): void {
  program
    .command('broadcast')
    .description('Broadcast a custom event to every OBS WebSocket client')
    .argument('<action>', 'Action name, namespaced unless it already contains ":"')
    .option('-p, --payload <json>', 'Event data as a JSON object', asArgParser(parseJsonObject))
    .addOption(timeoutOption)
    .addOption(jsonOption)
    .action(async (action: string, options: BroadcastOptions) => {
      await runCommand<BroadcastOptions, BroadcastCommandResult>(
        async (opts) => ({
          success: true,
          data: await broadcastOnce(action, opts.payload, opts.timeout),
        }),
        options,
        formatBroadcast
      );
    });
}

/**
 * Broadcast a predefined action through the host bridge.
 *
 * A broadcast OBS did not accept is a failed result, not an exception;
 * the reason has already been logged by the broadcaster.
 */
export async function runBridgeAction(
  bridgeAction: BridgeAction,
  timeout?: number,
  deps: BridgeSessionDeps = {}
): Promise<CommandResult<BroadcastCommandResult>> {
  return withHostBridge(async (bridge) => {
    const eventType = bridge.broadcaster.formatEventType(bridgeAction.eventAction);
    const sent = await bridge.broadcast(bridgeAction.eventAction, bridgeAction.payload, timeout);
    if (!sent) {
      return {
        success: false,
        error: `OBS did not accept ${eventType}`,
        exitCode: EXIT_CODES.BROADCAST_FAILED,
      };
    }
    return { success: true, data: { eventType, eventData: bridgeAction.payload ?? {} } };
  }, deps);
}

function registerActionCommand(program: Command, bridgeAction: BridgeAction): void {
  program
    .command(bridgeAction.command)
    .description(bridgeAction.description)
    .addOption(timeoutOption)
    .addOption(jsonOption)
    .action(async (options: BroadcastOptions) => {
      await runCommand<BroadcastOptions, BroadcastCommandResult>(
        (opts) => runBridgeAction(bridgeAction, opts.timeout),
        options,
        formatBroadcast
      );
    });
}

/**
 * Register one command per predefined bridge action (e.g. `greet-feed-read-all`).
 */
export function registerActionCommands(program: Command): void {
  for (const bridgeAction of BRIDGE_ACTIONS) {
    registerActionCommand(program, bridgeAction);
  }
}
