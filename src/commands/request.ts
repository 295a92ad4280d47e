import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import { withBridge } from '@/commands/shared/bridgeSession.js';
import {
  asArgParser,
  jsonOption,
  parseJsonObject,
  timeoutOption,
} from '@/commands/shared/commonOptions.js';
import type { RequestCommandResult } from '@/commands/types.js';

interface RequestOptions extends BaseCommandOptions {
  data?: Record<string, unknown>;
  timeout?: number;
}

function formatRequest(data: RequestCommandResult): string {
  if (Object.keys(data.responseData).length === 0) {
    return `${data.requestType} succeeded`;
  }
  return JSON.stringify(data.responseData, null, 2);
}

/**
 * Register `obsb request <type>`: send a raw OBS request (GetVersion,
 * GetSceneList, ...) and print its response data.
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerRequestCommand(program: Command): void {
  program
    .command('request')
    .description('Send a raw OBS WebSocket request and print the response data')
    .argument('<type>', 'OBS request type, e.g. GetVersion')
    .option('-d, --data <json>', 'Request data as a JSON object', asArgParser(parseJsonObject))
    .addOption(timeoutOption)
    .addOption(jsonOption)
    .action(async (requestType: string, options: RequestOptions) => {
      await runCommand<RequestOptions, RequestCommandResult>(
        async (opts) => {
          const responseData = await withBridge((bridge) =>
            bridge.manager.sendRequest(requestType, opts.data, opts.timeout)
          );
          return { success: true, data: { requestType, responseData } };
        },
        options,
        formatRequest
      );
    });
}
