import type { Command } from 'commander';

import type { BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { runCommand } from '@/commands/shared/CommandRunner.js';
import {
  asArgParser,
  jsonOption,
  parsePort,
  parseTimeoutSeconds,
} from '@/commands/shared/commonOptions.js';
import type { ConfigSetResult, ConfigShowResult } from '@/commands/types.js';
import {
  settingsFromEnv,
  settingsToRecord,
  updateSettings,
  type BridgeSettings,
  type BridgeSettingsPatch,
} from '@/settings/settings.js';
import { FileSettingsStore, loadEffectiveSettings } from '@/settings/store.js';
import { CommandError } from '@/ui/errors/index.js';
import { keyValueLines, section } from '@/ui/formatting.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const MASKED_PASSWORD = '********';

interface ConfigSetOptions extends BaseCommandOptions {
  host?: string;
  port?: number;
  password?: string;
  ssl?: boolean;
  namespace?: string;
  requestTimeout?: number;
}

/**
 * Settings as printed: the password is masked unless empty.
 */
export function displaySettings(settings: BridgeSettings): Record<string, unknown> {
  const record = settingsToRecord(settings);
  return { ...record, password: settings.password ? MASKED_PASSWORD : '' };
}

/**
 * Turn `config set` flags into a settings patch.
 *
 * @throws CommandError if no setting flag was given
 */
export function buildSettingsPatch(options: ConfigSetOptions): BridgeSettingsPatch {
  const patch: BridgeSettingsPatch = {};
  if (options.host !== undefined) patch.host = options.host;
  if (options.port !== undefined) patch.port = options.port;
  if (options.password !== undefined) patch.password = options.password;
  if (options.ssl !== undefined) patch.use_ssl = options.ssl;
  if (options.namespace !== undefined) patch.namespace = options.namespace;
  if (options.requestTimeout !== undefined) patch.request_timeout = options.requestTimeout;

  if (Object.keys(patch).length === 0) {
    throw new CommandError(
      'No settings given',
      { suggestion: 'Pass at least one of --host, --port, --password, --ssl, --namespace, --request-timeout' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return patch;
}

function formatSettingsRows(settings: Record<string, unknown>): string[] {
  return keyValueLines(Object.entries(settings).map(([key, value]) => [key, String(value)]));
}

function formatShow(data: ConfigShowResult): string {
  const lines = [section(`Settings (${data.path}):`, formatSettingsRows(data.settings))];
  if (data.envOverrides.length > 0) {
    lines.push(`Overridden by environment: ${data.envOverrides.join(', ')}`);
  }
  return lines.join('\n');
}

function formatSet(data: ConfigSetResult): string {
  if (!data.changed) {
    return `Settings unchanged (${data.path})`;
  }
  return section(`Saved settings to ${data.path}:`, formatSettingsRows(data.settings));
}

/**
 * Register `obsb config show` and `obsb config set`
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerConfigCommands(program: Command): void {
  const config = program.command('config').description('Show or change bridge settings');

  config
    .command('show')
    .description('Print the effective settings (file + OBS_* environment overrides)')
    .addOption(jsonOption)
    .action(async (options: BaseCommandOptions) => {
      await runCommand<BaseCommandOptions, ConfigShowResult>(
        async () => {
          const store = new FileSettingsStore();
          const settings = await loadEffectiveSettings(store);
          return {
            success: true,
            data: {
              path: store.path,
              settings: displaySettings(settings),
              envOverrides: Object.keys(settingsFromEnv(process.env)),
            },
          };
        },
        options,
        formatShow
      );
    });

  config
    .command('set')
    .description('Change stored settings')
    .option('--host <host>', 'OBS WebSocket host')
    .option('--port <port>', 'OBS WebSocket port', asArgParser(parsePort))
    .option('--password <password>', 'OBS WebSocket server password ("" to clear)')
    .option('--ssl', 'Connect with wss://')
    .option('--no-ssl', 'Connect with ws://')
    .option('--namespace <namespace>', 'Prefix of broadcast event types')
    .option(
      '--request-timeout <seconds>',
      'Response timeout in seconds',
      asArgParser(parseTimeoutSeconds)
    )
    .addOption(jsonOption)
    .action(async (options: ConfigSetOptions) => {
      await runCommand<ConfigSetOptions, ConfigSetResult>(
        async (opts) => {
          const patch = buildSettingsPatch(opts);
          const store = new FileSettingsStore();
          const stored = await store.load();
          const next = updateSettings(stored, patch);
          const changed = next !== stored;
          if (changed) {
            await store.save(next);
          }
          return {
            success: true,
            data: { path: store.path, changed, settings: displaySettings(next) },
          };
        },
        options,
        formatSet
      );
    });
}
