import { ObsAuthenticationError, ObsError } from '@/obs/errors.js';
import { SettingsFileError } from '@/settings/store.js';
import { OutputBuilder } from '@/ui/OutputBuilder.js';
import { CommandError } from '@/ui/errors/index.js';
import {
  genericError,
  obsAuthenticationError,
  obsUnreachableError,
  unknownError,
} from '@/ui/messages/errors.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

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
  /** Data to output (for successful commands) */
  data?: T;
  /** Error message (for failed commands) */
  error?: string;
  /** Optional exit code override (defaults: SUCCESS=0, error codes from EXIT_CODES) */
  exitCode?: number;
}

export type CommandHandler<TOptions extends BaseCommandOptions, TResult = unknown> = (
  options: TOptions
) => Promise<CommandResult<TResult>>;

/**
 * Formats the command result data for human-readable output.
 */
export type CommandFormatter<TResult = unknown> = (data: TResult) => string;

/**
 * Run a command with consistent error handling, output formatting, and exit codes.
 *
 * - OBS errors exit with their own exit code (connection, auth, timeout, rejected request)
 * - Settings file errors exit with SETTINGS_FILE_ERROR
 * - CommandError carries its own metadata and exit code
 * - Anything else is an unhandled exception
 *
 * Handlers own their resources: close the OBS connection before returning or
 * throwing, since this function ends the process.
 *
 * @example
 * ```typescript
 * await runCommand(
 *   async (opts) => {
 *     const data = await withBridge((bridge) => bridge.manager.sendRequest('GetVersion'));
 *     return { success: true, data };
 *   },
 *   options,
 *   formatVersion
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

    if (!result.success) {
      if (options.json) {
        console.log(
          JSON.stringify(OutputBuilder.buildJsonError(result.error ?? 'Unknown error'), null, 2)
        );
      } else {
        console.error(result.error ? genericError(result.error) : unknownError());
      }
      process.exit(result.exitCode ?? EXIT_CODES.UNHANDLED_EXCEPTION);
    }

    if (options.json) {
      console.log(JSON.stringify(result.data ?? null, null, 2));
    } else if (formatter && result.data !== undefined) {
      console.log(formatter(result.data));
    } else if (result.data !== undefined) {
      console.log(JSON.stringify(result.data, null, 2));
    }

    process.exit(EXIT_CODES.SUCCESS);
  } catch (error) {
    if (error instanceof CommandError) {
      if (options.json) {
        console.log(
          JSON.stringify(
            OutputBuilder.buildJsonError(error.message, { ...error.metadata, exitCode: error.exitCode }),
            null,
            2
          )
        );
      } else {
        console.error(genericError(error.message));
        for (const value of Object.values(error.metadata)) {
          console.error(value);
        }
      }
      process.exit(error.exitCode);
    }

    if (error instanceof ObsError || error instanceof SettingsFileError) {
      if (options.json) {
        console.log(
          JSON.stringify(
            OutputBuilder.buildJsonError(error.message, {
              code: error.code,
              exitCode: error.exitCode,
            }),
            null,
            2
          )
        );
      } else if (error instanceof ObsAuthenticationError) {
        console.error(obsAuthenticationError(error.message));
      } else if (error instanceof ObsError && error.code === 'OBS_CONNECTION_ERROR') {
        console.error(obsUnreachableError(error.message));
      } else {
        console.error(genericError(error.message));
      }
      process.exit(error.exitCode);
    }

    const errorMessage = getErrorMessage(error);
    if (options.json) {
      console.log(JSON.stringify(OutputBuilder.buildJsonError(errorMessage), null, 2));
    } else {
      console.error(genericError(errorMessage));
    }
    process.exit(EXIT_CODES.UNHANDLED_EXCEPTION);
  }
}
