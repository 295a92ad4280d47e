import { InvalidArgumentError, Option } from 'commander';

import { isRecord } from '@/obs/protocol.js';
import { CommandError } from '@/ui/errors/index.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

const MIN_PORT = 1;
const MAX_PORT = 65535;

/**
 * Shared --json flag for all commands that support JSON output.
 */
export const jsonOption = new Option('-j, --json', 'Output as JSON').default(false);

/**
 * Shared --timeout <ms> option bounding how long a command waits for OBS.
 */
export const timeoutOption = new Option(
  '-t, --timeout <ms>',
  'Response timeout in milliseconds (default: request_timeout setting)'
).argParser(asArgParser(parseTimeoutMs));

/**
 * Parse a positive timeout in milliseconds.
 *
 * @throws CommandError with INVALID_ARGUMENTS
 */
export function parseTimeoutMs(value: string): number {
  const ms = Number(value);
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new CommandError(
      `Invalid timeout: ${value}`,
      { suggestion: 'Use a positive number of milliseconds, e.g. --timeout 5000' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return ms;
}

/**
 * Parse a positive timeout in seconds (settings unit).
 *
 * @throws CommandError with INVALID_ARGUMENTS
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CommandError(
      `Invalid request timeout: ${value}`,
      { suggestion: 'Use a positive number of seconds, e.g. --request-timeout 2.5' },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return seconds;
}

/**
 * Parse a TCP port.
 *
 * @throws CommandError with INVALID_ARGUMENTS
 */
export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    throw new CommandError(
      `Invalid port: ${value}`,
      { suggestion: `Use a port between ${MIN_PORT} and ${MAX_PORT}` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return port;
}

/**
 * Parse a JSON object argument (--payload, --data).
 *
 * @throws CommandError with INVALID_ARGUMENTS if `value` is not JSON or not an object
 */
export function parseJsonObject(value: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new CommandError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { suggestion: `Quote the object for your shell, e.g. '{"key":"value"}'` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  if (!isRecord(parsed)) {
    throw new CommandError(
      'Expected a JSON object',
      { suggestion: `Wrap values in an object, e.g. '{"key":"value"}'` },
      EXIT_CODES.INVALID_ARGUMENTS
    );
  }
  return parsed;
}

/**
 * Adapt a parser for commander's argParser, which reports
 * InvalidArgumentError on its own.
 */
export function asArgParser<T>(parser: (value: string) => T): (value: string) => T {
  return (value: string) => {
    try {
      return parser(value);
    } catch (error) {
      if (error instanceof CommandError) {
        throw new InvalidArgumentError(error.message);
      }
      throw error;
    }
  };
}
