/**
 * Errors raised by obsb commands with a user-facing hint and exit code.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

/**
 * Extra lines printed under the error message.
 */
export interface ErrorMetadata {
  /** How to fix it */
  suggestion?: string;
  note?: string;
}

/**
 * Command failure carrying metadata and the process exit code.
 *
 * @example
 * ```typescript
 * throw new CommandError(
 *   'Invalid port: 99999',
 *   { suggestion: 'Use a port between 1 and 65535' },
 *   EXIT_CODES.INVALID_ARGUMENTS
 * );
 * ```
 */
export class CommandError extends Error {
  public readonly metadata: ErrorMetadata;
  public readonly exitCode: number;

  constructor(
    message: string,
    metadata: ErrorMetadata = {},
    exitCode: number = EXIT_CODES.GENERIC_FAILURE
  ) {
    super(message);
    this.name = 'CommandError';
    this.metadata = metadata;
    this.exitCode = exitCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CommandError);
    }
  }
}
