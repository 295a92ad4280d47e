/**
 * Semantic exit codes for script-friendly error handling.
 *
 * Exit codes follow semantic ranges:
 * - **0**: Success
 * - **1**: Generic failure (avoid in new code)
 * - **80-99**: User errors (invalid input, bad credentials, missing settings)
 * - **100-119**: Software errors (OBS unreachable, protocol failures, timeouts)
 *
 * Values are stable: scripts may branch on them.
 */
export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** Generic failure (use specific codes when possible) */
  GENERIC_FAILURE: 1,

  // User Errors (80-99)

  /** Invalid command-line arguments or options */
  INVALID_ARGUMENTS: 81,

  /** OBS rejected the configured password (or none was configured) */
  AUTHENTICATION_FAILED: 82,

  /** OBS answered the request with a failure status */
  REQUEST_REJECTED: 87,

  // Software Errors (100-119)

  /** WebSocket dial or handshake failed */
  OBS_CONNECTION_FAILURE: 101,

  /** OBS did not answer within the request timeout */
  OBS_TIMEOUT: 102,

  /** Settings file could not be read or written */
  SETTINGS_FILE_ERROR: 103,

  /** Unhandled exception in code */
  UNHANDLED_EXCEPTION: 104,

  /** A bridge action was not accepted (OBS unreachable, rejected or timed out) */
  BROADCAST_FAILED: 105,

  /** Operation needs an identified OBS session but none exists */
  OBS_NOT_CONNECTED: 106,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
