/**
 * OBS WebSocket error classes.
 *
 * Every failure the connection layer surfaces is an {@link ObsError} with a
 * stable `code`, so callers can branch on the kind of failure without
 * depending on class identity across module boundaries.
 */

import { EXIT_CODES } from '@/utils/exitCodes.js';

import type { RequestStatus } from './protocol.js';

/**
 * Discriminant for every OBS error kind.
 */
export type ObsErrorCode =
  | 'OBS_CONNECTION_ERROR'
  | 'OBS_AUTHENTICATION_ERROR'
  | 'OBS_NOT_CONNECTED'
  | 'OBS_RESPONSE_TIMEOUT'
  | 'OBS_REQUEST_FAILED';

/**
 * Base error class for all OBS-related errors.
 *
 * Carries an error code for programmatic handling, an exit code for the CLI,
 * and cause chaining for wrapped transport errors.
 */
export abstract class ObsError extends Error {
  abstract readonly code: ObsErrorCode;
  abstract readonly exitCode: number;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Transport or handshake failure.
 *
 * Examples:
 * - WebSocket dial refused or timed out
 * - First frame was not Hello
 * - Identified acknowledgement missing
 */
export class ObsConnectionError extends ObsError {
  readonly code: ObsErrorCode = 'OBS_CONNECTION_ERROR';
  readonly exitCode: number = EXIT_CODES.OBS_CONNECTION_FAILURE;
}

/**
 * Authentication material missing or rejected.
 */
export class ObsAuthenticationError extends ObsConnectionError {
  readonly code: ObsErrorCode = 'OBS_AUTHENTICATION_ERROR';
  readonly exitCode: number = EXIT_CODES.AUTHENTICATION_FAILED;
}

/**
 * Operation attempted without an identified session.
 */
export class ObsNotConnectedError extends ObsConnectionError {
  readonly code: ObsErrorCode = 'OBS_NOT_CONNECTED';
  readonly exitCode: number = EXIT_CODES.OBS_NOT_CONNECTED;
}

/**
 * No matching response arrived before the request deadline.
 */
export class ObsResponseTimeoutError extends ObsConnectionError {
  readonly code: ObsErrorCode = 'OBS_RESPONSE_TIMEOUT';
  readonly exitCode: number = EXIT_CODES.OBS_TIMEOUT;
}

/**
 * OBS answered a request with `requestStatus.result === false`.
 */
export class ObsRequestError extends ObsConnectionError {
  readonly code: ObsErrorCode = 'OBS_REQUEST_FAILED';
  readonly exitCode: number = EXIT_CODES.REQUEST_REJECTED;

  readonly requestType: string;
  readonly status: RequestStatus;

  constructor(requestType: string, status: RequestStatus) {
    const comment = status.comment ?? 'Unknown OBS request failure';
    super(`${requestType} failed with code ${status.code}: ${comment}`);
    this.requestType = requestType;
    this.status = status;
  }

  /** Protocol status code (e.g. 400, 600) */
  get statusCode(): number {
    return this.status.code;
  }

  /** Human-readable comment OBS attached to the failure, if any */
  get comment(): string | undefined {
    return this.status.comment;
  }
}

/**
 * Error kinds that reflect the state of OBS or the link to it rather than a
 * programming mistake on the caller's side.
 */
export const RUNTIME_FAILURE_CODES: readonly ObsErrorCode[] = [
  'OBS_NOT_CONNECTED',
  'OBS_REQUEST_FAILED',
  'OBS_RESPONSE_TIMEOUT',
];

/**
 * Check whether a thrown value is an OBS error, optionally of specific kinds.
 *
 * @example
 * ```typescript
 * if (isObsError(error, 'OBS_RESPONSE_TIMEOUT')) {
 *   log.warn('OBS is slow to answer');
 * }
 * ```
 */
export function isObsError(error: unknown, ...codes: ObsErrorCode[]): error is ObsError {
  if (!(error instanceof ObsError)) {
    return false;
  }
  return codes.length === 0 || codes.includes(error.code);
}

// ============================================================================
// Typed outcomes
// ============================================================================

/**
 * Outcome of an operation that can fail for expected runtime reasons.
 *
 * Lets callers pattern-match on `success` (and on `error.code`) instead of
 * wrapping calls in try/catch.
 */
export type ObsResult<T> =
  | { success: true; data: T }
  | { success: false; error: ObsError };

/**
 * Run an async operation, converting the given OBS error kinds into a failed
 * {@link ObsResult}. Any other error propagates.
 */
export async function captureObsResult<T>(
  operation: () => Promise<T>,
  codes: readonly ObsErrorCode[] = RUNTIME_FAILURE_CODES
): Promise<ObsResult<T>> {
  try {
    return { success: true, data: await operation() };
  } catch (error) {
    if (isObsError(error, ...codes)) {
      return { success: false, error };
    }
    throw error;
  }
}
