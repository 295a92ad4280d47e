/**
 * Error handling utilities.
 */

/**
 * Extract error message from unknown error type.
 *
 * @example
 * ```typescript
 * try {
 *   await manager.connect();
 * } catch (error) {
 *   log.warn(`Connect failed: ${getErrorMessage(error)}`);
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Normalize an unknown thrown value into an Error instance for cause chaining.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
