/**
 * JSON envelopes for `--json` command output.
 */

import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Error envelope: `{ version, success: false, error, ...extra }`.
   */
  static buildJsonError(
    error: string | Error,
    options?: { exitCode?: number; [key: string]: unknown }
  ): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...options,
    };
  }

  static buildJsonSuccess(data: Record<string, unknown>): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      ...data,
    };
  }
}
