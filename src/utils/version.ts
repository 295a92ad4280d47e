import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

import { isRecord } from '@/obs/protocol.js';
import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

const log = createLogger('obsb');

const FALLBACK_VERSION = '0.0.0';

let cachedVersion = '';

/**
 * Package version, read once from package.json (two levels above this
 * module in both src/ and dist/).
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  try {
    const moduleDir = dirname(fileURLToPath(import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(join(moduleDir, '../../package.json'), 'utf-8'));
    const version = isRecord(pkg) ? pkg['version'] : undefined;
    cachedVersion = typeof version === 'string' ? version : FALLBACK_VERSION;
  } catch (error) {
    cachedVersion = FALLBACK_VERSION;
    log.debug(`Could not read package version: ${getErrorMessage(error)}`);
  }

  return cachedVersion;
}

export const VERSION: string = getVersion();
