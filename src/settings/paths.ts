/**
 * Settings file locations.
 *
 * Settings live in ~/.obsb/settings.json; OBSB_CONFIG_DIR points obsb at
 * another directory (tests, portable installs).
 */

import * as os from 'os';
import * as path from 'path';

import { SETTINGS_DIR_ENV, SETTINGS_DIR_NAME, SETTINGS_FILE_NAME } from '@/constants.js';

/**
 * Directory holding obsb settings.
 *
 * Uses os.homedir() on every call so tests can change HOME.
 */
export function getSettingsDir(): string {
  const override = process.env[SETTINGS_DIR_ENV];
  if (override && override.trim().length > 0) {
    return path.isAbsolute(override) ? override : path.resolve(override);
  }

  return path.join(os.homedir(), SETTINGS_DIR_NAME);
}

export function getSettingsFilePath(): string {
  return path.join(getSettingsDir(), SETTINGS_FILE_NAME);
}
