/**
 * Settings persistence.
 */

import * as fs from 'fs';
import * as path from 'path';

import { createLogger } from '@/ui/logging/index.js';
import { AtomicFileWriter } from '@/utils/atomicFile.js';
import { getErrorMessage } from '@/utils/errors.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

import { getSettingsFilePath } from './paths.js';
import {
  DEFAULT_SETTINGS,
  settingsFromEnv,
  settingsFromRecord,
  settingsToRecord,
  updateSettings,
  type BridgeSettings,
} from './settings.js';

const log = createLogger('settings');

/** Owner read/write only: the file holds the OBS password. */
const SETTINGS_FILE_MODE = 0o600;

/**
 * Settings file could not be read, parsed or written.
 */
export class SettingsFileError extends Error {
  readonly code = 'SETTINGS_FILE_ERROR';
  readonly exitCode = EXIT_CODES.SETTINGS_FILE_ERROR;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'SettingsFileError';
    if (cause) {
      this.cause = cause;
    }
  }
}

/**
 * Where settings are loaded from and saved to.
 */
export interface SettingsStore {
  load(): Promise<BridgeSettings>;
  save(settings: BridgeSettings): Promise<void>;
}

/**
 * JSON file store. A missing file loads as defaults.
 */
export class FileSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string = getSettingsFilePath()) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<BridgeSettings> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        log.debug(`No settings file at ${this.filePath}, using defaults`);
        return DEFAULT_SETTINGS;
      }
      throw new SettingsFileError(
        `Failed to read settings from ${this.filePath}: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new SettingsFileError(
        `Settings file ${this.filePath} is not valid JSON: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
    return settingsFromRecord(raw);
  }

  async save(settings: BridgeSettings): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await AtomicFileWriter.writeAsync(
        this.filePath,
        `${JSON.stringify(settingsToRecord(settings), null, 2)}\n`,
        { mode: SETTINGS_FILE_MODE }
      );
      log.debug(`Saved settings to ${this.filePath}`);
    } catch (error) {
      throw new SettingsFileError(
        `Failed to write settings to ${this.filePath}: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

/**
 * Load settings and apply OBS_HOST / OBS_PORT / OBS_PASSWORD overrides.
 */
export async function loadEffectiveSettings(
  store: SettingsStore,
  env: NodeJS.ProcessEnv = process.env
): Promise<BridgeSettings> {
  const stored = await store.load();
  return updateSettings(stored, settingsFromEnv(env));
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
