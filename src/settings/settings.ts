/**
 * User-facing bridge settings.
 *
 * Stored as snake_case JSON (the format other tools of the host read and
 * write) and converted to an OBS {@link ConnectionConfig} for the manager.
 * Reading is lenient: unknown keys are ignored and missing or invalid values
 * fall back to defaults.
 */

import {
  DEFAULT_EVENT_NAMESPACE,
  DEFAULT_OBS_HOST,
  DEFAULT_OBS_PORT,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '@/constants.js';
import { createConnectionConfig, type ConnectionConfig } from '@/obs/config.js';
import { isRecord } from '@/obs/protocol.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('settings');

const MS_PER_SECOND = 1000;
const MIN_PORT = 1;
const MAX_PORT = 65535;

export interface BridgeSettings {
  readonly host: string;
  readonly port: number;
  readonly password: string;
  readonly use_ssl: boolean;
  readonly namespace: string;
  /** Seconds */
  readonly request_timeout: number;
}

export type BridgeSettingsPatch = Partial<{ -readonly [K in keyof BridgeSettings]: BridgeSettings[K] }>;

export const DEFAULT_SETTINGS: BridgeSettings = Object.freeze({
  host: DEFAULT_OBS_HOST,
  port: DEFAULT_OBS_PORT,
  password: '',
  use_ssl: false,
  namespace: DEFAULT_EVENT_NAMESPACE,
  request_timeout: DEFAULT_REQUEST_TIMEOUT_MS / MS_PER_SECOND,
});

function readString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return typeof value === 'string' ? value : String(value);
}

function readNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return undefined;
}

function readPort(raw: Record<string, unknown>): number {
  const port = readNumber(raw, 'port');
  if (port === undefined) {
    return DEFAULT_SETTINGS.port;
  }
  if (!Number.isInteger(port) || port < MIN_PORT || port > MAX_PORT) {
    log.warn(`Ignoring invalid port ${String(raw['port'])}, using ${DEFAULT_SETTINGS.port}`);
    return DEFAULT_SETTINGS.port;
  }
  return port;
}

function readTimeout(raw: Record<string, unknown>): number {
  const timeout = readNumber(raw, 'request_timeout');
  if (timeout === undefined) {
    return DEFAULT_SETTINGS.request_timeout;
  }
  if (!Number.isFinite(timeout) || timeout <= 0) {
    log.warn(
      `Ignoring invalid request_timeout ${String(raw['request_timeout'])}, using ${DEFAULT_SETTINGS.request_timeout}`
    );
    return DEFAULT_SETTINGS.request_timeout;
  }
  return timeout;
}

function readBoolean(raw: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = raw[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (value === 'true' || value === '1' || value === 1) {
    return true;
  }
  if (value === 'false' || value === '0' || value === 0) {
    return false;
  }
  return fallback;
}

/**
 * Build settings from an untrusted record (parsed JSON, CLI flags).
 */
export function settingsFromRecord(raw: unknown): BridgeSettings {
  const record = isRecord(raw) ? raw : {};

  return Object.freeze({
    host: readString(record, 'host')?.trim() || DEFAULT_SETTINGS.host,
    port: readPort(record),
    password: readString(record, 'password') ?? DEFAULT_SETTINGS.password,
    use_ssl: readBoolean(record, 'use_ssl', DEFAULT_SETTINGS.use_ssl),
    namespace: readString(record, 'namespace')?.trim() || DEFAULT_SETTINGS.namespace,
    request_timeout: readTimeout(record),
  });
}

export function settingsToRecord(settings: BridgeSettings): Record<string, unknown> {
  return {
    host: settings.host,
    port: settings.port,
    password: settings.password,
    use_ssl: settings.use_ssl,
    namespace: settings.namespace,
    request_timeout: settings.request_timeout,
  };
}

export function settingsEqual(a: BridgeSettings, b: BridgeSettings): boolean {
  return (
    a.host === b.host &&
    a.port === b.port &&
    a.password === b.password &&
    a.use_ssl === b.use_ssl &&
    a.namespace === b.namespace &&
    a.request_timeout === b.request_timeout
  );
}

/**
 * Apply a patch through the same normalization as {@link settingsFromRecord}.
 * Returns `settings` itself when the result is unchanged.
 */
export function updateSettings(settings: BridgeSettings, patch: BridgeSettingsPatch): BridgeSettings {
  const next = settingsFromRecord({ ...settingsToRecord(settings), ...patch });
  return settingsEqual(next, settings) ? settings : next;
}

export function toConnectionConfig(settings: BridgeSettings): ConnectionConfig {
  return createConnectionConfig({
    host: settings.host,
    port: settings.port,
    password: settings.password,
    useSSL: settings.use_ssl,
    requestTimeout: Math.round(settings.request_timeout * MS_PER_SECOND),
  });
}

/**
 * Environment overrides: OBS_HOST, OBS_PORT, OBS_PASSWORD.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): BridgeSettingsPatch {
  const patch: BridgeSettingsPatch = {};
  const host = env['OBS_HOST'];
  const port = env['OBS_PORT'];
  const password = env['OBS_PASSWORD'];

  if (host) {
    patch.host = host;
  }
  if (port) {
    const parsed = Number(port);
    if (Number.isInteger(parsed)) {
      patch.port = parsed;
    } else {
      log.warn(`Ignoring non-numeric OBS_PORT=${port}`);
    }
  }
  if (password !== undefined) {
    patch.password = password;
  }
  return patch;
}
