/**
 * OBS connection configuration.
 *
 * Configurations are immutable values: every change produces a new frozen
 * object, and a patch that changes nothing returns the original reference.
 */

import {
  DEFAULT_EVENT_SUBSCRIPTIONS,
  DEFAULT_OBS_HOST,
  DEFAULT_OBS_PORT,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from '@/constants.js';

/**
 * Endpoint, credential and timing parameters of one OBS connection.
 */
export interface ConnectionConfig {
  /** Hostname or IP address of the machine running OBS */
  readonly host: string;
  /** OBS WebSocket server port (default: 4455) */
  readonly port: number;
  /** Server password; empty when authentication is disabled */
  readonly password: string;
  /** Dial wss:// instead of ws:// */
  readonly useSSL: boolean;
  /** Request and handshake timeout in milliseconds (default: 5000) */
  readonly requestTimeout: number;
  /** EventSubscription bitmask sent in Identify (default: 0) */
  readonly eventSubscriptions: number;
}

/**
 * Partial change to a {@link ConnectionConfig}. Omitted fields keep their value.
 */
export interface ConnectionConfigPatch {
  host?: string;
  port?: number;
  password?: string;
  useSSL?: boolean;
  requestTimeout?: number;
  eventSubscriptions?: number;
}

export const DEFAULT_CONNECTION_CONFIG: ConnectionConfig = Object.freeze({
  host: DEFAULT_OBS_HOST,
  port: DEFAULT_OBS_PORT,
  password: '',
  useSSL: false,
  requestTimeout: DEFAULT_REQUEST_TIMEOUT_MS,
  eventSubscriptions: DEFAULT_EVENT_SUBSCRIPTIONS,
});

function merge(base: ConnectionConfig, patch: ConnectionConfigPatch): ConnectionConfig {
  return Object.freeze({
    host: patch.host ?? base.host,
    port: patch.port ?? base.port,
    password: patch.password ?? base.password,
    useSSL: patch.useSSL ?? base.useSSL,
    requestTimeout: patch.requestTimeout ?? base.requestTimeout,
    eventSubscriptions: patch.eventSubscriptions ?? base.eventSubscriptions,
  });
}

/**
 * Create a configuration from defaults overlaid with the given fields.
 */
export function createConnectionConfig(patch: ConnectionConfigPatch = {}): ConnectionConfig {
  return merge(DEFAULT_CONNECTION_CONFIG, patch);
}

/**
 * Field-wise equality of two configurations.
 */
export function configsEqual(a: ConnectionConfig, b: ConnectionConfig): boolean {
  return (
    a.host === b.host &&
    a.port === b.port &&
    a.password === b.password &&
    a.useSSL === b.useSSL &&
    a.requestTimeout === b.requestTimeout &&
    a.eventSubscriptions === b.eventSubscriptions
  );
}

/**
 * Apply a patch, returning `config` itself when nothing changes.
 */
export function applyConfigPatch(
  config: ConnectionConfig,
  patch: ConnectionConfigPatch
): ConnectionConfig {
  const next = merge(config, patch);
  return configsEqual(next, config) ? config : next;
}

/**
 * Whether moving from `prev` to `next` invalidates an established session.
 * Timeout and subscription changes apply without reconnecting.
 */
export function requiresReconnect(prev: ConnectionConfig, next: ConnectionConfig): boolean {
  return (
    prev.host !== next.host ||
    prev.port !== next.port ||
    prev.useSSL !== next.useSSL ||
    prev.password !== next.password
  );
}

/**
 * WebSocket URL of the configured endpoint.
 *
 * @example
 * ```typescript
 * connectionUrl(createConnectionConfig({ host: 'obs.local', useSSL: true }))
 * // → 'wss://obs.local:4455'
 * ```
 */
export function connectionUrl(config: ConnectionConfig): string {
  const scheme = config.useSSL ? 'wss' : 'ws';
  return `${scheme}://${config.host}:${config.port}`;
}
