/**
 * Broadcast bridge
 *
 * Host-facing facade that wires settings, the OBS connection manager and
 * the event broadcaster together. Hosts (the CLI, a stream deck plugin, a
 * hotkey daemon) create one bridge, call connectInBackground() on startup,
 * broadcast() from user actions and disconnect() on teardown.
 */

import { EventBroadcaster } from '@/obs/broadcaster.js';
import {
  ObsConnectionManager,
  type ObsConnectionOptions,
  type WebSocketFactory,
} from '@/obs/connection.js';
import { ObsConnectionError } from '@/obs/errors.js';
import { isRecord } from '@/obs/protocol.js';
import type { SettingsStore } from '@/settings/store.js';
import {
  toConnectionConfig,
  updateSettings,
  type BridgeSettings,
  type BridgeSettingsPatch,
} from '@/settings/settings.js';
import { createLogger } from '@/ui/logging/index.js';

const log = createLogger('bridge');

export interface BroadcastBridgeOptions {
  settings: BridgeSettings;
  /** Persists settings after every effective change */
  store?: SettingsStore;
  createWebSocket?: WebSocketFactory;
}

export class BroadcastBridge {
  readonly manager: ObsConnectionManager;
  readonly broadcaster: EventBroadcaster;

  private currentSettings: BridgeSettings;
  private readonly store: SettingsStore | undefined;
  private pendingConnect: Promise<boolean> | null = null;

  constructor(options: BroadcastBridgeOptions) {
    this.currentSettings = options.settings;
    this.store = options.store;

    const connectionOptions: ObsConnectionOptions = {
      config: toConnectionConfig(options.settings),
    };
    if (options.createWebSocket) {
      connectionOptions.createWebSocket = options.createWebSocket;
    }
    this.manager = new ObsConnectionManager(connectionOptions);
    this.broadcaster = new EventBroadcaster(this.manager, options.settings.namespace);
  }

  get settings(): BridgeSettings {
    return this.currentSettings;
  }

  /**
   * Attempt to connect without throwing.
   *
   * Concurrent calls share the attempt in flight. Connection failures are
   * logged and reported as `false`.
   *
   * @returns True if the manager is connected afterwards
   */
  connectInBackground(): Promise<boolean> {
    if (this.pendingConnect) {
      return this.pendingConnect;
    }

    const attempt = this.manager
      .ensureConnection()
      .then(() => true)
      .catch((error: unknown) => {
        if (!(error instanceof ObsConnectionError)) {
          throw error;
        }
        log.warn(`OBS connection attempt failed: ${error.message}`);
        return false;
      })
      .finally(() => {
        this.pendingConnect = null;
      });

    this.pendingConnect = attempt;
    return attempt;
  }

  /**
   * Apply a settings change: namespace swap, connection reconfiguration,
   * persistence, and a background reconnect when not connected.
   *
   * @returns The effective settings (the same object when nothing changed)
   */
  async updateSettings(patch: BridgeSettingsPatch): Promise<BridgeSettings> {
    const next = updateSettings(this.currentSettings, patch);
    if (next === this.currentSettings) {
      return next;
    }

    log.info(`Updating bridge settings: ${describePatch(patch)}`);
    this.currentSettings = next;
    this.broadcaster.setNamespace(next.namespace);
    await this.manager.updateConfig(toConnectionConfig(next));

    if (this.store) {
      await this.store.save(next);
    }

    if (!this.manager.isConnected()) {
      // An attempt started before the change may still be settling
      await this.pendingConnect;
      if (!this.manager.isConnected()) {
        await this.connectInBackground();
      }
    }
    return next;
  }

  /**
   * Broadcast a user action.
   *
   * @param timeoutMs - Response deadline (default: settings.request_timeout)
   * @returns True if OBS accepted the event
   * @throws TypeError if `payload` is given but is not a JSON object
   */
  async broadcast(action: string, payload?: unknown, timeoutMs?: number): Promise<boolean> {
    if (payload === undefined || payload === null) {
      return this.broadcaster.safeBroadcast(action, undefined, timeoutMs);
    }
    if (!isRecord(payload)) {
      throw new TypeError('Payload must be a JSON object or omitted');
    }
    return this.broadcaster.safeBroadcast(action, payload, timeoutMs);
  }

  async disconnect(): Promise<void> {
    await this.manager.disconnect();
  }
}

function describePatch(patch: BridgeSettingsPatch): string {
  return Object.entries(patch)
    .map(([key, value]) => (key === 'password' ? `${key}=***` : `${key}=${String(value)}`))
    .join(', ');
}
