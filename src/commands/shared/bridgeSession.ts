import { BroadcastBridge, type BroadcastBridgeOptions } from '@/bridge/BroadcastBridge.js';
import type { WebSocketFactory } from '@/obs/connection.js';
import { FileSettingsStore, loadEffectiveSettings, type SettingsStore } from '@/settings/store.js';

export interface BridgeSessionDeps {
  store?: SettingsStore;
  env?: NodeJS.ProcessEnv;
  createWebSocket?: WebSocketFactory;
}

async function createBridge(deps: BridgeSessionDeps): Promise<BroadcastBridge> {
  const store = deps.store ?? new FileSettingsStore();
  const settings = await loadEffectiveSettings(store, deps.env);

  const options: BroadcastBridgeOptions = { settings, store };
  if (deps.createWebSocket) {
    options.createWebSocket = deps.createWebSocket;
  }
  return new BroadcastBridge(options);
}

/**
 * Run `fn` against a connected bridge built from the effective settings.
 *
 * The connection is opened before `fn` and always closed afterwards.
 *
 * @throws ObsConnectionError | ObsAuthenticationError if OBS cannot be reached
 * @throws SettingsFileError if the settings file is unreadable
 */
export async function withBridge<T>(
  fn: (bridge: BroadcastBridge) => Promise<T>,
  deps: BridgeSessionDeps = {}
): Promise<T> {
  const bridge = await createBridge(deps);

  try {
    await bridge.manager.connect();
    return await fn(bridge);
  } finally {
    await bridge.disconnect();
  }
}

/**
 * Run `fn` the way a host runs a user action: the connection is attempted
 * in the background and `fn` runs whether or not it succeeded.
 *
 * @throws SettingsFileError if the settings file is unreadable
 */
export async function withHostBridge<T>(
  fn: (bridge: BroadcastBridge) => Promise<T>,
  deps: BridgeSessionDeps = {}
): Promise<T> {
  const bridge = await createBridge(deps);

  try {
    await bridge.connectInBackground();
    return await fn(bridge);
  } finally {
    await bridge.disconnect();
  }
}
