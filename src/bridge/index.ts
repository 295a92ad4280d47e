/**
 * Host bridge barrel export.
 *
 * Entry point for hosts (stream deck plugins, hotkey daemons) that broadcast
 * user actions to OBS.
 */

export { BroadcastBridge } from './BroadcastBridge.js';
export { BRIDGE_ACTIONS, GREET_FEED_READ_ALL } from './actions.js';
export { FileSettingsStore, loadEffectiveSettings } from '@/settings/store.js';

// Types
export type { BroadcastBridgeOptions } from './BroadcastBridge.js';
export type { BridgeAction } from './actions.js';
export type { BridgeSettings, BridgeSettingsPatch } from '@/settings/settings.js';
export type { SettingsStore } from '@/settings/store.js';
