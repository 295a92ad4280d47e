import { DEFAULT_SETTINGS, type BridgeSettings } from '@/settings/settings.js';
import type { SettingsStore } from '@/settings/store.js';

/**
 * SettingsStore kept in memory; records every save.
 */
export class MemorySettingsStore implements SettingsStore {
  readonly saved: BridgeSettings[] = [];

  constructor(private current: BridgeSettings = DEFAULT_SETTINGS) {}

  load(): Promise<BridgeSettings> {
    return Promise.resolve(this.current);
  }

  save(settings: BridgeSettings): Promise<void> {
    this.current = settings;
    this.saved.push(settings);
    return Promise.resolve();
  }
}
