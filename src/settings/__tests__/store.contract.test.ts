import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, it } from 'node:test';

import { MemorySettingsStore } from '@/__testutils__/MemorySettingsStore.js';
import { getSettingsDir, getSettingsFilePath } from '@/settings/paths.js';
import { DEFAULT_SETTINGS, settingsFromRecord } from '@/settings/settings.js';
import { FileSettingsStore, loadEffectiveSettings, SettingsFileError } from '@/settings/store.js';

void describe('FileSettingsStore contract', () => {
  let tmpDir: string;
  let previousDir: string | undefined;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'obsb-settings-'));
    previousDir = process.env['OBSB_CONFIG_DIR'];
    process.env['OBSB_CONFIG_DIR'] = tmpDir;
  });

  afterEach(() => {
    if (previousDir === undefined) {
      delete process.env['OBSB_CONFIG_DIR'];
    } else {
      process.env['OBSB_CONFIG_DIR'] = previousDir;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  void it('resolves the settings file under OBSB_CONFIG_DIR', () => {
    assert.equal(getSettingsDir(), tmpDir);
    assert.equal(getSettingsFilePath(), path.join(tmpDir, 'settings.json'));
    assert.equal(new FileSettingsStore().path, path.join(tmpDir, 'settings.json'));
  });

  void it('loads defaults when no file exists', async () => {
    assert.equal(await new FileSettingsStore().load(), DEFAULT_SETTINGS);
  });

  void it('saves pretty JSON readable only by the owner and loads it back', async () => {
    const store = new FileSettingsStore(path.join(tmpDir, 'nested', 'settings.json'));
    const settings = settingsFromRecord({ host: 'obs.local', password: 'test-secret' });

    await store.save(settings);

    const text = fs.readFileSync(store.path, 'utf-8');
    assert.equal(
      text,
      [
        '{',
        '  "host": "obs.local",',
        '  "port": 4455,',
        '  "password": "test-secret",',
        '  "use_ssl": false,',
        '  "namespace": "twitchat",',
        '  "request_timeout": 5',
        '}',
        '',
      ].join('\n')
    );
    if (process.platform !== 'win32') {
      assert.equal(fs.statSync(store.path).mode & 0o777, 0o600);
    }
    assert.deepEqual(await store.load(), settings);
  });

  void it('fails with a settings error on invalid JSON', async () => {
    const filePath = path.join(tmpDir, 'settings.json');
    fs.writeFileSync(filePath, '{ not json');

    await assert.rejects(new FileSettingsStore(filePath).load(), (error: unknown) => {
      return (
        error instanceof SettingsFileError &&
        error.exitCode === 103 &&
        error.message.startsWith(`Settings file ${filePath} is not valid JSON: `)
      );
    });
  });

  void it('fails with a settings error when the path is a directory', async () => {
    const dirPath = path.join(tmpDir, 'settings.json');
    fs.mkdirSync(dirPath);

    await assert.rejects(new FileSettingsStore(dirPath).load(), SettingsFileError);
    await assert.rejects(new FileSettingsStore(dirPath).save(DEFAULT_SETTINGS), SettingsFileError);
  });
});

void describe('loadEffectiveSettings', () => {
  void it('applies environment overrides over stored settings', async () => {
    const store = new MemorySettingsStore(settingsFromRecord({ host: 'stored.local', namespace: 'deck' }));

    const settings = await loadEffectiveSettings(store, {
      OBS_HOST: 'env.local',
      OBS_PASSWORD: 'test-secret',
    });

    assert.equal(settings.host, 'env.local');
    assert.equal(settings.password, 'test-secret');
    assert.equal(settings.namespace, 'deck');
    assert.equal(store.saved.length, 0);
  });

  void it('returns the stored settings untouched without overrides', async () => {
    const stored = settingsFromRecord({ host: 'stored.local' });
    assert.equal(await loadEffectiveSettings(new MemorySettingsStore(stored), {}), stored);
  });
});
