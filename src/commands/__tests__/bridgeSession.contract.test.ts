import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { FakeObsServer } from '@/__testutils__/FakeObsServer.js';
import { MemorySettingsStore } from '@/__testutils__/MemorySettingsStore.js';
import { withBridge } from '@/commands/shared/bridgeSession.js';
import { ObsAuthenticationError } from '@/obs/errors.js';
import { settingsFromRecord } from '@/settings/settings.js';

void describe('withBridge', () => {
  void it('connects with the effective settings and disconnects afterwards', async () => {
    const server = new FakeObsServer({
      auth: { password: 'test-secret', salt: 'test-salt', challenge: 'test-challenge' },
      onRequest: () => ({ responseData: { obsVersion: '30.1.2' } }),
    });
    const store = new MemorySettingsStore(settingsFromRecord({ host: 'stored.local', request_timeout: 0.5 }));

    const data = await withBridge((bridge) => bridge.manager.sendRequest('GetVersion'), {
      store,
      env: { OBS_HOST: 'env.local', OBS_PASSWORD: 'test-secret' },
      createWebSocket: server.factory,
    });

    assert.deepEqual(data, { obsVersion: '30.1.2' });
    assert.deepEqual(server.urls, ['ws://env.local:4455']);
    assert.equal(server.socket.getCloseCode(), 1000);
    assert.equal(store.saved.length, 0);
  });

  void it('disconnects when the callback throws', async () => {
    const server = new FakeObsServer();

    await assert.rejects(
      withBridge(
        () => Promise.reject(new Error('callback failed')),
        {
          store: new MemorySettingsStore(settingsFromRecord({ request_timeout: 0.5 })),
          env: {},
          createWebSocket: server.factory,
        }
      ),
      { message: 'callback failed' }
    );
    assert.equal(server.socket.getCloseCode(), 1000);
  });

  void it('surfaces connection failures without running the callback', async () => {
    const server = new FakeObsServer({
      auth: { password: 'test-secret', salt: 'test-salt', challenge: 'test-challenge' },
    });
    let called = false;

    await assert.rejects(
      withBridge(
        () => {
          called = true;
          return Promise.resolve();
        },
        {
          store: new MemorySettingsStore(settingsFromRecord({ request_timeout: 0.5 })),
          env: {},
          createWebSocket: server.factory,
        }
      ),
      ObsAuthenticationError
    );
    assert.equal(called, false);
  });
});
