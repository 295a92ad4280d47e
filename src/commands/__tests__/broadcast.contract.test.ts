import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { FakeObsServer, type FakeObsServerOptions } from '@/__testutils__/FakeObsServer.js';
import { MemorySettingsStore } from '@/__testutils__/MemorySettingsStore.js';
import { GREET_FEED_READ_ALL } from '@/bridge/index.js';
import { runBridgeAction } from '@/commands/broadcast.js';
import type { BridgeSessionDeps } from '@/commands/shared/bridgeSession.js';
import { settingsFromRecord } from '@/settings/settings.js';
import { EXIT_CODES } from '@/utils/exitCodes.js';

function depsFor(server: FakeObsServer): BridgeSessionDeps {
  return {
    store: new MemorySettingsStore(settingsFromRecord({ request_timeout: 0.5 })),
    env: {},
    createWebSocket: server.factory,
  };
}

function serverWith(options: FakeObsServerOptions): FakeObsServer {
  return new FakeObsServer(options);
}

void describe('runBridgeAction', () => {
  void it('broadcasts the action through the host bridge', async () => {
    const server = serverWith({ onRequest: () => ({}) });

    const result = await runBridgeAction(GREET_FEED_READ_ALL, undefined, depsFor(server));

    assert.deepEqual(result, {
      success: true,
      data: { eventType: 'twitchat:GREET_FEED_READ_ALL', eventData: {} },
    });
    assert.equal(server.requests[0]?.requestType, 'BroadcastCustomEvent');
    assert.deepEqual(server.requests[0]?.requestData, {
      eventType: 'twitchat:GREET_FEED_READ_ALL',
      eventData: {},
    });
    assert.equal(server.socket.getCloseCode(), 1000);
  });

  void it('fails with the broadcast exit code when OBS is unreachable', async () => {
    const server = serverWith({ refuse: true });

    const result = await runBridgeAction(GREET_FEED_READ_ALL, undefined, depsFor(server));

    assert.deepEqual(result, {
      success: false,
      error: 'OBS did not accept twitchat:GREET_FEED_READ_ALL',
      exitCode: EXIT_CODES.BROADCAST_FAILED,
    });
    assert.equal(server.requests.length, 0);
  });

  void it('fails with the broadcast exit code when OBS rejects the event', async () => {
    const server = serverWith({
      onRequest: () => ({ result: false, code: 600, comment: 'rejected' }),
    });

    const result = await runBridgeAction(GREET_FEED_READ_ALL, undefined, depsFor(server));

    assert.equal(result.success, false);
    assert.equal(result.exitCode, 105);
    assert.equal(server.requests.length, 1);
  });
});
