import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  applyConfigPatch,
  configsEqual,
  connectionUrl,
  createConnectionConfig,
  DEFAULT_CONNECTION_CONFIG,
  requiresReconnect,
} from '@/obs/config.js';

void describe('ConnectionConfig', () => {
  void it('defaults to a local unauthenticated OBS on port 4455', () => {
    assert.deepEqual({ ...DEFAULT_CONNECTION_CONFIG }, {
      host: '127.0.0.1',
      port: 4455,
      password: '',
      useSSL: false,
      requestTimeout: 5000,
      eventSubscriptions: 0,
    });
  });

  void it('overlays given fields on the defaults', () => {
    const config = createConnectionConfig({ host: 'obs.local', password: 'test-secret' });
    assert.equal(config.host, 'obs.local');
    assert.equal(config.password, 'test-secret');
    assert.equal(config.port, 4455);
    assert.ok(Object.isFrozen(config));
  });

  void it('returns the same reference when a patch changes nothing', () => {
    const config = createConnectionConfig({ port: 4456 });
    assert.equal(applyConfigPatch(config, {}), config);
    assert.equal(applyConfigPatch(config, { port: 4456, host: '127.0.0.1' }), config);
  });

  void it('returns a new value when a patch changes a field', () => {
    const config = createConnectionConfig();
    const next = applyConfigPatch(config, { requestTimeout: 250 });
    assert.notEqual(next, config);
    assert.equal(next.requestTimeout, 250);
    assert.equal(config.requestTimeout, 5000);
    assert.equal(configsEqual(next, config), false);
  });

  void it('reconnects only for endpoint and credential changes', () => {
    const base = createConnectionConfig();
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { host: '10.0.0.2' })), true);
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { port: 4460 })), true);
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { useSSL: true })), true);
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { password: 'test-secret' })), true);
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { requestTimeout: 100 })), false);
    assert.equal(requiresReconnect(base, applyConfigPatch(base, { eventSubscriptions: 1 })), false);
  });

  void it('builds ws and wss URLs', () => {
    assert.equal(connectionUrl(createConnectionConfig()), 'ws://127.0.0.1:4455');
    assert.equal(
      connectionUrl(createConnectionConfig({ host: 'obs.local', port: 443, useSSL: true })),
      'wss://obs.local:443'
    );
  });
});
