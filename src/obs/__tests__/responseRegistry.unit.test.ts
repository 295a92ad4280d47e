import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { ObsNotConnectedError, ObsResponseTimeoutError } from '@/obs/errors.js';
import type { ResponseData } from '@/obs/protocol.js';
import { ResponseRegistry } from '@/obs/responseRegistry.js';

function response(requestId: string, code = 100): ResponseData {
  return { requestId, requestStatus: { result: true, code } };
}

void describe('ResponseRegistry', () => {
  void it('hands a stored response to a later caller exactly once', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    registry.put('a', response('a'));
    assert.equal(registry.storedCount, 1);

    assert.deepEqual(await registry.waitFor('a', 50), response('a'));
    assert.equal(registry.storedCount, 0);
    await assert.rejects(registry.waitFor('a', 10), ObsResponseTimeoutError);
  });

  void it('wakes a caller that is already waiting', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    const pending = registry.waitFor('b', 1000);
    assert.equal(registry.waitingCount, 1);

    registry.put('b', response('b', 101));

    assert.deepEqual(await pending, response('b', 101));
    assert.equal(registry.waitingCount, 0);
    assert.equal(registry.storedCount, 0);
  });

  void it('routes out-of-order responses to their own callers', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    const first = registry.waitFor('first', 1000);
    const second = registry.waitFor('second', 1000);

    registry.put('second', response('second', 2));
    registry.put('first', response('first', 1));

    assert.equal((await first).requestStatus.code, 1);
    assert.equal((await second).requestStatus.code, 2);
  });

  void it('times out no earlier than the deadline', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    const started = Date.now();

    await assert.rejects(registry.waitFor('slow', 40), (error: unknown) => {
      return (
        error instanceof ObsResponseTimeoutError &&
        error.message === 'Timeout waiting for OBS response to request slow'
      );
    });

    // Timers may fire a millisecond early on some platforms
    assert.ok(Date.now() - started >= 39);
    assert.equal(registry.waitingCount, 0);
  });

  void it('drops the late response of a timed out request', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    await assert.rejects(registry.waitFor('late', 5), ObsResponseTimeoutError);

    registry.put('late', response('late'));

    assert.equal(registry.storedCount, 0);
  });

  void it('evicts unclaimed responses after the retention period', () => {
    let now = 1_000;
    const registry = new ResponseRegistry({ retentionMs: 100, now: () => now });

    registry.put('orphan', response('orphan'));
    now += 50;
    registry.put('fresh', response('fresh'));
    assert.equal(registry.storedCount, 2);

    now += 60;
    registry.put('newest', response('newest'));

    // orphan (110ms old) is gone, fresh (60ms old) stays
    assert.equal(registry.storedCount, 2);
  });

  void it('forgets abandoned ids after the retention period', async () => {
    let now = 0;
    const registry = new ResponseRegistry({ retentionMs: () => 100, now: () => now });
    await assert.rejects(registry.waitFor('gone', 5), ObsResponseTimeoutError);

    now = 200;
    registry.put('gone', response('gone'));

    assert.equal(registry.storedCount, 1);
  });

  void it('sweeps expired abandoned ids when another request times out', async () => {
    let now = 0;
    const registry = new ResponseRegistry({ retentionMs: 100, now: () => now });
    await assert.rejects(registry.waitFor('first', 5), ObsResponseTimeoutError);
    assert.equal(registry.abandonedCount, 1);

    now = 200;
    await assert.rejects(registry.waitFor('second', 5), ObsResponseTimeoutError);

    // first expired and was swept; only second is remembered
    assert.equal(registry.abandonedCount, 1);
    registry.put('first', response('first'));
    assert.equal(registry.storedCount, 1);
  });

  void it('rejects every waiter on clear', async () => {
    const registry = new ResponseRegistry({ retentionMs: 1000 });
    const one = registry.waitFor('one', 1000);
    const two = registry.waitFor('two', 1000);
    registry.put('stored', response('stored'));

    registry.clear(new ObsNotConnectedError('Disconnected from OBS before the response arrived'));

    await assert.rejects(one, ObsNotConnectedError);
    await assert.rejects(two, { message: 'Disconnected from OBS before the response arrived' });
    assert.equal(registry.waitingCount, 0);
    assert.equal(registry.storedCount, 0);
  });
});
