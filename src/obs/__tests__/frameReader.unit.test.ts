import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import type WebSocket from 'ws';

import { FakeWebSocket } from '@/__testutils__/FakeWebSocket.js';
import { ObsAuthenticationError, ObsConnectionError } from '@/obs/errors.js';
import { FrameReader, FrameReadTimeoutError } from '@/obs/frameReader.js';

function openSocket(): FakeWebSocket {
  const ws = new FakeWebSocket();
  ws.simulateOpen();
  return ws;
}

function readerFor(ws: FakeWebSocket): FrameReader {
  return new FrameReader(ws as unknown as WebSocket);
}

void describe('FrameReader', () => {
  void it('returns buffered frames in arrival order', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    ws.simulateMessage('{"op":0}');
    ws.simulateMessage(Buffer.from('{"op":2}'));

    assert.equal(await reader.next(), '{"op":0}');
    assert.equal(await reader.next(), '{"op":2}');
  });

  void it('resolves a pending read when a frame arrives', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    const pending = reader.next(1000);
    ws.simulateMessage('{"op":5}');

    assert.equal(await pending, '{"op":5}');
  });

  void it('times out a read with a deadline', async () => {
    const reader = readerFor(openSocket());

    await assert.rejects(reader.next(20), (error: unknown) => {
      return (
        error instanceof FrameReadTimeoutError &&
        error.message === 'Timed out after 20ms waiting for a frame from OBS'
      );
    });
    assert.equal(reader.isClosed(), false);
  });

  void it('fails pending reads when the socket closes', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    const pending = reader.next();
    ws.simulateClose(1001, 'Going away');

    await assert.rejects(pending, { message: 'WebSocket closed: 1001 - Going away' });
    assert.equal(reader.isClosed(), true);
    await assert.rejects(reader.next(), ObsConnectionError);
  });

  void it('still delivers frames buffered before the close', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    ws.simulateMessage('{"op":7}');
    ws.simulateClose(1000, '');

    assert.equal(await reader.next(), '{"op":7}');
    await assert.rejects(reader.next(), { message: 'WebSocket closed: 1000' });
  });

  void it('reports close code 4009 as an authentication failure', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    ws.simulateClose(4009, 'Authentication failed.');

    await assert.rejects(reader.next(), (error: unknown) => {
      return (
        error instanceof ObsAuthenticationError &&
        error.message === 'OBS rejected the authentication: WebSocket closed: 4009 - Authentication failed.'
      );
    });
  });

  void it('fails reads on socket errors', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    ws.simulateError(new Error('read ECONNRESET'));

    await assert.rejects(reader.next(), { message: 'WebSocket error: read ECONNRESET' });
  });

  void it('fails reads after abort and ignores later frames', async () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    const pending = reader.next();
    reader.abort(new Error('Receiver stopped'));
    ws.simulateMessage('{"op":5}');

    await assert.rejects(pending, { message: 'Receiver stopped' });
    await assert.rejects(reader.next(), { message: 'Receiver stopped' });
  });

  void it('swallows errors emitted after dispose', () => {
    const ws = openSocket();
    const reader = readerFor(ws);

    reader.dispose();

    assert.doesNotThrow(() => ws.simulateError(new Error('late')));
    assert.equal(ws.listenerCount('message'), 0);
  });
});
