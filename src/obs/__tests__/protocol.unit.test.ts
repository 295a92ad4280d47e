import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  decodeFrame,
  encodeFrame,
  FrameDecodeError,
  OpCode,
  readEventType,
  readHello,
  readRequestId,
  readResponse,
} from '@/obs/protocol.js';

void describe('decodeFrame', () => {
  void it('decodes an envelope', () => {
    assert.deepEqual(decodeFrame('{"op":2,"d":{"negotiatedRpcVersion":1}}'), {
      op: 2,
      d: { negotiatedRpcVersion: 1 },
    });
  });

  void it('treats a missing payload as empty', () => {
    assert.deepEqual(decodeFrame('{"op":5}'), { op: 5, d: {} });
  });

  void it('rejects text that is not JSON', () => {
    assert.throws(() => decodeFrame('not json'), (error: unknown) => {
      return error instanceof FrameDecodeError && error.message.startsWith('Invalid JSON: ');
    });
  });

  void it('rejects JSON that is not an object', () => {
    assert.throws(() => decodeFrame('[1,2]'), { message: 'Frame must be a JSON object' });
    assert.throws(() => decodeFrame('null'), { message: 'Frame must be a JSON object' });
  });

  void it('rejects a missing or fractional opcode', () => {
    assert.throws(() => decodeFrame('{"d":{}}'), {
      message: 'Frame is missing an integer "op" field',
    });
    assert.throws(() => decodeFrame('{"op":1.5,"d":{}}'), {
      message: 'Frame is missing an integer "op" field',
    });
  });

  void it('rejects a non-object payload', () => {
    assert.throws(() => decodeFrame('{"op":7,"d":"x"}'), {
      message: 'Frame op=7 has a non-object "d" field',
    });
  });
});

void describe('encodeFrame', () => {
  void it('serializes a request envelope', () => {
    const text = encodeFrame({
      op: OpCode.Request,
      d: { requestType: 'GetVersion', requestId: 'r-1', requestData: {} },
    });
    assert.equal(text, '{"op":6,"d":{"requestType":"GetVersion","requestId":"r-1","requestData":{}}}');
  });
});

void describe('payload readers', () => {
  void it('reads Hello with authentication', () => {
    assert.deepEqual(
      readHello({
        obsWebSocketVersion: '5.1.0',
        rpcVersion: 1,
        authentication: { challenge: 'test-challenge', salt: 'test-salt' },
      }),
      {
        obsWebSocketVersion: '5.1.0',
        rpcVersion: 1,
        authentication: { challenge: 'test-challenge', salt: 'test-salt' },
      }
    );
  });

  void it('defaults the rpc version and leaves authentication out when absent', () => {
    assert.deepEqual(readHello({}), { rpcVersion: 1 });
  });

  void it('reads an incomplete challenge as empty strings', () => {
    assert.deepEqual(readHello({ rpcVersion: 1, authentication: { salt: 7 } }).authentication, {
      challenge: '',
      salt: '',
    });
  });

  void it('reads request ids only when they are non-empty strings', () => {
    assert.equal(readRequestId({ requestId: 'abc' }), 'abc');
    assert.equal(readRequestId({ requestId: '' }), undefined);
    assert.equal(readRequestId({ requestId: 12 }), undefined);
    assert.equal(readRequestId({}), undefined);
  });

  void it('reads a response with status and data', () => {
    assert.deepEqual(
      readResponse(
        {
          requestType: 'GetVersion',
          requestId: 'r-1',
          requestStatus: { result: true, code: 100 },
          responseData: { obsVersion: '30.0.0' },
        },
        'r-1'
      ),
      {
        requestId: 'r-1',
        requestType: 'GetVersion',
        requestStatus: { result: true, code: 100 },
        responseData: { obsVersion: '30.0.0' },
      }
    );
  });

  void it('reads a missing status as a failure', () => {
    assert.deepEqual(readResponse({ requestId: 'r-2' }, 'r-2'), {
      requestId: 'r-2',
      requestStatus: { result: false, code: 0 },
    });
  });

  void it('reads a failure comment', () => {
    const response = readResponse(
      { requestStatus: { result: false, code: 400, comment: 'bad' } },
      'r-3'
    );
    assert.deepEqual(response.requestStatus, { result: false, code: 400, comment: 'bad' });
  });

  void it('reads event types', () => {
    assert.equal(readEventType({ eventType: 'CustomEvent' }), 'CustomEvent');
    assert.equal(readEventType({}), '<unknown>');
  });
});
