/**
 * FakeObsServer - in-process stand-in for an OBS WebSocket v5 server
 *
 * Hands out FakeWebSockets through a {@link WebSocketFactory}, plays the
 * server side of the Hello → Identify → Identified handshake and records
 * requests so tests can answer them (or not) in any order.
 */

import * as crypto from 'node:crypto';

import type WebSocket from 'ws';

import type { WebSocketFactory } from '@/obs/connection.js';
import { isRecord } from '@/obs/protocol.js';

import { assertEventually } from './assertions.js';
import { FakeWebSocket, OPEN } from './FakeWebSocket.js';

export interface FakeAuth {
  password: string;
  salt: string;
  challenge: string;
}

export interface RecordedRequest {
  socket: FakeWebSocket;
  requestType: string;
  requestId: string;
  requestData: unknown;
}

export interface RequestReply {
  result?: boolean;
  code?: number;
  comment?: string;
  responseData?: Record<string, unknown>;
}

export interface FakeObsServerOptions {
  /** Require authentication with these parameters */
  auth?: FakeAuth;
  rpcVersion?: number;
  /** Never open sockets; dials fail with an 'error' event */
  refuse?: boolean;
  /**
   * Queue Identify answers until {@link FakeObsServer.releaseIdentified},
   * keeping the client in the middle of its handshake.
   */
  deferIdentified?: boolean;
  /**
   * Answer requests automatically. Return undefined to leave a request
   * unanswered (answer later with {@link FakeObsServer.respond}).
   */
  onRequest?: (request: RecordedRequest) => RequestReply | undefined;
}

function sha256Base64(data: string): string {
  return crypto.createHash('sha256').update(data, 'utf8').digest('base64');
}

export class FakeObsServer {
  readonly sockets: FakeWebSocket[] = [];
  readonly urls: string[] = [];
  readonly requests: RecordedRequest[] = [];
  /** Parsed `d` of every Identify received */
  readonly identifies: Array<Record<string, unknown>> = [];

  private readonly deferredIdentified: Array<() => void> = [];

  constructor(private readonly options: FakeObsServerOptions = {}) {}

  /**
   * Factory to pass as `createWebSocket`.
   */
  readonly factory: WebSocketFactory = (url: string) => {
    const socket = new FakeWebSocket(url);
    this.sockets.push(socket);
    this.urls.push(url);
    socket.onSend = (data) => this.handleClientFrame(socket, data);

    setImmediate(() => {
      if (this.options.refuse) {
        socket.simulateError(new Error('connect ECONNREFUSED'));
        return;
      }
      if (socket.readyState !== FakeWebSocket.CONNECTING) {
        return;
      }
      socket.simulateOpen();
      this.sendHello(socket);
    });

    return socket as unknown as WebSocket;
  };

  /** Most recently created socket */
  get socket(): FakeWebSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) {
      throw new Error('No socket has been created yet');
    }
    return socket;
  }

  sendHello(socket: FakeWebSocket = this.socket): void {
    const d: Record<string, unknown> = {
      obsWebSocketVersion: '5.0.0',
      rpcVersion: this.options.rpcVersion ?? 1,
    };
    if (this.options.auth) {
      d['authentication'] = {
        challenge: this.options.auth.challenge,
        salt: this.options.auth.salt,
      };
    }
    this.deliver(socket, { op: 0, d });
  }

  /**
   * Answer a recorded request.
   */
  respond(requestId: string, reply: RequestReply = {}, socket: FakeWebSocket = this.socket): void {
    const request = this.requests.find((r) => r.requestId === requestId);
    const requestStatus: Record<string, unknown> = {
      result: reply.result ?? true,
      code: reply.code ?? 100,
    };
    if (reply.comment !== undefined) {
      requestStatus['comment'] = reply.comment;
    }
    const d: Record<string, unknown> = {
      requestType: request?.requestType ?? 'Unknown',
      requestId,
      requestStatus,
    };
    if (reply.responseData) {
      d['responseData'] = reply.responseData;
    }
    this.deliver(socket, { op: 7, d });
  }

  /**
   * Deliver any frame (or raw text) to the client.
   */
  deliver(socket: FakeWebSocket, frame: unknown): void {
    if (socket.readyState !== OPEN) {
      return;
    }
    socket.simulateMessage(typeof frame === 'string' ? frame : JSON.stringify(frame));
  }

  /**
   * Answer the oldest Identify held back by `deferIdentified`.
   */
  releaseIdentified(): void {
    const answer = this.deferredIdentified.shift();
    if (!answer) {
      throw new Error('No Identify is waiting for an answer');
    }
    answer();
  }

  async waitForRequests(count: number, timeoutMs = 1000): Promise<RecordedRequest[]> {
    await assertEventually(
      () => this.requests.length >= count,
      timeoutMs,
      `Expected ${count} request(s), got ${this.requests.length}`
    );
    return this.requests.slice(0, count);
  }

  private handleClientFrame(socket: FakeWebSocket, data: string): void {
    const frame: unknown = JSON.parse(data);
    if (!isRecord(frame)) {
      return;
    }
    const op = frame['op'];
    const payload = frame['d'];
    if (!isRecord(payload)) {
      return;
    }

    if (op === 1) {
      this.identifies.push(payload);
      const answer = (): void => this.answerIdentify(socket, payload);
      if (this.options.deferIdentified) {
        this.deferredIdentified.push(answer);
      } else {
        setImmediate(answer);
      }
      return;
    }

    if (op === 6) {
      const request: RecordedRequest = {
        socket,
        requestType: String(payload['requestType']),
        requestId: String(payload['requestId']),
        requestData: payload['requestData'],
      };
      this.requests.push(request);
      const reply = this.options.onRequest?.(request);
      if (reply) {
        setImmediate(() => this.respond(request.requestId, reply, socket));
      }
    }
  }

  private answerIdentify(socket: FakeWebSocket, identify: Record<string, unknown>): void {
    const auth = this.options.auth;
    if (auth) {
      const expected = sha256Base64(sha256Base64(auth.password + auth.salt) + auth.challenge);
      if (identify['authentication'] !== expected) {
        socket.simulateClose(4009, 'Authentication failed.');
        return;
      }
    }
    this.deliver(socket, { op: 2, d: { negotiatedRpcVersion: this.options.rpcVersion ?? 1 } });
  }
}
