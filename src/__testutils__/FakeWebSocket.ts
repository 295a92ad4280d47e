/**
 * FakeWebSocket - WebSocket boundary fake for testing
 *
 * Mimics the subset of the `ws` client API the OBS connection uses
 * (readyState, send, close, open/message/close/error events) so the
 * connection manager can be contract tested without network I/O.
 */

import { EventEmitter } from 'node:events';

// ws library readyState constants
export const CONNECTING = 0;
export const OPEN = 1;
export const CLOSING = 2;
export const CLOSED = 3;

type ReadyState = typeof CONNECTING | typeof OPEN | typeof CLOSING | typeof CLOSED;

export class FakeWebSocket extends EventEmitter {
  public readyState: ReadyState = CONNECTING;

  /** Called with every frame the client sends (after it is recorded) */
  public onSend: ((data: string) => void) | null = null;

  private sentMessages: string[] = [];
  private closeCode: number | null = null;
  private closeReason: string | null = null;

  static readonly CONNECTING = CONNECTING;
  static readonly OPEN = OPEN;
  static readonly CLOSING = CLOSING;
  static readonly CLOSED = CLOSED;

  constructor(public readonly url: string = 'ws://127.0.0.1:4455') {
    super();
  }

  /**
   * ws API - Send a message. Fails through the callback when not OPEN.
   */
  send(data: string, callback?: (err?: Error) => void): void {
    if (this.readyState !== OPEN) {
      const err = new Error('WebSocket is not open: readyState ' + this.readyState);
      if (callback) {
        callback(err);
      } else {
        throw err;
      }
      return;
    }

    this.sentMessages.push(data);
    if (callback) {
      callback();
    }
    this.onSend?.(data);
  }

  /**
   * ws API - Close connection. Emits 'close' immediately.
   */
  close(code?: number, reason?: string): void {
    if (this.readyState === CLOSED || this.readyState === CLOSING) {
      return;
    }

    this.closeCode = code ?? null;
    this.closeReason = reason ?? null;
    this.readyState = CLOSED;
    this.emit('close', code ?? 1000, Buffer.from(reason ?? ''));
  }

  /**
   * TEST CONTROL - CONNECTING -> OPEN, emits 'open'
   */
  simulateOpen(): void {
    if (this.readyState !== CONNECTING) {
      throw new Error('Can only open from CONNECTING state');
    }

    this.readyState = OPEN;
    this.emit('open');
  }

  /**
   * TEST CONTROL - Deliver a text message (only valid when OPEN)
   */
  simulateMessage(data: string | Buffer): void {
    if (this.readyState !== OPEN) {
      throw new Error('Cannot receive message when not OPEN');
    }

    this.emit('message', typeof data === 'string' ? Buffer.from(data) : data);
  }

  /**
   * TEST CONTROL - Server-side close
   */
  simulateClose(code: number, reason: string): void {
    if (this.readyState === CLOSED) {
      return;
    }

    this.readyState = CLOSED;
    this.closeCode = code;
    this.closeReason = reason;
    this.emit('close', code, Buffer.from(reason));
  }

  /**
   * TEST CONTROL - Emit 'error'
   */
  simulateError(error: Error): void {
    this.emit('error', error);
  }

  /**
   * VERIFICATION - Sent messages (defensive copy)
   */
  getSentMessages(): string[] {
    return [...this.sentMessages];
  }

  getCloseCode(): number | null {
    return this.closeCode;
  }

  getCloseReason(): string | null {
    return this.closeReason;
  }
}
