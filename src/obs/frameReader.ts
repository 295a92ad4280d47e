/**
 * Awaitable read side of a WebSocket.
 *
 * `ws` pushes messages through events; the handshake and the receiver loop
 * instead want to pull "the next frame", optionally with a deadline. The
 * reader buffers text messages until they are pulled and fails every read
 * once the socket closes, errors or is aborted.
 */

import type WebSocket from 'ws';

import { UTF8_ENCODING } from '@/constants.js';

import { ObsAuthenticationError, ObsConnectionError } from './errors.js';
import { CloseCode } from './protocol.js';

const READ_TIMEOUT_ERROR = (timeoutMs: number): string =>
  `Timed out after ${timeoutMs}ms waiting for a frame from OBS`;
const WEBSOCKET_CLOSED_ERROR = (code: number, reason: string): string =>
  reason ? `WebSocket closed: ${code} - ${reason}` : `WebSocket closed: ${code}`;

/**
 * No frame arrived before the read's deadline.
 */
export class FrameReadTimeoutError extends ObsConnectionError {}

interface PendingRead {
  resolve: (frame: string) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

export class FrameReader {
  private readonly buffered: string[] = [];
  private readonly reads: PendingRead[] = [];
  private failure: Error | null = null;

  private readonly onMessage = (data: WebSocket.RawData): void => {
    this.push(rawDataToString(data));
  };

  private readonly onClose = (code: number, reason: Buffer | string): void => {
    const message = WEBSOCKET_CLOSED_ERROR(code, reason.toString());
    this.fail(
      code === CloseCode.AuthenticationFailed
        ? new ObsAuthenticationError(`OBS rejected the authentication: ${message}`)
        : new ObsConnectionError(message)
    );
  };

  private readonly onError = (error: Error): void => {
    this.fail(new ObsConnectionError(`WebSocket error: ${error.message}`, error));
  };

  constructor(private readonly ws: WebSocket) {
    ws.on('message', this.onMessage);
    ws.on('close', this.onClose);
    ws.on('error', this.onError);
  }

  /**
   * Pull the next text frame.
   *
   * @param timeoutMs - Optional deadline; omitted means wait until a frame
   *                    arrives or the socket goes away
   * @throws FrameReadTimeoutError when the deadline passes
   * @throws ObsConnectionError on close, socket error or abort
   */
  next(timeoutMs?: number): Promise<string> {
    const frame = this.buffered.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<string>((resolve, reject) => {
      const read: PendingRead = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        read.timer = setTimeout(() => {
          const index = this.reads.indexOf(read);
          if (index !== -1) {
            this.reads.splice(index, 1);
          }
          reject(new FrameReadTimeoutError(READ_TIMEOUT_ERROR(timeoutMs)));
        }, timeoutMs);
      }
      this.reads.push(read);
    });
  }

  /**
   * Fail pending and future reads with `error`, even though the socket may
   * not have finished closing yet.
   */
  abort(error: Error): void {
    this.fail(error);
  }

  /**
   * Whether reads will fail from now on.
   */
  isClosed(): boolean {
    return this.failure !== null;
  }

  /**
   * Detach from the socket.
   *
   * An error listener stays attached so that a late 'error' event on the
   * discarded socket does not crash the process.
   */
  dispose(): void {
    this.ws.off('message', this.onMessage);
    this.ws.off('close', this.onClose);
    this.ws.off('error', this.onError);
    this.ws.on('error', ignoreLateError);
  }

  private push(frame: string): void {
    if (this.failure) {
      return;
    }
    const read = this.reads.shift();
    if (read) {
      if (read.timer) {
        clearTimeout(read.timer);
      }
      read.resolve(frame);
    } else {
      this.buffered.push(frame);
    }
  }

  private fail(error: Error): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    for (const read of this.reads.splice(0)) {
      if (read.timer) {
        clearTimeout(read.timer);
      }
      read.reject(error);
    }
  }
}

function ignoreLateError(): void {}

/**
 * Convert ws raw message data to text.
 */
function rawDataToString(data: WebSocket.RawData | string): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString(UTF8_ENCODING);
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString(UTF8_ENCODING);
  }
  return Buffer.from(data).toString(UTF8_ENCODING);
}
