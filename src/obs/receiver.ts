/**
 * Receiver loop
 *
 * Owns the read side of one connection after the handshake: pulls frames
 * one at a time, decodes them and hands them to the connection's dispatcher.
 * One bad frame never ends the loop; a closed or failed socket does.
 */

import { createLogger } from '@/ui/logging/index.js';
import { getErrorMessage } from '@/utils/errors.js';

import type { FrameReader } from './frameReader.js';
import { decodeFrame, FrameDecodeError, type Frame } from './protocol.js';

const log = createLogger('receiver');

/**
 * Handles one decoded frame. May await (e.g. answering a Hello with
 * Identify); the next frame is not read until it settles.
 */
export type FrameDispatcher = (frame: Frame) => Promise<void> | void;

export interface ReceiverLoopOptions {
  reader: FrameReader;
  dispatch: FrameDispatcher;
  /** Runs once, as the loop's last act, however it ends */
  onExit: () => void;
}

const STOPPED_ERROR = 'Receiver stopped';

export class ReceiverLoop {
  private running = false;
  private task: Promise<void> | null = null;
  private readonly reader: FrameReader;
  private readonly dispatch: FrameDispatcher;
  private readonly onExit: () => void;

  constructor(options: ReceiverLoopOptions) {
    this.reader = options.reader;
    this.dispatch = options.dispatch;
    this.onExit = options.onExit;
  }

  /**
   * Start the loop. No-op if it is already running.
   */
  start(): void {
    if (this.task) {
      return;
    }
    this.running = true;
    this.task = this.run();
  }

  /**
   * Whether the loop has been started and has not exited yet.
   */
  isRunning(): boolean {
    return this.running;
  }

  /**
   * Force the loop to exit, even while it waits for a frame, and wait up to
   * `timeoutMs` for it to finish.
   *
   * @returns True if the loop exited within the deadline
   */
  async stop(timeoutMs: number): Promise<boolean> {
    this.running = false;
    this.reader.abort(new Error(STOPPED_ERROR));

    const task = this.task;
    if (!task) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([task.then(() => true as const), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(): Promise<void> {
    try {
      while (this.running) {
        let raw: string;
        try {
          raw = await this.reader.next();
        } catch (error) {
          if (this.running) {
            log.warn(`Lost connection to OBS WebSocket: ${getErrorMessage(error)}`);
          } else {
            log.debug('Receiver loop stopped');
          }
          break;
        }

        let frame: Frame;
        try {
          frame = decodeFrame(raw);
        } catch (error) {
          const reason = error instanceof FrameDecodeError ? error.message : getErrorMessage(error);
          log.warn(`Received malformed OBS payload (${reason}): ${truncate(raw)}`);
          continue;
        }

        try {
          await this.dispatch(frame);
        } catch (error) {
          log.error(`Failed to handle OBS frame op=${frame.op}: ${getErrorMessage(error)}`);
        }
      }
    } finally {
      this.running = false;
      this.onExit();
    }
  }
}

const MAX_LOGGED_FRAME_LENGTH = 200;

function truncate(raw: string): string {
  return raw.length > MAX_LOGGED_FRAME_LENGTH ? `${raw.slice(0, MAX_LOGGED_FRAME_LENGTH)}…` : raw;
}
