/**
 * Response registry
 *
 * Hands response payloads from the receiver loop to the callers waiting on
 * them, keyed by correlation id. A response may arrive before its caller
 * starts waiting; it is then held until claimed.
 */

import { createLogger } from '@/ui/logging/index.js';

import { ObsResponseTimeoutError } from './errors.js';
import type { ResponseData } from './protocol.js';

const log = createLogger('receiver');

interface StoredResponse {
  data: ResponseData;
  storedAt: number;
}

interface Waiter {
  resolve: (data: ResponseData) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export interface ResponseRegistryOptions {
  /**
   * How long (ms) an unclaimed response is kept, and how long the id of a
   * timed out request is remembered so its late response can be dropped.
   */
  retentionMs: number | (() => number);
  /** Clock, injectable for tests */
  now?: () => number;
}

export class ResponseRegistry {
  private readonly responses = new Map<string, StoredResponse>();
  private readonly waiters = new Map<string, Set<Waiter>>();
  /** request id → time the caller gave up */
  private readonly abandoned = new Map<string, number>();
  private readonly retentionMs: () => number;
  private readonly now: () => number;

  constructor(options: ResponseRegistryOptions) {
    const { retentionMs } = options;
    this.retentionMs = typeof retentionMs === 'number' ? () => retentionMs : retentionMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Store a response and wake every caller waiting for its id.
   *
   * Responses for ids whose caller already timed out are dropped.
   */
  put(requestId: string, data: ResponseData): void {
    this.sweep();

    if (this.abandoned.delete(requestId)) {
      log.debug(`Dropping late response for abandoned request ${requestId}`);
      return;
    }

    this.responses.set(requestId, { data, storedAt: this.now() });
    this.wake(requestId);
  }

  /**
   * Wait for the response to `requestId`, removing it once claimed.
   *
   * @throws ObsResponseTimeoutError if nothing arrives within `timeoutMs`
   */
  waitFor(requestId: string, timeoutMs: number): Promise<ResponseData> {
    const stored = this.take(requestId);
    if (stored) {
      return Promise.resolve(stored);
    }

    return new Promise<ResponseData>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.removeWaiter(requestId, waiter);
          this.sweep();
          // Only mark abandoned if no other caller is still waiting for the id.
          if (!this.waiters.has(requestId)) {
            this.abandoned.set(requestId, this.now());
          }
          reject(
            new ObsResponseTimeoutError(`Timeout waiting for OBS response to request ${requestId}`)
          );
        }, timeoutMs),
      };

      let waitersForId = this.waiters.get(requestId);
      if (!waitersForId) {
        waitersForId = new Set();
        this.waiters.set(requestId, waitersForId);
      }
      waitersForId.add(waiter);
    });
  }

  /**
   * Reject every pending waiter, e.g. when the connection is torn down.
   * Stored responses and abandoned ids are discarded as well.
   */
  clear(error: Error): void {
    for (const waitersForId of this.waiters.values()) {
      for (const waiter of waitersForId) {
        clearTimeout(waiter.timer);
        waiter.reject(error);
      }
    }
    this.waiters.clear();
    this.responses.clear();
    this.abandoned.clear();
  }

  /** Number of responses stored but not yet claimed */
  get storedCount(): number {
    return this.responses.size;
  }

  /** Number of timed out ids whose late response would be dropped */
  get abandonedCount(): number {
    return this.abandoned.size;
  }

  /** Number of callers currently waiting */
  get waitingCount(): number {
    let count = 0;
    for (const waitersForId of this.waiters.values()) {
      count += waitersForId.size;
    }
    return count;
  }

  private take(requestId: string): ResponseData | undefined {
    const stored = this.responses.get(requestId);
    if (!stored) {
      return undefined;
    }
    this.responses.delete(requestId);
    return stored.data;
  }

  private wake(requestId: string): void {
    const waitersForId = this.waiters.get(requestId);
    if (!waitersForId) {
      return;
    }

    // The first waiter claims the entry; any others keep waiting.
    for (const waiter of waitersForId) {
      const data = this.take(requestId);
      if (!data) {
        break;
      }
      clearTimeout(waiter.timer);
      this.removeWaiter(requestId, waiter);
      waiter.resolve(data);
    }
  }

  private removeWaiter(requestId: string, waiter: Waiter): void {
    const waitersForId = this.waiters.get(requestId);
    if (!waitersForId) {
      return;
    }
    waitersForId.delete(waiter);
    if (waitersForId.size === 0) {
      this.waiters.delete(requestId);
    }
  }

  private sweep(): void {
    const cutoff = this.now() - this.retentionMs();

    for (const [requestId, abandonedAt] of this.abandoned) {
      if (abandonedAt <= cutoff) {
        this.abandoned.delete(requestId);
      }
    }

    for (const [requestId, stored] of this.responses) {
      if (stored.storedAt <= cutoff) {
        log.debug(`Evicting unclaimed response for request ${requestId}`);
        this.responses.delete(requestId);
      }
    }
  }
}
