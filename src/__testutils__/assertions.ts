/**
 * assertions - Custom assertion helpers for contract tests
 */

import assert from 'node:assert/strict';

import { isRecord } from '@/obs/protocol.js';

/**
 * Poll a condition until it becomes true or timeout
 *
 * @example
 * await assertEventually(() => ws.getSentMessages().length > 0, 1000);
 */
export async function assertEventually(
  fn: () => boolean,
  timeoutMs: number,
  message?: string
): Promise<void> {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (fn()) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
  throw new Error(message ?? `Condition not met within ${timeoutMs}ms`);
}

/**
 * Parse a sent frame and check its opcode.
 *
 * @returns The frame's `d` payload
 */
export function parseSentFrame(raw: string | undefined, op: number): Record<string, unknown> {
  assert.ok(raw !== undefined, `Expected a sent frame with op=${op}`);
  const frame: unknown = JSON.parse(raw);
  assert.ok(isRecord(frame), 'Sent frame must be a JSON object');
  assert.equal(frame['op'], op);
  const d = frame['d'];
  assert.ok(isRecord(d), 'Sent frame must carry an object "d"');
  return d;
}

/**
 * Let pending immediates (fake server replies) and microtasks run.
 */
export function flushImmediates(rounds = 3): Promise<void> {
  let chain = Promise.resolve();
  for (let i = 0; i < rounds; i++) {
    chain = chain.then(() => new Promise<void>((resolve) => setImmediate(resolve)));
  }
  return chain;
}
