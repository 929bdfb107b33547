/**
 * Fleetwire Runtime Host: runBounded Tests
 *
 *   POOL-U1: results come back in input order
 *   POOL-U2: never more than `limit` workers in flight
 *   POOL-U3: a rejection is reported without cancelling other items
 *   POOL-U4: an invalid limit throws RangeError
 */

import { describe, it, expect } from 'vitest';
import { runBounded } from '../src/module/pool.js';

const delay = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

describe('runBounded', () => {
  it('POOL-U1: preserves input order', async () => {
    const results = await runBounded([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(results).toEqual([
      { status: 'fulfilled', value: 60 },
      { status: 'fulfilled', value: 20 },
      { status: 'fulfilled', value: 40 },
    ]);
  });

  it('POOL-U2: bounds concurrency', async () => {
    let inFlight = 0;
    let peak = 0;
    await runBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await delay(10);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it('POOL-U3: isolates failures', async () => {
    const seen: number[] = [];
    const results = await runBounded([1, 2, 3], 1, async (n) => {
      seen.push(n);
      if (n === 2) throw new Error('boom');
      return n;
    });

    expect(seen).toEqual([1, 2, 3]);
    expect(results[0]).toEqual({ status: 'fulfilled', value: 1 });
    expect(results[1]?.status).toBe('rejected');
    expect(results[2]).toEqual({ status: 'fulfilled', value: 3 });
  });

  it('POOL-U4: rejects a non-positive limit', async () => {
    await expect(runBounded([1], 0, async (n) => n)).rejects.toThrow(RangeError);
  });
});
