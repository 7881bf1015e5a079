import { describe, it, expect } from 'vitest';

import { mapWithConcurrency } from '../concurrency.js';
import { sleep } from '../retry.js';

describe('mapWithConcurrency', () => {
  it('keeps input order', async () => {
    const result = await mapWithConcurrency([30, 10, 20], 2, async (ms, i) => {
      await sleep(ms);
      return `${i}:${ms}`;
    });

    expect(result).toEqual(['0:30', '1:10', '2:20']);
  });

  it('never exceeds the limit', async () => {
    let running = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(5);
      running--;
    });

    expect(peak).toBe(3);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects a limit below 1', async () => {
    await expect(mapWithConcurrency([1], 0, async (x) => x)).rejects.toThrow(
      'Concurrency limit must be a positive integer, got 0'
    );
  });
});
