import { describe, it, expect } from 'vitest';
import { mapWithConcurrency } from '@shared/utils/pool';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  it('should return results in input order', async () => {
    const results = await mapWithConcurrency([30, 10, 20], 3, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:10', '2:20']);
  });

  it('should never run more than the limit at once', async () => {
    let running = 0;
    let peak = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(5);
      running--;
    });

    expect(peak).toBe(2);
  });

  it('should return an empty array for empty input', async () => {
    const results = await mapWithConcurrency([], 4, async (item: number) => item);

    expect(results).toEqual([]);
  });

  it('should treat a limit below one as one', async () => {
    let running = 0;
    let peak = 0;

    const results = await mapWithConcurrency(['a', 'b'], 0, async (item) => {
      running++;
      peak = Math.max(peak, running);
      await delay(1);
      running--;
      return item.toUpperCase();
    });

    expect(results).toEqual(['A', 'B']);
    expect(peak).toBe(1);
  });

  it('should reject with the first error', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (item) => {
        if (item === 2) {
          throw new Error('boom');
        }
        return item;
      })
    ).rejects.toThrow('boom');
  });
});
