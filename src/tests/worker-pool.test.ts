import { mapWithConcurrency } from '../utils/worker-pool.util';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('mapWithConcurrency', () => {
  test('should return results in input order', async () => {
    const results = await mapWithConcurrency([30, 5, 15], 2, async (ms) => {
      await delay(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 10, 30]);
  });

  test('should never exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });
    expect(peak).toBe(3);
  });

  test('should run at least one worker', async () => {
    const results = await mapWithConcurrency(['a', 'b'], 0, async (item, index) => `${index}:${item}`);
    expect(results).toEqual(['0:a', '1:b']);
  });

  test('should fall back to one worker for a non-finite limit', async () => {
    let peak = 0;
    let active = 0;
    const results = await mapWithConcurrency([1, 2, 3], NaN, async (item) => {
      active++;
      peak = Math.max(peak, active);
      await delay(1);
      active--;
      return item * 10;
    });
    expect(results).toEqual([10, 20, 30]);
    expect(peak).toBe(1);
  });

  test('should handle an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  test('should reject when a task rejects', async () => {
    await expect(
      mapWithConcurrency([1, 2], 2, async (item) => {
        if (item === 2) throw new Error('task failed');
        return item;
      })
    ).rejects.toThrow('task failed');
  });
});
