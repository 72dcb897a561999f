/**
 * Bounded worker pool Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { runWithConcurrency } from '../../../src/shared/concurrency.js';

function delayed<T>(value: T, ms: number): () => Promise<T> {
  return () => new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

describe('runWithConcurrency', () => {
  it('returns results in task order regardless of completion order', async () => {
    const results = await runWithConcurrency([delayed('a', 20), delayed('b', 1), delayed('c', 10)], 3);

    expect(results).toEqual(['a', 'b', 'c']);
  });

  it('runs at most `workers` tasks at a time', async () => {
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 7 }, (_, i) => async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active -= 1;
      return i;
    });

    const results = await runWithConcurrency(tasks, 3);

    expect(peak).toBe(3);
    expect(results).toEqual([0, 1, 2, 3, 4, 5, 6]);
  });

  it('treats fewer than one worker as one', async () => {
    let active = 0;
    let peak = 0;
    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await Promise.resolve();
      active -= 1;
    };

    await runWithConcurrency([task, task, task], 0);

    expect(peak).toBe(1);
  });

  it('reports progress after each task', async () => {
    const onProgress = vi.fn();

    await runWithConcurrency([delayed(1, 1), delayed(2, 1)], 1, onProgress);

    expect(onProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  it('returns an empty list for no tasks', async () => {
    expect(await runWithConcurrency([], 4)).toEqual([]);
  });
});
