/**
 * Bounded worker pool. Results come back in task order regardless of
 * completion order.
 */
export async function runWithConcurrency<T>(
  tasks: Array<() => Promise<T>>,
  workers: number,
  onProgress?: (completed: number, total: number) => void
): Promise<T[]> {
  if (tasks.length === 0) return [];

  const concurrency = Math.max(1, Math.round(workers));
  const results: T[] = new Array(tasks.length);
  const total = tasks.length;
  let completed = 0;
  let nextIndex = 0;

  const worker = async () => {
    while (nextIndex < tasks.length) {
      const current = nextIndex;
      nextIndex += 1;
      try {
        results[current] = await tasks[current]();
      } finally {
        completed += 1;
        onProgress?.(completed, total);
      }
    }
  };

  const runners = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(runners);
  return results;
}
