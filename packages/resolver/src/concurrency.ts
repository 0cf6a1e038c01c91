/**
 * Bounded worker pool. Runs `tasks` with at most `concurrency` in flight and
 * returns their settled results in task order, so callers can merge results
 * deterministically regardless of completion order.
 */
export async function settleWithConcurrency<T>(
  tasks: readonly (() => Promise<T>)[],
  concurrency: number,
): Promise<PromiseSettledResult<T>[]> {
  const results: PromiseSettledResult<T>[] = [];
  let index = 0;

  async function worker(): Promise<void> {
    while (index < tasks.length) {
      const current = index;
      index++;
      const task = tasks[current];
      if (task) {
        try {
          results[current] = { status: "fulfilled", value: await task() };
        } catch (error: unknown) {
          results[current] = { status: "rejected", reason: error };
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, tasks.length); i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
