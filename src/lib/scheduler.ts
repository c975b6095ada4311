/**
 * @file src/lib/scheduler.ts
 * @description Pacing policy for outbound fetches. The attribution engine never sees it; the
 *              workflows hand their per-article tasks to a scheduler.
 */

export type Task<T> = () => Promise<T>;

export interface FetchScheduler {
  /** Runs every task and resolves with their results in task order. */
  run<T>(tasks: ReadonlyArray<Task<T>>): Promise<T[]>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** One task at a time with `delayMs` between the end of one task and the start of the next. */
export const createSerialScheduler = (
  delayMs: number,
  wait: (ms: number) => Promise<void> = sleep,
): FetchScheduler => ({
  async run<T>(tasks: ReadonlyArray<Task<T>>): Promise<T[]> {
    const results: T[] = [];
    for (const [index, task] of tasks.entries()) {
      if (index > 0 && delayMs > 0) {
        await wait(delayMs);
      }
      results.push(await task());
    }
    return results;
  },
});
