import { PAIR_CONCURRENCY } from './constants.js';

/**
 * Run tasks through a bounded worker pool. Results come back in task order as
 * settled outcomes, so one rejection never cancels its siblings.
 */
export async function runPooled<T>(
  tasks: ReadonlyArray<() => Promise<T>>,
  limit: number = PAIR_CONCURRENCY,
): Promise<PromiseSettledResult<T>[]> {
  const results: PromiseSettledResult<T>[] = new Array(tasks.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < tasks.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await tasks[index]() };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, tasks.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Unwrap a settled result, substituting `fallback` for a rejection.
 */
export function settledOr<T>(result: PromiseSettledResult<T>, fallback: T): T {
  return result.status === 'fulfilled' ? result.value : fallback;
}
