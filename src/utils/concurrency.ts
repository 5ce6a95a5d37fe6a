/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

/**
 * Execute tasks with controlled concurrency, collecting every outcome.
 * Results keep the order of `tasks`, not completion order.
 * @param tasks Array of async tasks
 * @param concurrency Maximum concurrent tasks
 */
export async function executeConcurrentSettled<T>(
  tasks: Array<() => Promise<T>>,
  concurrency = 1
): Promise<PromiseSettledResult<T>[]> {
  const limit = pLimit(Math.max(1, concurrency));
  const wrappedTasks = tasks.map((task) => limit(task));
  return await Promise.allSettled(wrappedTasks);
}
