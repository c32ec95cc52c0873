export type Task<T> = () => Promise<T>;

/**
 * Runs tasks with at most `concurrency` in flight and waits for every one of
 * them. Results keep submission order. A single failure is rethrown as-is;
 * several are thrown together as an AggregateError.
 */
export async function runBounded<T>(tasks: readonly Task<T>[], concurrency: number): Promise<T[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const settled: Array<PromiseSettledResult<T> | undefined> = tasks.map(() => undefined);
  let next = 0;

  async function worker(): Promise<void> {
    for (;;) {
      const idx = next++;
      const task = tasks[idx];
      if (!task) return;
      try {
        settled[idx] = { status: "fulfilled", value: await task() };
      } catch (reason) {
        settled[idx] = { status: "rejected", reason };
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, tasks.length) }, () => worker());
  await Promise.all(workers);

  const errors: unknown[] = [];
  const values: T[] = [];
  for (const r of settled) {
    if (!r) continue;
    if (r.status === "rejected") errors.push(r.reason);
    else values.push(r.value);
  }

  const [first, ...rest] = errors;
  if (errors.length === 1) throw first;
  if (rest.length > 0) throw new AggregateError(errors, `${errors.length} of ${tasks.length} tasks failed`);
  return values;
}
