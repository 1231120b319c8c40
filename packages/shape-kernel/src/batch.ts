/**
 * Batch runner — one job per item, in order, nothing shared between
 * items. A failing item either stops the run (default) or is recorded
 * and skipped.
 */

export interface BatchOptions {
  continueOnError?: boolean;
}

export interface BatchFailure<T> {
  index: number;
  item: T;
  error: Error;
}

export interface BatchResult<T, R> {
  /** One entry per item; undefined where the item failed. */
  results: (R | undefined)[];
  failures: BatchFailure<T>[];
}

export async function runBatch<T, R>(
  items: readonly T[],
  job: (item: T, index: number) => R | Promise<R>,
  opts: BatchOptions = {},
): Promise<BatchResult<T, R>> {
  const results: (R | undefined)[] = [];
  const failures: BatchFailure<T>[] = [];
  for (const [index, item] of items.entries()) {
    try {
      results.push(await job(item, index));
    } catch (err) {
      if (!opts.continueOnError) throw err;
      failures.push({ index, item, error: err instanceof Error ? err : new Error(String(err)) });
      results.push(undefined);
    }
  }
  return { results, failures };
}
