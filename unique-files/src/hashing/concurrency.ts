/**
 * Outcome of mapWithConcurrency: one slot per input item, plus the
 * failures that left a slot empty.
 */
export interface MappedResult<T, R> {
  /** Results in input order (null for failed items) */
  results: (R | null)[];
  errors: Array<{
    index: number;
    item: T;
    error: Error;
  }>;
}

/**
 * Maps items through an async function with at most `limit` calls in flight.
 *
 * Errors are captured per item rather than thrown, so one failure never
 * cancels the work on its siblings.
 *
 * @param mapper - May return null to skip an item without recording an error
 * @param onProgress - Invoked after each item completes
 *
 * @example
 * const { results, errors } = await mapWithConcurrency(
 *   files,
 *   4,
 *   (file) => hashFile(file)
 * );
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T) => Promise<R | null>,
  onProgress?: (completed: number, item: T) => void
): Promise<MappedResult<T, R>> {
  const results: (R | null)[] = new Array<R | null>(items.length).fill(null);
  const errors: MappedResult<T, R>['errors'] = [];
  let index = 0;
  let completed = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        return;
      }

      const item = items[current];
      try {
        results[current] = await mapper(item);
      } catch (err) {
        results[current] = null;
        errors.push({
          index: current,
          item,
          error: err instanceof Error ? err : new Error(String(err))
        });
      }

      completed++;
      onProgress?.(completed, item);
    }
  }

  const workers = Array.from({ length: Math.max(1, limit) }, () => worker());
  await Promise.all(workers);
  return { results, errors };
}
