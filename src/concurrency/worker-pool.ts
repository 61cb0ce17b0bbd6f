/**
 * Fixed-size async worker pool.
 *
 * `size` workers pull the next index from a shared cursor until every item
 * has been handed out. Tasks are independent; nothing is cancelled once
 * started.
 */

export type PoolTask<T, R> = (item: T, index: number) => Promise<R>;

export type Settled<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown };

export interface PoolCompletion<T, R> {
  item: T;
  index: number;
  result: Settled<R>;
}

/**
 * Run `task` over `items` and call `onSettled` for each one as it finishes,
 * in completion order. Resolves once every task has settled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  task: PoolTask<T, R>,
  onSettled: (completion: PoolCompletion<T, R>) => void,
): Promise<void> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
  }

  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const item = items[index];
      let result: Settled<R>;
      try {
        result = { status: "fulfilled", value: await task(item, index) };
      } catch (reason) {
        result = { status: "rejected", reason };
      }
      onSettled({ item, index, result });
    }
  };

  const workers = Array.from({ length: Math.min(size, items.length) }, () => worker());
  await Promise.all(workers);
}

/**
 * Run `task` over `items` and return one settled result per item, in input
 * order regardless of completion order.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  size: number,
  task: PoolTask<T, R>,
): Promise<Array<Settled<R>>> {
  const slots = new Array<Settled<R>>(items.length);
  await runPool(items, size, task, ({ index, result }) => {
    slots[index] = result;
  });
  return slots;
}
