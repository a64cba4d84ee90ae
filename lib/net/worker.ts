import pLimit from 'p-limit';

type Settled<R> = { id: number; ok: true; value: R } | { id: number; ok: false; error: unknown };

/**
 * Run `fn` over `items` with at most `concurrency` in flight and yield each
 * result as soon as it settles (completion order, not submission order).
 * A rejected task is rethrown from the generator; the remaining tasks keep
 * running to completion.
 */
export async function* mapUnordered<T, R>(
  items: Iterable<T>,
  concurrency: number,
  fn: (item: T) => Promise<R>,
): AsyncGenerator<R> {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  const pending = new Map<number, Promise<Settled<R>>>();
  let id = 0;
  for (const item of items) {
    const taskId = id++;
    pending.set(
      taskId,
      limit(() => fn(item)).then(
        (value): Settled<R> => ({ id: taskId, ok: true, value }),
        (error: unknown): Settled<R> => ({ id: taskId, ok: false, error }),
      ),
    );
  }

  while (pending.size > 0) {
    const settled = await Promise.race(pending.values());
    pending.delete(settled.id);
    if (!settled.ok) throw settled.error;
    yield settled.value;
  }
}

export default mapUnordered;
