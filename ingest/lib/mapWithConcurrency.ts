import { componentLogger } from '../logger.js';

const log = componentLogger('pool');

export interface SettledError {
  error: unknown;
}

export type Settled<R> = R | SettledError;

export function isSettledError<R>(result: Settled<R>): result is SettledError {
  return typeof result === 'object' && result !== null && 'error' in result && Object.keys(result).length === 1;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * A throwing worker does not stop the pool: its slot in the result array
 * holds `{ error }` instead. Results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: Settled<R>, index: number, item: T) => void,
): Promise<Array<Settled<R>>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results = new Array<Settled<R>>(list.length);
  let cursor = 0;

  async function runOneWorker() {
    while (cursor < list.length) {
      const currentIndex = cursor;
      cursor += 1;
      try {
        results[currentIndex] = await worker(list[currentIndex], currentIndex);
      } catch (err: unknown) {
        results[currentIndex] = { error: err };
      }
      if (typeof onSettled === 'function') {
        try {
          onSettled(results[currentIndex], currentIndex, list[currentIndex]);
        } catch (err: unknown) {
          log.warn({ index: currentIndex, err }, 'onSettled callback failed');
        }
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}
