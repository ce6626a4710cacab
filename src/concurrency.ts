import { UnitTimeoutError } from './errors.js';

export type UnitWorker<I, O> = (item: I, index: number, signal: AbortSignal) => Promise<O>;

export interface PoolOptions {
  /** Simultaneous in-flight units */
  limit: number;
  /** Per-unit timeout; a timed-out unit settles as rejected with UnitTimeoutError */
  timeoutMs?: number;
  /** Label used in timeout errors, e.g. "analysis" */
  label?: string;
}

interface StartedUnit<T> {
  /** Settles with the unit's value, or rejects with UnitTimeoutError when the timer fires first */
  result: Promise<T>;
  /** Settles once the unit's own work has stopped, however late that is */
  settled: Promise<void>;
}

function startUnit<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  label: string
): StartedUnit<T> {
  const controller = new AbortController();
  const work = Promise.resolve().then(() => run(controller.signal));
  const settled = work.then(
    () => undefined,
    () => undefined
  );
  if (!timeoutMs) {
    return { result: work, settled };
  }

  const result = new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new UnitTimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    work.then(
      value => {
        clearTimeout(timer);
        resolve(value);
      },
      error => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
  return { result, settled };
}

/**
 * Run one unit with an individual timeout. The unit's signal is aborted with the
 * UnitTimeoutError as its reason so cooperative work can stop early; the returned
 * promise rejects either way.
 */
export function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number | undefined,
  label: string
): Promise<T> {
  return startUnit(run, timeoutMs, label).result;
}

/**
 * Fan out `items` over at most `limit` concurrent workers and wait for ALL of them (barrier).
 * Results keep input order; a failing unit never aborts its siblings.
 * A timed-out unit is recorded as rejected at once but keeps its slot until its work settles,
 * so no more than `limit` units are ever running.
 */
export async function runBounded<I, O>(
  items: readonly I[],
  worker: UnitWorker<I, O>,
  options: PoolOptions
): Promise<PromiseSettledResult<O>[]> {
  const results: PromiseSettledResult<O>[] = new Array(items.length);
  const lanes = Math.max(1, Math.min(options.limit, items.length));
  const label = options.label ?? 'unit';
  let cursor = 0;

  const lane = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      const unit = startUnit(
        signal => worker(items[index], index, signal),
        options.timeoutMs,
        `${label} #${index + 1}`
      );
      try {
        results[index] = { status: 'fulfilled', value: await unit.result };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
      await unit.settled;
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
