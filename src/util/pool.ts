import { PipelineAbortError } from "../errors";

export type TaskOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: unknown; cancelled: boolean };

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 * Outcomes are returned in input order, whatever order the tasks finish in.
 * Items not yet started when `signal` aborts are reported as cancelled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<TaskOutcome<R>[]> {
  const outcomes = new Array<TaskOutcome<R>>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      if (signal?.aborted) {
        outcomes[index] = { ok: false, error: new PipelineAbortError(), cancelled: true };
        continue;
      }
      try {
        outcomes[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        outcomes[index] = { ok: false, error, cancelled: error instanceof PipelineAbortError };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return outcomes;
}
