import type { RetryPolicy } from "../types/config";
import { PipelineAbortError, TransientTransportError } from "../errors";

/** Resolves after `ms`, or rejects with PipelineAbortError when the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) { reject(new PipelineAbortError()); return; }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new PipelineAbortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Delay before retry number `attempt` (1-based: the delay after the first failure is attempt 1). */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return capped + Math.floor(random() * policy.jitterMs);
}

export interface RetryOptions {
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
  random?: () => number;
}

export interface RetryResult<T> {
  value: T;
  attempts: number;
}

/**
 * Run `task` until it succeeds or the policy's attempts are used up.
 * The last error is rethrown unchanged, with `attempts` attached as a property
 * readable through `attemptsOf`.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const shouldRetry = options.shouldRetry ?? (() => true);

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) throw new PipelineAbortError();
    try {
      const value = await task(attempt);
      return { value, attempts: attempt };
    } catch (err) {
      if (err instanceof PipelineAbortError || attempt >= maxAttempts || !shouldRetry(err)) {
        throw tagAttempts(err, attempt);
      }
      const delay = backoffDelay(policy, attempt, options.random);
      options.onRetry?.(err, attempt, delay);
      await sleep(delay, options.signal);
    }
  }
}

const ATTEMPTS = Symbol("attempts");

/** Attach an attempt count to `err`, readable through `attemptsOf`. */
export function tagAttempts(err: unknown, attempts: number): unknown {
  if (err instanceof Error) {
    Object.defineProperty(err, ATTEMPTS, { value: attempts, configurable: true });
  }
  return err;
}

export function attemptsOf(err: unknown, fallback: number): number {
  if (err instanceof Error) {
    const value: unknown = Reflect.get(err, ATTEMPTS);
    if (typeof value === "number") return value;
  }
  return fallback;
}

/**
 * Run `task` with its own AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts. A timeout rejects with TransientTransportError.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new PipelineAbortError());
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      controller.abort();
      reject(new PipelineAbortError());
    };
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TransientTransportError(`timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    parent?.addEventListener("abort", onAbort, { once: true });

    void task(controller.signal)
      .then(resolve, reject)
      .finally(() => {
        clearTimeout(timer);
        parent?.removeEventListener("abort", onAbort);
      });
  });
}
