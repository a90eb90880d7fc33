/**
 * Limiter - semaphore bounding how many external calls run at once.
 *
 * Callers normally go through `run`, which guarantees the slot is released on
 * every exit path (success, error, timeout, abort).
 */

interface WaitingRequest {
  resolve: () => void;
  reject: (error: Error) => void;
  timeoutId?: NodeJS.Timeout;
}

export class Limiter {
  private currentCount = 0;
  private waitingQueue: WaitingRequest[] = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`Limiter size must be a positive integer, got ${maxConcurrent}`);
    }
  }

  getStats(): { maxConcurrent: number; currentCount: number; waitingCount: number } {
    return {
      maxConcurrent: this.maxConcurrent,
      currentCount: this.currentCount,
      waitingCount: this.waitingQueue.length,
    };
  }

  private tryAcquire(): boolean {
    if (this.currentCount < this.maxConcurrent) {
      this.currentCount++;
      return true;
    }
    return false;
  }

  /**
   * Acquire a slot, waiting if at limit.
   * Rejects if `timeoutMs` elapses while queued.
   */
  async acquire(timeoutMs?: number): Promise<void> {
    if (this.tryAcquire()) {
      return;
    }

    return new Promise<void>((resolve, reject) => {
      const request: WaitingRequest = {
        resolve: () => {
          this.currentCount++;
          resolve();
        },
        reject,
      };

      if (timeoutMs !== undefined && timeoutMs > 0) {
        request.timeoutId = setTimeout(() => {
          const index = this.waitingQueue.indexOf(request);
          if (index !== -1) {
            this.waitingQueue.splice(index, 1);
          }
          reject(new Error(`Limiter acquisition timed out after ${timeoutMs}ms`));
        }, timeoutMs);
      }

      this.waitingQueue.push(request);
    });
  }

  release(): void {
    if (this.currentCount <= 0) {
      return;
    }

    this.currentCount--;

    const next = this.waitingQueue.shift();
    if (next) {
      if (next.timeoutId) {
        clearTimeout(next.timeoutId);
      }
      // resolve() increments currentCount
      next.resolve();
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
