import { RelayError } from "../errors.js";

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
  detach?: () => void;
};

/**
 * Runs at most `maxConcurrent` relay pumps at once; the rest wait in FIFO order.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private currentCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    if (typeof options === "number") {
      this.maxConcurrent = options;
      this.queueTimeoutMs = 0;
    } else {
      this.maxConcurrent = options.maxConcurrent;
      this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
    }
    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new RelayError("CONFIG_INVALID", "maxConcurrent must be a positive integer", {
        maxConcurrent: this.maxConcurrent
      });
    }
  }

  get running(): number {
    return this.currentCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  get atCapacity(): boolean {
    return this.currentCount >= this.maxConcurrent;
  }

  /**
   * Run a task once a slot is free.
   * Aborting `signal` while queued removes the waiter and rejects with the abort reason.
   *
   * @throws RelayError CAPACITY_EXCEEDED if the queue wait times out
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (this.currentCount >= this.maxConcurrent) {
      await this.waitForSlot(signal);
    }

    this.currentCount++;
    try {
      return await task();
    } finally {
      this.currentCount--;
      this.releaseNext();
    }
  }

  private releaseNext(): void {
    const next = this.queue.shift();
    if (next) {
      this.settle(next);
      next.resolve();
    }
  }

  private settle(entry: Waiter): void {
    if (entry.timeoutId) {
      clearTimeout(entry.timeoutId);
    }
    entry.detach?.();
  }

  private remove(entry: Waiter): void {
    const idx = this.queue.indexOf(entry);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
    }
    this.settle(entry);
  }

  private waitForSlot(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason instanceof Error ? signal.reason : new RelayError("CALLER_CANCELED", "Aborted"));
        return;
      }

      const entry: Waiter = { resolve, reject };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          this.remove(entry);
          reject(
            new RelayError("CAPACITY_EXCEEDED", `Queue wait exceeded ${this.queueTimeoutMs}ms timeout`, {
              retryAfterMs: this.queueTimeoutMs
            })
          );
        }, this.queueTimeoutMs);
      }

      if (signal) {
        const onAbort = (): void => {
          this.remove(entry);
          reject(signal.reason instanceof Error ? signal.reason : new RelayError("CALLER_CANCELED", "Aborted"));
        };
        signal.addEventListener("abort", onAbort, { once: true });
        entry.detach = () => signal.removeEventListener("abort", onAbort);
      }

      this.queue.push(entry);
    });
  }
}
