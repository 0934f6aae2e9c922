import { PipelineError } from "../errors.js";

/**
 * Error thrown when queue wait times out.
 */
export class CapacityExceededError extends PipelineError {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number, details?: unknown) {
    super("CAPACITY_EXCEEDED", message, details);
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Timeout for waiting in queue (ms). 0 = no timeout */
  queueTimeoutMs?: number;
  /** Included in capacity errors. */
  label?: string;
};

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  timeoutId?: ReturnType<typeof setTimeout>;
};

/**
 * Runs at most `maxConcurrent` tasks at once; the rest wait in FIFO order.
 * The limit can be changed while tasks are running.
 */
export class ConcurrencyLimiter {
  private maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private readonly label: string;
  private currentCount = 0;
  private readonly queue: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    const opts = typeof options === "number" ? { maxConcurrent: options } : options;
    if (opts.maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1");
    }
    this.maxConcurrent = opts.maxConcurrent;
    this.queueTimeoutMs = opts.queueTimeoutMs ?? 0;
    this.label = opts.label ?? "limiter";
  }

  get running(): number {
    return this.currentCount;
  }

  get queued(): number {
    return this.queue.length;
  }

  get limit(): number {
    return this.maxConcurrent;
  }

  get atCapacity(): boolean {
    return this.currentCount >= this.maxConcurrent;
  }

  /**
   * Change the limit. Raising it releases queued tasks right away; lowering
   * it lets running tasks finish.
   */
  resize(maxConcurrent: number): void {
    if (maxConcurrent < 1) {
      throw new Error("maxConcurrent must be at least 1");
    }
    this.maxConcurrent = maxConcurrent;
    while (this.queue.length > 0 && this.currentCount + this.pendingGrants < this.maxConcurrent) {
      this.releaseNext();
    }
  }

  /** Slots handed to waiters that have not started running yet. */
  private pendingGrants = 0;

  /**
   * Run a task with concurrency limiting.
   * @throws CapacityExceededError if queue wait times out
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.currentCount + this.pendingGrants >= this.maxConcurrent) {
      await this.waitForSlot();
      this.pendingGrants--;
    }

    this.currentCount++;
    try {
      return await task();
    } finally {
      this.currentCount--;
      if (this.currentCount + this.pendingGrants < this.maxConcurrent) {
        this.releaseNext();
      }
    }
  }

  /**
   * Try to run a task immediately. Returns null if at capacity.
   */
  tryRun<T>(task: () => Promise<T>): Promise<T> | null {
    if (this.currentCount + this.pendingGrants >= this.maxConcurrent) {
      return null;
    }
    return this.run(task);
  }

  private releaseNext(): void {
    const next = this.queue.shift();
    if (!next) return;
    if (next.timeoutId) clearTimeout(next.timeoutId);
    this.pendingGrants++;
    next.resolve();
  }

  private waitForSlot(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const entry: Waiter = { resolve, reject };

      if (this.queueTimeoutMs > 0) {
        entry.timeoutId = setTimeout(() => {
          const idx = this.queue.indexOf(entry);
          if (idx !== -1) {
            this.queue.splice(idx, 1);
          }
          reject(
            new CapacityExceededError(
              `${this.label}: queue wait exceeded ${this.queueTimeoutMs}ms timeout`,
              this.queueTimeoutMs,
              { limiter: this.label }
            )
          );
        }, this.queueTimeoutMs);
      }

      this.queue.push(entry);
    });
  }

  /**
   * Reject all waiting tasks with a capacity error.
   */
  clearQueue(): number {
    const waiting = this.queue.splice(0, this.queue.length);
    for (const entry of waiting) {
      if (entry.timeoutId) clearTimeout(entry.timeoutId);
      entry.reject(new CapacityExceededError(`${this.label}: queue cleared`, 1000, { limiter: this.label }));
    }
    return waiting.length;
  }
}

export type LimiterStats = {
  running: number;
  queued: number;
  limit: number;
};

/**
 * One limiter per key (stage name), created on first use.
 */
export class KeyedConcurrencyLimiter {
  private readonly limiters = new Map<string, ConcurrencyLimiter>();
  private readonly queueTimeoutMs: number;

  constructor(options: { queueTimeoutMs?: number } = {}) {
    this.queueTimeoutMs = options.queueTimeoutMs ?? 0;
  }

  /**
   * Run `task` under the limiter for `key`, sized to `maxConcurrent`. A
   * changed size applies to the existing limiter.
   */
  run<T>(key: string, maxConcurrent: number, task: () => Promise<T>): Promise<T> {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = new ConcurrencyLimiter({ maxConcurrent, queueTimeoutMs: this.queueTimeoutMs, label: key });
      this.limiters.set(key, limiter);
    } else if (limiter.limit !== maxConcurrent) {
      limiter.resize(maxConcurrent);
    }
    return limiter.run(task);
  }

  stats(): Record<string, LimiterStats> {
    const out: Record<string, LimiterStats> = {};
    for (const [key, limiter] of this.limiters) {
      out[key] = { running: limiter.running, queued: limiter.queued, limit: limiter.limit };
    }
    return out;
  }

  clear(): number {
    let rejected = 0;
    for (const limiter of this.limiters.values()) {
      rejected += limiter.clearQueue();
    }
    return rejected;
  }
}
