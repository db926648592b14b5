/**
 * Bounded worker pool
 *
 * At most `concurrency` tasks run at once; up to `maxQueueSize` more wait in
 * FIFO order. Submissions beyond that are rejected.
 */

export interface WorkerPoolOptions {
  name: string;
  concurrency: number;
  maxQueueSize: number;
}

export interface WorkerPoolStats {
  active: number;
  queued: number;
  rejected: number;
}

export class WorkerPoolSaturatedError extends Error {
  constructor(
    readonly poolName: string,
    readonly queued: number
  ) {
    super(
      `Worker pool '${poolName}' is saturated (${String(queued)} tasks queued)`
    );
    this.name = "WorkerPoolSaturatedError";
  }
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private active = 0;
  private rejected = 0;
  private readonly waiting: (() => void)[] = [];

  constructor(options: WorkerPoolOptions) {
    if (options.concurrency < 1) {
      throw new RangeError("concurrency must be at least 1");
    }
    this.options = options;
  }

  /**
   * Run `task` once a slot is free and resolve with its result
   */
  async submit<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireSlot();
    try {
      return await task();
    } finally {
      this.releaseSlot();
    }
  }

  getStats(): WorkerPoolStats {
    return {
      active: this.active,
      queued: this.waiting.length,
      rejected: this.rejected,
    };
  }

  private acquireSlot(): Promise<void> {
    if (this.active < this.options.concurrency) {
      this.active++;
      return Promise.resolve();
    }

    if (this.waiting.length >= this.options.maxQueueSize) {
      this.rejected++;
      return Promise.reject(
        new WorkerPoolSaturatedError(this.options.name, this.waiting.length)
      );
    }

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private releaseSlot(): void {
    // Hand the slot straight to the next waiter so `active` never overshoots
    const next = this.waiting.shift();
    if (next !== undefined) {
      next();
    } else {
      this.active--;
    }
  }
}
