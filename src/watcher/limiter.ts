export interface RequestLimiter {
  schedule<T>(task: () => Promise<T>): Promise<T>;
}

export interface SequentialLimiterOptions {
  /** Minimum time between the start of two consecutive tasks (ms) */
  minIntervalMs?: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs scheduled tasks strictly one at a time, in submission order.
 * The explorer API rejects concurrent requests per key, so every fetch goes through here.
 */
export class SequentialLimiter implements RequestLimiter {
  private tail: Promise<void> = Promise.resolve();
  private lastStart = 0;
  private queued = 0;
  private readonly minIntervalMs: number;

  constructor(options: SequentialLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
  }

  /**
   * Number of tasks waiting or running
   */
  get pending(): number {
    return this.queued;
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.queued += 1;

    const run = this.tail.then(async () => {
      const wait = this.lastStart + this.minIntervalMs - Date.now();
      if (this.lastStart > 0 && wait > 0) {
        await sleep(wait);
      }
      this.lastStart = Date.now();
      try {
        return await task();
      } finally {
        this.queued -= 1;
      }
    });

    // A rejected task must not block the ones queued behind it
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }
}
