/**
 * Pacing policies for calls to the snapshot provider
 */

export interface Pacer {
  /**
   * Resolves when the caller may issue its next external call
   */
  acquire(): Promise<void>;
}

export interface MinIntervalPacerOptions {
  /** Minimum time between two successive acquisitions */
  minIntervalMs: number;
  /** Clock, for tests */
  now?: () => number;
}

/**
 * FIFO minimum-interval limiter.
 * Serializes acquisitions so that two calls are never closer than minIntervalMs.
 * The first acquisition resolves immediately. Concurrent callers are released in
 * arrival order, which lets fetches overlap without breaking the spacing.
 */
export class MinIntervalPacer implements Pacer {
  private queue: Array<{ resolve: () => void }> = [];
  private processing = false;
  private lastAcquireTime: number | undefined;
  private readonly minIntervalMs: number;
  private readonly now: () => number;

  constructor(options: MinIntervalPacerOptions) {
    if (!Number.isFinite(options.minIntervalMs) || options.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be a non-negative number, got ${options.minIntervalMs}`);
    }
    this.minIntervalMs = options.minIntervalMs;
    this.now = options.now ?? Date.now;
  }

  acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push({ resolve });
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const next = this.queue.shift();
        if (!next) break;

        if (this.lastAcquireTime !== undefined) {
          const elapsed = this.now() - this.lastAcquireTime;
          if (elapsed < this.minIntervalMs) {
            await new Promise<void>((r) => setTimeout(r, this.minIntervalMs - elapsed));
          }
        }

        this.lastAcquireTime = this.now();
        next.resolve();
      }
    } finally {
      this.processing = false;
    }
  }
}

/**
 * Pacer that never waits
 */
export const noPacing: Pacer = {
  acquire: () => Promise.resolve(),
};
