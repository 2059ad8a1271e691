export type SleepFn = (ms: number) => Promise<void>;

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Serializes tasks across all callers and keeps at least `minDelayMs`
 * between the end of one task and the start of the next.
 */
export class RateLimiter {
  private tail: Promise<void> = Promise.resolve();
  private lastFinishedAt: number | null = null;

  constructor(
    private readonly minDelayMs: number,
    private readonly sleepFn: SleepFn = sleep,
    private readonly now: () => number = Date.now
  ) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      if (this.lastFinishedAt !== null) {
        const wait = this.lastFinishedAt + this.minDelayMs - this.now();
        if (wait > 0) {
          await this.sleepFn(wait);
        }
      }
      try {
        return await task();
      } finally {
        this.lastFinishedAt = this.now();
      }
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
