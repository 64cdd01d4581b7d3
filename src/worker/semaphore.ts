/**
 * Counting semaphore bounding how many requests the worker loop runs at once.
 * Waiters are woken in arrival order.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new Error("Semaphore permits must be an integer >= 1");
    }
    this.permits = permits;
    this.maxPermits = permits;
  }

  /**
   * Acquire a permit. Blocks if no permits available.
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  /**
   * Release a permit, handing it straight to the oldest waiter if any.
   * @throws Error if no permit is held
   */
  release(): void {
    if (this.waiting.length === 0 && this.permits >= this.maxPermits) {
      throw new Error(
        `Semaphore over-release: already at max permits (${this.maxPermits})`,
      );
    }
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiting.length;
  }
}
