/**
 * Counting semaphore. Bounds how many pentest sessions run at once.
 */
export class Semaphore {
  private current = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly max: number) {
    if (!Number.isInteger(max) || max < 1) {
      throw new Error("Semaphore max must be a positive integer");
    }
  }

  /**
   * Take a slot, waiting for one to be released if all are held
   */
  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next();
      return;
    }
    if (this.current > 0) {
      this.current--;
    }
  }

  /**
   * Run `fn` while holding a slot
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  available(): number {
    return Math.max(0, this.max - this.current);
  }

  waiting(): number {
    return this.waiters.length;
  }

  acquired(): number {
    return this.current;
  }

  getMax(): number {
    return this.max;
  }
}
