/**
 * Promise-based mutual exclusion with FIFO hand-off. Every mutation of an
 * enforcer's shared health and temperature state runs under one of these.
 */
export class Mutex {
  private locked: boolean = false;
  private waiting: Array<() => void> = [];
  private peakWaiting: number = 0;

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    await new Promise<void>(resolve => {
      this.waiting.push(resolve);
      if (this.waiting.length > this.peakWaiting) {
        this.peakWaiting = this.waiting.length;
      }
    });
  }

  release(): void {
    if (!this.locked) {
      throw new Error('Mutex released while not held');
    }

    const next = this.waiting.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `locked` stays true.
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getWaiting(): number {
    return this.waiting.length;
  }

  getPeakWaiting(): number {
    return this.peakWaiting;
  }
}
