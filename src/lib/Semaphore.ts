/**
 * Counting semaphore for capping concurrent async work
 */

export type Release = () => void;

export class Semaphore {
  private available: number;
  private readonly waiters: Array<(release: Release) => void> = [];

  /**
   * @param permits Number of holders allowed at once; Infinity disables the cap
   */
  constructor(permits: number) {
    if (
      permits !== Infinity &&
      (!Number.isInteger(permits) || permits < 1)
    ) {
      throw new RangeError(
        `Semaphore permits must be a positive integer, got ${permits}`
      );
    }
    this.available = permits;
  }

  /**
   * Wait for a permit. The returned function gives it back; extra calls are ignored.
   */
  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.createRelease());
    }

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Run `task` while holding a permit
   */
  async withPermit<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  getAvailablePermits(): number {
    return this.available;
  }

  getWaitingCount(): number {
    return this.waiters.length;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the permit straight to the next waiter
        next(this.createRelease());
      } else {
        this.available++;
      }
    };
  }
}
