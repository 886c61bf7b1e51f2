/**
 * Unit tests for Semaphore
 */

import { Semaphore } from "./Semaphore";

describe("Semaphore", () => {
  it("should hand out permits up to the limit", async () => {
    const semaphore = new Semaphore(2);
    await semaphore.acquire();
    await semaphore.acquire();

    expect(semaphore.getAvailablePermits()).toBe(0);

    let acquired = false;
    semaphore.acquire().then(() => {
      acquired = true;
    });
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(acquired).toBe(false);
    expect(semaphore.getWaitingCount()).toBe(1);
  });

  it("should pass a released permit to the next waiter", async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const next = semaphore.acquire();

    release();
    const releaseNext = await next;
    expect(semaphore.getAvailablePermits()).toBe(0);

    releaseNext();
    expect(semaphore.getAvailablePermits()).toBe(1);
  });

  it("should ignore repeated releases", async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();

    release();
    release();
    expect(semaphore.getAvailablePermits()).toBe(1);
  });

  it("should never exceed the limit under load", async () => {
    const semaphore = new Semaphore(3);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        semaphore.withPermit(async () => {
          active++;
          peak = Math.max(peak, active);
          await new Promise<void>((resolve) => setTimeout(resolve, i % 3));
          active--;
        })
      )
    );

    expect(peak).toBe(3);
    expect(semaphore.getAvailablePermits()).toBe(3);
  });

  it("should release the permit when the task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.withPermit(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(semaphore.getAvailablePermits()).toBe(1);
  });

  it("should accept Infinity as no limit", async () => {
    const semaphore = new Semaphore(Infinity);
    await Promise.all(Array.from({ length: 100 }, () => semaphore.acquire()));
    expect(semaphore.getAvailablePermits()).toBe(Infinity);
  });

  it.each([0, -1, 1.5, NaN])("should reject %p permits", (permits) => {
    expect(() => new Semaphore(permits)).toThrow(RangeError);
  });
});
