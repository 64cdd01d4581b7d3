import { describe, expect, test } from "vitest";
import { Semaphore } from "../semaphore.js";

describe("Semaphore", () => {
  test("constructor rejects fewer than one permit", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore permits must be an integer >= 1");
    expect(() => new Semaphore(-1)).toThrow("Semaphore permits must be an integer >= 1");
  });

  test("constructor rejects fractional permits", () => {
    expect(() => new Semaphore(1.5)).toThrow("Semaphore permits must be an integer >= 1");
  });

  test("acquires up to permit count without blocking", async () => {
    const sem = new Semaphore(2);

    await sem.acquire();
    expect(sem.available).toBe(1);

    await sem.acquire();
    expect(sem.available).toBe(0);
  });

  test("blocks when permits exhausted", async () => {
    const sem = new Semaphore(1);
    await sem.acquire();

    let acquired = false;
    const pendingAcquire = sem.acquire().then(() => {
      acquired = true;
    });

    await new Promise((r) => setTimeout(r, 10));
    expect(acquired).toBe(false);
    expect(sem.pending).toBe(1);

    sem.release();
    await pendingAcquire;
    expect(acquired).toBe(true);
    expect(sem.pending).toBe(0);
    expect(sem.available).toBe(0);
  });

  test("FIFO ordering for waiting acquires", async () => {
    const sem = new Semaphore(1);
    const order: number[] = [];

    await sem.acquire();

    const p1 = sem.acquire().then(() => order.push(1));
    const p2 = sem.acquire().then(() => order.push(2));
    const p3 = sem.acquire().then(() => order.push(3));

    sem.release();
    sem.release();
    sem.release();

    await Promise.all([p1, p2, p3]);

    expect(order).toEqual([1, 2, 3]);
  });

  test("over-release beyond initial permits throws", () => {
    const sem = new Semaphore(1);
    expect(() => sem.release()).toThrow(
      "Semaphore over-release: already at max permits (1)",
    );
    expect(sem.available).toBe(1);
  });

  test("concurrent usage with multiple permits", async () => {
    const sem = new Semaphore(3);
    const inFlight: number[] = [];
    let maxConcurrent = 0;

    const tasks = Array.from({ length: 10 }, (_, i) => async () => {
      await sem.acquire();
      inFlight.push(i);
      maxConcurrent = Math.max(maxConcurrent, inFlight.length);

      await new Promise((r) => setTimeout(r, 5));

      inFlight.splice(inFlight.indexOf(i), 1);
      sem.release();
    });

    await Promise.all(tasks.map((t) => t()));

    expect(maxConcurrent).toBe(3);
    expect(inFlight).toHaveLength(0);
    expect(sem.available).toBe(3);
  });
});
