import { describe, it, expect } from "vitest";
import { AsyncMutex } from "./lock.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = (): void => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("AsyncMutex", () => {
  it("runs critical sections one at a time in arrival order", async () => {
    const mutex = new AsyncMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive(async () => {
      order.push("second");
    });
    const third = mutex.runExclusive(() => {
      order.push("third");
    });

    expect(mutex.isLocked).toBe(true);
    expect(mutex.pending).toBe(2);

    gate.resolve();
    await Promise.all([first, second, third]);

    expect(order).toEqual(["first:start", "first:end", "second", "third"]);
    expect(mutex.isLocked).toBe(false);
  });

  it("releases the lock when the critical section throws", async () => {
    const mutex = new AsyncMutex();

    await expect(
      mutex.runExclusive(async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
    expect(mutex.isLocked).toBe(false);
  });
});
