import { describe, expect, it } from "vitest";
import { KeyedMutex } from "../../src/shared/mutex.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs tasks for the same key one after another", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("k", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("k", async () => {
      order.push("second");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block different keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const slow = mutex.runExclusive("a", () => gate.promise);
    await expect(mutex.runExclusive("b", async () => "b-done")).resolves.toBe("b-done");
    gate.resolve();
    await slow;
  });

  it("releases the key after a task rejects", async () => {
    const mutex = new KeyedMutex();
    await expect(
      mutex.runExclusive("k", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    await expect(mutex.runExclusive("k", async () => 42)).resolves.toBe(42);
    expect(mutex.isLocked("k")).toBe(false);
  });

  it("forgets keys once all holders settle", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const held = mutex.runExclusive("k", () => gate.promise);
    expect(mutex.isLocked("k")).toBe(true);
    expect(mutex.size).toBe(1);
    gate.resolve();
    await held;
    expect(mutex.size).toBe(0);
  });
});
