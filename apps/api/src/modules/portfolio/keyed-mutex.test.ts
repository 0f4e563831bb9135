import { describe, expect, it } from "vitest";

import { KeyedMutex } from "./keyed-mutex";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedMutex", () => {
  it("runs work for the same key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive("alice", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("alice", () => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(mutex.isLocked("alice")).toBe(false);
  });

  it("does not block other keys", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const slow = mutex.runExclusive("alice", () => gate.promise);
    const other = await mutex.runExclusive("bob", () => "bob done");

    expect(other).toBe("bob done");
    expect(mutex.isLocked("alice")).toBe(true);
    gate.resolve();
    await slow;
  });

  it("keeps the queue moving after a failure", async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive("alice", () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive("alice", () => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });
});
