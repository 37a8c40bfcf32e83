// Unit tests for the per-session lock

import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./session-lock.js";
import { createDeferred } from "./utils/deferred.js";

describe("KeyedMutex", () => {
  it("runs tasks for the same key one at a time, in arrival order", async () => {
    const mutex = new KeyedMutex();
    const gate = createDeferred<void>();
    const order: string[] = [];

    const first = mutex.runExclusive("alice", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = mutex.runExclusive("alice", async () => {
      order.push("second");
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(["first:start"]);
    expect(mutex.isLocked("alice")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("never makes different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const gate = createDeferred<void>();

    const blocked = mutex.runExclusive("alice", () => gate.promise);
    const other = await mutex.runExclusive("bob", async () => "bob done");

    expect(other).toBe("bob done");
    expect(mutex.isLocked("alice")).toBe(true);
    expect(mutex.isLocked("bob")).toBe(false);

    gate.resolve();
    await blocked;
  });

  it("releases the key when a task throws", async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive("alice", async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.runExclusive("alice", async () => "next")).resolves.toBe("next");
    expect(mutex.isLocked("alice")).toBe(false);
  });

  it("forgets a key once its queue is empty", async () => {
    const mutex = new KeyedMutex();
    const first = mutex.runExclusive("alice", async () => undefined);
    const second = mutex.runExclusive("alice", async () => undefined);
    expect(mutex.isLocked("alice")).toBe(true);

    await Promise.all([first, second]);
    expect(mutex.isLocked("alice")).toBe(false);
  });

  it("drain waits for every queued task", async () => {
    const mutex = new KeyedMutex();
    const gate = createDeferred<void>();
    let finished = false;

    void mutex.runExclusive("alice", async () => {
      await gate.promise;
      finished = true;
    });

    const drained = mutex.drain();
    gate.resolve();
    await drained;
    expect(finished).toBe(true);
  });
});
