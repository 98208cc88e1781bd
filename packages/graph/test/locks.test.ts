import { describe, it, expect } from "vitest";
import { KeyedMutex, ReadWriteLock } from "../src/infrastructure/locks.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ReadWriteLock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const gate = deferred();
    const first = lock.read(() => gate.promise);
    const second = lock.read(() => lock.activeReaders);
    expect(await second).toBe(2);
    gate.resolve();
    await first;
    expect(lock.activeReaders).toBe(0);
  });

  it("keeps readers out while a write runs", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const gate = deferred();
    const write = lock.write(async () => {
      await gate.promise;
      order.push("write");
    });
    const read = lock.read(() => {
      order.push("read");
    });
    expect(lock.isWriting).toBe(true);
    gate.resolve();
    await Promise.all([write, read]);
    expect(order).toEqual(["write", "read"]);
  });

  it("lets a queued writer go before readers that arrive after it", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const gate = deferred();
    const firstRead = lock.read(async () => {
      await gate.promise;
      order.push("read 1");
    });
    const write = lock.write(() => {
      order.push("write");
    });
    const secondRead = lock.read(() => {
      order.push("read 2");
    });
    gate.resolve();
    await Promise.all([firstRead, write, secondRead]);
    expect(order).toEqual(["read 1", "write", "read 2"]);
  });

  it("releases the lock when the callback throws", async () => {
    const lock = new ReadWriteLock();
    await expect(
      lock.write(() => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(lock.isWriting).toBe(false);
    expect(await lock.read(() => "after")).toBe("after");
  });
});

describe("KeyedMutex", () => {
  it("serialises work on the same key", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    const gate = deferred();
    const first = mutex.run("a.ts", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = mutex.run("a.ts", () => {
      order.push("second");
    });
    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first", "second"]);
    expect(mutex.pending).toBe(0);
  });

  it("runs different keys independently", async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const blocked = mutex.run("a.ts", () => gate.promise);
    expect(await mutex.run("b.ts", () => "free")).toBe("free");
    gate.resolve();
    await blocked;
  });

  it("moves on after a failure", async () => {
    const mutex = new KeyedMutex();
    const failed = mutex.run("a.ts", () => {
      throw new Error("boom");
    });
    const next = mutex.run("a.ts", () => "next");
    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("next");
  });
});
