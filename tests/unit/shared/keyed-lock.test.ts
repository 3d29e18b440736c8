import { describe, it, expect } from "vitest";
import { KeyedLock } from "@src/shared/keyed-lock.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("KeyedLock", () => {
  it("runs tasks under the same key one after another", async () => {
    const lock = new KeyedLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run("chat-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.run("chat-1", () => {
      order.push("second");
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("does not block tasks under other keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();

    const blocked = lock.run("chat-1", () => gate.promise);
    const other = await lock.run("chat-2", () => "done");

    expect(other).toBe("done");
    gate.resolve();
    await blocked;
  });

  it("keeps the chain going after a task throws", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run("chat-1", () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.run("chat-1", () => 7)).resolves.toBe(7);
  });

  it("forgets a key once its work settles", async () => {
    const lock = new KeyedLock();

    const pending = lock.run("chat-1", () => "x");
    expect(lock.size).toBe(1);

    await pending;
    expect(lock.size).toBe(0);
  });
});
