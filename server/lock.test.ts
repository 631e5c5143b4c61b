import { describe, it, expect } from "vitest";
import { createKeyedLock } from "./lock.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("createKeyedLock", () => {
  it("runs calls for the same key one after another", async () => {
    const lock = createKeyedLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.run("u1", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.run("u1", async () => {
      events.push("second:start");
    });

    await Promise.resolve();
    await Promise.resolve();
    expect(events).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not hold back other keys", async () => {
    const lock = createKeyedLock();
    const gate = deferred();
    const events: string[] = [];

    const slow = lock.run("u1", async () => {
      await gate.promise;
      events.push("u1");
    });
    await lock.run("u2", async () => {
      events.push("u2");
    });

    expect(events).toEqual(["u2"]);
    gate.resolve();
    await slow;
    expect(events).toEqual(["u2", "u1"]);
  });

  it("releases the key when a call fails", async () => {
    const lock = createKeyedLock();

    await expect(
      lock.run("u1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(await lock.run("u1", async () => "next")).toBe("next");
    expect(lock.pendingKeys()).toBe(0);
  });
});
