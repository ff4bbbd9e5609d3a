import { describe, it, expect } from "vitest";
import { KeyedLock } from "../keyedLock";

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
};

describe("KeyedLock", () => {
  it("runs tasks for the same key one at a time, in order", async () => {
    const lock = new KeyedLock<number>();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive(1, async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = lock.runExclusive(1, async () => {
      events.push("second:start");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(events).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
    expect(lock.isLocked(1)).toBe(false);
  });

  it("does not block other keys", async () => {
    const lock = new KeyedLock<number>();
    const gate = deferred();
    const held = lock.runExclusive(1, () => gate.promise);

    await expect(lock.runExclusive(2, async () => "other")).resolves.toBe("other");
    expect(lock.isLocked(1)).toBe(true);

    gate.resolve();
    await held;
  });

  it("releases the key when the task throws", async () => {
    const lock = new KeyedLock<string>();

    await expect(
      lock.runExclusive("a", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive("a", async () => 42)).resolves.toBe(42);
    expect(lock.isLocked("a")).toBe(false);
  });
});
