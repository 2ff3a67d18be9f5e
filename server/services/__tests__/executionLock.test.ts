import { describe, it, expect } from "vitest";
import { ExecutionLock, executionLockKey } from "../executionLock";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("ExecutionLock", () => {
  it("runs callers sharing a key one at a time, in arrival order", async () => {
    const lock = new ExecutionLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.runExclusive("media_buy:mb-1", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = lock.runExclusive("media_buy:mb-1", async () => {
      order.push("second");
    });

    await new Promise((resolve) => setImmediate(resolve));
    expect(order).toEqual(["first:start"]);
    expect(lock.isLocked("media_buy:mb-1")).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked("media_buy:mb-1")).toBe(false);
  });

  it("does not block different keys", async () => {
    const lock = new ExecutionLock();
    const gate = deferred();
    const held = lock.runExclusive("media_buy:mb-1", () => gate.promise);

    const other = await lock.runExclusive("media_buy:mb-2", async () => "done");

    expect(other).toBe("done");
    gate.resolve();
    await held;
  });

  it("releases the key when the callback throws", async () => {
    const lock = new ExecutionLock();

    await expect(
      lock.runExclusive("task:c_1", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive("task:c_1", async () => 42)).resolves.toBe(42);
    expect(lock.isLocked("task:c_1")).toBe(false);
  });

  it("keys by media buy, falling back to the task id", () => {
    expect(executionLockKey("mb-1", "c_1")).toBe("media_buy:mb-1");
    expect(executionLockKey(null, "c_1")).toBe("task:c_1");
  });
});
