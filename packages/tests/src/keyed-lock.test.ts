import { describe, it, expect } from "vitest";
import { TransientError } from "@converge/proto";
import { KeyedLock, withTimeout } from "@converge/engine";
import { deferred, tick } from "./helpers";

describe("KeyedLock", () => {
  it("should run work for the same key one at a time", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const first = lock.runExclusive("office", async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
      return 1;
    });
    const second = lock.runExclusive("office", async () => {
      order.push("second");
      return 2;
    });

    await tick();
    expect(order).toEqual(["first:start"]);
    expect(lock.isLocked("office")).toBe(true);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
    expect(lock.isLocked("office")).toBe(false);
    expect(lock.size).toBe(0);
  });

  it("should not block different keys", async () => {
    const lock = new KeyedLock();
    const gate = deferred();
    const order: string[] = [];

    const slow = lock.runExclusive("a", async () => {
      await gate.promise;
      order.push("a");
    });
    await lock.runExclusive("b", async () => {
      order.push("b");
    });

    expect(order).toEqual(["b"]);
    gate.resolve();
    await slow;
    expect(order).toEqual(["b", "a"]);
  });

  it("should release the key after a failure", async () => {
    const lock = new KeyedLock();

    await expect(
      lock.runExclusive("office", async () => {
        throw new Error("failed");
      })
    ).rejects.toThrow("failed");

    expect(await lock.runExclusive("office", async () => "next")).toBe("next");
    expect(lock.size).toBe(0);
  });
});

describe("withTimeout", () => {
  it("should pass through results when no timeout is set", async () => {
    expect(await withTimeout(async () => "done", undefined, "stepper.begin")).toBe("done");
    expect(await withTimeout(async () => "done", 0, "stepper.begin")).toBe("done");
  });

  it("should pass through results that arrive in time", async () => {
    expect(await withTimeout(async () => 42, 1000, "stepper.begin")).toBe(42);
  });

  it("should reject with a transient error when the call is too slow", async () => {
    const gate = deferred();
    const result = withTimeout(() => gate.promise, 10, "stepper.delete");

    await expect(result).rejects.toBeInstanceOf(TransientError);
    await expect(result).rejects.toThrow("stepper.delete timed out after 10ms");
    gate.resolve();
  });

  it("should hand the abandoned call to onLate when the timer fires", async () => {
    const gate = deferred();
    const late: Array<Promise<string>> = [];

    const result = withTimeout(
      () => gate.promise.then(() => "finished"),
      10,
      "stepper.begin",
      (call) => late.push(call)
    );

    await expect(result).rejects.toThrow("stepper.begin timed out after 10ms");
    expect(late).toHaveLength(1);
    gate.resolve();
    expect(await late[0]).toBe("finished");
  });

  it("should not call onLate for calls that finish in time", async () => {
    const late: Array<Promise<number>> = [];

    expect(await withTimeout(async () => 7, 1000, "stepper.delete", (call) => late.push(call))).toBe(7);
    expect(late).toEqual([]);
  });

  it("should pass through the call's own error", async () => {
    await expect(
      withTimeout(async () => {
        throw new Error("refused");
      }, 1000, "stepper.begin")
    ).rejects.toThrow("refused");
  });
});
