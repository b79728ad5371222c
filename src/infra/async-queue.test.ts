import { describe, expect, it } from "vitest";
import { AsyncQueue } from "./async-queue.js";

describe("AsyncQueue", () => {
  it("hands out queued items in order", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.size).toBe(2);
    expect(await queue.next(10)).toBe(1);
    expect(await queue.next(10)).toBe(2);
  });

  it("wakes a waiting reader", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.next(1_000);
    queue.push("late");

    expect(await pending).toBe("late");
    expect(queue.size).toBe(0);
  });

  it("resolves undefined on timeout and accepts a new reader afterwards", async () => {
    const queue = new AsyncQueue<string>();
    expect(await queue.next(5)).toBeUndefined();

    queue.push("next");
    expect(await queue.next(5)).toBe("next");
  });

  it("rejects a second concurrent reader", async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.next(50);

    await expect(queue.next(50)).rejects.toThrow("AsyncQueue supports a single pending reader");
    queue.push("x");
    expect(await first).toBe("x");
  });

  it("delivers items queued before a failure, then rejects", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(7);
    queue.fail(new Error("closed"));
    queue.push(8);

    expect(await queue.next(10)).toBe(7);
    await expect(queue.next(10)).rejects.toThrow("closed");
    expect(queue.failed?.message).toBe("closed");
  });

  it("rejects a waiting reader on failure", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next(1_000);
    queue.fail(new Error("reset"));

    await expect(pending).rejects.toThrow("reset");
  });

  it("drains without waiting", () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });
});
