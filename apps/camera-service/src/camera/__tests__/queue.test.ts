/**
 * AsyncQueue Tests
 *
 * Critical Invariants:
 * - FIFO order
 * - get() waits for the next put()
 * - get(timeout) resolves undefined when nothing arrives
 * - An item put after a timed-out get() is kept for the next reader
 */

import { describe, it, expect } from "vitest";
import { AsyncQueue } from "../queue";

describe("AsyncQueue", () => {
  it("returns items in the order they were put", async () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);
    queue.put(3);

    expect(queue.size).toBe(3);
    expect(await queue.get()).toBe(1);
    expect(queue.getNowait()).toBe(2);
    expect(await queue.get(10)).toBe(3);
    expect(queue.getNowait()).toBeUndefined();
  });

  it("resolves a waiting get() on the next put()", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.get();

    queue.put("ready");

    expect(await pending).toBe("ready");
    expect(queue.size).toBe(0);
  });

  it("serves waiters in arrival order", async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.get();
    const second = queue.get();

    queue.put("a");
    queue.put("b");

    expect(await Promise.all([first, second])).toEqual(["a", "b"]);
  });

  it("times out with undefined and keeps later items", async () => {
    const queue = new AsyncQueue<string>();

    expect(await queue.get(5)).toBeUndefined();

    queue.put("late");
    expect(queue.getNowait()).toBe("late");
  });

  it("drains everything queued", () => {
    const queue = new AsyncQueue<number>();
    queue.put(1);
    queue.put(2);

    expect(queue.drain()).toEqual([1, 2]);
    expect(queue.size).toBe(0);
  });
});
