import { describe, expect, it } from "vitest";
import { BoundedQueue } from "./bounded-queue";
import { Mutex } from "./mutex";

describe("BoundedQueue", () => {
  it("delivers values in order and ends after close", async () => {
    const queue = new BoundedQueue<number>(4);
    await queue.push(1);
    await queue.push(2);
    queue.close();

    const received: number[] = [];
    for await (const value of queue) {
      received.push(value);
    }
    expect(received).toEqual([1, 2]);
  });

  it("hands a value straight to a waiting reader", async () => {
    const queue = new BoundedQueue<string>(1);
    const read = queue.next();
    await queue.push("a");
    expect(await read).toEqual({ value: "a", done: false });
    expect(queue.size).toBe(0);
  });

  it("holds a producer back until the consumer makes room", async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);

    let admitted: boolean | undefined;
    const blocked = queue.push(2).then((accepted) => {
      admitted = accepted;
    });
    await Promise.resolve();
    expect(admitted).toBeUndefined();

    expect(await queue.next()).toEqual({ value: 1, done: false });
    await blocked;
    expect(admitted).toBe(true);
    expect(queue.size).toBe(1);
  });

  it("releases a blocked producer with false on cancel", async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);

    queue.cancel();

    expect(await blocked).toBe(false);
    expect(await queue.push(3)).toBe(false);
    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });

  it("rejects waiting readers on failure", async () => {
    const queue = new BoundedQueue<number>(1);
    const read = queue.next();
    queue.fail(new Error("source failed"));

    await expect(read).rejects.toThrow("source failed");
    await expect(queue.next()).rejects.toThrow("source failed");
  });

  it("refuses pushes after close", async () => {
    const queue = new BoundedQueue<number>(1);
    queue.close();
    expect(queue.isClosed).toBe(true);
    await expect(queue.push(1)).rejects.toThrow("Cannot push into a closed queue");
  });

  it("requires a positive capacity", () => {
    expect(() => new BoundedQueue<number>(0)).toThrow("Queue capacity must be a positive integer");
  });
});

describe("Mutex", () => {
  it("runs tasks one at a time in submission order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const task = (label: string) => async () => {
      events.push(`${label}:start`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`${label}:end`);
      return label;
    };

    const results = await Promise.all([mutex.runExclusive(task("a")), mutex.runExclusive(task("b"))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps going after a task rejects", async () => {
    const mutex = new Mutex();
    const failing = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
