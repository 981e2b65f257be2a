import { describe, expect, test } from "vitest";
import { RingBuffer } from "../history.js";

describe("RingBuffer", () => {
  test("returns entries most recent first", () => {
    const ring = new RingBuffer<number>(3);
    ring.push(1);
    ring.push(2);
    expect(ring.toArray()).toEqual([2, 1]);
    expect(ring.size).toBe(2);
  });

  test("drops the oldest entry once full", () => {
    const ring = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4, 5]) ring.push(n);
    expect(ring.toArray()).toEqual([5, 4, 3]);
    expect(ring.size).toBe(3);
  });

  test("clear() empties the buffer", () => {
    const ring = new RingBuffer<string>(2);
    ring.push("a");
    ring.clear();
    expect(ring.toArray()).toEqual([]);
    ring.push("b");
    expect(ring.toArray()).toEqual(["b"]);
  });

  test("rejects a non-positive capacity", () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
  });
});
