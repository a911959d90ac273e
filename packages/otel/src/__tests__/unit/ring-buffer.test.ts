import { describe, expect, it } from "vitest";
import { RingBuffer } from "../../ring-buffer.js";

describe("RingBuffer", () => {
  it("should reject a non-positive capacity", () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
    expect(() => new RingBuffer(1.5)).toThrow(RangeError);
  });

  it("should keep items in insertion order", () => {
    const buffer = new RingBuffer<number>(3);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.size).toBe(2);
    expect(buffer.drain()).toEqual([1, 2]);
  });

  it("should evict the oldest item on overflow and report it", () => {
    const buffer = new RingBuffer<number>(2);

    expect(buffer.push(1)).toBe(false);
    expect(buffer.push(2)).toBe(false);
    expect(buffer.push(3)).toBe(true);
    expect(buffer.drain()).toEqual([2, 3]);
  });

  it("should drain oldest first, up to a maximum", () => {
    const buffer = new RingBuffer<number>(3);
    for (const n of [1, 2, 3, 4]) buffer.push(n);

    expect(buffer.drain(2)).toEqual([2, 3]);
    expect(buffer.size).toBe(1);
    expect(buffer.drain()).toEqual([4]);
    expect(buffer.size).toBe(0);
  });

  it("should accept pushes after a drain wraps around", () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);
    buffer.drain(1);
    buffer.push(3);

    expect(buffer.drain()).toEqual([2, 3]);
  });

  it("should return nothing from an empty buffer", () => {
    const buffer = new RingBuffer<number>(2);

    expect(buffer.drain(5)).toEqual([]);
  });
});
