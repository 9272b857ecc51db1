import { afterEach, describe, it, expect, vi } from "vitest";
import {
  compactPointBudget,
  decodeCompact,
  encodeCompact,
  QUANTIZATION_STEP,
} from "./codec";
import { CurveDecodeError, CurveInvariantError } from "./errors";

// Header for min x 0, max x 100 (float32 0x42c80000)
const header = (n: number) => [1, 0, 0, 0, 0, 0, 0, 200, 66, n];

describe("Compact codec", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should write the fixed layout", () => {
    const bytes = encodeCompact([
      { x: 0, y: 0 },
      { x: 50, y: 0.5 },
      { x: 100, y: 1 },
    ]);
    expect(Array.from(bytes)).toEqual([
      ...header(3),
      0, 0,
      128, 128, // 127.5 rounds up
      255, 255,
    ]);
  });

  it("should decode within one quantization step", () => {
    const points = decodeCompact(
      encodeCompact([
        { x: 0, y: 0 },
        { x: 30, y: 0.2 },
        { x: 100, y: 1 },
      ])
    );
    expect(points).toHaveLength(3);
    expect(points[1].x).toBeCloseTo(30, 0);
    expect(Math.abs(points[1].y - 0.2)).toBeLessThanOrEqual(QUANTIZATION_STEP);
    expect(points[2]).toEqual({ x: 100, y: 1 });
  });

  it("should quantize x against the bounds stored in the header", () => {
    // 0.16 sits at 25.5 steps of the exact range but just below it in float32
    const bytes = encodeCompact([
      { x: 0.1, y: 0 },
      { x: 0.16, y: 0.5 },
      { x: 0.7, y: 1 },
    ]);
    const view = new DataView(bytes.buffer);
    expect(view.getFloat32(1, true)).toBe(Math.fround(0.1));
    expect(view.getFloat32(5, true)).toBe(Math.fround(0.7));
    expect(bytes[12]).toBe(25);
  });

  it("should reject point counts outside the format", () => {
    expect(() => encodeCompact([{ x: 0, y: 0 }])).toThrow(CurveInvariantError);

    const many = Array.from({ length: 256 }, (_, i) => ({ x: i, y: i / 255 }));
    expect(() => encodeCompact(many)).toThrow(
      "The compact format holds at most 255 points, got 256."
    );
  });

  it("should derive the point budget from a byte limit", () => {
    expect(compactPointBudget(20)).toBe(5);
    expect(compactPointBudget(21)).toBe(5);
    expect(compactPointBudget(14)).toBe(2);
    expect(compactPointBudget(10000)).toBe(255);
    expect(() => compactPointBudget(13)).toThrow(CurveInvariantError);
  });

  it("should collapse points sharing an x byte", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const bytes = new Uint8Array([
      ...header(4),
      0, 0,
      0, 10,
      255, 200,
      255, 255,
    ]);

    expect(decodeCompact(bytes)).toEqual([
      { x: 0, y: 0 },
      { x: 100, y: 1 },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry.declared).toBe(4);
    expect(entry.decoded).toBe(2);
  });

  it("should read from an offset view", () => {
    const backing = new Uint8Array([9, 9, ...header(2), 0, 0, 255, 255]);
    expect(decodeCompact(backing.subarray(2))).toEqual([
      { x: 0, y: 0 },
      { x: 100, y: 1 },
    ]);
  });

  it("should reject malformed buffers", () => {
    expect(() => decodeCompact(new Uint8Array(5))).toThrow(CurveDecodeError);
    expect(() => decodeCompact(new Uint8Array([2, ...header(0).slice(1)]))).toThrow(
      "Unknown compact format tag: 2"
    );
    expect(() => decodeCompact(new Uint8Array([...header(3), 0, 0, 255, 255]))).toThrow(
      "Byte array too short for declared length: 3 points need 16 bytes, got 14."
    );
  });
});
