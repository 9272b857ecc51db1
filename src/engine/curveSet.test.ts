import { afterEach, describe, it, expect, vi } from "vitest";
import { BreakpointCurve } from "../core/breakpoint";
import { CurveInvariantError, CurveRangeError } from "../core/errors";
import { i8 } from "../core/numeric";
import { FixedStepCurve } from "../core/regular";
import { CurveSet } from "./curveSet";

describe("CurveSet", () => {
  const a = new BreakpointCurve([
    { x: 0, y: 0 },
    { x: 10, y: 1 },
  ]);
  const b = new BreakpointCurve([
    { x: 0, y: 0 },
    { x: 20, y: 1 },
  ]);

  function makeSet(): CurveSet {
    const set = new CurveSet();
    set.addCurve(10, b);
    set.addCurve(0, a);
    return set;
  }

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should keep curves sorted by key", () => {
    const set = makeSet();
    expect(set.length).toBe(2);
    expect(set.keys()).toEqual([0, 10]);
    expect(set.curveAt(0)).toBe(a);
    expect(set.minKey()).toBe(0);
    expect(set.maxKey()).toBe(10);
  });

  it("should reject duplicate keys", () => {
    const set = makeSet();
    expect(() => set.addCurve(10, a)).toThrow("Duplicate key: 10");
  });

  it("should store keys in the key type", () => {
    const set = new CurveSet({ keyType: i8 });
    set.addCurve(3.7, a);
    expect(set.keys()).toEqual([3]);
    expect(() => set.addCurve(3.2, b)).toThrow(CurveInvariantError);
  });

  it("should fail on an empty set", () => {
    const set = new CurveSet();
    expect(() => set.minKey()).toThrow("The curve set is empty.");
    expect(() => set.curveAt(0)).toThrow("No curve at index 0.");
  });

  it("should interpolate between neighbouring keys", () => {
    const c = makeSet().curveAtX(5);
    expect(c.getValuesAsPairs()).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0.75 },
      { x: 20, y: 1 },
    ]);
  });

  it("should pick the right pair among several curves", () => {
    const set = makeSet();
    set.addCurve(
      20,
      new BreakpointCurve([
        { x: 0, y: 0 },
        { x: 40, y: 1 },
      ])
    );
    const c = set.curveAtX(15);
    // Halfway between the curves at keys 10 and 20
    expect(c.yAtX(20)).toBeCloseTo(0.75);
    expect(c.maxX()).toBe(40);
  });

  it("should throw outside the keys in strict mode", () => {
    const set = makeSet();
    expect(() => set.curveAtX(0)).toThrow(CurveRangeError);
    expect(() => set.curveAtX(-1)).toThrow("X -1 is at or below the minimum key 0.");

    let caught: unknown;
    try {
      set.curveAtX(12);
    } catch (e: unknown) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(CurveRangeError);
    if (caught instanceof CurveRangeError) {
      expect(caught.bound).toBe("max");
      expect(caught.max).toBe(10);
      expect(caught.code).toBe("OUT_OF_RANGE");
    }
  });

  it("should continue with the nearest curve outside the keys", () => {
    const set = makeSet();
    const low = set.curveAtXWithContinuation(-5);
    expect(low.getValuesAsPairs()).toEqual(a.getValuesAsPairs());
    expect(low).not.toBe(a);

    const high = set.curveAtXWithContinuation(10);
    expect(high.getValuesAsPairs()).toEqual(b.getValuesAsPairs());
  });

  it("should accept fixed-step curves", () => {
    const set = new CurveSet<FixedStepCurve>();
    set.addCurve(0, new FixedStepCurve(0, 10, [0, 1]));
    set.addCurve(10, new FixedStepCurve(0, 10, [0, 0.5, 1]));
    expect(set.curveAtX(5).yAtX(10)).toBeCloseTo(0.75);
  });

  it("should extrapolate linearly and warn", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const c = makeSet().curveAtXWithExtrapolation(15);

    expect(c.getValuesAsPairs()).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0.25 },
      { x: 20, y: 1 },
    ]);
    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry.component).toBe("curveSet");
    expect(entry.x).toBe(15);
  });

  it("should not warn when interpolating inside the keys", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    makeSet().curveAtXWithExtrapolation(5);
    expect(warn).not.toHaveBeenCalled();
  });

  it("should copy the only curve of a single-curve set", () => {
    const set = new CurveSet();
    set.addCurve(0, a);
    const c = set.curveAtXWithExtrapolation(100);
    expect(c.getValuesAsPairs()).toEqual(a.getValuesAsPairs());
    expect(c).not.toBe(a);
  });
});
