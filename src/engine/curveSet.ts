import { BreakpointCurve } from "../core/breakpoint";
import { CurveInvariantError, CurveRangeError } from "../core/errors";
import { float64, type NumericType } from "../core/numeric";
import { weightedAverage } from "../core/ops";
import type { Curve } from "../core/types";
import { createLogger } from "../logger";

const logger = createLogger("curveSet");

export interface CurveSetEntry<C extends Curve> {
  key: number; // raw value in the set's key type
  curve: C;
}

/**
 * Curves keyed by an external parameter (route, time of day, ...), sorted by
 * key. Curves for keys in between are interpolated from their neighbours.
 */
export class CurveSet<C extends Curve = BreakpointCurve> {
  readonly keyType: NumericType;
  private curves: CurveSetEntry<C>[] = [];

  constructor(options: { keyType?: NumericType } = {}) {
    this.keyType = options.keyType ?? float64;
  }

  get length(): number {
    return this.curves.length;
  }

  entries(): CurveSetEntry<C>[] {
    return this.curves.map((e) => ({ ...e }));
  }

  /** Keys as canonical floats. */
  keys(): number[] {
    return this.curves.map((e) => this.keyAt(e));
  }

  curveAt(index: number): C {
    const entry = this.curves[index];
    if (!entry) {
      throw new CurveInvariantError(`No curve at index ${index}.`);
    }
    return entry.curve;
  }

  private keyAt(entry: CurveSetEntry<C>): number {
    return this.keyType.toFloat(entry.key);
  }

  private first(): CurveSetEntry<C> {
    const entry = this.curves[0];
    if (!entry) throw new CurveInvariantError("The curve set is empty.");
    return entry;
  }

  private last(): CurveSetEntry<C> {
    const entry = this.curves[this.curves.length - 1];
    if (!entry) throw new CurveInvariantError("The curve set is empty.");
    return entry;
  }

  minKey(): number {
    return this.keyAt(this.first());
  }

  maxKey(): number {
    return this.keyAt(this.last());
  }

  addCurve(key: number, curve: C) {
    const raw = this.keyType.fromFloat(key);
    const k = this.keyType.toFloat(raw);

    let i = 0;
    while (i < this.curves.length && this.keyAt(this.curves[i]) < k) i++;

    if (i < this.curves.length && this.keyAt(this.curves[i]) === k) {
      throw new CurveInvariantError(`Duplicate key: ${key}`);
    }
    this.curves.splice(i, 0, { key: raw, curve });
  }

  /**
   * Finds the neighbouring pair of curves around x by halving, and blends
   * them. Outside the key range the two outermost curves are used and the
   * blend factor leaves [0, 1].
   */
  private interpolate(x: number): BreakpointCurve {
    let start = 0;
    let end = this.curves.length - 1;
    while (start + 1 < end) {
      const mid = Math.floor((start + end) / 2);
      if (x < this.keyAt(this.curves[mid])) end = mid;
      else start = mid;
    }

    const l = this.curves[start];
    const r = this.curves[end];
    const lx = this.keyAt(l);
    const a = (x - lx) / (this.keyAt(r) - lx);
    return weightedAverage([l.curve, r.curve], [1 - a, a]);
  }

  /**
   * Curve for x. Out of bounds, the two nearest curves are extrapolated
   * linearly.
   *
   * Experimental: the extrapolation is untested beyond simple cases and may
   * produce invalid curves, which then fail construction.
   */
  curveAtXWithExtrapolation(x: number): BreakpointCurve {
    if (this.curves.length === 1) {
      return BreakpointCurve.fromCurve(this.first().curve);
    }
    if (x < this.minKey() || x > this.maxKey()) {
      logger.warn("Extrapolating beyond the curve set keys", {
        x,
        minKey: this.minKey(),
        maxKey: this.maxKey(),
      });
    }
    return this.interpolate(x);
  }

  /**
   * Curve for x. Out of bounds, the curve at the nearest bound is returned.
   */
  curveAtXWithContinuation(x: number): BreakpointCurve {
    if (x <= this.minKey()) return BreakpointCurve.fromCurve(this.first().curve);
    if (x >= this.maxKey()) return BreakpointCurve.fromCurve(this.last().curve);
    return this.interpolate(x);
  }

  /**
   * Curve for x, strictly between the smallest and largest key.
   *
   * @throws CurveRangeError when x is at or beyond either bound
   */
  curveAtX(x: number): BreakpointCurve {
    const min = this.minKey();
    const max = this.maxKey();
    if (x <= min) throw new CurveRangeError(x, "min", min, max);
    if (x >= max) throw new CurveRangeError(x, "max", min, max);
    return this.interpolate(x);
  }
}
