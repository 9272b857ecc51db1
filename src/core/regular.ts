import { CurveInvariantError } from "./errors";
import { float64, type NumericType } from "./numeric";
import { snapRaw } from "./snap";
import { summarize } from "./summary";
import type { Curve, Point, StorageTypes, TypedCurve } from "./types";

/**
 * Curve sampled at regular distances: sample i sits at origin + i * step.
 * Immutable once constructed.
 */
export class FixedStepCurve implements Curve, TypedCurve {
  readonly xType: NumericType;
  readonly yType: NumericType;

  // Raw storage values
  private readonly rawOrigin: number;
  private readonly rawStep: number;
  private readonly rawSamples: number[];

  // Canonical copies used by the queries
  private readonly origin: number;
  private readonly step: number;
  private readonly values: number[];

  constructor(
    origin: number,
    step: number,
    samples: number[],
    types: StorageTypes = {}
  ) {
    this.xType = types.xType ?? float64;
    this.yType = types.yType ?? float64;

    this.rawOrigin = this.xType.fromFloat(origin);
    this.rawStep = this.xType.fromFloat(step);
    this.rawSamples = samples.map((s) => this.yType.fromFloat(s));
    const last = this.rawSamples.length - 1;
    if (last >= 0) {
      this.rawSamples[0] = snapRaw(this.rawSamples[0], 0, this.yType);
      this.rawSamples[last] = snapRaw(this.rawSamples[last], 1, this.yType);
    }

    this.origin = this.xType.toFloat(this.rawOrigin);
    this.step = this.xType.toFloat(this.rawStep);
    this.values = this.rawSamples.map((s) => this.yType.toFloat(s));

    this.check();
  }

  /** Builds a curve from values already in the storage encodings. */
  static fromRaw(
    rawOrigin: number,
    rawStep: number,
    rawSamples: number[],
    types: StorageTypes = {}
  ): FixedStepCurve {
    const xType = types.xType ?? float64;
    const yType = types.yType ?? float64;
    return new FixedStepCurve(
      xType.toFloat(rawOrigin),
      xType.toFloat(rawStep),
      rawSamples.map((s) => yType.toFloat(s)),
      { xType, yType }
    );
  }

  private check() {
    const n = this.values.length;
    if (n < 2) {
      throw new CurveInvariantError(
        `A fixed-step curve needs at least 2 samples, got ${n}.`
      );
    }
    if (!(this.step > 0) || !Number.isFinite(this.step)) {
      throw new CurveInvariantError(`Step must be positive, got ${this.step}.`);
    }
    for (let i = 1; i < n; i++) {
      if (this.values[i] < this.values[i - 1]) {
        throw new CurveInvariantError(
          "Y does not increase monotonously for increasing x."
        );
      }
    }

    if (this.values[0] !== 0) {
      throw new CurveInvariantError("First sample does not define y = 0.");
    }
    if (this.values[n - 1] !== 1) {
      throw new CurveInvariantError("Last sample does not define y = 1.");
    }
  }

  get length(): number {
    return this.values.length;
  }

  get rawValues(): { origin: number; step: number; samples: number[] } {
    return {
      origin: this.rawOrigin,
      step: this.rawStep,
      samples: [...this.rawSamples],
    };
  }

  minX(): number {
    return this.origin;
  }

  maxX(): number {
    return this.origin + this.step * (this.values.length - 1);
  }

  yAtX(x: number): number {
    const n = this.values.length;
    if (x <= this.minX()) return this.values[0];
    if (x >= this.maxX()) return this.values[n - 1];

    const i = (x - this.origin) / this.step;
    const iMin = Math.floor(i);
    const iMax = Math.min(Math.ceil(i), n - 1);

    if (iMin === iMax) return this.values[iMin];

    const a = i - iMin;
    return this.values[iMin] * (1 - a) + this.values[iMax] * a;
  }

  /**
   * When several consecutive samples equal y, the position of the first one is
   * returned.
   */
  xAtY(y: number): number {
    if (!(y >= 0 && y <= 1)) {
      throw new CurveInvariantError(`Y must be within [0, 1], got ${y}.`);
    }
    if (y === 0) return this.minX();
    if (y === 1) return this.maxX();

    for (let i = 0; i < this.values.length; i++) {
      const vR = this.values[i];
      if (vR === y) {
        return this.origin + i * this.step;
      }
      if (vR > y) {
        if (i === 0) {
          throw new CurveInvariantError(
            `First sample ${vR} already lies above y = ${y}.`
          );
        }
        const vL = this.values[i - 1];
        const a = (y - vL) / (vR - vL);
        return this.origin + (i - 1 + a) * this.step;
      }
    }

    throw new CurveInvariantError(`Did not find y = ${y}.`);
  }

  getXValues(): number[] {
    return this.values.map((_, i) => this.origin + i * this.step);
  }

  getValuesAsPairs(): Point[] {
    return this.values.map((y, i) => ({ x: this.origin + i * this.step, y }));
  }

  getValuesAsVectors(): [number[], number[]] {
    return [this.getXValues(), [...this.values]];
  }

  typedMinX(): number {
    return this.rawOrigin;
  }

  typedMaxX(): number {
    return this.xType.fromFloat(this.maxX());
  }

  typedYAtX(rawX: number): number {
    return this.yType.fromFloat(this.yAtX(this.xType.toFloat(rawX)));
  }

  typedXAtY(rawY: number): number {
    return this.xType.fromFloat(this.xAtY(this.yType.toFloat(rawY)));
  }

  toString(): string {
    return summarize("FixedStepCurve", this, this.values.length);
  }
}
