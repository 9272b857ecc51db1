import { createLogger } from "../logger";
import { compactPointBudget, decodeCompact, encodeCompact } from "./codec";
import { CurveInvariantError } from "./errors";
import { float64, type NumericType } from "./numeric";
import { douglasPeucker, reduceToCount } from "./reducer";
import { snapRaw } from "./snap";
import { summarize } from "./summary";
import type { Curve, Point, StorageTypes } from "./types";

const logger = createLogger("breakpoint");

/**
 * Curve defined by irregularly spaced (x, y) points with linear segments in
 * between. x strictly increases, y never decreases, and the curve runs from
 * y = 0 at the first point to y = 1 at the last.
 */
export class BreakpointCurve implements Curve {
  readonly xType: NumericType;
  readonly yType: NumericType;

  // Raw storage values, sorted by x
  private xs: number[];
  private ys: number[];

  constructor(points: Point[], types: StorageTypes = {}) {
    this.xType = types.xType ?? float64;
    this.yType = types.yType ?? float64;

    const raw = points.map((p) => ({
      x: this.xType.fromFloat(p.x),
      y: this.yType.fromFloat(p.y),
    }));
    raw.sort((a, b) => this.xType.toFloat(a.x) - this.xType.toFloat(b.x));

    this.xs = raw.map((p) => p.x);
    this.ys = raw.map((p) => p.y);

    // Fix first and/or last point if they are very close to 0 / 1
    const last = this.ys.length - 1;
    if (last >= 0) {
      this.ys[0] = snapRaw(this.ys[0], 0, this.yType);
      this.ys[last] = snapRaw(this.ys[last], 1, this.yType);
    }

    this.check();
  }

  /** Builds a curve from points already in the storage encodings. */
  static fromRaw(rawPoints: Point[], types: StorageTypes = {}): BreakpointCurve {
    const xType = types.xType ?? float64;
    const yType = types.yType ?? float64;
    return new BreakpointCurve(
      rawPoints.map((p) => ({ x: xType.toFloat(p.x), y: yType.toFloat(p.y) })),
      { xType, yType }
    );
  }

  /** Copies a breakpoint curve, or converts any other curve through its pairs. */
  static fromCurve(curve: Curve): BreakpointCurve {
    if (curve instanceof BreakpointCurve) return curve.clone();
    return new BreakpointCurve(curve.getValuesAsPairs());
  }

  static decode(bytes: Uint8Array, types: StorageTypes = {}): BreakpointCurve {
    return new BreakpointCurve(decodeCompact(bytes), types);
  }

  private xAt(i: number): number {
    return this.xType.toFloat(this.xs[i]);
  }

  private yAt(i: number): number {
    return this.yType.toFloat(this.ys[i]);
  }

  private check() {
    const n = this.xs.length;
    if (n < 2) {
      throw new CurveInvariantError(
        `A breakpoint curve needs at least 2 points, got ${n}.`
      );
    }
    if (this.yAt(0) !== 0) {
      throw new CurveInvariantError("First point does not define y = 0.");
    }
    if (this.yAt(n - 1) !== 1) {
      throw new CurveInvariantError("Last point does not define y = 1.");
    }
    for (let i = 0; i < n - 1; i++) {
      if (!(this.xAt(i) < this.xAt(i + 1))) {
        throw new CurveInvariantError(
          "Unsorted x values or duplicate x value."
        );
      }
      if (!(this.yAt(i) <= this.yAt(i + 1))) {
        throw new CurveInvariantError(
          "Y does not increase monotonously for increasing x."
        );
      }
    }
  }

  // Index of the left point of the segment containing x; needs minX < x < maxX
  private bracketByX(x: number): number {
    let start = 0;
    let end = this.xs.length - 1;
    while (start + 1 < end) {
      const mid = Math.floor((start + end) / 2);
      if (x < this.xAt(mid)) end = mid;
      else start = mid;
    }
    return start;
  }

  private bracketByY(y: number): number {
    let start = 0;
    let end = this.ys.length - 1;
    while (start + 1 < end) {
      const mid = Math.floor((start + end) / 2);
      if (y < this.yAt(mid)) end = mid;
      else start = mid;
    }
    return start;
  }

  get length(): number {
    return this.xs.length;
  }

  get rawPoints(): Point[] {
    return this.xs.map((x, i) => ({ x, y: this.ys[i] }));
  }

  minX(): number {
    return this.xAt(0);
  }

  maxX(): number {
    return this.xAt(this.xs.length - 1);
  }

  yAtX(x: number): number {
    if (x <= this.minX()) return 0;
    if (x >= this.maxX()) return 1;

    const i = this.bracketByX(x);
    const lx = this.xAt(i);
    const a = (x - lx) / (this.xAt(i + 1) - lx);
    return this.yAt(i) * (1 - a) + this.yAt(i + 1) * a;
  }

  xAtY(y: number): number {
    if (!(y >= 0 && y <= 1)) {
      throw new CurveInvariantError(`Y must be within [0, 1], got ${y}.`);
    }
    if (y === 0) return this.minX();
    if (y === 1) return this.maxX();

    const i = this.bracketByY(y);
    const ly = this.yAt(i);
    const a = (y - ly) / (this.yAt(i + 1) - ly);
    return this.xAt(i) * (1 - a) + this.xAt(i + 1) * a;
  }

  indexAtX(x: number): number {
    if (x <= this.minX()) return 0;
    if (x >= this.maxX()) return this.xs.length - 1;
    return this.bracketByX(x);
  }

  indexAtY(y: number): number {
    if (y <= 0) return 0;
    if (y >= 1) return this.ys.length - 1;
    return this.bracketByY(y);
  }

  getXValues(): number[] {
    return this.xs.map((x) => this.xType.toFloat(x));
  }

  getValuesAsPairs(): Point[] {
    return this.xs.map((_, i) => ({ x: this.xAt(i), y: this.yAt(i) }));
  }

  getValuesAsVectors(): [number[], number[]] {
    return [this.getXValues(), this.ys.map((y) => this.yType.toFloat(y))];
  }

  clone(): BreakpointCurve {
    return BreakpointCurve.fromRaw(this.rawPoints, {
      xType: this.xType,
      yType: this.yType,
    });
  }

  /**
   * Inserts a point between its neighbours. Only the neighbours are checked,
   * the rest of the curve is already valid.
   */
  addPoint(x: number, y: number) {
    const rawX = this.xType.fromFloat(x);
    const rawY = this.yType.fromFloat(y);
    const xf = this.xType.toFloat(rawX);
    const yf = this.yType.toFloat(rawY);
    const n = this.xs.length;

    if (!Number.isFinite(xf) || !Number.isFinite(yf)) {
      throw new CurveInvariantError(`New point ${x},${y} is not finite.`);
    }

    let i = 0;
    while (i < n && this.xAt(i) < xf) i++;

    if (i < n && this.xAt(i) === xf) {
      throw new CurveInvariantError(`Duplicate x value: ${x}`);
    }
    if ((i > 0 && this.yAt(i - 1) > yf) || (i < n && yf > this.yAt(i))) {
      throw new CurveInvariantError(`New point ${x},${y} breaks monotony.`);
    }
    if (i === 0 && yf !== 0) {
      throw new CurveInvariantError(
        `New first point ${x},${y} does not define y = 0.`
      );
    }
    if (i === n && yf !== 1) {
      throw new CurveInvariantError(
        `New last point ${x},${y} does not define y = 1.`
      );
    }

    this.xs.splice(i, 0, rawX);
    this.ys.splice(i, 0, rawY);
  }

  /**
   * Douglas–Peucker simplification: drops points closer than tolerance to
   * the chord of their range. Tolerance 0 only removes collinear points.
   */
  simplify(tolerance: number) {
    const before = this.xs.length;
    this.retain(douglasPeucker(this.getValuesAsPairs(), tolerance));
    logger.debug("Simplified curve", {
      tolerance,
      before,
      after: this.xs.length,
    });
  }

  /**
   * Removes the least significant points until at most maxPoints are left.
   * First and last point always survive.
   */
  simplifyFixed(maxPoints: number) {
    if (!Number.isInteger(maxPoints) || maxPoints < 2) {
      throw new CurveInvariantError(
        `Cannot reduce a curve to fewer than 2 points (got ${maxPoints}).`
      );
    }
    const before = this.xs.length;
    this.retain(reduceToCount(this.getValuesAsPairs(), maxPoints));
    logger.debug("Reduced curve to point budget", {
      maxPoints,
      before,
      after: this.xs.length,
    });
  }

  private retain(indices: number[]) {
    this.xs = indices.map((i) => this.xs[i]);
    this.ys = indices.map((i) => this.ys[i]);
  }

  /** Full-resolution compact encoding. */
  encode(): Uint8Array {
    return encodeCompact(this.getValuesAsPairs());
  }

  /**
   * Compact encoding that fits into maxBytes, simplifying a copy of the curve
   * when it has too many points.
   */
  encodeLimited(maxBytes: number): Uint8Array {
    const budget = compactPointBudget(maxBytes);
    if (this.xs.length <= budget) return this.encode();

    const reduced = this.clone();
    reduced.simplifyFixed(budget);
    logger.info("Simplified curve to fit compact byte budget", {
      maxBytes,
      points: this.xs.length,
      kept: reduced.length,
    });
    return reduced.encode();
  }

  toString(): string {
    return summarize("BreakpointCurve", this, this.xs.length);
  }
}
