import { createLogger } from "../logger";
import { BreakpointCurve } from "./breakpoint";
import { CurveInvariantError } from "./errors";
import type { Curve, Point } from "./types";

const logger = createLogger("ops");

/**
 * Sorted union of the x values of all curves, without duplicates.
 */
export function mergeXValues(curves: Curve[]): number[] {
  const all: number[] = [];
  for (const c of curves) all.push(...c.getXValues());
  all.sort((a, b) => a - b);

  const merged: number[] = [];
  for (const x of all) {
    if (merged.length === 0 || merged[merged.length - 1] !== x) merged.push(x);
  }
  return merged;
}

/**
 * Weighted average of several curves, evaluated at every x value any of them
 * defines. The weights are normalized to add up to 1. Points that end up
 * collinear are dropped from the result.
 */
export function weightedAverage(curves: Curve[], weights: number[]): BreakpointCurve {
  if (curves.length !== weights.length) {
    throw new CurveInvariantError(
      `Invalid arguments: number of curves (${curves.length}) and weights (${weights.length}) must be the same.`
    );
  }
  if (curves.length === 0) {
    throw new CurveInvariantError("Cannot average an empty list of curves.");
  }

  const total = weights.reduce((a, b) => a + b, 0);
  if (total === 0 || !Number.isFinite(total)) {
    throw new CurveInvariantError(`Weights must have a non-zero sum, got ${total}.`);
  }
  const f = 1 / total;

  const points: Point[] = mergeXValues(curves).map((x) => {
    let y = 0;
    curves.forEach((c, i) => {
      y += c.yAtX(x) * weights[i];
    });
    return { x, y: y * f };
  });

  const result = new BreakpointCurve(points);
  result.simplify(0);

  logger.debug("Averaged curves", {
    curves: curves.length,
    merged: points.length,
    kept: result.length,
  });
  return result;
}

/** Unweighted average. */
export function average(curves: Curve[]): BreakpointCurve {
  return weightedAverage(
    curves,
    curves.map(() => 1)
  );
}

/**
 * Area between the graphs of two curves.
 */
export function distance(a: Curve, b: Curve): number {
  const diffs = mergeXValues([a, b]).map((x) => ({
    x,
    d: a.yAtX(x) - b.yAtX(x),
  }));

  let area = 0;
  for (let i = 0; i + 1 < diffs.length; i++) {
    const { x: x1, d: d1 } = diffs[i];
    const { x: x2, d: d2 } = diffs[i + 1];
    const h = x2 - x1;
    const l = Math.abs(d1);
    const r = Math.abs(d2);

    if (d1 * d2 >= 0) {
      // Same signs: true trapezoid or triangle
      area += ((l + r) * h) / 2;
    } else {
      // Different signs: the curves cross, self-intersecting trapezoid
      area += (h / 2) * ((l * l + r * r) / (l + r));
    }
  }
  return area;
}
