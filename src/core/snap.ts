import { getConfig } from "../config";
import type { NumericType } from "./numeric";

/**
 * How far the first and last y value of a curve may sit from 0 and 1 before
 * construction fails. Values within it are snapped to exactly 0 and 1.
 */
export function endTolerance(yType: NumericType): number {
  return Math.max(getConfig().snapEpsilon, yType.resolution);
}

/** Raw value for `target` when `value` lies within the end tolerance of it. */
export function snapRaw(
  raw: number,
  target: 0 | 1,
  yType: NumericType
): number {
  const value = yType.toFloat(raw);
  return Math.abs(value - target) <= endTolerance(yType)
    ? yType.fromFloat(target)
    : raw;
}
