import type { Curve } from "./types";

const QUANTILES: Array<[string, number]> = [
  ["min", 0],
  ["5%", 0.05],
  ["med", 0.5],
  ["95%", 0.95],
  ["max", 1],
];

/**
 * One-line description, e.g.
 * `BreakpointCurve (min=12.00, 5%=12.25, med=21.67, 95%=38.33, max=40.00) with 5 points`
 */
export function summarize(label: string, curve: Curve, count: number): string {
  const parts = QUANTILES.map(
    ([name, y]) => `${name}=${curve.xAtY(y).toFixed(2)}`
  );
  return `${label} (${parts.join(", ")}) with ${count} points`;
}
