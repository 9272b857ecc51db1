import type { Point } from "./types";

/**
 * Distance of p from the line through s whose normal vector is (nx, ny).
 */
function distanceToLine(p: Point, s: Point, nx: number, ny: number): number {
  const dx = p.x - s.x;
  const dy = p.y - s.y;
  return Math.abs((dx * nx + dy * ny) / Math.sqrt(nx * nx + ny * ny));
}

/**
 * How far b sits off the chord from a to c.
 */
export function tripleDeviation(a: Point, b: Point, c: Point): number {
  return distanceToLine(b, a, a.y - c.y, c.x - a.x);
}

/**
 * Douglas–Peucker reduction. Returns the indices of the points to keep,
 * ascending. The first and last point are always kept, and a tolerance of 0
 * only drops points lying exactly on a chord.
 */
export function douglasPeucker(points: Point[], tolerance: number): number[] {
  const n = points.length;
  const dropped = new Array<boolean>(n).fill(false);

  // Work-list of [start, end] index ranges instead of recursion
  const ranges: Array<[number, number]> = n >= 3 ? [[0, n - 1]] : [];

  while (ranges.length > 0) {
    const range = ranges.pop();
    if (!range) break;
    const [start, end] = range;
    if (end - start < 2) continue; // keep 1 or 2 points

    const s = points[start];
    const e = points[end];
    const nx = s.y - e.y;
    const ny = e.x - s.x;

    let maxD = -1;
    let maxI = start;
    for (let i = start + 1; i < end; i++) {
      const d = distanceToLine(points[i], s, nx, ny);
      if (d > maxD) {
        maxD = d;
        maxI = i;
      }
    }

    if (maxD <= tolerance) {
      for (let i = start + 1; i < end; i++) dropped[i] = true;
    } else {
      ranges.push([start, maxI], [maxI, end]);
    }
  }

  const kept: number[] = [];
  for (let i = 0; i < n; i++) {
    if (!dropped[i]) kept.push(i);
  }
  return kept;
}

/**
 * Greedy reduction to at most maxPoints: repeatedly removes the middle point
 * of the consecutive triple that deviates least from its chord. Ties go to
 * the first triple. Returns the indices to keep, ascending.
 */
export function reduceToCount(points: Point[], maxPoints: number): number[] {
  const kept = points.map((_, i) => i);

  while (kept.length > maxPoints) {
    let bestIdx = -1;
    let minD = Number.POSITIVE_INFINITY;

    for (let i = 1; i < kept.length - 1; i++) {
      const d = tripleDeviation(
        points[kept[i - 1]],
        points[kept[i]],
        points[kept[i + 1]]
      );
      if (d < minD) {
        minD = d;
        bestIdx = i;
      }
    }

    if (bestIdx === -1) {
      // Fewer than 3 points left
      break;
    }
    kept.splice(bestIdx, 1);
  }

  return kept;
}
