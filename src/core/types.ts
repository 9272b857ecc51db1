import type { NumericType } from "./numeric";

export interface Point {
  x: number; // domain value, e.g. elapsed time
  y: number; // cumulative fraction in [0, 1]
}

/**
 * Query contract shared by every curve representation.
 * All values are canonical floats, whatever the storage types are.
 */
export interface Curve {
  minX(): number;
  maxX(): number;
  yAtX(x: number): number;
  xAtY(y: number): number;
  getValuesAsPairs(): Point[];
  getValuesAsVectors(): [number[], number[]];
  getXValues(): number[];
}

/**
 * Same queries in the raw storage encodings of the curve.
 */
export interface TypedCurve {
  typedMinX(): number;
  typedMaxX(): number;
  typedYAtX(rawX: number): number;
  typedXAtY(rawY: number): number;
}

export interface StorageTypes {
  xType?: NumericType;
  yType?: NumericType;
}
