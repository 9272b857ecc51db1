import { CurveInvariantError } from "./errors";

export const NUMERIC_TYPE_NAMES = [
  "float64",
  "float32",
  "f16",
  "u1f7",
  "u1f15",
  "i8",
] as const;

export type NumericTypeName = (typeof NUMERIC_TYPE_NAMES)[number];

/**
 * Converts between a storage encoding ("raw" value) and the canonical float.
 * Conversions are total: narrow types round, truncate or saturate.
 */
export interface NumericType {
  readonly name: NumericTypeName;
  readonly resolution: number; // worst round-trip error for values in [0, 1]
  toFloat(raw: number): number;
  fromFloat(value: number): number;
}

function saturate(v: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, v));
}

export const float64: NumericType = {
  name: "float64",
  resolution: 0,
  toFloat: (raw) => raw,
  fromFloat: (value) => value,
};

export const float32: NumericType = {
  name: "float32",
  resolution: 2 ** -24,
  toFloat: (raw) => raw,
  fromFloat: (value) => Math.fround(value),
};

/** Unsigned fixed point, 1 integer bit and 7 fraction bits. */
export const u1f7: NumericType = {
  name: "u1f7",
  resolution: 1 / 256,
  toFloat: (raw) => raw / 128,
  fromFloat: (value) =>
    Number.isNaN(value) ? 0 : saturate(Math.round(value * 128), 0, 255),
};

/** Unsigned fixed point, 1 integer bit and 15 fraction bits. */
export const u1f15: NumericType = {
  name: "u1f15",
  resolution: 1 / 65536,
  toFloat: (raw) => raw / 32768,
  fromFloat: (value) =>
    Number.isNaN(value) ? 0 : saturate(Math.round(value * 32768), 0, 65535),
};

/** Signed byte; casts truncate toward zero. */
export const i8: NumericType = {
  name: "i8",
  resolution: 1,
  toFloat: (raw) => raw,
  fromFloat: (value) =>
    Number.isNaN(value) ? 0 : saturate(Math.trunc(value), -128, 127),
};

// Scratch buffers for reading float32 bit patterns
const f32Scratch = new Float32Array(1);
const u32Scratch = new Uint32Array(f32Scratch.buffer);

function toHalfBits(value: number): number {
  f32Scratch[0] = value;
  const bits = u32Scratch[0];
  const sign = (bits >>> 16) & 0x8000;
  const exp = (bits >>> 23) & 0xff;
  const mant = bits & 0x7fffff;

  if (exp === 0xff) {
    // Inf / NaN
    return sign | 0x7c00 | (mant !== 0 ? 0x200 : 0);
  }

  const e = exp - 127 + 15;
  if (e >= 0x1f) return sign | 0x7c00;

  if (e <= 0) {
    // Subnormal half, or zero
    if (e < -10) return sign;
    const full = mant | 0x800000;
    const shift = 14 - e;
    let half = full >>> shift;
    const rest = full & ((1 << shift) - 1);
    const halfway = 1 << (shift - 1);
    if (rest > halfway || (rest === halfway && (half & 1) === 1)) half++;
    return sign | half;
  }

  // Round to nearest even; a carry out of the mantissa bumps the exponent
  let half = sign | (e << 10) | (mant >>> 13);
  const rest = mant & 0x1fff;
  if (rest > 0x1000 || (rest === 0x1000 && (half & 1) === 1)) half++;
  return half;
}

function fromHalfBits(bits: number): number {
  const sign = bits & 0x8000 ? -1 : 1;
  const exp = (bits >>> 10) & 0x1f;
  const mant = bits & 0x3ff;
  if (exp === 0) return sign * mant * 2 ** -24;
  if (exp === 0x1f) return mant !== 0 ? NaN : sign * Infinity;
  return sign * (1 + mant / 1024) * 2 ** (exp - 15);
}

/** IEEE 754 half precision, stored as its 16-bit pattern. */
export const f16: NumericType = {
  name: "f16",
  resolution: 2 ** -11,
  toFloat: fromHalfBits,
  fromFloat: toHalfBits,
};

export const numericTypes: Record<NumericTypeName, NumericType> = {
  float64,
  float32,
  f16,
  u1f7,
  u1f15,
  i8,
};

export function isNumericTypeName(name: string): name is NumericTypeName {
  return Object.prototype.hasOwnProperty.call(numericTypes, name);
}

export function numericType(name: string): NumericType {
  if (!isNumericTypeName(name)) {
    throw new CurveInvariantError(`Unknown numeric type: ${name}`);
  }
  return numericTypes[name];
}

/** Canonical value after a trip through the storage encoding. */
export function roundTrip(type: NumericType, value: number): number {
  return type.toFloat(type.fromFloat(value));
}
