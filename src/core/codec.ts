/**
 * Compact curve format
 *
 * Fixed layout, little-endian:
 *
 *   byte 0       format tag (1)
 *   bytes 1-4    min x, float32
 *   bytes 5-8    max x, float32
 *   byte 9       point count n
 *   10 + 2i      x of point i, quantized to 0..255 between min x and max x
 *   11 + 2i      y of point i, quantized to 0..255
 *
 * Quantization rounds half up: 127.5 becomes 128.
 */

import { createLogger } from "../logger";
import { CurveDecodeError, CurveInvariantError } from "./errors";
import type { Point } from "./types";

export const COMPACT_FORMAT_TAG = 1;
export const COMPACT_HEADER_BYTES = 10;
export const COMPACT_MAX_POINTS = 255;
export const QUANTIZATION_STEP = 1 / 255;

const logger = createLogger("codec");

function quantize(v: number): number {
  return Math.min(255, Math.max(0, Math.round(v * 255)));
}

/**
 * Largest point count that fits into maxBytes.
 */
export function compactPointBudget(maxBytes: number): number {
  const budget = Math.min(
    COMPACT_MAX_POINTS,
    Math.floor((maxBytes - COMPACT_HEADER_BYTES) / 2)
  );
  if (!(budget >= 2)) {
    throw new CurveInvariantError(
      `${maxBytes} bytes cannot hold a curve of at least 2 points.`
    );
  }
  return budget;
}

/**
 * Encodes sorted points. The first and last point define min x and max x.
 */
export function encodeCompact(points: Point[]): Uint8Array {
  const n = points.length;
  if (n < 2) {
    throw new CurveInvariantError(`Cannot encode a curve of ${n} points.`);
  }
  if (n > COMPACT_MAX_POINTS) {
    throw new CurveInvariantError(
      `The compact format holds at most ${COMPACT_MAX_POINTS} points, got ${n}.`
    );
  }

  // Quantize against the bounds as the header stores them
  const minX = Math.fround(points[0].x);
  const maxX = Math.fround(points[n - 1].x);
  const width = maxX - minX;

  const bytes = new Uint8Array(COMPACT_HEADER_BYTES + 2 * n);
  const view = new DataView(bytes.buffer);
  view.setUint8(0, COMPACT_FORMAT_TAG);
  view.setFloat32(1, minX, true);
  view.setFloat32(5, maxX, true);
  view.setUint8(9, n);

  points.forEach((p, i) => {
    bytes[COMPACT_HEADER_BYTES + 2 * i] = quantize((p.x - minX) / width);
    bytes[COMPACT_HEADER_BYTES + 2 * i + 1] = quantize(p.y);
  });

  return bytes;
}

/**
 * Decodes a compact buffer back into points.
 *
 * Consecutive points sharing an x byte collapse into the first of them, so
 * the result may hold fewer points than were encoded. The last point of the
 * buffer always survives, replacing the kept point of its run, so the curve
 * still ends at y = 1.
 */
export function decodeCompact(bytes: Uint8Array): Point[] {
  if (bytes.length < COMPACT_HEADER_BYTES) {
    throw new CurveDecodeError(
      `Byte array too short for the compact header: ${bytes.length} bytes.`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const tag = view.getUint8(0);
  if (tag !== COMPACT_FORMAT_TAG) {
    throw new CurveDecodeError(`Unknown compact format tag: ${tag}`);
  }

  const minX = view.getFloat32(1, true);
  const maxX = view.getFloat32(5, true);
  const n = view.getUint8(9);

  if (bytes.length < COMPACT_HEADER_BYTES + 2 * n) {
    throw new CurveDecodeError(
      `Byte array too short for declared length: ${n} points need ${
        COMPACT_HEADER_BYTES + 2 * n
      } bytes, got ${bytes.length}.`
    );
  }

  const points: Point[] = [];
  let previousXByte = -1;
  let collapsed = 0;

  for (let i = 0; i < n; i++) {
    const xByte = bytes[COMPACT_HEADER_BYTES + 2 * i];
    const yByte = bytes[COMPACT_HEADER_BYTES + 2 * i + 1];
    const point = {
      x: minX + (xByte / 255) * (maxX - minX),
      y: yByte / 255,
    };

    if (xByte !== previousXByte) {
      points.push(point);
      previousXByte = xByte;
    } else {
      collapsed++;
      if (i === n - 1) points[points.length - 1] = point;
    }
  }

  if (collapsed > 0) {
    logger.warn("Collapsed points sharing a quantized x value", {
      declared: n,
      decoded: points.length,
    });
  }

  return points;
}
