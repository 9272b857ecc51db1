/**
 * Save/load pairs for every curve value.
 *
 * Both formats carry the same self-describing document with the raw storage
 * values, so narrow types survive a round trip unchanged: "json" as UTF-8
 * text, "compact" as MessagePack. The quantized byte format of breakpoint
 * curves is separate (`BreakpointCurve.encode`).
 */

import { decode as decodeMsgpack, encode as encodeMsgpack } from "@msgpack/msgpack";
import { z } from "zod";
import { getConfig, type PersistenceFormat } from "../config";
import { BreakpointCurve } from "../core/breakpoint";
import { CurveDecodeError, CurveInvariantError } from "../core/errors";
import { NUMERIC_TYPE_NAMES, numericType } from "../core/numeric";
import { FixedStepCurve } from "../core/regular";
import { createLogger } from "../logger";
import { CurveSet } from "./curveSet";

const logger = createLogger("serde");

export const SERDE_VERSION = 1;

const NumericTypeNameSchema = z.enum(NUMERIC_TYPE_NAMES);

export const BreakpointDocSchema = z.object({
  version: z.literal(SERDE_VERSION),
  kind: z.literal("breakpoint"),
  xType: NumericTypeNameSchema,
  yType: NumericTypeNameSchema,
  points: z.array(z.tuple([z.number(), z.number()])),
});

export const FixedStepDocSchema = z.object({
  version: z.literal(SERDE_VERSION),
  kind: z.literal("fixed-step"),
  xType: NumericTypeNameSchema,
  yType: NumericTypeNameSchema,
  origin: z.number(),
  step: z.number(),
  samples: z.array(z.number()),
});

const CurveDocSchema = z.discriminatedUnion("kind", [
  BreakpointDocSchema,
  FixedStepDocSchema,
]);

export const CurveSetDocSchema = z.object({
  version: z.literal(SERDE_VERSION),
  kind: z.literal("curve-set"),
  keyType: NumericTypeNameSchema,
  curves: z.array(z.object({ key: z.number(), curve: CurveDocSchema })),
});

export type BreakpointDoc = z.infer<typeof BreakpointDocSchema>;
export type FixedStepDoc = z.infer<typeof FixedStepDocSchema>;
export type CurveSetDoc = z.infer<typeof CurveSetDocSchema>;

export type StoredCurve = BreakpointCurve | FixedStepCurve;

export function fileExtension(format: PersistenceFormat): string {
  return format === "json" ? "json" : "icrv";
}

function toDoc(curve: StoredCurve): BreakpointDoc | FixedStepDoc {
  if (curve instanceof BreakpointCurve) {
    return {
      version: SERDE_VERSION,
      kind: "breakpoint",
      xType: curve.xType.name,
      yType: curve.yType.name,
      points: curve.rawPoints.map((p): [number, number] => [p.x, p.y]),
    };
  }
  const raw = curve.rawValues;
  return {
    version: SERDE_VERSION,
    kind: "fixed-step",
    xType: curve.xType.name,
    yType: curve.yType.name,
    origin: raw.origin,
    step: raw.step,
    samples: raw.samples,
  };
}

function fromDoc(doc: BreakpointDoc | FixedStepDoc): StoredCurve {
  const types = {
    xType: numericType(doc.xType),
    yType: numericType(doc.yType),
  };
  if (doc.kind === "breakpoint") {
    return BreakpointCurve.fromRaw(
      doc.points.map(([x, y]) => ({ x, y })),
      types
    );
  }
  return FixedStepCurve.fromRaw(doc.origin, doc.step, doc.samples, types);
}

function encodeDoc(doc: unknown, format: PersistenceFormat): Uint8Array {
  if (format === "compact") return encodeMsgpack(doc);
  return new TextEncoder().encode(JSON.stringify(doc));
}

function parseDoc(bytes: Uint8Array, format: PersistenceFormat, what: string): unknown {
  try {
    if (format === "compact") return decodeMsgpack(bytes);
    return JSON.parse(new TextDecoder().decode(bytes));
  } catch (e: unknown) {
    logger.error(`Failed to parse ${what}`, e, { format });
    const name = format === "compact" ? "MessagePack" : "JSON";
    throw new CurveDecodeError(`Invalid ${what}: not a ${name} document.`, [], {
      cause: e,
    });
  }
}

/**
 * Reads and validates a document, then builds the value from it. A value that
 * breaks its own invariants is reported as a decode error too.
 */
function load<T, R>(
  bytes: Uint8Array,
  format: PersistenceFormat,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
  build: (doc: T) => R
): R {
  const result = schema.safeParse(parseDoc(bytes, format, what));
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    logger.error(`Failed to load ${what}`, undefined, { format, issues });
    throw new CurveDecodeError(`Invalid ${what}: ${issues.join("; ")}`, issues);
  }

  try {
    return build(result.data);
  } catch (e: unknown) {
    if (!(e instanceof CurveInvariantError)) throw e;
    logger.error(`Stored ${what} is not a valid value`, e, { format });
    throw new CurveDecodeError(`Invalid ${what}: ${e.message}`, [e.message], {
      cause: e,
    });
  }
}

export function serializeCurve(
  curve: StoredCurve,
  format: PersistenceFormat = getConfig().persistenceFormat
): Uint8Array {
  return encodeDoc(toDoc(curve), format);
}

export function deserializeBreakpointCurve(
  bytes: Uint8Array,
  format: PersistenceFormat = getConfig().persistenceFormat
): BreakpointCurve {
  return load(bytes, format, BreakpointDocSchema, "breakpoint curve", (doc) =>
    BreakpointCurve.fromRaw(
      doc.points.map(([x, y]) => ({ x, y })),
      { xType: numericType(doc.xType), yType: numericType(doc.yType) }
    )
  );
}

export function deserializeFixedStepCurve(
  bytes: Uint8Array,
  format: PersistenceFormat = getConfig().persistenceFormat
): FixedStepCurve {
  return load(bytes, format, FixedStepDocSchema, "fixed-step curve", (doc) =>
    FixedStepCurve.fromRaw(doc.origin, doc.step, doc.samples, {
      xType: numericType(doc.xType),
      yType: numericType(doc.yType),
    })
  );
}

export function serializeCurveSet<C extends StoredCurve>(
  set: CurveSet<C>,
  format: PersistenceFormat = getConfig().persistenceFormat
): Uint8Array {
  const doc: CurveSetDoc = {
    version: SERDE_VERSION,
    kind: "curve-set",
    keyType: set.keyType.name,
    curves: set.entries().map((e) => ({ key: e.key, curve: toDoc(e.curve) })),
  };
  return encodeDoc(doc, format);
}

export function deserializeCurveSet(
  bytes: Uint8Array,
  format: PersistenceFormat = getConfig().persistenceFormat
): CurveSet<StoredCurve> {
  return load(bytes, format, CurveSetDocSchema, "curve set", (doc) => {
    const keyType = numericType(doc.keyType);
    const set = new CurveSet<StoredCurve>({ keyType });
    for (const entry of doc.curves) {
      set.addCurve(keyType.toFloat(entry.key), fromDoc(entry.curve));
    }
    return set;
  });
}
