export type { Curve, Point, StorageTypes, TypedCurve } from "./core/types";
export {
  CurveError,
  CurveInvariantError,
  CurveRangeError,
  CurveDecodeError,
} from "./core/errors";
export type { CurveErrorCode } from "./core/errors";
export {
  NUMERIC_TYPE_NAMES,
  float64,
  float32,
  f16,
  u1f7,
  u1f15,
  i8,
  numericTypes,
  numericType,
  isNumericTypeName,
  roundTrip,
} from "./core/numeric";
export type { NumericType, NumericTypeName } from "./core/numeric";
export { FixedStepCurve } from "./core/regular";
export { BreakpointCurve } from "./core/breakpoint";
export { douglasPeucker, reduceToCount, tripleDeviation } from "./core/reducer";
export {
  COMPACT_FORMAT_TAG,
  COMPACT_HEADER_BYTES,
  COMPACT_MAX_POINTS,
  QUANTIZATION_STEP,
  compactPointBudget,
  encodeCompact,
  decodeCompact,
} from "./core/codec";
export { weightedAverage, average, distance, mergeXValues } from "./core/ops";
export { CurveSet } from "./engine/curveSet";
export type { CurveSetEntry } from "./engine/curveSet";
export {
  SERDE_VERSION,
  fileExtension,
  serializeCurve,
  deserializeBreakpointCurve,
  deserializeFixedStepCurve,
  serializeCurveSet,
  deserializeCurveSet,
} from "./engine/serde";
export type { StoredCurve } from "./engine/serde";
export {
  getConfig,
  setGlobalConfig,
  resetConfig,
  loadConfigFromEnv,
  ConfigValidationError,
} from "./config";
export type { CurveConfig, LogLevel, PersistenceFormat } from "./config";
export { Logger, createLogger } from "./logger";
