/**
 * Error classes raised by curve construction, queries and decoding.
 */

export type CurveErrorCode =
  | "INVARIANT_VIOLATION"
  | "OUT_OF_RANGE"
  | "DECODE_FAILED";

export class CurveError extends Error {
  constructor(
    public readonly code: CurveErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "CurveError";

    // Maintain proper stack trace for where error was thrown (V8 engines only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Broken curve invariant or precondition: unsorted or duplicate x values,
 * decreasing y values, mismatched argument counts. Not meant to be recovered from.
 */
export class CurveInvariantError extends CurveError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "CurveInvariantError";
  }
}

/**
 * Query outside the keys of a curve set, raised by the strict lookup only.
 */
export class CurveRangeError extends CurveError {
  constructor(
    public readonly x: number,
    public readonly bound: "min" | "max",
    public readonly min: number,
    public readonly max: number
  ) {
    super(
      "OUT_OF_RANGE",
      bound === "min"
        ? `X ${x} is at or below the minimum key ${min}.`
        : `X ${x} is at or above the maximum key ${max}.`
    );
    this.name = "CurveRangeError";
  }
}

/**
 * Unreadable stored data: malformed bytes, a document that fails its schema, or
 * a stored curve that breaks its invariants (kept as `cause`).
 */
export class CurveDecodeError extends CurveError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: ErrorOptions
  ) {
    super("DECODE_FAILED", message, options);
    this.name = "CurveDecodeError";
  }
}
