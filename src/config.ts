import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const PersistenceFormatSchema = z.enum(["json", "compact"]);
export type PersistenceFormat = z.infer<typeof PersistenceFormatSchema>;

export const CurveConfigSchema = z.object({
  /** First/last y values this close to 0/1 are snapped on construction */
  snapEpsilon: z.number().positive().max(0.5).default(1e-4),
  /** Minimum severity written by the logger */
  logLevel: LogLevelSchema.default("warn"),
  /** Wire format used by the save/load helpers when none is given */
  persistenceFormat: PersistenceFormatSchema.default("json"),
});

export type CurveConfig = z.infer<typeof CurveConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(
    public readonly issues: string[],
    message: string
  ) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

const DEFAULT_CONFIG: CurveConfig = CurveConfigSchema.parse({});

let config: CurveConfig = { ...DEFAULT_CONFIG };

export function getConfig(): CurveConfig {
  return config;
}

export function setGlobalConfig(next: Partial<CurveConfig>) {
  const result = CurveConfigSchema.safeParse({ ...config, ...next });
  if (!result.success) {
    const issues = result.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigValidationError(
      issues,
      `Invalid curve configuration: ${issues.join("; ")}`
    );
  }
  config = result.data;
}

export function resetConfig() {
  config = { ...DEFAULT_CONFIG };
}

/**
 * Reads overrides from PROPCURVE_* environment variables.
 * Unset variables keep their current values.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
) {
  const next: Record<string, unknown> = {};
  if (env.PROPCURVE_SNAP_EPSILON !== undefined) {
    next.snapEpsilon = Number(env.PROPCURVE_SNAP_EPSILON);
  }
  if (env.PROPCURVE_LOG_LEVEL !== undefined) {
    next.logLevel = env.PROPCURVE_LOG_LEVEL.toLowerCase();
  }
  if (env.PROPCURVE_FORMAT !== undefined) {
    next.persistenceFormat = env.PROPCURVE_FORMAT.toLowerCase();
  }

  const partial = CurveConfigSchema.partial().safeParse(next);
  if (!partial.success) {
    const issues = partial.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ConfigValidationError(
      issues,
      `Invalid curve configuration in environment: ${issues.join("; ")}`
    );
  }
  setGlobalConfig(partial.data);
}
