/**
 * Structured JSON-line logger.
 *
 * Each entry is a single JSON object with `severity`, `message`, `timestamp`
 * and `component`, plus any extra fields passed by the caller. The threshold
 * is read from the global configuration on every call.
 */

import { getConfig, type LogLevel } from "./config";

export type Severity = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const LEVEL_THRESHOLD: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: Number.POSITIVE_INFINITY,
};

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  component: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export class Logger {
  constructor(public readonly component: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("DEBUG", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("INFO", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("WARNING", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("ERROR", message, { ...data, ...formatError(error) });
  }

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= LEVEL_THRESHOLD[getConfig().logLevel];
  }

  private log(severity: Severity, message: string, data?: Record<string, unknown>) {
    if (!this.isEnabled(severity)) return;

    const entry: LogEntry = {
      ...data,
      severity,
      message,
      timestamp: new Date().toISOString(),
      component: this.component,
    };
    const line = JSON.stringify(entry);

    if (severity === "ERROR") console.error(line);
    else if (severity === "WARNING") console.warn(line);
    else console.log(line);
  }
}

function formatError(error: unknown): Pick<LogEntry, "error"> {
  if (error === undefined) return {};
  if (error instanceof Error) {
    return {
      error: { name: error.name, message: error.message, stack: error.stack },
    };
  }
  return { error: { name: "NonError", message: String(error) } };
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
