import { afterEach, describe, it, expect } from "vitest";
import {
  ConfigValidationError,
  getConfig,
  loadConfigFromEnv,
  resetConfig,
  setGlobalConfig,
} from "./config";

describe("Config", () => {
  afterEach(() => {
    resetConfig();
  });

  it("should start from defaults", () => {
    expect(getConfig()).toEqual({
      snapEpsilon: 1e-4,
      logLevel: "warn",
      persistenceFormat: "json",
    });
  });

  it("should merge partial updates", () => {
    setGlobalConfig({ logLevel: "debug" });
    setGlobalConfig({ snapEpsilon: 0.001 });
    expect(getConfig()).toEqual({
      snapEpsilon: 0.001,
      logLevel: "debug",
      persistenceFormat: "json",
    });
  });

  it("should reject invalid values and keep the old ones", () => {
    expect(() => setGlobalConfig({ snapEpsilon: -1 })).toThrow(ConfigValidationError);
    expect(() => setGlobalConfig({ snapEpsilon: 0.9 })).toThrow(
      /^Invalid curve configuration: snapEpsilon: /
    );
    expect(getConfig().snapEpsilon).toBe(1e-4);
  });

  it("should read overrides from the environment", () => {
    loadConfigFromEnv({
      PROPCURVE_SNAP_EPSILON: "0.002",
      PROPCURVE_LOG_LEVEL: "DEBUG",
      PROPCURVE_FORMAT: "Compact",
    });
    expect(getConfig()).toEqual({
      snapEpsilon: 0.002,
      logLevel: "debug",
      persistenceFormat: "compact",
    });
  });

  it("should leave unset variables alone", () => {
    setGlobalConfig({ persistenceFormat: "compact" });
    loadConfigFromEnv({ PROPCURVE_LOG_LEVEL: "error" });
    expect(getConfig().persistenceFormat).toBe("compact");
    expect(getConfig().logLevel).toBe("error");
  });

  it("should report every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfigFromEnv({ PROPCURVE_SNAP_EPSILON: "abc", PROPCURVE_FORMAT: "xml" });
    } catch (e: unknown) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.issues).toHaveLength(2);
    }
    expect(getConfig().persistenceFormat).toBe("json");
  });
});
