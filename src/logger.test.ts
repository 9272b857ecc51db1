import { afterEach, describe, it, expect, vi } from "vitest";
import { resetConfig, setGlobalConfig } from "./config";
import { createLogger } from "./logger";

describe("Logger", () => {
  afterEach(() => {
    resetConfig();
    vi.restoreAllMocks();
  });

  it("should write warnings as JSON lines", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("test").warn("Something odd", { points: 3 });

    expect(warn).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(warn.mock.calls[0][0]));
    expect(entry.severity).toBe("WARNING");
    expect(entry.message).toBe("Something odd");
    expect(entry.component).toBe("test");
    expect(entry.points).toBe(3);
    expect(typeof entry.timestamp).toBe("string");
  });

  it("should drop entries below the configured level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = createLogger("test");
    logger.info("hidden");
    logger.debug("hidden");
    expect(log).not.toHaveBeenCalled();

    setGlobalConfig({ logLevel: "info" });
    logger.info("shown");
    logger.debug("hidden");
    expect(log).toHaveBeenCalledTimes(1);
  });

  it("should attach error details", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("test").error("Failed", new RangeError("bad value"), { step: 2 });

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry.severity).toBe("ERROR");
    expect(entry.step).toBe(2);
    expect(entry.error.name).toBe("RangeError");
    expect(entry.error.message).toBe("bad value");
  });

  it("should wrap thrown values that are not errors", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("test").error("Failed", "plain text");

    const entry = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry.error).toEqual({ name: "NonError", message: "plain text" });
  });

  it("should stay quiet when silenced", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setGlobalConfig({ logLevel: "silent" });
    const logger = createLogger("test");
    logger.error("hidden");
    expect(error).not.toHaveBeenCalled();
    expect(logger.isEnabled("ERROR")).toBe(false);
  });
});
