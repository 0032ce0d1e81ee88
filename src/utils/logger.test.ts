import { describe, test, expect, vi, afterEach } from "vitest";
import { logger } from "./logger";

describe("logger", () => {
  const originalLevel = process.env.LOG_LEVEL;
  const originalDebug = process.env.DEBUG;

  function restore(key: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  afterEach(() => {
    vi.restoreAllMocks();
    restore("LOG_LEVEL", originalLevel);
    restore("DEBUG", originalDebug);
  });

  test("writes to stderr at or above the configured level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.env.LOG_LEVEL = "warn";

    logger.info("hidden");
    logger.warn("shown");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain("shown");
  });

  test("is silent when LOG_LEVEL is silent", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.env.LOG_LEVEL = "silent";

    logger.error("nothing");

    expect(spy).not.toHaveBeenCalled();
  });

  test("requires DEBUG=true for debug output", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    process.env.LOG_LEVEL = "debug";
    delete process.env.DEBUG;

    logger.debug("quiet");
    process.env.DEBUG = "true";
    logger.debug("loud");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain("loud");
  });
});
