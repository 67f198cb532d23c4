import { afterEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";
import {
  applyEnvOverrides,
  loadConfig,
} from "../../src/infrastructure/config/loader.js";
import { createLogger, resolveLoggingConfig } from "../../src/utils/logger.js";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      logging: { level: "info", enabled: true },
    });
  });

  it("reads level and enablement from the environment", () => {
    expect(
      loadConfig({ CALSCHED_LOG_LEVEL: "DEBUG", CALSCHED_LOG_ENABLED: "false" }),
    ).toEqual({
      logging: { level: "debug", enabled: false },
    });
  });

  it("disables logging under the test runner", () => {
    expect(loadConfig({ VITEST: "true", CALSCHED_LOG_ENABLED: "true" })).toEqual({
      logging: { level: "info", enabled: false },
    });
    expect(loadConfig({ NODE_ENV: "test" }).logging.enabled).toBe(false);
  });

  it("lets the environment override file values", () => {
    const config = loadConfig(
      { CALSCHED_LOG_LEVEL: "warn" },
      { logging: { level: "trace", enabled: false } },
    );

    expect(config.logging).toEqual({ level: "warn", enabled: false });
  });

  it("ignores an unparseable boolean", () => {
    expect(loadConfig({ CALSCHED_LOG_ENABLED: "sometimes" }).logging.enabled).toBe(
      true,
    );
  });

  it("rejects an unknown level", () => {
    expect(() => loadConfig({ CALSCHED_LOG_LEVEL: "verbose" })).toThrow(ZodError);
  });
});

describe("applyEnvOverrides", () => {
  it("keeps unrelated keys", () => {
    expect(applyEnvOverrides({ extra: 1 }, {})).toEqual({ extra: 1, logging: {} });
  });
});

describe("createLogger", () => {
  it("applies the configured level", () => {
    const logger = createLogger({ level: "warn", enabled: true });
    expect(logger.level).toBe("warn");
  });
});

describe("resolveLoggingConfig", () => {
  it("falls back to the default level for an invalid one", () => {
    expect(resolveLoggingConfig({ CALSCHED_LOG_LEVEL: "verbose" })).toEqual({
      config: { level: "info", enabled: true },
      rejectedLevel: "verbose",
    });
  });

  it("keeps other overrides when the level is invalid", () => {
    expect(
      resolveLoggingConfig({
        CALSCHED_LOG_LEVEL: "verbose",
        CALSCHED_LOG_ENABLED: "false",
      }).config,
    ).toEqual({ level: "info", enabled: false });
  });

  it("reports nothing rejected for a valid level", () => {
    expect(resolveLoggingConfig({ CALSCHED_LOG_LEVEL: "error" })).toEqual({
      config: { level: "error", enabled: true },
    });
  });
});

describe("module loading with a bad log level", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("still loads the builder", async () => {
    vi.stubEnv("CALSCHED_LOG_LEVEL", "verbose");
    vi.resetModules();

    const { CalendarIntervalScheduleBuilder } = await import(
      "../../src/application/calendar-interval-schedule.js"
    );

    expect(CalendarIntervalScheduleBuilder.create().build()).toEqual({
      repeatInterval: 1,
      repeatIntervalUnit: "day",
      misfireInstruction: 0,
    });
  });
});
