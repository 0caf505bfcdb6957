import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCacheFromConfig, getAppConfig } from "../src/config/app-config.js";

beforeEach(() => {
  vi.spyOn(console, "debug").mockImplementation(() => undefined);
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
});

describe("getAppConfig", () => {
  it("falls back to defaults when nothing is set", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "");

    expect(getAppConfig()).toEqual({
      defaultTtlMs: undefined,
      sweepIntervalMs: 600_000,
    });
  });

  it("reads ttl and sweep interval from the environment", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "60000");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "120000");

    expect(getAppConfig()).toEqual({
      defaultTtlMs: 60_000,
      sweepIntervalMs: 120_000,
    });
  });

  it("ignores invalid values with a warning", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "soon");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "-5");

    expect(getAppConfig()).toEqual({
      defaultTtlMs: undefined,
      sweepIntervalMs: 600_000,
    });
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

describe("getAppConfig sweep interval bounds", () => {
  it("falls back when the sweep interval overflows the timer", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "2592000000");

    expect(getAppConfig().sweepIntervalMs).toBe(600_000);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it("keeps the longest interval the timer can hold", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "2147483647");

    expect(getAppConfig().sweepIntervalMs).toBe(2_147_483_647);
  });

  it("does not cap the default ttl at the timer limit", () => {
    vi.stubEnv("CACHE_DEFAULT_TTL_MS", "2592000000");
    vi.stubEnv("CACHE_SWEEP_INTERVAL_MS", "");

    expect(getAppConfig().defaultTtlMs).toBe(2_592_000_000);
  });
});

describe("createCacheFromConfig", () => {
  it("applies the configured default ttl", () => {
    const cache = createCacheFromConfig<string, string>({
      defaultTtlMs: 30_000,
      sweepIntervalMs: 600_000,
    });
    expect(cache.defaultTtlMs).toBe(30_000);
    expect(cache.isEmpty()).toBe(true);
  });
});
