import dotenv from "dotenv";
import { MAX_SWEEP_INTERVAL_MS } from "../cache/expiry-sweeper.js";
import { createMemoryCacheStore } from "../cache/memory-cache-store.js";
import type { CacheStore } from "../cache/cache-store.js";

export type AppConfig = {
  defaultTtlMs: number | undefined;
  sweepIntervalMs: number;
};

const DEFAULT_SWEEP_INTERVAL_MS = 10 * 60 * 1000;

export function getAppConfig(): AppConfig {
  dotenv.config();
  console.log("[app-config:getAppConfig] env loaded");

  const defaultTtlMs = parseNumber(
    process.env.CACHE_DEFAULT_TTL_MS,
    undefined,
    "defaultTtlMs",
  );
  const sweepIntervalMs = parseNumber(
    process.env.CACHE_SWEEP_INTERVAL_MS,
    DEFAULT_SWEEP_INTERVAL_MS,
    "sweepIntervalMs",
    MAX_SWEEP_INTERVAL_MS,
  );

  return { defaultTtlMs, sweepIntervalMs };
}

export function createCacheFromConfig<K, V extends NonNullable<unknown>>(
  config: AppConfig,
): CacheStore<K, V> {
  return createMemoryCacheStore<K, V>({ defaultTtlMs: config.defaultTtlMs });
}

function parseNumber<T extends number | undefined>(
  value: string | undefined,
  fallback: T,
  name: string,
  max = Number.MAX_SAFE_INTEGER,
): number | T {
  if (!value) {
    console.debug("[app-config:parseNumber] using default", name, fallback);
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > max) {
    console.warn(
      "[app-config:parseNumber] invalid value using default",
      name,
      value,
    );
    return fallback;
  }

  return parsed;
}
