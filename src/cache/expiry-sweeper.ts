export type ExpirySweeper = {
  stop: () => void;
};

type SweepableCache = {
  removeExpired: () => number;
};

// setInterval treats longer delays as 1 ms
export const MAX_SWEEP_INTERVAL_MS = 2 ** 31 - 1;

export function startExpirySweeper(
  cache: SweepableCache,
  intervalMs: number,
): ExpirySweeper {
  if (
    !Number.isFinite(intervalMs) ||
    intervalMs <= 0 ||
    intervalMs > MAX_SWEEP_INTERVAL_MS
  ) {
    throw new RangeError(
      `Sweep interval must be between 1 and ${MAX_SWEEP_INTERVAL_MS} milliseconds, got ${intervalMs}.`,
    );
  }

  console.log("[expiry-sweeper:startExpirySweeper] sweeper started", intervalMs);
  const timer = setInterval(() => {
    const removed = cache.removeExpired();
    console.debug("[expiry-sweeper:sweep] expired entries removed", removed);
  }, intervalMs);
  timer.unref();

  let stopped = false;
  return {
    stop: () => {
      if (stopped) {
        return;
      }
      stopped = true;
      clearInterval(timer);
      console.log("[expiry-sweeper:stop] sweeper stopped");
    },
  };
}
