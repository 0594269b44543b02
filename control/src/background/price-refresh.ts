// background/price-refresh.ts - Periodic price list refresh
//
// One refresh at a time: a tick that fires while the previous refresh is
// still running is skipped. Failed regions are retried on the next tick.

import type { PriceListRefresher, RegionRefreshResult } from "../offer/refresh";

export interface PriceRefreshTask {
  /** Run a refresh now unless one is already in flight; null when skipped. */
  runOnce(): Promise<RegionRefreshResult[] | null>;
  stop(): void;
}

export function startPriceRefreshTask(refresher: PriceListRefresher, intervalMs: number): PriceRefreshTask {
  let running = false;

  const runOnce = async (): Promise<RegionRefreshResult[] | null> => {
    if (running) {
      console.debug("[control] Price refresh still running, skipping tick");
      return null;
    }
    running = true;
    try {
      return await refresher.refreshAll();
    } finally {
      running = false;
    }
  };

  const handle = setInterval(() => {
    runOnce().catch(err => console.error("[control] priceRefresh error:", err));
  }, intervalMs);

  return {
    runOnce,
    stop: () => clearInterval(handle),
  };
}
