// main.ts - Control process entry point

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { pathToFileURL } from "node:url";
import { errorMessage } from "@offerdesk/contracts";
import { loadControlConfig, type ControlConfig } from "./config";
import { closeDatabase, initDatabase, runMigrations } from "./material/db";
import { createDefaultInstanceOfferManager } from "./offer/manager";
import { startPriceRefreshTask, type PriceRefreshTask } from "./background/price-refresh";
import { getEffectiveAWSConfig } from "./provider/config";
import { createAwsPriceListProvider } from "./provider/pricing/aws";
import { getRegisteredProviders, registerPriceListProvider } from "./provider/registry";

// =============================================================================
// Module-level State
// =============================================================================

let refreshTask: PriceRefreshTask | null = null;
let isShuttingDown = false;

// =============================================================================
// Startup
// =============================================================================

export async function startup(config: ControlConfig = loadControlConfig()): Promise<void> {
  console.log("[control] Starting offerdesk control process...");

  initializeDatabase(config.dbPath);
  registerProviders();

  const manager = createDefaultInstanceOfferManager();
  refreshTask = startPriceRefreshTask(manager, config.priceRefreshIntervalMs);
  console.log(`[control] Price refresh every ${Math.round(config.priceRefreshIntervalMs / 60_000)}m`);

  process.on("SIGINT", () => {
    console.log("[control] Received SIGINT");
    shutdown();
  });
  process.on("SIGTERM", () => {
    console.log("[control] Received SIGTERM");
    shutdown();
  });

  if (config.refreshOnStartup) {
    await refreshTask.runOnce();
  }

  console.log("[control] Control process started");
}

export function initializeDatabase(dbPath: string): void {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  initDatabase(dbPath);
  runMigrations();
  console.log(`[control] Database initialized at ${dbPath}`);
}

export function registerProviders(): void {
  const aws = getEffectiveAWSConfig();
  if (aws.enabled) {
    registerPriceListProvider(createAwsPriceListProvider({ config: aws }));
  }
  if (getRegisteredProviders().length === 0) {
    console.warn("[control] No price list providers enabled; refreshes will leave every region unchanged");
  }
}

// =============================================================================
// Shutdown
// =============================================================================

export function shutdown(): void {
  if (isShuttingDown) return;
  isShuttingDown = true;
  console.log("[control] Shutting down...");

  refreshTask?.stop();
  refreshTask = null;
  closeDatabase();

  console.log("[control] Shutdown complete");
  process.exit(0);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startup().catch(err => {
    console.error(`[control] Startup failed: ${errorMessage(err)}`);
    process.exit(1);
  });
}
