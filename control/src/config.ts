// config.ts - Control process configuration from the environment

import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigurationError, TIMING, errorMessage, parseDuration } from "@offerdesk/contracts";

const EnvSchema = Type.Object({
  OFFERDESK_DB_PATH: Type.Optional(Type.String({ minLength: 1 })),
  OFFERDESK_PRICE_REFRESH_INTERVAL: Type.Optional(Type.String({ minLength: 1 })),
  OFFERDESK_REFRESH_ON_STARTUP: Type.Optional(Type.Union([Type.Literal("true"), Type.Literal("false")])),
});

type ControlEnv = Static<typeof EnvSchema>;

export interface ControlConfig {
  dbPath: string;
  priceRefreshIntervalMs: number;
  refreshOnStartup: boolean;
}

export function loadControlConfig(env: Record<string, string | undefined> = process.env): ControlConfig {
  let parsed: ControlEnv;
  try {
    parsed = Value.Parse(EnvSchema, env);
  } catch (err) {
    throw new ConfigurationError(`Invalid environment: ${errorMessage(err)}`, { cause: err });
  }

  let priceRefreshIntervalMs: number = TIMING.PRICE_REFRESH_INTERVAL_MS;
  if (parsed.OFFERDESK_PRICE_REFRESH_INTERVAL !== undefined) {
    try {
      priceRefreshIntervalMs = parseDuration(parsed.OFFERDESK_PRICE_REFRESH_INTERVAL);
    } catch (err) {
      throw new ConfigurationError(`OFFERDESK_PRICE_REFRESH_INTERVAL: ${errorMessage(err)}`, { cause: err });
    }
    if (priceRefreshIntervalMs <= 0) {
      throw new ConfigurationError("OFFERDESK_PRICE_REFRESH_INTERVAL must be positive");
    }
  }

  return {
    dbPath: parsed.OFFERDESK_DB_PATH ?? join(homedir(), ".offerdesk", "offerdesk.db"),
    priceRefreshIntervalMs,
    refreshOnStartup: parsed.OFFERDESK_REFRESH_ON_STARTUP !== "false",
  };
}
