// offer/spot-bid.ts - Spot bid price from the allocation strategy preference
//
// Misconfiguration is logged and degrades to the configured bid price (which
// may be null); resolution never throws.

import { ConfigurationError, errorMessage } from "@offerdesk/contracts";
import type { PreferenceStore } from "./types";
import { SystemPreferences } from "../preference/system";
import type { AllowancePolicyResolver } from "./allowance";
import type { PriceEstimator } from "./estimate";

export const SpotAllocStrategy = {
  MANUAL: "manual",
  ON_DEMAND: "on_demand",
} as const;

export interface SpotBidResolver {
  resolveSpotBidPrice(instanceType: string, regionId?: number | null): number | null;
}

export interface SpotBidResolverDeps {
  preferences: PreferenceStore;
  allowance: Pick<AllowancePolicyResolver, "defaultRegionIfNull">;
  estimator: Pick<PriceEstimator, "getPricePerHourForInstance">;
}

function logConfigurationError(error: ConfigurationError): void {
  console.error(`[offers] ${error.code}: ${error.message}`);
}

export function createSpotBidResolver(deps: SpotBidResolverDeps): SpotBidResolver {
  return {
    resolveSpotBidPrice(instanceType, regionId) {
      const strategy = deps.preferences.getPreference(SystemPreferences.CLUSTER_SPOT_ALLOC_STRATEGY);
      const bidPrice = deps.preferences.getPreference(SystemPreferences.CLUSTER_SPOT_BID_PRICE);

      switch (strategy) {
        case SpotAllocStrategy.MANUAL:
          if (bidPrice === null) {
            logConfigurationError(
              new ConfigurationError(
                `Spot allocation strategy is '${strategy}' but ${SystemPreferences.CLUSTER_SPOT_BID_PRICE.key} is not set`,
                { code: "SPOT_BID_PRICE_MISSING" }
              )
            );
          }
          return bidPrice;

        case SpotAllocStrategy.ON_DEMAND:
          try {
            return deps.estimator.getPricePerHourForInstance(
              instanceType,
              deps.allowance.defaultRegionIfNull(regionId)
            );
          } catch (err) {
            console.error(`[offers] Failed to resolve on-demand bid price for ${instanceType}: ${errorMessage(err)}`);
            return null;
          }

        default:
          logConfigurationError(
            new ConfigurationError(`Unknown spot allocation strategy '${strategy}'`, {
              code: "UNKNOWN_SPOT_ALLOC_STRATEGY",
            })
          );
          return bidPrice;
      }
    },
  };
}
