// offer/manager.ts - Instance offer manager: refresh, allowance, estimation, spot bids

import {
  sqliteLaunchConfigurationStore,
  sqliteOfferStore,
  sqliteRegionStore,
  sqliteRunHistoryStore,
} from "../material/stores";
import { createContextualResolver, createPreferenceManager } from "../preference/manager";
import { createCloudFacade } from "../provider/facade";
import { createAllowancePolicyResolver, type AllowancePolicyResolver } from "./allowance";
import { createPriceEstimator, type PriceEstimator } from "./estimate";
import type { OfferFilterSettings } from "./filters";
import { createPriceListRefresher, type PriceListRefresher } from "./refresh";
import { createSpotBidResolver, type SpotBidResolver } from "./spot-bid";
import type {
  CloudProviderAdapter,
  ContextualPreferenceResolver,
  LaunchConfigurationStore,
  OfferStore,
  PreferenceStore,
  RegionStore,
  RunHistoryStore,
} from "./types";

export interface InstanceOfferManager
  extends PriceListRefresher,
    AllowancePolicyResolver,
    PriceEstimator,
    SpotBidResolver {}

export interface InstanceOfferManagerDeps {
  regions: RegionStore;
  offers: OfferStore;
  runs: RunHistoryStore;
  launchConfigs: LaunchConfigurationStore;
  cloud: CloudProviderAdapter;
  preferences: PreferenceStore;
  contextual: ContextualPreferenceResolver;
  filterDefaults?: Readonly<OfferFilterSettings>;
  now?: () => number;
}

export function createInstanceOfferManager(deps: InstanceOfferManagerDeps): InstanceOfferManager {
  const refresher = createPriceListRefresher({
    regions: deps.regions,
    offers: deps.offers,
    cloud: deps.cloud,
    preferences: deps.preferences,
    defaults: deps.filterDefaults,
  });
  const allowance = createAllowancePolicyResolver(deps);
  const estimator = createPriceEstimator({ ...deps, allowance });
  const spotBid = createSpotBidResolver({ preferences: deps.preferences, allowance, estimator });

  return { ...refresher, ...allowance, ...estimator, ...spotBid };
}

/** Manager over the process database and the registered price list providers. */
export function createDefaultInstanceOfferManager(): InstanceOfferManager {
  return createInstanceOfferManager({
    regions: sqliteRegionStore,
    offers: sqliteOfferStore,
    runs: sqliteRunHistoryStore,
    launchConfigs: sqliteLaunchConfigurationStore,
    cloud: createCloudFacade({ regions: sqliteRegionStore, offers: sqliteOfferStore }),
    preferences: createPreferenceManager(),
    contextual: createContextualResolver(),
  });
}
