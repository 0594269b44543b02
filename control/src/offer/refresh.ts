// offer/refresh.ts - Per-region price list refresh
//
// retrieve -> filter -> replace, one region at a time. A region whose
// provider returns nothing keeps its previous offers; a region that fails is
// logged and yields no offers without stopping the others.

import { errorMessage, type CloudRegion, type InstanceOffer } from "@offerdesk/contracts";
import {
  buildFilters,
  composeFilters,
  OFFER_FILTER_DEFAULTS,
  resolveFilterSettings,
  type OfferFilterSettings,
} from "./filters";
import type { CloudProviderAdapter, OfferStore, PreferenceStore, RegionStore } from "./types";

export interface RegionRefreshResult {
  regionId: number;
  offers: InstanceOffer[];
}

export interface PriceListRefresher {
  refreshRegion(region: CloudRegion): Promise<InstanceOffer[]>;
  /** @throws NotFoundError when the region does not exist */
  refreshRegionById(regionId: number): Promise<InstanceOffer[]>;
  refreshAll(): Promise<RegionRefreshResult[]>;
}

export interface PriceListRefresherDeps {
  regions: RegionStore;
  offers: OfferStore;
  cloud: CloudProviderAdapter;
  preferences: PreferenceStore;
  defaults?: Readonly<OfferFilterSettings>;
}

function describeRegion(region: CloudRegion): string {
  return `${region.provider} ${region.regionCode} (id=${region.id})`;
}

export function createPriceListRefresher(deps: PriceListRefresherDeps): PriceListRefresher {
  const defaults = deps.defaults ?? OFFER_FILTER_DEFAULTS;

  const refreshRegion = async (region: CloudRegion): Promise<InstanceOffer[]> => {
    try {
      const retrieved = await deps.cloud.refreshPriceListForRegion(region.id);
      if (retrieved.length === 0) {
        console.warn(`[refresh] No offers retrieved for ${describeRegion(region)}; keeping the current price list`);
        return [];
      }

      // Resolved on every call so preference edits apply to the next refresh
      const settings = resolveFilterSettings(deps.preferences, defaults);
      const chain = composeFilters(buildFilters(settings));
      const offers = chain.filter(retrieved);
      console.debug(
        `[refresh] ${describeRegion(region)}: ${retrieved.length} retrieved, ${offers.length} kept by [${chain.name}]`
      );

      deps.offers.replaceOffersForRegion(region.id, offers, settings.insertBatchSize);
      return offers;
    } catch (err) {
      console.error(`[refresh] Failed to refresh price list for ${describeRegion(region)}: ${errorMessage(err)}`);
      return [];
    }
  };

  return {
    refreshRegion,

    async refreshRegionById(regionId) {
      return refreshRegion(deps.regions.load(regionId));
    },

    async refreshAll() {
      const results: RegionRefreshResult[] = [];
      let total = 0;
      for (const region of deps.regions.loadAll()) {
        const offers = await refreshRegion(region);
        total += offers.length;
        results.push({ regionId: region.id, offers });
      }
      console.log(`[refresh] Refreshed ${results.length} regions, ${total} offers stored`);
      return results;
    },
  };
}
