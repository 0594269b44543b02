// provider/facade.ts - Region-id based cloud adapter over the provider registry

import {
  INSTANCE_PRODUCT_FAMILY,
  termTypeFor,
  type CloudRegion,
  type InstanceOffer,
  type InstanceType,
} from "@offerdesk/contracts";
import type { CloudProviderAdapter, OfferStore, RegionStore } from "../offer/types";
import { getPriceListProvider } from "./registry";

export interface CloudFacadeDeps {
  regions: RegionStore;
  offers: OfferStore;
}

export function createCloudFacade({ regions, offers }: CloudFacadeDeps): CloudProviderAdapter {
  const providerFor = (region: CloudRegion) => getPriceListProvider(region.provider);

  const instanceTypesIn = (region: CloudRegion, spot: boolean): InstanceType[] => {
    const termType = termTypeFor(region.provider, spot);
    const byName = new Map<string, InstanceType>();
    for (const offer of offers.loadOffers({
      regionId: region.id,
      productFamily: INSTANCE_PRODUCT_FAMILY,
      termType,
    })) {
      if (byName.has(offer.instanceType)) continue;
      byName.set(offer.instanceType, toInstanceType(offer));
    }
    return [...byName.values()];
  };

  return {
    async refreshPriceListForRegion(regionId) {
      const region = regions.load(regionId);
      return providerFor(region).refreshPriceList(region);
    },

    async getSpotPrice(regionId, instanceType) {
      const region = regions.load(regionId);
      return providerFor(region).getSpotPrice(region, instanceType);
    },

    getPriceForDisk(regionId, diskOffers, diskGb, instanceType, spot) {
      const region = regions.load(regionId);
      return providerFor(region).getPriceForDisk(region, diskOffers, diskGb, instanceType, spot);
    },

    getAllInstanceTypes(regionId, spot) {
      const scope = regionId === null ? regions.loadAll() : [regions.load(regionId)];
      return scope.flatMap(region => instanceTypesIn(region, spot));
    },

    adjustOfferRequest(regionId, criteria) {
      const region = regions.load(regionId);
      const provider = providerFor(region);
      return provider.adjustOfferRequest ? provider.adjustOfferRequest(region, criteria) : criteria;
    },
  };
}

function toInstanceType(offer: InstanceOffer): InstanceType {
  return {
    name: offer.instanceType,
    regionId: offer.regionId,
    termType: offer.termType,
    vCPU: offer.vCPU,
    memoryGb: offer.memoryGb,
    gpu: offer.gpu,
  };
}
