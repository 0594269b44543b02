// provider/types.ts - Price list provider interface

import type { CloudProvider, CloudRegion, InstanceOffer, OfferCriteria } from "@offerdesk/contracts";

/**
 * Per-cloud pricing adapter. Implementations talk to the cloud's pricing APIs;
 * everything region-id based goes through the CloudFacade instead.
 */
export interface PriceListProvider {
  readonly name: CloudProvider;

  /** Raw compute + storage offers for one region, unfiltered. */
  refreshPriceList(region: CloudRegion): Promise<InstanceOffer[]>;

  /** Current hourly spot price; 0 when the cloud quotes none. */
  getSpotPrice(region: CloudRegion, instanceType: string): Promise<number>;

  /** Hourly price of a diskGb volume given the region's storage offers. */
  getPriceForDisk(
    region: CloudRegion,
    offers: InstanceOffer[],
    diskGb: number,
    instanceType: string,
    spot: boolean
  ): number;

  // Optional
  adjustOfferRequest?(region: CloudRegion, criteria: OfferCriteria): OfferCriteria;
}
