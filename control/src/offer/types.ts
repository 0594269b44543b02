// offer/types.ts - Collaborator interfaces consumed by the offer core
//
// The SQLite-backed implementations live in material/stores.ts, the cloud
// adapter in provider/facade.ts and the preference readers in
// preference/manager.ts. Tests substitute fakes for any of them.

import type {
  CloudRegion,
  InstanceOffer,
  InstanceType,
  LaunchConfiguration,
  OfferCriteria,
  PreferenceResource,
  RunRecord,
} from "@offerdesk/contracts";
import type { Static, TSchema } from "@sinclair/typebox";
import type { PreferenceDescriptor } from "../preference/system";

export interface OfferStore {
  loadOffers(criteria: OfferCriteria): InstanceOffer[];
  /** Atomically supersede every offer of the region. */
  replaceOffersForRegion(regionId: number, offers: InstanceOffer[], batchSize: number): void;
  getPriceListPublishDate(): Date | null;
}

export interface RegionStore {
  loadAll(): CloudRegion[];
  /** @throws NotFoundError */
  load(id: number): CloudRegion;
  /** @throws NotFoundError when no default region is configured */
  loadDefault(): CloudRegion;
}

export interface CloudProviderAdapter {
  refreshPriceListForRegion(regionId: number): Promise<InstanceOffer[]>;
  getSpotPrice(regionId: number, instanceType: string): Promise<number>;
  /** Hourly price of a whole volume of diskGb. */
  getPriceForDisk(
    regionId: number,
    offers: InstanceOffer[],
    diskGb: number,
    instanceType: string,
    spot: boolean
  ): number;
  /** Compute SKUs offered in a region (every region when regionId is null). */
  getAllInstanceTypes(regionId: number | null, spot: boolean): InstanceType[];
  /** Provider-specific narrowing of the storage offer lookup. */
  adjustOfferRequest(regionId: number, criteria: OfferCriteria): OfferCriteria;
}

export interface RunHistoryStore {
  loadFinishedRuns(pipelineId: number, version: string): RunRecord[];
  /** @throws NotFoundError */
  loadRun(id: number): RunRecord;
}

export interface LaunchConfigurationStore {
  /** @throws NotFoundError */
  loadLaunchConfiguration(pipelineId: number, version: string, configName: string): LaunchConfiguration;
}

export interface PreferenceStore {
  getPreference<T extends TSchema>(descriptor: PreferenceDescriptor<T>): Static<T>;
}

export interface ContextualPreferenceResolver {
  /**
   * Resolve each key at its most specific scope among `resources`, falling
   * back to the system value, and join the non-blank results with ",".
   */
  searchList(keys: readonly string[], resources?: readonly PreferenceResource[]): string;
}
