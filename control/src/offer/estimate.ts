// offer/estimate.ts - Instance, pipeline and run price estimation

import {
  GENERAL_PURPOSE_VOLUME_TYPE,
  HOURS_UNIT,
  INSTANCE_PRODUCT_FAMILY,
  LINUX_OPERATING_SYSTEM,
  SHARED_TENANCY,
  STORAGE_PRODUCT_FAMILY,
  TermType,
  ValidationError,
  isFinalStatus,
  toHours,
  type InstanceOffer,
  type InstancePrice,
  type OfferCriteria,
  type PipelineRunPrice,
} from "@offerdesk/contracts";
import type { AllowancePolicyResolver } from "./allowance";
import { getBillableDurationMs } from "./duration";
import type { CloudProviderAdapter, LaunchConfigurationStore, OfferStore, RunHistoryStore } from "./types";

export interface PriceEstimator {
  /** @throws ValidationError when the type is neither allowed nor tool-allowed */
  getInstanceEstimatedPrice(
    instanceType: string,
    diskGb: number,
    spot?: boolean | null,
    regionId?: number | null
  ): Promise<InstancePrice>;
  /**
   * Estimate for a pipeline version. A blank type, a non-positive disk or an
   * unset spot flag is taken from the launch configuration; finished runs of
   * the version add average/minimum/maximum run prices.
   */
  getPipelineEstimatedPrice(
    pipelineId: number,
    version: string,
    configName: string,
    instanceType?: string | null,
    diskGb?: number | null,
    spot?: boolean | null,
    regionId?: number | null
  ): Promise<InstancePrice>;
  getPipelineRunEstimatedPrice(runId: number, regionId?: number | null): Promise<PipelineRunPrice>;
  /** Cheapest positive on-demand Linux hourly price; 0 when none. */
  getPricePerHourForInstance(instanceType: string, regionId?: number | null): number;
  findOffer(instanceType: string, regionId?: number | null): InstanceOffer | null;
  getPriceListPublishDate(): Date | null;
}

export interface PriceEstimatorDeps {
  offers: OfferStore;
  runs: RunHistoryStore;
  launchConfigs: LaunchConfigurationStore;
  cloud: CloudProviderAdapter;
  allowance: AllowancePolicyResolver;
  now?: () => number;
}

function instanceTypeCriteria(instanceType: string, regionId?: number | null): OfferCriteria {
  return {
    instanceType,
    termType: TermType.ON_DEMAND,
    operatingSystem: LINUX_OPERATING_SYSTEM,
    tenancy: SHARED_TENANCY,
    unit: HOURS_UNIT,
    productFamily: INSTANCE_PRODUCT_FAMILY,
    ...(regionId === null || regionId === undefined ? {} : { regionId }),
  };
}

export function createPriceEstimator(deps: PriceEstimatorDeps): PriceEstimator {
  const { offers, runs, launchConfigs, cloud, allowance } = deps;
  const now = deps.now ?? Date.now;

  const getPricePerHourForInstance = (instanceType: string, regionId?: number | null): number => {
    const prices = offers
      .loadOffers(instanceTypeCriteria(instanceType, regionId))
      .map(offer => offer.pricePerUnit)
      .filter(price => price > 0);
    return prices.length > 0 ? Math.min(...prices) : 0;
  };

  const computePricePerHour = (instanceType: string, spot: boolean, regionId: number): Promise<number> =>
    spot ? cloud.getSpotPrice(regionId, instanceType) : Promise.resolve(getPricePerHourForInstance(instanceType, regionId));

  const diskPricePerHour = (diskGb: number, regionId: number, instanceType: string, spot: boolean): number => {
    if (diskGb <= 0) return 0;
    const criteria = cloud.adjustOfferRequest(regionId, {
      productFamily: STORAGE_PRODUCT_FAMILY,
      volumeType: GENERAL_PURPOSE_VOLUME_TYPE,
      regionId,
    });
    return cloud.getPriceForDisk(regionId, offers.loadOffers(criteria), diskGb, instanceType, spot);
  };

  const getInstanceEstimatedPrice = async (
    instanceType: string,
    diskGb: number,
    spot?: boolean | null,
    regionId?: number | null
  ): Promise<InstancePrice> => {
    const isSpot = allowance.isSpotRequest(spot);
    const region = allowance.defaultRegionIfNull(regionId);
    if (
      !allowance.isInstanceAllowed(instanceType, region, isSpot) &&
      !allowance.isToolInstanceAllowed(instanceType, region, isSpot)
    ) {
      throw new ValidationError(`Instance type ${instanceType} is not allowed`, {
        code: "INSTANCE_TYPE_NOT_ALLOWED",
        details: { instanceType, regionId: region, spot: isSpot },
      });
    }

    const compute = await computePricePerHour(instanceType, isSpot, region);
    const diskTotal = diskPricePerHour(diskGb, region, instanceType, isSpot);
    return {
      instanceType,
      instanceDisk: diskGb,
      pricePerHour: compute + diskTotal,
      pricePerHourCompute: compute,
      pricePerHourDisk: diskGb > 0 ? diskTotal / diskGb : 0,
      pricePerHourDiskTotal: diskTotal,
    };
  };

  return {
    getInstanceEstimatedPrice,

    async getPipelineEstimatedPrice(pipelineId, version, configName, instanceType, diskGb, spot, regionId) {
      let type = instanceType ?? "";
      let disk = diskGb ?? 0;
      let useSpot = spot ?? null;

      if (type.trim() === "" || disk <= 0 || useSpot === null) {
        const config = launchConfigs.loadLaunchConfiguration(pipelineId, version, configName);
        if (type.trim() === "") type = config.instanceType;
        if (disk <= 0) disk = config.instanceDisk;
        if (useSpot === null) useSpot = config.isSpot;
      }

      const price = await getInstanceEstimatedPrice(type, disk, useSpot, regionId);

      const finished = runs.loadFinishedRuns(pipelineId, version);
      if (finished.length === 0) return price;

      const at = now();
      const durations = finished.map(run => getBillableDurationMs(run, at));
      const average = durations.reduce((sum, d) => sum + d, 0) / durations.length;
      return {
        ...price,
        averageTimePrice: price.pricePerHour * toHours(average),
        minimumTimePrice: price.pricePerHour * toHours(Math.min(...durations)),
        maximumTimePrice: price.pricePerHour * toHours(Math.max(...durations)),
      };
    },

    async getPipelineRunEstimatedPrice(runId, regionId) {
      const run = runs.loadRun(runId);
      const region = allowance.defaultRegionIfNull(regionId ?? run.regionId);
      const spot = allowance.isSpotRequest(run.isSpot);

      const compute = await computePricePerHour(run.nodeType, spot, region);
      const pricePerHour = compute + diskPricePerHour(run.nodeDisk, region, run.nodeType, spot);

      return {
        runId: run.id,
        instanceType: run.nodeType,
        instanceDisk: run.nodeDisk,
        pricePerHour,
        totalPrice: isFinalStatus(run.status) ? toHours(getBillableDurationMs(run, now())) * pricePerHour : 0,
      };
    },

    getPricePerHourForInstance,

    findOffer(instanceType, regionId) {
      return offers.loadOffers(instanceTypeCriteria(instanceType, regionId))[0] ?? null;
    },

    getPriceListPublishDate() {
      return offers.getPriceListPublishDate();
    },
  };
}
