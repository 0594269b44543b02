// tests/unit/estimate.test.ts - Instance, pipeline and run price estimation

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { MS_PER_HOUR, NotFoundError, TermType, ValidationError, type RunRecord } from "@offerdesk/contracts";
import { setupTest, makeOffer } from "../harness";
import { createMockPriceListProvider } from "../mock-provider";
import {
  createRegion,
  createRun,
  replaceRegionOffers,
  saveLaunchConfig,
  setPreferenceValue,
} from "../../src/material/db";
import { registerPriceListProvider } from "../../src/provider/registry";
import { createDefaultInstanceOfferManager, type InstanceOfferManager } from "../../src/offer/manager";

// =============================================================================
// Top-level test setup
// =============================================================================

const T0 = Date.UTC(2024, 3, 1, 8, 0, 0);
const DISK_PER_GB_HOUR = 0.1 / 730;

let cleanup: () => void;
let manager: InstanceOfferManager;
let provider: ReturnType<typeof createMockPriceListProvider>;
let east: number;
let west: number;

beforeEach(() => {
  cleanup = setupTest();

  east = createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true }).id;
  west = createRegion({ provider: "AWS", regionCode: "eu-west-1", name: "EU West", isDefault: false }).id;

  replaceRegionOffers(
    east,
    [
      makeOffer({ sku: "A", pricePerUnit: 0.25, tenancy: "Shared" }),
      makeOffer({ sku: "B", pricePerUnit: 0 }),
      makeOffer({ sku: "C", pricePerUnit: 0.192 }),
      makeOffer({ sku: "D", termType: TermType.SPOT }),
      makeOffer({
        sku: "GP2",
        instanceType: "gp2",
        productFamily: "Storage",
        unit: "GB-Mo",
        volumeType: "General Purpose",
        operatingSystem: "",
        tenancy: "",
        vCPU: 0,
        memoryGb: 0,
        pricePerUnit: 0.1,
        priceListPublishDate: Date.UTC(2024, 1, 1),
      }),
    ],
    100
  );
  replaceRegionOffers(west, [makeOffer({ sku: "W", instanceType: "c5.large", pricePerUnit: 1 })], 100);

  provider = createMockPriceListProvider({ spotPrices: { "m5.xlarge": 0.07 } });
  registerPriceListProvider(provider);

  manager = createDefaultInstanceOfferManager();
});

afterEach(() => cleanup());

function seedRun(overrides: Partial<Omit<RunRecord, "id">>): RunRecord {
  return createRun({
    pipelineId: 10,
    version: "v1",
    status: "SUCCESS",
    nodeType: "c5.large",
    nodeDisk: 20,
    isSpot: false,
    regionId: west,
    startedAt: T0,
    endedAt: T0 + MS_PER_HOUR,
    statusChanges: [],
    ...overrides,
  });
}

// =============================================================================
// Instance estimates
// =============================================================================

describe("getInstanceEstimatedPrice", () => {
  test("on-demand compute plus the whole disk", async () => {
    const price = await manager.getInstanceEstimatedPrice("m5.xlarge", 100, false, east);

    expect(price.instanceType).toBe("m5.xlarge");
    expect(price.instanceDisk).toBe(100);
    expect(price.pricePerHourCompute).toBe(0.192);
    expect(price.pricePerHourDiskTotal).toBeCloseTo(DISK_PER_GB_HOUR * 100, 12);
    expect(price.pricePerHourDisk).toBeCloseTo(DISK_PER_GB_HOUR, 12);
    expect(price.pricePerHour).toBe(price.pricePerHourCompute + price.pricePerHourDiskTotal);
    expect(price.averageTimePrice).toBeUndefined();
  });

  test("spot compute comes from the provider's spot price", async () => {
    const price = await manager.getInstanceEstimatedPrice("m5.xlarge", 100, true, east);

    expect(price.pricePerHourCompute).toBe(0.07);
    expect(provider.getSpotPrice).toHaveBeenCalledTimes(1);
    expect(provider.getSpotPrice.mock.calls[0]?.[0].regionCode).toBe("us-east-1");
    expect(provider.getSpotPrice.mock.calls[0]?.[1]).toBe("m5.xlarge");
  });

  test("an unset spot flag follows cluster.spot and the region defaults", async () => {
    const spot = await manager.getInstanceEstimatedPrice("m5.xlarge", 10, null, null);
    expect(spot.pricePerHourCompute).toBe(0.07);

    setPreferenceValue("cluster.spot", false);
    const onDemand = await manager.getInstanceEstimatedPrice("m5.xlarge", 10, undefined, undefined);
    expect(onDemand.pricePerHourCompute).toBe(0.192);
  });

  test("zero disk reports zero disk prices", async () => {
    const price = await manager.getInstanceEstimatedPrice("m5.xlarge", 0, false, east);
    expect(price.pricePerHourDisk).toBe(0);
    expect(price.pricePerHourDiskTotal).toBe(0);
    expect(price.pricePerHour).toBe(0.192);
  });

  test("negative disk sizes price the disk at zero", async () => {
    const price = await manager.getInstanceEstimatedPrice("m5.xlarge", -730, false, east);
    expect(price.pricePerHourDisk).toBe(0);
    expect(price.pricePerHourDiskTotal).toBe(0);
    expect(price.pricePerHour).toBe(0.192);
    expect(provider.getPriceForDisk).not.toHaveBeenCalled();
  });

  test("types that are not allowed are rejected", async () => {
    setPreferenceValue("cluster.allowed.instance.types", "c5.*");

    const error = await manager.getInstanceEstimatedPrice("m5.xlarge", 100, false, east).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.code).toBe("INSTANCE_TYPE_NOT_ALLOWED");
    expect(error.message).toBe("Instance type m5.xlarge is not allowed");
  });

  test("blank types are rejected", async () => {
    await expect(manager.getInstanceEstimatedPrice("", 100, false, east)).rejects.toBeInstanceOf(ValidationError);
  });
});

// =============================================================================
// Pipeline estimates
// =============================================================================

describe("getPipelineEstimatedPrice", () => {
  test("average, minimum and maximum over finished runs", async () => {
    saveLaunchConfig(10, "v1", "default", { instanceType: "c5.large", instanceDisk: 20, isSpot: false });
    seedRun({ endedAt: T0 + MS_PER_HOUR });
    seedRun({ status: "FAILURE", endedAt: T0 + 3 * MS_PER_HOUR });
    seedRun({ status: "RUNNING", endedAt: null });
    seedRun({ version: "v2", endedAt: T0 + 10 * MS_PER_HOUR });

    const price = await manager.getPipelineEstimatedPrice(10, "v1", "default", null, 0, null, west);

    expect(price.instanceType).toBe("c5.large");
    expect(price.instanceDisk).toBe(20);
    expect(price.pricePerHour).toBe(1);
    expect(price.averageTimePrice).toBe(2);
    expect(price.minimumTimePrice).toBe(1);
    expect(price.maximumTimePrice).toBe(3);
  });

  test("only missing values are taken from the launch configuration", async () => {
    saveLaunchConfig(10, "v1", "default", { instanceType: "c5.large", instanceDisk: 20, isSpot: true });

    const price = await manager.getPipelineEstimatedPrice(10, "v1", "default", "", 50, false, west);

    expect(price.instanceType).toBe("c5.large");
    expect(price.instanceDisk).toBe(50);
    expect(price.pricePerHourCompute).toBe(1);
  });

  test("complete arguments need no launch configuration", async () => {
    const price = await manager.getPipelineEstimatedPrice(10, "v1", "default", "c5.large", 20, false, west);
    expect(price.pricePerHour).toBe(1);
  });

  test("a missing launch configuration is reported", async () => {
    await expect(manager.getPipelineEstimatedPrice(10, "v1", "default", null, 0, null, west)).rejects.toBeInstanceOf(
      NotFoundError
    );
  });
});

// =============================================================================
// Run estimates
// =============================================================================

describe("getPipelineRunEstimatedPrice", () => {
  test("finished runs are priced by billable hours", async () => {
    const run = seedRun({
      nodeType: "m5.xlarge",
      nodeDisk: 100,
      regionId: east,
      endedAt: T0 + 2 * MS_PER_HOUR,
    });

    const price = await manager.getPipelineRunEstimatedPrice(run.id);

    const expectedPerHour = 0.192 + DISK_PER_GB_HOUR * 100;
    expect(price.runId).toBe(run.id);
    expect(price.instanceType).toBe("m5.xlarge");
    expect(price.instanceDisk).toBe(100);
    expect(price.pricePerHour).toBeCloseTo(expectedPerHour, 12);
    expect(price.totalPrice).toBeCloseTo(2 * expectedPerHour, 12);
  });

  test("active runs have no total yet", async () => {
    const run = seedRun({ status: "RUNNING", endedAt: null });
    const price = await manager.getPipelineRunEstimatedPrice(run.id);
    expect(price.pricePerHour).toBe(1);
    expect(price.totalPrice).toBe(0);
  });

  test("a run without a spot flag follows cluster.spot", async () => {
    const run = seedRun({ nodeType: "m5.xlarge", nodeDisk: 0, isSpot: null, regionId: east });
    const price = await manager.getPipelineRunEstimatedPrice(run.id);
    expect(price.pricePerHour).toBe(0.07);
    expect(price.totalPrice).toBeCloseTo(0.07, 12);
  });

  test("unknown runs are reported", async () => {
    await expect(manager.getPipelineRunEstimatedPrice(999)).rejects.toBeInstanceOf(NotFoundError);
  });
});

// =============================================================================
// Catalog lookups
// =============================================================================

describe("catalog lookups", () => {
  test("getPricePerHourForInstance takes the cheapest positive on-demand price", () => {
    expect(manager.getPricePerHourForInstance("m5.xlarge", east)).toBe(0.192);
    expect(manager.getPricePerHourForInstance("m5.xlarge", west)).toBe(0);
    expect(manager.getPricePerHourForInstance("c5.large")).toBe(1);
  });

  test("findOffer returns the first matching on-demand offer", () => {
    expect(manager.findOffer("m5.xlarge", east)?.sku).toBe("A");
    expect(manager.findOffer("r5.large", east)).toBeNull();
  });

  test("getPriceListPublishDate is the newest publish date", () => {
    expect(manager.getPriceListPublishDate()).toEqual(new Date(Date.UTC(2024, 1, 1)));
  });
});
