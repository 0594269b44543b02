// tests/unit/stores.test.ts - SQLite stores and the cloud facade

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { NotFoundError, ProviderError, TermType } from "@offerdesk/contracts";
import { setupTest, makeOffer } from "../harness";
import { createMockPriceListProvider } from "../mock-provider";
import {
  createRegion,
  createRun,
  getMigrationVersion,
  getPreferenceValue,
  listRegions,
  replaceRegionOffers,
  saveLaunchConfig,
  setPreferenceValue,
  deletePreferenceValue,
  execute,
  getDatabase,
  runMigrations,
} from "../../src/material/db";
import {
  sqliteLaunchConfigurationStore,
  sqliteOfferStore,
  sqliteRegionStore,
  sqliteRunHistoryStore,
} from "../../src/material/stores";
import { createCloudFacade } from "../../src/provider/facade";
import { registerPriceListProvider } from "../../src/provider/registry";

let cleanup: () => void;
beforeEach(() => { cleanup = setupTest(); });
afterEach(() => cleanup());

describe("migrations", () => {
  test("schema is at the latest version", () => {
    expect(getMigrationVersion()).toBe(1);
  });

  test("re-running applies nothing", () => {
    createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    runMigrations();
    expect(getMigrationVersion()).toBe(1);
    expect(listRegions()).toHaveLength(1);
  });

  test("a schema newer than the code is refused", () => {
    getDatabase().pragma("user_version = 7");
    expect(() => runMigrations()).toThrow("Database schema v7 is newer than the latest migration v1");
  });
});

describe("sqliteRegionStore", () => {
  test("only one region is the default", () => {
    createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    const west = createRegion({ provider: "AWS", regionCode: "eu-west-1", name: "EU West", isDefault: true });

    expect(sqliteRegionStore.loadDefault().id).toBe(west.id);
    expect(listRegions().filter(r => r.isDefault)).toHaveLength(1);
  });

  test("missing regions throw NotFoundError", () => {
    expect(() => sqliteRegionStore.load(42)).toThrow(NotFoundError);
    expect(() => sqliteRegionStore.loadDefault()).toThrow("Region default not found");
  });
});

describe("sqliteOfferStore", () => {
  test("criteria narrow the result and unset fields are unconstrained", () => {
    const region = createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    sqliteOfferStore.replaceOffersForRegion(
      region.id,
      [makeOffer(), makeOffer({ termType: TermType.SPOT }), makeOffer({ instanceType: "c5.large" })],
      10
    );

    expect(sqliteOfferStore.loadOffers({})).toHaveLength(3);
    expect(sqliteOfferStore.loadOffers({ instanceType: "m5.xlarge" })).toHaveLength(2);
    expect(sqliteOfferStore.loadOffers({ instanceType: "m5.xlarge", termType: TermType.SPOT })).toHaveLength(1);
  });

  test("replacement is all or nothing", () => {
    const region = createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    sqliteOfferStore.replaceOffersForRegion(region.id, [makeOffer()], 10);

    expect(() =>
      sqliteOfferStore.replaceOffersForRegion(region.id, [makeOffer({ instanceType: "c5.large" }), makeOffer({ pricePerUnit: -1 })], 1)
    ).toThrow();
    expect(sqliteOfferStore.loadOffers({ regionId: region.id }).map(o => o.instanceType)).toEqual(["m5.xlarge"]);
  });

  test("publish date is null for an empty catalog", () => {
    expect(sqliteOfferStore.getPriceListPublishDate()).toBeNull();
  });
});

describe("sqliteRunHistoryStore", () => {
  test("finished runs only, with their status changes in order", () => {
    const base = {
      pipelineId: 5,
      version: "v1",
      nodeType: "m5.xlarge",
      nodeDisk: 50,
      isSpot: true,
      regionId: null,
      startedAt: 1_000,
    };
    const done = createRun({
      ...base,
      status: "SUCCESS",
      endedAt: 9_000,
      statusChanges: [
        { status: "PAUSED", at: 3_000 },
        { status: "RUNNING", at: 2_000 },
      ],
    });
    createRun({ ...base, status: "PAUSED", endedAt: null, statusChanges: [] });

    const finished = sqliteRunHistoryStore.loadFinishedRuns(5, "v1");

    expect(finished.map(r => r.id)).toEqual([done.id]);
    expect(finished[0]?.isSpot).toBe(true);
    expect(finished[0]?.statusChanges).toEqual([
      { status: "RUNNING", at: 2_000 },
      { status: "PAUSED", at: 3_000 },
    ]);
    expect(() => sqliteRunHistoryStore.loadRun(999)).toThrow(NotFoundError);
  });
});

describe("sqliteLaunchConfigurationStore", () => {
  test("round trips the saved configuration", () => {
    saveLaunchConfig(5, "v1", "default", { instanceType: "c5.large", instanceDisk: 30, isSpot: true });
    expect(sqliteLaunchConfigurationStore.loadLaunchConfiguration(5, "v1", "default")).toEqual({
      instanceType: "c5.large",
      instanceDisk: 30,
      isSpot: true,
    });
    expect(() => sqliteLaunchConfigurationStore.loadLaunchConfiguration(5, "v2", "default")).toThrow(NotFoundError);
  });
});

describe("preferences table", () => {
  test("values are stored as JSON, bare legacy strings read as-is", () => {
    setPreferenceValue("cluster.spot.bid.price", 0.5);
    expect(getPreferenceValue("cluster.spot.bid.price")).toBe(0.5);

    execute("INSERT INTO preferences (key, value, updated_at) VALUES (?, ?, ?)", [
      "cluster.allowed.instance.types",
      "m5.*,c5.*",
      0,
    ]);
    expect(getPreferenceValue("cluster.allowed.instance.types")).toBe("m5.*,c5.*");

    deletePreferenceValue("cluster.spot.bid.price");
    expect(getPreferenceValue("cluster.spot.bid.price")).toBeUndefined();
  });
});

describe("createCloudFacade", () => {
  const facade = () => createCloudFacade({ regions: sqliteRegionStore, offers: sqliteOfferStore });

  test("instance types are deduplicated per region and term", () => {
    const east = createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    replaceRegionOffers(
      east.id,
      [
        makeOffer({ sku: "a" }),
        makeOffer({ sku: "b", tenancy: "Dedicated" }),
        makeOffer({ instanceType: "c5.large", termType: TermType.SPOT }),
        makeOffer({ instanceType: "gp2", productFamily: "Storage", unit: "GB-Mo" }),
      ],
      10
    );

    expect(facade().getAllInstanceTypes(east.id, false).map(t => t.name)).toEqual(["m5.xlarge"]);
    expect(facade().getAllInstanceTypes(null, true).map(t => t.name)).toEqual(["c5.large"]);
  });

  test("dispatches to the region's provider", async () => {
    const east = createRegion({ provider: "AWS", regionCode: "us-east-1", name: "US East", isDefault: true });
    const provider = createMockPriceListProvider({ spotPrices: { "m5.xlarge": 0.04 } });
    registerPriceListProvider(provider);

    expect(await facade().getSpotPrice(east.id, "m5.xlarge")).toBe(0.04);
    expect(facade().adjustOfferRequest(east.id, { regionId: east.id })).toEqual({ regionId: east.id });
  });

  test("regions without a provider fail with UNSUPPORTED_PROVIDER", async () => {
    const gcp = createRegion({ provider: "GCP", regionCode: "us-central1", name: "Iowa", isDefault: true });

    const error = await facade().refreshPriceListForRegion(gcp.id).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (!(error instanceof ProviderError)) return;
    expect(error.code).toBe("UNSUPPORTED_PROVIDER");
  });
});
