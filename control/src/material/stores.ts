// material/stores.ts - SQLite-backed collaborators for the offer core

import { NotFoundError } from "@offerdesk/contracts";
import type {
  LaunchConfigurationStore,
  OfferStore,
  RegionStore,
  RunHistoryStore,
} from "../offer/types";
import {
  findOffers,
  getDefaultRegion,
  getLatestPublishDate,
  getLaunchConfig,
  getRegion,
  getRun,
  listFinishedRuns,
  listRegions,
  replaceRegionOffers,
} from "./db";

export const sqliteOfferStore: OfferStore = {
  loadOffers: criteria => findOffers(criteria),
  replaceOffersForRegion: (regionId, offers, batchSize) => replaceRegionOffers(regionId, offers, batchSize),
  getPriceListPublishDate: () => {
    const latest = getLatestPublishDate();
    return latest === null ? null : new Date(latest);
  },
};

export const sqliteRegionStore: RegionStore = {
  loadAll: () => listRegions(),
  load: id => {
    const region = getRegion(id);
    if (!region) throw new NotFoundError("Region", id);
    return region;
  },
  loadDefault: () => {
    const region = getDefaultRegion();
    if (!region) throw new NotFoundError("Region", "default");
    return region;
  },
};

export const sqliteRunHistoryStore: RunHistoryStore = {
  loadFinishedRuns: (pipelineId, version) => listFinishedRuns(pipelineId, version),
  loadRun: id => {
    const run = getRun(id);
    if (!run) throw new NotFoundError("Run", id);
    return run;
  },
};

export const sqliteLaunchConfigurationStore: LaunchConfigurationStore = {
  loadLaunchConfiguration: (pipelineId, version, configName) => {
    const config = getLaunchConfig(pipelineId, version, configName);
    if (!config) {
      throw new NotFoundError("Launch configuration", `${pipelineId}@${version}/${configName}`);
    }
    return config;
  },
};
