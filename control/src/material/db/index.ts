// db/index.ts - Barrel re-export for the database layer

export { initDatabase, getDatabase, closeDatabase, runMigrations, getMigrationVersion } from "./init";
export { queryOne, queryMany, execute, transaction } from "./helpers";
export { listRegions, getRegion, getDefaultRegion, createRegion } from "./regions";
export { findOffers, countOffers, replaceRegionOffers, getLatestPublishDate } from "./offers";
export {
  getPreferenceValue,
  setPreferenceValue,
  deletePreferenceValue,
  getContextualValue,
  setContextualValue,
} from "./preferences";
export { getRun, listFinishedRuns, createRun, getLaunchConfig, saveLaunchConfig } from "./runs";
