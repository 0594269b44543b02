// db/runs.ts - Pipeline run history and launch configurations

import {
  FINAL_RUN_STATUSES,
  NotFoundError,
  type LaunchConfiguration,
  type RunRecord,
  type RunStatus,
  type RunStatusChange,
} from "@offerdesk/contracts";
import { getDatabase, queryOne, queryMany, execute, transaction, toBool } from "./helpers";

interface RunRow {
  id: number;
  pipeline_id: number;
  version: string;
  status: RunStatus;
  node_type: string;
  node_disk: number;
  is_spot: number | null;
  region_id: number | null;
  started_at: number;
  ended_at: number | null;
}

function loadStatusChanges(runId: number): RunStatusChange[] {
  return queryMany<RunStatusChange>(
    "SELECT status, at FROM run_status_changes WHERE run_id = ? ORDER BY at, id",
    [runId]
  );
}

function toRun(row: RunRow): RunRecord {
  return {
    id: row.id,
    pipelineId: row.pipeline_id,
    version: row.version,
    status: row.status,
    nodeType: row.node_type,
    nodeDisk: row.node_disk,
    isSpot: toBool(row.is_spot),
    regionId: row.region_id,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    statusChanges: loadStatusChanges(row.id),
  };
}

export function getRun(id: number): RunRecord | null {
  const row = queryOne<RunRow>("SELECT * FROM pipeline_runs WHERE id = ?", [id]);
  return row ? toRun(row) : null;
}

export function listFinishedRuns(pipelineId: number, version: string): RunRecord[] {
  const placeholders = FINAL_RUN_STATUSES.map(() => "?").join(", ");
  return queryMany<RunRow>(
    `SELECT * FROM pipeline_runs WHERE pipeline_id = ? AND version = ? AND status IN (${placeholders}) ORDER BY id`,
    [pipelineId, version, ...FINAL_RUN_STATUSES]
  ).map(toRun);
}

export function createRun(data: Omit<RunRecord, "id">): RunRecord {
  return transaction(() => {
    const db = getDatabase();
    const result = db
      .prepare<unknown[]>(
        `INSERT INTO pipeline_runs (pipeline_id, version, status, node_type, node_disk, is_spot, region_id, started_at, ended_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        data.pipelineId,
        data.version,
        data.status,
        data.nodeType,
        data.nodeDisk,
        data.isSpot === null ? null : data.isSpot ? 1 : 0,
        data.regionId,
        data.startedAt,
        data.endedAt
      );
    const id = Number(result.lastInsertRowid);
    for (const change of data.statusChanges) {
      execute("INSERT INTO run_status_changes (run_id, status, at) VALUES (?, ?, ?)", [
        id,
        change.status,
        change.at,
      ]);
    }
    const created = getRun(id);
    if (!created) throw new NotFoundError("Run", id);
    return created;
  });
}

interface LaunchConfigRow {
  instance_type: string;
  instance_disk: number;
  is_spot: number;
}

export function getLaunchConfig(
  pipelineId: number,
  version: string,
  configName: string
): LaunchConfiguration | null {
  const row = queryOne<LaunchConfigRow>(
    `SELECT instance_type, instance_disk, is_spot FROM pipeline_launch_configs
     WHERE pipeline_id = ? AND version = ? AND config_name = ?`,
    [pipelineId, version, configName]
  );
  if (!row) return null;
  return {
    instanceType: row.instance_type,
    instanceDisk: row.instance_disk,
    isSpot: row.is_spot !== 0,
  };
}

export function saveLaunchConfig(
  pipelineId: number,
  version: string,
  configName: string,
  config: LaunchConfiguration
): void {
  execute(
    `INSERT INTO pipeline_launch_configs (pipeline_id, version, config_name, instance_type, instance_disk, is_spot)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(pipeline_id, version, config_name) DO UPDATE SET
       instance_type = excluded.instance_type,
       instance_disk = excluded.instance_disk,
       is_spot = excluded.is_spot`,
    [pipelineId, version, configName, config.instanceType, config.instanceDisk, config.isSpot ? 1 : 0]
  );
}
