// db/regions.ts - Cloud region records

import { NotFoundError, type CloudProvider, type CloudRegion } from "@offerdesk/contracts";
import { getDatabase, queryOne, queryMany, execute, transaction } from "./helpers";

interface RegionRow {
  id: number;
  provider: CloudProvider;
  region_code: string;
  name: string;
  is_default: number;
}

function toRegion(row: RegionRow): CloudRegion {
  return {
    id: row.id,
    provider: row.provider,
    regionCode: row.region_code,
    name: row.name,
    isDefault: row.is_default !== 0,
  };
}

export function listRegions(): CloudRegion[] {
  return queryMany<RegionRow>("SELECT * FROM cloud_regions ORDER BY id").map(toRegion);
}

export function getRegion(id: number): CloudRegion | null {
  const row = queryOne<RegionRow>("SELECT * FROM cloud_regions WHERE id = ?", [id]);
  return row ? toRegion(row) : null;
}

export function getDefaultRegion(): CloudRegion | null {
  const row = queryOne<RegionRow>(
    "SELECT * FROM cloud_regions WHERE is_default = 1 ORDER BY id LIMIT 1"
  );
  return row ? toRegion(row) : null;
}

export function createRegion(data: Omit<CloudRegion, "id">): CloudRegion {
  return transaction(() => {
    if (data.isDefault) {
      execute("UPDATE cloud_regions SET is_default = 0");
    }
    const result = getDatabase()
      .prepare<unknown[]>(
        "INSERT INTO cloud_regions (provider, region_code, name, is_default) VALUES (?, ?, ?, ?)"
      )
      .run(data.provider, data.regionCode, data.name, data.isDefault ? 1 : 0);
    const created = getRegion(Number(result.lastInsertRowid));
    if (!created) throw new NotFoundError("Region", Number(result.lastInsertRowid));
    return created;
  });
}
