// db/offers.ts - Instance offer catalog: filtered reads, whole-region replacement

import type { CloudProvider, InstanceOffer, OfferCriteria } from "@offerdesk/contracts";
import { getDatabase, queryMany, queryOne, transaction } from "./helpers";

interface OfferRow {
  id: number;
  region_id: number;
  sku: string;
  instance_type: string;
  cloud_provider: CloudProvider;
  term_type: string;
  price_per_unit: number;
  currency: string;
  unit: string;
  product_family: string;
  operating_system: string;
  tenancy: string;
  volume_type: string;
  vcpu: number;
  memory_gb: number;
  gpu: number;
  price_list_publish_date: number;
}

const OFFER_COLUMNS = [
  "region_id",
  "sku",
  "instance_type",
  "cloud_provider",
  "term_type",
  "price_per_unit",
  "currency",
  "unit",
  "product_family",
  "operating_system",
  "tenancy",
  "volume_type",
  "vcpu",
  "memory_gb",
  "gpu",
  "price_list_publish_date",
] as const;

// Lowest SQLITE_MAX_VARIABLE_NUMBER any build ships with.
const SQLITE_MAX_VARIABLES = 999;

const CRITERIA_COLUMNS: ReadonlyArray<readonly [keyof OfferCriteria, string]> = [
  ["regionId", "region_id"],
  ["cloudProvider", "cloud_provider"],
  ["instanceType", "instance_type"],
  ["termType", "term_type"],
  ["operatingSystem", "operating_system"],
  ["tenancy", "tenancy"],
  ["unit", "unit"],
  ["productFamily", "product_family"],
  ["volumeType", "volume_type"],
];

function toOffer(row: OfferRow): InstanceOffer {
  return {
    sku: row.sku,
    instanceType: row.instance_type,
    regionId: row.region_id,
    cloudProvider: row.cloud_provider,
    termType: row.term_type,
    pricePerUnit: row.price_per_unit,
    currency: row.currency,
    unit: row.unit,
    productFamily: row.product_family,
    operatingSystem: row.operating_system,
    tenancy: row.tenancy,
    volumeType: row.volume_type,
    vCPU: row.vcpu,
    memoryGb: row.memory_gb,
    gpu: row.gpu,
    priceListPublishDate: row.price_list_publish_date,
  };
}

function toParams(regionId: number, offer: InstanceOffer): unknown[] {
  return [
    regionId,
    offer.sku,
    offer.instanceType,
    offer.cloudProvider,
    offer.termType,
    offer.pricePerUnit,
    offer.currency,
    offer.unit,
    offer.productFamily,
    offer.operatingSystem,
    offer.tenancy,
    offer.volumeType,
    offer.vCPU,
    offer.memoryGb,
    offer.gpu,
    offer.priceListPublishDate,
  ];
}

export function findOffers(criteria: OfferCriteria = {}): InstanceOffer[] {
  const clauses: string[] = [];
  const params: unknown[] = [];
  for (const [key, column] of CRITERIA_COLUMNS) {
    const value = criteria[key];
    if (value === undefined) continue;
    clauses.push(`${column} = ?`);
    params.push(value);
  }
  const where = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
  return queryMany<OfferRow>(`SELECT * FROM instance_offers${where} ORDER BY id`, params).map(toOffer);
}

export function countOffers(regionId: number): number {
  const row = queryOne<{ n: number }>(
    "SELECT COUNT(*) AS n FROM instance_offers WHERE region_id = ?",
    [regionId]
  );
  return row?.n ?? 0;
}

/**
 * Replace every offer of a region in one transaction. Inserts are grouped
 * into multi-row statements of at most batchSize rows.
 */
export function replaceRegionOffers(
  regionId: number,
  offers: InstanceOffer[],
  batchSize: number
): void {
  const rowsPerStatement = Math.max(
    1,
    Math.min(batchSize, Math.floor(SQLITE_MAX_VARIABLES / OFFER_COLUMNS.length))
  );
  const rowPlaceholder = `(${OFFER_COLUMNS.map(() => "?").join(", ")})`;
  const db = getDatabase();

  transaction(() => {
    db.prepare<unknown[]>("DELETE FROM instance_offers WHERE region_id = ?").run(regionId);
    for (let start = 0; start < offers.length; start += rowsPerStatement) {
      const chunk = offers.slice(start, start + rowsPerStatement);
      const sql =
        `INSERT INTO instance_offers (${OFFER_COLUMNS.join(", ")}) VALUES ` +
        chunk.map(() => rowPlaceholder).join(", ");
      db.prepare<unknown[]>(sql).run(...chunk.flatMap(offer => toParams(regionId, offer)));
    }
  });
}

export function getLatestPublishDate(): number | null {
  const row = queryOne<{ latest: number | null }>(
    "SELECT MAX(price_list_publish_date) AS latest FROM instance_offers"
  );
  return row?.latest ?? null;
}
