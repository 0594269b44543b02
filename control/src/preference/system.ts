// preference/system.ts - System preference descriptors
//
// Each descriptor pairs a storage key with the TypeBox schema its value must
// satisfy and the fallback used when the value is absent or invalid.

import { Type, type Static, type TSchema } from "@sinclair/typebox";

export interface PreferenceDescriptor<T extends TSchema = TSchema> {
  key: string;
  schema: T;
  fallback: Static<T>;
}

function preference<T extends TSchema>(key: string, schema: T, fallback: Static<T>): PreferenceDescriptor<T> {
  return { key, schema, fallback };
}

const NullableString = Type.Union([Type.String(), Type.Null()]);
const NullableBoolean = Type.Union([Type.Boolean(), Type.Null()]);
const NullableInteger = Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]);

export const SystemPreferences = {
  // ─── Allow-lists (comma-separated glob patterns) ─────────────────────
  CLUSTER_ALLOWED_INSTANCE_TYPES: preference("cluster.allowed.instance.types", Type.String(), ""),
  CLUSTER_ALLOWED_INSTANCE_TYPES_DOCKER: preference("cluster.allowed.instance.types.docker", Type.String(), ""),
  CLUSTER_ALLOWED_PRICE_TYPES: preference("cluster.allowed.price.types", Type.String(), ""),
  CLUSTER_ALLOWED_MASTER_PRICE_TYPES: preference("cluster.allowed.price.types.master", Type.String(), ""),

  // ─── Offer filters (null = use OFFER_FILTER_DEFAULTS) ────────────────
  CLUSTER_INSTANCE_OFFER_FILTER_TERM_TYPES: preference("cluster.instance.offer.filter.term.types", NullableString, null),
  CLUSTER_INSTANCE_OFFER_FILTER_UNIQUE: preference("cluster.instance.offer.filter.unique", NullableBoolean, null),
  CLUSTER_INSTANCE_OFFER_FILTER_CPU_MIN: preference("cluster.instance.offer.filter.cpu.min", NullableInteger, null),
  CLUSTER_INSTANCE_OFFER_FILTER_MEM_MIN: preference("cluster.instance.offer.filter.mem.min", NullableInteger, null),
  CLUSTER_INSTANCE_OFFER_INSERT_BATCH_SIZE: preference(
    "cluster.instance.offer.insert.batch.size",
    Type.Union([Type.Integer({ minimum: 1 }), Type.Null()]),
    null
  ),

  // ─── Spot ─────────────────────────────────────────────────────────────
  CLUSTER_SPOT: preference("cluster.spot", Type.Boolean(), true),
  CLUSTER_SPOT_ALLOC_STRATEGY: preference("cluster.spot.alloc.strategy", Type.String(), "on_demand"),
  CLUSTER_SPOT_BID_PRICE: preference(
    "cluster.spot.bid.price",
    Type.Union([Type.Number({ minimum: 0 }), Type.Null()]),
    null
  ),
} as const;

/** Keys whose contextual values are concatenated, in priority order. */
export const INSTANCE_TYPES_PREFERENCES: readonly string[] = [
  SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES.key,
];
export const TOOL_INSTANCE_TYPES_PREFERENCES: readonly string[] = [
  SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES_DOCKER.key,
  SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES.key,
];
export const PRICE_TYPES_PREFERENCES: readonly string[] = [
  SystemPreferences.CLUSTER_ALLOWED_PRICE_TYPES.key,
];
export const MASTER_PRICE_TYPES_PREFERENCES: readonly string[] = [
  SystemPreferences.CLUSTER_ALLOWED_MASTER_PRICE_TYPES.key,
];
