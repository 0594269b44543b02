// types.ts - Core Domain Types: regions, offers, prices, runs

// =============================================================================
// PRIMITIVES
// =============================================================================

/** Database row ID */
export type ID = number;

/** Unix timestamp in milliseconds */
export type TimestampMs = number;

/** Duration in milliseconds */
export type DurationMs = number;

export type CloudProvider = 'AWS' | 'GCP' | 'AZURE';

export const CLOUD_PROVIDERS: readonly CloudProvider[] = ['AWS', 'GCP', 'AZURE'];

// =============================================================================
// PRICE LIST CONSTANTS
// =============================================================================

export const TermType = {
  ON_DEMAND: 'OnDemand',
  SPOT: 'Spot',
  PREEMPTIBLE: 'Preemptible',
  LOW_PRIORITY: 'LowPriority',
} as const;

export type TermTypeName = (typeof TermType)[keyof typeof TermType];

export const ALL_TERM_TYPES: readonly string[] = Object.values(TermType);

export const INSTANCE_PRODUCT_FAMILY = 'Compute Instance';
export const STORAGE_PRODUCT_FAMILY = 'Storage';
export const GENERAL_PURPOSE_VOLUME_TYPE = 'General Purpose';
export const LINUX_OPERATING_SYSTEM = 'Linux';
export const SHARED_TENANCY = 'Shared';
export const HOURS_UNIT = 'Hrs';
export const GB_MONTH_UNIT = 'GB-Mo';

/** Term name a provider uses for its preemptible, variable-price capacity. */
export function spotTermName(provider: CloudProvider): TermTypeName {
  switch (provider) {
    case 'AWS':
      return TermType.SPOT;
    case 'GCP':
      return TermType.PREEMPTIBLE;
    case 'AZURE':
      return TermType.LOW_PRIORITY;
  }
}

export function termTypeFor(provider: CloudProvider, spot: boolean): TermTypeName {
  return spot ? spotTermName(provider) : TermType.ON_DEMAND;
}

/** Price types a run can request for its nodes. */
export const PriceType = {
  ON_DEMAND: 'on_demand',
  SPOT: 'spot',
} as const;

// =============================================================================
// REGIONS
// =============================================================================

export interface CloudRegion {
  id: ID;
  provider: CloudProvider;
  regionCode: string;
  name: string;
  isDefault: boolean;
}

// =============================================================================
// OFFERS
// =============================================================================

/** One price quote for a compute or storage SKU in a region. */
export interface InstanceOffer {
  sku: string;
  instanceType: string;
  regionId: ID;
  cloudProvider: CloudProvider;
  termType: string;
  pricePerUnit: number;
  currency: string;
  unit: string;
  productFamily: string;
  operatingSystem: string;
  tenancy: string;
  volumeType: string;
  vCPU: number;
  memoryGb: number;
  gpu: number;
  priceListPublishDate: TimestampMs;
}

/**
 * Offer lookup criteria. Every field that is set must match exactly;
 * unset fields are unconstrained.
 */
export interface OfferCriteria {
  regionId?: ID;
  cloudProvider?: CloudProvider;
  instanceType?: string;
  termType?: string;
  operatingSystem?: string;
  tenancy?: string;
  unit?: string;
  productFamily?: string;
  volumeType?: string;
}

/** A distinct compute SKU, derived from offers on read. */
export interface InstanceType {
  name: string;
  regionId: ID;
  termType: string;
  vCPU: number;
  memoryGb: number;
  gpu: number;
}

// =============================================================================
// PRICES
// =============================================================================

export interface InstancePrice {
  instanceType: string;
  instanceDisk: number;
  pricePerHour: number;
  pricePerHourCompute: number;
  /** Disk price per GB-hour. */
  pricePerHourDisk: number;
  /** Disk price per hour for the whole volume; this is what pricePerHour includes. */
  pricePerHourDiskTotal: number;
  averageTimePrice?: number;
  minimumTimePrice?: number;
  maximumTimePrice?: number;
}

export interface PipelineRunPrice {
  runId: ID;
  instanceType: string;
  instanceDisk: number;
  pricePerHour: number;
  totalPrice: number;
}

export interface AllowedInstanceAndPriceTypes {
  allowedInstanceTypes: InstanceType[];
  allowedToolInstanceTypes: InstanceType[];
  allowedPriceTypes: string[];
  allowedMasterPriceTypes: string[];
}

// =============================================================================
// RUNS
// =============================================================================

export type RunStatus =
  | 'RUNNING'
  | 'PAUSING'
  | 'PAUSED'
  | 'RESUMING'
  | 'SUCCESS'
  | 'FAILURE'
  | 'STOPPED';

export const FINAL_RUN_STATUSES: readonly RunStatus[] = ['SUCCESS', 'FAILURE', 'STOPPED'];

export function isFinalStatus(status: RunStatus): boolean {
  return FINAL_RUN_STATUSES.includes(status);
}

export interface RunStatusChange {
  status: RunStatus;
  at: TimestampMs;
}

export interface RunRecord {
  id: ID;
  pipelineId: ID;
  version: string;
  status: RunStatus;
  nodeType: string;
  nodeDisk: number;
  isSpot: boolean | null;
  regionId: ID | null;
  startedAt: TimestampMs;
  endedAt: TimestampMs | null;
  statusChanges: RunStatusChange[];
}

export interface LaunchConfiguration {
  instanceType: string;
  instanceDisk: number;
  isSpot: boolean;
}

// =============================================================================
// CONTEXTUAL PREFERENCES
// =============================================================================

/** Scopes a preference value can be overridden at, most specific first. */
export type PreferenceLevel = 'tool' | 'region' | 'role' | 'user';

export const PREFERENCE_LEVEL_PRIORITY: readonly PreferenceLevel[] = ['tool', 'region', 'role', 'user'];

export interface PreferenceResource {
  level: PreferenceLevel;
  resourceId: string;
}
