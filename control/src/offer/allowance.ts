// offer/allowance.ts - Allowed instance and price type resolution
//
// An instance type is allowed when it matches one of the patterns resolved
// from the contextual preference keys AND the catalog offers it in the region
// under the requested term. A blank pattern list allows everything.

import {
  PriceType,
  TermType,
  termTypeFor,
  type AllowedInstanceAndPriceTypes,
  type InstanceType,
  type PreferenceResource,
} from "@offerdesk/contracts";
import {
  INSTANCE_TYPES_PREFERENCES,
  MASTER_PRICE_TYPES_PREFERENCES,
  PRICE_TYPES_PREFERENCES,
  SystemPreferences,
  TOOL_INSTANCE_TYPES_PREFERENCES,
} from "../preference/system";
import type {
  CloudProviderAdapter,
  ContextualPreferenceResolver,
  OfferStore,
  PreferenceStore,
  RegionStore,
} from "./types";
import { matchesAny, parsePatterns } from "./wildcard";

type RegionRef = number | null | undefined;

export interface AllowancePolicyResolver {
  /** The given region, or the default region's id. */
  defaultRegionIfNull(regionId?: RegionRef): number;
  /** An unset spot flag takes the `cluster.spot` preference. */
  isSpotRequest(spot?: boolean | null): boolean;

  isInstanceAllowed(
    instanceType: string,
    regionId: RegionRef,
    spot: boolean,
    resources?: readonly PreferenceResource[]
  ): boolean;
  isToolInstanceAllowed(
    instanceType: string,
    regionId: RegionRef,
    spot: boolean,
    resources?: readonly PreferenceResource[]
  ): boolean;
  /** On-demand or spot, in any region. */
  isToolInstanceAllowedInAnyRegion(instanceType: string, toolResource?: PreferenceResource): boolean;
  isPriceTypeAllowed(priceType: string, resources?: readonly PreferenceResource[], isMaster?: boolean): boolean;

  getAllowedInstanceTypes(regionId?: RegionRef, spot?: boolean | null): InstanceType[];
  getAllowedToolInstanceTypes(regionId?: RegionRef, spot?: boolean | null): InstanceType[];
  /** System-wide allow-list across every region, on-demand and spot. */
  getAllAllowedInstanceTypes(): InstanceType[];
  getAllowedInstanceAndPriceTypes(
    toolId?: number | null,
    regionId?: RegionRef,
    spot?: boolean | null
  ): AllowedInstanceAndPriceTypes;
}

export interface AllowancePolicyResolverDeps {
  regions: RegionStore;
  offers: OfferStore;
  cloud: CloudProviderAdapter;
  preferences: PreferenceStore;
  contextual: ContextualPreferenceResolver;
}

const ALL_PRICE_TYPES: readonly string[] = Object.values(PriceType);

export function toolResource(toolId: number | null | undefined): PreferenceResource | null {
  return toolId === null || toolId === undefined ? null : { level: "tool", resourceId: String(toolId) };
}

function withRegionScope(
  resources: readonly PreferenceResource[],
  regionId: number | null
): PreferenceResource[] {
  if (regionId === null) return [...resources];
  return [...resources, { level: "region", resourceId: String(regionId) }];
}

function allowedBy(patterns: readonly string[], candidate: string): boolean {
  return patterns.length === 0 || matchesAny(patterns, candidate);
}

export function createAllowancePolicyResolver(deps: AllowancePolicyResolverDeps): AllowancePolicyResolver {
  const { regions, offers, cloud, preferences, contextual } = deps;

  const defaultRegionIfNull = (regionId?: RegionRef): number =>
    regionId ?? regions.loadDefault().id;

  const isSpotRequest = (spot?: boolean | null): boolean =>
    spot ?? preferences.getPreference(SystemPreferences.CLUSTER_SPOT);

  const resolvePatterns = (
    keys: readonly string[],
    resources: readonly PreferenceResource[],
    regionId: number | null
  ): string[] => parsePatterns(contextual.searchList(keys, withRegionScope(resources, regionId)));

  const isOffered = (instanceType: string, regionId: number | null, spot: boolean): boolean => {
    const candidates = offers.loadOffers({
      instanceType,
      ...(regionId === null ? {} : { regionId }),
      ...(spot ? {} : { termType: TermType.ON_DEMAND }),
    });
    const wanted = instanceType.toLowerCase();
    return candidates.some(
      offer =>
        offer.instanceType.toLowerCase() === wanted &&
        offer.termType.toLowerCase() === termTypeFor(offer.cloudProvider, spot).toLowerCase()
    );
  };

  const isInstanceTypeAllowed = (
    instanceType: string,
    resources: readonly PreferenceResource[],
    regionId: number | null,
    keys: readonly string[],
    spot: boolean
  ): boolean =>
    instanceType.trim() !== "" &&
    allowedBy(resolvePatterns(keys, resources, regionId), instanceType) &&
    isOffered(instanceType, regionId, spot);

  const filterBySystemPattern = (types: InstanceType[], value: string): InstanceType[] => {
    const patterns = parsePatterns(value);
    return types.filter(type => allowedBy(patterns, type.name));
  };

  return {
    defaultRegionIfNull,
    isSpotRequest,

    isInstanceAllowed(instanceType, regionId, spot, resources = []) {
      return isInstanceTypeAllowed(
        instanceType,
        resources,
        defaultRegionIfNull(regionId),
        INSTANCE_TYPES_PREFERENCES,
        spot
      );
    },

    isToolInstanceAllowed(instanceType, regionId, spot, resources = []) {
      return isInstanceTypeAllowed(
        instanceType,
        resources,
        defaultRegionIfNull(regionId),
        TOOL_INSTANCE_TYPES_PREFERENCES,
        spot
      );
    },

    isToolInstanceAllowedInAnyRegion(instanceType, tool) {
      const resources = tool ? [tool] : [];
      return (
        isInstanceTypeAllowed(instanceType, resources, null, TOOL_INSTANCE_TYPES_PREFERENCES, false) ||
        isInstanceTypeAllowed(instanceType, resources, null, TOOL_INSTANCE_TYPES_PREFERENCES, true)
      );
    },

    isPriceTypeAllowed(priceType, resources = [], isMaster = false) {
      const keys = isMaster ? MASTER_PRICE_TYPES_PREFERENCES : PRICE_TYPES_PREFERENCES;
      return allowedBy(resolvePatterns(keys, resources, null), priceType);
    },

    getAllowedInstanceTypes(regionId, spot) {
      return filterBySystemPattern(
        cloud.getAllInstanceTypes(defaultRegionIfNull(regionId), isSpotRequest(spot)),
        preferences.getPreference(SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES)
      );
    },

    getAllowedToolInstanceTypes(regionId, spot) {
      return filterBySystemPattern(
        cloud.getAllInstanceTypes(defaultRegionIfNull(regionId), isSpotRequest(spot)),
        preferences.getPreference(SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES_DOCKER)
      );
    },

    getAllAllowedInstanceTypes() {
      const all = [...cloud.getAllInstanceTypes(null, false), ...cloud.getAllInstanceTypes(null, true)];
      return filterBySystemPattern(all, preferences.getPreference(SystemPreferences.CLUSTER_ALLOWED_INSTANCE_TYPES));
    },

    getAllowedInstanceAndPriceTypes(toolId, regionId, spot) {
      const region = defaultRegionIfNull(regionId);
      const tool = toolResource(toolId);
      const resources = tool ? [tool] : [];
      const instanceTypes = cloud.getAllInstanceTypes(region, isSpotRequest(spot));

      const instancePatterns = resolvePatterns(INSTANCE_TYPES_PREFERENCES, resources, region);
      const toolPatterns = resolvePatterns(TOOL_INSTANCE_TYPES_PREFERENCES, resources, region);
      // Price types are scoped by tool only, matching isPriceTypeAllowed.
      const pricePatterns = resolvePatterns(PRICE_TYPES_PREFERENCES, resources, null);
      const masterPricePatterns = resolvePatterns(MASTER_PRICE_TYPES_PREFERENCES, resources, null);

      return {
        allowedInstanceTypes: instanceTypes.filter(type => allowedBy(instancePatterns, type.name)),
        allowedToolInstanceTypes: instanceTypes.filter(type => allowedBy(toolPatterns, type.name)),
        allowedPriceTypes: ALL_PRICE_TYPES.filter(type => allowedBy(pricePatterns, type)),
        allowedMasterPriceTypes: ALL_PRICE_TYPES.filter(type => allowedBy(masterPricePatterns, type)),
      };
    },
  };
}
