// offer/filters.ts - Offer filter chain
//
// Every filter is pure: it returns a new array, keeps the relative order of
// surviving offers and never mutates its input. The chain is rebuilt from
// live preferences on every refresh so preference edits apply without restart.

import { ALL_TERM_TYPES, INSTANCE_PRODUCT_FAMILY, type InstanceOffer } from "@offerdesk/contracts";
import type { PreferenceStore } from "./types";
import { SystemPreferences } from "../preference/system";
import { parsePatterns } from "./wildcard";

// =============================================================================
// Filter Interface
// =============================================================================

export interface OfferFilter {
  readonly name: string;
  filter(offers: readonly InstanceOffer[]): InstanceOffer[];
}

// =============================================================================
// Built-in Filters
// =============================================================================

export function termTypeFilter(allowedTermTypes: ReadonlySet<string>): OfferFilter {
  return {
    name: "term-type",
    filter: offers => offers.filter(offer => allowedTermTypes.has(offer.termType)),
  };
}

/** Offers sharing one of these keys describe the same SKU price. */
export function offerDedupKey(offer: InstanceOffer): string {
  return JSON.stringify([
    offer.instanceType,
    offer.regionId,
    offer.termType,
    offer.productFamily,
    offer.operatingSystem,
    offer.tenancy,
    offer.volumeType,
  ]);
}

export function uniqueFilter(): OfferFilter {
  return {
    name: "unique",
    filter: offers => {
      const seen = new Set<string>();
      return offers.filter(offer => {
        const key = offerDedupKey(offer);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    },
  };
}

/**
 * Drops compute offers below the CPU or memory floor. Storage offers declare
 * neither and always pass, since disk pricing reads them.
 */
export function minimumRequirementsFilter(minCpu: number, minMemGb: number): OfferFilter {
  return {
    name: "minimum-requirements",
    filter: offers =>
      offers.filter(
        offer =>
          offer.productFamily !== INSTANCE_PRODUCT_FAMILY ||
          (offer.vCPU >= minCpu && offer.memoryGb >= minMemGb)
      ),
  };
}

// =============================================================================
// Composition
// =============================================================================

/** Left-to-right composition; the identity when no filters are given. */
export function composeFilters(filters: readonly OfferFilter[]): OfferFilter {
  return {
    name: filters.map(f => f.name).join(" > ") || "identity",
    filter: offers => filters.reduce<InstanceOffer[]>((acc, f) => f.filter(acc), [...offers]),
  };
}

// =============================================================================
// Settings
// =============================================================================

export interface OfferFilterSettings {
  termTypes: ReadonlySet<string>;
  unique: boolean;
  cpuMin: number;
  memMin: number;
  insertBatchSize: number;
}

export const OFFER_FILTER_DEFAULTS: Readonly<OfferFilterSettings> = Object.freeze({
  termTypes: new Set(ALL_TERM_TYPES),
  unique: true,
  cpuMin: 2,
  memMin: 3,
  insertBatchSize: 10_000,
});

/** Read the filter preferences now; absent or blank values take the defaults. */
export function resolveFilterSettings(
  preferences: PreferenceStore,
  defaults: Readonly<OfferFilterSettings> = OFFER_FILTER_DEFAULTS
): OfferFilterSettings {
  const termTypes = parsePatterns(
    preferences.getPreference(SystemPreferences.CLUSTER_INSTANCE_OFFER_FILTER_TERM_TYPES)
  );
  return {
    termTypes: termTypes.length > 0 ? new Set(termTypes) : defaults.termTypes,
    unique: preferences.getPreference(SystemPreferences.CLUSTER_INSTANCE_OFFER_FILTER_UNIQUE) ?? defaults.unique,
    cpuMin: preferences.getPreference(SystemPreferences.CLUSTER_INSTANCE_OFFER_FILTER_CPU_MIN) ?? defaults.cpuMin,
    memMin: preferences.getPreference(SystemPreferences.CLUSTER_INSTANCE_OFFER_FILTER_MEM_MIN) ?? defaults.memMin,
    insertBatchSize:
      preferences.getPreference(SystemPreferences.CLUSTER_INSTANCE_OFFER_INSERT_BATCH_SIZE) ??
      defaults.insertBatchSize,
  };
}

/** Active filters only: each is included when its activation condition holds. */
export function buildFilters(settings: OfferFilterSettings): OfferFilter[] {
  const filters: OfferFilter[] = [];
  if (settings.termTypes.size > 0) {
    filters.push(termTypeFilter(settings.termTypes));
  }
  if (settings.unique) {
    filters.push(uniqueFilter());
  }
  if (settings.cpuMin > 0 || settings.memMin > 0) {
    filters.push(minimumRequirementsFilter(settings.cpuMin, settings.memMin));
  }
  return filters;
}
