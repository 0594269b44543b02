// preference/manager.ts - Typed preference reads + contextual list resolution

import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import { PREFERENCE_LEVEL_PRIORITY, type PreferenceLevel, type PreferenceResource } from "@offerdesk/contracts";
import { getPreferenceValue, getContextualValue } from "../material/db";
import type { ContextualPreferenceResolver, PreferenceStore } from "../offer/types";
import type { PreferenceDescriptor } from "./system";

export const PREFERENCE_DELIMITER = ",";

// =============================================================================
// Preference Manager
// =============================================================================

export function createPreferenceManager(
  read: (key: string) => unknown = getPreferenceValue
): PreferenceStore {
  return {
    getPreference<T extends TSchema>(descriptor: PreferenceDescriptor<T>): Static<T> {
      const raw = read(descriptor.key);
      if (raw === undefined) return descriptor.fallback;

      const converted = Value.Convert(descriptor.schema, raw);
      if (Value.Check(descriptor.schema, converted)) {
        return converted;
      }
      const first = Value.Errors(descriptor.schema, converted).First();
      console.warn(
        `[preferences] Invalid value for ${descriptor.key}: ${first?.message ?? "schema mismatch"}; using fallback`
      );
      return descriptor.fallback;
    },
  };
}

// =============================================================================
// Contextual Resolution
// =============================================================================

export interface ContextualSources {
  contextual: (key: string, level: PreferenceLevel, resourceId: string) => string | null;
  system: (key: string) => unknown;
}

const DB_SOURCES: ContextualSources = {
  contextual: getContextualValue,
  system: getPreferenceValue,
};

function levelRank(level: PreferenceLevel): number {
  return PREFERENCE_LEVEL_PRIORITY.indexOf(level);
}

export function createContextualResolver(
  sources: ContextualSources = DB_SOURCES
): ContextualPreferenceResolver {
  const resolveKey = (key: string, resources: readonly PreferenceResource[]): string | null => {
    const ordered = [...resources].sort((a, b) => levelRank(a.level) - levelRank(b.level));
    for (const resource of ordered) {
      const value = sources.contextual(key, resource.level, resource.resourceId);
      if (value !== null) return value;
    }
    const system = sources.system(key);
    return typeof system === "string" ? system : null;
  };

  return {
    searchList(keys, resources = []) {
      return keys
        .map(key => resolveKey(key, resources))
        .filter((value): value is string => value !== null && value.trim() !== "")
        .join(PREFERENCE_DELIMITER);
    },
  };
}
