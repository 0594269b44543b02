// db/preferences.ts - System-wide and contextual preference values
//
// System values are stored as JSON; contextual values are plain strings
// (comma-delimited pattern lists) scoped by level + resource id.

import type { PreferenceLevel } from "@offerdesk/contracts";
import { queryOne, execute } from "./helpers";

export function getPreferenceValue(key: string): unknown {
  const row = queryOne<{ value: string }>("SELECT value FROM preferences WHERE key = ?", [key]);
  if (!row) return undefined;
  try {
    const parsed: unknown = JSON.parse(row.value);
    return parsed;
  } catch {
    // Legacy rows written as bare strings
    return row.value;
  }
}

export function setPreferenceValue(key: string, value: unknown): void {
  execute(
    `INSERT INTO preferences (key, value, updated_at) VALUES (?, ?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    [key, JSON.stringify(value), Date.now()]
  );
}

export function deletePreferenceValue(key: string): void {
  execute("DELETE FROM preferences WHERE key = ?", [key]);
}

export function getContextualValue(
  key: string,
  level: PreferenceLevel,
  resourceId: string
): string | null {
  const row = queryOne<{ value: string }>(
    "SELECT value FROM contextual_preferences WHERE key = ? AND level = ? AND resource_id = ?",
    [key, level, resourceId]
  );
  return row?.value ?? null;
}

export function setContextualValue(
  key: string,
  level: PreferenceLevel,
  resourceId: string,
  value: string
): void {
  execute(
    `INSERT INTO contextual_preferences (key, level, resource_id, value, updated_at) VALUES (?, ?, ?, ?, ?)
     ON CONFLICT(key, level, resource_id) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`,
    [key, level, resourceId, value, Date.now()]
  );
}
