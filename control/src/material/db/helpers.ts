// db/helpers.ts - Query helpers and transaction management

import { OfferDeskError } from "@offerdesk/contracts";
import { getDatabase } from "./init";

export { getDatabase };

export function queryOne<T>(sql: string, params: unknown[] = []): T | null {
  const db = getDatabase();
  const row = db.prepare<unknown[], T>(sql).get(...params);
  return row ?? null;
}

export function queryMany<T>(sql: string, params: unknown[] = []): T[] {
  const db = getDatabase();
  return db.prepare<unknown[], T>(sql).all(...params);
}

export function execute(sql: string, params: unknown[] = []): number {
  const db = getDatabase();
  return db.prepare<unknown[]>(sql).run(...params).changes;
}

/**
 * Run fn inside a single SQLite transaction. Readers on other connections see
 * either the state before or after it, never a mix.
 */
export function transaction<T>(fn: () => T): T {
  const db = getDatabase();
  try {
    return db.transaction(fn)();
  } catch (e) {
    if (e instanceof OfferDeskError) throw e;
    const message = e instanceof Error ? e.message : String(e);
    throw new OfferDeskError("DATABASE_ERROR", message, "internal", { cause: e });
  }
}

/** SQLite stores booleans as 0/1; NULL stays null. */
export function toBool(value: number | null): boolean | null {
  return value === null ? null : value !== 0;
}
