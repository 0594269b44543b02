// db/init.ts - Connection management, migrations, WAL

import Database from "better-sqlite3";
import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { OfferDeskError } from "@offerdesk/contracts";

interface Migration {
  version: number;
  sql: string;
}

let connection: Database.Database | null = null;

export function initDatabase(path: string): Database.Database {
  connection = new Database(path);
  connection.pragma("journal_mode = WAL");
  connection.pragma("foreign_keys = ON");
  connection.pragma("busy_timeout = 5000");
  return connection;
}

export function getDatabase(): Database.Database {
  if (!connection) {
    throw new OfferDeskError("DATABASE_ERROR", "Database not initialized", "internal");
  }
  return connection;
}

export function closeDatabase(): void {
  if (connection) {
    connection.close();
    connection = null;
  }
}

/** Numbered `NNN_name.sql` files beside the package, in version order. */
function loadMigrations(): Migration[] {
  const dir = fileURLToPath(new URL("../../../migrations", import.meta.url));
  const migrations: Migration[] = [];
  for (const file of readdirSync(dir)) {
    const match = /^(\d+)_.*\.sql$/.exec(file);
    if (!match?.[1]) continue;
    migrations.push({ version: Number(match[1]), sql: readFileSync(join(dir, file), "utf-8") });
  }
  return migrations.sort((a, b) => a.version - b.version);
}

/** Schema version, kept in SQLite's user_version header field. */
export function getMigrationVersion(): number {
  const version = getDatabase().pragma("user_version", { simple: true });
  return typeof version === "number" ? version : 0;
}

/** Apply pending migrations, each in its own transaction with its version bump. */
export function runMigrations(): void {
  const db = getDatabase();
  const current = getMigrationVersion();
  const migrations = loadMigrations();
  const latest = migrations.at(-1)?.version ?? 0;

  if (current > latest) {
    throw new OfferDeskError(
      "MIGRATION_ERROR",
      `Database schema v${current} is newer than the latest migration v${latest}`,
      "internal"
    );
  }

  for (const { version, sql } of migrations) {
    if (version <= current) continue;
    db.transaction(() => {
      db.exec(sql);
      db.pragma(`user_version = ${version}`);
    })();
    console.debug(`[db] Applied migration ${String(version).padStart(3, "0")}`);
  }
}
