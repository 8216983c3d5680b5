import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import path from "node:path";
import Database from "better-sqlite3";
import type { RunResult } from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";

import * as schema from "@/lib/db/schema";
import { logger } from "@/lib/logger";

// Shared by the connection and by `db.transaction` callbacks.
export type Db = BaseSQLiteDatabase<"sync", RunResult, typeof schema>;

export interface DatabaseHandle {
  db: Db;
  close: () => void;
}

const SCHEMA_FILE = path.join(path.dirname(fileURLToPath(import.meta.url)), "schema.sql");

// Child tables first so that foreign keys never block the drop.
const TABLES_IN_DROP_ORDER = [
  "change_orders",
  "tasks",
  "progress_photos",
  "transactions",
  "projects",
  "users",
] as const;

function loadSchemaSql(): string {
  return readFileSync(SCHEMA_FILE, "utf8");
}

export function createDatabase(filename: string): DatabaseHandle {
  const sqlite = new Database(filename);
  sqlite.pragma("foreign_keys = ON");
  if (filename !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(loadSchemaSql());

  logger.info("Database ready", { filename });

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

export function resetDatabase(filename: string): void {
  const sqlite = new Database(filename);
  try {
    sqlite.pragma("foreign_keys = OFF");
    const dropAll = sqlite.transaction(() => {
      for (const table of TABLES_IN_DROP_ORDER) {
        sqlite.exec(`DROP TABLE IF EXISTS ${table}`);
      }
    });
    dropAll();
    sqlite.exec(loadSchemaSql());
    logger.warn("Database reset", { filename, tables: TABLES_IN_DROP_ORDER.length });
  } finally {
    sqlite.close();
  }
}
