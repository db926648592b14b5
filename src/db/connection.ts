import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import SQLite from "better-sqlite3";
import { Kysely, SqliteDialect } from "kysely";

import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";

export const DEFAULT_DB_PATH = "./data/jobs.db";

/**
 * Open the job database at `path` (":memory:" for a throwaway one)
 */
export function createDatabase(
  path = process.env.DB_PATH ?? DEFAULT_DB_PATH
): Kysely<Database> {
  if (path !== ":memory:") {
    // Ensure data directory exists
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  const database = new SQLite(path);
  database.pragma("journal_mode = WAL");

  dbLogger.debug({ path }, "Opened job database");

  return new Kysely<Database>({
    dialect: new SqliteDialect({ database }),
  });
}

/**
 * Gracefully close the database connection
 */
export async function closeDatabase(db: Kysely<Database>): Promise<void> {
  try {
    await db.destroy();
    dbLogger.debug("Job database closed");
  } catch (error) {
    dbLogger.error({ error }, "Error closing job database");
    throw error;
  }
}
