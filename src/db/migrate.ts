import { dbLogger } from "../logger.js";

import type { Database } from "./schema.js";
import type { Kysely } from "kysely";

/**
 * Create the job tables if they do not exist yet
 */
export async function migrate(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable("sync_jobs")
    .ifNotExists()
    .addColumn("id", "text", (col) => col.primaryKey())
    .addColumn("network_view", "text", (col) => col.notNull())
    .addColumn("state", "text", (col) => col.notNull())
    .addColumn("progress_current", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("progress_total", "integer", (col) =>
      col.notNull().defaultTo(0)
    )
    .addColumn("progress_message", "text", (col) =>
      col.notNull().defaultTo("")
    )
    .addColumn("outcome", "text", (col) => col.notNull())
    .addColumn("error", "text")
    .addColumn("created_at", "text", (col) => col.notNull())
    .addColumn("started_at", "text")
    .addColumn("completed_at", "text")
    .execute();

  await db.schema
    .createIndex("idx_sync_jobs_created_at")
    .ifNotExists()
    .on("sync_jobs")
    .column("created_at")
    .execute();

  dbLogger.debug("Job database schema is up to date");
}
