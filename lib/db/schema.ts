import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

export const ledgerEntries = sqliteTable("ledger_entries", {
  key: text("key").primaryKey(),
  destinationId: text("destination_id").notNull(),
  name: text("name"),
  completedAt: text("completed_at").notNull(),
});

export const transferRuns = sqliteTable("transfer_runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  startedAt: text("started_at").notNull(),
  completedAt: text("completed_at"),
  status: text("status", {
    enum: ["running", "success", "failure", "cancelled", "aborted", "interrupted"],
  }).notNull(),
  totalItems: integer("total_items").notNull().default(0),
  alreadyTransferred: integer("already_transferred").notNull().default(0),
  committed: integer("committed").notNull().default(0),
  failed: integer("failed").notNull().default(0),
  errorMessage: text("error_message"),
});

export const transferLogs = sqliteTable("transfer_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  runId: integer("run_id")
    .notNull()
    .references(() => transferRuns.id),
  itemKey: text("item_key").notNull(),
  fileName: text("file_name").notNull(),
  outcome: text("outcome", { enum: ["committed", "fetch-failed", "left-on-disk"] }).notNull(),
  phase: text("phase", { enum: ["fetch", "publish"] }).notNull(),
  attempts: integer("attempts").notNull().default(0),
  destinationId: text("destination_id"),
  errorMessage: text("error_message"),
  loggedAt: text("logged_at")
    .notNull()
    .default(sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`),
});

export type LedgerEntry = typeof ledgerEntries.$inferSelect;
export type TransferRun = typeof transferRuns.$inferSelect;
export type TransferLog = typeof transferLogs.$inferSelect;
export type NewTransferLog = typeof transferLogs.$inferInsert;
