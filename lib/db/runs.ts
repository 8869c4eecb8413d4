/**
 * Pass history: one row per transfer pass and one per processed item.
 * Purely informational; de-duplication only ever consults the ledger.
 */

import { desc, eq } from "drizzle-orm";
import type { AppDatabase } from "@/lib/db";
import { transferLogs, transferRuns, type NewTransferLog, type TransferRun } from "@/lib/db/schema";

export type RunStatus = TransferRun["status"];

export interface RunSummary {
  status: Exclude<RunStatus, "running" | "interrupted">;
  totalItems: number;
  alreadyTransferred: number;
  committed: number;
  failed: number;
  errorMessage?: string;
}

export type ItemLog = Omit<NewTransferLog, "id" | "runId" | "loggedAt">;

export class RunHistory {
  constructor(private readonly db: AppDatabase) {}

  startRun(startedAt: Date = new Date()): number {
    const [run] = this.db
      .insert(transferRuns)
      .values({ startedAt: startedAt.toISOString(), status: "running" })
      .returning({ id: transferRuns.id })
      .all();
    return run.id;
  }

  logItem(runId: number, entry: ItemLog): void {
    this.db
      .insert(transferLogs)
      .values({ ...entry, runId, loggedAt: new Date().toISOString() })
      .run();
  }

  finishRun(runId: number, summary: RunSummary, completedAt: Date = new Date()): void {
    this.db
      .update(transferRuns)
      .set({
        status: summary.status,
        completedAt: completedAt.toISOString(),
        totalItems: summary.totalItems,
        alreadyTransferred: summary.alreadyTransferred,
        committed: summary.committed,
        failed: summary.failed,
        errorMessage: summary.errorMessage ?? null,
      })
      .where(eq(transferRuns.id, runId))
      .run();
  }

  /**
   * Runs still marked "running" at startup were cut short by a crash or a
   * kill; mark them so they no longer look live. Returns how many changed.
   */
  recoverInterrupted(): number {
    const result = this.db
      .update(transferRuns)
      .set({ status: "interrupted", completedAt: new Date().toISOString() })
      .where(eq(transferRuns.status, "running"))
      .run();
    return result.changes;
  }

  getRun(runId: number): TransferRun | undefined {
    return this.db.select().from(transferRuns).where(eq(transferRuns.id, runId)).get();
  }

  recentRuns(limit = 10): TransferRun[] {
    return this.db.select().from(transferRuns).orderBy(desc(transferRuns.id)).limit(limit).all();
  }

  itemsForRun(runId: number) {
    return this.db
      .select()
      .from(transferLogs)
      .where(eq(transferLogs.runId, runId))
      .orderBy(transferLogs.id)
      .all();
  }
}
