import { eq } from "drizzle-orm";
import type { AppDatabase } from "@/lib/db";
import { ledgerEntries, type LedgerEntry } from "@/lib/db/schema";

/**
 * Durable record of completed transfers, keyed by source identity.
 *
 * The key set is loaded once when the ledger is constructed. Every
 * `record()` is a committed SQLite write, so it has reached disk by the
 * time the call returns and the caller may delete the staging file.
 */
export class Ledger {
  private readonly keys: Set<string>;

  constructor(private readonly db: AppDatabase) {
    this.keys = new Set(
      db
        .select({ key: ledgerEntries.key })
        .from(ledgerEntries)
        .all()
        .map((row) => row.key)
    );
  }

  contains(key: string): boolean {
    return this.keys.has(key);
  }

  /** Upsert; recording the same key again replaces the previous entry. */
  record(key: string, destinationId: string, completedAt: Date = new Date(), name?: string): void {
    const values = {
      key,
      destinationId,
      name: name ?? null,
      completedAt: completedAt.toISOString(),
    };
    this.db
      .insert(ledgerEntries)
      .values(values)
      .onConflictDoUpdate({
        target: ledgerEntries.key,
        set: {
          destinationId: values.destinationId,
          name: values.name,
          completedAt: values.completedAt,
        },
      })
      .run();
    this.keys.add(key);
  }

  get(key: string): LedgerEntry | undefined {
    return this.db.select().from(ledgerEntries).where(eq(ledgerEntries.key, key)).get();
  }

  entries(): LedgerEntry[] {
    return this.db.select().from(ledgerEntries).orderBy(ledgerEntries.completedAt).all();
  }

  get size(): number {
    return this.keys.size;
  }
}
