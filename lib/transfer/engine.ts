import fs from "fs/promises";
import path from "path";
import type { Fetcher, SourceLister, TransferItem } from "@/lib/source/interface";
import { newPublishSession, type Publisher } from "@/lib/destination/interface";
import type { Ledger } from "@/lib/ledger";
import type { RunHistory, RunSummary } from "@/lib/db/runs";
import type { LedgerKeyMode } from "@/lib/env";
import type { RetryEvent, RetryExecutor } from "@/lib/retry";
import {
  IntegrityError,
  PermanentRunError,
  describeError,
  type TransferPhase,
} from "@/lib/errors";
import { createLogger, withItemContext, withRunContext } from "@/lib/logger";

const log = createLogger("engine");

/**
 * Per-item lifecycle. `committed`, `fetch-failed` and `left-on-disk` are
 * terminal for the pass.
 */
export type ItemState =
  | "pending"
  | "fetching"
  | "fetched"
  | "publishing"
  | "committed"
  | "fetch-failed"
  | "left-on-disk";

export type ItemResult =
  | "committed"
  | "fetch-failed"
  | "left-on-disk"
  | "already-transferred"
  | "cancelled";

export interface ItemOutcome {
  key: string;
  item: TransferItem;
  result: ItemResult;
  localPath?: string;
  destinationId?: string;
  attempts?: number;
  error?: string;
}

export interface TransferPassOptions {
  lister: SourceLister;
  fetcher: Fetcher;
  publisher: Publisher;
  ledger: Ledger;
  retry: RetryExecutor;
  stagingDir: string;
  ledgerKey?: LedgerKeyMode;
  history?: RunHistory;
  /** Checked between items; once aborted the remaining items are cancelled. */
  signal?: AbortSignal;
  now?: () => Date;
  onStateChange?: (item: TransferItem, state: ItemState) => void;
}

export interface TransferPassResult {
  runId?: number;
  status: "success" | "failure" | "cancelled";
  listed: number;
  alreadyTransferred: number;
  committed: number;
  failed: number;
  cancelled: number;
  outcomes: ItemOutcome[];
}

export function ledgerKeyFor(item: TransferItem, mode: LedgerKeyMode = "remote-id"): string {
  return mode === "name" ? item.name : item.remoteId;
}

/** Destination title: the file name without its extension. */
export function deriveTitle(fileName: string): string {
  return path.parse(fileName).name || fileName;
}

/** One staging file per item, named after the source file, never outside `stagingDir`. */
export function stagingPathFor(stagingDir: string, item: TransferItem): string {
  const base = path.basename(item.name) || item.remoteId.replace(/[^\w.-]+/g, "_");
  return path.join(stagingDir, base);
}

async function removeStagingFile(localPath: string): Promise<void> {
  await fs.rm(localPath, { force: true });
}

function logRetry(item: TransferItem, maxAttempts: number) {
  return ({ phase, attempt, delayMs, error }: RetryEvent) => {
    log.warn("Attempt failed — retrying", {
      fileName: item.name,
      phase,
      attempt,
      maxAttempts,
      delayMs,
      rateLimited: error.rateLimited,
      error: describeError(error),
    });
  };
}

/**
 * Run one phase-less collaborator call (listing, credential acquisition)
 * under the retry policy. Anything that still fails aborts the pass.
 */
async function runPrerequisite<T>(
  retry: RetryExecutor,
  phase: TransferPhase,
  what: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await retry.execute(phase, fn, {
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn(`${what} failed — retrying`, { phase, attempt, delayMs, error: describeError(error) }),
    });
  } catch (err) {
    if (err instanceof PermanentRunError) throw err;
    throw new PermanentRunError(`${what} failed: ${describeError(err)}`, { phase, cause: err });
  }
}

/**
 * Fetch → validate → publish → ledger commit → delete, for a single item.
 * Phase failures are handled here; only PermanentRunError escapes.
 */
async function processItem(
  item: TransferItem,
  key: string,
  options: TransferPassOptions
): Promise<ItemOutcome> {
  const { fetcher, publisher, ledger, retry } = options;
  const notify = (state: ItemState) => options.onStateChange?.(item, state);
  const localPath = stagingPathFor(options.stagingDir, item);
  const onRetry = logRetry(item, retry.maxAttempts);

  log.info("Processing item", { fileName: item.name, expectedSize: item.sizeBytes });

  // ── Fetch ────────────────────────────────────────────────────────────────
  notify("fetching");
  let fetchAttempts = 0;
  let sizeBytes: number;
  try {
    sizeBytes = await retry.execute(
      "fetch",
      async (attempt) => {
        fetchAttempts = attempt;
        const written = await fetcher.fetch(item, localPath);
        const { size } = await fs.stat(localPath);
        if (written !== size) {
          log.warn("Fetcher byte count differs from file on disk", { reported: written, onDisk: size });
        }
        if (item.sizeBytes !== null && size !== item.sizeBytes) {
          await removeStagingFile(localPath);
          throw new IntegrityError(item.sizeBytes, size);
        }
        return size;
      },
      { onRetry }
    );
  } catch (err) {
    await removeStagingFile(localPath);
    if (err instanceof PermanentRunError) throw err;
    const error = describeError(err);
    log.error("Fetch failed — item skipped", {
      fileName: item.name,
      phase: "fetch",
      attempts: fetchAttempts,
      error,
    });
    notify("fetch-failed");
    return { key, item, result: "fetch-failed", attempts: fetchAttempts, error };
  }
  notify("fetched");
  log.info("Item fetched", { fileName: item.name, bytes: sizeBytes });

  // ── Publish ──────────────────────────────────────────────────────────────
  notify("publishing");
  const session = newPublishSession();
  let publishAttempts = 0;
  let destinationId: string;
  try {
    destinationId = await retry.execute(
      "publish",
      (attempt) => {
        publishAttempts = attempt;
        return publisher.publish(
          { localPath, title: deriveTitle(item.name), sourceName: item.name, sizeBytes },
          session
        );
      },
      { onRetry }
    );
  } catch (err) {
    if (err instanceof PermanentRunError) throw err;
    const error = describeError(err);
    log.error("Publish failed — staging file kept for manual recovery", {
      fileName: item.name,
      phase: "publish",
      attempts: publishAttempts,
      localPath,
      error,
    });
    notify("left-on-disk");
    return { key, item, result: "left-on-disk", localPath, attempts: publishAttempts, error };
  }

  // ── Commit, then clean up ────────────────────────────────────────────────
  ledger.record(key, destinationId, options.now?.() ?? new Date(), item.name);
  try {
    await fs.unlink(localPath);
  } catch (err) {
    log.warn("Committed but could not delete staging file", {
      fileName: item.name,
      localPath,
      error: describeError(err),
    });
  }
  notify("committed");
  log.info("Item committed", { fileName: item.name, destinationId, attempts: publishAttempts });
  return { key, item, result: "committed", destinationId, attempts: publishAttempts };
}

function summarize(outcomes: ItemOutcome[]) {
  const count = (result: ItemResult) => outcomes.filter((o) => o.result === result).length;
  const failed = count("fetch-failed") + count("left-on-disk");
  return {
    alreadyTransferred: count("already-transferred"),
    committed: count("committed"),
    failed,
    cancelled: count("cancelled"),
  };
}

function recordItem(history: RunHistory | undefined, runId: number | undefined, outcome: ItemOutcome) {
  if (!history || runId === undefined) return;
  if (outcome.result === "already-transferred" || outcome.result === "cancelled") return;
  history.logItem(runId, {
    itemKey: outcome.key,
    fileName: outcome.item.name,
    outcome: outcome.result,
    phase: outcome.result === "fetch-failed" ? "fetch" : "publish",
    attempts: outcome.attempts ?? 0,
    destinationId: outcome.destinationId ?? null,
    errorMessage: outcome.error ?? null,
  });
}

/**
 * One transfer pass: list the source, drop everything already in the
 * ledger, then move the remaining items across one at a time.
 *
 * Rejects with PermanentRunError when the source cannot be listed or no
 * destination credential can be obtained; every other failure is confined
 * to its item and reported in the result.
 */
export async function runTransferPass(options: TransferPassOptions): Promise<TransferPassResult> {
  const { history } = options;
  const runId = history?.startRun(options.now?.());

  const finish = (result: TransferPassResult) => {
    if (!history || runId === undefined) return;
    const summary: RunSummary = {
      status: result.status,
      totalItems: result.listed,
      alreadyTransferred: result.alreadyTransferred,
      committed: result.committed,
      failed: result.failed,
    };
    history.finishRun(runId, summary, options.now?.());
  };

  const pass = async (): Promise<TransferPassResult> => {
    log.info("Starting transfer pass", { stagingDir: options.stagingDir, ledgerSize: options.ledger.size });
    const outcomes: ItemOutcome[] = [];
    let listed = 0;

    try {
      const items = await runPrerequisite(options.retry, "list", "Listing source", () =>
        options.lister.listItems()
      );
      listed = items.length;

      const pending: { item: TransferItem; key: string }[] = [];
      for (const item of items) {
        const key = ledgerKeyFor(item, options.ledgerKey);
        if (options.ledger.contains(key)) {
          log.info("Skipping item — already transferred", { fileName: item.name, key });
          outcomes.push({ key, item, result: "already-transferred" });
        } else {
          options.onStateChange?.(item, "pending");
          pending.push({ item, key });
        }
      }
      log.info("Source listed", {
        listed: items.length,
        pending: pending.length,
        alreadyTransferred: outcomes.length,
      });

      if (pending.length > 0) {
        await runPrerequisite(options.retry, "auth", "Connecting to destination", () =>
          options.publisher.connect()
        );
      }

      for (const { item, key } of pending) {
        if (options.signal?.aborted) {
          outcomes.push({ key, item, result: "cancelled" });
          continue;
        }
        // The same key can appear twice in one listing when keyed by name.
        if (options.ledger.contains(key)) {
          outcomes.push({ key, item, result: "already-transferred" });
          continue;
        }
        const outcome = await withItemContext(key, () => processItem(item, key, options));
        recordItem(history, runId, outcome);
        outcomes.push(outcome);
      }

      const counts = summarize(outcomes);
      const status = options.signal?.aborted ? "cancelled" : counts.failed > 0 ? "failure" : "success";
      const result: TransferPassResult = { runId, status, listed: items.length, ...counts, outcomes };

      finish(result);
      log.info("Transfer pass complete", {
        status,
        listed: result.listed,
        committed: result.committed,
        failed: result.failed,
        alreadyTransferred: result.alreadyTransferred,
        cancelled: result.cancelled,
      });
      return result;
    } catch (err) {
      const counts = summarize(outcomes);
      if (history && runId !== undefined) {
        history.finishRun(runId, {
          status: "aborted",
          totalItems: listed,
          ...counts,
          errorMessage: describeError(err),
        });
      }
      log.error("Transfer pass aborted", { error: describeError(err) });
      throw err;
    }
  };

  return runId === undefined ? pass() : withRunContext(runId, pass);
}

/** Process exit codes for a single pass. */
export const EXIT_ITEM_FAILURES = 1;
export const EXIT_RUN_FAILURE = 2;

/**
 * Run one pass and map it to an exit code: 0 when nothing failed, 1 when
 * some items failed, 2 when the pass itself could not complete.
 */
export async function runPassForExitCode(options: TransferPassOptions): Promise<number> {
  try {
    const result = await runTransferPass(options);
    return result.failed > 0 ? EXIT_ITEM_FAILURES : 0;
  } catch (err) {
    log.error("Transfer pass could not run", { error: describeError(err) });
    return EXIT_RUN_FAILURE;
  }
}

export interface DryRunItem {
  key: string;
  name: string;
  sizeBytes: number | null;
  wouldTransfer: boolean;
  skipReason: "already-transferred" | null;
}

export interface DryRunResult {
  items: DryRunItem[];
  listed: number;
  wouldTransfer: number;
  alreadyTransferred: number;
  /** Sum of known sizes of the items that would be transferred. */
  totalBytes: number;
}

/** List and filter exactly like a pass, without fetching or writing anything. */
export async function dryRunPass(
  options: Pick<TransferPassOptions, "lister" | "ledger" | "retry" | "ledgerKey">
): Promise<DryRunResult> {
  const listed = await runPrerequisite(options.retry, "list", "Listing source", () =>
    options.lister.listItems()
  );

  const items: DryRunItem[] = listed.map((item) => {
    const key = ledgerKeyFor(item, options.ledgerKey);
    const done = options.ledger.contains(key);
    return {
      key,
      name: item.name,
      sizeBytes: item.sizeBytes,
      wouldTransfer: !done,
      skipReason: done ? "already-transferred" : null,
    };
  });

  const transfer = items.filter((i) => i.wouldTransfer);
  return {
    items,
    listed: items.length,
    wouldTransfer: transfer.length,
    alreadyTransferred: items.length - transfer.length,
    totalBytes: transfer.reduce((sum, i) => sum + (i.sizeBytes ?? 0), 0),
  };
}
