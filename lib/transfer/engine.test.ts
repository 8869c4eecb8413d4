import { existsSync } from "fs";
import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  deriveTitle,
  dryRunPass,
  ledgerKeyFor,
  runPassForExitCode,
  runTransferPass,
  stagingPathFor,
  type ItemState,
} from "./engine";
import { Ledger } from "@/lib/ledger";
import { RunHistory } from "@/lib/db/runs";
import type { DatabaseHandle } from "@/lib/db";
import { PermanentItemError, PermanentRunError, TransientError } from "@/lib/errors";
import type { RetryConfig } from "@/lib/retry";
import {
  FakePublisher,
  FakeSource,
  makeTempDir,
  memoryDatabase,
  recordingRetry,
  type FakeFile,
} from "@/test/fakes";

const LISTING: FakeFile[] = [
  { remoteId: "a1", name: "clip1.mov", size: 1000 },
  { remoteId: "a2", name: "clip2.mov", size: 2000 },
];

describe("runTransferPass", () => {
  let dir: string;
  let stagingDir: string;
  let database: DatabaseHandle;
  let ledger: Ledger;

  beforeEach(async () => {
    dir = await makeTempDir();
    stagingDir = path.join(dir, "staging");
    database = memoryDatabase();
    ledger = new Ledger(database.db);
  });

  afterEach(async () => {
    database.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function setup(files: FakeFile[] = LISTING, retryOverrides: Partial<RetryConfig> = {}) {
    const source = new FakeSource(files, stagingDir);
    const publisher = new FakePublisher();
    const { retry, delays } = recordingRetry(retryOverrides);
    const options = { lister: source, fetcher: source, publisher, ledger, retry, stagingDir };
    return { source, publisher, delays, options };
  }

  it("transfers every new item in listing order and leaves no staging files", async () => {
    const { source, publisher, options } = setup();

    const result = await runTransferPass(options);

    expect(result.status).toBe("success");
    expect(result.committed).toBe(2);
    expect(source.fetched).toEqual(["a1", "a2"]);
    expect(publisher.calls.map((c) => c.request.sourceName)).toEqual(["clip1.mov", "clip2.mov"]);
    expect(ledger.get("a1")?.destinationId).toBe("yt1");
    expect(ledger.get("a2")?.destinationId).toBe("yt2");
    expect(ledger.get("a1")?.name).toBe("clip1.mov");
    expect(await fs.readdir(stagingDir)).toEqual([]);
  });

  it("hands the publisher the staged file with a title derived from the name", async () => {
    const { publisher, options } = setup();

    await runTransferPass(options);

    expect(publisher.calls[0].fileExisted).toBe(true);
    expect(publisher.calls[0].request).toEqual({
      localPath: path.join(stagingDir, "clip1.mov"),
      title: "clip1",
      sourceName: "clip1.mov",
      sizeBytes: 1000,
    });
  });

  it("keeps the file of an item the destination rejects and carries on", async () => {
    const { publisher, delays, options } = setup();
    publisher.alwaysFail.set("clip2.mov", new PermanentItemError("rejected"));

    const result = await runTransferPass(options);

    expect(result.status).toBe("failure");
    expect(result.committed).toBe(1);
    expect(result.failed).toBe(1);
    expect(ledger.contains("a1")).toBe(true);
    expect(ledger.contains("a2")).toBe(false);
    expect(existsSync(path.join(stagingDir, "clip1.mov"))).toBe(false);
    expect(existsSync(path.join(stagingDir, "clip2.mov"))).toBe(true);
    expect(result.outcomes[1]).toMatchObject({ result: "left-on-disk", attempts: 1, error: "rejected" });
    expect(publisher.calls).toHaveLength(2);
    expect(delays).toEqual([]);
  });

  it("transfers nothing the second time over an unchanged source", async () => {
    const { source, publisher, options } = setup();

    await runTransferPass(options);
    const second = await runTransferPass(options);

    expect(second.committed).toBe(0);
    expect(second.alreadyTransferred).toBe(2);
    expect(source.fetched).toEqual(["a1", "a2"]);
    expect(publisher.connectCalls).toBe(1);
  });

  it("never fetches an item whose key is already in the ledger", async () => {
    ledger.record("a1", "yt-old");
    const { source, options } = setup();

    const result = await runTransferPass(options);

    expect(source.fetched).toEqual(["a2"]);
    expect(result.alreadyTransferred).toBe(1);
    expect(ledger.get("a1")?.destinationId).toBe("yt-old");
  });

  it("never has two staging files at once", async () => {
    const { source, publisher, options } = setup([
      ...LISTING,
      { remoteId: "a3", name: "clip3.mov", size: 10 },
    ]);
    publisher.alwaysFail.set("clip1.mov", new PermanentItemError("rejected"));

    await runTransferPass(options);

    // clip1 stays behind as a recovery file; nothing else accumulates next to it.
    expect(source.stagingSnapshots).toEqual([[], ["clip1.mov"], ["clip1.mov"]]);
  });

  it("commits to the ledger while the file still exists, then deletes it", async () => {
    const { options } = setup([LISTING[0]]);
    const seen: boolean[] = [];
    const record = ledger.record.bind(ledger);
    vi.spyOn(ledger, "record").mockImplementation((...args) => {
      seen.push(existsSync(path.join(stagingDir, "clip1.mov")));
      record(...args);
    });

    await runTransferPass(options);

    expect(seen).toEqual([true]);
    expect(existsSync(path.join(stagingDir, "clip1.mov"))).toBe(false);
  });

  it("walks each item through its lifecycle states", async () => {
    const { options } = setup([LISTING[0]]);
    const states: ItemState[] = [];

    await runTransferPass({ ...options, onStateChange: (_item, state) => states.push(state) });

    expect(states).toEqual(["pending", "fetching", "fetched", "publishing", "committed"]);
  });

  describe("retries", () => {
    it("commits an item whose fetch fails twice then succeeds", async () => {
      const { source, delays, options } = setup();
      source.fetchFailures.set("a1", [new TransientError("reset"), new TransientError("reset")]);

      const result = await runTransferPass(options);

      expect(result.outcomes[0].result).toBe("committed");
      expect(source.fetched).toEqual(["a1", "a1", "a1", "a2"]);
      expect(delays).toEqual([1000, 2000]);
    });

    it("treats errors a collaborator did not classify as transient", async () => {
      const { publisher, delays, options } = setup([LISTING[0]]);
      publisher.failures.set("clip1.mov", [new Error("socket hang up")]);

      const result = await runTransferPass(options);

      expect(result.committed).toBe(1);
      expect(delays).toEqual([1000]);
    });

    it("gives up after the configured attempts with growing delays and keeps the file", async () => {
      const { publisher, delays, options } = setup();
      publisher.alwaysFail.set("clip1.mov", new TransientError("backend error", { statusCode: 503 }));

      const result = await runTransferPass(options);

      const clip1Calls = publisher.calls.filter((c) => c.request.sourceName === "clip1.mov");
      expect(clip1Calls).toHaveLength(5);
      expect(delays).toEqual([1000, 2000, 4000, 8000]);
      expect(result.outcomes[0]).toMatchObject({
        result: "left-on-disk",
        attempts: 5,
        error: "Gave up after 5 attempts: backend error (503)",
      });
      expect(existsSync(path.join(stagingDir, "clip1.mov"))).toBe(true);
      expect(ledger.contains("a2")).toBe(true);
    });

    it("passes the same upload session to every attempt for an item", async () => {
      const { publisher, options } = setup([LISTING[0]]);
      publisher.failures.set("clip1.mov", [new TransientError("503")]);

      await runTransferPass(options);

      expect(publisher.calls).toHaveLength(2);
      expect(publisher.calls[1].session).toBe(publisher.calls[0].session);
    });

    it("waits at least the rate-limit delay after a quota failure", async () => {
      const { publisher, delays, options } = setup([LISTING[0]]);
      publisher.failures.set("clip1.mov", [new TransientError("quota", { rateLimited: true })]);

      await runTransferPass(options);

      expect(delays).toEqual([30_000]);
    });
  });

  describe("fetch failures", () => {
    it("removes a download whose size does not match the listing", async () => {
      const { source, publisher, delays, options } = setup(LISTING, { maxAttempts: 3 });
      source.writeBytes.set("a1", 999);

      const result = await runTransferPass(options);

      expect(result.outcomes[0]).toMatchObject({ result: "fetch-failed", attempts: 3 });
      expect(delays).toEqual([1000, 2000]);
      expect(existsSync(path.join(stagingDir, "clip1.mov"))).toBe(false);
      expect(publisher.calls.map((c) => c.request.sourceName)).toEqual(["clip2.mov"]);
    });

    it("skips size validation when the source reports no size", async () => {
      const { source, options } = setup([{ remoteId: "a1", name: "clip1.mov", size: null }]);
      source.writeBytes.set("a1", 42);

      const result = await runTransferPass(options);

      expect(result.committed).toBe(1);
    });

    it("does not retry a permanent fetch failure and deletes the partial file", async () => {
      const { source, delays, options } = setup();
      source.fetchFailures.set("a1", [new PermanentItemError("gone", { statusCode: 404 })]);

      const result = await runTransferPass(options);

      expect(result.outcomes[0]).toMatchObject({ result: "fetch-failed", error: "gone (404)" });
      expect(source.fetched).toEqual(["a1", "a2"]);
      expect(delays).toEqual([]);
      expect(existsSync(path.join(stagingDir, "clip1.mov"))).toBe(false);
      expect(ledger.contains("a2")).toBe(true);
    });
  });

  describe("run-level failures", () => {
    it("aborts before any item when the source cannot be listed", async () => {
      const { source, publisher, options } = setup();
      source.listFailures.push(new PermanentRunError("folder not found"));

      await expect(runTransferPass(options)).rejects.toThrow("folder not found");
      expect(source.fetched).toEqual([]);
      expect(publisher.connectCalls).toBe(0);
    });

    it("retries a transient listing failure", async () => {
      const { source, delays, options } = setup();
      source.listFailures.push(new TransientError("timeout"));

      const result = await runTransferPass(options);

      expect(source.listCalls).toBe(2);
      expect(delays).toEqual([1000]);
      expect(result.committed).toBe(2);
    });

    it("turns an exhausted listing retry into a run failure", async () => {
      const { source, options } = setup(LISTING, { maxAttempts: 2 });
      source.listFailures.push(new TransientError("timeout"), new TransientError("timeout"));

      await expect(runTransferPass(options)).rejects.toBeInstanceOf(PermanentRunError);
      expect(source.fetched).toEqual([]);
    });

    it("aborts before any item when no destination credential is available", async () => {
      const { source, publisher, options } = setup();
      publisher.connectError = new PermanentRunError("token file missing");

      await expect(runTransferPass(options)).rejects.toThrow("token file missing");
      expect(source.fetched).toEqual([]);
    });
  });

  it("cancels the remaining items once the signal is aborted", async () => {
    const { source, options } = setup();
    const controller = new AbortController();

    const result = await runTransferPass({
      ...options,
      signal: controller.signal,
      onStateChange: (item, state) => {
        if (item.remoteId === "a1" && state === "committed") controller.abort();
      },
    });

    expect(result.status).toBe("cancelled");
    expect(result.committed).toBe(1);
    expect(result.cancelled).toBe(1);
    expect(source.fetched).toEqual(["a1"]);
  });

  it("transfers a repeated name only once when keyed by name", async () => {
    const { source, options } = setup([
      { remoteId: "a1", name: "clip.mov", size: 10 },
      { remoteId: "a2", name: "clip.mov", size: 10 },
    ]);

    const result = await runTransferPass({ ...options, ledgerKey: "name" });

    expect(source.fetched).toEqual(["a1"]);
    expect(result.committed).toBe(1);
    expect(result.alreadyTransferred).toBe(1);
    expect(ledger.contains("clip.mov")).toBe(true);
  });

  describe("run history", () => {
    it("records the pass and each processed item", async () => {
      const history = new RunHistory(database.db);
      const { publisher, options } = setup();
      publisher.alwaysFail.set("clip2.mov", new PermanentItemError("rejected"));

      const result = await runTransferPass({ ...options, history });

      expect(result.runId).toBeDefined();
      const runId = result.runId ?? -1;
      expect(history.getRun(runId)).toMatchObject({
        status: "failure",
        totalItems: 2,
        committed: 1,
        failed: 1,
        alreadyTransferred: 0,
      });
      const items = history.itemsForRun(runId);
      expect(items.map((i) => [i.itemKey, i.outcome, i.destinationId])).toEqual([
        ["a1", "committed", "yt1"],
        ["a2", "left-on-disk", null],
      ]);
      expect(items[1].errorMessage).toBe("rejected");
    });

    it("marks an aborted pass with its error", async () => {
      const history = new RunHistory(database.db);
      const { source, options } = setup();
      source.listFailures.push(new PermanentRunError("folder not found"));

      await expect(runTransferPass({ ...options, history })).rejects.toThrow();

      const [run] = history.recentRuns(1);
      expect(run.status).toBe("aborted");
      expect(run.errorMessage).toBe("folder not found");
      expect(run.completedAt).not.toBeNull();
    });

    it("counts every listed item on a pass aborted after listing", async () => {
      const history = new RunHistory(database.db);
      const { publisher, options } = setup();
      publisher.connectError = new PermanentRunError("token file missing");

      await expect(runTransferPass({ ...options, history })).rejects.toThrow("token file missing");

      const [run] = history.recentRuns(1);
      expect(run).toMatchObject({ status: "aborted", totalItems: 2, committed: 0 });
    });
  });

  describe("exit codes", () => {
    it("exits 0 when every item is committed", async () => {
      const { options } = setup();
      await expect(runPassForExitCode(options)).resolves.toBe(0);
    });

    it("exits 1 when some items failed", async () => {
      const { publisher, options } = setup();
      publisher.alwaysFail.set("clip2.mov", new PermanentItemError("rejected"));

      await expect(runPassForExitCode(options)).resolves.toBe(1);
    });

    it("exits 2 when the ledger cannot be written", async () => {
      const { options } = setup();
      vi.spyOn(ledger, "record").mockImplementation(() => {
        throw new Error("disk I/O error");
      });

      await expect(runPassForExitCode(options)).resolves.toBe(2);
    });

    it("exits 2 when the source cannot be listed", async () => {
      const { source, options } = setup();
      source.listFailures.push(new PermanentRunError("folder not found"));

      await expect(runPassForExitCode(options)).resolves.toBe(2);
    });
  });
});

describe("dryRunPass", () => {
  it("reports what a pass would transfer without fetching", async () => {
    const database = memoryDatabase();
    const ledger = new Ledger(database.db);
    ledger.record("a1", "yt1");
    const source = new FakeSource(LISTING);
    const { retry } = recordingRetry();

    const preview = await dryRunPass({ lister: source, ledger, retry });

    expect(preview.items.map((i) => [i.key, i.wouldTransfer, i.skipReason])).toEqual([
      ["a1", false, "already-transferred"],
      ["a2", true, null],
    ]);
    expect(preview.wouldTransfer).toBe(1);
    expect(preview.alreadyTransferred).toBe(1);
    expect(preview.totalBytes).toBe(2000);
    expect(source.fetched).toEqual([]);
    database.close();
  });
});

describe("helpers", () => {
  const item = { remoteId: "disk:abc", name: "Holiday 2023.MOV", path: "/Holiday 2023.MOV", sizeBytes: 5 };

  it("keys items by remote id unless configured for names", () => {
    expect(ledgerKeyFor(item)).toBe("disk:abc");
    expect(ledgerKeyFor(item, "name")).toBe("Holiday 2023.MOV");
  });

  it("strips the extension for the title", () => {
    expect(deriveTitle("Holiday 2023.MOV")).toBe("Holiday 2023");
    expect(deriveTitle("no-extension")).toBe("no-extension");
  });

  it("keeps staging paths inside the staging directory", () => {
    expect(stagingPathFor("/tmp/s", { ...item, name: "../../etc/passwd" })).toBe("/tmp/s/passwd");
    expect(stagingPathFor("/tmp/s", { ...item, name: "" })).toBe("/tmp/s/disk_abc");
  });
});
