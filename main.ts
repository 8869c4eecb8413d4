import { parseArgs } from "util";
import { loadEnvFile, validateEnv, type Config } from "@/lib/env";
import { openDatabase } from "@/lib/db";
import { Ledger } from "@/lib/ledger";
import { RunHistory } from "@/lib/db/runs";
import { createHttpClient } from "@/lib/http";
import { RetryExecutor } from "@/lib/retry";
import { YandexDiskSource } from "@/lib/source/yandex-disk";
import { GoogleTokenProvider } from "@/lib/auth/google-token";
import { YouTubePublisher } from "@/lib/destination/youtube";
import {
  EXIT_RUN_FAILURE,
  dryRunPass,
  runPassForExitCode,
  runTransferPass,
  type TransferPassOptions,
} from "@/lib/transfer/engine";
import { startScheduler } from "@/lib/scheduler";
import { describeError } from "@/lib/errors";
import { createLogger, setLogLevel } from "@/lib/logger";

const log = createLogger("main");

function buildPassOptions(config: Config, ledger: Ledger, history: RunHistory, signal: AbortSignal): TransferPassOptions {
  const http = createHttpClient(config.httpTimeoutMs);
  const source = new YandexDiskSource(
    {
      publicUrl: config.source.publicUrl,
      oauthToken: config.source.oauthToken,
      fileFilter: config.source.fileFilter,
      stallTimeoutMs: config.downloadStallTimeoutMs,
    },
    http
  );
  const tokens = new GoogleTokenProvider(config.destination.tokenFile, http);
  const publisher = new YouTubePublisher(
    {
      privacyStatus: config.destination.privacyStatus,
      categoryId: config.destination.categoryId,
      tags: config.destination.tags,
      descriptionTemplate: config.destination.descriptionTemplate,
      chunkSizeBytes: config.destination.chunkSizeBytes,
    },
    tokens,
    http
  );

  return {
    lister: source,
    fetcher: source,
    publisher,
    ledger,
    history,
    retry: new RetryExecutor(config.retry),
    stagingDir: config.stagingDir,
    ledgerKey: config.ledgerKey,
    signal,
  };
}

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      "dry-run": { type: "boolean", default: false },
      once: { type: "boolean", default: false },
    },
  });

  if (loadEnvFile() && process.env.LOG_LEVEL) setLogLevel(process.env.LOG_LEVEL);
  const config = validateEnv();
  const database = openDatabase(config.databasePath);
  const ledger = new Ledger(database.db);
  const history = new RunHistory(database.db);

  const interrupted = history.recoverInterrupted();
  if (interrupted > 0) {
    log.warn("Marked runs left over from a previous crash as interrupted", { count: interrupted });
  }

  const controller = new AbortController();
  const options = buildPassOptions(config, ledger, history, controller.signal);

  try {
    if (values["dry-run"]) {
      const preview = await dryRunPass(options);
      for (const item of preview.items) {
        log.info(item.wouldTransfer ? "Would transfer" : "Would skip", {
          fileName: item.name,
          key: item.key,
          sizeBytes: item.sizeBytes,
          skipReason: item.skipReason,
        });
      }
      log.info("Dry run complete", {
        listed: preview.listed,
        wouldTransfer: preview.wouldTransfer,
        alreadyTransferred: preview.alreadyTransferred,
        totalBytes: preview.totalBytes,
      });
      return 0;
    }

    if (config.schedule && !values.once) {
      const scheduler = startScheduler(config.schedule, config.timezone, () => runTransferPass(options));
      await new Promise<void>((resolve) => {
        const shutdown = (signal: NodeJS.Signals) => {
          log.info("Shutting down — finishing the current item", { signal });
          controller.abort();
          scheduler.stop();
          resolve();
        };
        process.once("SIGINT", shutdown);
        process.once("SIGTERM", shutdown);
      });
      await scheduler.idle();
      return 0;
    }

    const onSignal = (signal: NodeJS.Signals) => {
      log.info("Stop requested — remaining items will be skipped after the current one", { signal });
      controller.abort();
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    return await runPassForExitCode(options);
  } catch (err) {
    log.error("Transfer pass could not run", { error: describeError(err) });
    return EXIT_RUN_FAILURE;
  } finally {
    database.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error("Fatal error", { error: describeError(err) });
    process.exitCode = EXIT_RUN_FAILURE;
  }
);
