import cron from "node-cron";
import { ConfigError, describeError } from "@/lib/errors";
import { createLogger } from "@/lib/logger";

const log = createLogger("scheduler");

export interface SchedulerHandle {
  stop(): void;
  /** Resolves once the pass in flight (if any) has settled. */
  idle(): Promise<void>;
}

export interface GuardedRunner {
  /** Start a pass unless one is already running. Resolves to whether it ran. */
  trigger(): Promise<boolean>;
  readonly running: boolean;
  idle(): Promise<void>;
}

/**
 * Wrap a pass so that ticks arriving while it is still in flight are
 * skipped, and a failing pass is logged without killing the schedule.
 */
export function createGuardedRunner(runPass: () => Promise<unknown>): GuardedRunner {
  let inFlight: Promise<void> | undefined;

  return {
    get running() {
      return inFlight !== undefined;
    },
    async trigger() {
      if (inFlight) {
        log.info("Skipping scheduled pass — previous pass still running");
        return false;
      }
      inFlight = (async () => {
        try {
          await runPass();
        } catch (error) {
          log.error("Scheduled pass failed", { error: describeError(error) });
        }
      })();
      try {
        await inFlight;
      } finally {
        inFlight = undefined;
      }
      return true;
    },
    async idle() {
      await inFlight;
    },
  };
}

/**
 * Run `runPass` on a cron schedule until `stop()` is called. Overlapping
 * ticks are skipped rather than queued.
 */
export function startScheduler(
  expression: string,
  timezone: string,
  runPass: () => Promise<unknown>
): SchedulerHandle {
  if (!cron.validate(expression)) {
    throw new ConfigError([`TRANSFER_SCHEDULE: invalid cron expression "${expression}"`]);
  }

  const runner = createGuardedRunner(runPass);
  const task = cron.schedule(
    expression,
    async () => {
      log.info("Triggering scheduled pass", { expression });
      await runner.trigger();
    },
    { timezone }
  );

  log.info("Transfer pass scheduled", { expression, timezone });
  return {
    stop: () => {
      task.stop();
      log.info("Scheduler stopped");
    },
    idle: () => runner.idle(),
  };
}
