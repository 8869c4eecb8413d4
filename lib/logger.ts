import pino from "pino";
import { AsyncLocalStorage } from "async_hooks";

// ---------------------------------------------------------------------------
// Async context store: propagates the current pass and item through async
// call stacks without threading them through every collaborator signature.
// ---------------------------------------------------------------------------
interface LogContext {
  runId?: number;
  itemKey?: string;
}

const store = new AsyncLocalStorage<LogContext>();

// ---------------------------------------------------------------------------
// Sensitive field redaction: matched against every log object and replaced
// with "[REDACTED]" before the line is written.
// ---------------------------------------------------------------------------
const REDACT_PATHS = [
  "token",
  "accessToken",
  "refreshToken",
  "clientSecret",
  "authorization",
  "Authorization",
  "*.token",
  "*.accessToken",
  "*.refreshToken",
  "*.clientSecret",
  "*.authorization",
  "*.Authorization",
];

// ---------------------------------------------------------------------------
// Base pino logger
// - JSON lines on stdout
// - LOG_LEVEL controls verbosity (default: info, "silent" under test)
// ---------------------------------------------------------------------------
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "media-relay" },
  redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Applied after a .env file has been loaded at start-up. */
export function setLogLevel(level: string): void {
  baseLogger.level = level;
}

type Extra = Record<string, unknown>;

export interface Logger {
  debug(msg: string, extra?: Extra): void;
  info(msg: string, extra?: Extra): void;
  warn(msg: string, extra?: Extra): void;
  error(msg: string, extra?: Extra): void;
}

function child(component: string) {
  return baseLogger.child({ component, ...store.getStore() });
}

/**
 * Create a structured logger bound to a named component.
 *
 *   const log = createLogger("engine");
 *   log.info("Item committed", { destinationId });
 *
 * Each line carries at least { level, time, service, component, msg } plus
 * runId / itemKey when emitted inside a context runner.
 */
export function createLogger(component: string): Logger {
  return {
    debug: (msg, extra) => child(component).debug(extra ?? {}, msg),
    info: (msg, extra) => child(component).info(extra ?? {}, msg),
    warn: (msg, extra) => child(component).warn(extra ?? {}, msg),
    error: (msg, extra) => child(component).error(extra ?? {}, msg),
  };
}

/** Attach a run id to every log line emitted inside `fn`. */
export function withRunContext<T>(runId: number, fn: () => Promise<T>): Promise<T> {
  return store.run({ runId }, fn);
}

/**
 * Attach an item key to every log line emitted inside `fn`, keeping the
 * enclosing run id.
 */
export function withItemContext<T>(itemKey: string, fn: () => Promise<T>): Promise<T> {
  return store.run({ ...store.getStore(), itemKey }, fn);
}
