import { z } from "zod";
import { existsSync } from "fs";
import path from "path";
import { ConfigError } from "@/lib/errors";
import type { RetryConfig } from "@/lib/retry";

/**
 * Environment variable validation.
 * Call validateEnv() at startup to fail fast with clear error messages
 * instead of failures deep inside a transfer pass.
 */

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  // Source: public folder link (https://disk.yandex.ru/d/<key>) or bare key
  SOURCE_PUBLIC_URL: z.string().min(1, "SOURCE_PUBLIC_URL is required"),
  SOURCE_OAUTH_TOKEN: z.string().optional(),
  SOURCE_FILE_FILTER: z.string().default("*.mov"),

  // Destination
  YOUTUBE_TOKEN_FILE: z.string().default("youtube_token.json"),
  YOUTUBE_PRIVACY_STATUS: z.enum(["public", "unlisted", "private"]).default("public"),
  YOUTUBE_CATEGORY_ID: z.string().regex(/^\d+$/, "YOUTUBE_CATEGORY_ID must be numeric").default("22"),
  YOUTUBE_TAGS: z.string().default(""),
  YOUTUBE_DESCRIPTION: z.string().default("Uploaded from {file}"),
  UPLOAD_CHUNK_SIZE_MB: positiveInt(8),

  // Local state
  STAGING_DIR: z.string().default("staging"),
  DATABASE_PATH: z.string().optional(),
  LEDGER_KEY: z.enum(["remote-id", "name"]).default("remote-id"),

  // Retry / timeouts
  RETRY_MAX_ATTEMPTS: positiveInt(5),
  RETRY_BASE_DELAY_MS: positiveInt(1000),
  RETRY_MAX_DELAY_MS: positiveInt(60_000),
  RETRY_RATE_LIMIT_MIN_DELAY_MS: positiveInt(30_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.2),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  DOWNLOAD_STALL_TIMEOUT_MS: positiveInt(120_000),

  // Scheduling
  TRANSFER_SCHEDULE: z.string().optional(),
  TRANSFER_TIMEZONE: z.string().default("UTC"),
});

export type LedgerKeyMode = z.infer<typeof envSchema>["LEDGER_KEY"];
export type PrivacyStatus = z.infer<typeof envSchema>["YOUTUBE_PRIVACY_STATUS"];

export interface Config {
  source: {
    publicUrl: string;
    oauthToken?: string;
    fileFilter: string;
  };
  destination: {
    tokenFile: string;
    privacyStatus: PrivacyStatus;
    categoryId: string;
    tags: string[];
    descriptionTemplate: string;
    chunkSizeBytes: number;
  };
  stagingDir: string;
  databasePath: string;
  ledgerKey: LedgerKeyMode;
  retry: RetryConfig;
  httpTimeoutMs: number;
  downloadStallTimeoutMs: number;
  schedule?: string;
  timezone: string;
}

/** Resumable upload chunks must be a multiple of 256 KiB; whole MiB always are. */
const MIB = 1024 * 1024;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const e = result.data;
  if (e.RETRY_BASE_DELAY_MS > e.RETRY_MAX_DELAY_MS) {
    throw new ConfigError(["RETRY_BASE_DELAY_MS: must not exceed RETRY_MAX_DELAY_MS"]);
  }

  return {
    source: {
      publicUrl: e.SOURCE_PUBLIC_URL,
      oauthToken: e.SOURCE_OAUTH_TOKEN || undefined,
      fileFilter: e.SOURCE_FILE_FILTER,
    },
    destination: {
      tokenFile: e.YOUTUBE_TOKEN_FILE,
      privacyStatus: e.YOUTUBE_PRIVACY_STATUS,
      categoryId: e.YOUTUBE_CATEGORY_ID,
      tags: e.YOUTUBE_TAGS.split(",")
        .map((t) => t.trim())
        .filter(Boolean),
      descriptionTemplate: e.YOUTUBE_DESCRIPTION,
      chunkSizeBytes: e.UPLOAD_CHUNK_SIZE_MB * MIB,
    },
    stagingDir: path.resolve(e.STAGING_DIR),
    databasePath: e.DATABASE_PATH || path.join(process.cwd(), "data", "media-relay.db"),
    ledgerKey: e.LEDGER_KEY,
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
      rateLimitMinDelayMs: e.RETRY_RATE_LIMIT_MIN_DELAY_MS,
      jitterRatio: e.RETRY_JITTER_RATIO,
    },
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    downloadStallTimeoutMs: e.DOWNLOAD_STALL_TIMEOUT_MS,
    schedule: e.TRANSFER_SCHEDULE || undefined,
    timezone: e.TRANSFER_TIMEZONE,
  };
}

/** Load KEY=value lines from `file` into process.env. Returns false when there is no such file. */
export function loadEnvFile(file = ".env"): boolean {
  if (!existsSync(file)) return false;
  process.loadEnvFile(file);
  return true;
}

export function validateEnv(): Config {
  try {
    const config = loadConfig();
    console.log("[media-relay] ✓ Environment validated");
    return config;
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(
      `\n[media-relay] ❌ Invalid environment configuration — cannot start:\n` +
        `${err.issues.map((i) => `  - ${i}`).join("\n")}\n` +
        `  See .env.example for the supported variables.\n`
    );
    process.exit(1);
  }
}
