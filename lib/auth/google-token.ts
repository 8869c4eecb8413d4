import fs from "fs/promises";
import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { PermanentRunError, TransientError } from "@/lib/errors";
import { classifyRequestError } from "@/lib/http";
import { createLogger } from "@/lib/logger";

const log = createLogger("google-token");

const DEFAULT_TOKEN_URI = "https://oauth2.googleapis.com/token";

/** Refresh this long before the reported expiry. */
const EXPIRY_SKEW_MS = 60_000;

/**
 * Authorized-user token file, as written by Google's installed-app flow.
 * Unknown fields are preserved when the file is rewritten.
 */
const tokenFileSchema = z
  .object({
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    token: z.string().optional(),
    expiry: z.string().optional(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

type TokenFile = z.infer<typeof tokenFileSchema>;

const refreshResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}

/**
 * Hands out OAuth access tokens for the destination, refreshing them from
 * the stored refresh token as they expire.
 */
export class GoogleTokenProvider implements AccessTokenProvider {
  private file?: TokenFile;
  private cached?: { token: string; expiresAt: number };

  constructor(
    private readonly tokenFile: string,
    private readonly http: AxiosInstance,
    private readonly now: () => number = Date.now
  ) {}

  async getAccessToken(): Promise<string> {
    if (this.cached && this.cached.expiresAt - EXPIRY_SKEW_MS > this.now()) {
      return this.cached.token;
    }

    const file = await this.load();
    const storedExpiry = file.expiry ? Date.parse(file.expiry) : NaN;
    if (!this.cached && file.token && storedExpiry - EXPIRY_SKEW_MS > this.now()) {
      this.cached = { token: file.token, expiresAt: storedExpiry };
      return file.token;
    }

    return this.refresh(file);
  }

  private async load(): Promise<TokenFile> {
    if (this.file) return this.file;

    let raw: string;
    try {
      raw = await fs.readFile(this.tokenFile, "utf8");
    } catch (err) {
      throw new PermanentRunError(`Cannot read destination token file ${this.tokenFile}`, {
        phase: "auth",
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PermanentRunError(`Destination token file ${this.tokenFile} is not valid JSON`, {
        phase: "auth",
        cause: err,
      });
    }

    const parsed = tokenFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentRunError(
        `Destination token file ${this.tokenFile} needs client_id, client_secret and refresh_token`,
        { phase: "auth", cause: parsed.error }
      );
    }
    this.file = parsed.data;
    return parsed.data;
  }

  private async refresh(file: TokenFile): Promise<string> {
    log.info("Refreshing access token");
    const body = new URLSearchParams({
      grant_type: "refresh_token",
      client_id: file.client_id,
      client_secret: file.client_secret,
      refresh_token: file.refresh_token,
    });

    let response: AxiosResponse;
    try {
      response = await this.http.post(file.token_uri ?? DEFAULT_TOKEN_URI, body.toString(), {
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
      });
    } catch (err) {
      throw classifyRequestError(err, "auth") ?? err;
    }

    if (response.status >= 500 || response.status === 429) {
      throw new TransientError(`Token endpoint returned HTTP ${response.status}`, {
        phase: "auth",
        statusCode: response.status,
        rateLimited: response.status === 429,
      });
    }
    const parsed = refreshResponseSchema.safeParse(response.data);
    if (response.status !== 200 || !parsed.success) {
      throw new PermanentRunError(
        `Token refresh refused with HTTP ${response.status}; re-authorize the destination account`,
        { phase: "auth", statusCode: response.status }
      );
    }

    const expiresAt = this.now() + parsed.data.expires_in * 1000;
    this.cached = { token: parsed.data.access_token, expiresAt };
    await this.persist(file, parsed.data.access_token, expiresAt);
    log.info("Access token refreshed", { expiresAt: new Date(expiresAt).toISOString() });
    return parsed.data.access_token;
  }

  /** Write the fresh token back so the next process start can reuse it. */
  private async persist(file: TokenFile, token: string, expiresAt: number): Promise<void> {
    const updated: TokenFile = { ...file, token, expiry: new Date(expiresAt).toISOString() };
    this.file = updated;
    const tmp = `${this.tokenFile}.tmp`;
    try {
      await fs.writeFile(tmp, JSON.stringify(updated, null, 2), { mode: 0o600 });
      await fs.rename(tmp, this.tokenFile);
    } catch (err) {
      log.warn("Could not save refreshed token", {
        tokenFile: this.tokenFile,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
