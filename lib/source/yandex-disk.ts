import { createWriteStream } from "fs";
import fs from "fs/promises";
import path from "path";
import { Transform, type Readable, type TransformCallback } from "stream";
import { pipeline } from "stream/promises";
import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import type { Fetcher, SourceLister, TransferItem } from "./interface";
import { globToRegex } from "./interface";
import {
  PermanentItemError,
  PermanentRunError,
  TransferError,
  TransientError,
} from "@/lib/errors";
import { classifyHttpFailure, classifyRequestError } from "@/lib/http";
import { createLogger } from "@/lib/logger";

const log = createLogger("yandex-disk");

const API_BASE = "https://cloud-api.yandex.net/v1/disk";
const PAGE_SIZE = 100;

export interface YandexDiskOptions {
  /** Public folder link or bare public key. */
  publicUrl: string;
  oauthToken?: string;
  /** Glob filter applied to file names, e.g. "*.mov". */
  fileFilter: string;
  /** Fail a download when no bytes arrive for this long. */
  stallTimeoutMs: number;
}

const resourceSchema = z.object({
  type: z.enum(["file", "dir"]),
  name: z.string(),
  path: z.string(),
  size: z.number().int().nonnegative().optional(),
  resource_id: z.string().optional(),
});

const listingSchema = z.object({
  _embedded: z
    .object({
      items: z.array(resourceSchema),
      total: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

const downloadLinkSchema = z.object({ href: z.string().url() });

const errorBodySchema = z.object({
  error: z.string().optional(),
  message: z.string().optional(),
  description: z.string().optional(),
});

function errorReason(body: unknown): { reason?: string; detail?: string } {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) return {};
  return { reason: parsed.data.error, detail: parsed.data.message ?? parsed.data.description };
}

/**
 * Extract the public key from a link like https://disk.yandex.ru/d/<key>.
 * Anything else is passed through, since the API also accepts full links.
 */
export function extractPublicKey(publicUrl: string): string {
  try {
    const parsed = new URL(publicUrl);
    if (parsed.pathname.startsWith("/d/")) {
      return parsed.pathname.slice(3).replace(/\/+$/, "");
    }
  } catch {
    // Not a URL: already a bare key
  }
  return publicUrl;
}

/** Destroys the stream when no chunk arrives within `timeoutMs`. */
class StallGuard extends Transform {
  bytes = 0;
  private timer?: NodeJS.Timeout;

  constructor(private readonly timeoutMs: number) {
    super();
    this.arm();
  }

  private arm(): void {
    clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.destroy(
        new TransientError(`Download stalled: no data for ${this.timeoutMs} ms`, {
          phase: "fetch",
          reason: "stalled",
        })
      );
    }, this.timeoutMs);
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.bytes += chunk.length;
    this.arm();
    callback(null, chunk);
  }

  override _flush(callback: TransformCallback): void {
    clearTimeout(this.timer);
    callback();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    clearTimeout(this.timer);
    callback(error);
  }
}

/**
 * Yandex Disk public-folder source: lists files through the public
 * resources API and streams each one to local disk.
 */
export class YandexDiskSource implements SourceLister, Fetcher {
  private readonly publicKey: string;
  private readonly filter: RegExp;

  constructor(
    private readonly options: YandexDiskOptions,
    private readonly http: AxiosInstance
  ) {
    this.publicKey = extractPublicKey(options.publicUrl);
    this.filter = globToRegex(options.fileFilter);
  }

  private headers(): Record<string, string> {
    return this.options.oauthToken ? { Authorization: `OAuth ${this.options.oauthToken}` } : {};
  }

  async listItems(): Promise<TransferItem[]> {
    log.info("Listing public folder", { publicKey: this.publicKey, fileFilter: this.options.fileFilter });
    const items: TransferItem[] = [];
    let offset = 0;
    let seen = 0;

    for (;;) {
      const response = await this.request(() =>
        this.http.get(`${API_BASE}/public/resources`, {
          params: { public_key: this.publicKey, limit: PAGE_SIZE, offset },
          headers: this.headers(),
        }),
        "list"
      );

      if (response.status !== 200) {
        throw this.listingFailure(response);
      }

      const parsed = listingSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new PermanentRunError("Unexpected folder listing format", {
          phase: "list",
          cause: parsed.error,
        });
      }

      const page = parsed.data._embedded?.items ?? [];
      seen += page.length;
      for (const resource of page) {
        if (resource.type !== "file" || !this.filter.test(resource.name)) continue;
        items.push({
          remoteId: resource.resource_id ?? resource.path,
          name: resource.name,
          path: resource.path,
          sizeBytes: resource.size ?? null,
        });
      }

      const total = parsed.data._embedded?.total;
      if (page.length < PAGE_SIZE || (total !== undefined && seen >= total)) break;
      offset += PAGE_SIZE;
    }

    log.info("Files listed", { scanned: seen, matched: items.length });
    return items;
  }

  async fetch(item: TransferItem, localPath: string): Promise<number> {
    const href = await this.getDownloadLink(item);
    log.info("Downloading file", { fileName: item.name, localPath, expectedSize: item.sizeBytes });

    const response = await this.request(
      () => this.http.get<Readable>(href, { responseType: "stream" }),
      "fetch"
    );
    if (response.status !== 200) {
      response.data.destroy();
      throw classifyHttpFailure(response, "fetch", `Download failed with HTTP ${response.status}`);
    }

    await fs.mkdir(path.dirname(localPath), { recursive: true });
    const guard = new StallGuard(this.options.stallTimeoutMs);
    try {
      await pipeline(response.data, guard, createWriteStream(localPath));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOSPC") {
        throw new PermanentItemError(`No space left on device writing ${localPath}`, {
          phase: "fetch",
          reason: "ENOSPC",
          cause: err,
        });
      }
      throw err;
    }

    log.info("File downloaded", { fileName: item.name, bytes: guard.bytes });
    return guard.bytes;
  }

  private async getDownloadLink(item: TransferItem): Promise<string> {
    const response = await this.request(
      () =>
        this.http.get(`${API_BASE}/public/resources/download`, {
          params: { public_key: this.publicKey, path: item.path },
          headers: this.headers(),
        }),
      "fetch"
    );

    if (response.status !== 200) {
      const { reason, detail } = errorReason(response.data);
      throw classifyHttpFailure(
        response,
        "fetch",
        `Could not get download link for ${item.name}: ${detail ?? `HTTP ${response.status}`}`,
        reason
      );
    }

    const parsed = downloadLinkSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TransientError(`Download link response for ${item.name} has no href`, { phase: "fetch" });
    }
    return parsed.data.href;
  }

  private listingFailure(response: AxiosResponse): TransferError {
    const { reason, detail } = errorReason(response.data);
    const options = { phase: "list" as const, statusCode: response.status, reason };
    switch (response.status) {
      case 401:
        return new PermanentRunError(`Source rejected the OAuth token: ${detail ?? "unauthorized"}`, options);
      case 403:
        return new PermanentRunError(
          `Access to the source folder is forbidden: ${detail ?? "check SOURCE_OAUTH_TOKEN and folder sharing"}`,
          options
        );
      case 404:
        return new PermanentRunError(
          `Source folder not found: ${detail ?? "check SOURCE_PUBLIC_URL"}`,
          options
        );
      default:
        return classifyHttpFailure(response, "list", `Listing failed with HTTP ${response.status}`, reason);
    }
  }

  private async request<T>(
    send: () => Promise<AxiosResponse<T>>,
    phase: "list" | "fetch"
  ): Promise<AxiosResponse<T>> {
    try {
      return await send();
    } catch (err) {
      throw classifyRequestError(err, phase) ?? err;
    }
  }
}
