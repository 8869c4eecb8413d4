/**
 * Chunked resumable upload against a session URI (Google upload protocol).
 *
 * A chunk PUT answers 308 with a `Range: bytes=0-N` header while the upload
 * is incomplete, and 200/201 with the created resource once the last byte
 * is in. An empty PUT whose Content-Range gives `*` as the byte range asks
 * the server how far it got.
 */

import fs from "fs/promises";
import type { AxiosInstance, AxiosResponse } from "axios";
import { TransientError, toTransferError, type TransferError } from "@/lib/errors";
import { classifyRequestError, headerValue } from "@/lib/http";
import { createLogger } from "@/lib/logger";

const log = createLogger("resumable-upload");

/** Chunk sizes must be a multiple of this, except for the final chunk. */
export const CHUNK_ALIGNMENT = 256 * 1024;

export const SESSION_EXPIRED = "sessionExpired";
export const NO_PROGRESS = "noProgress";

export type UploadChunkResult =
  | { status: "in_progress"; bytesReceived: number }
  | { status: "complete"; body: unknown };

export interface ResumableUploadOptions {
  chunkSizeBytes: number;
  /** Re-synchronisations allowed inside one upload call. */
  maxChunkRetries: number;
  /** Turns a non-success chunk response into a classified error. */
  classify: (response: AxiosResponse) => TransferError;
  /** Bearer token attached to every chunk PUT and status query. */
  accessToken?: () => Promise<string>;
  sleep?: (ms: number) => Promise<void>;
  onProgress?: (bytesReceived: number, totalSize: number) => void;
}

/** Parse "bytes=0-1048575" into the count of bytes received. */
export function bytesFromRange(range: string | undefined): number {
  if (!range) return 0;
  const match = /^bytes=0-(\d+)$/.exec(range.trim());
  return match ? Number(match[1]) + 1 : 0;
}

export class ResumableUploadSession {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    public readonly uploadUri: string,
    private readonly http: AxiosInstance,
    private readonly options: ResumableUploadOptions
  ) {
    if (options.chunkSizeBytes <= 0 || options.chunkSizeBytes % CHUNK_ALIGNMENT !== 0) {
      throw new Error(`Chunk size must be a positive multiple of ${CHUNK_ALIGNMENT} bytes`);
    }
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async uploadChunk(chunk: Buffer, offset: number, totalSize: number): Promise<UploadChunkResult> {
    const end = offset + chunk.length - 1;
    const response = await this.put(chunk, {
      "Content-Length": String(chunk.length),
      "Content-Range": `bytes ${offset}-${end}/${totalSize}`,
    });
    return this.interpret(response);
  }

  async queryStatus(totalSize: number): Promise<UploadChunkResult> {
    const response = await this.put(Buffer.alloc(0), {
      "Content-Length": "0",
      "Content-Range": `bytes */${totalSize}`,
    });
    return this.interpret(response);
  }

  /**
   * Upload `localPath` from `startOffset` to the end. A failed chunk, or a
   * 308 that does not move the acknowledged offset forward, is followed by
   * a status query and the upload continues from whatever the server
   * acknowledged, up to `maxChunkRetries` times in a row. Once every byte is
   * acknowledged the created resource is collected with a status query.
   */
  async uploadFile(localPath: string, totalSize: number, startOffset = 0): Promise<unknown> {
    const handle = await fs.open(localPath, "r");
    let offset = startOffset;
    let failures = 0;
    let resync = false;

    try {
      for (;;) {
        try {
          if (resync || offset >= totalSize) {
            const status = await this.queryStatus(totalSize);
            if (status.status === "complete") return status.body;
            if (status.bytesReceived >= totalSize) {
              throw new TransientError("Upload session holds every byte but returned no resource", {
                phase: "publish",
                statusCode: 308,
                reason: NO_PROGRESS,
              });
            }
            offset = status.bytesReceived;
            if (resync) log.info("Resuming upload", { uploadedBytes: offset, totalSize });
            resync = false;
          }

          const length = Math.min(this.options.chunkSizeBytes, totalSize - offset);
          const buffer = Buffer.alloc(length);
          const { bytesRead } = await handle.read(buffer, 0, length, offset);
          const result = await this.uploadChunk(buffer.subarray(0, bytesRead), offset, totalSize);
          if (result.status === "complete") return result.body;

          if (result.bytesReceived <= offset) {
            throw new TransientError(`Upload chunk at offset ${offset} was not acknowledged`, {
              phase: "publish",
              statusCode: 308,
              reason: NO_PROGRESS,
            });
          }
          offset = result.bytesReceived;
          failures = 0;
          this.options.onProgress?.(offset, totalSize);
        } catch (err) {
          const error = toTransferError(err, "publish");
          failures++;
          if (!error.isRetryable() || error.reason === SESSION_EXPIRED || failures > this.options.maxChunkRetries) {
            throw error;
          }
          const waitMs = Math.min(2 ** failures * 1000, 60_000);
          log.warn("Chunk upload failed — resynchronising", {
            offset,
            failures,
            waitMs,
            error: error.message,
          });
          await this.sleep(waitMs);
          resync = true;
        }
      }
    } finally {
      await handle.close();
    }
  }

  private async put(data: Buffer, headers: Record<string, string>): Promise<AxiosResponse> {
    const token = this.options.accessToken ? await this.options.accessToken() : undefined;
    try {
      return await this.http.put(this.uploadUri, data, {
        headers: token ? { ...headers, Authorization: `Bearer ${token}` } : headers,
      });
    } catch (err) {
      throw classifyRequestError(err, "publish") ?? err;
    }
  }

  private interpret(response: AxiosResponse): UploadChunkResult {
    if (response.status === 308) {
      return { status: "in_progress", bytesReceived: bytesFromRange(headerValue(response, "range")) };
    }
    if (response.status === 200 || response.status === 201) {
      return { status: "complete", body: response.data };
    }
    if (response.status === 404 || response.status === 410) {
      throw new TransientError("Resumable upload session expired", {
        phase: "publish",
        statusCode: response.status,
        reason: SESSION_EXPIRED,
      });
    }
    throw this.options.classify(response);
  }
}
