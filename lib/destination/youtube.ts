import path from "path";
import type { AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import type { Publisher, PublishRequest, PublishSession } from "./interface";
import { ResumableUploadSession, SESSION_EXPIRED } from "./resumable-upload";
import type { AccessTokenProvider } from "@/lib/auth/google-token";
import type { PrivacyStatus } from "@/lib/env";
import {
  PermanentItemError,
  PermanentRunError,
  TransferError,
  TransientError,
} from "@/lib/errors";
import { classifyHttpFailure, classifyRequestError, headerValue } from "@/lib/http";
import { createLogger } from "@/lib/logger";

const log = createLogger("youtube");

const UPLOAD_ENDPOINT = "https://www.googleapis.com/upload/youtube/v3/videos";

/** YouTube rejects titles longer than this or containing angle brackets. */
const MAX_TITLE_LENGTH = 100;

/** Reasons that clear up by waiting: retried with the rate-limit delay. */
const RATE_LIMIT_REASONS = new Set(["rateLimitExceeded", "userRateLimitExceeded", "quotaExceeded"]);

export interface YouTubeOptions {
  privacyStatus: PrivacyStatus;
  categoryId: string;
  tags: string[];
  /** `{file}` is replaced with the source file name. */
  descriptionTemplate: string;
  chunkSizeBytes: number;
  maxChunkRetries?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface VideoMetadata {
  snippet: {
    title: string;
    description: string;
    tags: string[];
    categoryId: string;
  };
  status: {
    privacyStatus: PrivacyStatus;
  };
}

const errorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

const videoSchema = z.object({ id: z.string().min(1) });

const CONTENT_TYPES: Record<string, string> = {
  ".mov": "video/quicktime",
  ".mp4": "video/mp4",
  ".m4v": "video/x-m4v",
  ".avi": "video/x-msvideo",
  ".mkv": "video/x-matroska",
  ".webm": "video/webm",
  ".wmv": "video/x-ms-wmv",
  ".flv": "video/x-flv",
  ".3gp": "video/3gpp",
  ".mpg": "video/mpeg",
  ".mpeg": "video/mpeg",
};

export function inferContentType(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

/** Title rules: no angle brackets, at most 100 characters, never empty. */
export function sanitizeTitle(title: string): string {
  const cleaned = title.replace(/[<>]/g, "").trim().slice(0, MAX_TITLE_LENGTH).trim();
  return cleaned || "Untitled";
}

export function buildVideoMetadata(request: PublishRequest, options: YouTubeOptions): VideoMetadata {
  return {
    snippet: {
      title: sanitizeTitle(request.title),
      description: options.descriptionTemplate.replace(/\{file\}/g, request.sourceName),
      tags: options.tags,
      categoryId: options.categoryId,
    },
    status: { privacyStatus: options.privacyStatus },
  };
}

/**
 * Map a failed YouTube API response onto the failure taxonomy. Rate and
 * quota reasons are transient with the longer delay; 401 means the grant
 * was revoked while the item was in flight.
 */
export function classifyYouTubeFailure(response: AxiosResponse): TransferError {
  const parsed = errorBodySchema.safeParse(response.data);
  const reason = parsed.success ? parsed.data.error.errors?.[0]?.reason : undefined;
  const detail = parsed.success ? parsed.data.error.message : undefined;
  const message = `YouTube API error ${response.status}: ${detail ?? reason ?? "no details"}`;

  if (reason && RATE_LIMIT_REASONS.has(reason)) {
    return new TransientError(message, {
      phase: "publish",
      statusCode: response.status,
      reason,
      rateLimited: true,
    });
  }
  if (response.status === 401) {
    return new PermanentItemError(message, {
      phase: "publish",
      statusCode: response.status,
      reason: reason ?? "unauthorized",
    });
  }
  return classifyHttpFailure(response, "publish", message, reason);
}

/**
 * Publishes videos through the YouTube Data API resumable upload protocol.
 * The session URI lives in the engine-owned PublishSession, so a retried
 * publish picks up where the previous attempt stopped.
 */
export class YouTubePublisher implements Publisher {
  constructor(
    private readonly options: YouTubeOptions,
    private readonly tokens: AccessTokenProvider,
    private readonly http: AxiosInstance
  ) {}

  async connect(): Promise<void> {
    await this.tokens.getAccessToken();
    log.info("Destination credentials ready");
  }

  async publish(request: PublishRequest, session: PublishSession): Promise<string> {
    if (request.sizeBytes === 0) {
      throw new PermanentItemError(`Refusing to upload empty file ${request.sourceName}`, {
        phase: "publish",
      });
    }

    try {
      let resumeFrom = 0;
      if (!session.uploadUri) {
        session.uploadUri = await this.startSession(request);
        session.bytesAcknowledged = 0;
      } else {
        const status = await this.openSession(session.uploadUri, session).queryStatus(request.sizeBytes);
        if (status.status === "complete") return this.videoId(status.body);
        resumeFrom = status.bytesReceived;
        session.bytesAcknowledged = resumeFrom;
        log.info("Resuming upload session", { uploadedBytes: resumeFrom, totalSize: request.sizeBytes });
      }

      const body = await this.openSession(session.uploadUri, session).uploadFile(
        request.localPath,
        request.sizeBytes,
        resumeFrom
      );
      const videoId = this.videoId(body);
      log.info("Video uploaded", { title: request.title, videoId });
      return videoId;
    } catch (err) {
      if (err instanceof TransferError && err.reason === SESSION_EXPIRED) {
        session.uploadUri = undefined;
        session.bytesAcknowledged = 0;
      }
      // A credential lost mid-item fails the item, not the run.
      if (err instanceof PermanentRunError) {
        throw new PermanentItemError(err.message, {
          phase: "publish",
          statusCode: err.statusCode,
          reason: err.reason,
          cause: err,
        });
      }
      throw err;
    }
  }

  private openSession(uploadUri: string, session: PublishSession): ResumableUploadSession {
    return new ResumableUploadSession(uploadUri, this.http, {
      chunkSizeBytes: this.options.chunkSizeBytes,
      maxChunkRetries: this.options.maxChunkRetries ?? 3,
      classify: classifyYouTubeFailure,
      accessToken: () => this.tokens.getAccessToken(),
      sleep: this.options.sleep,
      onProgress: (bytesReceived, totalSize) => {
        session.bytesAcknowledged = bytesReceived;
        log.debug("Upload progress", { bytesReceived, totalSize });
      },
    });
  }

  private async startSession(request: PublishRequest): Promise<string> {
    const token = await this.tokens.getAccessToken();
    const metadata = buildVideoMetadata(request, this.options);

    let response: AxiosResponse;
    try {
      response = await this.http.post(UPLOAD_ENDPOINT, metadata, {
        params: { uploadType: "resumable", part: "snippet,status" },
        headers: {
          Authorization: `Bearer ${token}`,
          "Content-Type": "application/json; charset=UTF-8",
          "X-Upload-Content-Length": String(request.sizeBytes),
          "X-Upload-Content-Type": inferContentType(request.sourceName),
        },
      });
    } catch (err) {
      throw classifyRequestError(err, "publish") ?? err;
    }

    if (response.status !== 200) {
      throw classifyYouTubeFailure(response);
    }
    const location = headerValue(response, "location");
    if (!location) {
      throw new TransientError("Upload session response has no Location header", { phase: "publish" });
    }
    log.info("Upload session started", { title: metadata.snippet.title, totalSize: request.sizeBytes });
    return location;
  }

  private videoId(body: unknown): string {
    const parsed = videoSchema.safeParse(body);
    if (!parsed.success) {
      throw new PermanentItemError("Upload finished but the response carries no video id", {
        phase: "publish",
      });
    }
    return parsed.data.id;
  }
}
