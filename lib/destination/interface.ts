export interface PublishRequest {
  localPath: string;
  /** Destination title, already derived from the source name. */
  title: string;
  /** Original source file name, used in the description. */
  sourceName: string;
  sizeBytes: number;
}

/**
 * Per-item upload state, created by the engine and passed to every publish
 * attempt for that item so a retry can continue the same resumable session.
 */
export interface PublishSession {
  uploadUri?: string;
  /** Bytes the destination has acknowledged on `uploadUri`. */
  bytesAcknowledged: number;
}

export interface Publisher {
  /**
   * Acquire credentials before any item is processed.
   * Fails with PermanentRunError when no destination credential is available.
   */
  connect(): Promise<void>;
  /** Upload one local file; resolves to the destination identifier. */
  publish(request: PublishRequest, session: PublishSession): Promise<string>;
}

export function newPublishSession(): PublishSession {
  return { bytesAcknowledged: 0 };
}
