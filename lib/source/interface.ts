export interface TransferItem {
  /** Stable identifier assigned by the source. */
  remoteId: string;
  name: string;
  /** Source-side path used to request the download. */
  path: string;
  /** Expected size in bytes, or null when the source does not report one. */
  sizeBytes: number | null;
}

export interface SourceLister {
  /**
   * Enumerate candidate files in listing order.
   * Fails with PermanentRunError when the source cannot be listed at all.
   */
  listItems(): Promise<TransferItem[]>;
}

export interface Fetcher {
  /**
   * Write one item's bytes to `localPath`, replacing anything there.
   * Resolves to the number of bytes written.
   */
  fetch(item: TransferItem, localPath: string): Promise<number>;
}

/**
 * Convert one or more comma-separated glob-style wildcard patterns to a RegExp.
 * An empty string matches everything (same as "*").
 * Examples: "*.mov" → matches .mov files; "*.mov, *.mp4" → matches either.
 */
export function globToRegex(pattern: string): RegExp {
  const trimmed = pattern.trim();
  if (!trimmed) return /^.*$/i;

  const parts = trimmed
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean)
    .map((p) => {
      const escaped = p
        .replace(/[.+^${}()|[\]\\]/g, "\\$&")
        .replace(/\*/g, ".*")
        .replace(/\?/g, ".");
      return `^${escaped}$`;
    });

  return new RegExp(parts.join("|"), "i");
}
