/**
 * Outcome of a cleanup pass over a storage backend
 */
export interface CleanupResult {
  /** Number of items that were deleted */
  deletedCount: number;

  /** Total number of items inspected */
  totalCount: number;

  /** Paths or keys of deleted items */
  deletedKeys: string[];

  /** Per-item failures; they never abort the pass */
  errors: string[];
}

export interface StorageBackend {
  /** Move or upload a finished artifact; returns its final location */
  deliver(artifactPath: string, filename: string): Promise<string>;

  /** Delete items last modified strictly before `now - maxAgeSeconds` */
  cleanupOlderThan(maxAgeSeconds: number, now?: Date): Promise<CleanupResult>;

  /** Human-readable description of the target */
  describe(): string;
}
