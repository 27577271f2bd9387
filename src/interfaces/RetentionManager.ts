import { JobConfig } from './BackupConfig';
import { CleanupResult, StorageBackend } from './StorageBackend';

export interface RetentionResult extends CleanupResult {
  /** Items last modified before this instant were eligible */
  cutoff: Date;
}

/**
 * Interface for managing backup retention and cleanup
 */
export interface RetentionManager {
  /**
   * Delete artifacts older than the retention policy (e.g. "7d", "2w")
   */
  enforce(backend: StorageBackend, retention: string): Promise<RetentionResult>;

  /**
   * Resolve a job's storage and enforce its retention; null when the job declares none
   */
  enforceForJob(job: JobConfig): Promise<RetentionResult | null>;
}
