/**
 * Interface for cron-based backup scheduling
 */
export interface CronScheduler {
  /** Start one timing loop per scheduled job */
  start(): void;

  /** Stop all loops and wait for in-flight runs to settle */
  stop(): Promise<void>;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;

  /** Get the next scheduled execution time of a job */
  getNextScheduledTime(jobName: string): Date | null;

  /** Resolves once every job loop has ended */
  waitForCompletion(): Promise<JobLoopOutcome[]>;
}

export type JobLoopStatus = 'stopped' | 'terminated' | 'crashed';

export interface JobLoopOutcome {
  jobName: string;
  status: JobLoopStatus;
  error?: Error;
}
