import { parseExpression } from 'cron-parser';
import { BackupConfig, JobConfig, RetentionTrigger, ScheduleConfig } from '../interfaces/BackupConfig';
import { BackupExecutor } from '../interfaces/BackupManager';
import { CronScheduler as ICronScheduler, JobLoopOutcome } from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { RetentionManager } from '../interfaces/RetentionManager';
import { AcquireAbortedError, ConcurrencyLimiter, Permit } from '../utils/ConcurrencyLimiter';
import { appendCauseStack, formatError, toError } from '../utils/errors';
import { sleepUntil } from '../utils/time';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    appendCauseStack(this, cause);
  }
}

/**
 * Malformed or exhausted schedule; disables only the owning job's loop
 */
export class CronError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string,
    cause?: Error
  ) {
    super(message, 'schedule', cause);
    this.name = 'CronError';
  }
}

export class CronExecutionError extends CronSchedulerError {
  constructor(message: string, cause?: Error) {
    super(message, 'execution', cause);
    this.name = 'CronExecutionError';
  }
}

export interface CronSchedulerDependencies {
  executor: BackupExecutor;
  logger: Logger;
  retentionManager?: RetentionManager;
}

export interface CronSchedulerOptions {
  /** Shared permit pool; defaults to one sized by settings.maxConcurrentJobs */
  limiter?: ConcurrencyLimiter;
  now?: () => Date;
  sleep?: (until: Date, signal: AbortSignal) => Promise<void>;
}

/**
 * CronScheduler runs one independent timing loop per scheduled job.
 * Loops share a single permit pool, so at most `capacity` backups run at
 * once across all jobs; runs of the same job are strictly sequential.
 */
export class CronScheduler implements ICronScheduler {
  private readonly limiter: ConcurrencyLimiter;
  private readonly now: () => Date;
  private readonly sleep: (until: Date, signal: AbortSignal) => Promise<void>;
  private readonly nextRuns = new Map<string, Date>();
  private abortController: AbortController | null = null;
  private loops: Promise<JobLoopOutcome>[] = [];

  constructor(
    private readonly config: BackupConfig,
    private readonly deps: CronSchedulerDependencies,
    options: CronSchedulerOptions = {}
  ) {
    this.limiter = options.limiter ?? new ConcurrencyLimiter(config.settings.maxConcurrentJobs);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleepUntil;
  }

  /**
   * Check an expression (and optional timezone) with the same evaluator the
   * job loops use: it must parse and yield at least one fire time
   */
  static validateCronExpression(expression: string, timezone?: string): boolean {
    try {
      parseExpression(expression, { tz: timezone }).next();
      return true;
    } catch {
      return false;
    }
  }

  start(): void {
    if (this.abortController) {
      this.deps.logger.warn('CronScheduler is already running');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;

    const scheduled = this.config.jobs.flatMap(job => (job.schedule ? [{ job, schedule: job.schedule }] : []));

    if (scheduled.length === 0) {
      this.deps.logger.warn('No scheduled backups found in configuration');
    } else {
      this.deps.logger.info(
        `Starting backup scheduler with ${this.limiter.capacity} concurrent slots for ${scheduled.length} scheduled backup(s)`
      );
    }

    this.loops = scheduled.map(({ job, schedule }) =>
      this.runJobLoop(job, schedule, controller.signal).catch((error: unknown): JobLoopOutcome => {
        const crash = new CronExecutionError(
          `Scheduler loop for '${job.name}' crashed: ${formatError(error)}`,
          toError(error)
        );
        this.deps.logger.error(crash.message, crash);
        return { jobName: job.name, status: 'crashed', error: crash };
      })
    );
  }

  /**
   * Abort every loop (and any in-flight dump) and wait for them to finish
   */
  async stop(): Promise<void> {
    if (!this.abortController) {
      this.deps.logger.warn('CronScheduler is not running');
      return;
    }

    this.deps.logger.info('Stopping cron scheduler...');
    this.abortController.abort();
    await Promise.all(this.loops);
    this.abortController = null;
    this.deps.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.abortController !== null;
  }

  getNextScheduledTime(jobName: string): Date | null {
    return this.nextRuns.get(jobName) ?? null;
  }

  waitForCompletion(): Promise<JobLoopOutcome[]> {
    return Promise.all(this.loops);
  }

  private async runJobLoop(
    job: JobConfig,
    schedule: ScheduleConfig,
    signal: AbortSignal
  ): Promise<JobLoopOutcome> {
    const { logger } = this.deps;
    let lastFire: Date | null = null;

    logger.info(`Scheduled backup '${job.name}' initialized with cron: ${schedule.cron}`);

    while (!signal.aborted) {
      let nextRun: Date;
      try {
        nextRun = this.computeNextRun(job, schedule, lastFire);
      } catch (error) {
        const cronError =
          error instanceof CronError
            ? error
            : new CronError(`Could not calculate next run time for '${job.name}'`, schedule.cron, toError(error));
        logger.error(`Scheduled backup '${job.name}' disabled: ${cronError.message}`, cronError);
        this.nextRuns.delete(job.name);
        return { jobName: job.name, status: 'terminated', error: cronError };
      }

      this.nextRuns.set(job.name, nextRun);
      logger.logScheduledExecution(job.name, schedule.cron, nextRun);

      await this.sleep(nextRun, signal);
      if (signal.aborted) {
        break;
      }
      lastFire = nextRun;

      let permit: Permit;
      try {
        permit = await this.limiter.acquire(signal);
      } catch (error) {
        if (error instanceof AcquireAbortedError) {
          break;
        }
        throw error;
      }

      let succeeded: boolean;
      try {
        succeeded = await this.executeScheduledBackup(structuredClone(job), signal);
      } finally {
        permit.release();
      }

      if (succeeded && !signal.aborted) {
        await this.applyRetention(job);
      }
    }

    this.nextRuns.delete(job.name);
    return { jobName: job.name, status: 'stopped' };
  }

  /**
   * Next fire time after max(now, last fire) so an early timer cannot
   * fire the same slot twice
   */
  private computeNextRun(job: JobConfig, schedule: ScheduleConfig, lastFire: Date | null): Date {
    const now = this.now();
    const from = lastFire && lastFire.getTime() >= now.getTime() ? lastFire : now;

    try {
      const interval = parseExpression(schedule.cron, { currentDate: from, tz: schedule.timezone });
      return interval.next().toDate();
    } catch (error) {
      throw new CronError(
        `Invalid or exhausted cron expression for '${job.name}': ${schedule.cron} (${formatError(error)})`,
        schedule.cron,
        toError(error)
      );
    }
  }

  /**
   * Execute one scheduled run; failures are logged and never escape the loop
   */
  private async executeScheduledBackup(job: JobConfig, signal: AbortSignal): Promise<boolean> {
    const { logger, executor } = this.deps;
    const startTime = Date.now();
    const executionId = this.generateExecutionId(job.name);

    logger.info(`[${executionId}] Starting scheduled backup: ${job.name}`);

    try {
      const result = await executor.executeBackup(job, { signal });
      logger.info(
        `[${executionId}] Scheduled backup '${job.name}' completed in ${Date.now() - startTime}ms: ${result.location}`
      );
      return true;
    } catch (error) {
      logger.error(
        `[${executionId}] Scheduled backup '${job.name}' failed after ${Date.now() - startTime}ms`,
        toError(error)
      );
      return false;
    }
  }

  private async applyRetention(job: JobConfig): Promise<void> {
    const { retentionManager, logger } = this.deps;
    if (
      !retentionManager ||
      !job.retention ||
      this.config.settings.retentionTrigger !== RetentionTrigger.AFTER_BACKUP
    ) {
      return;
    }

    try {
      await retentionManager.enforceForJob(job);
    } catch (error) {
      logger.warn(`Retention cleanup for '${job.name}' failed (backup still successful): ${formatError(error)}`);
    }
  }

  /**
   * Generate unique execution ID for tracking
   */
  private generateExecutionId(jobName: string): string {
    const timestamp = this.now().toISOString().replace(/[:.]/g, '-');
    const random = Math.random().toString(36).substring(2, 6);
    return `${jobName}-${timestamp}-${random}`;
  }
}
