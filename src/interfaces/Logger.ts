export type LogMeta = Record<string, unknown>;

export interface Logger {
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup operations
  logBackupStart(jobName: string, meta?: LogMeta): void;
  logBackupComplete(
    jobName: string,
    fileName: string,
    fileSize: number,
    location: string,
    duration: number
  ): void;
  logBackupError(jobName: string, operation: string, error: Error, meta?: LogMeta): void;
  logRetentionCleanup(jobName: string, deletedCount: number, retention: string): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(jobName: string, cronExpression: string, nextRun: Date): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
