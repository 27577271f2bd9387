import winston from 'winston';
import { Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { errorCode } from '../utils/errors';

const SENSITIVE_KEYS = ['password', 'secret', 'token', 'credential', 'accesskeyid'];

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      transports: [
        new winston.transports.Console({
          format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
        }),
      ],
    });
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.info(message, meta && sanitizeMeta(meta));
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.warn(message, meta && sanitizeMeta(meta));
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta: LogMeta = {
      ...meta,
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...this.systemErrorFields(error),
        },
      }),
    };
    this.winston.error(message, sanitizeMeta(errorMeta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.debug(message, meta && sanitizeMeta(meta));
  }

  logBackupStart(jobName: string, meta?: LogMeta): void {
    this.info(`Backup '${jobName}' started`, {
      operation: 'backup_start',
      jobName,
      ...meta,
    });
  }

  logBackupComplete(
    jobName: string,
    fileName: string,
    fileSize: number,
    location: string,
    duration: number
  ): void {
    this.info(`Backup '${jobName}' completed: ${location}`, {
      operation: 'backup_complete',
      jobName,
      fileName,
      fileSize,
      location,
      duration,
      fileSizeMB: Math.round((fileSize / 1024 / 1024) * 100) / 100,
    });
  }

  logBackupError(jobName: string, operation: string, error: Error, meta?: LogMeta): void {
    this.error(`Backup '${jobName}' failed: ${operation}`, error, {
      operation: 'backup_error',
      jobName,
      failedOperation: operation,
      ...meta,
    });
  }

  logRetentionCleanup(jobName: string, deletedCount: number, retention: string): void {
    this.info(`Retention cleanup for '${jobName}' removed ${deletedCount} backup(s)`, {
      operation: 'retention_cleanup',
      jobName,
      deletedCount,
      retention,
    });
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', {
      operation: 'startup',
      config,
    });
  }

  logScheduledExecution(jobName: string, cronExpression: string, nextRun: Date): void {
    this.info(`Next run for '${jobName}': ${nextRun.toISOString()}`, {
      operation: 'scheduled_execution',
      jobName,
      cronExpression,
      nextRun: nextRun.toISOString(),
    });
  }

  private systemErrorFields(error: Error): LogMeta {
    const fields: LogMeta = {};
    const code = errorCode(error);
    if (code) {
      fields.code = code;
    }
    for (const key of ['errno', 'syscall', 'path'] as const) {
      if (key in error) {
        fields[key] = Reflect.get(error, key);
      }
    }
    return fields;
  }

  /**
   * Create a logger instance with the level from LOG_LEVEL, then the fallback
   */
  static createFromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    fallback: string = LogLevel.INFO
  ): Logger {
    const requested = (env.LOG_LEVEL ?? fallback).toLowerCase();

    if (!isLogLevel(requested)) {
      const logger = new Logger(LogLevel.INFO);
      logger.warn(`Invalid LOG_LEVEL: ${requested}. Using INFO level.`);
      return logger;
    }

    return new Logger(requested);
  }
}
