import { promises as fs } from 'fs';
import * as yaml from 'js-yaml';
import { join } from 'path';
import { ZodError } from 'zod';
import { validateConnection, ValidationError } from '../clients/BackupManager';
import { CronScheduler } from '../clients/CronScheduler';
import {
  BackupConfig,
  DatabaseDriver,
  JobConfig,
  StorageConfig,
  StorageSelection,
} from '../interfaces/BackupConfig';
import { LogMeta } from '../interfaces/Logger';
import { errorCode, formatError, toError } from '../utils/errors';
import { InvalidDurationError, parseDuration } from '../utils/duration';
import { ConfigDocument, configDocumentSchema, JobDocument, StorageDocument } from './schema';
import { assertStorageComplete, ConfigResolutionError, resolveStorage } from './StorageResolver';

export const DEFAULT_CONFIG_PATH = 'backup.yml';
export const DEFAULT_S3_PREFIX = 'backups/';

const DEFAULT_PORTS: Record<DatabaseDriver, number> = {
  [DatabaseDriver.POSTGRESQL]: 5432,
  [DatabaseDriver.MYSQL]: 3306,
};

const SAMPLE_CONFIG_PATH = join(__dirname, '..', '..', 'templates', 'backup.sample.yml');

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigurationError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A problem found by `validateConfiguration`; `job` is unset for global issues
 */
export interface ConfigurationIssue {
  job?: string;
  field: string;
  message: string;
}

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Pick the configuration path: CLI flag, then BACKUP_CONFIG, then backup.yml
 */
export function resolveConfigPath(cliPath: string | undefined, env: Environment = process.env): string {
  return cliPath ?? env['BACKUP_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}

export class ConfigurationManager {
  constructor(private readonly config: BackupConfig) {}

  /**
   * Read and parse a YAML configuration file
   */
  static async load(path: string, env: Environment = process.env): Promise<ConfigurationManager> {
    let source: string;
    try {
      source = await fs.readFile(path, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        throw new ConfigurationError(
          `Configuration file not found: ${path}. Run 'generate' to create a sample configuration.`,
          'path'
        );
      }
      throw new ConfigurationError(
        `Failed to read configuration file ${path}: ${formatError(error)}`,
        'path',
        toError(error)
      );
    }

    return ConfigurationManager.parse(source, env);
  }

  /**
   * Parse YAML text into a validated, read-only configuration
   */
  static parse(source: string, env: Environment = process.env): ConfigurationManager {
    let raw: unknown;
    try {
      raw = yaml.load(source);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML: ${formatError(error)}`, undefined, toError(error));
    }

    return ConfigurationManager.fromDocument(raw ?? {}, env);
  }

  static fromDocument(raw: unknown, env: Environment = process.env): ConfigurationManager {
    const result = configDocumentSchema.safeParse(raw);
    if (!result.success) {
      throw ConfigurationManager.toConfigurationError(result.error);
    }

    const config = ConfigurationManager.applyEnvironment(ConfigurationManager.toBackupConfig(result.data), env);
    return new ConfigurationManager(deepFreeze(config));
  }

  /**
   * Write the bundled sample configuration; never overwrites an existing file
   */
  static async generateSampleConfiguration(outputPath: string): Promise<void> {
    const sample = await fs.readFile(SAMPLE_CONFIG_PATH, 'utf8');
    try {
      await fs.writeFile(outputPath, sample, { flag: 'wx' });
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        throw new ConfigurationError(`Refusing to overwrite existing file: ${outputPath}`, 'output');
      }
      throw new ConfigurationError(
        `Failed to write sample configuration to ${outputPath}: ${formatError(error)}`,
        'output',
        toError(error)
      );
    }
  }

  getConfig(): BackupConfig {
    return this.config;
  }

  getJob(name: string): JobConfig | undefined {
    return this.config.jobs.find(job => job.name === name);
  }

  /**
   * Configuration summary safe to write to logs
   */
  getSanitizedConfig(): LogMeta {
    const { settings, storages, jobs } = this.config;
    return {
      settings: {
        maxConcurrentJobs: settings.maxConcurrentJobs,
        retentionTrigger: settings.retentionTrigger,
        scratchDirectory: settings.scratchDirectory,
        logLevel: settings.logLevel,
      },
      storages: Object.fromEntries(
        Object.entries(storages ?? {}).map(([name, storage]) => [name, sanitizeStorage(storage)])
      ),
      backups: jobs.map(job => ({
        name: job.name,
        driver: job.driver,
        mode: job.mode,
        host: job.connection.host,
        port: job.connection.port,
        database: job.connection.database,
        username: job.connection.username,
        password: '[REDACTED]',
        schedule: job.schedule?.cron,
        retention: job.retention,
        storage:
          job.storage?.kind === 'inline'
            ? sanitizeStorage(job.storage.config)
            : job.storage?.reference.ref,
      })),
    };
  }

  /**
   * Report every problem that would make a job fail at run time
   */
  validateConfiguration(): ConfigurationIssue[] {
    const issues: ConfigurationIssue[] = [];

    if (this.config.jobs.length === 0) {
      issues.push({ field: 'backups', message: 'No backups defined' });
    }

    for (const job of this.config.jobs) {
      try {
        validateConnection(job.connection);
      } catch (error) {
        if (!(error instanceof ValidationError)) throw error;
        issues.push({ job: job.name, field: `connection.${error.field ?? 'unknown'}`, message: error.message });
      }

      if (job.schedule && !CronScheduler.validateCronExpression(job.schedule.cron)) {
        issues.push({
          job: job.name,
          field: 'schedule.cron',
          message: `Invalid cron expression: ${job.schedule.cron}`,
        });
      } else if (
        job.schedule?.timezone !== undefined &&
        !CronScheduler.validateCronExpression(job.schedule.cron, job.schedule.timezone)
      ) {
        issues.push({
          job: job.name,
          field: 'schedule.timezone',
          message: `Invalid timezone: ${job.schedule.timezone}`,
        });
      }

      if (job.retention !== undefined) {
        try {
          parseDuration(job.retention);
        } catch (error) {
          if (!(error instanceof InvalidDurationError)) throw error;
          issues.push({ job: job.name, field: 'retention', message: error.message });
        }
      }

      try {
        assertStorageComplete(resolveStorage(job, this.config.storages), job.name);
      } catch (error) {
        if (!(error instanceof ConfigResolutionError)) throw error;
        issues.push({ job: job.name, field: 'storage', message: `${error.reason}: ${error.message}` });
      }
    }

    return issues;
  }

  private static toBackupConfig(document: ConfigDocument): BackupConfig {
    const { settings } = document;
    const storages =
      document.storages &&
      Object.fromEntries(Object.entries(document.storages).map(([name, storage]) => [name, toStorageConfig(storage)]));

    return {
      settings: {
        maxConcurrentJobs: settings.max_concurrent_jobs,
        scratchDirectory: settings.scratch_dir,
        retentionTrigger: settings.retention_trigger,
        logLevel: settings.log_level,
        binaries: {
          pgDump: settings.binary.pg_dump,
          mysqldump: settings.binary.mysqldump,
        },
      },
      storages,
      jobs: document.backups.map(toJobConfig),
    };
  }

  private static applyEnvironment(config: BackupConfig, env: Environment): BackupConfig {
    const settings = { ...config.settings };

    const logLevel = env['LOG_LEVEL'];
    if (logLevel) {
      settings.logLevel = logLevel;
    }

    const maxConcurrent = env['MAX_CONCURRENT_JOBS'];
    if (maxConcurrent !== undefined && maxConcurrent !== '') {
      const parsed = Number(maxConcurrent);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigurationError('MAX_CONCURRENT_JOBS must be a positive integer', 'MAX_CONCURRENT_JOBS');
      }
      settings.maxConcurrentJobs = parsed;
    }

    const scratchDir = env['BACKUP_SCRATCH_DIR'];
    if (scratchDir) {
      settings.scratchDirectory = scratchDir;
    }

    return { ...config, settings };
  }

  private static toConfigurationError(error: ZodError): ConfigurationError {
    const details = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    const field = error.issues[0]?.path.join('.');
    return new ConfigurationError(`Invalid configuration: ${details.join('; ')}`, field || undefined);
  }
}

function toStorageConfig(storage: StorageDocument): StorageConfig {
  if (storage.driver === 'local') {
    return {
      driver: 'local',
      path: storage.path,
      filenamePrefix: storage.filename_prefix ?? '',
    };
  }

  return {
    driver: 's3',
    bucket: storage.bucket,
    region: storage.region,
    prefix: storage.prefix ?? DEFAULT_S3_PREFIX,
    endpoint: storage.endpoint,
    accessKeyId: storage.access_key_id,
    secretAccessKey: storage.secret_access_key,
    filenamePrefix: storage.filename_prefix ?? '',
  };
}

function toStorageSelection(storage: JobDocument['storage']): StorageSelection | undefined {
  if (!storage) {
    return undefined;
  }

  if ('ref' in storage) {
    return {
      kind: 'reference',
      reference: {
        ref: storage.ref,
        prefix: storage.prefix,
        filenamePrefix: storage.filename_prefix,
      },
    };
  }

  return { kind: 'inline', config: toStorageConfig(storage) };
}

function toJobConfig(job: JobDocument): JobConfig {
  const driver = job.driver === 'mysql' ? DatabaseDriver.MYSQL : DatabaseDriver.POSTGRESQL;

  return {
    name: job.name,
    driver,
    connection: {
      host: job.connection.host,
      port: job.connection.port ?? DEFAULT_PORTS[driver],
      username: job.connection.username,
      password: job.connection.password,
      database: job.connection.database,
    },
    mode: job.mode,
    parallelJobs: job.parallel_jobs,
    schedule: job.schedule && { cron: job.schedule.cron, timezone: job.schedule.timezone },
    binaryPath: job.binary_path,
    retention: job.retention,
    storage: toStorageSelection(job.storage),
  };
}

function sanitizeStorage(storage: StorageConfig): LogMeta {
  if (storage.driver === 'local') {
    return { driver: storage.driver, path: storage.path, filenamePrefix: storage.filenamePrefix };
  }

  return {
    driver: storage.driver,
    bucket: storage.bucket,
    region: storage.region,
    prefix: storage.prefix,
    endpoint: storage.endpoint,
    filenamePrefix: storage.filenamePrefix,
    accessKeyId: storage.accessKeyId && '[REDACTED]',
    secretAccessKey: storage.secretAccessKey && '[REDACTED]',
  };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}
