/**
 * Database engines a job can dump
 */
export enum DatabaseDriver {
  POSTGRESQL = 'postgresql',
  MYSQL = 'mysql',
}

/**
 * Dump pipeline selection for a job
 */
export enum BackupMode {
  /** Single custom-format stream, gzipped into one file */
  BASIC = 'basic',
  /** Directory-format dump with N workers, archived as tar.gz */
  PARALLEL = 'parallel',
}

/**
 * When retention cleanup runs for a job that declares one
 */
export enum RetentionTrigger {
  AFTER_BACKUP = 'after_backup',
  MANUAL = 'manual',
}

export interface ConnectionConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
}

export interface ScheduleConfig {
  /** Cron expression for the job's fire times */
  cron: string;

  /** IANA timezone the expression is evaluated in (defaults to local time) */
  timezone?: string;
}

export interface LocalStorageConfig {
  driver: 'local';
  path: string;
  filenamePrefix: string;
}

export interface S3StorageConfig {
  driver: 's3';
  bucket: string;
  region: string;
  prefix: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  filenamePrefix: string;
}

/**
 * A concrete storage target, tagged by driver
 */
export type StorageConfig = LocalStorageConfig | S3StorageConfig;

export type StorageDriver = StorageConfig['driver'];

/**
 * Pointer to a shared storage template plus optional overrides
 */
export interface StorageReference {
  ref: string;
  prefix?: string;
  filenamePrefix?: string;
}

export type StorageSelection =
  | { kind: 'inline'; config: StorageConfig }
  | { kind: 'reference'; reference: StorageReference };

export interface JobConfig {
  name: string;
  driver: DatabaseDriver;
  connection: ConnectionConfig;
  mode: BackupMode;
  parallelJobs: number;
  schedule?: ScheduleConfig;
  binaryPath?: string;
  retention?: string;
  storage?: StorageSelection;
}

export interface BinarySettings {
  pgDump?: string;
  mysqldump?: string;
}

export interface Settings {
  maxConcurrentJobs: number;
  binaries: BinarySettings;
  scratchDirectory?: string;
  retentionTrigger: RetentionTrigger;
  logLevel?: string;
}

export interface BackupConfig {
  settings: Settings;
  storages?: Readonly<Record<string, StorageConfig>>;
  jobs: readonly JobConfig[];
}
