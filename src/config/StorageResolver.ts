import { JobConfig, StorageConfig } from '../interfaces/BackupConfig';

export type ConfigResolutionReason =
  | 'StorageNotFound'
  | 'NoTemplatesDefined'
  | 'MissingStorageConfig'
  | 'InvalidStorageConfig';

export class ConfigResolutionError extends Error {
  constructor(
    message: string,
    public readonly reason: ConfigResolutionReason,
    public readonly jobName: string
  ) {
    super(message);
    this.name = 'ConfigResolutionError';
  }
}

/**
 * Turn a job's storage selection into one concrete storage configuration.
 *
 * Inline selections are returned as given. References are looked up in
 * `templates`, copied, and have their `prefix` / `filenamePrefix` overrides
 * applied. A `prefix` override has no effect on a local template, which has
 * no key prefix.
 */
export function resolveStorage(
  job: JobConfig,
  templates: Readonly<Record<string, StorageConfig>> | undefined
): StorageConfig {
  const selection = job.storage;

  if (!selection) {
    throw new ConfigResolutionError(
      `Backup '${job.name}' has no storage configuration`,
      'MissingStorageConfig',
      job.name
    );
  }

  if (selection.kind === 'inline') {
    return selection.config;
  }

  const { reference } = selection;

  if (!templates || Object.keys(templates).length === 0) {
    throw new ConfigResolutionError(
      `Backup '${job.name}' references storage '${reference.ref}' but no storages are defined`,
      'NoTemplatesDefined',
      job.name
    );
  }

  if (!Object.prototype.hasOwnProperty.call(templates, reference.ref)) {
    throw new ConfigResolutionError(
      `Storage '${reference.ref}' referenced by backup '${job.name}' not found`,
      'StorageNotFound',
      job.name
    );
  }

  const template = templates[reference.ref];
  const filenamePrefix = reference.filenamePrefix ?? template.filenamePrefix;

  if (template.driver === 's3') {
    return {
      ...template,
      prefix: reference.prefix ?? template.prefix,
      filenamePrefix,
    };
  }

  return { ...template, filenamePrefix };
}

/**
 * Reject a resolved config that lacks a field its driver needs
 */
export function assertStorageComplete(config: StorageConfig, jobName: string): void {
  const missing: string[] = [];

  if (config.driver === 'local') {
    if (!config.path) missing.push('path');
  } else {
    if (!config.bucket) missing.push('bucket');
    if (!config.region) missing.push('region');
    if (Boolean(config.accessKeyId) !== Boolean(config.secretAccessKey)) {
      missing.push(config.accessKeyId ? 'secret_access_key' : 'access_key_id');
    }
  }

  if (missing.length > 0) {
    throw new ConfigResolutionError(
      `Storage for backup '${jobName}' (${config.driver}) is missing: ${missing.join(', ')}`,
      'InvalidStorageConfig',
      jobName
    );
  }
}
