import { parseArgs } from 'util';
import { BackupManager } from '../clients/BackupManager';
import { ProcessSpawner } from '../clients/DumpProducer';
import { Logger } from '../clients/Logger';
import { PostgreSQLClient } from '../clients/PostgreSQLClient';
import { RetentionManager } from '../clients/RetentionManager';
import { createStorageBackendFactory, StorageBackendFactory } from '../clients/StorageFactory';
import {
  ConfigurationError,
  ConfigurationIssue,
  ConfigurationManager,
  DEFAULT_CONFIG_PATH,
  Environment,
  resolveConfigPath,
} from '../config/ConfigurationManager';
import { ConfigResolutionError, resolveStorage } from '../config/StorageResolver';
import { ConnectionConfig, DatabaseDriver, JobConfig, RetentionTrigger } from '../interfaces/BackupConfig';
import { Logger as ILogger } from '../interfaces/Logger';
import { PostgreSQLClient as IPostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { formatError, toError } from '../utils/errors';

export interface CommandDependencies {
  env: Environment;
  print: (line: string) => void;
  createLogger: (env: Environment, fallbackLevel?: string) => ILogger;
  createStorageFactory: (logger: ILogger) => StorageBackendFactory;
  createPostgresProbe: (connection: ConnectionConfig, logger: ILogger) => IPostgreSQLClient;
  spawner?: ProcessSpawner;
}

export const defaultDependencies: CommandDependencies = {
  env: process.env,
  print: line => console.log(line),
  createLogger: (env, fallbackLevel) => Logger.createFromEnvironment(env, fallbackLevel),
  createStorageFactory: logger => createStorageBackendFactory(logger),
  createPostgresProbe: (connection, logger) => new PostgreSQLClient(connection, logger),
};

export interface LoadedContext {
  manager: ConfigurationManager;
  logger: ILogger;
  storageFactory: StorageBackendFactory;
}

export async function loadContext(configPath: string | undefined, deps: CommandDependencies): Promise<LoadedContext> {
  const manager = await ConfigurationManager.load(resolveConfigPath(configPath, deps.env), deps.env);
  const logger = deps.createLogger(deps.env, manager.getConfig().settings.logLevel);
  return { manager, logger, storageFactory: deps.createStorageFactory(logger) };
}

/**
 * All jobs, or only the named one; unknown names are a configuration error
 */
function selectJobs(manager: ConfigurationManager, name: string | undefined): readonly JobConfig[] {
  if (name === undefined) {
    return manager.getConfig().jobs;
  }

  const job = manager.getJob(name);
  if (!job) {
    const available = manager
      .getConfig()
      .jobs.map(candidate => candidate.name)
      .join(', ');
    throw new ConfigurationError(`Unknown backup: ${name}. Available backups: ${available || '(none)'}`, 'name');
  }
  return [job];
}

/**
 * One-shot run of all (or one) jobs, in order, stopping at the first failure
 */
export async function backupCommand(args: string[], deps: CommandDependencies = defaultDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      name: { type: 'string', short: 'n' },
    },
    allowPositionals: false,
  });

  const { manager, logger, storageFactory } = await loadContext(values.config, deps);
  const config = manager.getConfig();
  const jobs = selectJobs(manager, values.name);

  if (jobs.length === 0) {
    deps.print('No backups defined');
    return 0;
  }

  const executor = new BackupManager(config, logger, { storageFactory, spawner: deps.spawner });
  const retention = new RetentionManager(config, storageFactory, logger);

  for (const job of jobs) {
    try {
      const result = await executor.executeBackup(job);
      deps.print(`${job.name}: ${result.location}`);
    } catch (error) {
      deps.print(`${job.name}: FAILED (${formatError(error)})`);
      return 1;
    }

    if (config.settings.retentionTrigger === RetentionTrigger.AFTER_BACKUP && job.retention) {
      try {
        await retention.enforceForJob(job);
      } catch (error) {
        logger.warn(`Retention cleanup for '${job.name}' failed (backup still successful): ${formatError(error)}`);
      }
    }
  }

  return 0;
}

/**
 * Explicit retention pass for jobs that declare a retention span
 */
export async function cleanupCommand(args: string[], deps: CommandDependencies = defaultDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      name: { type: 'string', short: 'n' },
    },
    allowPositionals: false,
  });

  const { manager, logger, storageFactory } = await loadContext(values.config, deps);
  const jobs = selectJobs(manager, values.name).filter(job => job.retention !== undefined);

  if (jobs.length === 0) {
    deps.print('No backups with a retention policy');
    return 0;
  }

  const retention = new RetentionManager(manager.getConfig(), storageFactory, logger);
  let failures = 0;

  for (const job of jobs) {
    try {
      const result = await retention.enforceForJob(job);
      const deleted = result?.deletedCount ?? 0;
      const errors = result?.errors.length ?? 0;
      deps.print(`${job.name}: deleted ${deleted} backup(s)${errors > 0 ? `, ${errors} error(s)` : ''}`);
    } catch (error) {
      failures += 1;
      logger.error(`Retention cleanup for '${job.name}' failed`, toError(error));
      deps.print(`${job.name}: FAILED (${formatError(error)})`);
    }
  }

  return failures > 0 ? 1 : 0;
}

/**
 * Report every configuration issue; optionally probe databases and buckets
 */
export async function validateCommand(args: string[], deps: CommandDependencies = defaultDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      'check-connections': { type: 'boolean' },
    },
    allowPositionals: false,
  });

  const { manager, logger, storageFactory } = await loadContext(values.config, deps);
  const issues = manager.validateConfiguration();

  if (values['check-connections']) {
    issues.push(...(await checkConnections(manager, logger, storageFactory, deps)));
  }

  if (issues.length === 0) {
    deps.print(`Configuration is valid (${manager.getConfig().jobs.length} backup(s))`);
    return 0;
  }

  for (const issue of issues) {
    deps.print(`${issue.job ?? 'configuration'}: ${issue.field}: ${issue.message}`);
  }
  deps.print(`Found ${issues.length} issue(s)`);
  return 1;
}

async function checkConnections(
  manager: ConfigurationManager,
  logger: ILogger,
  storageFactory: StorageBackendFactory,
  deps: CommandDependencies
): Promise<ConfigurationIssue[]> {
  const issues: ConfigurationIssue[] = [];
  const config = manager.getConfig();
  const probedStorages = new Set<string>();

  for (const job of config.jobs) {
    if (job.driver === DatabaseDriver.POSTGRESQL) {
      const reachable = await deps.createPostgresProbe(job.connection, logger).testConnection();
      if (!reachable) {
        issues.push({ job: job.name, field: 'connection', message: 'Database is not reachable' });
      }
    } else {
      deps.print(`${job.name}: connection check not supported for ${job.driver}`);
    }

    try {
      const storage = resolveStorage(job, config.storages);
      const key = JSON.stringify(storage);
      if (probedStorages.has(key)) continue;
      probedStorages.add(key);
      await storageFactory(storage, job.name);
    } catch (error) {
      // resolution problems are already reported by validateConfiguration
      if (error instanceof ConfigResolutionError) continue;
      issues.push({ job: job.name, field: 'storage', message: formatError(error) });
    }
  }

  return issues;
}

/**
 * Write a sample configuration file
 */
export async function generateCommand(args: string[], deps: CommandDependencies = defaultDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      output: { type: 'string', short: 'o' },
    },
    allowPositionals: false,
  });

  const output = values.output ?? DEFAULT_CONFIG_PATH;
  await ConfigurationManager.generateSampleConfiguration(output);
  deps.print(`Sample configuration written to ${output}`);
  return 0;
}
