#!/usr/bin/env node
import { readFileSync } from 'fs';
import { join } from 'path';
import { parseArgs } from 'util';
import {
  backupCommand,
  cleanupCommand,
  CommandDependencies,
  defaultDependencies,
  generateCommand,
  loadContext,
  validateCommand,
} from './cli/commands';
import { BackupManager } from './clients/BackupManager';
import { CronScheduler } from './clients/CronScheduler';
import { RetentionManager } from './clients/RetentionManager';
import { StorageBackendFactory } from './clients/StorageFactory';
import { ConfigurationError, ConfigurationManager } from './config/ConfigurationManager';
import { JobLoopOutcome } from './interfaces/CronScheduler';
import { Logger } from './interfaces/Logger';
import { formatError, toError } from './utils/errors';

/**
 * Scheduler daemon: one cron loop per scheduled job until stopped
 */
export class BackupApplication {
  private readonly scheduler: CronScheduler;
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    private readonly manager: ConfigurationManager,
    private readonly logger: Logger,
    storageFactory: StorageBackendFactory,
    deps: Pick<CommandDependencies, 'spawner'> = {}
  ) {
    const config = manager.getConfig();
    const executor = new BackupManager(config, logger, { storageFactory, spawner: deps.spawner });
    const retentionManager = new RetentionManager(config, storageFactory, logger);
    this.scheduler = new CronScheduler(config, { executor, retentionManager, logger });
  }

  /**
   * Start all loops and resolve once every loop has ended
   */
  async run(): Promise<JobLoopOutcome[]> {
    this.logger.logConfigurationStart(this.manager.getSanitizedConfig());
    this.scheduler.start();
    this.logger.info('Backup scheduler started; waiting for scheduled runs');

    const outcomes = await this.scheduler.waitForCompletion();
    await this.shutdown();
    return outcomes;
  }

  /**
   * Stop all loops and abort in-flight dumps; safe to call more than once
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.logger.info('Initiating graceful shutdown...');
      this.shutdownPromise = this.scheduler.isRunning() ? this.scheduler.stop() : Promise.resolve();
    }
    return this.shutdownPromise;
  }

  getScheduler(): CronScheduler {
    return this.scheduler;
  }

  /**
   * Setup signal handlers for graceful shutdown
   */
  setupSignalHandlers(): void {
    const signals = ['SIGTERM', 'SIGINT'] as const;

    signals.forEach(signal => {
      process.once(signal, () => {
        this.logger.info(`Received ${signal}, initiating graceful shutdown...`);
        this.shutdown().catch(error => {
          this.logger.error('Error during shutdown', toError(error));
          process.exit(4);
        });
      });
    });

    process.on('uncaughtException', error => {
      this.logger.error('Uncaught exception', error);
      this.shutdown().finally(() => process.exit(5));
    });

    process.on('unhandledRejection', reason => {
      this.logger.error('Unhandled promise rejection', toError(reason));
      this.shutdown().finally(() => process.exit(6));
    });
  }
}

export async function runCommand(args: string[], deps: CommandDependencies = defaultDependencies): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
    },
    allowPositionals: false,
  });

  const { manager, logger, storageFactory } = await loadContext(values.config, deps);
  const app = new BackupApplication(manager, logger, storageFactory, deps);
  app.setupSignalHandlers();

  const outcomes = await app.run();
  const failed = outcomes.filter(outcome => outcome.status !== 'stopped');
  for (const outcome of failed) {
    logger.error(`Scheduler loop for '${outcome.jobName}' ended: ${outcome.status}`, outcome.error);
  }

  logger.info('Backup scheduler shutdown completed');
  return failed.length > 0 ? 1 : 0;
}

export function readVersion(): string {
  const parsed: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return 'unknown';
}

const HELP = `Usage: db-dump-scheduler <command> [options]

Commands:
  run, start                     Start the scheduler daemon
  backup [--name NAME]           Run backups once (all, or the named one)
  cleanup [--name NAME]          Apply retention policies
  validate [--check-connections] Check the configuration
  generate [--output PATH]       Write a sample configuration file
  help                           Show this help message
  version                        Show version

Options:
  -c, --config PATH   Configuration file (default: $BACKUP_CONFIG or backup.yml)`;

/**
 * Main application entry point
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command, ...commandArgs] = argv;

  try {
    switch (command) {
      case 'run':
      case 'start':
        return await runCommand(commandArgs);
      case 'backup':
        return await backupCommand(commandArgs);
      case 'cleanup':
        return await cleanupCommand(commandArgs);
      case 'validate':
        return await validateCommand(commandArgs);
      case 'generate':
        return await generateCommand(commandArgs);
      case undefined:
      case 'help':
      case '-h':
      case '--help':
        console.log(HELP);
        return 0;
      case 'version':
      case '-v':
      case '--version':
        console.log(readVersion());
        return 0;
      default:
        console.error(`Unknown command: ${command}`);
        console.error(`Run 'db-dump-scheduler help' for usage information.`);
        return 1;
    }
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    console.error(`Error: ${formatError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main().then(
    code => process.exit(code),
    error => {
      console.error('Fatal error:', error);
      process.exit(7);
    }
  );
}
