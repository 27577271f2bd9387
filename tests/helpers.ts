import { SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { ProcessSpawner, ProducerProcess } from '../src/clients/DumpProducer';
import {
  BackupConfig,
  BackupMode,
  DatabaseDriver,
  JobConfig,
  RetentionTrigger,
} from '../src/interfaces/BackupConfig';
import { Logger } from '../src/interfaces/Logger';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logBackupStart: jest.fn(),
    logBackupComplete: jest.fn(),
    logBackupError: jest.fn(),
    logRetentionCleanup: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}

/**
 * Child process stand-in: stdout/stderr are PassThrough streams and exit is
 * reported through a delayed 'close' event, as a real process would.
 */
export class FakeProcess extends EventEmitter implements ProducerProcess {
  readonly stdout: PassThrough | null;
  readonly stderr = new PassThrough();
  readonly killSignals: Array<NodeJS.Signals | number | undefined> = [];

  constructor(withStdout: boolean) {
    super();
    this.stdout = withStdout ? new PassThrough() : null;
  }

  kill(signal?: NodeJS.Signals | number): boolean {
    this.killSignals.push(signal);
    this.stdout?.end();
    setTimeout(() => this.emit('close', null, 'SIGTERM'), 5);
    return true;
  }

  exit(code: number, stderr?: string): void {
    if (stderr) {
      this.stderr.write(stderr);
    }
    this.stdout?.end();
    setTimeout(() => this.emit('close', code, null), 10);
  }

  fail(error: Error): void {
    setTimeout(() => this.emit('error', error), 5);
  }
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
  process: FakeProcess;
}

export type SpawnBehaviour = (proc: FakeProcess, args: readonly string[]) => void;

/**
 * Spawner that records each call and hands the fake process to `behaviour`
 */
export function createFakeSpawner(behaviour: SpawnBehaviour): { spawner: ProcessSpawner; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  const spawner: ProcessSpawner = (command, args, options) => {
    const withStdout = Array.isArray(options.stdio) && options.stdio[1] === 'pipe';
    const proc = new FakeProcess(withStdout);
    calls.push({ command, args, options, process: proc });
    behaviour(proc, args);
    return proc;
  };
  return { spawner, calls };
}

/** Value following `flag` in an argv list */
export function argAfter(args: readonly string[], flag: string): string {
  const index = args.indexOf(flag);
  if (index === -1 || index + 1 >= args.length) {
    throw new Error(`missing ${flag} in ${args.join(' ')}`);
  }
  return args[index + 1];
}

export function createJob(overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    name: 'nightly-pg',
    driver: DatabaseDriver.POSTGRESQL,
    connection: {
      host: 'db.internal',
      port: 5432,
      username: 'backup',
      password: 'test-secret',
      database: 'app',
    },
    mode: BackupMode.BASIC,
    parallelJobs: 2,
    ...overrides,
  };
}

export function createConfig(jobs: JobConfig[], overrides: Partial<BackupConfig> = {}): BackupConfig {
  return {
    settings: {
      maxConcurrentJobs: 2,
      binaries: {},
      retentionTrigger: RetentionTrigger.AFTER_BACKUP,
    },
    jobs,
    ...overrides,
  };
}
