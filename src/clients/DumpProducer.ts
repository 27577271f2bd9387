import { spawn, SpawnOptions } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { BinarySettings, ConnectionConfig, DatabaseDriver } from '../interfaces/BackupConfig';
import { appendCauseStack } from '../utils/errors';

/**
 * Custom error classes for dump producer operations
 */
export class ProducerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ProducerError';
    appendCauseStack(this, cause);
  }
}

export class ProducerSpawnError extends ProducerError {
  constructor(message: string, cause?: Error) {
    super(message, 'spawn', cause);
    this.name = 'ProducerSpawnError';
  }
}

export class ProducerExecutionError extends ProducerError {
  constructor(
    message: string,
    public readonly exitStatus: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderrExcerpt: string
  ) {
    super(message, 'execution');
    this.name = 'ProducerExecutionError';
  }
}

export class UnsupportedDumpModeError extends ProducerError {
  constructor(message: string) {
    super(message, 'command');
    this.name = 'UnsupportedDumpModeError';
  }
}

/**
 * Where the producer writes: its stdout, or a directory with N workers
 */
export type ProducerOutput = { kind: 'stream' } | { kind: 'directory'; path: string; jobs: number };

export interface ProducerCommand {
  command: string;
  args: string[];
  env: NodeJS.ProcessEnv;
}

/**
 * The parts of a child process the pipelines rely on
 */
export interface ProducerProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type ProcessSpawner = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ProducerProcess;

export const spawnProcess: ProcessSpawner = (command, args, options) =>
  spawn(command, args, options);

const STDERR_EXCERPT_LIMIT = 4096;

const DEFAULT_BINARIES: Record<DatabaseDriver, string> = {
  [DatabaseDriver.POSTGRESQL]: 'pg_dump',
  [DatabaseDriver.MYSQL]: 'mysqldump',
};

/**
 * Job override, then the settings override, then the bare tool name
 */
export function resolveProducerBinary(
  driver: DatabaseDriver,
  jobBinaryPath: string | undefined,
  binaries: BinarySettings
): string {
  if (jobBinaryPath) {
    return jobBinaryPath;
  }
  const configured = driver === DatabaseDriver.POSTGRESQL ? binaries.pgDump : binaries.mysqldump;
  return configured ?? DEFAULT_BINARIES[driver];
}

/**
 * Build argv and environment for a dump. Credentials travel in the
 * environment, never in argv.
 */
export function buildProducerCommand(
  driver: DatabaseDriver,
  connection: ConnectionConfig,
  output: ProducerOutput,
  binaryPath: string
): ProducerCommand {
  switch (driver) {
    case DatabaseDriver.POSTGRESQL: {
      const args = [
        '--host',
        connection.host,
        '--port',
        String(connection.port),
        '--username',
        connection.username,
        '--dbname',
        connection.database,
        '--no-password',
      ];

      if (output.kind === 'stream') {
        args.push('--format=custom', '--compress=9');
      } else {
        args.push('--format=directory', '--jobs', String(output.jobs), '--file', output.path);
      }
      args.push('--no-owner', '--no-acl', '--verbose');

      return {
        command: binaryPath,
        args,
        env: { ...process.env, PGPASSWORD: connection.password },
      };
    }

    case DatabaseDriver.MYSQL: {
      if (output.kind !== 'stream') {
        throw new UnsupportedDumpModeError('mysqldump does not support directory-format dumps');
      }

      return {
        command: binaryPath,
        args: [
          '--host',
          connection.host,
          '--port',
          String(connection.port),
          '--user',
          connection.username,
          '--single-transaction',
          '--routines',
          '--triggers',
          connection.database,
        ],
        env: { ...process.env, MYSQL_PWD: connection.password },
      };
    }
  }
}

export interface RunningProducer {
  process: ProducerProcess;
  /** Settles when the process exits; rejects on spawn failure or non-zero exit */
  completion: Promise<void>;
}

/**
 * Spawn the producer, capture its stderr and kill it when `signal` aborts
 */
export function startProducer(
  spawner: ProcessSpawner,
  command: ProducerCommand,
  output: ProducerOutput,
  signal?: AbortSignal
): RunningProducer {
  const tool = command.command;
  const child = spawner(command.command, command.args, {
    stdio: ['ignore', output.kind === 'stream' ? 'pipe' : 'ignore', 'pipe'],
    env: command.env,
  });

  const completion = new Promise<void>((resolve, reject) => {
    let stderr = '';
    let settled = false;

    const onAbort = () => {
      child.kill('SIGTERM');
    };

    const settle = (error?: Error) => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    child.stderr?.on('data', (chunk: Buffer | string) => {
      stderr += chunk.toString();
      if (stderr.length > STDERR_EXCERPT_LIMIT * 2) {
        stderr = stderr.slice(-STDERR_EXCERPT_LIMIT);
      }
    });

    child.on('error', (error: Error) => {
      settle(new ProducerSpawnError(describeSpawnFailure(tool, error), error));
    });

    child.on('close', (code: number | null, exitSignal: NodeJS.Signals | null) => {
      if (code === 0) {
        settle();
        return;
      }
      const excerpt = stderr.trim().slice(-STDERR_EXCERPT_LIMIT);
      settle(
        new ProducerExecutionError(
          describeProducerFailure(tool, code, exitSignal, excerpt),
          code,
          exitSignal,
          excerpt
        )
      );
    });

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }
  });

  return { process: child, completion };
}

/**
 * Analyze producer stderr and provide a helpful error message
 */
export function describeProducerFailure(
  tool: string,
  exitStatus: number | null,
  signal: NodeJS.Signals | null,
  stderr: string
): string {
  const status = exitStatus === null ? `signal ${signal ?? 'unknown'}` : `exit code ${exitStatus}`;
  const lowerStderr = stderr.toLowerCase();

  if (lowerStderr.includes('authentication failed') || lowerStderr.includes('access denied for user')) {
    return `${tool} authentication failed (${status}). Please check database credentials.`;
  }

  if (lowerStderr.includes('does not exist') || lowerStderr.includes('unknown database')) {
    return `${tool} failed: database does not exist (${status}).`;
  }

  if (lowerStderr.includes('permission denied')) {
    return `${tool} failed: insufficient permissions to access database (${status}).`;
  }

  if (
    lowerStderr.includes('connection') &&
    (lowerStderr.includes('refused') || lowerStderr.includes('timeout') || lowerStderr.includes('timed out'))
  ) {
    return `${tool} failed: unable to connect to database server (${status}). Please check connection settings.`;
  }

  if (lowerStderr.includes('no space left on device') || lowerStderr.includes('disk full')) {
    return `${tool} failed: insufficient disk space (${status}).`;
  }

  if (lowerStderr.includes('out of memory')) {
    return `${tool} failed: insufficient memory (${status}).`;
  }

  const details = stderr || 'No additional error information available';
  return `${tool} failed with ${status}. Error details: ${details}`;
}

function describeSpawnFailure(tool: string, error: Error): string {
  const message = error.message.toLowerCase();

  if (message.includes('enoent')) {
    return `${tool} command not found. Please ensure the database client tools are installed.`;
  }

  if (message.includes('eacces')) {
    return `Permission denied executing ${tool}. Please check file permissions.`;
  }

  return `Failed to execute ${tool}: ${error.message}`;
}
