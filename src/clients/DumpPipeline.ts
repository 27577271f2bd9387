import { createWriteStream, promises as fs } from 'fs';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import { constants as zlibConstants, createGzip } from 'zlib';
import * as tar from 'tar';
import { BackupMode } from '../interfaces/BackupConfig';
import { Artifact, DumpPipeline, DumpRequest } from '../interfaces/DumpPipeline';
import { Logger } from '../interfaces/Logger';
import { appendCauseStack, formatError, toError } from '../utils/errors';
import { buildArtifactFilename, formatTimestamp } from '../utils/time';
import { buildProducerCommand, ProcessSpawner, ProducerOutput, startProducer } from './DumpProducer';

export const BASIC_SUFFIX = '.dump.gz';
export const PARALLEL_SUFFIX = '.dir.tar.gz';

export class CompressionError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CompressionError';
    appendCauseStack(this, cause);
  }
}

/**
 * Single custom-format stream piped through gzip into `{prefix}{ts}.dump.gz`
 */
export class BasicDumpPipeline implements DumpPipeline {
  readonly mode = BackupMode.BASIC;

  constructor(
    private readonly spawner: ProcessSpawner,
    private readonly logger: Logger
  ) {}

  async run(request: DumpRequest): Promise<Artifact> {
    const filename = buildArtifactFilename(request.filenamePrefix, request.timestamp, BASIC_SUFFIX);
    const artifactPath = join(request.scratchDir, filename);
    const output: ProducerOutput = { kind: 'stream' };
    const command = buildProducerCommand(request.driver, request.connection, output, request.binaryPath);

    this.logger.debug('Executing dump producer in basic mode', {
      command: command.command,
      args: command.args,
      artifactPath,
    });

    const producer = startProducer(this.spawner, command, output, request.signal);
    const stdout = producer.process.stdout;
    const compression = stdout
      ? pipeline(
          stdout,
          createGzip({ level: zlibConstants.Z_BEST_COMPRESSION }),
          createWriteStream(artifactPath)
        )
      : Promise.reject(new Error('producer stdout was not captured'));

    // A failed producer must not leave the compressor waiting on an open pipe
    const exited = producer.completion.catch((error: unknown) => {
      stdout?.destroy();
      throw error;
    });

    const [exit, compressed] = await Promise.allSettled([exited, compression]);

    if (exit.status === 'rejected') {
      throw exit.reason;
    }

    if (compressed.status === 'rejected') {
      throw new CompressionError(
        `Failed to compress dump output: ${formatError(compressed.reason)}`,
        toError(compressed.reason)
      );
    }

    return { path: artifactPath, filename };
  }
}

/**
 * Directory-format dump with N workers, archived into `{prefix}{ts}.dir.tar.gz`
 */
export class ParallelDumpPipeline implements DumpPipeline {
  readonly mode = BackupMode.PARALLEL;

  constructor(
    private readonly spawner: ProcessSpawner,
    private readonly logger: Logger
  ) {}

  async run(request: DumpRequest): Promise<Artifact> {
    const basename = `${request.filenamePrefix}${formatTimestamp(request.timestamp)}`;
    const dumpDirectory = join(request.scratchDir, `${basename}.dir`);
    const output: ProducerOutput = {
      kind: 'directory',
      path: dumpDirectory,
      jobs: request.parallelJobs,
    };
    const command = buildProducerCommand(request.driver, request.connection, output, request.binaryPath);

    this.logger.debug(`Executing dump producer with ${request.parallelJobs} parallel jobs`, {
      command: command.command,
      args: command.args,
    });

    try {
      await startProducer(this.spawner, command, output, request.signal).completion;

      const filename = buildArtifactFilename(request.filenamePrefix, request.timestamp, PARALLEL_SUFFIX);
      const artifactPath = join(request.scratchDir, filename);

      try {
        await tar.c({ gzip: true, file: artifactPath, cwd: dumpDirectory, portable: true }, ['.']);
      } catch (error) {
        throw new CompressionError(
          `Failed to archive dump directory ${dumpDirectory}: ${formatError(error)}`,
          toError(error)
        );
      }

      return { path: artifactPath, filename };
    } finally {
      await this.removeDumpDirectory(dumpDirectory);
    }
  }

  private async removeDumpDirectory(directory: string): Promise<void> {
    try {
      await fs.rm(directory, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn(`Failed to remove dump directory ${directory}: ${formatError(error)}`);
    }
  }
}

export function createDumpPipeline(
  mode: BackupMode,
  spawner: ProcessSpawner,
  logger: Logger
): DumpPipeline {
  switch (mode) {
    case BackupMode.BASIC:
      return new BasicDumpPipeline(spawner, logger);
    case BackupMode.PARALLEL:
      return new ParallelDumpPipeline(spawner, logger);
  }
}
