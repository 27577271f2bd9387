import { BackupMode, ConnectionConfig, DatabaseDriver } from './BackupConfig';

export interface DumpRequest {
  driver: DatabaseDriver;
  connection: ConnectionConfig;
  /** Producer executable; resolved through PATH when it is a bare name */
  binaryPath: string;
  parallelJobs: number;
  scratchDir: string;
  filenamePrefix: string;
  timestamp: Date;
  signal?: AbortSignal;
}

/**
 * A finished dump waiting for delivery
 */
export interface Artifact {
  path: string;
  filename: string;
}

export interface DumpPipeline {
  readonly mode: BackupMode;
  run(request: DumpRequest): Promise<Artifact>;
}
