import {
  buildProducerCommand,
  describeProducerFailure,
  ProducerExecutionError,
  ProducerSpawnError,
  resolveProducerBinary,
  startProducer,
  UnsupportedDumpModeError,
} from '../src/clients/DumpProducer';
import { ConnectionConfig, DatabaseDriver } from '../src/interfaces/BackupConfig';
import { createFakeSpawner } from './helpers';

const connection: ConnectionConfig = {
  host: 'db.internal',
  port: 5433,
  username: 'backup',
  password: 'test-secret',
  database: 'app',
};

describe('resolveProducerBinary', () => {
  it('should prefer the job override', () => {
    expect(resolveProducerBinary(DatabaseDriver.POSTGRESQL, '/opt/pg16/bin/pg_dump', { pgDump: '/usr/bin/pg_dump' })).toBe(
      '/opt/pg16/bin/pg_dump'
    );
  });

  it('should fall back to the settings override', () => {
    expect(resolveProducerBinary(DatabaseDriver.POSTGRESQL, undefined, { pgDump: '/usr/bin/pg_dump' })).toBe(
      '/usr/bin/pg_dump'
    );
    expect(resolveProducerBinary(DatabaseDriver.MYSQL, undefined, { mysqldump: '/usr/local/bin/mysqldump' })).toBe(
      '/usr/local/bin/mysqldump'
    );
  });

  it('should default to the bare tool name', () => {
    expect(resolveProducerBinary(DatabaseDriver.POSTGRESQL, undefined, {})).toBe('pg_dump');
    expect(resolveProducerBinary(DatabaseDriver.MYSQL, undefined, {})).toBe('mysqldump');
  });
});

describe('buildProducerCommand', () => {
  it('should build a custom-format pg_dump streaming to stdout', () => {
    const command = buildProducerCommand(DatabaseDriver.POSTGRESQL, connection, { kind: 'stream' }, 'pg_dump');

    expect(command.command).toBe('pg_dump');
    expect(command.args).toEqual([
      '--host',
      'db.internal',
      '--port',
      '5433',
      '--username',
      'backup',
      '--dbname',
      'app',
      '--no-password',
      '--format=custom',
      '--compress=9',
      '--no-owner',
      '--no-acl',
      '--verbose',
    ]);
    expect(command.env.PGPASSWORD).toBe('test-secret');
  });

  it('should build a directory-format pg_dump with parallel workers', () => {
    const command = buildProducerCommand(
      DatabaseDriver.POSTGRESQL,
      connection,
      { kind: 'directory', path: '/scratch/app.dir', jobs: 4 },
      '/opt/pg16/bin/pg_dump'
    );

    expect(command.command).toBe('/opt/pg16/bin/pg_dump');
    expect(command.args.slice(9)).toEqual([
      '--format=directory',
      '--jobs',
      '4',
      '--file',
      '/scratch/app.dir',
      '--no-owner',
      '--no-acl',
      '--verbose',
    ]);
  });

  it('should never put the password on the command line', () => {
    const pg = buildProducerCommand(DatabaseDriver.POSTGRESQL, connection, { kind: 'stream' }, 'pg_dump');
    const mysql = buildProducerCommand(DatabaseDriver.MYSQL, connection, { kind: 'stream' }, 'mysqldump');

    expect(pg.args.join(' ')).not.toContain('test-secret');
    expect(mysql.args.join(' ')).not.toContain('test-secret');
  });

  it('should build a mysqldump command with the password in MYSQL_PWD', () => {
    const command = buildProducerCommand(DatabaseDriver.MYSQL, connection, { kind: 'stream' }, 'mysqldump');

    expect(command.args).toEqual([
      '--host',
      'db.internal',
      '--port',
      '5433',
      '--user',
      'backup',
      '--single-transaction',
      '--routines',
      '--triggers',
      'app',
    ]);
    expect(command.env.MYSQL_PWD).toBe('test-secret');
  });

  it('should reject directory output for mysql', () => {
    expect(() =>
      buildProducerCommand(DatabaseDriver.MYSQL, connection, { kind: 'directory', path: '/x', jobs: 2 }, 'mysqldump')
    ).toThrow(UnsupportedDumpModeError);
  });
});

describe('describeProducerFailure', () => {
  it('should recognise authentication failures', () => {
    expect(
      describeProducerFailure('pg_dump', 1, null, 'FATAL:  password authentication failed for user "backup"')
    ).toBe('pg_dump authentication failed (exit code 1). Please check database credentials.');
  });

  it('should recognise a missing database', () => {
    expect(describeProducerFailure('pg_dump', 1, null, 'FATAL:  database "nope" does not exist')).toBe(
      'pg_dump failed: database does not exist (exit code 1).'
    );
  });

  it('should report a termination signal', () => {
    expect(describeProducerFailure('pg_dump', null, 'SIGKILL', '')).toBe(
      'pg_dump failed with signal SIGKILL. Error details: No additional error information available'
    );
  });

  it('should surface unrecognised stderr verbatim', () => {
    expect(describeProducerFailure('mysqldump', 2, null, 'something odd')).toBe(
      'mysqldump failed with exit code 2. Error details: something odd'
    );
  });
});

describe('startProducer', () => {
  const command = { command: 'pg_dump', args: ['--dbname', 'app'], env: { PGPASSWORD: 'test-secret' } };

  it('should pass the environment and request piped stdout for stream output', async () => {
    const { spawner, calls } = createFakeSpawner(proc => proc.exit(0));

    await startProducer(spawner, command, { kind: 'stream' }).completion;

    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('pg_dump');
    expect(calls[0].options.env).toEqual({ PGPASSWORD: 'test-secret' });
    expect(calls[0].options.stdio).toEqual(['ignore', 'pipe', 'pipe']);
  });

  it('should not pipe stdout for directory output', async () => {
    const { spawner, calls } = createFakeSpawner(proc => proc.exit(0));

    await startProducer(spawner, command, { kind: 'directory', path: '/x', jobs: 2 }).completion;

    expect(calls[0].options.stdio).toEqual(['ignore', 'ignore', 'pipe']);
  });

  it('should reject with the exit status and stderr excerpt on failure', async () => {
    const { spawner } = createFakeSpawner(proc => proc.exit(3, 'pg_dump: error: server closed the connection'));

    const completion = startProducer(spawner, command, { kind: 'stream' }).completion;

    await expect(completion).rejects.toBeInstanceOf(ProducerExecutionError);
    await expect(completion).rejects.toMatchObject({
      exitStatus: 3,
      signal: null,
      stderrExcerpt: 'pg_dump: error: server closed the connection',
    });
  });

  it('should reject with a spawn error when the binary is missing', async () => {
    const missing = Object.assign(new Error('spawn pg_dump ENOENT'), { code: 'ENOENT' });
    const { spawner } = createFakeSpawner(proc => proc.fail(missing));

    const completion = startProducer(spawner, command, { kind: 'stream' }).completion;

    await expect(completion).rejects.toBeInstanceOf(ProducerSpawnError);
    await expect(completion).rejects.toThrow(
      'pg_dump command not found. Please ensure the database client tools are installed.'
    );
  });

  it('should kill the process when the signal aborts', async () => {
    const controller = new AbortController();
    const { spawner, calls } = createFakeSpawner(() => undefined);

    const completion = startProducer(spawner, command, { kind: 'stream' }, controller.signal).completion;
    controller.abort();

    await expect(completion).rejects.toMatchObject({ exitStatus: null, signal: 'SIGTERM' });
    expect(calls[0].process.killSignals).toEqual(['SIGTERM']);
  });
});
