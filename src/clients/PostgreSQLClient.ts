import { Client, ClientConfig } from 'pg';
import { ConnectionConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { PgConnection, PostgreSQLClient as IPostgreSQLClient } from '../interfaces/PostgreSQLClient';
import { errorCode, formatError, toError } from '../utils/errors';

export type PgConnectionFactory = (config: ClientConfig) => PgConnection;

const CONNECT_TIMEOUT_MS = 10_000;

const defaultConnectionFactory: PgConnectionFactory = config => new Client(config);

/**
 * Connection probe for postgresql jobs, used by `validate --check-connections`
 */
export class PostgreSQLClient implements IPostgreSQLClient {
  constructor(
    private readonly connection: ConnectionConfig,
    private readonly logger: Logger,
    private readonly connectionFactory: PgConnectionFactory = defaultConnectionFactory
  ) {}

  /**
   * Test connection to the PostgreSQL database
   */
  async testConnection(): Promise<boolean> {
    const client = this.connectionFactory({
      host: this.connection.host,
      port: this.connection.port,
      user: this.connection.username,
      password: this.connection.password,
      database: this.connection.database,
      connectionTimeoutMillis: CONNECT_TIMEOUT_MS,
    });

    try {
      await client.connect();
      await client.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error(
        `PostgreSQL connection test failed for ${this.describeTarget()}`,
        toError(error),
        { code: errorCode(error) }
      );
      return false;
    } finally {
      await client.end().catch((cleanupError: unknown) => {
        this.logger.warn(`Failed to close database connection during cleanup: ${formatError(cleanupError)}`);
      });
    }
  }

  private describeTarget(): string {
    return `${this.connection.host}:${this.connection.port}/${this.connection.database}`;
  }
}
