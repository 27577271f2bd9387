/**
 * Minimal surface of a pg connection used for reachability checks
 */
export interface PgConnection {
  connect(): Promise<void>;
  query(sql: string): Promise<unknown>;
  end(): Promise<void>;
}

export interface PostgreSQLClient {
  /** Open a connection, run `SELECT 1` and close it again */
  testConnection(): Promise<boolean>;
}
