import pg, { Pool, type PoolClient, type PoolConfig } from 'pg';

let parsersConfigured = false;

/**
 * BIGINT counts come back as numbers and DATE columns as their `YYYY-MM-DD`
 * text, so calendar dates never pass through a local-time `Date`.
 */
function configureGlobalParsers(): void {
  if (parsersConfigured) {
    return;
  }
  pg.types.setTypeParser(pg.types.builtins.INT8, (value: string) => Number.parseInt(value, 10));
  pg.types.setTypeParser(pg.types.builtins.NUMERIC, (value: string) => Number.parseFloat(value));
  pg.types.setTypeParser(pg.types.builtins.DATE, (value: string) => value);
  parsersConfigured = true;
}

export function quoteIdentifier(input: string): string {
  return `"${input.replace(/"/g, '""')}"`;
}

export type PostgresAcquireOptions = {
  /** Defaults to true when the pool was created with a schema. */
  setSearchPath?: boolean;
};

export type PostgresPoolOptions = PoolConfig & {
  schema?: string;
  onError?: (message: string, err: unknown) => void;
};

export type ClientCallback<T> = (client: PoolClient) => Promise<T>;

export interface PostgresHelpers {
  withConnection<T>(fn: ClientCallback<T>, options?: PostgresAcquireOptions): Promise<T>;
  /** Runs `fn` between BEGIN and COMMIT, rolling back when it throws. */
  withTransaction<T>(fn: ClientCallback<T>, options?: PostgresAcquireOptions): Promise<T>;
  closePool(): Promise<void>;
}

export function createPostgresPool(options: PostgresPoolOptions = {}): PostgresHelpers {
  configureGlobalParsers();
  const { schema, onError, ...poolConfig } = options;
  const pool = new Pool(poolConfig);
  const searchPath = schema ? `SET search_path TO ${quoteIdentifier(schema)}, public` : null;
  const reportError =
    onError ??
    ((message: string, err: unknown) => {
      console.error(`[postgres] ${message}`, err);
    });

  // idle clients can fail when the server goes away; without a listener pg would crash the process
  pool.on('error', (err: Error) => reportError('unexpected error on idle client', err));

  const withConnection = async <T>(fn: ClientCallback<T>, acquire?: PostgresAcquireOptions): Promise<T> => {
    const client = await pool.connect();
    try {
      if (searchPath && acquire?.setSearchPath !== false) {
        await client.query(searchPath);
      }
      return await fn(client);
    } finally {
      client.release();
    }
  };

  const withTransaction = <T>(fn: ClientCallback<T>, acquire?: PostgresAcquireOptions): Promise<T> =>
    withConnection(async (client) => {
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          reportError('failed to roll back transaction', rollbackErr);
        });
        throw err;
      }
    }, acquire);

  return {
    withConnection,
    withTransaction,
    closePool: () => pool.end()
  };
}
