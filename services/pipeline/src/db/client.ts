import {
  createPostgresPool,
  quoteIdentifier,
  withRetries,
  type Logger,
  type PostgresHelpers
} from '@wxdata/shared';
import type { DatabaseConfig } from '../config/serviceConfig';
import { StoreUnavailableError, describeError } from '../errors';
import { isConnectionError } from './errors';
import { runMigrations } from './migrations';
import { PostgresWeatherStore } from './postgresStore';

export type OpenStoreOptions = {
  /** Apply pending migrations before returning; on by default. */
  migrate?: boolean;
};

/** Strips credentials so connection strings can be logged. */
export function redactDatabaseUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return '<unparseable DATABASE_URL>';
  }
}

export function createDatabase(config: DatabaseConfig, logger: Logger): PostgresHelpers {
  return createPostgresPool({
    connectionString: config.url,
    max: config.maxConnections,
    idleTimeoutMillis: config.idleTimeoutMs,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    schema: config.schema,
    ssl: config.ssl,
    onError: (message, err) => {
      logger.error({ err }, `[postgres] ${message}`);
    }
  });
}

async function verifyConnection(db: PostgresHelpers, config: DatabaseConfig, logger: Logger): Promise<void> {
  await withRetries(
    () =>
      db.withConnection(
        async (client) => {
          await client.query('SELECT 1');
        },
        { setSearchPath: false }
      ),
    {
      attempts: config.connectAttempts,
      baseMs: config.connectBackoffMs,
      shouldRetry: isConnectionError,
      onRetry: (err, attempt, delayMs) => {
        logger.warn(
          { attempt, attempts: config.connectAttempts, delayMs, error: describeError(err) },
          'database connection failed, retrying'
        );
      }
    }
  );
}

async function prepareSchema(db: PostgresHelpers, config: DatabaseConfig, logger: Logger): Promise<void> {
  await db.withConnection(
    async (client) => {
      await client.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdentifier(config.schema)}`);
    },
    { setSearchPath: false }
  );

  const applied = await db.withConnection((client) => runMigrations(client));
  if (applied.length > 0) {
    logger.info({ migrations: applied, schema: config.schema }, 'applied database migrations');
  } else {
    logger.debug({ schema: config.schema }, 'database schema up to date');
  }
}

/**
 * Connects (with backoff), prepares the schema and hands back a store. Any
 * connection-level failure surfaces as `StoreUnavailableError`.
 */
export async function openWeatherStore(
  config: DatabaseConfig,
  logger: Logger,
  options: OpenStoreOptions = {}
): Promise<PostgresWeatherStore> {
  const db = createDatabase(config, logger);
  const target = redactDatabaseUrl(config.url);

  try {
    await verifyConnection(db, config, logger);
    if (options.migrate !== false) {
      await prepareSchema(db, config, logger);
    }
  } catch (err) {
    await db.closePool().catch((closeErr: unknown) => {
      logger.warn({ error: describeError(closeErr) }, 'failed to close database pool');
    });
    if (isConnectionError(err)) {
      throw new StoreUnavailableError(`Cannot reach database at ${target}: ${describeError(err)}`, err);
    }
    throw err;
  }

  logger.debug({ database: target, schema: config.schema }, 'database ready');
  return new PostgresWeatherStore(db);
}
