import { mock } from 'node:test';
import pg, { type PoolClient, type QueryResultRow } from 'pg';
import type { StoreDatabase } from '../../src/db/postgresStore';

export type RecordedQuery = {
  text: string;
  values: unknown[];
};

export type StubResponse = {
  rows?: QueryResultRow[];
  rowCount?: number;
};

/** Returns the canned result for a statement, or an error to throw. */
export type QueryResponder = (text: string, values: unknown[]) => StubResponse | Error | undefined;

export type StubClient = {
  client: PoolClient;
  queries: RecordedQuery[];
  statements: () => string[];
};

function normalizeSql(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * A real `pg.Client` that never connects; `query` is replaced by a recorder
 * that answers from `respond`.
 */
export function createStubClient(respond: QueryResponder = () => undefined): StubClient {
  const queries: RecordedQuery[] = [];
  const client: PoolClient = Object.assign(new pg.Client(), { release: () => undefined });

  mock.method(client, 'query', async (text: string, values: unknown[] = []) => {
    const normalized = normalizeSql(text);
    queries.push({ text: normalized, values });
    const response = respond(normalized, values);
    if (response instanceof Error) {
      throw response;
    }
    const rows = response?.rows ?? [];
    return { command: '', oid: 0, fields: [], rows, rowCount: response?.rowCount ?? rows.length };
  });

  return { client, queries, statements: () => queries.map((query) => query.text) };
}

export type StubDatabase = StoreDatabase & {
  closed: () => boolean;
};

/** Runs callbacks on the stub client, wrapping writes in BEGIN/COMMIT like the shared pool helper. */
export function createStubDatabase(client: PoolClient, connectError?: Error): StubDatabase {
  let closed = false;
  return {
    withConnection: async (fn) => {
      if (connectError) {
        throw connectError;
      }
      return fn(client);
    },
    withTransaction: async (fn) => {
      if (connectError) {
        throw connectError;
      }
      await client.query('BEGIN');
      try {
        const result = await fn(client);
        await client.query('COMMIT');
        return result;
      } catch (err) {
        await client.query('ROLLBACK');
        throw err;
      }
    },
    closePool: async () => {
      closed = true;
    },
    closed: () => closed
  };
}

export function pgError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}
