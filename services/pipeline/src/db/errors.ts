import { errorCode } from '../errors';

const SOCKET_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH', 'EPIPE']);

// 57P01 admin_shutdown, 57P02 crash_shutdown, 57P03 cannot_connect_now
const SHUTDOWN_SQLSTATES = new Set(['57P01', '57P02', '57P03']);

/**
 * True when the database itself is unreachable, as opposed to a statement
 * that failed on a healthy connection.
 */
export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err);
  if (code) {
    if (SOCKET_ERROR_CODES.has(code) || SHUTDOWN_SQLSTATES.has(code)) {
      return true;
    }
    // class 08: connection exception
    if (/^08[0-9A-Z]{3}$/.test(code)) {
      return true;
    }
  }
  if (err instanceof AggregateError) {
    return err.errors.some((inner) => isConnectionError(inner));
  }
  if (err instanceof Error) {
    return /Connection terminated|timeout exceeded when trying to connect/i.test(err.message);
  }
  return false;
}

// 42P01 undefined_table, 3F000 invalid_schema_name
const MISSING_SCHEMA_SQLSTATES = new Set(['42P01', '3F000']);

export function isMissingSchemaError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && MISSING_SCHEMA_SQLSTATES.has(code);
}
