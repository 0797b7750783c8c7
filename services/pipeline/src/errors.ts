export class JobConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'JobConfigError';
  }
}

/**
 * The persistence layer cannot be reached. Always fatal for the run, unlike
 * a single failed batch.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

/** The database answers but its tables were never created. */
export class StoreSchemaError extends StoreUnavailableError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'StoreSchemaError';
  }
}

export class StoreWriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreWriteError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/** The `code` of a Node system error or a PostgreSQL SQLSTATE, when present. */
export function errorCode(err: unknown): string | null {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return null;
  }
  const { code } = err;
  return typeof code === 'string' ? code : null;
}
