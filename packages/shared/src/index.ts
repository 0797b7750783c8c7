export * from './envConfig';
export * from './postgres';
export * from './logging';
export * from './retries/backoff';
