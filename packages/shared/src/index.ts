export * from './postgres';
export * from './env';
export * from './retries/backoff';
