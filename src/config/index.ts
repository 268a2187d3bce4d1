// src/config/index.ts

// Only the validated environment is re-exported here. The Postgres pool and the
// Redis client are opened by the server entry point, so tests never touch them.
export * from './environment';
