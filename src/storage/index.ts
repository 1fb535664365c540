export * from './records.js';
export * from './types.js';
export { aggregateUserRecords, filterUsers } from './aggregate.js';
export { MemoryStorage } from './memory.js';
export { SqliteStorage, SqliteDocumentStore } from './sqlite.js';
export type { SqliteStorageOptions } from './sqlite.js';
export { runMigrations, SCHEMA_VERSION } from './migrations.js';
