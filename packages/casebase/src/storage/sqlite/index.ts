/**
 * SQLite Storage Exports
 */

export { SQLiteClient, type SQLiteClientConfig } from './client.js';
export { SQLiteCaseStore, type SQLiteCaseStoreConfig } from './storage.js';
export { SCHEMA, VECTOR_SCHEMA, SCHEMA_VERSION } from './schema.js';
