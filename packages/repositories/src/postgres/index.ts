// Postgres storage backend
export { createDatabase, type Database, type DatabaseConfig, type DatabaseConnection } from './db.js';
export * from './schema/index.js';
export * from './collections/index.js';
