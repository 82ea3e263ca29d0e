/**
 * Database module exports.
 */

export { createDb } from './client';
export type { Database, DatabaseConnection, DatabaseOptions } from './client';

export { runMigrations, buildMigrationStatements } from './migrations';
export type { SqlExecutor } from './migrations';

// Schemas
export * from './schema';
