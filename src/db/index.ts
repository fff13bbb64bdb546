/**
 * Database module exports.
 */

export { createDatabase } from './client';
export type { Database, DatabaseConnection, DatabaseOptions } from './client';

export * from './schema';
