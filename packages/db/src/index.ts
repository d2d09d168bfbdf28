/**
 * @pixhold/db
 *
 * Metadata store for uploaded images:
 * - SQLite connection and migrations (better-sqlite3)
 * - ImageRecord model and repository
 */

export * from './models/index.js';
export * from './connection.js';
