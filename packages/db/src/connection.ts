/**
 * Database connection management
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import type { Logger } from '@pixhold/utils';

export const IN_MEMORY = ':memory:';

export interface DbConfig {
  /** Path to the SQLite database file, or `:memory:` */
  dbPath: string;
  logger: Logger;
}

interface Migration {
  version: number;
  name: string;
  sql: string;
}

/**
 * Migrations, applied in order. Never edit an applied one; append instead.
 */
const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: 'create_images',
    sql: `
      CREATE TABLE IF NOT EXISTS images (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        filename TEXT NOT NULL UNIQUE,
        original_name TEXT NOT NULL,
        size INTEGER NOT NULL CHECK (size > 0),
        upload_time TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
        file_type TEXT NOT NULL
      );
    `
  },
  {
    version: 2,
    name: 'index_images_upload_time',
    sql: `
      CREATE INDEX IF NOT EXISTS idx_images_upload_time ON images(upload_time DESC, id DESC);
    `
  }
];

/**
 * Database service that wraps better-sqlite3
 */
export class DBService {
  private db: DatabaseType;
  private logger: Logger;

  private constructor(db: DatabaseType, logger: Logger) {
    this.db = db;
    this.logger = logger;
  }

  /**
   * Open the database and bring the schema up to date
   */
  static create(config: DbConfig): DBService {
    const { dbPath, logger } = config;

    if (dbPath !== IN_MEMORY) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath);

    // WAL for file databases
    if (dbPath !== IN_MEMORY) {
      db.pragma('journal_mode = WAL');
    }

    const service = new DBService(db, logger);
    service.runMigrations();

    return service;
  }

  /**
   * Get the underlying database instance for direct queries
   */
  get database(): DatabaseType {
    return this.db;
  }

  private runMigrations(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const rows = this.db.prepare<[], { version: number }>('SELECT version FROM _migrations').all();
    const appliedVersions = new Set(rows.map((row) => row.version));

    for (const migration of MIGRATIONS) {
      if (appliedVersions.has(migration.version)) {
        continue;
      }

      this.logger.info(`Applying migration ${migration.version}: ${migration.name}`);

      this.transaction(() => {
        this.db.exec(migration.sql);
        this.db.prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      });
    }
  }

  /**
   * Cheap liveness query used by the readiness probe
   */
  ping(): boolean {
    const row = this.db.prepare<[], { ok: number }>('SELECT 1 AS ok').get();
    return row?.ok === 1;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }
}
