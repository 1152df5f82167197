import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { env } from '../config/env';
import { logger } from '../config/logger';
import * as schema from './schema';

export type Db = BetterSQLite3Database<typeof schema>;

const SCHEMA_FILE = path.join(__dirname, 'schema.sql');

function toFilename(databaseUrl: string): string {
  return databaseUrl.startsWith('file:') ? databaseUrl.slice('file:'.length) : databaseUrl;
}

/**
 * Opens a SQLite database and applies the schema.
 * Tests run against `:memory:`, so each test file gets a fresh database.
 */
export function createDb(databaseUrl: string): { db: Db; sqlite: Database.Database } {
  const sqlite = new Database(toFilename(databaseUrl));
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.exec(fs.readFileSync(SCHEMA_FILE, 'utf8'));

  const db = drizzle(sqlite, {
    schema,
    logger:
      env.NODE_ENV === 'development'
        ? { logQuery: (query) => logger.trace({ query }, 'db.query') }
        : false,
  });

  return { db, sqlite };
}

// Single connection reused across the app.
const connection = createDb(env.DATABASE_URL);

export const db = connection.db;
export const sqlite = connection.sqlite;
