/**
 * SQLite Database Schema for the quotes catalog
 *
 * Entity tables for quotes, authors, tags, categories and users, plus the
 * join tables that carry their many-to-many associations.
 */

import Database from 'better-sqlite3'
import type { Database as DatabaseType } from 'better-sqlite3'
import { z } from 'zod'

export const SCHEMA_VERSION = 1

/**
 * SQL statements for creating the database schema
 *
 * Case-insensitive uniqueness is enforced here as well as in the validator,
 * since validate-then-insert is not atomic.
 */
export const SCHEMA_SQL = `
-- Schema version tracking
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  applied_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS authors (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE COLLATE NOCASE
);

CREATE TABLE IF NOT EXISTS quotes (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  text TEXT NOT NULL UNIQUE CHECK(length(text) <= 5000),
  author_id INTEGER REFERENCES authors(id) ON DELETE SET NULL,
  source TEXT CHECK(source IS NULL OR length(source) <= 300)
);

CREATE TABLE IF NOT EXISTS tags (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE COLLATE NOCASE CHECK(length(name) <= 100),
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE COLLATE NOCASE CHECK(length(name) <= 50),
  keywords TEXT NOT NULL DEFAULT '[]' -- JSON array of keywords
);

CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL UNIQUE,
  created_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Association tables
CREATE TABLE IF NOT EXISTS quote_tags (
  quote_id INTEGER NOT NULL REFERENCES quotes(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (quote_id, tag_id)
);

CREATE TABLE IF NOT EXISTS quote_categories (
  quote_id INTEGER NOT NULL REFERENCES quotes(id) ON DELETE CASCADE,
  category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE CASCADE,
  PRIMARY KEY (quote_id, category_id)
);

CREATE TABLE IF NOT EXISTS user_quotes (
  user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  quote_id INTEGER NOT NULL REFERENCES quotes(id) ON DELETE CASCADE,
  PRIMARY KEY (user_id, quote_id)
);

CREATE TABLE IF NOT EXISTS user_authors (
  user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  author_id INTEGER NOT NULL REFERENCES authors(id) ON DELETE CASCADE,
  PRIMARY KEY (user_id, author_id)
);

CREATE TABLE IF NOT EXISTS author_tags (
  author_id INTEGER NOT NULL REFERENCES authors(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (author_id, tag_id)
);

CREATE TABLE IF NOT EXISTS user_tags (
  user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  tag_id INTEGER NOT NULL REFERENCES tags(id) ON DELETE CASCADE,
  PRIMARY KEY (user_id, tag_id)
);

-- Indexes for reverse association lookups
CREATE INDEX IF NOT EXISTS idx_quotes_author ON quotes(author_id);
CREATE INDEX IF NOT EXISTS idx_quote_tags_tag ON quote_tags(tag_id);
CREATE INDEX IF NOT EXISTS idx_quote_categories_category ON quote_categories(category_id);
CREATE INDEX IF NOT EXISTS idx_user_quotes_quote ON user_quotes(quote_id);
CREATE INDEX IF NOT EXISTS idx_user_authors_author ON user_authors(author_id);
CREATE INDEX IF NOT EXISTS idx_author_tags_tag ON author_tags(tag_id);
CREATE INDEX IF NOT EXISTS idx_user_tags_tag ON user_tags(tag_id);
`

/**
 * Migration definitions for schema upgrades
 */
export interface Migration {
  version: number
  description: string
  sql: string
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Initial schema creation',
    sql: SCHEMA_SQL,
  },
]

const VersionRowSchema = z.object({ version: z.number().nullable() })

export interface DatabaseOptions {
  /** Open read-only; the schema is not touched */
  readonly?: boolean
  /** Busy timeout in milliseconds */
  timeout?: number
}

/**
 * Initialize the database with the complete schema
 */
export function initializeSchema(db: DatabaseType): void {
  db.exec(SCHEMA_SQL)
  db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION)
}

/**
 * Get the current schema version from the database, 0 when unversioned
 */
export function getSchemaVersion(db: DatabaseType): number {
  const table = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'")
    .get()
  if (table === undefined) {
    return 0
  }

  const row = VersionRowSchema.parse(
    db.prepare('SELECT MAX(version) as version FROM schema_version').get()
  )
  return row.version ?? 0
}

/**
 * Run pending migrations to upgrade the schema
 *
 * @returns Number of migrations applied
 */
export function runMigrations(db: DatabaseType): number {
  const currentVersion = getSchemaVersion(db)
  let migrationsRun = 0

  for (const migration of MIGRATIONS) {
    if (migration.version > currentVersion) {
      db.exec(migration.sql)
      db.prepare('INSERT OR REPLACE INTO schema_version (version) VALUES (?)').run(
        migration.version
      )
      migrationsRun++
    }
  }

  return migrationsRun
}

/**
 * Create a new database connection with proper configuration
 */
export function createDatabase(
  path: string = ':memory:',
  options: DatabaseOptions = {}
): DatabaseType {
  const db = new Database(path, {
    readonly: options.readonly ?? false,
    // better-sqlite3 rejects an explicit undefined timeout
    ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
  })

  db.pragma('foreign_keys = ON')

  if (!options.readonly) {
    if (path !== ':memory:') {
      db.pragma('journal_mode = WAL')
    }
    runMigrations(db)
  }

  return db
}

/**
 * Close the database connection safely
 */
export function closeDatabase(db: DatabaseType): void {
  if (db.open) {
    db.close()
  }
}
