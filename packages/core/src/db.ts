import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TodoDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

type EnvMap = Record<string, string | undefined>;

const DB_DIR_NAME = 'todo-api';
const DB_FILE_NAME = 'todo.db';

function userDataDir(env: EnvMap, platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin': return join(homedir(), 'Library', 'Application Support');
    case 'win32': return env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming');
    default: return env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share');
  }
}

/**
 * Where the database lives when no path is passed: `TODO_DB_PATH` if set,
 * otherwise `todo-api/todo.db` under the per-user data directory.
 */
export function getDefaultDbPath(env: EnvMap = process.env, platform: NodeJS.Platform = process.platform): string {
  const configured = env['TODO_DB_PATH']?.trim();
  if (configured) return configured;
  return join(userDataDir(env, platform), DB_DIR_NAME, DB_FILE_NAME);
}

/** The raw SQL to create the schema from scratch. Every statement is idempotent. */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS task (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title VARCHAR(255) NOT NULL,
    description VARCHAR(1000),
    completed INTEGER NOT NULL DEFAULT 0,
    priority TEXT NOT NULL DEFAULT 'Moderate' CHECK (priority IN ('Low', 'Moderate', 'High')),
    status TEXT NOT NULL DEFAULT 'Not Started' CHECK (status IN ('Not Started', 'In Progress', 'Completed')),
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS ix_task_title ON task(title);
CREATE INDEX IF NOT EXISTS ix_task_completed ON task(completed);
`;

/**
 * Create a Drizzle database connection with proper pragmas and the schema applied.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TodoDb {
  const dbPath = path ?? getDefaultDbPath();

  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Pragmas apply per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('busy_timeout = 5000');

  sqlite.exec(CREATE_SCHEMA_SQL);

  return drizzle(sqlite, { schema });
}

/** In-memory database with schema applied. For tests. */
export function createTestDb(): TodoDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (pragmas, close, raw exec).
 */
export function getRawDb(db: TodoDb): Database.Database {
  return db.$client;
}

/** Close the underlying connection. Safe to call twice. */
export function closeDb(db: TodoDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}
