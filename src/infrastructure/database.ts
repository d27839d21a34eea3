import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from '../config/env';
import { logger } from './logger';

export type SqliteDatabase = Database.Database;

export type OpenDatabaseOptions = {
  /** How long a write waits for the lock before failing (and rolling back). */
  busyTimeoutMs?: number;
  migrationsDir?: string;
};

const DEFAULT_MIGRATIONS_DIR = path.resolve(__dirname, '../../db/migrations');

export function runMigrations(db: SqliteDatabase, migrationsDir: string = DEFAULT_MIGRATIONS_DIR): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `);

  const applied = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM schema_migrations')
      .all()
      .map((row) => row.name)
  );

  const files = fs
    .readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const record = db.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)');
  const newlyApplied: string[] = [];

  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = fs.readFileSync(path.join(migrationsDir, file), 'utf8');
    db.transaction(() => {
      db.exec(sql);
      record.run(file, new Date().toISOString());
    })();
    newlyApplied.push(file);
  }

  if (newlyApplied.length > 0) {
    logger.info({ migrations: newlyApplied }, `[DB] Applied ${newlyApplied.length} migration(s)`);
  }
  return newlyApplied;
}

export function openDatabase(filename: string, opts: OpenDatabaseOptions = {}): SqliteDatabase {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
  }

  const db = new Database(filename, { timeout: opts.busyTimeoutMs ?? config.PERSIST_TIMEOUT_MS });
  db.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }

  runMigrations(db, opts.migrationsDir);
  return db;
}

// One connection per process; better-sqlite3 serialises access on it.
let shared: SqliteDatabase | undefined;

export function getDatabase(): SqliteDatabase {
  if (!shared) {
    shared = openDatabase(config.DATABASE_PATH);
  }
  return shared;
}

export function closeDatabase(): void {
  if (shared) {
    shared.close();
    shared = undefined;
  }
}
