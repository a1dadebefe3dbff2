/**
 * SQLite database for the durable cache store
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, readdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { fileURLToPath } from 'url';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

export const IN_MEMORY = ':memory:';

function resolveDbPath(path: string): string {
  if (path === IN_MEMORY) return path;
  const resolved = isAbsolute(path) ? path : join(process.cwd(), path);
  const dir = dirname(resolved);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return resolved;
}

/** Opens a new connection and brings its schema up to date. */
export function openDatabase(path: string): Database.Database {
  const dbPath = resolveDbPath(path);
  const isNew = dbPath === IN_MEMORY || !existsSync(dbPath);

  logger.debug({ dbPath, isNew }, 'Opening database');

  const database = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    database.pragma('journal_mode = WAL');
  }

  runMigrations(database);
  ensureCoreTables(database);

  return database;
}

function runMigrations(database: Database.Database): void {
  if (!existsSync(MIGRATIONS_DIR)) {
    logger.warn({ migrationsDir: MIGRATIONS_DIR }, 'Migrations directory not found');
    return;
  }

  const files = readdirSync(MIGRATIONS_DIR)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  for (const file of files) {
    database.exec(readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'));
  }

  logger.debug({ files }, 'Database migrations complete');
}

// Fallback for builds that do not ship the migrations folder
function ensureCoreTables(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS analysis_cache (
      key TEXT PRIMARY KEY,
      payload TEXT NOT NULL,
      fetched_at INTEGER NOT NULL,
      ttl_seconds INTEGER NOT NULL
    );
  `);
}
