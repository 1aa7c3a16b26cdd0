/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync, unlinkSync } from 'fs';
import { dirname, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

function getDbPath(): string {
  const override = getEnvConfig().dbPath;
  if (override) {
    return override;
  }

  return join(process.cwd(), 'data', 'dcf.db');
}

export function initializeDatabase(): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = getDbPath();
  const inMemory = dbPath === IN_MEMORY;
  if (!inMemory) {
    // Ensure data directory exists
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const isNew = inMemory || !existsSync(dbPath);

  logger.info({ dbPath, isNew }, 'Initializing database');

  db = new Database(dbPath);

  if (!inMemory) {
    db.pragma('journal_mode = WAL');
  }

  runMigrations(db);

  return db;
}

function runMigrations(database: Database.Database): void {
  const migrationsDir = join(process.cwd(), 'src', 'data', 'migrations');
  if (!existsSync(migrationsDir)) {
    throw new Error(`Migrations directory not found: ${migrationsDir}`);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  logger.debug({ migrationsDir, files }, 'Running database migrations');

  for (const file of files) {
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    database.exec(sql);
  }
}

export function getDatabase(): Database.Database {
  if (!db) {
    return initializeDatabase();
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.debug('Database connection closed');
  }
}

export function resetDatabase(): void {
  closeDatabase();

  const dbPath = getDbPath();
  if (dbPath === IN_MEMORY) return;

  for (const path of [dbPath, `${dbPath}-wal`, `${dbPath}-shm`]) {
    if (existsSync(path)) unlinkSync(path);
  }

  logger.info({ dbPath }, 'Database reset complete');
}
