import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

/** Shared database; `dbPath` is only read on first use and defaults to data/caddie.db. */
export function getDatabase(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(dbPath ?? join(__dirname, '../../data', 'caddie.db'));
  return db;
}

/** Opens and migrates a database; `:memory:` gives a private in-process one. */
export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  if (dbPath !== ':memory:') {
    mkdirSync(pathDirname(dbPath), { recursive: true });
  }

  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');

  runMigrations(database);

  return database;
}

function runMigrations(db: Database.Database): void {
  logger.info('Running database migrations');

  db.exec(`
    CREATE TABLE IF NOT EXISTS rounds (
      id TEXT PRIMARY KEY,
      course_name TEXT NOT NULL,
      starting_hole INTEGER NOT NULL DEFAULT 1,
      started_at INTEGER NOT NULL,
      ended_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_rounds_started ON rounds(started_at);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS shots (
      id TEXT PRIMARY KEY,
      round_id TEXT REFERENCES rounds(id) ON DELETE CASCADE,
      hole_number INTEGER,
      club TEXT NOT NULL,
      lie TEXT NOT NULL,
      miss_direction TEXT,
      pressure_tagged INTEGER NOT NULL DEFAULT 0,
      pressure_inferred INTEGER NOT NULL DEFAULT 0,
      scoring_context TEXT,
      notes TEXT,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_shots_round ON shots(round_id);
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS miss_patterns (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      direction TEXT NOT NULL,
      club TEXT,
      frequency INTEGER NOT NULL,
      confidence REAL NOT NULL CHECK (confidence >= 0 AND confidence <= 1),
      pressure_tagged INTEGER NOT NULL DEFAULT 0,
      pressure_inferred INTEGER NOT NULL DEFAULT 0,
      scoring_context TEXT,
      last_occurrence INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_miss_patterns_club ON miss_patterns(club);
  `);

  logger.info('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
