import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Open the attempt history database.
 * Creates the database file and schema if they don't exist.
 * Pass ':memory:' for a throwaway database.
 */
export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better performance
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  initSchema(db);

  return db;
}

/**
 * Initialize the database schema.
 */
function initSchema(database: Database.Database): void {
  // Imports table - one row per recorded source
  database.exec(`
    CREATE TABLE IF NOT EXISTS imports (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source TEXT NOT NULL,
      content_hash TEXT NOT NULL UNIQUE,
      exam_count INTEGER NOT NULL,
      imported_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  // Attempts table - one row per graded question
  database.exec(`
    CREATE TABLE IF NOT EXISTS attempts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      import_id INTEGER NOT NULL,
      exam_index INTEGER NOT NULL,
      number INTEGER NOT NULL,
      question_id TEXT NOT NULL,
      selected_answer TEXT NOT NULL,
      correct_answer TEXT NOT NULL,
      is_correct INTEGER NOT NULL,
      FOREIGN KEY (import_id) REFERENCES imports(id)
    )
  `);

  database.exec(`
    CREATE INDEX IF NOT EXISTS idx_attempts_question_id ON attempts(question_id);
    CREATE INDEX IF NOT EXISTS idx_attempts_import_id ON attempts(import_id);
  `);
}
