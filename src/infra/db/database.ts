import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { applyMigrations } from './schema';

// Open the SQLite file (or ':memory:'), enable foreign keys and bring the schema up to date
export function openDatabase(filename: string): DatabaseType {
  const db = new Database(filename);
  db.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  applyMigrations(db);
  return db;
}
