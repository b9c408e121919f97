/**
 * Database Connection Module
 *
 * Provides a singleton SQLite connection using better-sqlite3.
 * The database lives at ~/.course-rag/courses.db unless overridden.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { getDbPath } from '../config/paths.js';

// Module-level singleton instance
let db: Database.Database | null = null;

/**
 * Open a database file with the pragmas the course store relies on.
 * Tests use this directly with a temp path.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const database = new Database(path);

  // Lessons and chunks cascade with their course
  database.pragma('foreign_keys = ON');
  database.pragma('journal_mode = WAL');

  return database;
}

/**
 * Get the singleton database instance.
 *
 * @example
 * ```ts
 * const db = getDb();
 * const count = db.prepare('SELECT COUNT(*) AS n FROM courses').get();
 * ```
 */
export function getDb(): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(getDbPath());
  process.on('exit', () => closeDb());

  return db;
}

/**
 * Close the database connection.
 * Safe to call multiple times or when no connection exists.
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
