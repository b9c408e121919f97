/**
 * Database Migration Runner
 *
 * Applies embedded SQL migrations in order, tracking which have been
 * applied in the _migrations table. Safe to run on every start.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';

/**
 * Result of running migrations.
 */
export interface MigrationResult {
  /** Names of migrations that were applied by this call */
  applied: string[];
  /** Migrations that failed with their error messages */
  failed: Array<{ name: string; error: string }>;
}

// Embedded so the built CLI has no SQL files to locate
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-course-catalog.sql',
    sql: `
-- Course catalog: one row per course, title is the canonical key
CREATE TABLE IF NOT EXISTS courses (
  title TEXT PRIMARY KEY,
  instructor TEXT NOT NULL,
  course_link TEXT,
  loaded_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Lessons keep their catalog position; lesson numbers need not be sorted
CREATE TABLE IF NOT EXISTS lessons (
  course_title TEXT NOT NULL,
  lesson_number INTEGER NOT NULL,
  lesson_title TEXT NOT NULL,
  lesson_link TEXT,
  position INTEGER NOT NULL,
  PRIMARY KEY (course_title, lesson_number),
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_lessons_position ON lessons(course_title, position);
    `.trim(),
  },
  {
    name: '002-transcript-chunks.sql',
    sql: `
CREATE TABLE IF NOT EXISTS chunks (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  course_title TEXT NOT NULL,
  lesson_number INTEGER,
  chunk_index INTEGER NOT NULL,
  content TEXT NOT NULL,
  FOREIGN KEY (course_title) REFERENCES courses(title) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_chunks_course ON chunks(course_title, lesson_number);

-- Full-text index over chunk content; rowid mirrors chunks.id
CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(content, tokenize = 'porter unicode61');

-- Title index used by fuzzy course-name resolution
CREATE VIRTUAL TABLE IF NOT EXISTS course_titles_fts USING fts5(title, tokenize = 'porter unicode61');
    `.trim(),
  },
];

const MigrationNameRowSchema = z.object({ name: z.string() });

/**
 * Run all pending migrations against a database.
 *
 * Failed migrations do not stop later ones from being attempted; callers
 * decide whether a failure is fatal.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  const applied: string[] = [];
  const failed: Array<{ name: string; error: string }> = [];

  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const alreadyApplied = getAppliedMigrations(db);

  for (const migration of MIGRATIONS) {
    if (alreadyApplied.includes(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      applied.push(migration.name);
    } catch (error) {
      failed.push({
        name: migration.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return { applied, failed };
}

/**
 * Names of migrations already recorded, in application order.
 */
export function getAppliedMigrations(db: Database.Database): string[] {
  return db
    .prepare('SELECT name FROM _migrations ORDER BY id')
    .all()
    .map((row) => MigrationNameRowSchema.parse(row).name);
}

/**
 * Total number of embedded migrations.
 */
export function getMigrationCount(): number {
  return MIGRATIONS.length;
}
