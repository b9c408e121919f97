/**
 * Database Module
 *
 * SQLite storage for courses, lessons and transcript chunks.
 *
 * @example
 * ```ts
 * import { getDb, runMigrations, DatabaseOperations } from './database/index.js';
 *
 * const db = getDb();
 * runMigrations(db);
 * const titles = new DatabaseOperations(db).getCourseTitles();
 * ```
 */

// Connection management (low-level)
export { getDb, closeDb, openDatabase } from './connection.js';

// Migration utilities
export { runMigrations, getAppliedMigrations, getMigrationCount } from './migrate.js';
export type { MigrationResult } from './migrate.js';

// Schema types
export type { Course, Lesson, Chunk, RankedChunk } from './schema.js';

// Validation schemas and utilities
export {
  CourseRowSchema,
  LessonRowSchema,
  RankedChunkRowSchema,
  type CourseRow,
  type LessonRow,
  type RankedChunkRow,
  SchemaValidationError,
  validateRow,
  validateRows,
} from './validation.js';

// High-level database operations
export {
  DatabaseOperations,
  type CourseInput,
  type LessonInput,
  type ChunkInsertInput,
  type ChunkQuery,
} from './operations.js';
