/**
 * Database Operations
 *
 * Course catalog and transcript chunk persistence on top of the raw
 * better-sqlite3 connection. Every read is validated with the row schemas
 * in validation.ts.
 */

import type Database from 'better-sqlite3';
import { getDb } from './connection.js';
import type { Course, Lesson, RankedChunk } from './schema.js';
import {
  CourseRowSchema,
  LessonRowSchema,
  RankedChunkRowSchema,
  TitleRowSchema,
  CountRowSchema,
  validateRow,
  validateRows,
} from './validation.js';

/**
 * Input for one lesson of a course.
 */
export interface LessonInput {
  lessonNumber: number;
  lessonTitle: string;
  lessonLink?: string | null;
}

/**
 * Input for creating a course with its lessons.
 */
export interface CourseInput {
  title: string;
  instructor: string;
  courseLink?: string | null;
  lessons: LessonInput[];
}

/**
 * Input for inserting a transcript chunk.
 */
export interface ChunkInsertInput {
  lessonNumber: number | null;
  chunkIndex: number;
  content: string;
}

/**
 * Filters for a full-text chunk query.
 */
export interface ChunkQuery {
  /** FTS5 MATCH expression */
  match: string;
  /** Canonical course title to restrict to */
  courseTitle?: string;
  lessonNumber?: number;
  limit: number;
}

/**
 * High-level database operations wrapper.
 *
 * All methods use the shared connection from getDb() unless a database is
 * passed in (tests pass a temporary one).
 */
export class DatabaseOperations {
  private db: Database.Database;

  constructor(db?: Database.Database) {
    this.db = db ?? getDb();
  }

  /**
   * Insert a course, its lessons and its chunks in one transaction.
   *
   * @throws if a course with the same title already exists
   */
  insertCourse(course: CourseInput, chunks: ChunkInsertInput[]): void {
    const insertCourse = this.db.prepare(
      'INSERT INTO courses (title, instructor, course_link) VALUES (@title, @instructor, @courseLink)'
    );
    const insertTitle = this.db.prepare('INSERT INTO course_titles_fts (title) VALUES (?)');
    const insertLesson = this.db.prepare(`
      INSERT INTO lessons (course_title, lesson_number, lesson_title, lesson_link, position)
      VALUES (@courseTitle, @lessonNumber, @lessonTitle, @lessonLink, @position)
    `);
    const insertChunk = this.db.prepare(`
      INSERT INTO chunks (course_title, lesson_number, chunk_index, content)
      VALUES (@courseTitle, @lessonNumber, @chunkIndex, @content)
    `);
    const insertFts = this.db.prepare('INSERT INTO chunks_fts (rowid, content) VALUES (?, ?)');

    this.db.transaction(() => {
      insertCourse.run({
        title: course.title,
        instructor: course.instructor,
        courseLink: course.courseLink ?? null,
      });
      insertTitle.run(course.title);

      course.lessons.forEach((lesson, position) => {
        insertLesson.run({
          courseTitle: course.title,
          lessonNumber: lesson.lessonNumber,
          lessonTitle: lesson.lessonTitle,
          lessonLink: lesson.lessonLink ?? null,
          position,
        });
      });

      for (const chunk of chunks) {
        const result = insertChunk.run({
          courseTitle: course.title,
          lessonNumber: chunk.lessonNumber,
          chunkIndex: chunk.chunkIndex,
          content: chunk.content,
        });
        insertFts.run(Number(result.lastInsertRowid), chunk.content);
      }
    })();
  }

  /**
   * Delete a course and everything indexed for it.
   *
   * @returns true if a course was removed
   */
  deleteCourse(title: string): boolean {
    const deleteFts = this.db.prepare(
      'DELETE FROM chunks_fts WHERE rowid IN (SELECT id FROM chunks WHERE course_title = ?)'
    );
    const deleteTitle = this.db.prepare('DELETE FROM course_titles_fts WHERE title = ?');
    // Lessons and chunks go with the course (ON DELETE CASCADE)
    const deleteCourse = this.db.prepare('DELETE FROM courses WHERE title = ?');

    return this.db.transaction(() => {
      deleteFts.run(title);
      deleteTitle.run(title);
      return deleteCourse.run(title).changes > 0;
    })();
  }

  getCourse(title: string): Course | undefined {
    const row = this.db.prepare('SELECT * FROM courses WHERE title = ?').get(title);
    return row ? validateRow(CourseRowSchema, row, `courses.title=${title}`) : undefined;
  }

  /**
   * All courses, in the order they were loaded.
   */
  getAllCourses(): Course[] {
    const rows = this.db.prepare('SELECT * FROM courses ORDER BY rowid').all();
    return validateRows(CourseRowSchema, rows, 'courses');
  }

  /**
   * Lessons of a course in catalog order.
   */
  getLessons(courseTitle: string): Lesson[] {
    const rows = this.db
      .prepare('SELECT * FROM lessons WHERE course_title = ? ORDER BY position')
      .all(courseTitle);
    return validateRows(LessonRowSchema, rows, `lessons.course_title=${courseTitle}`);
  }

  getLesson(courseTitle: string, lessonNumber: number): Lesson | undefined {
    const row = this.db
      .prepare('SELECT * FROM lessons WHERE course_title = ? AND lesson_number = ?')
      .get(courseTitle, lessonNumber);
    return row
      ? validateRow(LessonRowSchema, row, `lessons.course_title=${courseTitle}`)
      : undefined;
  }

  getCourseTitles(): string[] {
    const rows = this.db.prepare('SELECT title FROM courses ORDER BY rowid').all();
    return validateRows(TitleRowSchema, rows, 'courses').map((row) => row.title);
  }

  getCourseCount(): number {
    const row = this.db.prepare('SELECT COUNT(*) AS count FROM courses').get();
    return validateRow(CountRowSchema, row, 'courses').count;
  }

  getChunkCount(courseTitle?: string): number {
    const row =
      courseTitle === undefined
        ? this.db.prepare('SELECT COUNT(*) AS count FROM chunks').get()
        : this.db
            .prepare('SELECT COUNT(*) AS count FROM chunks WHERE course_title = ?')
            .get(courseTitle);
    return validateRow(CountRowSchema, row, 'chunks').count;
  }

  /**
   * Full-text search over chunk content, best matches first.
   */
  searchChunks(query: ChunkQuery): RankedChunk[] {
    const rows = this.db
      .prepare(
        `
      SELECT c.course_title, c.lesson_number, c.chunk_index, c.content,
             bm25(chunks_fts) AS rank
      FROM chunks_fts
      JOIN chunks c ON c.id = chunks_fts.rowid
      WHERE chunks_fts MATCH @match
        AND (@courseTitle IS NULL OR c.course_title = @courseTitle)
        AND (@lessonNumber IS NULL OR c.lesson_number = @lessonNumber)
      ORDER BY rank, c.chunk_index
      LIMIT @limit
    `
      )
      .all({
        match: query.match,
        courseTitle: query.courseTitle ?? null,
        lessonNumber: query.lessonNumber ?? null,
        limit: query.limit,
      });
    return validateRows(RankedChunkRowSchema, rows, 'chunks_fts');
  }

  /**
   * Best course title for an FTS5 MATCH expression, if any title matches.
   */
  matchCourseTitle(match: string): string | undefined {
    const row = this.db
      .prepare(
        `
      SELECT title FROM course_titles_fts
      WHERE course_titles_fts MATCH ?
      ORDER BY bm25(course_titles_fts)
      LIMIT 1
    `
      )
      .get(match);
    return row ? validateRow(TitleRowSchema, row, 'course_titles_fts').title : undefined;
  }
}
