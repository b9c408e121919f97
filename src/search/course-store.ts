/**
 * Course Store
 *
 * SQLite-backed SearchProvider. Transcript chunks are ranked with FTS5
 * bm25; course names given by the model are resolved to canonical titles
 * before filtering.
 */

import { DatabaseOperations, type ChunkInsertInput } from '../database/index.js';
import type { RankedChunk } from '../database/index.js';
import { type Logger, consoleLogger } from '../utils/index.js';
import { createSearchResults, emptySearchResults } from './results.js';
import { toMatchExpression } from './fts-query.js';
import type {
  ChunkMetadata,
  CourseCatalog,
  CourseMetadata,
  CourseStoreOptions,
  SearchResults,
} from './types.js';

/**
 * What happened to a course passed to addCourse.
 */
export type AddCourseOutcome = 'added' | 'replaced' | 'skipped';

function toChunkMetadata(row: RankedChunk): ChunkMetadata {
  return {
    courseTitle: row.course_title,
    lessonNumber: row.lesson_number,
    chunkIndex: row.chunk_index,
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CourseStore implements CourseCatalog {
  private readonly ops: DatabaseOperations;
  private readonly maxResults: number;
  private readonly logger: Logger;

  constructor(ops: DatabaseOperations, options: CourseStoreOptions, logger: Logger = consoleLogger) {
    this.ops = ops;
    this.maxResults = options.maxResults;
    this.logger = logger;
  }

  async search(query: string, courseName?: string, lessonNumber?: number): Promise<SearchResults> {
    try {
      let courseTitle: string | undefined;
      if (courseName) {
        const resolved = this.resolveTitle(courseName);
        if (resolved === null) {
          return emptySearchResults(`No course found matching '${courseName}'`);
        }
        courseTitle = resolved;
      }

      const match = toMatchExpression(query);
      if (match === null) {
        return emptySearchResults();
      }

      const rows = this.ops.searchChunks({
        match,
        courseTitle,
        lessonNumber,
        limit: this.maxResults,
      });

      this.logger.debug?.(
        `search "${query}" course=${courseTitle ?? '-'} lesson=${lessonNumber ?? '-'}: ${rows.length} hit(s)`
      );

      return createSearchResults(
        rows.map((row) => row.content),
        rows.map(toChunkMetadata),
        rows.map((row) => row.rank)
      );
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Course search failed: ${message}`);
      return emptySearchResults(`Search error: ${message}`);
    }
  }

  async resolveCourseName(name: string): Promise<string | null> {
    try {
      return this.resolveTitle(name);
    } catch (error) {
      this.logger.warn(`Course name lookup failed: ${errorMessage(error)}`);
      return null;
    }
  }

  async getAllCourseMetadata(): Promise<CourseMetadata[]> {
    try {
      return this.ops.getAllCourses().map((course) => ({
        title: course.title,
        instructor: course.instructor,
        courseLink: course.course_link,
        lessons: this.ops.getLessons(course.title).map((lesson) => ({
          lessonNumber: lesson.lesson_number,
          lessonTitle: lesson.lesson_title,
          lessonLink: lesson.lesson_link,
        })),
      }));
    } catch (error) {
      this.logger.warn(`Course catalog read failed: ${errorMessage(error)}`);
      return [];
    }
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    try {
      return this.ops.getLesson(courseTitle, lessonNumber)?.lesson_link ?? null;
    } catch (error) {
      this.logger.warn(`Lesson link lookup failed: ${errorMessage(error)}`);
      return null;
    }
  }

  /**
   * Store a course with its chunks.
   *
   * An existing title is left alone unless `replace` is set, in which case
   * the old course and its chunks are removed first.
   */
  addCourse(
    course: CourseMetadata,
    chunks: ChunkInsertInput[],
    options: { replace?: boolean } = {}
  ): AddCourseOutcome {
    const exists = this.ops.getCourse(course.title) !== undefined;
    if (exists && !options.replace) {
      return 'skipped';
    }
    if (exists) {
      this.ops.deleteCourse(course.title);
    }

    this.ops.insertCourse(course, chunks);
    return exists ? 'replaced' : 'added';
  }

  removeCourse(title: string): boolean {
    return this.ops.deleteCourse(title);
  }

  getCourseCount(): number {
    return this.ops.getCourseCount();
  }

  getExistingCourseTitles(): string[] {
    return this.ops.getCourseTitles();
  }

  /**
   * Exact title (ignoring case), then the shortest title containing the
   * input, then the best full-text match over titles.
   */
  private resolveTitle(name: string): string | null {
    const needle = name.trim().toLowerCase();
    if (needle === '') {
      return null;
    }

    const titles = this.ops.getCourseTitles();

    const exact = titles.find((title) => title.toLowerCase() === needle);
    if (exact !== undefined) {
      return exact;
    }

    const containing = titles
      .filter((title) => title.toLowerCase().includes(needle))
      .sort((a, b) => a.length - b.length);
    if (containing.length > 0) {
      return containing[0];
    }

    const match = toMatchExpression(name);
    if (match === null) {
      return null;
    }
    return this.ops.matchCourseTitle(match) ?? null;
  }
}
