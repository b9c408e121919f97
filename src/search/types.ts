/**
 * Search Module Types
 *
 * The contract between the course tools and whatever stores the course
 * catalog and transcript chunks.
 */

/**
 * Where a retrieved chunk came from. Every field may be missing for
 * chunks written by other tools, so consumers must tolerate gaps.
 */
export interface ChunkMetadata {
  courseTitle?: string;
  /** Null for course-level text that belongs to no lesson */
  lessonNumber?: number | null;
  chunkIndex?: number;
}

/**
 * Ranked results of one search.
 *
 * `documents`, `metadata` and `distances` always have the same length.
 * A non-null `error` means the search did not run and all three are empty.
 * Build values with createSearchResults / emptySearchResults.
 */
export interface SearchResults {
  readonly documents: readonly string[];
  readonly metadata: readonly ChunkMetadata[];
  /** Lower is closer */
  readonly distances: readonly number[];
  readonly error: string | null;
}

export interface LessonMetadata {
  lessonNumber: number;
  lessonTitle: string;
  lessonLink?: string | null;
}

/**
 * A course with its lessons in catalog order.
 */
export interface CourseMetadata {
  title: string;
  instructor: string;
  courseLink?: string | null;
  lessons: LessonMetadata[];
}

/**
 * Read access to the course catalog and its transcript index.
 */
export interface SearchProvider {
  /**
   * Search transcript chunks.
   *
   * An approximate `courseName` is resolved to a canonical title first;
   * when it cannot be resolved the result carries an error instead of
   * documents.
   */
  search(query: string, courseName?: string, lessonNumber?: number): Promise<SearchResults>;

  /** Map an approximate course name to a canonical title. */
  resolveCourseName(name: string): Promise<string | null>;

  getAllCourseMetadata(): Promise<CourseMetadata[]>;

  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
}

/**
 * A SearchProvider that can also report what it holds.
 */
export interface CourseCatalog extends SearchProvider {
  getCourseCount(): number;
  /** Titles in load order */
  getExistingCourseTitles(): string[];
}

/**
 * Options for the SQLite-backed course store.
 */
export interface CourseStoreOptions {
  /** Maximum chunks returned per search (config: search.max_results) */
  maxResults: number;
}
