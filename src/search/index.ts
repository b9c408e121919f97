/**
 * Search Module
 *
 * Course catalog access and transcript search for the tools.
 */

export type {
  ChunkMetadata,
  CourseCatalog,
  CourseMetadata,
  CourseStoreOptions,
  LessonMetadata,
  SearchProvider,
  SearchResults,
} from './types.js';

export { createSearchResults, emptySearchResults, isEmptyResults } from './results.js';
export { toMatchExpression, tokenize } from './fts-query.js';
export { CourseStore, type AddCourseOutcome } from './course-store.js';
