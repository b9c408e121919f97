/**
 * Indexer Module
 *
 * Turns course JSON files into stored courses and searchable chunks.
 */

export {
  CourseFileSchema,
  CourseFileLessonSchema,
  type CourseFile,
  type CourseFileLesson,
  type ChunkingOptions,
  type CourseLoadEvent,
  type LoadOptions,
  type LoadResult,
} from './types.js';
export { chunkText, chunkCourse, splitSentences } from './chunker/index.js';
export { findCourseFiles } from './scanner.js';
export { parseCourseFile, loadCourses } from './pipeline.js';
