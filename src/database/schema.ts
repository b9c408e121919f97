/**
 * Database Schema Types
 *
 * TypeScript interfaces matching the SQLite table schemas.
 * Column names stay snake_case; the store maps them to camelCase metadata.
 */

// ============================================================================
// Courses Table
// ============================================================================

/**
 * A loaded course. The title is the course's identity.
 */
export interface Course {
  title: string;
  instructor: string;
  /** Link to the course landing page */
  course_link: string | null;
  /** SQLite datetime of the last load */
  loaded_at: string;
}

// ============================================================================
// Lessons Table
// ============================================================================

/**
 * One lesson of a course, with its position in the original catalog.
 */
export interface Lesson {
  course_title: string;
  lesson_number: number;
  lesson_title: string;
  lesson_link: string | null;
  /** Zero-based index in the course file's lesson list */
  position: number;
}

// ============================================================================
// Chunks Table
// ============================================================================

/**
 * A searchable slice of lesson transcript text.
 */
export interface Chunk {
  id: number;
  course_title: string;
  /** Null for course-level text not tied to a lesson */
  lesson_number: number | null;
  /** Running index across the whole course */
  chunk_index: number;
  content: string;
}

/**
 * A chunk returned from a full-text query, with its bm25 rank.
 */
export interface RankedChunk extends Omit<Chunk, 'id'> {
  /** bm25 score; lower is a closer match */
  rank: number;
}
