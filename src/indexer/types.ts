/**
 * Indexer Types
 *
 * Course files are JSON documents validated with zod before anything is
 * written to the store.
 */

import { z } from 'zod';

export const CourseFileLessonSchema = z.object({
  lessonNumber: z.number().int().nonnegative(),
  lessonTitle: z.string().min(1),
  lessonLink: z.string().url().nullish(),
  /** Transcript text */
  content: z.string().default(''),
});

export const CourseFileSchema = z
  .object({
    title: z.string().trim().min(1),
    instructor: z.string().default('Unknown'),
    courseLink: z.string().url().nullish(),
    lessons: z.array(CourseFileLessonSchema).default([]),
  })
  .superRefine((course, ctx) => {
    const seen = new Set<number>();
    course.lessons.forEach((lesson, index) => {
      if (seen.has(lesson.lessonNumber)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['lessons', index, 'lessonNumber'],
          message: `Duplicate lesson number ${lesson.lessonNumber}`,
        });
      }
      seen.add(lesson.lessonNumber);
    });
  });

export type CourseFile = z.infer<typeof CourseFileSchema>;
export type CourseFileLesson = z.infer<typeof CourseFileLessonSchema>;

export interface ChunkingOptions {
  /** Maximum characters per chunk */
  chunkSize: number;
  /** Characters of trailing sentences repeated at the start of the next chunk */
  chunkOverlap: number;
}

/**
 * Per-file outcome of a load.
 */
export type CourseLoadEvent =
  | { type: 'added' | 'replaced'; path: string; title: string; chunks: number }
  | { type: 'skipped'; path: string; title: string }
  | { type: 'failed'; path: string; error: string };

export interface LoadOptions {
  chunking: ChunkingOptions;
  /** Reload courses whose title is already stored */
  replace?: boolean;
  onCourse?: (event: CourseLoadEvent) => void;
}

/**
 * Totals for one `load` run.
 */
export interface LoadResult {
  added: string[];
  replaced: string[];
  skipped: string[];
  failed: Array<{ path: string; error: string }>;
  totalChunks: number;
}
