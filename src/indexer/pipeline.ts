/**
 * Load Pipeline
 *
 * Scan → Parse → Chunk → Store for course files.
 *
 * A file that fails to parse or validate is reported and skipped; the
 * rest of the directory still loads.
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { CourseStore } from '../search/course-store.js';
import { ValidationError } from '../errors/index.js';
import { chunkCourse } from './chunker/index.js';
import { findCourseFiles } from './scanner.js';
import { CourseFileSchema, type CourseFile, type LoadOptions, type LoadResult } from './types.js';

/**
 * Read and validate one course file.
 *
 * @throws ValidationError listing every schema issue, or when the file is not JSON
 */
export async function parseCourseFile(path: string): Promise<CourseFile> {
  const text = await readFile(path, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`${basename(path)} is not valid JSON: ${message}`);
  }

  const parsed = CourseFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid course file: ${basename(path)}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'file'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

function describeFailure(error: unknown): string {
  if (error instanceof ValidationError && error.issues.length > 0) {
    return `${error.message} (${error.issues.join('; ')})`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load every course file under `path` into the store.
 *
 * @throws FileNotFoundError when `path` does not exist
 */
export async function loadCourses(
  store: CourseStore,
  path: string,
  options: LoadOptions
): Promise<LoadResult> {
  const result: LoadResult = { added: [], replaced: [], skipped: [], failed: [], totalChunks: 0 };

  for (const file of await findCourseFiles(path)) {
    let course: CourseFile;
    try {
      course = await parseCourseFile(file);
    } catch (error) {
      const message = describeFailure(error);
      result.failed.push({ path: file, error: message });
      options.onCourse?.({ type: 'failed', path: file, error: message });
      continue;
    }

    const chunks = chunkCourse(course, options.chunking);
    const outcome = store.addCourse(
      {
        title: course.title,
        instructor: course.instructor,
        courseLink: course.courseLink ?? null,
        lessons: course.lessons.map((lesson) => ({
          lessonNumber: lesson.lessonNumber,
          lessonTitle: lesson.lessonTitle,
          lessonLink: lesson.lessonLink ?? null,
        })),
      },
      chunks,
      { replace: options.replace }
    );

    if (outcome === 'skipped') {
      result.skipped.push(course.title);
      options.onCourse?.({ type: 'skipped', path: file, title: course.title });
      continue;
    }

    result[outcome].push(course.title);
    result.totalChunks += chunks.length;
    options.onCourse?.({ type: outcome, path: file, title: course.title, chunks: chunks.length });
  }

  return result;
}
