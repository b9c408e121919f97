/**
 * Database Row Validation
 *
 * Zod schemas for validating database reads at runtime.
 *
 * ```ts
 * const row = db.prepare('SELECT * FROM courses WHERE title = ?').get(title);
 * return row ? validateRow(CourseRowSchema, row, `courses.title=${title}`) : undefined;
 * ```
 */

import { z, type ZodIssue } from 'zod';
import { CLIError } from '../errors/types.js';

export const CourseRowSchema = z.object({
  title: z.string(),
  instructor: z.string(),
  course_link: z.string().nullable(),
  loaded_at: z.string(),
});

export type CourseRow = z.infer<typeof CourseRowSchema>;

export const LessonRowSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nonnegative(),
  lesson_title: z.string(),
  lesson_link: z.string().nullable(),
  position: z.number().int().nonnegative(),
});

export type LessonRow = z.infer<typeof LessonRowSchema>;

/**
 * Shape of a row produced by the full-text search query.
 */
export const RankedChunkRowSchema = z.object({
  course_title: z.string(),
  lesson_number: z.number().int().nullable(),
  chunk_index: z.number().int().nonnegative(),
  content: z.string(),
  rank: z.number(),
});

export type RankedChunkRow = z.infer<typeof RankedChunkRowSchema>;

export const TitleRowSchema = z.object({ title: z.string() });

export const CountRowSchema = z.object({ count: z.number().int().nonnegative() });

// ============================================================================
// Schema Validation Error
// ============================================================================

/**
 * Thrown when a database row fails schema validation, usually because
 * the database file was written by a different version of the CLI.
 *
 * Exit code 5: Database error
 */
export class SchemaValidationError extends CLIError {
  public readonly issues: Array<{ path: string; message: string }>;

  constructor(message: string, zodIssues: ZodIssue[]) {
    const formattedIssues = zodIssues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));

    const issuesSummary = formattedIssues
      .slice(0, 3)
      .map((i) => `  - ${i.path}: ${i.message}`)
      .join('\n');

    const hint =
      `Schema validation failed:\n${issuesSummary}` +
      (formattedIssues.length > 3 ? `\n  ... and ${formattedIssues.length - 3} more` : '') +
      `\n\nReload your courses with: crag load <dir> --replace`;

    super(message, hint, 5);
    this.name = 'SchemaValidationError';
    this.issues = formattedIssues;
  }
}

// ============================================================================
// Validation Utilities
// ============================================================================

/**
 * Validate a single database row against a Zod schema.
 *
 * @param context - Where the row came from, used in the error message (e.g. "courses.title=X")
 * @throws SchemaValidationError if validation fails
 */
export function validateRow<T extends z.ZodSchema>(
  schema: T,
  row: unknown,
  context: string
): z.output<T> {
  const result = schema.safeParse(row);

  if (result.success) {
    return result.data;
  }

  throw new SchemaValidationError(`Database schema mismatch in ${context}`, result.error.issues);
}

/**
 * Validate every row of a result set. Throws on the first invalid row.
 */
export function validateRows<T extends z.ZodSchema>(
  schema: T,
  rows: unknown[],
  context: string
): Array<z.output<T>> {
  return rows.map((row, index) => validateRow(schema, row, `${context}[${index}]`));
}
