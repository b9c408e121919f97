/**
 * Course Outline Tool
 *
 * Returns the title, instructor, link and lesson list of one course or
 * of every course.
 */

import { z } from 'zod';
import type { CourseMetadata, SearchProvider } from '../../search/index.js';
import { ValidatedTool } from './base-tool.js';
import type { SourceCitation, ToolDefinition } from './types.js';

const outlineInputSchema = z.object({
  course_name: z.string().nullish(),
});

type OutlineInput = z.infer<typeof outlineInputSchema>;

/**
 * Render one course. Every line, including the last, ends with a newline.
 */
export function renderOutline(course: CourseMetadata): string {
  let text = `**${course.title}**\n`;
  text += `Instructor: ${course.instructor}\n`;
  if (course.courseLink) {
    text += `Course Link: ${course.courseLink}\n`;
  }
  text += `\nLessons (${course.lessons.length} total):\n`;
  for (const lesson of course.lessons) {
    text += `  ${lesson.lessonNumber}. ${lesson.lessonTitle}\n`;
  }
  return text;
}

/**
 * Lesson-level citations, or a single course-level one when no lesson is linked.
 */
export function outlineCitations(course: CourseMetadata): SourceCitation[] {
  const lessonCitations: SourceCitation[] = [];
  for (const lesson of course.lessons) {
    if (lesson.lessonLink) {
      lessonCitations.push({
        title: `${course.title} - Lesson ${lesson.lessonNumber}`,
        url: lesson.lessonLink,
      });
    }
  }

  if (lessonCitations.length === 0 && course.courseLink) {
    return [{ title: course.title, url: course.courseLink }];
  }
  return lessonCitations;
}

export class CourseOutlineTool extends ValidatedTool<typeof outlineInputSchema> {
  protected readonly schema = outlineInputSchema;

  constructor(private readonly provider: SearchProvider) {
    super();
  }

  definition(): ToolDefinition {
    return {
      name: 'get_course_outline',
      description:
        'Get the outline of a course: title, course link, instructor and the numbered list of lessons',
      input_schema: {
        type: 'object',
        properties: {
          course_name: {
            type: 'string',
            description:
              "Course title (partial matches work, e.g. 'MCP', 'Introduction'). Omit to list every course",
          },
        },
        required: [],
      },
    };
  }

  protected async run(input: OutlineInput): Promise<string> {
    const allCourses = await this.provider.getAllCourseMetadata();
    if (allCourses.length === 0) {
      return 'No courses found in the system.';
    }

    let courses = allCourses;
    const filter = input.course_name;
    if (filter) {
      const resolved = await this.provider.resolveCourseName(filter);
      courses = resolved === null ? [] : allCourses.filter((course) => course.title === resolved);
      if (courses.length === 0) {
        return `No course found matching '${filter}'.`;
      }
    }

    this.setCitations(courses.flatMap(outlineCitations));
    return courses.map(renderOutline).join('\n\n');
  }
}
