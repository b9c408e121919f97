/**
 * Course Search Tool
 *
 * Lets the model search lesson transcripts, optionally narrowed to one
 * course (fuzzy name) and one lesson.
 */

import { z } from 'zod';
import type { ChunkMetadata, SearchProvider, SearchResults } from '../../search/index.js';
import { ValidatedTool } from './base-tool.js';
import type { SourceCitation, ToolDefinition } from './types.js';

const searchInputSchema = z.object({
  query: z.string(),
  course_name: z.string().nullish(),
  lesson_number: z.number().int().nullish(),
});

type SearchInput = z.infer<typeof searchInputSchema>;

function sourceLabel(courseTitle: string, lessonNumber: number | null | undefined): string {
  return lessonNumber === null || lessonNumber === undefined
    ? courseTitle
    : `${courseTitle} - Lesson ${lessonNumber}`;
}

export class CourseSearchTool extends ValidatedTool<typeof searchInputSchema> {
  protected readonly schema = searchInputSchema;

  constructor(private readonly provider: SearchProvider) {
    super();
  }

  definition(): ToolDefinition {
    return {
      name: 'search_course_content',
      description: 'Search course materials with smart course name matching and lesson filtering',
      input_schema: {
        type: 'object',
        properties: {
          query: {
            type: 'string',
            description: 'What to search for in the course content',
          },
          course_name: {
            type: 'string',
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
          lesson_number: {
            type: 'integer',
            description: 'Specific lesson number to search within (e.g. 1, 2, 3)',
          },
        },
        required: ['query'],
      },
    };
  }

  protected async run(input: SearchInput): Promise<string> {
    const courseName = input.course_name ?? undefined;
    const lessonNumber = input.lesson_number ?? undefined;

    const results = await this.provider.search(input.query, courseName, lessonNumber);

    if (results.error !== null) {
      return results.error;
    }

    if (results.documents.length === 0) {
      let filterInfo = '';
      if (courseName) {
        filterInfo += ` in course '${courseName}'`;
      }
      if (lessonNumber !== undefined) {
        filterInfo += ` in lesson ${lessonNumber}`;
      }
      return `No relevant content found${filterInfo}.`;
    }

    return this.formatResults(results);
  }

  private async formatResults(results: SearchResults): Promise<string> {
    const blocks: string[] = [];
    const citations: SourceCitation[] = [];

    for (const [index, document] of results.documents.entries()) {
      const meta: ChunkMetadata = results.metadata[index] ?? {};
      const courseTitle = meta.courseTitle ?? 'unknown';
      const lessonNumber = meta.lessonNumber;
      const label = sourceLabel(courseTitle, lessonNumber);

      blocks.push(`[${label}]\n${document}`);

      let url: string | null = null;
      if (lessonNumber !== null && lessonNumber !== undefined && courseTitle !== 'unknown') {
        url = await this.provider.getLessonLink(courseTitle, lessonNumber);
      }
      citations.push({ title: label, url });
    }

    this.setCitations(citations);
    return blocks.join('\n\n');
  }
}
