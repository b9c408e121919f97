/**
 * CourseOutlineTool Tests
 */

import { describe, it, expect } from 'vitest';
import { CourseOutlineTool } from '../outline-tool.js';
import type { CourseMetadata } from '../../../search/index.js';
import { createMockProvider } from './helpers.js';

const LINKED: CourseMetadata = {
  title: 'MCP: Build Rich-Context AI Apps',
  instructor: 'Elie Example',
  courseLink: 'https://example.com/mcp',
  lessons: [
    { lessonNumber: 0, lessonTitle: 'Introduction', lessonLink: 'https://example.com/mcp/0' },
    { lessonNumber: 2, lessonTitle: 'Servers', lessonLink: null },
    { lessonNumber: 1, lessonTitle: 'Clients', lessonLink: 'https://example.com/mcp/1' },
  ],
};

const UNLINKED: CourseMetadata = {
  title: 'Prompt Basics',
  instructor: 'Pat Example',
  courseLink: 'https://example.com/prompts',
  lessons: [{ lessonNumber: 1, lessonTitle: 'Zero-shot' }],
};

const BARE: CourseMetadata = {
  title: 'Notes',
  instructor: 'Nobody',
  lessons: [],
};

describe('CourseOutlineTool', () => {
  it('declares get_course_outline with no required parameters', () => {
    const definition = new CourseOutlineTool(createMockProvider()).definition();

    expect(definition.name).toBe('get_course_outline');
    expect(definition.input_schema).toMatchObject({
      type: 'object',
      required: [],
    });
    expect(Object.keys(definition.input_schema.properties)).toEqual(['course_name']);
  });

  it('reports an empty catalog', async () => {
    const tool = new CourseOutlineTool(createMockProvider());

    expect(await tool.execute({})).toBe('No courses found in the system.');
    expect(tool.getCitations()).toEqual([]);
  });

  it('reports a filter that cannot be resolved', async () => {
    const provider = createMockProvider({ courses: [LINKED], resolved: null });

    expect(await new CourseOutlineTool(provider).execute({ course_name: 'ZZZ' })).toBe(
      "No course found matching 'ZZZ'."
    );
    expect(provider.resolveCourseName).toHaveBeenCalledWith('ZZZ');
  });

  it('reports a resolved title missing from the catalog', async () => {
    const provider = createMockProvider({ courses: [LINKED], resolved: 'Retired Course' });

    expect(await new CourseOutlineTool(provider).execute({ course_name: 'retired' })).toBe(
      "No course found matching 'retired'."
    );
  });

  it('renders one course in catalog order with lesson citations', async () => {
    const provider = createMockProvider({ courses: [LINKED, UNLINKED], resolved: LINKED.title });
    const tool = new CourseOutlineTool(provider);

    const output = await tool.execute({ course_name: 'mcp' });

    expect(output).toBe(
      '**MCP: Build Rich-Context AI Apps**\n' +
        'Instructor: Elie Example\n' +
        'Course Link: https://example.com/mcp\n' +
        '\n' +
        'Lessons (3 total):\n' +
        '  0. Introduction\n' +
        '  2. Servers\n' +
        '  1. Clients\n'
    );
    expect(tool.getCitations()).toEqual([
      { title: 'MCP: Build Rich-Context AI Apps - Lesson 0', url: 'https://example.com/mcp/0' },
      { title: 'MCP: Build Rich-Context AI Apps - Lesson 1', url: 'https://example.com/mcp/1' },
    ]);
  });

  it('falls back to one course-level citation when no lesson is linked', async () => {
    const provider = createMockProvider({ courses: [UNLINKED], resolved: UNLINKED.title });
    const tool = new CourseOutlineTool(provider);

    await tool.execute({ course_name: 'prompt' });

    expect(tool.getCitations()).toEqual([
      { title: 'Prompt Basics', url: 'https://example.com/prompts' },
    ]);
  });

  it('renders every course without a filter, joined by a blank line', async () => {
    const provider = createMockProvider({ courses: [UNLINKED, BARE] });
    const tool = new CourseOutlineTool(provider);

    const output = await tool.execute({});

    expect(output).toBe(
      '**Prompt Basics**\n' +
        'Instructor: Pat Example\n' +
        'Course Link: https://example.com/prompts\n' +
        '\n' +
        'Lessons (1 total):\n' +
        '  1. Zero-shot\n' +
        '\n\n' +
        '**Notes**\n' +
        'Instructor: Nobody\n' +
        '\n' +
        'Lessons (0 total):\n'
    );
    expect(tool.getCitations()).toEqual([
      { title: 'Prompt Basics', url: 'https://example.com/prompts' },
    ]);
    expect(provider.resolveCourseName).not.toHaveBeenCalled();
  });
});
