/**
 * Shared fakes for tool tests.
 */

import { vi } from 'vitest';
import type { CourseMetadata, SearchProvider, SearchResults } from '../../../search/index.js';
import { emptySearchResults } from '../../../search/index.js';

export function createMockProvider(
  overrides: Partial<{
    results: SearchResults;
    courses: CourseMetadata[];
    resolved: string | null;
    lessonLink: string | null;
  }> = {}
) {
  return {
    search: vi.fn<SearchProvider['search']>().mockResolvedValue(
      overrides.results ?? emptySearchResults()
    ),
    resolveCourseName: vi
      .fn<SearchProvider['resolveCourseName']>()
      .mockResolvedValue(overrides.resolved ?? null),
    getAllCourseMetadata: vi
      .fn<SearchProvider['getAllCourseMetadata']>()
      .mockResolvedValue(overrides.courses ?? []),
    getLessonLink: vi
      .fn<SearchProvider['getLessonLink']>()
      .mockResolvedValue(overrides.lessonLink ?? null),
  } satisfies SearchProvider;
}
