/**
 * CourseStore tests against a temporary SQLite database.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import type Database from 'better-sqlite3';

import { openDatabase, runMigrations, DatabaseOperations } from '../../database/index.js';
import { silentLogger } from '../../utils/index.js';
import { CourseStore } from '../course-store.js';
import type { CourseMetadata } from '../types.js';

const MCP: CourseMetadata = {
  title: 'MCP: Build Rich-Context AI Apps',
  instructor: 'Elie Example',
  courseLink: 'https://example.com/mcp',
  lessons: [
    { lessonNumber: 0, lessonTitle: 'Introduction', lessonLink: 'https://example.com/mcp/0' },
    { lessonNumber: 1, lessonTitle: 'Why MCP', lessonLink: 'https://example.com/mcp/1' },
    { lessonNumber: 2, lessonTitle: 'Architecture', lessonLink: null },
  ],
};

const RETRIEVAL: CourseMetadata = {
  title: 'Advanced Retrieval for AI',
  instructor: 'Rae Example',
  courseLink: null,
  lessons: [{ lessonNumber: 1, lessonTitle: 'Query Expansion' }],
};

describe('CourseStore', () => {
  let testDir: string;
  let db: Database.Database;
  let store: CourseStore;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'course-rag-store-'));
    db = openDatabase(join(testDir, 'test.db'));
    runMigrations(db);
    store = new CourseStore(new DatabaseOperations(db), { maxResults: 5 }, silentLogger);

    store.addCourse(MCP, [
      { lessonNumber: 0, chunkIndex: 0, content: 'Lesson 0 content: welcome to the protocol course' },
      { lessonNumber: 1, chunkIndex: 1, content: 'the protocol standardises tool access' },
      { lessonNumber: 2, chunkIndex: 2, content: 'clients and servers speak the protocol' },
    ]);
    store.addCourse(RETRIEVAL, [
      { lessonNumber: 1, chunkIndex: 0, content: 'query expansion rewrites the query' },
    ]);
  });

  afterEach(() => {
    db.close();
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('search', () => {
    it('returns documents with metadata and bm25 distances', async () => {
      const results = await store.search('expansion');

      expect(results.error).toBeNull();
      expect(results.documents).toEqual(['query expansion rewrites the query']);
      expect(results.metadata).toEqual([
        { courseTitle: 'Advanced Retrieval for AI', lessonNumber: 1, chunkIndex: 0 },
      ]);
      expect(results.distances).toHaveLength(1);
    });

    it('filters by a fuzzy course name and lesson', async () => {
      const results = await store.search('protocol', 'mcp', 2);

      expect(results.documents).toEqual(['clients and servers speak the protocol']);
      expect(results.metadata[0]?.courseTitle).toBe(MCP.title);
    });

    it('reports an unresolved course filter as an error', async () => {
      const results = await store.search('protocol', 'Quantum Basket Weaving');

      expect(results).toEqual({
        documents: [],
        metadata: [],
        distances: [],
        error: "No course found matching 'Quantum Basket Weaving'",
      });
    });

    it('ignores an empty course filter', async () => {
      const results = await store.search('protocol', '');
      expect(results.documents).toHaveLength(3);
    });

    it('returns empty results for a query without words', async () => {
      expect(await store.search('')).toEqual({
        documents: [],
        metadata: [],
        distances: [],
        error: null,
      });
    });

    it('caps results at maxResults', async () => {
      const small = new CourseStore(new DatabaseOperations(db), { maxResults: 2 }, silentLogger);
      expect((await small.search('protocol')).documents).toHaveLength(2);
    });

    it('turns database failures into a search error', async () => {
      const warn = vi.fn();
      const broken = new CourseStore(new DatabaseOperations(db), { maxResults: 5 }, { warn });
      db.exec('DROP TABLE chunks_fts');

      const results = await broken.search('protocol');

      expect(results.error).toMatch(/^Search error: /);
      expect(results.documents).toEqual([]);
      expect(warn).toHaveBeenCalledOnce();
    });
  });

  describe('when the database is unavailable', () => {
    it('degrades catalog reads and logs a warning for each', async () => {
      const warn = vi.fn();
      const broken = new CourseStore(new DatabaseOperations(db), { maxResults: 5 }, { warn });
      db.close();

      expect(await broken.getAllCourseMetadata()).toEqual([]);
      expect(await broken.resolveCourseName('MCP')).toBeNull();
      expect(await broken.getLessonLink(MCP.title, 1)).toBeNull();
      expect((await broken.search('protocol')).error).toBe(
        'Search error: The database connection is not open'
      );
      expect(warn.mock.calls.map(([message]) => message)).toEqual([
        'Course catalog read failed: The database connection is not open',
        'Course name lookup failed: The database connection is not open',
        'Lesson link lookup failed: The database connection is not open',
        'Course search failed: The database connection is not open',
      ]);
    });
  });

  describe('resolveCourseName', () => {
    it('matches a title ignoring case', async () => {
      expect(await store.resolveCourseName('advanced retrieval for ai')).toBe(RETRIEVAL.title);
    });

    it('prefers the shortest title containing the input', async () => {
      store.addCourse({ ...RETRIEVAL, title: 'Advanced Retrieval for AI, Part 2' }, []);
      expect(await store.resolveCourseName('retrieval')).toBe(RETRIEVAL.title);
    });

    it('falls back to a full-text match over titles', async () => {
      expect(await store.resolveCourseName('rich context apps')).toBe(MCP.title);
    });

    it('returns null for blank or unknown names', async () => {
      expect(await store.resolveCourseName('   ')).toBeNull();
      expect(await store.resolveCourseName('basket weaving')).toBeNull();
    });
  });

  describe('catalog', () => {
    it('returns course metadata in load order with lessons in catalog order', async () => {
      const courses = await store.getAllCourseMetadata();

      expect(courses.map((c) => c.title)).toEqual([MCP.title, RETRIEVAL.title]);
      expect(courses[0]?.lessons).toEqual(MCP.lessons);
      expect(courses[1]?.lessons).toEqual([
        { lessonNumber: 1, lessonTitle: 'Query Expansion', lessonLink: null },
      ]);
    });

    it('looks up lesson links', async () => {
      expect(await store.getLessonLink(MCP.title, 1)).toBe('https://example.com/mcp/1');
      expect(await store.getLessonLink(MCP.title, 2)).toBeNull();
      expect(await store.getLessonLink(MCP.title, 9)).toBeNull();
    });

    it('skips an existing title unless replacing', () => {
      expect(store.addCourse(MCP, [])).toBe('skipped');
      expect(store.addCourse(MCP, [], { replace: true })).toBe('replaced');
      expect(store.getCourseCount()).toBe(2);
    });

    it('drops chunks of a replaced course', async () => {
      store.addCourse(MCP, [], { replace: true });
      expect((await store.search('protocol')).documents).toEqual([]);
    });

    it('removes a course', () => {
      expect(store.removeCourse(RETRIEVAL.title)).toBe(true);
      expect(store.getExistingCourseTitles()).toEqual([MCP.title]);
    });
  });
});
