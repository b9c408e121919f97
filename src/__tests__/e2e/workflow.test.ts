/**
 * E2E Workflow Tests
 *
 * The complete journey: load the example course files → search → answer
 * with citations → follow-up within a session.
 *
 * Mocking Strategy:
 * - LLM: scripted MessageClient (deterministic)
 * - Database: real SQLite in a temp directory
 * - Course files: the examples shipped in courses/
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, type Mock } from 'vitest';
import type Database from 'better-sqlite3';
import { DatabaseOperations, openDatabase, runMigrations } from '../../database/index.js';
import { CourseStore } from '../../search/index.js';
import { loadCourses } from '../../indexer/index.js';
import { RAGSystem } from '../../agent/index.js';
import type { MessageClient, MessageResponse } from '../../providers/index.js';
import { silentLogger } from '../../utils/index.js';

const COURSES_DIR = fileURLToPath(new URL('../../../courses', import.meta.url));

function toolCall(id: string, name: string, input: Record<string, unknown>): MessageResponse {
  return { content: [{ type: 'tool_use', id, name, input }], stopReason: 'tool_use' };
}

function text(value: string): MessageResponse {
  return { content: [{ type: 'text', text: value }], stopReason: 'end_turn' };
}

describe('E2E: load → ask', () => {
  let dir: string;
  let db: Database.Database;
  let store: CourseStore;

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), 'course-rag-e2e-'));
    db = openDatabase(join(dir, 'courses.db'));
    runMigrations(db);
    store = new CourseStore(new DatabaseOperations(db), { maxResults: 5 }, silentLogger);

    const result = await loadCourses(store, COURSES_DIR, {
      chunking: { chunkSize: 800, chunkOverlap: 100 },
    });
    expect(result.failed).toEqual([]);
  });

  afterAll(() => {
    db.close();
    rmSync(dir, { recursive: true, force: true });
  });

  let createMessage: Mock<MessageClient['createMessage']>;
  let system: RAGSystem;

  beforeEach(() => {
    createMessage = vi.fn<MessageClient['createMessage']>();
    system = new RAGSystem({
      client: { createMessage },
      catalog: store,
      maxHistory: 2,
      logger: silentLogger,
    });
  });

  it('loads both example courses in file order', () => {
    expect(system.getCourseAnalytics()).toEqual({
      totalCourses: 2,
      courseTitles: ['Prompt Compression and Query Optimization', 'Tool Use with Language Models'],
    });
    expect(db.prepare('SELECT COUNT(*) AS n FROM chunks').get()).toEqual({ n: 5 });
  });

  it('answers an outline question with lesson citations', async () => {
    createMessage
      .mockResolvedValueOnce(toolCall('toolu_outline', 'get_course_outline', { course_name: 'tool use' }))
      .mockResolvedValueOnce(text('The course has two lessons.'));

    const result = await system.query('What lessons are in the tool use course?');

    expect(result).toEqual({
      answer: 'The course has two lessons.',
      citations: [
        {
          title: 'Tool Use with Language Models - Lesson 1',
          url: 'https://courses.example.com/tool-use/lesson-1',
        },
        {
          title: 'Tool Use with Language Models - Lesson 2',
          url: 'https://courses.example.com/tool-use/lesson-2',
        },
      ],
    });

    const followUp = createMessage.mock.calls[1][0];
    expect(followUp.messages[2]).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          toolUseId: 'toolu_outline',
          content:
            '**Tool Use with Language Models**\n' +
            'Instructor: Sam Placeholder\n' +
            'Course Link: https://courses.example.com/tool-use\n' +
            '\n' +
            'Lessons (2 total):\n' +
            '  1. What Is a Tool\n' +
            '  2. The Tool Use Loop\n',
        },
      ],
    });
  });

  it('searches one lesson of a partially named course', async () => {
    createMessage
      .mockResolvedValueOnce(
        toolCall('toolu_search', 'search_course_content', {
          query: 'summaries of passages',
          course_name: 'compression',
          lesson_number: 2,
        })
      )
      .mockResolvedValueOnce(text('Summarize each passage separately.'));

    const result = await system.query('How should retrieved context be summarized?');

    expect(result.citations).toEqual([
      {
        title: 'Prompt Compression and Query Optimization - Lesson 2',
        url: 'https://courses.example.com/prompt-compression/lesson-2',
      },
    ]);
    const toolResult = createMessage.mock.calls[1][0].messages[2].content;
    expect(toolResult).toEqual([
      {
        type: 'tool_result',
        toolUseId: 'toolu_search',
        content:
          '[Prompt Compression and Query Optimization - Lesson 2]\n' +
          'Lesson 2 content: Summaries of retrieved passages keep the key facts and drop repetition. ' +
          'Summarize each passage on its own so that citations still point at a single source.',
      },
    ]);
  });

  it('carries history into the next question of a session', async () => {
    createMessage
      .mockResolvedValueOnce(text('Tools are functions the model can request.'))
      .mockResolvedValueOnce(text('The application runs them.'));
    const sessionId = system.sessions.createSession();

    await system.query('What is a tool?', sessionId);
    const second = await system.query('Who runs it?', sessionId);

    expect(second).toEqual({ answer: 'The application runs them.', citations: [] });
    expect(createMessage.mock.calls[1][0].system).toMatch(
      /Previous conversation:\nUser: What is a tool\?\nAssistant: Tools are functions the model can request\.$/
    );
  });
});
