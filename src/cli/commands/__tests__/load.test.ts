/**
 * Tests for load command
 *
 * Tests cover:
 * - Loading a directory of course files
 * - Skipping and replacing titles that are already stored
 * - Invalid files reported without stopping the run
 * - NDJSON output
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLoadCommand } from '../load.js';
import * as runtime from '../../runtime.js';
import { FileNotFoundError } from '../../../errors/index.js';
import { createTempStore, createTestContext, type TempStore } from './helpers.js';

vi.mock('../../runtime.js', () => ({
  openCourseStore: vi.fn(),
  createAgentRuntime: vi.fn(),
}));

const PROMPT_COURSE = {
  title: 'Prompt Compression',
  instructor: 'A. Tester',
  courseLink: 'https://example.com/prompt-compression',
  lessons: [
    {
      lessonNumber: 0,
      lessonTitle: 'Introduction',
      lessonLink: 'https://example.com/prompt-compression/0',
      content: 'Shorter prompts cost less. They also answer faster.',
    },
    {
      lessonNumber: 1,
      lessonTitle: 'Keeping the facts',
      content: 'Compression must keep the key facts.',
    },
  ],
};

describe('createLoadCommand', () => {
  let temp: TempStore;
  let coursesDir: string;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    temp = createTempStore();
    coursesDir = mkdtempSync(join(tmpdir(), 'crag-courses-'));
    writeFileSync(join(coursesDir, 'prompt.json'), JSON.stringify(PROMPT_COURSE));
    vi.mocked(runtime.openCourseStore).mockReturnValue(temp);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    temp.cleanup();
    rmSync(coursesDir, { recursive: true, force: true });
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  function jsonLines(): unknown[] {
    return consoleLogSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
  }

  it('loads every course file in a directory', async () => {
    const { ctx, logs } = createTestContext();

    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir]);

    expect(logs.slice(-2)).toEqual(['', 'Loaded 1 course (2 chunks), 0 skipped, 0 failed']);
    expect(temp.store.getExistingCourseTitles()).toEqual(['Prompt Compression']);
    expect(process.exitCode).toBeUndefined();
  });

  it('skips stored titles unless --replace is given', async () => {
    const { ctx, logs } = createTestContext();
    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir]);

    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir]);
    expect(logs.slice(-3)).toEqual([
      '',
      'Loaded 0 courses (0 chunks), 1 skipped, 0 failed',
      'Use --replace to reload courses that are already stored.',
    ]);

    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir, '--replace']);
    expect(logs.slice(-2)).toEqual(['', 'Loaded 1 course (2 chunks), 0 skipped, 0 failed']);
    expect(temp.store.getCourseCount()).toBe(1);
  });

  it('reports invalid files and sets a failing exit code', async () => {
    writeFileSync(join(coursesDir, 'broken.json'), '{ "title": ');
    const { ctx, logs } = createTestContext();

    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir]);

    expect(logs.slice(-1)).toEqual(['Loaded 1 course (2 chunks), 0 skipped, 1 failed']);
    expect(process.exitCode).toBe(1);
  });

  it('emits NDJSON events and a summary', async () => {
    const { ctx, logs } = createTestContext({ json: true });

    await createLoadCommand(() => ctx).parseAsync(['node', 'load', coursesDir]);

    expect(logs).toEqual([]);
    expect(jsonLines()).toEqual([
      {
        type: 'added',
        path: join(coursesDir, 'prompt.json'),
        title: 'Prompt Compression',
        chunks: 2,
      },
      { type: 'complete', added: 1, replaced: 0, skipped: 0, failed: 0, totalChunks: 2 },
    ]);
  });

  it('rejects a missing path', async () => {
    const { ctx } = createTestContext();

    await expect(
      createLoadCommand(() => ctx).parseAsync(['node', 'load', join(coursesDir, 'missing')])
    ).rejects.toThrow(FileNotFoundError);
  });
});
