/**
 * Shared fixtures for command tests: a recording CommandContext and a
 * course store over a temporary SQLite file.
 */

import { vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandContext, GlobalOptions } from '../../types.js';
import { DatabaseOperations, openDatabase, runMigrations } from '../../../database/index.js';
import { CourseStore, type CourseMetadata } from '../../../search/index.js';
import { DEFAULT_CONFIG } from '../../../config/index.js';
import { silentLogger } from '../../../utils/index.js';
import type { StoreRuntime } from '../../runtime.js';

const ANSI = /\u001b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI, '');
}

export function createTestContext(options: Partial<GlobalOptions> = {}) {
  const logs: string[] = [];
  const ctx = {
    options: { verbose: false, json: false, ...options },
    log: (message: string) => {
      logs.push(stripAnsi(message));
    },
    debug: vi.fn<CommandContext['debug']>(),
    warn: vi.fn<CommandContext['warn']>(),
    error: vi.fn<CommandContext['error']>(),
  } satisfies CommandContext;
  return { ctx, logs };
}

export interface TempStore extends StoreRuntime {
  dir: string;
  cleanup: () => void;
}

export function createTempStore(): TempStore {
  const dir = mkdtempSync(join(tmpdir(), 'crag-cli-'));
  const db = openDatabase(join(dir, 'courses.db'));
  runMigrations(db);
  const store = new CourseStore(new DatabaseOperations(db), { maxResults: 5 }, silentLogger);
  return {
    dir,
    config: DEFAULT_CONFIG,
    store,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function course(title: string, lessonCount = 1): CourseMetadata {
  return {
    title,
    instructor: 'Test Instructor',
    courseLink: `https://example.com/${encodeURIComponent(title)}`,
    lessons: Array.from({ length: lessonCount }, (_, i) => ({
      lessonNumber: i,
      lessonTitle: `Lesson ${i}`,
      lessonLink: `https://example.com/${encodeURIComponent(title)}/${i}`,
    })),
  };
}
