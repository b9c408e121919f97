/**
 * Centralized Path Definitions
 *
 * All modules resolve storage paths through here.
 *
 * Directory structure:
 * ~/.course-rag/          (or $COURSE_RAG_HOME)
 * ├── courses.db          (SQLite course store, or $COURSE_RAG_DB)
 * └── config.toml         (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the course-rag home directory.
 * Resolved on every call so tests can point it at a temp directory.
 */
export function getHomeDir(): string {
  return getEnv('COURSE_RAG_HOME') ?? join(homedir(), '.course-rag');
}

/**
 * Get the SQLite database path.
 */
export function getDbPath(): string {
  return getEnv('COURSE_RAG_DB') ?? join(getHomeDir(), 'courses.db');
}

/**
 * Get the TOML config file path.
 */
export function getConfigPath(): string {
  return join(getHomeDir(), 'config.toml');
}
