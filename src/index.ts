/**
 * course-rag - Library Entry Point
 *
 * The CLI (`crag`) covers everyday use:
 * ```bash
 * crag load ./courses            # Load course files
 * crag ask "What is MCP?"        # One answer with sources
 * crag chat                      # Multi-turn conversation
 * ```
 *
 * The same pieces are exported for embedding the assistant elsewhere.
 *
 * @example
 * ```typescript
 * import {
 *   CourseStore, DatabaseOperations, RAGSystem, createMessageClient,
 *   getDb, loadConfig, runMigrations,
 * } from 'course-rag';
 *
 * const config = loadConfig();
 * const db = getDb();
 * runMigrations(db);
 *
 * const store = new CourseStore(new DatabaseOperations(db), { maxResults: 5 });
 * const rag = new RAGSystem({
 *   client: createMessageClient(config),
 *   catalog: store,
 *   maxHistory: config.session.max_history,
 * });
 *
 * const { answer, citations } = await rag.query('What does lesson 1 cover?');
 * ```
 *
 * @packageDocumentation
 */

export type { GlobalOptions, CommandContext } from './cli/types.js';

export * from './agent/index.js';
export * from './search/index.js';
export * from './providers/index.js';
export * from './indexer/index.js';
export * from './errors/index.js';

export {
  getDb,
  closeDb,
  openDatabase,
  runMigrations,
  getAppliedMigrations,
  DatabaseOperations,
} from './database/index.js';
export type { Course, Lesson, Chunk, RankedChunk } from './database/index.js';

export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  getHomeDir,
  getDbPath,
  getConfigPath,
  DEFAULT_CONFIG,
  type Config,
} from './config/index.js';

export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
