/**
 * Command Runtime
 *
 * Builds the objects commands share: config, the migrated course store
 * and, for commands that talk to the model, the RAG system.
 */

import { loadConfig, type Config } from '../config/index.js';
import { DatabaseOperations, getDb, runMigrations } from '../database/index.js';
import { DatabaseError } from '../errors/index.js';
import { RAGSystem } from '../agent/index.js';
import { createMessageClient } from '../providers/index.js';
import { CourseStore } from '../search/index.js';
import type { Logger } from '../utils/index.js';

export interface StoreRuntime {
  config: Config;
  store: CourseStore;
}

export interface AgentRuntime extends StoreRuntime {
  system: RAGSystem;
}

/**
 * Load config, open the database and apply pending migrations.
 *
 * @throws DatabaseError when a migration fails
 */
export function openCourseStore(logger: Logger): StoreRuntime {
  const config = loadConfig();
  const db = getDb();

  const migrations = runMigrations(db);
  const failure = migrations.failed[0];
  if (failure !== undefined) {
    throw new DatabaseError(`Migration ${failure.name} failed: ${failure.error}`);
  }
  if (migrations.applied.length > 0) {
    logger.debug?.(`Applied migrations: ${migrations.applied.join(', ')}`);
  }

  const store = new CourseStore(
    new DatabaseOperations(db),
    { maxResults: config.search.max_results },
    logger
  );
  return { config, store };
}

/**
 * Everything `ask` and `chat` need.
 *
 * @throws APIKeyError when ANTHROPIC_API_KEY is missing or malformed
 */
export function createAgentRuntime(logger: Logger): AgentRuntime {
  const { config, store } = openCourseStore(logger);
  const system = new RAGSystem({
    client: createMessageClient(config),
    catalog: store,
    maxHistory: config.session.max_history,
    logger,
  });
  return { config, store, system };
}
