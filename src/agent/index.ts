/**
 * Agent Module
 *
 * Answers course questions with a tool-using model:
 * 1. The model sees the question plus the course tool definitions
 * 2. Requested tools run against the course store
 * 3. A second request turns the tool output into the final answer
 *
 * @example
 * ```typescript
 * import { RAGSystem } from './agent/index.js';
 *
 * const rag = new RAGSystem({ client, catalog: store, maxHistory: 2 });
 * const session = rag.sessions.createSession();
 * const { answer, citations } = await rag.query('What does lesson 2 of the MCP course cover?', session);
 * ```
 *
 * @packageDocumentation
 */

export {
  GenerationLoop,
  SYSTEM_PROMPT,
  buildSystemPrompt,
  firstText,
  type GenerationInput,
  type GenerationState,
} from './generation-loop.js';

export {
  RAGSystem,
  answerQuery,
  buildPrompt,
  type AnswerResult,
  type CourseAnalytics,
  type RAGSystemOptions,
} from './rag-system.js';

export { SessionManager, type ConversationTurn } from './session.js';

export {
  formatCitations,
  citationsToJSON,
  dedupeCitations,
  type CitationJSON,
} from './citations.js';

export * from './tools/index.js';
