/**
 * RAG System
 *
 * Wires the course catalog, the two course tools, the generation loop and
 * session history together to answer questions.
 */

import type { MessageClient } from '../providers/types.js';
import type { CourseCatalog } from '../search/types.js';
import { type Logger, consoleLogger } from '../utils/index.js';
import { GenerationLoop } from './generation-loop.js';
import { SessionManager } from './session.js';
import { CourseOutlineTool, CourseSearchTool, ToolRegistry } from './tools/index.js';
import type { SourceCitation } from './tools/types.js';

export interface AnswerResult {
  answer: string;
  /** Sources behind the answer; empty when no tool produced any */
  citations: SourceCitation[];
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export interface RAGSystemOptions {
  client: MessageClient;
  catalog: CourseCatalog;
  /** Exchanges remembered per session (config: session.max_history) */
  maxHistory: number;
  logger?: Logger;
}

/**
 * Run one query through the loop and take the citations it produced.
 *
 * Citations are cleared afterwards, and also when the model request fails,
 * so nothing carries over to the next query.
 */
export async function answerQuery(
  loop: GenerationLoop,
  registry: ToolRegistry,
  query: string,
  history?: string | null
): Promise<AnswerResult> {
  let answer: string;
  try {
    answer = await loop.generate({
      query,
      history,
      tools: registry.listDefinitions(),
      registry,
    });
  } catch (error) {
    registry.clearCitations();
    throw error;
  }

  const citations = registry.collectCitations();
  registry.clearCitations();
  return { answer, citations };
}

/**
 * Frame a user question for the model.
 */
export function buildPrompt(query: string): string {
  return `Answer this question about course materials: ${query}`;
}

export class RAGSystem {
  readonly registry: ToolRegistry;
  readonly sessions: SessionManager;
  private readonly loop: GenerationLoop;
  private readonly catalog: CourseCatalog;

  constructor(options: RAGSystemOptions) {
    const logger = options.logger ?? consoleLogger;

    this.catalog = options.catalog;
    this.loop = new GenerationLoop(options.client, logger);
    this.sessions = new SessionManager(options.maxHistory);

    this.registry = new ToolRegistry();
    this.registry.register(new CourseSearchTool(options.catalog));
    this.registry.register(new CourseOutlineTool(options.catalog));
  }

  /**
   * Answer a question, using and extending the session's history when a
   * session id is given. The stored history holds the question as asked.
   */
  async query(query: string, sessionId?: string): Promise<AnswerResult> {
    const history = this.sessions.getConversationHistory(sessionId);
    const result = await answerQuery(this.loop, this.registry, buildPrompt(query), history);

    if (sessionId !== undefined) {
      this.sessions.addExchange(sessionId, query, result.answer);
    }

    return result;
  }

  getCourseAnalytics(): CourseAnalytics {
    return {
      totalCourses: this.catalog.getCourseCount(),
      courseTitles: this.catalog.getExistingCourseTitles(),
    };
  }
}
