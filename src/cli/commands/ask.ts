/**
 * Ask Command
 *
 * One question answered from the loaded courses, with sources:
 *
 *   crag ask "What does lesson 2 of the MCP course cover?"
 *   crag ask "Which courses are about retrieval?" --json
 *
 * Each run starts without history; follow-up questions belong in `chat`.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { createAgentRuntime } from '../runtime.js';
import {
  citationsToJSON,
  formatCitations,
  type AnswerResult,
  type CitationJSON,
} from '../../agent/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  sources: CitationJSON[];
}

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question about the course materials')
    .description('Ask a question about the loaded courses')
    .action(async (question: string) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError(
          'Question cannot be empty',
          'Provide a question, e.g.: crag ask "What is covered in lesson 1?"'
        );
      }
      ctx.debug(`Question: "${trimmedQuestion}"`);

      const { system } = createAgentRuntime(ctx);
      if (system.getCourseAnalytics().totalCourses === 0) {
        ctx.warn('No courses loaded. Run: crag load <path>  to add course files');
      }

      const spinner = ctx.options.json
        ? null
        : ora({ text: 'Thinking...', color: 'cyan' }).start();

      let result: AnswerResult;
      try {
        result = await system.query(trimmedQuestion);
      } finally {
        spinner?.stop();
      }

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: trimmedQuestion,
          answer: result.answer,
          sources: citationsToJSON(result.citations),
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(result.answer);
      if (result.citations.length > 0) {
        ctx.log('');
        ctx.log(chalk.bold('Sources:'));
        ctx.log(formatCitations(result.citations));
      }
    });
}
