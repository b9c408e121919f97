/**
 * Chat Command
 *
 * Multi-turn REPL over one session. Each question is answered with the
 * session's recent history, so follow-ups like "and lesson 3?" work.
 *
 *   crag chat
 *   > What is the MCP course about?
 *   > /courses
 *   > /clear
 *   > exit
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as readline from 'node:readline';
import type { CommandContext } from '../types.js';
import { createAgentRuntime } from '../runtime.js';
import { formatCitations, type RAGSystem } from '../../agent/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * State shared by the REPL loop and its commands.
 */
export interface ChatState {
  system: RAGSystem;
  sessionId: string;
}

/**
 * REPL command definition.
 * Handler returns true to continue REPL, false to exit.
 */
export interface REPLCommand {
  name: string;
  aliases: string[];
  description: string;
  handler: (state: ChatState, ctx: CommandContext) => Promise<boolean>;
}

/**
 * Commands start with "/" except for exit/quit.
 */
export const REPL_COMMANDS: REPLCommand[] = [
  {
    name: 'help',
    aliases: ['h', '?'],
    description: 'Show available commands',
    handler: async (_state, ctx) => {
      ctx.log('');
      ctx.log(chalk.bold('Available Commands:'));
      for (const cmd of REPL_COMMANDS) {
        const aliasStr =
          cmd.aliases.length > 0
            ? chalk.dim(` (${cmd.aliases.map((a) => '/' + a).join(', ')})`)
            : '';
        ctx.log(`  ${chalk.green('/' + cmd.name)}${aliasStr}  ${chalk.dim(cmd.description)}`);
      }
      ctx.log('');
      ctx.log(chalk.dim('Type any other text to ask a question.'));
      return true;
    },
  },
  {
    name: 'clear',
    aliases: ['c'],
    description: 'Forget the conversation so far',
    handler: async (state, ctx) => {
      state.system.sessions.clearSession(state.sessionId);
      ctx.log(chalk.dim('Conversation cleared.'));
      return true;
    },
  },
  {
    name: 'courses',
    aliases: [],
    description: 'List the loaded courses',
    handler: async (state, ctx) => {
      const { totalCourses, courseTitles } = state.system.getCourseAnalytics();
      ctx.log(chalk.bold(`Courses (${totalCourses}):`));
      for (const title of courseTitles) {
        ctx.log(`  - ${title}`);
      }
      return true;
    },
  },
  {
    name: 'exit',
    aliases: ['quit', 'q'],
    description: 'Leave the chat',
    handler: async (_state, ctx) => {
      ctx.log(chalk.dim('Goodbye!'));
      return false;
    },
  },
];

/**
 * Detect a REPL command in user input. Returns null for a regular question,
 * including unknown "/words".
 */
export function parseREPLCommand(input: string): REPLCommand | null {
  const trimmed = input.trim();

  if (/^(exit|quit)$/i.test(trimmed)) {
    return REPL_COMMANDS.find((c) => c.name === 'exit') ?? null;
  }

  if (!trimmed.startsWith('/')) {
    return null;
  }

  const cmdName = trimmed.slice(1).split(/\s+/)[0]?.toLowerCase() ?? '';
  return REPL_COMMANDS.find((c) => c.name === cmdName || c.aliases.includes(cmdName)) ?? null;
}

/**
 * Answer one question within the chat session and print it with sources.
 */
export async function handleQuestion(
  question: string,
  state: ChatState,
  ctx: CommandContext
): Promise<void> {
  const spinner = ora({ text: 'Thinking...', color: 'cyan' }).start();

  let answer: string;
  let sources: string;
  try {
    const result = await state.system.query(question, state.sessionId);
    answer = result.answer;
    sources = formatCitations(result.citations);
  } finally {
    spinner.stop();
  }

  ctx.log('');
  ctx.log(answer);
  if (sources) {
    ctx.log('');
    ctx.log(chalk.dim(sources));
  }
  ctx.log('');
}

function reportError(error: unknown, ctx: CommandContext): void {
  if (error instanceof CLIError) {
    ctx.error(error.message);
    if (error.hint) {
      ctx.log(chalk.dim(error.hint));
    }
  } else {
    ctx.error(`Failed to answer: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Event-based readline loop. A failed question is reported and the
 * session continues.
 */
function runChatREPL(state: ChatState, ctx: CommandContext): Promise<void> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.cyan('> '),
    });

    // Serialize lines so a question typed while one is running waits its turn
    let queue = Promise.resolve();

    rl.on('line', (line) => {
      queue = queue.then(async () => {
        const input = line.trim();
        if (!input) {
          rl.prompt();
          return;
        }

        const command = parseREPLCommand(input);
        try {
          if (command) {
            if (!(await command.handler(state, ctx))) {
              rl.close();
              return;
            }
          } else {
            await handleQuestion(input, state, ctx);
          }
        } catch (error) {
          reportError(error, ctx);
        }
        rl.prompt();
      });
    });

    rl.on('SIGINT', () => {
      ctx.log('');
      ctx.log(chalk.dim('Goodbye!'));
      rl.close();
    });

    rl.on('close', () => resolve());

    ctx.log(chalk.bold('Course assistant'));
    ctx.log(chalk.dim('Ask about the loaded courses. Type /help for commands, exit to quit.'));
    ctx.log('');
    rl.prompt();
  });
}

export function createChatCommand(getContext: () => CommandContext): Command {
  return new Command('chat')
    .description('Interactive multi-turn chat about the loaded courses')
    .action(async () => {
      const ctx = getContext();

      if (ctx.options.json) {
        throw new CLIError('chat does not support --json', 'Use: crag ask "<question>" --json');
      }

      const { system } = createAgentRuntime(ctx);
      const state: ChatState = { system, sessionId: system.sessions.createSession() };
      ctx.debug(`Session: ${state.sessionId}`);

      if (system.getCourseAnalytics().totalCourses === 0) {
        ctx.warn('No courses loaded. Run: crag load <path>  to add course files');
      }

      await runChatREPL(state, ctx);
    });
}
