#!/usr/bin/env node
/**
 * course-rag CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands
 * of the `crag` command.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createCoursesCommand } from './commands/courses.js';
import { createLoadCommand } from './commands/load.js';
import { createRemoveCommand } from './commands/remove.js';
import { handleError, createGlobalErrorHandler, CLIError, APIKeyError } from '../errors/index.js';
import { validateAnthropicKey } from '../providers/index.js';

const VERSION = '1.0.0';

/** Commands that send requests to the model */
const MODEL_COMMANDS = new Set(['ask', 'chat']);

const program = new Command();

program
  .name('crag')
  .description('Question answering over course transcripts, grounded in search tools')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('crag load ./courses')}                   Load every course file in a directory
  ${chalk.cyan('crag courses')}                          List loaded courses
  ${chalk.cyan('crag ask "What is lesson 2 about?"')}    Ask one question
  ${chalk.cyan('crag chat')}                             Start a conversation
  ${chalk.cyan('crag config set search.max_results 8')}  Change a setting
`);

/**
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createLoadCommand(getContext));
program.addCommand(createCoursesCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createChatCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: crag --help  to see available commands');
});

// Fail before any work when a model command has no usable key
program.hook('preAction', (_thisCommand, actionCommand) => {
  if (!MODEL_COMMANDS.has(actionCommand.name())) {
    return;
  }

  const result = validateAnthropicKey();
  if (!result.valid) {
    throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY', result.error);
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
