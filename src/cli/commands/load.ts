/**
 * Load Command
 *
 * Adds course files to the store:
 *   crag load ./courses/mcp.json      Load one file
 *   crag load ./courses               Load every .json file in a directory
 *   crag load ./courses --replace     Reload titles that are already stored
 *   crag load ./courses --json        Output progress as NDJSON
 */

import { Command } from 'commander';
import { relative, resolve } from 'node:path';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openCourseStore } from '../runtime.js';
import { loadCourses, type CourseLoadEvent } from '../../indexer/index.js';

interface LoadCommandOptions {
  replace?: boolean;
}

function describeEvent(event: CourseLoadEvent): string {
  const file = relative(process.cwd(), event.path) || event.path;
  switch (event.type) {
    case 'added':
      return `${chalk.green('✓')} ${event.title} ${chalk.dim(`(${event.chunks} chunks, ${file})`)}`;
    case 'replaced':
      return `${chalk.cyan('↻')} ${event.title} ${chalk.dim(`(${event.chunks} chunks, replaced, ${file})`)}`;
    case 'skipped':
      return `${chalk.dim('-')} ${event.title} ${chalk.dim('(already loaded)')}`;
    case 'failed':
      return `${chalk.red('✗')} ${file}: ${event.error}`;
  }
}

export function createLoadCommand(getContext: () => CommandContext): Command {
  return new Command('load')
    .argument('<path>', 'Course JSON file or a directory of them')
    .description('Load course files into the course store')
    .option('--replace', 'Reload courses whose title is already stored', false)
    .action(async (path: string, cmdOptions: LoadCommandOptions) => {
      const ctx = getContext();
      const target = resolve(path);
      const { config, store } = openCourseStore(ctx);

      ctx.debug(`Loading from ${target}`);
      ctx.debug(
        `Chunking: size=${config.chunking.chunk_size} overlap=${config.chunking.chunk_overlap}`
      );

      const result = await loadCourses(store, target, {
        chunking: {
          chunkSize: config.chunking.chunk_size,
          chunkOverlap: config.chunking.chunk_overlap,
        },
        replace: cmdOptions.replace,
        onCourse: (event) => {
          if (ctx.options.json) {
            console.log(JSON.stringify(event));
          } else {
            ctx.log(describeEvent(event));
          }
        },
      });

      if (ctx.options.json) {
        console.log(
          JSON.stringify({
            type: 'complete',
            added: result.added.length,
            replaced: result.replaced.length,
            skipped: result.skipped.length,
            failed: result.failed.length,
            totalChunks: result.totalChunks,
          })
        );
      } else {
        const loaded = result.added.length + result.replaced.length;
        ctx.log('');
        ctx.log(
          `Loaded ${loaded} course${loaded === 1 ? '' : 's'} (${result.totalChunks} chunks), ` +
            `${result.skipped.length} skipped, ${result.failed.length} failed`
        );
        if (result.skipped.length > 0 && !cmdOptions.replace) {
          ctx.log(chalk.dim('Use --replace to reload courses that are already stored.'));
        }
      }

      if (result.failed.length > 0) {
        process.exitCode = 1;
      }
    });
}
