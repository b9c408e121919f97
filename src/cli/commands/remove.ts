/**
 * Remove Command
 *
 * Deletes a course with its lessons and transcript chunks:
 *   crag remove "<title>"          - Shows what would be deleted
 *   crag remove "<title>" --force  - Deletes it
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openCourseStore } from '../runtime.js';
import { CLIError } from '../../errors/index.js';

interface RemoveOptions {
  force?: boolean;
}

export function createRemoveCommand(getContext: () => CommandContext): Command {
  return new Command('remove')
    .alias('rm')
    .argument('<title>', 'Course title (or a part of it)')
    .description('Remove a course and its transcript chunks')
    .option('-f, --force', 'Skip confirmation prompt')
    .action(async (title: string, options: RemoveOptions) => {
      const ctx = getContext();
      const { store } = openCourseStore(ctx);

      const resolved = await store.resolveCourseName(title);
      if (resolved === null) {
        throw new CLIError(
          `Course not found: ${title}`,
          'Run: crag courses  to see loaded courses'
        );
      }
      ctx.debug(`Resolved "${title}" to "${resolved}"`);

      if (!options.force && !ctx.options.json) {
        ctx.log(chalk.yellow(`This will permanently delete "${resolved}" and its transcript chunks.`));
        ctx.log('');
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm deletion.`);
        process.exitCode = 1;
        return;
      }

      const removed = store.removeCourse(resolved);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: removed, title: resolved }));
      } else {
        ctx.log(`${chalk.green('✓')} Removed course "${chalk.cyan(resolved)}"`);
      }
    });
}
