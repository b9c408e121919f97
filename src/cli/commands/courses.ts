/**
 * Courses Command
 *
 * Catalog analytics for the loaded courses:
 *   crag courses         - Count and titles
 *   crag courses --json  - { totalCourses, courseTitles }
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openCourseStore } from '../runtime.js';
import type { CourseAnalytics } from '../../agent/index.js';

export function createCoursesCommand(getContext: () => CommandContext): Command {
  return new Command('courses')
    .description('Show the loaded courses')
    .action(() => {
      const ctx = getContext();
      const { store } = openCourseStore(ctx);

      const analytics: CourseAnalytics = {
        totalCourses: store.getCourseCount(),
        courseTitles: store.getExistingCourseTitles(),
      };

      if (ctx.options.json) {
        console.log(JSON.stringify(analytics, null, 2));
        return;
      }

      if (analytics.totalCourses === 0) {
        ctx.log(chalk.yellow('No courses loaded yet.'));
        ctx.log('');
        ctx.log(`Load course files with: ${chalk.cyan('crag load <path>')}`);
        return;
      }

      ctx.log(chalk.bold(`${analytics.totalCourses} course${analytics.totalCourses === 1 ? '' : 's'} loaded:`));
      for (const title of analytics.courseTitles) {
        ctx.log(`  - ${title}`);
      }
    });
}
