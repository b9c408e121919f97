/**
 * Config Command
 *
 * Reads and edits ~/.course-rag/config.toml:
 *   crag config list                - All values, flattened to dot keys
 *   crag config get <key>           - One value
 *   crag config set <key> <value>   - Validate and write one value
 *   crag config path                - Location of the file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import {
  getConfigPath,
  getConfigValue,
  listConfig,
  setConfigValue,
} from '../../config/index.js';
import type { CommandContext } from '../types.js';

/**
 * Render a config value the way it would be typed on the command line.
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig();

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      let currentGroup: string | undefined;
      for (const [key, value] of entries) {
        const group = key.includes('.') ? key.slice(0, key.indexOf('.')) : '';
        if (group !== currentGroup) {
          ctx.log('');
          currentGroup = group;
        }
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
    });

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., crag config get llm.max_tokens)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(key);

      if (value === undefined) {
        ctx.error(`Unknown config key: ${key}`);
        ctx.log(`Run ${chalk.cyan('crag config list')} to see all available keys.`);
        process.exitCode = 1;
        return;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., crag config set search.max_results 8)')
    .action((key: string, value: string) => {
      const ctx = getContext();
      setConfigValue(key, value);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, key, value: getConfigValue(key) }));
      } else {
        ctx.log(`${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(value)}`);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: configPath }));
      } else {
        ctx.log(configPath);
      }
    });

  return configCmd;
}
