/**
 * Course File Scanner
 *
 * Finds course JSON files using fast-glob. A file path is returned as is;
 * a directory yields its top-level *.json files in name order.
 */

import { statSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import fg from 'fast-glob';
import { FileNotFoundError } from '../errors/index.js';

/**
 * @throws FileNotFoundError when the path does not exist
 */
export async function findCourseFiles(path: string): Promise<string[]> {
  const absolutePath = resolve(path);
  if (!existsSync(absolutePath)) {
    throw new FileNotFoundError(absolutePath);
  }

  if (statSync(absolutePath).isFile()) {
    return [absolutePath];
  }

  const entries = await fg('*.json', {
    cwd: absolutePath,
    absolute: true,
    onlyFiles: true,
    dot: false,
  });

  return entries.sort();
}
