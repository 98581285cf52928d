import * as path from 'node:path';
import { glob } from 'glob';
import { PROBLEM_CONFIG_FILE } from '../metadata/problem_metadata.js';

/**
 * Names of the immediate subdirectories of `root` that are problem packages
 * (contain problem.yaml), sorted. Symlinked directories are followed.
 */
export async function findProblemDirectories(root: string): Promise<string[]> {
  const configs = await glob(`*/${PROBLEM_CONFIG_FILE}`, {
    cwd: root,
    follow: true,
    nodir: true,
    posix: true,
  });
  return configs.map((config) => path.posix.dirname(config)).sort();
}
