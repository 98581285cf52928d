/**
 * @fileoverview problem.yaml loading and title checks
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { issue, type Issue } from '../issues/issue_log.js';
import { isMapping, MetadataNodeSchema, type MetadataNode } from './metadata_node.js';

export const PROBLEM_CONFIG_FILE = 'problem.yaml';

/**
 * Parsed problem.yaml of a problem directory; null when the file is empty.
 * Throws when the file is unreadable or not valid YAML.
 */
export async function readDeclaredMetadata(problemDir: string): Promise<MetadataNode> {
  const content = await readFile(path.join(problemDir, PROBLEM_CONFIG_FILE), 'utf8');
  return MetadataNodeSchema.parse(parseYaml(content) ?? null);
}

/**
 * Title of the problem: the declared `name` (preferring English when it is
 * given per language), falling back to the statement's `\problemname`.
 */
export function resolveProblemTitle(
  declared: MetadataNode,
  statementTitles: ReadonlyMap<string, string> = new Map(),
): string | undefined {
  const name = isMapping(declared) ? declared.name : undefined;
  if (typeof name === 'string' && name.trim().length > 0) {
    return name;
  }
  if (isMapping(name)) {
    const preferred = name.en ?? Object.values(name)[0];
    if (typeof preferred === 'string') return preferred;
  }
  return statementTitles.get('en') ?? statementTitles.values().next().value;
}

export function shortTitle(title: string): string {
  return title.replace(/[^a-zA-Z0-9]/g, '').toLowerCase();
}

export function checkProblemNameTitle(problem: string, title: string | undefined): Issue[] {
  if (title === undefined) {
    return [issue(problem, 'could not determine the problem title')];
  }
  if (problem !== shortTitle(title)) {
    return [issue(problem, `use matching directory name and title: ${problem} "${title}"`)];
  }
  return [];
}
