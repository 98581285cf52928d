/**
 * @fileoverview Submissions inventory and robustness check
 *
 * A problem's judge submissions live in `submissions/<category>/`, one file
 * or one directory per submission. The check looks for a spread of verdicts
 * and for accepted submissions in a slower language.
 */

import { readdir } from 'node:fs/promises';
import * as path from 'node:path';
import { issue, type Issue } from '../issues/issue_log.js';

export type SubmissionCategory = 'AC' | 'WA' | 'TLE' | 'RTE';

export interface Submission {
  name: string;
  language: string;
}

export type SubmissionsInventory = Record<SubmissionCategory, Submission[]>;

export const SUBMISSIONS_DIR = 'submissions';

export const CATEGORY_DIRECTORIES: Record<string, SubmissionCategory> = {
  accepted: 'AC',
  wrong_answer: 'WA',
  time_limit_exceeded: 'TLE',
  run_time_error: 'RTE',
};

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  '.c': 'C',
  '.cc': 'C++',
  '.cpp': 'C++',
  '.cxx': 'C++',
  '.c++': 'C++',
  '.cs': 'C#',
  '.go': 'Go',
  '.hs': 'Haskell',
  '.java': 'Java',
  '.js': 'JavaScript',
  '.kt': 'Kotlin',
  '.ml': 'OCaml',
  '.pas': 'Pascal',
  '.php': 'PHP',
  '.py': 'Python 3',
  '.rb': 'Ruby',
  '.rs': 'Rust',
  '.scala': 'Scala',
  '.ts': 'TypeScript',
};

/** C, C++ and friends count as fast languages. */
const FAST_LANGUAGE_RE = /^C(\+\+)?\b/;

export function emptyInventory(): SubmissionsInventory {
  return { AC: [], WA: [], TLE: [], RTE: [] };
}

export function languageForFile(fileName: string): string | undefined {
  return LANGUAGE_BY_EXTENSION[path.extname(fileName).toLowerCase()];
}

async function languageForEntry(entryPath: string, isDirectory: boolean): Promise<string | undefined> {
  if (!isDirectory) return languageForFile(entryPath);
  const files = (await readdir(entryPath)).sort();
  for (const file of files) {
    const language = languageForFile(file);
    if (language) return language;
  }
  return undefined;
}

export async function loadSubmissionsInventory(problemDir: string): Promise<SubmissionsInventory> {
  const inventory = emptyInventory();
  const root = path.join(problemDir, SUBMISSIONS_DIR);

  let categories: string[];
  try {
    categories = (await readdir(root)).sort();
  } catch {
    return inventory;
  }

  for (const directory of categories) {
    const category = CATEGORY_DIRECTORIES[directory];
    if (!category) continue;
    const entries = await readdir(path.join(root, directory), { withFileTypes: true });
    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const language = await languageForEntry(path.join(root, directory, entry.name), entry.isDirectory());
      if (language) {
        inventory[category].push({ name: entry.name, language });
      }
    }
  }
  return inventory;
}

export function checkSubmissions(problem: string, inventory: SubmissionsInventory): Issue[] {
  const issues: Issue[] = [];

  if (inventory.WA.length === 0) {
    issues.push(issue(problem, 'has no WA submissions'));
  }
  if (inventory.TLE.length === 0) {
    issues.push(issue(problem, 'has no TLE submissions'));
  }
  if (inventory.AC.length === 1) {
    issues.push(issue(problem, 'has only one AC submission'));
  }

  const acceptedLanguages = [...new Set(inventory.AC.map((submission) => submission.language))].sort();
  const hasSlow = acceptedLanguages.some((language) => !FAST_LANGUAGE_RE.test(language));
  if (!hasSlow) {
    issues.push(issue(
      problem,
      `there are no "slow" accepted submissions (only: ${acceptedLanguages.join(', ')})`,
    ));
  }

  return issues;
}
