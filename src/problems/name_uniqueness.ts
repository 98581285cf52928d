import { readFile } from 'node:fs/promises';
import { GENERAL_ISSUE_KEY, issue, type Issue } from '../issues/issue_log.js';
import { formatList } from '../statement/text_issue_detector.js';
import { logWarning } from '../telemetry/logger.js';

/**
 * Existing problem names from a cache file, one per line. Returns undefined
 * when no cache was given or it cannot be read.
 */
export async function loadExistingProblemNames(cacheFile: string | undefined): Promise<Set<string> | undefined> {
  if (!cacheFile) return undefined;
  try {
    const content = await readFile(cacheFile, 'utf8');
    return new Set(
      content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  } catch (error) {
    logWarning(`[names] cannot read problem name cache ${cacheFile}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export function checkProblemNameUniqueness(
  problems: readonly string[],
  existingNames: ReadonlySet<string> | undefined,
): Issue[] {
  if (!existingNames || existingNames.size === 0) {
    return [issue(GENERAL_ISSUE_KEY, 'could not check whether problem names are already used')];
  }

  const taken = [...new Set(problems.filter((problem) => existingNames.has(problem)))].sort();
  if (taken.length > 0) {
    return [issue(GENERAL_ISSUE_KEY, `some problems use names already in use: ${formatList(taken)}`)];
  }
  return [];
}
