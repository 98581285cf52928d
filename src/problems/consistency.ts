import { GENERAL_ISSUE_KEY, issue, type Issue } from '../issues/issue_log.js';
import type { MetadataMapping } from '../metadata/metadata_node.js';

/** Fields that every problem of a collection should agree on. */
export const CONSISTENT_FIELDS = ['source', 'source_url', 'license'] as const;

/**
 * Compare selected metadata fields across successfully checked problems.
 * Iteration follows `metadataByProblem` insertion order.
 */
export function checkMetadataConsistency(
  metadataByProblem: ReadonlyMap<string, MetadataMapping>,
  fields: readonly string[] = CONSISTENT_FIELDS,
): Issue[] {
  const issues: Issue[] = [];

  for (const field of fields) {
    const counts = new Map<string, number>();
    let complete = true;
    for (const metadata of metadataByProblem.values()) {
      const value = metadata[field];
      if (value === undefined) {
        complete = false;
        break;
      }
      const label = typeof value === 'string' ? value : JSON.stringify(value);
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }

    if (!complete) {
      issues.push(issue(GENERAL_ISSUE_KEY, `could not check for consistency of metadata field ${field}`));
      continue;
    }
    if (counts.size > 1) {
      issues.push(issue(
        GENERAL_ISSUE_KEY,
        `multiple values for ${field}: ${JSON.stringify(Object.fromEntries(counts))}`,
      ));
    }
  }

  return issues;
}
