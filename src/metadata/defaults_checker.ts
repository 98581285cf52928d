/**
 * @fileoverview Metadata Defaults Checker
 *
 * Recursive structural diff of a declared problem.yaml against the default
 * schema. Reports keys the schema does not know, settings that are rarely
 * changed, and (when enabled) values that merely restate the default.
 */

import { isDeepStrictEqual } from 'node:util';
import { issue, type Issue } from '../issues/issue_log.js';
import { isMapping, type MetadataMapping, type MetadataNode } from './metadata_node.js';

/** Settings that are legal but unusual enough to deserve a second look. */
export const UNUSUAL_SETTINGS: ReadonlySet<string> = new Set([
  'validation',
  'type',
  'limits/memory',
  'limits/output',
  'limits/compilation_time',
  'limits/validation_time',
  'limits/validation_memory',
  'limits/validation_output',
]);

export interface DefaultsCheckOptions {
  /** Warn when a declared value equals the default. Defaults to true. */
  flagRedundantDefaults?: boolean;
  unusualSettings?: ReadonlySet<string>;
}

export function metadataIssueKey(problem: string): string {
  return `${problem}/problem.yaml`;
}

function checkMapping(
  key: string,
  declared: MetadataMapping,
  schema: MetadataMapping,
  path: string,
  options: Required<DefaultsCheckOptions>,
  issues: Issue[],
): void {
  for (const [name, value] of Object.entries(declared)) {
    const fullKey = path ? `${path}/${name}` : name;

    if (options.unusualSettings.has(fullKey)) {
      issues.push(issue(key, `specifying unusual metadata value ${fullKey}`));
    }

    if (!Object.hasOwn(schema, name)) {
      issues.push(issue(key, `option ${fullKey} is not in default`));
      continue;
    }

    const fallback = schema[name];
    if (isMapping(value)) {
      // under a mandatory key the mapping is free-form; under a scalar default no subkey is known
      if (fallback !== null) {
        checkMapping(key, value, isMapping(fallback) ? fallback : {}, fullKey, options, issues);
      }
      continue;
    }

    // null marks a mandatory key: any declared value is expected
    if (fallback === null) continue;

    if (options.flagRedundantDefaults && isDeepStrictEqual(value, fallback)) {
      issues.push(issue(key, `specifies default value for ${fullKey}; remove the definition`));
    }
  }
}

/**
 * Compare a problem's declared metadata with the default schema.
 *
 * @param problem - Problem name; findings are keyed `<problem>/problem.yaml`
 * @param declared - Parsed problem.yaml, or null/undefined when absent
 */
export function checkDefaults(
  problem: string,
  declared: MetadataNode | undefined,
  schema: MetadataMapping,
  options: DefaultsCheckOptions = {},
): Issue[] {
  const key = metadataIssueKey(problem);

  if (declared === null || declared === undefined) {
    return [issue(key, 'there is no metadata')];
  }
  if (!isMapping(declared)) {
    return [issue(key, 'metadata is not a key/value mapping')];
  }

  const issues: Issue[] = [];
  checkMapping(key, declared, schema, '', {
    flagRedundantDefaults: options.flagRedundantDefaults ?? true,
    unusualSettings: options.unusualSettings ?? UNUSUAL_SETTINGS,
  }, issues);
  return issues;
}
