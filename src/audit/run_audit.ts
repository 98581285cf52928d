/**
 * @fileoverview Audit orchestrator
 *
 * Checks each problem to completion before the next one, then compares
 * metadata across the collection. A failure while checking one problem is
 * logged under that problem and the run moves on.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { IssueLog } from '../issues/issue_log.js';
import type { DefaultSchemaAvailability } from '../metadata/default_schema.js';
import { checkDefaults } from '../metadata/defaults_checker.js';
import { isMapping, mergeWithDefaults, type MetadataMapping } from '../metadata/metadata_node.js';
import {
  checkProblemNameTitle,
  readDeclaredMetadata,
  resolveProblemTitle,
} from '../metadata/problem_metadata.js';
import { checkMetadataConsistency } from '../problems/consistency.js';
import { checkProblemNameUniqueness } from '../problems/name_uniqueness.js';
import { checkSubmissions, loadSubmissionsInventory } from '../problems/submissions.js';
import { checkLargeImages } from '../quality/image_size_guard.js';
import type { SpellingDictionaryStore } from '../spelling/dictionary_store.js';
import type { MarkupParserAvailability } from '../statement/latex_adapter.js';
import { checkStatements } from '../statement/statement_check.js';
import { logInfo, logWarning } from '../telemetry/logger.js';

export interface AuditContext {
  workspace: string;
  issues: IssueLog;
  dictionaries: SpellingDictionaryStore;
  parser: MarkupParserAvailability;
  defaultSchema: DefaultSchemaAvailability;
  flagRedundantDefaults: boolean;
  maxImageKilobytes: number;
}

export interface AuditSummary {
  checked: string[];
  failed: string[];
  /** Declared metadata merged over the defaults, per checked problem. */
  metadata: Map<string, MetadataMapping>;
}

function describeFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

/**
 * Run every per-problem check and return the problem's effective metadata.
 */
export async function checkProblem(problem: string, context: AuditContext): Promise<MetadataMapping> {
  const { issues } = context;
  const problemDir = path.join(context.workspace, problem);

  const declared = await readDeclaredMetadata(problemDir);

  const statements = await checkStatements(problem, {
    workspace: context.workspace,
    parser: context.parser,
    dictionaries: context.dictionaries,
  });
  issues.record(statements.issues);

  issues.record(checkProblemNameTitle(problem, resolveProblemTitle(declared, statements.titles)));

  let metadata: MetadataMapping = isMapping(declared) ? declared : {};
  if (context.defaultSchema.available) {
    issues.record(checkDefaults(problem, declared, context.defaultSchema.schema, {
      flagRedundantDefaults: context.flagRedundantDefaults,
    }));
    metadata = mergeWithDefaults(context.defaultSchema.schema, metadata);
  } else {
    issues.log(problem, `could not load the default metadata schema: ${context.defaultSchema.reason}`);
  }

  issues.record(checkSubmissions(problem, await loadSubmissionsInventory(problemDir)));

  issues.record(await checkLargeImages(context.workspace, problem, {
    maxKilobytes: context.maxImageKilobytes,
  }));

  return metadata;
}

/**
 * Check every problem, then the collection-wide rules.
 */
export async function checkProblems(
  problems: readonly string[],
  context: AuditContext,
  existingNames?: ReadonlySet<string>,
): Promise<AuditSummary> {
  const summary: AuditSummary = { checked: [], failed: [], metadata: new Map() };

  context.issues.record(checkProblemNameUniqueness(problems, existingNames));

  for (const problem of problems) {
    logInfo(`[audit] checking ${problem}`);
    try {
      summary.metadata.set(problem, await checkProblem(problem, context));
      summary.checked.push(problem);
    } catch (error) {
      summary.failed.push(problem);
      logWarning(`[audit] exception while checking ${problem}`);
      context.issues.log(
        problem,
        `an exception occurred when checking this problem: ${describeFailure(error)}`,
      );
    }
  }

  context.issues.record(checkMetadataConsistency(summary.metadata));

  return summary;
}
