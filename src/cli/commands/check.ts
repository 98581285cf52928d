/**
 * @fileoverview Check Command - audit a collection of problem packages
 *
 * Usage: problemset-audit check [problem...] [--dictionaries <dir>]
 *        [--problem-name-cache <file>] [--defaults <file>] [--report-dir <dir>]
 *        [--skip-redundant-defaults] [--max-image-kb <n>] [--json]
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { checkProblems, type AuditSummary } from '../../audit/run_audit.js';
import { resolveAuditConfig, type AuditConfig } from '../../config/audit_config.js';
import { IssueLog } from '../../issues/issue_log.js';
import { loadDefaultSchema } from '../../metadata/default_schema.js';
import { findProblemDirectories } from '../../problems/discovery.js';
import { loadExistingProblemNames } from '../../problems/name_uniqueness.js';
import { writeReport, type WrittenReport } from '../../report/report_renderer.js';
import { loadSpellingDictionaries } from '../../spelling/dictionary_store.js';
import { loadLatexParser } from '../../statement/latex_adapter.js';
import { logInfo, logWarning } from '../../telemetry/logger.js';
import { CliError } from '../errors.js';

export interface CheckCommandOptions {
  workspace: string;
  /** Arguments starting at the command name. */
  rawArgs: string[];
}

export interface CheckCommandResult {
  config: AuditConfig;
  problems: string[];
  summary: AuditSummary;
  issues: IssueLog;
  report: WrittenReport;
}

function optionalString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export async function checkCommand(options: CheckCommandOptions): Promise<CheckCommandResult> {
  const { values, positionals } = parseArgs({
    args: options.rawArgs.slice(1),
    options: {
      json: { type: 'boolean', default: false },
      dictionaries: { type: 'string' },
      'problem-name-cache': { type: 'string' },
      defaults: { type: 'string' },
      'report-dir': { type: 'string' },
      'skip-redundant-defaults': { type: 'boolean', default: false },
      'max-image-kb': { type: 'string' },
      workspace: { type: 'string', short: 'w' },
      verbose: { type: 'boolean', default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const config = resolveAuditConfig({
    workspace: optionalString(values.workspace) ?? options.workspace,
    dictionaries: optionalString(values.dictionaries),
    problemNameCache: optionalString(values['problem-name-cache']),
    defaults: optionalString(values.defaults),
    reportDir: optionalString(values['report-dir']),
    skipRedundantDefaults: values['skip-redundant-defaults'] === true,
    maxImageKb: optionalString(values['max-image-kb']),
  });

  const problems = positionals.length > 0
    ? [...positionals]
    : await findProblemDirectories(config.workspace);
  if (problems.length === 0) {
    throw new CliError(`No problem packages found in ${config.workspace}`, 'INVALID_ARGUMENT', [
      'Run from a directory whose subdirectories contain problem.yaml',
      'Or name the problems to check: problemset-audit check <problem>...',
    ]);
  }

  const [dictionaries, parser, defaultSchema, existingNames] = await Promise.all([
    loadSpellingDictionaries(config.dictionariesDir),
    loadLatexParser(),
    loadDefaultSchema(config.defaultsFile),
    loadExistingProblemNames(config.problemNameCache),
  ]);
  if (!parser.available) {
    logWarning(`[check] LaTeX parser unavailable: ${parser.reason}`);
  }
  if (!defaultSchema.available) {
    logWarning(`[check] default metadata schema unavailable: ${defaultSchema.reason}`);
  }
  logInfo(`[check] checking ${problems.length} problem(s) in ${config.workspace}`);

  const issues = new IssueLog();
  const summary = await checkProblems(problems, {
    workspace: config.workspace,
    issues,
    dictionaries,
    parser,
    defaultSchema,
    flagRedundantDefaults: config.flagRedundantDefaults,
    maxImageKilobytes: config.maxImageKilobytes,
  }, existingNames);

  const report = await writeReport(issues, {
    reportDir: config.reportDir,
    workingDirectory: config.workspace,
  });

  if (values.json === true) {
    console.log(JSON.stringify({
      reportFile: report.path,
      checked: summary.checked,
      failed: summary.failed,
      issues: issues.toJSON(),
    }, null, 2));
  } else {
    for (const line of report.lines) {
      console.log(line);
    }
  }

  return { config, problems, summary, issues, report };
}
