/**
 * @fileoverview problemset-audit public API
 *
 * @packageDocumentation
 */

export { PROBLEMSET_AUDIT_VERSION } from './version.js';

export { IssueLog, GENERAL_ISSUE_KEY, issue, sectionPrefix, type Issue, type IssueSection } from './issues/issue_log.js';

export {
  text,
  group,
  math,
  generic,
  documentRoot,
  type DocumentNode,
  type TextNode,
  type GroupNode,
  type MathEnvironmentNode,
  type GenericNode,
} from './statement/document_tree.js';
export { classify, type TextStreams } from './statement/tree_classifier.js';
export {
  detect,
  tokenize,
  splitUnknownWords,
  findIncorrectMath,
  matchLineRules,
  LINE_RULES,
  type DetectorInput,
  type LineRule,
} from './statement/text_issue_detector.js';
export { loadLatexParser, toDocumentTree, type MarkupParser, type MarkupParserAvailability } from './statement/latex_adapter.js';
export { checkStatements, findStatementFiles } from './statement/statement_check.js';

export { SpellingDictionaryStore, loadSpellingDictionaries, GLOBAL_DICTIONARY } from './spelling/dictionary_store.js';

export { checkDefaults, UNUSUAL_SETTINGS, type DefaultsCheckOptions } from './metadata/defaults_checker.js';
export { loadDefaultSchema, BUNDLED_DEFAULTS_PATH, type DefaultSchemaAvailability } from './metadata/default_schema.js';
export { isMapping, mergeWithDefaults, type MetadataNode, type MetadataMapping } from './metadata/metadata_node.js';

export { checkProblem, checkProblems, type AuditContext, type AuditSummary } from './audit/run_audit.js';
export { findProblemDirectories } from './problems/discovery.js';
export { renderReport, writeReport } from './report/report_renderer.js';
export { resolveAuditConfig, type AuditConfig } from './config/audit_config.js';
