/**
 * @fileoverview Statement check
 *
 * Finds the LaTeX statements of a problem, classifies each parsed statement
 * into plain and math text, and runs the text issue detector on it.
 */

import { readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { glob } from 'glob';
import { issue, type Issue } from '../issues/issue_log.js';
import type { SpellingDictionaryStore } from '../spelling/dictionary_store.js';
import { logDebug } from '../telemetry/logger.js';
import { extractProblemName, type MarkupParserAvailability } from './latex_adapter.js';
import { detect } from './text_issue_detector.js';
import { classify, type TextStreams } from './tree_classifier.js';

export const STATEMENT_DIR = 'problem_statement';

const DEFAULT_LANGUAGE = 'en';

const STATEMENT_FILE_RE = /(?:^|\/)problem(?:\.([a-z][a-z]))?\.tex$/;

export interface StatementFile {
  /** Path relative to the workspace, also the issue key. */
  key: string;
  language: string;
}

export interface StatementCheckContext {
  workspace: string;
  parser: MarkupParserAvailability;
  dictionaries: SpellingDictionaryStore;
}

export interface StatementCheckResult {
  issues: Issue[];
  /** `\problemname` titles by language. */
  titles: Map<string, string>;
}

export function statementLanguage(fileName: string): string | undefined {
  const match = STATEMENT_FILE_RE.exec(fileName);
  if (!match) return undefined;
  return match[1] ?? DEFAULT_LANGUAGE;
}

export async function findStatementFiles(workspace: string, problem: string): Promise<StatementFile[]> {
  const matches = await glob(`${STATEMENT_DIR}/problem*.tex`, {
    cwd: path.join(workspace, problem),
    nodir: true,
    posix: true,
  });

  const files: StatementFile[] = [];
  for (const match of matches.sort()) {
    const language = statementLanguage(match);
    if (language === undefined) continue;
    files.push({ key: path.posix.join(problem, match), language });
  }
  return files;
}

function splitLines(source: string): string[] {
  return source.split(/\r?\n/);
}

type ClassifyOutcome =
  | { ok: true; streams: TextStreams }
  | { ok: false; failure: Issue };

const EMPTY_STREAMS: TextStreams = { plainText: '', mathText: '' };

function classifySource(
  file: StatementFile,
  source: string,
  parser: MarkupParserAvailability,
): ClassifyOutcome {
  if (!parser.available) {
    return { ok: false, failure: issue(file.key, `could not load the LaTeX parser: ${parser.reason}`) };
  }
  try {
    return { ok: true, streams: classify(parser.parser.parse(source)) };
  } catch (error) {
    return {
      ok: false,
      failure: issue(file.key, `could not parse tex: ${error instanceof Error ? error.message : String(error)}`),
    };
  }
}

export async function checkStatement(
  file: StatementFile,
  context: StatementCheckContext,
): Promise<{ issues: Issue[]; title?: string }> {
  const source = await readFile(path.join(context.workspace, file.key), 'utf8');
  const rawLines = splitLines(source);
  const outcome = classifySource(file, source, context.parser);
  const dictionary = context.dictionaries.lookup(file.language);

  if (!dictionary) {
    logDebug(`[statement] no dictionary for language ${file.language}; skipping spelling for ${file.key}`);
  }

  // the line rules run on the raw source even when parsing failed
  const streams = outcome.ok ? outcome.streams : EMPTY_STREAMS;
  const issues = detect({
    key: file.key,
    plainText: streams.plainText,
    mathText: streams.mathText,
    rawLines,
    dictionary,
  });

  return {
    issues: outcome.ok ? issues : [outcome.failure, ...issues],
    title: extractProblemName(source),
  };
}

export async function checkStatements(
  problem: string,
  context: StatementCheckContext,
): Promise<StatementCheckResult> {
  const issues: Issue[] = [];
  const titles = new Map<string, string>();

  for (const file of await findStatementFiles(context.workspace, problem)) {
    const result = await checkStatement(file, context);
    issues.push(...result.issues);
    if (result.title !== undefined && !titles.has(file.language)) {
      titles.set(file.language, result.title);
    }
  }

  return { issues, titles };
}
