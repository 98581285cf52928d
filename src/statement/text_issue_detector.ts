/**
 * @fileoverview Text Issue Detector
 *
 * Runs the statement detectors over the classified text streams and the raw
 * source lines:
 * - spelling and numbers outside math mode (plain text, needs a dictionary)
 * - thousands groups and long digit runs in math mode
 * - line-level style rules on the LaTeX source
 *
 * Each detector runs independently; the result is a flat list of findings
 * keyed by the statement file.
 */

import { issue, type Issue } from '../issues/issue_log.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DetectorInput {
  /** Issue key for the statement, normally its path. */
  key: string;
  plainText: string;
  mathText: string;
  rawLines: readonly string[];
  /** Words for the statement's language merged with the global words. */
  dictionary?: ReadonlySet<string>;
}

export interface LineRule {
  id: string;
  pattern: RegExp;
  message: string;
}

export interface SpellingFindings {
  missingMathMode: string[];
  misspelledWords: string[];
}

// ============================================================================
// PATTERNS
// ============================================================================

const WORD_CHAR = '[\\p{L}\\p{M}\\p{N}_]';

/** Starts and ends with a word character, no whitespace in between. */
const TOKEN_RE = new RegExp(`(?<!${WORD_CHAR})${WORD_CHAR}(?:\\S*${WORD_CHAR})?(?!${WORD_CHAR})`, 'gu');

const BARE_NUMBER_RE = /^[0-9.,]/;

/** Digits grouped with commas instead of `\,`, or four or more digits in a row. */
const INCORRECT_MATH_RE = /\b(?:[0-9]+[0-9,]*,[0-9]+|[0-9]{4,})\b/g;

/**
 * Matches `pattern` only before the first `%` on the line. An escaped `\%`
 * also counts as a comment marker here.
 */
function uncommented(pattern: string): RegExp {
  return new RegExp(`^[^%]*${pattern}`, 'iu');
}

export const LINE_RULES: readonly LineRule[] = [
  {
    id: 'double-quotes',
    pattern: uncommented('"'),
    message: "uses double-quotes; use `` and '' instead",
  },
  {
    id: 'includegraphics-width',
    pattern: uncommented('\\\\includegraphics(?!\\[width=[0-9.]+\\\\(?:textwidth|linewidth)\\])'),
    message: 'bad includegraphics width; use a multiplier (e.g. width=0.9\\textwidth) or HTML layout can break',
  },
  {
    id: 'three-periods',
    pattern: uncommented('\\.\\.\\.'),
    message: 'uses three periods rather than \\ldots',
  },
  {
    id: 'floating-point',
    pattern: uncommented('floating[- ]*point'),
    message: 'mentions floating-point rather than real number',
  },
  {
    id: 'times',
    pattern: uncommented('\\\\times\\b'),
    message: 'uses \\times; use \\cdot instead',
  },
];

// ============================================================================
// DETECTORS
// ============================================================================

export function formatList(values: Iterable<string>): string {
  return `[${[...values].map((value) => JSON.stringify(value)).join(', ')}]`;
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const match of text.matchAll(TOKEN_RE)) {
    tokens.add(match[0]);
  }
  return tokens;
}

export function splitUnknownWords(
  tokens: Iterable<string>,
  dictionary: ReadonlySet<string>,
): SpellingFindings {
  const missingMathMode: string[] = [];
  const misspelledWords: string[] = [];
  for (const token of tokens) {
    if (dictionary.has(token)) continue;
    if (BARE_NUMBER_RE.test(token)) {
      missingMathMode.push(token);
    } else {
      misspelledWords.push(token);
    }
  }
  return {
    missingMathMode: sortedUnique(missingMathMode),
    misspelledWords: sortedUnique(misspelledWords),
  };
}

export function findIncorrectMath(mathText: string): string[] {
  return sortedUnique(Array.from(mathText.matchAll(INCORRECT_MATH_RE), (match) => match[0]));
}

/**
 * Rules that match at least one line, in rule order, each reported once.
 */
export function matchLineRules(
  lines: readonly string[],
  rules: readonly LineRule[] = LINE_RULES,
): LineRule[] {
  return rules.filter((rule) => lines.some((line) => rule.pattern.test(line)));
}

export function detect(input: DetectorInput): Issue[] {
  const issues: Issue[] = [];

  if (input.dictionary && input.dictionary.size > 0) {
    const spelling = splitUnknownWords(tokenize(input.plainText), input.dictionary);
    if (spelling.misspelledWords.length > 0) {
      issues.push(issue(input.key, `misspelled words: ${formatList(spelling.misspelledWords)}`));
    }
    if (spelling.missingMathMode.length > 0) {
      issues.push(issue(input.key, `missing math mode: ${formatList(spelling.missingMathMode)}`));
    }
  }

  const incorrectMath = findIncorrectMath(input.mathText);
  if (incorrectMath.length > 0) {
    issues.push(issue(
      input.key,
      `incorrect math: ${formatList(incorrectMath)} (use \\, (backslash comma) to separate thousands groups)`,
    ));
  }

  for (const rule of matchLineRules(input.rawLines)) {
    issues.push(issue(input.key, rule.message));
  }

  return issues;
}
