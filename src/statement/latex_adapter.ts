/**
 * @fileoverview LaTeX adapter
 *
 * Parses problem statements with unified-latex and maps its AST onto the
 * four-kind DocumentNode tree. The parser is loaded lazily so that a missing
 * or broken install degrades to an availability result instead of a crash.
 */

import type * as Ast from '@unified-latex/unified-latex-types';
import {
  documentRoot,
  generic,
  group,
  math,
  text,
  type DocumentNode,
  type GenericNode,
} from './document_tree.js';

export interface MarkupParser {
  name: string;
  parse(source: string): GenericNode;
}

export type MarkupParserAvailability =
  | { available: true; parser: MarkupParser }
  | { available: false; reason: string };

/**
 * Environments whose body is math even when the parser reports them as plain
 * environments.
 */
const MATH_ENVIRONMENTS = new Set([
  'math',
  'displaymath',
  'equation',
  'equation*',
  'align',
  'align*',
  'alignat',
  'alignat*',
  'gather',
  'gather*',
  'multline',
  'multline*',
  'eqnarray',
  'eqnarray*',
  'flalign',
  'flalign*',
]);

/**
 * Commands whose arguments are identifiers, paths or URLs rather than prose.
 */
const NON_PROSE_MACROS = new Set([
  'label',
  'ref',
  'eqref',
  'pageref',
  'cite',
  'url',
  'href',
  'includegraphics',
  'illustration',
  'input',
  'include',
  'usepackage',
  'documentclass',
  'begin',
  'end',
]);

/**
 * Problem-statement macros the parser does not know. Their arguments are
 * attached after parsing so that they are not read as loose brace groups.
 */
const STATEMENT_MACROS: Ast.MacroInfoRecord = {
  illustration: { signature: 'm m m' },
  problemname: { signature: 'm' },
  url: { signature: 'm' },
  href: { signature: 'm m' },
};

function convertArguments(args: Ast.Argument[] | undefined): DocumentNode[] {
  if (!args) return [];
  // optional `[...]` arguments carry options, not text; `\item` bodies have no marks
  return args
    .filter((arg) => arg.openMark !== '[')
    .map((arg) => group(...convertNodes(arg.content)));
}

function convertNodes(nodes: Ast.Node[]): DocumentNode[] {
  return nodes.map(convertNode);
}

export function convertNode(node: Ast.Node): DocumentNode {
  switch (node.type) {
    case 'root':
      return documentRoot(...convertNodes(node.content));
    case 'string':
      return text(node.content);
    case 'whitespace':
    case 'parbreak':
      return text(' ');
    case 'group':
      return group(...convertNodes(node.content));
    case 'inlinemath':
      return math('math', ...convertNodes(node.content));
    case 'displaymath':
      return math('displaymath', ...convertNodes(node.content));
    case 'mathenv':
      return math(node.env, ...convertNodes(node.content));
    case 'environment':
      if (MATH_ENVIRONMENTS.has(node.env)) {
        return math(node.env, ...convertNodes(node.content));
      }
      return generic(node.env, ...convertNodes(node.content));
    case 'macro':
      if (NON_PROSE_MACROS.has(node.content)) {
        return generic(node.content);
      }
      return generic(node.content, ...convertArguments(node.args));
    case 'comment':
      return generic('comment');
    case 'verb':
    case 'verbatim':
      return generic(node.env);
    default:
      return generic('unknown');
  }
}

export function toDocumentTree(root: Ast.Root): GenericNode {
  return documentRoot(...convertNodes(root.content));
}

/**
 * Load the unified-latex parser.
 */
export async function loadLatexParser(): Promise<MarkupParserAvailability> {
  try {
    const [{ parse }, { attachMacroArgs }] = await Promise.all([
      import('@unified-latex/unified-latex-util-parse'),
      import('@unified-latex/unified-latex-util-arguments'),
    ]);
    return {
      available: true,
      parser: {
        name: 'unified-latex',
        parse: (source) => {
          const root = parse(source);
          attachMacroArgs(root, STATEMENT_MACROS);
          return toDocumentTree(root);
        },
      },
    };
  } catch (error) {
    return {
      available: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * The `\problemname{...}` title of a statement, if it declares one.
 */
export function extractProblemName(source: string): string | undefined {
  const match = /\\problemname\s*\{([^}]*)\}/.exec(source);
  const title = match?.[1]?.trim();
  return title ? title : undefined;
}
