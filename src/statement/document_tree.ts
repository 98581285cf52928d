/**
 * @fileoverview Parser-neutral document tree consumed by the tree classifier.
 *
 * The LaTeX adapter maps the parser's AST onto these four node kinds; nothing
 * downstream inspects parser-specific node classes.
 */

export type DocumentNode = TextNode | GroupNode | MathEnvironmentNode | GenericNode;

export interface TextNode {
  kind: 'Text';
  text: string;
}

/** A delimiting scope such as a brace group. */
export interface GroupNode {
  kind: 'Group';
  children: DocumentNode[];
}

/** A scope whose entire subtree is mathematical content. */
export interface MathEnvironmentNode {
  kind: 'MathEnvironment';
  name: string;
  children: DocumentNode[];
}

/** Any other construct: commands, prose environments, comments, the root. */
export interface GenericNode {
  kind: 'Generic';
  name: string;
  children: DocumentNode[];
}

export const DOCUMENT_ROOT_NAME = 'document';

export function text(value: string): TextNode {
  return { kind: 'Text', text: value };
}

export function group(...children: DocumentNode[]): GroupNode {
  return { kind: 'Group', children };
}

export function math(name: string, ...children: DocumentNode[]): MathEnvironmentNode {
  return { kind: 'MathEnvironment', name, children };
}

export function generic(name: string, ...children: DocumentNode[]): GenericNode {
  return { kind: 'Generic', name, children };
}

export function documentRoot(...children: DocumentNode[]): GenericNode {
  return generic(DOCUMENT_ROOT_NAME, ...children);
}

export function childrenOf(node: DocumentNode): readonly DocumentNode[] {
  return node.kind === 'Text' ? [] : node.children;
}
