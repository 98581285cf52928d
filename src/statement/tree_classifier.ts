/**
 * @fileoverview Tree Classifier
 *
 * Walks a document tree depth-first, pre-order, and partitions all text into a
 * plain-prose stream and a math stream. Math mode is inherited by the whole
 * subtree of a math environment and never left inside it.
 */

import { childrenOf, type DocumentNode } from './document_tree.js';

export interface TextStreams {
  plainText: string;
  mathText: string;
}

interface StreamBuffers {
  plain: string[];
  math: string[];
}

function visit(node: DocumentNode, inMath: boolean, buffers: StreamBuffers): void {
  let childInMath = inMath;

  switch (node.kind) {
    case 'Text':
      (inMath ? buffers.math : buffers.plain).push(node.text.toLowerCase());
      return;
    case 'Group':
      // keep words of adjacent groups from fusing into one token
      buffers.plain.push(' ');
      buffers.math.push(' ');
      break;
    case 'MathEnvironment':
      buffers.math.push(' ');
      childInMath = true;
      break;
    case 'Generic':
      // a command between digits (`1\,000`, `2\cdot10`) separates numbers
      if (inMath) {
        buffers.math.push(' ');
      }
      break;
  }

  for (const child of childrenOf(node)) {
    visit(child, childInMath, buffers);
  }
}

export function classify(root: DocumentNode): TextStreams {
  const buffers: StreamBuffers = { plain: [], math: [] };
  visit(root, false, buffers);
  return {
    plainText: buffers.plain.join(''),
    mathText: buffers.math.join(''),
  };
}
