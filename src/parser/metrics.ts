import { NodeKind, type Metrics, type StructuralNode } from '../types';
import type { ScanResult } from './lexer';
import { walk } from './tree';

const BRANCH_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.LOOP,
  NodeKind.CONDITIONAL,
  NodeKind.HANDLER,
  NodeKind.BOOLEAN_OP,
]);

/**
 * Tree-derived counts plus the raw-text measures (`maxLineLength`,
 * `numComments`), which stay exact whichever parser built the tree.
 */
export function computeMetrics(tree: StructuralNode, scan: ScanResult): Metrics {
  let numFunctions = 0;
  let numClasses = 0;
  let numImports = 0;
  let branches = 0;
  let documented = 0;

  walk(tree, (node) => {
    if (node.kind === NodeKind.FUNCTION) numFunctions++;
    else if (node.kind === NodeKind.CLASS) numClasses++;
    else if (node.kind === NodeKind.IMPORT) numImports++;
    if (BRANCH_KINDS.has(node.kind)) branches++;
    if ((node.kind === NodeKind.FUNCTION || node.kind === NodeKind.CLASS) && node.documented === true) {
      documented++;
    }
  });

  const definitions = numFunctions + numClasses;
  return {
    linesOfCode: scan.lines.length,
    numFunctions,
    numClasses,
    numImports,
    complexity: branches + 1,
    maxLineLength: scan.lines.reduce((max, line) => Math.max(max, line.length), 0),
    numComments: scan.comments.length,
    docstringCoverage: definitions === 0 ? 1 : documented / definitions,
  };
}
