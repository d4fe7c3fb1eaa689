import { NodeKind, type SourceSpan, type StructuralNode } from '../types';

/** Kinds that describe part of a statement rather than a statement. */
export const EXPRESSION_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.CALL,
  NodeKind.LITERAL,
  NodeKind.COMPARISON,
  NodeKind.BOOLEAN_OP,
]);

/** Kinds that open a nested control-flow level. */
export const NESTING_KINDS: ReadonlySet<NodeKind> = new Set([
  NodeKind.LOOP,
  NodeKind.CONDITIONAL,
  NodeKind.TRY,
  NodeKind.HANDLER,
  NodeKind.BLOCK,
]);

export type NodeDetails = Partial<Omit<StructuralNode, 'kind' | 'span' | 'children'>>;

export function createNode(kind: NodeKind, span: SourceSpan, extra: NodeDetails = {}): StructuralNode {
  return { kind, span: { ...span }, ...extra, children: [] };
}

export type NodeVisitor = (node: StructuralNode, ancestors: readonly StructuralNode[]) => void;

/** Pre-order walk; `ancestors` runs from the root to the direct parent. */
export function walk(root: StructuralNode, visit: NodeVisitor): void {
  const ancestors: StructuralNode[] = [];
  const visitNode = (node: StructuralNode): void => {
    visit(node, ancestors);
    ancestors.push(node);
    for (const child of node.children) visitNode(child);
    ancestors.pop();
  };
  visitNode(root);
}

export function collect(root: StructuralNode, ...kinds: NodeKind[]): StructuralNode[] {
  const found: StructuralNode[] = [];
  walk(root, (node) => {
    if (kinds.includes(node.kind)) found.push(node);
  });
  return found;
}

export function statementChildren(node: StructuralNode): StructuralNode[] {
  return node.children.filter((child) => !EXPRESSION_KINDS.has(child.kind));
}

/** Widens every span to cover its descendants. */
export function finalizeSpans(node: StructuralNode): SourceSpan {
  for (const child of node.children) {
    const span = finalizeSpans(child);
    if (span.endLine > node.span.endLine) node.span.endLine = span.endLine;
  }
  return node.span;
}

/** Deepest chain of nesting kinds below `node`, not descending into nested functions or classes. */
export function nestingDepth(node: StructuralNode): number {
  let deepest = 0;
  for (const child of node.children) {
    if (child.kind === NodeKind.FUNCTION || child.kind === NodeKind.CLASS) continue;
    const below = nestingDepth(child);
    const depth = NESTING_KINDS.has(child.kind) ? below + 1 : below;
    if (depth > deepest) deepest = depth;
  }
  return deepest;
}
