import { FindingCategory, NodeKind, Severity, type StructuralNode } from '../../types';
import { collect, statementChildren, walk } from '../../parser/tree';
import {
  type BugPatternRule,
  type RuleMatch,
  enclosingFunction,
  isStringLiteral,
  lineSpan,
  MODULE_SCOPE,
} from '../rule';

const PYTHON_SINGLETONS = new Set(['None', 'True', 'False', 'NotImplemented', 'Ellipsis']);

function isLiteralOperand(operand: string): boolean {
  const text = operand.trim();
  if (PYTHON_SINGLETONS.has(text)) return false;
  return isStringLiteral(text) || /^-?\d/.test(text) || /^[[{(]/.test(text);
}

const identityComparison: BugPatternRule = {
  id: 'identity_comparison',
  title: 'Identity comparison with a literal',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.ERROR,
  languages: ['python'],
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const node of collect(tree, NodeKind.COMPARISON)) {
      if (node.operator !== 'is' && node.operator !== 'is not') continue;
      const literal = (node.operands ?? []).find(isLiteralOperand);
      if (literal === undefined) continue;
      const equality = node.operator === 'is' ? '==' : '!=';
      matches.push({
        message: `"${node.operator}" compares identity with the literal ${literal}; use "${equality}"`,
        span: node.span,
      });
    }
    return matches;
  },
};

const looseEquality: BugPatternRule = {
  id: 'loose_equality',
  title: 'Loose equality',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  languages: ['javascript', 'typescript'],
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const node of collect(tree, NodeKind.COMPARISON)) {
      if (node.operator !== '==' && node.operator !== '!=') continue;
      // `x == null` deliberately covers undefined as well
      if ((node.operands ?? []).some((operand) => operand.trim() === 'null')) continue;
      matches.push({
        message: `"${node.operator}" coerces types; use "${node.operator}="`,
        span: node.span,
      });
    }
    return matches;
  },
};

const MUTABLE_DEFAULT = /^(?:\[|\{|(?:list|dict|set|bytearray|defaultdict|OrderedDict|collections\.\w+)\s*\()/;

const mutableDefaultArgument: BugPatternRule = {
  id: 'mutable_default_argument',
  title: 'Mutable default argument',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  languages: ['python'],
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const fn of collect(tree, NodeKind.FUNCTION)) {
      for (const param of fn.params ?? []) {
        if (param.defaultValue === undefined || !MUTABLE_DEFAULT.test(param.defaultValue)) continue;
        matches.push({
          message: `Parameter "${param.name}" of "${fn.name ?? 'function'}" defaults to ${param.defaultValue}, which is shared between calls`,
          span: lineSpan(fn.span.startLine),
        });
      }
    }
    return matches;
  },
};

const EXIT_KINDS = new Set([NodeKind.RETURN, NodeKind.RAISE, NodeKind.JUMP]);
/** Languages whose function declarations are hoisted to the top of their scope. */
const HOISTING_LANGUAGES = new Set(['javascript', 'typescript']);

const unreachableCode: BugPatternRule = {
  id: 'unreachable_code',
  title: 'Unreachable code',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  evaluate({ tree, syntax }) {
    const hoists = HOISTING_LANGUAGES.has(syntax.id);
    const matches: RuleMatch[] = [];
    walk(tree, (node) => {
      const statements = statementChildren(node);
      const exit = statements.findIndex((child) => EXIT_KINDS.has(child.kind));
      if (exit < 0) return;
      const dead = statements.slice(exit + 1).filter((child) => !(hoists && child.kind === NodeKind.FUNCTION));
      if (dead.length === 0) return;
      const keyword = (statements[exit].text ?? '').split(/[\s;(]/)[0] || statements[exit].kind;
      const first = dead[0];
      const last = dead[dead.length - 1];
      matches.push({
        message: `Code after "${keyword}" on line ${statements[exit].span.startLine} never runs`,
        span: lineSpan(first.span.startLine, last.span.endLine),
      });
    });
    return matches;
  },
};

const BROAD_HANDLER = [
  /^except\s*:/,
  /^except\s*\(?\s*(?:Exception|BaseException)\b/,
  /^catch\s*\(\s*(?:final\s+)?\\?(?:java\.lang\.|System\.)?(?:Exception|Throwable)\b/,
  /^catch\s*\(\s*\.\.\.\s*\)/,
  /^catch\s*(?:\{|$)/,
  /^rescue\s*(?:$|=>|Exception\b)/,
];

const bareExcept: BugPatternRule = {
  id: 'bare_except',
  title: 'Overly broad exception handler',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  languages: ['python', 'java', 'csharp', 'cpp', 'kotlin', 'php', 'ruby', 'unknown'],
  evaluate({ tree }) {
    // One finding per function, however many broad handlers it has.
    const byScope = new Map<StructuralNode | null, StructuralNode[]>();
    walk(tree, (node, ancestors) => {
      if (node.kind !== NodeKind.HANDLER) return;
      const text = (node.text ?? '').trim();
      if (!BROAD_HANDLER.some((pattern) => pattern.test(text))) return;
      const scope = enclosingFunction(ancestors) ?? null;
      const handlers = byScope.get(scope) ?? [];
      handlers.push(node);
      byScope.set(scope, handlers);
    });

    const matches: RuleMatch[] = [];
    for (const [scope, handlers] of byScope) {
      const where = scope?.name ?? MODULE_SCOPE;
      const count = handlers.length > 1 ? ` (${handlers.length} handlers in ${where})` : '';
      matches.push({
        message: `"${handlers[0].text ?? ''}" catches every exception, hiding unrelated failures${count}`,
        span: handlers[0].span,
      });
    }
    return matches;
  },
};

const EMPTY_BODY = /(?:\{\s*\}?|:\s*(?:pass)?)\s*;?\s*$/;

const emptyExceptionHandler: BugPatternRule = {
  id: 'empty_exception_handler',
  title: 'Swallowed exception',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  evaluate({ tree }) {
    const matches: RuleMatch[] = [];
    for (const handler of collect(tree, NodeKind.HANDLER)) {
      const body = statementChildren(handler);
      const onlyPass = body.every((child) => child.kind === NodeKind.STATEMENT && /^(?:pass|;)?$/.test((child.text ?? '').trim()));
      if (!onlyPass) continue;
      if (body.length === 0 && !EMPTY_BODY.test((handler.text ?? '').trim())) continue;
      matches.push({
        message: `Exception handler on line ${handler.span.startLine} discards the error silently`,
        span: handler.span,
      });
    }
    return matches;
  },
};

const unusedImport: BugPatternRule = {
  id: 'unused_import',
  title: 'Unused import',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.INFO,
  evaluate({ tree, scan }) {
    const imports = collect(tree, NodeKind.IMPORT);
    if (imports.length === 0) return [];
    const importLines = new Set<number>();
    for (const node of imports) {
      for (let line = node.span.startLine; line <= node.span.endLine; line++) importLines.add(line);
    }
    const code = scan.masked.filter((_, index) => !importLines.has(index + 1)).join('\n');
    const templates = scan.strings.filter((token) => token.quote === '`').map((token) => token.content).join('\n');
    const usage = `${code}\n${templates}`;

    const matches: RuleMatch[] = [];
    for (const node of imports) {
      for (const binding of node.bindings ?? []) {
        const escaped = binding.replace(/[$]/g, '\\$');
        if (new RegExp(`(?<![\\w$])${escaped}(?![\\w$])`).test(usage)) continue;
        matches.push({ message: `"${binding}" is imported but never used`, span: node.span });
      }
    }
    return matches;
  },
};

const ENDLESS_LOOP = [
  /^while\s*\(?\s*(?:True|true|1)\s*\)?\s*[:{]?\s*$/,
  /^for\s*\(\s*;\s*;\s*\)/,
  /^loop\s*(?:\{|do\b|$)/,
];

function hasExit(loop: StructuralNode): boolean {
  let exits = false;
  const visit = (node: StructuralNode, nestedLoop: boolean): void => {
    for (const child of node.children) {
      if (child.kind === NodeKind.FUNCTION || child.kind === NodeKind.CLASS) continue;
      if (child.kind === NodeKind.RETURN || child.kind === NodeKind.RAISE) exits = true;
      if (child.kind === NodeKind.JUMP && child.operator === 'break' && !nestedLoop) exits = true;
      if (child.kind === NodeKind.CALL && /^(?:sys\.)?exit$|^process\.exit$/.test(child.name ?? '')) exits = true;
      visit(child, nestedLoop || child.kind === NodeKind.LOOP);
    }
  };
  visit(loop, false);
  return exits;
}

const infiniteLoop: BugPatternRule = {
  id: 'infinite_loop',
  title: 'Loop without exit',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  evaluate({ tree }) {
    return collect(tree, NodeKind.LOOP)
      .filter((loop) => ENDLESS_LOOP.some((pattern) => pattern.test((loop.text ?? '').trim())))
      .filter((loop) => !hasExit(loop))
      .map((loop) => ({
        message: `Loop on line ${loop.span.startLine} has no break, return or raise`,
        span: loop.span,
      }));
  },
};

const resourceLeak: BugPatternRule = {
  id: 'resource_leak',
  title: 'File handle never closed',
  category: FindingCategory.BUG_PATTERN,
  severity: Severity.WARNING,
  languages: ['python'],
  evaluate({ tree }) {
    const closeLines = collect(tree, NodeKind.CALL)
      .filter((call) => (call.name ?? '').endsWith('.close'))
      .map((call) => call.span.startLine);

    const matches: RuleMatch[] = [];
    walk(tree, (node, ancestors) => {
      if (node.kind !== NodeKind.CALL || !/^(?:io\.|codecs\.)?open$/.test(node.name ?? '')) return;
      const managed = ancestors.some((ancestor) => /^(?:async\s+)?with\b/.test(ancestor.text ?? ''));
      if (managed || closeLines.some((line) => line >= node.span.startLine)) return;
      matches.push({
        message: `File opened on line ${node.span.startLine} is not closed; open it in a "with" block`,
        span: node.span,
      });
    });
    return matches;
  },
};

export const BUG_PATTERN_RULES: readonly BugPatternRule[] = [
  identityComparison,
  looseEquality,
  mutableDefaultArgument,
  unreachableCode,
  bareExcept,
  emptyExceptionHandler,
  unusedImport,
  infiniteLoop,
  resourceLeak,
];
