import { FindingCategory, NodeKind, type StructuralNode } from '../../types';
import { collect, nestingDepth, walk } from '../../parser/tree';
import { type CodeSmellRule, type RuleMatch, lineSpan, MODULE_SCOPE } from '../rule';

const RECEIVER_PARAMS = new Set(['self', 'cls']);
const CONSTANT_NAME = /^[A-Z][A-Z0-9_]*$/;
const MARKER_COMMENT = /\b(TODO|FIXME|XXX|HACK)\b/;

function lineCount(node: StructuralNode): number {
  return node.span.endLine - node.span.startLine + 1;
}

function containsLoop(node: StructuralNode): boolean {
  return node.children.some((child) => {
    if (child.kind === NodeKind.FUNCTION || child.kind === NodeKind.CLASS) return false;
    return child.kind === NodeKind.LOOP || containsLoop(child);
  });
}

const longFunction: CodeSmellRule = {
  id: 'long_function',
  title: 'Long function',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Split the function into smaller functions with one job each.',
  evaluate({ tree, config }) {
    return collect(tree, NodeKind.FUNCTION)
      .filter((fn) => lineCount(fn) > config.longFunctionLines)
      .map((fn) => ({
        message: `Function "${fn.name ?? 'anonymous'}" spans ${lineCount(fn)} lines (limit ${config.longFunctionLines})`,
        span: fn.span,
      }));
  },
};

const deepNesting: CodeSmellRule = {
  id: 'deep_nesting',
  title: 'Deep nesting',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Return early or extract the inner blocks into helper functions.',
  evaluate({ tree, config }) {
    const scopes = [tree, ...collect(tree, NodeKind.FUNCTION)];
    const matches: RuleMatch[] = [];
    for (const scope of scopes) {
      const depth = nestingDepth(scope);
      if (depth <= config.maxNestingDepth) continue;
      const where = scope.kind === NodeKind.MODULE ? MODULE_SCOPE : `"${scope.name ?? 'anonymous'}"`;
      matches.push({
        message: `Blocks in ${where} nest ${depth} levels deep (limit ${config.maxNestingDepth})`,
        span: scope.kind === NodeKind.MODULE ? undefined : scope.span,
      });
    }
    return matches;
  },
};

const tooManyParameters: CodeSmellRule = {
  id: 'too_many_parameters',
  title: 'Too many parameters',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Group related parameters into an object.',
  evaluate({ tree, config }) {
    const matches: RuleMatch[] = [];
    for (const fn of collect(tree, NodeKind.FUNCTION)) {
      const count = (fn.params ?? []).filter((param) => !RECEIVER_PARAMS.has(param.name)).length;
      if (count <= config.maxParameters) continue;
      matches.push({
        message: `Function "${fn.name ?? 'anonymous'}" takes ${count} parameters (limit ${config.maxParameters})`,
        span: lineSpan(fn.span.startLine),
      });
    }
    return matches;
  },
};

const duplicateCode: CodeSmellRule = {
  id: 'duplicate_code',
  title: 'Duplicated code',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Move the repeated lines into a shared function.',
  evaluate({ scan, config }) {
    const size = config.duplicateBlockLines;
    const lines = scan.lines.map((line) => line.trim());
    const eligible = (start: number): boolean => {
      const window = lines.slice(start, start + size);
      return window.length === size &&
        window.every((line) => line.length > 0) &&
        window.some((line) => /\w/.test(line));
    };

    const firstSeen = new Map<string, number>();
    const matches: RuleMatch[] = [];
    let i = 0;
    while (i + size <= lines.length) {
      if (!eligible(i)) {
        i++;
        continue;
      }
      const key = lines.slice(i, i + size).join('\n');
      const original = firstSeen.get(key);
      if (original === undefined || original + size > i) {
        if (original === undefined) firstSeen.set(key, i);
        i++;
        continue;
      }
      let length = size;
      while (
        i + length < lines.length &&
        original + length < i &&
        lines[i + length].length > 0 &&
        lines[i + length] === lines[original + length]
      ) {
        length++;
      }
      matches.push({
        message: `Lines ${i + 1}-${i + length} repeat lines ${original + 1}-${original + length}`,
        span: lineSpan(i + 1, i + length),
      });
      i += length;
    }
    return matches;
  },
};

const magicNumbers: CodeSmellRule = {
  id: 'magic_numbers',
  title: 'Magic numbers',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Name the values as constants.',
  evaluate({ tree }) {
    const seen = new Map<string, StructuralNode>();
    walk(tree, (node, ancestors) => {
      if (node.kind !== NodeKind.LITERAL || node.value === undefined) return;
      const integerPart = /^\d+/.exec(node.value);
      if (!integerPart || integerPart[0].length < 2) return;
      const inConstant = ancestors.some((ancestor) =>
        ancestor.kind === NodeKind.ASSIGNMENT &&
        (ancestor.bindings ?? []).length > 0 &&
        (ancestor.bindings ?? []).every((binding) => CONSTANT_NAME.test(binding)));
      if (inConstant || seen.has(node.value)) return;
      seen.set(node.value, node);
    });
    if (seen.size === 0) return [];
    const [first] = seen.values();
    return [{
      message: `Unnamed numeric literals: ${[...seen.keys()].join(', ')}`,
      span: lineSpan(first.span.startLine),
    }];
  },
};

const todoComments: CodeSmellRule = {
  id: 'todo_comments',
  title: 'Unfinished work marker',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Resolve the note or track it in an issue.',
  evaluate({ scan }) {
    const matches: RuleMatch[] = [];
    for (const comment of scan.comments) {
      const marker = MARKER_COMMENT.exec(comment.text);
      if (!marker) continue;
      matches.push({
        message: `${marker[1]} left in a comment on line ${comment.line}`,
        span: lineSpan(comment.line),
      });
    }
    return matches;
  },
};

const nestedLoops: CodeSmellRule = {
  id: 'nested_loops',
  title: 'Nested loops',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Index the inner collection in a map or set to avoid the quadratic scan.',
  evaluate({ tree }) {
    return collect(tree, NodeKind.LOOP)
      .filter(containsLoop)
      .map((loop) => ({
        message: `Loop on line ${loop.span.startLine} contains another loop`,
        span: loop.span,
      }));
  },
};

const godClass: CodeSmellRule = {
  id: 'god_class',
  title: 'Oversized class',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Split the class by responsibility.',
  evaluate({ tree, config }) {
    const matches: RuleMatch[] = [];
    for (const cls of collect(tree, NodeKind.CLASS)) {
      const methods = cls.children.filter((child) => child.kind === NodeKind.FUNCTION).length;
      if (methods <= config.godClassMethods) continue;
      matches.push({
        message: `Class "${cls.name ?? 'anonymous'}" defines ${methods} methods (limit ${config.godClassMethods})`,
        span: lineSpan(cls.span.startLine),
      });
    }
    return matches;
  },
};

const longLine: CodeSmellRule = {
  id: 'long_line',
  title: 'Long lines',
  category: FindingCategory.CODE_SMELL,
  suggestion: 'Wrap lines to the configured width.',
  evaluate({ scan, config }) {
    const offending: number[] = [];
    let longest = 0;
    scan.lines.forEach((line, index) => {
      if (line.length <= config.maxLineLength) return;
      offending.push(index + 1);
      longest = Math.max(longest, line.length);
    });
    if (offending.length === 0) return [];
    return [{
      message: `${offending.length} line(s) exceed ${config.maxLineLength} characters (longest ${longest})`,
      span: lineSpan(offending[0]),
    }];
  },
};

export const CODE_SMELL_RULES: readonly CodeSmellRule[] = [
  longFunction,
  deepNesting,
  tooManyParameters,
  duplicateCode,
  magicNumbers,
  todoComments,
  nestedLoops,
  godClass,
  longLine,
];
