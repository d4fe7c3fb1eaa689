import { NodeKind, ParseMode, type ParameterInfo, type SourceSpan, type StructuralNode } from '../types';
import type { BackendOutcome, ParserBackend } from './backend';
import type { LanguageSyntax } from './languages';
import { buildLogicalLines, type LogicalLine, type ScanResult } from './lexer';
import { createNode, finalizeSpans, statementChildren, walk } from './tree';

const CONTROL_KEYWORDS = new Map<string, NodeKind>([
  ['for', NodeKind.LOOP],
  ['foreach', NodeKind.LOOP],
  ['while', NodeKind.LOOP],
  ['do', NodeKind.LOOP],
  ['loop', NodeKind.LOOP],
  ['until', NodeKind.LOOP],
  ['repeat', NodeKind.LOOP],
  ['if', NodeKind.CONDITIONAL],
  ['elif', NodeKind.CONDITIONAL],
  ['elsif', NodeKind.CONDITIONAL],
  ['unless', NodeKind.CONDITIONAL],
  ['case', NodeKind.CONDITIONAL],
  ['else', NodeKind.BLOCK],
  ['switch', NodeKind.BLOCK],
  ['match', NodeKind.BLOCK],
  ['select', NodeKind.BLOCK],
  ['when', NodeKind.BLOCK],
  ['default', NodeKind.BLOCK],
  ['finally', NodeKind.BLOCK],
  ['ensure', NodeKind.BLOCK],
  ['with', NodeKind.BLOCK],
  ['try', NodeKind.TRY],
  ['begin', NodeKind.TRY],
  ['except', NodeKind.HANDLER],
  ['catch', NodeKind.HANDLER],
  ['rescue', NodeKind.HANDLER],
  ['return', NodeKind.RETURN],
  ['raise', NodeKind.RAISE],
  ['throw', NodeKind.RAISE],
  ['break', NodeKind.JUMP],
  ['continue', NodeKind.JUMP],
]);

/** Words that can precede '(' without being a declaration or call name. */
const RESERVED = new Set([
  'if', 'elif', 'else', 'for', 'foreach', 'while', 'do', 'switch', 'case', 'catch', 'except',
  'return', 'throw', 'raise', 'new', 'sizeof', 'typeof', 'delete', 'await', 'yield', 'with',
  'function', 'def', 'class', 'fn', 'func', 'fun', 'and', 'or', 'not', 'in', 'is', 'lambda',
  'assert', 'until', 'unless', 'using', 'lock', 'synchronized', 'import', 'from', 'super',
]);

const UNCONDITIONAL_KINDS = new Set([NodeKind.RETURN, NodeKind.RAISE, NodeKind.JUMP]);

const NUMBER_PATTERN = /(?<![\w$.])\d+(?:\.\d+)?(?:[eE][+-]?\d+)?(?![\w$.])/g;
const CALL_PATTERN = /(?<![\w$])([A-Za-z_$][\w$]*(?:\s*\.\s*[A-Za-z_$][\w$]*)*)\s*\(/g;
const EQUALITY_OPERATOR = /===|!==|==|!=/g;
const IDENTITY_OPERATOR = /\bis\s+not\b|\bis\b|==|!=/g;
const OPERAND_CHAR = /[\w$.()[\]{}"'`]/;
/** Longest operand text read on either side of a comparison operator. */
const MAX_OPERAND_LENGTH = 256;
const DOCSTRING_PATTERN = /^[rRuUbBfF]{0,2}("""|'''|"|')/;

interface Header {
  masked: string;
  raw: string;
  /** Characters stripped from the front of the logical line. */
  offset: number;
  /** A closing bracket preceded the header (`} else {`). */
  closed: boolean;
}

interface Positioned {
  node: StructuralNode;
  line: number;
  column: number;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Index of the bracket closing the one at `open`, or the text length. */
function matchClose(masked: string, open: number): number {
  let depth = 0;
  for (let i = open; i < masked.length; i++) {
    const ch = masked[i];
    if (ch === '(' || ch === '[' || ch === '{') depth++;
    else if (ch === ')' || ch === ']' || ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return masked.length;
}

function precededByNew(text: string, index: number): boolean {
  let end = index;
  while (end > 0 && /\s/.test(text[end - 1])) end--;
  const start = end - 3;
  return end < index && start >= 0 && text.slice(start, end) === 'new' && (start === 0 || !/[\w$]/.test(text[start - 1]));
}

interface ComparisonMatch {
  operator: string;
  left: [number, number];
  right: [number, number];
}

/**
 * Comparisons found by locating each operator and reading the operands
 * outward from it, so a long run of operand characters is read once.
 */
function findComparisons(text: string, operators: RegExp): ComparisonMatch[] {
  const matches: ComparisonMatch[] = [];
  const scanner = new RegExp(operators.source, 'g');
  let consumed = 0;
  for (let m = scanner.exec(text); m !== null; m = scanner.exec(text)) {
    if (m.index < consumed) continue;
    const floor = Math.max(consumed, m.index - MAX_OPERAND_LENGTH);

    let leftEnd = m.index;
    while (leftEnd > floor && /\s/.test(text[leftEnd - 1])) leftEnd--;
    let leftStart = leftEnd;
    while (leftStart > floor && OPERAND_CHAR.test(text[leftStart - 1])) leftStart--;
    if (leftStart === leftEnd) continue;

    let rightStart = m.index + m[0].length;
    while (rightStart < text.length && /\s/.test(text[rightStart])) rightStart++;
    let rightEnd = rightStart;
    if (text[rightEnd] === '-') rightEnd++;
    const bodyStart = rightEnd;
    const ceiling = Math.min(text.length, bodyStart + MAX_OPERAND_LENGTH);
    while (rightEnd < ceiling && OPERAND_CHAR.test(text[rightEnd])) rightEnd++;
    if (rightEnd === bodyStart) continue;

    matches.push({ operator: m[0].replace(/\s+/g, ' '), left: [leftStart, leftEnd], right: [rightStart, rightEnd] });
    consumed = rightEnd;
  }
  return matches;
}

function trimOperand(operand: string): string {
  let text = operand.trim();
  const count = (ch: string): number => text.split(ch).length - 1;
  while (text.startsWith('(') && count('(') > count(')')) text = text.slice(1);
  while (text.endsWith(')') && count(')') > count('(')) text = text.slice(0, -1);
  return text;
}

/**
 * Builds a structural tree from lines alone: statements come from
 * {@link buildLogicalLines}, nesting from indentation, and node kinds from
 * keyword and declaration patterns of the language registry.
 */
export class HeuristicParser implements ParserBackend {
  readonly mode = ParseMode.HEURISTIC;

  supports(): boolean {
    return true;
  }

  build(_code: string, syntax: LanguageSyntax, scan: ScanResult): BackendOutcome {
    const root = createNode(NodeKind.MODULE, { startLine: 1, endLine: Math.max(1, scan.lines.length) });
    const stack: { node: StructuralNode; indent: number }[] = [{ node: root, indent: -1 }];

    for (const logical of buildLogicalLines(scan, syntax)) {
      const node = this.classify(logical, syntax, scan);
      if (!node) continue;
      while (stack.length > 1 && stack[stack.length - 1].indent >= logical.indent) {
        stack.pop();
      }
      stack[stack.length - 1].node.children.push(node);
      stack.push({ node, indent: logical.indent });
    }

    finalizeSpans(root);
    this.markDocumentation(root, syntax, scan);
    return { ok: true, tree: root };
  }

  // ─── Line classification ─────────────────────────────────────────────────

  private header(logical: LogicalLine, syntax: LanguageSyntax): Header | null {
    let offset = logical.masked.length - logical.masked.trimStart().length;
    let closed = false;
    if (!syntax.indentBlocks) {
      const closer = /^[}\])]+\s*/.exec(logical.masked.slice(offset));
      if (closer) {
        offset += closer[0].length;
        closed = true;
      }
    }
    const masked = logical.masked.slice(offset);
    if (/^[;,)\]}\s]*$/.test(masked)) return null;
    return { masked, raw: logical.raw.slice(offset), offset, closed };
  }

  private classify(logical: LogicalLine, syntax: LanguageSyntax, scan: ScanResult): StructuralNode | null {
    const header = this.header(logical, syntax);
    if (!header) return null;
    const hm = header.masked;
    if (/^@[A-Za-z_][\w.]*/.test(hm)) return null;
    if (syntax.id === 'csharp' && /^\[[A-Za-z][\w.]*(?:\(.*\))?\]\s*$/.test(hm)) return null;
    if (syntax.id === 'ruby' && /^end\b/.test(hm)) return null;

    const span: SourceSpan = { startLine: logical.startLine, endLine: logical.endLine };
    const text = header.raw.split('\n')[0].trim();

    const node =
      this.importNode(hm, syntax, span, text) ??
      this.classNode(hm, syntax, span, text) ??
      this.controlNode(hm, header.closed, syntax, span, text) ??
      this.functionNode(header, syntax, span, text) ??
      this.assignmentNode(hm, syntax, span, text) ??
      createNode(NodeKind.STATEMENT, span, { text });

    const skipCallName = node.kind === NodeKind.FUNCTION || node.kind === NodeKind.CLASS ? node.name : undefined;
    node.children.push(...this.inlineNodes(header, logical, syntax, scan, skipCallName));
    return node;
  }

  private importNode(hm: string, syntax: LanguageSyntax, span: SourceSpan, text: string): StructuralNode | null {
    if (!syntax.importPatterns.some((pattern) => pattern.test(hm))) return null;
    return createNode(NodeKind.IMPORT, span, {
      name: text,
      text,
      bindings: this.importBindings(hm, syntax),
    });
  }

  private importBindings(hm: string, syntax: LanguageSyntax): string[] {
    const flat = hm.replace(/\s+/g, ' ').trim();
    const alias = (part: string): string | null => {
      const trimmed = part.trim();
      if (trimmed.length === 0 || trimmed === '*') return null;
      const renamed = /\bas\s+([A-Za-z_$][\w$]*)$/.exec(trimmed) ?? /:\s*([A-Za-z_$][\w$]*)$/.exec(trimmed);
      if (renamed) return renamed[1];
      const plain = /^([A-Za-z_$][\w$]*)/.exec(trimmed);
      return plain ? plain[1] : null;
    };
    const names = (list: string): string[] =>
      list.split(',').map(alias).filter((name): name is string => name !== null);

    switch (syntax.id) {
      case 'python': {
        const fromImport = /^from\s+[\w.]+\s+import\s+\(?([^)]*)\)?/.exec(flat);
        if (fromImport) return names(fromImport[1]);
        const plainImport = /^import\s+(.+)$/.exec(flat);
        return plainImport ? names(plainImport[1]) : [];
      }
      case 'javascript':
      case 'typescript': {
        const required = /^(?:const|let|var)\s+(\{[^}]*\}|[A-Za-z_$][\w$]*)\s*=/.exec(flat);
        if (required) {
          const target = required[1];
          return target.startsWith('{') ? names(target.slice(1, -1)) : [target];
        }
        const clause = /^import\s+(?:type\s+)?(.+?)\s+from\b/.exec(flat);
        if (!clause) return [];
        const result: string[] = [];
        const namespace = /\*\s*as\s+([A-Za-z_$][\w$]*)/.exec(clause[1]);
        if (namespace) result.push(namespace[1]);
        const braces = /\{([^}]*)\}/.exec(clause[1]);
        if (braces) result.push(...names(braces[1].replace(/\btype\s+/g, '')));
        const defaultImport = /^([A-Za-z_$][\w$]*)\s*(?:,|$)/.exec(clause[1]);
        if (defaultImport) result.unshift(defaultImport[1]);
        return result;
      }
      case 'java':
      case 'kotlin': {
        const imported = /^import\s+(?:static\s+)?([\w.]+)(?:\s+as\s+(\w+))?/.exec(flat);
        if (!imported || flat.includes('*')) return [];
        if (imported[2]) return [imported[2]];
        const segments = imported[1].split('.');
        return [segments[segments.length - 1]];
      }
      default:
        return [];
    }
  }

  private classNode(hm: string, syntax: LanguageSyntax, span: SourceSpan, text: string): StructuralNode | null {
    for (const pattern of syntax.classPatterns) {
      const match = pattern.exec(hm);
      if (match) return createNode(NodeKind.CLASS, span, { name: match[1], text });
    }
    return null;
  }

  private controlNode(
    hm: string,
    closed: boolean,
    syntax: LanguageSyntax,
    span: SourceSpan,
    text: string,
  ): StructuralNode | null {
    const match = /^([A-Za-z_]\w*)(?![\w$])/.exec(hm);
    if (!match) return null;
    const word = match[1];
    const rest = hm.slice(word.length).trimStart();
    // `loop = 1`, `match.group()`: the word is a plain name here
    if (/^[=.,)\]}]/.test(rest) && !rest.startsWith('==')) return null;

    let kind = CONTROL_KEYWORDS.get(word);
    if (kind === undefined) return null;
    if (word === 'begin' && syntax.id !== 'ruby') return null;
    if (word === 'else' && /^if\b/.test(rest)) kind = NodeKind.CONDITIONAL;
    if (word === 'when' && syntax.id === 'ruby') kind = NodeKind.CONDITIONAL;
    if (word === 'while' && closed && hm.trimEnd().endsWith(';')) {
      return createNode(NodeKind.STATEMENT, span, { text });
    }
    if (syntax.id === 'ruby' && UNCONDITIONAL_KINDS.has(kind) && /\s(?:if|unless)\s/.test(hm)) {
      kind = NodeKind.CONDITIONAL;
    }
    return createNode(kind, span, {
      text,
      operator: kind === NodeKind.JUMP ? word : undefined,
    });
  }

  private functionNode(header: Header, syntax: LanguageSyntax, span: SourceSpan, text: string): StructuralNode | null {
    for (const pattern of syntax.functionPatterns) {
      const match = pattern.exec(header.masked);
      if (!match || RESERVED.has(match[1])) continue;
      const name = match[1];
      return createNode(NodeKind.FUNCTION, span, {
        name,
        text,
        params: this.parameters(header, name, syntax),
        documented: false,
      });
    }
    return null;
  }

  private parameters(header: Header, name: string, syntax: LanguageSyntax): ParameterInfo[] {
    const { masked, raw } = header;
    const at = new RegExp(`(?<![\\w$])${escapeRegExp(name)}(?![\\w$])`).exec(masked);
    const from = at ? at.index + name.length : 0;
    const open = masked.indexOf('(', from);
    if (open < 0) {
      const single = /=\s*(?:async\s+)?([A-Za-z_$][\w$]*)\s*=>/.exec(masked);
      return single ? [{ name: single[1] }] : [];
    }
    const close = matchClose(masked, open);
    const region = masked.slice(open + 1, close);
    const regionRaw = raw.slice(open + 1, close);

    const pieces: [number, number][] = [];
    let depth = 0;
    let start = 0;
    for (let i = 0; i < region.length; i++) {
      const ch = region[i];
      if ('([{'.includes(ch) || (ch === '<' && syntax.id !== 'python')) depth++;
      else if (')]}'.includes(ch) || (ch === '>' && syntax.id !== 'python' && region[i - 1] !== '=')) depth = Math.max(0, depth - 1);
      else if (ch === ',' && depth === 0) {
        pieces.push([start, i]);
        start = i + 1;
      }
    }
    pieces.push([start, region.length]);

    const params: ParameterInfo[] = [];
    for (const [s, e] of pieces) {
      const pieceMasked = region.slice(s, e);
      const pieceRaw = regionRaw.slice(s, e);
      const trimmed = pieceRaw.trim();
      if (trimmed.length === 0 || trimmed === '*' || trimmed === '/' || trimmed === 'void') continue;

      const eq = this.topLevelAssign(pieceMasked);
      const left = (eq < 0 ? pieceRaw : pieceRaw.slice(0, eq)).trim();
      const defaultValue = eq < 0 ? undefined : pieceRaw.slice(eq + 1).trim();
      params.push({ name: this.parameterName(left, syntax), defaultValue });
    }
    return params;
  }

  private topLevelAssign(masked: string): number {
    let depth = 0;
    for (let i = 0; i < masked.length; i++) {
      const ch = masked[i];
      if ('([{'.includes(ch)) depth++;
      else if (')]}'.includes(ch)) depth = Math.max(0, depth - 1);
      else if (ch === '=' && depth === 0 && !'=!<>'.includes(masked[i - 1] ?? '') && !'=>'.includes(masked[i + 1] ?? '')) {
        return i;
      }
    }
    return -1;
  }

  private parameterName(left: string, syntax: LanguageSyntax): string {
    if (syntax.paramStyle === 'type-first') {
      const identifiers = left.match(/[A-Za-z_]\w*/g) ?? [];
      return identifiers.length > 0 ? identifiers[identifiers.length - 1] : left;
    }
    const match = /^[\s*&.]*(?:(?:public|private|protected|readonly|override|val|var|mut|ref|out|in)\s+)*\$?([A-Za-z_$][\w$]*)/.exec(left);
    return match ? match[1] : left;
  }

  private assignmentNode(hm: string, syntax: LanguageSyntax, span: SourceSpan, text: string): StructuralNode | null {
    for (const pattern of syntax.assignmentPatterns) {
      const match = pattern.exec(hm);
      if (!match) continue;
      const bindings = match[1].split(',').map((name) => name.trim()).filter((name) => name.length > 0);
      if (bindings.length === 0 || RESERVED.has(bindings[0])) continue;
      return createNode(NodeKind.ASSIGNMENT, span, { name: bindings[0], text, bindings });
    }
    return null;
  }

  // ─── Inline expressions ──────────────────────────────────────────────────

  private inlineNodes(
    header: Header,
    logical: LogicalLine,
    syntax: LanguageSyntax,
    scan: ScanResult,
    skipCallName: string | undefined,
  ): StructuralNode[] {
    const hm = header.masked;
    const hr = header.raw;
    const found: Positioned[] = [];

    const lineBreaks: number[] = [];
    for (let i = hm.indexOf('\n'); i >= 0; i = hm.indexOf('\n', i + 1)) lineBreaks.push(i);
    const position = (offset: number): { line: number; column: number } => {
      let breaks = 0;
      while (breaks < lineBreaks.length && lineBreaks[breaks] < offset) breaks++;
      const column = breaks === 0 ? header.offset + offset : offset - lineBreaks[breaks - 1] - 1;
      return { line: logical.startLine + breaks, column };
    };
    const add = (node: StructuralNode, offset: number): void => {
      const { line, column } = position(offset);
      node.span = { startLine: line, endLine: line };
      found.push({ node, line, column });
    };

    let skipPending = skipCallName;
    const calls = new RegExp(CALL_PATTERN.source, 'g');
    for (let m = calls.exec(hm); m !== null; m = calls.exec(hm)) {
      const name = m[1].replace(/\s+/g, '');
      if (RESERVED.has(name.split('.')[0])) continue;
      if (skipPending !== undefined && name === skipPending) {
        skipPending = undefined;
        continue;
      }
      const open = m.index + m[0].length - 1;
      const close = matchClose(hm, open);
      const node = createNode(NodeKind.CALL, { startLine: 0, endLine: 0 }, {
        name,
        text: hr.slice(m.index, Math.min(close + 1, hr.length)),
        operator: precededByNew(hm, m.index) ? 'new' : undefined,
      });
      add(node, m.index);
    }

    // Blanked string interiors are refilled so a literal reads as one operand.
    const probe = hm.replace(/(["'`])( *)\1/g, (_all, quote: string, gap: string) => quote + 's'.repeat(gap.length) + quote);
    const operators = syntax.id === 'python' ? IDENTITY_OPERATOR : EQUALITY_OPERATOR;
    for (const { operator, left, right } of findComparisons(probe, operators)) {
      const node = createNode(NodeKind.COMPARISON, { startLine: 0, endLine: 0 }, {
        operator,
        operands: [trimOperand(hr.slice(left[0], left[1])), trimOperand(hr.slice(right[0], right[1]))],
      });
      add(node, left[0]);
    }

    const booleans = new RegExp(syntax.booleanOperators.source, 'g');
    for (let m = booleans.exec(hm); m !== null; m = booleans.exec(hm)) {
      add(createNode(NodeKind.BOOLEAN_OP, { startLine: 0, endLine: 0 }, { operator: m[0] }), m.index);
    }

    const numbers = new RegExp(NUMBER_PATTERN.source, 'g');
    for (let m = numbers.exec(hm); m !== null; m = numbers.exec(hm)) {
      add(createNode(NodeKind.LITERAL, { startLine: 0, endLine: 0 }, { value: m[0] }), m.index);
    }

    for (const token of scan.strings) {
      if (token.line < logical.startLine || token.line > logical.endLine) continue;
      found.push({
        node: createNode(NodeKind.LITERAL, { startLine: token.line, endLine: token.endLine }, { value: token.text }),
        line: token.line,
        column: token.column,
      });
    }

    found.sort((a, b) => a.line - b.line || a.column - b.column);
    return found.map((entry) => entry.node);
  }

  // ─── Documentation ───────────────────────────────────────────────────────

  private markDocumentation(root: StructuralNode, syntax: LanguageSyntax, scan: ScanResult): void {
    walk(root, (node) => {
      if (node.kind !== NodeKind.FUNCTION && node.kind !== NodeKind.CLASS) return;
      if (syntax.tripleQuotes) {
        const first = statementChildren(node)[0];
        node.documented = first !== undefined &&
          first.kind === NodeKind.STATEMENT &&
          DOCSTRING_PATTERN.test(first.text ?? '');
      } else {
        node.documented = this.hasLeadingComment(node.span.startLine, scan);
      }
    });
  }

  private hasLeadingComment(line: number, scan: ScanResult): boolean {
    let current = line - 1;
    while (current >= 1) {
      const raw = scan.lines[current - 1].trim();
      if (raw.startsWith('@') || /^\[[A-Za-z][\w.]*(?:\(.*\))?\]$/.test(raw)) {
        current--;
        continue;
      }
      return scan.commentLines.has(current) && scan.masked[current - 1].trim().length === 0;
    }
    return false;
  }
}
