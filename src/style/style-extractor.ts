import {
  NodeKind,
  type NamingConvention,
  type QuoteStyle,
  type StructuralNode,
  type StyleSignature,
  type IndentationStyle,
  type SpacingStyle,
} from '../types';
import { getSyntax, type LanguageSyntax } from '../parser/languages';
import { buildLogicalLines, scanSource, type ScanResult } from '../parser/lexer';
import { walk } from '../parser/tree';
import { buildDistribution, EMPTY_NAMING, EMPTY_QUOTES } from './distribution';

// ─── Identifier classification ──────────────────────────────────────────────

const SNAKE_CASE = /^[a-z][a-z0-9]*(?:_[a-z0-9]+)+$/;
const CAMEL_CASE = /^[a-z][a-z0-9]*(?:[A-Z][a-z0-9]*)+$/;
const PASCAL_CASE = /^[A-Z][a-z0-9]*(?:[A-Z][a-z0-9]*)*$/;
const SINGLE_WORD = /^[a-z][a-z0-9]*$/;
const CONSTANT_CASE = /^[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)*$/;
const DUNDER = /^__\w+__$/;

/**
 * Naming convention of one identifier, or null when the identifier cannot
 * tell conventions apart (`total`, `MAX_SIZE`, `__init__`).
 */
export function classifyIdentifier(identifier: string): NamingConvention | null {
  if (DUNDER.test(identifier)) return null;
  const name = identifier.replace(/^[_$]+/, '').replace(/_+$/, '');
  if (name.length === 0 || SINGLE_WORD.test(name) || CONSTANT_CASE.test(name)) return null;
  if (SNAKE_CASE.test(name)) return 'snake_case';
  if (CAMEL_CASE.test(name)) return 'camelCase';
  if (PASCAL_CASE.test(name) && /[a-z]/.test(name)) return 'PascalCase';
  return 'mixed';
}

export function classifyQuote(quote: string, content: string): QuoteStyle {
  if (quote === "'") return content.includes('"') ? 'mixed' : 'single';
  return content.includes("'") ? 'mixed' : 'double';
}

// ─── Extractor ──────────────────────────────────────────────────────────────

/**
 * Quantifies the surface style of one submission. Holds no state between
 * calls: the same tree and text always give the same signature.
 */
export class StyleExtractor {
  extract(tree: StructuralNode, rawText: string, language: string = 'unknown'): StyleSignature {
    const syntax = getSyntax(language);
    const scan = scanSource(rawText, syntax);
    return {
      naming: buildDistribution(EMPTY_NAMING, this.namingTokens(tree)),
      indentation: this.detectIndentation(scan, syntax),
      quoteStyle: buildDistribution(EMPTY_QUOTES, this.quoteTokens(scan, syntax)),
      spacing: this.detectSpacing(tree, scan, syntax),
    };
  }

  private namingTokens(tree: StructuralNode): NamingConvention[] {
    const tokens: NamingConvention[] = [];
    const record = (identifier: string | undefined): void => {
      if (identifier === undefined || identifier === 'constructor') return;
      const convention = classifyIdentifier(identifier);
      if (convention) tokens.push(convention);
    };
    walk(tree, (node) => {
      if (node.kind === NodeKind.FUNCTION || node.kind === NodeKind.CLASS) {
        record(node.name);
      } else if (node.kind === NodeKind.ASSIGNMENT) {
        for (const binding of node.bindings ?? []) record(binding);
      }
    });
    return tokens;
  }

  private detectIndentation(scan: ScanResult, syntax: LanguageSyntax): IndentationStyle {
    const deltas: number[] = [];
    let previous: number | null = null;
    for (const line of buildLogicalLines(scan, syntax)) {
      if (previous !== null && line.indent > previous) deltas.push(line.indent - previous);
      previous = line.indent;
    }
    if (deltas.length === 0) return { unitWidth: 0, consistencyRatio: 1, observations: 0 };

    const counts = new Map<number, number>();
    for (const delta of deltas) counts.set(delta, (counts.get(delta) ?? 0) + 1);
    let unitWidth = deltas[0];
    for (const [delta, count] of counts) {
      if (count > (counts.get(unitWidth) ?? 0)) unitWidth = delta;
    }
    const matching = deltas.filter((delta) => delta === unitWidth).length;
    return { unitWidth, consistencyRatio: matching / deltas.length, observations: 1 };
  }

  private quoteTokens(scan: ScanResult, syntax: LanguageSyntax): QuoteStyle[] {
    if (!syntax.quoteStyleMatters) return [];
    return scan.strings
      .filter((token) => !token.triple && token.quote !== '`')
      .map((token) => classifyQuote(token.quote, token.content));
  }

  private detectSpacing(tree: StructuralNode, scan: ScanResult, syntax: LanguageSyntax): SpacingStyle {
    const lines = scan.lines;
    const trailing = lines.filter((line) => /[ \t]+$/.test(line)).length;
    const trailingWhitespaceRate = lines.length === 0 ? 0 : trailing / lines.length;

    const definitions: StructuralNode[] = [];
    walk(tree, (node, ancestors) => {
      const parent = ancestors[ancestors.length - 1];
      if (
        (node.kind === NodeKind.FUNCTION || node.kind === NodeKind.CLASS) &&
        parent !== undefined &&
        (parent.kind === NodeKind.MODULE || parent.kind === NodeKind.CLASS)
      ) {
        definitions.push(node);
      }
    });
    definitions.sort((a, b) => a.span.startLine - b.span.startLine);
    if (definitions.length < 2) {
      return { avgBlankLinesBetweenDefs: 0, blankLineObservations: 0, trailingWhitespaceRate };
    }

    let blankTotal = 0;
    for (const definition of definitions.slice(1)) {
      blankTotal += this.blankLinesAbove(definition.span.startLine, scan, syntax);
    }
    return {
      avgBlankLinesBetweenDefs: blankTotal / (definitions.length - 1),
      blankLineObservations: 1,
      trailingWhitespaceRate,
    };
  }

  /** Blank lines directly above a definition, looking past its decorators and comments. */
  private blankLinesAbove(startLine: number, scan: ScanResult, syntax: LanguageSyntax): number {
    let line = startLine - 1;
    while (line >= 1) {
      const raw = scan.lines[line - 1].trim();
      const commentOnly = scan.commentLines.has(line) && scan.masked[line - 1].trim().length === 0;
      const decorator = raw.startsWith('@') || (syntax.id === 'csharp' && /^\[.*\]$/.test(raw));
      if (raw.length === 0 || !(commentOnly || decorator)) break;
      line--;
    }
    let blanks = 0;
    while (line >= 1 && scan.lines[line - 1].trim().length === 0) {
      blanks++;
      line--;
    }
    return blanks;
  }
}
