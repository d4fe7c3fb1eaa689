import {
  NodeKind,
  type FindingCategory,
  type Severity,
  type SourceSpan,
  type StructuralNode,
} from '../types';
import type { LanguageSyntax } from '../parser/languages';
import type { ScanResult } from '../parser/lexer';
import type { DetectorConfig } from '../utils/config';

/** Everything a rule may look at for one submission. */
export interface RuleContext {
  readonly tree: StructuralNode;
  readonly rawText: string;
  readonly scan: ScanResult;
  readonly syntax: LanguageSyntax;
  readonly config: DetectorConfig;
}

export interface RuleMatch {
  message: string;
  span?: SourceSpan;
}

interface RuleBase {
  /** Finding type reported for every match. */
  readonly id: string;
  readonly title: string;
  /** Language ids the rule applies to; every language when omitted. */
  readonly languages?: readonly string[];
  evaluate(context: RuleContext): RuleMatch[];
}

export interface BugPatternRule extends RuleBase {
  readonly category: FindingCategory.BUG_PATTERN;
  readonly severity: Severity;
}

export interface CodeSmellRule extends RuleBase {
  readonly category: FindingCategory.CODE_SMELL;
  readonly suggestion: string;
}

export interface SecurityRule extends RuleBase {
  readonly category: FindingCategory.SECURITY_ISSUE;
  readonly suggestion: string;
}

export type PatternRule = BugPatternRule | CodeSmellRule | SecurityRule;

// ─── Helpers shared by the rule catalog ─────────────────────────────────────

export function lineSpan(line: number, endLine: number = line): SourceSpan {
  return { startLine: line, endLine };
}

/** Argument text of a call: everything between its outermost parentheses. */
export function callArguments(callText: string): string {
  const open = callText.indexOf('(');
  const close = callText.lastIndexOf(')');
  if (open < 0) return '';
  return callText.slice(open + 1, close > open ? close : callText.length).trim();
}

export function lastSegment(name: string): string {
  const segments = name.split('.');
  return segments[segments.length - 1];
}

/** Nearest function among the ancestors, if any. */
export function enclosingFunction(ancestors: readonly StructuralNode[]): StructuralNode | undefined {
  for (let i = ancestors.length - 1; i >= 0; i--) {
    if (ancestors[i].kind === NodeKind.FUNCTION) return ancestors[i];
  }
  return undefined;
}

export function isStringLiteral(text: string): boolean {
  return /^[rRuUbBfF]{0,2}["'`]/.test(text.trim());
}

/** A single string literal with no interpolation or concatenation. */
export function isPlainLiteral(text: string): boolean {
  const trimmed = text.trim();
  const match = /^(["'])(.*)\1$/s.exec(trimmed);
  if (match) return !match[2].includes(match[1]);
  const template = /^`([^`]*)`$/s.exec(trimmed);
  return template !== null && !template[1].includes('${');
}

/** Placeholder name for code outside any function. */
export const MODULE_SCOPE = '<module>';
