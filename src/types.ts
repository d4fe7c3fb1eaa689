/**
 * Core type definitions for the Stylewise analysis engine.
 * These types define the contracts between all pipeline stages.
 */

// ─── Submission ──────────────────────────────────────────────────────────────

export interface CodeSubmission {
  readonly rawText: string;
  readonly declaredLanguage: string;
  readonly userId: string | null;
  readonly timestamp: Date;
}

// ─── Structural Tree ─────────────────────────────────────────────────────────

export enum NodeKind {
  MODULE = 'module',
  FUNCTION = 'function',
  CLASS = 'class',
  LOOP = 'loop',
  CONDITIONAL = 'conditional',
  IMPORT = 'import',
  CALL = 'call',
  LITERAL = 'literal',
  RETURN = 'return',
  RAISE = 'raise',
  JUMP = 'jump',
  TRY = 'try',
  HANDLER = 'handler',
  COMPARISON = 'comparison',
  BOOLEAN_OP = 'boolean_op',
  ASSIGNMENT = 'assignment',
  STATEMENT = 'statement',
  BLOCK = 'block',
}

export interface SourceSpan {
  startLine: number;
  endLine: number;
}

export interface ParameterInfo {
  name: string;
  defaultValue?: string;
}

export interface StructuralNode {
  kind: NodeKind;
  span: SourceSpan;
  /** Declared or referenced name: function, class, variable, import, callee. */
  name?: string;
  /** Header text of the construct (first line, trimmed, strings kept). */
  text?: string;
  params?: ParameterInfo[];
  documented?: boolean;
  /** Comparison or boolean operator, or the jump keyword. */
  operator?: string;
  /** Raw operand text for comparisons. */
  operands?: string[];
  /** Raw literal text. */
  value?: string;
  /** Imported binding names. */
  bindings?: string[];
  children: StructuralNode[];
}

export enum ParseMode {
  GRAMMAR = 'grammar',
  HEURISTIC = 'heuristic',
}

export interface Metrics {
  linesOfCode: number;
  numFunctions: number;
  numClasses: number;
  numImports: number;
  complexity: number;
  maxLineLength: number;
  numComments: number;
  /** Ratio in [0,1] of documented function/class nodes. */
  docstringCoverage: number;
}

export interface ParseResult {
  tree: StructuralNode;
  metrics: Metrics;
  mode: ParseMode;
  language: string;
  /** Why the grammar parser was not used, when it was not. */
  degradedReason?: string;
}

// ─── Style ───────────────────────────────────────────────────────────────────

export type NamingConvention = 'snake_case' | 'camelCase' | 'PascalCase' | 'mixed';
export type QuoteStyle = 'single' | 'double' | 'mixed';

export const NAMING_CONVENTIONS: readonly NamingConvention[] = ['snake_case', 'camelCase', 'PascalCase', 'mixed'];
export const QUOTE_STYLES: readonly QuoteStyle[] = ['single', 'double', 'mixed'];

export interface CategoricalDistribution<C extends string> {
  distribution: Record<C, number>;
  dominant: C | null;
  samples: number;
  /** Submissions that had at least one sample; 0 or 1 for a single signature. */
  observations: number;
}

export interface IndentationStyle {
  /** 0 when nothing was indented. */
  unitWidth: number;
  consistencyRatio: number;
  /** Submissions in which an indentation step was measured. */
  observations: number;
}

export interface SpacingStyle {
  avgBlankLinesBetweenDefs: number;
  /** Submissions with two or more top-level definitions to measure gaps between. */
  blankLineObservations: number;
  trailingWhitespaceRate: number;
}

export interface StyleSignature {
  naming: CategoricalDistribution<NamingConvention>;
  indentation: IndentationStyle;
  quoteStyle: CategoricalDistribution<QuoteStyle>;
  spacing: SpacingStyle;
}

// ─── Findings ────────────────────────────────────────────────────────────────

export enum FindingCategory {
  BUG_PATTERN = 'bug_pattern',
  CODE_SMELL = 'code_smell',
  SECURITY_ISSUE = 'security_issue',
}

export enum Severity {
  ERROR = 'error',
  WARNING = 'warning',
  INFO = 'info',
}

interface FindingBase {
  /** Rule identifier. */
  type: string;
  message: string;
  span?: SourceSpan;
}

export interface BugPatternFinding extends FindingBase {
  category: FindingCategory.BUG_PATTERN;
  severity: Severity;
}

export interface CodeSmellFinding extends FindingBase {
  category: FindingCategory.CODE_SMELL;
  suggestion: string;
}

export interface SecurityIssueFinding extends FindingBase {
  category: FindingCategory.SECURITY_ISSUE;
  suggestion: string;
}

export type Finding = BugPatternFinding | CodeSmellFinding | SecurityIssueFinding;

export interface DetectedPatterns {
  bugPatterns: BugPatternFinding[];
  codeSmells: CodeSmellFinding[];
  securityIssues: SecurityIssueFinding[];
}

// ─── Profile ─────────────────────────────────────────────────────────────────

export interface AnalysisHistoryEntry {
  id: string;
  analyzedAt: string;
  language: string;
  linesOfCode: number;
  qualityScore: number;
  findingCounts: Record<FindingCategory, number>;
}

export interface UserProfile {
  userId: string;
  style: StyleSignature;
  totalAnalyses: number;
  totalLines: number;
  cumulativeQualitySum: number;
  favoriteLanguage: string;
  /** Submission count per language, keys in first-seen order. */
  languageCounts: Record<string, number>;
  /** Occurrence count per finding type across all submissions. */
  findingTypeCounts: Record<string, number>;
  history: AnalysisHistoryEntry[];
  createdAt: string;
  updatedAt: string;
}

export interface ProfileStatistics {
  userId: string;
  totalAnalyses: number;
  totalLines: number;
  averageQualityScore: number;
  favoriteLanguage: string;
  languages: Record<string, number>;
  topFindingTypes: { type: string; count: number }[];
  lastAnalyzedAt: string | null;
}

// ─── Recommendations ─────────────────────────────────────────────────────────

export enum Priority {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
}

export enum RecommendationSource {
  FINDING = 'finding',
  STYLE = 'style',
  METRIC = 'metric',
}

export interface Recommendation {
  title: string;
  description: string;
  confidence: number;
  priority: Priority;
  tags: string[];
  source: RecommendationSource;
  lineStart?: number;
  lineEnd?: number;
}

export interface RecommendationSummary {
  total: number;
  byPriority: Record<Priority, number>;
  byTag: Record<string, number>;
  top: Pick<Recommendation, 'title' | 'description' | 'priority'>[];
}

// ─── Analysis Result ─────────────────────────────────────────────────────────

export enum NoticeCode {
  PARSE_DEGRADED = 'parse_degraded',
  RULE_EVALUATION_SKIPPED = 'rule_evaluation_skipped',
  PROFILE_STORE_UNAVAILABLE = 'profile_store_unavailable',
}

export interface AnalysisNotice {
  code: NoticeCode;
  message: string;
  ruleId?: string;
}

export interface AnalysisResult {
  id: string;
  language: string;
  parseMode: ParseMode;
  metrics: Metrics;
  issues: BugPatternFinding[];
  patterns: DetectedPatterns;
  stylePatterns: StyleSignature;
  recommendations: Recommendation[];
  summary: RecommendationSummary;
  qualityScore: number;
  /** True when personalization was skipped because the profile store failed. */
  degraded: boolean;
  notices: AnalysisNotice[];
  profile: UserProfile | null;
}
