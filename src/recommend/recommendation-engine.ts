import {
  FindingCategory,
  Priority,
  RecommendationSource,
  Severity,
  type CategoricalDistribution,
  type DetectedPatterns,
  type Finding,
  type Metrics,
  type Recommendation,
  type RecommendationSummary,
  type StyleSignature,
  type UserProfile,
} from '../types';
import { getDefaultConfig, type RecommendationConfig } from '../utils/config';

const PRIORITY_RANK: Record<Priority, number> = {
  [Priority.HIGH]: 0,
  [Priority.MEDIUM]: 1,
  [Priority.LOW]: 2,
};

/** Confidence at or above which a style recommendation is raised to medium priority. */
const STYLE_MEDIUM_CONFIDENCE = 0.75;
const IMPORTS_CONFIDENCE = 0.6;
const SEVERE_COMPLEXITY = 20;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function clampConfidence(value: number): number {
  return round2(Math.min(1, Math.max(0, value)));
}

/** `mutable_default_argument` → `Mutable default argument` */
export function humanizeRuleId(id: string): string {
  const words = id.replace(/_/g, ' ').trim();
  return words.length === 0 ? id : words[0].toUpperCase() + words.slice(1);
}

function findingPriority(finding: Finding): Priority {
  switch (finding.category) {
    case FindingCategory.SECURITY_ISSUE:
      return Priority.HIGH;
    case FindingCategory.CODE_SMELL:
      return Priority.MEDIUM;
    case FindingCategory.BUG_PATTERN:
      if (finding.severity === Severity.ERROR) return Priority.HIGH;
      return finding.severity === Severity.WARNING ? Priority.MEDIUM : Priority.LOW;
  }
}

function stylePriority(confidence: number): Priority {
  return confidence >= STYLE_MEDIUM_CONFIDENCE ? Priority.MEDIUM : Priority.LOW;
}

/**
 * Turns findings, metrics and the style delta against the user's profile
 * into one ranked list. Pure: identical inputs give identical output.
 */
export class RecommendationEngine {
  constructor(
    private readonly config: RecommendationConfig = getDefaultConfig().recommendation,
    private readonly ruleTitles: ReadonlyMap<string, string> = new Map(),
  ) {}

  recommend(
    metrics: Metrics,
    patterns: DetectedPatterns,
    profile: UserProfile | null,
    signature: StyleSignature,
  ): Recommendation[] {
    const generated = [
      ...this.fromFindings(patterns),
      ...(profile ? this.fromStyle(profile.style, signature) : []),
      ...this.fromMetrics(metrics),
    ];
    // Array.prototype.sort is stable, so equal keys keep generation order.
    return generated.sort(
      (a, b) => PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || b.confidence - a.confidence,
    );
  }

  summarize(recommendations: readonly Recommendation[], topN: number = this.config.summaryTopN): RecommendationSummary {
    const byPriority: Record<Priority, number> = {
      [Priority.HIGH]: 0,
      [Priority.MEDIUM]: 0,
      [Priority.LOW]: 0,
    };
    const byTag: Record<string, number> = {};
    for (const recommendation of recommendations) {
      byPriority[recommendation.priority] += 1;
      for (const tag of recommendation.tags) {
        byTag[tag] = (Object.hasOwn(byTag, tag) ? byTag[tag] : 0) + 1;
      }
    }
    return {
      total: recommendations.length,
      byPriority,
      byTag,
      top: recommendations.slice(0, Math.max(0, topN)).map(({ title, description, priority }) => ({
        title,
        description,
        priority,
      })),
    };
  }

  // ─── Finding recommendations ─────────────────────────────────────────────

  private fromFindings(patterns: DetectedPatterns): Recommendation[] {
    const groups = new Map<string, Finding[]>();
    const findings: Finding[] = [...patterns.bugPatterns, ...patterns.codeSmells, ...patterns.securityIssues];
    for (const finding of findings) {
      const key = `${finding.category}:${finding.type}`;
      const group = groups.get(key);
      if (group) group.push(finding);
      else groups.set(key, [finding]);
    }

    return Array.from(groups.values()).map((group) => {
      const first = group[0];
      const occurrences = group.length > 1 ? ` (${group.length} occurrences)` : '';
      const detail = first.category === FindingCategory.BUG_PATTERN ? first.message : first.suggestion;
      return {
        title: this.ruleTitles.get(first.type) ?? humanizeRuleId(first.type),
        description: `${detail}${occurrences}`,
        confidence: clampConfidence(0.5 + 0.1 * group.length),
        priority: findingPriority(first),
        tags: [first.category, first.type],
        source: RecommendationSource.FINDING,
        lineStart: first.span?.startLine,
        lineEnd: first.span?.endLine,
      };
    });
  }

  // ─── Style recommendations ───────────────────────────────────────────────

  private fromStyle(usual: StyleSignature, current: StyleSignature): Recommendation[] {
    const recommendations: Recommendation[] = [];
    const push = (title: string, description: string, divergence: number, aspect: string): void => {
      const confidence = clampConfidence(divergence);
      recommendations.push({
        title,
        description,
        confidence,
        priority: stylePriority(confidence),
        tags: ['style', aspect],
        source: RecommendationSource.STYLE,
      });
    };

    const naming = this.categoricalDivergence(usual.naming, current.naming);
    if (naming) {
      push(
        'Naming differs from your usual style',
        `Most names here are ${naming.current}; your earlier code mostly uses ${naming.usual}.`,
        naming.divergence,
        'naming',
      );
    }

    const quotes = this.categoricalDivergence(usual.quoteStyle, current.quoteStyle);
    if (quotes) {
      push(
        'Quote style differs from your usual style',
        `Strings here mostly use ${quotes.current} quotes; your earlier code mostly uses ${quotes.usual} quotes.`,
        quotes.divergence,
        'quotes',
      );
    }

    const indentationMeasured = usual.indentation.observations > 0 && current.indentation.observations > 0;
    const usualWidth = usual.indentation.unitWidth;
    const currentWidth = current.indentation.unitWidth;
    if (indentationMeasured && usualWidth > 0 && currentWidth > 0) {
      const relative = Math.abs(currentWidth - usualWidth) / usualWidth;
      if (relative > this.config.styleTolerance) {
        push(
          'Indentation width differs from your usual style',
          `This code indents by ${currentWidth}; your earlier code averages ${round2(usualWidth)}.`,
          relative,
          'indentation',
        );
      }
    }

    const consistencyDrop = usual.indentation.consistencyRatio - current.indentation.consistencyRatio;
    if (indentationMeasured && consistencyDrop > this.config.consistencyTolerance) {
      push(
        'Indentation is less consistent than usual',
        `${Math.round(current.indentation.consistencyRatio * 100)}% of indented blocks use the same step, ` +
          `against ${Math.round(usual.indentation.consistencyRatio * 100)}% in your earlier code.`,
        consistencyDrop,
        'indentation',
      );
    }

    const trailingIncrease = current.spacing.trailingWhitespaceRate - usual.spacing.trailingWhitespaceRate;
    if (trailingIncrease > this.config.trailingWhitespaceTolerance) {
      push(
        'More trailing whitespace than usual',
        `${Math.round(current.spacing.trailingWhitespaceRate * 100)}% of lines end in whitespace.`,
        trailingIncrease,
        'whitespace',
      );
    }

    return recommendations;
  }

  /**
   * How far the submission strays from the profile's dominant category:
   * the share of its samples outside that category. Null when either side
   * has no dominant category, they agree, or the gap is within tolerance.
   */
  private categoricalDivergence<C extends string>(
    usual: CategoricalDistribution<C>,
    current: CategoricalDistribution<C>,
  ): { usual: C; current: C; divergence: number } | null {
    if (usual.dominant === null || current.dominant === null || usual.dominant === current.dominant) return null;
    const divergence = 1 - current.distribution[usual.dominant];
    if (divergence <= this.config.styleTolerance) return null;
    return { usual: usual.dominant, current: current.dominant, divergence };
  }

  // ─── Metric recommendations ──────────────────────────────────────────────

  private fromMetrics(metrics: Metrics): Recommendation[] {
    const recommendations: Recommendation[] = [];
    const { complexityCeiling, docstringFloor, maxImports } = this.config;

    if (metrics.complexity > complexityCeiling) {
      recommendations.push({
        title: 'Reduce complexity',
        description: `Cyclomatic complexity is ${metrics.complexity}, above ${complexityCeiling}. Split branching logic into smaller functions.`,
        confidence: clampConfidence(0.5 + (metrics.complexity - complexityCeiling) / 20),
        priority: metrics.complexity > SEVERE_COMPLEXITY ? Priority.HIGH : Priority.MEDIUM,
        tags: ['metrics', 'complexity'],
        source: RecommendationSource.METRIC,
      });
    }

    const definitions = metrics.numFunctions + metrics.numClasses;
    if (definitions > 0 && metrics.docstringCoverage < docstringFloor) {
      recommendations.push({
        title: 'Document functions and classes',
        description: `${Math.round(metrics.docstringCoverage * 100)}% of functions and classes are documented.`,
        confidence: clampConfidence(0.5 + docstringFloor - metrics.docstringCoverage),
        priority: Priority.LOW,
        tags: ['metrics', 'documentation'],
        source: RecommendationSource.METRIC,
      });
    }

    if (metrics.numImports > maxImports) {
      recommendations.push({
        title: 'Trim imports',
        description: `${metrics.numImports} imports suggest the module has too many responsibilities.`,
        confidence: IMPORTS_CONFIDENCE,
        priority: Priority.LOW,
        tags: ['metrics', 'imports'],
        source: RecommendationSource.METRIC,
      });
    }

    return recommendations;
  }
}
