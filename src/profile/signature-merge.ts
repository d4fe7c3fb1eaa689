import {
  FindingCategory,
  NAMING_CONVENTIONS,
  QUOTE_STYLES,
  type AnalysisHistoryEntry,
  type CategoricalDistribution,
  type DetectedPatterns,
  type Metrics,
  type StyleSignature,
  type UserProfile,
} from '../types';
import { dominantOf } from '../style/distribution';

/** One analysed submission as the profile sees it. */
export interface AnalysisRecord {
  userId: string;
  analysisId: string;
  analyzedAt: Date;
  language: string;
  signature: StyleSignature;
  metrics: Metrics;
  qualityScore: number;
  patterns: DetectedPatterns;
}

/** Mean of `count` earlier values extended by `next`. */
export function runningMean(mean: number, count: number, next: number): number {
  return (mean * count) / (count + 1) + next / (count + 1);
}

/**
 * Mean of two aggregates weighted by how many submissions each measured.
 * An unmeasured side leaves the other unchanged.
 */
export function mergeMeasured(current: number, currentObservations: number, next: number, nextObservations: number): number {
  if (nextObservations === 0) return current;
  if (currentObservations === 0) return next;
  const total = currentObservations + nextObservations;
  return (current * currentObservations) / total + (next * nextObservations) / total;
}

function mergeDistribution<C extends string>(
  current: CategoricalDistribution<C>,
  next: CategoricalDistribution<C>,
  order: readonly C[],
): CategoricalDistribution<C> {
  if (next.observations === 0) return structuredClone(current);
  if (current.observations === 0) return structuredClone(next);

  const distribution: Record<C, number> = { ...current.distribution };
  for (const category of order) {
    distribution[category] = mergeMeasured(
      current.distribution[category],
      current.observations,
      next.distribution[category],
      next.observations,
    );
  }
  // The established dominant keeps its place when shares tie.
  const preferred = current.dominant === null ? order : [current.dominant, ...order.filter((c) => c !== current.dominant)];
  return {
    distribution,
    dominant: dominantOf(distribution, preferred),
    samples: current.samples + next.samples,
    observations: current.observations + next.observations,
  };
}

/**
 * Folds one more signature into an aggregate built from `count` earlier
 * ones. Each field becomes the mean over the submissions that measured it;
 * trailing whitespace is measured on every submission.
 */
export function mergeSignature(current: StyleSignature, next: StyleSignature, count: number): StyleSignature {
  const indent = current.indentation;
  const spacing = current.spacing;
  return {
    naming: mergeDistribution(current.naming, next.naming, NAMING_CONVENTIONS),
    indentation: {
      unitWidth: mergeMeasured(indent.unitWidth, indent.observations, next.indentation.unitWidth, next.indentation.observations),
      consistencyRatio: mergeMeasured(
        indent.consistencyRatio,
        indent.observations,
        next.indentation.consistencyRatio,
        next.indentation.observations,
      ),
      observations: indent.observations + next.indentation.observations,
    },
    quoteStyle: mergeDistribution(current.quoteStyle, next.quoteStyle, QUOTE_STYLES),
    spacing: {
      avgBlankLinesBetweenDefs: mergeMeasured(
        spacing.avgBlankLinesBetweenDefs,
        spacing.blankLineObservations,
        next.spacing.avgBlankLinesBetweenDefs,
        next.spacing.blankLineObservations,
      ),
      blankLineObservations: spacing.blankLineObservations + next.spacing.blankLineObservations,
      trailingWhitespaceRate: runningMean(spacing.trailingWhitespaceRate, count, next.spacing.trailingWhitespaceRate),
    },
  };
}

/** Plurality language; on a tie the language seen first wins. */
export function favoriteLanguageOf(languageCounts: Record<string, number>): string {
  let favorite = '';
  let best = 0;
  for (const [language, count] of Object.entries(languageCounts)) {
    if (count > best) {
      favorite = language;
      best = count;
    }
  }
  return favorite;
}

function countFindings(patterns: DetectedPatterns): Record<FindingCategory, number> {
  return {
    [FindingCategory.BUG_PATTERN]: patterns.bugPatterns.length,
    [FindingCategory.CODE_SMELL]: patterns.codeSmells.length,
    [FindingCategory.SECURITY_ISSUE]: patterns.securityIssues.length,
  };
}

function incrementCounts(counts: Record<string, number>, keys: readonly string[]): Record<string, number> {
  const next = { ...counts };
  for (const key of keys) {
    next[key] = (Object.hasOwn(next, key) ? next[key] : 0) + 1;
  }
  return next;
}

/**
 * Profile after one more analysis. A missing profile is created from the
 * record alone. Does not mutate `previous`.
 */
export function applyAnalysis(
  previous: UserProfile | undefined,
  record: AnalysisRecord,
  historyLimit: number,
): UserProfile {
  const timestamp = record.analyzedAt.toISOString();
  const entry: AnalysisHistoryEntry = {
    id: record.analysisId,
    analyzedAt: timestamp,
    language: record.language,
    linesOfCode: record.metrics.linesOfCode,
    qualityScore: record.qualityScore,
    findingCounts: countFindings(record.patterns),
  };
  const findingTypes = [
    ...record.patterns.bugPatterns,
    ...record.patterns.codeSmells,
    ...record.patterns.securityIssues,
  ].map((finding) => finding.type);

  const count = previous?.totalAnalyses ?? 0;
  const languageCounts = incrementCounts(previous?.languageCounts ?? {}, [record.language]);

  return {
    userId: record.userId,
    style: previous ? mergeSignature(previous.style, record.signature, count) : structuredClone(record.signature),
    totalAnalyses: count + 1,
    totalLines: (previous?.totalLines ?? 0) + record.metrics.linesOfCode,
    cumulativeQualitySum: (previous?.cumulativeQualitySum ?? 0) + record.qualityScore,
    favoriteLanguage: favoriteLanguageOf(languageCounts),
    languageCounts,
    findingTypeCounts: incrementCounts(previous?.findingTypeCounts ?? {}, findingTypes),
    history: [entry, ...(previous?.history ?? [])].slice(0, Math.max(0, historyLimit)),
    createdAt: previous?.createdAt ?? timestamp,
    updatedAt: timestamp,
  };
}
