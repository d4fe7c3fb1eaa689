import { Severity, type DetectedPatterns } from '../types';

export const QUALITY_PENALTIES = {
  errorBug: 10,
  warningBug: 5,
  securityIssue: 10,
  otherFinding: 2,
} as const;

/** Complexity bands, checked from the highest threshold down. */
export const COMPLEXITY_PENALTIES: readonly { above: number; penalty: number }[] = [
  { above: 20, penalty: 15 },
  { above: 10, penalty: 10 },
  { above: 5, penalty: 5 },
];

/**
 * Integer score in [0, 100]. Security issues cost as much as error-level
 * bug patterns; info bug patterns and code smells cost the flat rate.
 */
export function computeQualityScore(patterns: DetectedPatterns, complexity: number): number {
  let score = 100;
  for (const bug of patterns.bugPatterns) {
    if (bug.severity === Severity.ERROR) score -= QUALITY_PENALTIES.errorBug;
    else if (bug.severity === Severity.WARNING) score -= QUALITY_PENALTIES.warningBug;
    else score -= QUALITY_PENALTIES.otherFinding;
  }
  score -= patterns.securityIssues.length * QUALITY_PENALTIES.securityIssue;
  score -= patterns.codeSmells.length * QUALITY_PENALTIES.otherFinding;

  const band = COMPLEXITY_PENALTIES.find((entry) => complexity > entry.above);
  if (band) score -= band.penalty;

  return Math.round(Math.min(100, Math.max(0, score)));
}
