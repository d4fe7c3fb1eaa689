import {
  FindingCategory,
  Severity,
  type BugPatternFinding,
  type CodeSmellFinding,
  type DetectedPatterns,
  type Metrics,
  type SecurityIssueFinding,
  type StyleSignature,
} from '../src/types';
import type { AnalysisRecord } from '../src/profile/signature-merge';

export const PY_MUTABLE_DEFAULT = 'def f(x=[]):\n    x.append(1)\n    return x\n';
export const PY_MUTABLE_DEFAULT_TWO_SPACES = 'def f(x=[]):\n  x.append(1)\n  return x\n';

export function makeSignature(overrides: Partial<StyleSignature> = {}): StyleSignature {
  return {
    naming: {
      distribution: { snake_case: 0, camelCase: 0, PascalCase: 0, mixed: 0 },
      dominant: null,
      samples: 0,
      observations: 0,
    },
    indentation: { unitWidth: 4, consistencyRatio: 1, observations: 1 },
    quoteStyle: {
      distribution: { single: 0, double: 0, mixed: 0 },
      dominant: null,
      samples: 0,
      observations: 0,
    },
    spacing: { avgBlankLinesBetweenDefs: 0, blankLineObservations: 0, trailingWhitespaceRate: 0 },
    ...overrides,
  };
}

export function makeMetrics(overrides: Partial<Metrics> = {}): Metrics {
  return {
    linesOfCode: 10,
    numFunctions: 0,
    numClasses: 0,
    numImports: 0,
    complexity: 1,
    maxLineLength: 40,
    numComments: 0,
    docstringCoverage: 1,
    ...overrides,
  };
}

export function emptyPatterns(): DetectedPatterns {
  return { bugPatterns: [], codeSmells: [], securityIssues: [] };
}

export function bug(type: string, severity: Severity, line = 1): BugPatternFinding {
  return {
    category: FindingCategory.BUG_PATTERN,
    type,
    severity,
    message: `${type} on line ${line}`,
    span: { startLine: line, endLine: line },
  };
}

export function smell(type: string, line = 1): CodeSmellFinding {
  return {
    category: FindingCategory.CODE_SMELL,
    type,
    message: `${type} on line ${line}`,
    suggestion: `Fix ${type}`,
    span: { startLine: line, endLine: line },
  };
}

export function securityIssue(type: string, line = 1): SecurityIssueFinding {
  return {
    category: FindingCategory.SECURITY_ISSUE,
    type,
    message: `${type} on line ${line}`,
    suggestion: `Fix ${type}`,
    span: { startLine: line, endLine: line },
  };
}

export function makeRecord(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    userId: 'alice',
    analysisId: 'analysis-1',
    analyzedAt: new Date('2024-03-01T10:00:00.000Z'),
    language: 'python',
    signature: makeSignature(),
    metrics: makeMetrics(),
    qualityScore: 90,
    patterns: emptyPatterns(),
    ...overrides,
  };
}
