import { Priority, RecommendationSource, Severity } from '../../src/types';
import { humanizeRuleId, RecommendationEngine } from '../../src/recommend/recommendation-engine';
import { applyAnalysis } from '../../src/profile/signature-merge';
import { bug, emptyPatterns, makeMetrics, makeRecord, makeSignature, securityIssue } from '../helpers';

describe('RecommendationEngine', () => {
  const engine = new RecommendationEngine();

  describe('findings', () => {
    it('should group findings by type and rank security first', () => {
      const patterns = {
        ...emptyPatterns(),
        bugPatterns: [bug('loose_equality', Severity.WARNING, 2), bug('loose_equality', Severity.WARNING, 5)],
        securityIssues: [securityIssue('weak_hash', 7)],
      };
      const recommendations = engine.recommend(makeMetrics(), patterns, null, makeSignature());

      expect(recommendations).toEqual([
        {
          title: 'Weak hash',
          description: 'Fix weak_hash',
          confidence: 0.6,
          priority: Priority.HIGH,
          tags: ['security_issue', 'weak_hash'],
          source: RecommendationSource.FINDING,
          lineStart: 7,
          lineEnd: 7,
        },
        {
          title: 'Loose equality',
          description: 'loose_equality on line 2 (2 occurrences)',
          confidence: 0.7,
          priority: Priority.MEDIUM,
          tags: ['bug_pattern', 'loose_equality'],
          source: RecommendationSource.FINDING,
          lineStart: 2,
          lineEnd: 2,
        },
      ]);
    });

    it('should use registered rule titles when known', () => {
      const titled = new RecommendationEngine(undefined, new Map([['weak_hash', 'Weak hash algorithm']]));
      const patterns = { ...emptyPatterns(), securityIssues: [securityIssue('weak_hash')] };

      expect(titled.recommend(makeMetrics(), patterns, null, makeSignature())[0].title).toBe('Weak hash algorithm');
    });

    it('should map bug severity to priority', () => {
      const patterns = {
        ...emptyPatterns(),
        bugPatterns: [bug('unused_import', Severity.INFO), bug('identity_comparison', Severity.ERROR)],
      };
      const recommendations = engine.recommend(makeMetrics(), patterns, null, makeSignature());

      expect(recommendations.map((r) => [r.title, r.priority])).toEqual([
        ['Identity comparison', Priority.HIGH],
        ['Unused import', Priority.LOW],
      ]);
    });
  });

  describe('metrics', () => {
    it('should recommend reducing complexity above the ceiling', () => {
      const moderate = engine.recommend(makeMetrics({ complexity: 14 }), emptyPatterns(), null, makeSignature());
      const severe = engine.recommend(makeMetrics({ complexity: 25 }), emptyPatterns(), null, makeSignature());

      expect(moderate).toEqual([
        {
          title: 'Reduce complexity',
          description: 'Cyclomatic complexity is 14, above 10. Split branching logic into smaller functions.',
          confidence: 0.7,
          priority: Priority.MEDIUM,
          tags: ['metrics', 'complexity'],
          source: RecommendationSource.METRIC,
        },
      ]);
      expect(severe[0]).toMatchObject({ priority: Priority.HIGH, confidence: 1 });
    });

    it('should recommend documentation below the floor', () => {
      const metrics = makeMetrics({ numFunctions: 5, docstringCoverage: 0.2 });
      const [recommendation] = engine.recommend(metrics, emptyPatterns(), null, makeSignature());

      expect(recommendation).toMatchObject({
        title: 'Document functions and classes',
        description: '20% of functions and classes are documented.',
        confidence: 0.8,
        priority: Priority.LOW,
      });
    });

    it('should not ask for documentation without definitions', () => {
      const metrics = makeMetrics({ numFunctions: 0, numClasses: 0, docstringCoverage: 0 });

      expect(engine.recommend(metrics, emptyPatterns(), null, makeSignature())).toEqual([]);
    });

    it('should recommend trimming many imports', () => {
      const [recommendation] = engine.recommend(makeMetrics({ numImports: 12 }), emptyPatterns(), null, makeSignature());

      expect(recommendation).toMatchObject({ title: 'Trim imports', confidence: 0.6, priority: Priority.LOW });
    });
  });

  describe('style', () => {
    const usual = makeSignature({
      naming: {
        distribution: { snake_case: 1, camelCase: 0, PascalCase: 0, mixed: 0 },
        dominant: 'snake_case',
        samples: 4,
        observations: 1,
      },
    });
    const profile = applyAnalysis(undefined, makeRecord({ signature: usual }), 20);

    it('should report naming that departs from the profile', () => {
      const current = makeSignature({
        naming: {
          distribution: { snake_case: 0, camelCase: 1, PascalCase: 0, mixed: 0 },
          dominant: 'camelCase',
          samples: 3,
          observations: 1,
        },
      });

      expect(engine.recommend(makeMetrics(), emptyPatterns(), profile, current)).toEqual([
        {
          title: 'Naming differs from your usual style',
          description: 'Most names here are camelCase; your earlier code mostly uses snake_case.',
          confidence: 1,
          priority: Priority.MEDIUM,
          tags: ['style', 'naming'],
          source: RecommendationSource.STYLE,
        },
      ]);
    });

    it('should report a different indentation width', () => {
      const current = makeSignature({ indentation: { unitWidth: 2, consistencyRatio: 1, observations: 1 } });
      const recommendations = engine.recommend(makeMetrics(), emptyPatterns(), profile, current);

      expect(recommendations).toEqual([
        {
          title: 'Indentation width differs from your usual style',
          description: 'This code indents by 2; your earlier code averages 4.',
          confidence: 0.5,
          priority: Priority.LOW,
          tags: ['style', 'indentation'],
          source: RecommendationSource.STYLE,
        },
      ]);
    });

    it('should stay quiet within tolerance', () => {
      const current = makeSignature({
        naming: {
          distribution: { snake_case: 0.8, camelCase: 0.2, PascalCase: 0, mixed: 0 },
          dominant: 'snake_case',
          samples: 5,
          observations: 1,
        },
      });

      expect(engine.recommend(makeMetrics(), emptyPatterns(), profile, current)).toEqual([]);
    });

    it('should report trailing whitespace and inconsistent indentation', () => {
      const current = makeSignature({
        indentation: { unitWidth: 4, consistencyRatio: 0.5, observations: 1 },
        spacing: { avgBlankLinesBetweenDefs: 0, blankLineObservations: 0, trailingWhitespaceRate: 0.4 },
      });
      const recommendations = engine.recommend(makeMetrics(), emptyPatterns(), profile, current);

      expect(recommendations.map((r) => [r.title, r.confidence, r.priority])).toEqual([
        ['Indentation is less consistent than usual', 0.5, Priority.LOW],
        ['More trailing whitespace than usual', 0.4, Priority.LOW],
      ]);
    });

    it('should skip style recommendations without a profile', () => {
      const current = makeSignature({ indentation: { unitWidth: 2, consistencyRatio: 1, observations: 1 } });

      expect(engine.recommend(makeMetrics(), emptyPatterns(), null, current)).toEqual([]);
    });
  });

  describe('ordering and summary', () => {
    it('should order by priority, then confidence, and be deterministic', () => {
      const patterns = {
        ...emptyPatterns(),
        bugPatterns: [bug('unused_import', Severity.INFO)],
        securityIssues: [securityIssue('weak_hash')],
      };
      const metrics = makeMetrics({ complexity: 14, numFunctions: 2, docstringCoverage: 0 });
      const first = engine.recommend(metrics, patterns, null, makeSignature());
      const second = engine.recommend(metrics, patterns, null, makeSignature());

      expect(first.map((r) => r.title)).toEqual([
        'Weak hash',
        'Reduce complexity',
        'Document functions and classes',
        'Unused import',
      ]);
      expect(second).toEqual(first);
    });

    it('should count recommendations by priority and tag', () => {
      const patterns = { ...emptyPatterns(), securityIssues: [securityIssue('weak_hash')] };
      const recommendations = engine.recommend(makeMetrics({ numImports: 12 }), patterns, null, makeSignature());

      expect(engine.summarize(recommendations, 1)).toEqual({
        total: 2,
        byPriority: { high: 1, medium: 0, low: 1 },
        byTag: { security_issue: 1, weak_hash: 1, metrics: 1, imports: 1 },
        top: [{ title: 'Weak hash', description: 'Fix weak_hash', priority: Priority.HIGH }],
      });
    });
  });

  it('should humanize rule ids', () => {
    expect(humanizeRuleId('mutable_default_argument')).toBe('Mutable default argument');
    expect(humanizeRuleId('')).toBe('');
  });
});
