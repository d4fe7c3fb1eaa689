import { FindingCategory, NoticeCode, ParseMode, Priority, Severity } from '../../src/types';
import { AnalysisEngine } from '../../src/engine/analysis-engine';
import type { PatternRule } from '../../src/detector/rule';
import { createDefaultRules } from '../../src/detector/rules';
import { InMemoryProfileStore, type ProfileStore, type PutResult, type StoredProfile } from '../../src/profile/profile-store';
import { mergeWithDefaults } from '../../src/utils/config';
import { InvalidInputError } from '../../src/utils/errors';
import { PY_MUTABLE_DEFAULT, PY_MUTABLE_DEFAULT_TWO_SPACES } from '../helpers';

const FIXED_NOW = new Date('2024-03-01T10:00:00.000Z');

describe('AnalysisEngine end to end', () => {
  let store: InMemoryProfileStore;
  let engine: AnalysisEngine;

  beforeEach(() => {
    store = new InMemoryProfileStore();
    engine = new AnalysisEngine({ store, clock: () => FIXED_NOW });
  });

  it('should analyze an anonymous Python submission', async () => {
    const result = await engine.analyze(PY_MUTABLE_DEFAULT, 'python');

    expect(result.language).toBe('python');
    expect(result.parseMode).toBe(ParseMode.HEURISTIC);
    expect(result.issues.map((issue) => [issue.type, issue.severity])).toEqual([
      ['mutable_default_argument', Severity.WARNING],
    ]);
    expect(result.metrics.complexity).toBe(1);
    expect(result.notices).toEqual([{ code: NoticeCode.PARSE_DEGRADED, message: 'no grammar available for python' }]);
    expect(result.qualityScore).toBe(95);
    expect(result.degraded).toBe(false);
    expect(result.profile).toBeNull();
    expect(result.recommendations.map((r) => r.title)).toEqual([
      'Mutable default argument',
      'Document functions and classes',
    ]);
    expect(result.summary.total).toBe(2);
    expect(result.summary.byPriority).toEqual({ high: 0, medium: 1, low: 1 });
    expect(store.size).toBe(0);
  });

  it('should compare a submission against the pre-update profile', async () => {
    await engine.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1');
    const second = await engine.analyze(PY_MUTABLE_DEFAULT_TWO_SPACES, 'python', 'u1');

    expect(second.profile?.totalAnalyses).toBe(2);
    expect(second.profile?.style.indentation.unitWidth).toBe(3);
    expect(second.recommendations.map((r) => r.title)).toEqual([
      'Mutable default argument',
      'Document functions and classes',
      'Indentation width differs from your usual style',
    ]);
    const indentation = second.recommendations[2];
    expect(indentation.confidence).toBe(0.5);
    expect(indentation.priority).toBe(Priority.LOW);
    expect(indentation.description).toBe('This code indents by 2; your earlier code averages 4.');
  });

  it('should not recommend style changes on a first analysis', async () => {
    const first = await engine.analyze(PY_MUTABLE_DEFAULT_TWO_SPACES, 'python', 'u1');

    expect(first.profile?.totalAnalyses).toBe(1);
    expect(first.recommendations.some((r) => r.tags.includes('style'))).toBe(false);
  });

  it('should count every concurrent analysis for one user', async () => {
    await Promise.all(Array.from({ length: 20 }, () => engine.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1')));

    const stats = await engine.getStatistics('u1');
    expect(stats?.totalAnalyses).toBe(20);
    expect(stats?.totalLines).toBe(60);
    expect(await engine.getHistory('u1', 5)).toHaveLength(5);
  });

  it('should count concurrent analyses beyond the update retry budget', async () => {
    const results = await Promise.all(
      Array.from({ length: 80 }, () => engine.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1')),
    );

    expect(results.filter((result) => result.degraded)).toEqual([]);
    expect((await engine.getStatistics('u1'))?.totalAnalyses).toBe(80);
  });

  it('should keep the usual indentation after a submission without indented blocks', async () => {
    await engine.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1');
    await engine.analyze('total_count = 1\n', 'python', 'u1');
    const third = await engine.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1');

    expect(third.profile?.style.indentation).toEqual({ unitWidth: 4, consistencyRatio: 1, observations: 2 });
    expect(third.recommendations.map((r) => r.title)).toEqual([
      'Mutable default argument',
      'Document functions and classes',
    ]);
  });

  it('should degrade when the profile store does not answer', async () => {
    const hanging: ProfileStore = {
      getProfile: () => new Promise<StoredProfile | undefined>(() => undefined),
      putProfile: () => new Promise<PutResult>(() => undefined),
    };
    const slow = new AnalysisEngine({
      store: hanging,
      config: mergeWithDefaults({ profile: { storeTimeoutMs: 20 } }),
    });

    const result = await slow.analyze(PY_MUTABLE_DEFAULT, 'python', 'u1');

    expect(result.degraded).toBe(true);
    expect(result.profile).toBeNull();
    expect(result.notices).toContainEqual({
      code: NoticeCode.PROFILE_STORE_UNAVAILABLE,
      message: 'Profile store read timed out after 20ms',
    });
    expect(result.recommendations).toHaveLength(2);
  });

  it('should degrade when the profile store fails to write', async () => {
    const broken: ProfileStore = {
      getProfile: async () => undefined,
      putProfile: async () => {
        throw new Error('disk gone');
      },
    };
    const result = await new AnalysisEngine({ store: broken }).analyze(PY_MUTABLE_DEFAULT, 'python', 'u1');

    expect(result.degraded).toBe(true);
    expect(result.notices).toContainEqual({
      code: NoticeCode.PROFILE_STORE_UNAVAILABLE,
      message: 'Profile store write failed: disk gone',
    });
  });

  it('should reject empty and non-text input', async () => {
    await expect(engine.analyze('')).rejects.toThrow(InvalidInputError);
    await expect(engine.analyze('   \n')).rejects.toThrow(InvalidInputError);
    await expect(engine.analyze(123)).rejects.toThrow(InvalidInputError);
  });

  it('should parse TypeScript with the grammar and report no notices', async () => {
    const result = await engine.analyze(
      'export function add(a: number, b: number): number {\n  return a + b;\n}\n',
      'typescript',
    );

    expect(result.language).toBe('typescript');
    expect(result.parseMode).toBe(ParseMode.GRAMMAR);
    expect(result.notices).toEqual([]);
    expect(result.metrics.numFunctions).toBe(1);
  });

  it('should rank security findings first', async () => {
    const result = await engine.analyze('import os\ndef run(cmd=[]):\n    os.system("ls " + cmd)\n', 'python');

    expect(result.patterns.securityIssues.map((issue) => issue.type)).toEqual(['shell_injection']);
    expect(result.recommendations.map((r) => r.priority)).toEqual([Priority.HIGH, Priority.MEDIUM, Priority.LOW]);
    expect(result.recommendations[0].tags).toEqual([FindingCategory.SECURITY_ISSUE, 'shell_injection']);
  });

  it('should give identical results for identical anonymous input', async () => {
    const first = await engine.analyze(PY_MUTABLE_DEFAULT, 'python');
    const second = await engine.analyze(PY_MUTABLE_DEFAULT, 'python');

    expect(second.id).not.toBe(first.id);
    expect({ ...second, id: first.id }).toEqual(first);
  });

  it('should report a failing rule and keep the other findings', async () => {
    const failing: PatternRule = {
      id: 'always_fails',
      title: 'Always fails',
      category: FindingCategory.CODE_SMELL,
      suggestion: 'None.',
      evaluate() {
        throw new Error('boom');
      },
    };
    const withBrokenRule = new AnalysisEngine({ rules: [...createDefaultRules(), failing] });

    const result = await withBrokenRule.analyze(PY_MUTABLE_DEFAULT, 'python');

    expect(result.notices).toContainEqual({
      code: NoticeCode.RULE_EVALUATION_SKIPPED,
      message: 'rule always_fails was skipped: boom',
      ruleId: 'always_fails',
    });
    expect(result.issues.map((issue) => issue.type)).toEqual(['mutable_default_argument']);
  });
});
